/**
 * Shared domain tests: volume rules, handles, playlists and the error taxonomy
 */

import * as fc from 'fast-check';
import {
  ControllerError,
  DaemonHandleFactory,
  ErrorFactory,
  MAX_VOLUME,
  MIN_VOLUME,
  PlatformProfileFactory,
  PlaylistUtils,
  VolumeUtils,
  formatDuration
} from '../index';

describe('VolumeUtils', () => {
  test('clamps out-of-range levels', () => {
    expect(VolumeUtils.clamp(150)).toBe(100);
    expect(VolumeUtils.clamp(-5)).toBe(0);
    expect(VolumeUtils.clamp(Number.NaN)).toBe(0);
  });

  test('rounds fractional levels', () => {
    expect(VolumeUtils.clamp(42.6)).toBe(43);
    expect(VolumeUtils.clamp(42.4)).toBe(42);
  });

  /**
   * Any number maps to an integer in [0, 100]; in-range integers are kept
   */
  test('Property: clamp always yields a valid volume', () => {
    fc.assert(fc.property(fc.double(), (level: number) => {
      const clamped = VolumeUtils.clamp(level);
      return Number.isInteger(clamped) && clamped >= MIN_VOLUME && clamped <= MAX_VOLUME;
    }));

    fc.assert(fc.property(fc.integer({ min: 0, max: 100 }), (level: number) => VolumeUtils.clamp(level) === level));
  });
});

describe('formatDuration', () => {
  test('formats milliseconds as m:ss', () => {
    expect(formatDuration(0)).toBe('0:00');
    expect(formatDuration(65_000)).toBe('1:05');
    expect(formatDuration(3_599_999)).toBe('59:59');
  });

  test('treats negative durations as zero', () => {
    expect(formatDuration(-1_000)).toBe('0:00');
  });
});

describe('PlaylistUtils', () => {
  test('builds the playlist context URI', () => {
    expect(PlaylistUtils.contextUri({ id: '37i9dQZF1DX0XUsuxWHRQd', name: 'Focus' }))
      .toBe('spotify:playlist:37i9dQZF1DX0XUsuxWHRQd');
  });
});

describe('DaemonHandleFactory', () => {
  test('creates frozen snapshots', () => {
    const handle = DaemonHandleFactory.stopped('/usr/bin/spotifyd', 'Bot');

    expect(Object.isFrozen(handle)).toBe(true);
    expect(handle).toEqual({ processId: null, binaryPath: '/usr/bin/spotifyd', deviceName: 'Bot', state: 'stopped' });
  });

  test('derives a new handle without touching the original', () => {
    const stopped = DaemonHandleFactory.stopped('/usr/bin/spotifyd', 'Bot');
    const running = DaemonHandleFactory.with(stopped, { processId: 4242, state: 'running' });

    expect(running.state).toBe('running');
    expect(running.processId).toBe(4242);
    expect(stopped.state).toBe('stopped');
  });

  test('treats starting and running handles as alive', () => {
    const base = DaemonHandleFactory.notInstalled('Bot');

    expect(DaemonHandleFactory.isAlive(base)).toBe(false);
    expect(DaemonHandleFactory.isAlive(DaemonHandleFactory.with(base, { state: 'starting' }))).toBe(true);
    expect(DaemonHandleFactory.isAlive(DaemonHandleFactory.with(base, { state: 'running' }))).toBe(true);
    expect(DaemonHandleFactory.isAlive(DaemonHandleFactory.with(base, { state: 'crashed' }))).toBe(false);
  });
});

describe('PlatformProfileFactory', () => {
  test('describes a profile in one line', () => {
    const profile = PlatformProfileFactory.create('raspberry_pi', 'armv7', 'alsa');
    expect(PlatformProfileFactory.describe(profile)).toBe('raspberry_pi/armv7 (alsa)');
  });
});

describe('ErrorFactory', () => {
  const codes: ControllerError[] = [
    'UNSUPPORTED_PLATFORM',
    'DOWNLOAD_FAILED',
    'LAUNCH_FAILED',
    'DEVICE_UNAVAILABLE',
    'NO_ACTIVE_SESSION',
    'AUTHENTICATION_FAILED',
    'API_REQUEST_FAILED',
    'CONFIG_INVALID'
  ];

  test('has a message and a suggestion for every code', () => {
    for (const code of codes) {
      const details = ErrorFactory.create(code);
      expect(details.code).toBe(code);
      expect(details.message.length).toBeGreaterThan(0);
      expect(details.suggestion?.length).toBeGreaterThan(0);
    }
  });

  test('keeps context only when given', () => {
    expect(ErrorFactory.create('LAUNCH_FAILED').context).toBeUndefined();
    expect(ErrorFactory.create('LAUNCH_FAILED', { pid: 12 }).context).toEqual({ pid: 12 });
  });

  test('describes an error on one line', () => {
    expect(ErrorFactory.describe('NO_ACTIVE_SESSION'))
      .toBe('Nothing is playing right now. Enter a playlist name to start playback.');
  });
});
