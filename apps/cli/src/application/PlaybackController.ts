/**
 * Playback Controller
 *
 * Drives playback on the daemon's device through the Spotify Web API and
 * keeps the local session: which playlist was started on which device, the
 * last applied volume and the running volume ramp, if any.
 */

import type { Logger } from 'pino';
import {
  PlaybackError,
  PlaybackState,
  PlaybackStatus,
  PlaylistRef,
  PlaylistUtils,
  Result,
  VolumeUtils,
  sleep,
  withRetry
} from '@spotify-controller/shared';
import {
  DEFAULT_PLAYBACK_CONTROLLER_OPTIONS,
  IDeviceDirectory,
  IDeviceManager,
  IPlaybackController,
  PlaybackControllerOptions,
  PlaybackDevice,
  VolumeRampResult
} from '../domain/controller';
import {
  ISpotifyWebApi,
  SpotifyAPIError,
  SpotifyAuthenticationError,
  SpotifyPlaybackStateResponse,
  isTransientSpotifyError
} from '../infrastructure/spotify';
import { describeError, toApiError } from './errorMapping';

export interface PlaybackControllerDependencies {
  api: ISpotifyWebApi;
  devices: IDeviceDirectory;
  daemon: Pick<IDeviceManager, 'ensureAvailable'>;
  logger: Logger;
}

interface PlaybackSession {
  readonly playlist: PlaylistRef;
  readonly deviceId: string;
  readonly deviceName: string;
}

const INITIAL_VOLUME = 50;

export class PlaybackController implements IPlaybackController {
  private readonly api: ISpotifyWebApi;
  private readonly devices: IDeviceDirectory;
  private readonly daemon: Pick<IDeviceManager, 'ensureAvailable'>;
  private readonly logger: Logger;
  private readonly options: PlaybackControllerOptions;

  private session: PlaybackSession | null = null;
  private playing = false;
  private volume = INITIAL_VOLUME;
  private ramp: AbortController | null = null;
  private volumeRequests = 0;

  constructor(dependencies: PlaybackControllerDependencies, options: Partial<PlaybackControllerOptions> = {}) {
    this.api = dependencies.api;
    this.devices = dependencies.devices;
    this.daemon = dependencies.daemon;
    this.logger = dependencies.logger;
    this.options = { ...DEFAULT_PLAYBACK_CONTROLLER_OPTIONS, ...options };
  }

  /**
   * Start `playlist` on the named device, recovering a crashed daemon first
   */
  async play(playlist: PlaylistRef, deviceName: string): Promise<Result<void, PlaybackError>> {
    this.cancelVolumeRamp();

    const available = await this.daemon.ensureAvailable();
    if (!available.success) {
      return { success: false, error: 'DEVICE_UNAVAILABLE' };
    }

    const device = await this.resolveDevice(deviceName);
    if (!device.success) {
      return device;
    }

    const contextUri = PlaylistUtils.contextUri(playlist);
    const started = await this.call('start playback', () =>
      this.api.startPlayback({ deviceId: device.value.id, contextUri })
    );

    if (!started.success) {
      // the device dropped out between lookup and start
      return started.error === 'NO_ACTIVE_SESSION'
        ? { success: false, error: 'DEVICE_UNAVAILABLE' }
        : started;
    }

    this.session = { playlist, deviceId: device.value.id, deviceName: device.value.name };
    this.playing = true;
    if (device.value.volume !== null) {
      this.volume = device.value.volume;
    }

    this.logger.info({ playlist: playlist.name, contextUri, device: device.value.name }, 'Playback started');
    return { success: true, value: undefined };
  }

  async pause(): Promise<Result<void, PlaybackError>> {
    this.cancelVolumeRamp();
    return this.sessionCommand('pause', (session) => this.api.pausePlayback(session.deviceId), () => {
      this.playing = false;
    });
  }

  async resume(): Promise<Result<void, PlaybackError>> {
    this.cancelVolumeRamp();
    return this.sessionCommand('resume', (session) => this.api.resumePlayback(session.deviceId), () => {
      this.playing = true;
    });
  }

  async next(): Promise<Result<void, PlaybackError>> {
    this.cancelVolumeRamp();
    return this.sessionCommand('skip to next track', (session) => this.api.skipToNext(session.deviceId));
  }

  async previous(): Promise<Result<void, PlaybackError>> {
    this.cancelVolumeRamp();
    return this.sessionCommand('skip to previous track', (session) => this.api.skipToPrevious(session.deviceId));
  }

  /**
   * Pause and forget the session
   */
  async stop(): Promise<Result<void, PlaybackError>> {
    this.cancelVolumeRamp();

    const session = this.session;
    if (!session) {
      return { success: false, error: 'NO_ACTIVE_SESSION' };
    }

    const paused = await this.call('stop playback', () => this.api.pausePlayback(session.deviceId));
    this.session = null;
    this.playing = false;

    if (!paused.success && paused.error !== 'NO_ACTIVE_SESSION') {
      return paused;
    }

    this.logger.info({ playlist: session.playlist.name }, 'Playback stopped');
    return { success: true, value: undefined };
  }

  /**
   * Out-of-range levels are clamped, never rejected
   */
  async setVolume(level: number): Promise<Result<number, PlaybackError>> {
    this.cancelVolumeRamp();

    const session = this.session;
    if (!session) {
      return { success: false, error: 'NO_ACTIVE_SESSION' };
    }

    return this.sendVolume(session, VolumeUtils.clamp(level));
  }

  /**
   * Move the volume from `start` to `end` in steps of `rampIncrement`,
   * spread evenly over `durationMs`. A later ramp or any playback command
   * cancels this one, which then resolves with `completed: false`.
   */
  async rampVolume(start: number, end: number, durationMs: number): Promise<Result<VolumeRampResult, PlaybackError>> {
    this.cancelVolumeRamp();

    const session = this.session;
    if (!session) {
      return { success: false, error: 'NO_ACTIVE_SESSION' };
    }

    const controller = new AbortController();
    this.ramp = controller;

    const from = VolumeUtils.clamp(start);
    const to = VolumeUtils.clamp(end);
    const increment = Math.max(1, this.options.rampIncrement);
    const steps = Math.ceil(Math.abs(to - from) / increment);
    const intervalMs = steps > 0 ? Math.max(0, durationMs) / steps : 0;

    this.logger.info({ from, to, steps, intervalMs }, 'Volume ramp started');

    try {
      const first = await this.sendVolume(session, from);
      if (!first.success) {
        return first;
      }

      let current = from;
      while (current !== to && !controller.signal.aborted) {
        await sleep(intervalMs, controller.signal);
        if (controller.signal.aborted) {
          break;
        }

        current = from < to ? Math.min(current + increment, to) : Math.max(current - increment, to);
        const applied = await this.sendVolume(session, current);
        if (!applied.success) {
          return applied;
        }
      }

      const completed = current === to;
      this.logger.info({ finalVolume: current, completed }, completed ? 'Volume ramp finished' : 'Volume ramp cancelled');
      return { success: true, value: { finalVolume: current, completed } };
    } finally {
      if (this.ramp === controller) {
        this.ramp = null;
      }
    }
  }

  cancelVolumeRamp(): void {
    if (this.ramp) {
      this.ramp.abort();
      this.ramp = null;
      this.logger.debug('Volume ramp cancelled');
    }
  }

  /**
   * Fetch the remote state and reconcile the local view with it
   */
  async getPlaybackState(): Promise<Result<PlaybackState | null, PlaybackError>> {
    const result = await this.call('read playback state', () => this.api.getPlaybackState());
    if (!result.success) {
      return result;
    }

    const remote = result.value;
    if (!remote) {
      this.playing = false;
      return { success: true, value: null };
    }

    this.playing = remote.is_playing;
    if (remote.device.volume_percent !== null && !this.ramp) {
      this.volume = remote.device.volume_percent;
    }

    return { success: true, value: toPlaybackState(remote, this.volume) };
  }

  getStatus(): PlaybackStatus {
    return {
      isPlaying: this.playing,
      volume: this.volume,
      rampActive: this.ramp !== null,
      playlist: this.session?.playlist.name ?? null,
      playlistId: this.session?.playlist.id ?? null,
      deviceName: this.session?.deviceName ?? null
    };
  }

  /**
   * Look the device up, retrying once after a short delay
   */
  private async resolveDevice(deviceName: string): Promise<Result<PlaybackDevice, PlaybackError>> {
    for (let attempt = 0; attempt <= 1; attempt++) {
      try {
        const device = await this.devices.findDevice(deviceName);
        if (device) {
          return { success: true, value: device };
        }
      } catch (error) {
        if (error instanceof SpotifyAuthenticationError) {
          return { success: false, error: 'AUTHENTICATION_FAILED' };
        }
        this.logger.warn({ deviceName, error: describeError(error) }, 'Device lookup failed');
      }

      if (attempt === 0) {
        this.logger.info({ deviceName, delayMs: this.options.deviceRetryDelayMs }, 'Device not found, retrying');
        await sleep(this.options.deviceRetryDelayMs);
      }
    }

    this.logger.error({ deviceName }, 'Device not available');
    return { success: false, error: 'DEVICE_UNAVAILABLE' };
  }

  /**
   * Only the most recently issued request updates the local volume, so a ramp
   * step answered after a manual change cannot overwrite it
   */
  private async sendVolume(session: PlaybackSession, level: number): Promise<Result<number, PlaybackError>> {
    const request = ++this.volumeRequests;
    const result = await this.call('set volume', () => this.api.setVolume(level, session.deviceId));
    if (!result.success) {
      return result;
    }
    if (request === this.volumeRequests) {
      this.volume = level;
      this.logger.debug({ volume: level }, 'Volume set');
    } else {
      this.logger.debug({ volume: level }, 'Superseded volume request answered');
    }
    return { success: true, value: level };
  }

  private async sessionCommand(
    action: string,
    operation: (session: PlaybackSession) => Promise<void>,
    onSuccess?: () => void
  ): Promise<Result<void, PlaybackError>> {
    const session = this.session;
    if (!session) {
      return { success: false, error: 'NO_ACTIVE_SESSION' };
    }

    const result = await this.call(action, () => operation(session));
    if (!result.success) {
      if (result.error === 'NO_ACTIVE_SESSION' && this.session === session) {
        this.session = null;
        this.playing = false;
      }
      return result;
    }

    onSuccess?.();
    this.logger.info({ action }, 'Playback command sent');
    return { success: true, value: undefined };
  }

  /**
   * Run an API call, retrying a transient failure once
   */
  private async call<T>(action: string, operation: () => Promise<T>): Promise<Result<T, PlaybackError>> {
    try {
      const value = await withRetry(operation, {
        retries: 1,
        delayMs: this.options.apiRetryDelayMs,
        isRetryable: isTransientSpotifyError,
        onRetry: (error) => this.logger.warn({ action, error: describeError(error) }, 'Transient Spotify error, retrying')
      });
      return { success: true, value };
    } catch (error) {
      this.logger.error({ action, error: describeError(error) }, 'Spotify playback request failed');
      if (error instanceof SpotifyAPIError && error.code === 'NO_ACTIVE_DEVICE') {
        return { success: false, error: 'NO_ACTIVE_SESSION' };
      }
      return { success: false, error: toApiError(error) };
    }
  }
}

function toPlaybackState(remote: SpotifyPlaybackStateResponse, fallbackVolume: number): PlaybackState {
  const track = remote.item;
  return {
    isPlaying: remote.is_playing,
    volume: remote.device.volume_percent ?? fallbackVolume,
    currentTrack: track ? `${track.name} - ${track.artists.map(artist => artist.name).join(', ')}` : null,
    progressMs: remote.progress_ms ?? undefined,
    durationMs: track?.duration_ms,
    deviceName: remote.device.name
  };
}
