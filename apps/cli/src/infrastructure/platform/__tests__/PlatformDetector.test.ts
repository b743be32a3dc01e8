/**
 * PlatformDetector Tests
 *
 * Detection runs against a StaticHostEnvironment, so every case is a fixed
 * set of host facts.
 */

import * as fc from 'fast-check';
import { PlatformDetector } from '../PlatformDetector';
import { StaticHostEnvironment } from '../../../__tests__/setup/host-environment';

const detect = (facts: ConstructorParameters<typeof StaticHostEnvironment>[0]) =>
  new PlatformDetector(new StaticHostEnvironment(facts)).detect();

describe('PlatformDetector', () => {
  describe('OS and architecture', () => {
    it('should detect an x86_64 Linux host', () => {
      expect(detect({ platform: 'linux', arch: 'x64' })).toEqual({
        success: true,
        value: { osKind: 'linux', arch: 'x86_64', audioBackend: 'alsa' }
      });
    });

    it('should detect Apple Silicon macOS with CoreAudio', () => {
      expect(detect({ platform: 'darwin', arch: 'arm64' })).toEqual({
        success: true,
        value: { osKind: 'macos', arch: 'arm64', audioBackend: 'coreaudio' }
      });
    });

    it('should map 32-bit ARM to armv7', () => {
      const result = detect({ platform: 'linux', arch: 'arm' });
      expect(result.success && result.value.arch).toBe('armv7');
    });

    it('should reject an unsupported OS', () => {
      expect(detect({ platform: 'win32', arch: 'x64' })).toEqual({ success: false, error: 'UNSUPPORTED_PLATFORM' });
    });

    it('should reject an unsupported CPU architecture', () => {
      expect(detect({ platform: 'linux', arch: 'ia32' })).toEqual({ success: false, error: 'UNSUPPORTED_PLATFORM' });
    });

    it('should not treat object prototype keys as architectures', () => {
      expect(detect({ platform: 'linux', arch: 'constructor' }).success).toBe(false);
    });
  });

  describe('Raspberry Pi markers', () => {
    it('should detect a Pi from the device tree model', () => {
      const result = detect({
        platform: 'linux',
        arch: 'arm64',
        files: { '/proc/device-tree/model': 'Raspberry Pi 4 Model B Rev 1.4\u0000' }
      });
      expect(result.success && result.value.osKind).toBe('raspberry_pi');
    });

    it('should detect a Pi from the firmware model file', () => {
      const result = detect({
        platform: 'linux',
        arch: 'arm',
        files: { '/sys/firmware/devicetree/base/model': 'Raspberry Pi 3 Model B Plus' }
      });
      expect(result.success && result.value.osKind).toBe('raspberry_pi');
    });

    it('should fall back to a Broadcom SoC in cpuinfo', () => {
      const result = detect({
        platform: 'linux',
        arch: 'arm',
        files: { '/proc/cpuinfo': 'processor\t: 0\nHardware\t: BCM2835\nRevision\t: a02082\n' }
      });
      expect(result.success && result.value.osKind).toBe('raspberry_pi');
    });

    it('should keep other ARM boards as plain Linux', () => {
      const result = detect({
        platform: 'linux',
        arch: 'arm64',
        files: {
          '/proc/device-tree/model': 'Pine64 RockPro64 v2.1',
          '/proc/cpuinfo': 'processor\t: 0\nHardware\t: Rockchip RK3399\n'
        }
      });
      expect(result.success && result.value.osKind).toBe('linux');
    });

    it('should ignore Pi markers on macOS', () => {
      const result = detect({
        platform: 'darwin',
        arch: 'arm64',
        files: { '/proc/cpuinfo': 'Raspberry Pi' }
      });
      expect(result.success && result.value.osKind).toBe('macos');
    });
  });

  describe('audio backend', () => {
    it('should prefer PulseAudio when pulseaudio is installed', () => {
      const result = detect({ platform: 'linux', arch: 'x64', executables: ['pulseaudio'] });
      expect(result.success && result.value.audioBackend).toBe('pulseaudio');
    });

    it('should prefer PulseAudio when only pactl is installed', () => {
      const result = detect({ platform: 'linux', arch: 'x64', executables: ['pactl'] });
      expect(result.success && result.value.audioBackend).toBe('pulseaudio');
    });

    it('should default to ALSA', () => {
      const result = detect({ platform: 'linux', arch: 'arm64', executables: ['aplay'] });
      expect(result.success && result.value.audioBackend).toBe('alsa');
    });
  });

  /**
   * Every supported (OS, arch) pair yields a profile with an audio backend
   */
  test('Property: supported hosts always get an audio backend', () => {
    fc.assert(fc.property(
      fc.constantFrom('linux', 'darwin'),
      fc.constantFrom('x64', 'arm64', 'arm'),
      fc.boolean(),
      fc.subarray(['pulseaudio', 'pactl', 'aplay']),
      (platform: string, arch: string, pi: boolean, executables: string[]) => {
        const files: Record<string, string> = pi ? { '/proc/device-tree/model': 'Raspberry Pi 5 Model B' } : {};
        const result = detect({ platform, arch, files, executables });

        if (!result.success) {
          return false;
        }
        return ['alsa', 'pulseaudio', 'coreaudio'].includes(result.value.audioBackend);
      }
    ));
  });
});
