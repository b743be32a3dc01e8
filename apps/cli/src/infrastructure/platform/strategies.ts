/**
 * Per-OS daemon settings: release assets, directories and audio tuning
 */

import path from 'path';
import { CpuArch, OsKind, PlatformProfile } from '@spotify-controller/shared';
import { PlatformStrategy } from '../../domain/controller';

const LINUX_ASSETS: Record<CpuArch, readonly string[]> = {
  x86_64: ['spotifyd-linux-x86_64'],
  arm64: ['spotifyd-linux-aarch64', 'spotifyd-linux-arm64'],
  armv7: ['spotifyd-linux-armv7', 'spotifyd-linux-armhf']
};

const MACOS_ASSETS: Record<CpuArch, readonly string[]> = {
  x86_64: ['spotifyd-macos-x86_64'],
  arm64: ['spotifyd-macos-aarch64', 'spotifyd-macos-arm64'],
  armv7: []
};

const xdgDirs = {
  installDir: (home: string) => path.join(home, '.local', 'bin'),
  configDir: (home: string) => path.join(home, '.config', 'spotifyd'),
  cacheDir: (home: string) => path.join(home, '.cache', 'spotifyd')
};

export const PLATFORM_STRATEGIES: Readonly<Record<OsKind, PlatformStrategy>> = {
  linux: {
    osKind: 'linux',
    deviceNameSuffix: 'Linux',
    bitrate: 320,
    normalisationPregain: -6,
    assetCandidates: (arch) => LINUX_ASSETS[arch],
    ...xdgDirs,
    extraSettings: {}
  },

  raspberry_pi: {
    osKind: 'raspberry_pi',
    deviceNameSuffix: 'RaspberryPi',
    bitrate: 160,
    normalisationPregain: -10,
    assetCandidates: (arch) => LINUX_ASSETS[arch],
    ...xdgDirs,
    extraSettings: {
      initial_volume: '50',
      max_cache_size: 1000000000
    }
  },

  macos: {
    osKind: 'macos',
    deviceNameSuffix: 'Mac',
    bitrate: 320,
    normalisationPregain: -6,
    assetCandidates: (arch) => MACOS_ASSETS[arch],
    installDir: (home) => path.join(home, '.local', 'bin'),
    configDir: (home) => path.join(home, 'Library', 'Application Support', 'spotifyd'),
    cacheDir: (home) => path.join(home, 'Library', 'Caches', 'spotifyd'),
    extraSettings: {}
  }
};

export function strategyFor(profile: PlatformProfile): PlatformStrategy {
  return PLATFORM_STRATEGIES[profile.osKind];
}

/**
 * Device name used when the configuration does not set one
 */
export function defaultDeviceName(profile: PlatformProfile): string {
  return `SpotifyBot-${strategyFor(profile).deviceNameSuffix}`;
}
