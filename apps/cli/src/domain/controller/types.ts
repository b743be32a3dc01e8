/**
 * Core types for daemon supervision and playback control
 */

import { CpuArch, OsKind } from '@spotify-controller/shared';

/**
 * Per-OS settings for installing and configuring the daemon
 */
export interface PlatformStrategy {
  readonly osKind: OsKind;
  readonly deviceNameSuffix: string;
  readonly bitrate: 96 | 160 | 320;
  readonly normalisationPregain: number;
  /** Release asset name fragments, most specific first */
  assetCandidates(arch: CpuArch): readonly string[];
  installDir(home: string): string;
  configDir(home: string): string;
  cacheDir(home: string): string;
  /** Extra daemon config lines for this platform */
  readonly extraSettings: Readonly<Record<string, string | number | boolean>>;
}

/**
 * Release asset as listed by the GitHub releases API
 */
export interface ReleaseAsset {
  readonly name: string;
  readonly downloadUrl: string;
}

/**
 * Credentials written into the daemon config file
 */
export interface DaemonCredentials {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly username?: string | undefined;
  readonly password?: string | undefined;
}

export interface DeviceManagerOptions {
  /** Grace period for the device to appear after launch */
  readonly readinessTimeoutMs: number;
  readonly pollIntervalMs: number;
  /** Wait after SIGTERM before SIGKILL */
  readonly stopTimeoutMs: number;
  /** Automatic restarts allowed after consecutive crashes */
  readonly maxRestartAttempts: number;
  readonly homeDir: string;
}

export const DEFAULT_DEVICE_MANAGER_OPTIONS: Omit<DeviceManagerOptions, 'homeDir'> = {
  readinessTimeoutMs: 5000,
  pollIntervalMs: 500,
  stopTimeoutMs: 2000,
  maxRestartAttempts: 1
};

/**
 * A playback device as seen by the remote API
 */
export interface PlaybackDevice {
  readonly id: string;
  readonly name: string;
  readonly isActive: boolean;
  readonly volume: number | null;
}

export interface VolumeRampResult {
  readonly finalVolume: number;
  readonly completed: boolean;
}

export interface PlaybackControllerOptions {
  /** Delay before the single device lookup retry */
  readonly deviceRetryDelayMs: number;
  /** Delay before retrying a transient API failure */
  readonly apiRetryDelayMs: number;
  readonly rampIncrement: number;
}

export const DEFAULT_PLAYBACK_CONTROLLER_OPTIONS: PlaybackControllerOptions = {
  deviceRetryDelayMs: 2000,
  apiRetryDelayMs: 500,
  rampIncrement: 2
};
