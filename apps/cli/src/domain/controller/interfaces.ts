/**
 * Core interfaces for the Spotify controller
 * Ports between the application services and the infrastructure adapters
 */

import {
  ApiError,
  DaemonHandle,
  DaemonState,
  DeviceError,
  InstallError,
  LaunchError,
  PlatformError,
  PlatformProfile,
  PlaybackError,
  PlaybackState,
  PlaybackStatus,
  PlaylistRef,
  PlaylistSummary,
  Result
} from '@spotify-controller/shared';
import { DaemonCredentials, PlaybackDevice, VolumeRampResult } from './types';

/**
 * Reads host facts: OS, CPU, marker files and executables on PATH
 */
export interface IHostEnvironment {
  platform(): string;
  arch(): string;
  /** File contents, or null when the file cannot be read */
  readTextFile(path: string): string | null;
  hasExecutable(name: string): boolean;
}

/**
 * Classifies the host once at startup
 */
export interface IPlatformDetector {
  detect(): Result<PlatformProfile, PlatformError>;
}

/**
 * Fetches the daemon binary for a platform
 */
export interface IDaemonInstaller {
  /**
   * Download and install the binary at `targetPath`
   */
  install(profile: PlatformProfile, targetPath: string): Promise<Result<string, InstallError>>;
}

/**
 * Answers whether a named device is registered with the remote API
 */
export interface IDeviceVisibility {
  isDeviceVisible(deviceName: string): Promise<boolean>;
}

/**
 * Daemon lifecycle supervisor
 */
export interface IDeviceManager {
  /**
   * Locate or download the daemon binary
   */
  ensureInstalled(): Promise<Result<string, InstallError>>;

  /**
   * Launch the daemon and wait until its device is visible
   */
  start(deviceName: string): Promise<Result<DaemonHandle, LaunchError>>;

  /**
   * Stop the daemon; a no-op when nothing runs
   */
  stop(): Promise<void>;

  restart(): Promise<Result<DaemonHandle, LaunchError>>;

  /**
   * Process liveness only, no network
   */
  healthCheck(): DaemonState;

  /**
   * Restart a crashed daemon within the restart budget
   */
  ensureAvailable(): Promise<Result<DaemonHandle, DeviceError>>;

  writeDaemonConfig(deviceName: string, credentials: DaemonCredentials): Promise<Result<string, LaunchError>>;

  getHandle(): DaemonHandle;

  /**
   * Synchronous kill for process exit hooks
   */
  killSync(): void;
}

/**
 * Resolves playback devices by name
 */
export interface IDeviceDirectory extends IDeviceVisibility {
  findDevice(deviceName: string): Promise<PlaybackDevice | null>;
}

/**
 * Playlist search against the remote API
 */
export interface IPlaylistManager {
  search(query: string): Promise<Result<PlaylistSummary[], ApiError>>;
  resolveFirst(query: string): Promise<Result<PlaylistSummary | null, ApiError>>;
  getPlaylistInfo(playlistId: string): Promise<Result<PlaylistSummary, ApiError>>;
  summarize(playlist: PlaylistSummary): string;
}

/**
 * Playback commands on the daemon's device
 */
export interface IPlaybackController {
  play(playlist: PlaylistRef, deviceName: string): Promise<Result<void, PlaybackError>>;
  pause(): Promise<Result<void, PlaybackError>>;
  resume(): Promise<Result<void, PlaybackError>>;
  stop(): Promise<Result<void, PlaybackError>>;
  next(): Promise<Result<void, PlaybackError>>;
  previous(): Promise<Result<void, PlaybackError>>;

  /**
   * Apply a clamped volume; resolves with the level actually applied
   */
  setVolume(level: number): Promise<Result<number, PlaybackError>>;

  rampVolume(start: number, end: number, durationMs: number): Promise<Result<VolumeRampResult, PlaybackError>>;
  cancelVolumeRamp(): void;

  getPlaybackState(): Promise<Result<PlaybackState | null, PlaybackError>>;
  getStatus(): PlaybackStatus;
}
