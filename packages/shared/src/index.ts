/**
 * Shared types and contracts for the Spotify controller
 *
 * Domain entities, the error taxonomy and the small async helpers used by
 * both the infrastructure adapters and the application services.
 */

// Domain entities and value objects
export type { OsKind, CpuArch, AudioBackend, PlatformProfile } from './domain/PlatformProfile';
export { PlatformProfileFactory, OS_KINDS, CPU_ARCHS } from './domain/PlatformProfile';

export type { DaemonState, DaemonHandle } from './domain/DaemonHandle';
export { DaemonHandleFactory } from './domain/DaemonHandle';

export type { PlaylistRef, PlaylistSummary } from './domain/Playlist';
export { PlaylistUtils } from './domain/Playlist';

export type { PlaybackState, PlaybackStatus } from './domain/PlaybackState';
export { VolumeUtils, formatDuration, MIN_VOLUME, MAX_VOLUME } from './domain/PlaybackState';

// Error types and utilities
export type {
  PlatformError,
  InstallError,
  LaunchError,
  DeviceError,
  ApiError,
  PlaybackError,
  ControllerError,
  ErrorDetails
} from './domain/errors';
export { ErrorFactory } from './domain/errors';

// Utility types
export type { Result } from './domain/Result';

export type { RetryOptions } from './utils/retry';
export { withRetry, pollUntil, sleep } from './utils/retry';
