/**
 * Controller domain exports
 */

export type {
  PlatformStrategy,
  ReleaseAsset,
  DaemonCredentials,
  DeviceManagerOptions,
  PlaybackDevice,
  VolumeRampResult,
  PlaybackControllerOptions
} from './types';

export { DEFAULT_DEVICE_MANAGER_OPTIONS, DEFAULT_PLAYBACK_CONTROLLER_OPTIONS } from './types';

export type {
  IHostEnvironment,
  IPlatformDetector,
  IDaemonInstaller,
  IDeviceVisibility,
  IDeviceManager,
  IDeviceDirectory,
  IPlaylistManager,
  IPlaybackController
} from './interfaces';
