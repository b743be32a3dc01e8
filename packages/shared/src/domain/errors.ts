/**
 * Error taxonomy for the Spotify controller
 */

/**
 * Platform and daemon installation errors
 */
export type PlatformError = 'UNSUPPORTED_PLATFORM';

export type InstallError = 'DOWNLOAD_FAILED' | 'UNSUPPORTED_PLATFORM';

/**
 * Daemon lifecycle errors
 */
export type LaunchError = 'LAUNCH_FAILED';

export type DeviceError = 'DEVICE_UNAVAILABLE';

/**
 * Remote API errors
 */
export type ApiError =
  | 'AUTHENTICATION_FAILED'
  | 'API_REQUEST_FAILED';

/**
 * Playback command errors
 */
export type PlaybackError =
  | 'DEVICE_UNAVAILABLE'
  | 'NO_ACTIVE_SESSION'
  | ApiError;

/**
 * Every error code a controller operation can surface
 */
export type ControllerError =
  | InstallError
  | LaunchError
  | PlaybackError
  | 'CONFIG_INVALID';

/**
 * Error details with context information
 */
export interface ErrorDetails {
  code: ControllerError;
  message: string;
  context?: Record<string, unknown> | undefined;
  suggestion?: string | undefined;
}

const MESSAGES: Record<ControllerError, string> = {
  UNSUPPORTED_PLATFORM: 'This operating system or CPU architecture is not supported',
  DOWNLOAD_FAILED: 'Failed to download the spotifyd binary',
  LAUNCH_FAILED: 'spotifyd failed to start',
  DEVICE_UNAVAILABLE: 'The playback device is not available',
  NO_ACTIVE_SESSION: 'Nothing is playing right now',
  AUTHENTICATION_FAILED: 'Spotify authentication failed',
  API_REQUEST_FAILED: 'The Spotify request failed',
  CONFIG_INVALID: 'The configuration file is invalid'
};

const SUGGESTIONS: Record<ControllerError, string> = {
  UNSUPPORTED_PLATFORM: 'Supported platforms are Linux, macOS and Raspberry Pi on x86_64, arm64 or armv7',
  DOWNLOAD_FAILED: 'Check your internet connection or install spotifyd manually into ~/.local/bin',
  LAUNCH_FAILED: 'Check logs/device_manager.log and the spotifyd configuration',
  DEVICE_UNAVAILABLE: 'Wait a few seconds for the device to register, then try again',
  NO_ACTIVE_SESSION: 'Enter a playlist name to start playback',
  AUTHENTICATION_FAILED: 'Check spotify.client_id and spotify.client_secret, then delete the token cache and sign in again',
  API_REQUEST_FAILED: 'Try the command again in a moment',
  CONFIG_INVALID: 'Fix the reported keys in the configuration file'
};

/**
 * Error factory for creating consistent error responses
 */
export class ErrorFactory {
  static create(error: ControllerError, context?: Record<string, unknown> | undefined): ErrorDetails {
    return {
      code: error,
      message: MESSAGES[error],
      context: context || undefined,
      suggestion: SUGGESTIONS[error]
    };
  }

  /**
   * Render an error as a single line for the terminal
   */
  static describe(error: ControllerError): string {
    return `${MESSAGES[error]}. ${SUGGESTIONS[error]}.`;
  }
}
