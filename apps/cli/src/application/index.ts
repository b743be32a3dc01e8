/**
 * Application services
 */

export { PlaylistManager, toPlaylistSummary } from './PlaylistManager';
export type { PlaylistManagerOptions } from './PlaylistManager';
export { PlaybackController } from './PlaybackController';
export type { PlaybackControllerDependencies } from './PlaybackController';
export { DeviceDirectory } from './DeviceDirectory';
export { toApiError, describeError } from './errorMapping';
