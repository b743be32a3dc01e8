/**
 * Spotify infrastructure exports
 */

export {
  SpotifyWebApiClient,
  SpotifyAPIError,
  SpotifyAuthenticationError,
  SpotifyRateLimitError,
  SpotifyTimeoutError,
  isTransientSpotifyError
} from './SpotifyWebApiClient';
export { SpotifyOAuth, SPOTIFY_SCOPES } from './SpotifyOAuth';
export type { SpotifyOAuthConfig, SpotifyOAuthDependencies, TokenCache } from './SpotifyOAuth';
export { AuthCallbackServer } from './AuthCallbackServer';
export type { AuthCallbackServerConfig, IAuthCodeReceiver } from './AuthCallbackServer';
export type {
  ISpotifyWebApi,
  ITokenProvider,
  SpotifyClientConfig,
  SpotifyDevice,
  SpotifyPlaylist,
  SpotifyPlaybackStateResponse,
  StartPlaybackRequest
} from './types';
