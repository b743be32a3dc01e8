/**
 * Spotify Web API Types
 *
 * Response shapes for the endpoints the controller calls, plus the adapter
 * and token provider interfaces.
 */

export interface SpotifyImage {
  url: string;
  width: number | null;
  height: number | null;
}

export interface SpotifyUser {
  id: string;
  display_name: string | null;
}

/**
 * Simplified playlist object returned by search and playlist listings
 */
export interface SpotifyPlaylist {
  id: string;
  name: string;
  uri: string;
  description: string | null;
  public: boolean | null;
  collaborative?: boolean;
  owner: SpotifyUser;
  tracks: { total: number };
  images?: SpotifyImage[];
}

/**
 * Search response for `type=playlist`. Spotify may return `null` entries.
 */
export interface SpotifyPlaylistSearchResponse {
  playlists: {
    href: string;
    limit: number;
    offset: number;
    total: number;
    next: string | null;
    items: Array<SpotifyPlaylist | null>;
  };
}

export interface SpotifyDevice {
  id: string | null;
  name: string;
  type: string;
  is_active: boolean;
  is_private_session: boolean;
  is_restricted: boolean;
  volume_percent: number | null;
}

export interface SpotifyDevicesResponse {
  devices: SpotifyDevice[];
}

export interface SpotifyTrack {
  id: string;
  name: string;
  uri: string;
  duration_ms: number;
  artists: Array<{ name: string }>;
}

/**
 * Response of GET /me/player
 */
export interface SpotifyPlaybackStateResponse {
  is_playing: boolean;
  progress_ms: number | null;
  item: SpotifyTrack | null;
  device: SpotifyDevice;
  context: { uri: string } | null;
}

/**
 * Spotify error envelope; player endpoints add a `reason`
 */
export interface SpotifyErrorResponse {
  error: {
    status: number;
    message: string;
    reason?: string;
  };
}

export interface StartPlaybackRequest {
  deviceId: string;
  contextUri?: string;
}

/**
 * Supplies a valid bearer token for each request
 */
export interface ITokenProvider {
  getAccessToken(): Promise<string>;
}

export interface SpotifyClientConfig {
  baseUrl?: string;
  timeout?: number;
  maxSearchResults?: number;
}

/**
 * Spotify Web API adapter interface
 */
export interface ISpotifyWebApi {
  getCurrentUser(): Promise<SpotifyUser>;
  searchPlaylists(query: string, limit?: number): Promise<SpotifyPlaylist[]>;
  getPlaylist(playlistId: string): Promise<SpotifyPlaylist>;
  getDevices(): Promise<SpotifyDevice[]>;
  getPlaybackState(): Promise<SpotifyPlaybackStateResponse | null>;
  startPlayback(request: StartPlaybackRequest): Promise<void>;
  resumePlayback(deviceId: string): Promise<void>;
  pausePlayback(deviceId: string): Promise<void>;
  skipToNext(deviceId: string): Promise<void>;
  skipToPrevious(deviceId: string): Promise<void>;
  setVolume(volumePercent: number, deviceId: string): Promise<void>;
}
