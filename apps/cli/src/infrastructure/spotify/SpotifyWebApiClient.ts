/**
 * Spotify Web API Adapter
 *
 * Infrastructure adapter for the Spotify Web API: playlist search, device
 * listing and player commands. Handles request timeouts and maps error
 * responses onto typed errors.
 */

import {
  ISpotifyWebApi,
  ITokenProvider,
  SpotifyClientConfig,
  SpotifyDevice,
  SpotifyDevicesResponse,
  SpotifyErrorResponse,
  SpotifyPlaybackStateResponse,
  SpotifyPlaylist,
  SpotifyPlaylistSearchResponse,
  SpotifyUser,
  StartPlaybackRequest
} from './types';

/**
 * Custom error types for Spotify API operations
 */
export class SpotifyAPIError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode?: number,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'SpotifyAPIError';
  }
}

export class SpotifyAuthenticationError extends SpotifyAPIError {
  constructor(message: string = 'Spotify authentication failed') {
    super(message, 'AUTHENTICATION_ERROR', 401);
    this.name = 'SpotifyAuthenticationError';
  }
}

export class SpotifyRateLimitError extends SpotifyAPIError {
  constructor(public readonly retryAfterSeconds: number | null, message: string = 'Spotify API rate limit exceeded') {
    super(message, 'RATE_LIMITED', 429);
    this.name = 'SpotifyRateLimitError';
  }
}

export class SpotifyTimeoutError extends SpotifyAPIError {
  constructor(message: string = 'Spotify API request timed out') {
    super(message, 'TIMEOUT_ERROR');
    this.name = 'SpotifyTimeoutError';
  }
}

/**
 * Errors worth a single retry: timeouts, network failures and 5xx replies
 */
export function isTransientSpotifyError(error: unknown): boolean {
  if (error instanceof SpotifyTimeoutError) {
    return true;
  }
  if (error instanceof SpotifyAPIError) {
    return error.code === 'NETWORK_ERROR' || error.code === 'SERVICE_UNAVAILABLE';
  }
  return false;
}

export class SpotifyWebApiClient implements ISpotifyWebApi {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly maxSearchResults: number;

  constructor(
    private readonly tokens: ITokenProvider,
    config: SpotifyClientConfig = {}
  ) {
    this.baseUrl = config.baseUrl || 'https://api.spotify.com/v1';
    this.timeout = config.timeout || 10000;
    this.maxSearchResults = config.maxSearchResults || 50; // Spotify API limit
  }

  async getCurrentUser(): Promise<SpotifyUser> {
    return this.requestJson<SpotifyUser>('GET', '/me');
  }

  /**
   * Search public playlists; the API's relevance order is preserved
   */
  async searchPlaylists(query: string, limit: number = 10): Promise<SpotifyPlaylist[]> {
    const trimmed = query.trim();
    if (trimmed.length === 0) {
      return [];
    }

    const params = new URLSearchParams({
      q: trimmed,
      type: 'playlist',
      limit: Math.max(1, Math.min(limit, this.maxSearchResults)).toString()
    });

    const data = await this.requestJson<SpotifyPlaylistSearchResponse>('GET', `/search?${params.toString()}`);

    if (!data.playlists || !Array.isArray(data.playlists.items)) {
      throw new SpotifyAPIError('Invalid Spotify search response format', 'INVALID_RESPONSE');
    }

    return data.playlists.items.filter((item): item is SpotifyPlaylist => item !== null && Boolean(item.name));
  }

  async getPlaylist(playlistId: string): Promise<SpotifyPlaylist> {
    const params = new URLSearchParams({ fields: 'id,name,uri,description,public,collaborative,owner,tracks.total,images' });
    return this.requestJson<SpotifyPlaylist>('GET', `/playlists/${encodeURIComponent(playlistId)}?${params.toString()}`);
  }

  async getDevices(): Promise<SpotifyDevice[]> {
    const data = await this.requestJson<SpotifyDevicesResponse>('GET', '/me/player/devices');
    if (!data.devices || !Array.isArray(data.devices)) {
      throw new SpotifyAPIError('Invalid Spotify devices response format', 'INVALID_RESPONSE');
    }
    return data.devices;
  }

  /**
   * Current playback, or null when nothing is active (204)
   */
  async getPlaybackState(): Promise<SpotifyPlaybackStateResponse | null> {
    const response = await this.send('GET', '/me/player');
    if (response.status === 204) {
      return null;
    }
    return await response.json() as SpotifyPlaybackStateResponse;
  }

  async startPlayback(request: StartPlaybackRequest): Promise<void> {
    const body = request.contextUri ? { context_uri: request.contextUri } : undefined;
    await this.send('PUT', `/me/player/play?${this.deviceQuery(request.deviceId)}`, body);
  }

  async resumePlayback(deviceId: string): Promise<void> {
    await this.send('PUT', `/me/player/play?${this.deviceQuery(deviceId)}`);
  }

  async pausePlayback(deviceId: string): Promise<void> {
    await this.send('PUT', `/me/player/pause?${this.deviceQuery(deviceId)}`);
  }

  async skipToNext(deviceId: string): Promise<void> {
    await this.send('POST', `/me/player/next?${this.deviceQuery(deviceId)}`);
  }

  async skipToPrevious(deviceId: string): Promise<void> {
    await this.send('POST', `/me/player/previous?${this.deviceQuery(deviceId)}`);
  }

  async setVolume(volumePercent: number, deviceId: string): Promise<void> {
    const params = new URLSearchParams({
      volume_percent: volumePercent.toString(),
      device_id: deviceId
    });
    await this.send('PUT', `/me/player/volume?${params.toString()}`);
  }

  private deviceQuery(deviceId: string): string {
    return new URLSearchParams({ device_id: deviceId }).toString();
  }

  private async requestJson<T>(method: string, path: string, body?: unknown): Promise<T> {
    const response = await this.send(method, path, body);
    try {
      return await response.json() as T;
    } catch (error) {
      throw new SpotifyAPIError('Spotify returned a response that is not JSON', 'INVALID_RESPONSE', response.status, error);
    }
  }

  /**
   * Make HTTP request with timeout and error handling
   */
  private async send(method: string, path: string, body?: unknown): Promise<Response> {
    const token = await this.tokens.getAccessToken();
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    const headers: Record<string, string> = {
      'Accept': 'application/json',
      'Authorization': `Bearer ${token}`
    };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: controller.signal
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new SpotifyTimeoutError(`Request timed out after ${this.timeout}ms`);
      }

      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      throw new SpotifyAPIError(`Spotify request failed: ${errorMessage}`, 'NETWORK_ERROR', undefined, error);
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      await this.handleErrorResponse(response);
    }

    return response;
  }

  /**
   * Handle Spotify API error responses
   */
  private async handleErrorResponse(response: Response): Promise<never> {
    let errorData: SpotifyErrorResponse | null = null;

    try {
      errorData = await response.json() as SpotifyErrorResponse;
    } catch {
      errorData = null; // body is not JSON; fall back to the status text
    }

    const statusCode = response.status;
    const errorMessage = errorData?.error?.message || response.statusText || 'Unknown error';

    switch (statusCode) {
      case 400:
        throw new SpotifyAPIError(errorMessage, 'BAD_REQUEST', statusCode, errorData);

      case 401:
        throw new SpotifyAuthenticationError(`Spotify rejected the access token: ${errorMessage}`);

      case 403:
        throw new SpotifyAPIError(errorMessage, 'FORBIDDEN', statusCode, errorData);

      case 404:
        if (errorData?.error?.reason === 'NO_ACTIVE_DEVICE') {
          throw new SpotifyAPIError(errorMessage, 'NO_ACTIVE_DEVICE', statusCode, errorData);
        }
        throw new SpotifyAPIError(errorMessage, 'NOT_FOUND', statusCode, errorData);

      case 429: {
        const retryAfter = Number.parseInt(response.headers.get('Retry-After') ?? '', 10);
        throw new SpotifyRateLimitError(Number.isNaN(retryAfter) ? null : retryAfter);
      }

      case 500:
      case 502:
      case 503:
      case 504:
        throw new SpotifyAPIError('Spotify API is temporarily unavailable', 'SERVICE_UNAVAILABLE', statusCode, errorData);

      default:
        throw new SpotifyAPIError(errorMessage, 'UNKNOWN_ERROR', statusCode, errorData);
    }
  }
}
