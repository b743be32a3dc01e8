/**
 * Playlist Manager
 *
 * Application service for playlist search. Ranking is left to the Spotify
 * search endpoint; results keep the order the API returns them in.
 */

import type { Logger } from 'pino';
import { ApiError, PlaylistSummary, Result } from '@spotify-controller/shared';
import { IPlaylistManager } from '../domain/controller';
import { ISpotifyWebApi, SpotifyPlaylist } from '../infrastructure/spotify';
import { describeError, toApiError } from './errorMapping';

export interface PlaylistManagerOptions {
  readonly searchLimit: number;
  readonly descriptionLength: number;
}

const DEFAULT_OPTIONS: PlaylistManagerOptions = {
  searchLimit: 10,
  descriptionLength: 100
};

export class PlaylistManager implements IPlaylistManager {
  private readonly options: PlaylistManagerOptions;

  constructor(
    private readonly api: ISpotifyWebApi,
    private readonly logger: Logger,
    options: Partial<PlaylistManagerOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async search(query: string): Promise<Result<PlaylistSummary[], ApiError>> {
    const trimmed = query.trim();
    if (trimmed.length === 0) {
      return { success: true, value: [] };
    }

    this.logger.info({ query: trimmed }, 'Searching playlists');

    try {
      const playlists = await this.api.searchPlaylists(trimmed, this.options.searchLimit);
      const results = playlists.map(toPlaylistSummary);
      this.logger.info({ query: trimmed, count: results.length }, 'Playlist search finished');
      return { success: true, value: results };
    } catch (error) {
      this.logger.error({ query: trimmed, error: describeError(error) }, 'Playlist search failed');
      return { success: false, error: toApiError(error) };
    }
  }

  async resolveFirst(query: string): Promise<Result<PlaylistSummary | null, ApiError>> {
    const result = await this.search(query);
    if (!result.success) {
      return result;
    }
    return { success: true, value: result.value[0] ?? null };
  }

  async getPlaylistInfo(playlistId: string): Promise<Result<PlaylistSummary, ApiError>> {
    try {
      const playlist = await this.api.getPlaylist(playlistId);
      this.logger.debug({ playlistId, name: playlist.name }, 'Fetched playlist info');
      return { success: true, value: toPlaylistSummary(playlist) };
    } catch (error) {
      this.logger.error({ playlistId, error: describeError(error) }, 'Could not fetch playlist info');
      return { success: false, error: toApiError(error) };
    }
  }

  /**
   * One-line description: 'Name' by owner (N tracks) [Public] - description
   */
  summarize(playlist: PlaylistSummary): string {
    let summary = `'${playlist.name}' by ${playlist.owner} (${playlist.trackCount} tracks)`;
    summary += playlist.isPublic ? ' [Public]' : ' [Private]';

    const description = playlist.description.trim();
    if (description.length > 0) {
      const limit = this.options.descriptionLength;
      summary += ` - ${description.length > limit ? `${description.slice(0, limit)}...` : description}`;
    }

    return summary;
  }
}

export function toPlaylistSummary(playlist: SpotifyPlaylist): PlaylistSummary {
  return {
    id: playlist.id,
    name: playlist.name,
    uri: playlist.uri,
    owner: playlist.owner.display_name || playlist.owner.id,
    trackCount: playlist.tracks.total,
    isPublic: playlist.public,
    description: playlist.description ?? ''
  };
}
