/**
 * Playlist reference resolved from a search; transient, never persisted
 */
export interface PlaylistRef {
  readonly id: string;
  readonly name: string;
}

/**
 * Search result with the details shown when the user picks a playlist
 */
export interface PlaylistSummary extends PlaylistRef {
  readonly uri: string;
  readonly owner: string;
  readonly trackCount: number;
  readonly isPublic: boolean | null;
  readonly description: string;
}

export class PlaylistUtils {
  static contextUri(playlist: PlaylistRef): string {
    return `spotify:playlist:${playlist.id}`;
  }
}
