/**
 * Playback state as reported by the remote API.
 * Not locally authoritative: updated optimistically, then reconciled.
 */
export interface PlaybackState {
  readonly isPlaying: boolean;
  readonly volume: number; // 0-100
  readonly currentTrack: string | null;
  readonly progressMs?: number;
  readonly durationMs?: number;
  readonly deviceName?: string;
}

/**
 * Local view of the controller used by the `status` command
 */
export interface PlaybackStatus {
  readonly isPlaying: boolean;
  readonly volume: number;
  readonly rampActive: boolean;
  readonly playlist: string | null;
  readonly playlistId: string | null;
  readonly deviceName: string | null;
}

export const MIN_VOLUME = 0;
export const MAX_VOLUME = 100;

export class VolumeUtils {
  /**
   * Clamp any numeric input into the 0-100 range
   */
  static clamp(level: number): number {
    if (Number.isNaN(level)) {
      return MIN_VOLUME;
    }
    return Math.max(MIN_VOLUME, Math.min(MAX_VOLUME, Math.round(level)));
  }
}

/**
 * Format milliseconds as m:ss
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}:${seconds.toString().padStart(2, '0')}`;
}
