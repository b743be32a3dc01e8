import { ApiError } from '@spotify-controller/shared';
import { SpotifyAPIError, SpotifyAuthenticationError } from '../infrastructure/spotify';

/**
 * Map an adapter exception onto the API error codes services return
 */
export function toApiError(error: unknown): ApiError {
  if (error instanceof SpotifyAuthenticationError) {
    return 'AUTHENTICATION_FAILED';
  }
  return 'API_REQUEST_FAILED';
}

/**
 * Serializable description of an adapter exception for log lines
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof SpotifyAPIError) {
    return { code: error.code, statusCode: error.statusCode, message: error.message };
  }
  if (error instanceof Error) {
    return { message: error.message };
  }
  return { message: String(error) };
}
