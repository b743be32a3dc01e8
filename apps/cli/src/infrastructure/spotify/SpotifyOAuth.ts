/**
 * Spotify OAuth (authorization code flow)
 *
 * Keeps the access token in a JSON cache file, refreshes it shortly before
 * it expires, and runs the interactive browser sign-in when no usable
 * refresh token exists.
 */

import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import type { Logger } from 'pino';
import { z } from 'zod';
import { AuthCallbackServer, IAuthCodeReceiver } from './AuthCallbackServer';
import { SpotifyAuthenticationError } from './SpotifyWebApiClient';
import { ITokenProvider } from './types';

export const SPOTIFY_SCOPES: readonly string[] = [
  'user-read-playback-state',
  'user-modify-playback-state',
  'playlist-read-private',
  'playlist-read-collaborative'
];

export interface SpotifyOAuthConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  cachePath: string;
  scopes?: readonly string[];
  accountsUrl?: string;
  authorizeTimeoutMs?: number;
}

export interface SpotifyOAuthDependencies {
  /** Shows the sign-in URL to the user */
  onAuthorizeUrl?: (url: string) => void;
  createCodeReceiver?: (redirectUri: string) => IAuthCodeReceiver;
  now?: () => number;
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string(),
  expires_in: z.number().positive(),
  scope: z.string().optional(),
  refresh_token: z.string().optional()
});

const tokenCacheSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string(),
  expires_at: z.number(),
  scope: z.string(),
  refresh_token: z.string().nullable()
});

export type TokenCache = z.infer<typeof tokenCacheSchema>;

// Refresh this many seconds before the token actually expires
const EXPIRY_MARGIN_SECONDS = 60;

export class SpotifyOAuth implements ITokenProvider {
  private readonly accountsUrl: string;
  private readonly scopes: readonly string[];
  private readonly authorizeTimeoutMs: number;
  private readonly now: () => number;
  private token: TokenCache | null = null;
  private cacheLoaded = false;

  constructor(
    private readonly config: SpotifyOAuthConfig,
    private readonly logger: Logger,
    private readonly dependencies: SpotifyOAuthDependencies = {}
  ) {
    this.accountsUrl = config.accountsUrl || 'https://accounts.spotify.com';
    this.scopes = config.scopes || SPOTIFY_SCOPES;
    this.authorizeTimeoutMs = config.authorizeTimeoutMs || 5 * 60 * 1000;
    this.now = dependencies.now || Date.now;
  }

  /**
   * Return a valid access token, refreshing it when needed.
   * Never starts the interactive flow; call `ensureAuthorized` at startup.
   */
  async getAccessToken(): Promise<string> {
    await this.loadCache();

    if (this.token && !this.isExpired(this.token)) {
      return this.token.access_token;
    }

    if (this.token?.refresh_token) {
      const refreshed = await this.refresh(this.token.refresh_token);
      return refreshed.access_token;
    }

    throw new SpotifyAuthenticationError('Not signed in to Spotify');
  }

  /**
   * Make sure a usable token exists, signing in through the browser if needed
   */
  async ensureAuthorized(): Promise<void> {
    try {
      await this.getAccessToken();
      return;
    } catch (error) {
      if (!(error instanceof SpotifyAuthenticationError)) {
        throw error;
      }
      this.logger.info({ reason: error.message }, 'Cached Spotify token unusable, starting authorization');
    }

    await this.authorize();
  }

  getAuthorizeUrl(state: string): string {
    const params = new URLSearchParams({
      client_id: this.config.clientId,
      response_type: 'code',
      redirect_uri: this.config.redirectUri,
      scope: this.scopes.join(' '),
      state
    });
    return `${this.accountsUrl}/authorize?${params.toString()}`;
  }

  /**
   * Interactive sign-in: open the URL, wait for the redirect, exchange the code
   */
  async authorize(): Promise<TokenCache> {
    const receiver = this.dependencies.createCodeReceiver
      ? this.dependencies.createCodeReceiver(this.config.redirectUri)
      : new AuthCallbackServer(AuthCallbackServer.fromRedirectUri(this.config.redirectUri));

    const state = randomUUID();
    await receiver.start();

    try {
      const codePromise = receiver.waitForCode(state, this.authorizeTimeoutMs);
      const url = this.getAuthorizeUrl(state);
      this.logger.info('Waiting for Spotify authorization');
      (this.dependencies.onAuthorizeUrl ?? ((authorizeUrl: string) => console.log(`Open this URL to sign in to Spotify:\n${authorizeUrl}`)))(url);

      const code = await codePromise;
      return await this.exchangeCode(code);
    } finally {
      await receiver.stop();
    }
  }

  async exchangeCode(code: string): Promise<TokenCache> {
    const token = await this.requestToken(new URLSearchParams({
      grant_type: 'authorization_code',
      code,
      redirect_uri: this.config.redirectUri
    }), null);

    this.logger.info('Spotify authorization completed');
    return token;
  }

  async refresh(refreshToken: string): Promise<TokenCache> {
    this.logger.debug('Refreshing Spotify access token');
    return this.requestToken(new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: refreshToken
    }), refreshToken);
  }

  private isExpired(token: TokenCache): boolean {
    return token.expires_at - EXPIRY_MARGIN_SECONDS <= Math.floor(this.now() / 1000);
  }

  private async requestToken(body: URLSearchParams, previousRefreshToken: string | null): Promise<TokenCache> {
    const credentials = Buffer.from(`${this.config.clientId}:${this.config.clientSecret}`).toString('base64');

    let response: Response;
    try {
      response = await fetch(`${this.accountsUrl}/api/token`, {
        method: 'POST',
        headers: {
          'Authorization': `Basic ${credentials}`,
          'Content-Type': 'application/x-www-form-urlencoded'
        },
        body: body.toString()
      });
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      throw new SpotifyAuthenticationError(`Token request failed: ${errorMessage}`);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => response.statusText);
      this.logger.error({ status: response.status, detail }, 'Spotify token request rejected');
      if (previousRefreshToken) {
        this.token = null;
      }
      throw new SpotifyAuthenticationError(`Spotify token request rejected with status ${response.status}`);
    }

    const parsed = tokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new SpotifyAuthenticationError('Spotify token response is malformed');
    }

    const token: TokenCache = {
      access_token: parsed.data.access_token,
      token_type: parsed.data.token_type,
      expires_at: Math.floor(this.now() / 1000) + parsed.data.expires_in,
      scope: parsed.data.scope ?? this.scopes.join(' '),
      refresh_token: parsed.data.refresh_token ?? previousRefreshToken
    };

    this.token = token;
    await this.saveCache(token);
    return token;
  }

  private async loadCache(): Promise<void> {
    if (this.cacheLoaded) {
      return;
    }
    this.cacheLoaded = true;

    let raw: string;
    try {
      raw = await fs.readFile(this.config.cachePath, 'utf8');
    } catch {
      this.logger.debug({ cachePath: this.config.cachePath }, 'No Spotify token cache found');
      return;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      this.logger.warn({ cachePath: this.config.cachePath }, 'Spotify token cache is not valid JSON, ignoring it');
      return;
    }

    const parsed = tokenCacheSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn({ cachePath: this.config.cachePath }, 'Spotify token cache has an unexpected shape, ignoring it');
      return;
    }

    this.token = parsed.data;
  }

  private async saveCache(token: TokenCache): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.config.cachePath), { recursive: true });
      await fs.writeFile(this.config.cachePath, JSON.stringify(token, null, 2), { encoding: 'utf8', mode: 0o600 });
    } catch (error) {
      this.logger.warn({ err: error, cachePath: this.config.cachePath }, 'Could not write Spotify token cache');
    }
  }
}
