/**
 * OAuth Callback Server
 *
 * Fastify server bound to the configured redirect URI. It receives the
 * authorization code after the user signs in and hands it to whoever is
 * waiting on `waitForCode`.
 */

import Fastify, { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { SpotifyAuthenticationError } from './SpotifyWebApiClient';

export interface AuthCallbackServerConfig {
  host: string;
  port: number;
  callbackPath: string;
  logger?: boolean;
}

/**
 * Anything that can deliver an authorization code for a given state value
 */
export interface IAuthCodeReceiver {
  start(): Promise<void>;
  waitForCode(expectedState: string, timeoutMs: number): Promise<string>;
  stop(): Promise<void>;
}

interface CallbackQuery {
  code?: string;
  state?: string;
  error?: string;
}

interface PendingAuthorization {
  readonly state: string;
  readonly resolve: (code: string) => void;
  readonly reject: (error: Error) => void;
  readonly timer: NodeJS.Timeout;
}

const SUCCESS_PAGE = `<!DOCTYPE html>
<html>
<head><title>Spotify Controller</title></head>
<body><h1>Authorization complete</h1><p>You can close this window and return to the terminal.</p></body>
</html>`;

export class AuthCallbackServer implements IAuthCodeReceiver {
  private fastify: FastifyInstance;
  private config: AuthCallbackServerConfig;
  private pending: PendingAuthorization | null = null;
  private initialized = false;

  constructor(config: AuthCallbackServerConfig) {
    this.config = config;
    this.fastify = Fastify({
      logger: config.logger ?? false,
      trustProxy: false,
    });
  }

  /**
   * Build a server config from a redirect URI such as http://localhost:8888/callback
   */
  static fromRedirectUri(redirectUri: string): AuthCallbackServerConfig {
    const url = new URL(redirectUri);
    const defaultPort = url.protocol === 'https:' ? 443 : 80;
    return {
      host: url.hostname === 'localhost' ? '127.0.0.1' : url.hostname,
      port: url.port ? Number.parseInt(url.port, 10) : defaultPort,
      callbackPath: url.pathname || '/',
    };
  }

  /**
   * Register the callback route
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    this.fastify.get(this.config.callbackPath, async (request: FastifyRequest<{ Querystring: CallbackQuery }>, reply: FastifyReply) => {
      return this.handleCallback(request.query, reply);
    });

    this.initialized = true;
  }

  async start(): Promise<void> {
    await this.initialize();
    await this.fastify.listen({
      port: this.config.port,
      host: this.config.host,
    });
  }

  async stop(): Promise<void> {
    this.rejectPending(new SpotifyAuthenticationError('Authorization was cancelled'));
    await this.fastify.close();
  }

  /**
   * Resolve with the authorization code once the browser hits the callback
   */
  waitForCode(expectedState: string, timeoutMs: number): Promise<string> {
    this.rejectPending(new SpotifyAuthenticationError('A newer authorization request replaced this one'));

    return new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(new SpotifyAuthenticationError(`No authorization received within ${Math.round(timeoutMs / 1000)} seconds`));
      }, timeoutMs);
      timer.unref();

      this.pending = { state: expectedState, resolve, reject, timer };
    });
  }

  /**
   * Get the Fastify instance (used by tests through inject)
   */
  getFastifyInstance(): FastifyInstance {
    return this.fastify;
  }

  private handleCallback(query: CallbackQuery, reply: FastifyReply): FastifyReply {
    const pending = this.pending;

    if (!pending) {
      return reply.code(409).type('text/plain').send('No authorization is in progress');
    }

    if (query.error) {
      this.rejectPending(new SpotifyAuthenticationError(`Authorization was denied: ${query.error}`));
      return reply.code(400).type('text/plain').send(`Authorization failed: ${query.error}`);
    }

    if (!query.state || query.state !== pending.state) {
      this.rejectPending(new SpotifyAuthenticationError('Authorization state mismatch'));
      return reply.code(400).type('text/plain').send('Authorization failed: state mismatch');
    }

    if (!query.code) {
      this.rejectPending(new SpotifyAuthenticationError('Authorization response did not include a code'));
      return reply.code(400).type('text/plain').send('Authorization failed: missing code');
    }

    clearTimeout(pending.timer);
    this.pending = null;
    pending.resolve(query.code);

    return reply.code(200).type('text/html').send(SUCCESS_PAGE);
  }

  private rejectPending(error: Error): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }
    clearTimeout(pending.timer);
    this.pending = null;
    pending.reject(error);
  }
}
