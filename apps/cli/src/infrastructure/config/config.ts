/**
 * Configuration Management
 *
 * Loads the YAML configuration file, applies environment overrides and
 * validates the result. Missing optional keys take their defaults.
 */

import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

export const DEFAULT_CONFIG_PATH = 'config/config.yaml';

/**
 * Configuration error with one entry per offending key
 */
export class ConfigError extends Error {
  constructor(message: string, public readonly issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}:\n  ${issues.join('\n  ')}` : message);
    this.name = 'ConfigError';
  }
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const volume = z.number().int().min(0).max(100);

const configSchema = z.object({
  spotify: z.object({
    client_id: z.string().trim().min(1, 'is required'),
    client_secret: z.string().trim().min(1, 'is required'),
    redirect_uri: z.string().url().default('http://localhost:8888/callback'),
    username: z.string().optional(),
    password: z.string().optional(),
    cache_path: z.string().min(1).default('.spotify_cache')
  }),
  /** Falls back to SpotifyBot-<platform> when omitted */
  device_name: z.string().trim().min(1).optional(),
  default_volume: volume.default(50),
  automation: z.object({
    volume_ramp: z.boolean().default(false),
    start_volume: volume.default(10),
    end_volume: volume.default(80),
    /** seconds */
    ramp_duration: z.number().positive().default(300)
  }).default({}),
  logging: z.object({
    level: z.preprocess(
      value => (typeof value === 'string' ? value.toLowerCase() : value),
      z.enum(LOG_LEVELS)
    ).default('info'),
    dir: z.string().min(1).default('logs')
  }).default({}),
  device: z.object({
    /** seconds */
    readiness_timeout: z.number().positive().default(5),
    max_restart_attempts: z.number().int().min(0).default(1)
  }).default({})
});

export type AppConfig = z.infer<typeof configSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Overlay SPOTIFY_CLIENT_ID, SPOTIFY_CLIENT_SECRET and LOG_LEVEL onto the parsed file
 */
export function applyEnvOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result: Record<string, unknown> = { ...raw };

  const spotifyOverrides: Record<string, string> = {};
  if (env.SPOTIFY_CLIENT_ID) spotifyOverrides.client_id = env.SPOTIFY_CLIENT_ID;
  if (env.SPOTIFY_CLIENT_SECRET) spotifyOverrides.client_secret = env.SPOTIFY_CLIENT_SECRET;

  if (Object.keys(spotifyOverrides).length > 0 && (raw.spotify === undefined || isRecord(raw.spotify))) {
    result.spotify = { ...(isRecord(raw.spotify) ? raw.spotify : {}), ...spotifyOverrides };
  }

  if (env.LOG_LEVEL && (raw.logging === undefined || isRecord(raw.logging))) {
    result.logging = { ...(isRecord(raw.logging) ? raw.logging : {}), level: env.LOG_LEVEL };
  }

  return result;
}

/**
 * Validate an already parsed configuration object
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): AppConfig {
  const root = raw ?? {};
  if (!isRecord(root)) {
    throw new ConfigError('Configuration must be a mapping of keys to values');
  }

  const parsed = configSchema.safeParse(applyEnvOverrides(root, env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError('Invalid configuration', issues);
  }

  return parsed.data;
}

/**
 * Load configuration from a YAML file
 */
export function loadConfig(filePath: string = DEFAULT_CONFIG_PATH, env: NodeJS.ProcessEnv = process.env): AppConfig {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read configuration file ${filePath}: ${reason}`);
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Configuration file ${filePath} is not valid YAML: ${reason}`);
  }

  return parseConfig(raw, env);
}
