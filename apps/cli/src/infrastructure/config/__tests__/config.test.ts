/**
 * Configuration Tests
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { ConfigError, applyEnvOverrides, loadConfig, parseConfig } from '../config';

const minimal = { spotify: { client_id: 'test-client', client_secret: 'test-secret' } };

const issuesOf = (run: () => unknown): readonly string[] => {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected a ConfigError');
};

describe('parseConfig', () => {
  it('should fill in every default', () => {
    expect(parseConfig(minimal)).toEqual({
      spotify: {
        client_id: 'test-client',
        client_secret: 'test-secret',
        redirect_uri: 'http://localhost:8888/callback',
        cache_path: '.spotify_cache'
      },
      default_volume: 50,
      automation: { volume_ramp: false, start_volume: 10, end_volume: 80, ramp_duration: 300 },
      logging: { level: 'info', dir: 'logs' },
      device: { readiness_timeout: 5, max_restart_attempts: 1 }
    });
  });

  it('should keep configured values', () => {
    const config = parseConfig({
      ...minimal,
      device_name: 'Kitchen',
      automation: { volume_ramp: true, ramp_duration: 60 },
      logging: { level: 'DEBUG' }
    });

    expect(config.device_name).toBe('Kitchen');
    expect(config.automation).toEqual({ volume_ramp: true, start_volume: 10, end_volume: 80, ramp_duration: 60 });
    expect(config.logging.level).toBe('debug');
  });

  it('should report missing credentials', () => {
    expect(issuesOf(() => parseConfig({ spotify: { client_id: '  ' } }))).toEqual([
      'spotify.client_id: is required',
      'spotify.client_secret: Required'
    ]);
  });

  it('should report out-of-range volumes', () => {
    expect(issuesOf(() => parseConfig({ ...minimal, default_volume: 150 }))).toEqual([
      'default_volume: Number must be less than or equal to 100'
    ]);
  });

  it('should treat an empty file as an empty mapping', () => {
    expect(issuesOf(() => parseConfig(null))).toEqual(['spotify: Required']);
  });

  it('should reject a document that is not a mapping', () => {
    expect(() => parseConfig(['spotify'])).toThrow('Configuration must be a mapping of keys to values');
  });

  it('should apply environment overrides', () => {
    const config = parseConfig(
      { spotify: { client_id: 'file-client', client_secret: 'file-secret' } },
      { SPOTIFY_CLIENT_ID: 'env-client', LOG_LEVEL: 'warn' }
    );

    expect(config.spotify.client_id).toBe('env-client');
    expect(config.spotify.client_secret).toBe('file-secret');
    expect(config.logging.level).toBe('warn');
  });

  it('should accept credentials that only come from the environment', () => {
    const config = parseConfig({}, { SPOTIFY_CLIENT_ID: 'env-client', SPOTIFY_CLIENT_SECRET: 'test-secret' });

    expect(config.spotify.client_secret).toBe('test-secret');
  });
});

describe('applyEnvOverrides', () => {
  it('should leave the input untouched', () => {
    const raw = { spotify: { client_id: 'file-client' } };

    applyEnvOverrides(raw, { SPOTIFY_CLIENT_ID: 'env-client' });

    expect(raw).toEqual({ spotify: { client_id: 'file-client' } });
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'config-test-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should load a YAML file', async () => {
    const file = path.join(dir, 'config.yaml');
    await fs.writeFile(file, [
      'spotify:',
      '  client_id: "test-client"',
      '  client_secret: "test-secret"',
      'device_name: Bedroom',
      'automation:',
      '  volume_ramp: true',
      ''
    ].join('\n'));

    const config = loadConfig(file, {});

    expect(config.device_name).toBe('Bedroom');
    expect(config.automation.volume_ramp).toBe(true);
  });

  it('should load the example configuration', () => {
    const example = path.resolve(__dirname, '../../../../../../config/config.example.yaml');

    const config = loadConfig(example, {});

    expect(config.device_name).toBeUndefined();
    expect(config.automation.ramp_duration).toBe(300);
  });

  it('should fail for a missing file', () => {
    expect(() => loadConfig(path.join(dir, 'missing.yaml'), {})).toThrow(/^Cannot read configuration file/);
  });

  it('should fail for invalid YAML', async () => {
    const file = path.join(dir, 'broken.yaml');
    await fs.writeFile(file, 'spotify: [unclosed\n');

    expect(() => loadConfig(file, {})).toThrow(/is not valid YAML/);
  });
});
