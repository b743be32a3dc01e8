/**
 * Spotify Controller Entry Point
 *
 * Loads configuration, detects the host platform, signs in to Spotify,
 * installs and launches spotifyd, then hands over to the interactive CLI.
 * Any setup failure aborts with exit code 1.
 */

import type { Logger } from 'pino';
import { ControllerError, ErrorFactory, PlatformProfileFactory } from '@spotify-controller/shared';
import { DeviceDirectory, PlaybackController, PlaylistManager, toApiError } from './application';
import { CliSettings, InteractiveCli, TerminalIO, installShutdownHooks } from './cli';
import { AppConfig, DEFAULT_CONFIG_PATH, loadConfig } from './infrastructure/config';
import { DeviceManager, GitHubReleaseInstaller } from './infrastructure/device';
import { LoggerFactory } from './infrastructure/logging';
import { NodeHostEnvironment, PlatformDetector, defaultDeviceName } from './infrastructure/platform';
import { SpotifyOAuth, SpotifyWebApiClient } from './infrastructure/spotify';

/**
 * Setup step failure carrying the code shown to the user
 */
class SetupError extends Error {
  constructor(public readonly code: ControllerError, message: string) {
    super(message);
    this.name = 'SetupError';
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Process-wide instances, released by cleanup()
let loggers: LoggerFactory | null = null;
let deviceManager: DeviceManager | null = null;
let terminal: TerminalIO | null = null;

/**
 * Build every component and prepare the playback device
 */
async function initialize(config: AppConfig, logger: Logger, factory: LoggerFactory): Promise<InteractiveCli> {
  const detected = new PlatformDetector(new NodeHostEnvironment()).detect();
  if (!detected.success) {
    throw new SetupError(detected.error, 'Platform detection failed');
  }
  const profile = detected.value;
  logger.info({ platform: PlatformProfileFactory.describe(profile) }, 'Platform detected');
  console.log(`Platform: ${PlatformProfileFactory.describe(profile)}`);

  const oauth = new SpotifyOAuth(
    {
      clientId: config.spotify.client_id,
      clientSecret: config.spotify.client_secret,
      redirectUri: config.spotify.redirect_uri,
      cachePath: config.spotify.cache_path
    },
    factory.get('spotify_auth')
  );
  const api = new SpotifyWebApiClient(oauth);

  try {
    await oauth.ensureAuthorized();
    const user = await api.getCurrentUser();
    logger.info({ user: user.id }, 'Authenticated with Spotify');
    console.log(`Signed in as ${user.display_name || user.id}`);
  } catch (error) {
    throw new SetupError(toApiError(error), `Spotify sign-in failed: ${messageOf(error)}`);
  }

  const devices = new DeviceDirectory(api, factory.get('playback_controller'));
  const deviceName = config.device_name ?? defaultDeviceName(profile);
  const manager = new DeviceManager(
    profile,
    {
      installer: new GitHubReleaseInstaller(factory.get('installer')),
      visibility: devices,
      logger: factory.get('device_manager')
    },
    {
      readinessTimeoutMs: config.device.readiness_timeout * 1000,
      maxRestartAttempts: config.device.max_restart_attempts
    }
  );
  deviceManager = manager;

  console.log('Checking spotifyd installation...');
  const installed = await manager.ensureInstalled();
  if (!installed.success) {
    throw new SetupError(installed.error, 'spotifyd installation failed');
  }

  const written = await manager.writeDaemonConfig(deviceName, {
    clientId: config.spotify.client_id,
    clientSecret: config.spotify.client_secret,
    username: config.spotify.username,
    password: config.spotify.password
  });
  if (!written.success) {
    throw new SetupError(written.error, 'Could not write the spotifyd configuration');
  }

  console.log(`Starting spotifyd as '${deviceName}'...`);
  const started = await manager.start(deviceName);
  if (!started.success) {
    throw new SetupError(started.error, 'spotifyd did not start');
  }
  logger.info({ pid: started.value.processId, device: deviceName }, 'Playback device ready');

  const settings: CliSettings = {
    deviceName,
    defaultVolume: config.default_volume,
    automation: {
      volumeRamp: config.automation.volume_ramp,
      startVolume: config.automation.start_volume,
      endVolume: config.automation.end_volume,
      rampDurationMs: config.automation.ramp_duration * 1000
    }
  };

  terminal = new TerminalIO();

  return new InteractiveCli(
    {
      playlists: new PlaylistManager(api, factory.get('playlist_manager')),
      playback: new PlaybackController({
        api,
        devices,
        daemon: manager,
        logger: factory.get('playback_controller')
      }),
      daemon: manager,
      io: terminal,
      logger
    },
    settings
  );
}

/**
 * Run the controller; resolves to the process exit code
 */
async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  const configPath = argv[0] ?? DEFAULT_CONFIG_PATH;

  let config: AppConfig;
  try {
    config = loadConfig(configPath);
  } catch (error) {
    console.error(`✗ ${ErrorFactory.describe('CONFIG_INVALID')}\n${messageOf(error)}`);
    return 1;
  }

  const factory = new LoggerFactory({ level: config.logging.level, dir: config.logging.dir, console: true });
  loggers = factory;
  const logger = factory.get('spotify_cli');
  logger.info({ configPath }, 'Spotify controller starting');

  setupProcessHooks();

  let cli: InteractiveCli;
  try {
    cli = await initialize(config, logger, factory);
  } catch (error) {
    if (error instanceof SetupError) {
      logger.error(ErrorFactory.create(error.code), error.message);
      console.error(`✗ ${error.message}: ${ErrorFactory.describe(error.code)}`);
    } else {
      logger.error({ err: error }, 'Setup failed');
      console.error(`✗ Setup failed: ${messageOf(error)}`);
    }
    await cleanup();
    return 1;
  }

  try {
    await cli.run();
    return 0;
  } catch (error) {
    logger.fatal({ err: error }, 'Interactive session crashed');
    console.error(`Fatal error: ${messageOf(error)}`);
    return 1;
  } finally {
    await cleanup();
  }
}

/**
 * Make sure spotifyd never outlives this process
 */
function setupProcessHooks(): void {
  installShutdownHooks({
    killDaemon: () => deviceManager?.killSync(),
    endInput: () => {
      if (!terminal) {
        return false;
      }
      terminal.close();
      return true;
    },
    exit: (code) => process.exit(code)
  });
}

/**
 * Stop the daemon, close the terminal and flush logs
 */
async function cleanup(): Promise<void> {
  if (deviceManager) {
    await deviceManager.stop();
    deviceManager = null;
  }

  terminal?.close();
  terminal = null;

  loggers?.close();
  loggers = null;
}

// Start the controller if this file is run directly
if (require.main === module) {
  main().then(
    code => process.exit(code),
    (error: unknown) => {
      console.error('Fatal startup error:', error);
      process.exit(1);
    }
  );
}

export { main, initialize, cleanup };
