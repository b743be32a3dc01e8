/**
 * DeviceManager: spotifyd lifecycle supervision
 *
 * Installs the daemon binary when missing, launches it in the foreground
 * mode so the child PID stays under our control, waits for its device to
 * register with the Spotify API and restarts it after a crash within a
 * fixed budget. At most one daemon runs per process.
 */

import { spawn, SpawnOptions } from 'child_process';
import { constants as fsConstants, promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { Logger } from 'pino';
import which from 'which';
import {
  DaemonHandle,
  DaemonHandleFactory,
  DaemonState,
  DeviceError,
  InstallError,
  LaunchError,
  PlatformProfile,
  PlatformProfileFactory,
  Result,
  pollUntil
} from '@spotify-controller/shared';
import {
  DaemonCredentials,
  DEFAULT_DEVICE_MANAGER_OPTIONS,
  DeviceManagerOptions,
  IDaemonInstaller,
  IDeviceManager,
  IDeviceVisibility,
  PlatformStrategy
} from '../../domain/controller';
import { strategyFor } from '../platform';
import { DAEMON_CONFIG_FILE, renderDaemonConfig } from './DaemonConfigWriter';
import { DAEMON_BINARY_NAME } from './GitHubReleaseInstaller';

/**
 * The slice of ChildProcess the manager relies on
 */
export interface DaemonProcess {
  readonly pid?: number | undefined;
  readonly exitCode: number | null;
  readonly signalCode?: NodeJS.Signals | null;
  readonly stdout: OutputStream | null;
  readonly stderr: OutputStream | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

interface OutputStream {
  on(event: 'data', listener: (chunk: Buffer) => void): unknown;
}

export type SpawnFunction = (command: string, args: readonly string[], options: SpawnOptions) => DaemonProcess;

export interface DeviceManagerDependencies {
  installer: IDaemonInstaller;
  visibility: IDeviceVisibility;
  logger: Logger;
  spawnProcess?: SpawnFunction;
  /** PATH lookup; resolves to null when the executable is absent */
  findExecutable?: (name: string) => Promise<string | null>;
}

const spawnChild: SpawnFunction = (command, args, options) => spawn(command, [...args], options);

const findOnPath = (name: string): Promise<string | null> => which(name, { nothrow: true });

export class DeviceManager implements IDeviceManager {
  private readonly strategy: PlatformStrategy;
  private readonly options: DeviceManagerOptions;
  private readonly installer: IDaemonInstaller;
  private readonly visibility: IDeviceVisibility;
  private readonly logger: Logger;
  private readonly spawnProcess: SpawnFunction;
  private readonly findExecutable: (name: string) => Promise<string | null>;

  private handle: DaemonHandle = DaemonHandleFactory.notInstalled();
  private child: DaemonProcess | null = null;
  private binaryPath: string | null = null;
  private configPath: string | null = null;
  private lastDeviceName: string | null = null;
  private consecutiveRecoveries = 0;

  constructor(
    private readonly profile: PlatformProfile,
    dependencies: DeviceManagerDependencies,
    options: Partial<DeviceManagerOptions> = {}
  ) {
    this.strategy = strategyFor(profile);
    this.options = { ...DEFAULT_DEVICE_MANAGER_OPTIONS, homeDir: os.homedir(), ...options };
    this.installer = dependencies.installer;
    this.visibility = dependencies.visibility;
    this.logger = dependencies.logger;
    this.spawnProcess = dependencies.spawnProcess ?? spawnChild;
    this.findExecutable = dependencies.findExecutable ?? findOnPath;
  }

  /**
   * Where a downloaded binary goes for this platform
   */
  get installPath(): string {
    return path.join(this.strategy.installDir(this.options.homeDir), DAEMON_BINARY_NAME);
  }

  async ensureInstalled(): Promise<Result<string, InstallError>> {
    if (await isExecutable(this.installPath)) {
      this.logger.debug({ path: this.installPath }, 'Found spotifyd in install directory');
      return { success: true, value: this.useBinary(this.installPath) };
    }

    const onPath = await this.findExecutable(DAEMON_BINARY_NAME);
    if (onPath) {
      this.logger.debug({ path: onPath }, 'Found spotifyd on PATH');
      return { success: true, value: this.useBinary(onPath) };
    }

    this.logger.info({ platform: PlatformProfileFactory.describe(this.profile) }, 'spotifyd not installed, downloading');
    const result = await this.installer.install(this.profile, this.installPath);
    if (!result.success) {
      this.logger.error({ error: result.error }, 'spotifyd installation failed');
      return result;
    }

    return { success: true, value: this.useBinary(result.value) };
  }

  async writeDaemonConfig(deviceName: string, credentials: DaemonCredentials): Promise<Result<string, LaunchError>> {
    const configDir = this.strategy.configDir(this.options.homeDir);
    const cacheDir = this.strategy.cacheDir(this.options.homeDir);
    const configFile = path.join(configDir, DAEMON_CONFIG_FILE);

    try {
      await fs.mkdir(configDir, { recursive: true });
      await fs.mkdir(cacheDir, { recursive: true });
      const content = renderDaemonConfig({
        deviceName,
        credentials,
        profile: this.profile,
        strategy: this.strategy,
        cacheDir
      });
      await fs.writeFile(configFile, content, { encoding: 'utf8', mode: 0o600 });
    } catch (error) {
      this.logger.error({ err: error, path: configFile }, 'Could not write spotifyd config');
      return { success: false, error: 'LAUNCH_FAILED' };
    }

    this.configPath = configFile;
    this.logger.info({ path: configFile }, 'Wrote spotifyd config');
    return { success: true, value: configFile };
  }

  /**
   * Start the daemon as `deviceName`, replacing any instance this manager runs.
   * An explicit start resets the crash recovery budget.
   */
  async start(deviceName: string): Promise<Result<DaemonHandle, LaunchError>> {
    this.consecutiveRecoveries = 0;
    return this.launch(deviceName);
  }

  async stop(): Promise<void> {
    const child = this.child;
    this.child = null;

    if (child && !hasExited(child)) {
      this.logger.info({ pid: child.pid }, 'Stopping spotifyd');
      await this.terminate(child);
    }

    if (this.binaryPath) {
      this.handle = DaemonHandleFactory.stopped(this.binaryPath, this.handle.deviceName);
    }
  }

  async restart(): Promise<Result<DaemonHandle, LaunchError>> {
    if (!this.lastDeviceName) {
      this.logger.error('Cannot restart spotifyd before it was started');
      return { success: false, error: 'LAUNCH_FAILED' };
    }

    await this.stop();
    return this.launch(this.lastDeviceName);
  }

  healthCheck(): DaemonState {
    if (this.child && hasExited(this.child)) {
      this.markCrashed(this.child, this.child.exitCode, this.child.signalCode ?? null);
    }
    return this.handle.state;
  }

  /**
   * Recover from a crash: restart while the consecutive recovery count is
   * below the configured maximum. A recovered daemon found running again
   * ends the streak, so a later unrelated crash gets its own restart.
   */
  async ensureAvailable(): Promise<Result<DaemonHandle, DeviceError>> {
    const state = this.healthCheck();

    if (state === 'running') {
      if (this.consecutiveRecoveries > 0) {
        this.logger.info({ restarts: this.consecutiveRecoveries }, 'spotifyd healthy again, restart budget restored');
        this.consecutiveRecoveries = 0;
      }
      return { success: true, value: this.handle };
    }

    if (state !== 'crashed') {
      this.logger.warn({ state }, 'spotifyd is not running');
      return { success: false, error: 'DEVICE_UNAVAILABLE' };
    }

    if (this.consecutiveRecoveries >= this.options.maxRestartAttempts) {
      this.logger.error(
        { restarts: this.consecutiveRecoveries },
        'spotifyd crashed again, restart budget exhausted'
      );
      return { success: false, error: 'DEVICE_UNAVAILABLE' };
    }

    this.consecutiveRecoveries++;
    this.logger.warn(
      { attempt: this.consecutiveRecoveries, max: this.options.maxRestartAttempts },
      'spotifyd crashed, restarting'
    );

    const result = await this.restart();
    if (!result.success) {
      return { success: false, error: 'DEVICE_UNAVAILABLE' };
    }
    return result;
  }

  getHandle(): DaemonHandle {
    return this.handle;
  }

  killSync(): void {
    const child = this.child;
    this.child = null;
    if (child && !hasExited(child)) {
      child.kill('SIGKILL');
    }
  }

  private async launch(deviceName: string): Promise<Result<DaemonHandle, LaunchError>> {
    if (DaemonHandleFactory.isAlive(this.handle) || this.child) {
      await this.stop();
    }

    const binaryPath = this.binaryPath;
    if (!binaryPath) {
      this.logger.error('spotifyd is not installed; call ensureInstalled first');
      return { success: false, error: 'LAUNCH_FAILED' };
    }

    const args = ['--no-daemon', '--device-name', deviceName];
    if (this.configPath) {
      args.push('--config-path', this.configPath);
    }

    this.logger.info({ command: [binaryPath, ...args].join(' ') }, 'Starting spotifyd');

    let child: DaemonProcess;
    try {
      child = this.spawnProcess(binaryPath, args, {
        detached: true,
        stdio: ['ignore', 'pipe', 'pipe']
      });
    } catch (error) {
      this.logger.error({ err: error }, 'Could not spawn spotifyd');
      this.handle = DaemonHandleFactory.stopped(binaryPath, deviceName);
      return { success: false, error: 'LAUNCH_FAILED' };
    }

    this.child = child;
    this.lastDeviceName = deviceName;
    this.handle = DaemonHandleFactory.with(this.handle, {
      processId: child.pid ?? null,
      binaryPath,
      deviceName,
      state: 'starting'
    });

    let spawnFailed = false;
    child.on('error', (error) => {
      spawnFailed = true;
      this.logger.error({ err: error }, 'spotifyd process error');
    });
    child.on('exit', (code, signal) => this.markCrashed(child, code, signal));
    this.forwardOutput(child);

    const visible = await pollUntil(
      () => this.visibility.isDeviceVisible(deviceName),
      {
        timeoutMs: this.options.readinessTimeoutMs,
        intervalMs: this.options.pollIntervalMs,
        shouldAbort: () => spawnFailed || this.child !== child || hasExited(child)
      }
    );

    if (!visible || this.child !== child || hasExited(child)) {
      this.logger.error(
        { deviceName, exited: hasExited(child), timeoutMs: this.options.readinessTimeoutMs },
        'spotifyd device did not become available'
      );
      if (this.child === child) {
        await this.stop();
      }
      // a newer launch owns the handle now
      if (this.child === null) {
        this.handle = DaemonHandleFactory.stopped(binaryPath, deviceName);
      }
      return { success: false, error: 'LAUNCH_FAILED' };
    }

    this.handle = DaemonHandleFactory.with(this.handle, { state: 'running' });
    this.logger.info({ deviceName, pid: child.pid }, 'spotifyd is running');
    return { success: true, value: this.handle };
  }

  /**
   * SIGTERM, then SIGKILL once the stop timeout passes
   */
  private terminate(child: DaemonProcess): Promise<void> {
    return new Promise<void>((resolve) => {
      let settled = false;

      const timer = setTimeout(() => {
        if (settled) return;
        this.logger.warn({ pid: child.pid }, 'spotifyd ignored SIGTERM, sending SIGKILL');
        child.kill('SIGKILL');
        finish();
      }, this.options.stopTimeoutMs);

      const finish = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve();
      };

      child.on('exit', finish);
      child.kill('SIGTERM');
      if (hasExited(child)) {
        finish();
      }
    });
  }

  private markCrashed(child: DaemonProcess, code: number | null, signal: NodeJS.Signals | null): void {
    // exits of replaced or deliberately stopped processes are expected
    if (this.child !== child) {
      return;
    }

    this.child = null;
    if (this.handle.state === 'running' || this.handle.state === 'starting') {
      this.logger.warn({ pid: child.pid, code, signal }, 'spotifyd exited unexpectedly');
      this.handle = DaemonHandleFactory.with(this.handle, { processId: null, state: 'crashed' });
    }
  }

  private forwardOutput(child: DaemonProcess): void {
    child.stdout?.on('data', (chunk) => {
      this.logger.debug({ stream: 'stdout' }, chunk.toString().trimEnd());
    });
    child.stderr?.on('data', (chunk) => {
      this.logger.debug({ stream: 'stderr' }, chunk.toString().trimEnd());
    });
  }

  private useBinary(binaryPath: string): string {
    this.binaryPath = binaryPath;
    if (this.handle.state === 'not_installed') {
      this.handle = DaemonHandleFactory.stopped(binaryPath, this.handle.deviceName);
    }
    return binaryPath;
  }
}

function hasExited(child: DaemonProcess): boolean {
  return child.exitCode !== null || (child.signalCode ?? null) !== null;
}

async function isExecutable(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}
