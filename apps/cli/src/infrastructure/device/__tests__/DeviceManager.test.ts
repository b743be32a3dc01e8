/**
 * DeviceManager Tests
 *
 * Lifecycle supervision against a mocked spawner: install, launch,
 * readiness, replacement, crash recovery and shutdown.
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { PlatformProfileFactory } from '@spotify-controller/shared';
import { DeviceManager, SpawnFunction } from '../DeviceManager';
import { createSilentLogger } from '../../logging';
import { FakeInstaller, FakeDeviceVisibility, MockChildProcess } from '../../../__tests__/setup/process-mocks';

describe('DeviceManager', () => {
  const profile = PlatformProfileFactory.create('linux', 'x86_64', 'alsa');

  let home: string;
  let installer: FakeInstaller;
  let visibility: FakeDeviceVisibility;
  let spawned: MockChildProcess[];
  let spawnCalls: Array<{ command: string; args: readonly string[] }>;

  const spawnProcess: SpawnFunction = (command, args) => {
    const child = new MockChildProcess();
    spawned.push(child);
    spawnCalls.push({ command, args });
    return child;
  };

  const createManager = (overrides: { installer?: FakeInstaller; onPath?: string | null } = {}) =>
    new DeviceManager(
      profile,
      {
        installer: overrides.installer ?? installer,
        visibility,
        logger: createSilentLogger(),
        spawnProcess,
        findExecutable: async () => overrides.onPath ?? null
      },
      {
        homeDir: home,
        readinessTimeoutMs: 200,
        pollIntervalMs: 10,
        stopTimeoutMs: 50,
        maxRestartAttempts: 1
      }
    );

  const lastChild = (): MockChildProcess => {
    const child = spawned[spawned.length - 1];
    if (!child) {
      throw new Error('nothing was spawned');
    }
    return child;
  };

  beforeEach(async () => {
    home = await fs.mkdtemp(path.join(os.tmpdir(), 'device-manager-test-'));
    installer = new FakeInstaller();
    visibility = new FakeDeviceVisibility();
    spawned = [];
    spawnCalls = [];
  });

  afterEach(async () => {
    await fs.rm(home, { recursive: true, force: true });
  });

  describe('ensureInstalled', () => {
    it('should download spotifyd when it is not installed', async () => {
      const manager = createManager();
      const expectedPath = path.join(home, '.local', 'bin', 'spotifyd');

      const result = await manager.ensureInstalled();

      expect(result).toEqual({ success: true, value: expectedPath });
      expect(installer.calls).toEqual([{ profile, targetPath: expectedPath }]);
      expect(manager.healthCheck()).toBe('stopped');
    });

    it('should reuse a binary already in the install directory', async () => {
      const manager = createManager();
      await manager.ensureInstalled();

      const second = await createManager().ensureInstalled();

      expect(second.success).toBe(true);
      expect(installer.calls).toHaveLength(1);
    });

    it('should use spotifyd found on PATH', async () => {
      const manager = createManager({ onPath: '/usr/bin/spotifyd' });

      const result = await manager.ensureInstalled();

      expect(result).toEqual({ success: true, value: '/usr/bin/spotifyd' });
      expect(installer.calls).toHaveLength(0);
    });

    it('should surface installer errors', async () => {
      const failing = new FakeInstaller({ success: false, error: 'UNSUPPORTED_PLATFORM' });
      const manager = createManager({ installer: failing });

      const result = await manager.ensureInstalled();

      expect(result).toEqual({ success: false, error: 'UNSUPPORTED_PLATFORM' });
      expect(manager.healthCheck()).toBe('not_installed');
    });
  });

  describe('start', () => {
    it('should go from not installed to running', async () => {
      const manager = createManager();
      expect(manager.healthCheck()).toBe('not_installed');

      await manager.ensureInstalled();
      const result = await manager.start('Bot');

      expect(result.success).toBe(true);
      expect(manager.healthCheck()).toBe('running');
      expect(manager.getHandle()).toEqual({
        processId: lastChild().pid,
        binaryPath: path.join(home, '.local', 'bin', 'spotifyd'),
        deviceName: 'Bot',
        state: 'running'
      });
      expect(spawnCalls).toEqual([
        {
          command: path.join(home, '.local', 'bin', 'spotifyd'),
          args: ['--no-daemon', '--device-name', 'Bot']
        }
      ]);
      expect(visibility.queries).toEqual(['Bot']);
    });

    it('should fail to launch before the binary is installed', async () => {
      const manager = createManager();

      const result = await manager.start('Bot');

      expect(result).toEqual({ success: false, error: 'LAUNCH_FAILED' });
      expect(spawned).toHaveLength(0);
    });

    it('should never leave two daemons running when started twice', async () => {
      const manager = createManager();
      await manager.ensureInstalled();

      await manager.start('Bot');
      await manager.start('Bot');

      expect(spawned).toHaveLength(2);
      expect(spawned[0]?.signals).toEqual(['SIGTERM']);
      expect(spawned.filter(child => !child.hasExited())).toHaveLength(1);
      expect(manager.getHandle().processId).toBe(spawned[1]?.pid);
      expect(manager.healthCheck()).toBe('running');
    });

    it('should keep the newer handle when two starts overlap', async () => {
      const manager = createManager();
      await manager.ensureInstalled();

      const [first, second] = await Promise.all([manager.start('Bot A'), manager.start('Bot B')]);

      expect(first).toEqual({ success: false, error: 'LAUNCH_FAILED' });
      expect(second.success).toBe(true);
      expect(spawned).toHaveLength(2);
      expect(spawned[0]?.signals).toEqual(['SIGTERM']);
      expect(manager.getHandle()).toEqual({
        processId: spawned[1]?.pid,
        binaryPath: path.join(home, '.local', 'bin', 'spotifyd'),
        deviceName: 'Bot B',
        state: 'running'
      });
    });

    it('should pass the written config file to spotifyd', async () => {
      const manager = createManager();
      await manager.ensureInstalled();
      const configPath = path.join(home, '.config', 'spotifyd', 'spotifyd.conf');

      const written = await manager.writeDaemonConfig('Bot', { clientId: 'test-client', clientSecret: 'test-secret' });
      await manager.start('Bot');

      expect(written).toEqual({ success: true, value: configPath });
      expect(spawnCalls[0]?.args).toEqual(['--no-daemon', '--device-name', 'Bot', '--config-path', configPath]);
    });

    it('should fail when the process exits during startup', async () => {
      const manager = createManager();
      await manager.ensureInstalled();
      visibility.visible = false;
      visibility.onQuery = () => lastChild().simulateExit(1);

      const result = await manager.start('Bot');

      expect(result).toEqual({ success: false, error: 'LAUNCH_FAILED' });
      expect(manager.healthCheck()).toBe('stopped');
    });

    it('should fail when the spawn reports an error', async () => {
      const manager = createManager();
      await manager.ensureInstalled();
      visibility.visible = false;
      visibility.onQuery = () => lastChild().simulateError(new Error('spawn EACCES'));

      const result = await manager.start('Bot');

      expect(result).toEqual({ success: false, error: 'LAUNCH_FAILED' });
      expect(lastChild().signals).toEqual(['SIGTERM']);
    });

    it('should stop the daemon when the device never becomes visible', async () => {
      const manager = createManager();
      await manager.ensureInstalled();
      visibility.visible = false;

      const result = await manager.start('Bot');

      expect(result).toEqual({ success: false, error: 'LAUNCH_FAILED' });
      expect(lastChild().signals).toEqual(['SIGTERM']);
      expect(manager.healthCheck()).toBe('stopped');
      expect(visibility.queries.length).toBeGreaterThan(1);
    });
  });

  describe('stop', () => {
    it('should be idempotent', async () => {
      const manager = createManager();
      await manager.ensureInstalled();
      await manager.start('Bot');

      await manager.stop();
      await manager.stop();

      expect(lastChild().signals).toEqual(['SIGTERM']);
      expect(manager.healthCheck()).toBe('stopped');
    });

    it('should send SIGKILL from killSync', async () => {
      const manager = createManager();
      await manager.ensureInstalled();
      await manager.start('Bot');

      manager.killSync();

      expect(lastChild().signals).toEqual(['SIGKILL']);
    });
  });

  describe('restart', () => {
    it('should fail before any start', async () => {
      const manager = createManager();
      await manager.ensureInstalled();

      expect(await manager.restart()).toEqual({ success: false, error: 'LAUNCH_FAILED' });
    });

    it('should relaunch with the last device name', async () => {
      const manager = createManager();
      await manager.ensureInstalled();
      await manager.start('Kitchen');

      const result = await manager.restart();

      expect(result.success).toBe(true);
      expect(spawnCalls.map(call => call.args[2])).toEqual(['Kitchen', 'Kitchen']);
      expect(spawned[0]?.hasExited()).toBe(true);
    });
  });

  describe('crash recovery', () => {
    it('should report a crashed daemon from healthCheck', async () => {
      const manager = createManager();
      await manager.ensureInstalled();
      await manager.start('Bot');

      lastChild().simulateExit(101);

      expect(manager.healthCheck()).toBe('crashed');
      expect(manager.getHandle().processId).toBeNull();
    });

    it('should restart once, then give up after a second crash', async () => {
      const manager = createManager();
      await manager.ensureInstalled();
      await manager.start('Bot');

      lastChild().simulateExit(1);
      const recovered = await manager.ensureAvailable();

      expect(recovered.success).toBe(true);
      expect(spawned).toHaveLength(2);
      expect(manager.healthCheck()).toBe('running');

      lastChild().simulateExit(1);
      const exhausted = await manager.ensureAvailable();

      expect(exhausted).toEqual({ success: false, error: 'DEVICE_UNAVAILABLE' });
      expect(spawned).toHaveLength(2);
    });

    it('should restore the restart budget once a recovered daemon is healthy', async () => {
      const manager = createManager();
      await manager.ensureInstalled();
      await manager.start('Bot');

      lastChild().simulateExit(1);
      expect((await manager.ensureAvailable()).success).toBe(true);
      expect((await manager.ensureAvailable()).success).toBe(true);

      lastChild().simulateExit(1);
      const recovered = await manager.ensureAvailable();

      expect(recovered.success).toBe(true);
      expect(spawned).toHaveLength(3);
      expect(manager.healthCheck()).toBe('running');
    });

    it('should reset the restart budget on an explicit start', async () => {
      const manager = createManager();
      await manager.ensureInstalled();
      await manager.start('Bot');
      lastChild().simulateExit(1);
      await manager.ensureAvailable();
      lastChild().simulateExit(1);

      await manager.start('Bot');
      lastChild().simulateExit(1);
      const recovered = await manager.ensureAvailable();

      expect(recovered.success).toBe(true);
      expect(spawned).toHaveLength(4);
    });

    it('should not restart a daemon that was never started', async () => {
      const manager = createManager();
      await manager.ensureInstalled();

      expect(await manager.ensureAvailable()).toEqual({ success: false, error: 'DEVICE_UNAVAILABLE' });
      expect(spawned).toHaveLength(0);
    });
  });

  describe('writeDaemonConfig', () => {
    it('should write a private config file into the platform config directory', async () => {
      const manager = createManager();
      const configPath = path.join(home, '.config', 'spotifyd', 'spotifyd.conf');

      await manager.writeDaemonConfig('Bot', { clientId: 'test-client', clientSecret: 'test-secret' });

      const content = await fs.readFile(configPath, 'utf8');
      const stat = await fs.stat(configPath);
      expect(content).toContain('device_name = "Bot"\n');
      expect(content).toContain(`cache_path = "${path.join(home, '.cache', 'spotifyd')}"\n`);
      expect(stat.mode & 0o777).toBe(0o600);
    });
  });
});
