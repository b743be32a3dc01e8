/**
 * Test doubles for spotifyd process supervision
 */

import { EventEmitter } from 'events';
import { IDaemonInstaller, IDeviceVisibility } from '../../domain/controller';
import { InstallError, PlatformProfile, Result } from '@spotify-controller/shared';
import { promises as fs } from 'fs';
import path from 'path';

let nextPid = 4000;

/**
 * Mock spotifyd child process
 */
export class MockChildProcess extends EventEmitter {
  public pid?: number = nextPid++;
  public exitCode: number | null = null;
  public signalCode: NodeJS.Signals | null = null;
  public killed = false;
  public readonly signals: Array<NodeJS.Signals | number | undefined> = [];
  public stdout = new EventEmitter();
  public stderr = new EventEmitter();

  kill(signal?: NodeJS.Signals | number): boolean {
    this.signals.push(signal);
    if (this.hasExited()) {
      return false;
    }
    this.killed = true;
    this.signalCode = typeof signal === 'string' ? signal : 'SIGTERM';
    this.emit('exit', null, this.signalCode);
    return true;
  }

  // Simulate process output
  simulateOutput(data: string, stream: 'stdout' | 'stderr' = 'stdout'): void {
    this[stream].emit('data', Buffer.from(data));
  }

  // Simulate an unexpected exit
  simulateExit(code: number = 1): void {
    this.exitCode = code;
    this.emit('exit', code, null);
  }

  simulateError(error: Error): void {
    this.emit('error', error);
  }

  hasExited(): boolean {
    return this.exitCode !== null || this.signalCode !== null;
  }
}

/**
 * Installer that writes a placeholder executable instead of downloading
 */
export class FakeInstaller implements IDaemonInstaller {
  public calls: Array<{ profile: PlatformProfile; targetPath: string }> = [];

  constructor(private readonly outcome: Result<true, InstallError> = { success: true, value: true }) {}

  async install(profile: PlatformProfile, targetPath: string): Promise<Result<string, InstallError>> {
    this.calls.push({ profile, targetPath });
    if (!this.outcome.success) {
      return this.outcome;
    }
    await fs.mkdir(path.dirname(targetPath), { recursive: true });
    await fs.writeFile(targetPath, '#!/bin/sh\nexit 0\n', { mode: 0o755 });
    return { success: true, value: targetPath };
  }
}

/**
 * Device visibility whose answer the test controls
 */
export class FakeDeviceVisibility implements IDeviceVisibility {
  public visible = true;
  public queries: string[] = [];
  public onQuery: (() => void) | null = null;

  async isDeviceVisible(deviceName: string): Promise<boolean> {
    this.queries.push(deviceName);
    this.onQuery?.();
    return this.visible;
  }
}
