/**
 * Lifecycle state of the external playback daemon
 */
export type DaemonState = 'not_installed' | 'stopped' | 'starting' | 'running' | 'crashed';

/**
 * Snapshot of the supervised daemon process.
 * Only the device manager produces new handles; everyone else reads them.
 */
export interface DaemonHandle {
  readonly processId: number | null;
  readonly binaryPath: string;
  readonly deviceName: string;
  readonly state: DaemonState;
}

export class DaemonHandleFactory {
  static notInstalled(deviceName = ''): DaemonHandle {
    return Object.freeze({ processId: null, binaryPath: '', deviceName, state: 'not_installed' });
  }

  static stopped(binaryPath: string, deviceName: string): DaemonHandle {
    return Object.freeze({ processId: null, binaryPath, deviceName, state: 'stopped' });
  }

  static with(handle: DaemonHandle, changes: Partial<DaemonHandle>): DaemonHandle {
    return Object.freeze({ ...handle, ...changes });
  }

  static isAlive(handle: DaemonHandle): boolean {
    return handle.state === 'running' || handle.state === 'starting';
  }
}
