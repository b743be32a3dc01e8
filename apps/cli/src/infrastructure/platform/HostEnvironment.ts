/**
 * Host facts read from the running process and filesystem
 */

import { readFileSync } from 'fs';
import os from 'os';
import which from 'which';
import { IHostEnvironment } from '../../domain/controller';

export class NodeHostEnvironment implements IHostEnvironment {
  platform(): string {
    return os.platform();
  }

  arch(): string {
    return os.arch();
  }

  readTextFile(path: string): string | null {
    try {
      return readFileSync(path, 'utf8');
    } catch {
      return null;
    }
  }

  hasExecutable(name: string): boolean {
    return which.sync(name, { nothrow: true }) !== null;
  }
}
