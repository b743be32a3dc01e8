/**
 * Host environment stand-in for platform detection tests
 */

import { IHostEnvironment } from '../../domain/controller';

/**
 * Host with fixed answers, so detection cases stay deterministic
 */
export class StaticHostEnvironment implements IHostEnvironment {
  constructor(
    private readonly facts: {
      platform: string;
      arch: string;
      files?: Record<string, string>;
      executables?: readonly string[];
    }
  ) {}

  platform(): string {
    return this.facts.platform;
  }

  arch(): string {
    return this.facts.arch;
  }

  readTextFile(path: string): string | null {
    return this.facts.files?.[path] ?? null;
  }

  hasExecutable(name: string): boolean {
    return this.facts.executables?.includes(name) ?? false;
  }
}
