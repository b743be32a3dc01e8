/**
 * Host classification used to pick the daemon build, audio backend and paths
 */

export type OsKind = 'linux' | 'macos' | 'raspberry_pi';

export type CpuArch = 'x86_64' | 'arm64' | 'armv7';

export type AudioBackend = 'alsa' | 'pulseaudio' | 'coreaudio';

/**
 * Detected once per process at startup and never mutated afterwards
 */
export interface PlatformProfile {
  readonly osKind: OsKind;
  readonly arch: CpuArch;
  readonly audioBackend: AudioBackend;
}

export const OS_KINDS: readonly OsKind[] = ['linux', 'macos', 'raspberry_pi'];
export const CPU_ARCHS: readonly CpuArch[] = ['x86_64', 'arm64', 'armv7'];

export class PlatformProfileFactory {
  static create(osKind: OsKind, arch: CpuArch, audioBackend: AudioBackend): PlatformProfile {
    return Object.freeze({ osKind, arch, audioBackend });
  }

  static describe(profile: PlatformProfile): string {
    return `${profile.osKind}/${profile.arch} (${profile.audioBackend})`;
  }
}
