/**
 * Platform detection
 *
 * Classifies the host into an OS kind, CPU architecture and audio backend.
 * Everything it reads comes from the injected host environment, so the
 * result depends only on its answers.
 */

import {
  AudioBackend,
  CpuArch,
  OsKind,
  PlatformError,
  PlatformProfile,
  PlatformProfileFactory,
  Result
} from '@spotify-controller/shared';
import { IHostEnvironment, IPlatformDetector } from '../../domain/controller';

const PI_MODEL_FILES = ['/proc/device-tree/model', '/sys/firmware/devicetree/base/model'];
const CPUINFO_FILE = '/proc/cpuinfo';
const BROADCOM_SOC = /\bBCM2\d{3}\b/i;

const ARCH_MAP: ReadonlyMap<string, CpuArch> = new Map<string, CpuArch>([
  ['x64', 'x86_64'],
  ['arm64', 'arm64'],
  ['arm', 'armv7']
]);

export class PlatformDetector implements IPlatformDetector {
  constructor(private readonly host: IHostEnvironment) {}

  detect(): Result<PlatformProfile, PlatformError> {
    const osKind = this.detectOsKind();
    const arch = ARCH_MAP.get(this.host.arch());

    if (!osKind || !arch) {
      return { success: false, error: 'UNSUPPORTED_PLATFORM' };
    }

    return {
      success: true,
      value: PlatformProfileFactory.create(osKind, arch, this.detectAudioBackend(osKind))
    };
  }

  private detectOsKind(): OsKind | null {
    switch (this.host.platform()) {
      case 'darwin':
        return 'macos';
      case 'linux':
        return this.isRaspberryPi() ? 'raspberry_pi' : 'linux';
      default:
        return null;
    }
  }

  private isRaspberryPi(): boolean {
    for (const file of PI_MODEL_FILES) {
      const model = this.host.readTextFile(file);
      if (model && model.toLowerCase().includes('raspberry pi')) {
        return true;
      }
    }

    const cpuinfo = this.host.readTextFile(CPUINFO_FILE);
    if (!cpuinfo) {
      return false;
    }
    return cpuinfo.toLowerCase().includes('raspberry pi') || BROADCOM_SOC.test(cpuinfo);
  }

  private detectAudioBackend(osKind: OsKind): AudioBackend {
    if (osKind === 'macos') {
      return 'coreaudio';
    }
    if (this.host.hasExecutable('pulseaudio') || this.host.hasExecutable('pactl')) {
      return 'pulseaudio';
    }
    return 'alsa';
  }
}
