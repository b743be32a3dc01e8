/**
 * spotifyd.conf rendering
 */

import { AudioBackend, PlatformProfile } from '@spotify-controller/shared';
import { DaemonCredentials, PlatformStrategy } from '../../domain/controller';

export const DAEMON_CONFIG_FILE = 'spotifyd.conf';

type TomlValue = string | number | boolean;

// spotifyd has no coreaudio backend; portaudio drives CoreAudio on macOS
const DAEMON_BACKENDS: Record<AudioBackend, string> = {
  alsa: 'alsa',
  pulseaudio: 'pulseaudio',
  coreaudio: 'portaudio'
};

export interface DaemonConfigInput {
  readonly deviceName: string;
  readonly credentials: DaemonCredentials;
  readonly profile: PlatformProfile;
  readonly strategy: PlatformStrategy;
  readonly cacheDir: string;
}

function tomlValue(value: TomlValue): string {
  if (typeof value === 'string') {
    return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n')}"`;
  }
  return String(value);
}

function renderSection(entries: ReadonlyArray<readonly [string, TomlValue | undefined]>): string[] {
  return entries
    .filter((entry): entry is readonly [string, TomlValue] => entry[1] !== undefined)
    .map(([key, value]) => `${key} = ${tomlValue(value)}`);
}

/**
 * Render the daemon config as TOML.
 * Username and password lines are omitted when not configured.
 */
export function renderDaemonConfig(input: DaemonConfigInput): string {
  const { credentials, strategy } = input;

  const lines = [
    '[global]',
    ...renderSection([
      ['username', credentials.username],
      ['password', credentials.password],
      ['client_id', credentials.clientId],
      ['client_secret', credentials.clientSecret]
    ]),
    '',
    ...renderSection([
      ['device_name', input.deviceName],
      ['device_type', 'computer'],
      ['mixer', 'softvol'],
      ['volume_controller', 'softvol'],
      ['backend', DAEMON_BACKENDS[input.profile.audioBackend]],
      ['bitrate', strategy.bitrate],
      ['cache_path', input.cacheDir]
    ]),
    '',
    ...renderSection([
      ['volume_normalisation', true],
      ['normalisation_pregain', strategy.normalisationPregain]
    ]),
    '',
    ...renderSection([
      ['no_audio_cache', false],
      ['use_mpris', false]
    ])
  ];

  const extra = Object.entries(strategy.extraSettings);
  if (extra.length > 0) {
    lines.push('', `# ${strategy.deviceNameSuffix} specific settings`, ...renderSection(extra));
  }

  return `${lines.join('\n')}\n`;
}
