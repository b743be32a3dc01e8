/**
 * Interactive CLI
 *
 * Read-eval loop over the playback controller. Known commands control
 * playback; any other text searches playlists and starts the one picked.
 * A failed command prints a message and the loop carries on.
 */

import type { Logger } from 'pino';
import {
  ControllerError,
  ErrorFactory,
  PlaylistSummary,
  Result,
  formatDuration
} from '@spotify-controller/shared';
import { IDeviceManager, IPlaybackController, IPlaylistManager } from '../domain/controller';
import { CliCommand, HELP_TEXT, parseCommand } from './CommandParser';
import { CliIO } from './TerminalIO';

export interface CliSettings {
  readonly deviceName: string;
  readonly defaultVolume: number;
  readonly automation: {
    readonly volumeRamp: boolean;
    readonly startVolume: number;
    readonly endVolume: number;
    readonly rampDurationMs: number;
  };
}

export interface InteractiveCliDependencies {
  playlists: IPlaylistManager;
  playback: IPlaybackController;
  daemon: Pick<IDeviceManager, 'stop' | 'healthCheck'>;
  io: CliIO;
  logger: Logger;
}

export class InteractiveCli {
  private readonly playlists: IPlaylistManager;
  private readonly playback: IPlaybackController;
  private readonly daemon: Pick<IDeviceManager, 'stop' | 'healthCheck'>;
  private readonly io: CliIO;
  private readonly logger: Logger;
  private backgroundRamp: Promise<void> | null = null;
  private shutdownStarted = false;

  constructor(dependencies: InteractiveCliDependencies, private readonly settings: CliSettings) {
    this.playlists = dependencies.playlists;
    this.playback = dependencies.playback;
    this.daemon = dependencies.daemon;
    this.io = dependencies.io;
    this.logger = dependencies.logger;
  }

  async run(): Promise<void> {
    this.io.print(`\n${'='.repeat(60)}`);
    this.io.print('🎵 Spotify Controller - Interactive Mode');
    this.io.print('='.repeat(60));
    this.showHelp();
    this.io.print(`\nDevice: ${this.settings.deviceName}`);
    this.io.print('Ready! Enter a playlist name to search and play, or use the commands above.');

    try {
      for (;;) {
        const line = await this.io.prompt('\n> ');
        if (line === null) {
          break;
        }
        if (!(await this.handleCommand(line))) {
          break;
        }
      }
    } finally {
      await this.shutdown();
    }
  }

  /**
   * Execute one line of input. Resolves to false when the user quits.
   */
  async handleCommand(input: string): Promise<boolean> {
    const command = parseCommand(input);
    this.logger.debug({ command }, 'Command received');

    try {
      return await this.execute(command);
    } catch (error) {
      this.logger.error({ err: error, input }, 'Command failed unexpectedly');
      this.io.print(`✗ Command failed: ${error instanceof Error ? error.message : String(error)}`);
      return true;
    }
  }

  /**
   * Search and let the user pick; a single match is picked automatically
   */
  async searchAndSelect(query: string): Promise<PlaylistSummary | null> {
    this.io.print(`\nSearching for playlists matching '${query}'...`);
    const result = await this.playlists.search(query);
    if (!result.success) {
      this.printFailure(result.error);
      return null;
    }

    const found = result.value;
    if (found.length === 0) {
      this.io.print('No playlists found matching your search.');
      return null;
    }

    this.io.print('\nFound playlists:');
    found.forEach((playlist, index) => {
      this.io.print(`${index + 1}. ${this.playlists.summarize(playlist)}`);
    });

    const [only] = found;
    if (found.length === 1 && only) {
      this.io.print(`\nAuto-selecting: ${only.name}`);
      return only;
    }

    for (;;) {
      const answer = await this.io.prompt(`\nSelect playlist (1-${found.length}) or 'q' to cancel: `);
      if (answer === null || answer.trim().toLowerCase() === 'q') {
        return null;
      }

      const choice = answer.trim();
      const picked = /^\d+$/.test(choice) ? found[Number.parseInt(choice, 10) - 1] : undefined;
      if (picked) {
        return picked;
      }
      this.io.print(`Please enter a number between 1 and ${found.length}, or 'q' to cancel`);
    }
  }

  async startPlaylist(playlist: PlaylistSummary): Promise<boolean> {
    this.io.print(`\nStarting '${playlist.name}'...`);
    const result = await this.playback.play(playlist, this.settings.deviceName);
    if (!result.success) {
      this.printFailure(result.error);
      return false;
    }

    this.io.print(`✓ Now playing: ${playlist.name}`);

    const { automation } = this.settings;
    if (automation.volumeRamp) {
      this.io.print(
        `Ramping volume ${automation.startVolume}% → ${automation.endVolume}% over ${Math.round(automation.rampDurationMs / 1000)}s`
      );
      this.startBackgroundRamp();
      return true;
    }

    const volume = await this.playback.setVolume(this.settings.defaultVolume);
    if (volume.success) {
      this.io.print(`Volume set to ${volume.value}%`);
    } else {
      this.printFailure(volume.error);
    }
    return true;
  }

  showHelp(): void {
    this.io.print(`\n${HELP_TEXT}`);
  }

  /**
   * Cancel the ramp, stop playback and the daemon. Safe to call twice.
   */
  async shutdown(): Promise<void> {
    if (this.shutdownStarted) {
      return;
    }
    this.shutdownStarted = true;

    this.io.print('\nShutting down...');
    this.playback.cancelVolumeRamp();
    if (this.backgroundRamp) {
      await this.backgroundRamp;
    }

    const stopped = await this.playback.stop();
    if (!stopped.success && stopped.error !== 'NO_ACTIVE_SESSION') {
      this.logger.warn({ error: stopped.error }, 'Could not stop playback during shutdown');
    }

    await this.daemon.stop();
    this.logger.info('CLI session ended');
    this.io.print('Goodbye!');
  }

  private async execute(command: CliCommand): Promise<boolean> {
    switch (command.kind) {
      case 'empty':
        return true;

      case 'quit':
        return false;

      case 'help':
        this.showHelp();
        return true;

      case 'pause':
        return this.report(await this.playback.pause(), '⏸ Playback paused');

      case 'resume':
        return this.report(await this.playback.resume(), '▶ Playback resumed');

      case 'stop':
        return this.report(await this.playback.stop(), '⏹ Playback stopped');

      case 'next':
        return this.report(await this.playback.next(), '⏭ Skipped to next track');

      case 'previous':
        return this.report(await this.playback.previous(), '⏮ Went to previous track');

      case 'volume': {
        const result = await this.playback.setVolume(command.level);
        if (result.success) {
          this.io.print(`🔊 Volume set to ${result.value}%`);
        } else {
          this.printFailure(result.error);
        }
        return true;
      }

      case 'invalid':
        this.io.print(command.usage);
        return true;

      case 'info':
        await this.showInfo();
        return true;

      case 'status':
        this.showStatus();
        return true;

      case 'search': {
        const playlist = await this.searchAndSelect(command.query);
        if (playlist) {
          await this.startPlaylist(playlist);
        }
        return true;
      }
    }
  }

  private async showInfo(): Promise<void> {
    const result = await this.playback.getPlaybackState();
    if (!result.success) {
      this.printFailure(result.error);
      return;
    }

    const state = result.value;
    if (!state) {
      this.io.print('No playback information available');
      return;
    }

    this.io.print(`🎵 ${state.currentTrack ?? 'Unknown track'}`);
    if (state.progressMs !== undefined && state.durationMs !== undefined) {
      this.io.print(`⏱ ${formatDuration(state.progressMs)} / ${formatDuration(state.durationMs)}`);
    }
    this.io.print(`🔊 Volume: ${state.volume}%`);
    if (state.deviceName) {
      this.io.print(`📻 Device: ${state.deviceName}`);
    }

    const playlistId = this.playback.getStatus().playlistId;
    if (playlistId) {
      const info = await this.playlists.getPlaylistInfo(playlistId);
      if (info.success) {
        this.io.print(`📋 ${this.playlists.summarize(info.value)}`);
      } else {
        this.logger.warn({ playlistId, error: info.error }, 'Playlist details unavailable');
      }
    }
  }

  private showStatus(): void {
    const status = this.playback.getStatus();
    this.io.print('\nPlayback Status:');
    this.io.print(`  Playing: ${status.isPlaying ? 'Yes' : 'No'}`);
    this.io.print(`  Volume: ${status.volume}%`);
    this.io.print(`  Volume Ramp: ${status.rampActive ? 'Active' : 'Inactive'}`);
    this.io.print(`  Playlist: ${status.playlist ?? 'None'}`);
    this.io.print(`  Device: ${status.deviceName ?? 'None'}`);
    this.io.print(`  Daemon: ${this.daemon.healthCheck()}`);
  }

  private startBackgroundRamp(): void {
    const { startVolume, endVolume, rampDurationMs } = this.settings.automation;

    this.backgroundRamp = this.playback.rampVolume(startVolume, endVolume, rampDurationMs).then(
      (result) => {
        if (!result.success) {
          this.logger.warn({ error: result.error }, 'Volume ramp failed');
          return;
        }
        this.logger.info(result.value, 'Volume ramp ended');
      },
      (error: unknown) => {
        this.logger.error({ err: error }, 'Volume ramp crashed');
      }
    );
  }

  private report(result: Result<unknown, ControllerError>, message: string): boolean {
    if (result.success) {
      this.io.print(message);
    } else {
      this.printFailure(result.error);
    }
    return true;
  }

  private printFailure(error: ControllerError): void {
    this.io.print(`✗ ${ErrorFactory.describe(error)}`);
  }
}
