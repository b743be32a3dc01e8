/**
 * Structured logging
 *
 * One pino logger per component, each appending JSON lines to
 * `<dir>/<component>.log`. Warnings and errors are also pretty-printed to
 * stderr so they show up next to the prompt.
 */

import path from 'path';
import pino, { Logger, LevelWithSilent, StreamEntry } from 'pino';
import pretty from 'pino-pretty';

export type LogComponent =
  | 'device_manager'
  | 'playlist_manager'
  | 'playback_controller'
  | 'spotify_cli'
  | 'spotify_auth'
  | 'installer';

export interface LoggerFactoryConfig {
  level: LevelWithSilent;
  dir: string;
  /** Mirror warnings and errors to stderr */
  console?: boolean;
}

type FileDestination = ReturnType<typeof pino.destination>;

export class LoggerFactory {
  private readonly loggers = new Map<LogComponent, Logger>();
  private readonly destinations: FileDestination[] = [];

  constructor(private readonly config: LoggerFactoryConfig) {}

  get(component: LogComponent): Logger {
    const existing = this.loggers.get(component);
    if (existing) {
      return existing;
    }

    const logger = this.create(component);
    this.loggers.set(component, logger);
    return logger;
  }

  /**
   * Flush and close every file destination
   */
  close(): void {
    for (const destination of this.destinations.splice(0)) {
      destination.flushSync();
      destination.end();
    }
    this.loggers.clear();
  }

  private create(component: LogComponent): Logger {
    const level = this.config.level;
    const options = {
      name: component,
      level,
      formatters: {
        level: (label: string) => ({ level: label })
      },
      timestamp: pino.stdTimeFunctions.isoTime
    };

    if (level === 'silent') {
      return pino(options);
    }

    const file = pino.destination({
      dest: path.join(this.config.dir, `${component}.log`),
      append: true,
      mkdir: true,
      sync: true
    });
    this.destinations.push(file);

    const streams: StreamEntry[] = [{ level, stream: file }];

    if (this.config.console) {
      streams.push({
        level: 'warn',
        stream: pretty({
          destination: 2,
          colorize: process.stderr.isTTY,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
          sync: true
        })
      });
    }

    return pino(options, pino.multistream(streams));
  }
}

/**
 * Logger that drops everything
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
