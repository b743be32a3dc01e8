/**
 * Maps a line typed at the prompt onto a command.
 * Anything that is not a known command is a playlist search.
 */

export type SimpleCommandKind =
  | 'pause'
  | 'resume'
  | 'stop'
  | 'next'
  | 'previous'
  | 'info'
  | 'status'
  | 'help'
  | 'quit';

export type CliCommand =
  | { kind: SimpleCommandKind }
  | { kind: 'volume'; level: number }
  | { kind: 'invalid'; usage: string }
  | { kind: 'search'; query: string }
  | { kind: 'empty' };

const ALIASES: ReadonlyMap<string, SimpleCommandKind> = new Map<string, SimpleCommandKind>([
  ['p', 'pause'],
  ['pause', 'pause'],
  ['r', 'resume'],
  ['resume', 'resume'],
  ['s', 'stop'],
  ['stop', 'stop'],
  ['n', 'next'],
  ['next', 'next'],
  ['b', 'previous'],
  ['back', 'previous'],
  ['i', 'info'],
  ['info', 'info'],
  ['st', 'status'],
  ['status', 'status'],
  ['h', 'help'],
  ['help', 'help'],
  ['q', 'quit'],
  ['quit', 'quit']
]);

export const VOLUME_USAGE = 'Usage: v <number> (0-100)';

export function parseCommand(input: string): CliCommand {
  const line = input.trim();
  if (line.length === 0) {
    return { kind: 'empty' };
  }

  const normalized = line.toLowerCase();
  const alias = ALIASES.get(normalized);
  if (alias) {
    return { kind: alias };
  }

  const tokens = normalized.split(/\s+/);
  if (tokens[0] === 'v' && tokens.length <= 2) {
    const argument = tokens[1];
    if (argument !== undefined && /^-?\d+$/.test(argument)) {
      return { kind: 'volume', level: Number.parseInt(argument, 10) };
    }
    return { kind: 'invalid', usage: VOLUME_USAGE };
  }

  return { kind: 'search', query: line };
}

export const HELP_TEXT = [
  'Available commands:',
  '  [p]ause     - Pause playback',
  '  [r]esume    - Resume playback',
  '  [s]top      - Stop playback',
  '  [v] <num>   - Set volume (0-100)',
  '  [n]ext      - Skip to next track',
  '  [b]ack      - Go to previous track',
  '  [i]nfo      - Show current track info',
  '  [st]atus    - Show playback status',
  '  [h]elp      - Show this help',
  '  [q]uit      - Quit application',
  '  <playlist>  - Search and play new playlist'
].join('\n');
