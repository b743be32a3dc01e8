export { InteractiveCli } from './InteractiveCli';
export type { CliSettings, InteractiveCliDependencies } from './InteractiveCli';
export { parseCommand, HELP_TEXT, VOLUME_USAGE } from './CommandParser';
export type { CliCommand, SimpleCommandKind } from './CommandParser';
export { TerminalIO } from './TerminalIO';
export type { CliIO } from './TerminalIO';
export { installShutdownHooks } from './shutdownHooks';
export type { ShutdownHooks, SignalSource } from './shutdownHooks';
