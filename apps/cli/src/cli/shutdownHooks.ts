/**
 * Process signal wiring that keeps spotifyd from outliving the controller
 */

export interface SignalSource {
  on(event: 'exit', listener: () => void): unknown;
  on(event: NodeJS.Signals, listener: () => void): unknown;
  removeListener(event: 'exit', listener: () => void): unknown;
  removeListener(event: NodeJS.Signals, listener: () => void): unknown;
}

export interface ShutdownHooks {
  /** Synchronous daemon kill; the only work that can run inside 'exit' */
  killDaemon(): void;
  /** End interactive input; false when the prompt does not exist yet */
  endInput(): boolean;
  exit(code: number): void;
}

const SIGNAL_EXIT_CODES = [
  ['SIGINT', 130],
  ['SIGTERM', 143]
] as const;

/**
 * The first SIGINT or SIGTERM ends input so the CLI shuts down normally.
 * Before the prompt exists, or on a repeated signal, the process exits at
 * once and the 'exit' hook kills the daemon.
 *
 * Returns a function that removes the listeners again.
 */
export function installShutdownHooks(hooks: ShutdownHooks, source: SignalSource = process): () => void {
  let signalled = false;

  const onExit = () => hooks.killDaemon();
  source.on('exit', onExit);

  const handlers = SIGNAL_EXIT_CODES.map(([signal, code]) => {
    const handler = () => {
      if (!signalled && hooks.endInput()) {
        signalled = true;
        return;
      }
      hooks.exit(code);
    };
    source.on(signal, handler);
    return { signal, handler };
  });

  return () => {
    source.removeListener('exit', onExit);
    for (const { signal, handler } of handlers) {
      source.removeListener(signal, handler);
    }
  };
}
