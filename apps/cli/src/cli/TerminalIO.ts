/**
 * Terminal input/output for the interactive prompt
 */

import { Interface, createInterface } from 'readline/promises';

export interface CliIO {
  /** Resolves to null once input has ended */
  prompt(question: string): Promise<string | null>;
  print(line: string): void;
}

export class TerminalIO implements CliIO {
  private readonly rl: Interface;
  private closed = false;
  private readonly closedSignal: Promise<null>;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = createInterface({ input, output });
    this.closedSignal = new Promise<null>((resolve) => {
      this.rl.once('close', () => {
        this.closed = true;
        resolve(null);
      });
    });
    // Ctrl+C at the prompt ends input the same way Ctrl+D does
    this.rl.on('SIGINT', () => this.rl.close());
  }

  async prompt(question: string): Promise<string | null> {
    if (this.closed) {
      return null;
    }

    const answer = this.rl.question(question).catch((error: unknown) => {
      if (this.closed || isClosedError(error)) {
        return null;
      }
      throw error;
    });

    return Promise.race([answer, this.closedSignal]);
  }

  print(line: string): void {
    this.output.write(`${line}\n`);
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }
}

function isClosedError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  const code = 'code' in error ? error.code : undefined;
  return error.name === 'AbortError' || code === 'ERR_USE_AFTER_CLOSE';
}
