/**
 * @fileoverview Line-oriented terminal prompting
 *
 * Lines are buffered as readline emits them, so piped input that arrives
 * before a question is asked is not lost. Ctrl+C rejects the pending
 * question; with no question pending it is recorded and reported through
 * takeInterrupt() once the caller reaches a safe point.
 */
import * as readline from 'readline';

// =============================================================================
// Errors
// =============================================================================

/** Input ended (Ctrl+D or end of a pipe) */
export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

/** Ctrl+C while waiting for an answer */
export class InputInterruptedError extends Error {
  constructor() {
    super('Input interrupted');
    this.name = 'InputInterruptedError';
  }
}

export function isInputEnded(error: unknown): error is InputClosedError | InputInterruptedError {
  return error instanceof InputClosedError || error instanceof InputInterruptedError;
}

// =============================================================================
// Prompter
// =============================================================================

export interface Prompter {
  /** Print `query` without a newline and resolve with the next input line */
  ask(query: string): Promise<string>;
  /** Print one line of user-facing text */
  say(text: string): void;
  /** Whether Ctrl+C arrived while no question was pending; clears the flag */
  takeInterrupt(): boolean;
  close(): void;
}

interface PendingQuestion {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
}

export interface ReadlinePrompterOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export class ReadlinePrompter implements Prompter {
  private readonly rl: readline.Interface;
  private readonly output: NodeJS.WritableStream;
  private readonly lines: string[] = [];
  private pending: PendingQuestion | null = null;
  private closed = false;
  private interruptRequested = false;
  private readonly onProcessSigint = (): void => this.interrupt();

  constructor(options: ReadlinePrompterOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.rl = readline.createInterface({
      input: options.input ?? process.stdin,
      output: this.output,
      terminal: false,
    });

    this.rl.on('line', (line) => this.handleLine(line));
    this.rl.on('close', () => this.handleClose());
    this.rl.on('SIGINT', () => this.interrupt());
    process.on('SIGINT', this.onProcessSigint);
  }

  ask(query: string): Promise<string> {
    this.output.write(query);

    const buffered = this.lines.shift();
    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }
    if (this.closed) {
      return Promise.reject(new InputClosedError());
    }

    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  say(text: string): void {
    this.output.write(`${text}\n`);
  }

  takeInterrupt(): boolean {
    const requested = this.interruptRequested;
    this.interruptRequested = false;
    return requested;
  }

  close(): void {
    process.removeListener('SIGINT', this.onProcessSigint);
    if (!this.closed) {
      this.rl.close();
    }
  }

  private handleLine(line: string): void {
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.resolve(line);
    } else {
      this.lines.push(line);
    }
  }

  private handleClose(): void {
    this.closed = true;
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.reject(new InputClosedError());
    }
  }

  /**
   * Ctrl+C: reject the pending question, or remember it for takeInterrupt()
   */
  interrupt(): void {
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.reject(new InputInterruptedError());
    } else {
      this.interruptRequested = true;
    }
  }
}
