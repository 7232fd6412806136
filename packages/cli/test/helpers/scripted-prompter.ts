/**
 * @fileoverview Prompter fake that answers from a script
 */
import { InputClosedError, InputInterruptedError, type Prompter } from '../../src/input/prompter.js';

export const CLOSE = Symbol('close');
export const INTERRUPT = Symbol('interrupt');

export type ScriptStep = string | typeof CLOSE | typeof INTERRUPT;

export class ScriptedPrompter implements Prompter {
  /** Every prompt and line printed, in order */
  readonly transcript: string[] = [];
  readonly questions: string[] = [];
  closed = false;
  private readonly script: ScriptStep[];
  private interruptRequested = false;

  constructor(script: ScriptStep[]) {
    this.script = [...script];
  }

  async ask(query: string): Promise<string> {
    this.questions.push(query);
    this.transcript.push(query);

    const step = this.script.shift();
    if (step === undefined || step === CLOSE) {
      throw new InputClosedError();
    }
    if (step === INTERRUPT) {
      throw new InputInterruptedError();
    }
    return step;
  }

  say(text: string): void {
    this.transcript.push(text);
  }

  /** Simulate Ctrl+C while no question is pending */
  interrupt(): void {
    this.interruptRequested = true;
  }

  takeInterrupt(): boolean {
    const requested = this.interruptRequested;
    this.interruptRequested = false;
    return requested;
  }

  close(): void {
    this.closed = true;
  }

  /** Steps not consumed */
  get remaining(): number {
    return this.script.length;
  }
}
