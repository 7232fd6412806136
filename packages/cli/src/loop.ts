/**
 * @fileoverview Interactive loop
 *
 * One turn: gather content, run one inference cycle, report, ask whether to
 * continue. Ending input (Ctrl+C, Ctrl+D, exit/quit) between cycles stops the
 * loop immediately. Ctrl+C during a cycle is honoured only after the cycle
 * has released its conversation.
 */
import { formatError, type InferenceResult, type Logger } from '@titlecast/core';
import { isInputEnded, type Prompter } from './input/prompter.js';
import type { GatherResult } from './input/content-builder.js';

export interface InferenceCycle {
  run(content: string): Promise<InferenceResult>;
}

export interface InteractiveLoopOptions {
  prompter: Prompter;
  runner: InferenceCycle;
  /** Gathers one turn's content with the configured strategy */
  gather: (prompter: Prompter) => Promise<GatherResult>;
  logger: Logger;
}

export const BANNER = [
  '='.repeat(50),
  ' titlecast: single-shot inference through the title endpoint',
  ' Enter the content you want the model to process below.',
  " Tip: end your content with \"Use [xxx] as the title\" to steer the model.",
  " Type 'exit' or 'quit' to leave.",
  '='.repeat(50),
].join('\n');

export function describeResult(result: InferenceResult): string {
  switch (result.status) {
    case 'success':
      return `Title (answer): ${result.title}`;
    case 'absent':
      return 'No title returned. Check your network or input.';
    case 'error':
      return `Error: ${formatError(result.error)}. Please try again.`;
  }
}

export async function runInteractiveLoop(options: InteractiveLoopOptions): Promise<void> {
  const { prompter, runner, gather, logger } = options;

  logger.info('Ready (one temporary conversation per request)');
  prompter.say(`\n${BANNER}\n`);

  for (;;) {
    let gathered: GatherResult;
    try {
      gathered = await gather(prompter);
    } catch (error) {
      if (isInputEnded(error)) {
        prompter.say('\nExit signal received.');
        return;
      }
      throw error;
    }

    if (gathered.kind === 'exit') {
      return;
    }

    if (gathered.content.trim().length === 0) {
      prompter.say('No content entered, please try again.');
      continue;
    }

    prompter.say('...\n');
    const result = await runner.run(gathered.content);
    prompter.say(`${describeResult(result)}\n`);

    if (prompter.takeInterrupt()) {
      prompter.say('Exit signal received.');
      return;
    }

    let choice: string;
    try {
      choice = await prompter.ask('Continue? (Y/n): ');
    } catch (error) {
      if (isInputEnded(error)) {
        prompter.say('\nExit signal received.');
        return;
      }
      throw error;
    }
    if (choice.trim().toLowerCase() === 'n') {
      return;
    }
  }
}
