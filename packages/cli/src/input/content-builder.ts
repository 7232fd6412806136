/**
 * @fileoverview Interactive content gathering
 *
 * Asks for the pieces each packaging strategy needs and hands them to the
 * core builders. Both functions resolve to `{ kind: 'exit' }` when the user
 * types exit or quit at the first prompt of a turn.
 */
import {
  DIRECT_ACKNOWLEDGEMENT,
  MAX_MESSAGES,
  MIN_MESSAGES,
  buildDirectContent,
  buildGuidedContent,
  canAutoFill,
  parseMessageCount,
} from '@titlecast/core';
import type { Prompter } from './prompter.js';
import { readMultiline } from './multiline-input.js';

export type GatherResult = { kind: 'content'; content: string } | { kind: 'exit' };

const EXIT_WORDS = new Set(['exit', 'quit']);

export function isExitWord(answer: string): boolean {
  return EXIT_WORDS.has(answer.trim().toLowerCase());
}

export interface DirectGatherOptions {
  /** Count used when the prompt is left empty */
  defaultCount: number;
  /** Skip the count prompt and use this count */
  fixedCount?: number;
}

async function askMessageCount(prompter: Prompter, defaultCount: number): Promise<number | null> {
  for (;;) {
    const answer = await prompter.ask(
      `Number of messages (${MIN_MESSAGES}-${MAX_MESSAGES}, default ${defaultCount}): `
    );
    if (isExitWord(answer)) {
      return null;
    }
    const count = parseMessageCount(answer, defaultCount);
    if (count !== null) {
      return count;
    }
    prompter.say(`Invalid number, enter an integer between ${MIN_MESSAGES} and ${MAX_MESSAGES}.`);
  }
}

/**
 * Gather messages for the direct strategy
 */
export async function collectDirectContent(
  prompter: Prompter,
  options: DirectGatherOptions
): Promise<GatherResult> {
  prompter.say('\n--- Message builder ---');

  const count = options.fixedCount ?? (await askMessageCount(prompter, options.defaultCount));
  if (count === null) {
    return { kind: 'exit' };
  }

  const messages: string[] = [];
  for (let i = 1; i <= count; i++) {
    if (canAutoFill(i, count)) {
      const choice = await prompter.ask(`Auto-fill Message ${i}? (Y/n): `);
      if (choice.trim().toLowerCase() !== 'n') {
        messages.push(DIRECT_ACKNOWLEDGEMENT);
        prompter.say(`Message ${i} auto-filled.`);
        continue;
      }
    }
    messages.push(await readMultiline(prompter, `Enter Message ${i}`));
  }

  return { kind: 'content', content: buildDirectContent(messages) };
}

/**
 * Gather core content and a directive for the guided strategy
 */
export async function collectGuidedContent(prompter: Prompter): Promise<GatherResult> {
  prompter.say('\n--- Guided builder ---');

  const coreContent = await readMultiline(prompter, 'Enter the content to analyze');
  if (isExitWord(coreContent)) {
    return { kind: 'exit' };
  }

  const directive = await prompter.ask('Directive (what to do with the content): ');
  return { kind: 'content', content: buildGuidedContent({ coreContent, directive }) };
}
