/**
 * @fileoverview Multi-line input terminated by an EOF line
 */
import { InputClosedError, type Prompter } from './prompter.js';

/** Terminator line, matched case-insensitively after trimming */
export const EOF_MARKER = 'eof';

export function isEofMarker(line: string): boolean {
  return line.trim().toLowerCase() === EOF_MARKER;
}

/**
 * Collect lines until an EOF line or the end of input.
 * Interrupts propagate; a closed input returns what was collected.
 */
export async function readMultiline(prompter: Prompter, label: string): Promise<string> {
  prompter.say(`${label} (finish with a line containing only EOF):`);

  const lines: string[] = [];
  for (;;) {
    let line: string;
    try {
      line = await prompter.ask('');
    } catch (error) {
      if (error instanceof InputClosedError) {
        break;
      }
      throw error;
    }
    if (isEofMarker(line)) {
      break;
    }
    lines.push(line);
  }

  return lines.join('\n');
}
