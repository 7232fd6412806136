/**
 * @fileoverview Multi-line Input Tests
 */
import { describe, it, expect } from 'vitest';
import { isEofMarker, readMultiline } from '../../src/input/multiline-input.js';
import { InputInterruptedError } from '../../src/input/prompter.js';
import { CLOSE, INTERRUPT, ScriptedPrompter } from '../helpers/scripted-prompter.js';

describe('isEofMarker', () => {
  it.each(['EOF', 'eof', ' Eof ', '\teof'])('should accept %j', (line) => {
    expect(isEofMarker(line)).toBe(true);
  });

  it.each(['', 'EOF.', 'e o f', 'end'])('should reject %j', (line) => {
    expect(isEofMarker(line)).toBe(false);
  });
});

describe('readMultiline', () => {
  it('should join lines until the EOF line', async () => {
    const prompter = new ScriptedPrompter(['first', '', 'third', 'EOF', 'never read']);

    await expect(readMultiline(prompter, 'Enter Message 1')).resolves.toBe('first\n\nthird');
    expect(prompter.remaining).toBe(1);
  });

  it('should print the label with the terminator hint', async () => {
    const prompter = new ScriptedPrompter(['eof']);
    await readMultiline(prompter, 'Enter Message 1');

    expect(prompter.transcript[0]).toBe('Enter Message 1 (finish with a line containing only EOF):');
  });

  it('should return collected lines when input closes', async () => {
    const prompter = new ScriptedPrompter(['one', 'two', CLOSE]);

    await expect(readMultiline(prompter, 'x')).resolves.toBe('one\ntwo');
  });

  it('should return an empty string for an immediate EOF', async () => {
    await expect(readMultiline(new ScriptedPrompter(['EOF']), 'x')).resolves.toBe('');
  });

  it('should propagate interrupts', async () => {
    const prompter = new ScriptedPrompter(['one', INTERRUPT]);

    await expect(readMultiline(prompter, 'x')).rejects.toBeInstanceOf(InputInterruptedError);
  });
});
