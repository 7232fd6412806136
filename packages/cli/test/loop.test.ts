/**
 * @fileoverview Interactive Loop Tests
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ConversationCreateError, type InferenceResult } from '@titlecast/core';
import { describeResult, runInteractiveLoop, type InferenceCycle } from '../src/loop.js';
import { collectDirectContent, type GatherResult } from '../src/input/content-builder.js';
import type { Prompter } from '../src/input/prompter.js';
import { CLOSE, INTERRUPT, ScriptedPrompter } from './helpers/scripted-prompter.js';
import { RecordingLogger } from '../../core/test/helpers/recording-logger.js';

const success = (title: string): InferenceResult => ({ status: 'success', conversationId: 'conv-1', title });

function fakeRunner(...results: InferenceResult[]) {
  const run = vi.fn<InferenceCycle['run']>();
  for (const result of results) {
    run.mockResolvedValueOnce(result);
  }
  return { run };
}

const gatherDirect = (prompter: Prompter): Promise<GatherResult> =>
  collectDirectContent(prompter, { defaultCount: 2 });

describe('describeResult', () => {
  it('should render each outcome', () => {
    expect(describeResult(success('Paris'))).toBe('Title (answer): Paris');
    expect(describeResult({ status: 'absent', conversationId: 'conv-1' })).toBe(
      'No title returned. Check your network or input.'
    );
    expect(
      describeResult({
        status: 'error',
        kind: 'conversation_create',
        conversationId: 'conv-1',
        error: new ConversationCreateError('conv-1'),
      })
    ).toBe('Error: Could not create a temporary conversation. Please try again.');
  });
});

describe('runInteractiveLoop', () => {
  let logger: RecordingLogger;

  beforeEach(() => {
    logger = new RecordingLogger();
  });

  it('should print the banner first', async () => {
    const prompter = new ScriptedPrompter(['exit']);
    await runInteractiveLoop({ prompter, runner: fakeRunner(), gather: gatherDirect, logger });

    expect(prompter.transcript[0]).toContain("Type 'exit' or 'quit' to leave.");
  });

  it('should run one cycle per turn and print the title', async () => {
    const runner = fakeRunner(success('Paris'), success('Rome'));
    const prompter = new ScriptedPrompter([
      '1', 'Capital of France?', 'EOF', 'y',
      '1', 'Capital of Italy?', 'EOF', 'n',
    ]);

    await runInteractiveLoop({ prompter, runner, gather: gatherDirect, logger });

    expect(runner.run.mock.calls).toEqual([
      ['Message 1:\n\nCapital of France?'],
      ['Message 1:\n\nCapital of Italy?'],
    ]);
    expect(prompter.transcript).toContain('Title (answer): Paris\n');
    expect(prompter.transcript).toContain('Title (answer): Rome\n');
    expect(prompter.questions.filter((q) => q === 'Continue? (Y/n): ')).toHaveLength(2);
  });

  it('should continue on an empty answer to the continue prompt', async () => {
    const runner = fakeRunner(success('A'), success('B'));
    const prompter = new ScriptedPrompter(['1', 'a', 'EOF', '', '1', 'b', 'EOF', 'N']);

    await runInteractiveLoop({ prompter, runner, gather: gatherDirect, logger });

    expect(runner.run).toHaveBeenCalledTimes(2);
  });

  it('should re-prompt without a remote call when content is empty', async () => {
    const runner = fakeRunner(success('A'));
    const prompter = new ScriptedPrompter(['1', '', 'EOF', '1', 'real', 'EOF', 'n']);

    await runInteractiveLoop({ prompter, runner, gather: gatherDirect, logger });

    expect(prompter.transcript).toContain('No content entered, please try again.');
    expect(runner.run).toHaveBeenCalledTimes(1);
    expect(runner.run).toHaveBeenCalledWith('Message 1:\n\nreal');
  });

  it('should report a missing title and keep going', async () => {
    const runner = fakeRunner({ status: 'absent', conversationId: 'conv-1' });
    const prompter = new ScriptedPrompter(['1', 'x', 'EOF', 'n']);

    await runInteractiveLoop({ prompter, runner, gather: gatherDirect, logger });

    expect(prompter.transcript).toContain('No title returned. Check your network or input.\n');
  });

  it('should end on exit at the count prompt without a remote call', async () => {
    const runner = fakeRunner();
    const prompter = new ScriptedPrompter(['quit']);

    await runInteractiveLoop({ prompter, runner, gather: gatherDirect, logger });

    expect(runner.run).not.toHaveBeenCalled();
  });

  it.each([
    ['closed', CLOSE],
    ['interrupted', INTERRUPT],
  ] as const)('should end when input is %s while gathering', async (_label, step) => {
    const runner = fakeRunner();
    const prompter = new ScriptedPrompter([step]);

    await runInteractiveLoop({ prompter, runner, gather: gatherDirect, logger });

    expect(runner.run).not.toHaveBeenCalled();
    expect(prompter.transcript.at(-1)).toBe('\nExit signal received.');
  });

  it('should end when input closes at the continue prompt', async () => {
    const runner = fakeRunner(success('A'));
    const prompter = new ScriptedPrompter(['1', 'x', 'EOF', CLOSE]);

    await runInteractiveLoop({ prompter, runner, gather: gatherDirect, logger });

    expect(runner.run).toHaveBeenCalledTimes(1);
    expect(prompter.transcript.at(-1)).toBe('\nExit signal received.');
  });

  it('should finish the cycle and then exit on a deferred interrupt', async () => {
    const prompter = new ScriptedPrompter(['1', 'x', 'EOF', 'y']);
    const order: string[] = [];
    const runner: InferenceCycle = {
      run: async () => {
        prompter.interrupt();
        order.push('released');
        return success('Done');
      },
    };

    await runInteractiveLoop({ prompter, runner, gather: gatherDirect, logger });

    expect(order).toEqual(['released']);
    expect(prompter.transcript).toContain('Title (answer): Done\n');
    expect(prompter.questions).not.toContain('Continue? (Y/n): ');
    expect(prompter.remaining).toBe(1);
  });
});
