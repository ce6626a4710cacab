/**
 * ResultMerger: binary-tree reduction of per-paper analyses
 */

import { describe, it, expect, vi } from 'vitest';
import { LLMError } from '../errors.js';
import { MergeOptions, NO_CONTENT_PLACEHOLDER, pairTokenBudget, ResultMerger } from '../synthesis.js';
import { fakeModel, userPrompt } from './helpers/fakes.js';

const baseOptions: MergeOptions = {
  query: 'graph neural networks',
  maxWorkers: 4,
  tokenBudget: 16000,
  minPairTokens: 512,
  maxPairTokens: 4000,
};

function countingModel() {
  let calls = 0;
  return fakeModel(() => {
    calls++;
    return `merged ${calls}`;
  });
}

describe('pairTokenBudget', () => {
  it('splits the round budget across pairs within the bounds', () => {
    expect(pairTokenBudget(1, baseOptions)).toBe(4000);
    expect(pairTokenBudget(5, baseOptions)).toBe(3200);
    expect(pairTokenBudget(40, baseOptions)).toBe(512);
  });

  it('lets the per-pair floor win over the round budget', () => {
    // 37 pairs at the floor total more than the 16000-token round budget
    expect(pairTokenBudget(37, baseOptions)).toBe(512);
    expect(pairTokenBudget(37, baseOptions) * 37).toBeGreaterThan(baseOptions.tokenBudget);
  });
});

describe('ResultMerger', () => {
  it('returns the placeholder for no input', async () => {
    const { model, complete } = countingModel();
    const result = await new ResultMerger(model, baseOptions).mergeWithStats([]);
    expect(result).toEqual({ text: NO_CONTENT_PLACEHOLDER, rounds: 0, llmCalls: 0, stopped: false });
    expect(complete).not.toHaveBeenCalled();
  });

  it('returns the placeholder when every entry is degenerate', async () => {
    const { model } = countingModel();
    expect(await new ResultMerger(model, baseOptions).merge(['', '   ', 'No results found.'])).toBe(NO_CONTENT_PLACEHOLDER);
  });

  it('returns a single entry unchanged', async () => {
    const { model, complete } = countingModel();
    const merger = new ResultMerger(model, baseOptions);
    expect(await merger.merge(['  single finding  '])).toBe('  single finding  ');
    expect(await merger.merge(['No results found.', 'only real finding'])).toBe('only real finding');
    expect(complete).not.toHaveBeenCalled();
  });

  it('merges four texts in two rounds', async () => {
    const { model, complete } = countingModel();
    const onRound = vi.fn();
    const result = await new ResultMerger(model, { ...baseOptions, onRound }).mergeWithStats(['a1', 'b2', 'c3', 'd4']);

    expect(result).toEqual({ text: 'merged 3', rounds: 2, llmCalls: 3, stopped: false });
    expect(onRound.mock.calls).toEqual([
      [1, 4, 4000],
      [2, 2, 4000],
    ]);
    expect(complete).toHaveBeenLastCalledWith(
      expect.any(Array),
      expect.objectContaining({ maxTokens: 4000, temperature: 0.3 })
    );
  });

  it('carries an odd leftover into the next round unmerged', async () => {
    const { model, complete } = countingModel();
    const result = await new ResultMerger(model, baseOptions).mergeWithStats(['a1', 'b2', 'c3']);

    expect(result).toEqual({ text: 'merged 2', rounds: 2, llmCalls: 2, stopped: false });
    const lastRequest = userPrompt(complete.mock.calls[1][0]);
    expect(lastRequest).toContain('## Analysis A\nmerged 1');
    expect(lastRequest).toContain('## Analysis B\nc3');
  });

  it('shrinks the per-pair budget as the fan-in widens', async () => {
    const { model } = countingModel();
    const onRound = vi.fn();
    const texts = Array.from({ length: 16 }, (_, i) => `finding ${i}`);
    const result = await new ResultMerger(model, { ...baseOptions, tokenBudget: 8000, onRound }).mergeWithStats(texts);

    expect(result.rounds).toBe(4);
    expect(result.llmCalls).toBe(15);
    expect(onRound.mock.calls.map(call => call[2])).toEqual([1000, 2000, 4000, 4000]);
  });

  it('keeps both texts of a failed pair and reports the failure', async () => {
    const { model } = fakeModel(messages => {
      if (userPrompt(messages).includes('## Analysis A\nfirst')) {
        throw new LLMError('overloaded', 'fake-model', 'transient', 503);
      }
      return 'merged ok';
    });
    const onPairError = vi.fn();
    const result = await new ResultMerger(model, { ...baseOptions, onPairError }).mergeWithStats(['first', 'second']);

    expect(result).toEqual({ text: 'first\n\nsecond', rounds: 1, llmCalls: 1, stopped: false });
    expect(onPairError).toHaveBeenCalledTimes(1);
    expect(onPairError.mock.calls[0][1]).toBe(1);
    expect(onPairError.mock.calls[0][2]).toBe(0);
  });

  it('joins the texts without model calls when stopped before the first round', async () => {
    const { model, complete } = countingModel();
    const controller = new AbortController();
    const merger = new ResultMerger(model, { ...baseOptions, signal: controller.signal, onRound: () => controller.abort() });

    const result = await merger.mergeWithStats(['a1', 'b2', 'c3', 'd4']);

    expect(result).toEqual({ text: 'a1\n\nb2\n\nc3\n\nd4', rounds: 0, llmCalls: 0, stopped: true });
    expect(complete).not.toHaveBeenCalled();
  });

  it('keeps finished rounds and stops issuing calls once asked to stop', async () => {
    const { model, complete } = countingModel();
    const controller = new AbortController();
    const onRound = (round: number) => {
      if (round === 2) controller.abort();
    };
    const merger = new ResultMerger(model, { ...baseOptions, signal: controller.signal, onRound });

    const result = await merger.mergeWithStats(['a1', 'b2', 'c3', 'd4']);

    expect(result).toEqual({ text: 'merged 1\n\nmerged 2', rounds: 1, llmCalls: 2, stopped: true });
    expect(complete).toHaveBeenCalledTimes(2);
  });

  it('treats a boilerplate merge output as a failed pair', async () => {
    const { model } = fakeModel(() => 'No results found.');
    const onPairError = vi.fn();
    const result = await new ResultMerger(model, { ...baseOptions, onPairError }).merge(['left side', 'right side']);

    expect(result).toBe('left side\n\nright side');
    expect(onPairError).toHaveBeenCalledTimes(1);
  });
});
