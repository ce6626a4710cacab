/**
 * Synthesis Phase - Binary-tree merge of per-paper analyses into one report
 *
 * Round k merges adjacent pairs concurrently (bounded pool); an odd leftover is carried
 * through unmerged. N inputs take ceil(log2 N) rounds, and each pair's token budget is the
 * round budget split across its pairs, so total usage per round stays bounded.
 */

import { LanguageModel } from './clients/llm.js';
import { runBounded } from './concurrency.js';
import { filterInvalidContent } from './content-filter.js';
import { describeError } from './errors.js';

export const NO_CONTENT_PLACEHOLDER = 'No content to synthesize: no paper analysis produced usable findings.';

export interface MergeOptions {
  query: string;
  maxWorkers: number;
  unitTimeoutMs?: number;
  /** Token budget shared by all pairs of one round */
  tokenBudget: number;
  minPairTokens: number;
  maxPairTokens: number;
  /** Checked before each round; once aborted the remaining texts are joined without model calls */
  signal?: AbortSignal;
  onRound?: (round: number, inputs: number, pairTokens: number) => void;
  onPairError?: (error: unknown, round: number, pairIndex: number) => void;
}

export interface MergeResult {
  text: string;
  rounds: number;
  llmCalls: number;
  /** True when a stop request cut the merge short */
  stopped: boolean;
}

const MERGE_SYSTEM_PROMPT = (maxTokens: number) => `You are an academic information integration expert. Merge two research analyses into one structured, logically organized synthesis:
1. Keep every important finding and core argument
2. Remove redundancy and merge repeated points
3. Reorganize the content by its logical relationships
4. Highlight how the two analyses relate and complement each other
5. Stay within ${maxTokens} tokens
Output only the merged content, with no preface or commentary.`;

/**
 * Per-pair budget for a round with `pairs` concurrent merges.
 * The `minPairTokens` floor wins over the split, so a round with many pairs can total more
 * than `tokenBudget`; at most `maxWorkers` of those pairs are in flight at once.
 */
export function pairTokenBudget(pairs: number, options: Pick<MergeOptions, 'tokenBudget' | 'minPairTokens' | 'maxPairTokens'>): number {
  const share = Math.floor(options.tokenBudget / Math.max(1, pairs));
  return Math.min(options.maxPairTokens, Math.max(options.minPairTokens, share));
}

function isDegenerate(text: string): boolean {
  return filterInvalidContent(text, { minLength: 1 }) === '';
}

export class ResultMerger {
  constructor(
    private readonly llm: LanguageModel,
    private readonly options: MergeOptions
  ) {}

  async merge(texts: readonly string[]): Promise<string> {
    return (await this.mergeWithStats(texts)).text;
  }

  async mergeWithStats(texts: readonly string[]): Promise<MergeResult> {
    const valid = texts.filter(text => !isDegenerate(text));

    if (valid.length === 0) {
      console.error('[Synthesis] No valid content, returning placeholder');
      return { text: NO_CONTENT_PLACEHOLDER, rounds: 0, llmCalls: 0, stopped: false };
    }
    if (valid.length === 1) {
      return { text: valid[0], rounds: 0, llmCalls: 0, stopped: false };
    }

    console.error(`[Synthesis] Merging ${valid.length} analyses`);
    let level = valid;
    let round = 0;
    let llmCalls = 0;

    while (level.length > 1) {
      round++;
      const pairs: Array<[string, string]> = [];
      for (let i = 0; i + 1 < level.length; i += 2) {
        pairs.push([level[i], level[i + 1]]);
      }
      const leftover = level.length % 2 === 1 ? level[level.length - 1] : undefined;
      const maxTokens = pairTokenBudget(pairs.length, this.options);

      console.error(`[Synthesis] Round ${round}: ${level.length} inputs, ${pairs.length} pairs, ${maxTokens} tokens per pair`);
      this.options.onRound?.(round, level.length, maxTokens);

      if (this.options.signal?.aborted) {
        console.error(`[Synthesis] Stop requested before round ${round}, joining ${level.length} texts unmerged`);
        const joined = level.slice(1).reduce(concatenate, level[0]);
        return { text: joined, rounds: round - 1, llmCalls, stopped: true };
      }

      const settled = await runBounded(
        pairs,
        (pair, _index, signal) => this.mergePair(pair[0], pair[1], maxTokens, signal),
        { limit: this.options.maxWorkers, timeoutMs: this.options.unitTimeoutMs, label: `merge round ${round} pair` }
      );
      llmCalls += pairs.length;

      const next = settled.map((result, index) => {
        if (result.status === 'fulfilled') return result.value;
        console.error(`[Synthesis] Pair ${index + 1} in round ${round} failed: ${describeError(result.reason)}`);
        this.options.onPairError?.(result.reason, round, index);
        return concatenate(pairs[index][0], pairs[index][1]);
      });
      if (leftover !== undefined) next.push(leftover);

      level = next;
    }

    console.error(`[Synthesis] Completed in ${round} rounds, final length ${level[0].length}`);
    return { text: level[0], rounds: round, llmCalls, stopped: false };
  }

  private async mergePair(a: string, b: string, maxTokens: number, signal: AbortSignal): Promise<string> {
    const content = await this.llm.complete([
      { role: 'system', content: MERGE_SYSTEM_PROMPT(maxTokens) },
      {
        role: 'user',
        content: `## Original research query\n${this.options.query}\n\n## Analysis A\n${a}\n\n## Analysis B\n${b}\n\nOutput the merged content directly:`,
      },
    ], { maxTokens, temperature: 0.3, signal });

    const merged = filterInvalidContent(content.trim(), { minLength: 1 });
    if (!merged) {
      throw new Error('merge produced no usable content');
    }
    return merged;
  }
}

/**
 * Fallback for a failed pair: keep both sides rather than lose content
 */
function concatenate(a: string, b: string): string {
  const joined = `${a}\n\n${b}`;
  return filterInvalidContent(joined, { minLength: 1 }) || a;
}
