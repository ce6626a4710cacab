/**
 * Paper analysis round: every unanalyzed paper goes through the bounded pool; the round
 * returns only when each one is analyzed or failed.
 */

import { LanguageModel } from './clients/llm.js';
import { runBounded } from './concurrency.js';
import { filterInvalidContent } from './content-filter.js';
import { describeError, isPermanentLLMError } from './errors.js';
import { AcademicSearch } from './services/arxiv.js';
import { DocumentStructurer } from './services/document.js';
import { advanceStatus } from './session.js';
import { MemoryCache } from './storage/memory-cache.js';
import { PaperRecord } from './types/index.js';

export interface AnalyzerDeps {
  search: AcademicSearch;
  documents: DocumentStructurer;
  llm: LanguageModel;
  cache: MemoryCache;
}

export type AnalysisOutcome =
  | { paperId: string; ok: true; text: string; fromCache: boolean }
  | { paperId: string; ok: false; error: string; permanent: boolean };

export interface AnalysisRound {
  outcomes: AnalysisOutcome[];
  analyzed: number;
  failed: number;
  fromCache: number;
  /** Failures where the language model rejected the request permanently */
  permanentFailures: number;
}

const ANALYSIS_PROMPT = `You are a concise relevance analyst. Answer in English using EXACTLY these four headings and nothing else:
Query Decomposition:
Document Profiles:
Multi-Layer Matching Analysis:
Confidence Scoring:
Rules: ground every claim in the provided paper; include a 0-100 primary relevance rating under 'Confidence Scoring'. No extra sections, no preface or closing.`;

/**
 * Analyzes one paper: cache first, otherwise fetch → structure → language model → cache.
 * Owns the record's status while it runs.
 */
export class PaperAnalyzer {
  constructor(
    private readonly deps: AnalyzerDeps,
    private readonly options: { query: string; maxDocumentChars: number }
  ) {}

  async analyze(record: PaperRecord, signal?: AbortSignal): Promise<AnalysisOutcome> {
    try {
      const cached = await this.lookupCache(record.id);
      if (cached) {
        advanceStatus(record, 'analyzed', { analysisText: cached, fromCache: true });
        console.error(`[Exec] ✓ ${record.id} from cache`);
        return { paperId: record.id, ok: true, text: cached, fromCache: true };
      }

      throwIfAborted(signal);
      const document = await this.deps.search.fetchDocument(record.metadata, signal);
      advanceStatus(record, 'fetched');

      throwIfAborted(signal);
      const structured = await this.deps.documents.toStructuredText(document, signal);

      throwIfAborted(signal);
      const text = await this.analyzeText(record, structured, signal);

      // A reply that lands after the timeout is discarded, not cached or counted
      throwIfAborted(signal);
      await this.deps.cache.store(record.id, text).catch(error => {
        console.error(`[Exec] Cache write failed for ${record.id}: ${describeError(error)}`);
      });

      if (!advanceStatus(record, 'analyzed', { analysisText: text })) {
        return { paperId: record.id, ok: false, error: record.error ?? `paper ${record.id} is already ${record.status}`, permanent: false };
      }
      console.error(`[Exec] ✓ ${record.id} analyzed`);
      return { paperId: record.id, ok: true, text, fromCache: false };
    } catch (caught) {
      // After a timeout, whatever the late work threw is a consequence of the abort
      const error = signal?.aborted && signal.reason instanceof Error ? signal.reason : caught;
      const message = describeError(error);
      advanceStatus(record, 'failed', { error: message });
      console.error(`[Exec] ✗ ${record.id}: ${message}`);
      return { paperId: record.id, ok: false, error: message, permanent: isPermanentLLMError(error) };
    }
  }

  /**
   * A failing cache read is a miss, not a failure
   */
  private async lookupCache(paperId: string): Promise<string | undefined> {
    try {
      const hit = await this.deps.cache.lookup(paperId);
      return hit && hit.trim() ? hit : undefined;
    } catch (error) {
      console.error(`[Exec] Cache lookup failed for ${paperId}, treating as miss: ${describeError(error)}`);
      return undefined;
    }
  }

  private async analyzeText(record: PaperRecord, structured: string, signal?: AbortSignal): Promise<string> {
    const paper = structured.length > this.options.maxDocumentChars
      ? `${structured.slice(0, this.options.maxDocumentChars)}\n\n[truncated]`
      : structured;

    const content = await this.deps.llm.complete([
      { role: 'system', content: ANALYSIS_PROMPT },
      {
        role: 'user',
        content: `User query: ${this.options.query}\n\nTask: assess how the paper relates to the query following the four sections above.\n\nPaper (${record.metadata.title || record.id}):\n${paper}`,
      },
    ], { signal });

    const text = filterInvalidContent(content);
    if (!text) {
      throw new Error('analysis was empty or had no usable content');
    }
    return `### ${record.metadata.title || record.id} [arxiv:${record.id}]\n\n${text}`;
  }
}

function throwIfAborted(signal?: AbortSignal): void {
  if (!signal?.aborted) return;
  // The pool aborts with the UnitTimeoutError, which carries the message to record
  throw signal.reason instanceof Error ? signal.reason : new Error('analysis aborted');
}

/**
 * Fan out the records over the pool and wait for all of them (hard barrier).
 * A timed-out unit fails inside the analyzer once its late work returns; the pool
 * holds its slot until then, so the record is failed before the round ends.
 */
export async function analyzePapers(
  records: readonly PaperRecord[],
  analyzer: PaperAnalyzer,
  options: { maxWorkers: number; unitTimeoutMs?: number }
): Promise<AnalysisRound> {
  console.error(`[Exec] Analyzing ${records.length} papers (max ${options.maxWorkers} in flight)`);

  const settled = await runBounded(
    records,
    (record, _index, signal) => analyzer.analyze(record, signal),
    { limit: options.maxWorkers, timeoutMs: options.unitTimeoutMs, label: 'analysis' }
  );

  const outcomes = settled.map((result, index): AnalysisOutcome => {
    const record = records[index];
    if (result.status === 'fulfilled') return result.value;
    const error = describeError(result.reason);
    advanceStatus(record, 'failed', { error });
    return { paperId: record.id, ok: false, error, permanent: false };
  });

  const round: AnalysisRound = { outcomes, analyzed: 0, failed: 0, fromCache: 0, permanentFailures: 0 };
  for (const outcome of outcomes) {
    if (outcome.ok) {
      round.analyzed++;
      if (outcome.fromCache) round.fromCache++;
    } else {
      round.failed++;
      if (outcome.permanent) round.permanentFailures++;
    }
  }

  console.error(`[Exec] Round complete: ${round.analyzed} analyzed (${round.fromCache} cached), ${round.failed} failed`);
  return round;
}
