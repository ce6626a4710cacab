import { describe, it, expect, vi, afterEach } from 'vitest';
import { LLMError } from '../errors.js';
import { analyzePapers, PaperAnalyzer } from '../execution.js';
import { createSession, mergeCandidates, refreshMetrics } from '../session.js';
import { InMemoryCache, MemoryCache } from '../storage/memory-cache.js';
import { PaperRecord } from '../types/index.js';
import { ANALYSIS_TEXT, FakeSearch, FakeStructurer, fakeModel, paper, userPrompt } from './helpers/fakes.js';

afterEach(() => {
  vi.useRealTimers();
});

function records(...ids: string[]): PaperRecord[] {
  const ctx = createSession('graph neural networks');
  mergeCandidates(ctx, ids.map(id => paper(id)));
  return [...ctx.candidatePapers.values()];
}

function setup(cache: MemoryCache = new InMemoryCache()) {
  const search = new FakeSearch();
  const documents = new FakeStructurer();
  const { model, complete } = fakeModel(() => ANALYSIS_TEXT);
  const analyzer = new PaperAnalyzer(
    { search, documents, llm: model, cache },
    { query: 'graph neural networks', maxDocumentChars: 20000 }
  );
  return { search, documents, complete, analyzer, cache };
}

describe('PaperAnalyzer', () => {
  it('analyzes a pending paper and writes the result to the cache', async () => {
    const cache = new InMemoryCache();
    const { analyzer } = setup(cache);
    const [record] = records('2401.00001');

    const outcome = await analyzer.analyze(record);

    const expected = `### Paper 2401.00001 [arxiv:2401.00001]\n\n${ANALYSIS_TEXT}`;
    expect(outcome).toEqual({ paperId: '2401.00001', ok: true, text: expected, fromCache: false });
    expect(record.status).toBe('analyzed');
    expect(record.analysisText).toBe(expected);
    expect(await cache.lookup('2401.00001')).toBe(expected);
  });

  it('never calls the document or model path on a cache hit', async () => {
    const cache = new InMemoryCache();
    const { analyzer, search, documents, complete } = setup(cache);

    await analyzer.analyze(records('1')[0]);
    const second = records('1')[0];
    const outcome = await analyzer.analyze(second);

    expect(outcome.ok && outcome.fromCache).toBe(true);
    expect(second.fromCache).toBe(true);
    expect(search.fetchDocument).toHaveBeenCalledTimes(1);
    expect(documents.toStructuredText).toHaveBeenCalledTimes(1);
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('treats a failing cache read as a miss and a failing write as harmless', async () => {
    const cache: MemoryCache = {
      lookup: vi.fn(async () => {
        throw new Error('cache offline');
      }),
      store: vi.fn(async () => {
        throw new Error('cache offline');
      }),
      healthCheck: vi.fn(async () => true),
    };
    const { analyzer } = setup(cache);
    const [record] = records('1');

    const outcome = await analyzer.analyze(record);
    expect(outcome.ok).toBe(true);
    expect(record.status).toBe('analyzed');
  });

  it('truncates long documents before analysis', async () => {
    const { analyzer, documents, complete } = setup();
    documents.toStructuredText.mockResolvedValueOnce('x'.repeat(30000));

    await analyzer.analyze(records('1')[0]);

    const prompt = userPrompt(complete.mock.calls[0][0]);
    expect(prompt).toContain(`${'x'.repeat(20000)}\n\n[truncated]`);
    expect(prompt).not.toContain('x'.repeat(20001));
  });

  it('marks the paper failed when the document cannot be fetched', async () => {
    const { analyzer, search } = setup();
    search.unfetchable.add('1');
    const [record] = records('1');

    const outcome = await analyzer.analyze(record);

    expect(outcome).toEqual({ paperId: '1', ok: false, error: 'download failed for 1', permanent: false });
    expect(record.status).toBe('failed');
    expect(record.error).toBe('download failed for 1');
  });

  it('rejects a boilerplate analysis as a failure', async () => {
    const { analyzer, complete, cache } = setup();
    complete.mockResolvedValueOnce('No relevant information was found. No results found.');
    const [record] = records('1');

    const outcome = await analyzer.analyze(record);

    expect(outcome.ok).toBe(false);
    expect(record.status).toBe('failed');
    expect(await cache.lookup('1')).toBeUndefined();
  });

  it('flags permanent model rejections', async () => {
    const { analyzer, complete } = setup();
    complete.mockRejectedValueOnce(new LLMError('API key invalid', 'fake-model', 'permanent', 401));

    const outcome = await analyzer.analyze(records('1')[0]);
    expect(outcome).toEqual({ paperId: '1', ok: false, error: 'API key invalid', permanent: true });
  });
});

describe('analyzePapers', () => {
  it('lets the other papers finish when one fails', async () => {
    const { analyzer, search } = setup();
    search.unfetchable.add('b');
    const batch = records('a', 'b', 'c', 'd');

    const round = await analyzePapers(batch, analyzer, { maxWorkers: 2 });

    expect(batch.map(r => r.status)).toEqual(['analyzed', 'failed', 'analyzed', 'analyzed']);
    expect(round).toMatchObject({ analyzed: 3, failed: 1, fromCache: 0, permanentFailures: 0 });
    expect(round.outcomes.map(o => o.paperId)).toEqual(['a', 'b', 'c', 'd']);
  });

  it('fails a timed-out paper and keeps it failed when the late result arrives', async () => {
    vi.useFakeTimers();
    const { analyzer, documents, complete } = setup();
    documents.toStructuredText.mockImplementationOnce(
      document => new Promise(resolve => setTimeout(() => resolve(`Full text of ${document.paperId}`), 5000))
    );
    const batch = records('slow', 'fast');

    const pending = analyzePapers(batch, analyzer, { maxWorkers: 2, unitTimeoutMs: 1000 });
    await vi.advanceTimersByTimeAsync(1500);
    expect(batch[1].status).toBe('analyzed');

    // The round waits for the slow structurer to return before settling
    await vi.advanceTimersByTimeAsync(4000);
    const round = await pending;

    expect(round.failed).toBe(1);
    expect(batch[0].status).toBe('failed');
    expect(batch[0].error).toBe('analysis #1 timed out after 1000ms');
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('discards a model reply that arrives after the timeout', async () => {
    vi.useFakeTimers();
    const cache = new InMemoryCache();
    const { analyzer, complete } = setup(cache);
    const replyDelays = [1500, 800];
    complete.mockImplementation(
      () => new Promise<string>(resolve => setTimeout(() => resolve(ANALYSIS_TEXT), replyDelays.shift() ?? 0))
    );
    const ctx = createSession('graph neural networks');
    mergeCandidates(ctx, [paper('slow'), paper('b')]);
    const batch = [...ctx.candidatePapers.values()];

    const pending = analyzePapers(batch, analyzer, { maxWorkers: 1, unitTimeoutMs: 1000 });
    await vi.advanceTimersByTimeAsync(2500);
    const round = await pending;

    expect(batch.map(r => r.status)).toEqual(['failed', 'analyzed']);
    expect(batch[0].error).toBe('analysis #1 timed out after 1000ms');
    expect(round).toMatchObject({ analyzed: 1, failed: 1 });
    expect(round.outcomes.filter(o => o.ok)).toHaveLength(1);
    expect(refreshMetrics(ctx)).toEqual({ papersFound: 2, papersAnalyzed: 1, papersFailed: 1 });
    expect(await cache.lookup('slow')).toBeUndefined();
  });
});
