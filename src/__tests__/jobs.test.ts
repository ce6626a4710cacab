import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { startResearchJob, ResearchRunner } from '../job-orchestrator.js';
import { createJob, findJob, jobs, loadJob, saveJob } from '../jobs.js';
import { createSession } from '../session.js';
import { toRequestInput } from '../tool-input.js';

describe('job persistence', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'lit-research-jobs-'));
    jobs.clear();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('round-trips a job through its file', async () => {
    const job = createJob('graph neural networks');
    job.progress = { currentStep: 'ExecutingSearch', stepNumber: 3, searchAttempts: 0, papersFound: 0, papersAnalyzed: 0 };
    await saveJob(job, dir);

    expect(await loadJob(job.id, dir)).toEqual(job);
  });

  it('reads missing or malformed files as null', async () => {
    expect(await loadJob('research-missing', dir)).toBeNull();

    await writeFile(join(dir, 'research-bad.json'), JSON.stringify({ id: 'research-bad', status: 'exploded' }), 'utf-8');
    expect(await loadJob('research-bad', dir)).toBeNull();

    await writeFile(join(dir, 'research-broken.json'), '{', 'utf-8');
    expect(await loadJob('research-broken', dir)).toBeNull();
  });

  it('finds jobs saved by an earlier process and caches them', async () => {
    const job = createJob('q');
    await saveJob(job, dir);
    jobs.clear();

    const found = await findJob(job.id, dir);
    expect(found?.query).toBe('q');
    expect(jobs.has(job.id)).toBe(true);
  });
});

describe('startResearchJob', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'lit-research-run-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('stores the markdown and writes the report file on success', async () => {
    const job = createJob('graph neural networks');
    const run: ResearchRunner = vi.fn(async () => ({
      ok: true as const,
      state: 'Completed' as const,
      report: 'report',
      markdown: '# Research Results: graph neural networks\n',
      notes: [],
      context: createSession('graph neural networks'),
    }));
    const reportsDir = join(dir, 'reports');

    const { jobId, done } = startResearchJob(job, { query: job.query }, { run, jobsDir: dir, reportsDir });
    await done;

    expect(jobId).toBe(job.id);
    expect(job.status).toBe('completed');
    expect(job.progress).toBe('Complete');
    expect(job.result).toBe('# Research Results: graph neural networks\n');

    const [reportFile] = await readdir(reportsDir);
    expect(reportFile).toMatch(/^research-\d{4}-\d{2}-\d{2}-\d{6}-graph-neural-networks-[a-z0-9]+\.md$/);
    expect(job.reportPath).toBe(join(reportsDir, reportFile));
    expect(await readFile(join(reportsDir, reportFile), 'utf-8')).toBe('# Research Results: graph neural networks\n');
    expect((await loadJob(job.id, dir))?.status).toBe('completed');
  });

  it('records the failure state and partial report', async () => {
    const job = createJob('q');
    const run: ResearchRunner = async () => ({
      ok: false,
      failure: { state: 'ProcessingResults', message: 'language-model unavailable: every paper analysis was rejected' },
      partialReport: 'partial',
      context: createSession('q'),
    });

    await startResearchJob(job, { query: 'q' }, { run, jobsDir: dir, reportsDir: join(dir, 'reports') }).done;

    const saved = await loadJob(job.id, dir);
    expect(saved?.status).toBe('failed');
    expect(saved?.failedIn).toBe('ProcessingResults');
    expect(saved?.error).toBe('language-model unavailable: every paper analysis was rejected');
    expect(saved?.partialReport).toBe('partial');
    expect(saved?.progress).toBe('Failed');
  });

  it('marks the job failed when the runner throws', async () => {
    const job = createJob('q');
    const run: ResearchRunner = async () => {
      throw new Error('runner crashed');
    };

    await startResearchJob(job, { query: 'q' }, { run, jobsDir: dir }).done;

    expect(job.status).toBe('failed');
    expect(job.error).toBe('runner crashed');
  });

  it('tracks progress on every transition and forwards the caller hook', async () => {
    const job = createJob('q');
    const onTransition = vi.fn();
    const progress: unknown[] = [];
    const run: ResearchRunner = async (_input, options) => {
      const ctx = createSession('q');
      ctx.qualityMetrics.papersFound = 4;
      options.onTransition?.('ExecutingSearch', 'ProcessingResults', ctx);
      progress.push(structuredClone(job.progress));
      return { ok: false, failure: { state: 'ProcessingResults', message: 'stopped' }, context: ctx };
    };

    await startResearchJob(job, { query: 'q' }, { run, jobsDir: dir, options: { onTransition } }).done;

    expect(onTransition).toHaveBeenCalledWith('ExecutingSearch', 'ProcessingResults', expect.anything());
    expect(progress).toEqual([
      { currentStep: 'ProcessingResults', stepNumber: 1, searchAttempts: 0, papersFound: 4, papersAnalyzed: 0, note: undefined },
    ]);
  });
});

describe('toRequestInput', () => {
  it('applies the provider default model to every role', () => {
    expect(toRequestInput({ query: 'q', provider: 'openai' })).toEqual({
      query: 'q',
      models: {
        queryAnalysis: { provider: 'openai', model: 'gpt-4o-mini' },
        embedding: { provider: 'openai', model: 'gpt-4o-mini' },
        synthesis: { provider: 'openai', model: 'gpt-4o-mini' },
      },
    });
  });

  it('maps the optional tool arguments', () => {
    const input = toRequestInput({
      query: 'q',
      synthesis_model: 'gemini-2.5-pro',
      max_workers: 4,
      max_search_retries: 0,
      documents: 'abstract',
      cache: 'memory',
    });
    expect(input.models?.synthesis).toEqual({ provider: 'gemini', model: 'gemini-2.5-pro' });
    expect(input.models?.embedding).toEqual({ provider: 'gemini', model: 'gemini-2.5-flash-lite' });
    expect(input.maxWorkers).toBe(4);
    expect(input.maxSearchRetries).toBe(0);
    expect(input.documents).toEqual({ kind: 'abstract' });
    expect(input.cache).toEqual({ kind: 'memory' });
  });
});
