import { writeFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { homedir } from 'os';
import { describeError } from './errors.js';
import { generateFilename } from './formatting.js';
import { ResearchJob, saveJob, JOBS_DIR } from './jobs.js';
import { ResearchOutcome, runResearch, RunResearchOptions } from './research.js';

export const REPORTS_DIR = join(homedir(), 'research-reports');

export type ResearchRunner = (input: unknown, options: RunResearchOptions) => Promise<ResearchOutcome>;

export interface JobRunDeps {
  run?: ResearchRunner;
  options?: RunResearchOptions;
  jobsDir?: string;
  reportsDir?: string;
}

export interface JobStartResult {
  jobId: string;
  /** Settles once the job is completed or failed and saved; never rejects */
  done: Promise<void>;
}

/**
 * Start a research job and return immediately; execution continues in the background
 * and every state transition is written to the job file for check_research_status.
 */
export function startResearchJob(job: ResearchJob, input: unknown, deps: JobRunDeps = {}): JobStartResult {
  const done = executeResearchInBackground(job, input, deps);
  return { jobId: job.id, done };
}

async function executeResearchInBackground(job: ResearchJob, input: unknown, deps: JobRunDeps): Promise<void> {
  const run = deps.run ?? runResearch;
  const jobsDir = deps.jobsDir ?? JOBS_DIR;
  let stepNumber = 0;

  try {
    job.status = 'running';
    job.progress = { currentStep: 'Initializing', stepNumber, searchAttempts: 0, papersFound: 0, papersAnalyzed: 0 };
    await saveJob(job, jobsDir);

    const outcome = await run(input, {
      ...deps.options,
      onTransition: (from, to, ctx) => {
        deps.options?.onTransition?.(from, to, ctx);
        stepNumber++;
        job.progress = {
          currentStep: to,
          stepNumber,
          searchAttempts: ctx.searchAttempts,
          papersFound: ctx.qualityMetrics.papersFound,
          papersAnalyzed: ctx.qualityMetrics.papersAnalyzed,
          note: ctx.notes.at(-1),
        };
        // Progress saves must not block the state machine
        saveJob(job, jobsDir).catch(err => console.error(`[Jobs] Failed to save progress:`, err));
      },
    });

    job.completedAt = Date.now();
    if (!outcome.ok) {
      job.status = 'failed';
      job.error = outcome.failure.message;
      job.failedIn = outcome.failure.state;
      job.partialReport = outcome.partialReport;
      job.progress = 'Failed';
      await saveJob(job, jobsDir);
      console.error(`[Jobs] Job ${job.id} failed in ${outcome.failure.state}: ${outcome.failure.message}`);
      return;
    }

    job.status = 'completed';
    job.result = outcome.markdown;
    job.progress = 'Complete';

    // Save report file
    try {
      const reportDir = deps.reportsDir ?? REPORTS_DIR;
      const filepath = join(reportDir, generateFilename(job.query));
      await mkdir(reportDir, { recursive: true });
      await writeFile(filepath, outcome.markdown, 'utf-8');
      job.reportPath = filepath;
      console.error(`[Jobs] Report saved to: ${filepath}`);
    } catch (err) {
      console.error(`[Jobs] Failed to save report:`, err);
    }

    await saveJob(job, jobsDir);
    console.error(`[Jobs] Job ${job.id} completed successfully`);
  } catch (error) {
    job.status = 'failed';
    job.completedAt = Date.now();
    job.error = describeError(error);
    job.progress = 'Failed';
    await saveJob(job, jobsDir);
    console.error(`[Jobs] Job ${job.id} failed:`, job.error);
  }
}
