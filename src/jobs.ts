import { writeFile, readFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { RESEARCH_STATES } from './types/index.js';

// Jobs directory for file-based persistence
export const JOBS_DIR = join(homedir(), '.research-jobs');

const progressSchema = z.object({
  currentStep: z.enum(RESEARCH_STATES),
  stepNumber: z.number(),
  searchAttempts: z.number(),
  papersFound: z.number(),
  papersAnalyzed: z.number(),
  note: z.string().optional(),
});

// Progress info for agents polling check_research_status
export type ProgressInfo = z.infer<typeof progressSchema>;

const researchJobSchema = z.object({
  id: z.string(),
  status: z.enum(['pending', 'running', 'completed', 'failed']),
  query: z.string(),
  createdAt: z.number(),
  completedAt: z.number().optional(),
  result: z.string().optional(), // Markdown report
  partialReport: z.string().optional(),
  error: z.string().optional(),
  failedIn: z.enum(RESEARCH_STATES).optional(),
  progress: z.union([z.string(), progressSchema]).optional(),
  reportPath: z.string().optional(),
});

export type ResearchJob = z.infer<typeof researchJobSchema>;

// In-memory job storage
export const jobs = new Map<string, ResearchJob>();

/**
 * Generate unique job ID
 */
export function generateJobId(): string {
  return `research-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}

export function createJob(query: string): ResearchJob {
  const job: ResearchJob = { id: generateJobId(), status: 'pending', query, createdAt: Date.now() };
  jobs.set(job.id, job);
  return job;
}

/**
 * Save job to file system
 */
export async function saveJob(job: ResearchJob, dir: string = JOBS_DIR): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, `${job.id}.json`), JSON.stringify(job, null, 2), 'utf-8');
  } catch (error) {
    console.error(`[Jobs] Failed to save job ${job.id}:`, error);
  }
}

/**
 * Load job from file system. Missing or malformed files read as null.
 */
export async function loadJob(jobId: string, dir: string = JOBS_DIR): Promise<ResearchJob | null> {
  let data: string;
  try {
    data = await readFile(join(dir, `${jobId}.json`), 'utf-8');
  } catch {
    return null;
  }
  try {
    const parsed = researchJobSchema.safeParse(JSON.parse(data));
    if (parsed.success) return parsed.data;
    console.error(`[Jobs] Ignoring malformed job file for ${jobId}`);
  } catch (error) {
    console.error(`[Jobs] Ignoring unreadable job file for ${jobId}:`, error);
  }
  return null;
}

/**
 * In-memory first, then the file written by an earlier server process
 */
export async function findJob(jobId: string, dir: string = JOBS_DIR): Promise<ResearchJob | null> {
  const job = jobs.get(jobId) ?? (await loadJob(jobId, dir));
  if (job) jobs.set(job.id, job);
  return job;
}
