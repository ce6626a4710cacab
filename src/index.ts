#!/usr/bin/env node
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { createJob, findJob, saveJob, ResearchJob } from './jobs.js';
import { startResearchJob } from './job-orchestrator.js';
import { runResearch } from './research.js';
import { researchToolInputShape, toRequestInput } from './tool-input.js';

// In-memory check count tracking, only used for the "Still running (X checks)" message
const jobCheckCounts = new Map<string, number>();

// Create the MCP server
const server = new McpServer({
  name: 'lit-research-mcp',
  version: '0.1.0',
});

function textResult(text: string) {
  return { content: [{ type: 'text' as const, text }] };
}

server.registerTool(
  'research',
  {
    title: 'Adaptive Literature Research',
    description: `Searches arXiv for papers on a research question, analyzes each candidate paper against the question in parallel, refines the search when too few papers are usable, and merges the analyses into one markdown report.

Runs synchronously; long sessions can exceed client tool timeouts. Prefer start_research + check_research_status for full-text runs.`,
    inputSchema: researchToolInputShape,
  },
  async args => {
    const outcome = await runResearch(toRequestInput(args));
    if (outcome.ok) {
      return textResult(outcome.markdown);
    }
    const lines = [`Research failed in ${outcome.failure.state}: ${outcome.failure.message}`];
    if (outcome.partialReport) {
      lines.push('', '## Partial results', '', outcome.partialReport);
    }
    return { ...textResult(lines.join('\n')), isError: true };
  }
);

server.registerTool(
  'start_research',
  {
    title: 'Adaptive Literature Research (Async)',
    description: `Starts the same research session as the research tool in the background and returns a job id immediately. Poll check_research_status with the job id; the finished report is also saved under ~/research-reports.`,
    inputSchema: researchToolInputShape,
  },
  async args => {
    const job = createJob(args.query);
    job.progress = 'Initializing...';
    await saveJob(job);
    console.error(`[Jobs] Created job ${job.id} for: "${args.query}"`);

    const { jobId, done } = startResearchJob(job, toRequestInput(args));
    done.catch(error => console.error(`[Jobs] Background job ${jobId} crashed:`, error));

    return textResult(JSON.stringify({
      job_id: jobId,
      status: 'pending',
      message: 'Research job started. Wait at least 60 seconds before calling check_research_status.',
      query: args.query,
    }, null, 2));
  }
);

function describeProgress(job: ResearchJob): string {
  const progress = job.progress;
  if (progress === undefined) return 'pending';
  if (typeof progress === 'string') return progress;
  const note = progress.note ? ` (${progress.note})` : '';
  return `${progress.currentStep}: search round ${progress.searchAttempts + 1}, ${progress.papersAnalyzed}/${progress.papersFound} papers analyzed${note}`;
}

server.registerTool(
  'check_research_status',
  {
    title: 'Check Research Job Status',
    description: 'Returns the progress of a job started with start_research, or its markdown report once completed.',
    inputSchema: {
      job_id: z.string().describe('The job id returned by start_research'),
    },
  },
  async ({ job_id }) => {
    const job = await findJob(job_id);
    if (!job) {
      return { ...textResult(`No research job found with id ${job_id}`), isError: true };
    }

    switch (job.status) {
      case 'completed': {
        jobCheckCounts.delete(job_id);
        const saved = job.reportPath ? `\n\n---\nReport saved to: ${job.reportPath}` : '';
        return textResult(`${job.result ?? ''}${saved}`);
      }
      case 'failed': {
        jobCheckCounts.delete(job_id);
        const where = job.failedIn ? ` in ${job.failedIn}` : '';
        const partial = job.partialReport ? `\n\n## Partial results\n\n${job.partialReport}` : '';
        return { ...textResult(`Research failed${where}: ${job.error ?? 'unknown error'}${partial}`), isError: true };
      }
      case 'pending':
      case 'running': {
        const checks = (jobCheckCounts.get(job_id) ?? 0) + 1;
        jobCheckCounts.set(job_id, checks);
        const elapsed = Math.round((Date.now() - job.createdAt) / 1000);
        return textResult(`Still running (check ${checks}, ${elapsed}s elapsed): ${describeProgress(job)}`);
      }
    }
  }
);

// Start the server
async function main() {
  console.error('[Research MCP] Starting server...');

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error('[Research MCP] Server ready on stdio');
  console.error('[Research MCP] Available tools: research, start_research, check_research_status');

  const shutdown = async () => {
    console.error('\n[Research MCP] Shutting down...');
    await server.close();
    process.exit(0);
  };
  process.on('SIGINT', () => {
    shutdown().catch(error => {
      console.error('[Research MCP] Shutdown failed:', error);
      process.exit(1);
    });
  });
  process.on('SIGTERM', () => {
    shutdown().catch(error => {
      console.error('[Research MCP] Shutdown failed:', error);
      process.exit(1);
    });
  });
}

main().catch((error) => {
  console.error('[Research MCP] Fatal error:', error);
  process.exit(1);
});
