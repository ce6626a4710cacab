/**
 * Format research results as clean markdown
 */

import { QualityEvaluation, scoreQuality } from './planning.js';
import { PaperRecord, SessionContext } from './types/index.js';

export interface ReportInput {
  report: string;
  context: SessionContext;
  evaluation?: QualityEvaluation;
  mergeRounds?: number;
}

/**
 * Render a completed session: overview, synthesis, analyzed papers, then notes
 */
export function formatReport(input: ReportInput): string {
  const { context } = input;
  const metrics = context.qualityMetrics;
  const successRate = input.evaluation?.successRate ?? scoreQuality(metrics.papersFound, metrics.papersAnalyzed);
  const sections: string[] = [];

  sections.push(`# Research Results: ${context.query}\n`);

  sections.push(`## Overview\n`);
  sections.push(`- Search rounds: ${context.searchAttempts + 1}`);
  sections.push(`- Papers found: ${metrics.papersFound}`);
  sections.push(`- Papers analyzed: ${metrics.papersAnalyzed}`);
  sections.push(`- Papers failed: ${metrics.papersFailed}`);
  sections.push(`- Success rate: ${(successRate * 100).toFixed(1)}%`);
  if (input.mergeRounds !== undefined) {
    sections.push(`- Merge rounds: ${input.mergeRounds}`);
  }
  if (context.keywords.length) {
    sections.push(`- Keywords: ${context.keywords.join(', ')}`);
  }
  sections.push('');

  sections.push(`## Synthesis\n`);
  sections.push(input.report);
  sections.push('');

  const analyzed = [...context.candidatePapers.values()].filter(p => p.status === 'analyzed');
  if (analyzed.length > 0) {
    sections.push(`## Academic Papers\n`);
    sections.push(formatPapersCompact(analyzed));
    sections.push('');
  }

  if (context.notes.length > 0) {
    sections.push(`## Notes\n`);
    for (const note of context.notes) {
      sections.push(`- ${note}`);
    }
    sections.push('');
  }

  return sections.join('\n');
}

/**
 * Compact paper format - title, ID and link
 */
function formatPapersCompact(papers: PaperRecord[]): string {
  return papers
    .map((paper, index) => {
      const cached = paper.fromCache ? ' (cached)' : '';
      return `**${index + 1}. ${paper.metadata.title || paper.id}**${cached}
- arXiv ID: ${paper.id}
- URL: ${paper.metadata.url}`;
    })
    .join('\n\n');
}

/**
 * Report file name: date, time, query slug and a random suffix
 */
export function generateFilename(query: string, now: Date = new Date()): string {
  const iso = now.toISOString(); // e.g. 2025-12-11T21:03:16.480Z
  const date = iso.slice(0, 10);
  const time = iso.slice(11, 19).replaceAll(':', '');
  const rand = Math.random().toString(36).slice(2, 8);

  const lower = query.toLowerCase().slice(0, 80);
  let sanitized = '';
  let lastDash = false;
  for (const ch of lower) {
    const isAlphaNum = (ch >= 'a' && ch <= 'z') || (ch >= '0' && ch <= '9');
    if (isAlphaNum) {
      sanitized += ch;
      lastDash = false;
    } else if (!lastDash) {
      sanitized += '-';
      lastDash = true;
    }
  }
  if (sanitized.startsWith('-')) sanitized = sanitized.slice(1);
  if (sanitized.endsWith('-')) sanitized = sanitized.slice(0, -1);

  return `research-${date}-${time}-${sanitized}-${rand}.md`;
}
