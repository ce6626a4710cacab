import { describe, it, expect } from 'vitest';
import { formatReport, generateFilename } from '../formatting.js';
import { createSession } from '../session.js';
import { paper } from './helpers/fakes.js';

describe('formatReport', () => {
  it('renders the overview, the cached marker and the notes', () => {
    const context = createSession('over-smoothing');
    context.keywords = ['gnn', 'over-smoothing'];
    context.searchAttempts = 1;
    context.qualityMetrics = { papersFound: 2, papersAnalyzed: 1, papersFailed: 1 };
    context.candidatePapers.set('1', { id: '1', metadata: paper('1'), status: 'analyzed', fromCache: true });
    context.candidatePapers.set('2', { id: '2', metadata: paper('2'), status: 'failed' });
    context.notes.push('Stopped early');

    const markdown = formatReport({ report: 'The report.', context, mergeRounds: 0 });

    expect(markdown).toBe(
      [
        '# Research Results: over-smoothing\n',
        '## Overview\n',
        '- Search rounds: 2',
        '- Papers found: 2',
        '- Papers analyzed: 1',
        '- Papers failed: 1',
        '- Success rate: 50.0%',
        '- Merge rounds: 0',
        '- Keywords: gnn, over-smoothing',
        '',
        '## Synthesis\n',
        'The report.',
        '',
        '## Academic Papers\n',
        '**1. Paper 1** (cached)\n- arXiv ID: 1\n- URL: https://arxiv.org/abs/1',
        '',
        '## Notes\n',
        '- Stopped early',
        '',
      ].join('\n')
    );
  });
});

describe('generateFilename', () => {
  it('slugs the query after the timestamp', () => {
    const name = generateFilename('  GNNs: Over-Smoothing?  ', new Date('2025-03-04T05:06:07.000Z'));
    expect(name).toMatch(/^research-2025-03-04-050607-gnns-over-smoothing-[a-z0-9]*\.md$/);
  });
});
