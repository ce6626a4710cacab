/**
 * Session context operations. The orchestrator passes the context explicitly into every
 * state handler; these helpers are the only places that mutate it.
 */

import {
  HistoryEntry,
  PaperMetadata,
  PaperRecord,
  PaperStatus,
  QualityMetrics,
  SessionContext,
} from './types/index.js';

// pending → fetched → analyzed, or → failed; analyzed and failed are final
const ALLOWED_TRANSITIONS: Record<PaperStatus, readonly PaperStatus[]> = {
  pending: ['fetched', 'analyzed', 'failed'],
  fetched: ['analyzed', 'failed'],
  analyzed: [],
  failed: [],
};

export function createSession(query: string): SessionContext {
  return {
    query,
    state: 'Initializing',
    history: [],
    searchAttempts: 0,
    candidatePapers: new Map(),
    partialResults: [],
    qualityMetrics: { papersFound: 0, papersAnalyzed: 0, papersFailed: 0 },
    keywords: [],
    refinementHints: [],
    plannedQueries: [],
    notes: [],
  };
}

/**
 * Append one entry stamped with the current state. History is never rewritten.
 */
export function recordHistory(
  ctx: SessionContext,
  summary: string,
  extra: Pick<HistoryEntry, 'queries' | 'paperId' | 'error'> = {},
  now: () => number = Date.now
): HistoryEntry {
  const entry: HistoryEntry = { state: ctx.state, timestamp: now(), summary, ...extra };
  ctx.history.push(entry);
  return entry;
}

/**
 * Every query string already executed in this session, derived from history
 */
export function executedQueries(history: readonly HistoryEntry[]): Set<string> {
  const seen = new Set<string>();
  for (const entry of history) {
    for (const query of entry.queries ?? []) {
      seen.add(query);
    }
  }
  return seen;
}

/**
 * Prefer what is already known; only fill fields the existing record lacks
 */
function mergeMetadata(existing: PaperMetadata, incoming: PaperMetadata): PaperMetadata {
  return {
    id: existing.id,
    title: existing.title || incoming.title,
    authors: existing.authors.length ? existing.authors : incoming.authors,
    summary: existing.summary || incoming.summary,
    published: existing.published || incoming.published,
    url: existing.url || incoming.url,
    pdfUrl: existing.pdfUrl || incoming.pdfUrl,
  };
}

/**
 * Merge search results into candidatePapers keyed by id.
 * A known id only has its metadata gaps filled; its status is untouched.
 * Returns the number of newly added papers.
 */
export function mergeCandidates(ctx: SessionContext, papers: readonly PaperMetadata[]): number {
  let added = 0;
  for (const metadata of papers) {
    const id = metadata.id.trim();
    if (!id) continue;

    const existing = ctx.candidatePapers.get(id);
    if (existing) {
      existing.metadata = mergeMetadata(existing.metadata, { ...metadata, id });
      continue;
    }

    ctx.candidatePapers.set(id, { id, metadata: { ...metadata, id }, status: 'pending' });
    added++;
  }
  refreshMetrics(ctx);
  return added;
}

export function canAdvance(from: PaperStatus, to: PaperStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Move a paper forward. Returns false (and changes nothing) when the move would regress.
 */
export function advanceStatus(
  record: PaperRecord,
  next: 'fetched'
): boolean;
export function advanceStatus(
  record: PaperRecord,
  next: 'analyzed',
  detail: { analysisText: string; fromCache?: boolean }
): boolean;
export function advanceStatus(
  record: PaperRecord,
  next: 'failed',
  detail: { error: string }
): boolean;
export function advanceStatus(
  record: PaperRecord,
  next: Exclude<PaperStatus, 'pending'>,
  detail?: { analysisText?: string; fromCache?: boolean; error?: string }
): boolean {
  if (!canAdvance(record.status, next)) {
    return false;
  }
  record.status = next;
  if (next === 'analyzed') {
    record.analysisText = detail?.analysisText;
    record.fromCache = detail?.fromCache ?? false;
  } else if (next === 'failed') {
    record.error = detail?.error;
  }
  return true;
}

/**
 * Papers that still need analysis this round
 */
export function unanalyzedPapers(ctx: SessionContext): PaperRecord[] {
  return [...ctx.candidatePapers.values()].filter(p => p.status === 'pending' || p.status === 'fetched');
}

export function refreshMetrics(ctx: SessionContext): QualityMetrics {
  let papersAnalyzed = 0;
  let papersFailed = 0;
  for (const paper of ctx.candidatePapers.values()) {
    if (paper.status === 'analyzed') papersAnalyzed++;
    else if (paper.status === 'failed') papersFailed++;
  }
  ctx.qualityMetrics = { papersFound: ctx.candidatePapers.size, papersAnalyzed, papersFailed };
  return ctx.qualityMetrics;
}
