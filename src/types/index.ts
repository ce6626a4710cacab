/**
 * Research session data model
 * One SessionContext per research request, owned by the orchestrator for its lifetime.
 */

export const RESEARCH_STATES = [
  'Initializing',
  'AnalyzingQuery',
  'PlanningSearch',
  'ExecutingSearch',
  'ProcessingResults',
  'EvaluatingResults',
  'RefiningStrategy',
  'Synthesizing',
  'Completed',
  'Failed',
] as const;

export type ResearchState = typeof RESEARCH_STATES[number];

export type TerminalState = 'Completed' | 'Failed';

export type ActiveState = Exclude<ResearchState, TerminalState>;

export function isTerminalState(state: ResearchState): state is TerminalState {
  return state === 'Completed' || state === 'Failed';
}

/**
 * Paper metadata as returned by the academic search collaborator
 */
export interface PaperMetadata {
  id: string;
  title: string;
  authors: string[];
  summary: string;      // Abstract
  published: string;
  url: string;          // Landing page
  pdfUrl: string;
}

export type PaperStatus = 'pending' | 'fetched' | 'analyzed' | 'failed';

export interface PaperRecord {
  id: string;
  metadata: PaperMetadata;
  status: PaperStatus;
  analysisText?: string;   // Only set once status = analyzed
  fromCache?: boolean;
  error?: string;          // Only set once status = failed
}

/**
 * Append-only log entry. `queries` marks the entries that record executed search strings,
 * which is what the planner deduplicates against.
 */
export interface HistoryEntry {
  state: ResearchState;
  timestamp: number;
  summary: string;
  queries?: string[];
  paperId?: string;
  error?: string;
}

export interface QualityMetrics {
  papersFound: number;
  papersAnalyzed: number;
  papersFailed: number;
}

export interface SessionContext {
  readonly query: string;
  state: ResearchState;
  readonly history: HistoryEntry[];
  searchAttempts: number;
  readonly candidatePapers: Map<string, PaperRecord>;
  partialResults: string[];
  qualityMetrics: QualityMetrics;

  // Working set carried between states
  keywords: string[];
  refinementHints: string[];
  plannedQueries: string[];
  notes: string[];
  report?: string;
}

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}
