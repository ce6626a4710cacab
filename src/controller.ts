/**
 * Research Controller - drives one research session through its state machine
 * Flow: Initializing → AnalyzingQuery → PlanningSearch → ExecutingSearch → ProcessingResults
 *       → EvaluatingResults → (RefiningStrategy → PlanningSearch)* → Synthesizing → Completed
 *
 * One state is active at a time; parallel work only happens inside ProcessingResults and
 * Synthesizing, each behind a barrier. Any state may end in Failed on a fatal error.
 */

import { LanguageModel } from './clients/llm.js';
import { ResearchRequestConfig } from './config.js';
import { filterInvalidContent } from './content-filter.js';
import { CollaboratorUnavailableError, describeError } from './errors.js';
import { analyzePapers, PaperAnalyzer } from './execution.js';
import { QualityEvaluation, SearchPlanner } from './planning.js';
import { AcademicSearch } from './services/arxiv.js';
import { DocumentStructurer } from './services/document.js';
import { defaultSleep, RateLimiter, Sleep } from './services/rate-limiter.js';
import { createSession, mergeCandidates, recordHistory, refreshMetrics, unanalyzedPapers } from './session.js';
import { MemoryCache } from './storage/memory-cache.js';
import { NO_CONTENT_PLACEHOLDER, ResultMerger } from './synthesis.js';
import { ActiveState, isTerminalState, ResearchState, SessionContext } from './types/index.js';

export interface LanguageModels {
  queryAnalysis: LanguageModel;
  synthesis: LanguageModel;
  /** Per-paper analysis, whose output is what the memory cache stores */
  embedding: LanguageModel;
}

export interface Collaborators {
  models: LanguageModels;
  search: AcademicSearch;
  documents: DocumentStructurer;
  cache: MemoryCache;
}

export type OrchestratorSettings = Pick<
  ResearchRequestConfig,
  | 'maxWorkers'
  | 'maxSearchRetries'
  | 'minSuccessRate'
  | 'minPapersFound'
  | 'maxResultsPerQuery'
  | 'maxQueriesPerPlan'
  | 'unitTimeoutMs'
  | 'searchIntervalMs'
  | 'mergeTokenBudget'
  | 'mergeMinTokens'
  | 'mergeMaxTokens'
  | 'maxDocumentChars'
>;

export type OnTransitionCallback = (from: ResearchState, to: ResearchState, ctx: SessionContext) => void;

export interface OrchestratorHooks {
  /** Early termination, checked between states */
  signal?: AbortSignal;
  onTransition?: OnTransitionCallback;
  /** Used by the search rate limiter */
  sleep?: Sleep;
}

export type OrchestratorResult =
  | {
      state: 'Completed';
      report: string;
      cancelled: boolean;
      mergeRounds: number;
      evaluation?: QualityEvaluation;
      context: SessionContext;
    }
  | {
      state: 'Failed';
      error: string;
      failedIn: ResearchState;
      partialReport?: string;
      context: SessionContext;
    };

type StateHandler = (ctx: SessionContext) => Promise<ResearchState>;

export class ResearchOrchestrator {
  private readonly ctx: SessionContext;
  private readonly planner: SearchPlanner;
  private readonly analyzer: PaperAnalyzer;
  private readonly limiter: RateLimiter;
  private readonly handlers: Record<ActiveState, StateHandler>;

  private evaluation: QualityEvaluation | undefined;
  private mergeRounds = 0;
  private cancelled = false;
  private failure: { error: string; failedIn: ResearchState } | undefined;
  private started = false;

  constructor(
    query: string,
    private readonly collaborators: Collaborators,
    private readonly settings: OrchestratorSettings,
    private readonly hooks: OrchestratorHooks = {}
  ) {
    this.ctx = createSession(query);
    this.planner = new SearchPlanner(collaborators.models.queryAnalysis, {
      maxQueries: settings.maxQueriesPerPlan,
      query,
    });
    this.analyzer = new PaperAnalyzer(
      {
        search: collaborators.search,
        documents: collaborators.documents,
        llm: collaborators.models.embedding,
        cache: collaborators.cache,
      },
      { query, maxDocumentChars: settings.maxDocumentChars }
    );
    this.limiter = new RateLimiter(settings.searchIntervalMs, hooks.sleep ?? defaultSleep);

    this.handlers = {
      Initializing: ctx => this.initialize(ctx),
      AnalyzingQuery: ctx => this.analyzeQuery(ctx),
      PlanningSearch: ctx => this.planSearch(ctx),
      ExecutingSearch: ctx => this.executeSearch(ctx),
      ProcessingResults: ctx => this.processResults(ctx),
      EvaluatingResults: ctx => this.evaluateResults(ctx),
      RefiningStrategy: ctx => this.refineStrategy(ctx),
      Synthesizing: ctx => this.synthesize(ctx),
    };
  }

  get context(): SessionContext {
    return this.ctx;
  }

  /**
   * Run the session to a terminal state. Never throws: fatal errors end in Failed.
   */
  async run(): Promise<OrchestratorResult> {
    if (this.started) {
      throw new Error('A research session can only be run once');
    }
    this.started = true;
    console.error(`[Research] Starting session for: "${this.ctx.query.slice(0, 80)}"`);
    recordHistory(this.ctx, 'Session started');

    let state: ResearchState = this.ctx.state;
    while (!isTerminalState(state)) {
      if (this.stopRequested(state)) {
        this.transition('Synthesizing');
        state = 'Synthesizing';
        continue;
      }

      const handler = this.handlers[state];
      let next: ResearchState;
      try {
        next = await handler(this.ctx);
      } catch (error) {
        const message = describeError(error);
        console.error(`[Research] Fatal error in ${state}: ${message}`);
        this.failure = { error: message, failedIn: state };
        recordHistory(this.ctx, `Fatal: ${message}`, { error: message });
        next = 'Failed';
      }

      this.transition(next);
      state = next;
    }

    return this.result();
  }

  private stopRequested(state: ResearchState): boolean {
    if (!this.hooks.signal?.aborted || this.cancelled || state === 'Synthesizing') {
      return false;
    }
    this.cancelled = true;
    const note = `Stopped early on request during ${state}; synthesizing what was gathered`;
    this.ctx.notes.push(note);
    recordHistory(this.ctx, note);
    console.error(`[Research] ${note}`);
    return true;
  }

  private transition(to: ResearchState): void {
    const from = this.ctx.state;
    this.ctx.state = to;
    console.error(`[Research] ${from} → ${to}`);
    recordHistory(this.ctx, `${from} → ${to}`);
    this.hooks.onTransition?.(from, to, this.ctx);
  }

  private async initialize(ctx: SessionContext): Promise<ResearchState> {
    let healthy: boolean;
    try {
      healthy = await this.collaborators.cache.healthCheck();
    } catch (error) {
      throw new CollaboratorUnavailableError('memory-cache', `health check failed: ${describeError(error)}`, error);
    }
    if (!healthy) {
      throw new CollaboratorUnavailableError('memory-cache', 'health check failed');
    }
    recordHistory(ctx, 'Collaborators ready');
    return 'AnalyzingQuery';
  }

  private async analyzeQuery(ctx: SessionContext): Promise<ResearchState> {
    ctx.keywords = await this.planner.extractKeywords(ctx.query);
    console.error(`[Planning] Keywords: ${ctx.keywords.join(', ')}`);
    recordHistory(ctx, `Keywords: ${ctx.keywords.join(', ')}`);
    return 'PlanningSearch';
  }

  private async planSearch(ctx: SessionContext): Promise<ResearchState> {
    const queries = await this.planner.plan(ctx.keywords, ctx.refinementHints, ctx.history);
    if (queries.length === 0) {
      throw new Error('Search planning produced no new query strings');
    }
    ctx.plannedQueries = queries;
    recordHistory(ctx, `Planned ${queries.length} query strings (attempt ${ctx.searchAttempts + 1})`);
    return 'ExecutingSearch';
  }

  /**
   * Queries run one after another through the shared rate limiter. A failing query is
   * recorded and skipped; all of them failing just means zero papers this round.
   */
  private async executeSearch(ctx: SessionContext): Promise<ResearchState> {
    let added = 0;
    let failed = 0;

    for (const query of ctx.plannedQueries) {
      await this.limiter.wait();
      try {
        const papers = await this.collaborators.search.searchMetadata(query, this.settings.maxResultsPerQuery, this.hooks.signal);
        const fresh = mergeCandidates(ctx, papers);
        added += fresh;
        recordHistory(ctx, `Search returned ${papers.length} papers (${fresh} new)`, { queries: [query] });
      } catch (error) {
        failed++;
        const message = describeError(error);
        console.error(`[Research] Search failed for "${query}": ${message}`);
        recordHistory(ctx, `Search failed: ${message}`, { queries: [query], error: message });
      }
    }

    console.error(`[Research] Search round: ${added} new papers, ${ctx.candidatePapers.size} total, ${failed}/${ctx.plannedQueries.length} queries failed`);
    return 'ProcessingResults';
  }

  private async processResults(ctx: SessionContext): Promise<ResearchState> {
    const pending = unanalyzedPapers(ctx);
    if (pending.length === 0) {
      recordHistory(ctx, 'No new papers to analyze');
      return 'EvaluatingResults';
    }

    const round = await analyzePapers(pending, this.analyzer, {
      maxWorkers: this.settings.maxWorkers,
      unitTimeoutMs: this.settings.unitTimeoutMs,
    });

    for (const outcome of round.outcomes) {
      if (outcome.ok) {
        ctx.partialResults.push(outcome.text);
      } else {
        recordHistory(ctx, `Analysis failed for ${outcome.paperId}`, { paperId: outcome.paperId, error: outcome.error });
      }
    }
    refreshMetrics(ctx);
    recordHistory(ctx, `Analyzed ${round.analyzed}/${pending.length} papers (${round.fromCache} from cache)`);

    if (round.permanentFailures === pending.length) {
      throw new CollaboratorUnavailableError('language-model', 'every paper analysis was rejected');
    }
    return 'EvaluatingResults';
  }

  private async evaluateResults(ctx: SessionContext): Promise<ResearchState> {
    const evaluation = this.planner.evaluate(ctx.qualityMetrics, ctx.searchAttempts, {
      minSuccessRate: this.settings.minSuccessRate,
      minPapersFound: this.settings.minPapersFound,
    });
    this.evaluation = evaluation;
    recordHistory(
      ctx,
      `Quality: ${evaluation.papersAnalyzed}/${evaluation.papersFound} analyzed, success rate ${evaluation.successRate.toFixed(2)}, action ${evaluation.suggestedAction}`
    );

    if (!evaluation.needsRefinement) {
      return 'Synthesizing';
    }
    if (ctx.searchAttempts < this.settings.maxSearchRetries) {
      return 'RefiningStrategy';
    }

    const note = `Low-quality result: ${evaluation.papersFound} papers found, ${evaluation.papersAnalyzed} analyzed (success rate ${evaluation.successRate.toFixed(2)}) after ${ctx.searchAttempts + 1} search rounds`;
    ctx.notes.push(note);
    recordHistory(ctx, note);
    console.error(`[Research] ${note}`);
    return 'Synthesizing';
  }

  private async refineStrategy(ctx: SessionContext): Promise<ResearchState> {
    const evaluation = this.evaluation;
    if (!evaluation) {
      throw new Error('Refinement requested before any evaluation');
    }
    ctx.refinementHints = await this.planner.refine({
      query: ctx.query,
      keywords: ctx.keywords,
      history: ctx.history,
      evaluation,
      searchAttempts: ctx.searchAttempts,
    });
    ctx.searchAttempts++;
    recordHistory(ctx, `Refinement hints: ${ctx.refinementHints.join(', ')}`);
    return 'PlanningSearch';
  }

  private async synthesize(ctx: SessionContext): Promise<ResearchState> {
    // Consumed by this round
    const texts = ctx.partialResults;
    ctx.partialResults = [];

    const merger = new ResultMerger(this.collaborators.models.synthesis, {
      query: ctx.query,
      maxWorkers: this.settings.maxWorkers,
      unitTimeoutMs: this.settings.unitTimeoutMs,
      tokenBudget: this.settings.mergeTokenBudget,
      minPairTokens: this.settings.mergeMinTokens,
      maxPairTokens: this.settings.mergeMaxTokens,
      // A stop that already cut the search short still gets a full merge
      signal: this.cancelled ? undefined : this.hooks.signal,
      onPairError: (error, round, pairIndex) => {
        const message = describeError(error);
        recordHistory(ctx, `Merge pair ${pairIndex + 1} in round ${round} failed, kept both texts`, { error: message });
      },
    });

    const merged = await merger.mergeWithStats(texts);
    this.mergeRounds = merged.rounds;
    ctx.report = merged.text;
    if (merged.text === NO_CONTENT_PLACEHOLDER) {
      ctx.notes.push('No paper analysis produced usable content');
    }
    if (merged.stopped) {
      this.cancelled = true;
      const note = `Stopped early on request during Synthesizing; ${texts.length} analyses joined after ${merged.rounds} merge rounds`;
      ctx.notes.push(note);
      recordHistory(ctx, note);
      console.error(`[Research] ${note}`);
    }
    recordHistory(ctx, `Synthesized ${texts.length} analyses in ${merged.rounds} merge rounds`);
    return 'Completed';
  }

  private result(): OrchestratorResult {
    const ctx = this.ctx;
    if (ctx.state === 'Completed') {
      return {
        state: 'Completed',
        report: ctx.report ?? NO_CONTENT_PLACEHOLDER,
        cancelled: this.cancelled,
        mergeRounds: this.mergeRounds,
        evaluation: this.evaluation,
        context: ctx,
      };
    }

    const partial = ctx.partialResults
      .map(text => filterInvalidContent(text, { minLength: 1 }))
      .filter(text => text.length > 0);
    return {
      state: 'Failed',
      error: this.failure?.error ?? 'Research session failed',
      failedIn: this.failure?.failedIn ?? ctx.state,
      partialReport: partial.length ? partial.join('\n\n---\n\n') : undefined,
      context: ctx,
    };
  }
}
