/**
 * Library entry point: one research request in, one report or failure detail out
 */

import { createLanguageModel } from './clients/llm.js';
import { Env, parseRequestConfig, ResearchRequestConfig } from './config.js';
import { Collaborators, LanguageModels, OnTransitionCallback, ResearchOrchestrator } from './controller.js';
import { describeError } from './errors.js';
import { formatReport } from './formatting.js';
import { createAcademicSearch } from './services/arxiv.js';
import { createDocumentStructurer } from './services/document.js';
import { Sleep } from './services/rate-limiter.js';
import { createSession } from './session.js';
import { createMemoryCache } from './storage/memory-cache.js';
import { ResearchState, SessionContext } from './types/index.js';

export interface RunResearchOptions {
  /** Source of API keys and paths; defaults to process.env */
  env?: Env;
  signal?: AbortSignal;
  onTransition?: OnTransitionCallback;
  /** Replace any collaborator the request config would otherwise build */
  collaborators?: Partial<Collaborators>;
  sleep?: Sleep;
}

export type ResearchOutcome =
  | {
      ok: true;
      state: 'Completed';
      report: string;
      markdown: string;
      notes: string[];
      context: SessionContext;
    }
  | {
      ok: false;
      failure: { state: ResearchState; message: string };
      partialReport?: string;
      context: SessionContext;
    };

function queryOf(input: unknown): string {
  if (typeof input === 'object' && input !== null && 'query' in input && typeof input.query === 'string') {
    return input.query;
  }
  return '';
}

function buildModels(config: ResearchRequestConfig, env: Env, injected?: LanguageModels): LanguageModels {
  if (injected) return injected;
  return {
    queryAnalysis: createLanguageModel(config.models.queryAnalysis, env),
    synthesis: createLanguageModel(config.models.synthesis, env),
    embedding: createLanguageModel(config.models.embedding, env),
  };
}

/**
 * Run one research session. Never throws for request or collaborator problems;
 * those come back as `{ ok: false }` with the state the session stopped in.
 */
export async function runResearch(input: unknown, options: RunResearchOptions = {}): Promise<ResearchOutcome> {
  const env = options.env ?? process.env;

  let config: ResearchRequestConfig;
  let collaborators: Collaborators;
  try {
    config = parseRequestConfig(input);
    const injected = options.collaborators ?? {};
    collaborators = {
      models: buildModels(config, env, injected.models),
      search: injected.search ?? createAcademicSearch(config.search, options.sleep),
      documents: injected.documents ?? createDocumentStructurer(config.documents, env),
      cache: injected.cache ?? createMemoryCache(config.cache, env),
    };
  } catch (error) {
    const message = describeError(error);
    console.error(`[Research] Setup failed: ${message}`);
    return {
      ok: false,
      failure: { state: 'Initializing', message },
      context: createSession(queryOf(input)),
    };
  }

  const orchestrator = new ResearchOrchestrator(config.query, collaborators, config, {
    signal: options.signal,
    onTransition: options.onTransition,
    sleep: options.sleep,
  });

  try {
    const result = await orchestrator.run();
    if (result.state === 'Failed') {
      return {
        ok: false,
        failure: { state: result.failedIn, message: result.error },
        partialReport: result.partialReport,
        context: result.context,
      };
    }
    return {
      ok: true,
      state: 'Completed',
      report: result.report,
      markdown: formatReport({
        report: result.report,
        context: result.context,
        evaluation: result.evaluation,
        mergeRounds: result.mergeRounds,
      }),
      notes: [...result.context.notes],
      context: result.context,
    };
  } finally {
    // Only what this call built is ours to close
    if (!options.collaborators?.documents) {
      await collaborators.documents.close().catch(error => {
        console.error(`[Research] Failed to close document structurer: ${describeError(error)}`);
      });
    }
  }
}
