/**
 * Search planning: keywords from the raw query, arXiv query strings from keywords + refinement
 * hints, quality scoring of a search round, and refinement hints when quality is insufficient.
 */

import { z } from 'zod';
import { LanguageModel } from './clients/llm.js';
import { describeError, isPermanentLLMError } from './errors.js';
import { executedQueries } from './session.js';
import { HistoryEntry, QualityMetrics } from './types/index.js';

export type SuggestedAction = 'continue' | 'expand_keywords' | 'refine_keywords' | 'broaden_search';

export interface QualityEvaluation {
  papersFound: number;
  papersAnalyzed: number;
  successRate: number;       // 0-1
  searchEfficiency: number;  // papers per search attempt
  needsRefinement: boolean;
  suggestedAction: SuggestedAction;
}

export interface QualityThresholds {
  minSuccessRate: number;
  minPapersFound: number;
}

export interface RefinementInput {
  query: string;
  keywords: string[];
  history: readonly HistoryEntry[];
  evaluation: QualityEvaluation;
  searchAttempts: number;
}

const MAX_KEYWORDS = 8;

const KEYWORD_PROMPT = `You are a research query analyst. Analyze the user's research question and produce high-quality academic search keywords.

Requirements:
1. Extract the core research concepts and methods
2. Identify the relevant research fields and sub-fields
3. Balance technical terms with general terms
4. Use English terms, since most indexed papers are in English
5. Output ONLY the keywords, comma-separated, no explanation`;

const PLAN_PROMPT = `You are an expert search query generator for the arXiv API. Given keywords and optional refinement hints, output a JSON array of search query strings.
Each string must follow arXiv API syntax:
- Use field prefixes: ti: (Title), au: (Author), abs: (Abstract), cat: (Category), all: (All fields)
- Combine conditions with AND, OR, ANDNOT (in capitals)
- Put multi-word phrases in double quotes, e.g. abs:"graph neural network"
- Only use real arXiv category codes after cat: (e.g. cat:cs.LG). Never invent categories
- Prefer several focused queries over one query joining everything with OR
- Never repeat a query listed under "Already executed"
Output ONLY the JSON array, e.g. ["ti:\\"graph neural network\\" AND cat:cs.LG", "abs:\\"message passing\\""]`;

const REFINE_PROMPT = `You are a search strategy optimizer. The previous literature search did not yield enough usable papers. Produce new search keywords.
Rules:
1. If no papers were found, broaden the scope with more general terms
2. If the analysis success rate is low, make the keywords more precise and relevant
3. If only a few papers were found, try adjacent fields and synonyms
4. Do not reuse searches that were already executed
Output ONLY the keywords, comma-separated, no explanation`;

/**
 * Split a comma/period/newline separated keyword list, drop bullets, quotes and duplicates
 */
export function parseKeywords(content: string, max: number = MAX_KEYWORDS): string[] {
  const seen = new Set<string>();
  const keywords: string[] = [];
  for (const raw of content.split(/[,;\n。，]|\.\s/)) {
    const keyword = raw
      .replace(/^\s*(?:[-*•]|\d+[.)])\s*/, '')
      .replace(/^["'`]+|["'`.]+$/g, '')
      .trim();
    const key = keyword.toLowerCase();
    if (!keyword || keyword.length > 80 || seen.has(key)) continue;
    seen.add(key);
    keywords.push(keyword);
    if (keywords.length >= max) break;
  }
  return keywords;
}

const queryListSchema = z.array(z.string());

/**
 * Parse the planner response: a JSON array, a single-quoted list, or one query per line
 */
export function parseQueryList(content: string): string[] {
  const start = content.indexOf('[');
  const end = content.lastIndexOf(']');
  if (start >= 0 && end > start) {
    const slice = content.slice(start, end + 1);
    for (const candidate of [slice, slice.replace(/'/g, '"')]) {
      try {
        const parsed = queryListSchema.safeParse(JSON.parse(candidate));
        if (parsed.success) {
          return parsed.data.map(q => q.trim()).filter(q => q.length > 0);
        }
      } catch {
        // not JSON, try the next form
      }
    }
  }

  return content
    .split('\n')
    .map(line => line.replace(/^\s*(?:[-*•]|\d+[.)])\s*/, '').replace(/^`+|`+$/g, '').trim())
    .filter(line => line.length > 0 && !line.startsWith('```'));
}

/**
 * Quality signal in [0, 1]: share of found papers that were analyzed successfully
 */
export function scoreQuality(papersFound: number, papersAnalyzed: number): number {
  if (papersFound <= 0) return 0;
  return Math.min(1, Math.max(0, papersAnalyzed / papersFound));
}

export function evaluateQuality(
  metrics: QualityMetrics,
  searchAttempts: number,
  thresholds: QualityThresholds
): QualityEvaluation {
  const successRate = scoreQuality(metrics.papersFound, metrics.papersAnalyzed);
  const evaluation: QualityEvaluation = {
    papersFound: metrics.papersFound,
    papersAnalyzed: metrics.papersAnalyzed,
    successRate,
    searchEfficiency: metrics.papersFound / Math.max(1, searchAttempts + 1),
    needsRefinement: false,
    suggestedAction: 'continue',
  };

  if (metrics.papersFound === 0) {
    evaluation.needsRefinement = true;
    evaluation.suggestedAction = 'expand_keywords';
  } else if (successRate < thresholds.minSuccessRate) {
    evaluation.needsRefinement = true;
    evaluation.suggestedAction = 'refine_keywords';
  } else if (metrics.papersFound < thresholds.minPapersFound) {
    evaluation.needsRefinement = true;
    evaluation.suggestedAction = 'broaden_search';
  }

  return evaluation;
}

function quoteTerm(term: string): string {
  const clean = term.replace(/"/g, '').trim();
  return clean.includes(' ') ? `all:"${clean}"` : `all:${clean}`;
}

/**
 * Field-scoped queries built without the language model: all terms together, each alone,
 * then the user's own wording
 */
export function buildFallbackQueries(keywords: readonly string[], hints: readonly string[], rawQuery = ''): string[] {
  const terms = [...hints, ...keywords].map(t => t.trim()).filter(t => t.length > 0);
  const queries: string[] = [];
  if (terms.length > 1) {
    queries.push(terms.slice(0, 3).map(quoteTerm).join(' AND '));
  }
  queries.push(...terms.map(quoteTerm));
  if (rawQuery.trim()) {
    queries.push(quoteTerm(rawQuery));
  }
  return queries;
}

function summarizeRecentHistory(history: readonly HistoryEntry[]): string {
  if (history.length === 0) return 'No history yet';
  return history.slice(-4).map(entry => `- ${entry.state}: ${entry.summary}`).join('\n');
}

export class SearchPlanner {
  constructor(
    private readonly llm: LanguageModel,
    private readonly options: { maxQueries: number; query?: string }
  ) {}

  /**
   * Keywords for the raw query. Degenerate output or a transient failure falls back to the query
   * itself; a permanently unavailable model is rethrown.
   */
  async extractKeywords(query: string): Promise<string[]> {
    try {
      const content = await this.llm.complete([
        { role: 'system', content: KEYWORD_PROMPT },
        { role: 'user', content: query },
      ], { temperature: 0.7 });
      const keywords = parseKeywords(content);
      if (keywords.length === 0) {
        console.error('[Planning] Keyword extraction returned nothing usable, using raw query');
        return [query];
      }
      return keywords;
    } catch (error) {
      if (isPermanentLLMError(error)) throw error;
      console.error(`[Planning] Keyword extraction failed, using raw query: ${describeError(error)}`);
      return [query];
    }
  }

  /**
   * Query strings for the next search round. Never returns a string already executed in
   * this session (per history); may return [] when every candidate is a repeat.
   */
  async plan(keywords: readonly string[], refinementHints: readonly string[], history: readonly HistoryEntry[]): Promise<string[]> {
    const seen = executedQueries(history);
    const fresh = (candidates: readonly string[]): string[] => {
      const out: string[] = [];
      for (const candidate of candidates) {
        const query = candidate.trim();
        if (!query || seen.has(query) || out.includes(query)) continue;
        out.push(query);
      }
      return out.slice(0, this.options.maxQueries);
    };

    let generated: string[] = [];
    try {
      const content = await this.llm.complete([
        { role: 'system', content: PLAN_PROMPT },
        { role: 'user', content: this.buildPlanRequest(keywords, refinementHints, seen) },
      ], { temperature: 0.3 });
      generated = parseQueryList(content);
    } catch (error) {
      if (isPermanentLLMError(error)) throw error;
      console.error(`[Planning] Query generation failed, using fallback queries: ${describeError(error)}`);
    }

    const planned = fresh(generated);
    if (planned.length > 0) {
      console.error(`[Planning] ${planned.length} query strings (${generated.length - planned.length} dropped as repeats/invalid)`);
      return planned;
    }

    const fallback = fresh(buildFallbackQueries(keywords, refinementHints, this.options.query));
    console.error(`[Planning] Using ${fallback.length} fallback query strings`);
    return fallback;
  }

  score(papersFound: number, papersAnalyzed: number): number {
    return scoreQuality(papersFound, papersAnalyzed);
  }

  evaluate(metrics: QualityMetrics, searchAttempts: number, thresholds: QualityThresholds): QualityEvaluation {
    return evaluateQuality(metrics, searchAttempts, thresholds);
  }

  /**
   * Refinement hints after a low-quality round. A transient failure falls back to the
   * individual words of the current keywords.
   */
  async refine(input: RefinementInput): Promise<string[]> {
    const executed = [...executedQueries(input.history)];
    const prompt = [
      `Original query: ${input.query}`,
      `Current keywords: ${input.keywords.join(', ')}`,
      `Search attempts so far: ${input.searchAttempts + 1}`,
      `Papers found: ${input.evaluation.papersFound}`,
      `Analysis success rate: ${input.evaluation.successRate.toFixed(2)}`,
      `Suggested action: ${input.evaluation.suggestedAction}`,
      '',
      'Recent history:',
      summarizeRecentHistory(input.history),
      '',
      'Already executed searches:',
      executed.length ? executed.map(q => `- ${q}`).join('\n') : '- none',
    ].join('\n');

    try {
      const content = await this.llm.complete([
        { role: 'system', content: REFINE_PROMPT },
        { role: 'user', content: prompt },
      ], { temperature: 0.5 });
      const hints = parseKeywords(content);
      if (hints.length > 0) return hints;
    } catch (error) {
      if (isPermanentLLMError(error)) throw error;
      console.error(`[Planning] Refinement failed, broadening keywords locally: ${describeError(error)}`);
    }

    return broadenKeywords(input.keywords, input.query);
  }

  private buildPlanRequest(keywords: readonly string[], hints: readonly string[], seen: Set<string>): string {
    const lines = [`Keywords: ${keywords.join(', ')}`];
    if (hints.length) {
      lines.push(`Refinement hints (prefer these): ${hints.join(', ')}`);
    }
    lines.push(`Maximum number of queries: ${this.options.maxQueries}`);
    if (seen.size) {
      lines.push('Already executed (do not repeat):', ...[...seen].map(q => `- ${q}`));
    }
    return lines.join('\n');
  }
}

/**
 * Individual words (longer than 3 chars) of the keywords, then of the raw query
 */
export function broadenKeywords(keywords: readonly string[], query: string): string[] {
  const words = [...keywords, query]
    .flatMap(k => k.split(/\s+/))
    .map(w => w.replace(/[^\p{L}\p{N}-]/gu, ''))
    .filter(w => w.length > 3);
  return [...new Set(words.map(w => w.toLowerCase()))].slice(0, MAX_KEYWORDS);
}
