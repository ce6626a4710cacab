/**
 * Request configuration for one research run
 * Declared as zod schemas so the MCP front end and library callers share one validation path.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

export type Env = Record<string, string | undefined>;

export const LLM_PROVIDERS = ['gemini', 'openai', 'anthropic', 'deepseek', 'qwen'] as const;

export const modelSelectionSchema = z.object({
  provider: z.enum(LLM_PROVIDERS),
  model: z.string().min(1),
  apiKey: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
  maxOutputTokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
});

export type ModelSelection = z.infer<typeof modelSelectionSchema>;

const DEFAULT_MODEL: ModelSelection = { provider: 'gemini', model: 'gemini-2.5-flash-lite' };

export const searchSpecSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('arxiv'),
    baseUrl: z.string().url().optional(),
    retries: z.number().int().min(1).max(10).optional(),
  }),
]);

export type SearchSpec = z.infer<typeof searchSpecSchema>;

export const documentSpecSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('arxiv-mcp'), storagePath: z.string().optional() }),
  z.object({ kind: z.literal('abstract') }),
]);

export type DocumentSpec = z.infer<typeof documentSpecSchema>;

export const cacheSpecSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('memory') }),
  z.object({ kind: z.literal('file'), dir: z.string().optional() }),
  z.object({
    kind: z.literal('mem0'),
    apiKey: z.string().optional(),
    baseUrl: z.string().url().optional(),
    userId: z.string().optional(),
  }),
]);

export type CacheSpec = z.infer<typeof cacheSpecSchema>;

export const requestConfigSchema = z.object({
  query: z.string().trim().min(1, 'query must not be empty'),
  models: z
    .object({
      queryAnalysis: modelSelectionSchema.default(DEFAULT_MODEL),
      synthesis: modelSelectionSchema.default(DEFAULT_MODEL),
      embedding: modelSelectionSchema.default(DEFAULT_MODEL),
    })
    .default({}),
  maxWorkers: z.number().int().min(1).max(64).default(8),
  maxSearchRetries: z.number().int().min(0).max(10).default(2),
  // Quality floor: below this analysis success rate the engine refines (while attempts remain)
  minSuccessRate: z.number().min(0).max(1).default(0.3),
  minPapersFound: z.number().int().min(1).default(1),
  maxResultsPerQuery: z.number().int().min(1).max(100).default(5),
  maxQueriesPerPlan: z.number().int().min(1).max(10).default(5),
  unitTimeoutMs: z.number().int().positive().default(120_000),
  searchIntervalMs: z.number().int().min(0).default(3_000),
  mergeTokenBudget: z.number().int().positive().default(16_000),
  mergeMinTokens: z.number().int().positive().default(512),
  mergeMaxTokens: z.number().int().positive().default(4_000),
  maxDocumentChars: z.number().int().positive().default(20_000),
  search: searchSpecSchema.default({ kind: 'arxiv' }),
  documents: documentSpecSchema.default({ kind: 'arxiv-mcp' }),
  cache: cacheSpecSchema.default({ kind: 'file' }),
}).refine(c => c.mergeMinTokens <= c.mergeMaxTokens, {
  message: 'mergeMinTokens must not exceed mergeMaxTokens',
  path: ['mergeMinTokens'],
});

export type ResearchRequestInput = z.input<typeof requestConfigSchema>;
export type ResearchRequestConfig = z.output<typeof requestConfigSchema>;

/**
 * Validate a request and fill defaults. Throws ConfigError naming the first offending path.
 */
export function parseRequestConfig(input: unknown): ResearchRequestConfig {
  const parsed = requestConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(issue?.message ?? 'invalid input', issue ? issue.path.join('.') : '');
  }
  return parsed.data;
}

const API_KEY_ENV: Record<ModelSelection['provider'], string> = {
  gemini: 'GEMINI_API_KEY',
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  deepseek: 'DEEPSEEK_API_KEY',
  qwen: 'QWEN_API_KEY',
};

/**
 * Explicit key first, then the provider's environment variable
 */
export function resolveApiKey(selection: ModelSelection, env: Env): string | undefined {
  if (selection.apiKey) return selection.apiKey;
  const value = env[API_KEY_ENV[selection.provider]]?.trim();
  return value ? value : undefined;
}
