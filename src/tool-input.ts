/**
 * MCP tool arguments → research request input
 */

import { z } from 'zod';
import { LLM_PROVIDERS, ModelSelection, ResearchRequestInput } from './config.js';

type Provider = ModelSelection['provider'];

export const DEFAULT_PROVIDER_MODELS: Record<Provider, string> = {
  gemini: 'gemini-2.5-flash-lite',
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-latest',
  deepseek: 'deepseek-chat',
  qwen: 'qwen-plus',
};

// Shared by the research and start_research tools
export const researchToolInputShape = {
  query: z.string().describe('The research question. Example: "How do graph neural networks handle over-smoothing?"'),
  provider: z
    .enum(LLM_PROVIDERS)
    .optional()
    .describe('Language-model provider for every role. Default: gemini'),
  model: z
    .string()
    .optional()
    .describe('Model for query analysis and per-paper analysis. Default depends on the provider'),
  synthesis_model: z
    .string()
    .optional()
    .describe('Model used to merge analyses into the final report. Defaults to `model`'),
  max_workers: z
    .number()
    .int()
    .min(1)
    .max(64)
    .optional()
    .describe('Papers analyzed concurrently. Default: 8'),
  max_search_retries: z
    .number()
    .int()
    .min(0)
    .max(10)
    .optional()
    .describe('Refinement rounds allowed when results are poor. Default: 2'),
  documents: z
    .enum(['arxiv-mcp', 'abstract'])
    .optional()
    .describe('"arxiv-mcp" reads full papers through arxiv-mcp-server, "abstract" analyzes abstracts only (no downloads)'),
  cache: z
    .enum(['memory', 'file', 'mem0'])
    .optional()
    .describe('Where per-paper analyses are cached across sessions. Default: file'),
};

export type ResearchToolArgs = z.infer<z.ZodObject<typeof researchToolInputShape>>;

export function toRequestInput(args: ResearchToolArgs): ResearchRequestInput {
  const provider: Provider = args.provider ?? 'gemini';
  const model = args.model ?? DEFAULT_PROVIDER_MODELS[provider];
  const analysis: ModelSelection = { provider, model };

  const input: ResearchRequestInput = {
    query: args.query,
    models: {
      queryAnalysis: analysis,
      embedding: analysis,
      synthesis: { provider, model: args.synthesis_model ?? model },
    },
  };
  if (args.max_workers !== undefined) input.maxWorkers = args.max_workers;
  if (args.max_search_retries !== undefined) input.maxSearchRetries = args.max_search_retries;
  if (args.documents) input.documents = { kind: args.documents };
  if (args.cache) input.cache = { kind: args.cache };
  return input;
}
