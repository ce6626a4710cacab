import { z } from 'zod';
import { Env, ModelSelection, resolveApiKey } from '../config.js';
import { classifyHttpStatus, CollaboratorUnavailableError, LLMError } from '../errors.js';
import { ChatMessage } from '../types/index.js';

export type LLMProvider = ModelSelection['provider'];

export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

/**
 * Language-model capability consumed by the engine.
 * Failures surface as LLMError with a transient/permanent kind.
 */
export interface LanguageModel {
  readonly provider: LLMProvider;
  readonly model: string;
  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;
}

interface ProviderSettings {
  model: string;
  apiKey: string;
  timeoutMs: number;
  maxOutputTokens: number;
  temperature: number;
}

const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_OUTPUT_TOKENS = 4_000;
const DEFAULT_TEMPERATURE = 0.3;

const OPENAI_COMPATIBLE_URLS = {
  openai: 'https://api.openai.com/v1/chat/completions',
  deepseek: 'https://api.deepseek.com/chat/completions',
  qwen: 'https://dashscope.aliyuncs.com/compatible-mode/v1/chat/completions',
} as const;

const geminiResponseSchema = z.object({
  candidates: z
    .array(z.object({
      content: z.object({ parts: z.array(z.object({ text: z.string().optional() })).optional() }).optional(),
    }))
    .optional(),
});

const chatCompletionResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable().optional() }).optional() }))
    .optional(),
});

const anthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).optional(),
});

/**
 * POST JSON with a per-call timeout. The caller's signal (unit timeout, cancellation) also aborts.
 * Network errors and aborts are transient; HTTP errors are classified by status.
 */
async function postJson(
  url: string,
  headers: Record<string, string>,
  body: unknown,
  settings: ProviderSettings,
  provider: LLMProvider,
  signal?: AbortSignal
): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), settings.timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...headers },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error) {
      const reason = controller.signal.aborted ? `aborted after ${settings.timeoutMs}ms or by caller` : String(error);
      throw new LLMError(`${provider} request failed: ${reason}`, settings.model, 'transient', undefined, { provider, cause: error });
    }

    if (!response.ok) {
      const detail = (await response.text().catch(() => '')).slice(0, 300);
      throw new LLMError(
        `${provider} API error: ${response.status} ${response.statusText}${detail ? ` - ${detail}` : ''}`,
        settings.model,
        classifyHttpStatus(response.status),
        response.status,
        { provider }
      );
    }

    return await response.json();
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onAbort);
  }
}

/**
 * Call Gemini generateContent; system messages become systemInstruction
 */
async function callGemini(messages: ChatMessage[], settings: ProviderSettings, options: CompletionOptions): Promise<string> {
  const url = `https://generativelanguage.googleapis.com/v1beta/models/${settings.model}:generateContent?key=${settings.apiKey}`;
  const system = messages.filter(m => m.role === 'system').map(m => m.content).join('\n\n');
  const contents = messages
    .filter(m => m.role !== 'system')
    .map(m => ({ role: m.role === 'assistant' ? 'model' : 'user', parts: [{ text: m.content }] }));

  const data = await postJson(url, {}, {
    ...(system ? { systemInstruction: { parts: [{ text: system }] } } : {}),
    contents,
    generationConfig: {
      temperature: options.temperature ?? settings.temperature,
      maxOutputTokens: options.maxTokens ?? settings.maxOutputTokens,
    },
  }, settings, 'gemini', options.signal);

  const parsed = geminiResponseSchema.safeParse(data);
  return parsed.success ? parsed.data.candidates?.[0]?.content?.parts?.[0]?.text ?? '' : '';
}

/**
 * OpenAI chat completions and the compatible endpoints (DeepSeek, Qwen)
 */
async function callOpenAICompatible(
  provider: 'openai' | 'deepseek' | 'qwen',
  messages: ChatMessage[],
  settings: ProviderSettings,
  options: CompletionOptions
): Promise<string> {
  const maxTokens = options.maxTokens ?? settings.maxOutputTokens;
  const data = await postJson(OPENAI_COMPATIBLE_URLS[provider], { Authorization: `Bearer ${settings.apiKey}` }, {
    model: settings.model,
    messages,
    // OpenAI reasoning models reject max_tokens
    ...(provider === 'openai' ? { max_completion_tokens: maxTokens } : { max_tokens: maxTokens }),
    ...(provider === 'openai' ? {} : { temperature: options.temperature ?? settings.temperature }),
  }, settings, provider, options.signal);

  const parsed = chatCompletionResponseSchema.safeParse(data);
  return parsed.success ? parsed.data.choices?.[0]?.message?.content ?? '' : '';
}

/**
 * Call Anthropic messages API; system messages go to the top-level system field
 */
async function callAnthropic(messages: ChatMessage[], settings: ProviderSettings, options: CompletionOptions): Promise<string> {
  const system = messages.filter(m => m.role === 'system').map(m => m.content).join('\n\n');
  const data = await postJson('https://api.anthropic.com/v1/messages', {
    'x-api-key': settings.apiKey,
    'anthropic-version': '2023-06-01',
  }, {
    model: settings.model,
    ...(system ? { system } : {}),
    messages: messages.filter(m => m.role !== 'system'),
    max_tokens: options.maxTokens ?? settings.maxOutputTokens,
    temperature: options.temperature ?? settings.temperature,
  }, settings, 'anthropic', options.signal);

  const parsed = anthropicResponseSchema.safeParse(data);
  if (!parsed.success) return '';
  return parsed.data.content?.find(block => block.type === 'text')?.text ?? '';
}

/**
 * Resolve a model selection into a LanguageModel.
 * Throws CollaboratorUnavailableError when no API key can be found for the provider.
 */
export function createLanguageModel(selection: ModelSelection, env: Env): LanguageModel {
  const apiKey = resolveApiKey(selection, env);
  if (!apiKey) {
    throw new CollaboratorUnavailableError('language-model', `no API key for provider "${selection.provider}"`);
  }

  const settings: ProviderSettings = {
    model: selection.model,
    apiKey,
    timeoutMs: selection.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    maxOutputTokens: selection.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
    temperature: selection.temperature ?? DEFAULT_TEMPERATURE,
  };

  let call: (messages: ChatMessage[], options: CompletionOptions) => Promise<string>;
  switch (selection.provider) {
    case 'gemini':
      call = (messages, options) => callGemini(messages, settings, options);
      break;
    case 'anthropic':
      call = (messages, options) => callAnthropic(messages, settings, options);
      break;
    case 'openai':
    case 'deepseek':
    case 'qwen': {
      const provider = selection.provider;
      call = (messages, options) => callOpenAICompatible(provider, messages, settings, options);
      break;
    }
    default: {
      const unknownProvider: never = selection.provider;
      throw new CollaboratorUnavailableError('language-model', `unknown provider: ${String(unknownProvider)}`);
    }
  }

  return {
    provider: selection.provider,
    model: selection.model,
    async complete(messages, options = {}) {
      const start = Date.now();
      const content = await call(messages, options);
      console.error(`[LLM] ${selection.provider}/${selection.model} responded in ${((Date.now() - start) / 1000).toFixed(1)}s`);
      return content;
    },
  };
}
