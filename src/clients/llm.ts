import { z } from 'zod';
import type { GenerationCapability, GenerationConstraints } from '../capabilities.js';
import { CapabilityError } from '../errors.js';

export type LLMProvider = 'groq' | 'gemini' | 'openai' | 'anthropic';

export const LLM_PROVIDERS: readonly LLMProvider[] = ['groq', 'gemini', 'openai', 'anthropic'];

export interface LLMConfig {
  provider: LLMProvider;
  model: string;
  apiKey: string;
  timeout?: number;  // Timeout in milliseconds (default: 120000)
  maxOutputTokens?: number;  // Max output tokens (default: 2500)
  temperature?: number;  // Temperature for sampling (default: 0.6)
  topP?: number;  // Nucleus sampling (default: 0.9)
}

export interface LLMResponse {
  model: string;
  content: string;
}

export interface LLMCallOptions {
  /** Minimum content length to consider response valid (default: 10) */
  minContentLength?: number;
  system?: string;
  signal?: AbortSignal;
}

export class LLMError extends Error {
  constructor(
    message: string,
    public readonly model: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'LLMError';
  }
}

const DEFAULT_MODELS: Record<LLMProvider, string> = {
  groq: 'llama-3.3-70b-versatile',
  gemini: 'gemini-2.5-flash',
  openai: 'gpt-4.1-mini',
  anthropic: 'claude-sonnet-4-5',
};

export const API_KEY_ENV: Record<LLMProvider, string> = {
  groq: 'GROQ_API_KEY',
  gemini: 'GEMINI_API_KEY',
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

export const DEFAULT_SYSTEM_PROMPT =
  'You are an expert academic writer who produces well-researched, carefully argued scholarly prose. ' +
  'Your writing reads as the work of an experienced human academic: natural flow, varied sentence structure, ' +
  'precise vocabulary, and citations placed where the evidence is used.';

const chatCompletionSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable().optional() }) })).optional(),
});

const geminiSchema = z.object({
  candidates: z.array(z.object({
    content: z.object({ parts: z.array(z.object({ text: z.string().optional() })).optional() }).optional(),
  })).optional(),
});

const anthropicSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).optional(),
});

interface ProviderCall {
  prompt: string;
  system: string;
  model: string;
  apiKey: string;
  maxOutputTokens: number;
  temperature: number;
  topP: number;
  signal: AbortSignal;
}

/**
 * Groq and OpenAI share the chat-completions wire format
 */
async function callChatCompletions(url: string, call: ProviderCall, tokenField: 'max_tokens' | 'max_completion_tokens'): Promise<string> {
  const response = await fetch(url, {
    method: 'POST',
    headers: {
      Authorization: `Bearer ${call.apiKey}`,
      'Content-Type': 'application/json',
    },
    body: JSON.stringify({
      model: call.model,
      messages: [
        { role: 'system', content: call.system },
        { role: 'user', content: call.prompt },
      ],
      [tokenField]: call.maxOutputTokens,
      temperature: call.temperature,
      top_p: call.topP,
    }),
    signal: call.signal,
  });

  if (!response.ok) {
    throw new Error(`${call.model} API error: ${response.status} ${response.statusText}`);
  }

  const data = chatCompletionSchema.parse(await response.json());
  return data.choices?.[0]?.message.content ?? '';
}

/**
 * Call Gemini API directly using native fetch
 */
async function callGemini(call: ProviderCall): Promise<string> {
  const url = `https://generativelanguage.googleapis.com/v1beta/models/${call.model}:generateContent?key=${call.apiKey}`;

  const response = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({
      systemInstruction: { parts: [{ text: call.system }] },
      contents: [{ parts: [{ text: call.prompt }] }],
      generationConfig: { temperature: call.temperature, topP: call.topP, maxOutputTokens: call.maxOutputTokens },
    }),
    signal: call.signal,
  });

  if (!response.ok) {
    throw new Error(`Gemini API error: ${response.status} ${response.statusText}`);
  }

  const data = geminiSchema.parse(await response.json());
  return data.candidates?.[0]?.content?.parts?.map(p => p.text ?? '').join('') ?? '';
}

/**
 * Call Anthropic API directly using native fetch
 */
async function callAnthropic(call: ProviderCall): Promise<string> {
  const response = await fetch('https://api.anthropic.com/v1/messages', {
    method: 'POST',
    headers: {
      'x-api-key': call.apiKey,
      'anthropic-version': '2023-06-01',
      'Content-Type': 'application/json',
    },
    body: JSON.stringify({
      model: call.model,
      system: call.system,
      messages: [{ role: 'user', content: call.prompt }],
      max_tokens: call.maxOutputTokens,
      temperature: call.temperature,
    }),
    signal: call.signal,
  });

  if (!response.ok) {
    throw new Error(`Anthropic API error: ${response.status} ${response.statusText}`);
  }

  const data = anthropicSchema.parse(await response.json());
  return (data.content ?? []).filter(block => block.type === 'text').map(block => block.text ?? '').join('');
}

/**
 * Call a single LLM
 * @param options.minContentLength - Minimum content length to consider response valid (default: 10)
 * @throws LLMError on a failed request or insufficient content
 */
export async function callLLM(
  prompt: string,
  config: LLMConfig,
  options?: LLMCallOptions
): Promise<LLMResponse> {
  const { minContentLength = 10, system = DEFAULT_SYSTEM_PROMPT, signal } = options || {};
  const timeout = config.timeout || 120000;

  // Timeout and caller cancellation share one controller
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);
  const onAbort = () => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  const call: ProviderCall = {
    prompt,
    system,
    model: config.model,
    apiKey: config.apiKey,
    maxOutputTokens: config.maxOutputTokens || 2500,
    temperature: config.temperature ?? 0.6,
    topP: config.topP ?? 0.9,
    signal: controller.signal,
  };

  let content: string;
  try {
    if (config.provider === 'groq') {
      content = await callChatCompletions('https://api.groq.com/openai/v1/chat/completions', call, 'max_tokens');
    } else if (config.provider === 'openai') {
      content = await callChatCompletions('https://api.openai.com/v1/chat/completions', call, 'max_completion_tokens');
    } else if (config.provider === 'gemini') {
      content = await callGemini(call);
    } else {
      content = await callAnthropic(call);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[LLM] ${config.model} failed:`, message);
    throw new LLMError(`LLM call failed: ${message}`, config.model, error);
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onAbort);
  }

  if (content.trim().length < minContentLength) {
    throw new LLMError(
      `LLM call returned insufficient content (${content.trim().length} chars, need ${minContentLength})`,
      config.model
    );
  }

  return { model: config.model, content };
}

/**
 * Resolve provider settings from the environment.
 * Returns null when the selected provider has no API key.
 */
export function llmConfigFromEnv(env: Record<string, string | undefined>): LLMConfig | null {
  const requested = env.ACADEMIC_DRAFT_LLM_PROVIDER?.trim().toLowerCase() || 'groq';
  const provider = LLM_PROVIDERS.find(p => p === requested);
  if (!provider) {
    throw new Error(`Unknown provider: ${requested} (expected one of ${LLM_PROVIDERS.join(', ')})`);
  }

  const apiKey = env[API_KEY_ENV[provider]];
  if (!apiKey) {
    console.error(`[LLM] ERROR: ${API_KEY_ENV[provider]} not provided`);
    return null;
  }

  return {
    provider,
    model: env.ACADEMIC_DRAFT_LLM_MODEL?.trim() || DEFAULT_MODELS[provider],
    apiKey,
  };
}

/**
 * Adapt an LLM config to the pipeline's generation capability.
 * Every failure surfaces as CapabilityError so the caller's retry policy applies.
 */
export function createLLMGenerator(config: LLMConfig): GenerationCapability {
  return {
    async generate(prompt: string, constraints: GenerationConstraints, signal?: AbortSignal): Promise<string> {
      try {
        const response = await callLLM(
          prompt,
          {
            ...config,
            maxOutputTokens: constraints.maxOutputTokens,
            temperature: constraints.temperature ?? config.temperature,
          },
          { system: constraints.system, signal }
        );
        return response.content;
      } catch (error) {
        throw new CapabilityError(
          error instanceof Error ? error.message : String(error),
          'generation',
          error
        );
      }
    },
  };
}
