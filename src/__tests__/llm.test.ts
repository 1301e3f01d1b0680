import { afterEach, describe, it, expect, vi } from 'vitest';
import { callLLM, createLLMGenerator, llmConfigFromEnv, LLMError, type LLMConfig } from '../clients/llm.js';
import { CapabilityError } from '../errors.js';

const CONTENT = 'Grid-scale storage reshapes how operators balance supply.';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function stubFetch(body: unknown, status = 200) {
  const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => jsonResponse(body, status));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function requestBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}

const groq: LLMConfig = { provider: 'groq', model: 'test-model', apiKey: 'test-secret' };

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('callLLM', () => {
  it('sends chat-completions requests to Groq with the system prompt', async () => {
    const fetchMock = stubFetch({ choices: [{ message: { content: CONTENT } }] });

    const response = await callLLM('Write a paragraph', groq, { system: 'Be concise' });

    expect(response).toEqual({ model: 'test-model', content: CONTENT });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.groq.com/openai/v1/chat/completions');
    expect(requestBody(init)).toMatchObject({
      model: 'test-model',
      messages: [{ role: 'system', content: 'Be concise' }, { role: 'user', content: 'Write a paragraph' }],
      max_tokens: 2500,
      temperature: 0.6,
    });
  });

  it('uses max_completion_tokens for OpenAI', async () => {
    const fetchMock = stubFetch({ choices: [{ message: { content: CONTENT } }] });

    await callLLM('prompt', { ...groq, provider: 'openai', maxOutputTokens: 900 });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.openai.com/v1/chat/completions');
    expect(requestBody(init)).toMatchObject({ max_completion_tokens: 900 });
  });

  it('joins Gemini candidate parts', async () => {
    stubFetch({ candidates: [{ content: { parts: [{ text: 'Grid-scale storage ' }, { text: 'reshapes supply.' }] } }] });

    const response = await callLLM('prompt', { ...groq, provider: 'gemini' });

    expect(response.content).toBe('Grid-scale storage reshapes supply.');
  });

  it('keeps only text blocks from Anthropic responses', async () => {
    const fetchMock = stubFetch({ content: [{ type: 'text', text: CONTENT }, { type: 'tool_use' }] });

    const response = await callLLM('prompt', { ...groq, provider: 'anthropic' });

    expect(response.content).toBe(CONTENT);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.anthropic.com/v1/messages');
    expect(init?.headers).toMatchObject({ 'x-api-key': 'test-secret' });
  });

  it('throws LLMError on HTTP errors', async () => {
    stubFetch({}, 429);

    const calling = callLLM('prompt', groq);

    await expect(calling).rejects.toBeInstanceOf(LLMError);
    await expect(calling).rejects.toThrow(/429/);
  });

  it('throws LLMError when the content is too short', async () => {
    stubFetch({ choices: [{ message: { content: 'ok' } }] });

    await expect(callLLM('prompt', groq)).rejects.toThrow('LLM call returned insufficient content (2 chars, need 10)');
  });
});

describe('createLLMGenerator', () => {
  it('passes the constraints through to the provider', async () => {
    const fetchMock = stubFetch({ choices: [{ message: { content: CONTENT } }] });
    const generator = createLLMGenerator(groq);

    const text = await generator.generate('prompt', { targetWords: 100, maxOutputTokens: 360, temperature: 0.3, system: 'sys' });

    expect(text).toBe(CONTENT);
    expect(requestBody(fetchMock.mock.calls[0][1])).toMatchObject({
      max_tokens: 360,
      temperature: 0.3,
      messages: [{ role: 'system', content: 'sys' }, { role: 'user', content: 'prompt' }],
    });
  });

  it('wraps provider failures in CapabilityError', async () => {
    stubFetch({}, 500);
    const generator = createLLMGenerator(groq);

    const generating = generator.generate('prompt', { targetWords: 100, maxOutputTokens: 360 });

    await expect(generating).rejects.toBeInstanceOf(CapabilityError);
    await expect(generating).rejects.toMatchObject({ capability: 'generation', code: 'CAPABILITY_ERROR' });
  });
});

describe('llmConfigFromEnv', () => {
  it('defaults to Groq and its default model', () => {
    expect(llmConfigFromEnv({ GROQ_API_KEY: 'test-secret' })).toEqual({
      provider: 'groq',
      model: 'llama-3.3-70b-versatile',
      apiKey: 'test-secret',
    });
  });

  it('honours the provider and model variables', () => {
    const config = llmConfigFromEnv({
      ACADEMIC_DRAFT_LLM_PROVIDER: 'Anthropic',
      ACADEMIC_DRAFT_LLM_MODEL: 'test-model',
      ANTHROPIC_API_KEY: 'test-secret',
    });

    expect(config).toEqual({ provider: 'anthropic', model: 'test-model', apiKey: 'test-secret' });
  });

  it('returns null without an API key and throws for unknown providers', () => {
    expect(llmConfigFromEnv({})).toBeNull();
    expect(() => llmConfigFromEnv({ ACADEMIC_DRAFT_LLM_PROVIDER: 'mistral' })).toThrow(/Unknown provider: mistral/);
  });
});
