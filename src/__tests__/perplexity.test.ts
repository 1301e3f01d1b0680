import { afterEach, describe, it, expect, vi } from 'vitest';
import { CapabilityError } from '../errors.js';
import { createPerplexitySearch, perplexitySearch } from '../services/perplexity.js';

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('perplexitySearch', () => {
  it('maps search results to hits', async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => new Response(JSON.stringify({
      results: [
        { title: ' Storage Outlook ', url: 'https://example.org/outlook', snippet: 'Capacity doubled.', date: '2024-02-01' },
        { url: 'https://example.org/untitled', date: null },
      ],
    }), { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const hits = await perplexitySearch('grid storage', 5, 'test-secret');

    expect(hits).toEqual([
      { title: 'Storage Outlook', url: 'https://example.org/outlook', snippet: 'Capacity doubled.', date: '2024-02-01' },
      { title: 'https://example.org/untitled', url: 'https://example.org/untitled', snippet: '', date: undefined },
    ]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.perplexity.ai/search');
    expect(typeof init?.body === 'string' ? JSON.parse(init.body) : null).toEqual({ query: 'grid storage', max_results: 5 });
  });

  it('raises CapabilityError on HTTP errors', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('rate limited', { status: 429 })));

    const searching = perplexitySearch('grid storage', 5, 'test-secret');

    await expect(searching).rejects.toBeInstanceOf(CapabilityError);
    await expect(searching).rejects.toThrow('Search failed for "grid storage": Perplexity API error (429): rate limited');
  });

  it('requires an API key', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);

    await expect(createPerplexitySearch(undefined).search('grid storage', 5)).rejects.toThrow('PERPLEXITY_API_KEY is required');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
