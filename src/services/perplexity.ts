/**
 * Direct Perplexity API integration
 * Uses the Perplexity Search API for ranked web results
 */

import { z } from 'zod';
import type { SearchCapability } from '../capabilities.js';
import { CapabilityError } from '../errors.js';
import type { SearchHit } from '../types/index.js';

const searchResponseSchema = z.object({
  results: z.array(z.object({
    title: z.string().optional(),
    url: z.string(),
    snippet: z.string().optional(),
    date: z.string().nullable().optional(),
  })).default([]),
});

export async function perplexitySearch(
  query: string,
  limit: number,
  apiKey?: string,
  signal?: AbortSignal
): Promise<SearchHit[]> {
  if (!apiKey) {
    throw new CapabilityError('PERPLEXITY_API_KEY is required', 'search');
  }

  try {
    const response = await fetch('https://api.perplexity.ai/search', {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        query,
        max_results: limit,
      }),
      signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Perplexity API error (${response.status}): ${errorText}`);
    }

    const data = searchResponseSchema.parse(await response.json());

    return data.results.map(r => ({
      title: r.title?.trim() || r.url,
      url: r.url,
      snippet: r.snippet ?? '',
      date: r.date ?? undefined,
    }));
  } catch (error) {
    console.error('[Search] Perplexity error:', error instanceof Error ? error.message : error);
    throw new CapabilityError(
      `Search failed for "${query}": ${error instanceof Error ? error.message : String(error)}`,
      'search',
      error
    );
  }
}

export function createPerplexitySearch(apiKey?: string): SearchCapability {
  return {
    search: (query, limit, signal) => perplexitySearch(query, limit, apiKey, signal),
  };
}
