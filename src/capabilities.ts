/**
 * External collaborators the pipeline depends on.
 * Concrete clients live in ./clients and ./services; tests supply in-process fakes.
 */

import type { SearchHit } from './types/index.js';

export interface SearchCapability {
  /** Relevance-ordered hits; may be empty, may throw */
  search(query: string, limit: number, signal?: AbortSignal): Promise<SearchHit[]>;
}

export interface GenerationConstraints {
  /** Words the caller wants back */
  targetWords: number;
  /** Hard cap on output tokens for the call */
  maxOutputTokens: number;
  temperature?: number;
  system?: string;
}

export interface GenerationCapability {
  /** Non-deterministic; may throw on rate limit, timeout or empty output */
  generate(prompt: string, constraints: GenerationConstraints, signal?: AbortSignal): Promise<string>;
}

/** Rough token allowance for a number of words, with headroom for markdown and citations */
export function tokensForWords(words: number): number {
  return Math.ceil(words * 1.6) + 200;
}
