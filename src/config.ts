/**
 * Pipeline configuration
 *
 * One immutable object per pipeline instance. Nothing here is module-level
 * mutable state, so concurrent requests with different settings do not interfere.
 */

import { z } from 'zod';
import { CITATION_STYLES } from './types/index.js';

const searchSchema = z.object({
  resultCap: z.number().int().min(1).max(50).default(10),
  minSnippetLength: z.number().int().min(0).default(40),
  dedupSimilarity: z.number().gt(0).max(1).default(0.9),   // Shingle Jaccard at/above this = duplicate
  maxRetries: z.number().int().min(0).max(10).default(2),
  baseDelayMs: z.number().int().min(0).default(500),
  maxRecordsPerSection: z.number().int().min(1).default(12),
});

const outlineSchema = z.object({
  minWordsPerSection: z.number().int().min(1).default(100),
  maxWordCount: z.number().int().min(1).default(50000),
});

const draftingSchema = z.object({
  lengthTolerance: z.number().gt(0).lt(1).default(0.15),
  maxWordsPerCall: z.number().int().min(50).default(1200),
  maxExtensions: z.number().int().min(0).default(2),
  maxRetries: z.number().int().min(0).max(10).default(2),
  baseDelayMs: z.number().int().min(0).default(1000),
  temperature: z.number().min(0).max(2).default(0.6),
});

const weightsSchema = z.object({
  readability: z.number().min(0).default(0.35),
  burstiness: z.number().min(0).default(0.35),
  originality: z.number().min(0).default(0.3),
});

const humanizationSchema = z.object({
  acceptanceThreshold: z.number().min(0).max(1).default(0.7),
  hardFailureThreshold: z.number().min(0).max(1).default(0.4),
  maxAttempts: z.number().int().min(1).max(10).default(3),   // Scored texts, first draft included
  dimensionFloor: z.number().min(0).max(1).default(0.7),
  targetVariation: z.number().gt(0).default(0.45),
  maxOverlap: z.number().min(0).lt(1).default(0.15),
  weights: weightsSchema.default({}),
});

const configSchema = z
  .object({
    search: searchSchema.default({}),
    outline: outlineSchema.default({}),
    drafting: draftingSchema.default({}),
    humanization: humanizationSchema.default({}),
    workerPoolSize: z.number().int().min(1).max(32).default(4),
    citationStyle: z.enum(CITATION_STYLES).default('apa'),
    wordCountTolerance: z.number().gt(0).lt(1).default(0.2),
  })
  .refine(c => c.humanization.hardFailureThreshold < c.humanization.acceptanceThreshold, {
    message: 'hardFailureThreshold must be below acceptanceThreshold',
    path: ['humanization', 'hardFailureThreshold'],
  })
  .refine(c => {
    const w = c.humanization.weights;
    return w.readability + w.burstiness + w.originality > 0;
  }, {
    message: 'at least one scoring weight must be positive',
    path: ['humanization', 'weights'],
  });

type DeepReadonly<T> = { readonly [K in keyof T]: T[K] extends object ? DeepReadonly<T[K]> : T[K] };

export type PipelineConfig = DeepReadonly<z.output<typeof configSchema>>;

export type ConfigOverrides = z.input<typeof configSchema>;

/**
 * Apply defaults to the overrides, validate, and freeze
 * @throws Error listing every invalid field
 */
export function resolveConfig(overrides: ConfigOverrides = {}): PipelineConfig {
  const parsed = configSchema.safeParse(overrides);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid pipeline configuration: ${issues.join('; ')}`);
  }
  return deepFreeze(parsed.data);
}

export const DEFAULT_CONFIG: PipelineConfig = resolveConfig();

/**
 * Read overrides from environment variables; unset or blank values keep the defaults
 */
export function loadConfigFromEnv(env: Record<string, string | undefined>): PipelineConfig {
  const num = (key: string): number | undefined => {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return undefined;
    const value = Number(raw);
    if (Number.isNaN(value)) {
      throw new Error(`Invalid pipeline configuration: ${key} must be a number, got "${raw}"`);
    }
    return value;
  };

  const style = env.ACADEMIC_DRAFT_CITATION_STYLE?.trim().toLowerCase();
  const citationStyle = CITATION_STYLES.find(s => s === style);
  if (style && !citationStyle) {
    throw new Error(`Invalid pipeline configuration: ACADEMIC_DRAFT_CITATION_STYLE must be one of ${CITATION_STYLES.join(', ')}`);
  }

  return resolveConfig({
    search: {
      resultCap: num('ACADEMIC_DRAFT_SEARCH_CAP'),
      dedupSimilarity: num('ACADEMIC_DRAFT_DEDUP_SIMILARITY'),
    },
    humanization: {
      maxAttempts: num('ACADEMIC_DRAFT_MAX_ATTEMPTS'),
      acceptanceThreshold: num('ACADEMIC_DRAFT_ACCEPTANCE_THRESHOLD'),
      hardFailureThreshold: num('ACADEMIC_DRAFT_HARD_FAILURE_THRESHOLD'),
    },
    workerPoolSize: num('ACADEMIC_DRAFT_POOL_SIZE'),
    citationStyle,
  });
}

function deepFreeze<T>(obj: T): T {
  if (obj && typeof obj === 'object') {
    for (const value of Object.values(obj)) {
      deepFreeze(value);
    }
    Object.freeze(obj);
  }
  return obj;
}
