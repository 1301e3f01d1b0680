import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfigFromEnv, resolveConfig } from '../config.js';

describe('resolveConfig', () => {
  it('fills every default and freezes the result', () => {
    const config = resolveConfig();

    expect(config.workerPoolSize).toBe(4);
    expect(config.citationStyle).toBe('apa');
    expect(config.wordCountTolerance).toBe(0.2);
    expect(config.search.resultCap).toBe(10);
    expect(config.drafting.lengthTolerance).toBe(0.15);
    expect(config.humanization).toMatchObject({ acceptanceThreshold: 0.7, hardFailureThreshold: 0.4, maxAttempts: 3 });
    expect(config.humanization.weights).toEqual({ readability: 0.35, burstiness: 0.35, originality: 0.3 });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.humanization.weights)).toBe(true);
  });

  it('applies nested overrides and keeps sibling defaults', () => {
    const config = resolveConfig({ drafting: { baseDelayMs: 0 }, humanization: { maxAttempts: 5 } });

    expect(config.drafting.baseDelayMs).toBe(0);
    expect(config.drafting.maxRetries).toBe(2);
    expect(config.humanization.maxAttempts).toBe(5);
    expect(config.humanization.acceptanceThreshold).toBe(0.7);
  });

  it('returns independent objects per call', () => {
    expect(resolveConfig({ workerPoolSize: 2 }).workerPoolSize).toBe(2);
    expect(DEFAULT_CONFIG.workerPoolSize).toBe(4);
  });

  it('rejects a hard-failure floor at or above the acceptance threshold', () => {
    expect(() => resolveConfig({ humanization: { acceptanceThreshold: 0.5, hardFailureThreshold: 0.5 } }))
      .toThrow(/humanization\.hardFailureThreshold: hardFailureThreshold must be below acceptanceThreshold/);
  });

  it('rejects all-zero scoring weights', () => {
    expect(() => resolveConfig({ humanization: { weights: { readability: 0, burstiness: 0, originality: 0 } } }))
      .toThrow(/at least one scoring weight must be positive/);
  });

  it('rejects out-of-range values', () => {
    expect(() => resolveConfig({ workerPoolSize: 0 })).toThrow(/workerPoolSize/);
    expect(() => resolveConfig({ drafting: { lengthTolerance: 1 } })).toThrow(/drafting\.lengthTolerance/);
  });
});

describe('loadConfigFromEnv', () => {
  it('keeps defaults for unset or blank variables', () => {
    const config = loadConfigFromEnv({ ACADEMIC_DRAFT_POOL_SIZE: '  ' });

    expect(config.workerPoolSize).toBe(4);
    expect(config.citationStyle).toBe('apa');
  });

  it('reads numeric and style overrides', () => {
    const config = loadConfigFromEnv({
      ACADEMIC_DRAFT_POOL_SIZE: '8',
      ACADEMIC_DRAFT_MAX_ATTEMPTS: '4',
      ACADEMIC_DRAFT_SEARCH_CAP: '5',
      ACADEMIC_DRAFT_CITATION_STYLE: 'IEEE',
    });

    expect(config.workerPoolSize).toBe(8);
    expect(config.humanization.maxAttempts).toBe(4);
    expect(config.search.resultCap).toBe(5);
    expect(config.citationStyle).toBe('ieee');
  });

  it('rejects non-numeric values and unknown styles', () => {
    expect(() => loadConfigFromEnv({ ACADEMIC_DRAFT_POOL_SIZE: 'four' }))
      .toThrow('ACADEMIC_DRAFT_POOL_SIZE must be a number, got "four"');
    expect(() => loadConfigFromEnv({ ACADEMIC_DRAFT_CITATION_STYLE: 'chicago' }))
      .toThrow(/must be one of apa, harvard, mla, ieee/);
  });
});
