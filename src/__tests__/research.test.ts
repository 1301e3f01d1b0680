import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../config.js';
import { CancelledError } from '../errors.js';
import { planOutline } from '../outline.js';
import { parseGenerationRequest } from '../request.js';
import {
  allQueries,
  buildResearchCorpus,
  corpusSlice,
  normalizeUrl,
  planResearchQueries,
  snippetSimilarity,
  type ResearchQueryPlan,
} from '../research.js';
import type { ResearchCorpus, SearchHit } from '../types/index.js';
import { WorkerPool } from '../worker-pool.js';
import { createFakeSearch, makeNode, makeRecord } from './helpers/fakes.js';

const config = resolveConfig({ search: { baseDelayMs: 0 } });

const SNIPPET = 'Lithium iron phosphate cells dominate stationary storage deployments in 2024.';

function hit(url: string, snippet: string = SNIPPET): SearchHit {
  return { title: 'A source', url, snippet };
}

function plan(topicQuery: string, focusQueries: string[] = [], sectionQueries: Record<string, string> = {}): ResearchQueryPlan {
  return { topicQuery, focusQueries, sectionQueries };
}

describe('normalizeUrl', () => {
  it('canonicalizes scheme, host, tracking parameters, trailing slash and fragment', () => {
    expect(normalizeUrl('http://www.Example.org/a/b/?utm_source=x&b=2&a=1#frag')).toBe('https://example.org/a/b?a=1&b=2');
  });

  it('drops the root slash', () => {
    expect(normalizeUrl('https://example.org/')).toBe('https://example.org');
  });

  it('rejects unparseable and non-web URLs', () => {
    expect(normalizeUrl('not a url')).toBeNull();
    expect(normalizeUrl('ftp://example.org/file')).toBeNull();
  });
});

describe('snippetSimilarity', () => {
  it('ignores case and whitespace', () => {
    expect(snippetSimilarity('Grid scale  storage is growing fast', 'grid scale storage is growing fast   ')).toBe(1);
  });

  it('is low for unrelated snippets', () => {
    expect(snippetSimilarity('battery chemistry advances', 'policy incentives for wind power')).toBe(0);
  });
});

describe('planResearchQueries', () => {
  it('issues topic, focus-area and section queries in that order without duplicates', () => {
    const request = parseGenerationRequest({
      topic: 'renewable energy storage',
      documentType: 'Thesis',
      academicLevel: 'Masters',
      targetWordCount: 8000,
      focusAreas: ['battery chemistry', 'Battery Chemistry', 'renewable energy storage', 'grid integration'],
    });
    const queryPlan = planResearchQueries(request, planOutline(request, resolveConfig()));

    expect(queryPlan.topicQuery).toBe('renewable energy storage');
    expect(queryPlan.focusQueries).toEqual(['battery chemistry', 'grid integration']);
    expect(queryPlan.sectionQueries).toEqual({
      introduction: 'renewable energy storage background and significance',
      literature_review: 'renewable energy storage literature review',
      methodology: 'renewable energy storage research methodology',
      results: 'renewable energy storage empirical results',
      discussion: 'renewable energy storage implications and challenges',
    });
    expect(allQueries(queryPlan)[0]).toBe('renewable energy storage');
    expect(allQueries(queryPlan)).toHaveLength(8);
  });
});

describe('buildResearchCorpus', () => {
  it('collapses snippets that differ only by trailing whitespace into one record', async () => {
    const { capability } = createFakeSearch(query =>
      query === 'q1' ? [hit('https://a.org/x')] : [hit('https://b.org/y', `${SNIPPET}   `)]
    );

    const corpus = await buildResearchCorpus({ plan: plan('q1', ['q2']), search: capability, config, pool: new WorkerPool(2) });

    expect(Object.keys(corpus.records)).toEqual(['S1']);
    expect(corpus.buckets).toEqual({ q1: ['S1'], q2: ['S1'] });
    expect(corpus.records.S1.query).toBe('q1');
  });

  it('collapses URLs that differ only by tracking parameters', async () => {
    const { capability } = createFakeSearch(() => [
      hit('https://example.org/paper?utm_source=feed', 'First description of a storage paper with enough length.'),
      hit('https://www.example.org/paper/', 'Second, different description of the same storage paper here.'),
    ]);

    const corpus = await buildResearchCorpus({ plan: plan('q1'), search: capability, config, pool: new WorkerPool(1) });

    expect(corpus.buckets.q1).toEqual(['S1']);
    expect(corpus.records.S1.dedupKey).toBe('https://example.org/paper');
  });

  it('drops short snippets and invalid URLs', async () => {
    const { capability } = createFakeSearch(() => [
      hit('https://a.org/1', 'too short'),
      hit('mailto:someone', 'A snippet that is long enough to keep but has a bad URL.'),
      hit('https://a.org/2', 'Pumped hydro remains the largest installed storage technology worldwide.'),
    ]);

    const corpus = await buildResearchCorpus({ plan: plan('q1'), search: capability, config, pool: new WorkerPool(1) });

    expect(corpus.buckets.q1).toEqual(['S1']);
    expect(corpus.records.S1.url).toBe('https://a.org/2');
  });

  it('retries a failed query and keeps the results of the successful attempt', async () => {
    const { capability, search } = createFakeSearch((_query, call) => {
      if (call === 1) throw new Error('rate limited');
      return [hit('https://a.org/x')];
    });

    const corpus = await buildResearchCorpus({ plan: plan('q1'), search: capability, config, pool: new WorkerPool(1) });

    expect(search).toHaveBeenCalledTimes(2);
    expect(corpus.buckets.q1).toEqual(['S1']);
  });

  it('records an empty bucket once retries are exhausted', async () => {
    const { capability, search } = createFakeSearch(() => []);

    const corpus = await buildResearchCorpus({ plan: plan('q1'), search: capability, config, pool: new WorkerPool(1) });

    expect(search).toHaveBeenCalledTimes(3);
    expect(corpus.buckets.q1).toEqual([]);
    expect(corpus.records).toEqual({});
  });

  it('throws CancelledError when the signal is already aborted', async () => {
    const { capability, search } = createFakeSearch();
    const controller = new AbortController();
    controller.abort();

    await expect(
      buildResearchCorpus({ plan: plan('q1'), search: capability, config, pool: new WorkerPool(1), signal: controller.signal })
    ).rejects.toBeInstanceOf(CancelledError);
    expect(search).not.toHaveBeenCalled();
  });

  it('never puts two records with the same dedup key in a bucket', async () => {
    // Deterministic pseudo-random hit sequences over a small URL pool
    let seed = 7;
    const next = () => (seed = (seed * 16807) % 2147483647);
    const urls = [
      'https://a.org/x', 'http://a.org/x/', 'https://www.a.org/x?utm_medium=mail',
      'https://b.org/y', 'https://b.org/y#top', 'https://c.org/z?b=1&a=2', 'https://c.org/z?a=2&b=1',
    ];
    const snippets = [
      'Flow batteries suit long duration storage applications in grids.',
      'Hydrogen storage offers seasonal balancing at a high round trip cost.',
      'Thermal storage pairs well with concentrated solar power plants today.',
    ];
    const { capability } = createFakeSearch(() =>
      Array.from({ length: 6 }, () => hit(urls[next() % urls.length], snippets[next() % snippets.length]))
    );

    const corpus = await buildResearchCorpus({
      plan: plan('q1', ['q2', 'q3'], { intro: 'q4' }),
      search: capability,
      config,
      pool: new WorkerPool(2),
    });

    for (const ids of Object.values(corpus.buckets)) {
      const keys = ids.map(id => corpus.records[id].dedupKey);
      expect(new Set(ids).size).toBe(ids.length);
      expect(new Set(keys).size).toBe(keys.length);
    }
    const allKeys = Object.values(corpus.records).map(r => r.dedupKey);
    expect(new Set(allKeys).size).toBe(allKeys.length);
  });
});

describe('corpusSlice', () => {
  const corpus: ResearchCorpus = {
    queries: ['topic', 'focus', 'topic hint'],
    buckets: { topic: ['S1', 'S2'], focus: ['S5'], 'topic hint': ['S3', 'S4', 'S1'] },
    records: Object.fromEntries(['S1', 'S2', 'S3', 'S4', 'S5'].map(id => [id, makeRecord(id)])),
  };
  const queryPlan = plan('topic', ['focus'], { literature_review: 'topic hint' });

  it('interleaves own, topic and focus buckets for body sections', () => {
    const node = makeNode({ id: 'literature_review', role: 'literature_review' });
    expect(corpusSlice(corpus, queryPlan, node, 12).map(r => r.id)).toEqual(['S3', 'S1', 'S5', 'S4', 'S2']);
  });

  it('caps the slice', () => {
    const node = makeNode({ id: 'literature_review', role: 'literature_review' });
    expect(corpusSlice(corpus, queryPlan, node, 3).map(r => r.id)).toEqual(['S3', 'S1', 'S5']);
  });

  it('uses only the topic bucket for sections without their own query or focus role', () => {
    const node = makeNode({ id: 'conclusion', role: 'conclusion', searchHint: null });
    expect(corpusSlice(corpus, queryPlan, node, 12).map(r => r.id)).toEqual(['S1', 'S2']);
  });
});
