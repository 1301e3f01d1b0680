/**
 * Research Aggregator
 *
 * Flow: plan queries (topic, focus areas, section hints) → search each query
 * through the worker pool (retry with backoff) → merge buckets in query order,
 * collapsing duplicate URLs and near-duplicate snippets into one record.
 */

import type { SearchCapability } from './capabilities.js';
import type { PipelineConfig } from './config.js';
import { CancelledError, CapabilityError } from './errors.js';
import { withRetry } from './retry.js';
import { ngrams, wordTokens } from './text.js';
import type {
  GenerationRequest,
  OutlineNode,
  ResearchCorpus,
  ResearchRecord,
  SearchHit,
  SectionRole,
} from './types/index.js';
import type { WorkerPool } from './worker-pool.js';

export interface ResearchQueryPlan {
  topicQuery: string;
  focusQueries: string[];
  sectionQueries: Record<string, string>;  // Section id → query
}

// Body sections also draw on the focus-area buckets
const FOCUS_ROLES: readonly SectionRole[] = [
  'background',
  'literature_review',
  'theoretical_framework',
  'themes',
  'results',
  'findings',
  'analysis',
  'discussion',
  'research_gaps',
];

const TRACKING_PARAM = /^(utm_|fbclid$|gclid$|mc_)/i;

/**
 * Derive the query plan: topic first, then focus areas, then one query per searchable section
 */
export function planResearchQueries(request: GenerationRequest, outline: readonly OutlineNode[]): ResearchQueryPlan {
  const topicQuery = request.topic.trim();
  const focusQueries = uniqueQueries(request.focusAreas.map(f => f.trim()).filter(f => f.length > 0))
    .filter(q => q.toLowerCase() !== topicQuery.toLowerCase());

  const sectionQueries: Record<string, string> = {};
  for (const node of outline) {
    if (node.drafted && node.searchHint) {
      sectionQueries[node.id] = `${topicQuery} ${node.searchHint}`;
    }
  }

  return { topicQuery, focusQueries, sectionQueries };
}

/**
 * All distinct queries of a plan in issue order
 */
export function allQueries(plan: ResearchQueryPlan): string[] {
  return uniqueQueries([plan.topicQuery, ...plan.focusQueries, ...Object.values(plan.sectionQueries)]);
}

function uniqueQueries(queries: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const q of queries) {
    const key = q.toLowerCase().replace(/\s+/g, ' ').trim();
    if (!seen.has(key)) {
      seen.add(key);
      out.push(q);
    }
  }
  return out;
}

/**
 * Canonical form of a URL used as the dedup key; null when the URL does not parse
 */
export function normalizeUrl(raw: string): string | null {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    return null;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;

  const host = url.hostname.toLowerCase().replace(/^www\./, '');
  const params = [...url.searchParams.entries()]
    .filter(([key]) => !TRACKING_PARAM.test(key))
    .sort(([a], [b]) => a.localeCompare(b));
  const query = params.length > 0 ? `?${new URLSearchParams(params).toString()}` : '';
  const path = url.pathname.replace(/\/+$/, '');

  return `https://${host}${url.port ? `:${url.port}` : ''}${path}${query}`;
}

/**
 * Jaccard similarity of word 3-shingles (case and whitespace insensitive)
 */
export function snippetSimilarity(a: string, b: string): number {
  const tokensA = wordTokens(a);
  const tokensB = wordTokens(b);
  if (tokensA.length === 0 || tokensB.length === 0) return 0;

  const size = Math.min(3, tokensA.length, tokensB.length);
  const shinglesA = new Set(ngrams(tokensA, size));
  const shinglesB = new Set(ngrams(tokensB, size));

  let shared = 0;
  for (const s of shinglesA) {
    if (shinglesB.has(s)) shared++;
  }
  return shared / (shinglesA.size + shinglesB.size - shared);
}

export interface BuildCorpusParams {
  plan: ResearchQueryPlan;
  search: SearchCapability;
  config: PipelineConfig;
  pool: WorkerPool;
  signal?: AbortSignal;
}

/**
 * Build the research corpus. Empty buckets are allowed; only cancellation is fatal.
 */
export async function buildResearchCorpus({ plan, search, config, pool, signal }: BuildCorpusParams): Promise<ResearchCorpus> {
  const queries = allQueries(plan);
  console.error(`[Research] Issuing ${queries.length} queries...`);

  const hitsPerQuery = await Promise.all(
    queries.map(query => pool.run(s => fetchBucketHits(query, search, config, s), signal))
  );

  const retrievedAt = new Date().toISOString();
  const corpus: ResearchCorpus = { queries, buckets: {}, records: {} };
  const recordsByKey = new Map<string, ResearchRecord>();
  const ordered: ResearchRecord[] = [];

  queries.forEach((query, qi) => {
    const bucket: string[] = [];

    for (const hit of hitsPerQuery[qi]) {
      const dedupKey = normalizeUrl(hit.url);
      if (!dedupKey) continue;

      let record = recordsByKey.get(dedupKey)
        ?? ordered.find(r => snippetSimilarity(r.snippet, hit.snippet) >= config.search.dedupSimilarity);

      if (!record) {
        record = Object.freeze({
          id: `S${ordered.length + 1}`,
          query,
          url: hit.url.trim(),
          title: hit.title.trim() || dedupKey,
          snippet: hit.snippet.trim(),
          retrievedAt,
          ...(hit.date ? { publishedAt: hit.date } : {}),
          dedupKey,
        });
        ordered.push(record);
        recordsByKey.set(dedupKey, record);
        corpus.records[record.id] = record;
      }

      if (!bucket.includes(record.id)) bucket.push(record.id);
    }

    corpus.buckets[query] = bucket;
    if (bucket.length === 0) {
      console.error(`[Research] WARNING: no usable results for "${query}"`);
    }
  });

  console.error(`[Research] Corpus: ${ordered.length} records across ${queries.length} buckets`);
  return corpus;
}

/**
 * Search one query with retries. An error or an empty usable result set both count as failure;
 * after the last retry the bucket is simply empty.
 */
async function fetchBucketHits(
  query: string,
  search: SearchCapability,
  config: PipelineConfig,
  signal?: AbortSignal
): Promise<SearchHit[]> {
  const { resultCap, minSnippetLength, maxRetries, baseDelayMs } = config.search;

  try {
    return await withRetry(async () => {
      const hits = await search.search(query, resultCap, signal);
      const usable = hits
        .slice(0, resultCap)
        .filter(h => h.snippet.trim().length >= minSnippetLength && normalizeUrl(h.url) !== null);
      if (usable.length === 0) {
        throw new CapabilityError(`No usable results for "${query}"`, 'search');
      }
      return usable;
    }, { maxRetries, baseDelayMs, signal, tag: '[Research]', operation: `Search "${query}"` });
  } catch (error) {
    if (error instanceof CancelledError) throw error;
    return [];
  }
}

/**
 * Records a section may cite: its own bucket, the topic bucket and, for body
 * sections, the focus-area buckets, interleaved and capped.
 */
export function corpusSlice(
  corpus: ResearchCorpus,
  plan: ResearchQueryPlan,
  node: OutlineNode,
  maxRecords: number
): ResearchRecord[] {
  const bucketQueries: string[] = [];
  const own = plan.sectionQueries[node.id];
  if (own) bucketQueries.push(own);
  bucketQueries.push(plan.topicQuery);
  if (FOCUS_ROLES.includes(node.role)) bucketQueries.push(...plan.focusQueries);

  const buckets = bucketQueries.map(q => corpus.buckets[q] ?? []);
  const ids: string[] = [];
  const longest = Math.max(0, ...buckets.map(b => b.length));

  for (let i = 0; i < longest && ids.length < maxRecords; i++) {
    for (const bucket of buckets) {
      const id = bucket[i];
      if (id !== undefined && !ids.includes(id) && ids.length < maxRecords) ids.push(id);
    }
  }

  return ids.map(id => corpus.records[id]).filter((r): r is ResearchRecord => r !== undefined);
}
