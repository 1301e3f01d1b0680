/**
 * Document generation pipeline
 *
 * Flow: validate request → plan outline → gather research (once, shared) →
 * draft + refine every section in the worker pool → build citations → assemble.
 *
 * A section that fails (DraftFailed / QualityRejected) aborts its siblings; the
 * failure of the earliest section in outline order is what surfaces.
 */

import { assembleDocument } from './assembler.js';
import { buildCitationTable } from './citations.js';
import type { GenerationCapability, SearchCapability } from './capabilities.js';
import { DEFAULT_CONFIG, type PipelineConfig } from './config.js';
import { draftSection } from './drafting.js';
import { CancelledError, errorMessage, sectionIdOf } from './errors.js';
import { refineSection } from './humanizer.js';
import { loadSectionTemplates, planOutline, type SectionTemplates } from './outline.js';
import { parseGenerationRequest } from './request.js';
import { buildResearchCorpus, corpusSlice, planResearchQueries, type ResearchQueryPlan } from './research.js';
import { throwIfAborted } from './retry.js';
import type { SectionScorer } from './scoring.js';
import type {
  Document,
  GenerationRequest,
  OnProgressCallback,
  OutlineNode,
  ResearchCorpus,
  SectionDraft,
} from './types/index.js';
import { WorkerPool } from './worker-pool.js';

const TOTAL_STEPS = 5;

export interface PipelineDeps {
  search: SearchCapability;
  generator: GenerationCapability;
  config?: PipelineConfig;
  scorer?: SectionScorer;
  templates?: SectionTemplates;
}

export interface GenerateOptions {
  signal?: AbortSignal;
  onProgress?: OnProgressCallback;
}

export interface PipelineResult {
  document: Document;
  corpus: ResearchCorpus;
}

export class DocumentPipeline {
  private readonly config: PipelineConfig;

  constructor(private readonly deps: PipelineDeps) {
    this.config = deps.config ?? DEFAULT_CONFIG;
  }

  /**
   * Generate a document and return it with the research it was built from
   * @throws InvalidRequestError, DraftFailedError, QualityRejectedError, AssemblyError or CancelledError
   */
  async run(input: unknown, { signal, onProgress }: GenerateOptions = {}): Promise<PipelineResult> {
    const { config } = this;
    const request = parseGenerationRequest(input);
    const progress = (stepNumber: number, currentStep: string, note?: string): void => {
      onProgress?.({ currentStep, stepNumber, totalSteps: TOTAL_STEPS, ...(note ? { note } : {}) });
    };

    console.error(`[Pipeline] ${request.documentType}/${request.academicLevel}, ${request.targetWordCount} words: "${request.topic}"`);

    progress(1, 'Planning outline');
    const outline = planOutline(request, config, this.deps.templates ?? loadSectionTemplates());
    const plan = planResearchQueries(request, outline);
    throwIfAborted(signal);

    // One pool bounds every capability call made for this request
    const pool = new WorkerPool(config.workerPoolSize);

    progress(2, 'Gathering research');
    const corpus = await buildResearchCorpus({ plan, search: this.deps.search, config, pool, signal });

    progress(3, 'Drafting sections');
    const drafts = await this.draftAll({ request, outline, plan, corpus, pool, signal, progress });

    progress(4, 'Building citations');
    const orderedDrafts = outline.flatMap(node => {
      const draft = drafts.get(node.id);
      return draft ? [draft] : [];
    });
    const citations = buildCitationTable(orderedDrafts, corpus, request.citationStyle ?? config.citationStyle);

    progress(5, 'Assembling document');
    const document = assembleDocument({ request, outline, drafts, citations, config });

    console.error(`[Pipeline] Done: ${document.wordCount} words, ${document.citations.length} sources, ${document.qualityShortfalls.length} shortfall(s)`);
    return { document, corpus };
  }

  async generateDocument(input: unknown, options: GenerateOptions = {}): Promise<Document> {
    const { document } = await this.run(input, options);
    return document;
  }

  private async draftAll(params: {
    request: GenerationRequest;
    outline: readonly OutlineNode[];
    plan: ResearchQueryPlan;
    corpus: ResearchCorpus;
    pool: WorkerPool;
    signal?: AbortSignal;
    progress: (step: number, name: string, note?: string) => void;
  }): Promise<Map<string, SectionDraft>> {
    const { request, outline, plan, corpus, pool, signal, progress } = params;
    const { config, deps } = this;
    const sections = outline.filter(node => node.drafted);

    // Aborted by the caller or by the first failing section
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    const drafts = new Map<string, SectionDraft>();
    const failures = new Map<number, unknown>();
    let settled = 0;

    try {
      await Promise.all(sections.map(node =>
        pool.run(async taskSignal => {
          const slice = corpusSlice(corpus, plan, node, config.search.maxRecordsPerSection);
          const draft = await draftSection({ node, request, slice, config, generator: deps.generator, signal: taskSignal });
          const refined = await refineSection({
            draft,
            node,
            request,
            slice,
            config,
            generator: deps.generator,
            scorer: deps.scorer,
            signal: taskSignal,
          });
          drafts.set(node.id, refined);
          settled++;
          progress(3, 'Drafting sections', `${settled}/${sections.length} sections settled`);
        }, controller.signal).catch((error: unknown) => {
          // Cancellations that follow an abort are a consequence, not a cause
          if (error instanceof CancelledError && controller.signal.aborted) return;
          console.error(`[Pipeline] Section ${sectionIdOf(error) ?? node.id} failed: ${errorMessage(error)}`);
          failures.set(node.ordinal, error);
          controller.abort();
        })
      ));
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }

    if (signal?.aborted) throw new CancelledError();

    if (failures.size > 0) {
      const earliest = Math.min(...failures.keys());
      throw failures.get(earliest);
    }

    return drafts;
  }
}

/**
 * Generate one document with the given capabilities
 */
export async function generateDocument(input: unknown, deps: PipelineDeps, options: GenerateOptions = {}): Promise<Document> {
  return new DocumentPipeline(deps).generateDocument(input, options);
}
