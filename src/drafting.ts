/**
 * Section Drafter
 *
 * One generation call per part (long sections are split), then length
 * correction: truncate at a sentence boundary when over the band, ask for a
 * continuation when under it.
 */

import { tokensForWords, type GenerationCapability } from './capabilities.js';
import { extractMarkerIds } from './citations.js';
import type { PipelineConfig } from './config.js';
import { CancelledError, CapabilityError, DraftFailedError, errorMessage } from './errors.js';
import { allocateBudgets } from './outline.js';
import { buildContinuationPrompt, buildDraftPrompt } from './prompts.js';
import { withRetry } from './retry.js';
import { FLOAT_SLACK, countWords, tailWords, truncateToWords } from './text.js';
import type { GenerationRequest, OutlineNode, ResearchRecord, SectionDraft } from './types/index.js';

export const DRAFTING_SYSTEM_PROMPT =
  'You are an expert academic writer who produces original, well-cited scholarly prose that reads naturally.';

// Words of prior text handed to the next part
const CONTEXT_TAIL_WORDS = 150;

export interface DraftSectionParams {
  node: OutlineNode;
  request: GenerationRequest;
  slice: readonly ResearchRecord[];
  config: PipelineConfig;
  generator: GenerationCapability;
  signal?: AbortSignal;
}

/**
 * Lower and upper word bounds for a budget
 */
export function lengthBand(budget: number, tolerance: number): { min: number; max: number } {
  return {
    min: Math.ceil(budget * (1 - tolerance) - FLOAT_SLACK),
    max: Math.floor(budget * (1 + tolerance) + FLOAT_SLACK),
  };
}

/**
 * Draft one section
 * @throws DraftFailedError when a generation call fails after its retries
 * @throws CancelledError when the signal aborts
 */
export async function draftSection({ node, request, slice, config, generator, signal }: DraftSectionParams): Promise<SectionDraft> {
  const { maxWordsPerCall, maxExtensions, lengthTolerance } = config.drafting;
  const budget = node.wordBudget;
  const parts = Math.max(1, Math.ceil(budget / maxWordsPerCall));
  const partBudgets = parts === 1 ? [budget] : allocateBudgets(budget, new Array<number>(parts).fill(1));

  console.error(`[Draft] ${node.id}: ${budget} words in ${parts} part(s), ${slice.length} sources`);

  let text = '';
  for (let i = 0; i < parts; i++) {
    const prompt = buildDraftPrompt({
      request,
      node,
      slice,
      targetWords: partBudgets[i],
      part: { index: i + 1, total: parts, previousTail: tailWords(text, CONTEXT_TAIL_WORDS) },
    });
    const chunk = await generate(prompt, partBudgets[i], node, config, generator, signal, `part ${i + 1}/${parts}`);
    text = joinParagraphs(text, chunk);
  }

  const band = lengthBand(budget, lengthTolerance);
  let extensions = 0;
  while (countWords(text) < band.min && extensions < maxExtensions) {
    const missing = budget - countWords(text);
    extensions++;
    console.error(`[Draft] ${node.id}: ${countWords(text)} words is under ${band.min}, extending by ~${missing}`);
    const prompt = buildContinuationPrompt(request, node, slice, text, missing);
    text = joinParagraphs(text, await generate(prompt, missing, node, config, generator, signal, `extension ${extensions}`));
  }

  if (countWords(text) > band.max) {
    console.error(`[Draft] ${node.id}: ${countWords(text)} words is over ${band.max}, truncating`);
    text = truncateToWords(text, band.max);
  }

  const sliceIds = new Set(slice.map(r => r.id));
  const citedRecordIds = extractMarkerIds(text).filter(id => sliceIds.has(id));

  console.error(`[Draft] ${node.id}: drafted ${countWords(text)} words citing ${citedRecordIds.length} sources`);

  return {
    sectionId: node.id,
    text,
    score: 0,
    attempts: 0,
    citedRecordIds,
    status: 'drafted',
    qualityShortfall: false,
  };
}

async function generate(
  prompt: string,
  targetWords: number,
  node: OutlineNode,
  config: PipelineConfig,
  generator: GenerationCapability,
  signal: AbortSignal | undefined,
  label: string
): Promise<string> {
  const { maxRetries, baseDelayMs, temperature } = config.drafting;

  try {
    return await withRetry(async () => {
      const output = await generator.generate(prompt, {
        targetWords,
        maxOutputTokens: tokensForWords(targetWords),
        temperature,
        system: DRAFTING_SYSTEM_PROMPT,
      }, signal);
      const text = stripLeadingHeading(output, node.title);
      if (!text) throw new CapabilityError(`Empty draft for "${node.title}"`, 'generation');
      return text;
    }, { maxRetries, baseDelayMs, signal, tag: '[Draft]', operation: `${node.id} ${label}` });
  } catch (error) {
    if (error instanceof CancelledError) throw error;
    throw new DraftFailedError(node.id, `Drafting "${node.title}" failed: ${errorMessage(error)}`, error);
  }
}

/**
 * Models often repeat the section title as a heading; the assembler adds its own
 */
export function stripLeadingHeading(output: string, title: string): string {
  const lines = output.trim().split('\n');
  const first = lines[0].trim();
  const bare = first.replace(/^#{1,6}\s+/, '').replace(/^\*\*|\*\*$/g, '').replace(/:$/, '').trim();
  if (/^#{1,6}\s+/.test(first) || bare.toLowerCase() === title.toLowerCase()) {
    return lines.slice(1).join('\n').trim();
  }
  return output.trim();
}

function joinParagraphs(text: string, addition: string): string {
  if (!text) return addition;
  return `${text}\n\n${addition}`;
}
