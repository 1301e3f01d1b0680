/**
 * Humanization Refiner
 *
 * Per-section loop: score → accept, or rewrite the failing dimensions and score
 * again, until the score clears the acceptance threshold or the attempt budget
 * runs out. The best attempt seen is what survives; ties keep the earlier text.
 *
 *   Drafted ──score≥accept──▶ Accepted
 *      │                         ▲
 *      └─▶ Rewriting ──score≥accept┘
 *              │
 *              └─attempts spent / rewrite failed──▶ Exhausted (best attempt)
 *
 * Rewrites get the drafter's length handling: over the band they are truncated,
 * under it they use up an attempt but are never kept.
 *
 * An exhausted section whose best score is still below the hard-failure floor
 * raises QualityRejectedError instead of returning.
 */

import { tokensForWords, type GenerationCapability } from './capabilities.js';
import { extractMarkerIds } from './citations.js';
import type { PipelineConfig } from './config.js';
import { DRAFTING_SYSTEM_PROMPT, lengthBand, stripLeadingHeading } from './drafting.js';
import { CancelledError, QualityRejectedError, CapabilityError, errorMessage } from './errors.js';
import { buildRewritePrompt } from './prompts.js';
import { throwIfAborted, withRetry } from './retry.js';
import { scoreSection, type SectionScorer } from './scoring.js';
import { countWords, truncateToWords } from './text.js';
import type {
  GenerationRequest,
  OutlineNode,
  ResearchRecord,
  ScoreBreakdown,
  SectionDraft,
} from './types/index.js';

export interface RefineSectionParams {
  draft: SectionDraft;
  node: OutlineNode;
  request: GenerationRequest;
  slice: readonly ResearchRecord[];
  config: PipelineConfig;
  generator: GenerationCapability;
  scorer?: SectionScorer;
  signal?: AbortSignal;
}

interface Attempt {
  text: string;
  score: ScoreBreakdown;
}

/**
 * Refine one drafted section to a terminal state (accepted or exhausted)
 * @throws QualityRejectedError when the best attempt stays below the hard-failure floor
 * @throws CancelledError when the signal aborts
 */
export async function refineSection({
  draft,
  node,
  request,
  slice,
  config,
  generator,
  scorer = scoreSection,
  signal,
}: RefineSectionParams): Promise<SectionDraft> {
  const { acceptanceThreshold, hardFailureThreshold, maxAttempts } = config.humanization;
  const context = {
    academicLevel: request.academicLevel,
    snippets: slice.map(r => r.snippet),
    humanization: config.humanization,
  };

  const band = lengthBand(node.wordBudget, config.drafting.lengthTolerance);

  throwIfAborted(signal);
  let current: Attempt = { text: draft.text, score: scorer(draft.text, context) };
  let best = current;
  let attempts = 1;
  console.error(`[Humanize] ${node.id}: attempt 1 scored ${current.score.composite.toFixed(3)}`);

  while (best.score.composite < acceptanceThreshold && attempts < maxAttempts) {
    let rewritten: string;
    try {
      rewritten = await rewrite(current, node, request, config, generator, signal);
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      console.error(`[Humanize] ${node.id}: rewrite failed, keeping best attempt: ${errorMessage(error)}`);
      break;
    }

    attempts++;
    const words = countWords(rewritten);
    if (words < band.min) {
      console.error(`[Humanize] ${node.id}: attempt ${attempts} discarded, ${words} words is under ${band.min}`);
      continue;
    }
    if (words > band.max) rewritten = truncateToWords(rewritten, band.max);

    current = { text: rewritten, score: scorer(rewritten, context) };
    console.error(`[Humanize] ${node.id}: attempt ${attempts} scored ${current.score.composite.toFixed(3)}`);
    if (current.score.composite > best.score.composite) best = current;
  }

  const accepted = best.score.composite >= acceptanceThreshold;
  if (!accepted && best.score.composite < hardFailureThreshold) {
    throw new QualityRejectedError(
      node.id,
      best.score.composite,
      `Section "${node.title}" scored ${best.score.composite.toFixed(3)} after ${attempts} attempt(s), below the hard-failure threshold of ${hardFailureThreshold}`
    );
  }

  if (!accepted) {
    console.error(`[Humanize] ${node.id}: exhausted at ${best.score.composite.toFixed(3)} (threshold ${acceptanceThreshold})`);
  }

  const sliceIds = new Set(slice.map(r => r.id));
  const citedRecordIds = Object.freeze(extractMarkerIds(best.text).filter(id => sliceIds.has(id)));

  return Object.freeze({
    ...draft,
    text: best.text,
    citedRecordIds,
    score: best.score.composite,
    subScores: best.score,
    attempts,
    status: accepted ? 'accepted' : 'exhausted',
    qualityShortfall: !accepted,
  });
}

async function rewrite(
  current: Attempt,
  node: OutlineNode,
  request: GenerationRequest,
  config: PipelineConfig,
  generator: GenerationCapability,
  signal?: AbortSignal
): Promise<string> {
  const prompt = buildRewritePrompt(request, node, current.text, current.score, node.wordBudget);
  const { maxRetries, baseDelayMs, temperature } = config.drafting;

  return withRetry(async () => {
    const output = await generator.generate(prompt, {
      targetWords: node.wordBudget,
      maxOutputTokens: tokensForWords(node.wordBudget),
      temperature,
      system: DRAFTING_SYSTEM_PROMPT,
    }, signal);
    const text = stripLeadingHeading(output, node.title);
    if (!text) throw new CapabilityError(`Empty rewrite for "${node.title}"`, 'generation');
    return text;
  }, { maxRetries, baseDelayMs, signal, tag: '[Humanize]', operation: `Rewrite "${node.title}"` });
}
