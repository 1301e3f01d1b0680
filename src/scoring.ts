/**
 * Human-likeness scoring
 *
 * Three deterministic signals combined into one composite in [0, 1]:
 * - readability: Flesch-Kincaid grade against the band expected for the academic level
 * - burstiness: variation in sentence length, penalised by repeated phrasing
 * - originality: word 5-gram overlap with the research snippets
 *
 * Weights and thresholds are tunable; nothing downstream depends on their exact values.
 */

import type { PipelineConfig } from './config.js';
import { countSyllables, ngrams, proseOnly, splitSentences, wordTokens } from './text.js';
import type { AcademicLevel, ScoreBreakdown, ScoreDimension } from './types/index.js';

export const GRADE_BANDS: Record<AcademicLevel, { min: number; max: number }> = {
  Undergraduate: { min: 10, max: 15 },
  Masters: { min: 12, max: 17 },
  PhD: { min: 14, max: 20 },
};

// Grades outside the band lose 1/6 of the readability score per grade
const GRADE_FALLOFF = 6;

const ORIGINALITY_NGRAM = 5;

const DIMENSIONS: readonly ScoreDimension[] = ['readability', 'burstiness', 'originality'];

export interface ScoringContext {
  academicLevel: AcademicLevel;
  /** Research snippets the section had access to */
  snippets: readonly string[];
  humanization: PipelineConfig['humanization'];
}

export type SectionScorer = (text: string, context: ScoringContext) => ScoreBreakdown;

/**
 * Flesch-Kincaid grade level; 0 for text without words
 */
export function fleschKincaidGrade(text: string): number {
  const sentences = splitSentences(text);
  const words = wordTokens(text);
  if (words.length === 0 || sentences.length === 0) return 0;

  const syllables = words.reduce((sum, w) => sum + countSyllables(w), 0);
  return 0.39 * (words.length / sentences.length) + 11.8 * (syllables / words.length) - 15.59;
}

export function readabilityScore(grade: number, level: AcademicLevel): number {
  const band = GRADE_BANDS[level];
  if (grade >= band.min && grade <= band.max) return 1;
  const distance = grade < band.min ? band.min - grade : grade - band.max;
  return clamp01(1 - distance / GRADE_FALLOFF);
}

/**
 * Coefficient of variation of sentence lengths (population standard deviation / mean)
 */
export function sentenceLengthVariation(sentences: string[]): number {
  const lengths = sentences.map(s => wordTokens(s).length);
  if (lengths.length === 0) return 0;
  const mean = lengths.reduce((a, b) => a + b, 0) / lengths.length;
  if (mean === 0) return 0;
  const variance = lengths.reduce((sum, l) => sum + (l - mean) ** 2, 0) / lengths.length;
  return Math.sqrt(variance) / mean;
}

/**
 * Share of word trigrams that repeat an earlier trigram
 */
export function repeatedTrigramRatio(tokens: string[]): number {
  const trigrams = ngrams(tokens, 3);
  if (trigrams.length === 0) return 0;
  return (trigrams.length - new Set(trigrams).size) / trigrams.length;
}

export function burstinessScore(variation: number, repeatedRatio: number, sentenceCount: number, targetVariation: number): number {
  if (sentenceCount < 3) return 0;
  return clamp01(Math.min(1, variation / targetVariation) - 2 * repeatedRatio);
}

/**
 * Share of the text's 5-grams that also occur in the research snippets
 */
export function corpusOverlap(tokens: string[], snippets: readonly string[]): number {
  const textGrams = ngrams(tokens, ORIGINALITY_NGRAM);
  if (textGrams.length === 0 || snippets.length === 0) return 0;

  const sourceGrams = new Set<string>();
  for (const snippet of snippets) {
    for (const gram of ngrams(wordTokens(snippet), ORIGINALITY_NGRAM)) sourceGrams.add(gram);
  }

  const copied = textGrams.filter(g => sourceGrams.has(g)).length;
  return copied / textGrams.length;
}

export function originalityScore(overlap: number, maxOverlap: number): number {
  if (overlap <= maxOverlap) return 1;
  return clamp01(1 - (overlap - maxOverlap) / (1 - maxOverlap));
}

/**
 * Default scorer
 */
export const scoreSection: SectionScorer = (text, { academicLevel, snippets, humanization }) => {
  const prose = proseOnly(text);
  const sentences = splitSentences(prose);
  const tokens = wordTokens(prose);

  const gradeLevel = fleschKincaidGrade(prose);
  const sentenceVariation = sentenceLengthVariation(sentences);
  const repeated = repeatedTrigramRatio(tokens);
  const overlap = corpusOverlap(tokens, snippets);

  const readability = readabilityScore(gradeLevel, academicLevel);
  const burstiness = burstinessScore(sentenceVariation, repeated, sentences.length, humanization.targetVariation);
  const originality = originalityScore(overlap, humanization.maxOverlap);

  const { weights, dimensionFloor } = humanization;
  const totalWeight = weights.readability + weights.burstiness + weights.originality;
  const composite =
    (weights.readability * readability + weights.burstiness * burstiness + weights.originality * originality) / totalWeight;

  const subScores: Record<ScoreDimension, number> = { readability, burstiness, originality };
  const failedDimensions = DIMENSIONS.filter(d => subScores[d] < dimensionFloor);

  return {
    composite,
    readability,
    burstiness,
    originality,
    failedDimensions,
    gradeLevel,
    sentenceVariation,
    repeatedTrigramRatio: repeated,
    corpusOverlap: overlap,
  };
};

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}
