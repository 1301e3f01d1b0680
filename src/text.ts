/**
 * Plain-text helpers shared by drafting, scoring and assembly
 */

const MARKDOWN_HEADING = /^#{1,6}\s+.*$/gm;
// Word bounds are products like 100 * 1.15, which is 114.99999999999999 in binary floating point
export const FLOAT_SLACK = 1e-9;

const CITATION_MARKER = /\[(?:S\d+(?:\s*[,;]\s*S\d+)*|citation needed)\]/g;

/**
 * Strip headings and citation markers so only prose is measured
 */
export function proseOnly(text: string): string {
  return text.replace(MARKDOWN_HEADING, ' ').replace(CITATION_MARKER, ' ');
}

/**
 * Whitespace-delimited word count
 */
export function countWords(text: string): number {
  return text.split(/\s+/).filter(w => w.length > 0).length;
}

/**
 * Lower-cased alphanumeric tokens (apostrophes kept inside words)
 */
export function wordTokens(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9'\s-]/g, ' ')
    .split(/[\s-]+/)
    .map(w => w.replace(/^'+|'+$/g, ''))
    .filter(w => w.length > 0);
}

/**
 * Split prose into sentences on terminal punctuation followed by whitespace
 */
export function splitSentences(text: string): string[] {
  return text
    .replace(/\s+/g, ' ')
    .trim()
    .split(/(?<=[.!?])\s+/)
    .map(s => s.trim())
    .filter(s => wordTokens(s).length > 0);
}

export function countParagraphs(text: string): number {
  return text.split(/\n\s*\n/).filter(p => p.trim().length > 0).length;
}

/**
 * Heuristic English syllable count: vowel groups, minus a silent trailing "e", at least 1
 */
export function countSyllables(word: string): number {
  const w = word.toLowerCase().replace(/[^a-z]/g, '');
  if (w.length === 0) return 0;
  if (w.length <= 3) return 1;

  const trimmed = w.replace(/(?:[^laeiouy]es|[^laeiouy]ed|[^laeiouy]e)$/, '').replace(/^y/, '');
  const groups = trimmed.match(/[aeiouy]{1,2}/g);
  return Math.max(1, groups ? groups.length : 0);
}

/**
 * Contiguous word n-grams joined by a single space
 */
export function ngrams(tokens: string[], n: number): string[] {
  const out: string[] = [];
  for (let i = 0; i + n <= tokens.length; i++) {
    out.push(tokens.slice(i, i + n).join(' '));
  }
  return out;
}

/**
 * Cut text at the last sentence boundary that keeps it within maxWords.
 * Falls back to a hard word cut when the first sentence is already too long.
 */
export function truncateToWords(text: string, maxWords: number): string {
  if (countWords(text) <= maxWords) return text;

  const paragraphs = text.split(/\n\s*\n/);
  const kept: string[] = [];
  let used = 0;

  for (const paragraph of paragraphs) {
    const sentences = paragraph.trim().split(/(?<=[.!?])\s+/);
    const keptSentences: string[] = [];
    for (const sentence of sentences) {
      const words = countWords(sentence);
      if (used + words > maxWords) break;
      keptSentences.push(sentence);
      used += words;
    }
    if (keptSentences.length > 0) kept.push(keptSentences.join(' '));
    if (keptSentences.length < sentences.length) break;
  }

  if (kept.length === 0) {
    return text.split(/\s+/).filter(w => w.length > 0).slice(0, maxWords).join(' ');
  }
  return kept.join('\n\n');
}

/**
 * Last `words` words of a text, for continuation prompts
 */
export function tailWords(text: string, words: number): string {
  const all = text.split(/\s+/).filter(w => w.length > 0);
  return all.slice(Math.max(0, all.length - words)).join(' ');
}
