/**
 * Document Assembler
 *
 * Validates that every section settled, renders citations, and lays the
 * document out as markdown. All-or-nothing: any validation issue throws
 * AssemblyError and no document is produced.
 */

import { applyCitations, formatBibliography, hasMarkers } from './citations.js';
import type { PipelineConfig } from './config.js';
import { AssemblyError } from './errors.js';
import { headingAnchor } from './sectioning.js';
import { FLOAT_SLACK, countParagraphs, countWords, proseOnly, splitSentences } from './text.js';
import type {
  AssembledSection,
  CitationTable,
  Document,
  DocumentStats,
  GenerationRequest,
  OutlineNode,
  SectionDraft,
} from './types/index.js';

const NO_SOURCES = 'No sources were cited.';

export interface AssembleParams {
  request: GenerationRequest;
  outline: readonly OutlineNode[];
  drafts: ReadonlyMap<string, SectionDraft>;
  citations: CitationTable;
  config: PipelineConfig;
  generatedAt?: Date;
}

/**
 * @throws AssemblyError listing every problem found
 */
export function assembleDocument({ request, outline, drafts, citations, config, generatedAt = new Date() }: AssembleParams): Document {
  const issues: string[] = [];

  const missing = outline
    .filter(node => node.drafted)
    .filter(node => {
      const draft = drafts.get(node.id);
      return !draft || draft.status === 'drafted';
    })
    .map(node => node.id);
  if (missing.length > 0) {
    issues.push(`Sections without a settled draft: ${missing.join(', ')}`);
  }

  const seenTitles = new Set<string>();
  for (const node of outline) {
    const key = node.title.trim().toLowerCase();
    if (seenTitles.has(key)) issues.push(`Duplicate section title: "${node.title}"`);
    seenTitles.add(key);
  }

  if (issues.length > 0) fail(issues);

  const bibliography = formatBibliography(citations);
  const sections: AssembledSection[] = [];

  for (const node of outline) {
    const draft = drafts.get(node.id);
    const text = node.drafted && draft
      ? applyCitations(draft.text, citations)
      : bibliography || NO_SOURCES;

    if (hasMarkers(text)) {
      issues.push(`Unrendered citation markers in "${node.title}"`);
    }

    sections.push(Object.freeze({
      id: node.id,
      title: node.title,
      role: node.role,
      ordinal: node.ordinal,
      text,
      wordCount: countWords(text),
      wordBudget: node.wordBudget,
      score: draft ? draft.score : null,
      attempts: draft ? draft.attempts : 0,
      qualityShortfall: draft ? draft.qualityShortfall : false,
    }));
  }

  const wordCount = sections.reduce((sum, s) => sum + s.wordCount, 0);
  const tolerance = config.wordCountTolerance;
  const minWords = Math.ceil(request.targetWordCount * (1 - tolerance) - FLOAT_SLACK);
  const maxWords = Math.floor(request.targetWordCount * (1 + tolerance) + FLOAT_SLACK);
  if (wordCount < minWords || wordCount > maxWords) {
    issues.push(`Word count ${wordCount} is outside ${minWords}-${maxWords} for a target of ${request.targetWordCount}`);
  }

  if (issues.length > 0) fail(issues);

  const hasReferencesSection = outline.some(node => node.role === 'references');
  const tableOfContents = sections.map(s => s.title);
  if (!hasReferencesSection && citations.entries.length > 0) tableOfContents.push('References');

  const qualityShortfalls = sections.filter(s => s.qualityShortfall).map(s => s.id);
  const markdown = renderMarkdown({
    request,
    sections,
    tableOfContents,
    trailingReferences: hasReferencesSection ? null : bibliography || null,
    wordCount,
    generatedAt,
  });

  console.error(`[Assemble] ${sections.length} sections, ${wordCount} words, ${citations.entries.length} sources`);

  return Object.freeze({
    request,
    title: request.topic,
    sections: Object.freeze(sections),
    citations: Object.freeze([...citations.entries]),
    bibliography,
    tableOfContents: Object.freeze(tableOfContents),
    markdown,
    wordCount,
    qualityShortfalls: Object.freeze(qualityShortfalls),
    unresolvedMarkers: Object.freeze([...citations.unresolved]),
    stats: documentStats(sections),
    generatedAt: generatedAt.toISOString(),
  });
}

function fail(issues: string[]): never {
  console.error(`[Assemble] Assembly failed: ${issues.join('; ')}`);
  throw new AssemblyError(`Document assembly failed: ${issues.join('; ')}`, issues);
}

interface RenderInput {
  request: GenerationRequest;
  sections: readonly AssembledSection[];
  tableOfContents: readonly string[];
  trailingReferences: string | null;
  wordCount: number;
  generatedAt: Date;
}

function renderMarkdown({ request, sections, tableOfContents, trailingReferences, wordCount, generatedAt }: RenderInput): string {
  const parts: string[] = [];

  parts.push(`# ${request.topic}\n`);
  parts.push(`**Document type:** ${request.documentType}  `);
  parts.push(`**Academic level:** ${request.academicLevel}  `);
  if (request.focusAreas.length > 0) {
    parts.push(`**Focus areas:** ${request.focusAreas.join(', ')}  `);
  }
  parts.push(`**Word count:** ${wordCount}  `);
  parts.push(`**Generated:** ${generatedAt.toISOString().slice(0, 10)}\n`);

  parts.push('## Table of Contents\n');
  tableOfContents.forEach((title, i) => {
    parts.push(`${i + 1}. [${title}](#${headingAnchor(title)})`);
  });
  parts.push('');

  for (const section of sections) {
    parts.push(`## ${section.title}\n`);
    parts.push(`${section.text}\n`);
  }

  if (trailingReferences) {
    parts.push('## References\n');
    parts.push(`${trailingReferences}\n`);
  }

  return parts.join('\n');
}

function documentStats(sections: readonly AssembledSection[]): DocumentStats {
  const body = sections.filter(s => s.role !== 'references');
  return {
    words: sections.reduce((sum, s) => sum + s.wordCount, 0),
    sentences: body.reduce((sum, s) => sum + splitSentences(proseOnly(s.text)).length, 0),
    paragraphs: body.reduce((sum, s) => sum + countParagraphs(s.text), 0),
  };
}
