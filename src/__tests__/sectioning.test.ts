import { describe, it, expect } from 'vitest';
import { assembleDocument } from '../assembler.js';
import { buildCitationTable } from '../citations.js';
import { resolveConfig } from '../config.js';
import { parseGenerationRequest } from '../request.js';
import { formatCondensedView, formatSectionView, headingAnchor, normalizeSectionId } from '../sectioning.js';
import { makeDraft, makeNode, proseOfLength } from './helpers/fakes.js';

describe('normalizeSectionId', () => {
  it('turns titles into snake_case ids', () => {
    expect(normalizeSectionId('Literature Review')).toBe('literature_review');
    expect(normalizeSectionId('Research Questions and Objectives')).toBe('research_questions_and_objectives');
    expect(normalizeSectionId('Results & Discussion')).toBe('results_discussion');
  });
});

describe('headingAnchor', () => {
  it('follows markdown anchor rules', () => {
    expect(headingAnchor('Table of Contents')).toBe('table-of-contents');
    expect(headingAnchor('Results & Discussion')).toBe('results--discussion');
  });
});

describe('document views', () => {
  const request = parseGenerationRequest({
    topic: 'Grid storage',
    documentType: 'Thesis',
    academicLevel: 'PhD',
    targetWordCount: 200,
  });
  const outline = [
    makeNode({ ordinal: 0 }),
    makeNode({ id: 'conclusion', title: 'Conclusion', role: 'conclusion', ordinal: 1 }),
  ];
  const drafts = new Map([
    ['introduction', makeDraft('introduction', proseOfLength(100), { score: 0.8123, attempts: 2 })],
    ['conclusion', makeDraft('conclusion', proseOfLength(100), { status: 'exhausted', score: 0.55, attempts: 3, qualityShortfall: true })],
  ]);
  const citations = buildCitationTable([], { queries: [], buckets: {}, records: {} }, 'apa');
  const document = assembleDocument({ request, outline, drafts, citations, config: resolveConfig() });

  it('summarises the document with one entry per section', () => {
    const view = formatCondensedView('doc-1-abc', document);

    expect(view.startsWith('# Grid storage\n')).toBe(true);
    expect(view).toContain('**Words:** 200 of 200 targeted');
    expect(view).toContain('**Quality shortfall:** conclusion (returned with their best attempt)');
    expect(view).toContain('- **Score:** 0.81 after 2 attempt(s)');
    expect(view).toContain('- **Score:** 0.55 after 3 attempt(s) - shortfall');
    expect(view).toContain('`read_document_section(job_id="doc-1-abc", section_id="conclusion")`');
  });

  it('renders one section with its heading', () => {
    const view = formatSectionView('doc-1-abc', document.sections[1]);

    expect(view.split('\n').slice(0, 3)).toEqual(['# Conclusion', '', '**Job:** doc-1-abc']);
    expect(view.endsWith(proseOfLength(100))).toBe(true);
  });
});
