/**
 * Citation Manager
 *
 * Drafts cite research records with inline markers such as [S3] or [S1, S4].
 * The table numbers sources by first appearance across the document and
 * renders them in one of the supported styles; markers pointing at records
 * that do not exist become a neutral [citation needed] flag.
 */

import type { CitationEntry, CitationStyle, CitationTable, ResearchCorpus, ResearchRecord } from './types/index.js';

const MARKER_PATTERN = /\[(S\d+(?:\s*[,;]\s*S\d+)*)\]/g;

export const CITATION_NEEDED = '[citation needed]';

/**
 * Source ids referenced by the markers in a text, first appearance first
 */
export function extractMarkerIds(text: string): string[] {
  const ids: string[] = [];
  for (const match of text.matchAll(MARKER_PATTERN)) {
    for (const id of match[1].split(/\s*[,;]\s*/)) {
      if (!ids.includes(id)) ids.push(id);
    }
  }
  return ids;
}

export function hasMarkers(text: string): boolean {
  return new RegExp(MARKER_PATTERN.source).test(text);
}

/**
 * Build the citation table from section texts given in document order
 */
export function buildCitationTable(
  sections: ReadonlyArray<{ text: string }>,
  corpus: ResearchCorpus,
  style: CitationStyle
): CitationTable {
  const entries: CitationEntry[] = [];
  const unresolved: string[] = [];

  for (const section of sections) {
    for (const id of extractMarkerIds(section.text)) {
      const record = corpus.records[id];
      if (!record) {
        if (!unresolved.includes(id)) unresolved.push(id);
        continue;
      }
      if (entries.some(e => e.sourceId === id)) continue;

      const index = entries.length + 1;
      entries.push(Object.freeze({
        sourceId: id,
        index,
        inText: formatInText(record, index, style),
        bibliography: formatBibliographyEntry(record, index, style),
      }));
    }
  }

  if (unresolved.length > 0) {
    console.error(`[Assemble] ${unresolved.length} citation marker(s) point at unknown sources: ${unresolved.join(', ')}`);
  }

  return { style, entries, unresolved };
}

/**
 * Replace every marker in a text with its rendered in-text citation
 */
export function applyCitations(text: string, table: CitationTable): string {
  const byId = new Map(table.entries.map(e => [e.sourceId, e]));

  return text.replace(MARKER_PATTERN, (_match, group: string) => {
    const ids = [...new Set(group.split(/\s*[,;]\s*/))];
    const resolved = ids.flatMap(id => {
      const entry = byId.get(id);
      return entry ? [entry] : [];
    });
    if (resolved.length === 0) return CITATION_NEEDED;

    const rendered = renderGroup(resolved, table.style);
    return resolved.length < ids.length ? `${rendered} ${CITATION_NEEDED}` : rendered;
  });
}

/**
 * Bibliography in citation order
 */
export function formatBibliography(table: CitationTable): string {
  return table.entries.map(e => e.bibliography).join('\n\n');
}

function renderGroup(entries: CitationEntry[], style: CitationStyle): string {
  if (entries.length === 1) return entries[0].inText;
  if (style === 'ieee') return entries.map(e => e.inText).join(', ');
  // Parenthetical styles share one pair of parentheses
  return `(${entries.map(e => e.inText.replace(/^\(|\)$/g, '')).join('; ')})`;
}

export function formatInText(record: ResearchRecord, index: number, style: CitationStyle): string {
  const site = siteName(record);
  const year = publicationYear(record);

  switch (style) {
    case 'apa':
      return `(${site}, ${year})`;
    case 'harvard':
      return `(${site} ${year})`;
    case 'mla':
      return `("${shortTitle(record.title)}")`;
    case 'ieee':
      return `[${index}]`;
  }
}

export function formatBibliographyEntry(record: ResearchRecord, index: number, style: CitationStyle): string {
  const site = siteName(record);
  const year = publicationYear(record);
  const accessed = record.retrievedAt.slice(0, 10);

  switch (style) {
    case 'apa':
      return `${site}. (${year}). *${record.title}*. Retrieved ${accessed}, from ${record.url}`;
    case 'harvard':
      return `${site} (${year}) *${record.title}*. Available at: ${record.url} (Accessed: ${accessed}).`;
    case 'mla':
      return `"${record.title}." *${site}*, ${year}, ${record.url}. Accessed ${accessed}.`;
    case 'ieee':
      return `[${index}] "${record.title}," *${site}*, ${year === 'n.d.' ? year : `${year}.`} [Online]. Available: ${record.url} (accessed ${accessed}).`;
  }
}

/**
 * Host name without "www.", standing in for the author
 */
export function siteName(record: ResearchRecord): string {
  try {
    return new URL(record.url).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return record.title;
  }
}

export function publicationYear(record: ResearchRecord): string {
  const match = record.publishedAt?.match(/\b(1[89]\d{2}|2\d{3})\b/);
  return match ? match[1] : 'n.d.';
}

function shortTitle(title: string): string {
  const words = title.split(/\s+/).filter(w => w.length > 0);
  const short = words.slice(0, 4).join(' ').replace(/[.,:;!?]+$/, '');
  return words.length > 4 ? `${short}...` : short;
}
