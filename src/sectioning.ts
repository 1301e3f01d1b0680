/**
 * Sectioning utilities - ids, anchors and condensed views of a finished document
 */

import type { AssembledSection, Document } from './types/index.js';

/**
 * Normalize a section title into a valid section ID
 * Example: "Literature Review" -> "literature_review"
 */
export function normalizeSectionId(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, '') // Remove special chars
    .trim()
    .replace(/\s+/g, '_');         // Replace spaces with underscores
}

/**
 * Markdown heading anchor, e.g. "Results & Discussion" -> "results--discussion"
 */
export function headingAnchor(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, '')
    .trim()
    .replace(/\s/g, '-');
}

/**
 * Format the condensed view (document summary + section index)
 */
export function formatCondensedView(jobId: string, document: Document): string {
  const parts: string[] = [];

  parts.push(`# ${document.title}\n`);
  parts.push(`**Job:** ${jobId}`);
  parts.push(`**Type:** ${document.request.documentType} (${document.request.academicLevel})`);
  parts.push(`**Words:** ${document.wordCount} of ${document.request.targetWordCount} targeted`);
  parts.push(`**Sources cited:** ${document.citations.length}`);

  if (document.qualityShortfalls.length > 0) {
    parts.push(`**Quality shortfall:** ${document.qualityShortfalls.join(', ')} (returned with their best attempt)`);
  }
  if (document.unresolvedMarkers.length > 0) {
    parts.push(`**Unresolved citations:** ${document.unresolvedMarkers.join(', ')}`);
  }

  parts.push('');
  parts.push(`## Sections\n`);

  document.sections.forEach((section, index) => {
    parts.push(`### ${index + 1}. ${section.title}`);
    parts.push(`- **ID:** \`${section.id}\``);
    parts.push(`- **Words:** ${section.wordCount} (budget ${section.wordBudget})`);
    if (section.score !== null) {
      parts.push(`- **Score:** ${section.score.toFixed(2)} after ${section.attempts} attempt(s)${section.qualityShortfall ? ' - shortfall' : ''}`);
    }
    parts.push(`- **Usage:** \`read_document_section(job_id="${jobId}", section_id="${section.id}")\``);
    parts.push('');
  });

  return parts.join('\n');
}

/**
 * Format a single section view for reading
 */
export function formatSectionView(jobId: string, section: AssembledSection): string {
  const parts: string[] = [];

  parts.push(`# ${section.title}\n`);
  parts.push(`**Job:** ${jobId}`);
  parts.push(`**Section:** ${section.id}\n`);

  parts.push(section.text);

  return parts.join('\n');
}
