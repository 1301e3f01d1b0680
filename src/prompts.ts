/**
 * Prompt builders for drafting and rewriting sections
 */

import type {
  AcademicLevel,
  GenerationRequest,
  OutlineNode,
  ResearchRecord,
  ScoreBreakdown,
  ScoreDimension,
  SectionRole,
} from './types/index.js';

const ROLE_GUIDANCE: Record<SectionRole, string> = {
  abstract: 'Summarise the purpose, approach, principal findings and significance in one tight paragraph.',
  executive_summary: 'Give decision-makers the problem, the key findings and the main recommendations up front.',
  introduction: 'Establish context and significance, state the problem, and outline the structure of the document.',
  background: 'Explain the context, key concepts and history a reader needs before the analysis.',
  objectives: 'State specific, measurable objectives and how each relates to the research problem.',
  research_questions: 'Pose focused research questions and objectives, and explain why each matters.',
  literature_review: 'Critically synthesise prior work, compare positions, and identify tensions and gaps rather than summarising sources one by one.',
  theoretical_framework: 'Present the theories and concepts that frame the study and justify their selection.',
  methodology: 'Describe and justify the research design, data sources, procedures and analytical methods, including limitations.',
  themes: 'Organise the literature into themes, comparing and contrasting findings within each.',
  results: 'Report findings clearly and in a logical order, separating observation from interpretation.',
  findings: 'Present the evidence-based findings, each tied to its supporting sources.',
  analysis: 'Analyse the evidence critically, weighing competing explanations and trade-offs.',
  discussion: 'Interpret the findings, relate them to the literature, and discuss implications and limitations.',
  research_gaps: 'Identify what remains unknown or contested and why it matters for future research.',
  timeline: 'Lay out the phases of work with realistic durations and milestones.',
  expected_outcomes: 'Explain the anticipated contributions and their theoretical and practical significance.',
  recommendations: 'Give concrete, justified recommendations that follow from the analysis.',
  conclusion: 'Draw the argument together, state the contribution, and suggest directions for future work.',
  references: 'List the sources cited.',
};

const LEVEL_GUIDANCE: Record<AcademicLevel, string> = {
  Undergraduate: 'clear, well-organised academic prose suitable for a bachelor\'s submission',
  Masters: 'rigorous graduate-level prose with critical engagement and precise terminology',
  PhD: 'doctoral-level prose with sophisticated argumentation, theoretical depth and an original contribution',
};

const DIMENSION_FIXES: Record<ScoreDimension, (s: ScoreBreakdown) => string> = {
  readability: s =>
    `Readability: the text reads at grade ${s.gradeLevel.toFixed(1)}, outside the range expected for this academic level. Adjust vocabulary and sentence complexity accordingly.`,
  burstiness: s =>
    `Rhythm: sentence lengths are too uniform (variation ${s.sentenceVariation.toFixed(2)}) or phrasing repeats (${(s.repeatedTrigramRatio * 100).toFixed(0)}% repeated three-word sequences). Mix short and long sentences and vary the phrasing.`,
  originality: s =>
    `Originality: ${(s.corpusOverlap * 100).toFixed(0)}% of five-word sequences match the research excerpts verbatim. Paraphrase and synthesise instead of copying, keeping the citations.`,
};

export interface DraftPromptInput {
  request: GenerationRequest;
  node: OutlineNode;
  slice: readonly ResearchRecord[];
  targetWords: number;
  part?: { index: number; total: number; previousTail: string };
}

function formatExcerpts(slice: readonly ResearchRecord[]): string {
  if (slice.length === 0) {
    return 'No research excerpts are available for this section. Do not include citation markers.';
  }
  return slice.map(r => `[${r.id}] ${r.title} (${r.url})\n${r.snippet}`).join('\n\n');
}

export function buildDraftPrompt({ request, node, slice, targetWords, part }: DraftPromptInput): string {
  const focus = request.focusAreas.length > 0 ? request.focusAreas.join('; ') : 'general academic research';
  const partNote = part && part.total > 1
    ? `\nThis is part ${part.index} of ${part.total} of the section.${part.previousTail ? ` Continue seamlessly from where the previous part ended:\n"""\n${part.previousTail}\n"""\nDo not repeat earlier material.` : ''}\n`
    : '';

  return `
Write the "${node.title}" section of a ${request.documentType} on the topic: "${request.topic}".

Academic level: ${request.academicLevel} - ${LEVEL_GUIDANCE[request.academicLevel]}
Research areas: ${focus}
Section purpose: ${ROLE_GUIDANCE[node.role]}
Length: about ${targetWords} words.
${request.additionalRequirements ? `Additional requirements: ${request.additionalRequirements}\n` : ''}${partNote}
Research excerpts (cite with the bracketed id, e.g. [S1]; cite only ids listed here):
${formatExcerpts(slice)}

Requirements:
- Write in proper academic style for the specified level.
- Use varied sentence structures and academic vocabulary.
- Include critical analysis and original insight; paraphrase sources rather than quoting them.
- Maintain a scholarly tone that still sounds natural and human; avoid formulaic, robotic patterns.
- Place citation markers immediately after the claims they support.
- Output only the section body in plain paragraphs: no section heading, no bibliography.
`.trim();
}

export function buildContinuationPrompt(request: GenerationRequest, node: OutlineNode, slice: readonly ResearchRecord[], currentText: string, missingWords: number): string {
  return `
You are extending the "${node.title}" section of a ${request.documentType} on "${request.topic}" (${request.academicLevel} level).

The section so far ends with:
"""
${currentText.split(/\s+/).slice(-200).join(' ')}
"""

Write about ${missingWords} more words that continue the argument without repeating it.
Research excerpts (cite with the bracketed id; cite only ids listed here):
${formatExcerpts(slice)}

Output only the new paragraphs.
`.trim();
}

export function buildRewritePrompt(
  request: GenerationRequest,
  node: OutlineNode,
  text: string,
  score: ScoreBreakdown,
  targetWords: number
): string {
  const dimensions: ScoreDimension[] = score.failedDimensions.length > 0
    ? score.failedDimensions
    : ['readability', 'burstiness', 'originality'];
  const fixes = dimensions.map(d => `- ${DIMENSION_FIXES[d](score)}`).join('\n');

  return `
Revise the "${node.title}" section of a ${request.documentType} on "${request.topic}" (${request.academicLevel} level).

Correct ONLY these problems:
${fixes}

Keep everything else: the argument, the structure, the academic register, every citation marker such as [S1], and a length of about ${targetWords} words.
Output only the revised section body with no commentary.

Section:
"""
${text}
"""
`.trim();
}
