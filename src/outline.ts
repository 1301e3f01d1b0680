/**
 * Outline Planner
 *
 * Maps (document type, academic level, target length) onto an ordered list of
 * sections with word budgets that sum exactly to the target.
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { PipelineConfig } from './config.js';
import { InvalidRequestError } from './errors.js';
import { normalizeSectionId } from './sectioning.js';
import {
  SECTION_ROLES,
  type DocumentType,
  type GenerationRequest,
  type OutlineNode,
} from './types/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Same relative location from src/ and dist/
export const TEMPLATES_PATH = join(__dirname, '..', 'data', 'section-templates.json');

const templateEntrySchema = z.object({
  role: z.enum(SECTION_ROLES),
  title: z.string().min(1),
  weight: z.number().positive(),
  searchHint: z.string().min(1).nullable(),
  drafted: z.boolean().default(true),
});

const adjustmentsSchema = z.record(z.enum(SECTION_ROLES), z.number().positive()).default({});

const templateListSchema = z.array(templateEntrySchema).min(1);

const templateFileSchema = z.object({
  templates: z.object({
    Thesis: templateListSchema,
    Synopsis: templateListSchema,
    Dissertation: templateListSchema,
    ResearchPaper: templateListSchema,
    LiteratureReview: templateListSchema,
    ResearchProposal: templateListSchema,
    AcademicReport: templateListSchema,
  }),
  levelAdjustments: z.object({
    Undergraduate: adjustmentsSchema,
    Masters: adjustmentsSchema,
    PhD: adjustmentsSchema,
  }),
});

export type TemplateEntry = z.infer<typeof templateEntrySchema>;

export type SectionTemplates = z.infer<typeof templateFileSchema>;

let cachedTemplates: SectionTemplates | null = null;

/**
 * Load and validate the section template table (read once, then cached; the table is static data)
 */
export function loadSectionTemplates(path: string = TEMPLATES_PATH): SectionTemplates {
  if (path === TEMPLATES_PATH && cachedTemplates) return cachedTemplates;

  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const templates = templateFileSchema.parse(raw);

  if (path === TEMPLATES_PATH) cachedTemplates = templates;
  return templates;
}

/**
 * Fewest words a document of this type can have
 */
export function minimumViableWords(documentType: DocumentType, config: PipelineConfig, templates: SectionTemplates = loadSectionTemplates()): number {
  return templates.templates[documentType].length * config.outline.minWordsPerSection;
}

/**
 * Plan the outline for a request
 * @throws InvalidRequestError when the target is too small or too large for the template
 */
export function planOutline(
  request: GenerationRequest,
  config: PipelineConfig,
  templates: SectionTemplates = loadSectionTemplates()
): OutlineNode[] {
  const entries = templates.templates[request.documentType];
  const target = request.targetWordCount;
  const minimum = minimumViableWords(request.documentType, config, templates);

  if (target < minimum) {
    throw new InvalidRequestError(
      `Target of ${target} words is below the minimum of ${minimum} for a ${request.documentType} (${entries.length} sections x ${config.outline.minWordsPerSection} words)`
    );
  }
  if (target > config.outline.maxWordCount) {
    throw new InvalidRequestError(`Target of ${target} words exceeds the maximum of ${config.outline.maxWordCount}`);
  }

  const adjustments = templates.levelAdjustments[request.academicLevel];
  const weights = entries.map(e => e.weight * (adjustments[e.role] ?? 1));
  const budgets = allocateBudgets(target, weights);

  if (budgets.some(b => b <= 0)) {
    throw new InvalidRequestError(`Target of ${target} words leaves at least one section without a word budget`);
  }

  const outline = entries.map((entry, ordinal): OutlineNode => Object.freeze({
    id: normalizeSectionId(entry.title),
    title: entry.title,
    role: entry.role,
    wordBudget: budgets[ordinal],
    ordinal,
    searchHint: entry.searchHint,
    drafted: entry.drafted,
  }));

  console.error(`[Outline] ${request.documentType}/${request.academicLevel}: ${outline.map(n => `${n.id}=${n.wordBudget}`).join(', ')}`);
  return outline;
}

/**
 * Proportional allocation with floor rounding; the remainder goes to the
 * largest weight (earliest on ties) so the budgets sum exactly to the total.
 */
export function allocateBudgets(total: number, weights: number[]): number[] {
  const sum = weights.reduce((a, b) => a + b, 0);
  if (weights.length === 0 || sum <= 0) {
    throw new Error('allocateBudgets needs at least one positive weight');
  }

  const budgets = weights.map(w => Math.floor((total * w) / sum));
  const remainder = total - budgets.reduce((a, b) => a + b, 0);

  let largest = 0;
  weights.forEach((w, i) => {
    if (w > weights[largest]) largest = i;
  });
  budgets[largest] += remainder;

  return budgets;
}
