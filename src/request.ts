import { z } from 'zod';
import { InvalidRequestError } from './errors.js';
import { ACADEMIC_LEVELS, CITATION_STYLES, DOCUMENT_TYPES, type GenerationRequest } from './types/index.js';

export const generationRequestSchema = z.object({
  topic: z.string().trim().min(3, 'topic must be at least 3 characters').max(500),
  documentType: z.enum(DOCUMENT_TYPES),
  academicLevel: z.enum(ACADEMIC_LEVELS),
  targetWordCount: z.number().int().positive(),
  focusAreas: z.array(z.string().trim().min(1).max(200)).max(10).default([]),
  additionalRequirements: z.string().trim().max(2000).optional(),
  citationStyle: z.enum(CITATION_STYLES).optional(),
});

/**
 * Validate caller input and freeze it for the rest of the run
 * @throws InvalidRequestError listing every problem
 */
export function parseGenerationRequest(input: unknown): GenerationRequest {
  const parsed = generationRequestSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'request'}: ${i.message}`);
    throw new InvalidRequestError(`Invalid generation request: ${issues.join('; ')}`, issues);
  }

  const { additionalRequirements, citationStyle, focusAreas, ...rest } = parsed.data;
  const request: GenerationRequest = {
    ...rest,
    focusAreas: Object.freeze([...focusAreas]),
    ...(additionalRequirements ? { additionalRequirements } : {}),
    ...(citationStyle ? { citationStyle } : {}),
  };
  return Object.freeze(request);
}
