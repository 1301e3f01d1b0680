import { describe, it, expect } from 'vitest';
import { InvalidRequestError } from '../errors.js';
import { parseGenerationRequest } from '../request.js';

describe('parseGenerationRequest', () => {
  it('trims, defaults and freezes a valid request', () => {
    const request = parseGenerationRequest({
      topic: '  renewable energy storage ',
      documentType: 'Thesis',
      academicLevel: 'PhD',
      targetWordCount: 8000,
    });

    expect(request).toEqual({
      topic: 'renewable energy storage',
      documentType: 'Thesis',
      academicLevel: 'PhD',
      targetWordCount: 8000,
      focusAreas: [],
    });
    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.focusAreas)).toBe(true);
  });

  it('keeps optional fields only when present', () => {
    const request = parseGenerationRequest({
      topic: 'grid storage',
      documentType: 'ResearchPaper',
      academicLevel: 'Masters',
      targetWordCount: 3000,
      focusAreas: ['battery chemistry'],
      additionalRequirements: '   ',
      citationStyle: 'harvard',
    });

    expect(request.citationStyle).toBe('harvard');
    expect('additionalRequirements' in request).toBe(false);
    expect(request.focusAreas).toEqual(['battery chemistry']);
  });

  it('lists every problem in one error', () => {
    try {
      parseGenerationRequest({ topic: 'ab', documentType: 'Essay', academicLevel: 'PhD', targetWordCount: -5 });
      expect.unreachable('request should be rejected');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidRequestError);
      if (!(error instanceof InvalidRequestError)) return;
      expect(error.code).toBe('INVALID_REQUEST');
      expect(error.issues).toHaveLength(3);
      expect(error.issues[0]).toBe('topic: topic must be at least 3 characters');
      expect(error.issues.some(i => i.startsWith('documentType:'))).toBe(true);
      expect(error.issues.some(i => i.startsWith('targetWordCount:'))).toBe(true);
    }
  });

  it('rejects input that is not an object', () => {
    expect(() => parseGenerationRequest('write me a thesis')).toThrow(InvalidRequestError);
  });
});
