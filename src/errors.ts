/**
 * Pipeline error taxonomy
 *
 * Capability failures are retried where they happen; only exhaustion
 * travels upward as one of the fatal errors below.
 */

export type PipelineErrorCode =
  | 'INVALID_REQUEST'
  | 'CAPABILITY_ERROR'
  | 'DRAFT_FAILED'
  | 'QUALITY_REJECTED'
  | 'ASSEMBLY_ERROR'
  | 'CANCELLED';

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: PipelineErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

export class InvalidRequestError extends PipelineError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'INVALID_REQUEST');
    this.name = 'InvalidRequestError';
  }
}

/**
 * A single search or generation call failed
 */
export class CapabilityError extends PipelineError {
  constructor(
    message: string,
    public readonly capability: 'search' | 'generation',
    cause?: unknown
  ) {
    super(message, 'CAPABILITY_ERROR', cause);
    this.name = 'CapabilityError';
  }
}

export class DraftFailedError extends PipelineError {
  constructor(public readonly sectionId: string, message: string, cause?: unknown) {
    super(message, 'DRAFT_FAILED', cause);
    this.name = 'DraftFailedError';
  }
}

/**
 * Refinement ran out of attempts and even the best attempt scored below the hard-failure floor
 */
export class QualityRejectedError extends PipelineError {
  constructor(
    public readonly sectionId: string,
    public readonly score: number,
    message: string
  ) {
    super(message, 'QUALITY_REJECTED');
    this.name = 'QualityRejectedError';
  }
}

export class AssemblyError extends PipelineError {
  constructor(message: string, public readonly issues: string[]) {
    super(message, 'ASSEMBLY_ERROR');
    this.name = 'AssemblyError';
  }
}

export class CancelledError extends PipelineError {
  constructor(message: string = 'Document generation was cancelled') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

/**
 * Errors that identify the section they belong to
 */
export function sectionIdOf(error: unknown): string | undefined {
  if (error instanceof DraftFailedError || error instanceof QualityRejectedError) {
    return error.sectionId;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
