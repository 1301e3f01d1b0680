import { CancelledError, PipelineError, errorMessage, sectionIdOf } from './errors.js';
import { type DocumentJob, type DocumentJobError, JOBS_DIR, generateJobId, jobs, saveJob } from './jobs.js';
import type { DocumentPipeline } from './pipeline.js';
import { parseGenerationRequest } from './request.js';
import type { OnProgressCallback } from './types/index.js';

// One controller per running job; removed when the job settles
const controllers = new Map<string, AbortController>();

export interface JobStartResult {
  job: DocumentJob;
  /** Resolves once the job has settled and been saved; never rejects */
  done: Promise<void>;
}

/**
 * Start a document job.
 *
 * Flow:
 * 1. Validate the request (invalid input throws here, before any job exists)
 * 2. Register and persist the job as pending
 * 3. Fire off the pipeline in the background
 */
export async function startDocumentJob(
  input: unknown,
  pipeline: DocumentPipeline,
  dir: string = JOBS_DIR
): Promise<JobStartResult> {
  const request = parseGenerationRequest(input);

  const job: DocumentJob = {
    id: generateJobId(),
    status: 'pending',
    request,
    createdAt: Date.now(),
  };
  jobs.set(job.id, job);
  await saveJob(job, dir);

  console.error(`[Jobs] Created job ${job.id} for: "${request.topic}"`);

  const controller = new AbortController();
  controllers.set(job.id, controller);
  const done = executeDocumentInBackground(job, pipeline, controller.signal, dir)
    .finally(() => controllers.delete(job.id));

  return { job, done };
}

/**
 * Abort a running job. Returns false when the job is not running in this process.
 */
export function cancelDocumentJob(jobId: string): boolean {
  const controller = controllers.get(jobId);
  if (!controller) return false;
  console.error(`[Jobs] Cancelling job ${jobId}`);
  controller.abort();
  return true;
}

/**
 * Abort every running job (server shutdown)
 */
export function cancelAllJobs(): number {
  const ids = [...controllers.keys()];
  ids.forEach(id => cancelDocumentJob(id));
  return ids.length;
}

async function executeDocumentInBackground(
  job: DocumentJob,
  pipeline: DocumentPipeline,
  signal: AbortSignal,
  dir: string
): Promise<void> {
  // Saves are queued so a late progress write never lands after the final state
  let saving: Promise<void> = Promise.resolve();
  const persist = (): Promise<void> => {
    saving = saving.then(() => saveJob(job, dir));
    return saving;
  };

  try {
    job.status = 'running';
    job.progress = { currentStep: 'Initializing', stepNumber: 0, totalSteps: 5 };
    await persist();

    // Progress saves do not block drafting
    const onProgress: OnProgressCallback = progress => {
      job.progress = progress;
      void persist();
    };

    const { document, corpus } = await pipeline.run(job.request, { signal, onProgress });

    job.status = 'completed';
    job.completedAt = Date.now();
    job.document = document;
    job.corpus = corpus;
    job.progress = { currentStep: 'Complete', stepNumber: 5, totalSteps: 5 };

    await persist();
    console.error(`[Jobs] Job ${job.id} completed: ${document.wordCount} words`);
  } catch (error) {
    job.status = error instanceof CancelledError ? 'cancelled' : 'failed';
    job.completedAt = Date.now();
    job.error = toJobError(error);
    await persist();
    console.error(`[Jobs] Job ${job.id} ${job.status}: ${job.error.message}`);
  }
}

export function toJobError(error: unknown): DocumentJobError {
  const sectionId = sectionIdOf(error);
  return {
    code: error instanceof PipelineError ? error.code : 'INTERNAL',
    message: errorMessage(error),
    ...(sectionId ? { sectionId } : {}),
  };
}
