import { writeFile, readFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { homedir } from 'os';
import type { PipelineErrorCode } from './errors.js';
import type { Document, GenerationRequest, ProgressInfo, ResearchCorpus } from './types/index.js';

// Jobs directory for file-based persistence
export const JOBS_DIR = join(homedir(), '.academic-draft-jobs');

export type DocumentJobStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

export interface DocumentJobError {
  code: PipelineErrorCode | 'INTERNAL' | 'INTERRUPTED';
  message: string;
  sectionId?: string;
}

export interface DocumentJob {
  id: string;
  status: DocumentJobStatus;
  request: GenerationRequest;
  createdAt: number;
  completedAt?: number;
  progress?: ProgressInfo;
  document?: Document;
  corpus?: ResearchCorpus;   // Kept for auditing which sources a document drew on
  error?: DocumentJobError;
}

// In-memory job storage
export const jobs = new Map<string, DocumentJob>();

/**
 * Generate unique job ID
 */
export function generateJobId(): string {
  return `doc-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}

function jobPath(jobId: string, dir: string): string {
  return join(dir, `${jobId}.json`);
}

/**
 * Save job to file system. Persistence is best-effort: a failed write is logged, not thrown.
 */
export async function saveJob(job: DocumentJob, dir: string = JOBS_DIR): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
    await writeFile(jobPath(job.id, dir), JSON.stringify(job, null, 2), 'utf-8');
  } catch (error) {
    console.error(`[Jobs] Failed to save job ${job.id}:`, error);
  }
}

/**
 * Load job from file system; null when missing or unreadable
 */
export async function loadJob(jobId: string, dir: string = JOBS_DIR): Promise<DocumentJob | null> {
  if (!/^[\w-]+$/.test(jobId)) return null;
  try {
    const parsed: unknown = JSON.parse(await readFile(jobPath(jobId, dir), 'utf-8'));
    return isDocumentJob(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Look a job up in memory first, then on disk.
 * A job that was still pending or running on disk belongs to a previous process
 * and can no longer finish, so it is recorded as failed.
 */
export async function findJob(jobId: string, dir: string = JOBS_DIR): Promise<DocumentJob | null> {
  const inMemory = jobs.get(jobId);
  if (inMemory) return inMemory;
  const stored = await loadJob(jobId, dir);
  if (!stored) return null;

  if (stored.status === 'pending' || stored.status === 'running') {
    console.error(`[Jobs] Job ${jobId} was interrupted before it finished`);
    stored.status = 'failed';
    stored.completedAt = Date.now();
    stored.error = { code: 'INTERRUPTED', message: 'The server stopped before this job finished; start a new job' };
    delete stored.progress;
    await saveJob(stored, dir);
  }

  jobs.set(jobId, stored);
  return stored;
}

function isDocumentJob(value: unknown): value is DocumentJob {
  return typeof value === 'object'
    && value !== null
    && 'id' in value && typeof value.id === 'string'
    && 'status' in value && typeof value.status === 'string'
    && 'request' in value && typeof value.request === 'object';
}
