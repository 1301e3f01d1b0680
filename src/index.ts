#!/usr/bin/env node
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { createLLMGenerator, llmConfigFromEnv } from './clients/llm.js';
import { loadConfigFromEnv } from './config.js';
import { InvalidRequestError, errorMessage } from './errors.js';
import { cancelAllJobs, cancelDocumentJob, startDocumentJob } from './job-orchestrator.js';
import { findJob, type DocumentJob } from './jobs.js';
import { DocumentPipeline } from './pipeline.js';
import { formatCondensedView, formatSectionView } from './sectioning.js';
import { createPerplexitySearch } from './services/perplexity.js';
import { ACADEMIC_LEVELS, CITATION_STYLES, DOCUMENT_TYPES } from './types/index.js';

// Create the MCP server
const server = new McpServer({
  name: 'academic-draft-mcp',
  version: '1.0.0',
});

// Built on first use so a missing key only fails the tool call, not server startup
let pipeline: DocumentPipeline | null = null;

function getPipeline(): DocumentPipeline {
  if (!pipeline) {
    // Note: process.env is populated by the MCP client at runtime from its server config
    const llm = llmConfigFromEnv(process.env);
    if (!llm) {
      throw new Error('No API key for the configured LLM provider. Set ACADEMIC_DRAFT_LLM_PROVIDER and its key (e.g. GROQ_API_KEY).');
    }
    pipeline = new DocumentPipeline({
      search: createPerplexitySearch(process.env.PERPLEXITY_API_KEY),
      generator: createLLMGenerator(llm),
      config: loadConfigFromEnv(process.env),
    });
  }
  return pipeline;
}

function textResult(text: string, isError = false) {
  return {
    content: [{ type: 'text' as const, text }],
    ...(isError ? { isError: true } : {}),
  };
}

function jsonResult(value: unknown, isError = false) {
  return textResult(JSON.stringify(value, null, 2), isError);
}

function jobNotFound(jobId: string) {
  return jsonResult({
    error: 'Job not found',
    message: `No job with ID "${jobId}".`,
  }, true);
}

function jobSummary(job: DocumentJob): Record<string, unknown> {
  const summary: Record<string, unknown> = {
    job_id: job.id,
    status: job.status,
    topic: job.request.topic,
    document_type: job.request.documentType,
    created_at: new Date(job.createdAt).toISOString(),
  };
  if (job.progress && (job.status === 'pending' || job.status === 'running')) {
    summary.progress = job.progress;
  }
  if (job.completedAt) {
    summary.completed_at = new Date(job.completedAt).toISOString();
    summary.duration_seconds = Math.round((job.completedAt - job.createdAt) / 1000);
  }
  if (job.error) summary.error = job.error;
  return summary;
}

server.registerTool(
  'start_document',
  {
    title: 'Start Academic Document Generation',
    description: `Starts an async job that researches a topic and drafts a complete, cited academic document.

**Pipeline:**
1. Plans an outline for the document type with word budgets that sum to the target
2. Gathers web research once (topic, focus areas, section-specific queries)
3. Drafts every section in parallel, citing the gathered sources
4. Scores each section for readability, sentence variety and originality, and rewrites weak sections
5. Renders citations and a bibliography and assembles the markdown document

Returns a job_id immediately. Poll check_document_status until status is "completed", "failed" or "cancelled".
Long documents take several minutes.`,
    inputSchema: {
      topic: z.string().describe('Research topic. Example: "Renewable energy storage for grid stability"'),
      document_type: z.enum(DOCUMENT_TYPES).describe('Kind of document to produce'),
      academic_level: z.enum(ACADEMIC_LEVELS).describe('Academic level the writing should target'),
      target_word_count: z.number().int().positive().describe('Total words for the whole document. Example: 8000'),
      focus_areas: z
        .array(z.string())
        .optional()
        .describe('Sub-areas to research and emphasise. Example: ["battery chemistry", "grid integration"]'),
      additional_requirements: z
        .string()
        .optional()
        .describe('Extra instructions for every section. Example: "Focus on developments since 2020"'),
      citation_style: z.enum(CITATION_STYLES).optional().describe('Citation style (default apa)'),
    },
  },
  async (params) => {
    let pipelineInstance: DocumentPipeline;
    try {
      pipelineInstance = getPipeline();
    } catch (error) {
      return jsonResult({ error: 'Configuration error', message: errorMessage(error) }, true);
    }

    try {
      const { job } = await startDocumentJob({
        topic: params.topic,
        documentType: params.document_type,
        academicLevel: params.academic_level,
        targetWordCount: params.target_word_count,
        focusAreas: params.focus_areas,
        additionalRequirements: params.additional_requirements,
        citationStyle: params.citation_style,
      }, pipelineInstance);

      return jsonResult({
        job_id: job.id,
        status: job.status,
        message: `Document job started. Poll check_document_status with this job_id; expect roughly one minute per 2000 words.`,
        topic: job.request.topic,
      });
    } catch (error) {
      if (error instanceof InvalidRequestError) {
        return jsonResult({ error: 'Invalid request', issues: error.issues, message: error.message }, true);
      }
      throw error;
    }
  }
);

server.registerTool(
  'check_document_status',
  {
    title: 'Check Document Job Status',
    description: `Check the status of a job started with start_document.

**Status values:**
- pending / running: in progress, with the current step
- completed: finished; a condensed view (section index, word count, shortfalls) is returned by default
- failed: includes the error code, message and failing section
- cancelled: stopped by cancel_document

Use read_document_section to read individual sections. Set full=true only when the whole document is needed.`,
    inputSchema: {
      job_id: z.string().describe('The job_id returned from start_document'),
      full: z.boolean().optional().describe('Return the complete markdown document instead of the condensed view'),
    },
  },
  async ({ job_id, full }) => {
    const job = await findJob(job_id);
    if (!job) return jobNotFound(job_id);

    if (job.status === 'completed' && job.document) {
      return textResult(full ? job.document.markdown : formatCondensedView(job.id, job.document));
    }

    return jsonResult(jobSummary(job), job.status === 'failed');
  }
);

server.registerTool(
  'read_document_section',
  {
    title: 'Read Document Section',
    description: 'Read one section of a completed document by its id (as listed in the condensed view of check_document_status).',
    inputSchema: {
      job_id: z.string().describe('The job_id returned from start_document'),
      section_id: z.string().describe('Section id, e.g. "literature_review"'),
    },
  },
  async ({ job_id, section_id }) => {
    const job = await findJob(job_id);
    if (!job) return jobNotFound(job_id);
    if (job.status !== 'completed' || !job.document) {
      return jsonResult({ error: 'Document not ready', status: job.status }, true);
    }

    const section = job.document.sections.find(s => s.id === section_id);
    if (!section) {
      return jsonResult({
        error: 'Section not found',
        available_sections: job.document.sections.map(s => s.id),
      }, true);
    }
    return textResult(formatSectionView(job.id, section));
  }
);

server.registerTool(
  'cancel_document',
  {
    title: 'Cancel Document Job',
    description: 'Cancel a running document job. Work in progress is discarded.',
    inputSchema: {
      job_id: z.string().describe('The job_id returned from start_document'),
    },
  },
  async ({ job_id }) => {
    const cancelled = cancelDocumentJob(job_id);
    if (!cancelled) {
      const job = await findJob(job_id);
      if (!job) return jobNotFound(job_id);
      return jsonResult({ job_id, status: job.status, message: 'Job is not running' });
    }
    return jsonResult({ job_id, message: 'Cancellation requested' });
  }
);

// Start the server
async function main() {
  console.error('[Academic Draft MCP] Starting server...');

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error('[Academic Draft MCP] Server ready on stdio');
  console.error('[Academic Draft MCP] Available tools: start_document, check_document_status, read_document_section, cancel_document');

  // Cleanup on exit
  const shutdown = (): void => {
    console.error('\n[Academic Draft MCP] Shutting down...');
    const cancelled = cancelAllJobs();
    if (cancelled > 0) console.error(`[Academic Draft MCP] Cancelled ${cancelled} running job(s)`);
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('[Academic Draft MCP] Fatal error:', error);
  process.exit(1);
});
