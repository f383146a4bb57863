/**
 * Batch conversion
 *
 * Runs many documents through the pipeline with a bounded number of
 * concurrent runners. Each document gets its own correlation ID and its own
 * pass/fail entry; one failure never stops the rest of the batch.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContextAsync,
  convertDocument,
  MalformedInputError,
  SchemaViolationError,
  type ConversionResult,
  type ExtractedDocument,
  type PipelineOptions,
  type Violation,
} from '@formflow/shared';

export interface BatchOptions {
  /** Documents converted at once; defaults to BATCH_CONCURRENCY */
  concurrency?: number;
  pipeline?: PipelineOptions;
  /** Called after each document, in completion order */
  onResult?: (entry: BatchEntry) => void | Promise<void>;
}

export interface BatchFailure {
  code: string;
  message: string;
  violations?: Violation[];
}

export type BatchEntry =
  | { document_id: string; status: 'passed'; result: ConversionResult }
  | { document_id: string; status: 'failed'; error: BatchFailure };

export interface BatchSummary {
  total: number;
  passed: number;
  failed: number;
  duration_ms: number;
}

export interface BatchReport {
  /** One entry per input document, in input order */
  entries: BatchEntry[];
  summary: BatchSummary;
}

export function describeFailure(error: unknown): BatchFailure {
  if (error instanceof SchemaViolationError) {
    return { code: error.code, message: error.message, violations: error.violations };
  }
  if (error instanceof MalformedInputError) {
    return { code: error.code, message: error.message };
  }
  return {
    code: 'internal_error',
    message: error instanceof Error ? error.message : String(error),
  };
}

async function convertOne(document: ExtractedDocument, options: BatchOptions): Promise<BatchEntry> {
  return runWithContextAsync(
    { correlationId: ulid(), documentId: document.document_id, sourceFormat: document.source_format },
    async (): Promise<BatchEntry> => {
      // Let other runners interleave between documents
      await yieldToEventLoop();
      try {
        const result = convertDocument(document, options.pipeline);
        return { document_id: document.document_id, status: 'passed', result };
      } catch (error) {
        const failure = describeFailure(error);
        logger.warn('Document failed in batch', { code: failure.code, message: failure.message });
        return { document_id: document.document_id, status: 'failed', error: failure };
      }
    }
  );
}

/** A failing callback is logged; the entry stays in the report */
async function notify(onResult: NonNullable<BatchOptions['onResult']>, entry: BatchEntry): Promise<void> {
  try {
    await onResult(entry);
  } catch (error) {
    logger.error('Batch result callback failed', error, { documentId: entry.document_id });
  }
}

export async function convertBatch(
  documents: readonly ExtractedDocument[],
  options: BatchOptions = {}
): Promise<BatchReport> {
  const startTime = Date.now();
  const concurrency = Math.max(1, Math.min(options.concurrency ?? config.batchConcurrency, documents.length || 1));
  const entries: BatchEntry[] = new Array<BatchEntry>(documents.length);
  let next = 0;

  const runner = async (): Promise<void> => {
    while (next < documents.length) {
      const position = next;
      next += 1;
      const entry = await convertOne(documents[position], options);
      entries[position] = entry;
      if (options.onResult) {
        await notify(options.onResult, entry);
      }
    }
  };

  await Promise.all(Array.from({ length: concurrency }, () => runner()));

  const passed = entries.filter((entry) => entry.status === 'passed').length;
  const summary: BatchSummary = {
    total: documents.length,
    passed,
    failed: documents.length - passed,
    duration_ms: Date.now() - startTime,
  };

  logger.info('Batch complete', { ...summary, concurrency });
  return { entries, summary };
}
