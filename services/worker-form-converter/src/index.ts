/**
 * Form Converter Worker
 *
 * Consumes the convert_form queue, runs the conversion pipeline for each
 * document and writes the finalized field array to the output directory.
 */

import { Job, UnrecoverableError } from 'bullmq';
import {
  logger,
  config,
  runWithContextAsync,
  createWorker,
  serveMetrics,
  parseConvertFormJob,
  toExtractedDocument,
  convertDocument,
  isPipelineError,
  QUEUE_NAMES,
  type ConvertFormJob,
  type ConvertFormResult,
  jobsProcessedCounter,
  jobDurationHistogram,
} from '@formflow/shared';
import { writeSchemaDocument } from './lib/output';

/**
 * Process convert_form job
 */
async function processConvertForm(job: Job<ConvertFormJob, ConvertFormResult>): Promise<ConvertFormResult> {
  const parsed = parseConvertFormJob(job.data);
  if (!parsed.valid) {
    jobsProcessedCounter.inc({ queue: QUEUE_NAMES.CONVERT_FORM, status: 'invalid' });
    throw new UnrecoverableError(`Invalid convert_form payload: ${parsed.errors.join('; ')}`);
  }
  const { correlation_id, document_id, source_format, lines, consent_shaped } = parsed.data;

  return runWithContextAsync(
    { correlationId: correlation_id, documentId: document_id, sourceFormat: source_format },
    async () => {
      const startTime = Date.now();

      logger.info('Processing convert_form', {
        jobId: job.id,
        document_id,
        lines: lines.length,
        attempt: job.attemptsMade + 1,
      });

      try {
        const document = toExtractedDocument({ document_id, source_format, lines });
        const result = convertDocument(document, { consentShaped: consent_shaped });
        const outputUri = await writeSchemaDocument(config.outputPath, document_id, result.fields);

        logger.info('Wrote SchemaDocument', { document_id, output_uri: outputUri, fields: result.fields.length });

        const duration = (Date.now() - startTime) / 1000;
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.CONVERT_FORM, status: 'success' });
        jobDurationHistogram.observe({ queue: QUEUE_NAMES.CONVERT_FORM, status: 'success' }, duration);

        return {
          document_id,
          output_uri: outputUri,
          field_count: result.fields.length,
          form_kind: result.form_kind,
        };
      } catch (error) {
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.CONVERT_FORM, status: 'failed' });
        // Retrying cannot change a rejected document
        if (isPipelineError(error)) {
          throw new UnrecoverableError(error.message);
        }
        throw error;
      }
    }
  );
}

// Expose /metrics for Prometheus
serveMetrics(config.metricsPort);

// Create and start the worker
const worker = createWorker<ConvertFormJob, ConvertFormResult>(QUEUE_NAMES.CONVERT_FORM, processConvertForm);

logger.info('Form converter worker started', { outputPath: config.outputPath });

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
