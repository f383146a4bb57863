/**
 * Converter API application
 *
 * POST /convert - Convert a document synchronously
 * POST /jobs    - Enqueue a document for the form converter worker
 * GET  /health  - Liveness and queue depth
 * GET  /metrics - Prometheus metrics
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { ulid } from 'ulid';
import type { Queue } from 'bullmq';
import {
  logger,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  backpressureRejectionsCounter,
  checkBackpressure,
  convertDocument,
  type ConvertFormJob,
  type ConvertFormResult,
} from '@formflow/shared';
import { jobIdFor, parseRequestBody, toConvertFormJob } from './lib/request';
import { invalidRequest, tooManyRequests, toErrorResponse, type ErrorResponse } from './lib/responses';

export interface AppDependencies {
  /** convert_form queue; POST /jobs answers 503 without one */
  queue?: Queue<ConvertFormJob, ConvertFormResult>;
}

function correlationIdOf(res: Response): string {
  const value = res.getHeader('X-Correlation-Id');
  return typeof value === 'string' ? value : getCorrelationId();
}

function send(res: Response, response: ErrorResponse): void {
  res.status(response.status).json(response.body);
}

export function createApp(deps: AppDependencies = {}): Express {
  const app = express();

  // Middleware
  app.use(express.json({ limit: '5mb' }));

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header.length > 0 ? header : ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const labels = { method: req.method, path: req.path, status: res.statusCode.toString() };

      httpRequestDurationHistogram.observe(labels, duration);
      httpRequestsCounter.inc(labels);

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    const timestamp = new Date().toISOString();
    if (!deps.queue) {
      res.json({ status: 'healthy', service: 'converter-api', timestamp });
      return;
    }

    checkBackpressure(deps.queue)
      .then((metrics) => {
        res.json({ status: 'healthy', service: 'converter-api', queue_depth: metrics.depth, timestamp });
      })
      .catch((error: unknown) => {
        res.status(503).json({
          status: 'unhealthy',
          service: 'converter-api',
          error: error instanceof Error ? error.message : 'Unknown error',
          timestamp,
        });
      });
  });

  // Metrics endpoint
  app.get('/metrics', (_req: Request, res: Response, next: NextFunction) => {
    getMetrics()
      .then((body) => {
        res.setHeader('Content-Type', getMetricsContentType());
        res.send(body);
      })
      .catch(next);
  });

  /**
   * POST /convert
   * Runs the pipeline in-process and returns the ConversionResult
   */
  app.post('/convert', (req: Request, res: Response) => {
    const correlationId = correlationIdOf(res);
    const parsed = parseRequestBody(req.body);
    if (!parsed.ok) {
      send(res, invalidRequest(parsed.errors, correlationId));
      return;
    }

    try {
      const result = convertDocument(parsed.document, { consentShaped: parsed.request.consent_shaped });
      res.json(result);
    } catch (error) {
      const response = toErrorResponse(error, correlationId);
      if (response.status >= 500) {
        logger.error('Conversion failed', error);
      } else {
        logger.warn('Conversion refused', { code: response.body.error.code });
      }
      send(res, response);
    }
  });

  /**
   * POST /jobs
   * Enqueues a convert_form job, subject to backpressure
   */
  app.post('/jobs', (req: Request, res: Response) => {
    const correlationId = correlationIdOf(res);
    const queue = deps.queue;
    if (!queue) {
      res.status(503).json({
        error: { code: 'service_unavailable', message: 'Job queue is not configured', correlation_id: correlationId },
      });
      return;
    }

    const parsed = parseRequestBody(req.body);
    if (!parsed.ok) {
      send(res, invalidRequest(parsed.errors, correlationId));
      return;
    }

    const enqueue = async (): Promise<void> => {
      const backpressure = await checkBackpressure(queue);

      if (backpressure.shouldReject) {
        backpressureRejectionsCounter.inc();
        logger.warn('Request rejected due to backpressure', { queue_depth: backpressure.depth });
        send(res, tooManyRequests(correlationId));
        return;
      }

      if (backpressure.shouldWarn) {
        logger.warn('Queue depth approaching threshold', { queue_depth: backpressure.depth });
      }

      const job = toConvertFormJob(parsed.request, correlationId);
      const jobId = jobIdFor(job.document_id);
      await queue.add('convert_form', job, { jobId });

      logger.info('Enqueued convert_form job', { document_id: job.document_id, jobId });
      res.status(202).json({ correlation_id: correlationId, document_id: job.document_id, job_id: jobId });
    };

    enqueue().catch((error: unknown) => {
      logger.error('Enqueue failed', error);
      send(res, toErrorResponse(error, correlationId));
    });
  });

  return app;
}
