/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  asyncLocalStorage,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Errors
export { MalformedInputError, SchemaViolationError, isPipelineError } from './errors';

// Types
export * from './types';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ConvertFormJob,
  type ConvertFormResult,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  checkBackpressure,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  documentsConvertedCounter,
  conversionDurationHistogram,
  stageDurationHistogram,
  validationViolationsCounter,
  backpressureRejectionsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  validateFormSpec,
  validateConvertRequest,
  parseConvertRequest,
  parseConvertFormJob,
  type ValidationResult,
  type Parsed,
} from './schemas';

// Pipeline
export * from './pipeline';
