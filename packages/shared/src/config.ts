/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

export interface Config {
  // Redis
  redisHost: string;
  redisPort: number;
  redisUrl: string;

  // Queue & Worker
  workerConcurrency: number;
  maxJobAttempts: number;
  backoffBaseMs: number;
  batchConcurrency: number;

  // Backpressure Controls
  maxQueueDepthWarning: number;
  maxQueueDepthReject: number;

  // Services
  apiPort: number;
  metricsPort: number;
  outputPath: string;

  // Header/footer filter tunables
  headerFooterWindow: number;
  headerFooterMinSignals: number;
  headerFooterMinResidualWords: number;

  // Signature role filter tunables
  blankLineMinLength: number;
  blankLineRatio: number;

  // Ordering
  referenceOverlapThreshold: number;
}

export const config: Config = {
  // Redis
  redisHost: process.env.REDIS_HOST || 'redis',
  redisPort: parseInt(process.env.REDIS_PORT || '6379', 10),
  redisUrl: process.env.REDIS_URL || 'redis://redis:6379',

  // Queue & Worker
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '5', 10),
  maxJobAttempts: parseInt(process.env.BULLMQ_DEFAULT_ATTEMPTS || '3', 10),
  backoffBaseMs: parseInt(process.env.BACKOFF_BASE_MS || '2000', 10),
  batchConcurrency: parseInt(process.env.BATCH_CONCURRENCY || '4', 10),

  // Backpressure Controls
  maxQueueDepthWarning: parseInt(process.env.MAX_QUEUE_DEPTH_WARNING || '5000', 10),
  maxQueueDepthReject: parseInt(process.env.MAX_QUEUE_DEPTH_REJECT || '10000', 10),

  // Services
  apiPort: parseInt(process.env.PORT || '8080', 10),
  metricsPort: parseInt(process.env.METRICS_PORT || '9100', 10),
  outputPath: process.env.OUTPUT_PATH || '/object-store/forms',

  // Header/footer filter tunables
  headerFooterWindow: parseInt(process.env.HEADER_FOOTER_WINDOW || '3', 10),
  headerFooterMinSignals: parseInt(process.env.HEADER_FOOTER_MIN_SIGNALS || '2', 10),
  headerFooterMinResidualWords: parseInt(process.env.HEADER_FOOTER_MIN_RESIDUAL_WORDS || '4', 10),

  // Signature role filter tunables
  blankLineMinLength: parseInt(process.env.BLANK_LINE_MIN_LENGTH || '10', 10),
  blankLineRatio: parseFloat(process.env.BLANK_LINE_RATIO || '0.7'),

  // Ordering
  referenceOverlapThreshold: parseFloat(process.env.REFERENCE_OVERLAP_THRESHOLD || '0.5'),
};
