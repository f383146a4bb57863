/**
 * Converter API
 *
 * HTTP entry point for form conversion. See app.ts for routes.
 */

import {
  logger,
  config,
  createQueue,
  QUEUE_NAMES,
  type ConvertFormJob,
  type ConvertFormResult,
} from '@formflow/shared';
import { createApp } from './app';

const convertFormQueue = createQueue<ConvertFormJob, ConvertFormResult>(QUEUE_NAMES.CONVERT_FORM);

const app = createApp({ queue: convertFormQueue });

const server = app.listen(config.apiPort, () => {
  logger.info('Converter API started', { port: config.apiPort });
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await convertFormQueue.close();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
