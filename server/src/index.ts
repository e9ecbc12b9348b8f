import dotenv from 'dotenv';
import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { loadConfig, type AppConfig } from './lib/config.js';
import { isMainModule } from './lib/entrypoint.js';
import { isResumeError } from './lib/errors.js';
import { createProvider } from './lib/llm.js';
import logger from './lib/logger.js';
import { ResumePipeline } from './resume/pipeline.js';

let server: ReturnType<typeof serve> | null = null;
let shuttingDown = false;

function shutdown(signal: string) {
  if (shuttingDown || !server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Shutdown signal received, closing HTTP server');

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force exit if in-flight generations do not finish
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

export function startServer(config: AppConfig) {
  if (server) return server;

  const pipeline = new ResumePipeline(config, createProvider(config));
  const app = createApp({ config, pipeline });

  logger.info({ port: config.port, provider: config.provider, model: config.model }, 'Resume server starting');
  server = serve({ fetch: app.fetch, port: config.port });
  logger.info({ port: config.port }, `Server running at http://localhost:${config.port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  return server;
}

if (isMainModule(import.meta.url)) {
  dotenv.config();
  try {
    startServer(loadConfig());
  } catch (err) {
    if (!isResumeError(err, 'configuration')) throw err;
    logger.fatal({ field: err.field }, err.message);
    process.exitCode = 1;
  }
}
