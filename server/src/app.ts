import { Hono } from 'hono';
import type { AppConfig } from './lib/config.js';
import logger from './lib/logger.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import type { ResumePipeline } from './resume/pipeline.js';
import { createResumeRoutes } from './routes/resumes.js';

export interface AppDeps {
  config: AppConfig;
  pipeline: ResumePipeline;
}

export function createApp({ config, pipeline }: AppDeps): Hono {
  const app = new Hono();

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('Referrer-Policy', 'no-referrer');
  });

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    return c.json({
      status: 'ok',
      provider: config.provider,
      model: config.model,
      timestamp: new Date().toISOString(),
    });
  });

  app.route('/api/resumes', createResumeRoutes(pipeline));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    logger.error({ err, requestId }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}
