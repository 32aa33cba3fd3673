import { Hono } from 'hono';
import type { Context } from 'hono';
import { cors } from 'hono/cors';
import logger from './lib/logger.js';
import { PipelineError, ValidationError } from './lib/errors.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { ownerMiddleware } from './middleware/owner.js';
import { createArtifactRoutes } from './routes/artifacts.js';
import { createPipelineRoutes } from './routes/pipeline.js';
import { createSettingsRoutes } from './routes/settings.js';
import type { Scheduler } from './pipeline/scheduler.js';
import { ArtifactStore } from './storage/artifacts.js';

export interface AppOptions {
  allowedOrigins: string[];
  maxJsonBodyBytes: number;
  /** Root served by the artifact download and preview routes. */
  runsDir: string;
  isShuttingDown?: () => boolean;
}

function errorResponse(err: Error, c: Context) {
  const requestId = c.get('requestId');
  if (err instanceof PipelineError) {
    const log = c.get('log') ?? logger;
    log.info({ code: err.code, error: err.message, path: c.req.path }, 'Request rejected');
    return c.json({
      error: err.message,
      code: err.code,
      ...(err instanceof ValidationError && err.issues.length > 0 ? { details: err.issues } : {}),
    }, err.status);
  }
  logger.error({ err, requestId }, 'Unhandled error');
  return c.json({ error: 'Internal server error', request_id: requestId }, 500);
}

export function createApp(scheduler: Scheduler, options: AppOptions) {
  const app = new Hono();
  const startedAt = Date.now();

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    if (options.isShuttingDown?.() && c.req.path !== '/health') {
      return c.json({ error: 'Server is restarting. Please retry shortly.' }, 503);
    }
    await next();
  });

  app.use('*', async (c, next) => {
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('Referrer-Policy', 'no-referrer');
  });

  app.use('/api/*', cors({
    origin: options.allowedOrigins,
    credentials: true,
  }));
  app.use('/api/*', ownerMiddleware);

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    const shuttingDown = options.isShuttingDown?.() ?? false;
    return c.json({
      status: shuttingDown ? 'draining' : 'ok',
      uptime_seconds: Math.floor((Date.now() - startedAt) / 1000),
      pipeline: scheduler.stats(),
      timestamp: new Date().toISOString(),
    });
  });

  app.route('/api/pipeline', createPipelineRoutes(scheduler, { maxJsonBodyBytes: options.maxJsonBodyBytes }));
  app.route('/api/settings', createSettingsRoutes(scheduler));
  app.route('/api/artifacts', createArtifactRoutes(scheduler, new ArtifactStore(options.runsDir)));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));
  app.onError(errorResponse);

  return app;
}
