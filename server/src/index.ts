import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { createApp } from './app.js';
import { loadConfig } from './lib/config.js';
import { errorMessage } from './lib/errors.js';
import logger from './lib/logger.js';
import { createSupabaseAdmin } from './lib/supabase.js';
import { Scheduler } from './pipeline/scheduler.js';
import { createPipelineStages } from './services/index.js';
import { InMemoryJobRepository } from './storage/job-repository.js';
import type { JobRepository } from './storage/job-repository.js';
import { SupabaseJobRepository } from './storage/supabase-job-repository.js';

const config = loadConfig();
const isProduction = process.env.NODE_ENV === 'production';
let shuttingDown = false;

if (isProduction && config.allowedOrigins.length === 0) {
  logger.error('ALLOWED_ORIGINS not set in production, all cross-origin requests will be blocked');
}

function createRepository(): JobRepository {
  if (config.supabase) {
    return new SupabaseJobRepository(createSupabaseAdmin(config.supabase.url, config.supabase.serviceKey));
  }
  logger.warn('SUPABASE_URL / SUPABASE_SERVICE_ROLE_KEY not set, job history will not survive a restart');
  return new InMemoryJobRepository();
}

const scheduler = new Scheduler({
  repository: createRepository(),
  stages: createPipelineStages(config.services),
  runsDir: config.runsDir,
  maxQueueSize: config.maxQueueSize,
  parallelEnabled: config.parallelEnabled,
  maxConcurrent: config.maxConcurrent,
  introAssets: config.introAssets,
});

const app = createApp(scheduler, {
  allowedOrigins: config.allowedOrigins,
  maxJsonBodyBytes: config.maxJsonBodyBytes,
  runsDir: config.runsDir,
  isShuttingDown: () => shuttingDown,
});

let server: ReturnType<typeof serve> | null = null;

function shutdown(signal: string) {
  if (shuttingDown) return;
  if (!server) return;
  shuttingDown = true;
  logger.info({ signal, ...scheduler.stats() }, 'Graceful shutdown initiated');

  // Running jobs are not drained; the next start marks them interrupted.
  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

export async function startServer() {
  if (server) return server;

  logger.info({ port: config.port, runs_dir: config.runsDir }, 'Narration pipeline server starting');
  await scheduler.restore();
  server = serve({ fetch: app.fetch, port: config.port });
  logger.info({ port: config.port }, `Server running at http://localhost:${config.port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'Uncaught exception');
    shutdown('UNCAUGHT_EXCEPTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer().catch((err: unknown) => {
    logger.fatal({ error: errorMessage(err) }, 'Failed to start server');
    process.exit(1);
  });
}

export { app, scheduler };
