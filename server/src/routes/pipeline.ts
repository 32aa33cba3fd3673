import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import { parseJsonBodyWithLimit } from '../lib/http-body-guard.js';
import { parseOrThrow } from '../lib/validate.js';
import { reorderSchema, speakersBodySchema } from '../pipeline/schemas.js';
import type { Scheduler } from '../pipeline/scheduler.js';

const SSE_HEARTBEAT_MS = 10_000;

export interface PipelineRouteOptions {
  maxJsonBodyBytes: number;
}

export function createPipelineRoutes(scheduler: Scheduler, options: PipelineRouteOptions) {
  const pipeline = new Hono();

  pipeline.post('/start', async (c) => {
    const body = await parseJsonBodyWithLimit(c, options.maxJsonBodyBytes);
    if (!body.ok) return body.response;
    const job = await scheduler.submit(c.get('ownerId'), body.data);
    c.get('log').info({ job_id: job.id, status: job.status }, 'Pipeline job submitted');
    return c.json(job, 201);
  });

  pipeline.get('/jobs', (c) => {
    return c.json({
      jobs: scheduler.list(c.get('ownerId')),
      settings: scheduler.getSettings(),
    });
  });

  pipeline.get('/jobs/:id', (c) => {
    return c.json(scheduler.get(c.req.param('id'), c.get('ownerId')));
  });

  // Backlog, then live step events, then a single `done`.
  pipeline.get('/jobs/:id/stream', (c) => {
    const jobId = c.req.param('id');
    const subscription = scheduler.subscribe(jobId, c.get('ownerId'));
    const log = c.get('log');

    return streamSSE(c, async (stream) => {
      const heartbeat = setInterval(() => {
        void stream.writeSSE({ event: 'heartbeat', data: '{}' }).catch(() => {
          log.warn({ job_id: jobId }, 'SSE heartbeat failed, closing stream');
          subscription.close();
        });
      }, SSE_HEARTBEAT_MS);
      heartbeat.unref();
      stream.onAbort(() => subscription.close());

      try {
        for await (const item of subscription) {
          if (item.type === 'progress') {
            await stream.writeSSE({ event: 'progress', data: JSON.stringify(item.event) });
          } else {
            await stream.writeSSE({ event: 'done', data: JSON.stringify({ job_id: jobId }) });
          }
        }
      } finally {
        clearInterval(heartbeat);
        subscription.close();
      }
    });
  });

  pipeline.post('/jobs/:id/speakers', async (c) => {
    const body = await parseJsonBodyWithLimit(c, options.maxJsonBodyBytes);
    if (!body.ok) return body.response;
    const { speakers_json, speakers } = parseOrThrow(speakersBodySchema, body.data);
    const job = await scheduler.resumeWithSpeakers(c.req.param('id'), speakers_json ?? speakers, c.get('ownerId'));
    return c.json(job);
  });

  pipeline.get('/jobs/:id/speakers-template', (c) => {
    return c.json(scheduler.speakerTemplate(c.req.param('id'), c.get('ownerId')));
  });

  pipeline.post('/queue/reorder', async (c) => {
    const body = await parseJsonBodyWithLimit(c, options.maxJsonBodyBytes);
    if (!body.ok) return body.response;
    const { job_ids } = parseOrThrow(reorderSchema, body.data);
    const queue = await scheduler.reorderQueue(job_ids);
    return c.json({ queue });
  });

  pipeline.post('/jobs/:id/metadata', async (c) => {
    const body = await parseJsonBodyWithLimit(c, options.maxJsonBodyBytes);
    if (!body.ok) return body.response;
    return c.json(await scheduler.updateMetadata(c.req.param('id'), body.data, c.get('ownerId')));
  });

  pipeline.delete('/jobs/:id', async (c) => {
    const jobId = c.req.param('id');
    await scheduler.delete(jobId, c.get('ownerId'));
    return c.json({ deleted: true, job_id: jobId });
  });

  pipeline.post('/jobs/:id/summary-audio', async (c) => {
    const result = await scheduler.generateSummaryAudio(c.req.param('id'), c.get('ownerId'));
    return c.json({ result });
  });

  pipeline.post('/jobs/:id/merge-audio', async (c) => {
    const result = await scheduler.mergeFinalAudio(c.req.param('id'), c.get('ownerId'));
    return c.json({ result });
  });

  pipeline.post('/jobs/:id/tts', async (c) => {
    const body = await parseJsonBodyWithLimit(c, options.maxJsonBodyBytes);
    if (!body.ok) return body.response;
    const { speakers_json, speakers } = parseOrThrow(speakersBodySchema, body.data);
    const result = await scheduler.regenerateAudio(c.req.param('id'), speakers_json ?? speakers, c.get('ownerId'));
    return c.json({ result });
  });

  return pipeline;
}
