import { Hono } from 'hono';
import type { Context } from 'hono';
import { z } from 'zod';
import { ValidationError } from '../lib/errors.js';
import { parseOrThrow } from '../lib/validate.js';
import type { Scheduler } from '../pipeline/scheduler.js';
import { AUDIO_ARTIFACT_EXTENSIONS } from '../storage/artifacts.js';
import type { ArtifactRef, ArtifactStore } from '../storage/artifacts.js';

const artifactQuerySchema = z.object({
  path: z.string({ required_error: 'path is required' }).trim().min(1, 'path is required').max(1000),
});

export function createArtifactRoutes(scheduler: Scheduler, store: ArtifactStore) {
  const artifacts = new Hono();

  // Only files of a job the caller can see; 404 otherwise.
  function locate(c: Context): ArtifactRef {
    const query = parseOrThrow(artifactQuerySchema, { path: c.req.query('path') });
    const ref = store.resolve(query.path);
    scheduler.get(ref.job_id, c.get('ownerId'));
    return ref;
  }

  artifacts.get('/download', async (c) => {
    const ref = locate(c);
    const body = await store.read(ref);
    return c.body(body, 200, {
      'Content-Type': ref.content_type,
      'Content-Disposition': `attachment; filename="${ref.name.replace(/"/g, '')}"`,
    });
  });

  artifacts.get('/preview/summary', async (c) => {
    const ref = locate(c);
    if (ref.extension !== '.txt') {
      throw new ValidationError('Not a summary text file');
    }
    return c.text(await store.readText(ref));
  });

  artifacts.get('/preview/audio', async (c) => {
    const ref = locate(c);
    if (!AUDIO_ARTIFACT_EXTENSIONS.includes(ref.extension)) {
      throw new ValidationError('Not an audio file');
    }
    return c.body(await store.read(ref), 200, { 'Content-Type': ref.content_type });
  });

  return artifacts;
}
