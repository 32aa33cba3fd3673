import { Hono } from 'hono';
import { parseJsonBodyWithLimit } from '../lib/http-body-guard.js';
import type { Scheduler } from '../pipeline/scheduler.js';

const MAX_SETTINGS_BODY_BYTES = 20_000;

export function createSettingsRoutes(scheduler: Scheduler) {
  const settings = new Hono();

  settings.get('/', (c) => c.json(scheduler.getSettings()));

  settings.patch('/', async (c) => {
    const body = await parseJsonBodyWithLimit(c, MAX_SETTINGS_BODY_BYTES);
    if (!body.ok) return body.response;
    const updated = await scheduler.updateSettings(body.data);
    c.get('log').info({ settings: updated }, 'Settings updated');
    return c.json(updated);
  });

  return settings;
}
