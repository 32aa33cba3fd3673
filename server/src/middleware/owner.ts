import type { Context, Next } from 'hono';

declare module 'hono' {
  interface ContextVariableMap {
    ownerId: string;
  }
}

export const DEFAULT_OWNER_ID = 'local';
const OWNER_ID_PATTERN = /^[A-Za-z0-9._@:-]{1,128}$/;

/**
 * Scopes every request to an owner taken from `X-Owner-Id`. Identity is
 * established upstream; this only partitions job visibility.
 */
export async function ownerMiddleware(c: Context, next: Next) {
  const raw = c.req.header('X-Owner-Id')?.trim();
  if (raw && !OWNER_ID_PATTERN.test(raw)) {
    return c.json({ error: 'Invalid X-Owner-Id header', code: 'VALIDATION_FAILED' }, 400);
  }
  c.set('ownerId', raw || DEFAULT_OWNER_ID);
  await next();
}
