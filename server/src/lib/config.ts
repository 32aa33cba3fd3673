import path from 'node:path';

export const MAX_CONCURRENT_LIMIT = 5;

export interface ServiceEndpoint {
  baseUrl: string;
  apiKey: string | null;
}

export interface AppConfig {
  port: number;
  runsDir: string;
  maxQueueSize: number;
  parallelEnabled: boolean;
  maxConcurrent: number;
  introAssets: string[];
  allowedOrigins: string[];
  maxJsonBodyBytes: number;
  services: {
    acquisition: ServiceEndpoint;
    asr: ServiceEndpoint;
    translate: ServiceEndpoint;
    tts: ServiceEndpoint;
  };
  supabase: { url: string; serviceKey: string } | null;
}

type Env = Record<string, string | undefined>;

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function envBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  return raw === '1' || raw.toLowerCase() === 'true';
}

export function clampConcurrency(value: number): number {
  return Math.min(MAX_CONCURRENT_LIMIT, Math.max(1, Math.trunc(value)));
}

function splitList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw.split(',').map((item) => item.trim()).filter(Boolean);
}

function endpoint(env: Env, key: string, fallbackUrl: string): ServiceEndpoint {
  const baseUrl = (env[key] ?? fallbackUrl).replace(/\/+$/, '');
  return { baseUrl, apiKey: env.TOOL_SERVICE_API_KEY || null };
}

/**
 * Reads the process environment once into a typed config.
 * Unset or unparsable values fall back to local-development defaults.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const isProduction = env.NODE_ENV === 'production';
  const allowedOrigins = env.ALLOWED_ORIGINS
    ? splitList(env.ALLOWED_ORIGINS)
    : isProduction
      ? []
      : ['http://localhost:5173', 'http://localhost:5174'];

  const supabaseUrl = env.SUPABASE_URL;
  const supabaseServiceKey = env.SUPABASE_SERVICE_ROLE_KEY;

  return {
    port: parsePositiveInt(env.PORT, 3001),
    runsDir: path.resolve(env.RUNS_DIR ?? './runs'),
    maxQueueSize: parsePositiveInt(env.MAX_QUEUE_SIZE, 10),
    parallelEnabled: envBool(env.PARALLEL_ENABLED, false),
    maxConcurrent: clampConcurrency(parsePositiveInt(env.MAX_CONCURRENT, 1)),
    introAssets: splitList(env.INTRO_AUDIO_ASSETS),
    allowedOrigins,
    maxJsonBodyBytes: parsePositiveInt(env.MAX_JSON_BODY_BYTES, 200_000),
    services: {
      acquisition: endpoint(env, 'YT_AUDIO_SERVICE_URL', 'http://localhost:8101'),
      asr: endpoint(env, 'ASR_SERVICE_URL', 'http://localhost:8102'),
      translate: endpoint(env, 'TRANSLATE_SERVICE_URL', 'http://localhost:8103'),
      tts: endpoint(env, 'TTS_SERVICE_URL', 'http://localhost:8104'),
    },
    supabase: supabaseUrl && supabaseServiceKey
      ? { url: supabaseUrl, serviceKey: supabaseServiceKey }
      : null,
  };
}
