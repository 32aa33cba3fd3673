import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { clampConcurrency, envBool, loadConfig, parsePositiveInt } from '../lib/config.js';

describe('parsePositiveInt', () => {
  it('returns parsed positive values', () => {
    expect(parsePositiveInt('42', 5)).toBe(42);
  });

  it('falls back for invalid, empty, and non-positive values', () => {
    expect(parsePositiveInt(undefined, 5)).toBe(5);
    expect(parsePositiveInt('abc', 5)).toBe(5);
    expect(parsePositiveInt('0', 5)).toBe(5);
    expect(parsePositiveInt('-2', 5)).toBe(5);
  });
});

describe('envBool', () => {
  it('reads 1/true and falls back when unset', () => {
    expect(envBool('1', false)).toBe(true);
    expect(envBool('TRUE', false)).toBe(true);
    expect(envBool('yes', true)).toBe(false);
    expect(envBool(undefined, true)).toBe(true);
  });
});

describe('clampConcurrency', () => {
  it('keeps the limit between 1 and 5', () => {
    expect(clampConcurrency(0)).toBe(1);
    expect(clampConcurrency(3)).toBe(3);
    expect(clampConcurrency(9)).toBe(5);
  });
});

describe('loadConfig', () => {
  it('uses local-development defaults', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3001);
    expect(config.runsDir).toBe(path.resolve('./runs'));
    expect(config.maxQueueSize).toBe(10);
    expect(config.parallelEnabled).toBe(false);
    expect(config.maxConcurrent).toBe(1);
    expect(config.introAssets).toEqual([]);
    expect(config.allowedOrigins).toEqual(['http://localhost:5173', 'http://localhost:5174']);
    expect(config.maxJsonBodyBytes).toBe(200_000);
    expect(config.services.asr).toEqual({ baseUrl: 'http://localhost:8102', apiKey: null });
    expect(config.supabase).toBeNull();
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      RUNS_DIR: '/srv/runs',
      MAX_QUEUE_SIZE: '25',
      PARALLEL_ENABLED: 'true',
      MAX_CONCURRENT: '12',
      INTRO_AUDIO_ASSETS: '/assets/intro.wav, /assets/jingle.wav,',
      ALLOWED_ORIGINS: 'https://app.example.com',
      TTS_SERVICE_URL: 'http://tts.internal:9000//',
      TOOL_SERVICE_API_KEY: 'test-secret',
      SUPABASE_URL: 'http://supabase.test',
      SUPABASE_SERVICE_ROLE_KEY: 'test-service-key',
    });

    expect(config.port).toBe(8080);
    expect(config.runsDir).toBe('/srv/runs');
    expect(config.maxQueueSize).toBe(25);
    expect(config.parallelEnabled).toBe(true);
    expect(config.maxConcurrent).toBe(5);
    expect(config.introAssets).toEqual(['/assets/intro.wav', '/assets/jingle.wav']);
    expect(config.allowedOrigins).toEqual(['https://app.example.com']);
    expect(config.services.tts).toEqual({ baseUrl: 'http://tts.internal:9000', apiKey: 'test-secret' });
    expect(config.supabase).toEqual({ url: 'http://supabase.test', serviceKey: 'test-service-key' });
  });

  it('allows no cross-origin callers in production unless configured', () => {
    expect(loadConfig({ NODE_ENV: 'production' }).allowedOrigins).toEqual([]);
  });

  it('ignores a half-configured store', () => {
    expect(loadConfig({ SUPABASE_URL: 'http://supabase.test' }).supabase).toBeNull();
  });
});
