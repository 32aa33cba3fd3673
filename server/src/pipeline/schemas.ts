import { z } from 'zod';
import { MAX_CONCURRENT_LIMIT } from '../lib/config.js';
import { PIPELINE_STAGES, SPEAKER_INPUT_STEP } from './types.js';
import type { AcquisitionOptions, JobSource, JobSpec } from './types.js';
import { parseOrThrow } from '../lib/validate.js';

const AUDIO_EXTENSIONS = ['.mp3', '.wav'];

export function hasAudioExtension(value: string): boolean {
  const pathname = value.split(/[?#]/)[0].toLowerCase();
  return AUDIO_EXTENSIONS.some((ext) => pathname.endsWith(ext));
}

const isHttpUrl = (value: string) => /^https?:\/\/\S+$/i.test(value);

/** Trimmed optional string; blank becomes null. */
const optionalText = (max: number) =>
  z.string().trim().max(max).nullish().transform((value) => (value ? value : null));

const tagList = z.array(z.string().trim().min(1).max(40)).max(20);

export const startPipelineSchema = z
  .object({
    youtube_url: optionalText(2000),
    audio_url: optionalText(2000),
    audio_path: optionalText(1000),
    yt_cookies_file: optionalText(1000),
    yt_cookies_from_browser: optionalText(100),
    yt_user_agent: optionalText(500),
    yt_proxy: optionalText(500),
    provider: z.string().trim().min(1).max(50).default('openai'),
    model_name: optionalText(200),
    language: z.string().trim().min(2).max(20).default('fr'),
    chunk_length: z.number().int().min(5).max(600).default(30),
    speed: z.number().min(0.5).max(2).default(1),
    manual_speakers: z.boolean().default(false),
    name: optionalText(200),
    note: optionalText(2000),
    tags: tagList.default([]),
  })
  .superRefine((body, ctx) => {
    const given = [body.youtube_url, body.audio_url, body.audio_path].filter(Boolean).length;
    if (given !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Provide exactly one of youtube_url, audio_url or audio_path',
      });
      return;
    }
    if (body.youtube_url && !isHttpUrl(body.youtube_url)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['youtube_url'], message: 'youtube_url must be an http(s) URL' });
    }
    if (body.audio_url && !isHttpUrl(body.audio_url)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['audio_url'], message: 'audio_url must be an http(s) URL' });
    } else if (body.audio_url && !hasAudioExtension(body.audio_url)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['audio_url'], message: 'audio_url must point to an .mp3 or .wav file' });
    }
    if (body.audio_path && !hasAudioExtension(body.audio_path)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['audio_path'], message: 'audio_path must be an .mp3 or .wav file' });
    }
  });

export function parseJobSpec(body: unknown): JobSpec {
  const data = parseOrThrow(startPipelineSchema, body);
  const source: JobSource = data.youtube_url
    ? { kind: 'youtube', value: data.youtube_url }
    : data.audio_url
      ? { kind: 'audio_url', value: data.audio_url }
      : { kind: 'audio_path', value: data.audio_path ?? '' };

  const options: AcquisitionOptions = {};
  if (data.yt_cookies_file) options.cookies_file = data.yt_cookies_file;
  if (data.yt_cookies_from_browser) options.cookies_from_browser = data.yt_cookies_from_browser;
  if (data.yt_user_agent) options.user_agent = data.yt_user_agent;
  if (data.yt_proxy) options.proxy = data.yt_proxy;
  if (Object.keys(options).length > 0) source.options = options;

  return {
    source,
    parameters: {
      provider: data.provider,
      model_name: data.model_name,
      language: data.language,
      chunk_length: data.chunk_length,
      speed: data.speed,
    },
    speaker_required: data.manual_speakers,
    name: data.name,
    note: data.note,
    tags: Array.from(new Set(data.tags)),
  };
}

export const reorderSchema = z.object({
  job_ids: z.array(z.string().min(1).max(100)).max(1000),
});

export const metadataSchema = z.object({
  name: z.string().max(200).nullish(),
  note: z.string().max(2000).nullish(),
  tags: z.array(z.string().max(40)).max(20).optional(),
  published: z.boolean().optional(),
});

export const settingsPatchSchema = z.object({
  parallel_enabled: z.boolean().optional(),
  max_concurrent: z.number().int().min(1).max(MAX_CONCURRENT_LIMIT).optional(),
  tags: z.array(z.string().trim().min(1).max(40)).max(100).optional(),
});

export const storedSettingsSchema = z.object({
  parallel_enabled: z.boolean(),
  max_concurrent: z.number().int(),
  tags: z.array(z.string()).default([]),
});

export const speakersBodySchema = z.object({
  speakers_json: z.string().max(100_000).optional(),
  speakers: z.array(z.unknown()).max(50).optional(),
});

export const speakerConfigSchema = z.object({
  speaker_tag: z.string().trim().regex(/^\[SPEAKER\d+\]$/, 'speaker_tag must look like [SPEAKER0]'),
  language: z.string().trim().min(1).default('Chinese'),
  design_text: z.string().max(2000).optional(),
  design_instruct: z.string().max(2000).optional(),
  ref_audio: z.string().max(1000).optional(),
  ref_text: z.string().max(2000).optional(),
});

// ─── Stored rows ──────────────────────────────────────────────────────────────

const stepEventSchema = z.object({
  step: z.union([z.enum(PIPELINE_STAGES), z.literal(SPEAKER_INPUT_STEP)]),
  status: z.enum(['pending', 'running', 'waiting', 'completed', 'failed']),
  message: z.string(),
  detail: z.string().nullable(),
  timestamp: z.string(),
});

const jobResultSchema = z.object({
  run_dir: z.string(),
  input_audio_path: z.string(),
  transcript_path: z.string(),
  translated_path: z.string(),
  polished_path: z.string(),
  summary_path: z.string(),
  speakers_path: z.string(),
  speakers: z.array(speakerConfigSchema),
  speaker_tags: z.array(z.string()),
  audio_path: z.string(),
  summary_audio_path: z.string().nullable(),
  merged_audio_path: z.string().nullable(),
});

export const jobRecordSchema = z.object({
  id: z.string(),
  owner_id: z.string(),
  status: z.enum(['queued', 'running', 'completed', 'failed']),
  created_at: z.string(),
  started_at: z.string().nullable(),
  finished_at: z.string().nullable(),
  error: z.string().nullable(),
  steps: z.array(stepEventSchema),
  result: jobResultSchema.nullable(),
  speaker_required: z.boolean(),
  speaker_submitted: z.boolean(),
  queue_position: z.number().int().nullable(),
  source: z.object({
    kind: z.enum(['youtube', 'audio_url', 'audio_path']),
    value: z.string(),
    options: z
      .object({
        cookies_file: z.string().optional(),
        cookies_from_browser: z.string().optional(),
        user_agent: z.string().optional(),
        proxy: z.string().optional(),
      })
      .optional(),
  }),
  parameters: z.object({
    provider: z.string(),
    model_name: z.string().nullable(),
    language: z.string(),
    chunk_length: z.number(),
    speed: z.number(),
  }),
  name: z.string().nullable(),
  note: z.string().nullable(),
  tags: z.array(z.string()),
  published: z.boolean(),
});
