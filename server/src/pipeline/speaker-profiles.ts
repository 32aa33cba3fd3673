import { SpeakerInputError } from '../lib/errors.js';
import { speakerConfigSchema } from './schemas.js';
import type { SpeakerConfig } from './types.js';

const SPEAKER_LINE = /^\[(SPEAKER\d+)\]\s*(.*)$/;

export const DEFAULT_SPEAKER_TAG = '[SPEAKER0]';
export const DEFAULT_VOICE_LANGUAGE = 'Chinese';
export const MIN_SAMPLE_CHARS = 12;
export const MAX_SAMPLE_CHARS = 160;

const DEFAULT_INSTRUCT = 'Natural conversational pace with a calm, confident intonation.';

export interface SpeakerTurn {
  tag: string;
  text: string;
}

export function trimText(text: string, max: number): string {
  if (text.length <= max) return text;
  if (max <= 3) return text.slice(0, max);
  return `${text.slice(0, max - 3)}...`;
}

/**
 * Splits tagged text into turns. A `[SPEAKERn]` line opens a turn; untagged
 * lines extend the current one. Text before the first tag is ignored.
 */
export function parseSpeakerTurns(text: string): SpeakerTurn[] {
  const turns: SpeakerTurn[] = [];
  let current: SpeakerTurn | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;
    const match = SPEAKER_LINE.exec(line);
    if (match) {
      current = { tag: `[${match[1]}]`, text: match[2].trim() };
      turns.push(current);
    } else if (current) {
      current.text = current.text ? `${current.text} ${line}` : line;
    }
  }

  return turns;
}

/** Distinct speaker tags in order of first appearance. */
export function extractSpeakerTags(text: string): string[] {
  const seen = new Set<string>();
  for (const turn of parseSpeakerTurns(text)) {
    seen.add(turn.tag);
  }
  return Array.from(seen);
}

/** One `[SPEAKERn]text` line per non-empty turn, as synthesis expects. */
export function normalizeScriptText(text: string): string {
  return parseSpeakerTurns(text)
    .filter((turn) => turn.text.length > 0)
    .map((turn) => `${turn.tag}${turn.text}`)
    .join('\n');
}

function describeDelivery(utterances: string[]): string {
  if (utterances.length === 0) return DEFAULT_INSTRUCT;

  const questions = utterances.filter((u) => /[?？]$/.test(u)).length;
  const averageLength = utterances.reduce((sum, u) => sum + u.length, 0) / utterances.length;

  const pace = averageLength >= 80
    ? 'Measured, explanatory pace'
    : averageLength <= 25
      ? 'Brisk, short-phrased delivery'
      : 'Natural conversational pace';
  const tone = questions / utterances.length >= 0.3
    ? 'curious, inquisitive intonation'
    : 'calm, confident intonation';

  return `${pace} with a ${tone}.`;
}

function pickSample(utterances: string[]): string {
  const firstLongEnough = utterances.find((u) => u.length >= MIN_SAMPLE_CHARS);
  if (firstLongEnough !== undefined) return firstLongEnough;
  let longest = '';
  for (const u of utterances) {
    if (u.length > longest.length) longest = u;
  }
  return longest;
}

/**
 * Default voice-design configs for every speaker tag in `text`, in order of
 * first appearance. Pure; an untagged text yields an empty list.
 */
export function deriveSpeakerProfiles(
  text: string,
  options: { language?: string } = {},
): SpeakerConfig[] {
  const language = options.language ?? DEFAULT_VOICE_LANGUAGE;
  const byTag = new Map<string, string[]>();

  for (const turn of parseSpeakerTurns(text)) {
    const utterances = byTag.get(turn.tag) ?? [];
    if (turn.text) utterances.push(turn.text);
    byTag.set(turn.tag, utterances);
  }

  return Array.from(byTag, ([tag, utterances]) => ({
    speaker_tag: tag,
    language,
    design_text: trimText(pickSample(utterances), MAX_SAMPLE_CHARS),
    design_instruct: describeDelivery(utterances),
  }));
}

export function defaultNarratorConfig(language = DEFAULT_VOICE_LANGUAGE): SpeakerConfig {
  return {
    speaker_tag: DEFAULT_SPEAKER_TAG,
    language,
    design_text: 'Welcome, and thank you for listening.',
    design_instruct: DEFAULT_INSTRUCT,
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates a speaker payload (JSON string or array) against the tags the
 * job actually has. Throws SpeakerInputError; nothing is mutated.
 */
export function parseSpeakerConfigs(payload: unknown, expectedTags: readonly string[]): SpeakerConfig[] {
  let data: unknown = payload;
  if (typeof payload === 'string') {
    try {
      data = JSON.parse(payload);
    } catch {
      throw new SpeakerInputError('Invalid JSON for speaker configs');
    }
  }

  if (!Array.isArray(data) || data.length === 0) {
    throw new SpeakerInputError('Speaker configs must be a non-empty list');
  }
  if (!data.every(isPlainObject)) {
    throw new SpeakerInputError('Each speaker config must be an object');
  }

  const configs: SpeakerConfig[] = [];
  for (const [index, entry] of data.entries()) {
    const parsed = speakerConfigSchema.safeParse(entry);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue?.path.join('.') || 'entry';
      throw new SpeakerInputError(`Invalid speaker config at index ${index} (${field}): ${issue?.message ?? 'invalid'}`);
    }
    configs.push(parsed.data);
  }

  const provided = new Set<string>();
  for (const config of configs) {
    if (provided.has(config.speaker_tag)) {
      throw new SpeakerInputError(`Duplicate speaker tag ${config.speaker_tag}`);
    }
    provided.add(config.speaker_tag);
  }

  const missing = expectedTags.filter((tag) => !provided.has(tag));
  if (missing.length > 0) {
    throw new SpeakerInputError(`Missing speaker configs for: ${missing.join(', ')}`);
  }
  const unknown = configs.map((c) => c.speaker_tag).filter((tag) => !expectedTags.includes(tag));
  if (unknown.length > 0) {
    throw new SpeakerInputError(`Unknown speaker tags: ${unknown.join(', ')}`);
  }

  return configs;
}
