import { describe, it, expect } from 'vitest';
import { SpeakerInputError } from '../lib/errors.js';
import {
  defaultNarratorConfig,
  deriveSpeakerProfiles,
  extractSpeakerTags,
  normalizeScriptText,
  parseSpeakerConfigs,
  parseSpeakerTurns,
  trimText,
} from '../pipeline/speaker-profiles.js';

const SCRIPT = [
  'Intro line without a tag',
  '[SPEAKER0] Hi!',
  '[SPEAKER1] Welcome back to the show, everyone.',
  '[SPEAKER0] Thanks for having me here today.',
  'and continuing on the next line?',
  '[SPEAKER2] Yes',
].join('\n');

// ─── Parsing ──────────────────────────────────────────────────────────

describe('parseSpeakerTurns', () => {
  it('joins untagged lines onto the open turn and skips text before the first tag', () => {
    expect(parseSpeakerTurns(SCRIPT)).toEqual([
      { tag: '[SPEAKER0]', text: 'Hi!' },
      { tag: '[SPEAKER1]', text: 'Welcome back to the show, everyone.' },
      { tag: '[SPEAKER0]', text: 'Thanks for having me here today. and continuing on the next line?' },
      { tag: '[SPEAKER2]', text: 'Yes' },
    ]);
  });

  it('accepts CRLF line endings', () => {
    expect(parseSpeakerTurns('[SPEAKER3] one\r\n[SPEAKER3] two')).toEqual([
      { tag: '[SPEAKER3]', text: 'one' },
      { tag: '[SPEAKER3]', text: 'two' },
    ]);
  });
});

describe('extractSpeakerTags', () => {
  it('lists tags in order of first appearance', () => {
    expect(extractSpeakerTags(SCRIPT)).toEqual(['[SPEAKER0]', '[SPEAKER1]', '[SPEAKER2]']);
  });

  it('returns nothing for untagged text', () => {
    expect(extractSpeakerTags('just a narration\nwith two lines')).toEqual([]);
  });
});

describe('normalizeScriptText', () => {
  it('emits one tag-prefixed line per non-empty turn', () => {
    const text = '[SPEAKER0] Hello\n\n[SPEAKER1]\n[SPEAKER0]  again\nand more';
    expect(normalizeScriptText(text)).toBe('[SPEAKER0]Hello\n[SPEAKER0]again and more');
  });
});

describe('trimText', () => {
  it('keeps short text and ellipsizes long text to the limit', () => {
    expect(trimText('short', 10)).toBe('short');
    expect(trimText('abcdefghij', 8)).toBe('abcde...');
    expect(trimText('abcdefghij', 3)).toBe('abc');
  });
});

// ─── Derivation ───────────────────────────────────────────────────────

describe('deriveSpeakerProfiles', () => {
  it('derives one config per tag with a sample line and delivery hint', () => {
    expect(deriveSpeakerProfiles(SCRIPT)).toEqual([
      {
        speaker_tag: '[SPEAKER0]',
        language: 'Chinese',
        design_text: 'Thanks for having me here today. and continuing on the next line?',
        design_instruct: 'Natural conversational pace with a curious, inquisitive intonation.',
      },
      {
        speaker_tag: '[SPEAKER1]',
        language: 'Chinese',
        design_text: 'Welcome back to the show, everyone.',
        design_instruct: 'Natural conversational pace with a calm, confident intonation.',
      },
      {
        speaker_tag: '[SPEAKER2]',
        language: 'Chinese',
        design_text: 'Yes',
        design_instruct: 'Brisk, short-phrased delivery with a calm, confident intonation.',
      },
    ]);
  });

  it('uses the requested voice language', () => {
    const [config] = deriveSpeakerProfiles('[SPEAKER0] Bonjour tout le monde', { language: 'English' });
    expect(config?.language).toBe('English');
  });

  it('caps long samples and marks long turns as measured', () => {
    const [config] = deriveSpeakerProfiles(`[SPEAKER0] ${'x'.repeat(200)}`);
    expect(config?.design_text).toBe(`${'x'.repeat(157)}...`);
    expect(config?.design_instruct).toBe('Measured, explanatory pace with a calm, confident intonation.');
  });

  it('counts full-width question marks', () => {
    const [config] = deriveSpeakerProfiles('[SPEAKER0] 你今天过得怎么样？');
    expect(config?.design_instruct).toBe('Brisk, short-phrased delivery with a curious, inquisitive intonation.');
  });

  it('falls back to the default hint for a tag with no text', () => {
    expect(deriveSpeakerProfiles('[SPEAKER4]')).toEqual([
      {
        speaker_tag: '[SPEAKER4]',
        language: 'Chinese',
        design_text: '',
        design_instruct: 'Natural conversational pace with a calm, confident intonation.',
      },
    ]);
  });

  it('returns an empty list for untagged text', () => {
    expect(deriveSpeakerProfiles('no tags at all')).toEqual([]);
  });

  it('is deterministic', () => {
    expect(deriveSpeakerProfiles(SCRIPT)).toEqual(deriveSpeakerProfiles(SCRIPT));
  });
});

describe('defaultNarratorConfig', () => {
  it('describes a single narrator voice', () => {
    expect(defaultNarratorConfig('English')).toEqual({
      speaker_tag: '[SPEAKER0]',
      language: 'English',
      design_text: 'Welcome, and thank you for listening.',
      design_instruct: 'Natural conversational pace with a calm, confident intonation.',
    });
  });
});

// ─── Validation ───────────────────────────────────────────────────────

describe('parseSpeakerConfigs', () => {
  const tags = ['[SPEAKER0]', '[SPEAKER1]'];

  function errorFrom(fn: () => unknown): SpeakerInputError {
    try {
      fn();
    } catch (err) {
      if (err instanceof SpeakerInputError) return err;
      throw err;
    }
    throw new Error('expected SpeakerInputError');
  }

  it('accepts a JSON string and fills the default language', () => {
    const payload = JSON.stringify([
      { speaker_tag: '[SPEAKER0]', design_text: 'Hello there' },
      { speaker_tag: ' [SPEAKER1] ', language: 'English' },
    ]);
    expect(parseSpeakerConfigs(payload, tags)).toEqual([
      { speaker_tag: '[SPEAKER0]', language: 'Chinese', design_text: 'Hello there' },
      { speaker_tag: '[SPEAKER1]', language: 'English' },
    ]);
  });

  it('accepts an already-parsed array', () => {
    const configs = parseSpeakerConfigs([{ speaker_tag: '[SPEAKER0]', language: 'French' }], ['[SPEAKER0]']);
    expect(configs).toEqual([{ speaker_tag: '[SPEAKER0]', language: 'French' }]);
  });

  it.each([
    ['{not json', 'Invalid JSON for speaker configs'],
    ['[]', 'Speaker configs must be a non-empty list'],
    ['{"speaker_tag":"[SPEAKER0]"}', 'Speaker configs must be a non-empty list'],
    ['[1, 2]', 'Each speaker config must be an object'],
    ['[{"speaker_tag":"SPEAKER0"}]', 'Invalid speaker config at index 0 (speaker_tag): speaker_tag must look like [SPEAKER0]'],
    [
      '[{"speaker_tag":"[SPEAKER0]"},{"speaker_tag":"[SPEAKER0]"}]',
      'Duplicate speaker tag [SPEAKER0]',
    ],
    ['[{"speaker_tag":"[SPEAKER0]"}]', 'Missing speaker configs for: [SPEAKER1]'],
    [
      '[{"speaker_tag":"[SPEAKER0]"},{"speaker_tag":"[SPEAKER1]"},{"speaker_tag":"[SPEAKER7]"}]',
      'Unknown speaker tags: [SPEAKER7]',
    ],
  ])('rejects %s', (payload, message) => {
    const err = errorFrom(() => parseSpeakerConfigs(payload, tags));
    expect(err.message).toBe(message);
    expect(err.status).toBe(400);
    expect(err.code).toBe('SPEAKER_INPUT_INVALID');
  });
});
