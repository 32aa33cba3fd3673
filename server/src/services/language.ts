import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { StageError } from '../lib/errors.js';
import type { AudioArtifact, Stage, StageContext, TextArtifact } from '../pipeline/stages.js';
import type { ToolServiceClient } from './tool-client.js';

const transcriptSchema = z.object({
  segments: z.array(z.object({
    speaker: z.union([z.string(), z.number()]).nullish(),
    text: z.string(),
  })),
});

export type TranscriptSegment = z.output<typeof transcriptSchema>['segments'][number];

const textResultSchema = z.object({
  text: z.string(),
});

export type PromptType = 'translate' | 'polish' | 'summary';

async function writeArtifact(context: StageContext, fileName: string, contents: string): Promise<string> {
  await mkdir(context.run_dir, { recursive: true });
  const file = path.join(context.run_dir, fileName);
  await writeFile(file, contents, 'utf8');
  return file;
}

/**
 * Renders diarized segments as `[SPEAKERn]text` lines. Speaker labels are
 * numbered by first appearance; an unlabelled segment stays with the
 * previous speaker.
 */
export function toTaggedScript(segments: readonly TranscriptSegment[]): string {
  const labels = new Map<string, number>();
  let previous = 0;
  const lines: string[] = [];

  for (const segment of segments) {
    const text = segment.text.trim();
    if (!text) continue;
    let index = previous;
    if (segment.speaker !== null && segment.speaker !== undefined) {
      const key = String(segment.speaker);
      if (!labels.has(key)) labels.set(key, labels.size);
      index = labels.get(key) ?? previous;
    }
    previous = index;
    lines.push(`[SPEAKER${index}]${text}`);
  }

  return lines.join('\n');
}

export class TranscriptionStage implements Stage<AudioArtifact, TextArtifact> {
  constructor(private readonly asr: ToolServiceClient) {}

  async invoke(audio: AudioArtifact, context: StageContext): Promise<TextArtifact> {
    const { provider, model_name, language, chunk_length } = context.parameters;
    const { segments } = await this.asr.call(
      'transcribe_audio',
      { audio_path: audio.path, provider, model_name, language, chunk_length },
      transcriptSchema,
    );
    const text = toTaggedScript(segments);
    if (!text) {
      throw new StageError('Transcription produced no speech segments');
    }
    const file = await writeArtifact(context, 'transcript.json', JSON.stringify({ segments }, null, 2));
    return { path: file, text };
  }
}

/** Translation, polishing and summarization share one text service. */
export class TextRewriteStage implements Stage<TextArtifact, TextArtifact> {
  constructor(
    private readonly translator: ToolServiceClient,
    private readonly promptType: PromptType,
    private readonly outputName: string,
  ) {}

  async invoke(input: TextArtifact, context: StageContext): Promise<TextArtifact> {
    const { provider, model_name, language } = context.parameters;
    const { text } = await this.translator.call(
      'translate_text',
      { text: input.text, prompt_type: this.promptType, provider, model_name, source_language: language },
      textResultSchema,
    );
    if (!text.trim()) {
      throw new StageError(`${this.promptType} returned empty text`);
    }
    const file = await writeArtifact(context, this.outputName, text);
    return { path: file, text };
  }
}
