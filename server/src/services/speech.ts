import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { StageError, errorMessage } from '../lib/errors.js';
import { DEFAULT_SPEAKER_TAG, defaultNarratorConfig, normalizeScriptText } from '../pipeline/speaker-profiles.js';
import type {
  AudioArtifact,
  MergeInput,
  NarrationInput,
  Stage,
  StageContext,
  SynthesisInput,
} from '../pipeline/stages.js';
import type { SpeakerConfig } from '../pipeline/types.js';
import type { ToolServiceClient } from './tool-client.js';

const audioResultSchema = z.object({
  file_path: z.string().min(1).optional(),
});

async function readScript(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (err) {
    throw new StageError(`Cannot read ${path.basename(filePath)}: ${errorMessage(err)}`, { cause: err });
  }
}

async function cloneVoice(
  tts: ToolServiceClient,
  script: string,
  speakers: SpeakerConfig[],
  outputName: string,
  context: StageContext,
): Promise<AudioArtifact> {
  const outputPath = path.join(context.run_dir, outputName);
  const result = await tts.call(
    'clone_voice',
    { script, speakers, speed: context.parameters.speed, output_path: outputPath },
    audioResultSchema,
  );
  return { path: result.file_path ?? outputPath };
}

export class SynthesisStage implements Stage<SynthesisInput, AudioArtifact> {
  constructor(private readonly tts: ToolServiceClient) {}

  async invoke(input: SynthesisInput, context: StageContext): Promise<AudioArtifact> {
    const script = normalizeScriptText(await readScript(input.script_path));
    if (!script) {
      throw new StageError('Script has no speaker lines to synthesize');
    }
    return cloneVoice(this.tts, script, input.speakers, input.output_name, context);
  }
}

/** Reads a plain text file aloud with the default narrator voice. */
export class NarrationStage implements Stage<NarrationInput, AudioArtifact> {
  constructor(private readonly tts: ToolServiceClient) {}

  async invoke(input: NarrationInput, context: StageContext): Promise<AudioArtifact> {
    const text = (await readScript(input.source_path)).replace(/\s*\n+\s*/g, ' ').trim();
    if (!text) {
      throw new StageError('Nothing to narrate');
    }
    return cloneVoice(
      this.tts,
      `${DEFAULT_SPEAKER_TAG}${text}`,
      [defaultNarratorConfig()],
      input.output_name,
      context,
    );
  }
}

export class MergeStage implements Stage<MergeInput, AudioArtifact> {
  constructor(private readonly tts: ToolServiceClient) {}

  async invoke(input: MergeInput, context: StageContext): Promise<AudioArtifact> {
    if (input.segments.length === 0) {
      throw new StageError('No audio segments to merge');
    }
    const outputPath = path.join(context.run_dir, input.output_name);
    const result = await this.tts.call(
      'merge_audio',
      { segments: input.segments, output_path: outputPath },
      audioResultSchema,
    );
    return { path: result.file_path ?? outputPath };
  }
}
