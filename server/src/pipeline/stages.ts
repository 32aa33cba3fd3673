import type { Logger } from '../lib/logger.js';
import type { JobParameters, JobSource, SpeakerConfig } from './types.js';

export interface StageContext {
  job_id: string;
  /** Directory owned by this job; stages write their artifacts here. */
  run_dir: string;
  parameters: JobParameters;
  log: Logger;
}

/**
 * A single remote processing step. Implementations throw StageError with a
 * message fit for the step log; any other thrown error is recorded the same way.
 */
export interface Stage<I, O> {
  invoke(input: I, context: StageContext): Promise<O>;
}

export interface AudioArtifact {
  path: string;
}

export interface TextArtifact {
  path: string;
  text: string;
}

export interface SpeakerConfigInput {
  script: TextArtifact;
  /** Manually supplied configs; null means derive them from the script. */
  provided: SpeakerConfig[] | null;
}

export interface SpeakerArtifact {
  path: string;
  speakers: SpeakerConfig[];
}

export interface SynthesisInput {
  script_path: string;
  speakers: SpeakerConfig[];
  output_name: string;
}

export interface NarrationInput {
  source_path: string;
  output_name: string;
}

export interface MergeInput {
  segments: string[];
  output_name: string;
}

export interface PipelineStages {
  acquisition: Stage<JobSource, AudioArtifact>;
  transcription: Stage<AudioArtifact, TextArtifact>;
  translation: Stage<TextArtifact, TextArtifact>;
  polish: Stage<TextArtifact, TextArtifact>;
  summary: Stage<TextArtifact, TextArtifact>;
  speakerConfig: Stage<SpeakerConfigInput, SpeakerArtifact>;
  synthesis: Stage<SynthesisInput, AudioArtifact>;
  narration: Stage<NarrationInput, AudioArtifact>;
  merge: Stage<MergeInput, AudioArtifact>;
}
