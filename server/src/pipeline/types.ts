export const PIPELINE_STAGES = [
  'acquisition',
  'transcription',
  'translation',
  'polish',
  'summary',
  'speaker-config',
  'synthesis',
] as const;

export type StageKey = (typeof PIPELINE_STAGES)[number];

/** Pseudo-step recording receipt of manual speaker input. */
export const SPEAKER_INPUT_STEP = 'speaker-input';

export type StepKey = StageKey | typeof SPEAKER_INPUT_STEP;

export type JobStatus = 'queued' | 'running' | 'completed' | 'failed';

export type StepStatus = 'pending' | 'running' | 'waiting' | 'completed' | 'failed';

export interface StepEvent {
  step: StepKey;
  status: StepStatus;
  message: string;
  detail: string | null;
  timestamp: string;
}

export type SourceKind = 'youtube' | 'audio_url' | 'audio_path';

/** Passed through to YouTube extraction; `user_agent` also applies to URL downloads. */
export interface AcquisitionOptions {
  cookies_file?: string;
  cookies_from_browser?: string;
  user_agent?: string;
  proxy?: string;
}

export interface JobSource {
  kind: SourceKind;
  value: string;
  options?: AcquisitionOptions;
}

export interface JobParameters {
  provider: string;
  model_name: string | null;
  language: string;
  chunk_length: number;
  speed: number;
}

export interface SpeakerConfig {
  speaker_tag: string;
  language: string;
  design_text?: string;
  design_instruct?: string;
  ref_audio?: string;
  ref_text?: string;
}

export interface JobResult {
  run_dir: string;
  input_audio_path: string;
  transcript_path: string;
  translated_path: string;
  polished_path: string;
  summary_path: string;
  speakers_path: string;
  speakers: SpeakerConfig[];
  speaker_tags: string[];
  audio_path: string;
  summary_audio_path: string | null;
  merged_audio_path: string | null;
}

export interface JobMetadata {
  name: string | null;
  note: string | null;
  tags: string[];
  published: boolean;
}

export interface JobRecord extends JobMetadata {
  id: string;
  owner_id: string;
  status: JobStatus;
  created_at: string;
  started_at: string | null;
  finished_at: string | null;
  error: string | null;
  steps: StepEvent[];
  result: JobResult | null;
  speaker_required: boolean;
  speaker_submitted: boolean;
  queue_position: number | null;
  source: JobSource;
  parameters: JobParameters;
}

/** Fields that may change after creation. Identity and ownership never do. */
export type JobPatch = Partial<Omit<JobRecord, 'id' | 'owner_id' | 'created_at' | 'source' | 'parameters'>>;

export interface SchedulerSettings {
  parallel_enabled: boolean;
  max_concurrent: number;
  max_queued: number;
  tags: string[];
}

/** Validated submission, before a job id or timestamps exist. */
export interface JobSpec {
  source: JobSource;
  parameters: JobParameters;
  speaker_required: boolean;
  name: string | null;
  note: string | null;
  tags: string[];
}

export function isTerminal(status: JobStatus): boolean {
  return status === 'completed' || status === 'failed';
}
