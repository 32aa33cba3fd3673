import path from 'node:path';
import { createJobLogger } from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import { upsertStep } from './step-log.js';
import type { StepLog } from './step-log.js';
import { SpeakerInputCancelled } from './speaker-gate.js';
import type { SpeakerGate } from './speaker-gate.js';
import {
  DEFAULT_SPEAKER_TAG,
  defaultNarratorConfig,
  deriveSpeakerProfiles,
  extractSpeakerTags,
} from './speaker-profiles.js';
import type { PipelineStages, StageContext } from './stages.js';
import { SPEAKER_INPUT_STEP } from './types.js';
import type {
  JobPatch,
  JobRecord,
  JobResult,
  JobSource,
  SourceKind,
  SpeakerConfig,
  StageKey,
  StepEvent,
  StepKey,
  StepStatus,
} from './types.js';

/** Persist a partial job update. Must reject with PersistenceError on failure. */
export type CommitFn = (jobId: string, patch: JobPatch) => Promise<void>;

export interface ExecutorDeps {
  stages: PipelineStages;
  stepLog: StepLog;
  speakerGate: SpeakerGate;
  commit: CommitFn;
  runsDir: string;
  now?: () => Date;
}

export type ExecutionOutcome =
  | { status: 'completed'; result: JobResult }
  | { status: 'failed'; step: StageKey; error: string }
  | { status: 'cancelled' };

type ExecutableJob = Pick<JobRecord, 'id' | 'source' | 'parameters' | 'speaker_required' | 'steps' | 'note'>;

const ACQUIRED_MESSAGES: Record<SourceKind, string> = {
  youtube: 'YouTube audio extracted',
  audio_url: 'Audio downloaded',
  audio_path: 'Local audio copied',
};

/** Appends a remote source URL to the note on its own line, once. */
export function noteWithSource(note: string | null, source: JobSource): string | null {
  if (source.kind === 'audio_path') return note;
  if (!note) return source.value;
  if (note.includes(source.value)) return note;
  return `${note}${note.endsWith('\n') ? '' : '\n'}${source.value}`;
}

class StageFailure extends Error {
  constructor(readonly step: StageKey, message: string) {
    super(message);
  }
}

/**
 * Drives one job through the fixed stage sequence. Every transition is
 * persisted through `commit` before it reaches the step log, so observers
 * never see state that was not durably written.
 *
 * `run()` resolves with the outcome for stage failures, success, and a speaker
 * wait cancelled by deletion; it only rejects when persistence fails.
 */
export class StepExecutor {
  private readonly log: Logger;
  private readonly now: () => Date;
  private steps: StepEvent[];

  constructor(
    private readonly job: ExecutableJob,
    private readonly deps: ExecutorDeps,
  ) {
    this.log = createJobLogger(job.id);
    this.now = deps.now ?? (() => new Date());
    this.steps = [...job.steps];
  }

  async run(): Promise<ExecutionOutcome> {
    const { stages } = this.deps;
    const runDir = path.join(this.deps.runsDir, this.job.id);
    const context: StageContext = {
      job_id: this.job.id,
      run_dir: runDir,
      parameters: this.job.parameters,
      log: this.log,
    };

    this.log.info({ source: this.job.source.kind }, 'Pipeline execution started');

    try {
      const audio = await this.runStage(
        'acquisition',
        'Preparing audio source',
        () => stages.acquisition.invoke(this.job.source, context),
        (out) => [ACQUIRED_MESSAGES[this.job.source.kind], out.path],
      );
      const transcript = await this.runStage(
        'transcription',
        'Transcribing audio with speaker diarization',
        () => stages.transcription.invoke(audio, context),
        (out) => ['Transcription saved', out.path],
      );
      const translated = await this.runStage(
        'translation',
        'Translating transcript',
        () => stages.translation.invoke(transcript, context),
        (out) => ['Translation saved', out.path],
      );
      const polished = await this.runStage(
        'polish',
        'Polishing translated text',
        () => stages.polish.invoke(translated, context),
        (out) => ['Polished text saved', out.path],
      );
      const summary = await this.runStage(
        'summary',
        'Generating summary',
        () => stages.summary.invoke(polished, context),
        (out) => ['Summary saved', out.path],
      );

      let provided: SpeakerConfig[] | null = null;
      if (this.job.speaker_required) {
        provided = await this.awaitSpeakerInput(polished.text);
      }

      const speakers = await this.runStage(
        'speaker-config',
        provided ? 'Using provided speaker configs' : 'Deriving speaker profiles',
        () => stages.speakerConfig.invoke({ script: polished, provided }, context),
        (out) => ['Speaker configs saved', out.path],
      );
      const dialogue = await this.runStage(
        'synthesis',
        'Generating multi-speaker audio',
        () => stages.synthesis.invoke(
          { script_path: polished.path, speakers: speakers.speakers, output_name: 'dialogue.wav' },
          context,
        ),
        (out) => ['Audio generated', out.path],
      );

      const result: JobResult = {
        run_dir: runDir,
        input_audio_path: audio.path,
        transcript_path: transcript.path,
        translated_path: translated.path,
        polished_path: polished.path,
        summary_path: summary.path,
        speakers_path: speakers.path,
        speakers: speakers.speakers,
        speaker_tags: speakers.speakers.map((s) => s.speaker_tag),
        audio_path: dialogue.path,
        summary_audio_path: null,
        merged_audio_path: null,
      };

      const note = noteWithSource(this.job.note, this.job.source);
      await this.deps.commit(this.job.id, {
        status: 'completed',
        result,
        finished_at: this.now().toISOString(),
        ...(note !== this.job.note ? { note } : {}),
      });
      this.deps.stepLog.finish(this.job.id);
      this.log.info('Pipeline execution completed');
      return { status: 'completed', result };
    } catch (err) {
      if (err instanceof SpeakerInputCancelled) {
        this.log.info('Speaker input cancelled, stopping execution');
        return { status: 'cancelled' };
      }
      if (!(err instanceof StageFailure)) throw err;
      await this.fail(err.step, err.message);
      return { status: 'failed', step: err.step, error: err.message };
    }
  }

  private async runStage<T>(
    step: StageKey,
    runningMessage: string,
    invoke: () => Promise<T>,
    describe: (output: T) => [message: string, artifactPath: string],
  ): Promise<T> {
    await this.emit(step, 'running', runningMessage, null);
    let output: T;
    try {
      output = await invoke();
    } catch (err) {
      throw new StageFailure(step, errorMessage(err));
    }
    const [message, artifactPath] = describe(output);
    await this.emit(step, 'completed', message, this.relativeToRuns(artifactPath));
    return output;
  }

  private async awaitSpeakerInput(script: string): Promise<SpeakerConfig[]> {
    const detected = extractSpeakerTags(script);
    const expectedTags = detected.length > 0 ? detected : [DEFAULT_SPEAKER_TAG];
    const derived = deriveSpeakerProfiles(script);
    const defaults = derived.length > 0 ? derived : [defaultNarratorConfig()];

    await this.emit(
      'speaker-config',
      'waiting',
      'Awaiting manual speaker configuration',
      `${expectedTags.length} speakers detected: ${expectedTags.join(', ')}`,
    );
    this.log.info({ speakers: expectedTags }, 'Waiting for manual speaker configs');

    const provided = await this.deps.speakerGate.park(this.job.id, { expectedTags, defaults });

    await this.emit(SPEAKER_INPUT_STEP, 'completed', 'Speaker configuration received', `${provided.length} speaker configs`);
    return provided;
  }

  private event(step: StepKey, status: StepStatus, message: string, detail: string | null): StepEvent {
    return { step, status, message, detail, timestamp: this.now().toISOString() };
  }

  private async emit(step: StepKey, status: StepStatus, message: string, detail: string | null): Promise<void> {
    const event = this.event(step, status, message, detail);
    const steps = upsertStep(this.steps, event);
    await this.deps.commit(this.job.id, { steps });
    this.steps = steps;
    this.deps.stepLog.append(this.job.id, event);
  }

  private async fail(step: StageKey, message: string): Promise<void> {
    const event = this.event(step, 'failed', message, null);
    const steps = upsertStep(this.steps, event);
    await this.deps.commit(this.job.id, {
      steps,
      status: 'failed',
      error: message,
      finished_at: event.timestamp,
    });
    this.steps = steps;
    this.deps.stepLog.append(this.job.id, event);
    this.deps.stepLog.finish(this.job.id);
    this.log.warn({ step, error: message }, 'Pipeline stage failed');
  }

  private relativeToRuns(artifactPath: string): string {
    const relative = path.relative(this.deps.runsDir, artifactPath);
    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) return artifactPath;
    return relative;
  }
}
