import { createJobLogger } from '../lib/logger.js';
import { JobStateError, StageError, errorMessage } from '../lib/errors.js';
import type { CommitFn } from './executor.js';
import { parseSpeakerConfigs } from './speaker-profiles.js';
import type { PipelineStages, StageContext } from './stages.js';
import type { JobRecord, JobResult } from './types.js';

export interface PostActionDeps {
  stages: PipelineStages;
  commit: CommitFn;
  /** Live record lookup; throws NotFoundError for unknown or foreign jobs. */
  lookup: (jobId: string, ownerId?: string) => JobRecord;
  introAssets: () => string[];
}

/**
 * Follow-up audio work on a completed job. Actions only touch `result`,
 * never the job status, and at most one runs per job at a time.
 */
export class PostCompletionActions {
  private readonly inFlight = new Set<string>();

  constructor(private readonly deps: PostActionDeps) {}

  async generateSummaryAudio(jobId: string, ownerId?: string): Promise<JobResult> {
    const job = this.completedJob(jobId, ownerId);
    return this.exclusive(job, async (result, context) => {
      const audio = await this.deps.stages.narration.invoke(
        { source_path: result.summary_path, output_name: 'summary_audio.wav' },
        context,
      );
      return { summary_audio_path: audio.path };
    });
  }

  async mergeFinalAudio(jobId: string, ownerId?: string): Promise<JobResult> {
    const job = this.completedJob(jobId, ownerId);
    if (!job.result?.summary_audio_path) {
      throw new JobStateError('Generate summary audio before merging');
    }
    return this.exclusive(job, async (result, context) => {
      const segments = [...this.deps.introAssets()];
      if (result.summary_audio_path) segments.push(result.summary_audio_path);
      segments.push(result.audio_path);
      const merged = await this.deps.stages.merge.invoke(
        { segments, output_name: 'final_audio.wav' },
        context,
      );
      return { merged_audio_path: merged.path };
    });
  }

  async regenerateAudio(jobId: string, payload: unknown, ownerId?: string): Promise<JobResult> {
    const job = this.completedJob(jobId, ownerId);
    const speakers = parseSpeakerConfigs(payload, job.result?.speaker_tags ?? []);
    return this.exclusive(job, async (result, context) => {
      const dialogue = await this.deps.stages.synthesis.invoke(
        { script_path: result.polished_path, speakers, output_name: 'dialogue.wav' },
        context,
      );
      return { speakers, audio_path: dialogue.path, merged_audio_path: null };
    });
  }

  private completedJob(jobId: string, ownerId?: string): JobRecord {
    const job = this.deps.lookup(jobId, ownerId);
    if (job.status !== 'completed' || !job.result) {
      throw new JobStateError('Job is not completed');
    }
    return job;
  }

  private async exclusive(
    job: JobRecord,
    action: (result: JobResult, context: StageContext) => Promise<Partial<JobResult>>,
  ): Promise<JobResult> {
    const snapshot = job.result;
    if (!snapshot) throw new JobStateError('Job is not completed');
    if (this.inFlight.has(job.id)) {
      throw new JobStateError('Another audio action is already running for this job');
    }
    this.inFlight.add(job.id);

    const log = createJobLogger(job.id);
    const context: StageContext = {
      job_id: job.id,
      run_dir: snapshot.run_dir,
      parameters: job.parameters,
      log,
    };

    try {
      let changes: Partial<JobResult>;
      try {
        changes = await action(snapshot, context);
      } catch (err) {
        log.warn({ error: errorMessage(err) }, 'Post-completion action failed');
        throw err instanceof StageError ? err : new StageError(errorMessage(err), { cause: err });
      }
      const current = this.deps.lookup(job.id).result ?? snapshot;
      const next: JobResult = { ...current, ...changes };
      await this.deps.commit(job.id, { result: next });
      return structuredClone(next);
    } finally {
      this.inFlight.delete(job.id);
    }
  }
}
