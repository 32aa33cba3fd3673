import { randomUUID } from 'node:crypto';
import logger, { createJobLogger } from '../lib/logger.js';
import { Mutex } from '../lib/mutex.js';
import { clampConcurrency } from '../lib/config.js';
import {
  AdmissionError,
  JobStateError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from '../lib/errors.js';
import { parseOrThrow } from '../lib/validate.js';
import type { JobRepository } from '../storage/job-repository.js';
import { StepExecutor } from './executor.js';
import { PostCompletionActions } from './post-actions.js';
import { metadataSchema, parseJobSpec, settingsPatchSchema } from './schemas.js';
import { SpeakerGate } from './speaker-gate.js';
import { StepLog } from './step-log.js';
import type { StepSubscription } from './step-log.js';
import type { PipelineStages } from './stages.js';
import { isTerminal } from './types.js';
import type {
  JobPatch,
  JobRecord,
  JobResult,
  SchedulerSettings,
  SpeakerConfig,
  StepEvent,
} from './types.js';

export const INTERRUPTED_MESSAGE = 'Interrupted by server restart';

export interface SchedulerOptions {
  repository: JobRepository;
  stages: PipelineStages;
  runsDir: string;
  maxQueueSize: number;
  parallelEnabled: boolean;
  maxConcurrent: number;
  introAssets?: string[];
  now?: () => Date;
}

export interface SpeakerTemplate {
  detected_speakers: string[];
  speakers: SpeakerConfig[];
}

export interface SchedulerStats {
  queued: number;
  running: number;
  waiting_for_input: number;
  stream_subscribers: number;
}

/**
 * Admission, ordering and promotion of pipeline jobs. Queue order and the
 * running set are only read or changed while holding `lock`; executors run
 * outside it and report back when they reach a terminal state.
 */
export class Scheduler {
  readonly stepLog = new StepLog();
  private readonly speakerGate = new SpeakerGate();
  private readonly lock = new Mutex();
  private readonly jobs = new Map<string, JobRecord>();
  private readonly running = new Set<string>();
  private readonly deleted = new Set<string>();
  private readonly executions = new Map<string, Promise<void>>();
  private readonly actions: PostCompletionActions;
  private readonly repository: JobRepository;
  private readonly stages: PipelineStages;
  private readonly runsDir: string;
  private readonly now: () => Date;
  private queue: string[] = [];
  private settings: SchedulerSettings;
  private introAssets: string[];

  constructor(options: SchedulerOptions) {
    this.repository = options.repository;
    this.stages = options.stages;
    this.runsDir = options.runsDir;
    this.now = options.now ?? (() => new Date());
    this.introAssets = [...(options.introAssets ?? [])];
    this.settings = {
      parallel_enabled: options.parallelEnabled,
      max_concurrent: clampConcurrency(options.maxConcurrent),
      max_queued: options.maxQueueSize,
      tags: [],
    };
    this.actions = new PostCompletionActions({
      stages: this.stages,
      commit: (jobId, patch) => this.commit(jobId, patch),
      lookup: (jobId, ownerId) => this.requireJob(jobId, ownerId),
      introAssets: () => this.introAssets,
    });
  }

  // ─── Submission & queue ────────────────────────────────────────────────────

  async submit(ownerId: string, body: unknown): Promise<JobRecord> {
    const spec = parseJobSpec(body);

    return this.lock.runExclusive(async () => {
      const active = this.queue.length + this.running.size;
      if (active >= this.settings.max_queued) {
        throw new AdmissionError(this.settings.max_queued);
      }

      const job: JobRecord = {
        id: randomUUID(),
        owner_id: ownerId,
        status: 'queued',
        created_at: this.now().toISOString(),
        started_at: null,
        finished_at: null,
        error: null,
        steps: [],
        result: null,
        speaker_required: spec.speaker_required,
        speaker_submitted: false,
        queue_position: this.queue.length,
        source: spec.source,
        parameters: spec.parameters,
        name: spec.name,
        note: spec.note,
        tags: this.filterTags(spec.tags),
        published: false,
      };

      await this.repository.insert(job);
      this.jobs.set(job.id, job);
      this.queue.push(job.id);
      this.stepLog.open(job.id);
      logger.info({ job_id: job.id, source: job.source.kind, queued: this.queue.length }, 'Pipeline job queued');

      await this.promoteLocked();
      return this.snapshot(job);
    });
  }

  /**
   * Replace queue order. `orderedIds` must be exactly the queued job ids.
   * Positions are written one at a time; if a write fails, the ones already
   * written are put back so the store keeps the previous order.
   */
  async reorderQueue(orderedIds: readonly string[]): Promise<string[]> {
    return this.lock.runExclusive(async () => {
      const requested = new Set(orderedIds);
      if (requested.size !== orderedIds.length) {
        throw new ValidationError('Reorder list contains duplicate job ids');
      }
      const current = new Set(this.queue);
      if (requested.size !== current.size || orderedIds.some((id) => !current.has(id))) {
        throw new ValidationError('Reorder list must contain exactly the queued job ids');
      }

      const previous = new Map(
        this.queue.map((id): [string, number | null] => [id, this.jobs.get(id)?.queue_position ?? null]),
      );
      const written: string[] = [];
      try {
        for (const [index, id] of orderedIds.entries()) {
          if (previous.get(id) === index) continue;
          await this.commit(id, { queue_position: index });
          written.push(id);
        }
      } catch (err) {
        await this.restorePositions(written, previous);
        throw err;
      }
      this.queue = [...orderedIds];
      logger.info({ queue: this.queue }, 'Queue reordered');
      return [...this.queue];
    });
  }

  private async restorePositions(ids: readonly string[], previous: ReadonlyMap<string, number | null>): Promise<void> {
    for (const id of ids) {
      try {
        await this.commit(id, { queue_position: previous.get(id) ?? null });
      } catch (err) {
        logger.error({ job_id: id, error: errorMessage(err) }, 'Could not restore queue position');
      }
    }
  }

  async updateSettings(body: unknown): Promise<SchedulerSettings> {
    const patch = parseOrThrow(settingsPatchSchema, body);
    return this.lock.runExclusive(async () => {
      const next: SchedulerSettings = {
        ...this.settings,
        ...(patch.parallel_enabled !== undefined ? { parallel_enabled: patch.parallel_enabled } : {}),
        ...(patch.max_concurrent !== undefined ? { max_concurrent: patch.max_concurrent } : {}),
        ...(patch.tags !== undefined ? { tags: Array.from(new Set(patch.tags)) } : {}),
      };
      await this.repository.saveSettings({
        parallel_enabled: next.parallel_enabled,
        max_concurrent: next.max_concurrent,
        tags: next.tags,
      });
      this.settings = next;
      logger.info(
        { parallel_enabled: next.parallel_enabled, max_concurrent: next.max_concurrent },
        'Scheduler settings updated',
      );
      await this.promoteLocked();
      return this.getSettings();
    });
  }

  /** Applies to future promotions only; running jobs are never preempted. */
  async updateCapacity(parallelEnabled: boolean, maxConcurrent: number): Promise<SchedulerSettings> {
    return this.updateSettings({ parallel_enabled: parallelEnabled, max_concurrent: maxConcurrent });
  }

  getSettings(): SchedulerSettings {
    return { ...this.settings, tags: [...this.settings.tags] };
  }

  private effectiveLimit(): number {
    return this.settings.parallel_enabled ? this.settings.max_concurrent : 1;
  }

  /** Fill free slots from the head of the queue. Caller holds `lock`. */
  private async promoteLocked(): Promise<void> {
    while (this.running.size < this.effectiveLimit() && this.queue.length > 0) {
      const jobId = this.queue[0];
      const job = this.jobs.get(jobId);
      if (!job) {
        this.queue.shift();
        continue;
      }

      try {
        await this.commit(jobId, {
          status: 'running',
          started_at: this.now().toISOString(),
          queue_position: null,
        });
      } catch (err) {
        logger.error({ job_id: jobId, error: errorMessage(err) }, 'Failed to promote queued job');
        return;
      }

      this.queue.shift();
      this.start(job);
    }
  }

  private start(job: JobRecord): void {
    this.running.add(job.id);
    const log = createJobLogger(job.id);
    const executor = new StepExecutor(job, {
      stages: this.stages,
      stepLog: this.stepLog,
      speakerGate: this.speakerGate,
      commit: (jobId, patch) => this.commit(jobId, patch),
      runsDir: this.runsDir,
      now: this.now,
    });

    const execution = executor
      .run()
      .then((outcome) => {
        log.info({ status: outcome.status }, 'Pipeline job finished');
      })
      .catch((err: unknown) => this.recordCrash(job.id, err))
      .finally(() => this.release(job.id));
    this.executions.set(job.id, execution);
  }

  private async recordCrash(jobId: string, err: unknown): Promise<void> {
    const log = createJobLogger(jobId);
    log.error({ error: errorMessage(err) }, 'Pipeline executor stopped');
    const job = this.jobs.get(jobId);
    if (job && !isTerminal(job.status)) {
      try {
        await this.commit(jobId, {
          status: 'failed',
          error: `Persistence failed: ${errorMessage(err)}`,
          finished_at: this.now().toISOString(),
        });
      } catch (second) {
        log.error({ error: errorMessage(second) }, 'Could not record executor failure');
      }
    }
    this.stepLog.finish(jobId);
  }

  private async release(jobId: string): Promise<void> {
    await this.lock.runExclusive(async () => {
      this.running.delete(jobId);
      this.executions.delete(jobId);
      if (this.deleted.delete(jobId)) {
        this.stepLog.drop(jobId);
      }
      await this.promoteLocked();
    });
  }

  // ─── Queries ───────────────────────────────────────────────────────────────

  /**
   * Jobs visible to `ownerId` (all jobs when omitted): queued by position,
   * then running by start time, then finished jobs newest first.
   */
  list(ownerId?: string): JobRecord[] {
    const rank = (job: JobRecord) => (job.status === 'queued' ? 0 : job.status === 'running' ? 1 : 2);
    return Array.from(this.jobs.values())
      .filter((job) => ownerId === undefined || job.owner_id === ownerId)
      .sort((a, b) => {
        const byRank = rank(a) - rank(b);
        if (byRank !== 0) return byRank;
        if (a.status === 'queued') return this.queue.indexOf(a.id) - this.queue.indexOf(b.id);
        if (a.status === 'running') return (a.started_at ?? '').localeCompare(b.started_at ?? '');
        return (b.finished_at ?? '').localeCompare(a.finished_at ?? '');
      })
      .map((job) => this.snapshot(job));
  }

  get(jobId: string, ownerId?: string): JobRecord {
    return this.snapshot(this.requireJob(jobId, ownerId));
  }

  subscribe(jobId: string, ownerId?: string): StepSubscription {
    this.requireJob(jobId, ownerId);
    return this.stepLog.subscribe(jobId);
  }

  stats(): SchedulerStats {
    return {
      queued: this.queue.length,
      running: this.running.size,
      waiting_for_input: this.speakerGate.size,
      stream_subscribers: this.stepLog.stats().subscribers,
    };
  }

  /** Resolves once no executor is in flight. A job parked on speaker input never settles. */
  async drain(): Promise<void> {
    while (this.executions.size > 0) {
      await Promise.allSettled(Array.from(this.executions.values()));
    }
  }

  // ─── Speaker input ─────────────────────────────────────────────────────────

  async resumeWithSpeakers(jobId: string, payload: unknown, ownerId?: string): Promise<JobRecord> {
    const job = this.requireJob(jobId, ownerId);
    if (!job.speaker_required) {
      throw new JobStateError('Speaker input not required for this job');
    }
    if (job.speaker_submitted) {
      throw new JobStateError('Speaker input already submitted');
    }

    const claim = this.speakerGate.claim(jobId, payload);
    try {
      await this.commit(jobId, { speaker_submitted: true });
    } catch (err) {
      claim.abandon();
      if (!this.jobs.has(jobId)) this.speakerGate.cancel(jobId);
      throw err;
    }
    claim.release();
    createJobLogger(jobId).info({ speakers: claim.configs.length }, 'Speaker configs submitted');
    return this.snapshot(job);
  }

  speakerTemplate(jobId: string, ownerId?: string): SpeakerTemplate {
    const job = this.requireJob(jobId, ownerId);
    const request = this.speakerGate.request(jobId);
    if (request) {
      return { detected_speakers: request.expectedTags, speakers: request.defaults };
    }
    if (job.result) {
      return {
        detected_speakers: [...job.result.speaker_tags],
        speakers: structuredClone(job.result.speakers),
      };
    }
    throw new JobStateError('Speaker template is not available yet');
  }

  // ─── Metadata & deletion ───────────────────────────────────────────────────

  async updateMetadata(jobId: string, body: unknown, ownerId?: string): Promise<JobRecord> {
    const job = this.requireJob(jobId, ownerId);
    const update = parseOrThrow(metadataSchema, body);

    const patch: JobPatch = {};
    if (update.name !== undefined) patch.name = update.name?.trim() || null;
    if (update.note !== undefined) patch.note = update.note?.trim() || null;
    if (update.tags !== undefined) patch.tags = this.filterTags(update.tags);
    if (update.published !== undefined) patch.published = update.published;

    await this.commit(jobId, patch);
    return this.snapshot(job);
  }

  /**
   * Remove a job from listings and the queue. A running executor is left to
   * finish its current stage and its slot frees when it does; one parked on
   * speaker input is woken and stops at once.
   */
  async delete(jobId: string, ownerId?: string): Promise<void> {
    await this.lock.runExclusive(async () => {
      this.requireJob(jobId, ownerId);
      await this.repository.delete(jobId);
      this.jobs.delete(jobId);
      this.queue = this.queue.filter((id) => id !== jobId);
      if (this.running.has(jobId)) {
        this.deleted.add(jobId);
        if (this.speakerGate.cancel(jobId)) {
          logger.info({ job_id: jobId }, 'Cancelled speaker wait for deleted job');
        }
      } else {
        this.stepLog.drop(jobId);
      }
      logger.info({ job_id: jobId }, 'Pipeline job deleted');
    });
  }

  // ─── Post-completion audio ─────────────────────────────────────────────────

  generateSummaryAudio(jobId: string, ownerId?: string): Promise<JobResult> {
    return this.actions.generateSummaryAudio(jobId, ownerId);
  }

  mergeFinalAudio(jobId: string, ownerId?: string): Promise<JobResult> {
    return this.actions.mergeFinalAudio(jobId, ownerId);
  }

  regenerateAudio(jobId: string, payload: unknown, ownerId?: string): Promise<JobResult> {
    return this.actions.regenerateAudio(jobId, payload, ownerId);
  }

  // ─── Startup ───────────────────────────────────────────────────────────────

  /**
   * Load persisted state. Jobs left `running` by a previous process are
   * failed; queued jobs keep their relative order.
   */
  async restore(): Promise<void> {
    const [records, stored] = await Promise.all([
      this.repository.list(),
      this.repository.loadSettings(),
    ]);

    await this.lock.runExclusive(async () => {
      if (stored) {
        this.settings = {
          ...this.settings,
          parallel_enabled: stored.parallel_enabled,
          max_concurrent: clampConcurrency(stored.max_concurrent),
          tags: [...stored.tags],
        };
      }

      const queued: JobRecord[] = [];
      let interrupted = 0;
      for (const record of records) {
        let job = record;
        if (job.status === 'running') {
          const finishedAt = this.now().toISOString();
          const steps = job.steps.map((step): StepEvent => (
            step.status === 'running' || step.status === 'waiting'
              ? { ...step, status: 'failed', message: INTERRUPTED_MESSAGE, timestamp: finishedAt }
              : step
          ));
          const patch: JobPatch = { status: 'failed', error: INTERRUPTED_MESSAGE, finished_at: finishedAt, steps };
          await this.repository.update(job.id, patch);
          job = { ...job, ...patch };
          interrupted += 1;
        }
        this.jobs.set(job.id, job);
        this.stepLog.open(job.id, job.steps, isTerminal(job.status));
        if (job.status === 'queued') queued.push(job);
      }

      queued.sort((a, b) => {
        const byPosition = (a.queue_position ?? Number.MAX_SAFE_INTEGER) - (b.queue_position ?? Number.MAX_SAFE_INTEGER);
        return byPosition !== 0 ? byPosition : a.created_at.localeCompare(b.created_at);
      });
      this.queue = queued.map((job) => job.id);

      logger.info({ jobs: records.length, queued: this.queue.length, interrupted }, 'Pipeline state restored');
      await this.promoteLocked();
    });
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private requireJob(jobId: string, ownerId?: string): JobRecord {
    const job = this.jobs.get(jobId);
    if (!job || (ownerId !== undefined && job.owner_id !== ownerId)) {
      throw new NotFoundError();
    }
    return job;
  }

  /** Write-through: the store is updated first, then the in-memory record. */
  private async commit(jobId: string, patch: JobPatch): Promise<void> {
    const job = this.jobs.get(jobId);
    if (!job) return;
    await this.repository.update(jobId, patch);
    Object.assign(job, patch);
  }

  private filterTags(tags: readonly string[]): string[] {
    const cleaned = Array.from(new Set(tags.map((t) => t.trim()).filter(Boolean)));
    if (this.settings.tags.length === 0) return cleaned;
    return cleaned.filter((tag) => this.settings.tags.includes(tag));
  }

  private snapshot(job: JobRecord): JobRecord {
    const copy = structuredClone(job);
    copy.queue_position = job.status === 'queued' ? this.queue.indexOf(job.id) : null;
    return copy;
  }
}
