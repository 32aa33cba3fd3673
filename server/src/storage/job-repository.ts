import { PersistenceError } from '../lib/errors.js';
import type { JobPatch, JobRecord, SchedulerSettings } from '../pipeline/types.js';

export type StoredSettings = Pick<SchedulerSettings, 'parallel_enabled' | 'max_concurrent' | 'tags'>;

/**
 * Durable store for job records and scheduler settings. Every method either
 * completes the write or rejects with PersistenceError.
 */
export interface JobRepository {
  insert(job: JobRecord): Promise<void>;
  /** Partial update; untouched fields keep their stored values. */
  update(jobId: string, patch: JobPatch): Promise<void>;
  delete(jobId: string): Promise<void>;
  list(): Promise<JobRecord[]>;
  loadSettings(): Promise<StoredSettings | null>;
  saveSettings(settings: StoredSettings): Promise<void>;
}

/** Process-local store used when no database is configured, and in tests. */
export class InMemoryJobRepository implements JobRepository {
  private readonly rows = new Map<string, JobRecord>();
  private settings: StoredSettings | null = null;

  async insert(job: JobRecord): Promise<void> {
    if (this.rows.has(job.id)) {
      throw new PersistenceError(`Job ${job.id} already exists`);
    }
    this.rows.set(job.id, structuredClone(job));
  }

  async update(jobId: string, patch: JobPatch): Promise<void> {
    const row = this.rows.get(jobId);
    if (!row) {
      throw new PersistenceError(`Job ${jobId} not found in store`);
    }
    this.rows.set(jobId, { ...row, ...structuredClone(patch) });
  }

  async delete(jobId: string): Promise<void> {
    this.rows.delete(jobId);
  }

  async list(): Promise<JobRecord[]> {
    return Array.from(this.rows.values(), (row) => structuredClone(row));
  }

  async loadSettings(): Promise<StoredSettings | null> {
    return this.settings ? structuredClone(this.settings) : null;
  }

  async saveSettings(settings: StoredSettings): Promise<void> {
    this.settings = structuredClone(settings);
  }

  /** Synchronous read for tests. */
  peek(jobId: string): JobRecord | undefined {
    const row = this.rows.get(jobId);
    return row ? structuredClone(row) : undefined;
  }
}
