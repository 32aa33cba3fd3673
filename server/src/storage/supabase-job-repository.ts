import type { SupabaseClient } from '@supabase/supabase-js';
import logger from '../lib/logger.js';
import { PersistenceError } from '../lib/errors.js';
import { jobRecordSchema, storedSettingsSchema } from '../pipeline/schemas.js';
import type { JobPatch, JobRecord } from '../pipeline/types.js';
import type { JobRepository, StoredSettings } from './job-repository.js';

export const JOBS_TABLE = 'pipeline_jobs';
export const SETTINGS_TABLE = 'pipeline_settings';
const SETTINGS_ROW_ID = 'default';

/**
 * Job store backed by two Supabase tables. `steps`, `result`, `source`,
 * `parameters` and `tags` are jsonb columns.
 */
export class SupabaseJobRepository implements JobRepository {
  constructor(private readonly client: SupabaseClient) {}

  async insert(job: JobRecord): Promise<void> {
    const { error } = await this.client.from(JOBS_TABLE).insert(job);
    if (error) {
      throw new PersistenceError(`Failed to insert job ${job.id}: ${error.message}`);
    }
  }

  async update(jobId: string, patch: JobPatch): Promise<void> {
    const { error } = await this.client
      .from(JOBS_TABLE)
      .update({ ...patch, updated_at: new Date().toISOString() })
      .eq('id', jobId);
    if (error) {
      throw new PersistenceError(`Failed to update job ${jobId}: ${error.message}`);
    }
  }

  async delete(jobId: string): Promise<void> {
    const { error } = await this.client.from(JOBS_TABLE).delete().eq('id', jobId);
    if (error) {
      throw new PersistenceError(`Failed to delete job ${jobId}: ${error.message}`);
    }
  }

  async list(): Promise<JobRecord[]> {
    const { data, error } = await this.client
      .from(JOBS_TABLE)
      .select('*')
      .order('created_at', { ascending: true });
    if (error) {
      throw new PersistenceError(`Failed to load jobs: ${error.message}`);
    }

    const jobs: JobRecord[] = [];
    for (const row of data ?? []) {
      const parsed = jobRecordSchema.safeParse(row);
      if (!parsed.success) {
        logger.warn({ issues: parsed.error.issues.slice(0, 3) }, 'Skipping malformed pipeline job row');
        continue;
      }
      jobs.push(parsed.data);
    }
    return jobs;
  }

  async loadSettings(): Promise<StoredSettings | null> {
    const { data, error } = await this.client
      .from(SETTINGS_TABLE)
      .select('parallel_enabled, max_concurrent, tags')
      .eq('id', SETTINGS_ROW_ID)
      .maybeSingle();
    if (error) {
      throw new PersistenceError(`Failed to load settings: ${error.message}`);
    }
    if (!data) return null;
    const parsed = storedSettingsSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn({ issues: parsed.error.issues.slice(0, 3) }, 'Ignoring malformed pipeline settings row');
      return null;
    }
    return parsed.data;
  }

  async saveSettings(settings: StoredSettings): Promise<void> {
    const { error } = await this.client
      .from(SETTINGS_TABLE)
      .upsert({ id: SETTINGS_ROW_ID, ...settings, updated_at: new Date().toISOString() });
    if (error) {
      throw new PersistenceError(`Failed to save settings: ${error.message}`);
    }
  }
}
