import { JobStateError } from '../lib/errors.js';
import { parseSpeakerConfigs } from './speaker-profiles.js';
import type { SpeakerConfig } from './types.js';

export interface SpeakerInputRequest {
  expectedTags: string[];
  defaults: SpeakerConfig[];
}

interface PendingSpeakerInput extends SpeakerInputRequest {
  resolve: (configs: SpeakerConfig[]) => void;
  reject: (err: SpeakerInputCancelled) => void;
}

/** Rejects a parked `park()` call whose job went away before input arrived. */
export class SpeakerInputCancelled extends Error {
  constructor(readonly jobId: string) {
    super(`Speaker input for job ${jobId} was cancelled`);
    this.name = 'SpeakerInputCancelled';
  }
}

export interface SpeakerClaim {
  configs: SpeakerConfig[];
  /** Wake the parked executor with the claimed configs. */
  release(): void;
  /** Put the gate back in its waiting state, e.g. when persisting the claim failed. */
  abandon(): void;
}

/**
 * Suspension points for jobs that need manual speaker configs. An executor
 * parks on `park()`; a resume request claims the gate and releases it.
 */
export class SpeakerGate {
  private readonly pending = new Map<string, PendingSpeakerInput>();

  park(jobId: string, request: SpeakerInputRequest): Promise<SpeakerConfig[]> {
    if (this.pending.has(jobId)) {
      return Promise.reject(new JobStateError('Job is already waiting for speaker input'));
    }
    return new Promise<SpeakerConfig[]>((resolve, reject) => {
      this.pending.set(jobId, { ...request, resolve, reject });
    });
  }

  isWaiting(jobId: string): boolean {
    return this.pending.has(jobId);
  }

  request(jobId: string): SpeakerInputRequest | null {
    const pending = this.pending.get(jobId);
    if (!pending) return null;
    return { expectedTags: [...pending.expectedTags], defaults: structuredClone(pending.defaults) };
  }

  /**
   * Validate `payload` against the parked job's tags and take the gate.
   * Invalid payloads throw SpeakerInputError and leave the job waiting.
   */
  claim(jobId: string, payload: unknown): SpeakerClaim {
    const pending = this.pending.get(jobId);
    if (!pending) {
      throw new JobStateError('Job is not waiting for speaker input');
    }
    const configs = parseSpeakerConfigs(payload, pending.expectedTags);
    this.pending.delete(jobId);

    let settled = false;
    return {
      configs,
      release: () => {
        if (settled) return;
        settled = true;
        pending.resolve(configs);
      },
      abandon: () => {
        if (settled) return;
        settled = true;
        this.pending.set(jobId, pending);
      },
    };
  }

  /** Reject the parked executor. Returns false when the job was not waiting. */
  cancel(jobId: string): boolean {
    const pending = this.pending.get(jobId);
    if (!pending) return false;
    this.pending.delete(jobId);
    pending.reject(new SpeakerInputCancelled(jobId));
    return true;
  }

  get size(): number {
    return this.pending.size;
  }
}
