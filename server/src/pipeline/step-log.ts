import type { StepEvent } from './types.js';

export type StreamItem =
  | { type: 'progress'; event: StepEvent }
  | { type: 'done' };

/** Replace the entry with the same step key in place, or append. */
export function upsertStep(steps: readonly StepEvent[], event: StepEvent): StepEvent[] {
  const index = steps.findIndex((s) => s.step === event.step);
  if (index === -1) return [...steps, event];
  const next = [...steps];
  next[index] = event;
  return next;
}

/**
 * One observer's view of a job's log. Items are buffered per subscriber, so a
 * slow consumer never holds up the producer or other subscribers.
 */
export class StepSubscription implements AsyncIterable<StreamItem> {
  private buffer: StreamItem[] = [];
  private waiter: ((result: IteratorResult<StreamItem, undefined>) => void) | null = null;
  private ended = false;

  constructor(private readonly onClose: (subscription: StepSubscription) => void) {}

  /** @internal */
  push(item: StreamItem): void {
    if (this.ended) return;
    if (item.type === 'done') this.ended = true;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter({ value: item, done: false });
    } else {
      this.buffer.push(item);
    }
  }

  next(): Promise<IteratorResult<StreamItem, undefined>> {
    const item = this.buffer.shift();
    if (item) return Promise.resolve<IteratorResult<StreamItem, undefined>>({ value: item, done: false });
    if (this.ended) return Promise.resolve<IteratorResult<StreamItem, undefined>>({ value: undefined, done: true });
    return new Promise<IteratorResult<StreamItem, undefined>>((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Stop receiving. Buffered items are discarded. Safe to call twice. */
  close(): void {
    this.ended = true;
    this.buffer = [];
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.({ value: undefined, done: true });
    this.onClose(this);
  }

  [Symbol.asyncIterator](): AsyncIterator<StreamItem, undefined> {
    return {
      next: () => this.next(),
      return: async (): Promise<IteratorResult<StreamItem, undefined>> => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }
}

interface Channel {
  steps: StepEvent[];
  subscribers: Set<StepSubscription>;
  finished: boolean;
}

/**
 * Per-job step log with live fan-out. Appends are upserts by step key;
 * subscribers receive the backlog, then live events, then one `done`.
 */
export class StepLog {
  private readonly channels = new Map<string, Channel>();

  open(jobId: string, steps: readonly StepEvent[] = [], finished = false): void {
    this.channels.set(jobId, { steps: [...steps], subscribers: new Set(), finished });
  }

  private channel(jobId: string): Channel {
    let channel = this.channels.get(jobId);
    if (!channel) {
      channel = { steps: [], subscribers: new Set(), finished: false };
      this.channels.set(jobId, channel);
    }
    return channel;
  }

  append(jobId: string, event: StepEvent): StepEvent[] {
    const channel = this.channel(jobId);
    channel.steps = upsertStep(channel.steps, event);
    if (!channel.finished) {
      for (const subscriber of channel.subscribers) {
        subscriber.push({ type: 'progress', event: { ...event } });
      }
    }
    return [...channel.steps];
  }

  snapshot(jobId: string): StepEvent[] {
    return [...(this.channels.get(jobId)?.steps ?? [])];
  }

  isFinished(jobId: string): boolean {
    return this.channels.get(jobId)?.finished ?? false;
  }

  /** Mark the job terminal: every subscriber gets `done` and is released. */
  finish(jobId: string): void {
    const channel = this.channel(jobId);
    if (channel.finished) return;
    channel.finished = true;
    const subscribers = Array.from(channel.subscribers);
    channel.subscribers.clear();
    for (const subscriber of subscribers) {
      subscriber.push({ type: 'done' });
    }
  }

  subscribe(jobId: string): StepSubscription {
    const channel = this.channel(jobId);
    const subscription = new StepSubscription((s) => {
      this.channels.get(jobId)?.subscribers.delete(s);
    });
    for (const event of channel.steps) {
      subscription.push({ type: 'progress', event: { ...event } });
    }
    if (channel.finished) {
      subscription.push({ type: 'done' });
    } else {
      channel.subscribers.add(subscription);
    }
    return subscription;
  }

  /** Finish and forget a job's channel. */
  drop(jobId: string): void {
    this.finish(jobId);
    this.channels.delete(jobId);
  }

  stats(): { channels: number; subscribers: number } {
    let subscribers = 0;
    for (const channel of this.channels.values()) {
      subscribers += channel.subscribers.size;
    }
    return { channels: this.channels.size, subscribers };
  }
}
