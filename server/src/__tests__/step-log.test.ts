import { describe, it, expect, vi } from 'vitest';
import { StepLog, upsertStep } from '../pipeline/step-log.js';
import type { StreamItem } from '../pipeline/step-log.js';
import type { StepEvent } from '../pipeline/types.js';

function event(step: StepEvent['step'], status: StepEvent['status'], message = `${step} ${status}`): StepEvent {
  return { step, status, message, detail: null, timestamp: '2026-01-01T00:00:00.000Z' };
}

async function collect(iterable: AsyncIterable<StreamItem>): Promise<StreamItem[]> {
  const items: StreamItem[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

describe('upsertStep', () => {
  it('replaces an existing step in place and appends new ones', () => {
    const steps = [event('acquisition', 'completed'), event('transcription', 'running')];
    const next = upsertStep(steps, event('transcription', 'completed'));

    expect(next.map((s) => `${s.step}:${s.status}`)).toEqual(['acquisition:completed', 'transcription:completed']);
    expect(upsertStep(next, event('translation', 'running'))).toHaveLength(3);
    expect(steps[1]?.status).toBe('running');
  });
});

describe('StepLog', () => {
  it('delivers backlog, then live events, then done', async () => {
    const log = new StepLog();
    log.append('job-1', event('acquisition', 'running'));
    log.append('job-1', event('acquisition', 'completed'));

    const subscription = log.subscribe('job-1');
    const items = collect(subscription);

    log.append('job-1', event('transcription', 'running'));
    log.finish('job-1');

    expect(await items).toEqual([
      { type: 'progress', event: event('acquisition', 'completed') },
      { type: 'progress', event: event('transcription', 'running') },
      { type: 'done' },
    ]);
  });

  it('gives late subscribers to a finished job the snapshot and done', async () => {
    const log = new StepLog();
    log.open('job-2', [event('acquisition', 'failed', 'Audio file not found: /a.mp3')], true);

    expect(await collect(log.subscribe('job-2'))).toEqual([
      { type: 'progress', event: event('acquisition', 'failed', 'Audio file not found: /a.mp3') },
      { type: 'done' },
    ]);
    expect(log.stats().subscribers).toBe(0);
  });

  it('fans out to every subscriber independently', async () => {
    const log = new StepLog();
    const a = collect(log.subscribe('job-3'));
    const b = collect(log.subscribe('job-3'));
    expect(log.stats()).toEqual({ channels: 1, subscribers: 2 });

    log.append('job-3', event('acquisition', 'running'));
    log.finish('job-3');

    const expected = [{ type: 'progress', event: event('acquisition', 'running') }, { type: 'done' }];
    expect(await a).toEqual(expected);
    expect(await b).toEqual(expected);
    expect(log.stats().subscribers).toBe(0);
  });

  it('ignores appends after finish for subscribers but keeps the snapshot current', () => {
    const log = new StepLog();
    const subscription = log.subscribe('job-4');
    const push = vi.spyOn(subscription, 'push');

    log.finish('job-4');
    log.append('job-4', event('synthesis', 'completed'));

    expect(push).toHaveBeenCalledTimes(1);
    expect(log.snapshot('job-4')).toEqual([event('synthesis', 'completed')]);
    expect(log.isFinished('job-4')).toBe(true);
  });

  it('closing a subscription ends its iteration and unregisters it', async () => {
    const log = new StepLog();
    const subscription = log.subscribe('job-5');
    const pending = subscription.next();

    subscription.close();

    expect(await pending).toEqual({ value: undefined, done: true });
    expect(log.stats().subscribers).toBe(0);
    log.append('job-5', event('acquisition', 'running'));
    expect(await subscription.next()).toEqual({ value: undefined, done: true });
  });

  it('breaking out of for-await closes the subscription', async () => {
    const log = new StepLog();
    log.append('job-6', event('acquisition', 'running'));
    const subscription = log.subscribe('job-6');

    for await (const item of subscription) {
      expect(item.type).toBe('progress');
      break;
    }

    expect(log.stats().subscribers).toBe(0);
  });

  it('drop finishes open subscribers and forgets the channel', async () => {
    const log = new StepLog();
    const items = collect(log.subscribe('job-7'));

    log.drop('job-7');

    expect(await items).toEqual([{ type: 'done' }]);
    expect(log.snapshot('job-7')).toEqual([]);
    expect(log.stats().channels).toBe(0);
  });

  it('snapshot copies are detached from the log', () => {
    const log = new StepLog();
    log.append('job-8', event('acquisition', 'running'));
    const snapshot = log.snapshot('job-8');
    snapshot.push(event('transcription', 'running'));

    expect(log.snapshot('job-8')).toHaveLength(1);
  });
});
