/**
 * ProgressFeed: what a streaming transport sends for one discussion.
 *
 * Resolves, per connecting client, whether to follow a live registry entry,
 * replay the persisted record, or report that the discussion does not exist.
 * Pending discussions are started on connect; a start that loses the race to
 * another caller (`already_running`) just observes.
 */

import { RunPreconditionError } from './errors.js';
import { recordPayload } from '../../shared/discussion.js';
import type { DiscussionRunEngine } from './DiscussionRunEngine.js';
import type { IDiscussionStore, IProgressRegistry, ISubscription } from './interfaces/index.js';
import type { ProgressPayload, RunSnapshot } from './types.js';

/** `full` repeats the whole message list; `delta` sends messages past `offset`. */
export type FeedMode = 'full' | 'delta';

export interface WatchOptions {
  signal?: AbortSignal;
  mode?: FeedMode;
  /** Start a pending discussion on connect (default true) */
  autoStart?: boolean;
}

export interface ProgressFeedOptions {
  /** How long to wait for a first snapshot of a running discussion (ms) */
  attachTimeoutMs: number;
}

type Attachment =
  | { kind: 'live'; subscription: ISubscription }
  | { kind: 'payload'; payload: ProgressPayload };

export class ProgressFeed {
  constructor(
    private readonly store: IDiscussionStore,
    private readonly registry: IProgressRegistry,
    private readonly engine: DiscussionRunEngine,
    private readonly options: ProgressFeedOptions,
  ) {}

  /**
   * Yield payloads until the run's terminal payload has been sent, the
   * signal aborts, or the live entry goes away (the persisted record is sent
   * last in that case).
   */
  async *watch(discussionId: number, options: WatchOptions = {}): AsyncGenerator<ProgressPayload> {
    const { signal, mode = 'full', autoStart = true } = options;
    const attachment = await this.attach(discussionId, autoStart);
    if (attachment.kind === 'payload') {
      yield withOffset(attachment.payload, mode);
      return;
    }

    const sub = attachment.subscription;
    try {
      let snapshot = await this.firstSnapshot(sub, signal);
      while (snapshot) {
        yield toPayload(snapshot, sub, mode);
        if (snapshot.completed) return;
        snapshot = await sub.next(signal);
      }
      if (signal?.aborted) return;

      const record = await this.store.getDiscussion(discussionId);
      yield withOffset(record ? recordPayload(record) : notFoundPayload(discussionId), mode);
    } finally {
      sub.close();
    }
  }

  private async attach(discussionId: number, autoStart: boolean): Promise<Attachment> {
    if (this.registry.currentSnapshot(discussionId)) {
      return { kind: 'live', subscription: this.registry.subscribe(discussionId) };
    }

    const record = await this.store.getDiscussion(discussionId);
    if (!record) return { kind: 'payload', payload: notFoundPayload(discussionId) };
    if (record.status === 'completed' || record.status === 'failed') {
      return { kind: 'payload', payload: recordPayload(record) };
    }

    // Subscribe before starting so the first snapshot cannot be missed
    const subscription = this.registry.subscribe(discussionId);
    if (record.status === 'pending' && autoStart) {
      try {
        await this.engine.start(discussionId);
      } catch (err) {
        if (err instanceof RunPreconditionError && err.code === 'already_running') {
          console.log(`[Feed] Discussion ${discussionId} already running; observing`);
        } else {
          subscription.close();
          const message = err instanceof Error ? err.message : String(err);
          return {
            kind: 'payload',
            payload: { progress: 0, message, completed: true, error: message, messages: [] },
          };
        }
      }
    }
    return { kind: 'live', subscription };
  }

  /** Wait for the first snapshot, giving up after attachTimeoutMs. */
  private async firstSnapshot(sub: ISubscription, signal?: AbortSignal): Promise<RunSnapshot | null> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    const timer = setTimeout(() => controller.abort(), this.options.attachTimeoutMs);
    try {
      return await sub.next(controller.signal);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

function toPayload(snapshot: RunSnapshot, sub: ISubscription, mode: FeedMode): ProgressPayload {
  const payload: ProgressPayload = {
    progress: snapshot.progress,
    message: snapshot.message,
    completed: snapshot.completed,
  };
  if (snapshot.error !== undefined) payload.error = snapshot.error;
  if (mode === 'delta') {
    const delta = sub.takeDelta(snapshot);
    payload.offset = delta.offset;
    payload.messages = [...delta.messages];
  } else {
    payload.messages = [...snapshot.messages];
  }
  return payload;
}

function withOffset(payload: ProgressPayload, mode: FeedMode): ProgressPayload {
  return mode === 'delta' ? { ...payload, offset: 0 } : payload;
}

export function notFoundPayload(discussionId: number): ProgressPayload {
  return {
    progress: 0,
    message: `Discussion ${discussionId} not found`,
    completed: true,
    error: 'not_found',
    messages: [],
  };
}
