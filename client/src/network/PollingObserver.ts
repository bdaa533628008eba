import { recordPayload, type DiscussionRecord } from '../../../shared/discussion.js';
import { ApiError, type DiscussionApi } from './DiscussionApi.js';
import { ProgressTracker, type ProgressView } from './ProgressTracker.js';
import { TransportTimeoutError } from './TransportTimeoutError.js';
import type { ObserveHandlers, ProgressObserver } from './ProgressObserver.js';

export interface PollingOptions {
  intervalMs?: number;
  maxAttempts?: number;
}

function wait(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Observation aborted'));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error('Observation aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Starts the discussion, then reads the persisted record every `intervalMs`
 * until it is completed or failed.
 */
export class PollingObserver implements ProgressObserver {
  private api: DiscussionApi;
  private intervalMs: number;
  private maxAttempts: number;

  constructor(api: DiscussionApi, options: PollingOptions = {}) {
    this.api = api;
    this.intervalMs = options.intervalMs ?? 2000;
    this.maxAttempts = options.maxAttempts ?? 60;
  }

  async observe(discussionId: number, handlers: ObserveHandlers = {}): Promise<ProgressView> {
    const { onProgress, signal } = handlers;
    try {
      await this.api.startDiscussion(discussionId);
    } catch (err) {
      // A finished discussion is read back like any other
      if (!(err instanceof ApiError && err.code === 'already_completed')) throw err;
    }

    const tracker = new ProgressTracker();
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      await wait(this.intervalMs, signal);
      let record: DiscussionRecord;
      try {
        record = await this.api.getDiscussion(discussionId);
      } catch (err) {
        if (err instanceof ApiError) throw err;
        console.warn(`[Polling] Poll ${attempt} for discussion ${discussionId} failed:`, err);
        continue;
      }
      if (tracker.apply(recordPayload(record))) onProgress?.(tracker.view);
      if (tracker.completed) return tracker.view;
    }
    throw new TransportTimeoutError('polling', `no result after ${this.maxAttempts} polls`);
  }
}
