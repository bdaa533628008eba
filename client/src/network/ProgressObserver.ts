import type { ProgressView } from './ProgressTracker.js';

export interface ObserveHandlers {
  /** Called with the folded view after every payload that changed it */
  onProgress?: (view: ProgressView) => void;
  signal?: AbortSignal;
}

/**
 * One way of following a discussion run. Resolves with the terminal view
 * (check `error` for a generation failure) or rejects with
 * TransportTimeoutError when the transport gives up.
 */
export interface ProgressObserver {
  observe(discussionId: number, handlers?: ObserveHandlers): Promise<ProgressView>;
}
