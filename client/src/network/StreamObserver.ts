import { DEFAULT_BACKOFF, backoffDelay, type BackoffPolicy } from './backoff.js';
import { ProgressTracker, parsePayload, type ProgressView } from './ProgressTracker.js';
import { TransportTimeoutError } from './TransportTimeoutError.js';
import type { DiscussionApi } from './DiscussionApi.js';
import type { ObserveHandlers, ProgressObserver } from './ProgressObserver.js';

export interface StreamHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onError(): void;
}

export interface StreamConnection {
  close(): void;
}

export type EventSourceFactory = (url: string, handlers: StreamHandlers) => StreamConnection;

/** Default factory: the browser's EventSource. */
export const browserEventSource: EventSourceFactory = (url, handlers) => {
  const source = new EventSource(url);
  source.onopen = () => handlers.onOpen();
  source.onmessage = (event) => handlers.onMessage(String(event.data));
  source.onerror = () => handlers.onError();
  return source;
};

export interface StreamObserverOptions {
  /** Give up on a connection that delivers nothing for this long (ms) */
  connectTimeoutMs?: number;
  backoff?: BackoffPolicy;
  eventSource?: EventSourceFactory;
}

/**
 * Follows a discussion over Server-Sent Events. The server starts a pending
 * discussion when the stream connects. Transport errors reconnect with
 * bounded backoff; nothing reconnects once the terminal payload arrived.
 */
export class StreamObserver implements ProgressObserver {
  private api: DiscussionApi;
  private connectTimeoutMs: number;
  private backoff: BackoffPolicy;
  private eventSource: EventSourceFactory;

  constructor(api: DiscussionApi, options: StreamObserverOptions = {}) {
    this.api = api;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 30_000;
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.eventSource = options.eventSource ?? browserEventSource;
  }

  observe(discussionId: number, handlers: ObserveHandlers = {}): Promise<ProgressView> {
    const { onProgress, signal } = handlers;
    const url = this.api.streamUrl(discussionId);

    return new Promise((resolve, reject) => {
      const tracker = new ProgressTracker();
      let connection: StreamConnection | null = null;
      let connectTimer: ReturnType<typeof setTimeout> | undefined;
      let retryTimer: ReturnType<typeof setTimeout> | undefined;
      let failures = 0;
      let settled = false;

      const finish = (settle: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(connectTimer);
        clearTimeout(retryTimer);
        connection?.close();
        connection = null;
        signal?.removeEventListener('abort', onAbort);
        settle();
      };

      const onAbort = () => finish(() => reject(new Error('Observation aborted')));

      const retry = (reason: string) => {
        clearTimeout(connectTimer);
        connection?.close();
        connection = null;
        if (settled || tracker.completed) return;

        failures++;
        if (failures > this.backoff.maxAttempts) {
          finish(() => reject(new TransportTimeoutError('sse', `${reason} after ${this.backoff.maxAttempts} reconnects`)));
          return;
        }
        const delay = backoffDelay(failures, this.backoff);
        console.warn(`[SSE] ${reason}; reconnecting in ${delay}ms (attempt ${failures}/${this.backoff.maxAttempts})`);
        retryTimer = setTimeout(connect, delay);
      };

      const connect = () => {
        if (settled) return;
        connectTimer = setTimeout(() => retry('connect timeout'), this.connectTimeoutMs);
        connection = this.eventSource(url, {
          onOpen: () => {
            console.log(`[SSE] Connected to discussion ${discussionId}`);
          },
          onMessage: (data) => {
            if (settled) return;
            clearTimeout(connectTimer);
            const payload = parsePayload(data);
            if (!payload) {
              console.warn('[SSE] Ignoring malformed event:', data.slice(0, 200));
              return;
            }
            // Only an advancing view earns back the reconnect budget
            if (tracker.apply(payload)) {
              failures = 0;
              onProgress?.(tracker.view);
            }
            if (tracker.completed) finish(() => resolve(tracker.view));
          },
          onError: () => retry('stream error'),
        });
        // The factory may deliver the terminal event before returning
        if (settled) {
          connection.close();
          connection = null;
        }
      };

      if (signal?.aborted) {
        reject(new Error('Observation aborted'));
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });
      connect();
    });
  }
}
