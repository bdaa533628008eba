import { DEFAULT_BACKOFF, backoffDelay, type BackoffPolicy } from './backoff.js';
import { ProgressTracker, parsePayload, type ProgressView } from './ProgressTracker.js';
import { TransportTimeoutError } from './TransportTimeoutError.js';
import type { DiscussionApi } from './DiscussionApi.js';
import type { ObserveHandlers, ProgressObserver } from './ProgressObserver.js';

export interface SocketHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onClose(code: number, reason: string): void;
  onError(): void;
}

export interface SocketConnection {
  close(code?: number, reason?: string): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => SocketConnection;

/** Default factory: the browser's WebSocket. */
export const browserSocket: SocketFactory = (url, handlers) => {
  const ws = new WebSocket(url);
  ws.onopen = () => handlers.onOpen();
  ws.onmessage = (event) => handlers.onMessage(String(event.data));
  ws.onclose = (event) => handlers.onClose(event.code, event.reason);
  ws.onerror = () => handlers.onError();
  return ws;
};

type SocketEvent = 'progress' | 'connected' | 'disconnected' | 'failed';
type Handler = (view: ProgressView, error?: Error) => void;

export interface DiscussionSocketOptions {
  backoff?: BackoffPolicy;
  socket?: SocketFactory;
}

/**
 * Push-only WebSocket client for one discussion. Applies the server's
 * offset deltas to a ProgressTracker and reconnects with exponential backoff
 * on unexpected close, unless the terminal frame was already seen.
 */
export class DiscussionSocket {
  private connection: SocketConnection | null = null;
  private listeners: Map<SocketEvent, Handler[]> = new Map();
  private tracker = new ProgressTracker();
  private url: string;
  private backoff: BackoffPolicy;
  private socketFactory: SocketFactory;
  private shouldReconnect = true;
  private failures = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(url: string, options: DiscussionSocketOptions = {}) {
    this.url = url;
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.socketFactory = options.socket ?? browserSocket;
  }

  get view(): ProgressView {
    return this.tracker.view;
  }

  connect(): void {
    // Drop the previous connection's handlers before replacing it
    this.teardown();
    this.shouldReconnect = true;

    const connection = this.socketFactory(this.url, {
      onOpen: () => {
        console.log(`[WS] Connected to ${this.url}`);
        this.emit('connected');
      },
      onMessage: (data) => {
        if (this.connection !== connection) return;
        const payload = parsePayload(data);
        if (!payload) {
          console.error('[WS] Failed to parse frame:', data.slice(0, 200));
          return;
        }
        if (this.tracker.apply(payload)) {
          this.failures = 0;
          this.emit('progress');
        }
      },
      onClose: (code, reason) => {
        if (this.connection !== connection) return;
        this.connection = null;
        this.emit('disconnected');
        this.handleClose(code, reason);
      },
      onError: () => {
        console.error(`[WS] Error on ${this.url}`);
      },
    });
    this.connection = connection;
  }

  disconnect(): void {
    this.shouldReconnect = false;
    this.teardown();
  }

  on(type: SocketEvent, callback: Handler): void {
    if (!this.listeners.has(type)) {
      this.listeners.set(type, []);
    }
    this.listeners.get(type)?.push(callback);
  }

  off(type: SocketEvent, callback: Handler): void {
    const handlers = this.listeners.get(type);
    if (handlers) {
      const idx = handlers.indexOf(callback);
      if (idx !== -1) handlers.splice(idx, 1);
    }
  }

  removeAllListeners(): void {
    this.listeners.clear();
  }

  private handleClose(code: number, reason: string): void {
    if (this.tracker.completed || !this.shouldReconnect) return;

    this.failures++;
    if (this.failures > this.backoff.maxAttempts) {
      const error = new TransportTimeoutError(
        'websocket',
        `closed with ${code}${reason ? ` (${reason})` : ''} after ${this.backoff.maxAttempts} reconnects`,
      );
      this.emit('failed', error);
      return;
    }
    const delay = backoffDelay(this.failures, this.backoff);
    console.log(`[WS] Disconnected (${code}), reconnecting in ${delay}ms...`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }

  private teardown(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    const connection = this.connection;
    this.connection = null;
    connection?.close(1000, 'Client closed');
  }

  private emit(type: SocketEvent, error?: Error): void {
    const view = this.tracker.view;
    this.listeners.get(type)?.forEach((fn) => fn(view, error));
  }
}

/** ProgressObserver over DiscussionSocket. */
export class SocketObserver implements ProgressObserver {
  constructor(
    private readonly api: DiscussionApi,
    private readonly options: DiscussionSocketOptions = {},
  ) {}

  observe(discussionId: number, handlers: ObserveHandlers = {}): Promise<ProgressView> {
    const { onProgress, signal } = handlers;
    const socket = new DiscussionSocket(this.api.socketUrl(discussionId), this.options);

    return new Promise((resolve, reject) => {
      const finish = (settle: () => void) => {
        signal?.removeEventListener('abort', onAbort);
        socket.disconnect();
        socket.removeAllListeners();
        settle();
      };
      const onAbort = () => finish(() => reject(new Error('Observation aborted')));

      socket.on('progress', (view) => {
        onProgress?.(view);
        if (view.completed) finish(() => resolve(view));
      });
      socket.on('failed', (_view, error) => {
        finish(() => reject(error ?? new TransportTimeoutError('websocket', 'gave up')));
      });

      if (signal?.aborted) {
        reject(new Error('Observation aborted'));
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });
      socket.connect();
    });
  }
}
