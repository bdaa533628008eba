import { PollingObserver, type PollingOptions } from './network/PollingObserver.js';
import { StreamObserver, type StreamObserverOptions } from './network/StreamObserver.js';
import { SocketObserver, type DiscussionSocketOptions } from './network/DiscussionSocket.js';
import type { DiscussionApi } from './network/DiscussionApi.js';
import type { ProgressObserver } from './network/ProgressObserver.js';
import type { TransportKind } from './network/TransportTimeoutError.js';

export { DiscussionApi, ApiError, type GeneratedWorldResponse, type StartOutcome } from './network/DiscussionApi.js';
export { PollingObserver } from './network/PollingObserver.js';
export { StreamObserver } from './network/StreamObserver.js';
export { DiscussionSocket, SocketObserver } from './network/DiscussionSocket.js';
export { ProgressTracker, parsePayload, type ProgressView } from './network/ProgressTracker.js';
export { TransportTimeoutError, type TransportKind } from './network/TransportTimeoutError.js';
export { DEFAULT_BACKOFF, backoffDelay, type BackoffPolicy } from './network/backoff.js';
export type { ProgressObserver, ObserveHandlers } from './network/ProgressObserver.js';

export interface ObserverOptions {
  polling?: PollingOptions;
  sse?: StreamObserverOptions;
  websocket?: DiscussionSocketOptions;
}

/** Pick how the page follows a discussion run. */
export function createObserver(
  transport: TransportKind,
  api: DiscussionApi,
  options: ObserverOptions = {},
): ProgressObserver {
  switch (transport) {
    case 'polling':
      return new PollingObserver(api, options.polling);
    case 'sse':
      return new StreamObserver(api, options.sse);
    case 'websocket':
      return new SocketObserver(api, options.websocket);
  }
}
