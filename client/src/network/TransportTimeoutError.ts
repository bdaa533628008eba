export type TransportKind = 'polling' | 'sse' | 'websocket';

/**
 * The client could not observe progress (gave up polling, or ran out of
 * reconnect attempts). Not a generation failure: the discussion may still
 * finish on the server, so the user should refresh rather than retry.
 */
export class TransportTimeoutError extends Error {
  readonly transport: TransportKind;

  constructor(transport: TransportKind, detail: string) {
    super(`Could not observe discussion progress over ${transport} (${detail}). Try refreshing.`);
    this.name = 'TransportTimeoutError';
    this.transport = transport;
  }
}
