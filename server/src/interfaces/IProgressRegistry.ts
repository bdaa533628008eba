import type { RunSnapshot } from '../types.js';

export interface ISubscription {
  readonly discussionId: number;
  /** Newest unseen snapshot, or null once the entry is retired or the handle closed. */
  next(signal?: AbortSignal): Promise<RunSnapshot | null>;
  /** Messages past this handle's cursor; advances the cursor. */
  takeDelta(snapshot: RunSnapshot): { offset: number; messages: RunSnapshot['messages'] };
  close(): void;
}

export interface IProgressRegistry {
  open(snapshot: RunSnapshot): void;
  publish(snapshot: RunSnapshot): void;
  subscribe(discussionId: number): ISubscription;
  unsubscribe(handle: ISubscription): void;
  currentSnapshot(discussionId: number): RunSnapshot | undefined;
  retire(discussionId: number): boolean;
  close(): void;
}
