/**
 * Process-scoped table of in-flight discussion runs.
 *
 * The run engine is the only writer: it opens an entry when a run starts and
 * publishes immutable snapshots as the run advances. Transports subscribe and
 * await the next change. All mutation happens synchronously on the event
 * loop, so a publish is atomic with respect to every reader and unrelated
 * discussion ids never contend.
 *
 * Terminal entries stay readable for `graceMs` so late pollers and late
 * stream connects still see the final state, then are retired. An entry is
 * retired early once every subscriber that attached to it has gone.
 */

import type { DiscussionMessage, RunSnapshot } from './types.js';
import type { IProgressRegistry, ISubscription } from './interfaces/index.js';

interface Entry {
  /** Undefined while subscribers wait for a run that has not opened yet */
  snapshot: RunSnapshot | undefined;
  subscribers: Set<Subscription>;
  everSubscribed: boolean;
  retireTimer: ReturnType<typeof setTimeout> | null;
}

export interface ProgressRegistryOptions {
  /** How long a terminal snapshot stays readable (ms) */
  graceMs: number;
}

class Subscription implements ISubscription {
  private seenVersion = 0;
  private cursor = 0;
  private waiter: ((snapshot: RunSnapshot | null) => void) | null = null;
  private closed = false;

  constructor(
    readonly discussionId: number,
    private readonly registry: ProgressRegistry,
  ) {}

  next(signal?: AbortSignal): Promise<RunSnapshot | null> {
    if (this.closed || signal?.aborted) return Promise.resolve(null);

    const snapshot = this.registry.currentSnapshot(this.discussionId);
    if (snapshot && snapshot.version > this.seenVersion) {
      this.seenVersion = snapshot.version;
      return Promise.resolve(snapshot);
    }
    // Nothing follows a terminal snapshot
    if (snapshot?.completed) return Promise.resolve(null);

    if (this.waiter) {
      return Promise.reject(new Error('Subscription.next() is already pending'));
    }

    return new Promise((resolve) => {
      const onAbort = () => {
        this.waiter = null;
        resolve(null);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiter = (next) => {
        signal?.removeEventListener('abort', onAbort);
        this.waiter = null;
        if (next) this.seenVersion = next.version;
        resolve(next);
      };
    });
  }

  takeDelta(snapshot: RunSnapshot): { offset: number; messages: DiscussionMessage[] } {
    const offset = Math.min(this.cursor, snapshot.messages.length);
    const messages = snapshot.messages.slice(offset);
    this.cursor = snapshot.messages.length;
    return { offset, messages };
  }

  close(): void {
    if (this.closed) return;
    this.registry.unsubscribe(this);
  }

  /** Called by the registry when a new snapshot lands. */
  notify(snapshot: RunSnapshot): void {
    this.waiter?.(snapshot);
  }

  /** Called by the registry when the entry goes away. */
  end(): void {
    this.closed = true;
    this.waiter?.(null);
  }
}

export class ProgressRegistry implements IProgressRegistry {
  private entries = new Map<number, Entry>();
  private graceMs: number;
  private closed = false;

  constructor(options: ProgressRegistryOptions) {
    this.graceMs = options.graceMs;
  }

  /**
   * Start tracking a run, replacing any stale entry for the same id.
   * Subscribers still waiting for a first snapshot carry over; subscribers
   * of the replaced run are ended.
   */
  open(snapshot: RunSnapshot): void {
    this.assertOpen();
    const id = snapshot.discussionId;
    const existing = this.entries.get(id);
    const carried = new Set<Subscription>();

    if (existing) {
      if (existing.retireTimer) clearTimeout(existing.retireTimer);
      for (const sub of existing.subscribers) {
        if (existing.snapshot) sub.end();
        else carried.add(sub);
      }
    }

    this.entries.set(id, {
      snapshot,
      subscribers: carried,
      everSubscribed: carried.size > 0,
      retireTimer: null,
    });
    for (const sub of carried) sub.notify(snapshot);
    console.log(`[Registry] Run opened for discussion ${id}`);
  }

  /**
   * Replace the entry's snapshot and wake subscribers. Rejects anything that
   * would roll back what readers have already seen.
   */
  publish(snapshot: RunSnapshot): void {
    this.assertOpen();
    const id = snapshot.discussionId;
    const entry = this.entries.get(id);
    const previous = entry?.snapshot;
    if (!entry || !previous) {
      throw new Error(`No open run for discussion ${id}`);
    }
    assertAdvances(previous, snapshot);

    entry.snapshot = snapshot;
    for (const sub of entry.subscribers) sub.notify(snapshot);

    if (snapshot.completed) {
      entry.retireTimer = setTimeout(() => {
        if (this.entries.get(id) === entry) this.drop(id, entry, 'grace period elapsed');
      }, this.graceMs);
    }
  }

  subscribe(discussionId: number): ISubscription {
    const sub = new Subscription(discussionId, this);
    if (this.closed) {
      sub.end();
      return sub;
    }

    let entry = this.entries.get(discussionId);
    if (!entry) {
      entry = { snapshot: undefined, subscribers: new Set(), everSubscribed: false, retireTimer: null };
      this.entries.set(discussionId, entry);
    }
    entry.subscribers.add(sub);
    entry.everSubscribed = true;
    return sub;
  }

  unsubscribe(handle: ISubscription): void {
    const entry = this.entries.get(handle.discussionId);
    if (handle instanceof Subscription) handle.end();
    if (!entry || !(handle instanceof Subscription) || !entry.subscribers.delete(handle)) return;
    if (entry.subscribers.size > 0) return;

    if (!entry.snapshot) {
      // Nobody is waiting for this run any more
      this.entries.delete(handle.discussionId);
    } else if (entry.snapshot.completed && entry.everSubscribed) {
      this.drop(handle.discussionId, entry, 'all subscribers left');
    }
  }

  currentSnapshot(discussionId: number): RunSnapshot | undefined {
    return this.entries.get(discussionId)?.snapshot;
  }

  /** Retire a terminal entry ahead of its grace period. Returns false if none. */
  retire(discussionId: number): boolean {
    const entry = this.entries.get(discussionId);
    if (!entry?.snapshot?.completed) return false;
    this.drop(discussionId, entry, 'retired on request');
    return true;
  }

  /** Number of runs currently tracked (terminal ones included). */
  get size(): number {
    let count = 0;
    for (const entry of this.entries.values()) {
      if (entry.snapshot) count++;
    }
    return count;
  }

  close(): void {
    for (const [id, entry] of this.entries) {
      this.drop(id, entry, 'registry closed');
    }
    this.closed = true;
  }

  private drop(id: number, entry: Entry, reason: string): void {
    if (entry.retireTimer) clearTimeout(entry.retireTimer);
    this.entries.delete(id);
    for (const sub of entry.subscribers) sub.end();
    entry.subscribers.clear();
    if (entry.snapshot) {
      console.log(`[Registry] Run for discussion ${id} retired (${reason})`);
    }
  }

  private assertOpen(): void {
    if (this.closed) throw new Error('ProgressRegistry is closed');
  }
}

function assertAdvances(previous: RunSnapshot, next: RunSnapshot): void {
  const id = next.discussionId;
  if (previous.completed) {
    throw new Error(`Run for discussion ${id} already reached a terminal snapshot`);
  }
  if (next.version <= previous.version) {
    throw new Error(`Snapshot version for discussion ${id} went from ${previous.version} to ${next.version}`);
  }
  if (next.progress < previous.progress) {
    throw new Error(`Progress for discussion ${id} went from ${previous.progress} to ${next.progress}`);
  }
  if (next.messages.length < previous.messages.length) {
    throw new Error(`Message list for discussion ${id} shrank`);
  }
  for (let i = 0; i < previous.messages.length; i++) {
    const a = previous.messages[i];
    const b = next.messages[i];
    if (a !== b && (a.speaker !== b.speaker || a.content !== b.content || a.timestamp !== b.timestamp)) {
      throw new Error(`Message ${i} of discussion ${id} was rewritten`);
    }
  }
}
