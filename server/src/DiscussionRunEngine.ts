/**
 * DiscussionRunEngine: owns the lifecycle of a discussion run.
 *
 *   start() ── validate ── persist running ── open snapshot ── job (async)
 *                                                                 │
 *        phases 10/30/50/70 ── adapter ── reveal 70→95 ── persist result ── terminal
 *
 * Only precondition failures reach the caller of start(). Everything after
 * that is reported through the progress sink and the persisted status.
 */

import { GenerationFailed, RunPreconditionError, errorMessage } from './errors.js';
import { pause } from './utils/abortable.js';
import type { GenerationAdapter, GenerationOutcome } from './GenerationAdapter.js';
import type { IDiscussionStore, IProgressRegistry } from './interfaces/index.js';
import type {
  CharacterRecord,
  DiscussionMessage,
  DiscussionRecord,
  DiscussionResult,
  Persona,
  RunSnapshot,
  WorldRecord,
} from './types.js';

/** Where a run publishes its snapshots. */
export interface ProgressSink {
  open(snapshot: RunSnapshot): void;
  publish(snapshot: RunSnapshot): void;
}

export const noopSink: ProgressSink = {
  open: () => {},
  publish: () => {},
};

export function registrySink(registry: IProgressRegistry): ProgressSink {
  return {
    open: (snapshot) => registry.open(snapshot),
    publish: (snapshot) => registry.publish(snapshot),
  };
}

export interface RunOutcome {
  status: DiscussionResult['status'];
  result: DiscussionResult;
}

export interface StartReceipt {
  discussionId: number;
  message: string;
  /** Settles when the run reaches a terminal state. Never rejects. */
  done: Promise<RunOutcome>;
}

export interface DiscussionRunEngineOptions {
  /** Pause between progressively revealed messages (ms) */
  revealDelayMs: number;
  now?: () => Date;
}

export const INTERRUPTED_ERROR = 'Interrupted by server restart';

const PHASE = {
  initializing: 10,
  personas: 30,
  world: 50,
  starting: 70,
  revealed: 95,
  done: 100,
} as const;

interface RunContext {
  discussion: DiscussionRecord;
  world: WorldRecord;
  characters: CharacterRecord[];
}

/** Mutable state of one run; every publish freezes a copy of it. */
class RunState {
  private version = 0;
  progress = 0;
  message = 'Queued';
  messages: DiscussionMessage[] = [];
  strategy: string | undefined;

  constructor(
    readonly discussionId: number,
    readonly startedAt: string,
  ) {}

  snapshot(completed = false, error?: string): RunSnapshot {
    this.version++;
    return Object.freeze({
      discussionId: this.discussionId,
      version: this.version,
      progress: this.progress,
      message: this.message,
      messages: Object.freeze([...this.messages]),
      completed,
      ...(error !== undefined ? { error } : {}),
      ...(this.strategy !== undefined ? { strategy: this.strategy } : {}),
      startedAt: this.startedAt,
    });
  }
}

export function toPersona(character: CharacterRecord): Persona {
  return {
    name: character.name,
    description: character.description,
    personality: character.personality,
    background: character.background,
    traits: character.persona_config ?? {},
  };
}

export class DiscussionRunEngine {
  private store: IDiscussionStore;
  private adapter: GenerationAdapter;
  private defaultSink: ProgressSink;
  private revealDelayMs: number;
  private now: () => Date;

  /** Ids with a run in flight in this process, reserved synchronously by start() */
  private inFlight = new Set<number>();
  private jobs = new Map<number, Promise<RunOutcome>>();

  constructor(
    store: IDiscussionStore,
    registry: IProgressRegistry,
    adapter: GenerationAdapter,
    options: DiscussionRunEngineOptions,
  ) {
    this.store = store;
    this.adapter = adapter;
    this.defaultSink = registrySink(registry);
    this.revealDelayMs = options.revealDelayMs;
    this.now = options.now ?? (() => new Date());
  }

  isRunning(discussionId: number): boolean {
    return this.inFlight.has(discussionId);
  }

  /**
   * Begin a run. Resolves once the discussion is marked running; rejects
   * with RunPreconditionError, or with the sink's error when it refuses to
   * open (nothing is persisted then).
   */
  async start(discussionId: number, options: { sink?: ProgressSink } = {}): Promise<StartReceipt> {
    if (this.inFlight.has(discussionId)) {
      throw new RunPreconditionError('already_running', `Discussion ${discussionId} is already running`);
    }
    this.inFlight.add(discussionId);

    let context: RunContext;
    try {
      context = await this.loadContext(discussionId);
    } catch (err) {
      this.inFlight.delete(discussionId);
      throw err;
    }

    const sink = options.sink ?? this.defaultSink;
    const state = new RunState(discussionId, this.now().toISOString());
    // Open before persisting so a refused sink leaves the row untouched
    try {
      sink.open(state.snapshot());
    } catch (err) {
      this.inFlight.delete(discussionId);
      throw err;
    }
    const marked = await this.markRunning(discussionId);
    console.log(`[Engine] Discussion ${discussionId} started ("${context.discussion.theme}", ${context.characters.length} participants)`);

    const done = this.execute(context, state, sink, marked).finally(() => {
      this.inFlight.delete(discussionId);
      this.jobs.delete(discussionId);
    });
    this.jobs.set(discussionId, done);

    return { discussionId, message: 'Discussion started', done };
  }

  /** Start a run and wait for it, for callers that do not stream. */
  async runToCompletion(discussionId: number, sink: ProgressSink = noopSink): Promise<RunOutcome> {
    const receipt = await this.start(discussionId, { sink });
    return receipt.done;
  }

  /**
   * Mark discussions a previous process left `running` as failed. Returns
   * how many were recovered.
   */
  async recoverInterrupted(): Promise<number> {
    const discussions = await this.store.listDiscussions(undefined, { limit: Infinity });
    let recovered = 0;
    for (const discussion of discussions) {
      if (discussion.status !== 'running' || this.inFlight.has(discussion.id)) continue;
      const world = await this.store.getWorld(discussion.world_id);
      await this.store.updateDiscussion(discussion.id, {
        status: 'failed',
        result: {
          discussion_id: discussion.id,
          theme: discussion.theme,
          world: world?.name ?? '',
          participants: [],
          messages: discussion.result?.messages ?? [],
          status: 'failed',
          error: INTERRUPTED_ERROR,
        },
      });
      recovered++;
    }
    if (recovered > 0) {
      console.log(`[Engine] Marked ${recovered} interrupted discussion(s) as failed`);
    }
    return recovered;
  }

  /** Wait for every in-flight run to reach a terminal state. */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.jobs.values()]);
  }

  // ── Private ──

  private async loadContext(discussionId: number): Promise<RunContext> {
    const discussion = await this.store.getDiscussion(discussionId);
    if (!discussion) {
      throw new RunPreconditionError('not_found', `Discussion ${discussionId} not found`);
    }
    if (discussion.status === 'running') {
      throw new RunPreconditionError('already_running', `Discussion ${discussionId} is already running`);
    }
    if (discussion.status === 'completed') {
      throw new RunPreconditionError('already_completed', `Discussion ${discussionId} has already completed`);
    }

    const world = await this.store.getWorld(discussion.world_id);
    if (!world) {
      throw new RunPreconditionError('not_found', `World ${discussion.world_id} not found`);
    }
    const characters = await this.store.listCharacters(world.id, { limit: Infinity });
    if (characters.length === 0) {
      throw new RunPreconditionError('no_participants', `World "${world.name}" has no characters`);
    }
    return { discussion, world, characters };
  }

  /** Persist status=running. Returns the write error instead of throwing. */
  private async markRunning(discussionId: number): Promise<Error | null> {
    try {
      await this.store.updateDiscussion(discussionId, { status: 'running', result: null });
      return null;
    } catch (err) {
      console.error(`[Engine] Could not mark discussion ${discussionId} running:`, err);
      return err instanceof Error ? err : new Error(String(err));
    }
  }

  private async execute(
    context: RunContext,
    state: RunState,
    sink: ProgressSink,
    markError: Error | null,
  ): Promise<RunOutcome> {
    const { discussion, world, characters } = context;
    const id = discussion.id;
    const participants = characters.map((c) => c.name);
    const resultBase = {
      discussion_id: id,
      theme: discussion.theme,
      world: world.name,
      participants,
    };

    if (markError) {
      return this.failFatally(state, sink, resultBase, `Failed to save discussion state: ${markError.message}`);
    }

    try {
      this.advance(state, sink, PHASE.initializing, 'Initializing discussion...');
      const personas = characters.map(toPersona);
      this.advance(state, sink, PHASE.personas, `Converting ${characters.length} characters to personas...`);
      this.advance(state, sink, PHASE.world, `Preparing world "${world.name}"...`);
      this.advance(state, sink, PHASE.starting, `Starting discussion "${discussion.theme}"...`);

      let generated: GenerationOutcome;
      try {
        generated = await this.adapter.generate(
          {
            theme: discussion.theme,
            description: discussion.description,
            world: { name: world.name, background: world.background },
            personas,
          },
          { onStatus: (phrase) => this.advance(state, sink, state.progress, phrase) },
        );
      } catch (err) {
        if (!(err instanceof GenerationFailed)) throw err;
        return await this.finishFailed(state, sink, resultBase, err.message);
      }

      state.strategy = generated.strategy;
      await this.reveal(state, sink, generated.messages);

      const result: DiscussionResult = {
        ...resultBase,
        messages: generated.messages,
        status: 'completed',
        note: generated.strategy,
      };
      try {
        await this.store.updateDiscussion(id, { status: 'completed', result });
      } catch (err) {
        return await this.failFatally(state, sink, resultBase, `Failed to save discussion result: ${errorMessage(err)}`);
      }

      state.progress = PHASE.done;
      state.message = 'Discussion completed';
      this.emit(sink, state.snapshot(true));
      console.log(`[Engine] Discussion ${id} completed with ${generated.messages.length} messages via ${generated.strategy}`);
      return { status: 'completed', result };
    } catch (err) {
      console.error(`[Engine] Discussion ${id} crashed:`, err);
      return this.failFatally(state, sink, resultBase, errorMessage(err));
    }
  }

  /** Append messages one at a time, progress climbing from 70 toward 95. */
  private async reveal(state: RunState, sink: ProgressSink, messages: DiscussionMessage[]): Promise<void> {
    const span = PHASE.revealed - PHASE.starting;
    for (let i = 0; i < messages.length; i++) {
      if (i > 0) await pause(this.revealDelayMs);
      state.messages.push(messages[i]);
      const progress = PHASE.starting + Math.floor((span * (i + 1)) / messages.length);
      this.advance(state, sink, progress, `Message ${i + 1} of ${messages.length}`);
    }
  }

  private async finishFailed(
    state: RunState,
    sink: ProgressSink,
    resultBase: Omit<DiscussionResult, 'messages' | 'status'>,
    error: string,
  ): Promise<RunOutcome> {
    const result: DiscussionResult = { ...resultBase, messages: [...state.messages], status: 'failed', error };
    try {
      await this.store.updateDiscussion(resultBase.discussion_id, { status: 'failed', result });
    } catch (err) {
      return this.failFatally(state, sink, resultBase, `Failed to save discussion result: ${errorMessage(err)}`);
    }
    this.publishFailure(state, sink, error);
    return { status: 'failed', result };
  }

  /**
   * A store write failed mid-run. One best-effort attempt to record the
   * failure, then the terminal snapshot.
   */
  private async failFatally(
    state: RunState,
    sink: ProgressSink,
    resultBase: Omit<DiscussionResult, 'messages' | 'status'>,
    error: string,
  ): Promise<RunOutcome> {
    const result: DiscussionResult = { ...resultBase, messages: [...state.messages], status: 'failed', error };
    try {
      await this.store.updateDiscussion(resultBase.discussion_id, { status: 'failed', result });
    } catch (err) {
      console.error(`[Engine] Could not record failure of discussion ${resultBase.discussion_id}:`, err);
    }
    this.publishFailure(state, sink, error);
    return { status: 'failed', result };
  }

  private publishFailure(state: RunState, sink: ProgressSink, error: string): void {
    state.progress = PHASE.done;
    state.message = 'Discussion failed';
    this.emit(sink, state.snapshot(true, error));
    console.warn(`[Engine] Discussion ${state.discussionId} failed: ${error}`);
  }

  private advance(state: RunState, sink: ProgressSink, progress: number, message: string): void {
    state.progress = Math.max(state.progress, progress);
    state.message = message;
    this.emit(sink, state.snapshot());
  }

  private emit(sink: ProgressSink, snapshot: RunSnapshot): void {
    try {
      sink.publish(snapshot);
    } catch (err) {
      console.error(`[Engine] Could not publish progress for discussion ${snapshot.discussionId}:`, err);
    }
  }
}
