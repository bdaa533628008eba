/**
 * GenerationAdapter: produces a discussion transcript by trying strategies
 * in a fixed order (agent framework → completion API → mock).
 *
 * - A strategy whose preconditions fail (`isAvailable() === false`) is skipped
 *   without counting as a failure.
 * - Each attempt is bounded by `timeoutMs`; on timeout its AbortSignal fires
 *   and the next strategy runs.
 * - A result that throws, times out, or fails validation is discarded whole.
 *   Callers only ever see a complete transcript.
 * - Every transcript starts with one synthesized system message.
 */

import { composeOpening } from './DiscussionPromptBuilder.js';
import {
  GenerationFailed,
  MalformedOutputError,
  StrategyTimeoutError,
  errorMessage,
  type StrategyAttempt,
} from './errors.js';
import { withTimeout } from './utils/abortable.js';
import { SYSTEM_SPEAKER } from './types.js';
import type { IGenerationStrategy } from './interfaces/index.js';
import type { DiscussionMessage, GenerationRequest } from './types.js';

export interface GenerationAdapterOptions {
  /** Bound on each strategy attempt (ms) */
  timeoutMs: number;
  now?: () => Date;
}

export interface GenerateHooks {
  /** Called when a strategy attempt begins, with a user-facing phrase. */
  onStatus?: (phrase: string, strategy: string) => void;
}

export interface GenerationOutcome {
  /** Opening system message followed by the strategy's transcript */
  messages: DiscussionMessage[];
  strategy: string;
  attempts: StrategyAttempt[];
}

export class GenerationAdapter {
  private strategies: IGenerationStrategy[];
  private timeoutMs: number;
  private now: () => Date;

  constructor(strategies: IGenerationStrategy[], options: GenerationAdapterOptions) {
    this.strategies = strategies;
    this.timeoutMs = options.timeoutMs;
    this.now = options.now ?? (() => new Date());
  }

  /** Strategy names in the order they will be tried. */
  get order(): string[] {
    return this.strategies.map((s) => s.name);
  }

  async generate(request: GenerationRequest, hooks: GenerateHooks = {}): Promise<GenerationOutcome> {
    const opening: DiscussionMessage = {
      speaker: SYSTEM_SPEAKER,
      content: composeOpening(request.theme),
      timestamp: this.now().toISOString(),
    };
    const attempts: StrategyAttempt[] = [];

    for (const strategy of this.strategies) {
      if (!this.isAvailable(strategy)) {
        attempts.push({ strategy: strategy.name, outcome: 'skipped', durationMs: 0 });
        continue;
      }

      const fellBack = attempts.some((a) => a.outcome !== 'skipped');
      hooks.onStatus?.(fellBack ? `Falling back: ${strategy.label}...` : `${strategy.label}...`, strategy.name);

      const startedAt = Date.now();
      try {
        const messages = await withTimeout(
          (signal) => strategy.generate(request, signal),
          this.timeoutMs,
          () => new StrategyTimeoutError(strategy.name, this.timeoutMs),
        );
        const transcript = [opening, ...messages];
        validateTranscript(transcript);

        const durationMs = Date.now() - startedAt;
        attempts.push({ strategy: strategy.name, outcome: 'succeeded', durationMs });
        console.log(`[Generation] ${strategy.name} produced ${messages.length} messages in ${durationMs}ms`);
        return { messages: transcript, strategy: strategy.name, attempts };
      } catch (err) {
        const outcome: StrategyAttempt['outcome'] =
          err instanceof StrategyTimeoutError ? 'timed_out'
            : err instanceof MalformedOutputError ? 'malformed'
              : 'failed';
        const reason = errorMessage(err);
        attempts.push({ strategy: strategy.name, outcome, reason, durationMs: Date.now() - startedAt });
        console.warn(`[Generation] ${strategy.name} ${outcome}: ${reason}`);
      }
    }

    const tried = attempts.filter((a) => a.outcome !== 'skipped');
    const reason = tried.length === 0
      ? 'No generation strategy is available'
      : `All generation strategies failed (${tried.map((a) => `${a.strategy}: ${a.reason ?? a.outcome}`).join('; ')})`;
    throw new GenerationFailed(reason, attempts);
  }

  private isAvailable(strategy: IGenerationStrategy): boolean {
    try {
      return strategy.isAvailable();
    } catch (err) {
      console.warn(`[Generation] ${strategy.name} availability check threw: ${errorMessage(err)}`);
      return false;
    }
  }
}

/**
 * Reject transcripts that cannot be shown as a discussion: nothing beyond the
 * opening line, blank turns, or timestamps that go backwards.
 */
export function validateTranscript(messages: DiscussionMessage[]): void {
  if (messages.length < 2) {
    throw new MalformedOutputError('Transcript has no messages');
  }
  let previous = -Infinity;
  messages.forEach((m, i) => {
    if (!m.speaker || !m.content.trim()) {
      throw new MalformedOutputError(`Message ${i} is blank`);
    }
    const at = Date.parse(m.timestamp);
    if (Number.isNaN(at)) {
      throw new MalformedOutputError(`Message ${i} has an invalid timestamp`);
    }
    if (at < previous) {
      throw new MalformedOutputError(`Message ${i} is timestamped before the message preceding it`);
    }
    previous = at;
  });
}
