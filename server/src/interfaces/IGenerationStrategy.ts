import type { DiscussionMessage, GenerationRequest } from '../types.js';

/**
 * One way of producing a discussion transcript. Strategies are tried in a
 * fixed order; `isAvailable()` gates an attempt without counting as a failure.
 */
export interface IGenerationStrategy {
  /** Stable identifier used in logs and the persisted result note */
  readonly name: string;
  /** Phrase shown to users while this strategy runs */
  readonly label: string;
  isAvailable(): boolean;
  /**
   * Produce the full transcript (without the opening system message).
   * Must stop work promptly once `signal` aborts.
   */
  generate(request: GenerationRequest, signal: AbortSignal): Promise<DiscussionMessage[]>;
}
