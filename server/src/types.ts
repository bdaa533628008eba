export type {
  WorldRecord,
  CharacterRecord,
  DiscussionRecord,
  DiscussionMessage,
  DiscussionResult,
  DiscussionStatus,
  ProgressPayload,
  GeneratedWorldResponse,
  WorldGenerationEvent,
} from '../../shared/discussion.js';
export { SYSTEM_SPEAKER, isTerminalStatus } from '../../shared/discussion.js';

import type { DiscussionMessage } from '../../shared/discussion.js';

/** A character as handed to a generation strategy. */
export interface Persona {
  name: string;
  description: string;
  personality: string;
  background: string;
  /** Extra traits from the character's persona_config */
  traits: Record<string, unknown>;
}

export interface GenerationRequest {
  theme: string;
  description: string;
  world: {
    name: string;
    background: string;
  };
  /** Participants in speaking order */
  personas: Persona[];
}

/**
 * Point-in-time view of one run. Published by the engine as an immutable
 * copy; readers never mutate it.
 */
export interface RunSnapshot {
  readonly discussionId: number;
  /** Increments by one per publish within a run */
  readonly version: number;
  /** 0–100, non-decreasing within a run */
  readonly progress: number;
  /** Human-readable status phrase */
  readonly message: string;
  /** Grows monotonically; earlier entries never change */
  readonly messages: readonly DiscussionMessage[];
  readonly completed: boolean;
  readonly error?: string;
  /** Strategy that produced the messages, once known */
  readonly strategy?: string;
  readonly startedAt: string;
}
