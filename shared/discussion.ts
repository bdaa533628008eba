// ══════════════════════════════════════════════════════
//  Discussion Forge: Shared Record & Wire Schema
//
//  Types exchanged between the server and the browser
//  client: persisted records (worlds, characters,
//  discussions) and the progress payload every transport
//  (polling, SSE, WebSocket) delivers.
//
//  Field names are snake_case on the wire to match the
//  REST records; in-process types stay camelCase.
// ══════════════════════════════════════════════════════

// ── Records ───────────────────────────────────────────

export interface WorldRecord {
  id: number;
  name: string;
  description: string;
  background: string;
  created_at: string;
  updated_at?: string;
}

export interface CharacterRecord {
  id: number;
  world_id: number;
  name: string;
  description: string;
  personality: string;
  background: string;
  /** Free-form extra traits merged into the persona handed to the generator. */
  persona_config?: Record<string, unknown> | null;
  created_at: string;
  updated_at?: string;
}

/**
 * Lifecycle of a discussion. The run engine only moves
 * pending|failed → running → completed|failed; a client may reset a
 * non-running discussion back to pending to request a fresh run.
 */
export type DiscussionStatus = 'pending' | 'running' | 'completed' | 'failed';

export const TERMINAL_STATUSES: readonly DiscussionStatus[] = ['completed', 'failed'];

export function isTerminalStatus(status: DiscussionStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export interface DiscussionMessage {
  /** Either SYSTEM_SPEAKER or a character's display name */
  speaker: string;
  content: string;
  /** ISO-8601 instant, non-decreasing within one run */
  timestamp: string;
}

/** Reserved speaker label for narrative scaffolding. */
export const SYSTEM_SPEAKER = 'system';

/** Persisted result of a finished run. */
export interface DiscussionResult {
  discussion_id: number;
  theme: string;
  world: string;
  participants: string[];
  messages: DiscussionMessage[];
  status: Extract<DiscussionStatus, 'completed' | 'failed'>;
  /** Which generation strategy produced the messages */
  note?: string;
  error?: string;
}

export interface DiscussionRecord {
  id: number;
  world_id: number;
  theme: string;
  description: string;
  status: DiscussionStatus;
  result: DiscussionResult | null;
  created_at: string;
  updated_at?: string;
}

// ── Progress payload ──────────────────────────────────

/**
 * One progress event. SSE sends the full `messages` list every time;
 * WebSocket frames carry only the messages past `offset` (the first frame
 * after connecting has offset 0 and the full list so far).
 */
export interface ProgressPayload {
  progress: number;
  message: string;
  completed: boolean;
  error?: string;
  messages?: DiscussionMessage[];
  /** Index in the run's message list of messages[0] (WebSocket only) */
  offset?: number;
}

/** Rebuild a progress payload from a persisted record. */
export function recordPayload(record: DiscussionRecord): ProgressPayload {
  const messages = record.result?.messages ?? [];
  switch (record.status) {
    case 'completed':
      return { progress: 100, message: 'Discussion completed', completed: true, messages };
    case 'failed':
      return {
        progress: 100,
        message: 'Discussion failed',
        completed: true,
        error: record.result?.error ?? 'Discussion failed',
        messages,
      };
    case 'running':
      return { progress: 0, message: 'Discussion is running', completed: false, messages };
    case 'pending':
      return { progress: 0, message: 'Discussion has not started', completed: false, messages };
  }
}

// ── REST responses ────────────────────────────────────

export interface GeneratedWorldResponse {
  world: WorldRecord;
  characters: CharacterRecord[];
  /** 'completion-api' or 'template' */
  generated_by: string;
  keywords: string;
}

/**
 * One event of GET /api/worlds/generate-stream. The last one has
 * `completed: true` and carries either `result` or `error`.
 */
export interface WorldGenerationEvent {
  progress: number;
  message: string;
  completed: boolean;
  result?: GeneratedWorldResponse;
  error?: string;
}

export interface StartDiscussionResponse {
  message: string;
  discussion_id: number;
}

export type StartErrorCode =
  | 'not_found'
  | 'already_running'
  | 'already_completed'
  | 'no_participants';

export interface ApiErrorBody {
  /** Machine code: a StartErrorCode, 'bad_request', 'conflict' or 'internal_error' */
  error: string;
  detail?: string;
  /** Validation problems, one per offending field */
  details?: string[];
}
