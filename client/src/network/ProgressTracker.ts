import type { DiscussionMessage, ProgressPayload } from '../../../shared/discussion.js';

export interface ProgressView {
  progress: number;
  message: string;
  messages: DiscussionMessage[];
  completed: boolean;
  error?: string;
}

/**
 * Folds progress payloads from any transport into one view that only moves
 * forward: progress never drops, the message list never shrinks, and
 * `completed` sticks once seen.
 */
export class ProgressTracker {
  private state: ProgressView = { progress: 0, message: '', messages: [], completed: false };

  get view(): ProgressView {
    return { ...this.state, messages: [...this.state.messages] };
  }

  get completed(): boolean {
    return this.state.completed;
  }

  /** Apply one payload. Returns false when it was stale and changed nothing. */
  apply(payload: ProgressPayload): boolean {
    if (this.state.completed) return false;

    const messages = this.mergeMessages(payload);
    const progress = Math.max(this.state.progress, payload.progress);
    const changed =
      messages !== this.state.messages ||
      progress !== this.state.progress ||
      payload.message !== this.state.message ||
      payload.completed ||
      payload.error !== undefined;
    if (!changed) return false;

    this.state = {
      progress,
      message: payload.message,
      messages,
      completed: payload.completed,
      ...(payload.error !== undefined ? { error: payload.error } : {}),
    };
    return true;
  }

  private mergeMessages(payload: ProgressPayload): DiscussionMessage[] {
    const current = this.state.messages;
    const incoming = payload.messages;
    if (!incoming) return current;

    if (payload.offset === undefined) {
      return incoming.length > current.length ? [...incoming] : current;
    }
    // A delta that starts past what we hold would leave a gap
    if (payload.offset > current.length) return current;
    const merged = [...current.slice(0, payload.offset), ...incoming];
    return merged.length > current.length ? merged : current;
  }
}

function isMessage(value: unknown): value is DiscussionMessage {
  return (
    typeof value === 'object' && value !== null &&
    'speaker' in value && typeof value.speaker === 'string' &&
    'content' in value && typeof value.content === 'string' &&
    'timestamp' in value && typeof value.timestamp === 'string'
  );
}

/** Decode one SSE event or WebSocket frame; null if it is not a progress payload. */
export function parsePayload(data: string): ProgressPayload | null {
  let value: unknown;
  try {
    value = JSON.parse(data);
  } catch {
    return null;
  }
  if (typeof value !== 'object' || value === null) return null;
  if (!('progress' in value) || typeof value.progress !== 'number') return null;
  if (!('completed' in value) || typeof value.completed !== 'boolean') return null;

  const payload: ProgressPayload = {
    progress: value.progress,
    message: 'message' in value && typeof value.message === 'string' ? value.message : '',
    completed: value.completed,
  };
  if ('error' in value && typeof value.error === 'string') payload.error = value.error;
  if ('offset' in value && typeof value.offset === 'number') payload.offset = value.offset;
  if ('messages' in value && Array.isArray(value.messages)) {
    payload.messages = value.messages.filter(isMessage);
  }
  return payload;
}
