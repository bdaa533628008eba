import type {
  ApiErrorBody,
  CharacterRecord,
  DiscussionRecord,
  GeneratedWorldResponse,
  StartDiscussionResponse,
  WorldRecord,
} from '../../../shared/discussion.js';

export type { GeneratedWorldResponse };

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type WorldFields = Pick<WorldRecord, 'name' | 'description' | 'background'>;
export type CharacterFields = Pick<
  CharacterRecord,
  'world_id' | 'name' | 'description' | 'personality' | 'background' | 'persona_config'
>;
export type DiscussionFields = Pick<DiscussionRecord, 'world_id' | 'theme' | 'description'>;

/** `observing` means another caller already started the run; watch it instead. */
export type StartOutcome =
  | { started: true; discussionId: number }
  | { observing: true; discussionId: number };

export class ApiError extends Error {
  readonly status: number;
  readonly body: ApiErrorBody | null;

  constructor(status: number, body: ApiErrorBody | null) {
    super(body?.detail ?? body?.error ?? `Request failed with status ${status}`);
    this.name = 'ApiError';
    this.status = status;
    this.body = body;
  }

  get code(): string | undefined {
    return this.body?.error;
  }
}

function isErrorBody(value: unknown): value is ApiErrorBody {
  return typeof value === 'object' && value !== null && 'error' in value && typeof value.error === 'string';
}

/** Thin fetch wrapper over the REST surface under /api. */
export class DiscussionApi {
  private baseUrl: string;
  private fetchImpl: FetchLike;

  constructor(baseUrl: string, fetchImpl: FetchLike = (input, init) => fetch(input, init)) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.fetchImpl = fetchImpl;
  }

  // ── Worlds ──

  listWorlds(): Promise<WorldRecord[]> {
    return this.request('GET', '/api/worlds');
  }

  getWorld(id: number): Promise<WorldRecord> {
    return this.request('GET', `/api/worlds/${id}`);
  }

  createWorld(fields: WorldFields): Promise<WorldRecord> {
    return this.request('POST', '/api/worlds', fields);
  }

  generateWorld(keywords: string, characterCount = 3): Promise<GeneratedWorldResponse> {
    return this.request('POST', '/api/worlds/generate', {
      keywords,
      generate_characters: characterCount > 0,
      character_count: Math.max(1, characterCount),
    });
  }

  updateWorld(id: number, fields: Partial<WorldFields>): Promise<WorldRecord> {
    return this.request('PUT', `/api/worlds/${id}`, fields);
  }

  deleteWorld(id: number): Promise<{ message: string }> {
    return this.request('DELETE', `/api/worlds/${id}`);
  }

  // ── Characters ──

  listCharacters(worldId?: number): Promise<CharacterRecord[]> {
    return this.request('GET', worldId === undefined ? '/api/characters' : `/api/characters?world_id=${worldId}`);
  }

  createCharacter(fields: CharacterFields): Promise<CharacterRecord> {
    return this.request('POST', '/api/characters', fields);
  }

  updateCharacter(id: number, fields: Partial<Omit<CharacterFields, 'world_id'>>): Promise<CharacterRecord> {
    return this.request('PUT', `/api/characters/${id}`, fields);
  }

  deleteCharacter(id: number): Promise<{ message: string }> {
    return this.request('DELETE', `/api/characters/${id}`);
  }

  // ── Discussions ──

  listDiscussions(worldId?: number): Promise<DiscussionRecord[]> {
    return this.request('GET', worldId === undefined ? '/api/discussions' : `/api/discussions?world_id=${worldId}`);
  }

  getDiscussion(id: number): Promise<DiscussionRecord> {
    return this.request('GET', `/api/discussions/${id}`);
  }

  createDiscussion(fields: DiscussionFields): Promise<DiscussionRecord> {
    return this.request('POST', '/api/discussions', fields);
  }

  /** Reset a finished or failed discussion so it can run again. */
  resetDiscussion(id: number): Promise<DiscussionRecord> {
    return this.request('PUT', `/api/discussions/${id}`, { status: 'pending' });
  }

  deleteDiscussion(id: number): Promise<{ message: string }> {
    return this.request('DELETE', `/api/discussions/${id}`);
  }

  async startDiscussion(id: number): Promise<StartOutcome> {
    try {
      const body: StartDiscussionResponse = await this.request('POST', `/api/discussions/${id}/start`);
      return { started: true, discussionId: body.discussion_id };
    } catch (err) {
      if (err instanceof ApiError && err.status === 400 && err.code === 'already_running') {
        return { observing: true, discussionId: id };
      }
      throw err;
    }
  }

  /** Tell the server this client is done with the stream. */
  closeStream(id: number): Promise<{ message: string }> {
    return this.request('DELETE', `/api/discussions/${id}/stream`);
  }

  /** EventSource URL that generates a world and reports its progress. */
  generateWorldStreamUrl(keywords: string, characterCount = 3): string {
    const query = new URLSearchParams({
      keywords,
      generate_characters: String(characterCount > 0),
      character_count: String(Math.max(1, characterCount)),
    });
    return `${this.baseUrl}/api/worlds/generate-stream?${query}`;
  }

  streamUrl(id: number): string {
    return `${this.baseUrl}/api/discussions/${id}/stream`;
  }

  socketUrl(id: number): string {
    return `${this.baseUrl.replace(/^http/, 'ws')}/ws/discussions/${id}`;
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    if (!res.ok) {
      let parsed: unknown = null;
      try {
        parsed = await res.json();
      } catch {
        parsed = null;
      }
      throw new ApiError(res.status, isErrorBody(parsed) ? parsed : null);
    }
    return res.json();
  }
}
