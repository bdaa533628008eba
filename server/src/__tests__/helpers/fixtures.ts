import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { ChatCompletionClient } from '../../CompletionApiStrategy.js';
import type { IDiscussionStore, IGenerationStrategy } from '../../interfaces/index.js';
import type {
  CharacterRecord,
  DiscussionMessage,
  DiscussionRecord,
  GenerationRequest,
  Persona,
  WorldRecord,
} from '../../types.js';

export function makePersona(overrides: Partial<Persona> = {}): Persona {
  return {
    name: 'Ada',
    description: 'harbour engineer',
    personality: 'methodical',
    background: 'Rebuilt the north pier',
    traits: {},
    ...overrides,
  };
}

export function makeRequest(overrides: Partial<GenerationRequest> = {}): GenerationRequest {
  return {
    theme: 'Harbour expansion',
    description: 'Should the port add a second breakwater?',
    world: { name: 'Port Lumen', background: 'A trading port on a windy coast' },
    personas: [
      makePersona(),
      makePersona({ name: 'Bram', description: 'fisherman', personality: 'blunt', background: 'Third-generation trawler captain' }),
    ],
    ...overrides,
  };
}

/** Clock that advances `stepMs` on every call. */
export function steppingClock(startIso = '2026-01-01T00:00:00.000Z', stepMs = 1000): () => Date {
  let t = Date.parse(startIso);
  return () => {
    const d = new Date(t);
    t += stepMs;
    return d;
  };
}

export function line(speaker: string, content: string, timestamp = new Date().toISOString()): DiscussionMessage {
  return { speaker, content, timestamp };
}

/** Resolves never; rejects once the signal aborts. */
export function hangUntilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

export interface FakeStrategyOptions {
  name: string;
  label?: string;
  available?: boolean;
  generate: (request: GenerationRequest, signal: AbortSignal) => Promise<DiscussionMessage[]>;
}

export class FakeStrategy implements IGenerationStrategy {
  readonly name: string;
  readonly label: string;
  available: boolean;
  calls = 0;
  lastSignal: AbortSignal | null = null;
  private impl: FakeStrategyOptions['generate'];

  constructor(options: FakeStrategyOptions) {
    this.name = options.name;
    this.label = options.label ?? `Trying ${options.name}`;
    this.available = options.available ?? true;
    this.impl = options.generate;
  }

  isAvailable(): boolean {
    return this.available;
  }

  generate(request: GenerationRequest, signal: AbortSignal): Promise<DiscussionMessage[]> {
    this.calls++;
    this.lastSignal = signal;
    return this.impl(request, signal);
  }
}

export interface Seeded {
  world: WorldRecord;
  characters: CharacterRecord[];
  discussion: DiscussionRecord;
}

/** A world with the named characters and one pending discussion. */
export async function seedDiscussion(
  store: IDiscussionStore,
  characterNames: string[] = ['Ada', 'Bram'],
  theme = 'Harbour expansion',
): Promise<Seeded> {
  const world = await store.createWorld({
    name: 'Port Lumen',
    description: 'A windy trading port',
    background: 'Founded on salt and shipping',
  });
  const characters: CharacterRecord[] = [];
  for (const name of characterNames) {
    characters.push(await store.createCharacter({
      world_id: world.id,
      name,
      description: `${name} lives in Port Lumen`,
      personality: 'curious',
      background: 'Local',
      persona_config: null,
    }));
  }
  const discussion = await store.createDiscussion({
    world_id: world.id,
    theme,
    description: 'Weigh the costs',
  });
  return { world, characters, discussion };
}

export function chatCompletion(content: string | null): ChatCompletion {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model: 'test-model',
    choices: [
      {
        index: 0,
        finish_reason: 'stop',
        logprobs: null,
        message: { role: 'assistant', content, refusal: null },
      },
    ],
  };
}

/** Scripted reply that never answers until the request is aborted. */
export const HANG = Symbol('hang');

type ScriptedReply = string | null | Error | typeof HANG;

/** Answers each create() call with the next scripted reply; an Error reply rejects. */
export class FakeChatClient implements ChatCompletionClient {
  readonly requests: ChatCompletionCreateParamsNonStreaming[] = [];
  readonly signals: Array<AbortSignal | undefined> = [];
  private replies: ScriptedReply[];

  readonly chat = {
    completions: {
      create: (body: ChatCompletionCreateParamsNonStreaming, options?: { signal?: AbortSignal }) =>
        this.create(body, options),
    },
  };

  constructor(...replies: ScriptedReply[]) {
    this.replies = replies;
  }

  private async create(
    body: ChatCompletionCreateParamsNonStreaming,
    options?: { signal?: AbortSignal },
  ): Promise<ChatCompletion> {
    this.requests.push(body);
    this.signals.push(options?.signal);
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error('FakeChatClient has no reply left');
    if (reply instanceof Error) throw reply;
    if (reply === HANG) return hangUntilAborted(options?.signal ?? new AbortController().signal);
    return chatCompletion(reply);
  }
}
