import { z } from 'zod';
import { createChatClient, type ChatCompletionClient } from './CompletionApiStrategy.js';
import { errorMessage } from './errors.js';
import type { CharacterInput, WorldInput } from './interfaces/index.js';
import { withTimeout } from './utils/abortable.js';

export type GeneratedCharacter = Omit<CharacterInput, 'world_id' | 'persona_config'>;

export interface GeneratedWorld {
  world: WorldInput;
  characters: GeneratedCharacter[];
  generatedBy: 'completion-api' | 'template';
}

export interface WorldGenerateRequest {
  keywords: string;
  generateCharacters: boolean;
  characterCount: number;
}

export interface WorldGenerationProgress {
  progress: number;
  message: string;
}

export type WorldProgressHandler = (event: WorldGenerationProgress) => void;

export interface WorldGeneratorOptions {
  apiKey?: string;
  model: string;
  /** Injected for tests; built from apiKey otherwise */
  client?: ChatCompletionClient;
  /** Bound on each completion call (ms) */
  timeoutMs?: number;
  /** Source of randomness for template character picks */
  random?: () => number;
}

export const DEFAULT_COMPLETION_TIMEOUT_MS = 60_000;

const WORLD_TEMPLATES: Array<Record<keyof WorldInput, string>> = [
  {
    name: 'The Enchanted Realm of {k}',
    description: 'A mysterious world where {k} shapes everything.',
    background:
      'In this world {k} plays a central role. Ancient magic let a whole civilization grow around {k}, and its people rely on that power in their daily lives.',
  },
  {
    name: 'Kingdom of {k}',
    description: 'A grand kingdom built on the idea of {k}.',
    background:
      'The Kingdom of {k} has stood for centuries. Its people honour {k} and have built their culture and craft upon it. Peace in the kingdom is kept by the blessing of {k}.',
  },
  {
    name: 'The Hidden Land of {k}',
    description: 'A secluded land steeped in {k}.',
    background:
      'Far from any town lies a land where old legends of {k} survive. Visitors must face the true power of {k}. Nature and {k} live in a balance that is both beautiful and dangerous.',
  },
];

const CHARACTER_TEMPLATES: GeneratedCharacter[] = [
  {
    name: 'Sage of {k}',
    description: 'A wise scholar with deep knowledge of {k}.',
    personality: 'intellectual, careful, thoughtful',
    background: 'Has studied {k} for decades and analyses every question from several angles.',
  },
  {
    name: 'Warrior of {k}',
    description: 'A brave fighter sworn to protect {k}.',
    personality: 'courageous, principled, decisive',
    background: 'Has fought those who threaten {k} for years and prefers practical, quick action.',
  },
  {
    name: 'Merchant of {k}',
    description: 'A trader whose business revolves around {k}.',
    personality: 'pragmatic, persuasive, sociable',
    background: 'Made a fortune trading in {k} and proposes realistic solutions backed by a wide network.',
  },
  {
    name: 'Artist of {k}',
    description: 'A creator whose work is inspired by {k}.',
    personality: 'creative, sensitive, idealistic',
    background: 'Captivated by {k}, keeps making art about it and brings an unusual aesthetic view.',
  },
  {
    name: 'Explorer of {k}',
    description: 'An adventurer chasing the mysteries of {k}.',
    personality: 'curious, adventurous, optimistic',
    background: 'Has charted unknown territory tied to {k} and is driven by the thrill of discovery.',
  },
];

export const MAX_TEMPLATE_CHARACTERS = CHARACTER_TEMPLATES.length;

const GeneratedWorldSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().trim().min(1),
  background: z.string().trim().min(1),
});

const GeneratedCharactersSchema = z.object({
  characters: z
    .array(
      z.object({
        name: z.string().trim().min(1),
        description: z.string().default(''),
        personality: z.string().default(''),
        background: z.string().default(''),
      }),
    )
    .min(1),
});

function fill(template: string, keywords: string): string {
  return template.replaceAll('{k}', keywords);
}

/** Stable index for a keyword string so the same keywords pick the same template. */
function templateIndex(keywords: string, count: number): number {
  let hash = 0;
  for (const ch of keywords) hash = (hash * 31 + (ch.codePointAt(0) ?? 0)) >>> 0;
  return hash % count;
}

/**
 * Builds a world (and optionally its characters) from a few keywords. Uses
 * the completion API when configured; any failure there falls back to the
 * built-in templates, so generation itself never fails.
 */
export class WorldGenerator {
  private client: ChatCompletionClient | null;
  private model: string;
  private timeoutMs: number;
  private random: () => number;

  constructor(options: WorldGeneratorOptions) {
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COMPLETION_TIMEOUT_MS;
    this.random = options.random ?? Math.random;
    this.client = options.client ?? createChatClient(options.apiKey);
  }

  /**
   * `onProgress` sees each step once, with progress strictly rising and
   * below 100; the caller reports completion.
   */
  async generate(request: WorldGenerateRequest, onProgress?: WorldProgressHandler): Promise<GeneratedWorld> {
    const { keywords, generateCharacters, characterCount } = request;
    let reached = -1;
    const report = (progress: number, message: string) => {
      if (progress <= reached) return;
      reached = progress;
      onProgress?.({ progress, message });
    };

    report(10, 'Starting generation...');
    if (this.client) {
      try {
        report(30, 'Asking the completion API for a world...');
        const world = await this.generateWorldWithApi(this.client, keywords);
        let characters: GeneratedCharacter[] = [];
        if (generateCharacters) {
          report(70, `Asking the completion API for ${characterCount} characters...`);
          characters = await this.generateCharactersWithApi(this.client, keywords, world, characterCount);
        }
        report(90, 'Generation finished');
        return { world, characters, generatedBy: 'completion-api' };
      } catch (err) {
        console.warn(`[WorldGenerator] Completion API failed, using templates: ${errorMessage(err)}`);
        report(60, 'Completion API failed, falling back to templates...');
      }
    }

    report(40, 'Building the world from templates...');
    const world = WorldGenerator.templateWorld(keywords);
    let characters: GeneratedCharacter[] = [];
    if (generateCharacters) {
      report(80, 'Building characters from templates...');
      characters = this.templateCharacters(keywords, characterCount);
    }
    report(90, 'Generation finished');
    return { world, characters, generatedBy: 'template' };
  }

  static templateWorld(keywords: string): WorldInput {
    const template = WORLD_TEMPLATES[templateIndex(keywords, WORLD_TEMPLATES.length)];
    return {
      name: fill(template.name, keywords),
      description: fill(template.description, keywords),
      background: fill(template.background, keywords),
    };
  }

  /** Up to MAX_TEMPLATE_CHARACTERS distinct characters, picked at random. */
  templateCharacters(keywords: string, count: number): GeneratedCharacter[] {
    const pool = [...CHARACTER_TEMPLATES];
    for (let i = pool.length - 1; i > 0; i--) {
      const j = Math.floor(this.random() * (i + 1));
      [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, Math.min(count, pool.length)).map((t) => ({
      name: fill(t.name, keywords),
      description: fill(t.description, keywords),
      personality: t.personality,
      background: fill(t.background, keywords),
    }));
  }

  private async generateWorldWithApi(client: ChatCompletionClient, keywords: string): Promise<WorldInput> {
    const text = await this.complete(
      client,
      'You design imaginative settings for storytelling. Respond with JSON only.',
      `Create a fictional world from these keywords: ${keywords}

Respond with a JSON object of this exact shape:
{"name": "<world name>", "description": "<1-2 sentences>", "background": "<3-5 sentences covering history, culture and notable features>"}`,
    );
    return GeneratedWorldSchema.parse(JSON.parse(text));
  }

  private async generateCharactersWithApi(
    client: ChatCompletionClient,
    keywords: string,
    world: WorldInput,
    count: number,
  ): Promise<GeneratedCharacter[]> {
    const text = await this.complete(
      client,
      'You design distinct characters who fit a fictional world. Respond with JSON only.',
      `Create ${count} characters for this world.

WORLD: ${world.name}
DESCRIPTION: ${world.description}
BACKGROUND: ${world.background}
KEYWORDS: ${keywords}

Give each a different point of view so they disagree usefully in a discussion.
Respond with a JSON object of this exact shape:
{"characters": [{"name": "...", "description": "<1-2 sentences>", "personality": "<short traits>", "background": "<2-3 sentences>"}]}`,
    );
    return GeneratedCharactersSchema.parse(JSON.parse(text)).characters.slice(0, count);
  }

  private async complete(client: ChatCompletionClient, system: string, user: string): Promise<string> {
    const completion = await withTimeout(
      (signal) =>
        client.chat.completions.create(
          {
            model: this.model,
            temperature: 0.8,
            response_format: { type: 'json_object' },
            messages: [
              { role: 'system', content: system },
              { role: 'user', content: user },
            ],
          },
          { signal },
        ),
      this.timeoutMs,
      () => new Error(`Completion did not finish within ${this.timeoutMs}ms`),
    );
    const text = completion.choices[0]?.message?.content;
    if (!text) throw new Error('Completion returned no content');
    return text;
  }
}
