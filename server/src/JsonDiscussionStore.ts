import { readFile, writeFile, mkdir, rename } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { NotFoundError } from './errors.js';
import type {
  CharacterInput,
  DiscussionInput,
  DiscussionPatch,
  IDiscussionStore,
  ListOptions,
  WorldInput,
} from './interfaces/index.js';
import type { CharacterRecord, DiscussionRecord, WorldRecord } from './types.js';

interface StoreData {
  seq: { world: number; character: number; discussion: number };
  worlds: WorldRecord[];
  characters: CharacterRecord[];
  discussions: DiscussionRecord[];
}

function emptyData(): StoreData {
  return { seq: { world: 0, character: 0, discussion: 0 }, worlds: [], characters: [], discussions: [] };
}

export function page<T>(items: T[], options: ListOptions = {}): T[] {
  const skip = options.skip ?? 0;
  const limit = options.limit ?? 100;
  return items.slice(skip, skip + limit);
}

/**
 * File-backed store: the whole data set lives in memory and is written to
 * `{baseDir}/store.json` on every mutation. Mutations are serialized, each
 * applied to a draft that replaces the in-memory state only once its
 * atomic write (temp file + rename) succeeded.
 */
export class JsonDiscussionStore implements IDiscussionStore {
  private data: StoreData = emptyData();
  private filePath: string;
  private writeChain: Promise<void> = Promise.resolve();
  private now: () => Date;

  constructor(baseDir: string, now: () => Date = () => new Date()) {
    this.filePath = join(baseDir, 'store.json');
    this.now = now;
  }

  async load(): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch {
      this.data = emptyData();
      return;
    }
    const parsed: Partial<StoreData> = JSON.parse(raw);
    this.data = {
      seq: parsed.seq ?? emptyData().seq,
      worlds: parsed.worlds ?? [],
      characters: parsed.characters ?? [],
      discussions: parsed.discussions ?? [],
    };
    console.log(
      `[JsonStore] Loaded ${this.data.worlds.length} worlds, ${this.data.characters.length} characters, ${this.data.discussions.length} discussions`,
    );
  }

  async close(): Promise<void> {
    await this.writeChain;
  }

  // ── Worlds ──

  async listWorlds(options?: ListOptions): Promise<WorldRecord[]> {
    return page(this.data.worlds, options).map((w) => structuredClone(w));
  }

  async getWorld(id: number): Promise<WorldRecord | null> {
    const world = this.data.worlds.find((w) => w.id === id);
    return world ? structuredClone(world) : null;
  }

  async createWorld(input: WorldInput): Promise<WorldRecord> {
    return this.mutate((draft) => {
      const world: WorldRecord = {
        id: ++draft.seq.world,
        name: input.name,
        description: input.description,
        background: input.background,
        created_at: this.timestamp(),
      };
      draft.worlds.push(world);
      return world;
    });
  }

  async updateWorld(id: number, patch: Partial<WorldInput>): Promise<WorldRecord> {
    return this.mutate((draft) => {
      const world = draft.worlds.find((w) => w.id === id);
      if (!world) throw new NotFoundError('World', id);
      return Object.assign(world, definedOnly(patch), { updated_at: this.timestamp() });
    });
  }

  async deleteWorld(id: number): Promise<void> {
    await this.mutate((draft) => {
      if (!draft.worlds.some((w) => w.id === id)) throw new NotFoundError('World', id);
      draft.worlds = draft.worlds.filter((w) => w.id !== id);
      draft.characters = draft.characters.filter((c) => c.world_id !== id);
      draft.discussions = draft.discussions.filter((d) => d.world_id !== id);
    });
  }

  // ── Characters ──

  async listCharacters(worldId?: number, options?: ListOptions): Promise<CharacterRecord[]> {
    const matching = worldId === undefined
      ? this.data.characters
      : this.data.characters.filter((c) => c.world_id === worldId);
    return page(matching, options).map((c) => structuredClone(c));
  }

  async getCharacter(id: number): Promise<CharacterRecord | null> {
    const character = this.data.characters.find((c) => c.id === id);
    return character ? structuredClone(character) : null;
  }

  async createCharacter(input: CharacterInput): Promise<CharacterRecord> {
    return this.mutate((draft) => {
      if (!draft.worlds.some((w) => w.id === input.world_id)) throw new NotFoundError('World', input.world_id);
      const character: CharacterRecord = {
        id: ++draft.seq.character,
        world_id: input.world_id,
        name: input.name,
        description: input.description,
        personality: input.personality,
        background: input.background,
        persona_config: input.persona_config ?? null,
        created_at: this.timestamp(),
      };
      draft.characters.push(character);
      return character;
    });
  }

  async updateCharacter(
    id: number,
    patch: Partial<Omit<CharacterInput, 'world_id'>>,
  ): Promise<CharacterRecord> {
    return this.mutate((draft) => {
      const character = draft.characters.find((c) => c.id === id);
      if (!character) throw new NotFoundError('Character', id);
      return Object.assign(character, definedOnly(patch), { updated_at: this.timestamp() });
    });
  }

  async deleteCharacter(id: number): Promise<void> {
    await this.mutate((draft) => {
      if (!draft.characters.some((c) => c.id === id)) throw new NotFoundError('Character', id);
      draft.characters = draft.characters.filter((c) => c.id !== id);
    });
  }

  // ── Discussions ──

  async listDiscussions(worldId?: number, options?: ListOptions): Promise<DiscussionRecord[]> {
    const matching = worldId === undefined
      ? this.data.discussions
      : this.data.discussions.filter((d) => d.world_id === worldId);
    return page(matching, options).map((d) => structuredClone(d));
  }

  async getDiscussion(id: number): Promise<DiscussionRecord | null> {
    const discussion = this.data.discussions.find((d) => d.id === id);
    return discussion ? structuredClone(discussion) : null;
  }

  async createDiscussion(input: DiscussionInput): Promise<DiscussionRecord> {
    return this.mutate((draft) => {
      if (!draft.worlds.some((w) => w.id === input.world_id)) throw new NotFoundError('World', input.world_id);
      const discussion: DiscussionRecord = {
        id: ++draft.seq.discussion,
        world_id: input.world_id,
        theme: input.theme,
        description: input.description,
        status: 'pending',
        result: null,
        created_at: this.timestamp(),
      };
      draft.discussions.push(discussion);
      return discussion;
    });
  }

  async updateDiscussion(id: number, patch: DiscussionPatch): Promise<DiscussionRecord> {
    return this.mutate((draft) => {
      const discussion = draft.discussions.find((d) => d.id === id);
      if (!discussion) throw new NotFoundError('Discussion', id);
      return Object.assign(discussion, definedOnly(structuredClone(patch)), { updated_at: this.timestamp() });
    });
  }

  async deleteDiscussion(id: number): Promise<void> {
    await this.mutate((draft) => {
      if (!draft.discussions.some((d) => d.id === id)) throw new NotFoundError('Discussion', id);
      draft.discussions = draft.discussions.filter((d) => d.id !== id);
    });
  }

  // ── Private helpers ──

  private timestamp(): string {
    return this.now().toISOString();
  }

  /**
   * Queue a change against a copy of the current state and write it. The
   * copy becomes the state only after the write; if `change` throws or the
   * write fails, the returned promise rejects, nothing changes, and later
   * mutations still run.
   */
  private mutate<T>(change: (draft: StoreData) => T): Promise<T> {
    const run = this.writeChain.then(async () => {
      const draft = structuredClone(this.data);
      const result = change(draft);
      try {
        await this.writeAtomically(JSON.stringify(draft, null, 2));
      } catch (err) {
        console.error('[JsonStore] Write failed, keeping previous state:', err);
        throw err;
      }
      this.data = draft;
      return structuredClone(result);
    });
    this.writeChain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async writeAtomically(json: string): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    await writeFile(tmp, json);
    await rename(tmp, this.filePath);
  }
}

/** Drop keys whose value is undefined so Object.assign leaves those fields alone. */
export function definedOnly<T extends object>(patch: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key in patch) {
    if (patch[key] !== undefined) out[key] = patch[key];
  }
  return out;
}
