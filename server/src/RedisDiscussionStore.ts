import { getRedisClient, closeRedisClient } from './RedisClient.js';
import { definedOnly, page } from './JsonDiscussionStore.js';
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

type Kind = 'world' | 'character' | 'discussion';

const recordKey = (kind: Kind, id: number) => `forge:${kind}:${id}`;
const indexKey = (kind: Kind) => `forge:${kind}s`;
const seqKey = (kind: Kind) => `forge:seq:${kind}`;

/**
 * Redis-backed store. Each record is a JSON string at `forge:{kind}:{id}`;
 * `forge:{kind}s` is the set of live ids and `forge:seq:{kind}` the id counter.
 * Use when STORAGE_BACKEND=redis.
 */
export class RedisDiscussionStore implements IDiscussionStore {
  private now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  async load(): Promise<void> {
    const count = await getRedisClient().scard(indexKey('discussion'));
    console.log(`[RedisStore] Ready with ${count} discussions`);
  }

  async close(): Promise<void> {
    await closeRedisClient();
  }

  // ── Worlds ──

  async listWorlds(options?: ListOptions): Promise<WorldRecord[]> {
    return page(await this.all<WorldRecord>('world'), options);
  }

  getWorld(id: number): Promise<WorldRecord | null> {
    return this.read<WorldRecord>('world', id);
  }

  async createWorld(input: WorldInput): Promise<WorldRecord> {
    const world: WorldRecord = {
      id: await getRedisClient().incr(seqKey('world')),
      name: input.name,
      description: input.description,
      background: input.background,
      created_at: this.timestamp(),
    };
    await this.write('world', world);
    return world;
  }

  async updateWorld(id: number, patch: Partial<WorldInput>): Promise<WorldRecord> {
    const world = await this.require<WorldRecord>('world', id, 'World');
    const updated = { ...world, ...definedOnly(patch), updated_at: this.timestamp() };
    await this.write('world', updated);
    return updated;
  }

  async deleteWorld(id: number): Promise<void> {
    await this.require<WorldRecord>('world', id, 'World');
    const characters = await this.listCharacters(id, { limit: Infinity });
    const discussions = await this.listDiscussions(id, { limit: Infinity });
    for (const c of characters) await this.remove('character', c.id);
    for (const d of discussions) await this.remove('discussion', d.id);
    await this.remove('world', id);
  }

  // ── Characters ──

  async listCharacters(worldId?: number, options?: ListOptions): Promise<CharacterRecord[]> {
    const all = await this.all<CharacterRecord>('character');
    return page(worldId === undefined ? all : all.filter((c) => c.world_id === worldId), options);
  }

  getCharacter(id: number): Promise<CharacterRecord | null> {
    return this.read<CharacterRecord>('character', id);
  }

  async createCharacter(input: CharacterInput): Promise<CharacterRecord> {
    await this.require<WorldRecord>('world', input.world_id, 'World');
    const character: CharacterRecord = {
      id: await getRedisClient().incr(seqKey('character')),
      world_id: input.world_id,
      name: input.name,
      description: input.description,
      personality: input.personality,
      background: input.background,
      persona_config: input.persona_config ?? null,
      created_at: this.timestamp(),
    };
    await this.write('character', character);
    return character;
  }

  async updateCharacter(
    id: number,
    patch: Partial<Omit<CharacterInput, 'world_id'>>,
  ): Promise<CharacterRecord> {
    const character = await this.require<CharacterRecord>('character', id, 'Character');
    const updated = { ...character, ...definedOnly(patch), updated_at: this.timestamp() };
    await this.write('character', updated);
    return updated;
  }

  async deleteCharacter(id: number): Promise<void> {
    await this.require<CharacterRecord>('character', id, 'Character');
    await this.remove('character', id);
  }

  // ── Discussions ──

  async listDiscussions(worldId?: number, options?: ListOptions): Promise<DiscussionRecord[]> {
    const all = await this.all<DiscussionRecord>('discussion');
    return page(worldId === undefined ? all : all.filter((d) => d.world_id === worldId), options);
  }

  getDiscussion(id: number): Promise<DiscussionRecord | null> {
    return this.read<DiscussionRecord>('discussion', id);
  }

  async createDiscussion(input: DiscussionInput): Promise<DiscussionRecord> {
    await this.require<WorldRecord>('world', input.world_id, 'World');
    const discussion: DiscussionRecord = {
      id: await getRedisClient().incr(seqKey('discussion')),
      world_id: input.world_id,
      theme: input.theme,
      description: input.description,
      status: 'pending',
      result: null,
      created_at: this.timestamp(),
    };
    await this.write('discussion', discussion);
    return discussion;
  }

  async updateDiscussion(id: number, patch: DiscussionPatch): Promise<DiscussionRecord> {
    const discussion = await this.require<DiscussionRecord>('discussion', id, 'Discussion');
    const updated = { ...discussion, ...definedOnly(patch), updated_at: this.timestamp() };
    await this.write('discussion', updated);
    return updated;
  }

  async deleteDiscussion(id: number): Promise<void> {
    await this.require<DiscussionRecord>('discussion', id, 'Discussion');
    await this.remove('discussion', id);
  }

  // ── Private helpers ──

  private timestamp(): string {
    return this.now().toISOString();
  }

  private async read<T>(kind: Kind, id: number): Promise<T | null> {
    const data = await getRedisClient().get(recordKey(kind, id));
    return data ? JSON.parse(data) : null;
  }

  private async require<T>(kind: Kind, id: number, label: string): Promise<T> {
    const record = await this.read<T>(kind, id);
    if (record === null) throw new NotFoundError(label, id);
    return record;
  }

  /** Every live record of a kind, ascending by id. */
  private async all<T>(kind: Kind): Promise<T[]> {
    const redis = getRedisClient();
    const ids = (await redis.smembers(indexKey(kind))).map(Number).sort((a, b) => a - b);
    if (ids.length === 0) return [];
    const values = await redis.mget(...ids.map((id) => recordKey(kind, id)));
    const records: T[] = [];
    for (const value of values) {
      if (value) records.push(JSON.parse(value));
    }
    return records;
  }

  private async write(kind: Kind, record: { id: number }): Promise<void> {
    const redis = getRedisClient();
    await redis.set(recordKey(kind, record.id), JSON.stringify(record));
    await redis.sadd(indexKey(kind), String(record.id));
  }

  private async remove(kind: Kind, id: number): Promise<void> {
    const redis = getRedisClient();
    await redis.del(recordKey(kind, id));
    await redis.srem(indexKey(kind), String(id));
  }
}
