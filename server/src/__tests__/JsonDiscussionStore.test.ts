import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { JsonDiscussionStore, definedOnly, page } from '../JsonDiscussionStore.js';
import { NotFoundError } from '../errors.js';
import { seedDiscussion, steppingClock } from './helpers/fixtures.js';

describe('JsonDiscussionStore', () => {
  let dir: string;
  let store: JsonDiscussionStore;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    dir = await mkdtemp(join(tmpdir(), 'forge-store-'));
    store = new JsonDiscussionStore(dir, steppingClock());
    await store.load();
  });

  afterEach(async () => {
    await store.close();
    await rm(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('starts empty when there is no file yet', async () => {
    expect(await store.listWorlds()).toEqual([]);
    expect(await store.getDiscussion(1)).toBeNull();
  });

  it('creates records with sequential ids and clock timestamps', async () => {
    const first = await store.createWorld({ name: 'Port Lumen', description: 'Windy', background: 'Salt' });
    const second = await store.createWorld({ name: 'Dry Gulch', description: 'Dusty', background: 'Copper' });

    expect(first).toEqual({
      id: 1,
      name: 'Port Lumen',
      description: 'Windy',
      background: 'Salt',
      created_at: '2026-01-01T00:00:00.000Z',
    });
    expect(second.id).toBe(2);
    expect(second.created_at).toBe('2026-01-01T00:00:01.000Z');
  });

  it('creates discussions as pending with no result', async () => {
    const { discussion, world } = await seedDiscussion(store);
    expect(discussion).toMatchObject({
      id: 1,
      world_id: world.id,
      theme: 'Harbour expansion',
      description: 'Weigh the costs',
      status: 'pending',
      result: null,
    });
  });

  it('writes every mutation to store.json and reloads it', async () => {
    const { world } = await seedDiscussion(store);
    await store.close();

    const onDisk = JSON.parse(await readFile(join(dir, 'store.json'), 'utf-8'));
    expect(onDisk.seq).toEqual({ world: 1, character: 2, discussion: 1 });

    const reopened = new JsonDiscussionStore(dir);
    await reopened.load();
    expect((await reopened.getWorld(world.id))?.name).toBe('Port Lumen');
    expect(await reopened.listCharacters(world.id)).toHaveLength(2);

    const next = await reopened.createWorld({ name: 'Second', description: '', background: '' });
    expect(next.id).toBe(2);
    await reopened.close();
  });

  it('hands out copies of stored records', async () => {
    const world = await store.createWorld({ name: 'Port Lumen', description: '', background: '' });
    world.name = 'Changed outside';
    const listed = await store.listWorlds();
    listed[0].name = 'Also changed';

    expect((await store.getWorld(world.id))?.name).toBe('Port Lumen');
  });

  it('applies only the defined fields of a patch', async () => {
    const { discussion } = await seedDiscussion(store);

    const updated = await store.updateDiscussion(discussion.id, { theme: 'Breakwater', description: undefined });

    expect(updated.theme).toBe('Breakwater');
    expect(updated.description).toBe('Weigh the costs');
    expect(updated.updated_at).toBeDefined();
  });

  it('filters characters and discussions by world and pages them', async () => {
    const a = await seedDiscussion(store, ['Ada', 'Bram', 'Cleo']);
    const b = await seedDiscussion(store, ['Dov']);

    expect((await store.listCharacters(b.world.id)).map((c) => c.name)).toEqual(['Dov']);
    expect((await store.listCharacters(a.world.id, { skip: 1, limit: 1 })).map((c) => c.name)).toEqual(['Bram']);
    expect((await store.listCharacters()).map((c) => c.name)).toEqual(['Ada', 'Bram', 'Cleo', 'Dov']);
    expect(await store.listDiscussions(a.world.id)).toHaveLength(1);
    expect(await store.listDiscussions()).toHaveLength(2);
  });

  it('removes a world together with its characters and discussions', async () => {
    const kept = await seedDiscussion(store, ['Ada']);
    const dropped = await seedDiscussion(store, ['Bram']);

    await store.deleteWorld(dropped.world.id);

    expect(await store.getWorld(dropped.world.id)).toBeNull();
    expect((await store.listCharacters()).map((c) => c.name)).toEqual(['Ada']);
    expect((await store.listDiscussions()).map((d) => d.id)).toEqual([kept.discussion.id]);
  });

  it('throws NotFoundError for unknown ids', async () => {
    await expect(store.updateWorld(9, { name: 'x' })).rejects.toThrow(new NotFoundError('World', 9));
    await expect(store.deleteCharacter(4)).rejects.toThrow('Character 4 not found');
    await expect(store.updateDiscussion(3, { status: 'running' })).rejects.toThrow('Discussion 3 not found');
    await expect(store.createDiscussion({ world_id: 2, theme: 't', description: '' })).rejects.toThrow('World 2 not found');
    await expect(store.createCharacter({
      world_id: 2,
      name: 'Ghost',
      description: '',
      personality: '',
      background: '',
      persona_config: null,
    })).rejects.toThrow('World 2 not found');
  });

  it('keeps the previous state when a write fails', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const { world, discussion } = await seedDiscussion(store);
    // A directory where the temp file goes makes the next write fail
    await mkdir(join(dir, 'store.json.tmp'));

    await expect(store.updateDiscussion(discussion.id, { status: 'running' })).rejects.toThrow();
    await expect(store.createWorld({ name: 'Dry Gulch', description: 'Dusty', background: 'Copper' })).rejects.toThrow();

    expect((await store.getDiscussion(discussion.id))?.status).toBe('pending');
    expect(await store.listWorlds()).toEqual([world]);

    await rm(join(dir, 'store.json.tmp'), { recursive: true });
    const next = await store.createWorld({ name: 'Dry Gulch', description: 'Dusty', background: 'Copper' });
    expect(next.id).toBe(world.id + 1);
  });

  it('keeps the data set it loaded from a partial file', async () => {
    await writeFile(join(dir, 'store.json'), JSON.stringify({ worlds: [{ id: 4, name: 'Old', description: '', background: '', created_at: 'x' }] }));
    const legacy = new JsonDiscussionStore(dir);
    await legacy.load();

    expect((await legacy.listWorlds()).map((w) => w.name)).toEqual(['Old']);
    expect(await legacy.listDiscussions()).toEqual([]);
  });
});

describe('page()', () => {
  it('defaults to the first hundred items', () => {
    const items = Array.from({ length: 150 }, (_, i) => i);
    expect(page(items)).toHaveLength(100);
    expect(page(items, { skip: 140 })).toEqual([140, 141, 142, 143, 144, 145, 146, 147, 148, 149]);
    expect(page(items, { skip: 5, limit: 2 })).toEqual([5, 6]);
  });
});

describe('definedOnly()', () => {
  it('drops undefined values but keeps null', () => {
    expect(definedOnly({ a: 1, b: undefined, c: null })).toEqual({ a: 1, c: null });
  });
});
