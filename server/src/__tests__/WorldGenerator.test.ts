import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MAX_TEMPLATE_CHARACTERS, WorldGenerator } from '../WorldGenerator.js';
import { FakeChatClient, HANG } from './helpers/fixtures.js';

const WORLD_REPLY = JSON.stringify({
  name: 'Saltmarsh Reach',
  description: 'Tidal flats ruled by the moon.',
  background: 'Families farm salt between the tides.',
});

const CHARACTERS_REPLY = JSON.stringify({
  characters: [
    { name: 'Oona', description: 'Salt farmer', personality: 'stubborn', background: 'Born on the flats' },
    { name: 'Pell', description: 'Tide reader' },
    { name: 'Quill', description: 'Scribe', personality: 'nervous', background: 'Keeps the ledgers' },
  ],
});

describe('WorldGenerator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('with the completion API', () => {
    it('builds the world and its characters from two completions', async () => {
      const client = new FakeChatClient(WORLD_REPLY, CHARACTERS_REPLY);
      const generator = new WorldGenerator({ model: 'test-model', client });

      const generated = await generator.generate({ keywords: 'salt, tides', generateCharacters: true, characterCount: 2 });

      expect(generated.generatedBy).toBe('completion-api');
      expect(generated.world).toEqual({
        name: 'Saltmarsh Reach',
        description: 'Tidal flats ruled by the moon.',
        background: 'Families farm salt between the tides.',
      });
      expect(generated.characters).toEqual([
        { name: 'Oona', description: 'Salt farmer', personality: 'stubborn', background: 'Born on the flats' },
        { name: 'Pell', description: 'Tide reader', personality: '', background: '' },
      ]);
      expect(client.requests).toHaveLength(2);
      expect(client.requests[1].messages[1].content).toContain('Create 2 characters for this world.');
      expect(client.requests[1].messages[1].content).toContain('WORLD: Saltmarsh Reach');
    });

    it('skips the character request when none are wanted', async () => {
      const client = new FakeChatClient(WORLD_REPLY);
      const generator = new WorldGenerator({ model: 'test-model', client });

      const generated = await generator.generate({ keywords: 'salt', generateCharacters: false, characterCount: 3 });

      expect(generated.characters).toEqual([]);
      expect(client.requests).toHaveLength(1);
    });

    it('falls back to templates when the API fails', async () => {
      const generator = new WorldGenerator({
        model: 'test-model',
        client: new FakeChatClient(new Error('503 unavailable')),
        random: () => 0,
      });

      const generated = await generator.generate({ keywords: 'mist', generateCharacters: true, characterCount: 1 });

      expect(generated.generatedBy).toBe('template');
      expect(generated.world.name).toBe('Kingdom of mist');
      expect(console.warn).toHaveBeenCalledWith('[WorldGenerator] Completion API failed, using templates: 503 unavailable');
    });

    it('falls back to templates when a reply has the wrong shape', async () => {
      const generator = new WorldGenerator({
        model: 'test-model',
        client: new FakeChatClient(WORLD_REPLY, '{"characters": []}'),
      });

      const generated = await generator.generate({ keywords: 'ocean', generateCharacters: true, characterCount: 2 });

      expect(generated.generatedBy).toBe('template');
      expect(generated.world.name).toBe('The Hidden Land of ocean');
      expect(generated.characters).toHaveLength(2);
    });
  });

  describe('progress and timeouts', () => {
    it('reports each completion step before finishing', async () => {
      const events: Array<[number, string]> = [];
      const generator = new WorldGenerator({ model: 'test-model', client: new FakeChatClient(WORLD_REPLY, CHARACTERS_REPLY) });

      await generator.generate({ keywords: 'salt', generateCharacters: true, characterCount: 2 }, (e) =>
        events.push([e.progress, e.message]),
      );

      expect(events).toEqual([
        [10, 'Starting generation...'],
        [30, 'Asking the completion API for a world...'],
        [70, 'Asking the completion API for 2 characters...'],
        [90, 'Generation finished'],
      ]);
    });

    it('keeps progress rising through a template fallback', async () => {
      const events: Array<[number, string]> = [];
      const generator = new WorldGenerator({ model: 'test-model', client: new FakeChatClient(new Error('503 unavailable')) });

      await generator.generate({ keywords: 'mist', generateCharacters: true, characterCount: 1 }, (e) =>
        events.push([e.progress, e.message]),
      );

      expect(events).toEqual([
        [10, 'Starting generation...'],
        [30, 'Asking the completion API for a world...'],
        [60, 'Completion API failed, falling back to templates...'],
        [80, 'Building characters from templates...'],
        [90, 'Generation finished'],
      ]);
    });

    it('aborts a completion that outlives the timeout and uses templates', async () => {
      vi.useFakeTimers();
      try {
        const client = new FakeChatClient(HANG);
        const generator = new WorldGenerator({ model: 'test-model', client, timeoutMs: 5000 });

        const pending = generator.generate({ keywords: 'mist', generateCharacters: false, characterCount: 1 });
        await vi.advanceTimersByTimeAsync(5000);
        const generated = await pending;

        expect(generated.generatedBy).toBe('template');
        expect(generated.world.name).toBe('Kingdom of mist');
        expect(client.signals[0]?.aborted).toBe(true);
        expect(console.warn).toHaveBeenCalledWith(
          '[WorldGenerator] Completion API failed, using templates: Completion did not finish within 5000ms',
        );
      } finally {
        vi.useRealTimers();
      }
    });
  });

  describe('templates', () => {
    it('picks the same world template for the same keywords', () => {
      expect(WorldGenerator.templateWorld('x')).toEqual({
        name: 'The Enchanted Realm of x',
        description: 'A mysterious world where x shapes everything.',
        background:
          'In this world x plays a central role. Ancient magic let a whole civilization grow around x, and its people rely on that power in their daily lives.',
      });
      expect(WorldGenerator.templateWorld('mist').name).toBe('Kingdom of mist');
      expect(WorldGenerator.templateWorld('mist')).toEqual(WorldGenerator.templateWorld('mist'));
    });

    it('shuffles character templates with the injected randomness', () => {
      const shuffled = new WorldGenerator({ model: 'test-model', random: () => 0 });
      const inOrder = new WorldGenerator({ model: 'test-model', random: () => 0.999 });

      expect(shuffled.templateCharacters('ice', 3).map((c) => c.name)).toEqual([
        'Warrior of ice',
        'Merchant of ice',
        'Artist of ice',
      ]);
      expect(inOrder.templateCharacters('ice', 2)).toEqual([
        {
          name: 'Sage of ice',
          description: 'A wise scholar with deep knowledge of ice.',
          personality: 'intellectual, careful, thoughtful',
          background: 'Has studied ice for decades and analyses every question from several angles.',
        },
        {
          name: 'Warrior of ice',
          description: 'A brave fighter sworn to protect ice.',
          personality: 'courageous, principled, decisive',
          background: 'Has fought those who threaten ice for years and prefers practical, quick action.',
        },
      ]);
    });

    it('never repeats a template and caps the count', () => {
      const generator = new WorldGenerator({ model: 'test-model' });
      const names = generator.templateCharacters('ice', 10).map((c) => c.name);

      expect(names).toHaveLength(MAX_TEMPLATE_CHARACTERS);
      expect(new Set(names).size).toBe(MAX_TEMPLATE_CHARACTERS);
    });

    it('uses templates when no API key is configured', async () => {
      const generator = new WorldGenerator({ model: 'test-model', random: () => 0 });

      const generated = await generator.generate({ keywords: 'x', generateCharacters: true, characterCount: 1 });

      expect(generated).toEqual({
        world: WorldGenerator.templateWorld('x'),
        characters: [generator.templateCharacters('x', 1)[0]],
        generatedBy: 'template',
      });
    });
  });
});
