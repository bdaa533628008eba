import { Router } from 'express';
import type { Response } from 'express';
import { asyncRoute } from '../HttpErrors.js';
import { ConflictError, NotFoundError, errorMessage } from '../errors.js';
import { IdParam, ListQuery, WorldCreate, WorldGenerate, WorldGenerateQuery, WorldUpdate } from './schemas.js';
import type { DiscussionRunEngine } from '../DiscussionRunEngine.js';
import type { IDiscussionStore } from '../interfaces/index.js';
import type { GeneratedWorld, WorldGenerator } from '../WorldGenerator.js';
import type { CharacterRecord, GeneratedWorldResponse, WorldGenerationEvent } from '../types.js';

export interface WorldsRouterDeps {
  store: IDiscussionStore;
  engine: DiscussionRunEngine;
  worldGenerator: WorldGenerator;
}

export function createWorldsRouter({ store, engine, worldGenerator }: WorldsRouterDeps): Router {
  const router = Router();

  /** Store a generated world and its characters, shaped as the REST response. */
  const save = async (generated: GeneratedWorld, keywords: string): Promise<GeneratedWorldResponse> => {
    const world = await store.createWorld(generated.world);
    const characters: CharacterRecord[] = [];
    for (const character of generated.characters) {
      characters.push(await store.createCharacter({ ...character, world_id: world.id, persona_config: null }));
    }
    console.log(`[Worlds] Generated world ${world.id} with ${characters.length} characters (${generated.generatedBy})`);
    return { world, characters, generated_by: generated.generatedBy, keywords };
  };

  router.post('/', asyncRoute(async (req, res) => {
    const input = WorldCreate.parse(req.body);
    res.status(201).json(await store.createWorld(input));
  }));

  router.get('/', asyncRoute(async (req, res) => {
    const { skip, limit } = ListQuery.parse(req.query);
    res.json(await store.listWorlds({ skip, limit }));
  }));

  router.post('/generate', asyncRoute(async (req, res) => {
    const request = WorldGenerate.parse(req.body);
    const generated = await worldGenerator.generate({
      keywords: request.keywords,
      generateCharacters: request.generate_characters,
      characterCount: request.character_count,
    });

    res.status(201).json(await save(generated, request.keywords));
  }));

  // Registered before /:id so the path is not read as an id
  router.get('/generate-stream', asyncRoute(async (req, res) => {
    const request = WorldGenerateQuery.parse(req.query);

    res.set({
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache, no-transform',
      Connection: 'keep-alive',
      'X-Accel-Buffering': 'no',
    });
    res.flushHeaders?.();

    send(res, { progress: 0, message: 'Starting...', completed: false });
    try {
      const generated = await worldGenerator.generate(
        {
          keywords: request.keywords,
          generateCharacters: request.generate_characters,
          characterCount: request.character_count,
        },
        (event) => send(res, { ...event, completed: false }),
      );
      const result = await save(generated, request.keywords);
      send(res, { progress: 100, message: 'Generation complete', completed: true, result });
    } catch (err) {
      const message = errorMessage(err);
      console.error('[Worlds] Streamed generation failed:', err);
      send(res, { progress: 0, message: `Generation failed: ${message}`, completed: true, error: message });
    } finally {
      if (!res.writableEnded) res.end();
    }
  }));

  router.get('/:id', asyncRoute(async (req, res) => {
    const id = IdParam.parse(req.params.id);
    const world = await store.getWorld(id);
    if (!world) throw new NotFoundError('World', id);
    res.json(world);
  }));

  router.put('/:id', asyncRoute(async (req, res) => {
    const id = IdParam.parse(req.params.id);
    const patch = WorldUpdate.parse(req.body);
    res.json(await store.updateWorld(id, patch));
  }));

  router.delete('/:id', asyncRoute(async (req, res) => {
    const id = IdParam.parse(req.params.id);
    const discussions = await store.listDiscussions(id, { limit: Infinity });
    if (discussions.some((d) => engine.isRunning(d.id))) {
      throw new ConflictError(`World ${id} has a discussion in progress`);
    }
    await store.deleteWorld(id);
    res.json({ message: 'World deleted successfully' });
  }));

  return router;
}

/** Write one SSE event unless the client has gone. */
function send(res: Response, event: WorldGenerationEvent): void {
  if (!res.writableEnded && !res.destroyed) res.write(`data: ${JSON.stringify(event)}\n\n`);
}
