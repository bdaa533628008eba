import { Router } from 'express';
import { asyncRoute } from '../HttpErrors.js';
import { NotFoundError } from '../errors.js';
import { CharacterCreate, CharacterUpdate, IdParam, WorldScopedListQuery } from './schemas.js';
import type { IDiscussionStore } from '../interfaces/index.js';

export function createCharactersRouter(store: IDiscussionStore): Router {
  const router = Router();

  router.post('/', asyncRoute(async (req, res) => {
    const input = CharacterCreate.parse(req.body);
    res.status(201).json(await store.createCharacter(input));
  }));

  router.get('/', asyncRoute(async (req, res) => {
    const { world_id, skip, limit } = WorldScopedListQuery.parse(req.query);
    res.json(await store.listCharacters(world_id, { skip, limit }));
  }));

  router.get('/:id', asyncRoute(async (req, res) => {
    const id = IdParam.parse(req.params.id);
    const character = await store.getCharacter(id);
    if (!character) throw new NotFoundError('Character', id);
    res.json(character);
  }));

  router.put('/:id', asyncRoute(async (req, res) => {
    const id = IdParam.parse(req.params.id);
    const patch = CharacterUpdate.parse(req.body);
    res.json(await store.updateCharacter(id, patch));
  }));

  router.delete('/:id', asyncRoute(async (req, res) => {
    const id = IdParam.parse(req.params.id);
    await store.deleteCharacter(id);
    res.json({ message: 'Character deleted successfully' });
  }));

  return router;
}
