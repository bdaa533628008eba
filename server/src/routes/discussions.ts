import { Router } from 'express';
import { asyncRoute } from '../HttpErrors.js';
import { ConflictError, NotFoundError } from '../errors.js';
import { DiscussionCreate, DiscussionUpdate, IdParam, WorldScopedListQuery } from './schemas.js';
import type { DiscussionRunEngine } from '../DiscussionRunEngine.js';
import type { DiscussionPatch, IDiscussionStore, IProgressRegistry } from '../interfaces/index.js';
import type { DiscussionRecord } from '../types.js';
import type { StartDiscussionResponse } from '../../../shared/discussion.js';

export interface DiscussionsRouterDeps {
  store: IDiscussionStore;
  registry: IProgressRegistry;
  engine: DiscussionRunEngine;
}

export function createDiscussionsRouter({ store, registry, engine }: DiscussionsRouterDeps): Router {
  const router = Router();

  const requireIdle = (discussion: DiscussionRecord, action: string) => {
    if (discussion.status === 'running' || engine.isRunning(discussion.id)) {
      throw new ConflictError(`Cannot ${action} discussion ${discussion.id} while it is running`);
    }
  };

  const load = async (id: number): Promise<DiscussionRecord> => {
    const discussion = await store.getDiscussion(id);
    if (!discussion) throw new NotFoundError('Discussion', id);
    return discussion;
  };

  router.post('/', asyncRoute(async (req, res) => {
    const input = DiscussionCreate.parse(req.body);
    res.status(201).json(await store.createDiscussion(input));
  }));

  router.get('/', asyncRoute(async (req, res) => {
    const { world_id, skip, limit } = WorldScopedListQuery.parse(req.query);
    res.json(await store.listDiscussions(world_id, { skip, limit }));
  }));

  router.get('/:id', asyncRoute(async (req, res) => {
    res.json(await load(IdParam.parse(req.params.id)));
  }));

  router.put('/:id', asyncRoute(async (req, res) => {
    const id = IdParam.parse(req.params.id);
    const { theme, description, status } = DiscussionUpdate.parse(req.body);
    requireIdle(await load(id), 'edit');

    const patch: DiscussionPatch = { theme, description };
    if (status === 'pending') {
      // A reset is a new logical run: drop the old result and any lingering snapshot
      patch.status = 'pending';
      patch.result = null;
      registry.retire(id);
    }
    res.json(await store.updateDiscussion(id, patch));
  }));

  router.delete('/:id', asyncRoute(async (req, res) => {
    const id = IdParam.parse(req.params.id);
    requireIdle(await load(id), 'delete');
    await store.deleteDiscussion(id);
    registry.retire(id);
    res.json({ message: 'Discussion deleted successfully' });
  }));

  router.post('/:id/start', asyncRoute(async (req, res) => {
    const id = IdParam.parse(req.params.id);
    const receipt = await engine.start(id);
    const body: StartDiscussionResponse = { message: receipt.message, discussion_id: receipt.discussionId };
    res.status(202).json(body);
  }));

  return router;
}
