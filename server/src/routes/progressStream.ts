import { Router } from 'express';
import type { Response } from 'express';
import { IdParam } from './schemas.js';
import type { IProgressRegistry } from '../interfaces/index.js';
import type { ProgressFeed } from '../ProgressFeed.js';
import type { ProgressPayload } from '../types.js';

export interface ProgressStreamDeps {
  feed: ProgressFeed;
  registry: IProgressRegistry;
  /** Interval between `: ping` comments (ms) */
  pingIntervalMs?: number;
}

/** Open SSE streams in this process, keyed by discussion id. */
type StreamTable = Map<number, Set<AbortController>>;

/**
 * Server-Sent Events transport: one `data:` event per snapshot change with
 * the full message list, closed after the terminal event.
 */
export function createProgressStreamRouter({ feed, registry, pingIntervalMs = 25_000 }: ProgressStreamDeps): Router {
  const router = Router();
  const streams: StreamTable = new Map();

  router.get('/:id/stream', (req, res) => {
    const parsed = IdParam.safeParse(req.params.id);
    if (!parsed.success) {
      res.status(400).json({ error: 'bad_request', details: parsed.error.issues.map((i) => i.message) });
      return;
    }
    const id = parsed.data;

    res.set({
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache, no-transform',
      Connection: 'keep-alive',
      'X-Accel-Buffering': 'no',
    });
    res.flushHeaders?.();
    res.write('retry: 5000\n\n');

    const controller = new AbortController();
    let open = streams.get(id);
    if (!open) {
      open = new Set();
      streams.set(id, open);
    }
    open.add(controller);

    const ping = setInterval(() => {
      if (!res.writableEnded) res.write(': ping\n\n');
    }, pingIntervalMs);

    const cleanup = () => {
      clearInterval(ping);
      controller.abort();
      const set = streams.get(id);
      set?.delete(controller);
      if (set?.size === 0) streams.delete(id);
    };
    res.on('close', cleanup);

    console.log(`[SSE] Client attached to discussion ${id}`);
    pump(res, feed.watch(id, { signal: controller.signal, mode: 'full' }), controller.signal)
      .catch((err) => {
        console.error(`[SSE] Stream for discussion ${id} failed:`, err);
      })
      .finally(() => {
        cleanup();
        if (!res.writableEnded) res.end();
        console.log(`[SSE] Stream for discussion ${id} closed`);
      });
  });

  router.delete('/:id/stream', (req, res) => {
    const parsed = IdParam.safeParse(req.params.id);
    if (!parsed.success) {
      res.status(400).json({ error: 'bad_request', details: parsed.error.issues.map((i) => i.message) });
      return;
    }
    const id = parsed.data;
    const open = [...(streams.get(id) ?? [])];
    for (const controller of open) controller.abort();
    const retired = registry.retire(id);
    res.json({
      message: `Closed ${open.length} stream(s) for discussion ${id}${retired ? ' and released its progress' : ''}`,
    });
  });

  return router;
}

async function pump(res: Response, payloads: AsyncGenerator<ProgressPayload>, signal: AbortSignal): Promise<void> {
  for await (const payload of payloads) {
    if (signal.aborted || res.writableEnded) break;
    res.write(`data: ${JSON.stringify(payload)}\n\n`);
  }
}
