import { WebSocketServer, WebSocket } from 'ws';
import type { IncomingMessage, Server } from 'node:http';
import type { Duplex } from 'node:stream';
import type { ProgressFeed } from './ProgressFeed.js';
import type { ProgressPayload } from './types.js';

const PATH_PATTERN = /^\/ws\/discussions\/(\d+)\/?$/;

export interface DiscussionSocketServerOptions {
  /** Interval between heartbeat pings; sockets that miss one are dropped (ms) */
  heartbeatMs?: number;
}

/**
 * Push-only WebSocket transport at `/ws/discussions/:id`. The first frame
 * carries every message so far (offset 0); later frames carry only new
 * messages. The socket is closed with 1000 after the terminal frame.
 */
export class DiscussionSocketServer {
  private wss: WebSocketServer;
  private feed: ProgressFeed;
  private sockets = new Map<WebSocket, AbortController>();
  private alive = new WeakSet<WebSocket>();
  private heartbeat: ReturnType<typeof setInterval>;

  constructor(httpServer: Server, feed: ProgressFeed, options: DiscussionSocketServerOptions = {}) {
    this.feed = feed;
    this.wss = new WebSocketServer({ noServer: true });
    httpServer.on('upgrade', (req, socket, head) => this.handleUpgrade(req, socket, head));

    this.heartbeat = setInterval(() => {
      for (const ws of this.sockets.keys()) {
        if (!this.alive.has(ws)) {
          ws.terminate();
          continue;
        }
        this.alive.delete(ws);
        ws.ping();
      }
    }, options.heartbeatMs ?? 30_000);
  }

  /** Number of connected clients. */
  get connectionCount(): number {
    return this.sockets.size;
  }

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;
    const match = PATH_PATTERN.exec(path);
    if (!match) {
      socket.write('HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n');
      socket.destroy();
      return;
    }
    const discussionId = Number(match[1]);
    this.wss.handleUpgrade(req, socket, head, (ws) => this.handleConnection(ws, discussionId));
  }

  private handleConnection(ws: WebSocket, discussionId: number): void {
    const controller = new AbortController();
    this.sockets.set(ws, controller);
    this.alive.add(ws);
    console.log(`[WS] Client attached to discussion ${discussionId}`);

    ws.on('pong', () => this.alive.add(ws));
    ws.on('message', (raw) => {
      console.log(`[WS] Ignoring client message on discussion ${discussionId}: ${raw.toString().slice(0, 200)}`);
    });
    ws.on('close', () => {
      controller.abort();
      this.sockets.delete(ws);
      console.log(`[WS] Client detached from discussion ${discussionId}`);
    });
    ws.on('error', (err) => {
      console.error(`[WS] Socket error on discussion ${discussionId}:`, err);
      ws.terminate();
    });

    this.stream(ws, discussionId, controller.signal).catch((err) => {
      console.error(`[WS] Stream for discussion ${discussionId} failed:`, err);
      if (ws.readyState === WebSocket.OPEN) ws.close(1011, 'Internal error');
    });
  }

  private async stream(ws: WebSocket, discussionId: number, signal: AbortSignal): Promise<void> {
    let last: ProgressPayload | null = null;
    for await (const payload of this.feed.watch(discussionId, { signal, mode: 'delta' })) {
      if (ws.readyState !== WebSocket.OPEN) return;
      ws.send(JSON.stringify(payload));
      last = payload;
    }
    if (ws.readyState !== WebSocket.OPEN) return;
    if (last?.completed) {
      ws.close(1000, 'Discussion finished');
    } else {
      // Lost track of the run; the client reconnects and re-attaches
      ws.close(1013, 'Try again later');
    }
  }

  /**
   * Close every client socket with 1001 and stop accepting upgrades. Falls
   * back to terminate() after 2 s.
   */
  async close(): Promise<void> {
    clearInterval(this.heartbeat);
    const closePromises = Array.from(this.sockets.keys()).map(
      (ws) =>
        new Promise<void>((resolve) => {
          if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
            const timer = setTimeout(() => { ws.terminate(); resolve(); }, 2000);
            ws.once('close', () => { clearTimeout(timer); resolve(); });
            ws.close(1001, 'Server shutting down');
          } else {
            resolve();
          }
        }),
    );
    await Promise.allSettled(closePromises);
    this.sockets.clear();
    await new Promise<void>((resolve) => this.wss.close(() => resolve()));
  }
}
