import { createServer } from 'node:http';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Express } from 'express';
import { AgentFrameworkStrategy } from './AgentFrameworkStrategy.js';
import { CompletionApiStrategy } from './CompletionApiStrategy.js';
import { DiscussionRunEngine } from './DiscussionRunEngine.js';
import { DiscussionSocketServer } from './DiscussionSocketServer.js';
import { GenerationAdapter } from './GenerationAdapter.js';
import { createHttpApp } from './HttpApp.js';
import { MockStrategy } from './MockStrategy.js';
import { ProgressFeed } from './ProgressFeed.js';
import { ProgressRegistry } from './ProgressRegistry.js';
import { WorldGenerator } from './WorldGenerator.js';
import type { AppConfig } from './config.js';
import type { IDiscussionStore, IGenerationStrategy } from './interfaces/index.js';

export interface DiscussionServerOptions {
  store: IDiscussionStore;
  adapter: GenerationAdapter;
  worldGenerator: WorldGenerator;
  corsOrigin: string;
  graceMs: number;
  revealDelayMs: number;
  /** Wait for a running discussion's first snapshot before replaying the record (ms) */
  attachTimeoutMs?: number;
  pingIntervalMs?: number;
  heartbeatMs?: number;
}

/** Strategies in fallback order: agent framework, completion API, mock. */
export function createStrategies(generation: AppConfig['generation']): IGenerationStrategy[] {
  return [
    new AgentFrameworkStrategy({ apiKey: generation.anthropicApiKey, model: generation.agentModel }),
    new CompletionApiStrategy({ apiKey: generation.openaiApiKey, model: generation.openaiModel }),
    new MockStrategy({ turnDelayMs: generation.mockTurnDelayMs }),
  ];
}

/**
 * Wires the store, registry, engine and the three transports onto one HTTP
 * server: REST + SSE through express, WebSocket through the upgrade event.
 */
export class DiscussionServer {
  readonly store: IDiscussionStore;
  readonly registry: ProgressRegistry;
  readonly engine: DiscussionRunEngine;
  readonly feed: ProgressFeed;
  readonly app: Express;
  readonly httpServer: Server;
  private sockets: DiscussionSocketServer;

  constructor(options: DiscussionServerOptions) {
    this.store = options.store;
    this.registry = new ProgressRegistry({ graceMs: options.graceMs });
    this.engine = new DiscussionRunEngine(this.store, this.registry, options.adapter, {
      revealDelayMs: options.revealDelayMs,
    });
    this.feed = new ProgressFeed(this.store, this.registry, this.engine, {
      attachTimeoutMs: options.attachTimeoutMs ?? 30_000,
    });
    this.app = createHttpApp({
      store: this.store,
      registry: this.registry,
      engine: this.engine,
      feed: this.feed,
      worldGenerator: options.worldGenerator,
      corsOrigin: options.corsOrigin,
      pingIntervalMs: options.pingIntervalMs,
    });
    this.httpServer = createServer(this.app);
    this.sockets = new DiscussionSocketServer(this.httpServer, this.feed, { heartbeatMs: options.heartbeatMs });
  }

  static fromConfig(config: AppConfig, store: IDiscussionStore): DiscussionServer {
    const adapter = new GenerationAdapter(createStrategies(config.generation), {
      timeoutMs: config.generation.strategyTimeoutMs,
    });
    console.log(`[Server] Generation order: ${adapter.order.join(' → ')}`);
    return new DiscussionServer({
      store,
      adapter,
      worldGenerator: new WorldGenerator({
        apiKey: config.generation.openaiApiKey,
        model: config.generation.openaiModel,
        timeoutMs: config.generation.strategyTimeoutMs,
      }),
      corsOrigin: config.corsOrigin,
      graceMs: config.run.graceMs,
      revealDelayMs: config.run.revealDelayMs,
    });
  }

  /** Load the store, recover interrupted runs, then listen. */
  async listen(port: number, host?: string): Promise<AddressInfo> {
    await this.store.load();
    await this.engine.recoverInterrupted();
    await new Promise<void>((resolve, reject) => {
      this.httpServer.once('error', reject);
      this.httpServer.listen(port, host, () => {
        this.httpServer.off('error', reject);
        resolve();
      });
    });
    const address = this.httpServer.address();
    if (address === null || typeof address === 'string') {
      throw new Error('HTTP server is not listening on a TCP port');
    }
    console.log(`[Server] Listening on http://${address.address}:${address.port} (ws path /ws/discussions/:id)`);
    return address;
  }

  /**
   * Stop accepting connections, let in-flight runs finish (up to
   * `drainTimeoutMs`), then release the registry, open streams and store.
   */
  async close(drainTimeoutMs = 10_000): Promise<void> {
    console.log('[Server] Shutting down...');
    const serverClosed = new Promise<void>((resolve) => {
      if (!this.httpServer.listening) {
        resolve();
        return;
      }
      this.httpServer.close(() => resolve());
    });

    await this.sockets.close();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        console.warn(`[Server] Runs still in flight after ${drainTimeoutMs}ms; closing anyway`);
        resolve();
      }, drainTimeoutMs);
    });
    await Promise.race([this.engine.drain(), deadline]);
    clearTimeout(timer);

    // Ends every open subscription, which finishes the SSE responses
    this.registry.close();
    this.httpServer.closeAllConnections();
    await serverClosed;
    await this.store.close();
    console.log('[Server] Closed.');
  }
}
