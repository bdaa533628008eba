import { configureRedis, isRedisAvailable } from './RedisClient.js';
import { JsonDiscussionStore } from './JsonDiscussionStore.js';
import { RedisDiscussionStore } from './RedisDiscussionStore.js';
import type { AppConfig } from './config.js';
import type { IDiscussionStore } from './interfaces/index.js';

/**
 * Pick the persistence backend. Redis is opt-in (STORAGE_BACKEND=redis) and
 * falls back to the JSON file store when the server cannot be reached.
 */
export async function createDiscussionStore(config: AppConfig): Promise<IDiscussionStore> {
  if (config.storage.backend === 'redis') {
    configureRedis(config.redis);
    if (await isRedisAvailable()) {
      return new RedisDiscussionStore();
    }
  } else {
    console.log(`[Store] Using JSON file persistence in ${config.storage.dataDir} (set STORAGE_BACKEND=redis to enable Redis)`);
  }
  return new JsonDiscussionStore(config.storage.dataDir);
}
