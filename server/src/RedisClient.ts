import { Redis } from 'ioredis';

export interface RedisConnectionOptions {
  host: string;
  port: number;
  password?: string;
}

let options: RedisConnectionOptions = { host: 'localhost', port: 6379 };
let client: Redis | null = null;
let available: boolean | null = null;

/** Set connection settings. Takes effect on the next getRedisClient() after a close. */
export function configureRedis(next: RedisConnectionOptions): void {
  options = next;
  available = null;
}

export function getRedisClient(): Redis {
  if (!client) {
    client = new Redis({
      host: options.host,
      port: options.port,
      password: options.password,
      lazyConnect: true,
      maxRetriesPerRequest: 3,
      retryStrategy: (times) => {
        if (times > 3) return null; // stop retrying
        return Math.min(times * 100, 1000);
      },
    });

    client.on('connect', () => console.log('[Redis] Connected'));
    client.on('error', () => {
      // Repeated connection errors are reported once through isRedisAvailable()
    });
  }
  return client;
}

/**
 * Attempts a real connection and caches the result. Callers only ask when
 * STORAGE_BACKEND=redis; the JSON file store is the default.
 */
export async function isRedisAvailable(): Promise<boolean> {
  if (available !== null) return available;

  try {
    const redis = getRedisClient();
    await redis.connect();
    await redis.ping();
    available = true;
    console.log(`[Redis] Available at ${options.host}:${options.port}, using Redis for persistence`);
  } catch (err) {
    available = false;
    console.log(`[Redis] Not available (${err instanceof Error ? err.message : String(err)}); falling back to JSON file persistence`);
    // Disconnect the failed client so it doesn't keep retrying
    if (client) {
      client.disconnect();
      client = null;
    }
  }

  return available;
}

export async function closeRedisClient(): Promise<void> {
  if (client) {
    await client.quit();
    client = null;
  }
}
