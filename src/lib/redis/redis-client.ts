/**
 * Redis Client
 *
 * Opens a Redis connection for the conversation store.
 *
 * Features:
 * - Automatic reconnection with capped backoff
 * - Credentials masked in logs
 * - Idempotent close on shutdown
 */

import { createClient } from 'redis';
import { logger } from '@/lib/logger';
import { getErrorMessage } from '@/lib/errors';

const log = logger.child({ layer: 'cache', service: 'RedisClient' });

// =============================================================================
// Constants
// =============================================================================

/** Default timeout for establishing Redis connection (ms) */
export const DEFAULT_CONNECT_TIMEOUT_MS = 5000;

/** Maximum delay between reconnection attempts (ms) */
export const MAX_RECONNECT_DELAY_MS = 30000;

/** Base delay multiplier for reconnection backoff (ms) */
export const RECONNECT_BACKOFF_BASE_MS = 100;

// =============================================================================
// Types
// =============================================================================

export type RedisClient = ReturnType<typeof createClient>;

export interface RedisConnection {
  client: RedisClient;
  close(): Promise<void>;
}

export interface RedisOptions {
  connectTimeout?: number;
}

// =============================================================================
// Connection
// =============================================================================

/**
 * Delay before reconnect attempt `retries`, in ms.
 */
export function reconnectDelay(retries: number): number {
  return Math.min(retries * RECONNECT_BACKOFF_BASE_MS, MAX_RECONNECT_DELAY_MS);
}

/**
 * Connect to Redis. Rejects if the first connection cannot be made.
 */
export async function connectRedis(url: string, options: RedisOptions = {}): Promise<RedisConnection> {
  log.info({ event: 'redis_connecting', url: maskRedisUrl(url) }, 'Connecting to Redis');

  const client = createClient({
    url,
    socket: {
      connectTimeout: options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT_MS,
      reconnectStrategy: (retries) => {
        const delay = reconnectDelay(retries);
        log.debug(
          { event: 'redis_reconnect', retries, delay_ms: delay },
          `Reconnecting to Redis in ${delay}ms`
        );
        return delay;
      },
    },
  });

  client.on('error', (err: unknown) => {
    log.error({ event: 'redis_error', error: getErrorMessage(err) }, 'Redis client error');
  });

  client.on('ready', () => {
    log.info({ event: 'redis_ready' }, 'Redis client ready');
  });

  await client.connect();
  log.info({ event: 'redis_connected' }, 'Redis client connected');

  return {
    client,
    async close() {
      if (!client.isOpen) return;
      try {
        await client.quit();
        log.info({ event: 'redis_closed' }, 'Redis connection closed gracefully');
      } catch (error) {
        log.error(
          { event: 'redis_close_error', error: getErrorMessage(error) },
          'Error closing Redis connection'
        );
        throw error;
      }
    },
  };
}

/**
 * Mask password in Redis URL for logging.
 */
export function maskRedisUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) {
      parsed.password = '****';
    }
    return parsed.toString();
  } catch {
    return 'invalid-url';
  }
}
