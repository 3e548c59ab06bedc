import { createClient } from 'redis';
import { env } from './env';

const REDIS_URL = env.redisUrl;

// Create Redis client with retry strategy
export const redisClient = createClient({
  url: REDIS_URL || undefined,
  socket: {
    reconnectStrategy: (retries: number) => {
      if (!REDIS_URL) {
        return false;
      }
      if (retries > 5) {
        console.warn('[Redis] max retries reached, giving up');
        return false;
      }
      // Exponential backoff: 1s, 2s, 4s, 8s, 16s
      return Math.min(2 ** retries * 1000, 16000);
    },
  },
});

let redisConnected = false;

redisClient.on('ready', () => {
  redisConnected = true;
  console.log('[Redis] connected');
});

redisClient.on('error', (err: Error) => {
  if (redisConnected) {
    console.error('[Redis] error:', err.message);
  }
  redisConnected = false;
});

/** Connects when REDIS_URL is set. Without it every cache helper is a no-op. */
export async function connectRedis(): Promise<void> {
  if (!REDIS_URL) {
    console.log('[Redis] no REDIS_URL configured, caching disabled');
    return;
  }
  try {
    await redisClient.connect();
  } catch (error) {
    console.error('[Redis] connection error:', error);
    console.warn('[Redis] continuing without cache');
  }
}

export async function disconnectRedis(): Promise<void> {
  if (redisClient.isOpen) {
    await redisClient.quit();
  }
}

export const setCache = async (key: string, value: string, expirationSeconds?: number): Promise<void> => {
  if (!redisConnected) return;
  try {
    if (expirationSeconds) {
      await redisClient.setEx(key, expirationSeconds, value);
    } else {
      await redisClient.set(key, value);
    }
  } catch (error) {
    console.error('[Redis] setCache error:', error);
  }
};

export const getCache = async (key: string): Promise<string | null> => {
  if (!redisConnected) return null;
  try {
    return await redisClient.get(key);
  } catch (error) {
    console.error('[Redis] getCache error:', error);
    return null;
  }
};

export const deleteCache = async (...keys: string[]): Promise<void> => {
  if (!redisConnected || keys.length === 0) return;
  try {
    await redisClient.del(keys);
  } catch (error) {
    console.error('[Redis] deleteCache error:', error);
  }
};
