import { createHash } from 'crypto';
import { getRedis } from '../config/redis';

// Cache key prefixes
export const CACHE_KEY = {
  GS1_PARSE: 'gs1:parse:',
} as const;

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

/** Stable cache key for a barcode decoded under a given set of options */
export const parseCacheKey = (barcode: string, options: unknown): string => {
  const digest = createHash('sha1').update(JSON.stringify([barcode, options])).digest('hex');
  return `${CACHE_KEY.GS1_PARSE}${digest}`;
};

/**
 * Get a value from cache
 */
export const cacheGet = async <T>(key: string): Promise<T | null> => {
  const redis = getRedis();
  if (!redis) return null;

  try {
    const value = await redis.get(key);
    if (!value) return null;
    const parsed: T = JSON.parse(value);
    return parsed;
  } catch (error) {
    console.warn('Cache GET error:', errorMessage(error));
    return null;
  }
};

/**
 * Set a value in cache with TTL
 */
export const cacheSet = async (key: string, value: unknown, ttl: number): Promise<boolean> => {
  const redis = getRedis();
  if (!redis) return false;

  try {
    await redis.setex(key, ttl, JSON.stringify(value));
    return true;
  } catch (error) {
    console.warn('Cache SET error:', errorMessage(error));
    return false;
  }
};

/**
 * Delete all keys matching a pattern
 */
export const cacheDelPattern = async (pattern: string): Promise<boolean> => {
  const redis = getRedis();
  if (!redis) return false;

  try {
    const keys = await redis.keys(pattern);
    if (keys.length > 0) {
      await redis.del(...keys);
    }
    return true;
  } catch (error) {
    console.warn('Cache DEL pattern error:', errorMessage(error));
    return false;
  }
};

/**
 * Get or set a value in cache (cache-aside pattern)
 */
export const cacheGetOrSet = async <T>(key: string, ttl: number, fetchFn: () => Promise<T>): Promise<T> => {
  // Try to get from cache first
  const cached = await cacheGet<T>(key);
  if (cached !== null) {
    return cached;
  }

  // Cache miss - compute
  const value = await fetchFn();

  // Store in cache (fire and forget - don't wait)
  cacheSet(key, value, ttl).catch((err: unknown) => {
    console.warn('Background cache set error:', errorMessage(err));
  });

  return value;
};

/**
 * Invalidate cached parse results (after the AI catalog is rebuilt)
 */
export const invalidateParseCache = async (): Promise<void> => {
  await cacheDelPattern(`${CACHE_KEY.GS1_PARSE}*`);
  console.log('🗑️  Invalidated GS1 parse cache');
};
