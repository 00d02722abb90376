import Redis from 'ioredis';

let redis: Redis | null = null;

export const isRedisEnabled = (): boolean => process.env.REDIS_ENABLED !== 'false'; // Default to true

// Initialize Redis connection (called once from server startup)
export const initRedis = (): Redis | null => {
  if (!isRedisEnabled()) {
    console.log('⚠️  Redis caching is disabled (set REDIS_ENABLED=true to enable)');
    return null;
  }
  if (redis) return redis;

  const url = process.env.REDIS_URL || 'redis://localhost:6379';
  try {
    redis = new Redis(url, {
      maxRetriesPerRequest: 3,
      retryStrategy: (times: number) => {
        if (times > 3) {
          console.error('❌ Redis connection failed after 3 retries');
          return null; // Stop retrying
        }
        return Math.min(times * 200, 2000);
      },
      reconnectOnError: (err: Error) => err.message.includes('READONLY'),
    });

    redis.on('connect', () => {
      console.log('📦 Connected to Redis cache');
    });

    redis.on('error', (err: Error) => {
      // Parse caching degrades to recomputation; keep serving
      console.error('❌ Redis connection error:', err.message);
    });

    redis.on('close', () => {
      console.log('🔌 Redis connection closed');
    });

    return redis;
  } catch (error) {
    console.error('❌ Failed to initialize Redis:', error instanceof Error ? error.message : error);
    redis = null;
    return null;
  }
};

// Get Redis client (returns null if not enabled or not initialized)
export const getRedis = (): Redis | null => {
  return redis;
};

// Close Redis connection
export const closeRedis = async (): Promise<void> => {
  if (redis) {
    await redis.quit();
    redis = null;
    console.log('📦 Redis connection closed');
  }
};
