/**
 * Redis connection management. Run status snapshots live in Redis.
 */
import Redis from 'ioredis';

const TAG = '[redis]';

export function createRedis(url: string): Redis {
    const redis = new Redis(url, {
        maxRetriesPerRequest: 3,
        lazyConnect: true,
    });

    redis.on('error', (err) => console.error(`${TAG} connection error:`, err));
    return redis;
}
