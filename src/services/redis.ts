import Redis from 'ioredis';
import { logger } from '../utils/logger';

/**
 * Thin ioredis wrapper backing the shared geocode cache.
 */
export class RedisService {
  private client: Redis;

  constructor(redisUrl: string) {
    this.client = new Redis(redisUrl, {
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      lazyConnect: true,
    });

    this.client.on('connect', () => {
      logger.info('Redis client connected');
    });

    this.client.on('error', (error) => {
      logger.error({ error }, 'Redis client error');
    });
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string): Promise<'OK'> {
    return this.client.set(key, value);
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
    logger.info('Redis connection closed');
  }
}
