import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import Redis from 'ioredis';
import { ConfigService } from '../database/config.service';

@Injectable()
export class RedisService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private client?: Redis;

  constructor(private readonly configService: ConfigService) {}

  onModuleInit() {
    const url = this.configService.redisUrl;

    if (!url) {
      throw new Error('REDIS_URL environment variable is not set');
    }

    this.client = new Redis(url, {
      lazyConnect: true,
      retryStrategy: (times) => Math.min(times * 500, 5000),
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      keepAlive: 30000,
      connectTimeout: 10000,
      reconnectOnError: (err) => {
        const targetErrors = ['ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ECONNREFUSED'];
        return targetErrors.some((e) => err.message.includes(e));
      },
    });

    this.client.on('connect', () => this.logger.log('Redis connected'));
    this.client.on('reconnecting', (ms: number) =>
      this.logger.warn(`Redis reconnecting in ${ms}ms`),
    );
    this.client.on('error', (err) => {
      if (err.message?.includes('ECONNRESET')) {
        this.logger.warn('Redis ECONNRESET, will reconnect automatically');
      } else {
        this.logger.error('Redis error:', err);
      }
    });
  }

  onModuleDestroy() {
    this.client?.disconnect();
  }

  /**
   * Store a JSON-serialised value with an optional TTL in seconds
   */
  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    const serialized = JSON.stringify(value);
    if (ttlSeconds) {
      await this.connection().set(key, serialized, 'EX', ttlSeconds);
    } else {
      await this.connection().set(key, serialized);
    }
  }

  /**
   * Read and delete a key in one round trip, so a value can be consumed once.
   */
  async take<T>(key: string): Promise<T | null> {
    const value = await this.connection().getdel(key);
    if (value === null) return null;
    return JSON.parse(value) as T;
  }

  private connection(): Redis {
    if (!this.client) {
      throw new Error('Redis client used before module init');
    }
    return this.client;
  }
}
