import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import IORedis, { Redis as RedisClient } from 'ioredis';

@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private client?: RedisClient;
  private readonly redisUrl?: string;
  readonly keyPrefix: string;

  constructor(private readonly configService: ConfigService) {
    const urlUnknown: unknown = this.configService.get('redis.url');
    this.redisUrl =
      typeof urlUnknown === 'string' && urlUnknown.length > 0
        ? urlUnknown
        : undefined;
    this.keyPrefix = this.configService.get<string>('redis.keyPrefix', 'sts:');
    if (!this.redisUrl) {
      this.logger.warn(
        'REDIS_URL not set; settings and users will use in-memory stores',
      );
    }
  }

  isEnabled(): boolean {
    return this.redisUrl !== undefined;
  }

  getClient(): RedisClient {
    if (!this.redisUrl) {
      throw new Error('Redis is not configured');
    }
    if (!this.client) {
      this.client = new IORedis(this.redisUrl, {
        maxRetriesPerRequest: 1,
        lazyConnect: false,
        enableAutoPipelining: true,
      });
      this.client.on('error', (err: unknown) => {
        this.logger.error(
          `Redis error: ${err instanceof Error ? err.message : String(err)}`,
        );
      });
      this.client.on('ready', () => {
        this.logger.log('Connected to Redis');
      });
    }
    return this.client;
  }

  async onModuleDestroy(): Promise<void> {
    if (!this.client) return;
    try {
      await this.client.quit();
    } catch (err) {
      this.logger.warn(
        `Redis quit failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
}
