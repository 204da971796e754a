import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import Redis from 'ioredis';
import { APP_ENV, type Env } from '../config/env';

@Injectable()
export class RedisService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private client: Redis | null = null;

  constructor(@Inject(APP_ENV) private readonly env: Env) {}

  get enabled() {
    return this.env.CACHE_DRIVER === 'redis';
  }

  onModuleInit() {
    if (!this.enabled) return;
    this.client = new Redis(this.env.REDIS_URL);
    this.client.on('error', (e) => this.logger.warn(`redis: ${e.message}`));
  }

  async onModuleDestroy() {
    await this.client?.quit();
  }

  get redis(): Redis {
    if (!this.client) throw new Error('Redis is not configured (CACHE_DRIVER=memory)');
    return this.client;
  }
}
