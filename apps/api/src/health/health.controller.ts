import { Controller, Get, Inject } from '@nestjs/common';
import { APP_ENV, type Env } from '../config/env';
import { RedisService } from '../redis/redis.service';

@Controller()
export class HealthController {
  constructor(
    @Inject(APP_ENV) private readonly env: Env,
    private readonly redis: RedisService,
  ) {}

  @Get('/health')
  health() {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      cache: this.env.CACHE_DRIVER,
    };
  }

  @Get('/readyz')
  async readyz() {
    if (this.redis.enabled) await this.redis.redis.ping();
    return { status: 'ready' };
  }
}
