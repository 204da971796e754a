import { Module } from '@nestjs/common';
import { APP_ENV, type Env } from '../config/env';
import { AssetsModule } from '../assets/assets.module';
import { SwyftxModule } from '../swyftx/swyftx.module';
import { PricesModule } from '../prices/prices.module';
import { RedisModule } from '../redis/redis.module';
import { RedisService } from '../redis/redis.service';
import { CacheModule } from '../cache/cache.module';
import { CLOCK, type Clock } from '../cache/clock';
import { MemoryResultCache, RESULT_CACHE } from '../cache/result-cache';
import { RedisResultCache } from '../cache/redis-result-cache';
import { ResultCacheService } from '../cache/result-cache.service';
import { PortfolioController } from './portfolio.controller';
import { PortfolioService } from './portfolio.service';
import { portfolioSummarySchema } from './portfolio.types';

@Module({
  imports: [AssetsModule, SwyftxModule, PricesModule, RedisModule, CacheModule],
  controllers: [PortfolioController],
  providers: [
    {
      provide: RESULT_CACHE,
      inject: [APP_ENV, RedisService, CLOCK],
      useFactory: (env: Env, redis: RedisService, clock: Clock) =>
        env.CACHE_DRIVER === 'redis'
          ? new RedisResultCache(
              redis,
              clock,
              env.PORTFOLIO_CACHE_TTL_SECONDS,
              portfolioSummarySchema,
            )
          : new MemoryResultCache(clock, env.PORTFOLIO_CACHE_TTL_SECONDS),
    },
    ResultCacheService,
    PortfolioService,
  ],
})
export class PortfolioModule {}
