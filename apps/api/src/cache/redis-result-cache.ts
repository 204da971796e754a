import { Logger } from '@nestjs/common';
import { z } from 'zod';
import type { RedisService } from '../redis/redis.service';
import type { Clock } from './clock';
import type { CacheEntry, ResultCache } from './result-cache';

const cacheEnvelopeSchema = z.object({
  expiresAt: z.number(),
  value: z.unknown(),
});

/**
 * Redis-backed store. Redis expires the key itself; the stored expiresAt
 * keeps freshness decisions on the injected clock.
 */
export class RedisResultCache<T> implements ResultCache<T> {
  private readonly logger = new Logger(RedisResultCache.name);

  constructor(
    private readonly redisService: RedisService,
    private readonly clock: Clock,
    private readonly ttlSeconds: number,
    private readonly valueSchema: z.ZodType<T>,
    private readonly prefix = 'portfolio:summary:',
  ) {}

  async get(key: string): Promise<CacheEntry<T> | null> {
    const raw = await this.redisService.redis.get(this.prefix + key);
    if (!raw) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.logger.warn(`dropping unreadable cache entry ${key}`);
      return null;
    }

    const envelope = cacheEnvelopeSchema.safeParse(json);
    if (!envelope.success) {
      this.logger.warn(`dropping malformed cache entry ${key}`);
      return null;
    }
    const parsed = this.valueSchema.safeParse(envelope.data.value);
    if (!parsed.success) {
      this.logger.warn(`dropping malformed cache entry ${key}`);
      return null;
    }
    return { value: parsed.data, expiresAt: envelope.data.expiresAt };
  }

  async set(key: string, value: T): Promise<CacheEntry<T>> {
    const entry = { value, expiresAt: this.clock.now() + this.ttlSeconds * 1000 };
    await this.redisService.redis.set(
      this.prefix + key,
      JSON.stringify(entry),
      'EX',
      this.ttlSeconds,
    );
    return entry;
  }

  isFresh(entry: CacheEntry<T>) {
    return this.clock.now() < entry.expiresAt;
  }
}
