import { Inject, Injectable, Logger } from '@nestjs/common';
import { describeError } from '../common/upstream.errors';
import { RESULT_CACHE, type CacheEntry, type ResultCache } from './result-cache';

/**
 * EMPTY/STALE -> FRESH only after a successful compute. A failed compute
 * leaves whatever was cached before. Concurrent misses each recompute.
 * Store errors never fail the request: a failed read is a miss, a failed
 * write is logged.
 */
@Injectable()
export class ResultCacheService<T> {
  private readonly logger = new Logger(ResultCacheService.name);

  constructor(@Inject(RESULT_CACHE) private readonly store: ResultCache<T>) {}

  async getOrCompute(key: string, compute: () => Promise<T>): Promise<T> {
    const hit = await this.read(key);
    if (hit && this.store.isFresh(hit)) {
      this.logger.debug(`cache hit ${key}`);
      return hit.value;
    }

    const value = await compute();
    try {
      await this.store.set(key, value);
    } catch (error) {
      this.logger.warn(`Cache write error for ${key}: ${describeError(error)}`);
    }
    return value;
  }

  private async read(key: string): Promise<CacheEntry<T> | null> {
    try {
      return await this.store.get(key);
    } catch (error) {
      this.logger.warn(`Cache read error for ${key}: ${describeError(error)}`);
      return null;
    }
  }
}
