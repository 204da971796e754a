import type { Clock } from './clock';

export type CacheEntry<T> = {
  value: T;
  expiresAt: number; // epoch ms
};

export interface ResultCache<T> {
  get(key: string): Promise<CacheEntry<T> | null>;
  set(key: string, value: T): Promise<CacheEntry<T>>;
  isFresh(entry: CacheEntry<T>): boolean;
}

export const RESULT_CACHE = Symbol('RESULT_CACHE');

export class MemoryResultCache<T> implements ResultCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(
    private readonly clock: Clock,
    private readonly ttlSeconds: number,
  ) {}

  async get(key: string) {
    return this.entries.get(key) ?? null;
  }

  async set(key: string, value: T) {
    // whole-entry replacement, readers never see a half-written slot
    const entry = { value, expiresAt: this.clock.now() + this.ttlSeconds * 1000 };
    this.entries.set(key, entry);
    return entry;
  }

  isFresh(entry: CacheEntry<T>) {
    return this.clock.now() < entry.expiresAt;
  }
}
