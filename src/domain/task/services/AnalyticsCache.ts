import type { Clock } from '../../shared/Clock.js';
import type { DerivedDataCache } from '../ports.js';

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

type CacheEntries<M> = { [K in keyof M]?: CacheEntry<M[K]> };

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Time-bounded cache of aggregation results, keyed by aggregation name.
 *
 * invalidateAll() bumps a generation counter. A result computed under an older
 * generation is handed back to its caller but never stored, so nothing computed
 * before an invalidation survives it.
 *
 * Stored values are deep-frozen: every caller shares the same object.
 */
export class AnalyticsCache<M extends Record<string, unknown>> implements DerivedDataCache {
  private entries: CacheEntries<M> = {};
  private generation = 0;

  constructor(private clock: Clock, private ttlMs: number) {}

  get<K extends keyof M>(key: K): M[K] | undefined {
    const entry = this.entries[key];
    if (!entry) {
      return undefined;
    }
    if (this.clock.now().getTime() >= entry.expiresAt) {
      delete this.entries[key];
      return undefined;
    }
    return entry.value;
  }

  /**
   * Serve a live entry or compute, store and return a fresh one
   */
  getOrCompute<K extends keyof M>(key: K, compute: () => M[K]): M[K] {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const startedAt = this.generation;
    const value = compute();
    if (startedAt === this.generation) {
      this.set(key, value);
    }
    return value;
  }

  set<K extends keyof M>(key: K, value: M[K]): void {
    const entry: CacheEntry<M[K]> = {
      value: deepFreeze(value),
      expiresAt: this.clock.now().getTime() + this.ttlMs
    };
    this.entries[key] = entry;
  }

  invalidateAll(): void {
    this.generation += 1;
    this.entries = {};
  }
}
