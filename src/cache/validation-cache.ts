/**
 * Two-tier validation cache.
 *
 * DESIGN:
 * - Memory tier is a Map checked first; the persistent tier is the
 *   injected KeyValueStore.
 * - Every entry carries its own insertion time and TTL. Both tiers enforce
 *   them, so nothing is served past its TTL even when the store itself
 *   does not expire keys.
 * - A persistent hit is promoted into memory with its remaining TTL.
 * - Reads decode through a zod schema. A value that no longer matches its
 *   schema is dropped and reported as a miss.
 *
 * Keys are `prefix + tier + "_" + parts.join("_")`. By convention the
 * first part is a content hash, which is what invalidateContent() purges.
 */

import { z } from "zod";
import { CacheTier } from "../config/engine/enums.js";
import type { CacheConfig } from "../config/engine/schema.js";
import { DEFAULT_ENGINE_CONFIG } from "../config/engine/defaults.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import { systemClock, type Clock, type KeyValueStore } from "./store.js";

export type CacheCodec<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface CacheEntry {
  key: string;
  value: unknown;
  /** Epoch milliseconds */
  insertedAt: number;
  /** Seconds */
  ttl: number;
}

const CacheEntrySchema = z
  .object({
    key: z.string(),
    value: z.unknown(),
    insertedAt: z.number(),
    ttl: z.number(),
  })
  .strict();

export interface CacheStats {
  hits: number;
  misses: number;
  sets: number;
  /** hits / (hits + misses), 0 before the first lookup */
  hitRate: number;
  memoryHits: number;
  storeHits: number;
  memoryEntries: number;
}

export interface ValidationCacheOptions {
  store: KeyValueStore;
  config?: CacheConfig;
  now?: Clock;
  logger?: Logger;
}

export class ValidationCache {
  private readonly memory = new Map<string, CacheEntry>();
  private readonly store: KeyValueStore;
  private readonly config: CacheConfig;
  private readonly now: Clock;
  private readonly logger: Logger;

  private hits = 0;
  private misses = 0;
  private sets = 0;
  private memoryHits = 0;
  private storeHits = 0;

  constructor(options: ValidationCacheOptions) {
    this.store = options.store;
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG.cache;
    this.now = options.now ?? systemClock;
    this.logger = options.logger ?? createSilentLogger();
  }

  buildKey(tier: CacheTier, parts: readonly string[]): string {
    return `${this.config.prefix}${tier}_${parts.join("_")}`;
  }

  get<T>(tier: CacheTier, parts: readonly string[], codec: CacheCodec<T>): T | undefined {
    const key = this.buildKey(tier, parts);
    const now = this.now();

    const cached = this.memory.get(key);
    if (cached) {
      if (this.isFresh(cached, now)) {
        const decoded = this.decode(key, cached.value, codec);
        if (decoded !== undefined) {
          this.hits++;
          this.memoryHits++;
          return decoded;
        }
      } else {
        this.memory.delete(key);
      }
    }

    const stored = CacheEntrySchema.safeParse(this.store.get(key));
    if (stored.success) {
      const entry: CacheEntry = {
        key,
        value: stored.data.value,
        insertedAt: stored.data.insertedAt,
        ttl: stored.data.ttl,
      };
      if (this.isFresh(entry, now)) {
        const decoded = this.decode(key, entry.value, codec);
        if (decoded !== undefined) {
          this.makeRoom();
          this.memory.set(key, entry);
          this.hits++;
          this.storeHits++;
          return decoded;
        }
      } else {
        this.store.delete(key);
      }
    }

    this.misses++;
    return undefined;
  }

  /**
   * Write through both tiers. `ttlSeconds` defaults to the tier's TTL.
   */
  set(tier: CacheTier, parts: readonly string[], value: unknown, ttlSeconds?: number): void {
    const key = this.buildKey(tier, parts);
    const ttl = ttlSeconds ?? this.config.ttl[tier];
    const entry: CacheEntry = {
      key,
      value: structuredClone(value),
      insertedAt: this.now(),
      ttl,
    };

    this.memory.delete(key);
    this.makeRoom();
    this.memory.set(key, entry);
    this.store.set(key, entry, ttl);
    this.sets++;
  }

  /**
   * Read, or compute and populate both tiers on a miss.
   */
  remember<T>(
    tier: CacheTier,
    parts: readonly string[],
    codec: CacheCodec<T>,
    compute: () => T,
    ttlSeconds?: number
  ): T {
    const cached = this.get(tier, parts, codec);
    if (cached !== undefined) return cached;

    const value = compute();
    this.set(tier, parts, value, ttlSeconds);
    return value;
  }

  /**
   * Remove every entry, in every tier and both layers, whose first key
   * part is `contentHash`. Returns the number of keys removed.
   */
  invalidateContent(contentHash: string): number {
    const prefixes = CacheTier.options.map((tier) => this.buildKey(tier, [contentHash]));
    const matches = (key: string) =>
      prefixes.some((prefix) => key === prefix || key.startsWith(`${prefix}_`));

    const removed = new Set<string>();
    for (const key of [...this.memory.keys()]) {
      if (matches(key)) {
        this.memory.delete(key);
        removed.add(key);
      }
    }
    for (const key of this.store.keys(this.config.prefix)) {
      if (matches(key)) {
        this.store.delete(key);
        removed.add(key);
      }
    }

    this.logger.debug("Cache invalidated for content", { contentHash, removed: removed.size });
    return removed.size;
  }

  clearAll(): void {
    this.memory.clear();
    for (const key of this.store.keys(this.config.prefix)) {
      this.store.delete(key);
    }
    this.hits = 0;
    this.misses = 0;
    this.sets = 0;
    this.memoryHits = 0;
    this.storeHits = 0;
  }

  /**
   * Drop expired memory entries. Returns how many were dropped.
   */
  pruneExpired(): number {
    const now = this.now();
    let pruned = 0;
    for (const [key, entry] of this.memory) {
      if (!this.isFresh(entry, now)) {
        this.memory.delete(key);
        pruned++;
      }
    }
    return pruned;
  }

  getStats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      sets: this.sets,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
      memoryHits: this.memoryHits,
      storeHits: this.storeHits,
      memoryEntries: this.memory.size,
    };
  }

  private makeRoom(): void {
    if (this.memory.size < this.config.maxMemoryEntries) return;
    this.pruneExpired();
    // Map order is insertion order
    for (const key of this.memory.keys()) {
      if (this.memory.size < this.config.maxMemoryEntries) break;
      this.memory.delete(key);
    }
  }

  private isFresh(entry: CacheEntry, now: number): boolean {
    return now < entry.insertedAt + entry.ttl * 1000;
  }

  private decode<T>(key: string, value: unknown, codec: CacheCodec<T>): T | undefined {
    const parsed = codec.safeParse(value);
    if (parsed.success) return parsed.data;

    this.logger.warn("Dropping cache entry with unexpected shape", { key });
    this.memory.delete(key);
    this.store.delete(key);
    return undefined;
  }
}
