/**
 * Persistent key-value stores.
 *
 * The engine never reaches for ambient global state: whatever durable
 * option store the host has is wrapped in this interface and injected
 * into the cache, the retry manager and the error handler.
 *
 * Values are JSON-compatible. TTLs are in seconds; an expired entry reads
 * as the default.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export interface KeyValueStore {
  get(key: string, defaultValue?: unknown): unknown;
  set(key: string, value: unknown, ttlSeconds?: number): void;
  delete(key: string): void;
  /** Live keys starting with `prefix` (every live key when omitted) */
  keys(prefix?: string): string[];
}

/**
 * Failure reading or writing a file-backed store.
 */
export class StoreError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "StoreError";
  }
}

const StoredEntrySchema = z
  .object({
    value: z.unknown(),
    /** Epoch milliseconds; absent means no expiry */
    expiresAt: z.number().optional(),
  })
  .strict();

type StoredEntry = z.infer<typeof StoredEntrySchema>;

const StoreFileSchema = z.record(StoredEntrySchema);

function isLive(entry: StoredEntry, now: number): boolean {
  return entry.expiresAt === undefined || entry.expiresAt > now;
}

function makeEntry(value: unknown, ttlSeconds: number | undefined, now: number): StoredEntry {
  const copy: unknown = structuredClone(value);
  return ttlSeconds !== undefined && ttlSeconds > 0
    ? { value: copy, expiresAt: now + ttlSeconds * 1000 }
    : { value: copy };
}

/**
 * Process-local store. Used by tests and as the default when the host
 * provides nothing durable.
 */
export class MemoryKeyValueStore implements KeyValueStore {
  private readonly entries = new Map<string, StoredEntry>();

  constructor(private readonly now: Clock = systemClock) {}

  get(key: string, defaultValue?: unknown): unknown {
    const entry = this.entries.get(key);
    if (!entry) return defaultValue;
    if (!isLive(entry, this.now())) {
      this.entries.delete(key);
      return defaultValue;
    }
    return structuredClone(entry.value);
  }

  set(key: string, value: unknown, ttlSeconds?: number): void {
    this.entries.set(key, makeEntry(value, ttlSeconds, this.now()));
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  keys(prefix = ""): string[] {
    const now = this.now();
    return [...this.entries.entries()]
      .filter(([key, entry]) => key.startsWith(prefix) && isLive(entry, now))
      .map(([key]) => key);
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Store persisted as a single JSON document. The whole file is rewritten
 * on every change, which is fine for the handful of keys a CLI run writes.
 */
export class JsonFileKeyValueStore implements KeyValueStore {
  private entries: Map<string, StoredEntry> | null = null;

  constructor(
    private readonly path: string,
    private readonly now: Clock = systemClock
  ) {}

  get(key: string, defaultValue?: unknown): unknown {
    const entries = this.load();
    const entry = entries.get(key);
    if (!entry) return defaultValue;
    if (!isLive(entry, this.now())) {
      entries.delete(key);
      this.flush();
      return defaultValue;
    }
    return structuredClone(entry.value);
  }

  set(key: string, value: unknown, ttlSeconds?: number): void {
    this.load().set(key, makeEntry(value, ttlSeconds, this.now()));
    this.flush();
  }

  delete(key: string): void {
    if (this.load().delete(key)) {
      this.flush();
    }
  }

  keys(prefix = ""): string[] {
    const now = this.now();
    return [...this.load().entries()]
      .filter(([key, entry]) => key.startsWith(prefix) && isLive(entry, now))
      .map(([key]) => key);
  }

  private load(): Map<string, StoredEntry> {
    if (this.entries) return this.entries;

    if (!existsSync(this.path)) {
      this.entries = new Map();
      return this.entries;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, "utf-8"));
    } catch (err) {
      throw new StoreError(`Cannot read store file: ${this.path}`, this.path, err);
    }

    const parsed = StoreFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StoreError(`Store file has an unexpected shape: ${this.path}`, this.path, parsed.error);
    }

    this.entries = new Map(Object.entries(parsed.data));
    return this.entries;
  }

  private flush(): void {
    const entries = this.load();
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileSync(this.path, JSON.stringify(Object.fromEntries(entries), null, 2) + "\n");
    } catch (err) {
      throw new StoreError(`Cannot write store file: ${this.path}`, this.path, err);
    }
  }
}
