import { createHash } from 'crypto';
import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import logger from '@/utils/logger';
import { getErrorMessage } from '@/utils/error-handler';

export interface CacheEntry {
  payload: unknown;
  fetchedAt: number; // epoch ms
}

/**
 * Key-value store for upstream API responses, keyed by request fingerprint.
 */
export interface ResponseCache {
  get(key: string): Promise<CacheEntry | null>;
  set(key: string, entry: CacheEntry): Promise<void>;
}

/**
 * Stable fingerprint of a request. Parameter order does not matter; the
 * credential parameters are never part of the key.
 */
export function requestFingerprint(endpoint: string, params: Record<string, unknown>): string {
  const stable = Object.keys(params)
    .filter(key => key !== 'access_token' && key !== 'appsecret_proof')
    .sort()
    .map(key => [key, params[key]]);

  return createHash('sha256')
    .update(`${endpoint}?${JSON.stringify(stable)}`)
    .digest('hex');
}

function isFresh(entry: CacheEntry, ttlSeconds: number, now: number): boolean {
  return now - entry.fetchedAt <= ttlSeconds * 1000;
}

export class MemoryResponseCache implements ResponseCache {
  private entries = new Map<string, CacheEntry>();

  constructor(
    private ttlSeconds: number = 3600,
    private now: () => number = Date.now
  ) {}

  async get(key: string): Promise<CacheEntry | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (!isFresh(entry, this.ttlSeconds, this.now())) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  async set(key: string, entry: CacheEntry): Promise<void> {
    this.entries.set(key, entry);
  }

  get size(): number {
    return this.entries.size;
  }
}

function isCacheEntry(value: unknown): value is CacheEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'fetchedAt' in value &&
    typeof value.fetchedAt === 'number' &&
    'payload' in value
  );
}

/**
 * One JSON file per key. A cache that cannot be read or written degrades to
 * a miss; it never fails the fetch.
 */
export class FileResponseCache implements ResponseCache {
  constructor(
    private directory: string,
    private ttlSeconds: number = 3600,
    private now: () => number = Date.now
  ) {}

  private filePath(key: string): string {
    return path.join(this.directory, `${key}.json`);
  }

  async get(key: string): Promise<CacheEntry | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath(key), 'utf8');
    } catch (error) {
      logger.debug('Cache miss', { key, reason: getErrorMessage(error) });
      return null;
    }

    try {
      const entry: unknown = JSON.parse(raw);
      if (!isCacheEntry(entry)) {
        logger.warn('Ignoring malformed cache entry', { key });
        return null;
      }
      if (!isFresh(entry, this.ttlSeconds, this.now())) {
        logger.debug('Cache entry expired', { key });
        return null;
      }
      return entry;
    } catch (error) {
      logger.warn('Ignoring unreadable cache entry', { key, error: getErrorMessage(error) });
      return null;
    }
  }

  async set(key: string, entry: CacheEntry): Promise<void> {
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(this.filePath(key), JSON.stringify(entry), 'utf8');
    } catch (error) {
      logger.warn('Failed to write cache entry', { key, error: getErrorMessage(error) });
    }
  }
}
