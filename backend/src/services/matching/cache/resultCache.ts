import type { Clock, MatchResult } from '../types.js';
import { systemClock } from '../types.js';

export type CacheEntry = {
  fingerprint: string;
  result: readonly MatchResult[];
  createdAt: number;
  expiresAt: number;
};

export interface ResultCache {
  get(fingerprint: string): readonly MatchResult[] | null;
  put(fingerprint: string, result: readonly MatchResult[], ttlMs: number): void;
}

function freezeMatch(match: MatchResult): MatchResult {
  const subjects = [...match.tutor.subjects];
  Object.freeze(subjects);
  const tutor = Object.freeze({ ...match.tutor, subjects });
  return Object.freeze({ ...match, tutor });
}

function freezeResult(result: readonly MatchResult[]): readonly MatchResult[] {
  return Object.freeze(result.map(freezeMatch));
}

/**
 * In-memory cache keyed by fingerprint.
 * Entries are frozen copies written with a single Map.set, so readers
 * never see a half-built entry.
 */
export class MemoryResultCache implements ResultCache {
  private entries = new Map<string, CacheEntry>();
  private clock: Clock;
  private maxEntries: number;

  constructor(options: { clock?: Clock; maxEntries?: number } = {}) {
    this.clock = options.clock ?? systemClock;
    this.maxEntries = options.maxEntries ?? 1000;
  }

  size(): number {
    return this.entries.size;
  }

  get(fingerprint: string): readonly MatchResult[] | null {
    const entry = this.entries.get(fingerprint);
    if (!entry) return null;
    if (entry.expiresAt <= this.clock.now()) {
      this.entries.delete(fingerprint);
      return null;
    }
    return entry.result;
  }

  put(fingerprint: string, result: readonly MatchResult[], ttlMs: number): void {
    if (ttlMs <= 0) return;
    const createdAt = this.clock.now();
    const entry: CacheEntry = Object.freeze({
      fingerprint,
      result: freezeResult(result),
      createdAt,
      expiresAt: createdAt + ttlMs
    });

    this.entries.delete(fingerprint);
    if (this.entries.size >= this.maxEntries) {
      this.evict();
    }
    this.entries.set(fingerprint, entry);
  }

  prune(): number {
    const now = this.clock.now();
    let removed = 0;
    for (const [key, entry] of this.entries.entries()) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  private evict(): void {
    if (this.prune() > 0 && this.entries.size < this.maxEntries) return;
    // Map iteration follows insertion order, so the first key is the oldest write.
    const oldest = this.entries.keys().next();
    if (!oldest.done) {
      this.entries.delete(oldest.value);
    }
  }
}
