/**
 * Data provider contract and last-good-value cache
 */

import { ProviderFetchError } from "@paperday/core";
import { dateKey } from "../tasks.js";

export interface DataProvider<T> {
  /** Used as the log tag and in ProviderFetchError */
  readonly name: string;
  fetch(date: Date): Promise<T>;
}

export interface CachedProviderOptions {
  /** Reuse a value fetched for the same day for this long (default: always refetch) */
  ttlMs?: number;
  now?: () => number;
}

interface CacheEntry<T> {
  value: T;
  day: string;
  fetchedAt: number;
}

/**
 * Wraps a provider so that fetch() never rejects.
 *
 * On failure the last good value is returned, or `fallback` when nothing
 * has been fetched yet.
 */
export class CachedProvider<T> implements DataProvider<T> {
  readonly name: string;
  private last: CacheEntry<T> | null = null;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(
    private readonly inner: DataProvider<T>,
    private readonly fallback: T,
    options: CachedProviderOptions = {}
  ) {
    this.name = inner.name;
    this.ttlMs = options.ttlMs ?? 0;
    this.now = options.now ?? Date.now;
  }

  async fetch(date: Date): Promise<T> {
    const day = dateKey(date);
    const now = this.now();
    if (this.last && this.last.day === day && now - this.last.fetchedAt < this.ttlMs) {
      return this.last.value;
    }

    try {
      const value = await this.inner.fetch(date);
      this.last = { value, day, fetchedAt: now };
      return value;
    } catch (error) {
      const failure =
        error instanceof ProviderFetchError
          ? error
          : new ProviderFetchError(
              this.name,
              error instanceof Error ? error.message : String(error),
              { cause: error }
            );
      console.warn(`[${this.name}] Fetch failed, using ${this.last ? "cached" : "default"} value:`, failure);
      return this.last ? this.last.value : this.fallback;
    }
  }
}
