/**
 * TTL cache in front of a provider. Repeated analyses of the same query
 * within the TTL reuse the earlier fetch instead of spending quota.
 */

import type { EvidenceProvider, ProviderResult } from "./types.js";
import { logger } from "../../core/logger.js";

interface CacheEntry {
  result: ProviderResult;
  expiresAt: number;
}

export interface CacheOptions {
  maxEntries: number;
  ttlMs: number;
  now?: () => number;
}

export class CachedProvider implements EvidenceProvider {
  readonly id: string;
  readonly kind: EvidenceProvider["kind"];

  private readonly entries = new Map<string, CacheEntry>();
  private readonly now: () => number;

  constructor(
    private readonly inner: EvidenceProvider,
    private readonly options: CacheOptions
  ) {
    this.id = inner.id;
    this.kind = inner.kind;
    this.now = options.now ?? Date.now;
  }

  async fetch(query: string, domain: string, signal: AbortSignal): Promise<ProviderResult> {
    const key = `${query.trim().toLowerCase()}|${domain.trim().toLowerCase()}`;
    const hit = this.entries.get(key);

    if (hit && hit.expiresAt > this.now()) {
      logger.debug("Provider cache hit", { provider: this.id });
      // refresh LRU position
      this.entries.delete(key);
      this.entries.set(key, hit);
      return hit.result;
    }
    this.entries.delete(key);

    const result = await this.inner.fetch(query, domain, signal);

    // Empty results are not worth pinning for an hour
    if (result.documents.length > 0) {
      this.entries.set(key, { result, expiresAt: this.now() + this.options.ttlMs });
      while (this.entries.size > this.options.maxEntries) {
        const oldest = this.entries.keys().next();
        if (oldest.done) break;
        this.entries.delete(oldest.value);
      }
    }

    return result;
  }

  get size(): number {
    return this.entries.size;
  }
}
