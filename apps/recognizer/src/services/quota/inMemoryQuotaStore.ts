import type { CloudProviderName, QuotaStore } from "../../types/ocr.js";

export function usageDay(now: Date): string {
  return now.toISOString().slice(0, 10);
}

/**
 * Process-local daily counters. Each increment is a single synchronous
 * read-modify-write, so concurrent callers in one process never interleave.
 */
export class InMemoryQuotaStore implements QuotaStore {
  private readonly counts = new Map<string, number>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async increment(provider: CloudProviderName): Promise<number> {
    const key = this.key(provider);
    const next = (this.counts.get(key) ?? 0) + 1;
    this.counts.set(key, next);
    return next;
  }

  async currentCount(provider: CloudProviderName): Promise<number> {
    return this.counts.get(this.key(provider)) ?? 0;
  }

  private key(provider: CloudProviderName): string {
    return `${provider}:${usageDay(this.clock())}`;
  }
}
