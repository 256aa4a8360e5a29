/**
 * Usage Index
 *
 * Observed call counts per (path, method), folded from usage-log records.
 * Lookups are exact: a templated path such as `/orders/{id}` only counts
 * records logged under that same path.
 */

import { EndpointKey, UsageRecord } from './types';
import { endpointKey } from './spec-model';

export class UsageIndex {
  private readonly counts: ReadonlyMap<EndpointKey, number>;

  private constructor(counts: ReadonlyMap<EndpointKey, number>) {
    this.counts = counts;
  }

  static empty(): UsageIndex {
    return new UsageIndex(new Map());
  }

  /**
   * Fold records into one count per (path, method). Methods are compared
   * case-insensitively.
   */
  static fromRecords(records: Iterable<UsageRecord>): UsageIndex {
    const folded = new Map<EndpointKey, number>();

    for (const r of records) {
      const key = endpointKey(r.method, r.path);
      folded.set(key, (folded.get(key) ?? 0) + r.count);
    }

    return new UsageIndex(folded);
  }

  /** Number of distinct (path, method) keys */
  get size(): number {
    return this.counts.size;
  }

  countFor(path: string, method: string): number {
    return this.counts.get(endpointKey(method, path)) ?? 0;
  }

  wasUsed(path: string, method: string): boolean {
    return this.countFor(path, method) > 0;
  }
}
