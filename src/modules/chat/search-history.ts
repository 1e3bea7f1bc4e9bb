import { LRUCache } from "lru-cache";

export type SearchHistoryEntry = {
  query: string;
  count: number;
  lastSearchedAt: string;
};

type HistoryRecord = {
  count: number;
  lastSearchedAt: number;
};

export interface SearchHistoryOptions {
  maxEntries: number;
  now?: () => number;
}

/** Bounded log of normalized queries, most recent first. */
export class SearchHistory {
  private readonly records: LRUCache<string, HistoryRecord>;

  private readonly now: () => number;

  constructor(options: SearchHistoryOptions) {
    this.records = new LRUCache<string, HistoryRecord>({ max: Math.max(1, options.maxEntries) });
    this.now = options.now ?? Date.now;
  }

  record(normalizedQuery: string): void {
    const previous = this.records.get(normalizedQuery);
    this.records.set(normalizedQuery, {
      count: (previous?.count ?? 0) + 1,
      lastSearchedAt: this.now()
    });
  }

  recent(limit: number): SearchHistoryEntry[] {
    const entries: SearchHistoryEntry[] = [];
    for (const [query, record] of this.records.entries()) {
      if (entries.length >= limit) {
        break;
      }
      entries.push({ query, count: record.count, lastSearchedAt: new Date(record.lastSearchedAt).toISOString() });
    }
    return entries;
  }
}
