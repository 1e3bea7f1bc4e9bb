import { LRUCache } from "lru-cache";
import { defaultLogger, type CorrelationContext, type Logger } from "../../observability/logger.js";
import { recordCacheEvent } from "../../observability/metrics.js";
import type { ArticleRecord } from "../literature/types.js";
import type { CacheEntry, CacheEntryDraft } from "./types.js";

export interface ResultCacheSettings {
  ttlMs: number;
  maxEntries: number;
  /** Bound on remembered conversation bindings. */
  maxConversations?: number;
}

export interface ResultCacheDependencies {
  settings: ResultCacheSettings;
  now?: () => number;
  logger?: Logger;
}

export type LoadSource = "cache" | "load" | "collapsed";

export type LoadResult = {
  entry: CacheEntry;
  source: LoadSource;
  /** False when the loaded entry was rejected by `shouldStore`. */
  stored: boolean;
};

export interface GetOrLoadOptions {
  shouldStore?: (draft: CacheEntryDraft) => boolean;
  correlation?: CorrelationContext;
}

export type CacheSnapshot = {
  entries: CacheEntry[];
  conversations: Record<string, string>;
};

const DEFAULT_MAX_CONVERSATIONS = 10_000;

const freezeArticle = (article: ArticleRecord): ArticleRecord =>
  Object.freeze({ ...article, authors: Object.freeze([...article.authors]) });

// snapshot data arrives as plain objects; articles are kept immutable as when parsed
const freezeRestoredEntry = (entry: CacheEntry): CacheEntry => ({
  ...entry,
  resultSet: {
    ...entry.resultSet,
    entries: entry.resultSet.entries.map((ranked) => ({ ...ranked, article: freezeArticle(ranked.article) }))
  }
});

/**
 * Bounded store of assembled search results. Entries expire `ttlMs` after
 * `put`; when the store is full the least recently accessed entry is evicted
 * first, expired or not. Concurrent loads for one key share a single promise.
 */
export class ResultCache {
  private readonly settings: ResultCacheSettings;

  private readonly now: () => number;

  private readonly logger: Logger;

  private readonly entries: LRUCache<string, CacheEntry>;

  private readonly conversations: LRUCache<string, string>;

  private readonly inFlight = new Map<string, Promise<{ entry: CacheEntry; stored: boolean }>>();

  constructor(dependencies: ResultCacheDependencies) {
    this.settings = dependencies.settings;
    this.now = dependencies.now ?? Date.now;
    this.logger = dependencies.logger ?? defaultLogger;
    this.entries = new LRUCache<string, CacheEntry>({
      max: Math.max(1, this.settings.maxEntries),
      dispose: (_entry, key, reason) => {
        if (reason === "evict") {
          recordCacheEvent("evictions");
          this.logger.debug("cache.entry.evicted", {}, { key });
        }
      }
    });
    this.conversations = new LRUCache<string, string>({
      max: Math.max(1, this.settings.maxConversations ?? DEFAULT_MAX_CONVERSATIONS)
    });
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  put(key: string, draft: CacheEntryDraft): CacheEntry {
    const entry = this.stamp(key, draft);
    this.entries.set(key, entry);
    return entry;
  }

  bindConversation(conversationId: string, key: string): void {
    this.conversations.set(conversationId, key);
  }

  getForFollowup(conversationId: string): CacheEntry | undefined {
    const key = this.conversations.get(conversationId);
    if (key === undefined) {
      return undefined;
    }
    const entry = this.get(key);
    if (!entry) {
      this.conversations.delete(conversationId);
    }
    return entry;
  }

  /**
   * Returns the live entry for `key`, or runs `loader` once for all concurrent
   * callers. A rejected load is not stored and clears the in-flight slot.
   */
  async getOrLoad(
    key: string,
    loader: () => Promise<CacheEntryDraft>,
    options: GetOrLoadOptions = {}
  ): Promise<LoadResult> {
    const correlation = options.correlation ?? {};
    const cached = this.get(key);
    if (cached) {
      recordCacheEvent("hits");
      this.logger.debug("cache.hit", correlation, { key });
      return { entry: cached, source: "cache", stored: true };
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      recordCacheEvent("collapsed");
      this.logger.debug("cache.load.collapsed", correlation, { key });
      const shared = await pending;
      return { ...shared, source: "collapsed" };
    }

    recordCacheEvent("misses");
    const load = (async () => {
      const draft = await loader();
      const stored = options.shouldStore ? options.shouldStore(draft) : true;
      const entry = stored ? this.put(key, draft) : this.stamp(key, draft);
      return { entry, stored };
    })();
    this.inFlight.set(key, load);

    try {
      const result = await load;
      return { ...result, source: "load" };
    } finally {
      this.inFlight.delete(key);
    }
  }

  snapshot(): CacheSnapshot {
    const now = this.now();
    const entries: CacheEntry[] = [];
    // least recent first, so restoring in order rebuilds the same recency
    for (const [, entry] of this.entries.rentries()) {
      if (entry.expiresAt > now) {
        entries.push(entry);
      }
    }
    const conversations: Record<string, string> = {};
    for (const [conversationId, key] of this.conversations.rentries()) {
      conversations[conversationId] = key;
    }
    return { entries, conversations };
  }

  /** Restores unexpired entries and returns how many were kept. */
  restore(snapshot: CacheSnapshot): number {
    const now = this.now();
    let restored = 0;
    for (const entry of snapshot.entries) {
      if (entry.expiresAt > now) {
        this.entries.set(entry.key, freezeRestoredEntry(entry));
        restored += 1;
      }
    }
    for (const [conversationId, key] of Object.entries(snapshot.conversations)) {
      if (this.entries.has(key)) {
        this.conversations.set(conversationId, key);
      }
    }
    return restored;
  }

  clear(): void {
    this.entries.clear();
    this.conversations.clear();
  }

  private stamp(key: string, draft: CacheEntryDraft): CacheEntry {
    const createdAt = this.now();
    return {
      ...draft,
      key,
      createdAt,
      expiresAt: createdAt + this.settings.ttlMs
    };
  }
}
