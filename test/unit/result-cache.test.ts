import { describe, expect, it, vi } from "vitest";
import { ResultCache, type CacheSnapshot } from "../../src/modules/cache/result-cache.js";
import type { CacheEntryDraft } from "../../src/modules/cache/types.js";
import { getMetricsSnapshot } from "../../src/observability/metrics.js";
import { makeDraft } from "../../tests/helpers/cache-fixtures.js";
import { VirtualClock } from "../../tests/helpers/virtual-clock.js";

const createCache = (maxEntries = 10, ttlMs = 1000) => {
  const clock = new VirtualClock(5000);
  const cache = new ResultCache({ settings: { ttlMs, maxEntries }, now: clock.now });
  return { cache, clock };
};

const deferred = <T>() => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((onResolve, onReject) => {
    resolve = onResolve;
    reject = onReject;
  });
  return { promise, resolve, reject };
};

describe("ResultCache", () => {
  it("returns what was put, stamped with creation and expiry", () => {
    const { cache } = createCache();
    const draft = makeDraft("asthma");

    cache.put("asthma|n=5", draft);

    expect(cache.get("asthma|n=5")).toEqual({ ...draft, key: "asthma|n=5", createdAt: 5000, expiresAt: 6000 });
    expect(cache.get("missing")).toBeUndefined();
  });

  it("treats expired entries as misses and removes them", () => {
    const { cache, clock } = createCache();
    cache.put("k", makeDraft("asthma"));

    clock.advance(999);
    expect(cache.get("k")).toBeDefined();
    clock.advance(1);
    expect(cache.get("k")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("evicts the least recently accessed entry when full", () => {
    const { cache } = createCache(2);
    cache.put("a", makeDraft("a"));
    cache.put("b", makeDraft("b"));
    cache.get("a");

    cache.put("c", makeDraft("c"));

    expect(cache.get("b")).toBeUndefined();
    expect(cache.get("a")?.key).toBe("a");
    expect(cache.get("c")?.key).toBe("c");
    expect(getMetricsSnapshot().cache).toMatchObject({ evictions: 1 });
  });

  it("collapses concurrent loads of one key", async () => {
    const { cache } = createCache();
    const pending = deferred<CacheEntryDraft>();
    const loader = vi.fn(() => pending.promise);

    const first = cache.getOrLoad("k", loader);
    const second = cache.getOrLoad("k", loader);
    pending.resolve(makeDraft("asthma"));

    const [firstResult, secondResult] = await Promise.all([first, second]);
    const third = await cache.getOrLoad("k", loader);

    expect(loader).toHaveBeenCalledTimes(1);
    expect(firstResult.source).toBe("load");
    expect(secondResult.source).toBe("collapsed");
    expect(secondResult.entry).toBe(firstResult.entry);
    expect(third.source).toBe("cache");
    expect(getMetricsSnapshot().cache).toEqual({ hits: 1, misses: 1, collapsed: 1, evictions: 0 });
  });

  it("does not store failed loads and lets the next call retry", async () => {
    const { cache } = createCache();
    const pending = deferred<CacheEntryDraft>();
    const failing = vi.fn(() => pending.promise);

    const first = cache.getOrLoad("k", failing);
    const second = cache.getOrLoad("k", failing);
    pending.reject(new Error("upstream down"));

    const settled = await Promise.allSettled([first, second]);
    expect(settled.map((result) => result.status)).toEqual(["rejected", "rejected"]);
    expect(cache.size).toBe(0);

    const retried = await cache.getOrLoad("k", async () => makeDraft("asthma"));
    expect(retried.source).toBe("load");
    expect(failing).toHaveBeenCalledTimes(1);
  });

  it("skips storing when shouldStore rejects the draft", async () => {
    const { cache } = createCache();

    const result = await cache.getOrLoad("k", async () => makeDraft("asthma", []), {
      shouldStore: (draft) => draft.resultSet.entries.length > 0
    });

    expect(result.stored).toBe(false);
    expect(result.entry.resultSet.entries).toEqual([]);
    expect(cache.size).toBe(0);
  });

  it("resolves follow-ups through the conversation binding until expiry", () => {
    const { cache, clock } = createCache();
    cache.put("k", makeDraft("asthma"));
    cache.bindConversation("conv-1", "k");

    expect(cache.getForFollowup("conv-1")?.key).toBe("k");
    expect(cache.getForFollowup("conv-2")).toBeUndefined();

    clock.advance(1000);
    expect(cache.getForFollowup("conv-1")).toBeUndefined();
  });

  it("restores unexpired entries and bindings from a snapshot", () => {
    const source = createCache();
    source.cache.put("old", makeDraft("old"));
    source.clock.advance(600);
    source.cache.put("new", makeDraft("new"));
    source.cache.bindConversation("conv-1", "new");
    source.cache.bindConversation("conv-2", "old");
    const snapshot = source.cache.snapshot();

    expect(snapshot.entries.map((entry) => entry.key)).toEqual(["old", "new"]);

    const target = createCache();
    target.clock.advance(1200);
    expect(target.cache.restore(snapshot)).toBe(1);
    expect(target.cache.getForFollowup("conv-1")?.key).toBe("new");
    expect(target.cache.getForFollowup("conv-2")).toBeUndefined();
  });

  it("freezes restored articles and their author lists", () => {
    const source = createCache();
    source.cache.put("asthma|n=5", makeDraft("asthma", ["7", "8"]));
    const snapshot = source.cache.snapshot();
    const plain: CacheSnapshot = {
      ...snapshot,
      entries: snapshot.entries.map((entry) => ({
        ...entry,
        resultSet: {
          ...entry.resultSet,
          entries: entry.resultSet.entries.map((ranked) => ({
            ...ranked,
            article: { ...ranked.article, authors: [...ranked.article.authors] }
          }))
        }
      }))
    };
    const target = createCache();

    expect(target.cache.restore(plain)).toBe(1);

    const articles = target.cache.get("asthma|n=5")?.resultSet.entries.map((ranked) => ranked.article) ?? [];
    expect(articles.map((article) => article.id)).toEqual(["7", "8"]);
    expect(articles.every((article) => Object.isFrozen(article) && Object.isFrozen(article.authors))).toBe(true);
    expect(plain.entries[0]?.resultSet.entries[0]?.article).not.toBe(articles[0]);
  });
});
