import { createOpenAICompletionProvider, createOpenAIEmbeddingProvider } from "./clients/openai.js";
import { config, resolveRetrievalMinIntervalMs, type Config } from "./config/index.js";
import { defaultLogger, describeError, type Logger } from "./observability/logger.js";
import { CacheError } from "./modules/cache/errors.js";
import { ResultCache } from "./modules/cache/result-cache.js";
import { CacheSnapshotStore } from "./modules/cache/snapshot-store.js";
import { ConversationOrchestrator } from "./modules/chat/orchestrator.js";
import { SearchHistory } from "./modules/chat/search-history.js";
import { EmbeddingIndex } from "./modules/embeddings/embedding-index.js";
import type { EmbeddingProvider } from "./modules/embeddings/types.js";
import { IntervalGate, systemClock, type GateClock } from "./modules/literature/interval-gate.js";
import { ArticleRetriever, type FetchLike, type LiteratureSource } from "./modules/literature/retriever.js";
import { Summarizer } from "./modules/summaries/summarizer.js";
import type { CompletionProvider } from "./modules/summaries/types.js";

export interface PipelineOverrides {
  source?: LiteratureSource;
  fetch?: FetchLike;
  embeddingProvider?: EmbeddingProvider;
  completionProvider?: CompletionProvider;
  clock?: GateClock;
  logger?: Logger;
}

export interface LiteraturePipeline {
  orchestrator: ConversationOrchestrator;
  cache: ResultCache;
  snapshotStore: CacheSnapshotStore | null;
  /** Loads the cache snapshot when one is configured; failures are logged. */
  restoreCache(): Promise<void>;
  /** Writes the cache snapshot when one is configured; failures are logged. */
  persistCache(): Promise<void>;
}

export function createPipeline(settings: Config = config, overrides: PipelineOverrides = {}): LiteraturePipeline {
  const clock = overrides.clock ?? systemClock;
  const logger = overrides.logger ?? defaultLogger;

  const source =
    overrides.source ??
    new ArticleRetriever({
      gate: new IntervalGate(resolveRetrievalMinIntervalMs(settings), clock),
      settings: {
        baseUrl: settings.NCBI_BASE_URL,
        tool: settings.NCBI_TOOL,
        email: settings.NCBI_EMAIL,
        apiKey: settings.NCBI_API_KEY,
        pageSize: settings.RETRIEVAL_PAGE_SIZE,
        timeoutMs: settings.RETRIEVAL_TIMEOUT_MS,
        maxAttempts: settings.RETRIEVAL_MAX_ATTEMPTS,
        backoffBaseMs: settings.RETRIEVAL_BACKOFF_BASE_MS,
        defaultMaxResults: settings.SEARCH_DEFAULT_MAX_RESULTS
      },
      fetch: overrides.fetch,
      sleep: clock.sleep,
      now: clock.now,
      logger
    });

  const embeddings = new EmbeddingIndex({
    provider: overrides.embeddingProvider ?? createOpenAIEmbeddingProvider({ model: settings.OPENAI_EMBEDDING_MODEL }),
    settings: {
      maxInputChars: settings.EMBEDDING_MAX_INPUT_CHARS,
      timeoutMs: settings.EMBEDDING_TIMEOUT_MS,
      maxAttempts: settings.EMBEDDING_MAX_ATTEMPTS,
      backoffBaseMs: settings.EMBEDDING_BACKOFF_BASE_MS
    },
    sleep: clock.sleep,
    now: clock.now,
    logger
  });

  const summarizer = new Summarizer({
    provider: overrides.completionProvider ?? createOpenAICompletionProvider({ model: settings.OPENAI_MODEL }),
    settings: {
      contextBudgetChars: settings.SUMMARY_CONTEXT_BUDGET_CHARS,
      timeoutMs: settings.SUMMARIZATION_TIMEOUT_MS,
      backoffMs: settings.SUMMARIZATION_BACKOFF_MS
    },
    sleep: clock.sleep,
    now: clock.now,
    logger
  });

  const cache = new ResultCache({
    settings: { ttlMs: settings.CACHE_TTL_MS, maxEntries: settings.CACHE_MAX_ENTRIES },
    now: clock.now,
    logger
  });

  const orchestrator = new ConversationOrchestrator({
    source,
    embeddings,
    summarizer,
    cache,
    history: new SearchHistory({ maxEntries: settings.SEARCH_HISTORY_MAX_ENTRIES, now: clock.now }),
    settings: {
      defaultMaxResults: settings.SEARCH_DEFAULT_MAX_RESULTS,
      followupTopK: settings.FOLLOWUP_TOP_K,
      messageMaxChars: settings.MESSAGE_MAX_CHARS
    },
    logger
  });

  const snapshotStore = settings.CACHE_SNAPSHOT_FILE ? new CacheSnapshotStore(settings.CACHE_SNAPSHOT_FILE) : null;

  const reportCacheError = (event: string, error: unknown): void => {
    if (!(error instanceof CacheError)) {
      throw error;
    }
    logger.warn(event, {}, describeError(error));
  };

  return {
    orchestrator,
    cache,
    snapshotStore,
    async restoreCache() {
      if (!snapshotStore) {
        return;
      }
      try {
        const restored = cache.restore(await snapshotStore.load());
        logger.info("cache.snapshot.restored", {}, { file: snapshotStore.filePath, entries: restored });
      } catch (error) {
        reportCacheError("cache.snapshot.restore_failed", error);
      }
    },
    async persistCache() {
      if (!snapshotStore) {
        return;
      }
      try {
        const snapshot = cache.snapshot();
        await snapshotStore.save(snapshot);
        logger.info("cache.snapshot.saved", {}, { file: snapshotStore.filePath, entries: snapshot.entries.length });
      } catch (error) {
        reportCacheError("cache.snapshot.save_failed", error);
      }
    }
  };
}

let defaultPipeline: LiteraturePipeline | null = null;

export function getPipeline(): LiteraturePipeline {
  if (!defaultPipeline) {
    defaultPipeline = createPipeline();
  }
  return defaultPipeline;
}

export function resetPipelineForTests(): void {
  defaultPipeline = null;
}
