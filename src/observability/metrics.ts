import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

interface LatencySummary {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
}

interface OpenAIUsageSummary {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

interface CacheCounters {
  hits: number;
  misses: number;
  collapsed: number;
  evictions: number;
}

interface MetricsState {
  requestLatency: LatencySummary;
  retrievalLatency: LatencySummary;
  embeddingLatency: LatencySummary;
  summarizationLatency: LatencySummary;
  openAIUsage: OpenAIUsageSummary;
  cache: CacheCounters;
  droppedRecords: number;
  errorRates: Record<string, number>;
}

const createLatencySummary = (): LatencySummary => ({
  count: 0,
  totalMs: 0,
  minMs: Number.POSITIVE_INFINITY,
  maxMs: 0
});

const createCacheCounters = (): CacheCounters => ({
  hits: 0,
  misses: 0,
  collapsed: 0,
  evictions: 0
});

const state: MetricsState = {
  requestLatency: createLatencySummary(),
  retrievalLatency: createLatencySummary(),
  embeddingLatency: createLatencySummary(),
  summarizationLatency: createLatencySummary(),
  openAIUsage: {
    promptTokens: 0,
    completionTokens: 0,
    totalTokens: 0
  },
  cache: createCacheCounters(),
  droppedRecords: 0,
  errorRates: {}
};

const requestStartTimes = new WeakMap<FastifyRequest, number>();

const recordLatency = (summary: LatencySummary, durationMs: number): void => {
  const safeDuration = Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0;
  summary.count += 1;
  summary.totalMs += safeDuration;
  summary.minMs = Math.min(summary.minMs, safeDuration);
  summary.maxMs = Math.max(summary.maxMs, safeDuration);
};

const roundTo2Decimals = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

const serializeLatency = (summary: LatencySummary): { count: number; avgMs: number; minMs: number; maxMs: number } => {
  if (summary.count === 0) {
    return { count: 0, avgMs: 0, minMs: 0, maxMs: 0 };
  }
  return {
    count: summary.count,
    avgMs: roundTo2Decimals(summary.totalMs / summary.count),
    minMs: roundTo2Decimals(summary.minMs),
    maxMs: roundTo2Decimals(summary.maxMs)
  };
};

export const recordRequestLatency = (durationMs: number): void => {
  recordLatency(state.requestLatency, durationMs);
};

export const recordRetrievalLatency = (durationMs: number): void => {
  recordLatency(state.retrievalLatency, durationMs);
};

export const recordEmbeddingLatency = (durationMs: number): void => {
  recordLatency(state.embeddingLatency, durationMs);
};

export const recordSummarizationLatency = (durationMs: number): void => {
  recordLatency(state.summarizationLatency, durationMs);
};

export const recordOpenAIUsage = (usage: {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}): void => {
  state.openAIUsage.promptTokens += usage.promptTokens ?? 0;
  state.openAIUsage.completionTokens += usage.completionTokens ?? 0;
  state.openAIUsage.totalTokens += usage.totalTokens ?? 0;
};

export type CacheEvent = keyof CacheCounters;

export const recordCacheEvent = (event: CacheEvent): void => {
  state.cache[event] += 1;
};

export const recordDroppedRecords = (count: number): void => {
  state.droppedRecords += Math.max(0, count);
};

export const recordErrorRate = (key: string): void => {
  state.errorRates[key] = (state.errorRates[key] ?? 0) + 1;
};

export const getMetricsSnapshot = (): Record<string, unknown> => ({
  request_latency: serializeLatency(state.requestLatency),
  retrieval_latency: serializeLatency(state.retrievalLatency),
  embedding_latency: serializeLatency(state.embeddingLatency),
  summarization_latency: serializeLatency(state.summarizationLatency),
  openai_usage: { ...state.openAIUsage },
  cache: { ...state.cache },
  dropped_records: state.droppedRecords,
  error_rates: { ...state.errorRates }
});

export const resetMetrics = (): void => {
  state.requestLatency = createLatencySummary();
  state.retrievalLatency = createLatencySummary();
  state.embeddingLatency = createLatencySummary();
  state.summarizationLatency = createLatencySummary();
  state.openAIUsage = {
    promptTokens: 0,
    completionTokens: 0,
    totalTokens: 0
  };
  state.cache = createCacheCounters();
  state.droppedRecords = 0;
  state.errorRates = {};
};

export const registerMetricsRoutes = async (app: FastifyInstance): Promise<void> => {
  app.get("/metrics", async () => getMetricsSnapshot());
};

export const registerRequestMetricsHooks = (app: FastifyInstance): void => {
  app.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
    requestStartTimes.set(request, Date.now());
    reply.header("x-request-id", request.id);
  });

  app.addHook("onResponse", async (request: FastifyRequest, reply: FastifyReply) => {
    const startedAt = requestStartTimes.get(request) ?? Date.now();
    recordRequestLatency(Date.now() - startedAt);
    if (reply.statusCode >= 400) {
      recordErrorRate(`http_${reply.statusCode}`);
    }
  });
};
