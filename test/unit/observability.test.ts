import Fastify from "fastify";
import { afterEach, describe, expect, it, vi } from "vitest";
import { RetrievalError } from "../../src/modules/literature/errors.js";
import { describeError, parseConfiguredLogLevel } from "../../src/observability/logger.js";
import {
  getMetricsSnapshot,
  recordCacheEvent,
  recordDroppedRecords,
  recordErrorRate,
  recordOpenAIUsage,
  recordRetrievalLatency,
  registerMetricsRoutes,
  registerRequestMetricsHooks
} from "../../src/observability/metrics.js";
import { resolveRequestTraceMode } from "../../src/observability/request-tracing.js";

describe("observability/logger", () => {
  it("parses configured log levels", () => {
    expect(parseConfiguredLogLevel(" DEBUG ")).toBe("debug");
    expect(parseConfiguredLogLevel("verbose")).toBe("info");
    expect(parseConfiguredLogLevel(undefined)).toBe("info");
  });

  it("describes errors with kind and cause", () => {
    const error = new RetrievalError("transient", "PubMed request failed", { cause: new Error("socket hang up") });

    expect(describeError(error)).toEqual({
      error_name: "RetrievalError",
      error_message: "PubMed request failed",
      error_kind: "transient",
      error_cause: { name: "Error", message: "socket hang up" }
    });
    expect(describeError("plain")).toEqual({ error_raw: "plain" });
  });
});

describe("observability/metrics", () => {
  const apps: Array<ReturnType<typeof Fastify>> = [];

  afterEach(async () => {
    await Promise.all(apps.splice(0).map((app) => app.close()));
  });

  it("aggregates latencies, usage, cache counters and error rates", () => {
    recordRetrievalLatency(10);
    recordRetrievalLatency(30);
    recordOpenAIUsage({ promptTokens: 10, completionTokens: 5, totalTokens: 15 });
    recordOpenAIUsage({ totalTokens: 1 });
    recordCacheEvent("hits");
    recordCacheEvent("misses");
    recordCacheEvent("misses");
    recordDroppedRecords(2);
    recordDroppedRecords(-1);
    recordErrorRate("literature_transient");

    expect(getMetricsSnapshot()).toMatchObject({
      retrieval_latency: { count: 2, avgMs: 20, minMs: 10, maxMs: 30 },
      embedding_latency: { count: 0, avgMs: 0, minMs: 0, maxMs: 0 },
      openai_usage: { promptTokens: 10, completionTokens: 5, totalTokens: 16 },
      cache: { hits: 1, misses: 2, collapsed: 0, evictions: 0 },
      dropped_records: 2,
      error_rates: { literature_transient: 1 }
    });
  });

  it("records request latency and error statuses over HTTP", async () => {
    const app = Fastify({ logger: false });
    apps.push(app);
    registerRequestMetricsHooks(app);
    await registerMetricsRoutes(app);

    const missing = await app.inject({ method: "GET", url: "/missing" });
    expect(missing.statusCode).toBe(404);
    expect(missing.headers["x-request-id"]).toEqual(expect.any(String));

    const metrics = await app.inject({ method: "GET", url: "/metrics" });
    expect(metrics.json()).toMatchObject({
      request_latency: { count: 1 },
      error_rates: { http_404: 1 }
    });
  });
});

describe("observability/request-tracing", () => {
  it("resolves the trace mode from its setting", () => {
    expect(resolveRequestTraceMode("TRACE")).toBe("trace");
    expect(resolveRequestTraceMode(" debug ")).toBe("debug");
    expect(resolveRequestTraceMode("verbose")).toBe("off");
    vi.stubEnv("REQUEST_TRACE_MODE", "debug");
    expect(resolveRequestTraceMode()).toBe("debug");
  });
});
