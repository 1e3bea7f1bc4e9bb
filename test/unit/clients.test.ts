import Fastify from "fastify";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  RequestTimeoutError,
  backoffDelayMs,
  isTransientProviderError,
  readErrorStatus,
  withRetries,
  withTimeout
} from "../../src/clients/request-control.js";
import { registerClientLifecycle, type ClientLifecycleModules } from "../../src/clients/lifecycle.js";
import { statusError } from "../../tests/helpers/stub-providers.js";

describe("clients/request-control", () => {
  it("classifies transient provider failures", () => {
    expect(isTransientProviderError(new RequestTimeoutError(50))).toBe(true);
    expect(isTransientProviderError(statusError(429, "slow down"))).toBe(true);
    expect(isTransientProviderError(statusError(503, "unavailable"))).toBe(true);
    expect(isTransientProviderError(statusError(400, "bad request"))).toBe(false);
    expect(isTransientProviderError(new Error("socket hang up"))).toBe(true);
    expect(isTransientProviderError(new Error("invalid schema"))).toBe(false);
    expect(readErrorStatus({ status: "500" })).toBeUndefined();
  });

  it("doubles the backoff delay per attempt", () => {
    expect([1, 2, 3].map((attempt) => backoffDelayMs(100, attempt))).toEqual([100, 200, 400]);
  });

  it("retries retryable failures with backoff and stops at maxAttempts", async () => {
    const sleeps: number[] = [];
    const operation = vi.fn(async (attempt: number) => {
      if (attempt < 3) {
        throw statusError(503, "unavailable");
      }
      return "done";
    });
    const onRetry = vi.fn();

    await expect(
      withRetries(operation, {
        maxAttempts: 3,
        baseDelayMs: 10,
        shouldRetry: isTransientProviderError,
        sleep: async (ms) => {
          sleeps.push(ms);
        },
        onRetry
      })
    ).resolves.toBe("done");
    expect(sleeps).toEqual([10, 20]);
    expect(onRetry).toHaveBeenCalledTimes(2);

    const failing = vi.fn(async () => {
      throw statusError(400, "bad request");
    });
    await expect(
      withRetries(failing, { maxAttempts: 3, baseDelayMs: 10, shouldRetry: isTransientProviderError, sleep: async () => {} })
    ).rejects.toThrow("bad request");
    expect(failing).toHaveBeenCalledTimes(1);
  });

  it("turns an expired timer into RequestTimeoutError", async () => {
    const pending = withTimeout(
      (signal) =>
        new Promise<string>((_resolve, reject) => {
          signal.addEventListener("abort", () => reject(new Error("aborted")));
        }),
      5
    );
    await expect(pending).rejects.toBeInstanceOf(RequestTimeoutError);
    await expect(withTimeout(async () => "fast", 1000)).resolves.toBe("fast");
  });
});

describe("clients/openai", () => {
  beforeEach(() => {
    vi.resetModules();
  });

  afterEach(() => {
    vi.doUnmock("openai");
    vi.doUnmock("../../src/config/index.js");
  });

  async function importOpenAIModule(overrides: { retrieve?: () => Promise<unknown> } = {}) {
    const embeddingsCreate = vi.fn();
    const completionsCreate = vi.fn();
    const retrieve = vi.fn(overrides.retrieve ?? (async () => ({ id: "chat-test" })));
    const OpenAIConstructor = vi.fn().mockImplementation(() => ({
      models: { retrieve },
      embeddings: { create: embeddingsCreate },
      chat: { completions: { create: completionsCreate } }
    }));

    vi.doMock("openai", () => ({ default: OpenAIConstructor }));
    vi.doMock("../../src/config/index.js", () => ({
      config: { OPENAI_API_KEY: "test-key", OPENAI_MODEL: "chat-test" }
    }));

    const mod = await import("../../src/clients/openai.js");
    return { mod, OpenAIConstructor, embeddingsCreate, completionsCreate, retrieve };
  }

  it("creates one client without SDK retries and reports health", async () => {
    const { mod, OpenAIConstructor, retrieve } = await importOpenAIModule();

    const first = await mod.getOpenAIClient();
    const second = await mod.getOpenAIClient();

    expect(first).toBe(second);
    expect(OpenAIConstructor).toHaveBeenCalledTimes(1);
    expect(OpenAIConstructor).toHaveBeenCalledWith({ apiKey: "test-key", maxRetries: 0 });
    await expect(first.healthCheck()).resolves.toEqual({ status: "ok" });
    expect(retrieve).toHaveBeenCalledWith("chat-test", { timeout: 7000 });

    await mod.shutdownOpenAIClient();
    await mod.getOpenAIClient();
    expect(OpenAIConstructor).toHaveBeenCalledTimes(2);
  });

  it("reports an unhealthy client with the failure message", async () => {
    const { mod } = await importOpenAIModule({
      retrieve: async () => {
        throw new Error("invalid api key");
      }
    });

    const client = await mod.getOpenAIClient();
    await expect(client.healthCheck()).resolves.toEqual({ status: "error", details: "invalid api key" });
  });

  it("maps embedding responses back to input order", async () => {
    const { mod, embeddingsCreate } = await importOpenAIModule();
    embeddingsCreate.mockResolvedValue({
      data: [
        { index: 1, embedding: [0, 1] },
        { index: 0, embedding: [1, 0] },
        { index: 7, embedding: [9, 9] }
      ]
    });
    const signal = new AbortController().signal;

    const provider = mod.createOpenAIEmbeddingProvider({ model: "embed-test" });
    const vectors = await provider.embedTexts(["first", "second", "third"], { signal });

    expect(vectors).toEqual([[1, 0], [0, 1], []]);
    expect(embeddingsCreate).toHaveBeenCalledWith({ model: "embed-test", input: ["first", "second", "third"] }, { signal });
  });

  it("sends completion requests and reads content and usage", async () => {
    const { mod, completionsCreate } = await importOpenAIModule();
    completionsCreate.mockResolvedValue({
      choices: [{ message: { content: [{ type: "text", text: "part one, " }, "part two"] } }],
      usage: { prompt_tokens: 12, completion_tokens: 4, total_tokens: 16 }
    });
    const signal = new AbortController().signal;

    const provider = mod.createOpenAICompletionProvider({ model: "chat-test" });
    const result = await provider.complete({ system: "sys", user: "usr", json: true, maxTokens: 300 }, { signal });

    expect(result).toEqual({
      content: "part one, part two",
      usage: { promptTokens: 12, completionTokens: 4, totalTokens: 16 }
    });
    expect(completionsCreate).toHaveBeenCalledWith(
      {
        model: "chat-test",
        temperature: 0.3,
        max_tokens: 300,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: "sys" },
          { role: "user", content: "usr" }
        ]
      },
      { signal }
    );
  });

  it("returns empty content when the completion has no choices", async () => {
    const { mod, completionsCreate } = await importOpenAIModule();
    completionsCreate.mockResolvedValue({ choices: [] });

    const provider = mod.createOpenAICompletionProvider({ model: "chat-test" });
    const result = await provider.complete({ system: "sys", user: "usr" }, { signal: new AbortController().signal });

    expect(result).toEqual({ content: "", usage: undefined });
  });
});

describe("clients/lifecycle", () => {
  const createModules = (status: "ok" | "error" = "ok") => {
    const healthCheck = vi.fn(async () => (status === "ok" ? { status } : { status, details: "unreachable" }));
    const modules: ClientLifecycleModules = {
      getOpenAIClient: vi.fn(async () => ({ healthCheck })),
      shutdownOpenAIClient: vi.fn(async () => {})
    };
    return { modules, healthCheck };
  };

  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
  });

  it("runs the ready hook, then the shutdown hook before closing clients", async () => {
    const { modules, healthCheck } = createModules();
    const calls: string[] = [];
    const app = Fastify({ logger: false });
    registerClientLifecycle(app, {
      enableBootstrap: false,
      registerProcessSignals: false,
      loadClientModules: async () => modules,
      onReady: async () => {
        calls.push("ready");
      },
      onShutdown: async () => {
        calls.push("shutdown");
      }
    });
    vi.mocked(modules.shutdownOpenAIClient).mockImplementation(async () => {
      calls.push("clients");
    });

    await app.ready();
    expect(healthCheck).not.toHaveBeenCalled();
    await app.close();

    expect(calls).toEqual(["ready", "shutdown", "clients"]);
  });

  it("fails startup when the bootstrap health check fails", async () => {
    const { modules } = createModules("error");
    const app = Fastify({ logger: false });
    registerClientLifecycle(app, {
      enableBootstrap: true,
      registerProcessSignals: false,
      loadClientModules: async () => modules
    });

    await expect(app.ready()).rejects.toThrow("OpenAI health check failed: unreachable");
  });

  it("passes startup when the bootstrap health check succeeds", async () => {
    const { modules, healthCheck } = createModules();
    const app = Fastify({ logger: false });
    registerClientLifecycle(app, {
      enableBootstrap: true,
      registerProcessSignals: false,
      loadClientModules: async () => modules
    });

    await app.ready();
    expect(healthCheck).toHaveBeenCalledTimes(1);
    await app.close();
  });
});
