import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { parseEnv } from "../../src/config/env.js";
import type { Logger } from "../../src/observability/logger.js";
import { createPipeline } from "../../src/pipeline.js";
import { buildEfetchXml, createFakePubMed, esearchBody } from "../../tests/helpers/pubmed-fixtures.js";
import {
  createKeywordEmbeddingProvider,
  createStubCompletionProvider,
  echoFindingsHandler
} from "../../tests/helpers/stub-providers.js";
import { VirtualClock } from "../../tests/helpers/virtual-clock.js";

const VOCABULARY = ["crispr", "cancer", "therapy", "resistance"];

const createSpyLogger = (): Logger => ({
  trace: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn()
});

const createFakeEutils = () =>
  createFakePubMed({
    esearch: () => ({ status: 200, body: esearchBody(["101", "102"]) }),
    efetch: () => ({
      status: 200,
      body: buildEfetchXml([
        {
          pmid: "101",
          title: "CRISPR cancer therapy trial",
          abstract: "CRISPR therapy in cancer.",
          authors: [{ last: "Doe", fore: "Jane" }],
          journal: "Journal of Tests",
          year: "2024"
        },
        {
          pmid: "102",
          title: "Resistance to cancer therapy",
          abstract: "Resistance mechanisms.",
          authors: [{ last: "Roe", fore: "Rick" }],
          journal: "Journal of Tests",
          year: "2023"
        }
      ])
    })
  });

describe("createPipeline", () => {
  const tempDirs: string[] = [];

  afterEach(async () => {
    await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
  });

  const makeSettings = async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "literature-cache-"));
    tempDirs.push(dir);
    const snapshotFile = path.join(dir, "nested", "cache.json");
    return {
      snapshotFile,
      settings: parseEnv({
        OPENAI_API_KEY: "test-key",
        NCBI_EMAIL: "test@example.com",
        CACHE_SNAPSHOT_FILE: snapshotFile,
        RETRIEVAL_MIN_INTERVAL_MS: "0"
      })
    };
  };

  const build = (settings: ReturnType<typeof parseEnv>, logger: Logger = createSpyLogger()) => {
    const eutils = createFakeEutils();
    const clock = new VirtualClock(1_000);
    const pipeline = createPipeline(settings, {
      fetch: eutils.fetch,
      embeddingProvider: createKeywordEmbeddingProvider(VOCABULARY),
      completionProvider: createStubCompletionProvider(echoFindingsHandler),
      clock,
      logger
    });
    return { pipeline, eutils };
  };

  it("searches PubMed through the wired retriever, index and summarizer", async () => {
    const { settings } = await makeSettings();
    const { pipeline, eutils } = build(settings);

    const reply = await pipeline.orchestrator.search({ conversationId: "conv-1", text: "CRISPR cancer therapy" });

    expect(reply.status).toBe("ok");
    expect(reply.articleCount).toBe(2);
    expect(reply.messages[0]).toContain("1. CRISPR cancer therapy trial\n   Doe, Jane (2024) - Journal of Tests\n   - Key finding of art_1.");
    expect(eutils.calls.map((url) => url.pathname.split("/").at(-1))).toEqual(["esearch.fcgi", "efetch.fcgi"]);
    expect(eutils.calls[0]?.searchParams.get("email")).toBe("test@example.com");
    expect(eutils.calls[0]?.searchParams.get("retmax")).toBe("5");
  });

  it("persists the cache on shutdown and restores it on the next start", async () => {
    const { settings, snapshotFile } = await makeSettings();
    const first = build(settings);
    await first.pipeline.orchestrator.search({ conversationId: "conv-1", text: "CRISPR cancer therapy" });
    await first.pipeline.persistCache();

    const saved: unknown = JSON.parse(await fs.readFile(snapshotFile, "utf8"));
    expect(saved).toMatchObject({ version: 1, conversations: { "conv-1": "crispr cancer therapy|n=5" } });

    const second = build(settings);
    await second.pipeline.restoreCache();
    expect(second.pipeline.cache.size).toBe(1);

    const followup = await second.pipeline.orchestrator.ask({ conversationId: "conv-1", question: "What about resistance?" });
    expect(followup.status).toBe("ok");
    expect(followup.sources[0]?.id).toBe("102");

    const repeat = await second.pipeline.orchestrator.search({ conversationId: "conv-2", text: "crispr cancer therapy" });
    expect(repeat.cached).toBe(true);
    expect(second.eutils.calls).toHaveLength(0);
  });

  it("starts with an empty cache when the snapshot is unreadable", async () => {
    const { settings, snapshotFile } = await makeSettings();
    await fs.mkdir(path.dirname(snapshotFile), { recursive: true });
    await fs.writeFile(snapshotFile, "{not json", "utf8");
    const logger = createSpyLogger();
    const { pipeline } = build(settings, logger);

    await expect(pipeline.restoreCache()).resolves.toBeUndefined();

    expect(pipeline.cache.size).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith(
      "cache.snapshot.restore_failed",
      {},
      expect.objectContaining({ error_name: "CacheError", error_kind: "unavailable" })
    );
  });

  it("skips persistence when no snapshot file is configured", async () => {
    const settings = parseEnv({ OPENAI_API_KEY: "test-key", NCBI_EMAIL: "test@example.com" });
    const { pipeline } = build(settings);

    expect(pipeline.snapshotStore).toBeNull();
    await expect(pipeline.persistCache()).resolves.toBeUndefined();
    await expect(pipeline.restoreCache()).resolves.toBeUndefined();
  });
});
