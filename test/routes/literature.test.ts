import Fastify from "fastify";
import { afterEach, describe, expect, it, vi } from "vitest";
import { registerLiteratureRoutes, type LiteratureOrchestratorPort } from "../../src/api/routes/literature.js";
import type { AskReply, FailureKind, SearchReply } from "../../src/modules/chat/types.js";
import { RetrievalError } from "../../src/modules/literature/errors.js";
import { makeArticle } from "../../tests/helpers/pubmed-fixtures.js";

const OK_SEARCH: SearchReply = {
  status: "ok",
  messages: ["Literature review: crispr\n\n1. CRISPR cancer therapy trial"],
  articleCount: 1,
  omitted: { droppedRecords: 1, unavailableSummaries: 0, unrankedArticles: 0 },
  cached: false
};

const OK_ASK: AskReply = {
  status: "ok",
  messages: ["Answer:\nSynthesized answer [1]."],
  sources: [{ id: "102", title: "CRISPR cancer therapy trial", url: "https://pubmed.ncbi.nlm.nih.gov/102/", score: 0.5 }]
};

const FAILURE_CASES: Array<[FailureKind, number]> = [
  ["quota_exceeded", 429],
  ["malformed_query", 400],
  ["transient", 503],
  ["internal", 500]
];

const createOrchestrator = () => ({
  search: vi.fn<LiteratureOrchestratorPort["search"]>(async () => OK_SEARCH),
  ask: vi.fn<LiteratureOrchestratorPort["ask"]>(async () => OK_ASK),
  lookupArticle: vi.fn<LiteratureOrchestratorPort["lookupArticle"]>(async () => null),
  recentSearches: vi.fn<LiteratureOrchestratorPort["recentSearches"]>(() => [])
});

describe("literature routes", () => {
  const apps: Array<ReturnType<typeof Fastify>> = [];

  afterEach(async () => {
    await Promise.all(apps.splice(0).map((app) => app.close()));
  });

  const buildTestApp = async (orchestrator: LiteratureOrchestratorPort) => {
    const app = Fastify({ logger: false });
    apps.push(app);
    await registerLiteratureRoutes(app, { getOrchestrator: () => orchestrator });
    return app;
  };

  it("passes a search with filters to the orchestrator and shapes the reply", async () => {
    const orchestrator = createOrchestrator();
    const app = await buildTestApp(orchestrator);

    const response = await app.inject({
      method: "POST",
      url: "/api/search",
      headers: { "x-request-id": " req-42 " },
      payload: {
        conversation_id: "conv-1",
        query: "  crispr ",
        max_results: 3,
        date_from: "2020",
        date_to: " ",
        journal: null
      }
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      status: "ok",
      messages: OK_SEARCH.messages,
      article_count: 1,
      omitted: { dropped_records: 1, unavailable_summaries: 0, unranked_articles: 0 },
      cached: false
    });
    expect(orchestrator.search).toHaveBeenCalledWith({
      conversationId: "conv-1",
      text: "crispr",
      maxResults: 3,
      filters: { dateFrom: "2020" },
      requestId: "req-42"
    });
  });

  it("includes the answer when the search produced one", async () => {
    const orchestrator = createOrchestrator();
    orchestrator.search.mockResolvedValue({ ...OK_SEARCH, answer: "It works [1]." });
    const app = await buildTestApp(orchestrator);

    const response = await app.inject({
      method: "POST",
      url: "/api/search",
      payload: { conversation_id: "conv-1", query: "does it work?" }
    });

    expect(response.json()).toMatchObject({ answer: "It works [1]." });
    expect(orchestrator.search.mock.calls[0]?.[0].filters).toBeUndefined();
  });

  it("rejects invalid search bodies with field details", async () => {
    const orchestrator = createOrchestrator();
    const app = await buildTestApp(orchestrator);

    const response = await app.inject({
      method: "POST",
      url: "/api/search",
      payload: { conversation_id: "conv-1", query: "   ", max_results: 0 }
    });

    expect(response.statusCode).toBe(422);
    expect(response.json()).toEqual({
      detail: [
        { type: "too_small", loc: ["body", "query"], msg: "query is required" },
        { type: "too_small", loc: ["body", "max_results"], msg: "Number must be greater than or equal to 1" }
      ]
    });
    expect(orchestrator.search).not.toHaveBeenCalled();
  });

  it.each(FAILURE_CASES)("maps a %s failure to HTTP %i", async (kind, status) => {
    const orchestrator = createOrchestrator();
    orchestrator.search.mockResolvedValue({
      status: "failed",
      messages: ["Try again."],
      articleCount: 0,
      omitted: { droppedRecords: 0, unavailableSummaries: 0, unrankedArticles: 0 },
      cached: false,
      failure: { kind, userMessage: "Try again." }
    });
    const app = await buildTestApp(orchestrator);

    const response = await app.inject({
      method: "POST",
      url: "/api/search",
      payload: { conversation_id: "conv-1", query: "crispr" }
    });

    expect(response.statusCode).toBe(status);
    expect(response.json()).toEqual({ detail: "Try again.", kind });
  });

  it("answers follow-up questions", async () => {
    const orchestrator = createOrchestrator();
    const app = await buildTestApp(orchestrator);

    const response = await app.inject({
      method: "POST",
      url: "/api/ask",
      payload: { conversation_id: "conv-1", question: " What about safety? " }
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: "ok", messages: OK_ASK.messages, sources: OK_ASK.sources });
    expect(orchestrator.ask).toHaveBeenCalledWith({
      conversationId: "conv-1",
      question: "What about safety?",
      requestId: expect.any(String)
    });
  });

  it("returns no_context replies as a successful response", async () => {
    const orchestrator = createOrchestrator();
    orchestrator.ask.mockResolvedValue({ status: "no_context", messages: ["Run a search first."], sources: [] });
    const app = await buildTestApp(orchestrator);

    const response = await app.inject({
      method: "POST",
      url: "/api/ask",
      payload: { conversation_id: "conv-1", question: "Why?" }
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: "no_context", messages: ["Run a search first."], sources: [] });
  });

  it("looks up single articles", async () => {
    const orchestrator = createOrchestrator();
    orchestrator.lookupArticle.mockImplementation(async (id) => (id === "102" ? makeArticle("102") : null));
    const app = await buildTestApp(orchestrator);

    const found = await app.inject({ method: "GET", url: "/api/articles/102" });
    const missing = await app.inject({ method: "GET", url: "/api/articles/999" });
    const invalid = await app.inject({ method: "GET", url: "/api/articles/abc" });

    expect(found.statusCode).toBe(200);
    expect(found.json()).toMatchObject({ id: "102", title: "Article 102" });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ detail: "Article not found" });
    expect(invalid.statusCode).toBe(422);
    expect(invalid.json()).toEqual({
      detail: [{ type: "invalid_string", loc: ["path", "pmid"], msg: "pmid must be numeric" }]
    });
  });

  it("maps article lookup failures", async () => {
    const orchestrator = createOrchestrator();
    orchestrator.lookupArticle.mockRejectedValue(new RetrievalError("transient", "PubMed down"));
    const app = await buildTestApp(orchestrator);

    const response = await app.inject({ method: "GET", url: "/api/articles/102" });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toEqual({
      detail: "PubMed is temporarily unavailable. Please try again in a few minutes.",
      kind: "transient"
    });
  });

  it("lists recent searches", async () => {
    const orchestrator = createOrchestrator();
    orchestrator.recentSearches.mockReturnValue([
      { query: "crispr", count: 2, lastSearchedAt: "2024-01-01T00:00:00.000Z" }
    ]);
    const app = await buildTestApp(orchestrator);

    const response = await app.inject({ method: "GET", url: "/api/searches/recent?limit=5" });
    const invalid = await app.inject({ method: "GET", url: "/api/searches/recent?limit=0" });

    expect(response.json()).toEqual({
      searches: [{ query: "crispr", count: 2, lastSearchedAt: "2024-01-01T00:00:00.000Z" }]
    });
    expect(orchestrator.recentSearches).toHaveBeenCalledWith(5);
    expect(invalid.statusCode).toBe(422);
  });
});
