import { LRUCache } from "lru-cache";
import { defaultLogger, describeError, type CorrelationContext, type Logger } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";
import type { ResultCache } from "../cache/result-cache.js";
import type { CacheEntry, CacheEntryDraft } from "../cache/types.js";
import { articleEmbeddingText } from "../embeddings/article-text.js";
import type { EmbeddingIndex } from "../embeddings/embedding-index.js";
import { EmbeddingError } from "../embeddings/errors.js";
import type { Embedding, EmbeddingCandidate } from "../embeddings/types.js";
import { RetrievalError } from "../literature/errors.js";
import { buildCacheKey, buildLiteratureQuery, clampMaxResults } from "../literature/query.js";
import type { LiteratureSource } from "../literature/retriever.js";
import type { ArticleRecord, LiteratureQuery, RankedArticle, ResultSet } from "../literature/types.js";
import { SummarizationError } from "../summaries/errors.js";
import { unavailableFinding, type Summarizer } from "../summaries/summarizer.js";
import type { Finding } from "../summaries/types.js";
import {
  NO_ARTICLES_MESSAGE,
  SEARCH_FIRST_MESSAGE,
  buildAnswerBlocks,
  buildArticleBlock,
  buildHeaderBlock,
  buildOmissionsLine,
  chunkBlocks
} from "./message-format.js";
import type { SearchHistory, SearchHistoryEntry } from "./search-history.js";
import type {
  AnswerSource,
  AskReply,
  AskRequest,
  Omissions,
  ReplyFailure,
  SearchReply,
  SearchRequest
} from "./types.js";

export interface OrchestratorSettings {
  defaultMaxResults: number;
  followupTopK: number;
  messageMaxChars: number;
}

export interface OrchestratorDependencies {
  source: LiteratureSource;
  embeddings: EmbeddingIndex;
  summarizer: Summarizer;
  cache: ResultCache;
  history: SearchHistory;
  settings: OrchestratorSettings;
  logger?: Logger;
}

const GENERIC_FAILURE_MESSAGE = "Sorry, an error occurred while processing your request. Please try again later.";
const ANSWER_UNAVAILABLE_MESSAGE = "An answer could not be generated right now. The articles below may still help.";
const EMPTY_QUESTION_MESSAGE = "Please provide a question about your latest search results.";
const MAX_TRACKED_CONVERSATIONS = 10_000;

const NO_OMISSIONS: Omissions = { droppedRecords: 0, unavailableSummaries: 0, unrankedArticles: 0 };

export const toReplyFailure = (error: unknown): ReplyFailure => {
  if (error instanceof RetrievalError) {
    switch (error.kind) {
      case "malformed_query":
        return {
          kind: error.kind,
          userMessage: "PubMed could not process this search. Try rephrasing it with different keywords or filters."
        };
      case "quota_exceeded":
        return {
          kind: error.kind,
          userMessage: "PubMed is limiting requests right now. Please wait a minute and try again."
        };
      case "transient":
        return {
          kind: error.kind,
          userMessage: "PubMed is temporarily unavailable. Please try again in a few minutes."
        };
    }
  }
  return { kind: "internal", userMessage: GENERIC_FAILURE_MESSAGE };
};

const isQuestion = (text: string): boolean => text.includes("?");

const omissionsFor = (entry: CacheEntry): Omissions => ({
  droppedRecords: entry.resultSet.droppedRecordCount,
  unavailableSummaries: entry.findings.filter((finding) => !finding.available).length,
  unrankedArticles: entry.embeddingFailures.length
});

/**
 * Drives the search and follow-up flows: cache lookup, retrieval, semantic
 * re-ranking, summarization and reply formatting.
 */
export class ConversationOrchestrator {
  private readonly source: LiteratureSource;

  private readonly embeddings: EmbeddingIndex;

  private readonly summarizer: Summarizer;

  private readonly cache: ResultCache;

  private readonly history: SearchHistory;

  private readonly settings: OrchestratorSettings;

  private readonly logger: Logger;

  private readonly latestRequest = new LRUCache<string, number>({ max: MAX_TRACKED_CONVERSATIONS });

  private requestSequence = 0;

  constructor(dependencies: OrchestratorDependencies) {
    this.source = dependencies.source;
    this.embeddings = dependencies.embeddings;
    this.summarizer = dependencies.summarizer;
    this.cache = dependencies.cache;
    this.history = dependencies.history;
    this.settings = dependencies.settings;
    this.logger = dependencies.logger ?? defaultLogger;
  }

  async search(request: SearchRequest): Promise<SearchReply> {
    const correlation: CorrelationContext = {
      requestId: request.requestId ?? null,
      conversationId: request.conversationId
    };
    const sequence = ++this.requestSequence;
    this.latestRequest.set(request.conversationId, sequence);

    try {
      const query = buildLiteratureQuery(request.text, request.filters);
      const maxResults = clampMaxResults(request.maxResults, this.settings.defaultMaxResults);
      const key = buildCacheKey(query, maxResults);
      this.history.record(query.normalized);

      const { entry, source, stored } = await this.cache.getOrLoad(
        key,
        () => this.assembleEntry(query, maxResults, correlation),
        {
          correlation,
          shouldStore: (draft) =>
            draft.resultSet.entries.length > 0 && draft.failedSummaryIds.length < draft.resultSet.entries.length
        }
      );

      if (entry.resultSet.entries.length === 0) {
        this.logger.info("chat.search.empty", correlation, { key, dropped_records: entry.resultSet.droppedRecordCount });
        return {
          status: "empty",
          messages: [NO_ARTICLES_MESSAGE],
          articleCount: 0,
          omitted: { ...NO_OMISSIONS, droppedRecords: entry.resultSet.droppedRecordCount },
          cached: false
        };
      }

      if (!stored) {
        this.logger.warn("chat.search.not_cached", correlation, { key });
      } else if (this.latestRequest.get(request.conversationId) === sequence) {
        this.cache.bindConversation(request.conversationId, key);
      } else {
        this.logger.info("chat.search.superseded", correlation, { key, sequence });
      }

      const answer = isQuestion(request.text) ? await this.answerFromEntry(request.text, entry, correlation) : undefined;
      const omitted = omissionsFor(entry);
      const messages = this.formatSearch(query, entry, omitted, answer);

      this.logger.info("chat.search.complete", correlation, {
        key,
        source,
        article_count: entry.resultSet.entries.length,
        message_count: messages.length,
        answered: answer !== undefined
      });

      return {
        status: "ok",
        messages,
        articleCount: entry.resultSet.entries.length,
        omitted,
        cached: source !== "load",
        ...(answer !== undefined ? { answer } : {})
      };
    } catch (error) {
      const failure = toReplyFailure(error);
      recordErrorRate(`search_${failure.kind}`);
      this.logger.error("chat.search.failed", correlation, { failure_kind: failure.kind, ...describeError(error) });
      return {
        status: "failed",
        messages: [failure.userMessage],
        articleCount: 0,
        omitted: NO_OMISSIONS,
        cached: false,
        failure
      };
    }
  }

  async ask(request: AskRequest): Promise<AskReply> {
    const correlation: CorrelationContext = {
      requestId: request.requestId ?? null,
      conversationId: request.conversationId
    };
    const question = request.question.trim();
    if (!question) {
      return { status: "no_context", messages: [EMPTY_QUESTION_MESSAGE], sources: [] };
    }

    const entry = this.cache.getForFollowup(request.conversationId);
    if (!entry) {
      this.logger.info("chat.ask.no_context", correlation, {});
      return { status: "no_context", messages: [SEARCH_FIRST_MESSAGE], sources: [] };
    }

    try {
      const context = await this.selectContext(question, entry, correlation);
      const answer = await this.summarizer.answer(
        question,
        context.map((ranked) => ranked.article),
        { correlation }
      );
      const sources: AnswerSource[] = context.map(({ article, score }) => ({
        id: article.id,
        title: article.title,
        url: article.url,
        score
      }));

      this.logger.info("chat.ask.complete", correlation, {
        key: entry.key,
        source_ids: sources.map((source) => source.id)
      });
      return {
        status: "ok",
        messages: chunkBlocks(buildAnswerBlocks(answer, sources), this.settings.messageMaxChars),
        sources
      };
    } catch (error) {
      const failure = toReplyFailure(error);
      recordErrorRate(`ask_${failure.kind}`);
      this.logger.error("chat.ask.failed", correlation, { failure_kind: failure.kind, ...describeError(error) });
      return { status: "failed", messages: [failure.userMessage], sources: [], failure };
    }
  }

  lookupArticle(id: string, requestId?: string): Promise<ArticleRecord | null> {
    return this.source.fetchArticle(id, { correlation: { requestId: requestId ?? null } });
  }

  recentSearches(limit: number): SearchHistoryEntry[] {
    return this.history.recent(limit);
  }

  private async assembleEntry(
    query: LiteratureQuery,
    maxResults: number,
    correlation: CorrelationContext
  ): Promise<CacheEntryDraft> {
    const retrieved = await this.source.search(query, maxResults, { correlation });
    if (retrieved.entries.length === 0) {
      return {
        query,
        resultSet: retrieved,
        embeddings: {},
        embeddingFailures: [],
        findings: [],
        failedSummaryIds: []
      };
    }

    const batch = await this.embeddings.embedBatch(
      retrieved.entries.map(({ article }) => ({ id: article.id, text: articleEmbeddingText(article) })),
      { correlation }
    );
    const embeddings: Record<string, Embedding> = {};
    for (const candidate of batch.embeddings) {
      embeddings[candidate.id] = candidate.embedding;
    }

    const resultSet = await this.rerank(query, retrieved, batch.embeddings, correlation);
    const articles = resultSet.entries.map(({ article }) => article);
    const { findings, failedSummaryIds } = await this.summarizeArticles(articles, correlation);

    return {
      query,
      resultSet,
      embeddings,
      embeddingFailures: batch.failures.map((failure) => failure.id),
      findings,
      failedSummaryIds
    };
  }

  /**
   * Orders the embedded articles by similarity to the query, keeping articles
   * without an embedding after them in retrieval order. The retrieval order is
   * returned unchanged when the query itself cannot be embedded.
   */
  private async rerank(
    query: LiteratureQuery,
    retrieved: ResultSet,
    candidates: readonly EmbeddingCandidate[],
    correlation: CorrelationContext
  ): Promise<ResultSet> {
    if (candidates.length === 0) {
      return retrieved;
    }

    try {
      const queryEmbedding = await this.embeddings.embed(query.text, { correlation });
      const scored = this.embeddings.rank(queryEmbedding, candidates, candidates.length);
      const byId = new Map(retrieved.entries.map((entry) => [entry.article.id, entry.article]));
      const ranked: RankedArticle[] = scored.flatMap(({ id, score }) => {
        const article = byId.get(id);
        return article ? [{ article, score }] : [];
      });
      const rankedIds = new Set(ranked.map((entry) => entry.article.id));
      const unranked = retrieved.entries
        .filter((entry) => !rankedIds.has(entry.article.id))
        .map((entry) => ({ article: entry.article, score: 0 }));
      return { ...retrieved, entries: [...ranked, ...unranked] };
    } catch (error) {
      if (!(error instanceof EmbeddingError)) {
        throw error;
      }
      this.logger.warn("chat.search.rerank_skipped", correlation, describeError(error));
      return retrieved;
    }
  }

  private async summarizeArticles(
    articles: readonly ArticleRecord[],
    correlation: CorrelationContext
  ): Promise<{ findings: Finding[]; failedSummaryIds: string[] }> {
    try {
      const result = await this.summarizer.summarize(articles, { correlation });
      return { findings: result.findings, failedSummaryIds: result.failedArticleIds };
    } catch (error) {
      if (!(error instanceof SummarizationError)) {
        throw error;
      }
      this.logger.warn("chat.search.summaries_unavailable", correlation, describeError(error));
      return {
        findings: articles.map((article) => unavailableFinding(article.id)),
        failedSummaryIds: articles.map((article) => article.id)
      };
    }
  }

  /**
   * Top `followupTopK` articles of the entry for a question. Falls back to
   * presentation order when the question cannot be embedded or ranked.
   */
  private async selectContext(
    question: string,
    entry: CacheEntry,
    correlation: CorrelationContext
  ): Promise<RankedArticle[]> {
    const topK = Math.max(1, this.settings.followupTopK);
    const fallback = entry.resultSet.entries.slice(0, topK);
    const candidates: EmbeddingCandidate[] = entry.resultSet.entries.flatMap(({ article }) => {
      const embedding = entry.embeddings[article.id];
      return embedding ? [{ id: article.id, embedding }] : [];
    });
    if (candidates.length === 0) {
      return fallback;
    }

    try {
      const questionEmbedding = await this.embeddings.embed(question, { correlation });
      const byId = new Map(entry.resultSet.entries.map((ranked) => [ranked.article.id, ranked.article]));
      return this.embeddings.rank(questionEmbedding, candidates, topK).flatMap(({ id, score }) => {
        const article = byId.get(id);
        return article ? [{ article, score }] : [];
      });
    } catch (error) {
      if (!(error instanceof EmbeddingError)) {
        throw error;
      }
      this.logger.warn("chat.ask.ranking_fallback", correlation, describeError(error));
      return fallback;
    }
  }

  private async answerFromEntry(
    question: string,
    entry: CacheEntry,
    correlation: CorrelationContext
  ): Promise<string> {
    const context = entry.resultSet.entries
      .slice(0, Math.max(1, this.settings.followupTopK))
      .map((ranked) => ranked.article);
    try {
      return await this.summarizer.answer(question, context, { correlation });
    } catch (error) {
      if (!(error instanceof SummarizationError)) {
        throw error;
      }
      this.logger.warn("chat.search.answer_unavailable", correlation, describeError(error));
      return ANSWER_UNAVAILABLE_MESSAGE;
    }
  }

  private formatSearch(
    query: LiteratureQuery,
    entry: CacheEntry,
    omitted: Omissions,
    answer: string | undefined
  ): string[] {
    const findingsById = new Map(entry.findings.map((finding) => [finding.articleId, finding]));
    const blocks = [
      buildHeaderBlock(query, answer),
      ...entry.resultSet.entries.map(({ article }, index) =>
        buildArticleBlock(index + 1, article, findingsById.get(article.id))
      )
    ];
    const omissions = buildOmissionsLine(omitted);
    if (omissions) {
      blocks.push(omissions);
    }
    return chunkBlocks(blocks, this.settings.messageMaxChars);
  }
}
