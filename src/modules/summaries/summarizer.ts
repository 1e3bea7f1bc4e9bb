import {
  isTransientProviderError,
  withRetries,
  withTimeout,
  type Sleep
} from "../../clients/request-control.js";
import { defaultLogger, type CorrelationContext, type Logger } from "../../observability/logger.js";
import { recordErrorRate, recordOpenAIUsage, recordSummarizationLatency } from "../../observability/metrics.js";
import {
  ANSWER_SYSTEM_PROMPT,
  FINDINGS_SYSTEM_PROMPT,
  buildAnswerUserPrompt,
  buildFindingsSection,
  buildFindingsUserPrompt
} from "../../prompts/index.js";
import type { ArticleRecord } from "../literature/types.js";
import { SummarizationError } from "./errors.js";
import { parseFindingsResponse } from "./finding-parser.js";
import type { CompletionProvider, CompletionRequest, Finding, SummarizeResult } from "./types.js";

export const SUMMARY_UNAVAILABLE = "Summary unavailable.";
export const NO_CONTEXT_ANSWER = "There are no articles available to answer this question.";

export interface SummarizerSettings {
  /** Upper bound on the article sections of one findings prompt. */
  contextBudgetChars: number;
  timeoutMs: number;
  backoffMs: number;
  answerAbstractMaxChars?: number;
}

export interface SummarizerDependencies {
  provider: CompletionProvider;
  settings: SummarizerSettings;
  sleep?: Sleep;
  now?: () => number;
  logger?: Logger;
}

export interface SummarizeOptions {
  correlation?: CorrelationContext;
}

type BatchItem = {
  tempId: string;
  article: ArticleRecord;
  section: string;
};

// one retry on a transient provider error
const PROVIDER_ATTEMPTS = 2;
const SECTION_SEPARATOR_CHARS = 2;
const DEFAULT_ANSWER_ABSTRACT_MAX_CHARS = 1500;

export const unavailableFinding = (articleId: string): Finding => ({
  articleId,
  claims: [SUMMARY_UNAVAILABLE],
  available: false
});

export class Summarizer {
  private readonly provider: CompletionProvider;

  private readonly settings: SummarizerSettings;

  private readonly sleep: Sleep | undefined;

  private readonly now: () => number;

  private readonly logger: Logger;

  constructor(dependencies: SummarizerDependencies) {
    this.provider = dependencies.provider;
    this.settings = dependencies.settings;
    this.sleep = dependencies.sleep;
    this.now = dependencies.now ?? Date.now;
    this.logger = dependencies.logger ?? defaultLogger;
  }

  /**
   * Splits the articles into batches that fit the context budget and
   * summarizes them one batch after another. A batch that still fails after
   * the retry yields unavailable findings and lists its article ids in
   * `failedArticleIds`; only when every batch fails does the call throw.
   */
  async summarize(articles: readonly ArticleRecord[], options: SummarizeOptions = {}): Promise<SummarizeResult> {
    if (articles.length === 0) {
      return { findings: [], failedArticleIds: [] };
    }

    const correlation = options.correlation ?? {};
    const batches = this.buildBatches(articles);
    const findingsById = new Map<string, Finding>();
    const failedArticleIds: string[] = [];
    let lastError: SummarizationError | null = null;

    for (const [batchIndex, batch] of batches.entries()) {
      try {
        for (const finding of await this.summarizeBatch(batch, correlation)) {
          findingsById.set(finding.articleId, finding);
        }
      } catch (error) {
        const ids = batch.map((item) => item.article.id);
        lastError =
          error instanceof SummarizationError
            ? error
            : new SummarizationError("provider", "Summarization failed.", { cause: error, articleIds: ids });
        failedArticleIds.push(...ids);
        recordErrorRate("summarization_batch_failed");
        this.logger.warn("summaries.batch.failed", correlation, {
          batch_index: batchIndex,
          batch_count: batches.length,
          article_ids: ids,
          error: lastError.message
        });
      }
    }

    if (failedArticleIds.length === articles.length && lastError) {
      throw new SummarizationError("provider", `Summarization failed for every batch: ${lastError.message}`, {
        cause: lastError,
        articleIds: failedArticleIds
      });
    }

    const findings = articles.map((article) => findingsById.get(article.id) ?? unavailableFinding(article.id));
    this.logger.info("summaries.summarize.complete", correlation, {
      article_count: articles.length,
      batch_count: batches.length,
      available_count: findings.filter((finding) => finding.available).length,
      failed_article_ids: failedArticleIds
    });

    return { findings, failedArticleIds };
  }

  async answer(
    question: string,
    contextArticles: readonly ArticleRecord[],
    options: SummarizeOptions = {}
  ): Promise<string> {
    const trimmedQuestion = question.trim();
    if (contextArticles.length === 0) {
      return NO_CONTEXT_ANSWER;
    }

    const content = await this.complete(
      {
        system: ANSWER_SYSTEM_PROMPT,
        user: buildAnswerUserPrompt(
          trimmedQuestion,
          contextArticles,
          this.settings.answerAbstractMaxChars ?? DEFAULT_ANSWER_ABSTRACT_MAX_CHARS
        ),
        temperature: 0.3
      },
      contextArticles.map((article) => article.id),
      options.correlation ?? {}
    );

    const answer = content.trim();
    if (!answer) {
      throw new SummarizationError("unparseable", "The model returned an empty answer.", {
        articleIds: contextArticles.map((article) => article.id)
      });
    }
    return answer;
  }

  /** Section text for one article, with the abstract cut so the section alone fits the budget. */
  private fittedSection(article: ArticleRecord, tempId: string): string {
    const budget = this.settings.contextBudgetChars;
    const full = buildFindingsSection({ tempId, article, abstract: article.abstract });
    if (full.length <= budget) {
      return full;
    }
    const keep = Math.max(0, article.abstract.length - (full.length - budget));
    return buildFindingsSection({ tempId, article, abstract: article.abstract.slice(0, keep) });
  }

  private buildBatches(articles: readonly ArticleRecord[]): BatchItem[][] {
    const budget = this.settings.contextBudgetChars;
    const batches: BatchItem[][] = [];
    let current: BatchItem[] = [];
    let used = 0;

    for (const article of articles) {
      let tempId = `art_${current.length + 1}`;
      let section = this.fittedSection(article, tempId);

      if (current.length > 0 && used + SECTION_SEPARATOR_CHARS + section.length > budget) {
        batches.push(current);
        current = [];
        used = 0;
        tempId = "art_1";
        section = this.fittedSection(article, tempId);
      }

      used += (current.length > 0 ? SECTION_SEPARATOR_CHARS : 0) + section.length;
      current.push({ tempId, article, section });
    }

    if (current.length > 0) {
      batches.push(current);
    }
    return batches;
  }

  private async summarizeBatch(batch: BatchItem[], correlation: CorrelationContext): Promise<Finding[]> {
    const ids = batch.map((item) => item.tempId);
    const content = await this.complete(
      {
        system: FINDINGS_SYSTEM_PROMPT,
        user: buildFindingsUserPrompt(
          batch.map((item) => item.section),
          ids
        ),
        json: true,
        temperature: 0.3
      },
      batch.map((item) => item.article.id),
      correlation
    );

    const claimsByTempId = parseFindingsResponse(content);
    if (!claimsByTempId) {
      recordErrorRate("summarization_unparseable");
      this.logger.warn("summaries.batch.unparseable", correlation, {
        article_ids: batch.map((item) => item.article.id),
        content_chars: content.length
      });
    }

    return batch.map((item) => {
      const claims = claimsByTempId?.get(item.tempId.toLowerCase()) ?? [];
      return claims.length > 0
        ? { articleId: item.article.id, claims, available: true }
        : unavailableFinding(item.article.id);
    });
  }

  private async complete(request: CompletionRequest, articleIds: string[], correlation: CorrelationContext): Promise<string> {
    const startedAt = this.now();
    try {
      const result = await withRetries(
        () => withTimeout((signal) => this.provider.complete(request, { signal }), this.settings.timeoutMs),
        {
          maxAttempts: PROVIDER_ATTEMPTS,
          baseDelayMs: this.settings.backoffMs,
          sleep: this.sleep,
          shouldRetry: isTransientProviderError,
          onRetry: ({ attempt, delayMs, error }) => {
            recordErrorRate("summarization_request_retry");
            this.logger.warn("summaries.request.retry", correlation, {
              attempt,
              delay_ms: delayMs,
              article_ids: articleIds,
              error: error instanceof Error ? error.message : String(error)
            });
          }
        }
      );
      if (result.usage) {
        recordOpenAIUsage(result.usage);
      }
      return result.content;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SummarizationError("provider", `Completion provider failed: ${message}`, {
        cause: error,
        articleIds
      });
    } finally {
      recordSummarizationLatency(this.now() - startedAt);
    }
  }
}
