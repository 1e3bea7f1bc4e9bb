import {
  isTransientProviderError,
  readErrorStatus,
  withRetries,
  withTimeout,
  type Sleep
} from "../../clients/request-control.js";
import { defaultLogger, type CorrelationContext, type Logger } from "../../observability/logger.js";
import { recordDroppedRecords, recordErrorRate, recordRetrievalLatency } from "../../observability/metrics.js";
import { HttpStatusError, RetrievalError, UnreadableResponseError } from "./errors.js";
import type { IntervalGate } from "./interval-gate.js";
import { parseEfetchArticles, parseEsearchPage, type EsearchPage, type ParsedArticles } from "./pubmed-parser.js";
import { clampMaxResults, toPubMedSearchParams } from "./query.js";
import type { ArticleRecord, LiteratureQuery, RankedArticle, ResultSet } from "./types.js";

export type FetchLike = (url: string, init: { signal: AbortSignal; headers: Record<string, string> }) => Promise<{
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}>;

export interface PubMedSettings {
  baseUrl: string;
  tool: string;
  email: string;
  apiKey?: string;
  pageSize: number;
  timeoutMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  defaultMaxResults?: number;
}

export interface RetrieverDependencies {
  gate: IntervalGate;
  settings: PubMedSettings;
  fetch?: FetchLike;
  sleep?: Sleep;
  now?: () => number;
  logger?: Logger;
}

export interface SearchOptions {
  correlation?: CorrelationContext;
}

/**
 * Literature source contract consumed by the orchestrator. The PubMed
 * implementation is {@link ArticleRetriever}; tests substitute in-process stubs.
 */
export interface LiteratureSource {
  search(query: LiteratureQuery, maxResults: number, options?: SearchOptions): Promise<ResultSet>;
  fetchArticle(id: string, options?: SearchOptions): Promise<ArticleRecord | null>;
}

const DEFAULT_MAX_RESULTS = 10;

const classifyHttpFailure = (status: number, body: string): RetrievalError | HttpStatusError => {
  if (status === 429) {
    return new RetrievalError("quota_exceeded", "PubMed rejected the request: call quota exceeded.");
  }
  if (status === 400 || status === 414) {
    return new RetrievalError("malformed_query", `PubMed rejected the query (${status}).`);
  }
  return new HttpStatusError(status, `PubMed request failed (${status}): ${body.slice(0, 200)}`);
};

const readEsearchBody = (body: string): EsearchPage => {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new UnreadableResponseError("PubMed returned an unreadable search response.", { cause: error });
  }

  const page = parseEsearchPage(json);
  if (!page) {
    throw new UnreadableResponseError("PubMed returned an unexpected search response.");
  }
  if (page.error) {
    if (/rate limit|too many/i.test(page.error)) {
      throw new RetrievalError("quota_exceeded", `PubMed rejected the request: ${page.error}`);
    }
    if (page.ids.length === 0) {
      throw new RetrievalError("malformed_query", `PubMed could not process the query: ${page.error}`);
    }
  }
  return page;
};

const toRankedEntries = (records: ArticleRecord[]): RankedArticle[] =>
  records.map((article, index) => ({
    article,
    score: (records.length - index) / records.length
  }));

export class ArticleRetriever implements LiteratureSource {
  private readonly gate: IntervalGate;

  private readonly settings: PubMedSettings;

  private readonly fetchImpl: FetchLike;

  private readonly sleep: Sleep | undefined;

  private readonly now: () => number;

  private readonly logger: Logger;

  constructor(dependencies: RetrieverDependencies) {
    this.gate = dependencies.gate;
    this.settings = dependencies.settings;
    this.fetchImpl = dependencies.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = dependencies.sleep;
    this.now = dependencies.now ?? Date.now;
    this.logger = dependencies.logger ?? defaultLogger;
  }

  async search(query: LiteratureQuery, maxResults: number, options: SearchOptions = {}): Promise<ResultSet> {
    if (!query.normalized.trim()) {
      throw new RetrievalError("malformed_query", "Search text is empty.");
    }

    const startedAt = this.now();
    const correlation = options.correlation ?? {};
    const limit = clampMaxResults(maxResults, this.settings.defaultMaxResults ?? DEFAULT_MAX_RESULTS);
    const searchParams = toPubMedSearchParams(query);
    const records: ArticleRecord[] = [];
    const seenIds = new Set<string>();
    let droppedRecordCount = 0;
    let totalAvailable = 0;
    let retstart = 0;
    let pages = 0;

    while (records.length < limit) {
      const retmax = Math.min(this.settings.pageSize, limit - records.length);
      const page = await this.esearch({ ...searchParams, retstart: String(retstart), retmax: String(retmax) }, correlation);
      pages += 1;
      totalAvailable = page.count;
      if (page.ids.length === 0) {
        break;
      }

      const freshIds = page.ids.filter((id) => !seenIds.has(id));
      freshIds.forEach((id) => seenIds.add(id));
      if (freshIds.length > 0) {
        const parsed = await this.efetch(freshIds, correlation);
        const byId = new Map(parsed.records.map((record) => [record.id, record]));
        const ordered = freshIds.flatMap((id) => {
          const record = byId.get(id);
          return record ? [record] : [];
        });
        // ids esearch listed but efetch did not return count as dropped too
        droppedRecordCount += parsed.droppedCount + Math.max(0, freshIds.length - ordered.length - parsed.droppedCount);
        records.push(...ordered.slice(0, limit - records.length));
      }

      retstart += page.ids.length;
      if (retstart >= page.count) {
        break;
      }
    }

    const latencyMs = this.now() - startedAt;
    recordRetrievalLatency(latencyMs);
    recordDroppedRecords(droppedRecordCount);
    this.logger.info("literature.search.complete", correlation, {
      query: query.normalized,
      max_results: limit,
      result_count: records.length,
      dropped_record_count: droppedRecordCount,
      total_available: totalAvailable,
      pages,
      latency_ms: latencyMs
    });
    if (droppedRecordCount > 0) {
      this.logger.warn("literature.search.dropped_records", correlation, {
        query: query.normalized,
        dropped_record_count: droppedRecordCount
      });
    }

    return {
      query,
      entries: toRankedEntries(records),
      droppedRecordCount,
      totalAvailable
    };
  }

  async fetchArticle(id: string, options: SearchOptions = {}): Promise<ArticleRecord | null> {
    const pmid = id.trim();
    if (!/^\d+$/.test(pmid)) {
      throw new RetrievalError("malformed_query", "PubMed ids are numeric.");
    }

    const parsed = await this.efetch([pmid], options.correlation ?? {});
    return parsed.records.find((record) => record.id === pmid) ?? null;
  }

  private buildUrl(endpoint: string, params: Record<string, string>): string {
    const url = new URL(`${this.settings.baseUrl.replace(/\/+$/, "")}/${endpoint}`);
    const query = new URLSearchParams({
      db: "pubmed",
      ...params,
      tool: this.settings.tool,
      email: this.settings.email
    });
    if (this.settings.apiKey) {
      query.set("api_key", this.settings.apiKey);
    }
    url.search = query.toString();
    return url.toString();
  }

  private esearch(params: Record<string, string>, correlation: CorrelationContext): Promise<EsearchPage> {
    return this.request("esearch.fcgi", { ...params, retmode: "json" }, correlation, readEsearchBody);
  }

  private efetch(ids: string[], correlation: CorrelationContext): Promise<ParsedArticles> {
    return this.request(
      "efetch.fcgi",
      { id: ids.join(","), rettype: "abstract", retmode: "xml" },
      correlation,
      parseEfetchArticles
    );
  }

  /** One gated, retried call; `parse` runs inside the retry so an unreadable body is retried too. */
  private async request<T>(
    endpoint: string,
    params: Record<string, string>,
    correlation: CorrelationContext,
    parse: (body: string) => T
  ): Promise<T> {
    const url = this.buildUrl(endpoint, params);

    try {
      return await withRetries(
        () =>
          this.gate.run(() =>
            withTimeout(async (signal) => {
              const response = await this.fetchImpl(url, {
                signal,
                headers: { Accept: endpoint === "efetch.fcgi" ? "application/xml" : "application/json" }
              });
              const text = await response.text();
              if (!response.ok) {
                throw classifyHttpFailure(response.status, text);
              }
              return parse(text);
            }, this.settings.timeoutMs)
          ),
        {
          maxAttempts: this.settings.maxAttempts,
          baseDelayMs: this.settings.backoffBaseMs,
          sleep: this.sleep,
          shouldRetry: (error) =>
            error instanceof UnreadableResponseError ||
            (!(error instanceof RetrievalError) && isTransientProviderError(error)),
          onRetry: ({ attempt, delayMs, error }) => {
            recordErrorRate("literature_request_retry");
            this.logger.warn("literature.request.retry", correlation, {
              endpoint,
              attempt,
              delay_ms: delayMs,
              status: readErrorStatus(error) ?? null,
              error: error instanceof Error ? error.message : String(error)
            });
          }
        }
      );
    } catch (error) {
      if (error instanceof RetrievalError) {
        recordErrorRate(`literature_${error.kind}`);
        throw error;
      }
      recordErrorRate("literature_transient");
      const message = error instanceof Error ? error.message : "unknown error";
      throw new RetrievalError("transient", `PubMed request failed after retries: ${message}`, { cause: error });
    }
  }
}
