import {
  isTransientProviderError,
  readErrorStatus,
  withRetries,
  withTimeout,
  type Sleep
} from "../../clients/request-control.js";
import { defaultLogger, type CorrelationContext, type Logger } from "../../observability/logger.js";
import { recordEmbeddingLatency, recordErrorRate } from "../../observability/metrics.js";
import { EmbeddingError } from "./errors.js";
import { rankBySimilarity } from "./similarity.js";
import type {
  Embedding,
  EmbeddingCandidate,
  EmbeddingInput,
  EmbeddingProvider,
  ScoredId
} from "./types.js";

export interface EmbeddingIndexSettings {
  maxInputChars: number;
  timeoutMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  batchSize?: number;
}

export interface EmbeddingIndexDependencies {
  provider: EmbeddingProvider;
  settings: EmbeddingIndexSettings;
  sleep?: Sleep;
  now?: () => number;
  logger?: Logger;
}

export interface EmbedOptions {
  correlation?: CorrelationContext;
}

export type EmbeddingFailure = {
  id: string;
  error: EmbeddingError;
};

export type EmbedBatchResult = {
  embeddings: EmbeddingCandidate[];
  failures: EmbeddingFailure[];
};

const DEFAULT_BATCH_SIZE = 64;
const INPUT_TOO_LONG_PATTERN = /maximum context length|too long|too many tokens|reduce the length/i;

const toEmbeddingError = (error: unknown): EmbeddingError => {
  if (error instanceof EmbeddingError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  const status = readErrorStatus(error);
  if ((status === 400 || status === 413) && INPUT_TOO_LONG_PATTERN.test(message)) {
    return new EmbeddingError("input_too_long", `Embedding input rejected as too long: ${message}`, { cause: error });
  }
  return new EmbeddingError("provider", `Embedding provider failed: ${message}`, { cause: error });
};

const INPUT_REJECTION_STATUSES = new Set([400, 413]);

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;

const isUsableVector = (vector: number[] | undefined): vector is number[] =>
  Array.isArray(vector) && vector.length > 0 && vector.every((value) => Number.isFinite(value));

/**
 * Computes embeddings through an {@link EmbeddingProvider} and ranks them by
 * cosine similarity. Input text is whitespace-collapsed and cut at
 * `maxInputChars` before encoding, so the same text always yields the same
 * request.
 */
export class EmbeddingIndex {
  private readonly provider: EmbeddingProvider;

  private readonly settings: EmbeddingIndexSettings;

  private readonly sleep: Sleep | undefined;

  private readonly now: () => number;

  private readonly logger: Logger;

  constructor(dependencies: EmbeddingIndexDependencies) {
    this.provider = dependencies.provider;
    this.settings = dependencies.settings;
    this.sleep = dependencies.sleep;
    this.now = dependencies.now ?? Date.now;
    this.logger = dependencies.logger ?? defaultLogger;
  }

  get model(): string {
    return this.provider.model;
  }

  prepareText(text: string): string {
    const cut = text.replace(/\s+/g, " ").trim().slice(0, this.settings.maxInputChars);
    // drop half of a surrogate pair left at the cut
    return (isHighSurrogate(cut.charCodeAt(cut.length - 1)) ? cut.slice(0, -1) : cut).trimEnd();
  }

  async embed(text: string, options: EmbedOptions = {}): Promise<Embedding> {
    const prepared = this.prepareText(text);
    if (!prepared) {
      throw new EmbeddingError("empty_input", "Cannot embed empty text.");
    }

    const startedAt = this.now();
    const [vector] = await this.callProvider([prepared], options.correlation ?? {});
    recordEmbeddingLatency(this.now() - startedAt);
    if (!isUsableVector(vector)) {
      throw new EmbeddingError("provider", "Embedding response is missing a vector.");
    }
    return this.toEmbedding(vector);
  }

  async embedBatch(items: readonly EmbeddingInput[], options: EmbedOptions = {}): Promise<EmbedBatchResult> {
    const correlation = options.correlation ?? {};
    const startedAt = this.now();
    const vectorsById = new Map<string, number[]>();
    const failuresById = new Map<string, EmbeddingError>();
    const pending: EmbeddingInput[] = [];

    for (const item of items) {
      const prepared = this.prepareText(item.text);
      if (!prepared) {
        failuresById.set(item.id, new EmbeddingError("empty_input", `Item ${item.id} has no text to embed.`));
        continue;
      }
      pending.push({ id: item.id, text: prepared });
    }

    const batchSize = Math.max(1, this.settings.batchSize ?? DEFAULT_BATCH_SIZE);
    for (let offset = 0; offset < pending.length; offset += batchSize) {
      const chunk = pending.slice(offset, offset + batchSize);
      try {
        const vectors = await this.callProvider(chunk.map((item) => item.text), correlation);
        chunk.forEach((item, index) => {
          const vector = vectors[index];
          if (isUsableVector(vector)) {
            vectorsById.set(item.id, vector);
          } else {
            failuresById.set(item.id, new EmbeddingError("provider", `No vector returned for item ${item.id}.`));
          }
        });
      } catch (error) {
        const batchError = toEmbeddingError(error);
        // A rejection of the input is retried item by item so one bad text only fails itself.
        const status = readErrorStatus(batchError.cause);
        const causedByInput =
          batchError.kind === "input_too_long" || (status !== undefined && INPUT_REJECTION_STATUSES.has(status));
        if (causedByInput && chunk.length > 1) {
          await this.embedIndividually(chunk, vectorsById, failuresById, correlation);
          continue;
        }
        chunk.forEach((item) => failuresById.set(item.id, batchError));
      }
    }

    const expectedDimensions = this.findReferenceDimensions(items, vectorsById);
    const embeddings: EmbeddingCandidate[] = [];
    for (const item of items) {
      const vector = vectorsById.get(item.id);
      if (!vector) {
        continue;
      }
      if (vector.length !== expectedDimensions) {
        failuresById.set(
          item.id,
          new EmbeddingError(
            "dimension_mismatch",
            `Item ${item.id} returned dimension ${vector.length}, expected ${expectedDimensions}.`
          )
        );
        continue;
      }
      embeddings.push({ id: item.id, embedding: this.toEmbedding(vector) });
    }

    const failures = items.flatMap((item) => {
      const error = failuresById.get(item.id);
      return error ? [{ id: item.id, error }] : [];
    });

    recordEmbeddingLatency(this.now() - startedAt);
    if (failures.length > 0) {
      recordErrorRate("embedding_item_failure");
      this.logger.warn("embeddings.batch.partial_failure", correlation, {
        requested: items.length,
        embedded: embeddings.length,
        failed_ids: failures.map((failure) => failure.id),
        failure_kinds: failures.map((failure) => failure.error.kind)
      });
    }

    return { embeddings, failures };
  }

  rank(queryEmbedding: Embedding, candidates: readonly EmbeddingCandidate[], topK: number): ScoredId[] {
    return rankBySimilarity(queryEmbedding, candidates, topK);
  }

  private toEmbedding(vector: number[]): Embedding {
    return {
      model: this.provider.model,
      dimensions: vector.length,
      vector
    };
  }

  private findReferenceDimensions(items: readonly EmbeddingInput[], vectorsById: Map<string, number[]>): number {
    for (const item of items) {
      const vector = vectorsById.get(item.id);
      if (vector) {
        return vector.length;
      }
    }
    return 0;
  }

  private async embedIndividually(
    chunk: EmbeddingInput[],
    vectorsById: Map<string, number[]>,
    failuresById: Map<string, EmbeddingError>,
    correlation: CorrelationContext
  ): Promise<void> {
    for (const item of chunk) {
      try {
        const [vector] = await this.callProvider([item.text], correlation);
        if (isUsableVector(vector)) {
          vectorsById.set(item.id, vector);
        } else {
          failuresById.set(item.id, new EmbeddingError("provider", `No vector returned for item ${item.id}.`));
        }
      } catch (error) {
        failuresById.set(item.id, toEmbeddingError(error));
      }
    }
  }

  private async callProvider(texts: string[], correlation: CorrelationContext): Promise<number[][]> {
    try {
      return await withRetries(
        () => withTimeout((signal) => this.provider.embedTexts(texts, { signal }), this.settings.timeoutMs),
        {
          maxAttempts: this.settings.maxAttempts,
          baseDelayMs: this.settings.backoffBaseMs,
          sleep: this.sleep,
          shouldRetry: isTransientProviderError,
          onRetry: ({ attempt, delayMs, error }) => {
            recordErrorRate("embedding_request_retry");
            this.logger.warn("embeddings.request.retry", correlation, {
              attempt,
              delay_ms: delayMs,
              input_count: texts.length,
              error: error instanceof Error ? error.message : String(error)
            });
          }
        }
      );
    } catch (error) {
      throw toEmbeddingError(error);
    }
  }
}
