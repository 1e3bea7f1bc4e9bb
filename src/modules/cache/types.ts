import type { Embedding } from "../embeddings/types.js";
import type { LiteratureQuery, ResultSet } from "../literature/types.js";
import type { Finding } from "../summaries/types.js";

export type CacheEntry = {
  key: string;
  query: LiteratureQuery;
  resultSet: ResultSet;
  /** Article embeddings keyed by article id. */
  embeddings: Record<string, Embedding>;
  embeddingFailures: string[];
  findings: Finding[];
  failedSummaryIds: string[];
  /** Epoch ms. */
  createdAt: number;
  /** Epoch ms; the entry is a miss from this instant on. */
  expiresAt: number;
};

/** Entry contents before the cache stamps timing fields. */
export type CacheEntryDraft = Omit<CacheEntry, "key" | "createdAt" | "expiresAt">;
