import { RetrievalError } from "./errors.js";
import type { LiteratureQuery, SearchFilters } from "./types.js";

export const MAX_RESULTS_CEILING = 50;

const DATE_FILTER_PATTERN = /^\d{4}(?:\/(?:0[1-9]|1[0-2])(?:\/(?:0[1-9]|[12]\d|3[01]))?)?$/;
const EARLIEST_PUBLICATION_DATE = "1800";
const LATEST_PUBLICATION_DATE = "3000";

export const normalizeQueryText = (value: string): string =>
  value.normalize("NFKC").toLowerCase().replace(/\s+/g, " ").trim();

export const clampMaxResults = (value: number | undefined, fallback: number): number => {
  const requested = value !== undefined && Number.isFinite(value) ? Math.floor(value) : fallback;
  return Math.max(1, Math.min(MAX_RESULTS_CEILING, requested));
};

const normalizeDateFilter = (value: string | undefined, field: string): string | undefined => {
  const trimmed = value?.trim().replace(/-/g, "/");
  if (!trimmed) {
    return undefined;
  }
  if (!DATE_FILTER_PATTERN.test(trimmed)) {
    throw new RetrievalError("malformed_query", `${field} must look like YYYY, YYYY/MM or YYYY/MM/DD.`);
  }
  return trimmed;
};

const normalizeFilters = (filters: SearchFilters | undefined): SearchFilters | undefined => {
  if (!filters) {
    return undefined;
  }

  const dateFrom = normalizeDateFilter(filters.dateFrom, "dateFrom");
  const dateTo = normalizeDateFilter(filters.dateTo, "dateTo");
  const journal = filters.journal?.replace(/\s+/g, " ").replace(/"/g, "").trim() || undefined;

  if (dateFrom && dateTo && dateFrom.localeCompare(dateTo) > 0) {
    throw new RetrievalError("malformed_query", "dateFrom must not be after dateTo.");
  }
  if (!dateFrom && !dateTo && !journal) {
    return undefined;
  }

  return {
    ...(dateFrom ? { dateFrom } : {}),
    ...(dateTo ? { dateTo } : {}),
    ...(journal ? { journal } : {})
  };
};

export const buildLiteratureQuery = (text: string, filters?: SearchFilters): LiteratureQuery => {
  const normalized = normalizeQueryText(text);
  if (!normalized) {
    throw new RetrievalError("malformed_query", "Search text is empty.");
  }

  const normalizedFilters = normalizeFilters(filters);
  return {
    text: text.trim(),
    normalized,
    ...(normalizedFilters ? { filters: normalizedFilters } : {})
  };
};

/**
 * Cache key for a query. Filters and the result ceiling are part of the key so
 * requests that would fetch different sets never share an entry.
 */
export const buildCacheKey = (query: LiteratureQuery, maxResults: number): string => {
  const filters = query.filters;
  const parts = [query.normalized, `n=${maxResults}`];
  if (filters?.dateFrom || filters?.dateTo) {
    parts.push(`date=${filters.dateFrom ?? ""}..${filters.dateTo ?? ""}`);
  }
  if (filters?.journal) {
    parts.push(`journal=${normalizeQueryText(filters.journal)}`);
  }
  return parts.join("|");
};

export type PubMedSearchParams = {
  term: string;
  datetype?: "pdat";
  mindate?: string;
  maxdate?: string;
};

export const toPubMedSearchParams = (query: LiteratureQuery): PubMedSearchParams => {
  const filters = query.filters;
  const term = filters?.journal ? `(${query.normalized}) AND "${filters.journal}"[Journal]` : query.normalized;

  if (!filters || (!filters.dateFrom && !filters.dateTo)) {
    return { term };
  }

  return {
    term,
    datetype: "pdat",
    mindate: filters.dateFrom ?? EARLIEST_PUBLICATION_DATE,
    maxdate: filters.dateTo ?? LATEST_PUBLICATION_DATE
  };
};
