export type SearchFilters = {
  /** Inclusive lower bound, `YYYY`, `YYYY/MM` or `YYYY/MM/DD`. */
  dateFrom?: string;
  /** Inclusive upper bound, same formats as `dateFrom`. */
  dateTo?: string;
  journal?: string;
};

export type LiteratureQuery = {
  text: string;
  normalized: string;
  filters?: SearchFilters;
};

export type ArticleRecord = Readonly<{
  id: string;
  title: string;
  authors: readonly string[];
  journal: string;
  publicationDate: string;
  abstract: string;
  url: string;
  doi?: string;
}>;

export type RankedArticle = {
  article: ArticleRecord;
  score: number;
};

export type ResultSet = {
  query: LiteratureQuery;
  entries: RankedArticle[];
  droppedRecordCount: number;
  /** Total hits reported by the source, which may exceed `entries.length`. */
  totalAvailable: number;
};
