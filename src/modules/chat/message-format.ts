import type { ArticleRecord, LiteratureQuery } from "../literature/types.js";
import type { Finding } from "../summaries/types.js";
import type { AnswerSource, Omissions } from "./types.js";

const BLOCK_SEPARATOR = "\n\n";
const MAX_LISTED_AUTHORS = 3;

export const NO_ARTICLES_MESSAGE =
  "No articles found for your search query. Try different keywords or a broader search term.";
export const SEARCH_FIRST_MESSAGE =
  "There are no recent search results for this conversation. Run a search first, then ask your question.";

export const formatAuthors = (authors: readonly string[]): string => {
  if (authors.length === 0) {
    return "Unknown authors";
  }
  const listed = authors.slice(0, MAX_LISTED_AUTHORS).join(", ");
  return authors.length > MAX_LISTED_AUTHORS ? `${listed} et al.` : listed;
};

const describeQuery = (query: LiteratureQuery): string => {
  const filters = query.filters;
  const notes: string[] = [];
  if (filters?.dateFrom || filters?.dateTo) {
    notes.push(`published ${filters.dateFrom ?? "..."} to ${filters.dateTo ?? "..."}`);
  }
  if (filters?.journal) {
    notes.push(`journal: ${filters.journal}`);
  }
  return notes.length > 0 ? `${query.text} (${notes.join("; ")})` : query.text;
};

export const buildHeaderBlock = (query: LiteratureQuery, answer?: string): string =>
  answer
    ? [`Answer to: ${describeQuery(query)}`, "", answer, "", "Based on these articles:"].join("\n")
    : `Literature review: ${describeQuery(query)}`;

export const buildArticleBlock = (position: number, article: ArticleRecord, finding?: Finding): string => {
  const lines = [
    `${position}. ${article.title}`,
    `   ${formatAuthors(article.authors)} (${article.publicationDate}) - ${article.journal || "Unknown journal"}`
  ];
  for (const claim of finding?.claims ?? []) {
    lines.push(`   - ${claim}`);
  }
  lines.push(`   ${article.url}`);
  return lines.join("\n");
};

const plural = (count: number, singular: string, pluralForm = `${singular}s`): string =>
  `${count} ${count === 1 ? singular : pluralForm}`;

export const buildOmissionsLine = (omitted: Omissions): string | null => {
  const parts: string[] = [];
  if (omitted.droppedRecords > 0) {
    parts.push(`${plural(omitted.droppedRecords, "record")} could not be read and ${omitted.droppedRecords === 1 ? "was" : "were"} omitted`);
  }
  if (omitted.unavailableSummaries > 0) {
    parts.push(`summaries unavailable for ${plural(omitted.unavailableSummaries, "article")}`);
  }
  if (omitted.unrankedArticles > 0) {
    parts.push(`${plural(omitted.unrankedArticles, "article")} could not be ranked by relevance`);
  }
  return parts.length > 0 ? `Note: ${parts.join("; ")}.` : null;
};

export const buildAnswerBlocks = (answer: string, sources: readonly AnswerSource[]): string[] => {
  const blocks = [`Answer:\n${answer}`];
  if (sources.length > 0) {
    blocks.push(
      ["Sources:", ...sources.map((source, index) => `[${index + 1}] ${source.title}\n    ${source.url}`)].join("\n")
    );
  }
  return blocks;
};

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;

// a cut moves back one unit rather than separate a surrogate pair
const hardCut = (line: string, maxChars: number): string[] => {
  const pieces: string[] = [];
  let start = 0;
  while (start < line.length) {
    let end = Math.min(start + maxChars, line.length);
    if (end < line.length && end - start > 1 && isHighSurrogate(line.charCodeAt(end - 1))) {
      end -= 1;
    }
    pieces.push(line.slice(start, end));
    start = end;
  }
  return pieces;
};

const pack = (pieces: readonly string[], separator: string, maxChars: number): string[] => {
  const packed: string[] = [];
  let current = "";
  for (const piece of pieces) {
    if (!current) {
      current = piece;
    } else if (current.length + separator.length + piece.length <= maxChars) {
      current += separator + piece;
    } else {
      packed.push(current);
      current = piece;
    }
  }
  if (current) {
    packed.push(current);
  }
  return packed;
};

/** Splits a block larger than `maxChars` on line boundaries, cutting single lines that still overflow. */
export const splitOversizedBlock = (block: string, maxChars: number): string[] => {
  const lines = block.split("\n").flatMap((line) => (line.length > maxChars ? hardCut(line, maxChars) : [line]));
  return pack(lines, "\n", maxChars);
};

/**
 * Packs blocks in order into messages of at most `maxChars` characters,
 * separated by a blank line inside one message.
 */
export const chunkBlocks = (blocks: readonly string[], maxChars: number): string[] => {
  const limit = Math.max(1, maxChars);
  const pieces = blocks
    .filter((block) => block.length > 0)
    .flatMap((block) => (block.length > limit ? splitOversizedBlock(block, limit) : [block]));
  return pack(pieces, BLOCK_SEPARATOR, limit);
};
