import { z } from "zod";
import type { ArticleRecord } from "./types.js";

export const PUBMED_ARTICLE_URL = "https://pubmed.ncbi.nlm.nih.gov";
export const DATE_NOT_AVAILABLE = "Date not available";

const esearchResponseSchema = z.object({
  error: z.string().optional(),
  esearchresult: z
    .object({
      count: z.coerce.number().int().nonnegative().default(0),
      idlist: z.array(z.string()).default([]),
      ERROR: z.string().optional()
    })
    .optional()
});

export type EsearchPage = {
  count: number;
  ids: string[];
  error?: string;
};

export type ParsedArticles = {
  records: ArticleRecord[];
  droppedCount: number;
};

export const parseEsearchPage = (payload: unknown): EsearchPage | null => {
  const parsed = esearchResponseSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }

  const error = parsed.data.error ?? parsed.data.esearchresult?.ERROR;
  if (!parsed.data.esearchresult) {
    return error ? { count: 0, ids: [], error } : null;
  }

  return {
    count: parsed.data.esearchresult.count,
    ids: parsed.data.esearchresult.idlist.map((id) => id.trim()).filter((id) => /^\d+$/.test(id)),
    ...(error ? { error } : {})
  };
};

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " "
};

const MAX_CODE_POINT = 0x10ffff;

// numeric entities outside the Unicode range are left as written
const fromCodePointOrNull = (codePoint: number): string | null =>
  Number.isInteger(codePoint) && codePoint >= 0 && codePoint <= MAX_CODE_POINT ? String.fromCodePoint(codePoint) : null;

export const decodeXmlText = (value: string): string =>
  value
    .replace(/<!\[CDATA\[([\s\S]*?)\]\]>/g, "$1")
    .replace(/<[^>]+>/g, "")
    .replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
      if (entity.startsWith("#")) {
        const hex = entity[1] === "x" || entity[1] === "X";
        return fromCodePointOrNull(Number.parseInt(entity.slice(hex ? 2 : 1), hex ? 16 : 10)) ?? match;
      }
      return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
    })
    .replace(/\s+/g, " ")
    .trim();

const firstElement = (xml: string, tag: string): string | undefined => {
  const match = new RegExp(`<${tag}(?:\\s[^>]*)?>([\\s\\S]*?)</${tag}>`).exec(xml);
  return match?.[1];
};

const allElements = (xml: string, tag: string): string[] => {
  const pattern = new RegExp(`<${tag}(?:\\s[^>]*)?>([\\s\\S]*?)</${tag}>`, "g");
  return Array.from(xml.matchAll(pattern), (match) => match[1] ?? "");
};

const textOf = (xml: string | undefined, tag: string): string => {
  if (xml === undefined) {
    return "";
  }
  const element = firstElement(xml, tag);
  return element === undefined ? "" : decodeXmlText(element);
};

const extractAuthors = (articleXml: string): string[] => {
  const authorList = firstElement(articleXml, "AuthorList");
  if (!authorList) {
    return [];
  }

  const authors: string[] = [];
  for (const authorXml of allElements(authorList, "Author")) {
    const collectiveName = textOf(authorXml, "CollectiveName");
    const lastName = textOf(authorXml, "LastName");
    const foreName = textOf(authorXml, "ForeName");

    if (lastName && foreName) {
      authors.push(`${lastName}, ${foreName}`);
    } else if (lastName) {
      authors.push(lastName);
    } else if (collectiveName) {
      authors.push(collectiveName);
    }
  }
  return authors;
};

const extractPublicationDate = (articleXml: string): string => {
  const pubDate = firstElement(firstElement(articleXml, "JournalIssue") ?? "", "PubDate");
  if (!pubDate) {
    return DATE_NOT_AVAILABLE;
  }

  const year = textOf(pubDate, "Year");
  if (!year) {
    return textOf(pubDate, "MedlineDate") || DATE_NOT_AVAILABLE;
  }

  return [year, textOf(pubDate, "Month"), textOf(pubDate, "Day")].filter(Boolean).join(" ");
};

const extractAbstract = (articleXml: string): string => {
  const abstractXml = firstElement(articleXml, "Abstract");
  if (!abstractXml) {
    return "";
  }

  return allElements(abstractXml, "AbstractText")
    .map(decodeXmlText)
    .filter(Boolean)
    .join(" ");
};

const extractDoi = (articleXml: string): string | undefined => {
  const match = /<ELocationID[^>]*EIdType="doi"[^>]*>([\s\S]*?)<\/ELocationID>/.exec(articleXml);
  const doi = match?.[1] ? decodeXmlText(match[1]) : "";
  return doi || undefined;
};

export const buildArticleUrl = (id: string): string => `${PUBMED_ARTICLE_URL}/${id}/`;

/**
 * Normalizes one `<PubmedArticle>` block. Returns `null` when the record has no
 * PMID or no title.
 */
export const parsePubmedArticle = (articleXml: string): ArticleRecord | null => {
  const citation = firstElement(articleXml, "MedlineCitation") ?? articleXml;
  const id = textOf(citation, "PMID");
  if (!/^\d+$/.test(id)) {
    return null;
  }

  const article = firstElement(citation, "Article");
  if (!article) {
    return null;
  }

  const title = textOf(article, "ArticleTitle");
  if (!title) {
    return null;
  }

  const doi = extractDoi(article);
  return Object.freeze({
    id,
    title,
    authors: Object.freeze(extractAuthors(article)),
    journal: textOf(firstElement(article, "Journal"), "Title"),
    publicationDate: extractPublicationDate(article),
    abstract: extractAbstract(article),
    url: buildArticleUrl(id),
    ...(doi ? { doi } : {})
  });
};

export const parseEfetchArticles = (xml: string): ParsedArticles => {
  const blocks = allElements(xml, "PubmedArticle");
  const records: ArticleRecord[] = [];
  let droppedCount = 0;

  for (const block of blocks) {
    const record = parsePubmedArticle(block);
    if (record) {
      records.push(record);
    } else {
      droppedCount += 1;
    }
  }

  return { records, droppedCount };
};
