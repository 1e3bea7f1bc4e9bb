import type { ArticleRecord } from "../literature/types.js";

/** Text an article is embedded from: title, abstract and author names. */
export const articleEmbeddingText = (article: ArticleRecord): string =>
  [article.title, article.abstract, article.authors.join(" ")].filter(Boolean).join(" ");
