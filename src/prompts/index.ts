import type { ArticleRecord } from "../modules/literature/types.js";

export type PromptArticle = {
  tempId: string;
  article: ArticleRecord;
  abstract: string;
};

export const FINDINGS_SYSTEM_PROMPT = [
  "You summarize biomedical research articles for clinicians and researchers.",
  "For each article, state its key finding in one concise, scientific sentence focused on the main conclusion and clinical implications.",
  "Use only the title and abstract provided; do not invent results.",
  'Return only valid JSON shaped like {"findings":[{"id":"art_1","claims":["..."]}]} with one entry per article id.',
  "Use only the article ids that were provided and do not include any other keys."
].join(" ");

export const ANSWER_SYSTEM_PROMPT = [
  "You answer questions about biomedical research using only the articles provided.",
  "Synthesize information across articles, cite them as [1], [2] matching their numbers, acknowledge limitations or contradictions, and stay focused on the question.",
  "If the articles do not contain enough evidence, say so explicitly."
].join(" ");

export const UNAVAILABLE_ABSTRACT = "(no abstract available)";

export const buildFindingsSection = (input: PromptArticle): string =>
  [
    `Article ${input.tempId}`,
    `Title: ${input.article.title}`,
    `Journal: ${input.article.journal || "unknown"} (${input.article.publicationDate})`,
    `Abstract: ${input.abstract || UNAVAILABLE_ABSTRACT}`
  ].join("\n");

export const buildFindingsUserPrompt = (sections: string[], ids: string[]): string =>
  [
    `Summarize each of the following ${ids.length} articles.`,
    `Article ids: ${ids.join(", ")}`,
    "",
    sections.join("\n\n")
  ].join("\n");

export const buildAnswerUserPrompt = (question: string, articles: readonly ArticleRecord[], abstractMaxChars: number): string => {
  const context = articles.map((article, index) =>
    [
      `[${index + 1}] ${article.title}`,
      `Authors: ${article.authors.join(", ") || "unknown"}`,
      `Journal: ${article.journal || "unknown"} (${article.publicationDate})`,
      `Abstract: ${article.abstract.slice(0, abstractMaxChars) || UNAVAILABLE_ABSTRACT}`
    ].join("\n")
  );

  return ["Question:", question, "", "Articles:", context.join("\n\n"), "", "Answer:"].join("\n");
};
