import type { RetrievalErrorKind } from "../literature/errors.js";
import type { SearchFilters } from "../literature/types.js";

export interface SearchRequest {
  conversationId: string;
  text: string;
  maxResults?: number;
  filters?: SearchFilters;
  requestId?: string;
}

export interface AskRequest {
  conversationId: string;
  question: string;
  requestId?: string;
}

export type Omissions = {
  droppedRecords: number;
  unavailableSummaries: number;
  unrankedArticles: number;
};

export type FailureKind = RetrievalErrorKind | "internal";

export type ReplyFailure = {
  kind: FailureKind;
  userMessage: string;
};

export type SearchReplyStatus = "ok" | "empty" | "failed";

export interface SearchReply {
  status: SearchReplyStatus;
  /** Ordered message bodies, each within the transport size limit. */
  messages: string[];
  articleCount: number;
  omitted: Omissions;
  cached: boolean;
  answer?: string;
  failure?: ReplyFailure;
}

export type AskReplyStatus = "ok" | "no_context" | "failed";

export type AnswerSource = {
  id: string;
  title: string;
  url: string;
  score: number;
};

export interface AskReply {
  status: AskReplyStatus;
  messages: string[];
  sources: AnswerSource[];
  failure?: ReplyFailure;
}
