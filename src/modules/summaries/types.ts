export type Finding = {
  articleId: string;
  claims: string[];
  /** False when no usable summary could be produced for the article. */
  available: boolean;
};

export type SummarizeResult = {
  findings: Finding[];
  /** Articles whose batch failed at the provider after the retry. */
  failedArticleIds: string[];
};

export type CompletionRequest = {
  system: string;
  user: string;
  json?: boolean;
  temperature?: number;
  maxTokens?: number;
};

export type CompletionUsage = {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
};

export type CompletionResult = {
  content: string;
  usage?: CompletionUsage;
};

export interface CompletionProvider {
  readonly model: string;
  complete(request: CompletionRequest, options: { signal: AbortSignal }): Promise<CompletionResult>;
}
