export type SummarizationErrorKind = "provider" | "unparseable";

export class SummarizationError extends Error {
  readonly kind: SummarizationErrorKind;

  readonly articleIds: string[];

  constructor(kind: SummarizationErrorKind, message: string, options?: { cause?: unknown; articleIds?: string[] }) {
    super(message, { cause: options?.cause });
    this.name = "SummarizationError";
    this.kind = kind;
    this.articleIds = options?.articleIds ?? [];
  }
}
