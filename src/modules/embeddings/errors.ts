export type EmbeddingErrorKind = "dimension_mismatch" | "provider" | "input_too_long" | "empty_input";

export class EmbeddingError extends Error {
  readonly kind: EmbeddingErrorKind;

  constructor(kind: EmbeddingErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmbeddingError";
    this.kind = kind;
  }
}
