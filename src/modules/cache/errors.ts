export type CacheErrorKind = "unavailable";

export class CacheError extends Error {
  readonly kind: CacheErrorKind;

  constructor(kind: CacheErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CacheError";
    this.kind = kind;
  }
}
