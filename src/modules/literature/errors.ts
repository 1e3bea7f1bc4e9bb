export type RetrievalErrorKind = "transient" | "quota_exceeded" | "malformed_query";

export class RetrievalError extends Error {
  readonly kind: RetrievalErrorKind;

  constructor(kind: RetrievalErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RetrievalError";
    this.kind = kind;
  }
}

export class HttpStatusError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpStatusError";
    this.status = status;
  }
}

/** A 2xx response whose body could not be read; retried like an outage. */
export class UnreadableResponseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UnreadableResponseError";
  }
}
