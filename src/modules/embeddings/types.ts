export type Embedding = {
  model: string;
  dimensions: number;
  vector: readonly number[];
};

export type EmbeddingCandidate = {
  id: string;
  embedding: Embedding;
};

export type ScoredId = {
  id: string;
  score: number;
};

export type EmbeddingInput = {
  id: string;
  text: string;
};

export interface EmbeddingProvider {
  readonly model: string;
  /** One vector per input text, in input order. */
  embedTexts(texts: string[], options: { signal: AbortSignal }): Promise<number[][]>;
}
