import { EmbeddingError } from "./errors.js";
import type { Embedding, EmbeddingCandidate, ScoredId } from "./types.js";

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new EmbeddingError(
      "dimension_mismatch",
      `Cannot compare embeddings of dimension ${a.length} and ${b.length}.`
    );
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    const left = a[i] ?? 0;
    const right = b[i] ?? 0;
    dot += left * right;
    normA += left * left;
    normB += right * right;
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

const assertComparable = (query: Embedding, candidate: EmbeddingCandidate): void => {
  if (candidate.embedding.dimensions !== query.dimensions || candidate.embedding.vector.length !== query.vector.length) {
    throw new EmbeddingError(
      "dimension_mismatch",
      `Candidate ${candidate.id} has dimension ${candidate.embedding.dimensions}, expected ${query.dimensions}.`
    );
  }
  if (candidate.embedding.model !== query.model) {
    throw new EmbeddingError(
      "dimension_mismatch",
      `Candidate ${candidate.id} was embedded with ${candidate.embedding.model}, expected ${query.model}.`
    );
  }
};

/**
 * Scores every candidate against `query` by cosine similarity and returns the
 * best `topK`, highest first. Equal scores keep their input order.
 */
export function rankBySimilarity(query: Embedding, candidates: readonly EmbeddingCandidate[], topK: number): ScoredId[] {
  const limit = Math.max(0, Math.floor(topK));
  if (limit === 0 || candidates.length === 0) {
    return [];
  }

  const scored = candidates.map((candidate, index) => {
    assertComparable(query, candidate);
    return {
      id: candidate.id,
      score: cosineSimilarity(query.vector, candidate.embedding.vector),
      index
    };
  });

  scored.sort((left, right) => right.score - left.score || left.index - right.index);

  return scored.slice(0, limit).map(({ id, score }) => ({ id, score }));
}
