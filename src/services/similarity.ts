import { ConfigurationError } from '../errors.js';
import type { EpisodicRecord, SimilarityMatch } from '../types/workflow.js';

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new ConfigurationError(`Embedding dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Exact k-nearest-neighbour ranking by cosine similarity. Ties are broken by
 * runId so the same store contents always rank the same way.
 */
export function rankBySimilarity(vector: readonly number[], records: Iterable<EpisodicRecord>, k: number): SimilarityMatch[] {
  const scored: SimilarityMatch[] = [];
  for (const record of records) {
    scored.push({ record, score: cosineSimilarity(vector, record.embeddingVector) });
  }
  scored.sort((x, y) => y.score - x.score || x.record.runId.localeCompare(y.record.runId));
  return scored.slice(0, Math.max(0, k));
}
