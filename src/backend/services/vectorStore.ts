/**
 * Vector Store Service
 *
 * In-memory nearest-neighbor index over the chunks of one document.
 *
 * HOW IT WORKS:
 * 1. Every chunk is converted to an embedding vector at build time
 * 2. A query is converted to an embedding vector by the caller
 * 3. We score every chunk against the query and return the k best
 *
 * Search is exact (brute force). An index is built once and is read-only
 * afterwards; rebuilding means creating a new index object, so a query can
 * never observe a half-replaced index.
 */

import { Chunk } from '../../shared/types';
import {
  EmbeddingDimensionMismatchError,
  IndexAlreadyBuiltError,
  IndexNotBuiltError,
} from '../errors';
import { Embedder } from './embeddingClient';

export type DistanceMetric = 'cosine' | 'l2';

/**
 * Result of a similarity search. For cosine the score is a similarity
 * (higher is better); for l2 it is a distance (lower is better).
 */
export interface SearchResult {
  chunk: Chunk;
  score: number;
}

export interface IVectorIndex {
  readonly isBuilt: boolean;
  readonly dimension: number | undefined;
  readonly size: number;
  build(chunks: readonly Chunk[], embedder: Embedder): Promise<void>;
  query(queryEmbedding: readonly number[], k: number): SearchResult[];
  getChunk(id: number): Chunk | undefined;
}

/**
 * Cosine similarity: 1.0 same direction, 0.0 unrelated, -1.0 opposite.
 * Zero vectors score 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new EmbeddingDimensionMismatchError(a.length, b.length);
  }

  let dotProduct = 0;
  let magnitudeA = 0;
  let magnitudeB = 0;

  for (let i = 0; i < a.length; i++) {
    const aVal = a[i] ?? 0;
    const bVal = b[i] ?? 0;
    dotProduct += aVal * bVal;
    magnitudeA += aVal * aVal;
    magnitudeB += bVal * bVal;
  }

  const magnitude = Math.sqrt(magnitudeA) * Math.sqrt(magnitudeB);
  if (magnitude === 0) {
    return 0;
  }

  return dotProduct / magnitude;
}

export function euclideanDistance(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new EmbeddingDimensionMismatchError(a.length, b.length);
  }

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

interface IndexEntry {
  chunk: Chunk;
  embedding: readonly number[];
}

type IndexState =
  | { kind: 'empty' }
  | { kind: 'building' }
  | { kind: 'built'; entries: IndexEntry[]; dimension: number | undefined };

export class InMemoryVectorIndex implements IVectorIndex {
  private state: IndexState = { kind: 'empty' };

  constructor(private readonly metric: DistanceMetric = 'cosine') {}

  get isBuilt(): boolean {
    return this.state.kind === 'built';
  }

  get dimension(): number | undefined {
    return this.state.kind === 'built' ? this.state.dimension : undefined;
  }

  get size(): number {
    return this.state.kind === 'built' ? this.state.entries.length : 0;
  }

  /**
   * Embed every chunk and store it keyed by chunk id. Embeddings come back
   * in chunk order; all of them must share one dimension.
   */
  async build(chunks: readonly Chunk[], embedder: Embedder): Promise<void> {
    if (this.state.kind !== 'empty') {
      throw new IndexAlreadyBuiltError();
    }
    this.state = { kind: 'building' };

    try {
      const embeddings = await embedder.embedMany(chunks.map((chunk) => chunk.text));
      const dimension = embedder.dimension ?? embeddings[0]?.length;

      const entries = chunks.map((chunk, i): IndexEntry => {
        const embedding = embeddings[i] ?? [];
        if (dimension !== undefined && embedding.length !== dimension) {
          throw new EmbeddingDimensionMismatchError(dimension, embedding.length);
        }
        return { chunk, embedding };
      });
      entries.sort((a, b) => a.chunk.id - b.chunk.id);

      this.state = { kind: 'built', entries, dimension };
    } catch (error) {
      this.state = { kind: 'empty' };
      throw error;
    }
  }

  /**
   * Return the k chunks closest to the query, best first. Equal scores are
   * ordered by lower chunk id so results are deterministic.
   */
  query(queryEmbedding: readonly number[], k: number): SearchResult[] {
    if (this.state.kind !== 'built') {
      throw new IndexNotBuiltError();
    }
    const { entries, dimension } = this.state;

    if (dimension !== undefined && queryEmbedding.length !== dimension) {
      throw new EmbeddingDimensionMismatchError(dimension, queryEmbedding.length);
    }
    if (k <= 0 || entries.length === 0) {
      return [];
    }

    const results: SearchResult[] = entries.map((entry) => ({
      chunk: entry.chunk,
      score:
        this.metric === 'cosine'
          ? cosineSimilarity(queryEmbedding, entry.embedding)
          : euclideanDistance(queryEmbedding, entry.embedding),
    }));

    const direction = this.metric === 'cosine' ? -1 : 1;
    results.sort((a, b) => direction * (a.score - b.score) || a.chunk.id - b.chunk.id);

    return results.slice(0, k);
  }

  getChunk(id: number): Chunk | undefined {
    if (this.state.kind !== 'built') {
      return undefined;
    }
    return this.state.entries.find((entry) => entry.chunk.id === id)?.chunk;
  }
}

export function createVectorIndex(metric: DistanceMetric = 'cosine'): IVectorIndex {
  return new InMemoryVectorIndex(metric);
}
