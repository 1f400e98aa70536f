/**
 * Retriever
 *
 * Embeds the standalone question once and returns the index's best chunks
 * in the order the index ranked them. No re-ranking or score threshold is
 * applied; an empty result is a valid answer ("no grounding available").
 */

import { Chunk } from '../../shared/types';
import { IndexNotBuiltError } from '../errors';
import { Embedder } from './embeddingClient';
import { IVectorIndex } from './vectorStore';

export interface IRetriever {
  retrieve(
    index: IVectorIndex,
    standaloneQuestion: string,
    embedder: Embedder,
    k: number
  ): Promise<Chunk[]>;
}

export async function retrieve(
  index: IVectorIndex,
  standaloneQuestion: string,
  embedder: Embedder,
  k: number
): Promise<Chunk[]> {
  if (!index.isBuilt) {
    throw new IndexNotBuiltError();
  }
  if (k <= 0 || index.size === 0) {
    return [];
  }

  const queryEmbedding = await embedder.embed(standaloneQuestion);
  return index.query(queryEmbedding, k).map((result) => result.chunk);
}

export const defaultRetriever: IRetriever = { retrieve };
