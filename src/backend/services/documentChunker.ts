/**
 * Document Chunker Service
 *
 * Splits extracted text into overlapping, fixed-size passages for embedding
 * and retrieval.
 *
 * This is a "sliding window" over characters (Unicode code points, so a
 * surrogate pair is never cut in half):
 * 1. Start at position 0
 * 2. Take chunkSize characters
 * 3. Move forward by (chunkSize - overlap) characters
 * 4. Repeat until the window reaches the end of the text
 *
 * Every chunk but the last is exactly chunkSize characters long and
 * consecutive chunks share exactly chunkOverlap characters, so the text is
 * recovered by concatenating the first chunk with each later chunk minus its
 * leading overlap. Offsets are UTF-16 indices into the text, so
 * `text.slice(start, end)` gives back the chunk.
 */

import {
  Chunk,
  ChunkingStrategy,
  ResolvedChunkingStrategy,
} from '../../shared/types';
import { ConfigurationError } from '../errors';

export interface ChunkingConfig {
  /** Size of each chunk in characters */
  chunkSize: number;
  /** Number of characters shared by consecutive chunks */
  chunkOverlap: number;
}

/**
 * Automatic sizing tiers, ordered by document length.
 * Short documents get small chunks to keep retrieval granular; long ones get
 * larger chunks to bound the chunk count. Sizes never decrease as the
 * document grows and overlap is always below size.
 */
export const AUTOMATIC_CHUNKING_TIERS: ReadonlyArray<{
  maxLength: number;
  chunkSize: number;
  chunkOverlap: number;
}> = [
  { maxLength: 5000, chunkSize: 500, chunkOverlap: 100 },
  { maxLength: 50000, chunkSize: 1000, chunkOverlap: 200 },
  { maxLength: Number.POSITIVE_INFINITY, chunkSize: 1500, chunkOverlap: 300 },
];

export function validateChunkingConfig(config: ChunkingConfig): void {
  const { chunkSize, chunkOverlap } = config;

  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new ConfigurationError(
      `chunkOverlap must be a non-negative integer, got ${chunkOverlap}`
    );
  }
  if (chunkOverlap >= chunkSize) {
    throw new ConfigurationError(
      `chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`
    );
  }
}

/**
 * Fix chunk size and overlap for a document. Computed once at indexing time.
 */
export function resolveChunkingStrategy(
  text: string,
  strategy: ChunkingStrategy
): ResolvedChunkingStrategy {
  if (strategy.mode === 'manual') {
    validateChunkingConfig(strategy);
    return {
      mode: 'manual',
      chunkSize: strategy.chunkSize,
      chunkOverlap: strategy.chunkOverlap,
    };
  }

  const tier =
    AUTOMATIC_CHUNKING_TIERS.find((t) => text.length < t.maxLength) ??
    AUTOMATIC_CHUNKING_TIERS[AUTOMATIC_CHUNKING_TIERS.length - 1];
  if (!tier) {
    throw new ConfigurationError('No automatic chunking tier configured');
  }

  return { mode: 'automatic', chunkSize: tier.chunkSize, chunkOverlap: tier.chunkOverlap };
}

/**
 * Splits text into overlapping chunks with sequential ids.
 * Empty text produces no chunks; text that fits in one window produces one.
 */
export function splitIntoChunks(text: string, config: ChunkingConfig): Chunk[] {
  validateChunkingConfig(config);
  const { chunkSize, chunkOverlap } = config;

  if (text.length === 0) {
    return [];
  }

  // offsets[i] is the UTF-16 index where code point i starts
  const offsets: number[] = [];
  let unit = 0;
  for (const point of text) {
    offsets.push(unit);
    unit += point.length;
  }
  offsets.push(text.length);
  const pointCount = offsets.length - 1;

  const chunks: Chunk[] = [];
  let start = 0;

  for (;;) {
    const end = Math.min(start + chunkSize, pointCount);
    const from = offsets[start] ?? text.length;
    const to = offsets[end] ?? text.length;
    chunks.push(
      Object.freeze({
        id: chunks.length,
        text: text.slice(from, to),
        sourceOffset: Object.freeze({ start: from, end: to }),
      })
    );

    if (end === pointCount) {
      return chunks;
    }
    start = end - chunkOverlap;
  }
}

/**
 * Document Chunker: resolves the strategy for a text and splits it.
 */
export class DocumentChunker {
  chunk(
    text: string,
    strategy: ChunkingStrategy
  ): { chunks: Chunk[]; strategy: ResolvedChunkingStrategy } {
    const resolved = resolveChunkingStrategy(text, strategy);
    const chunks = splitIntoChunks(text, resolved);
    return { chunks, strategy: resolved };
  }
}

export function createDocumentChunker(): DocumentChunker {
  return new DocumentChunker();
}
