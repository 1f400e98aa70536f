/**
 * Response Formatter Service
 *
 * Maps pipeline objects to the JSON shapes returned by the HTTP API.
 * Source chunks are shown as short excerpts with their position in the
 * document so users can check where an answer came from.
 */

import { Chunk, SourceReference, Turn, TurnResponse } from '../../shared/types';

export interface FormatterConfig {
  /** Maximum excerpt length for source references */
  maxExcerptLength: number;
}

export const DEFAULT_FORMATTER_CONFIG: FormatterConfig = {
  maxExcerptLength: 300,
};

export function truncateExcerpt(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength - 3) + '...';
}

export function formatSourceReference(
  chunk: Chunk,
  config: FormatterConfig = DEFAULT_FORMATTER_CONFIG
): SourceReference {
  return {
    chunkId: chunk.id,
    excerpt: truncateExcerpt(chunk.text, config.maxExcerptLength),
    start: chunk.sourceOffset?.start,
    end: chunk.sourceOffset?.end,
  };
}

export function formatTurn(
  turn: Turn,
  config: FormatterConfig = DEFAULT_FORMATTER_CONFIG
): TurnResponse {
  return {
    id: turn.id,
    role: turn.role,
    content: turn.content,
    timestamp: turn.timestamp.toISOString(),
    sources: turn.sources.map((chunk) => formatSourceReference(chunk, config)),
  };
}
