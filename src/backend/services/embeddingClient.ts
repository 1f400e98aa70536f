/**
 * Embedding Client
 *
 * Turns text into fixed-length vectors through the language model
 * capability. Batches are embedded with bounded concurrency and returned in
 * input order regardless of completion order. The first failure drops the
 * texts still waiting, so a failed batch stops calling the model.
 */

import pLimit from 'p-limit';
import { LanguageModelCapability } from '../../shared/types';
import { ConfigurationError, EmbeddingDimensionMismatchError } from '../errors';

export interface EmbeddingClientConfig {
  /** Maximum embedding requests in flight during a batch */
  concurrency: number;
  /** Declared output dimension; learned from the first vector when unset */
  dimension?: number;
}

export const DEFAULT_EMBEDDING_CONFIG: EmbeddingClientConfig = {
  concurrency: 4,
};

/**
 * Anything that can embed text; the vector index and retriever depend on
 * this rather than on the full client.
 */
export interface Embedder {
  readonly dimension: number | undefined;
  embed(text: string): Promise<number[]>;
  embedMany(texts: readonly string[]): Promise<number[][]>;
}

export class EmbeddingClient implements Embedder {
  private readonly capability: LanguageModelCapability;
  private readonly config: EmbeddingClientConfig;
  private learnedDimension: number | undefined;

  constructor(capability: LanguageModelCapability, config: Partial<EmbeddingClientConfig> = {}) {
    this.capability = capability;
    this.config = { ...DEFAULT_EMBEDDING_CONFIG, ...config };

    if (!Number.isInteger(this.config.concurrency) || this.config.concurrency < 1) {
      throw new ConfigurationError(
        `Embedding concurrency must be a positive integer, got ${this.config.concurrency}`
      );
    }
    this.learnedDimension = this.config.dimension;
  }

  get dimension(): number | undefined {
    return this.learnedDimension;
  }

  async embed(text: string): Promise<number[]> {
    const vector = await this.capability.embed(text);
    return this.checkDimension(vector);
  }

  async embedMany(texts: readonly string[]): Promise<number[][]> {
    const limit = pLimit(this.config.concurrency);
    return Promise.all(
      texts.map((text) =>
        limit(async () => {
          try {
            return await this.embed(text);
          } catch (error) {
            limit.clearQueue();
            throw error;
          }
        })
      )
    );
  }

  private checkDimension(vector: number[]): number[] {
    if (this.learnedDimension === undefined) {
      this.learnedDimension = vector.length;
    } else if (vector.length !== this.learnedDimension) {
      throw new EmbeddingDimensionMismatchError(this.learnedDimension, vector.length);
    }
    return vector;
  }
}

export function createEmbeddingClient(
  capability: LanguageModelCapability,
  config?: Partial<EmbeddingClientConfig>
): EmbeddingClient {
  return new EmbeddingClient(capability, config);
}
