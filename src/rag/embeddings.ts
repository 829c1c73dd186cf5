import { z } from 'zod';

import { exponentialBackoff } from '../util/retry';
import { EMBEDDING_DIMENSIONS, type Embedder } from './schema';

export type OllamaEmbedderOptions = {
  baseUrl: string;
  model: string;
  /** Texts sent in one `/api/embed` request. */
  batchSize?: number;
  maxAttempts?: number;
  dimensions?: number;
};

const DEFAULT_BATCH_SIZE = 50;

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

/** Non-2xx answer from Ollama. Client errors other than 429 are final. */
export class EmbeddingHttpError extends Error {
  constructor(
    readonly status: number,
    readonly detail: string,
  ) {
    super(`Embedding request failed (status ${status}): ${detail}`);
    this.name = 'EmbeddingHttpError';
  }

  get retryable(): boolean {
    return this.status === 429 || this.status >= 500;
  }
}

const embedEndpoint = (baseUrl: string): string => {
  let url: URL;
  try {
    url = new URL(baseUrl);
  } catch (error) {
    throw new Error(`Invalid embedding service URL "${baseUrl}": ${(error as Error).message}`);
  }

  return new URL('/api/embed', url.origin).toString();
};

const splitBatches = (texts: string[], size: number): string[][] =>
  Array.from({ length: Math.ceil(texts.length / size) }, (_, index) =>
    texts.slice(index * size, (index + 1) * size),
  );

/**
 * Embeds texts through Ollama's batch endpoint, one request per batch.
 * A retry re-sends only the batch that failed.
 */
export class OllamaEmbedder implements Embedder {
  private readonly endpoint: string;

  private readonly model: string;

  private readonly batchSize: number;

  private readonly maxAttempts: number;

  private readonly dimensions: number;

  constructor({ baseUrl, model, batchSize, maxAttempts, dimensions }: OllamaEmbedderOptions) {
    this.endpoint = embedEndpoint(baseUrl);
    this.model = model;
    this.batchSize = Math.max(1, batchSize ?? DEFAULT_BATCH_SIZE);
    this.maxAttempts = Math.max(1, maxAttempts ?? 1);
    this.dimensions = dimensions ?? EMBEDDING_DIMENSIONS;
  }

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];

    for (const batch of splitBatches(texts, this.batchSize)) {
      vectors.push(...(await this.embedBatch(batch)));
    }

    return vectors;
  }

  private async embedBatch(batch: string[]): Promise<number[][]> {
    try {
      return await exponentialBackoff(() => this.post(batch), {
        maxAttempts: this.maxAttempts,
        // fetch rejects with a TypeError when the connection itself fails
        shouldRetry: (error) => (error instanceof EmbeddingHttpError ? error.retryable : error instanceof TypeError),
        onRetry: (error, attempt, delay) => {
          console.warn(
            `[INGEST] Embedding batch of ${batch.length} failed on attempt ${attempt}, retrying in ${delay}ms.`,
            error instanceof Error ? error.message : error,
          );
        },
      });
    } catch (error) {
      if (error instanceof EmbeddingHttpError) {
        throw error;
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new Error(`Embedding request failed: ${detail}`, { cause: error });
    }
  }

  private async post(batch: string[]): Promise<number[][]> {
    const response = await fetch(this.endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ model: this.model, input: batch }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new EmbeddingHttpError(response.status, body || response.statusText);
    }

    const parsed = embedResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Embedding response did not include an embeddings array.');
    }

    const { embeddings } = parsed.data;
    if (embeddings.length !== batch.length) {
      throw new Error(`Embedding service returned ${embeddings.length} vectors for ${batch.length} texts.`);
    }

    const wrongSize = embeddings.find((vector) => vector.length !== this.dimensions);
    if (wrongSize) {
      throw new Error(`Embedding has ${wrongSize.length} dimensions, expected ${this.dimensions}.`);
    }

    return embeddings;
  }
}
