import { OllamaEmbeddingFunction } from '@chroma-core/ollama';
import { ChromaClient, type Collection } from 'chromadb';
import { z } from 'zod';

import type { IndexMatch, IndexRecord, MatchMetadata, VectorIndex } from './schema';

export type ChromaIndexOptions = {
  url: string;
  collection: string;
  /** Ollama model the vectors come from, recorded on the collection. */
  embedding: { url: string; model: string };
};

const UNKNOWN_SOURCE = 'Unknown';

export const METADATA_TEXT_LIMIT = 8000;

const queryResultSchema = z.object({
  ids: z.array(z.array(z.string())),
  documents: z.array(z.array(z.string().nullable())).nullish(),
  metadatas: z.array(z.array(z.record(z.unknown()).nullable())).nullish(),
  distances: z.array(z.array(z.number().nullable())).nullish(),
});

const parseServerUrl = (url: string): { host: string; port: number; ssl: boolean } => {
  const parsed = new URL(url);
  const ssl = parsed.protocol === 'https:';
  const port = parsed.port ? Number.parseInt(parsed.port, 10) : ssl ? 443 : 80;

  return { host: parsed.hostname, port, ssl };
};

const toSimilarity = (distance: number | null | undefined): number => {
  if (typeof distance !== 'number' || Number.isNaN(distance)) {
    return 0;
  }

  // cosine space: distance = 1 - similarity
  return 1 - distance;
};

const toMatchMetadata = (
  metadata: Record<string, unknown> | null | undefined,
  document: string | null | undefined,
): MatchMetadata => {
  const sourceFile = metadata?.source_file;
  const page = metadata?.page;

  return {
    sourceFile: typeof sourceFile === 'string' && sourceFile ? sourceFile : UNKNOWN_SOURCE,
    page: typeof page === 'number' ? page : null,
    text: document ?? '',
  };
};

const toChromaMetadata = (metadata: MatchMetadata): Record<string, string | number> => {
  const base: Record<string, string | number> = { source_file: metadata.sourceFile };

  if (metadata.page !== null) {
    base.page = metadata.page;
  }

  return base;
};

export class ChromaVectorIndex implements VectorIndex {
  private readonly client: ChromaClient;

  private readonly collectionName: string;

  private readonly embedding: ChromaIndexOptions['embedding'];

  private collectionPromise: Promise<Collection> | null = null;

  constructor({ url, collection, embedding }: ChromaIndexOptions) {
    this.client = new ChromaClient(parseServerUrl(url));
    this.collectionName = collection;
    this.embedding = embedding;
  }

  get name(): string {
    return this.collectionName;
  }

  private async getCollection(): Promise<Collection> {
    if (!this.collectionPromise) {
      const pending = this.client.getOrCreateCollection({
        name: this.collectionName,
        metadata: { 'hnsw:space': 'cosine' },
        embeddingFunction: new OllamaEmbeddingFunction({
          url: this.embedding.url,
          model: this.embedding.model,
        }),
      });
      // retry the lookup on the next call after a failure, unless a newer one already started
      pending.catch(() => {
        if (this.collectionPromise === pending) {
          this.collectionPromise = null;
        }
      });
      this.collectionPromise = pending;
    }

    return this.collectionPromise;
  }

  async search(vector: number[], topK: number): Promise<IndexMatch[]> {
    if (topK <= 0) {
      return [];
    }

    const collection = await this.getCollection();
    const raw: unknown = await collection.query({
      queryEmbeddings: [vector],
      nResults: topK,
    });
    const result = queryResultSchema.parse(raw);

    const ids = result.ids[0] ?? [];
    const documents = result.documents?.[0] ?? [];
    const metadatas = result.metadatas?.[0] ?? [];
    const distances = result.distances?.[0] ?? [];

    return ids.map<IndexMatch>((id, index) => ({
      id,
      score: toSimilarity(distances[index]),
      metadata: toMatchMetadata(metadatas[index], documents[index]),
    }));
  }

  async upsert(records: IndexRecord[]): Promise<void> {
    if (!records.length) {
      return;
    }

    const collection = await this.getCollection();

    await collection.upsert({
      ids: records.map((record) => record.id),
      embeddings: records.map((record) => record.vector),
      documents: records.map((record) => record.metadata.text.slice(0, METADATA_TEXT_LIMIT)),
      metadatas: records.map((record) => toChromaMetadata(record.metadata)),
    });
  }

  async count(): Promise<number> {
    const collection = await this.getCollection();
    return collection.count();
  }

  async close(): Promise<void> {
    // ChromaClient holds no sockets
    this.collectionPromise = null;
  }
}
