import type { Chunk, Embedder, IndexRecord, VectorIndex } from '../rag/schema';

export type IndexChunksDeps = {
  embedder: Embedder;
  index: VectorIndex;
};

export type IndexChunksOptions = {
  batchSize?: number;
  onBatch?: (done: number, total: number) => void;
};

const DEFAULT_UPSERT_BATCH = 50;

export const chunkArray = <T>(items: T[], size: number): T[][] => {
  const batches: T[][] = [];

  for (let index = 0; index < items.length; index += size) {
    batches.push(items.slice(index, index + size));
  }

  return batches;
};

/** Embeds chunks batch by batch and upserts them, replacing vectors with the same id. */
export const indexChunks = async (
  chunks: Chunk[],
  { embedder, index }: IndexChunksDeps,
  { batchSize = DEFAULT_UPSERT_BATCH, onBatch }: IndexChunksOptions = {},
): Promise<number> => {
  const batches = chunkArray(chunks, Math.max(1, batchSize));
  let done = 0;

  for (const batch of batches) {
    const vectors = await embedder.embed(batch.map((chunk) => chunk.text));

    if (vectors.length !== batch.length) {
      throw new Error(`Embedding service returned ${vectors.length} vectors for ${batch.length} chunks.`);
    }

    const records = batch.map<IndexRecord>((chunk, position) => ({
      id: chunk.id,
      vector: vectors[position] ?? [],
      metadata: { sourceFile: chunk.sourceFile, page: chunk.page, text: chunk.text },
    }));

    await index.upsert(records);
    done += batch.length;
    onBatch?.(done, chunks.length);
  }

  return done;
};
