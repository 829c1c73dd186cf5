export const EMBEDDING_DIMENSIONS = 384;

export type SourceDocument = {
  sourceFile: string;
  pages: (string | null)[];
};

export interface Chunk {
  id: string;
  sourceFile: string;
  page: number | null;
  text: string;
  wordCount: number;
}

/** Line format of the chunk corpus file. */
export interface ChunkRecord {
  id: string;
  source_file: string;
  page: number | null;
  text: string;
}

export interface MatchMetadata {
  sourceFile: string;
  page: number | null;
  text: string;
}

export interface IndexMatch {
  id: string;
  score: number;
  metadata: MatchMetadata;
}

export interface RankedMatch extends IndexMatch {
  relevanceBoost: number;
  adjustedScore: number;
}

export interface IndexRecord {
  id: string;
  vector: number[];
  metadata: MatchMetadata;
}

export interface Embedder {
  embed(texts: string[]): Promise<number[][]>;
}

export interface VectorIndex {
  search(vector: number[], topK: number): Promise<IndexMatch[]>;
  upsert(records: IndexRecord[]): Promise<void>;
  count(): Promise<number>;
  close(): Promise<void>;
}
