import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import type { Chunk, ChunkRecord } from '../rag/schema';
import { countWords } from '../pipeline/chunk';

const chunkRecordSchema = z.object({
  id: z.string().min(1),
  source_file: z.string(),
  page: z.number().int().nullable(),
  text: z.string(),
});

export const toChunkRecord = (chunk: Chunk): ChunkRecord => ({
  id: chunk.id,
  source_file: chunk.sourceFile,
  page: chunk.page,
  text: chunk.text,
});

export const fromChunkRecord = (record: ChunkRecord): Chunk => ({
  id: record.id,
  sourceFile: record.source_file,
  page: record.page,
  text: record.text,
  wordCount: countWords(record.text),
});

export const writeCorpus = async (corpusPath: string, chunks: Chunk[]): Promise<void> => {
  await fs.promises.mkdir(path.dirname(corpusPath), { recursive: true });
  const handle = await fs.promises.open(corpusPath, 'w');

  try {
    for (const chunk of chunks) {
      await handle.appendFile(`${JSON.stringify(toChunkRecord(chunk))}\n`);
    }
  } finally {
    await handle.close();
  }
};

export const parseCorpus = (raw: string, label = 'corpus'): Chunk[] => {
  const chunks: Chunk[] = [];

  raw.split('\n').forEach((line, index) => {
    if (!line.trim()) {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      console.warn(`[CORPUS] ${label}:${index + 1} is not valid JSON, skipping.`, (error as Error).message);
      return;
    }

    const record = chunkRecordSchema.safeParse(parsed);
    if (!record.success) {
      console.warn(`[CORPUS] ${label}:${index + 1} is not a chunk record, skipping.`);
      return;
    }

    chunks.push(fromChunkRecord(record.data));
  });

  return chunks;
};

export const readCorpus = async (corpusPath: string): Promise<Chunk[]> => {
  const raw = await fs.promises.readFile(corpusPath, 'utf-8');
  return parseCorpus(raw, path.basename(corpusPath));
};
