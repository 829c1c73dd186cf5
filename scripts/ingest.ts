import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';

import { loadConfig, type AppConfig } from '../src/config';
import { chunkDocument } from '../src/pipeline/chunk';
import { extractPdf } from '../src/pipeline/extractPdf';
import { indexChunks } from '../src/pipeline/ingest';
import { ChromaVectorIndex } from '../src/rag/client';
import { OllamaEmbedder } from '../src/rag/embeddings';
import type { Chunk } from '../src/rag/schema';
import { readCorpus, writeCorpus } from '../src/store/corpus';

dotenv.config();

const args = new Set(process.argv.slice(2));
const SKIP_INDEX = args.has('--skip-index');
const FROM_CORPUS = args.has('--from-corpus');

const listPdfFiles = async (docsDir: string): Promise<string[]> => {
  const entries = await fs.promises.readdir(docsDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.pdf'))
    .map((entry) => path.join(docsDir, entry.name))
    .sort();
};

const processPdfs = async (pdfPaths: string[]): Promise<Chunk[]> => {
  const allChunks: Chunk[] = [];

  for (const pdfPath of pdfPaths) {
    const fileName = path.basename(pdfPath);

    try {
      const document = await extractPdf(pdfPath);
      const chunks = chunkDocument(document);

      if (!chunks.length) {
        console.warn(`[INGEST] No chunks generated for ${fileName}.`);
      } else {
        console.info(`[INGEST] ${fileName}: ${document.pages.length} page(s), ${chunks.length} chunk(s).`);
      }

      allChunks.push(...chunks);
    } catch (error) {
      console.warn(`[INGEST] Failed to extract ${fileName}, skipping.`, error);
    }
  }

  return allChunks;
};

const buildCorpus = async (config: AppConfig): Promise<Chunk[]> => {
  const docsDir = path.resolve(config.DOCS_DIR);

  let pdfPaths: string[];
  try {
    pdfPaths = await listPdfFiles(docsDir);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error(`${config.DOCS_DIR} directory not found. Add PDFs to ./${config.DOCS_DIR} before running ingest.`);
    }
    throw error;
  }

  if (pdfPaths.length === 0) {
    console.warn(`[INGEST] No PDF files found in ./${config.DOCS_DIR}. Nothing to ingest.`);
    return [];
  }

  console.info(`[INGEST] Found ${pdfPaths.length} PDF file(s). Extracting text...`);
  const chunks = await processPdfs(pdfPaths);

  if (!chunks.length) {
    console.warn('[INGEST] No chunks generated from PDFs. Skipping write.');
    return [];
  }

  await writeCorpus(config.CORPUS_PATH, chunks);
  console.info(`[INGEST] Wrote ${chunks.length} chunk(s) to ${config.CORPUS_PATH}.`);

  return chunks;
};

const upsertCorpus = async (config: AppConfig, chunks: Chunk[]): Promise<void> => {
  const index = new ChromaVectorIndex({
    url: config.CHROMA_URL,
    collection: config.CHROMA_COLLECTION,
    embedding: { url: config.OLLAMA_EMBED_URL, model: config.OLLAMA_EMBED_MODEL },
  });
  const embedder = new OllamaEmbedder({
    baseUrl: config.OLLAMA_EMBED_URL,
    model: config.OLLAMA_EMBED_MODEL,
    batchSize: config.EMBED_BATCH_SIZE,
    maxAttempts: config.EMBED_MAX_ATTEMPTS,
  });

  console.info(
    `[INGEST] CHROMA_URL=${config.CHROMA_URL} CHROMA_COLLECTION=${config.CHROMA_COLLECTION} BATCH_SIZE=${config.EMBED_BATCH_SIZE}`,
  );

  try {
    const upserted = await indexChunks(chunks, { embedder, index }, {
      batchSize: config.EMBED_BATCH_SIZE,
      onBatch: (done, total) => console.info(`[INGEST] Upserted ${done}/${total} chunk(s).`),
    });
    console.info(`[INGEST] Upserted ${upserted} chunk(s) to Chroma collection "${config.CHROMA_COLLECTION}".`);
  } finally {
    await index.close();
  }
};

const main = async (): Promise<void> => {
  const config = loadConfig();
  const chunks = FROM_CORPUS ? await readCorpus(config.CORPUS_PATH) : await buildCorpus(config);

  if (!chunks.length || SKIP_INDEX) {
    return;
  }

  try {
    await upsertCorpus(config, chunks);
  } catch (error) {
    console.error('[INGEST] Failed to upsert embeddings to Chroma.');
    throw error;
  }
};

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
