import dotenv from 'dotenv';

import { loadConfig } from '../src/config';
import { ChromaVectorIndex } from '../src/rag/client';

dotenv.config();

const main = async (): Promise<void> => {
  const config = loadConfig();
  const index = new ChromaVectorIndex({
    url: config.CHROMA_URL,
    collection: config.CHROMA_COLLECTION,
    embedding: { url: config.OLLAMA_EMBED_URL, model: config.OLLAMA_EMBED_MODEL },
  });

  try {
    const total = await index.count();
    console.info(`Collection "${config.CHROMA_COLLECTION}" at ${config.CHROMA_URL}`);
    console.info(`Total vectors: ${total}`);
  } finally {
    await index.close();
  }
};

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
