import type { AppConfig } from './config';
import { OpenAiChatClient } from './llm/client';
import { loadSystemPrompt } from './llm/prompts';
import { ChromaVectorIndex } from './rag/client';
import { OllamaEmbedder } from './rag/embeddings';
import type { VectorIndex } from './rag/schema';
import { createRetriever, type Retriever } from './pipeline/retrieve';
import { createSynthesizer, type AnswerMode, type Synthesizer } from './pipeline/synthesize';

export type AssistantServices = {
  retriever: Retriever;
  synthesizer: Synthesizer;
  index: VectorIndex;
  collection: string;
  llm: { configured: boolean; model: string };
  defaultTopK: number;
  defaultMode: AnswerMode;
  close(): Promise<void>;
};

/**
 * Builds the long-lived clients once per process. Call `close()` on shutdown.
 * The query-time embedder makes a single attempt; retrying is left to callers.
 */
export const createServices = (config: AppConfig): AssistantServices => {
  const index = new ChromaVectorIndex({
    url: config.CHROMA_URL,
    collection: config.CHROMA_COLLECTION,
    embedding: { url: config.OLLAMA_EMBED_URL, model: config.OLLAMA_EMBED_MODEL },
  });
  const embedder = new OllamaEmbedder({
    baseUrl: config.OLLAMA_EMBED_URL,
    model: config.OLLAMA_EMBED_MODEL,
    maxAttempts: 1,
  });
  const llm = new OpenAiChatClient({
    apiKey: config.OPENAI_API_KEY,
    baseURL: config.OPENAI_BASE_URL,
    model: config.OPENAI_MODEL,
  });

  return {
    retriever: createRetriever({ embedder, index }),
    synthesizer: createSynthesizer({ llm, systemPrompt: loadSystemPrompt(config.SYSTEM_PROMPT_PATH) }),
    index,
    collection: index.name,
    llm: { configured: llm.available, model: llm.model },
    defaultTopK: config.DEFAULT_TOP_K,
    defaultMode: config.DEFAULT_ANSWER_MODE,
    close: () => index.close(),
  };
};
