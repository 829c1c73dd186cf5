import { z } from 'zod';

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && !value.trim() ? undefined : value;

const fromEnv = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(blankToUndefined, schema);

const configSchema = z.object({
  PORT: fromEnv(z.coerce.number().int().positive().default(3000)),
  CHROMA_URL: fromEnv(z.string().url().default('http://127.0.0.1:8000')),
  CHROMA_COLLECTION: fromEnv(z.string().min(1).default('legal-index-v1')),
  OLLAMA_EMBED_URL: fromEnv(z.string().url().default('http://127.0.0.1:11434')),
  OLLAMA_EMBED_MODEL: fromEnv(z.string().min(1).default('all-minilm')),
  EMBED_BATCH_SIZE: fromEnv(z.coerce.number().int().positive().default(50)),
  EMBED_MAX_ATTEMPTS: fromEnv(z.coerce.number().int().positive().default(5)),
  OPENAI_API_KEY: fromEnv(z.string().optional()),
  OPENAI_BASE_URL: fromEnv(z.string().url().optional()),
  OPENAI_MODEL: fromEnv(z.string().min(1).default('gpt-3.5-turbo')),
  SYSTEM_PROMPT_PATH: fromEnv(z.string().min(1).default('prompts/system_prompt.txt')),
  DOCS_DIR: fromEnv(z.string().min(1).default('docs')),
  CORPUS_PATH: fromEnv(z.string().min(1).default('.data/chunks.jsonl')),
  DEFAULT_TOP_K: fromEnv(z.coerce.number().int().min(1).max(50).default(5)),
  DEFAULT_ANSWER_MODE: fromEnv(z.enum(['local', 'generative']).default('local')),
});

export type AppConfig = z.infer<typeof configSchema>;

export const loadConfig = (env: Record<string, string | undefined> = process.env): AppConfig => {
  const result = configSchema.safeParse(env);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  return result.data;
};
