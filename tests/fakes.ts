import { vi } from 'vitest';

import type { ChatCompletionClient } from '../src/llm/client';
import type { Embedder, IndexMatch, IndexRecord, VectorIndex } from '../src/rag/schema';

export const match = (id: string, score: number, text: string, sourceFile = 'ipc.pdf', page: number | null = 1): IndexMatch => ({
  id,
  score,
  metadata: { sourceFile, page, text },
});

export class FakeEmbedder implements Embedder {
  readonly embed = vi.fn(async (texts: string[]) => texts.map((text) => [text.length, 1]));
}

export class FakeIndex implements VectorIndex {
  readonly upserted: IndexRecord[][] = [];

  readonly search = vi.fn(async (_vector: number[], topK: number) => this.matches.slice(0, topK));

  readonly count = vi.fn(async () => this.matches.length);

  readonly close = vi.fn(async () => undefined);

  constructor(private readonly matches: IndexMatch[] = []) {}

  async upsert(records: IndexRecord[]): Promise<void> {
    this.upserted.push(records);
  }
}

export const fakeLlm = (reply: string | Error = 'Generated answer.', available = true) => {
  const complete = vi.fn(async () => {
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  });
  const client: ChatCompletionClient = { available, complete };

  return { client, complete };
};
