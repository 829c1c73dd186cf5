import { describe, it, expect, vi } from 'vitest';

import { answerQuestion } from '../src/pipeline/answer';
import type { Retriever } from '../src/pipeline/retrieve';
import { createSynthesizer } from '../src/pipeline/synthesize';
import type { RankedMatch } from '../src/rag/schema';
import { fakeLlm } from './fakes';

const ranked: RankedMatch = {
  id: 'ipc-0-0',
  score: 0.7,
  relevanceBoost: 0.1,
  adjustedScore: 0.8,
  metadata: { sourceFile: 'ipc.pdf', page: 1, text: 'Section 379 prescribes punishment for theft.' },
};

const retrieverReturning = (matches: RankedMatch[]) => {
  const retrieve = vi.fn(async (_query: string, _topK?: number) => matches);
  const retriever: Retriever = { retrieve };
  return { retriever, retrieve };
};

describe('answerQuestion', () => {
  it('retrieves before synthesizing', async () => {
    const { retriever, retrieve } = retrieverReturning([ranked]);
    const synthesizer = createSynthesizer({ llm: fakeLlm().client, systemPrompt: 'persona' });

    const { matches, result } = await answerQuestion(
      { retriever, synthesizer },
      { query: 'Punishment for theft under IPC?', topK: 3, mode: 'local' },
    );

    expect(retrieve).toHaveBeenCalledWith('Punishment for theft under IPC?', 3);
    expect(matches).toEqual([ranked]);
    expect(result).toMatchObject({ sources: ['ipc.pdf'], contextUsed: 1, confidence: 'medium' });
  });

  it('answers greetings without retrieval', async () => {
    const { retriever, retrieve } = retrieverReturning([ranked]);
    const { client, complete } = fakeLlm('Hello! Ask me anything about Indian law.');
    const synthesizer = createSynthesizer({ llm: client, systemPrompt: 'persona' });

    const { matches, result } = await answerQuestion(
      { retriever, synthesizer },
      { query: 'Good morning', topK: 5, mode: 'generative' },
    );

    expect(retrieve).not.toHaveBeenCalled();
    expect(matches).toEqual([]);
    expect(complete).toHaveBeenCalledWith(expect.objectContaining({ userPrompt: 'User Question: Good morning' }));
    expect(result).toMatchObject({ answer: 'Hello! Ask me anything about Indian law.', contextUsed: 0 });
  });
});
