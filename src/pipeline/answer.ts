import { isGreeting } from '../llm/prompts';
import type { RankedMatch } from '../rag/schema';
import type { Retriever } from './retrieve';
import type { AnswerMode, SynthesisResult, Synthesizer } from './synthesize';

export type AnswerDeps = {
  retriever: Retriever;
  synthesizer: Synthesizer;
};

export type AnswerRequest = {
  query: string;
  topK: number;
  mode: AnswerMode;
};

export type AnswerOutcome = {
  matches: RankedMatch[];
  result: SynthesisResult;
};

/** One chat turn: greetings go straight to synthesis, everything else is retrieved first. */
export const answerQuestion = async (
  { retriever, synthesizer }: AnswerDeps,
  { query, topK, mode }: AnswerRequest,
): Promise<AnswerOutcome> => {
  const matches = isGreeting(query) ? [] : await retriever.retrieve(query, topK);
  const result = await synthesizer.synthesize(query, matches, mode);

  return { matches, result };
};
