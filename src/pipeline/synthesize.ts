import {
  classifyLlmError,
  llmErrorMessage,
  type ChatCompletionClient,
  type LlmErrorKind,
} from '../llm/client';
import { buildUserPrompt } from '../llm/prompts';
import type { IndexMatch } from '../rag/schema';
import { assessConfidence, type Confidence } from './confidence';

export type AnswerMode = 'local' | 'generative';

export type AnswerPayload = {
  query: string;
  answer: string;
  sources: string[];
  confidence: Confidence;
  contextUsed: number;
  mode: AnswerMode;
};

export type AnswerError = {
  query: string;
  error: string;
  errorKind: LlmErrorKind;
  mode: AnswerMode;
};

export type SynthesisResult = AnswerPayload | AnswerError;

export type SynthesizerDeps = {
  llm: ChatCompletionClient;
  systemPrompt: string;
};

export interface Synthesizer {
  synthesize(query: string, matches: IndexMatch[], mode: AnswerMode): Promise<SynthesisResult>;
}

type Strategy = (query: string, matches: IndexMatch[], deps: SynthesizerDeps) => Promise<SynthesisResult>;

export const NO_MATCHES_ANSWER =
  "I couldn't find relevant information in the legal database for your query. Please try rephrasing your question or ask about the Indian Penal Code (IPC), the Code of Criminal Procedure (CrPC) or Constitutional law.";

export const LOCAL_INTRO = "Based on the legal documents, here's what I found:\n";

export const GENERATION_TEMPERATURE = 0.7;
export const GENERATION_MAX_TOKENS = 500;

const LOCAL_SHOWN_MATCHES = 3;
const LOCAL_TEXT_LIMIT = 400;

export const isAnswerError = (result: SynthesisResult): result is AnswerError => 'error' in result;

// counts code points so astral characters are never split
const truncate = (text: string, limit: number): string => {
  const characters = Array.from(text);
  return characters.length > limit ? `${characters.slice(0, limit).join('')}...` : text;
};

export const synthesizeLocal: Strategy = async (query, matches) => {
  if (!matches.length) {
    return {
      query,
      answer: NO_MATCHES_ANSWER,
      sources: [],
      confidence: 'very_low',
      contextUsed: 0,
      mode: 'local',
    };
  }

  const parts = [LOCAL_INTRO];
  const sources = new Set<string>();

  matches.slice(0, LOCAL_SHOWN_MATCHES).forEach((match, index) => {
    const { sourceFile, text } = match.metadata;
    const excerpt = truncate(text.trim(), LOCAL_TEXT_LIMIT);

    parts.push(`\n[${index + 1}] From ${sourceFile} (Relevance: ${match.score.toFixed(2)}):\n${excerpt}`);
    sources.add(sourceFile);
  });

  if (matches.length > LOCAL_SHOWN_MATCHES) {
    parts.push(`\n\nFound ${matches.length} total matches. Showing top ${LOCAL_SHOWN_MATCHES} most relevant.`);
  }

  return {
    query,
    answer: parts.join('\n'),
    sources: [...sources],
    confidence: assessConfidence(matches),
    contextUsed: matches.length,
    mode: 'local',
  };
};

export const synthesizeGenerative: Strategy = async (query, matches, { llm, systemPrompt }) => {
  if (!llm.available) {
    return { query, error: llmErrorMessage('unavailable'), errorKind: 'unavailable', mode: 'generative' };
  }

  try {
    const answer = await llm.complete({
      systemPrompt,
      userPrompt: buildUserPrompt(query, matches),
      temperature: GENERATION_TEMPERATURE,
      maxTokens: GENERATION_MAX_TOKENS,
    });

    return {
      query,
      answer,
      sources: matches.map((match) => match.metadata.sourceFile),
      confidence: assessConfidence(matches),
      contextUsed: matches.length,
      mode: 'generative',
    };
  } catch (error) {
    const errorKind = classifyLlmError(error);
    console.error(`[LLM] Completion failed (${errorKind}).`, error);

    return { query, error: llmErrorMessage(errorKind, error), errorKind, mode: 'generative' };
  }
};

const STRATEGIES: Record<AnswerMode, Strategy> = {
  local: synthesizeLocal,
  generative: synthesizeGenerative,
};

export const createSynthesizer = (deps: SynthesizerDeps): Synthesizer => ({
  synthesize: (query, matches, mode) => STRATEGIES[mode](query, matches, deps),
});
