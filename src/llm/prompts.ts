import fs from 'node:fs';

import type { IndexMatch } from '../rag/schema';

export const DEFAULT_SYSTEM_PROMPT =
  'You are an AI Legal Assistant for Indian law. Respond naturally and helpfully.';

export const NO_DOCUMENTS_CONTEXT = 'No relevant legal documents found.';

const GREETINGS = ['hi', 'hello', 'hey', 'good morning', 'good evening', 'how are you'];

const MAX_GREETING_TOKENS = 3;

/**
 * Reads the persona prompt from disk. A missing or empty file falls back to
 * the built-in persona.
 */
export const loadSystemPrompt = (filePath: string): string => {
  try {
    const prompt = fs.readFileSync(filePath, 'utf-8').trim();
    return prompt || DEFAULT_SYSTEM_PROMPT;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
      console.warn(`Failed to read system prompt from ${filePath}, using default.`, error);
    }
    return DEFAULT_SYSTEM_PROMPT;
  }
};

export const isGreeting = (query: string): boolean => {
  const normalized = query.toLowerCase().trim();
  const tokens = query.split(/\s+/).filter(Boolean);

  return tokens.length <= MAX_GREETING_TOKENS && GREETINGS.some((greeting) => normalized.includes(greeting));
};

export const buildContext = (matches: IndexMatch[]): string => {
  if (!matches.length) {
    return NO_DOCUMENTS_CONTEXT;
  }

  return matches
    .map((match, index) => `Document ${index + 1} (${match.metadata.sourceFile}):\n${match.metadata.text}`)
    .join('\n\n');
};

export const buildUserPrompt = (query: string, matches: IndexMatch[]): string => {
  if (isGreeting(query)) {
    return `User Question: ${query}`;
  }

  return `Legal Documents:\n${buildContext(matches)}\n\nUser Question: ${query}`;
};
