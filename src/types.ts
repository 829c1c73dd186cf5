import type { Confidence } from './pipeline/confidence';
import type { AnswerMode } from './pipeline/synthesize';
import type { LlmErrorKind } from './llm/client';

export interface QueryRequest {
  query: string;
  top_k?: number;
  mode?: AnswerMode;
}

export interface AnswerResponse {
  query: string;
  answer: string;
  sources: string[];
  confidence: Confidence;
  context_used: number;
  mode: AnswerMode;
}

export interface AnswerErrorResponse {
  query: string;
  error: string;
  error_kind: LlmErrorKind;
  mode: AnswerMode;
}

export interface MatchResponse {
  id: string;
  score: number;
  relevance_boost: number;
  adjusted_score: number;
  source_file: string;
  page: number | null;
  text: string;
}

export interface RetrieveResponse {
  query: string;
  matches: MatchResponse[];
}

export interface HealthResponse {
  status: 'ok' | 'degraded';
  index: { collection: string; vectors: number } | { collection: string; error: string };
  llm: { configured: boolean; model: string };
}

export interface ErrorResponse {
  error: string;
}

export interface ValidationErrorResponse {
  errors: { path?: string; message: string }[];
}
