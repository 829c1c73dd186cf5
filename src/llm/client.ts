import OpenAI from 'openai';

export type ChatCompletionRequest = {
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  maxTokens: number;
};

export interface ChatCompletionClient {
  readonly available: boolean;
  complete(request: ChatCompletionRequest): Promise<string>;
}

export type LlmErrorKind = 'unavailable' | 'authentication' | 'quota' | 'rate_limit' | 'generic';

export type OpenAiClientOptions = {
  apiKey?: string;
  baseURL?: string;
  model: string;
};

export const LLM_ERROR_MESSAGES: Record<Exclude<LlmErrorKind, 'generic'>, string> = {
  unavailable:
    'Generative mode is unavailable: no language model API key is configured. Switch to local mode or set OPENAI_API_KEY.',
  authentication:
    'Language model API key error: the key is invalid or expired. Switch to local mode or update the key.',
  quota: 'Language model quota error: no credits are available. Switch to local mode or add billing.',
  rate_limit: 'Rate limit reached: too many requests. Try local mode or wait a moment.',
};

export const isUsableApiKey = (apiKey: string | undefined): apiKey is string =>
  typeof apiKey === 'string' && apiKey.trim().length > 0 && !apiKey.startsWith('your_');

const readProperty = (error: unknown, key: 'status' | 'code'): unknown =>
  error && typeof error === 'object' && key in error ? Reflect.get(error, key) : undefined;

const errorDetail = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const classifyLlmError = (error: unknown): LlmErrorKind => {
  const status = readProperty(error, 'status');
  const code = readProperty(error, 'code');
  const message = errorDetail(error).toLowerCase();

  if (status === 401 || code === 'invalid_api_key' || message.includes('authentication') || message.includes('api key')) {
    return 'authentication';
  }

  // OpenAI reports exhausted credits as a 429 too, so quota is checked first
  if (code === 'insufficient_quota' || message.includes('quota') || message.includes('billing')) {
    return 'quota';
  }

  if (status === 429 || code === 'rate_limit_exceeded' || /rate[ _]limit/.test(message)) {
    return 'rate_limit';
  }

  return 'generic';
};

export const llmErrorMessage = (kind: LlmErrorKind, error?: unknown): string =>
  kind === 'generic'
    ? `Language model API error: ${error === undefined ? 'Unknown error' : errorDetail(error)}`
    : LLM_ERROR_MESSAGES[kind];

export class OpenAiChatClient implements ChatCompletionClient {
  private client: OpenAI | null = null;

  private readonly apiKey: string | undefined;

  private readonly baseURL: string | undefined;

  readonly model: string;

  constructor({ apiKey, baseURL, model }: OpenAiClientOptions) {
    this.apiKey = isUsableApiKey(apiKey) ? apiKey : undefined;
    this.baseURL = baseURL;
    this.model = model;
  }

  get available(): boolean {
    return this.apiKey !== undefined;
  }

  private getClient(): OpenAI {
    if (this.client) {
      return this.client;
    }

    if (!this.apiKey) {
      throw new Error('LLM API key not configured. Set OPENAI_API_KEY.');
    }

    this.client = new OpenAI({
      apiKey: this.apiKey,
      baseURL: this.baseURL,
      maxRetries: 0,
    });

    return this.client;
  }

  async complete({ systemPrompt, userPrompt, temperature, maxTokens }: ChatCompletionRequest): Promise<string> {
    const client = this.getClient();

    const response = await client.chat.completions.create({
      model: this.model,
      temperature,
      max_tokens: maxTokens,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userPrompt },
      ],
    });

    const content = response.choices[0]?.message?.content;

    if (!content) {
      throw new Error('LLM response did not contain any content.');
    }

    return content;
  }
}
