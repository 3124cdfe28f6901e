import OpenAI from 'openai';

import { config } from '../config';
import { GenerationServiceError, getErrorMessage } from '../errors';
import { exponentialBackoff } from '../util/retry';
import { DEFAULT_MODEL } from './models';

export type CompletionRequest = {
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  model?: string;
  signal?: AbortSignal;
};

/** Black-box text generation: system + user prompt in, raw text out. */
export interface TextGenerationService {
  complete(request: CompletionRequest): Promise<string>;
}

export type OpenAiGenerationOptions = {
  baseURL?: string;
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  maxAttempts?: number;
};

const getStatus = (error: unknown): number | undefined => {
  if (error && typeof error === 'object' && 'status' in error) {
    const { status } = error;
    if (typeof status === 'number') {
      return status;
    }
  }
  return undefined;
};

/**
 * Chat-completions client for any OpenAI-compatible endpoint (Ollama's `/v1` by
 * default). Failures surface as `GenerationServiceError` after the retry budget.
 */
export class OpenAiGenerationService implements TextGenerationService {
  private client: OpenAI | null = null;

  private readonly baseURL: string;

  private readonly apiKey: string;

  private readonly model: string;

  private readonly maxTokens: number;

  private readonly maxAttempts: number;

  constructor(options: OpenAiGenerationOptions = {}) {
    this.baseURL = options.baseURL ?? config.LLM_BASE_URL;
    this.apiKey = options.apiKey ?? config.LLM_API_KEY;
    this.model = options.model ?? config.LLM_MODEL ?? DEFAULT_MODEL;
    this.maxTokens = options.maxTokens ?? config.LLM_MAX_TOKENS;
    this.maxAttempts = options.maxAttempts ?? config.LLM_MAX_ATTEMPTS;
  }

  get defaultModel(): string {
    return this.model;
  }

  private getClient(): OpenAI {
    if (this.client) {
      return this.client;
    }

    this.client = new OpenAI({
      apiKey: this.apiKey,
      baseURL: this.baseURL,
      maxRetries: 0,
    });

    return this.client;
  }

  private shouldRetry(error: unknown): boolean {
    const status = getStatus(error);

    if (typeof status === 'number' && status >= 400 && status < 500 && status !== 429) {
      return false;
    }

    return true;
  }

  /** Model ids served by the endpoint, without Ollama's `:latest` tag. */
  async listModels(): Promise<string[]> {
    const names: string[] = [];

    for await (const model of this.getClient().models.list()) {
      names.push(model.id.replace(/:latest$/, ''));
    }

    return names;
  }

  async complete({ systemPrompt, userPrompt, temperature, model, signal }: CompletionRequest): Promise<string> {
    const client = this.getClient();
    const selectedModel = model ?? this.model;

    let content: string | null | undefined;

    try {
      const response = await exponentialBackoff(
        () => client.chat.completions.create(
          {
            model: selectedModel,
            temperature,
            max_tokens: this.maxTokens,
            messages: [
              { role: 'system', content: systemPrompt },
              { role: 'user', content: userPrompt },
            ],
          },
          { signal },
        ),
        {
          maxAttempts: this.maxAttempts,
          signal,
          shouldRetry: (error) => this.shouldRetry(error),
          onRetry: (error, attempt, delay) => {
            console.warn(`[LLM] Attempt ${attempt} failed (${getErrorMessage(error)}). Retrying in ${delay}ms.`);
          },
        },
      );
      content = response.choices[0]?.message?.content;
    } catch (error) {
      const status = getStatus(error);
      const detail = getErrorMessage(error);
      throw new GenerationServiceError(
        typeof status === 'number'
          ? `Generation request failed (status ${status}): ${detail}`
          : `Generation request failed: ${detail}`,
        { status, cause: error },
      );
    }

    if (!content) {
      throw new GenerationServiceError('Generation response did not contain any content.');
    }

    return content;
  }
}
