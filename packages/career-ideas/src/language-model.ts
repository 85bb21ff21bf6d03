import OpenAI from 'openai';

export const DEFAULT_MODEL = 'gpt-4o-mini';
export const DEFAULT_TEMPERATURE = 0.7;

export interface CompletionRequest {
  system: string;
  user: string;
}

/** Text-in, text-out chat model. Implementations reject on any transport or API failure. */
export interface LanguageModel {
  readonly configured: boolean;
  complete(request: CompletionRequest): Promise<string>;
}

export class LanguageModelUnavailableError extends Error {
  constructor(message = 'Language model is not configured. Set OPENAI_API_KEY to enable AI suggestions.') {
    super(message);
    this.name = 'LanguageModelUnavailableError';
  }
}

export class LanguageModelError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LanguageModelError';
  }
}

type ChatMessage = { role: 'system'; content: string } | { role: 'user'; content: string };

/** The slice of the OpenAI client used here; tests pass a fake. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: {
        model: string;
        temperature: number;
        messages: ChatMessage[];
      }): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface OpenAiLanguageModelOptions {
  apiKey: string;
  model?: string;
  temperature?: number;
  client?: ChatCompletionsClient;
}

export class OpenAiLanguageModel implements LanguageModel {
  readonly configured = true;
  private readonly client: ChatCompletionsClient;
  private readonly model: string;
  private readonly temperature: number;

  constructor(options: OpenAiLanguageModelOptions) {
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
    this.model = options.model ?? DEFAULT_MODEL;
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
  }

  async complete(request: CompletionRequest): Promise<string> {
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        temperature: this.temperature,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.user },
        ],
      });

      return completion.choices[0]?.message.content ?? '';
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new LanguageModelError(message, { cause: error });
    }
  }
}

export class UnconfiguredLanguageModel implements LanguageModel {
  readonly configured = false;

  async complete(): Promise<string> {
    throw new LanguageModelUnavailableError();
  }
}

export interface LanguageModelConfig {
  apiKey?: string;
  model?: string;
  temperature?: number;
}

export function createLanguageModel(config: LanguageModelConfig): LanguageModel {
  const apiKey = config.apiKey?.trim();
  if (!apiKey) {
    return new UnconfiguredLanguageModel();
  }

  return new OpenAiLanguageModel({ apiKey, model: config.model, temperature: config.temperature });
}
