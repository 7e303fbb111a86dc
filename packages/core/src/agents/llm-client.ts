import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { API_DEFAULT_MAX_TOKENS } from '../config/constants';

/**
 * LLM Provider configuration
 */
export type LLMProvider = 'openrouter' | 'openai';

export type LLMClientConfig = {
  provider: LLMProvider;
  apiKey: string;
  model?: string;
  /** Optional site URL for OpenRouter attribution */
  siteUrl?: string;
  /** Optional site name for OpenRouter attribution */
  siteName?: string;
};

export type ChatCompletionOptions = {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Ask the provider for a JSON object response. */
  json?: boolean;
};

/**
 * The one call the agents need. LLMClient implements it; tests substitute a fake.
 */
export interface ChatCompletionClient {
  chatCompletion(messages: ChatCompletionMessageParam[], options?: ChatCompletionOptions): Promise<string>;
}

/**
 * Default models for each provider
 */
export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  openrouter: 'openai/gpt-4o-mini',
  openai: 'gpt-4o-mini',
};

/**
 * Map OpenRouter model ID to OpenAI native model ID (for direct OpenAI API usage)
 */
export function mapToOpenAIModel(openrouterModelId: string): string {
  if (openrouterModelId.startsWith('openai/')) {
    return openrouterModelId.slice('openai/'.length);
  }
  if (!openrouterModelId.includes('/')) {
    return openrouterModelId;
  }
  // Other vendors' models are not served by the OpenAI API
  return DEFAULT_MODELS.openai;
}

/**
 * LLM Client that supports both OpenRouter and OpenAI APIs
 *
 * OpenRouter uses the same API format as OpenAI, just with a different base URL
 * and optional HTTP-Referer/X-Title headers for attribution.
 */
export class LLMClient implements ChatCompletionClient {
  private client: OpenAI;
  private provider: LLMProvider;
  private model: string;

  constructor(config: LLMClientConfig) {
    this.provider = config.provider;
    const configuredModel = config.model ?? DEFAULT_MODELS[config.provider];

    if (config.provider === 'openrouter') {
      this.model = configuredModel;
      this.client = new OpenAI({
        baseURL: 'https://openrouter.ai/api/v1',
        apiKey: config.apiKey,
        defaultHeaders: {
          ...(config.siteUrl ? { 'HTTP-Referer': config.siteUrl } : {}),
          'X-Title': config.siteName ?? 'docpath',
        },
      });
    } else {
      this.model = mapToOpenAIModel(configuredModel);
      this.client = new OpenAI({ apiKey: config.apiKey });
    }
  }

  getProvider(): LLMProvider {
    return this.provider;
  }

  getModel(): string {
    return this.model;
  }

  /**
   * Create a chat completion and return the trimmed text of the first choice.
   */
  async chatCompletion(messages: ChatCompletionMessageParam[], options?: ChatCompletionOptions): Promise<string> {
    const modelToUse = options?.model ?? this.model;

    try {
      console.log(`[LLMClient] Making API call - Provider: ${this.provider}, Model: ${modelToUse}, Messages: ${messages.length}`);

      const response = await this.client.chat.completions.create({
        model: modelToUse,
        messages,
        max_completion_tokens: options?.maxTokens ?? API_DEFAULT_MAX_TOKENS,
        temperature: options?.temperature,
        ...(options?.json ? { response_format: { type: 'json_object' as const } } : {}),
      });

      if (!Array.isArray(response.choices) || response.choices.length === 0) {
        throw new Error(`API response has no choices (model: ${modelToUse}, provider: ${this.provider})`);
      }

      const content = response.choices[0]?.message?.content?.trim() ?? '';
      if (!content) {
        console.warn(
          `[LLMClient] Empty content in response. Finish reason: ${response.choices[0]?.finish_reason}, ` +
            `Model: ${modelToUse}, Provider: ${this.provider}`
        );
      }
      return content;
    } catch (error) {
      console.error(`[LLMClient] Error in chatCompletion:`, error);
      throw error;
    }
  }
}

/**
 * Detect the best available LLM provider based on environment variables.
 * OPENROUTER_API_KEY wins over OPENAI_API_KEY; LLM_MODEL overrides the default model.
 */
export function detectLLMProvider(env: NodeJS.ProcessEnv = process.env): LLMClientConfig | null {
  const openrouterKey = env.OPENROUTER_API_KEY?.trim();
  const openaiKey = env.OPENAI_API_KEY?.trim();
  const configuredModel = env.LLM_MODEL?.trim() || undefined;

  if (openrouterKey) {
    return {
      provider: 'openrouter',
      apiKey: openrouterKey,
      model: configuredModel ?? DEFAULT_MODELS.openrouter,
    };
  }

  if (openaiKey) {
    return {
      provider: 'openai',
      apiKey: openaiKey,
      model: configuredModel ?? DEFAULT_MODELS.openai,
    };
  }

  return null;
}

/**
 * Create an LLM client using environment variables
 * Returns null if no API key is available
 */
export function createLLMClient(env: NodeJS.ProcessEnv = process.env): LLMClient | null {
  const config = detectLLMProvider(env);
  if (!config) {
    return null;
  }
  return new LLMClient(config);
}

export function getProviderDisplayName(provider: LLMProvider): string {
  switch (provider) {
    case 'openrouter':
      return 'OpenRouter';
    case 'openai':
      return 'OpenAI';
  }
}
