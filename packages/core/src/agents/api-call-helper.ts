import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { ChatCompletionClient } from './llm-client';
import { API_DEFAULT_MAX_TOKENS, API_DEFAULT_TIMEOUT_MS } from '../config/constants';

export type ApiCallOptions = {
  model?: string;
  maxTokens?: number;
  reason?: string; // Reason for the API call (for logging)
  timeoutMs?: number; // Timeout in milliseconds (default: 3 minutes)
  json?: boolean;
};

/**
 * Execute a chat completion request with a timeout.
 *
 * Unlike a best-effort summarizer there is nothing sensible to fall back to when
 * classification fails, so every error (timeout included) propagates to the caller.
 */
export async function executeApiCall(
  messages: ChatCompletionMessageParam[],
  llmClient: ChatCompletionClient,
  options?: ApiCallOptions
): Promise<string> {
  const reason = options?.reason || 'API call';
  const timeoutMs = options?.timeoutMs ?? API_DEFAULT_TIMEOUT_MS;

  console.log(`[API Call] ${reason}`);

  const startTime = Date.now();
  let timer: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new Error(`API call timeout after ${timeoutMs}ms: ${reason}`));
    }, timeoutMs);
  });

  try {
    const content = await Promise.race([
      llmClient.chatCompletion(messages, {
        model: options?.model,
        maxTokens: options?.maxTokens ?? API_DEFAULT_MAX_TOKENS,
        json: options?.json,
      }),
      timeoutPromise,
    ]);

    console.log(`[API Call] Completed in ${Date.now() - startTime}ms: ${reason}`);
    return content;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[API Call] Failed after ${Date.now() - startTime}ms: ${reason} - ${message}`);
    throw error;
  } finally {
    clearTimeout(timer);
  }
}
