import type { GenerativeClient, ProviderId } from '@docstruct/connector-sdk';
import { AnthropicClient, DEFAULT_ANTHROPIC_MODEL } from './anthropic-client.js';
import { GeminiClient, DEFAULT_GEMINI_MODEL } from './gemini-client.js';

export { GeminiClient, DEFAULT_GEMINI_MODEL, type GeminiClientConfig } from './gemini-client.js';
export { AnthropicClient, DEFAULT_ANTHROPIC_MODEL, type AnthropicClientConfig } from './anthropic-client.js';
export { classifyServiceError, kindFromStatus } from './service-errors.js';

/**
 * Model used when --model-name is not given.
 */
export const DEFAULT_MODELS: Record<ProviderId, string> = {
  gemini: DEFAULT_GEMINI_MODEL,
  anthropic: DEFAULT_ANTHROPIC_MODEL,
};

export interface GenerativeClientOptions {
  timeoutMs?: number;
  temperature?: number;
}

/**
 * Create the client for a provider.
 */
export function createGenerativeClient(
  provider: ProviderId,
  options: GenerativeClientOptions = {}
): GenerativeClient {
  switch (provider) {
    case 'gemini':
      return new GeminiClient(options);
    case 'anthropic':
      return new AnthropicClient(options);
  }
}
