import Anthropic from '@anthropic-ai/sdk';
import type {
  Conversation,
  ConversationTurn,
  GenerativeClient,
  ModelSession,
  SendResult,
} from '@docstruct/connector-sdk';
import { classifyServiceError } from './service-errors.js';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-20250514';

/**
 * Anthropic client configuration.
 */
export interface AnthropicClientConfig {
  maxTokens?: number;
  temperature?: number;
  /** Per-request deadline in milliseconds */
  timeoutMs?: number;
}

interface AnthropicMessage {
  role: 'user' | 'assistant';
  content: string;
}

function toMessage(turn: ConversationTurn): AnthropicMessage {
  return { role: turn.role === 'model' ? 'assistant' : 'user', content: turn.text };
}

class AnthropicConversation implements Conversation {
  private readonly messages: AnthropicMessage[];

  constructor(
    private readonly client: Anthropic,
    private readonly model: string,
    private readonly config: Required<Pick<AnthropicClientConfig, 'maxTokens' | 'temperature'>>,
    history: readonly ConversationTurn[]
  ) {
    this.messages = history.map(toMessage);
  }

  async send(message: string): Promise<SendResult> {
    const userMessage: AnthropicMessage = { role: 'user', content: message };

    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
        messages: [...this.messages, userMessage],
      });

      const parts: string[] = [];
      for (const block of response.content) {
        if (block.type === 'text') {
          parts.push(block.text);
        }
      }
      const text = parts.join('');

      this.messages.push(userMessage, { role: 'assistant', content: text });
      return { success: true, text };
    } catch (error) {
      return { success: false, error: classifyServiceError(error) };
    }
  }
}

class AnthropicSession implements ModelSession {
  readonly provider = 'anthropic' as const;

  constructor(
    readonly modelName: string,
    private readonly client: Anthropic,
    private readonly config: Required<Pick<AnthropicClientConfig, 'maxTokens' | 'temperature'>>
  ) {}

  openConversation(history: readonly ConversationTurn[]): Conversation {
    return new AnthropicConversation(this.client, this.modelName, this.config, history);
  }
}

/**
 * Anthropic Messages API via @anthropic-ai/sdk.
 *
 * SDK-level retries are disabled; the response controller owns the retry policy.
 */
export class AnthropicClient implements GenerativeClient {
  readonly provider = 'anthropic' as const;

  constructor(private readonly config: AnthropicClientConfig = {}) {}

  bind(credential: string, modelName: string): ModelSession {
    if (!credential.trim()) {
      throw new Error('Credential is empty');
    }
    if (!modelName.trim()) {
      throw new Error('Model name is empty');
    }

    const client = new Anthropic({
      apiKey: credential,
      maxRetries: 0,
      ...(this.config.timeoutMs !== undefined ? { timeout: this.config.timeoutMs } : {}),
    });

    return new AnthropicSession(modelName, client, {
      maxTokens: this.config.maxTokens ?? 8192,
      temperature: this.config.temperature ?? 0,
    });
  }
}
