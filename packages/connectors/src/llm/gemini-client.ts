import {
  GoogleGenerativeAI,
  type ChatSession,
  type Content,
  type GenerativeModel,
} from '@google/generative-ai';
import type {
  Conversation,
  ConversationTurn,
  GenerativeClient,
  ModelSession,
  SendResult,
} from '@docstruct/connector-sdk';
import { classifyServiceError } from './service-errors.js';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash';

/**
 * Gemini client configuration.
 */
export interface GeminiClientConfig {
  /** Per-request deadline in milliseconds */
  timeoutMs?: number;
  temperature?: number;
}

function toContent(turn: ConversationTurn): Content {
  return { role: turn.role, parts: [{ text: turn.text }] };
}

class GeminiConversation implements Conversation {
  constructor(private readonly chat: ChatSession) {}

  async send(message: string): Promise<SendResult> {
    try {
      const result = await this.chat.sendMessage(message);
      return { success: true, text: result.response.text() };
    } catch (error) {
      return { success: false, error: classifyServiceError(error) };
    }
  }
}

class GeminiSession implements ModelSession {
  readonly provider = 'gemini' as const;

  constructor(
    readonly modelName: string,
    private readonly model: GenerativeModel
  ) {}

  openConversation(history: readonly ConversationTurn[]): Conversation {
    return new GeminiConversation(this.model.startChat({ history: history.map(toContent) }));
  }
}

/**
 * Google Gemini via @google/generative-ai.
 */
export class GeminiClient implements GenerativeClient {
  readonly provider = 'gemini' as const;

  constructor(private readonly config: GeminiClientConfig = {}) {}

  bind(credential: string, modelName: string): ModelSession {
    if (!credential.trim()) {
      throw new Error('Credential is empty');
    }
    if (!modelName.trim()) {
      throw new Error('Model name is empty');
    }

    const genAI = new GoogleGenerativeAI(credential);
    const model = genAI.getGenerativeModel(
      {
        model: modelName,
        ...(this.config.temperature !== undefined
          ? { generationConfig: { temperature: this.config.temperature } }
          : {}),
      },
      this.config.timeoutMs !== undefined ? { timeout: this.config.timeoutMs } : undefined
    );

    return new GeminiSession(modelName, model);
  }
}
