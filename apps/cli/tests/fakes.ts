import { basename } from 'path';
import type {
  Conversation,
  ConversationTurn,
  GenerativeClient,
  ModelSession,
  SendResult,
  TextExtractionResult,
  TextExtractor,
} from '@docstruct/connector-sdk';
import type { ResponseSource } from '../src/pipeline/driver.js';

export function textResult(fullText: string): TextExtractionResult {
  return {
    success: true,
    pages: [{ pageNumber: 1, text: fullText, lines: fullText.split('\n') }],
    fullText,
    pageCount: 1,
  };
}

/**
 * Returns canned text per file name instead of parsing PDFs.
 */
export class FakeExtractor implements TextExtractor {
  readonly paths: string[] = [];

  constructor(private readonly results: Record<string, TextExtractionResult> = {}) {}

  async extract(path: string): Promise<TextExtractionResult> {
    this.paths.push(path);
    const name = basename(path);
    return this.results[name] ?? textResult(`Text of ${name}`);
  }
}

/**
 * Stands in for the response controller; replies are handed out in order.
 */
export class ScriptedResponses implements ResponseSource {
  readonly prompts: string[] = [];
  readonly maxAttempts: Array<number | undefined> = [];
  endCount = 0;

  constructor(private readonly replies: Array<string | null | Error>) {}

  async obtainResponse(prompt: string, maxAttempts?: number): Promise<string | null> {
    this.prompts.push(prompt);
    this.maxAttempts.push(maxAttempts);
    const next = this.replies.shift();
    if (next instanceof Error) throw next;
    return next ?? null;
  }

  endConversation(): boolean {
    this.endCount++;
    return true;
  }
}

class StubConversation implements Conversation {
  constructor(
    private readonly credential: string,
    private readonly client: StubClient
  ) {}

  async send(message: string): Promise<SendResult> {
    this.client.calls.push({ credential: this.credential, message });
    if (this.client.failing.has(this.credential)) {
      return {
        success: false,
        error: { kind: 'rate_limit', message: 'Resource has been exhausted', status: 429 },
      };
    }
    return { success: true, text: this.client.replyText };
  }
}

/**
 * In-process generative client for end-to-end runs of the CLI.
 */
export class StubClient implements GenerativeClient {
  readonly provider = 'gemini' as const;
  readonly calls: Array<{ credential: string; message: string }> = [];
  readonly bound: string[] = [];
  readonly failing = new Set<string>();
  readonly rejected = new Set<string>();
  replyText = '{"status": "ok"}';

  bind(credential: string, modelName: string): ModelSession {
    this.bound.push(credential);
    if (this.rejected.has(credential)) {
      throw new Error('API key not valid. Please pass a valid API key.');
    }
    return {
      provider: this.provider,
      modelName,
      openConversation: (_history: readonly ConversationTurn[]) => new StubConversation(credential, this),
    };
  }
}
