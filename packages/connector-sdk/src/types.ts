/**
 * Supported generative-language providers.
 */
export type ProviderId = 'gemini' | 'anthropic';

/**
 * Text extracted from a single PDF page.
 */
export interface PageText {
  pageNumber: number;
  text: string;
  lines: string[];
}

/**
 * Result of document text extraction.
 */
export interface TextExtractionResult {
  success: boolean;
  pages: PageText[];
  fullText: string;
  pageCount: number;
  error?: string;
}

/**
 * Reads a document from disk and returns its text, pages in order.
 *
 * Implementations MUST NOT throw for unreadable documents; they report
 * `success: false` with an error message instead.
 */
export interface TextExtractor {
  extract(path: string): Promise<TextExtractionResult>;
}

/**
 * Classification of a failed service call.
 */
export type ServiceErrorKind =
  | 'rate_limit'
  | 'auth'
  | 'invalid_request'
  | 'not_found'
  | 'server'
  | 'network'
  | 'timeout'
  | 'blocked'
  | 'unknown';

export interface ServiceErrorInfo {
  kind: ServiceErrorKind;
  message: string;
  /** HTTP status, when the service answered */
  status?: number;
}

/**
 * Outcome of sending one message to the service.
 */
export type SendResult =
  | { success: true; text: string }
  | { success: false; error: ServiceErrorInfo };

/**
 * One turn of a conversation transcript.
 */
export interface ConversationTurn {
  role: 'user' | 'model';
  text: string;
}

/**
 * A live chat scope on the remote service.
 */
export interface Conversation {
  /**
   * Send a message and wait for the reply.
   * Service failures are returned as `success: false`, never thrown.
   */
  send(message: string): Promise<SendResult>;
}

/**
 * A model handle bound to one credential.
 */
export interface ModelSession {
  readonly provider: ProviderId;
  readonly modelName: string;

  /**
   * Open a conversation seeded with `history` (empty for a fresh context).
   */
  openConversation(history: readonly ConversationTurn[]): Conversation;
}

/**
 * Client of a remote generative-text service.
 */
export interface GenerativeClient {
  readonly provider: ProviderId;

  /**
   * Bind a credential and model name to a new session.
   * @throws Error when the client rejects the credential or model name
   */
  bind(credential: string, modelName: string): ModelSession;
}
