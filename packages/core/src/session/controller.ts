import type { ConversationTurn, ServiceErrorInfo } from '@docstruct/connector-sdk';
import { CredentialPool, maskCredential } from '../credentials/pool.js';
import { createConsoleLogger, type Logger } from '../logging.js';
import { ConversationContext } from './conversation.js';
import type { BindResult, ModelSessionFactory, SessionHandle } from './factory.js';

export const DEFAULT_MAX_ATTEMPTS = 3;

/**
 * Transient record of one attempt, reported to `onAttempt`.
 */
export interface AttemptRecord {
  /** 1-based attempt number */
  attempt: number;
  maxAttempts: number;
  outcome: 'success' | 'failure' | 'exhausted';
  credential: string;
  error?: ServiceErrorInfo;
}

export interface ResponseControllerOptions {
  modelName: string;
  logger?: Logger;
  onAttempt?: (record: AttemptRecord) => void;
}

/**
 * Drives service calls for one document at a time, rotating credentials on failure.
 *
 * Owns the only live session handle and the current conversation context.
 * Not safe for concurrent use: one document must finish before the next begins.
 */
export class ResponseController {
  private handle: SessionHandle | null = null;
  private context: ConversationContext | null = null;
  private readonly logger: Logger;
  private readonly modelName: string;
  private readonly onAttempt?: (record: AttemptRecord) => void;

  constructor(
    private readonly pool: CredentialPool,
    private readonly factory: ModelSessionFactory,
    options: ResponseControllerOptions
  ) {
    this.modelName = options.modelName;
    this.logger = options.logger ?? createConsoleLogger('Controller');
    this.onAttempt = options.onAttempt;
  }

  /**
   * Bind the pool's current credential. Failure here is fatal to the run.
   */
  initialize(): BindResult {
    const result = this.factory.bind(this.pool.current(), this.modelName);
    this.handle = result.success ? result.handle : null;
    return result;
  }

  get session(): SessionHandle | null {
    return this.handle;
  }

  get conversation(): ConversationContext | null {
    return this.context;
  }

  /**
   * Open a fresh conversation, send `prompt` and return the reply text.
   *
   * The conversation stays open afterwards (for `continueResponse`) until
   * `endConversation` is called.
   *
   * @returns the reply, or null when every attempt failed
   */
  async obtainResponse(prompt: string, maxAttempts = DEFAULT_MAX_ATTEMPTS): Promise<string | null> {
    if (this.handle === null) {
      this.logger.error('No model session bound. Cannot start a conversation.');
      return null;
    }

    return this.runAttempts(prompt, maxAttempts, 'Starting new conversation', () => {
      this.closeContext();
      const handle = this.requireHandle();
      this.context = ConversationContext.open(handle);
      return this.context;
    });
  }

  /**
   * Send a follow-up message in the conversation left open by `obtainResponse`.
   *
   * After a rotation the conversation is reopened on the new session with the
   * transcript collected so far.
   */
  async continueResponse(message: string, maxAttempts = DEFAULT_MAX_ATTEMPTS): Promise<string | null> {
    if (this.context === null || !this.context.isOpen) {
      this.logger.error('No open conversation. Start one with obtainResponse first.');
      return null;
    }
    if (this.handle === null) {
      this.logger.error('No model session bound. Cannot continue the conversation.');
      return null;
    }

    return this.runAttempts(message, maxAttempts, 'Continuing conversation', () => {
      const handle = this.requireHandle();
      const current = this.context;
      if (current !== null && current.isOpen && current.handle === handle) {
        return current;
      }
      const history: readonly ConversationTurn[] = current?.history ?? [];
      current?.close();
      this.context = ConversationContext.open(handle, history);
      this.logger.info(`Conversation reopened with ${history.length} previous turn(s)`);
      return this.context;
    });
  }

  /**
   * Close the current conversation, if any.
   *
   * @returns false when there was nothing to close
   */
  endConversation(): boolean {
    if (this.context === null) {
      this.logger.info('No active conversation to end.');
      return false;
    }
    this.closeContext();
    this.logger.info('Conversation ended.');
    return true;
  }

  private async runAttempts(
    message: string,
    maxAttempts: number,
    label: string,
    acquireContext: () => ConversationContext
  ): Promise<string | null> {
    const bound = Math.max(1, Math.floor(maxAttempts));

    for (let attempt = 0; attempt < bound; attempt++) {
      const isFinalAttempt = attempt === bound - 1;
      const context = acquireContext();
      const credential = context.handle.credential;

      this.logger.info(`${label} (attempt ${attempt + 1}/${bound})`);
      const result = await context.send(message);

      if (result.success) {
        this.logger.info('Response received.');
        this.report({ attempt: attempt + 1, maxAttempts: bound, outcome: 'success', credential });
        return result.text;
      }

      this.logger.error(`Service call failed [${result.error.kind}]: ${result.error.message}`);
      this.report({
        attempt: attempt + 1,
        maxAttempts: bound,
        outcome: isFinalAttempt ? 'exhausted' : 'failure',
        credential,
        error: result.error,
      });

      if (isFinalAttempt) {
        this.logger.warn('Maximum number of attempts reached.');
        return null;
      }

      if (this.pool.size > 1) {
        if (!this.rotate()) {
          this.logger.error('Credential rotation failed. Giving up on this request.');
          return null;
        }
      } else {
        this.logger.info('Only one credential available. Retrying without rotation.');
      }
    }

    return null;
  }

  /**
   * Advance the pool and rebind. On a failed bind the previous credential
   * stays current and the previous handle stays live.
   */
  private rotate(): boolean {
    const rotation = this.pool.advance();
    if (!rotation.rotated) {
      return false;
    }

    this.logger.info(
      `Rotating credential ${rotation.previousIndex + 1} -> ${rotation.index + 1} (${maskCredential(rotation.credential)})`
    );

    const result = this.factory.bind(rotation.credential, this.modelName);
    if (!result.success) {
      this.pool.restore(rotation.previousIndex);
      this.logger.warn(`Restored previous credential ${rotation.previousIndex + 1}.`);
      return false;
    }

    this.handle = result.handle;
    return true;
  }

  private requireHandle(): SessionHandle {
    if (this.handle === null) {
      throw new Error('Model session lost during attempts');
    }
    return this.handle;
  }

  private closeContext(): void {
    this.context?.close();
    this.context = null;
  }

  private report(record: AttemptRecord): void {
    this.onAttempt?.(record);
  }
}
