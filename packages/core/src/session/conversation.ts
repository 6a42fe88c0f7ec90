import type { Conversation, ConversationTurn, SendResult } from '@docstruct/connector-sdk';
import { errorMessage } from '../errors.js';
import type { SessionHandle } from './factory.js';

/**
 * One document's exchange with the service.
 *
 * Tracks its own transcript so it can be reopened on another session.
 * Once closed it never reaches the service again.
 */
export class ConversationContext {
  private conversation: Conversation | null;
  private readonly turns: ConversationTurn[];

  private constructor(
    readonly handle: SessionHandle,
    history: readonly ConversationTurn[]
  ) {
    this.turns = [...history];
    this.conversation = handle.session.openConversation([...this.turns]);
  }

  static open(handle: SessionHandle, history: readonly ConversationTurn[] = []): ConversationContext {
    return new ConversationContext(handle, history);
  }

  get isOpen(): boolean {
    return this.conversation !== null;
  }

  get history(): readonly ConversationTurn[] {
    return [...this.turns];
  }

  async send(message: string): Promise<SendResult> {
    const conversation = this.conversation;
    if (conversation === null) {
      return {
        success: false,
        error: { kind: 'invalid_request', message: 'Conversation context is closed' },
      };
    }

    let result: SendResult;
    try {
      result = await conversation.send(message);
    } catch (error) {
      // Collaborators should not throw, but a stray rejection still counts as a failed attempt
      result = { success: false, error: { kind: 'unknown', message: errorMessage(error) } };
    }

    if (result.success) {
      this.turns.push({ role: 'user', text: message }, { role: 'model', text: result.text });
    }
    return result;
  }

  close(): void {
    this.conversation = null;
  }
}
