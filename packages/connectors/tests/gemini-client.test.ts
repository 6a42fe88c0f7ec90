import { describe, it, expect, vi, beforeEach } from 'vitest';

const mocks = vi.hoisted(() => ({
  constructed: vi.fn(),
  getGenerativeModel: vi.fn(),
  startChat: vi.fn(),
  sendMessage: vi.fn(),
}));

vi.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI: class {
    constructor(apiKey: string) {
      mocks.constructed(apiKey);
    }

    getGenerativeModel(...args: unknown[]) {
      return mocks.getGenerativeModel(...args);
    }
  },
}));

// Import after mock setup
const { GeminiClient, DEFAULT_GEMINI_MODEL } = await import('../src/llm/gemini-client.js');

describe('GeminiClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mocks.getGenerativeModel.mockReturnValue({ startChat: mocks.startChat });
    mocks.startChat.mockReturnValue({ sendMessage: mocks.sendMessage });
  });

  it('defaults to gemini-2.5-flash', () => {
    expect(DEFAULT_GEMINI_MODEL).toBe('gemini-2.5-flash');
  });

  describe('bind', () => {
    it('creates a model for the credential with the request timeout', () => {
      const client = new GeminiClient({ timeoutMs: 5000 });

      const session = client.bind('test-key', 'gemini-2.5-flash');

      expect(mocks.constructed).toHaveBeenCalledWith('test-key');
      expect(mocks.getGenerativeModel).toHaveBeenCalledWith({ model: 'gemini-2.5-flash' }, { timeout: 5000 });
      expect(session.provider).toBe('gemini');
      expect(session.modelName).toBe('gemini-2.5-flash');
    });

    it('passes the temperature as generation config', () => {
      new GeminiClient({ temperature: 0 }).bind('test-key', 'gemini-2.5-flash');

      expect(mocks.getGenerativeModel).toHaveBeenCalledWith(
        { model: 'gemini-2.5-flash', generationConfig: { temperature: 0 } },
        undefined
      );
    });

    it('rejects an empty credential or model name', () => {
      const client = new GeminiClient();
      expect(() => client.bind('  ', 'gemini-2.5-flash')).toThrow('Credential is empty');
      expect(() => client.bind('test-key', '')).toThrow('Model name is empty');
      expect(mocks.constructed).not.toHaveBeenCalled();
    });
  });

  describe('conversations', () => {
    it('seeds the chat with the given history', () => {
      const session = new GeminiClient().bind('test-key', 'gemini-2.5-flash');

      session.openConversation([
        { role: 'user', text: 'question' },
        { role: 'model', text: 'answer' },
      ]);

      expect(mocks.startChat).toHaveBeenCalledWith({
        history: [
          { role: 'user', parts: [{ text: 'question' }] },
          { role: 'model', parts: [{ text: 'answer' }] },
        ],
      });
    });

    it('returns the reply text', async () => {
      mocks.sendMessage.mockResolvedValue({ response: { text: () => '{"total": 10}' } });
      const conversation = new GeminiClient().bind('test-key', 'gemini-2.5-flash').openConversation([]);

      const result = await conversation.send('prompt');

      expect(mocks.sendMessage).toHaveBeenCalledWith('prompt');
      expect(result).toEqual({ success: true, text: '{"total": 10}' });
    });

    it('returns a classified failure instead of throwing', async () => {
      mocks.sendMessage.mockRejectedValue(
        Object.assign(new Error('[GoogleGenerativeAI Error]: [429 Too Many Requests]'), { status: 429 })
      );
      const conversation = new GeminiClient().bind('test-key', 'gemini-2.5-flash').openConversation([]);

      const result = await conversation.send('prompt');

      expect(result).toEqual({
        success: false,
        error: {
          kind: 'rate_limit',
          message: '[GoogleGenerativeAI Error]: [429 Too Many Requests]',
          status: 429,
        },
      });
    });
  });
});
