import { describe, it, expect, vi, beforeEach } from 'vitest';

const mocks = vi.hoisted(() => ({
  constructed: vi.fn(),
  create: vi.fn(),
}));

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create: mocks.create };

    constructor(options: unknown) {
      mocks.constructed(options);
    }
  },
}));

// Import after mock setup
const { AnthropicClient } = await import('../src/llm/anthropic-client.js');

describe('AnthropicClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('disables SDK retries and applies the timeout', () => {
    new AnthropicClient({ timeoutMs: 1000 }).bind('test-key', 'claude-sonnet-4-20250514');

    expect(mocks.constructed).toHaveBeenCalledWith({ apiKey: 'test-key', maxRetries: 0, timeout: 1000 });
  });

  it('rejects an empty credential', () => {
    expect(() => new AnthropicClient().bind('', 'claude-sonnet-4-20250514')).toThrow('Credential is empty');
  });

  it('joins text blocks of the reply and keeps the exchange for follow-ups', async () => {
    mocks.create
      .mockResolvedValueOnce({
        content: [
          { type: 'text', text: '{"a"' },
          { type: 'tool_use', id: 'tool-1', name: 'noop', input: {} },
          { type: 'text', text: ': 1}' },
        ],
      })
      .mockResolvedValueOnce({ content: [{ type: 'text', text: 'second' }] });

    const conversation = new AnthropicClient()
      .bind('test-key', 'claude-sonnet-4-20250514')
      .openConversation([]);

    const first = await conversation.send('hi');
    const second = await conversation.send('again');

    expect(first).toEqual({ success: true, text: '{"a": 1}' });
    expect(second).toEqual({ success: true, text: 'second' });
    expect(mocks.create).toHaveBeenNthCalledWith(1, {
      model: 'claude-sonnet-4-20250514',
      max_tokens: 8192,
      temperature: 0,
      messages: [{ role: 'user', content: 'hi' }],
    });
    expect(mocks.create).toHaveBeenNthCalledWith(2, {
      model: 'claude-sonnet-4-20250514',
      max_tokens: 8192,
      temperature: 0,
      messages: [
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: '{"a": 1}' },
        { role: 'user', content: 'again' },
      ],
    });
  });

  it('maps model turns of the history to assistant messages', async () => {
    mocks.create.mockResolvedValue({ content: [{ type: 'text', text: 'ok' }] });

    const conversation = new AnthropicClient({ maxTokens: 100 })
      .bind('test-key', 'claude-sonnet-4-20250514')
      .openConversation([
        { role: 'user', text: 'q' },
        { role: 'model', text: 'a' },
      ]);
    await conversation.send('next');

    expect(mocks.create).toHaveBeenCalledWith(
      expect.objectContaining({
        max_tokens: 100,
        messages: [
          { role: 'user', content: 'q' },
          { role: 'assistant', content: 'a' },
          { role: 'user', content: 'next' },
        ],
      })
    );
  });

  it('returns a classified failure instead of throwing', async () => {
    mocks.create.mockRejectedValue(Object.assign(new Error('invalid x-api-key'), { status: 401 }));

    const conversation = new AnthropicClient()
      .bind('test-key', 'claude-sonnet-4-20250514')
      .openConversation([]);

    await expect(conversation.send('hi')).resolves.toEqual({
      success: false,
      error: { kind: 'auth', message: 'invalid x-api-key', status: 401 },
    });
  });
});
