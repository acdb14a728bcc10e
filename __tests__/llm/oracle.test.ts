import { describe, it, expect, vi, beforeEach } from 'vitest';

const sdk = vi.hoisted(() => ({
  create: vi.fn(),
  clientOptions: [] as unknown[],
}));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create: sdk.create } };

    constructor(options: unknown) {
      sdk.clientOptions.push(options);
    }
  },
}));

import { OpenAIChatOracle } from '../../src/llm/oracle.js';
import { OracleResponseError, OracleUnavailableError } from '../../src/utils/errors.js';

const baseRequest = {
  messages: [
    { role: 'system' as const, content: 'be brief' },
    { role: 'user' as const, content: 'hello' },
  ],
  temperature: 0.3,
  maxCompletionTokens: 512,
  topP: 0.9,
};

describe('OpenAIChatOracle', () => {
  beforeEach(() => {
    sdk.create.mockReset();
    sdk.clientOptions.length = 0;
  });

  it('configures the client for the given endpoint without SDK retries', () => {
    new OpenAIChatOracle({
      apiKey: 'test-key',
      model: 'test-model',
      baseUrl: 'http://localhost:9999/v1',
      timeoutMs: 1500,
    });

    expect(sdk.clientOptions).toEqual([
      { apiKey: 'test-key', baseURL: 'http://localhost:9999/v1', timeout: 1500, maxRetries: 0 },
    ]);
  });

  it('sends the request parameters and returns trimmed content', async () => {
    sdk.create.mockResolvedValue({ choices: [{ message: { content: '  Refunds take 30 days.  ' } }] });
    const oracle = new OpenAIChatOracle({ apiKey: 'test-key', model: 'test-model' });

    const answer = await oracle.complete(baseRequest);

    expect(answer).toBe('Refunds take 30 days.');
    expect(sdk.create).toHaveBeenCalledWith({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'be brief' },
        { role: 'user', content: 'hello' },
      ],
      temperature: 0.3,
      max_completion_tokens: 512,
      top_p: 0.9,
      stream: false,
    });
  });

  it('passes the reasoning effort hint only when set', async () => {
    sdk.create.mockResolvedValue({ choices: [{ message: { content: 'ok' } }] });
    const oracle = new OpenAIChatOracle({ apiKey: 'test-key', model: 'test-model' });

    await oracle.complete({ ...baseRequest, reasoningEffort: 'low' });

    expect(sdk.create.mock.calls[0][0]).toMatchObject({ reasoning_effort: 'low' });
  });

  it('wraps transport failures', async () => {
    sdk.create.mockRejectedValue(new Error('Request timed out.'));
    const oracle = new OpenAIChatOracle({ apiKey: 'test-key', model: 'test-model' });

    const failure = oracle.complete(baseRequest);

    await expect(failure).rejects.toBeInstanceOf(OracleUnavailableError);
    await expect(failure).rejects.toThrow('Chat completion failed: Request timed out.');
  });

  it('rejects a reply without content', async () => {
    sdk.create.mockResolvedValue({ choices: [{ message: { content: '   ' } }] });
    const oracle = new OpenAIChatOracle({ apiKey: 'test-key', model: 'test-model' });

    await expect(oracle.complete(baseRequest)).rejects.toBeInstanceOf(OracleResponseError);
  });
});
