import { describe, it, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import { OpenAIChatModel, createChatModel } from './openai-client.js';
import type { ConversationTurn } from './types.js';

const MODEL = { provider: 'openai' as const, model: 'test/model', apiKey: 'test-key' };

describe('OpenAIChatModel', () => {
  const originalFetch = global.fetch;

  afterEach(() => {
    global.fetch = originalFetch;
  });

  function mockFetchJson(status: number, body: unknown) {
    const fn = mock.fn(async (_url: string, _init: RequestInit) => new Response(JSON.stringify(body), { status }));
    global.fetch = fn as unknown as typeof fetch;
    return fn;
  }

  it('sends turns and tools in OpenAI format and parses tool calls', async () => {
    const fetchMock = mockFetchJson(200, {
      model: 'test/model-2024',
      usage: { total_tokens: 42 },
      choices: [{
        message: {
          content: null,
          tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'search', arguments: '{"q":"x"}' } }],
        },
      }],
    });

    const turns: ConversationTurn[] = [
      { role: 'system', content: 'be brief' },
      { role: 'user', content: 'find x' },
      { role: 'assistant', content: '', toolCalls: [{ id: 'c0', name: 'search', argsJson: '{}' }] },
      { role: 'tool', content: 'nothing', toolCallId: 'c0' },
    ];
    const tools = [{
      type: 'function' as const,
      function: { name: 'search', description: 'web search', parameters: { type: 'object' as const, properties: {} } },
    }];

    const model = new OpenAIChatModel(MODEL);
    const response = await model.chat(turns, tools, { maxTokens: 256 });

    assert.deepEqual(response, {
      content: '',
      toolCalls: [{ id: 'call_1', name: 'search', argsJson: '{"q":"x"}' }],
      model: 'test/model-2024',
      tokensUsed: 42,
    });

    const [url, init] = fetchMock.mock.calls[0].arguments;
    assert.equal(url, 'https://api.openai.com/v1/chat/completions');
    const sent = JSON.parse(String(init.body));
    assert.equal(sent.model, 'test/model');
    assert.equal(sent.max_tokens, 256);
    assert.deepEqual(sent.tools, tools);
    assert.deepEqual(sent.messages, [
      { role: 'system', content: 'be brief' },
      { role: 'user', content: 'find x' },
      {
        role: 'assistant',
        content: '',
        tool_calls: [{ id: 'c0', type: 'function', function: { name: 'search', arguments: '{}' } }],
      },
      { role: 'tool', tool_call_id: 'c0', content: 'nothing' },
    ]);
  });

  it('omits tools when none are offered', async () => {
    const fetchMock = mockFetchJson(200, { choices: [{ message: { content: 'hi' } }] });

    const response = await new OpenAIChatModel(MODEL).chat([{ role: 'user', content: 'hello' }], []);
    assert.equal(response.content, 'hi');
    assert.deepEqual(response.toolCalls, []);

    const sent = JSON.parse(String(fetchMock.mock.calls[0].arguments[1].body));
    assert.equal('tools' in sent, false);
  });

  it('throws with the API error message on a non-retryable failure', async () => {
    mockFetchJson(401, { error: { message: 'invalid api key' } });

    await assert.rejects(
      () => new OpenAIChatModel(MODEL).chat([{ role: 'user', content: 'x' }], []),
      { message: 'OpenAI API error: invalid api key' },
    );
  });
});

describe('createChatModel', () => {
  it('returns null when AI is disabled or the key is missing', () => {
    assert.equal(createChatModel({ provider: 'none', model: 'none', apiKey: '' }), null);
    assert.equal(createChatModel({ provider: 'openai', model: 'm', apiKey: '' }), null);
  });

  it('returns an OpenAI model when configured', () => {
    assert.ok(createChatModel(MODEL) instanceof OpenAIChatModel);
  });
});
