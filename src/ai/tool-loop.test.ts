import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createRole } from '../config/roles.js';
import { CapabilityRegistry } from '../skills/registry.js';
import type { ToolSchema } from '../skills/types.js';
import { ToolLoop, NO_RESPONSE_FALLBACK, deniedMessage, withContextHint } from './tool-loop.js';
import type { ChatModel, ChatResponse, ConversationTurn } from './types.js';

interface RecordedCall {
  turns: ConversationTurn[];
  toolNames: string[];
  maxTokens?: number;
}

/** Модель со сценарием: отдаёт ответы по очереди, последний повторяется */
class ScriptedModel implements ChatModel {
  calls: RecordedCall[] = [];

  constructor(private readonly script: ChatResponse[]) {}

  async chat(turns: ConversationTurn[], tools: ToolSchema[], options?: { maxTokens?: number }): Promise<ChatResponse> {
    this.calls.push({
      turns: turns.map(t => ({ ...t })),
      toolNames: tools.map(t => t.function.name),
      maxTokens: options?.maxTokens,
    });
    return this.script[Math.min(this.calls.length - 1, this.script.length - 1)];
  }
}

function text(content: string): ChatResponse {
  return { content, toolCalls: [] };
}

function registryWith(log: string[]): CapabilityRegistry {
  const registry = new CapabilityRegistry();
  for (const name of ['search', 'delete_everything']) {
    registry.register({
      name,
      description: name,
      parameters: { type: 'object', properties: { q: { type: 'string' } } },
      invoke: args => {
        log.push(name);
        return `${name}:${String(args.q ?? '')}`;
      },
    });
  }
  return registry;
}

const researcher = createRole({
  id: 'researcher',
  systemInstructions: 'research only',
  capabilityWhitelist: ['search'],
  maxReplyTokens: 321,
});
const unrestricted = createRole({ id: 'assistant', systemInstructions: 'help', capabilityWhitelist: null });

describe('ToolLoop', () => {
  it('returns the plain answer when no tools are requested', async () => {
    const model = new ScriptedModel([text('42')]);
    const loop = new ToolLoop({ model, registry: registryWith([]) });

    assert.equal(await loop.run(unrestricted, 'question'), '42');
    assert.equal(model.calls.length, 1);
    assert.deepEqual(model.calls[0].turns, [
      { role: 'system', content: 'help' },
      { role: 'user', content: 'question' },
    ]);
  });

  it('offers only whitelisted capabilities and passes the role token limit', async () => {
    const model = new ScriptedModel([text('done')]);
    await new ToolLoop({ model, registry: registryWith([]) }).run(researcher, 'go');

    assert.deepEqual(model.calls[0].toolNames, ['search']);
    assert.equal(model.calls[0].maxTokens, 321);
  });

  it('denies a capability outside the whitelist without invoking it', async () => {
    const log: string[] = [];
    const model = new ScriptedModel([
      { content: '', toolCalls: [{ id: 'c1', name: 'delete_everything', argsJson: '{}' }] },
      text('finished'),
    ]);

    const result = await new ToolLoop({ model, registry: registryWith(log) }).run(researcher, 'clean up');

    assert.equal(result, 'finished');
    assert.deepEqual(log, []);
    assert.equal(model.calls.length, 2);
    const turns = model.calls[1].turns;
    assert.deepEqual(turns[turns.length - 1], {
      role: 'tool',
      toolCallId: 'c1',
      content: "[DENIED] capability 'delete_everything' not permitted for this role",
    });
  });

  it('appends the assistant turn then one tool turn per call in request order', async () => {
    const log: string[] = [];
    const toolCalls = [
      { id: 'a', name: 'search', argsJson: '{"q":"first"}' },
      { id: 'b', name: 'delete_everything', argsJson: '{"q":"second"}' },
    ];
    const model = new ScriptedModel([{ content: 'thinking', toolCalls }, text('ok')]);

    await new ToolLoop({ model, registry: registryWith(log) }).run(unrestricted, 'do both');

    assert.deepEqual(log, ['search', 'delete_everything']);
    assert.deepEqual(model.calls[1].turns.slice(2), [
      { role: 'assistant', content: 'thinking', toolCalls },
      { role: 'tool', toolCallId: 'a', content: 'search:first' },
      { role: 'tool', toolCallId: 'b', content: 'delete_everything:second' },
    ]);
  });

  it('turns malformed argument JSON into an error result', async () => {
    const log: string[] = [];
    const model = new ScriptedModel([
      { content: '', toolCalls: [{ id: 'x', name: 'search', argsJson: '[1,2]' }] },
      text('ok'),
    ]);

    await new ToolLoop({ model, registry: registryWith(log) }).run(unrestricted, 'q');

    assert.deepEqual(log, []);
    const last = model.calls[1].turns[model.calls[1].turns.length - 1];
    assert.equal(last.content, "Error: invalid arguments for 'search': expected a JSON object");
  });

  it('stops after the round limit and uses the fallback for an empty reply', async () => {
    const model = new ScriptedModel([
      { content: '', toolCalls: [{ id: 'loop', name: 'search', argsJson: '{}' }] },
    ]);

    const result = await new ToolLoop({ model, registry: registryWith([]) }).run(unrestricted, 'forever');

    assert.equal(result, NO_RESPONSE_FALLBACK);
    assert.equal(model.calls.length, 6);
  });

  it('prefixes the context hint to the user turn', async () => {
    const model = new ScriptedModel([text('ok')]);
    await new ToolLoop({ model, registry: registryWith([]) }).run(unrestricted, 'mission', 'user asked about cats');

    assert.equal(
      model.calls[0].turns[1].content,
      '[RECENT CONVERSATION CONTEXT]\nuser asked about cats\n[END OF CONTEXT]\n\nmission',
    );
  });

  it('reports progress through onStatus', async () => {
    const statuses: string[] = [];
    const model = new ScriptedModel([
      { content: '', toolCalls: [{ id: '1', name: 'search', argsJson: '{}' }] },
      text('ok'),
    ]);

    await new ToolLoop({
      model,
      registry: registryWith([]),
      onStatus: async s => {
        statuses.push(s);
      },
    }).run(unrestricted, 'q');

    assert.deepEqual(statuses, ['Using search...', 'Analysing results (round 1)...']);
  });

  it('keeps running when the status callback rejects', async () => {
    const log: string[] = [];
    const model = new ScriptedModel([
      { content: '', toolCalls: [{ id: '1', name: 'search', argsJson: '{"q":"x"}' }] },
      text('done'),
    ]);

    const result = await new ToolLoop({
      model,
      registry: registryWith(log),
      onStatus: async () => {
        throw new Error('chat gone');
      },
    }).run(unrestricted, 'q');

    assert.equal(result, 'done');
    assert.deepEqual(log, ['search']);
    assert.equal(model.calls[1].turns[3].content, 'search:x');
  });

  it('propagates chat failures', async () => {
    const model: ChatModel = {
      chat: async () => {
        throw new Error('provider down');
      },
    };
    await assert.rejects(() => new ToolLoop({ model, registry: registryWith([]) }).run(unrestricted, 'q'), /provider down/);
  });
});

describe('helpers', () => {
  it('formats the denial message', () => {
    assert.equal(deniedMessage('x'), "[DENIED] capability 'x' not permitted for this role");
  });

  it('leaves the prompt untouched without a hint', () => {
    assert.equal(withContextHint('p'), 'p');
    assert.equal(withContextHint('p', '   '), 'p');
  });
});
