import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { CapabilityRegistry } from './registry.js';
import type { CapabilityDescriptor, Skill, ToolDefinition } from './types.js';

function echoCapability(name: string, reply: string): CapabilityDescriptor {
  return {
    name,
    description: `returns ${reply}`,
    parameters: { type: 'object', properties: { text: { type: 'string' } } },
    invoke: () => reply,
  };
}

describe('CapabilityRegistry', () => {
  it('invokes a registered capability by name', async () => {
    const registry = new CapabilityRegistry();
    registry.register({
      name: 'shout',
      description: 'upper-cases text',
      parameters: { type: 'object', properties: { text: { type: 'string' } }, required: ['text'] },
      invoke: async args => String(args.text).toUpperCase(),
    });

    assert.equal(await registry.invoke('shout', { text: 'hi' }), 'HI');
  });

  it('replaces an earlier registration with the same name', async () => {
    const registry = new CapabilityRegistry();
    registry.register(echoCapability('weather', 'v1'));
    registry.register(echoCapability('weather', 'v2'));

    assert.deepEqual(registry.names(), ['weather']);
    assert.equal(await registry.invoke('weather', {}), 'v2');
  });

  it('returns an error string for an unknown capability', async () => {
    const registry = new CapabilityRegistry();
    assert.equal(await registry.invoke('nope', {}), "Error: unknown capability 'nope'");
  });

  it('returns an error string when the capability throws', async () => {
    const registry = new CapabilityRegistry();
    registry.register({
      name: 'explode',
      description: 'always fails',
      parameters: { type: 'object', properties: {} },
      invoke: () => {
        throw new Error('kaboom');
      },
    });

    assert.equal(await registry.invoke('explode', {}), "Error executing 'explode': kaboom");
  });

  it('rejects arguments that do not match the declared schema without invoking', async () => {
    const registry = new CapabilityRegistry();
    let called = false;
    registry.register({
      name: 'count',
      description: 'needs a number',
      parameters: { type: 'object', properties: { n: { type: 'number' } }, required: ['n'] },
      invoke: () => {
        called = true;
        return 'ok';
      },
    });

    const result = await registry.invoke('count', { n: 'three' });
    assert.equal(called, false);
    assert.equal(result, "Error: invalid arguments for 'count': /n: must be number");
  });

  it('lists schemas in OpenAI function format, optionally filtered', () => {
    const registry = new CapabilityRegistry();
    registry.register(echoCapability('search', 'r'));
    registry.register(echoCapability('delete_everything', 'gone'));

    assert.deepEqual(registry.listSchemas(name => name === 'search'), [
      {
        type: 'function',
        function: {
          name: 'search',
          description: 'returns r',
          parameters: { type: 'object', properties: { text: { type: 'string' } } },
        },
      },
    ]);
    assert.equal(registry.listSchemas().length, 2);
  });

  it('registers every tool of a skill and routes execution to it', async () => {
    const calls: string[] = [];
    const tools: ToolDefinition[] = [
      { name: 'alpha', description: 'a', parameters: { type: 'object', properties: {} } },
      { name: 'beta', description: 'b', parameters: { type: 'object', properties: {} } },
    ];
    const skill: Skill = {
      id: 'demo',
      name: 'Demo',
      description: 'demo skill',
      getTools: () => tools,
      execute: async toolName => {
        calls.push(toolName);
        return `ran ${toolName}`;
      },
    };

    const registry = new CapabilityRegistry();
    registry.registerSkill(skill);

    assert.deepEqual(registry.names(), ['alpha', 'beta']);
    assert.equal(await registry.invoke('beta', {}), 'ran beta');
    assert.deepEqual(calls, ['beta']);
  });

  it('unregisters a capability', async () => {
    const registry = new CapabilityRegistry();
    registry.register(echoCapability('temp', 'x'));

    assert.equal(registry.unregister('temp'), true);
    assert.equal(registry.unregister('temp'), false);
    assert.equal(registry.has('temp'), false);
  });
});
