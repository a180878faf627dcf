import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { ChatModel } from '../ai/types.js';
import { Dispatcher } from '../channels/dispatcher.js';
import { WebChannel } from '../channels/web/index.js';
import { RoleCatalog } from '../config/roles.js';
import { PluginHost } from '../plugins/host.js';
import { LaneQueue } from '../queue/lane-queue.js';
import { CapabilityRegistry } from '../skills/registry.js';
import {
  handleCapabilities,
  handleLanes,
  handleMessage,
  handlePluginInstall,
  handlePluginReload,
  handlePlugins,
  type ApiDeps,
  type JsonResponder,
} from './api.js';

class MockResponse implements JsonResponder {
  statusCode = 200;
  body: unknown = null;

  status(code: number): JsonResponder {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): unknown {
    this.body = body;
    return this;
  }
}

const upperModel: ChatModel = {
  chat: async turns => ({ content: turns[turns.length - 1].content.toUpperCase(), toolCalls: [] }),
};

describe('API handlers', () => {
  let dir: string;
  let deps: ApiDeps;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'api-test-'));
    const queue = new LaneQueue();
    const registry = new CapabilityRegistry();
    deps = {
      queue,
      registry,
      plugins: new PluginHost({
        dir, registry, env: {}, loadTimeoutMs: 5000, executeTimeoutMs: 5000, allowedProtocols: ['https'],
      }),
      dispatcher: new Dispatcher({
        queue,
        registry,
        model: upperModel,
        roles: new RoleCatalog([{ id: 'assistant', systemInstructions: 'help' }]),
      }),
      web: new WebChannel(),
    };
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('POST /api/message answers with the lane result', async () => {
    const res = new MockResponse();
    await handleMessage(res, deps, { text: 'hello', chatId: 'c1' });

    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.body, { success: true, laneId: 'web:c1', response: 'HELLO', pending: [] });
  });

  it('POST /api/message returns pending deliveries for the chat', async () => {
    await deps.web.sendMessage({ chatId: 'c1', text: 'recovered answer' });
    const res = new MockResponse();
    await handleMessage(res, deps, { text: 'next', chatId: 'c1' });

    assert.deepEqual(res.body, { success: true, laneId: 'web:c1', response: 'NEXT', pending: ['recovered answer'] });
  });

  it('POST /api/message rejects an empty text', async () => {
    const res = new MockResponse();
    await handleMessage(res, deps, { text: '   ' });

    assert.equal(res.statusCode, 400);
    assert.deepEqual(res.body, { error: 'text is required' });
  });

  it('GET /api/lanes reports lane depth and activity', async () => {
    await handleMessage(new MockResponse(), deps, { text: 'x', chatId: 'c9' });
    await deps.queue.whenIdle();

    const res = new MockResponse();
    handleLanes(res, deps);
    assert.deepEqual(res.body, { lanes: { 'web:c9': { depth: 0, active: false } } });
  });

  it('GET /api/capabilities and /api/plugins list loaded plugins', async () => {
    writeFileSync(join(dir, 'ping.mjs'), `
      export const name = 'ping';
      export const description = 'Replies pong';
      export function execute() { return 'pong'; }
    `);
    await deps.plugins.discover();

    const caps = new MockResponse();
    handleCapabilities(caps, deps);
    assert.deepEqual(caps.body, { capabilities: [{ name: 'plugin_ping', description: 'Replies pong' }] });

    const plugins = new MockResponse();
    handlePlugins(plugins, deps);
    const listed = plugins.body;
    assert.ok(listed && typeof listed === 'object' && 'plugins' in listed && Array.isArray(listed.plugins));
    assert.equal(listed.plugins.length, 1);
    assert.equal(listed.plugins[0].name, 'ping');
    assert.equal(listed.plugins[0].ready, true);
  });

  it('POST /api/plugins/:name/reload returns 404 for an unknown plugin', async () => {
    const res = new MockResponse();
    await handlePluginReload(res, deps, 'ghost');

    assert.equal(res.statusCode, 404);
    assert.deepEqual(res.body, { error: "Plugin 'ghost' not found" });
  });

  it('POST /api/plugins/:name/reload reloads a loaded plugin', async () => {
    writeFileSync(join(dir, 'ping.mjs'), `export const name = 'ping'; export function execute() { return 'pong'; }`);
    await deps.plugins.discover();

    const res = new MockResponse();
    await handlePluginReload(res, deps, 'ping');
    assert.deepEqual(res.body, { success: true, message: "Plugin 'ping' reloaded." });
  });

  it('POST /api/plugins/install requires a url', async () => {
    const res = new MockResponse();
    await handlePluginInstall(res, deps, {});

    assert.equal(res.statusCode, 400);
    assert.deepEqual(res.body, { error: 'url is required' });
  });

  it('POST /api/plugins/install reports a rejected install', async () => {
    const res = new MockResponse();
    await handlePluginInstall(res, deps, { url: 'http://example.test/p.mjs' });

    assert.deepEqual(res.body, {
      success: false,
      message: "Protocol 'http' is not allowed for plugin installs (allowed: https).",
    });
  });
});
