import { Router } from 'express';
import type { Dispatcher } from '../channels/dispatcher.js';
import { laneIdFor } from '../channels/types.js';
import type { WebChannel } from '../channels/web/index.js';
import type { PluginHost } from '../plugins/host.js';
import type { LaneQueue } from '../queue/lane-queue.js';
import type { CapabilityRegistry } from '../skills/registry.js';
import { authMiddleware } from './auth.js';

/** Часть express Response, которую используют обработчики */
export interface JsonResponder {
  status(code: number): JsonResponder;
  json(body: unknown): unknown;
}

export interface ApiDeps {
  queue: LaneQueue;
  registry: CapabilityRegistry;
  plugins: PluginHost;
  dispatcher: Dispatcher;
  web: WebChannel;
}

function isObject(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === 'object' && !Array.isArray(v);
}

function stringField(body: unknown, key: string): string {
  if (!isObject(body)) return '';
  const value = body[key];
  return typeof value === 'string' ? value.trim() : '';
}

// ============================================
// Обработчики (express-независимые, для тестов)
// ============================================

export function handleLanes(res: JsonResponder, deps: ApiDeps): void {
  res.json({ lanes: deps.queue.snapshot() });
}

export function handlePlugins(res: JsonResponder, deps: ApiDeps): void {
  res.json({ plugins: deps.plugins.listPlugins() });
}

export function handleCapabilities(res: JsonResponder, deps: ApiDeps): void {
  res.json({
    capabilities: deps.registry.list().map(c => ({ name: c.name, description: c.description })),
  });
}

export async function handlePluginReload(res: JsonResponder, deps: ApiDeps, name: string): Promise<void> {
  if (!deps.plugins.has(name)) {
    res.status(404).json({ error: `Plugin '${name}' not found` });
    return;
  }
  const message = await deps.plugins.reload(name);
  res.json({ success: deps.plugins.has(name) && !message.startsWith('Error'), message });
}

export async function handlePluginInstall(res: JsonResponder, deps: ApiDeps, body: unknown): Promise<void> {
  const url = stringField(body, 'url');
  if (!url) {
    res.status(400).json({ error: 'url is required' });
    return;
  }
  const message = await deps.plugins.installFromUrl(url);
  res.json({ success: message.endsWith('installed and loaded.'), message });
}

/** Веб-сообщение: ставится в полосу web:<chatId>, ответ — результат этой полосы */
export async function handleMessage(res: JsonResponder, deps: ApiDeps, body: unknown): Promise<void> {
  const text = stringField(body, 'text');
  const chatId = stringField(body, 'chatId') || 'web-default';
  if (!text) {
    res.status(400).json({ error: 'text is required' });
    return;
  }

  const laneId = laneIdFor(deps.web.id, chatId);
  const pending = deps.web.drainOutbox(chatId);
  const response = await deps.dispatcher.submitAndWait(laneId, text);
  res.json({ success: true, laneId, response, pending });
}

// ============================================
// Роутер
// ============================================

export function createApiRouter(deps: ApiDeps) {
  const router = Router();

  // Все /api/* роуты защищены
  router.use(authMiddleware);

  router.get('/api/lanes', (req, res) => {
    handleLanes(res, deps);
  });

  router.get('/api/plugins', (req, res) => {
    handlePlugins(res, deps);
  });

  router.get('/api/capabilities', (req, res) => {
    handleCapabilities(res, deps);
  });

  router.post('/api/plugins/:name/reload', async (req, res) => {
    try {
      await handlePluginReload(res, deps, req.params.name);
    } catch (error) {
      console.error('❌ Ошибка перезагрузки плагина:', error);
      res.status(500).json({ error: 'Plugin reload failed' });
    }
  });

  router.post('/api/plugins/install', async (req, res) => {
    try {
      await handlePluginInstall(res, deps, req.body);
    } catch (error) {
      console.error('❌ Ошибка установки плагина:', error);
      res.status(500).json({ error: 'Plugin install failed' });
    }
  });

  router.post('/api/message', async (req, res) => {
    try {
      await handleMessage(res, deps, req.body);
    } catch (error) {
      console.error('❌ Ошибка обработки сообщения:', error);
      res.status(500).json({ error: 'Message processing failed' });
    }
  });

  return router;
}
