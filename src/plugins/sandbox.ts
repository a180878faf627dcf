/**
 * sandbox.ts — загрузка и запуск плагина в отдельном worker_threads воркере.
 *
 * Каждый describe/run — свежий воркер. Модуль плагина грузится из data:-URL,
 * поэтому исполняется именно тот снимок исходника, что был загружен,
 * даже если файл на диске уже изменился. По таймауту воркер терминируется.
 */

import { Worker } from 'worker_threads';
import type { JsonSchemaObject } from '../skills/types.js';
import { PLUGIN_NAME_PATTERN, type PluginDescription, type PluginTool } from './types.js';

export type WorkerOutcome =
  | { kind: 'ok'; value: unknown }
  | { kind: 'error'; message: string }
  | { kind: 'timeout' };

type WorkerTask =
  | { mode: 'describe'; moduleUrl: string }
  | { mode: 'run'; moduleUrl: string; action: string; args: Record<string, unknown> };

const BOOTSTRAP = `
import { parentPort, workerData } from 'node:worker_threads';

const strings = (v) => Array.isArray(v) ? v.filter((x) => typeof x === 'string') : [];
const text = (v, fallback) => typeof v === 'string' ? v : fallback;
// Схемы параметров — только JSON-данные, чтобы пережить postMessage
const tools = (v) => Array.isArray(v)
  ? v.filter((t) => t && typeof t.name === 'string').map((t) => ({
      name: t.name,
      description: text(t.description, ''),
      parameters: t.parameters && typeof t.parameters === 'object' ? JSON.parse(JSON.stringify(t.parameters)) : null,
    }))
  : [];

try {
  const mod = await import(workerData.moduleUrl);
  if (workerData.mode === 'describe') {
    parentPort.postMessage({ ok: true, value: {
      name: typeof mod.name === 'string' ? mod.name : null,
      description: text(mod.description, ''),
      version: text(mod.version, '0.0.0'),
      author: text(mod.author, 'local'),
      actions: strings(mod.actions),
      requiresEnv: strings(mod.requiresEnv),
      tools: tools(mod.tools),
      hasExecute: typeof mod.execute === 'function',
    } });
  } else {
    const result = await mod.execute(workerData.action, workerData.args);
    const value = typeof result === 'string' ? result : (JSON.stringify(result) ?? '');
    parentPort.postMessage({ ok: true, value });
  }
} catch (err) {
  parentPort.postMessage({ ok: false, error: err instanceof Error ? err.message : String(err) });
}
`;

const BOOTSTRAP_URL = new URL(`data:text/javascript;base64,${Buffer.from(BOOTSTRAP).toString('base64')}`);

/** Снимок исходника плагина как импортируемый URL */
export function toModuleUrl(source: string): string {
  return `data:text/javascript;base64,${Buffer.from(source, 'utf-8').toString('base64')}`;
}

function isObject(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === 'object' && !Array.isArray(v);
}

function toParameters(raw: unknown): JsonSchemaObject {
  if (!isObject(raw) || raw.type !== 'object') return { type: 'object', properties: {} };
  const schema: JsonSchemaObject = {
    type: 'object',
    properties: isObject(raw.properties) ? raw.properties : {},
  };
  if (Array.isArray(raw.required)) {
    schema.required = raw.required.filter((r): r is string => typeof r === 'string');
  }
  if (typeof raw.additionalProperties === 'boolean') {
    schema.additionalProperties = raw.additionalProperties;
  }
  return schema;
}

/** Невалидные имена и повторы отбрасываются */
function toTools(raw: unknown): PluginTool[] {
  if (!Array.isArray(raw)) return [];
  const tools: PluginTool[] = [];
  for (const entry of raw) {
    if (!isObject(entry) || typeof entry.name !== 'string' || !PLUGIN_NAME_PATTERN.test(entry.name)) continue;
    if (tools.some(t => t.name === entry.name)) continue;
    tools.push({
      name: entry.name,
      description: typeof entry.description === 'string' ? entry.description : '',
      parameters: toParameters(entry.parameters),
    });
  }
  return tools;
}

function toOutcome(message: unknown): WorkerOutcome {
  if (!isObject(message)) return { kind: 'error', message: 'malformed worker message' };
  if (message.ok === true) return { kind: 'ok', value: message.value };
  return { kind: 'error', message: typeof message.error === 'string' ? message.error : String(message.error) };
}

function runTask(task: WorkerTask, timeoutMs: number): Promise<WorkerOutcome> {
  return new Promise(resolve => {
    const worker = new Worker(BOOTSTRAP_URL, { workerData: task, execArgv: [] });
    let settled = false;

    const settle = (outcome: WorkerOutcome) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(outcome);
      worker.terminate().catch((err: unknown) => {
        const msg = err instanceof Error ? err.message : String(err);
        console.warn(`⚠️ [plugins] worker_terminate_failed reason=${msg}`);
      });
    };

    const timer = setTimeout(() => settle({ kind: 'timeout' }), timeoutMs);

    worker.once('message', (message: unknown) => settle(toOutcome(message)));
    worker.once('error', (err: Error) => settle({ kind: 'error', message: err.message }));
    worker.once('exit', code => settle({ kind: 'error', message: `plugin worker exited with code ${code}` }));
  });
}

/** Загрузить модуль и прочитать его экспорты */
export async function describePlugin(moduleUrl: string, timeoutMs: number): Promise<PluginDescription> {
  const outcome = await runTask({ mode: 'describe', moduleUrl }, timeoutMs);
  if (outcome.kind === 'timeout') {
    throw new Error(`load timeout after ${timeoutMs}ms`);
  }
  if (outcome.kind === 'error') {
    throw new Error(outcome.message);
  }
  const v = outcome.value;
  if (!isObject(v)) throw new Error('malformed plugin description');
  const strings = (x: unknown) => (Array.isArray(x) ? x.filter((s): s is string => typeof s === 'string') : []);
  return {
    name: typeof v.name === 'string' ? v.name : null,
    description: typeof v.description === 'string' ? v.description : '',
    version: typeof v.version === 'string' ? v.version : '0.0.0',
    author: typeof v.author === 'string' ? v.author : 'local',
    actions: strings(v.actions),
    requiresEnv: strings(v.requiresEnv),
    tools: toTools(v.tools),
    hasExecute: v.hasExecute === true,
  };
}

/** execute(action, args) в свежем воркере; результат всегда строка */
export async function executePlugin(
  moduleUrl: string,
  action: string,
  args: Record<string, unknown>,
  timeoutMs: number,
): Promise<WorkerOutcome> {
  const outcome = await runTask({ mode: 'run', moduleUrl, action, args }, timeoutMs);
  if (outcome.kind === 'ok') {
    return { kind: 'ok', value: typeof outcome.value === 'string' ? outcome.value : String(outcome.value ?? '') };
  }
  return outcome;
}
