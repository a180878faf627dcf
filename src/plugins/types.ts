/**
 * types.ts — контракт плагинов.
 *
 * Плагин — ES-модуль (plugins/*.mjs | *.js):
 *   export const name = 'weather';            // обязательно, [A-Za-z0-9_-]+
 *   export async function execute(action, args) { ... }   // обязательно
 *   export const description / version / author / actions / requiresEnv  // опционально
 *   export const tools = [{ name, description, parameters }]  // опционально:
 *     каждый инструмент — отдельная capability plugin_<name>_<tool>, вызывает execute(tool, args)
 */

import type { JsonSchemaObject } from '../skills/types.js';

export const PLUGIN_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/** Инструмент, объявленный плагином в экспорте tools */
export interface PluginTool {
  name: string;
  description: string;
  parameters: JsonSchemaObject;
}

/** Что модуль сообщил о себе при загрузке в воркере */
export interface PluginDescription {
  name: string | null;
  description: string;
  version: string;
  author: string;
  actions: string[];
  requiresEnv: string[];
  tools: PluginTool[];
  hasExecute: boolean;
}

/** Сохраняется в <pluginsDir>/manifests/<name>.json */
export interface PluginManifest {
  name: string;
  displayName: string;
  description: string;
  version: string;
  author: string;
  /** "local" или URL, откуда плагин установлен */
  source: string;
  actions: string[];
  requiresEnv: string[];
  /** Имена инструментов из экспорта tools */
  tools: string[];
  /** ISO-время последней успешной загрузки */
  loadedAt: string;
  enabled: boolean;
}

export interface LoadedPlugin {
  name: string;
  /** Абсолютный путь к файлу */
  file: string;
  /** data:-URL со снимком исходника на момент загрузки */
  moduleUrl: string;
  manifest: PluginManifest;
  /** Все capability, зарегистрированные плагином */
  capabilities: string[];
}

export interface PluginStatus extends PluginManifest {
  missingEnv: string[];
  ready: boolean;
  status: string;
}
