/**
 * host.ts — менеджер плагинов.
 *
 * - discover: сканирует каталог, грузит каждый модуль в воркере, валидирует экспорты
 * - reload: подменяет плагин только после успешной загрузки новой версии
 * - run: execute() в свежем воркере с таймаутом; никогда не бросает
 * - installFromUrl: скачивание с проверками, запись, загрузка
 *
 * Каждый загруженный плагин регистрируется в реестре как capability plugin_<name>,
 * плюс plugin_<name>_<tool> на каждый инструмент из экспорта tools.
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { basename, join, resolve } from 'path';
import { config } from '../config/config.js';
import type { CapabilityRegistry } from '../skills/registry.js';
import type { CapabilityArgs, CapabilityDescriptor } from '../skills/types.js';
import { ManifestStore, defaultDisplayName } from './manifest-store.js';
import { describePlugin, executePlugin, toModuleUrl } from './sandbox.js';
import {
  PLUGIN_NAME_PATTERN,
  type LoadedPlugin,
  type PluginDescription,
  type PluginManifest,
  type PluginStatus,
  type PluginTool,
} from './types.js';

const PLUGIN_FILE = /\.(mjs|js)$/;
const SAFE_FILENAME = /^[A-Za-z0-9_-]+\.(mjs|js)$/;
const EXPORTS_NAME = /export\s+(?:const|let|var)\s+name\b|export\s*\{[^}]*\bname\b[^}]*\}/;
const EXPORTS_EXECUTE =
  /export\s+(?:async\s+)?function\s*\*?\s*execute\b|export\s+(?:const|let|var)\s+execute\b|export\s*\{[^}]*\bexecute\b[^}]*\}/;

export interface PluginHostOptions {
  dir?: string;
  registry: CapabilityRegistry;
  executeTimeoutMs?: number;
  loadTimeoutMs?: number;
  installTimeoutMs?: number;
  allowedProtocols?: string[];
  /** Откуда проверять requiresEnv */
  env?: NodeJS.ProcessEnv;
}

type LoadResult = { ok: true; plugin: LoadedPlugin } | { ok: false; reason: string; disabled?: boolean };

export function capabilityNameFor(pluginName: string, toolName?: string): string {
  return toolName ? `plugin_${pluginName}_${toolName}` : `plugin_${pluginName}`;
}

function safeDecode(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}

/** github.com/<user>/<repo>/blob/<ref>/<path> → raw.githubusercontent.com/<user>/<repo>/<ref>/<path> */
export function toRawUrl(url: URL): URL {
  if (url.hostname !== 'github.com' || !url.pathname.includes('/blob/')) return url;
  return new URL(`${url.protocol}//raw.githubusercontent.com${url.pathname.replace('/blob/', '/')}`);
}

function isObject(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === 'object' && !Array.isArray(v);
}

export class PluginHost {
  readonly dir: string;
  private readonly registry: CapabilityRegistry;
  private readonly manifestStore: ManifestStore;
  private readonly executeTimeoutMs: number;
  private readonly loadTimeoutMs: number;
  private readonly installTimeoutMs: number;
  private readonly allowedProtocols: string[];
  private readonly env: NodeJS.ProcessEnv;

  private plugins = new Map<string, LoadedPlugin>();
  /** Отключённые плагины: для listPlugins */
  private disabled = new Map<string, PluginManifest>();

  constructor(options: PluginHostOptions) {
    this.dir = resolve(options.dir ?? config.plugins.dir);
    this.registry = options.registry;
    this.executeTimeoutMs = options.executeTimeoutMs ?? config.plugins.executeTimeoutMs;
    this.loadTimeoutMs = options.loadTimeoutMs ?? config.plugins.loadTimeoutMs;
    this.installTimeoutMs = options.installTimeoutMs ?? config.plugins.installTimeoutMs;
    this.allowedProtocols = (options.allowedProtocols ?? config.plugins.allowedProtocols).map(p => p.toLowerCase());
    this.env = options.env ?? process.env;

    mkdirSync(this.dir, { recursive: true });
    this.manifestStore = new ManifestStore(join(this.dir, 'manifests'));
  }

  names(): string[] {
    return Array.from(this.plugins.keys());
  }

  has(name: string): boolean {
    return this.plugins.has(name);
  }

  // ============================================
  // Загрузка
  // ============================================

  /** Загрузить ещё не загруженные файлы каталога; возвращает имена загруженных сейчас плагинов */
  async discover(directory: string = this.dir): Promise<string[]> {
    const dir = resolve(directory);
    if (!existsSync(dir)) return [];

    const loadedFiles = new Set(Array.from(this.plugins.values(), p => p.file));
    const files = readdirSync(dir)
      .filter(f => PLUGIN_FILE.test(f) && !f.startsWith('_'))
      .sort()
      .map(f => join(dir, f))
      .filter(f => !loadedFiles.has(f));

    const loaded: string[] = [];
    for (const file of files) {
      const result = await this.loadFile(file, 'local');
      if (result.ok) {
        loaded.push(result.plugin.name);
      } else if (!result.disabled) {
        console.warn(`⚠️ [plugins] plugin_skipped file=${basename(file)} reason=${result.reason}`);
      }
    }
    if (loaded.length > 0) {
      console.log(`🧩 [plugins] discovered count=${loaded.length} names=${loaded.join(',')}`);
    }
    return loaded;
  }

  /**
   * Прочитать файл, загрузить снимок в воркере, провалидировать и только потом
   * атомарно подменить запись в реестре. replacing — имя перезагружаемого плагина.
   */
  private async loadFile(file: string, source: string, replacing?: string): Promise<LoadResult> {
    let moduleUrl: string;
    try {
      moduleUrl = toModuleUrl(readFileSync(file, 'utf-8'));
    } catch (err) {
      return { ok: false, reason: err instanceof Error ? err.message : String(err) };
    }

    let described: PluginDescription;
    try {
      described = await describePlugin(moduleUrl, this.loadTimeoutMs);
    } catch (err) {
      return { ok: false, reason: err instanceof Error ? err.message : String(err) };
    }

    const name = described.name;
    if (!name || !PLUGIN_NAME_PATTERN.test(name)) {
      return { ok: false, reason: 'missing or invalid exported name' };
    }
    if (!described.hasExecute) {
      return { ok: false, reason: 'missing exported execute()' };
    }
    if (replacing !== undefined && name !== replacing) {
      return { ok: false, reason: `file now declares name '${name}'` };
    }
    const current = this.plugins.get(name);
    if (current && current.file !== file) {
      return { ok: false, reason: `duplicate plugin name '${name}' (already loaded from ${basename(current.file)})` };
    }

    const stored = this.manifestStore.read(name);
    if (stored && !stored.enabled && replacing === undefined) {
      this.disabled.set(name, stored);
      console.log(`[plugins] plugin_disabled_skip name=${name}`);
      return { ok: false, reason: 'disabled', disabled: true };
    }

    const manifest: PluginManifest = {
      name,
      displayName: stored?.displayName || defaultDisplayName(name),
      description: described.description,
      version: described.version,
      author: described.author,
      source: source !== 'local' ? source : stored?.source ?? 'local',
      actions: described.actions,
      requiresEnv: described.requiresEnv,
      tools: described.tools.map(t => t.name),
      loadedAt: new Date().toISOString(),
      enabled: true,
    };
    this.manifestStore.write(manifest);

    const missing = this.missingEnv(manifest);
    if (missing.length > 0) {
      console.warn(`⚠️ [plugins] missing_env name=${name} vars=${missing.join(',')}`);
    }

    const descriptors = this.toCapabilities(name, manifest, described.tools);
    const plugin: LoadedPlugin = {
      name, file, moduleUrl, manifest,
      capabilities: descriptors.map(d => d.name),
    };
    for (const descriptor of descriptors) {
      this.registry.register(descriptor);
    }
    for (const stale of current?.capabilities ?? []) {
      if (!plugin.capabilities.includes(stale)) this.registry.unregister(stale);
    }
    this.plugins.set(name, plugin);
    this.disabled.delete(name);
    console.log(`🧩 [plugins] plugin_loaded name=${name} version=${manifest.version}`);
    return { ok: true, plugin };
  }

  private toCapabilities(name: string, manifest: PluginManifest, tools: PluginTool[]): CapabilityDescriptor[] {
    return [
      this.toCapability(name, manifest),
      ...tools.map(tool => this.toToolCapability(name, tool)),
    ];
  }

  private toCapability(name: string, manifest: PluginManifest): CapabilityDescriptor {
    const action: Record<string, unknown> = { type: 'string', description: 'Plugin action (default: "default")' };
    if (manifest.actions.length > 0) action.enum = manifest.actions;
    return {
      name: capabilityNameFor(name),
      description: manifest.description || `Run the ${manifest.displayName} plugin`,
      parameters: {
        type: 'object',
        properties: {
          action,
          args: { type: 'object', description: 'Arguments for the action' },
        },
      },
      invoke: (args: CapabilityArgs) => {
        const actionArgs = isObject(args.args) ? args.args : {};
        if (typeof args.action !== 'string') return this.run(name, actionArgs);
        return this.run(name, { ...actionArgs, action: args.action });
      },
    };
  }

  /** Инструмент плагина: имя инструмента уходит в execute() как action */
  private toToolCapability(name: string, tool: PluginTool): CapabilityDescriptor {
    return {
      name: capabilityNameFor(name, tool.name),
      description: tool.description || `Run ${tool.name} from the ${name} plugin`,
      parameters: tool.parameters,
      invoke: (args: CapabilityArgs) => this.execute(name, tool.name, args),
    };
  }

  async reload(name: string): Promise<string> {
    const plugin = this.plugins.get(name);
    if (!plugin) return `Plugin '${name}' not found.`;
    if (!existsSync(plugin.file)) {
      return `Error reloading '${name}': file ${basename(plugin.file)} no longer exists. The previous version stays active.`;
    }

    const result = await this.loadFile(plugin.file, plugin.manifest.source, name);
    if (result.ok) {
      console.log(`🔄 [plugins] plugin_reloaded name=${name}`);
      return `Plugin '${name}' reloaded.`;
    }
    console.warn(`⚠️ [plugins] reload_failed name=${name} reason=${result.reason}`);
    return `Error reloading '${name}': ${result.reason}. The previous version stays active.`;
  }

  /** Перезагрузить все плагины, затем подхватить новые файлы */
  async reloadAll(): Promise<string> {
    const lines: string[] = [];
    for (const name of this.names()) {
      lines.push(await this.reload(name));
    }
    for (const name of await this.discover()) {
      lines.push(`Plugin '${name}' loaded.`);
    }
    return lines.length > 0 ? lines.join('\n') : 'No plugins loaded.';
  }

  // ============================================
  // Выполнение
  // ============================================

  /** execute(args.action ?? 'default', остальные args); ошибки и таймаут — строкой */
  async run(name: string, args: CapabilityArgs = {}): Promise<string> {
    const { action: rawAction, ...rest } = args;
    const action = typeof rawAction === 'string' && rawAction ? rawAction : 'default';
    return this.execute(name, action, rest);
  }

  private async execute(name: string, action: string, args: CapabilityArgs): Promise<string> {
    const plugin = this.plugins.get(name);
    if (!plugin) {
      const loaded = this.names().join(', ') || 'none';
      return `Plugin '${name}' is not available. Loaded plugins: ${loaded}`;
    }

    const outcome = await executePlugin(plugin.moduleUrl, action, args, this.executeTimeoutMs);

    switch (outcome.kind) {
      case 'ok':
        return typeof outcome.value === 'string' ? outcome.value : String(outcome.value);
      case 'timeout':
        console.error(`❌ [plugins] plugin_timeout name=${name} timeout_ms=${this.executeTimeoutMs}`);
        return `Plugin '${name}' exceeded the ${this.executeTimeoutMs / 1000}s execution timeout.`;
      case 'error':
        console.error(`❌ [plugins] plugin_failed name=${name}: ${outcome.message}`);
        return `Error in plugin '${name}': ${outcome.message}`;
    }
  }

  // ============================================
  // Установка
  // ============================================

  async installFromUrl(url: string): Promise<string> {
    let parsed: URL;
    try {
      parsed = toRawUrl(new URL(url));
    } catch {
      return `Invalid URL: '${url}'`;
    }

    const protocol = parsed.protocol.replace(/:$/, '').toLowerCase();
    if (!this.allowedProtocols.includes(protocol)) {
      return `Protocol '${protocol}' is not allowed for plugin installs (allowed: ${this.allowedProtocols.join(', ')}).`;
    }

    const lastSegment = parsed.pathname.split('/').pop() ?? '';
    const filename = safeDecode(lastSegment);
    if (filename === null) {
      return `Invalid plugin filename: '${lastSegment}'`;
    }
    if (!PLUGIN_FILE.test(filename)) {
      return 'The URL must point to a .mjs or .js file.';
    }
    if (!SAFE_FILENAME.test(filename)) {
      return `Invalid plugin filename: '${filename}'`;
    }
    const dest = join(this.dir, filename);
    if (existsSync(dest)) {
      return `Plugin file '${filename}' already exists. Use reload to refresh it.`;
    }

    let source: string;
    try {
      console.log(`⬇️ [plugins] install_download url=${parsed.href}`);
      const response = await fetch(parsed, { signal: AbortSignal.timeout(this.installTimeoutMs) });
      if (!response.ok) {
        return `Error downloading plugin: HTTP ${response.status}`;
      }
      source = await response.text();
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(`❌ [plugins] install_failed url=${parsed.href}: ${msg}`);
      return `Error downloading plugin: ${msg}`;
    }

    if (!EXPORTS_NAME.test(source) || !EXPORTS_EXECUTE.test(source)) {
      return 'The downloaded file does not look like a plugin (missing exported name or execute).';
    }

    try {
      writeFileSync(dest, source, { encoding: 'utf-8', flag: 'wx' });
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      return `Error saving plugin: ${msg}`;
    }

    const result = await this.loadFile(dest, parsed.href);
    if (result.ok) {
      return `Plugin '${result.plugin.name}' installed and loaded.`;
    }
    rmSync(dest, { force: true });
    console.warn(`⚠️ [plugins] install_rejected file=${filename} reason=${result.reason}`);
    return `Plugin downloaded but failed to load: ${result.reason}`;
  }

  // ============================================
  // Включение / отключение
  // ============================================

  disable(name: string): boolean {
    const plugin = this.plugins.get(name);
    if (!plugin) return false;
    for (const capability of plugin.capabilities) {
      this.registry.unregister(capability);
    }
    this.plugins.delete(name);
    const manifest = { ...plugin.manifest, enabled: false };
    this.manifestStore.write(manifest);
    this.disabled.set(name, manifest);
    console.log(`⏸️ [plugins] plugin_disabled name=${name}`);
    return true;
  }

  async enable(name: string): Promise<boolean> {
    if (this.plugins.has(name)) return true;
    const manifest = this.disabled.get(name) ?? this.manifestStore.read(name);
    if (!manifest) return false;
    this.manifestStore.write({ ...manifest, enabled: true });
    this.disabled.delete(name);
    await this.discover();
    return this.plugins.has(name);
  }

  // ============================================
  // Статус
  // ============================================

  private missingEnv(manifest: PluginManifest): string[] {
    return manifest.requiresEnv.filter(key => !this.env[key]);
  }

  listPlugins(): PluginStatus[] {
    const manifests = [
      ...Array.from(this.plugins.values(), p => p.manifest),
      ...this.disabled.values(),
    ];
    return manifests.map(manifest => {
      const missingEnv = this.missingEnv(manifest);
      const ready = manifest.enabled && missingEnv.length === 0;
      let status = '✅ ready';
      if (!manifest.enabled) status = '⏸️ disabled';
      else if (missingEnv.length > 0) status = '⚠️ incomplete env';
      return { ...manifest, missingEnv, ready, status };
    });
  }
}
