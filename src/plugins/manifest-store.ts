/**
 * manifest-store.ts — манифесты плагинов: один JSON на плагин, запись атомарно (tmp + rename).
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { join } from 'path';
import type { PluginManifest } from './types.js';

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every(x => typeof x === 'string');
}

function isObject(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === 'object' && !Array.isArray(v);
}

export function parseManifest(raw: unknown): PluginManifest | null {
  if (!isObject(raw) || typeof raw.name !== 'string' || !raw.name) return null;
  const str = (v: unknown, fallback: string) => (typeof v === 'string' ? v : fallback);
  return {
    name: raw.name,
    displayName: str(raw.displayName, raw.name),
    description: str(raw.description, ''),
    version: str(raw.version, '0.0.0'),
    author: str(raw.author, 'local'),
    source: str(raw.source, 'local'),
    actions: isStringArray(raw.actions) ? raw.actions : [],
    requiresEnv: isStringArray(raw.requiresEnv) ? raw.requiresEnv : [],
    tools: isStringArray(raw.tools) ? raw.tools : [],
    loadedAt: str(raw.loadedAt, ''),
    enabled: raw.enabled !== false,
  };
}

/** "weather_alerts" → "Weather Alerts" */
export function defaultDisplayName(name: string): string {
  return name
    .split(/[_-]+/)
    .filter(Boolean)
    .map(part => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join(' ');
}

export class ManifestStore {
  constructor(readonly dir: string) {
    mkdirSync(dir, { recursive: true });
  }

  pathFor(name: string): string {
    return join(this.dir, `${name}.json`);
  }

  /** null — манифеста нет или он повреждён */
  read(name: string): PluginManifest | null {
    const file = this.pathFor(name);
    if (!existsSync(file)) return null;
    try {
      return parseManifest(JSON.parse(readFileSync(file, 'utf-8')));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.warn(`⚠️ [plugins] manifest_unreadable name=${name} reason=${msg}`);
      return null;
    }
  }

  /** Ошибка записи не фатальна: логируется и возвращается false */
  write(manifest: PluginManifest): boolean {
    const file = this.pathFor(manifest.name);
    const tmp = `${file}.tmp`;
    try {
      writeFileSync(tmp, JSON.stringify(manifest, null, 2), 'utf-8');
      renameSync(tmp, file);
      return true;
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.warn(`⚠️ [plugins] manifest_write_failed name=${manifest.name} reason=${msg}`);
      return false;
    }
  }
}
