/**
 * roles.ts — профили ролей для tool-loop.
 *
 * Роль = системные инструкции + опциональный whitelist capability + лимит токенов ответа.
 * assistant — основная роль без ограничений; остальные — для делегирования под-агентам.
 * Пользовательские роли читаются из JSON-хранилища (.roles.json).
 */

import { readFileSync, existsSync } from 'fs';
import { config } from './config.js';

export interface RoleProfile {
  readonly id: string;
  /** Подпись блока результата под-агента */
  readonly displayName?: string;
  readonly systemInstructions: string;
  /** null — без ограничений */
  readonly capabilityWhitelist: ReadonlySet<string> | null;
  readonly maxReplyTokens: number;
}

export interface RoleInput {
  id: string;
  displayName?: string;
  systemInstructions: string;
  capabilityWhitelist?: string[] | null;
  maxReplyTokens?: number;
}

export const PRIMARY_ROLE_ID = 'assistant';

export function createRole(input: RoleInput): RoleProfile {
  const id = input.id.trim();
  const systemInstructions = input.systemInstructions.trim();
  if (!id || !systemInstructions) {
    throw new Error('Role requires id and systemInstructions');
  }
  return Object.freeze({
    id,
    displayName: input.displayName?.trim() || undefined,
    systemInstructions,
    capabilityWhitelist: input.capabilityWhitelist ? new Set(input.capabilityWhitelist) : null,
    maxReplyTokens: input.maxReplyTokens ?? config.ai.maxTokens,
  });
}

const DEFAULT_ROLES: RoleInput[] = [
  {
    id: PRIMARY_ROLE_ID,
    displayName: 'Assistant',
    systemInstructions: config.ai.primaryPrompt,
    capabilityWhitelist: null,
  },
  {
    id: 'researcher',
    displayName: 'Research Agent',
    systemInstructions:
      'You are a research agent. Your only mission is to search, extract and synthesise information on the given topic. ' +
      'Produce a complete, structured report with sources. Do not chat, only report.',
    capabilityWhitelist: ['web_search', 'web_fetch', 'summarize_text'],
  },
  {
    id: 'coder',
    displayName: 'Coding Agent',
    systemInstructions:
      'You are a programming agent. Write, edit or run code as instructed and verify it works before reporting. ' +
      'Return the result or the content of the generated file.',
    capabilityWhitelist: ['read_file', 'write_file', 'run_command', 'list_dir', 'git_status'],
  },
  {
    id: 'analyst',
    displayName: 'Data Analyst',
    systemInstructions:
      'You are a data and text analysis agent. Summarise documents, translate, analyse stored notes and detect patterns. ' +
      'Present results as tables, lists or short paragraphs.',
    capabilityWhitelist: ['search_notes', 'list_notes', 'read_file', 'summarize_text', 'translate_text', 'save_note'],
  },
  {
    id: 'writer',
    displayName: 'Writer',
    systemInstructions:
      'You are a professional writer. Create, edit or polish texts in any format. ' +
      'Check stored notes for relevant context first and always return finished, ready-to-use text.',
    capabilityWhitelist: ['search_notes', 'list_notes', 'save_note', 'read_file', 'write_file'],
  },
];

function isObject(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === 'object' && !Array.isArray(v);
}

function isRoleInput(r: unknown): r is RoleInput {
  if (!isObject(r)) return false;
  const whitelistOk = r.capabilityWhitelist === undefined || r.capabilityWhitelist === null
    || (Array.isArray(r.capabilityWhitelist) && r.capabilityWhitelist.every(x => typeof x === 'string'));
  return typeof r.id === 'string'
    && typeof r.systemInstructions === 'string'
    && (r.displayName === undefined || typeof r.displayName === 'string')
    && (r.maxReplyTokens === undefined || typeof r.maxReplyTokens === 'number')
    && whitelistOk;
}

export class RoleCatalog {
  private roles = new Map<string, RoleProfile>();

  constructor(defaults: RoleInput[] = DEFAULT_ROLES) {
    for (const input of defaults) {
      const role = createRole(input);
      this.roles.set(role.id, role);
    }
  }

  /** Зарегистрировать роль в рантайме (одноимённая заменяется) */
  register(input: RoleInput): RoleProfile {
    const role = createRole(input);
    this.roles.set(role.id, role);
    console.log(`[roles] role_registered id=${role.id}`);
    return role;
  }

  get(id: string): RoleProfile | undefined {
    return this.roles.get(id);
  }

  ids(): string[] {
    return Array.from(this.roles.keys());
  }

  /**
   * Подгрузить пользовательские роли из JSON: { "roles": [RoleInput, ...] }.
   * Отсутствующий или повреждённый файл — не ошибка. Возвращает число загруженных ролей.
   */
  loadCustomRoles(filePath: string): number {
    if (!existsSync(filePath)) return 0;
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.warn(`⚠️ [roles] store_ignored path=${filePath} reason=${msg}`);
      return 0;
    }
    const list = isObject(parsed) ? parsed.roles : null;
    if (!Array.isArray(list)) {
      console.warn(`⚠️ [roles] store_ignored path=${filePath} reason=no roles array`);
      return 0;
    }

    let loaded = 0;
    for (const entry of list) {
      if (!isRoleInput(entry)) {
        console.warn(`⚠️ [roles] role_skipped path=${filePath} reason=malformed`);
        continue;
      }
      try {
        this.register(entry);
        loaded++;
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        console.warn(`⚠️ [roles] role_skipped id=${entry.id} reason=${msg}`);
      }
    }
    return loaded;
  }
}
