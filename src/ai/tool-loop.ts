/**
 * tool-loop.ts — цикл вызова инструментов под ролью.
 *
 * Модель получает только capability, разрешённые ролью. Запрос вне whitelist
 * не доходит до реестра: в историю уходит строка [DENIED].
 * Число раундов ограничено — упор в лимит не ошибка, возвращается последний ответ.
 */

import type { RoleProfile } from '../config/roles.js';
import type { CapabilityRegistry } from '../skills/registry.js';
import type { CapabilityArgs } from '../skills/types.js';
import type { ChatModel, ConversationTurn, StatusCallback, ToolCall } from './types.js';

export const MAX_TOOL_ROUNDS = 5;
export const NO_RESPONSE_FALLBACK = 'The agent produced no response.';

export function deniedMessage(name: string): string {
  return `[DENIED] capability '${name}' not permitted for this role`;
}

export function withContextHint(prompt: string, contextHint?: string): string {
  if (!contextHint || !contextHint.trim()) return prompt;
  return `[RECENT CONVERSATION CONTEXT]\n${contextHint}\n[END OF CONTEXT]\n\n${prompt}`;
}

export interface ToolLoopDeps {
  model: ChatModel;
  registry: CapabilityRegistry;
  maxRounds?: number;
  onStatus?: StatusCallback;
}

function parseArgs(name: string, argsJson: string): CapabilityArgs | string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(argsJson || '{}');
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return `Error: invalid arguments for '${name}': ${msg}`;
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return `Error: invalid arguments for '${name}': expected a JSON object`;
  }
  return Object.fromEntries(Object.entries(parsed));
}

export class ToolLoop {
  private readonly maxRounds: number;

  constructor(private readonly deps: ToolLoopDeps) {
    this.maxRounds = deps.maxRounds ?? MAX_TOOL_ROUNDS;
  }

  /** Ошибки chat() пробрасываются вызывающему */
  async run(role: RoleProfile, initialPrompt: string, contextHint?: string): Promise<string> {
    const { model, registry } = this.deps;
    const whitelist = role.capabilityWhitelist;
    const allowed = (name: string) => whitelist === null || whitelist.has(name);

    const turns: ConversationTurn[] = [
      { role: 'system', content: role.systemInstructions },
      { role: 'user', content: withContextHint(initialPrompt, contextHint) },
    ];
    const tools = registry.listSchemas(allowed);
    const options = { maxTokens: role.maxReplyTokens };

    let response = await model.chat(turns, tools, options);
    let rounds = 0;

    while (response.toolCalls.length > 0 && rounds < this.maxRounds) {
      rounds++;
      turns.push({ role: 'assistant', content: response.content, toolCalls: response.toolCalls });
      for (const call of response.toolCalls) {
        turns.push({ role: 'tool', toolCallId: call.id, content: await this.execute(call, allowed) });
      }
      await this.reportStatus(`Analysing results (round ${rounds})...`);
      response = await model.chat(turns, tools, options);
    }

    if (response.toolCalls.length > 0) {
      console.warn(`⚠️ [tool-loop] round_limit role=${role.id} rounds=${rounds}`);
    }
    return response.content.trim() ? response.content : NO_RESPONSE_FALLBACK;
  }

  private async execute(call: ToolCall, allowed: (name: string) => boolean): Promise<string> {
    if (!allowed(call.name)) {
      console.warn(`🚫 [tool-loop] capability_denied name=${call.name}`);
      return deniedMessage(call.name);
    }
    const args = parseArgs(call.name, call.argsJson);
    if (typeof args === 'string') return args;

    await this.reportStatus(`Using ${call.name}...`);
    return this.deps.registry.invoke(call.name, args);
  }

  /** Сбой статус-колбэка не прерывает обработку */
  private async reportStatus(text: string): Promise<void> {
    try {
      await this.deps.onStatus?.(text);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.warn(`⚠️ [tool-loop] status_callback_failed reason=${msg}`);
    }
  }
}
