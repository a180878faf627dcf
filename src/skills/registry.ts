/**
 * registry.ts — реестр capability.
 *
 * Единый источник инструментов для AI: встроенные навыки и плагины.
 * tool-loop не знает, какие capability зарегистрированы —
 * он запрашивает схемы и делегирует выполнение через реестр.
 *
 * Все мутации — одна синхронная операция над Map, поэтому invoke()/listSchemas()
 * никогда не видят «половину» обновления.
 */

import type { CapabilityArgs, CapabilityDescriptor, Skill, ToolSchema } from './types.js';
import { validateBySchema } from './schema.js';

export class CapabilityRegistry {
  private capabilities = new Map<string, CapabilityDescriptor>();

  /** Зарегистрировать capability; одноимённая заменяется (hot-reload) */
  register(descriptor: CapabilityDescriptor): void {
    const replaced = this.capabilities.has(descriptor.name);
    this.capabilities.set(descriptor.name, descriptor);
    console.log(`[registry] ${replaced ? 'capability_replaced' : 'capability_registered'} name=${descriptor.name}`);
  }

  /** Зарегистрировать все инструменты навыка */
  registerSkill(skill: Skill): void {
    const tools = skill.getTools();
    for (const tool of tools) {
      this.register({
        ...tool,
        invoke: args => skill.execute(tool.name, args),
      });
    }
    console.log(`🔧 Навык зарегистрирован: ${skill.name} (${skill.id}) — ${tools.length} инструментов`);
  }

  unregister(name: string): boolean {
    const removed = this.capabilities.delete(name);
    if (removed) console.log(`[registry] capability_removed name=${name}`);
    return removed;
  }

  get(name: string): CapabilityDescriptor | undefined {
    return this.capabilities.get(name);
  }

  has(name: string): boolean {
    return this.capabilities.has(name);
  }

  names(): string[] {
    return Array.from(this.capabilities.keys());
  }

  list(): CapabilityDescriptor[] {
    return Array.from(this.capabilities.values());
  }

  /** Схемы в формате OpenAI function calling; filter — например, whitelist роли */
  listSchemas(filter?: (name: string) => boolean): ToolSchema[] {
    const result: ToolSchema[] = [];
    for (const descriptor of this.capabilities.values()) {
      if (filter && !filter(descriptor.name)) continue;
      result.push({
        type: 'function',
        function: {
          name: descriptor.name,
          description: descriptor.description,
          parameters: descriptor.parameters,
        },
      });
    }
    return result;
  }

  /**
   * Выполнить capability по имени. Никогда не бросает:
   * любая ошибка превращается в строку, чтобы модель могла на неё отреагировать.
   */
  async invoke(name: string, args: CapabilityArgs): Promise<string> {
    const descriptor = this.capabilities.get(name);
    if (!descriptor) {
      return `Error: unknown capability '${name}'`;
    }

    const problem = validateBySchema(descriptor.parameters, args);
    if (problem) {
      return `Error: invalid arguments for '${name}': ${problem}`;
    }

    console.log(`🔧 [registry] invoke ${name}`, args);
    try {
      const result = await descriptor.invoke(args);
      return typeof result === 'string' ? result : String(result);
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(`❌ [registry] capability_failed name=${name}: ${msg}`);
      return `Error executing '${name}': ${msg}`;
    }
  }
}
