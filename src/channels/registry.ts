/**
 * registry.ts — реестр каналов.
 *
 * Тонкий оркестратор жизненного цикла и адресации: по lane id
 * ("channel:chat") находит канал, куда доставить результат.
 */

import type { ChannelPlugin, ResultHandler } from './types.js';
import { parseLaneId } from './types.js';

export class ChannelRegistry {
  private channels = new Map<string, ChannelPlugin>();

  /** Зарегистрировать канал */
  register(plugin: ChannelPlugin): void {
    if (this.channels.has(plugin.id)) {
      console.warn(`⚠️ Канал "${plugin.id}" уже зарегистрирован, перезаписываю`);
    }
    this.channels.set(plugin.id, plugin);
    console.log(`📌 Канал зарегистрирован: ${plugin.name} (${plugin.id})`);
  }

  /** Получить канал по ID */
  get(id: string): ChannelPlugin | undefined {
    return this.channels.get(id);
  }

  /** Список всех зарегистрированных каналов */
  list(): ChannelPlugin[] {
    return Array.from(this.channels.values());
  }

  /**
   * Куда доставить результат для полосы. null — полоса не адресуема
   * (неверный формат или канал не зарегистрирован).
   */
  resultHandlerFor(laneId: string): ResultHandler | null {
    const target = parseLaneId(laneId);
    if (!target) return null;
    const channel = this.channels.get(target.channelId);
    if (!channel) return null;
    return text => channel.sendMessage({ chatId: target.chatId, text });
  }

  /** Запустить все каналы */
  async startAll(): Promise<void> {
    for (const plugin of this.channels.values()) {
      try {
        await plugin.start();
        console.log(`✅ Канал запущен: ${plugin.name}`);
      } catch (error) {
        console.error(`❌ Ошибка запуска канала ${plugin.name}:`, error);
      }
    }
  }

  /** Остановить все каналы */
  async stopAll(): Promise<void> {
    for (const plugin of this.channels.values()) {
      try {
        await plugin.stop();
        console.log(`⏹️ Канал остановлен: ${plugin.name}`);
      } catch (error) {
        console.error(`❌ Ошибка остановки канала ${plugin.name}:`, error);
      }
    }
  }
}
