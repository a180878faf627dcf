/**
 * Web Channel Plugin
 *
 * Web — request/response канал: POST /api/message ждёт результат своей полосы
 * и отдаёт его в ответе. Push-доставки (например, результаты, восстановленные
 * после рестарта) копятся в outbox и забираются следующим запросом этого чата.
 */

import type { ChannelPlugin, OutgoingMessage } from '../types.js';

export class WebChannel implements ChannelPlugin {
  readonly id = 'web';
  readonly name = 'Web';

  private outbox = new Map<string, string[]>();

  async start(): Promise<void> {
    // No-op: Express сервер уже запущен, роуты монтируются в api.ts
    console.log('🌐 Web канал активен (API-роуты)');
  }

  async stop(): Promise<void> {
    this.outbox.clear();
  }

  async sendMessage(msg: OutgoingMessage): Promise<void> {
    const pending = this.outbox.get(msg.chatId) ?? [];
    pending.push(msg.text);
    this.outbox.set(msg.chatId, pending);
  }

  /** Забрать накопленные доставки чата */
  drainOutbox(chatId: string): string[] {
    const pending = this.outbox.get(chatId) ?? [];
    this.outbox.delete(chatId);
    return pending;
  }
}
