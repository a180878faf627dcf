/**
 * lane-queue.ts — последовательная обработка по «полосам» (lane).
 *
 * Lane = идентичность отправителя (например, channel:chat).
 * Внутри полосы — строгий FIFO и не более одного воркера;
 * разные полосы обрабатываются независимо и параллельно.
 * Каждый элемент до обработки пишется в WriteAheadStore.
 */

import { randomUUID } from 'crypto';
import type { WriteAheadStore } from './store.js';

export interface WorkItem {
  id: string;
  laneId: string;
  payload: string;
  enqueuedAt: number;
  /** id write-ahead записи; null, если очередь работает без хранилища */
  recordId: string | null;
}

export type WorkHandler = (item: WorkItem) => void | Promise<void>;

export interface LaneStatus {
  depth: number;
  active: boolean;
}

interface QueuedEntry {
  item: WorkItem;
  handler: WorkHandler;
}

export class LaneQueue {
  private lanes = new Map<string, QueuedEntry[]>();
  /** laneId → промис активного воркера */
  private workers = new Map<string, Promise<void>>();

  constructor(private readonly store: WriteAheadStore | null = null) {}

  /** Поставить элемент в полосу. Запись на диск — до постановки в память. */
  enqueue(laneId: string, payload: string, handler: WorkHandler): WorkItem {
    let item: WorkItem;
    if (this.store) {
      const record = this.store.write(laneId, payload);
      item = { id: record.id, laneId, payload, enqueuedAt: record.enqueuedAt, recordId: record.id };
    } else {
      item = { id: randomUUID(), laneId, payload, enqueuedAt: Date.now(), recordId: null };
    }
    this.push(item, handler);
    return item;
  }

  /**
   * Повторно поставить незавершённые записи после рестарта.
   * Вызывается один раз при старте. Возвращает количество восстановленных элементов.
   */
  recoverOrphans(handlerFactory: (laneId: string) => WorkHandler): number {
    if (!this.store) return 0;
    const orphans = this.store.loadPending();
    const handlers = new Map<string, WorkHandler>();
    for (const record of orphans) {
      let handler = handlers.get(record.laneId);
      if (!handler) {
        handler = handlerFactory(record.laneId);
        handlers.set(record.laneId, handler);
      }
      this.push({ ...record, recordId: record.id }, handler);
    }
    if (orphans.length > 0) {
      console.log(`[lane_queue] orphans_requeued count=${orphans.length} lanes=${handlers.size}`);
    }
    return orphans.length;
  }

  queueDepth(laneId: string): number {
    return this.lanes.get(laneId)?.length ?? 0;
  }

  isActive(laneId: string): boolean {
    return this.workers.has(laneId);
  }

  /** Сводка по всем полосам (для status API) */
  snapshot(): Record<string, LaneStatus> {
    const result: Record<string, LaneStatus> = {};
    for (const [laneId, entries] of this.lanes) {
      result[laneId] = { depth: entries.length, active: this.workers.has(laneId) };
    }
    return result;
  }

  /** Дождаться, пока все воркеры завершатся */
  async whenIdle(): Promise<void> {
    while (this.workers.size > 0) {
      await Promise.all(this.workers.values());
    }
  }

  /** whenIdle() с ограничением по времени; false — к сроку остались активные полосы */
  async whenIdleWithin(timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>(resolve => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([this.whenIdle().then((): true => true), timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  private push(item: WorkItem, handler: WorkHandler): void {
    let entries = this.lanes.get(item.laneId);
    if (!entries) {
      entries = [];
      this.lanes.set(item.laneId, entries);
    }
    entries.push({ item, handler });
    console.log(`[lane_queue] enqueued lane=${item.laneId} pending=${entries.length}`);

    if (!this.workers.has(item.laneId)) {
      this.workers.set(item.laneId, this.drain(item.laneId, entries));
    }
  }

  private async drain(laneId: string, entries: QueuedEntry[]): Promise<void> {
    // Первый await — до любых изменений workers, чтобы set() в push() отработал раньше
    await Promise.resolve();
    console.log(`[lane_queue] worker_started lane=${laneId}`);

    for (let next = entries.shift(); next; next = entries.shift()) {
      const { item, handler } = next;
      try {
        await handler(item);
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        console.error(`❌ [lane_queue] handler_failed lane=${laneId} item=${item.id}: ${msg}`);
      } finally {
        if (item.recordId && this.store) {
          this.store.complete(item.recordId);
        }
      }
    }

    // Очередь пуста: снимаем воркера синхронно, в том же тике, что и проверку
    this.workers.delete(laneId);
    console.log(`[lane_queue] worker_finished lane=${laneId}`);
  }
}
