/**
 * dispatcher.ts — приём сообщений в полосы и их обработка.
 *
 * submit() ставит текст в полосу отправителя; обработчик полосы прогоняет
 * tool-loop под основной ролью и отдаёт итоговую строку в onResult.
 * Ошибки модели превращаются в текст для пользователя, а не в исключения.
 */

import { ToolLoop } from '../ai/tool-loop.js';
import type { ChatModel, StatusCallback } from '../ai/types.js';
import { config } from '../config/config.js';
import { PRIMARY_ROLE_ID, createRole, type RoleCatalog, type RoleProfile } from '../config/roles.js';
import type { LaneQueue, WorkHandler, WorkItem } from '../queue/lane-queue.js';
import type { CapabilityRegistry } from '../skills/registry.js';
import type { ResultHandler } from './types.js';

export const PROCESSING_ERROR_TEXT = '❌ Error processing message. Check the AI provider settings.';
export const NO_MODEL_TEXT = '⚠️ AI model is not configured.';

export interface DispatcherDeps {
  queue: LaneQueue;
  model: ChatModel | null;
  registry: CapabilityRegistry;
  roles: RoleCatalog;
  maxRounds?: number;
}

export class Dispatcher {
  constructor(private readonly deps: DispatcherDeps) {}

  private primaryRole(): RoleProfile {
    return this.deps.roles.get(PRIMARY_ROLE_ID)
      ?? createRole({ id: PRIMARY_ROLE_ID, systemInstructions: config.ai.primaryPrompt });
  }

  /** Прогнать один текст через tool-loop; никогда не бросает */
  async process(text: string, onStatus?: StatusCallback): Promise<string> {
    const { model, registry, maxRounds } = this.deps;
    if (!model) return NO_MODEL_TEXT;

    try {
      const loop = new ToolLoop({ model, registry, maxRounds, onStatus });
      return await loop.run(this.primaryRole(), text);
    } catch (error) {
      console.error('❌ Ошибка AI обработки:', error);
      return PROCESSING_ERROR_TEXT;
    }
  }

  private handlerFor(onResult: ResultHandler, onStatus?: StatusCallback): WorkHandler {
    return async (item: WorkItem) => {
      console.log(`📨 [dispatcher] processing lane=${item.laneId} item=${item.id}`);
      const result = await this.process(item.payload, onStatus);
      await onResult(result);
    };
  }

  /** Поставить сообщение в полосу; результат придёт в onResult */
  submit(laneId: string, payload: string, onResult: ResultHandler, onStatus?: StatusCallback): WorkItem {
    return this.deps.queue.enqueue(laneId, payload, this.handlerFor(onResult, onStatus));
  }

  /** submit() для request/response каналов: промис результата этой полосы */
  submitAndWait(laneId: string, payload: string, onStatus?: StatusCallback): Promise<string> {
    return new Promise(resolve => {
      this.submit(laneId, payload, resolve, onStatus);
    });
  }

  /**
   * Поставить незавершённые после рестарта записи обратно в полосы.
   * resolve(laneId) — куда доставить результат; null — результат только логируется.
   */
  recover(resolve: (laneId: string) => ResultHandler | null): number {
    return this.deps.queue.recoverOrphans(laneId => {
      const deliver = resolve(laneId);
      if (deliver) return this.handlerFor(deliver);
      console.warn(`⚠️ [dispatcher] no delivery target lane=${laneId}`);
      return this.handlerFor(result => {
        console.log(`[dispatcher] undelivered_result lane=${laneId} length=${result.length}`);
      });
    });
  }
}
