// ============================================
// Исходящее сообщение
// ============================================

export interface OutgoingMessage {
  chatId: string;
  text: string;
}

// ============================================
// Плагин канала
// ============================================

export interface ChannelPlugin {
  /** Уникальный ID: "web", "discord", ... */
  readonly id: string;
  /** Человекочитаемое имя */
  readonly name: string;
  /** Запуск канала (подключение, старт polling и т.п.) */
  start(): Promise<void>;
  /** Остановка канала */
  stop(): Promise<void>;
  /** Доставить сообщение в чат канала */
  sendMessage(msg: OutgoingMessage): Promise<void>;
}

/** Результат обработки, доставляемый обратно в канал */
export type ResultHandler = (text: string) => void | Promise<void>;

// ============================================
// Lane id: "<channelId>:<chatId>"
// ============================================

export function laneIdFor(channelId: string, chatId: string): string {
  return `${channelId}:${chatId}`;
}

/** null — id не в формате channel:chat */
export function parseLaneId(laneId: string): { channelId: string; chatId: string } | null {
  const sep = laneId.indexOf(':');
  if (sep <= 0 || sep === laneId.length - 1) return null;
  return { channelId: laneId.slice(0, sep), chatId: laneId.slice(sep + 1) };
}
