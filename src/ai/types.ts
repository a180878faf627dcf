import type { ToolSchema } from '../skills/types.js';

export type TurnRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ToolCall {
  id: string;
  name: string;
  /** Аргументы как их прислала модель (JSON-строка) */
  argsJson: string;
}

export interface ConversationTurn {
  role: TurnRole;
  content: string;
  /** Для role=tool: id вызова, на который это ответ */
  toolCallId?: string;
  /** Для role=assistant: запрошенные вызовы */
  toolCalls?: ToolCall[];
}

export interface ChatResponse {
  content: string;
  toolCalls: ToolCall[];
  model?: string;
  tokensUsed?: number;
}

export interface ChatOptions {
  maxTokens?: number;
}

/** Контракт LLM-клиента: Chat(turns, tools) → Response */
export interface ChatModel {
  chat(turns: ConversationTurn[], tools: ToolSchema[], options?: ChatOptions): Promise<ChatResponse>;
}

/** Вызывается для уведомления канала о прогрессе */
export type StatusCallback = (status: string) => Promise<void>;
