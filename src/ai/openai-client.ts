/**
 * openai-client.ts — ChatModel поверх OpenAI-совместимого /chat/completions
 * (OpenRouter по умолчанию).
 */

import { config, type ModelConfig } from '../config/config.js';
import type { ToolSchema } from '../skills/types.js';
import { fetchWithRetry } from './retry.js';
import type { ChatModel, ChatOptions, ChatResponse, ConversationTurn, ToolCall } from './types.js';

type OpenAIMessage =
  | { role: 'system' | 'user'; content: string }
  | { role: 'assistant'; content: string; tool_calls?: Array<{ id: string; type: 'function'; function: { name: string; arguments: string } }> }
  | { role: 'tool'; tool_call_id: string; content: string };

function isObject(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === 'object' && !Array.isArray(v);
}

function toOpenAIMessage(turn: ConversationTurn): OpenAIMessage {
  switch (turn.role) {
    case 'assistant':
      if (turn.toolCalls && turn.toolCalls.length > 0) {
        return {
          role: 'assistant',
          content: turn.content,
          tool_calls: turn.toolCalls.map(tc => ({
            id: tc.id,
            type: 'function' as const,
            function: { name: tc.name, arguments: tc.argsJson },
          })),
        };
      }
      return { role: 'assistant', content: turn.content };
    case 'tool':
      return { role: 'tool', tool_call_id: turn.toolCallId ?? '', content: turn.content };
    default:
      return { role: turn.role, content: turn.content };
  }
}

function parseToolCalls(raw: unknown): ToolCall[] {
  if (!Array.isArray(raw)) return [];
  const calls: ToolCall[] = [];
  for (const tc of raw) {
    if (!isObject(tc) || !isObject(tc.function)) continue;
    calls.push({
      id: typeof tc.id === 'string' ? tc.id : `call_${calls.length}`,
      name: typeof tc.function.name === 'string' ? tc.function.name : '',
      argsJson: typeof tc.function.arguments === 'string' ? tc.function.arguments : '{}',
    });
  }
  return calls;
}

function errorMessageOf(body: unknown): string {
  if (isObject(body) && isObject(body.error) && typeof body.error.message === 'string') {
    return body.error.message;
  }
  return JSON.stringify(body);
}

export class OpenAIChatModel implements ChatModel {
  constructor(private readonly modelConfig: ModelConfig) {}

  async chat(turns: ConversationTurn[], tools: ToolSchema[], options?: ChatOptions): Promise<ChatResponse> {
    const body: Record<string, unknown> = {
      model: this.modelConfig.model,
      messages: turns.map(toOpenAIMessage),
      max_tokens: options?.maxTokens ?? config.ai.maxTokens,
      temperature: 0.7,
    };
    if (tools.length > 0) body.tools = tools;

    const baseUrl = (this.modelConfig.baseUrl || 'https://api.openai.com/v1').replace(/\/$/, '');
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Authorization': `Bearer ${this.modelConfig.apiKey}`,
    };
    if (this.modelConfig.baseUrl) {
      headers['HTTP-Referer'] = config.ai.siteUrl;
      headers['X-Title'] = config.ai.siteName;
    }

    const response = await fetchWithRetry(`${baseUrl}/chat/completions`, {
      method: 'POST',
      headers,
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const error: unknown = await response.json().catch(() => ({ error: { message: `HTTP ${response.status}` } }));
      throw new Error(`OpenAI API error: ${errorMessageOf(error)}`);
    }

    const data: unknown = await response.json();
    if (!isObject(data) || !Array.isArray(data.choices)) {
      throw new Error('OpenAI API error: response has no choices');
    }
    const choice: unknown = data.choices[0];
    const msg: Record<string, unknown> = isObject(choice) && isObject(choice.message) ? choice.message : {};
    const usage: Record<string, unknown> = isObject(data.usage) ? data.usage : {};

    return {
      content: typeof msg.content === 'string' ? msg.content : '',
      toolCalls: parseToolCalls(msg.tool_calls),
      model: typeof data.model === 'string' ? data.model : this.modelConfig.model,
      tokensUsed: typeof usage.total_tokens === 'number' ? usage.total_tokens : undefined,
    };
  }
}

/** null — AI не настроен (модель "none" или нет ключа) */
export function createChatModel(modelConfig: ModelConfig): ChatModel | null {
  if (modelConfig.provider === 'none') return null;
  if (!modelConfig.apiKey) {
    console.warn('⚠️ OPENROUTER_API_KEY не задан — AI обработка отключена');
    return null;
  }
  return new OpenAIChatModel(modelConfig);
}
