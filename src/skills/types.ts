/**
 * types.ts — контракт для capability и модульных навыков (skills).
 *
 * ToolDefinition — провайдер-агностичная схема (JSON Schema).
 * Реестр форматирует её в формат OpenAI function calling.
 */

export interface JsonSchemaObject {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
  additionalProperties?: boolean;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: JsonSchemaObject;
}

export type CapabilityArgs = Record<string, unknown>;

/** Именованная функция, доступная модели. Имя — единственная идентичность. */
export interface CapabilityDescriptor extends ToolDefinition {
  invoke(args: CapabilityArgs): Promise<string> | string;
}

/** Схема инструмента в формате OpenAI function calling */
export interface ToolSchema {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: JsonSchemaObject;
  };
}

export interface Skill {
  readonly id: string;
  readonly name: string;
  readonly description: string;

  /** Вернуть список инструментов этого навыка */
  getTools(): ToolDefinition[];

  /** Выполнить конкретный инструмент. Возвращает строку-результат для AI. */
  execute(toolName: string, args: CapabilityArgs): Promise<string>;
}
