import AjvModule, { type ValidateFunction } from 'ajv';
import type { JsonSchemaObject } from './types.js';

// ajv — CommonJS; под NodeNext класс лежит в .default
const Ajv = AjvModule.default;

const ajv = new Ajv({
  allErrors: true,
  strict: false,
});

const validatorCache = new WeakMap<JsonSchemaObject, ValidateFunction>();

function getValidator(schema: JsonSchemaObject): ValidateFunction {
  const existing = validatorCache.get(schema);
  if (existing) return existing;
  const compiled = ajv.compile(schema);
  validatorCache.set(schema, compiled);
  return compiled;
}

/**
 * Проверить аргументы по JSON Schema.
 * Возвращает null, если всё в порядке, иначе — описание ошибок.
 */
export function validateBySchema(schema: JsonSchemaObject, data: unknown): string | null {
  let validator: ValidateFunction;
  try {
    validator = getValidator(schema);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return `invalid parameter schema: ${msg}`;
  }
  if (validator(data)) return null;
  return (validator.errors || [])
    .map(e => `${e.instancePath || '/'}: ${e.message || 'validation error'}`)
    .join('; ');
}
