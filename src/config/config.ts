import dotenv from 'dotenv';

dotenv.config();

export const OPENROUTER_MODEL_TIERS = {
  FREE: 'google/gemini-2.0-flash-exp:free',
  BUDGET: 'deepseek/deepseek-chat',
  PRO_CODE: 'anthropic/claude-3.5-sonnet',
  FRONTIER: 'anthropic/claude-3-7-sonnet',
} as const;
export type OpenRouterTier = keyof typeof OPENROUTER_MODEL_TIERS;

export type AIModel = OpenRouterTier | 'none';

export interface ModelConfig {
  provider: 'openai' | 'none';
  model: string;
  apiKey: string;
  /** When set, use this base URL (e.g. OpenRouter) and add attribution headers. */
  baseUrl?: string;
}

// Значение из env с дефолтом
function getEnvValue(key: string, defaultValue: string = ''): string {
  return process.env[key] || defaultValue;
}

function getEnvInt(key: string, defaultValue: number, min: number): number {
  const parsed = parseInt(getEnvValue(key, String(defaultValue)), 10);
  return Number.isNaN(parsed) ? defaultValue : Math.max(min, parsed);
}

function getEnvList(key: string, defaultValue: string): string[] {
  return getEnvValue(key, defaultValue)
    .split(',').map(s => s.trim().toLowerCase()).filter(Boolean);
}

const VALID_TIERS: OpenRouterTier[] = ['FREE', 'BUDGET', 'PRO_CODE', 'FRONTIER'];

function isTier(value: string): value is OpenRouterTier {
  return (VALID_TIERS as string[]).includes(value);
}

export const config = {
  server: {
    port: getEnvInt('PORT', 3000, 1),
    host: getEnvValue('HOST', '127.0.0.1'),
  },
  ai: {
    baseUrl: getEnvValue('BASE_URL', 'https://openrouter.ai/api/v1'),
    openrouterKey: getEnvValue('OPENROUTER_API_KEY'),
    siteName: 'Lane Agent',
    siteUrl: getEnvValue('SITE_URL', 'http://localhost:3000'),
    maxTokens: getEnvInt('AI_MAX_TOKENS', 4096, 64),
    maxRetries: getEnvInt('AI_MAX_RETRIES', 2, 0),
    /** Модель по умолчанию; "none" отключает AI обработку */
    model: ((): AIModel => {
      const v = getEnvValue('DEFAULT_MODEL', 'BUDGET').toUpperCase();
      if (v === 'NONE') return 'none';
      return isTier(v) ? v : 'BUDGET';
    })(),
    primaryPrompt: getEnvValue(
      'ASSISTANT_PROMPT',
      'You are a helpful personal assistant. Answer briefly and to the point. Use the available tools when a task needs them and delegate specialised work with delegate_task.',
    ),
  },
  queue: {
    /** Директория write-ahead записей (один файл на незавершённый элемент) */
    waqDir: getEnvValue('WAQ_DIR', '.data/waq'),
    /** Сколько ждать активные полосы при остановке */
    shutdownTimeoutMs: getEnvInt('SHUTDOWN_TIMEOUT_MS', 10_000, 0),
  },
  plugins: {
    dir: getEnvValue('PLUGINS_DIR', 'plugins'),
    executeTimeoutMs: getEnvInt('PLUGIN_EXECUTE_TIMEOUT_MS', 30_000, 100),
    loadTimeoutMs: getEnvInt('PLUGIN_LOAD_TIMEOUT_MS', 10_000, 100),
    installTimeoutMs: getEnvInt('PLUGIN_INSTALL_TIMEOUT_MS', 15_000, 1000),
    allowedProtocols: getEnvList('PLUGIN_INSTALL_PROTOCOLS', 'https'),
  },
  roles: {
    storePath: getEnvValue('ROLES_STORE', '.roles.json'),
  },
  security: {
    adminToken: getEnvValue('ADMIN_TOKEN') || '',
  },
};

// Получение конфигурации модели
export function getModelConfig(): ModelConfig {
  const selected = config.ai.model;
  if (selected === 'none') {
    return { provider: 'none', model: 'none', apiKey: '' };
  }
  return {
    provider: 'openai',
    model: OPENROUTER_MODEL_TIERS[selected],
    apiKey: config.ai.openrouterKey,
    baseUrl: config.ai.baseUrl,
  };
}
