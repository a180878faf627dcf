/**
 * retry.ts — fetch с экспоненциальным backoff и поддержкой Retry-After.
 */

import { config } from '../config/config.js';

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  retryableStatuses: number[];
}

const DEFAULT_OPTIONS: Omit<RetryOptions, 'maxRetries'> = {
  baseDelayMs: 1000,
  retryableStatuses: [429, 500, 502, 503],
};

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/** Задержка перед попыткой attempt+1; для 429 — Retry-After (секунды), если есть */
function retryDelayMs(attempt: number, baseDelayMs: number, response?: Response): number {
  const backoff = baseDelayMs * Math.pow(2, attempt);
  if (response?.status !== 429) return backoff;
  const seconds = parseInt(response.headers.get('retry-after') ?? '', 10);
  return !isNaN(seconds) && seconds > 0 ? seconds * 1000 : backoff;
}

/**
 * fetch с автоматическим retry при transient-ошибках (сеть, 429, 5xx).
 * Не-retryable ответ возвращается сразу; после исчерпания попыток —
 * последний ответ или последняя сетевая ошибка.
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  options?: Partial<RetryOptions>,
): Promise<Response> {
  const opts: RetryOptions = {
    maxRetries: options?.maxRetries ?? config.ai.maxRetries,
    baseDelayMs: options?.baseDelayMs ?? DEFAULT_OPTIONS.baseDelayMs,
    retryableStatuses: options?.retryableStatuses ?? DEFAULT_OPTIONS.retryableStatuses,
  };

  for (let attempt = 0; ; attempt++) {
    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (err) {
      if (attempt >= opts.maxRetries) throw err;
      const delayMs = retryDelayMs(attempt, opts.baseDelayMs);
      console.log(`🔄 [retry] attempt=${attempt + 1}/${opts.maxRetries} delay_ms=${delayMs} reason=network`);
      await sleep(delayMs);
      continue;
    }

    if (response.ok || !opts.retryableStatuses.includes(response.status) || attempt >= opts.maxRetries) {
      return response;
    }

    const delayMs = retryDelayMs(attempt, opts.baseDelayMs, response);
    console.log(`🔄 [retry] attempt=${attempt + 1}/${opts.maxRetries} delay_ms=${delayMs} status=${response.status}`);
    await sleep(delayMs);
  }
}
