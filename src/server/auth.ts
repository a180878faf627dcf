/**
 * auth.ts — Express middleware для авторизации по токену.
 *
 * Secure-by-default: если ADMIN_TOKEN не задан — API заблокирован (401).
 * Если задан — проверяет заголовок X-Admin-Token или query-параметр ?token=...
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import { config } from '../config/config.js';

/** Часть express Request, которую читает middleware */
export interface AuthRequest {
  headers: Record<string, string | string[] | undefined>;
  query: Record<string, unknown>;
}

/** Часть express Response, которую пишет middleware */
export interface AuthResponse {
  status(code: number): { json(body: unknown): unknown };
}

function hashToken(token: string): Buffer {
  return createHash('sha256').update(token, 'utf8').digest();
}

function safeTokenEquals(expected: string, provided: string): boolean {
  return timingSafeEqual(hashToken(expected), hashToken(provided));
}

function providedToken(req: AuthRequest): string {
  const header = req.headers['x-admin-token'];
  if (typeof header === 'string' && header) return header;
  const query = req.query.token;
  return typeof query === 'string' ? query : '';
}

export function createAuthMiddleware(getToken: () => string = () => config.security.adminToken) {
  return function authMiddleware(req: AuthRequest, res: AuthResponse, next: () => void): void {
    const token = getToken();

    // Secure-by-default: без токена API закрыт (особенно опасно при HOST=0.0.0.0)
    if (!token) {
      res.status(401).json({
        error: 'ADMIN_TOKEN not configured. Set ADMIN_TOKEN in .env to enable API access.',
      });
      return;
    }

    if (safeTokenEquals(token, providedToken(req))) {
      next();
      return;
    }

    res.status(401).json({ error: 'Unauthorized. ADMIN_TOKEN required.' });
  };
}

export const authMiddleware = createAuthMiddleware();
