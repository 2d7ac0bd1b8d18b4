/**
 * Auth middleware — API key gate for the HTTP shell.
 *
 * Accepts `Authorization: Bearer <key>` or `x-api-key: <key>`. With no key
 * configured every request passes (development mode).
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import { timingSafeEqual } from 'node:crypto';

/** Constant-time string equality; also gates the WebSocket token. */
export function safeCompare(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}

export interface AuthConfig {
  apiKey?: string;
  /** Paths that do not require authentication. */
  publicPaths?: string[];
}

const DEFAULT_PUBLIC_PATHS = ['/health'];

function presentedKey(req: IncomingMessage): string | undefined {
  const authHeader = req.headers['authorization'];
  if (authHeader) {
    const [scheme, token] = authHeader.split(' ');
    if (scheme?.toLowerCase() === 'bearer' && token) return token;
  }
  const xApiKey = req.headers['x-api-key'];
  return typeof xApiKey === 'string' ? xApiKey : undefined;
}

/** Returns true when the request may proceed; otherwise writes a 401 and returns false. */
export function createAuthMiddleware(config: AuthConfig) {
  const { apiKey } = config;
  const publicPaths = new Set(config.publicPaths ?? DEFAULT_PUBLIC_PATHS);

  return function authorize(req: IncomingMessage, res: ServerResponse): boolean {
    if (!apiKey) return true;

    const pathname = (req.url ?? '').split('?')[0] ?? '';
    if (publicPaths.has(pathname)) return true;

    const key = presentedKey(req);
    if (key && safeCompare(key, apiKey)) return true;

    res.writeHead(401, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ error: 'unauthorized', message: 'Missing or invalid API key' }));
    return false;
  };
}
