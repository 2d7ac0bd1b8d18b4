/**
 * CORS middleware for the HTTP shell; answers preflight requests itself.
 */

import type { IncomingMessage, ServerResponse } from 'node:http';

export interface CorsConfig {
  /** Use ['*'] to allow any origin (development only). */
  allowedOrigins?: string[];
  maxAge?: number;
}

const DEFAULT_ORIGINS = ['http://localhost:3000', 'http://localhost:5173'];
const METHODS = 'GET, POST, PATCH, OPTIONS';
const HEADERS = 'Content-Type, Authorization, x-api-key';

/** Returns true when the request was a preflight that has been answered. */
export function createCorsMiddleware(config: CorsConfig = {}) {
  const origins = config.allowedOrigins ?? DEFAULT_ORIGINS;
  const maxAge = String(config.maxAge ?? 86400);
  const wildcard = origins.includes('*');

  return function handleCors(req: IncomingMessage, res: ServerResponse): boolean {
    const origin = req.headers['origin'];

    if (wildcard) {
      res.setHeader('Access-Control-Allow-Origin', '*');
    } else {
      res.setHeader('Vary', 'Origin');
      if (origin && origins.includes(origin)) {
        res.setHeader('Access-Control-Allow-Origin', origin);
        res.setHeader('Access-Control-Allow-Credentials', 'true');
      }
    }
    res.setHeader('Access-Control-Allow-Methods', METHODS);
    res.setHeader('Access-Control-Allow-Headers', HEADERS);
    res.setHeader('Access-Control-Max-Age', maxAge);

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return true;
    }
    return false;
  };
}
