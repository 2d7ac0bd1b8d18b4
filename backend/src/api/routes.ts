/**
 * HTTP API routes — a thin shell over AlertingService.
 *
 * Handlers parse the request, call one service operation and encode the result.
 * Error kinds map to status codes in `errorStatus`; no business rules live here.
 *
 * Uses raw Node.js http (IncomingMessage / ServerResponse) — no Express required.
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Logger } from '../../../src/core/logger.js';
import type { InMemoryMetrics } from '../../../src/core/metrics.js';
import type { Clock } from '../../../src/core/clock.js';
import type { AlertingService } from '../../../src/alerts/alertingService.js';
import { AppError, InvalidStateError, NotFoundError, ValidationError } from '../../../src/core/errors.js';
import {
  alertFilterSchema,
  alertPatchSchema,
  createAlertSchema,
  parseOrThrow,
} from '../../../src/alerts/schemas.js';
import { createAuthMiddleware, type AuthConfig } from '../middleware/auth.js';
import { createCorsMiddleware, type CorsConfig } from '../middleware/cors.js';

// ── Route context (injected dependencies) ────────────────────────────────────

export interface RouteContext {
  service: AlertingService;
  logger: Logger;
  metrics: InMemoryMetrics;
  clock: Clock;
  startedAt: number;
}

// ── Helpers ──────────────────────────────────────────────────────────────────

function json(res: ServerResponse, data: unknown, status = 200): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

const MAX_BODY_SIZE = 64 * 1024; // 64 KB

function readBody(req: IncomingMessage, timeoutMs = 10_000): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let totalLen = 0;
    const timer = setTimeout(() => { req.destroy(); reject(new ValidationError('body read timeout')); }, timeoutMs);
    req.on('data', (chunk: Buffer) => {
      totalLen += chunk.length;
      if (totalLen > MAX_BODY_SIZE) {
        clearTimeout(timer);
        req.destroy();
        reject(new ValidationError('request body too large'));
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => { clearTimeout(timer); resolve(Buffer.concat(chunks).toString()); });
    req.on('error', (err) => { clearTimeout(timer); reject(err); });
  });
}

async function parseJsonBody(req: IncomingMessage): Promise<unknown> {
  const raw = await readBody(req);
  if (raw.length === 0) return {};
  try {
    const body: unknown = JSON.parse(raw);
    return body;
  } catch {
    throw new ValidationError('request body is not valid JSON');
  }
}

export function errorStatus(err: unknown): number {
  if (err instanceof ValidationError) return 400;
  if (err instanceof NotFoundError) return 404;
  if (err instanceof InvalidStateError) return 409;
  return 500;
}

// ── Route table ──────────────────────────────────────────────────────────────

type Params = Record<string, string>;

type RouteHandler = (
  req: IncomingMessage,
  res: ServerResponse,
  ctx: RouteContext,
  params: Params,
  query: URLSearchParams,
) => Promise<void> | void;

interface Route {
  method: string;
  path: string;
  handler: RouteHandler;
}

const param = (params: Params, name: string): string => {
  const value = params[name];
  if (value === undefined) throw new ValidationError(`missing path parameter ${name}`);
  return value;
};

export const routes: Route[] = [
  {
    method: 'GET',
    path: '/health',
    handler: (_req, res, ctx) => {
      json(res, { ok: true, uptime: Math.floor((ctx.clock.now() - ctx.startedAt) / 1000) });
    },
  },

  {
    method: 'GET',
    path: '/metrics',
    handler: (_req, res, ctx) => {
      json(res, ctx.metrics.snapshot());
    },
  },

  // ── Admin ────────────────────────────────────────────────────────────────

  {
    method: 'POST',
    path: '/api/admin/alerts',
    handler: async (req, res, ctx) => {
      const input = parseOrThrow(createAlertSchema, await parseJsonBody(req), 'alert');
      json(res, await ctx.service.createAlert(input), 201);
    },
  },

  {
    method: 'GET',
    path: '/api/admin/alerts',
    handler: (_req, res, ctx, _params, query) => {
      const filter = parseOrThrow(
        alertFilterSchema,
        {
          severity: query.get('severity') ?? undefined,
          status: query.get('status') ?? undefined,
          visibilityKind: query.get('visibility') ?? undefined,
        },
        'alert filter',
      );
      const alerts = ctx.service.listAlerts(filter);
      json(res, { alerts, count: alerts.length });
    },
  },

  {
    method: 'GET',
    path: '/api/admin/alerts/:id',
    handler: (_req, res, ctx, params) => {
      json(res, ctx.service.getAlert(param(params, 'id')));
    },
  },

  {
    method: 'PATCH',
    path: '/api/admin/alerts/:id',
    handler: async (req, res, ctx, params) => {
      const patch = parseOrThrow(alertPatchSchema, await parseJsonBody(req), 'alert patch');
      json(res, await ctx.service.updateAlert(param(params, 'id'), patch));
    },
  },

  {
    method: 'POST',
    path: '/api/admin/alerts/:id/archive',
    handler: (_req, res, ctx, params) => {
      json(res, ctx.service.archiveAlert(param(params, 'id')));
    },
  },

  {
    method: 'GET',
    path: '/api/admin/deliveries',
    handler: (_req, res, ctx, _params, query) => {
      const limit = Number(query.get('limit') ?? 100);
      const deliveries = ctx.service.recentDeliveries(Number.isInteger(limit) && limit > 0 ? limit : 100);
      json(res, { deliveries, count: deliveries.length });
    },
  },

  // ── Users ────────────────────────────────────────────────────────────────

  {
    method: 'GET',
    path: '/api/users/:userId/alerts',
    handler: async (_req, res, ctx, params) => {
      const alerts = await ctx.service.alertsForUser(param(params, 'userId'));
      json(res, { alerts, count: alerts.length });
    },
  },

  {
    method: 'GET',
    path: '/api/users/:userId/inbox',
    handler: (_req, res, ctx, params) => {
      const entries = ctx.service.inbox(param(params, 'userId'));
      json(res, { entries, count: entries.length });
    },
  },

  {
    method: 'POST',
    path: '/api/users/:userId/alerts/:alertId/read',
    handler: async (_req, res, ctx, params) => {
      json(res, await ctx.service.markRead(param(params, 'userId'), param(params, 'alertId')));
    },
  },

  {
    method: 'POST',
    path: '/api/users/:userId/alerts/:alertId/unread',
    handler: async (_req, res, ctx, params) => {
      json(res, await ctx.service.markUnread(param(params, 'userId'), param(params, 'alertId')));
    },
  },

  {
    method: 'POST',
    path: '/api/users/:userId/alerts/:alertId/snooze',
    handler: async (_req, res, ctx, params) => {
      json(res, await ctx.service.snooze(param(params, 'userId'), param(params, 'alertId')));
    },
  },

  // ── System ───────────────────────────────────────────────────────────────

  {
    method: 'GET',
    path: '/api/analytics',
    handler: (_req, res, ctx) => {
      json(res, ctx.service.analytics());
    },
  },

  {
    method: 'POST',
    path: '/api/system/reminders/run',
    handler: async (_req, res, ctx) => {
      json(res, await ctx.service.runTick());
    },
  },
];

// ── Matching ─────────────────────────────────────────────────────────────────

export interface RouteMatch {
  handler: RouteHandler;
  params: Params;
}

function decodeParam(name: string, raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    throw new ValidationError(`malformed path parameter ${name}`, { [name]: raw });
  }
}

/** Segment-wise match; `:name` segments capture into params. Throws ValidationError on a bad escape. */
export function matchRoute(table: Route[], method: string, pathname: string): RouteMatch | null {
  const segments = pathname.split('/').filter(Boolean);
  for (const route of table) {
    if (route.method !== method) continue;
    const pattern = route.path.split('/').filter(Boolean);
    if (pattern.length !== segments.length) continue;

    const params: Params = {};
    let matched = true;
    for (const [i, part] of pattern.entries()) {
      const actual = segments[i] ?? '';
      if (part.startsWith(':')) {
        params[part.slice(1)] = decodeParam(part.slice(1), actual);
      } else if (part !== actual) {
        matched = false;
        break;
      }
    }
    if (matched) return { handler: route.handler, params };
  }
  return null;
}

// ── Router factory ───────────────────────────────────────────────────────────

export interface RouterOptions {
  context: RouteContext;
  auth?: AuthConfig;
  cors?: CorsConfig;
}

export function createRouter(options: RouterOptions) {
  const { context } = options;
  const authorize = createAuthMiddleware(options.auth ?? {});
  const handleCors = createCorsMiddleware(options.cors ?? {});

  return async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (handleCors(req, res)) return;
    if (!authorize(req, res)) return;

    const method = req.method ?? 'GET';
    const url = new URL(req.url ?? '/', 'http://localhost');
    try {
      const match = matchRoute(routes, method, url.pathname);
      if (!match) {
        json(res, { error: 'not_found', path: url.pathname }, 404);
        return;
      }
      await match.handler(req, res, context, match.params, url.searchParams);
    } catch (err) {
      const status = errorStatus(err);
      if (status === 500) {
        context.logger.error('route handler error', { method, path: url.pathname, error: String(err) });
      }
      if (!res.headersSent) {
        const body = err instanceof AppError
          ? { error: err.code, message: err.message, details: err.details }
          : { error: 'internal_error' };
        json(res, body, status);
      }
    }
  };
}
