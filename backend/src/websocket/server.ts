/**
 * WebSocket server — live push of in-app notifications and alert lifecycle events.
 *
 * Clients connect via `ws://host:port/ws?userId=<id>` and receive their own
 * in-app notifications. Lifecycle events are opt-in:
 *   { "action": "subscribe", "channels": ["alerts"] }
 *   { "action": "unsubscribe", "channels": ["alerts"] }
 */

import { WebSocketServer, WebSocket } from 'ws';
import { z } from 'zod';
import type { Server as HttpServer } from 'node:http';
import type { Logger } from '../../../src/core/logger.js';
import { ALL_CHANNELS, type Channel, type EventBus } from '../services/eventBus.js';
import { safeCompare } from '../middleware/auth.js';

interface ClientState {
  id: string;
  userId: string;
  unsubscribers: Map<Channel, () => void>;
  alive: boolean;
}

let clientCounter = 0;

const clientMessageSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('ping') }),
  z.object({ action: z.literal('subscribe'), channels: z.array(z.string()) }),
  z.object({ action: z.literal('unsubscribe'), channels: z.array(z.string()) }),
]);

type ClientMessage = z.infer<typeof clientMessageSchema>;

function isValidChannel(ch: string): ch is Channel {
  return ALL_CHANNELS.some((known) => known === ch);
}

function parseClientMessage(raw: string): ClientMessage | null {
  try {
    const parsed = clientMessageSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function sendJson(ws: WebSocket, data: unknown): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(data));
  }
}

export interface WsServerOptions {
  httpServer: HttpServer;
  eventBus: EventBus;
  logger: Logger;
  /** URL path for WebSocket upgrade. Default: '/ws'. */
  path?: string;
  /** If set, clients must pass ?token=<key>. */
  apiKey?: string;
  heartbeatMs?: number;
}

export function createWebSocketServer(options: WsServerOptions): WebSocketServer {
  const { httpServer, eventBus, logger, apiKey } = options;
  const path = options.path ?? '/ws';
  const heartbeatMs = options.heartbeatMs ?? 30_000;

  const wss = new WebSocketServer({ server: httpServer, path, maxPayload: 4096 });
  const clients = new Map<WebSocket, ClientState>();

  const subscribe = (ws: WebSocket, state: ClientState, channel: Channel): void => {
    if (state.unsubscribers.has(channel)) return;
    const unsub =
      channel === 'notifications'
        ? eventBus.on('notifications', (payload) => {
            if (payload.userId !== state.userId) return;
            sendJson(ws, { type: 'event', channel, data: payload });
          })
        : eventBus.on('alerts', (payload) => {
            sendJson(ws, { type: 'event', channel, data: payload });
          });
    state.unsubscribers.set(channel, unsub);
  };

  const release = (state: ClientState): void => {
    for (const unsub of state.unsubscribers.values()) unsub();
    state.unsubscribers.clear();
  };

  wss.on('connection', (ws, req) => {
    const url = new URL(req.url ?? '', `http://${req.headers.host ?? 'localhost'}`);
    if (apiKey && !safeCompare(url.searchParams.get('token') ?? '', apiKey)) {
      sendJson(ws, { error: 'unauthorized', message: 'Invalid or missing token' });
      ws.close(4001, 'Unauthorized');
      return;
    }
    const userId = url.searchParams.get('userId');
    if (!userId) {
      sendJson(ws, { error: 'bad_request', message: 'userId query parameter is required' });
      ws.close(4000, 'Missing userId');
      return;
    }

    const state: ClientState = {
      id: `ws-${++clientCounter}`,
      userId,
      unsubscribers: new Map(),
      alive: true,
    };
    clients.set(ws, state);
    subscribe(ws, state, 'notifications');

    logger.info('ws client connected', { clientId: state.id, userId, remoteAddr: req.socket.remoteAddress });
    sendJson(ws, { type: 'welcome', clientId: state.id, availableChannels: ALL_CHANNELS });

    ws.on('message', (raw) => {
      const msg = parseClientMessage(String(raw));
      if (!msg) {
        sendJson(ws, { error: 'invalid_message', message: 'Send JSON with action: subscribe|unsubscribe|ping' });
        return;
      }

      if (msg.action === 'ping') {
        sendJson(ws, { type: 'pong' });
        return;
      }

      const validChannels = msg.channels.filter(isValidChannel);
      const invalidChannels = msg.channels.filter((c) => !isValidChannel(c));
      if (invalidChannels.length > 0) {
        sendJson(ws, { type: 'warning', message: `Unknown channels ignored: ${invalidChannels.join(', ')}` });
      }

      if (msg.action === 'subscribe') {
        for (const ch of validChannels) subscribe(ws, state, ch);
      } else {
        for (const ch of validChannels) {
          state.unsubscribers.get(ch)?.();
          state.unsubscribers.delete(ch);
        }
      }
      sendJson(ws, { type: `${msg.action}d`, channels: [...state.unsubscribers.keys()] });
    });

    ws.on('close', () => {
      release(state);
      clients.delete(ws);
      logger.info('ws client disconnected', { clientId: state.id });
    });

    ws.on('error', (err) => {
      logger.warn('ws client error', { clientId: state.id, error: String(err) });
    });

    ws.on('pong', () => {
      state.alive = true;
    });
  });

  const heartbeatInterval = setInterval(() => {
    for (const [ws, state] of clients.entries()) {
      if (!state.alive) {
        logger.debug('ws client heartbeat timeout, terminating', { clientId: state.id });
        release(state);
        clients.delete(ws);
        ws.terminate();
        continue;
      }
      state.alive = false;
      ws.ping();
    }
  }, heartbeatMs);

  wss.on('close', () => {
    clearInterval(heartbeatInterval);
  });

  logger.info('websocket server attached', { path, heartbeatMs });
  return wss;
}
