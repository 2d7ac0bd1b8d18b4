import http from 'node:http';
import { loadConfig } from './config/load.js';
import { JsonLogger } from './core/logger.js';
import { SystemClock } from './core/clock.js';
import { loadUserDirectory } from './data/userDirectory.js';
import { SqliteRepository } from './data/sqliteRepository.js';
import { ConsoleChannel } from './alerts/console.js';
import { WebhookChannel } from './alerts/webhook.js';
import type { NotificationChannel } from './alerts/interface.js';
import { Scheduler } from './jobs/scheduler.js';
import { createAlertingSystem } from './app.js';
import { EventBus } from '../backend/src/services/eventBus.js';
import { createRouter } from '../backend/src/api/routes.js';
import { createWebSocketServer } from '../backend/src/websocket/server.js';

const main = async (): Promise<void> => {
  const config = loadConfig();
  const logger = new JsonLogger(config.logLevel, { service: 'alert-relay', env: config.nodeEnv });
  const clock = new SystemClock();
  const eventBus = new EventBus();

  const directory = loadUserDirectory(config.storage.directoryPath);
  const repository = config.storage.dbPath ? new SqliteRepository(config.storage.dbPath) : undefined;

  const channels: NotificationChannel[] = [];
  if (config.channels.console.enabled) channels.push(new ConsoleChannel(clock));
  if (config.channels.webhook.enabled && config.channels.webhook.url) {
    channels.push(new WebhookChannel({ url: config.channels.webhook.url, timeoutMs: config.dispatch.timeoutMs }));
  }

  const system = createAlertingSystem({
    directory,
    logger: logger.child({ component: 'core' }),
    clock,
    eventBus,
    repository,
    channels,
    defaultTimeZone: config.defaultTimeZone,
    defaultReminderIntervalMs: config.reminders.defaultIntervalMs,
    dispatchTimeoutMs: config.dispatch.timeoutMs,
    deliveryLogSize: config.dispatch.deliveryLogSize,
  });

  const rehydrated = await system.service.hydrateTargets();
  logger.info('alerting core ready', {
    alerts: system.alerts.size,
    states: system.states.size,
    rehydratedTargets: rehydrated,
    channels: system.dispatcher.channelNames(),
    persistence: repository ? 'sqlite' : 'memory',
  });

  const scheduler = new Scheduler(logger.child({ component: 'scheduler' }));
  scheduler.add('reminders', config.reminders.tickMs, async () => {
    await system.service.runTick();
  });

  const startedAt = clock.now();
  const handleRequest = createRouter({
    context: { service: system.service, logger, metrics: system.metrics, clock, startedAt },
    auth: { apiKey: config.apiKey },
    cors: { allowedOrigins: config.corsOrigins },
  });

  const server = http.createServer((req, res) => {
    void handleRequest(req, res).catch((err: unknown) => {
      logger.error('unhandled request error', { error: String(err) });
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ error: 'internal_error' }));
      }
    });
  });

  const wss = createWebSocketServer({
    httpServer: server,
    eventBus,
    logger: logger.child({ component: 'ws' }),
    apiKey: config.apiKey,
  });

  server.listen(config.httpPort, () => {
    logger.info('service started', { port: config.httpPort, reminderTickMs: config.reminders.tickMs });
  });

  const shutdown = (): void => {
    logger.info('shutdown initiated');
    scheduler.shutdown();
    wss.close();
    server.close(() => {
      repository?.close();
      logger.info('http server closed');
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
};

void main().catch((err) => {
  process.stderr.write(`Fatal startup error: ${String(err)}\n`);
  process.exit(1);
});
