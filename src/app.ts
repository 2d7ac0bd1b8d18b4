import { SystemClock, type Clock } from './core/clock.js';
import type { Logger } from './core/logger.js';
import { InMemoryMetrics } from './core/metrics.js';
import { AlertStore, DEFAULT_REMINDER_INTERVAL_MS } from './data/alertStore.js';
import { UserAlertStateStore } from './data/userAlertStateStore.js';
import { DeliveryLog } from './data/deliveryLog.js';
import type { UserDirectory } from './data/userDirectory.js';
import type { AlertRepository, UserAlertStateRepository } from './data/repository.js';
import { VisibilityResolver } from './alerts/visibility.js';
import { InAppChannel } from './alerts/inApp.js';
import type { NotificationChannel } from './alerts/interface.js';
import { NotificationDispatcher } from './alerts/notificationDispatcher.js';
import { AlertingService } from './alerts/alertingService.js';
import { ReminderScheduler } from './jobs/reminderScheduler.js';
import { AnalyticsAggregator } from './analytics/aggregator.js';
import type { EventBus } from '../backend/src/services/eventBus.js';

export interface AlertingSystemOptions {
  directory: UserDirectory;
  logger: Logger;
  clock?: Clock;
  metrics?: InMemoryMetrics;
  eventBus?: EventBus;
  repository?: AlertRepository & UserAlertStateRepository;
  /** Channels registered next to the built-in in-app channel. */
  channels?: NotificationChannel[];
  defaultTimeZone?: string;
  defaultReminderIntervalMs?: number;
  dispatchTimeoutMs?: number;
  deliveryLogSize?: number;
}

export interface AlertingSystem {
  service: AlertingService;
  alerts: AlertStore;
  states: UserAlertStateStore;
  dispatcher: NotificationDispatcher;
  scheduler: ReminderScheduler;
  analytics: AnalyticsAggregator;
  deliveryLog: DeliveryLog;
  inApp: InAppChannel;
  metrics: InMemoryMetrics;
  clock: Clock;
}

/** Wires the alerting core from its collaborators. */
export function createAlertingSystem(opts: AlertingSystemOptions): AlertingSystem {
  const clock = opts.clock ?? new SystemClock();
  const metrics = opts.metrics ?? new InMemoryMetrics();
  const logger = opts.logger;

  const alerts = new AlertStore({
    defaultReminderIntervalMs: opts.defaultReminderIntervalMs ?? DEFAULT_REMINDER_INTERVAL_MS,
    repository: opts.repository,
  });
  const states = new UserAlertStateStore(alerts, opts.repository);
  const deliveryLog = new DeliveryLog(opts.deliveryLogSize);
  const inApp = new InAppChannel(clock, opts.eventBus);
  const dispatcher = new NotificationDispatcher(
    [inApp, ...(opts.channels ?? [])],
    deliveryLog,
    clock,
    logger,
    metrics,
    { timeoutMs: opts.dispatchTimeoutMs },
  );
  const scheduler = new ReminderScheduler(alerts, states, dispatcher, clock, logger, metrics);
  const analytics = new AnalyticsAggregator(alerts, states, deliveryLog);
  const resolver = new VisibilityResolver(opts.directory);

  const service = new AlertingService({
    alerts,
    states,
    resolver,
    directory: opts.directory,
    dispatcher,
    scheduler,
    analytics,
    deliveryLog,
    inApp,
    clock,
    logger,
    metrics,
    eventBus: opts.eventBus,
    defaultTimeZone: opts.defaultTimeZone ?? 'UTC',
  });

  return { service, alerts, states, dispatcher, scheduler, analytics, deliveryLog, inApp, metrics, clock };
}
