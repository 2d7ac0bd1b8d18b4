import type { Logger } from '../core/logger.js';

interface ScheduledTask {
  timer: NodeJS.Timeout;
  running: boolean;
}

/** Interval runner for background jobs. A run is skipped while the previous one is still in flight. */
export class Scheduler {
  private readonly tasks = new Map<string, ScheduledTask>();

  constructor(private readonly logger: Logger) {}

  add(name: string, everyMs: number, task: () => Promise<void>): void {
    if (this.tasks.has(name)) throw new Error(`task ${name} already scheduled`);
    const entry: ScheduledTask = {
      running: false,
      timer: setInterval(() => {
        if (entry.running) {
          this.logger.warn('scheduled task still running, skipping run', { name });
          return;
        }
        entry.running = true;
        void task()
          .catch((err: unknown) => {
            this.logger.error('scheduled task failed', { name, err: String(err), stack: err instanceof Error ? err.stack : undefined });
          })
          .finally(() => {
            entry.running = false;
          });
      }, everyMs)
    };
    this.tasks.set(name, entry);
    this.logger.info('scheduled task registered', { name, everyMs });
  }

  shutdown(): void {
    for (const [, entry] of this.tasks) {
      clearInterval(entry.timer);
    }
    this.tasks.clear();
    this.logger.info('scheduler shutdown complete');
  }
}
