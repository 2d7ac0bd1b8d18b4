import type { Alert, UserAlertState } from '../core/types.js';

/**
 * Write-through persistence for the stores. Methods are synchronous so that a
 * store mutation and its write stay one indivisible step on the event loop.
 */

export interface AlertRecord {
  alert: Alert;
  /** Target snapshot; null when it was never stored and must be resolved again. */
  targets: string[] | null;
}

export interface AlertRepository {
  saveAlert(alert: Alert, targets: ReadonlySet<string> | null): void;
  loadAlerts(): AlertRecord[];
}

export interface UserAlertStateRepository {
  saveState(state: UserAlertState): void;
  loadStates(): UserAlertState[];
}
