/**
 * Time source and calendar-day helpers.
 *
 * Nothing in the core reads `Date.now()` directly; the clock is injected so that
 * reminder eligibility and snooze day boundaries are deterministic under test.
 */

import { addDays, startOfDay } from 'date-fns';
import { fromZonedTime, toZonedTime } from 'date-fns-tz';

export interface Clock {
  now(): number;
}

export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }
}

/**
 * First instant of the calendar day after the one containing `timestamp`,
 * as observed in `timeZone` (IANA name, e.g. "Europe/Berlin").
 *
 * A snooze set at `timestamp` holds for every instant strictly before this value.
 */
export function startOfNextDay(timestamp: number, timeZone: string): number {
  const wallClock = toZonedTime(timestamp, timeZone);
  const nextMidnight = startOfDay(addDays(wallClock, 1));
  return fromZonedTime(nextMidnight, timeZone).getTime();
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}
