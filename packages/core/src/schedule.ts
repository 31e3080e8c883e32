import { addDays, format, getDay, set, startOfDay } from 'date-fns';

import type { ScheduleClass } from '@cadre/protocol';

export type TimedScheduleClass = Extract<ScheduleClass, 'daily' | 'weekly' | 'biweekly'>;

/** Schedule table key of the daily cycle itself */
export const CYCLE_KEY = '__daily_cycle__';

export interface ScheduleSettings {
  /** Local hour and minute at which the daily cycle and timed agents fire */
  hour: number;
  minute: number;
  /** Weekday for weekly and biweekly agents, 0 = Sunday */
  weekday: number;
}

export interface ScheduleEntry {
  key: string;
  scheduleClass: TimedScheduleClass;
  nextFireAt: Date;
  lastFiredAt: Date | null;
}

const PERIOD_DAYS: Record<TimedScheduleClass, number> = {
  daily: 1,
  weekly: 7,
  biweekly: 14,
};

export function isTimedSchedule(scheduleClass: ScheduleClass): scheduleClass is TimedScheduleClass {
  return scheduleClass in PERIOD_DAYS;
}

export function periodDays(scheduleClass: TimedScheduleClass): number {
  return PERIOD_DAYS[scheduleClass];
}

/**
 * Cycle identifier for the local date of `at`, e.g. 2026-03-02
 */
export function cycleIdFor(at: Date): string {
  return format(at, 'yyyy-MM-dd');
}

/**
 * Earliest fire time at or after `from`. Daily classes fire on any day,
 * weekly and biweekly ones only on the configured weekday.
 */
export function firstFireAtOrAfter(
  scheduleClass: TimedScheduleClass,
  from: Date,
  settings: ScheduleSettings,
): Date {
  let candidate = set(startOfDay(from), {
    hours: settings.hour,
    minutes: settings.minute,
    seconds: 0,
    milliseconds: 0,
  });

  if (candidate.getTime() < from.getTime()) {
    candidate = addDays(candidate, 1);
  }

  if (scheduleClass !== 'daily') {
    while (getDay(candidate) !== settings.weekday) {
      candidate = addDays(candidate, 1);
    }
  }

  return candidate;
}

/**
 * Next fire time after a fire that was due at `previous`. Skips whole periods
 * so the result is always after `now`; missed periods are not replayed.
 */
export function advanceFire(previous: Date, scheduleClass: TimedScheduleClass, now: Date): Date {
  const days = periodDays(scheduleClass);
  let next = addDays(previous, days);
  while (next.getTime() <= now.getTime()) {
    next = addDays(next, days);
  }
  return next;
}

export function isDue(entry: ScheduleEntry, now: Date): boolean {
  return entry.nextFireAt.getTime() <= now.getTime();
}

/**
 * Schedule Store Interface
 *
 * Persistent next-fire table keyed by agent id (plus the cycle key).
 */
export interface ScheduleStore {
  load(): Promise<ScheduleEntry[]>;

  /**
   * Replace the stored entries for the given keys
   */
  save(entries: readonly ScheduleEntry[]): Promise<void>;
}

/**
 * In-Memory Schedule Store (for development and testing)
 */
export class InMemoryScheduleStore implements ScheduleStore {
  private entries: Map<string, ScheduleEntry> = new Map();

  async load(): Promise<ScheduleEntry[]> {
    return Array.from(this.entries.values()).map((entry) => ({ ...entry }));
  }

  async save(entries: readonly ScheduleEntry[]): Promise<void> {
    for (const entry of entries) {
      this.entries.set(entry.key, { ...entry });
    }
  }

  // Testing helpers

  get(key: string): ScheduleEntry | undefined {
    const entry = this.entries.get(key);
    return entry ? { ...entry } : undefined;
  }
}
