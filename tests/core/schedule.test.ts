import { describe, it, expect } from 'vitest';
import {
  InMemoryScheduleStore,
  advanceFire,
  cycleIdFor,
  firstFireAtOrAfter,
  isDue,
  isTimedSchedule,
  periodDays,
} from '@cadre/core';

// 2026-03-02 is a Monday; all times are local
const local = (day: number, hour: number, minute = 0) => new Date(2026, 2, day, hour, minute);
const settings = { hour: 9, minute: 0, weekday: 1 };

describe('firstFireAtOrAfter', () => {
  it('fires later the same day when the hour has not passed', () => {
    expect(firstFireAtOrAfter('daily', local(2, 8), settings)).toEqual(local(2, 9));
  });

  it('fires at the configured time itself', () => {
    expect(firstFireAtOrAfter('daily', local(2, 9), settings)).toEqual(local(2, 9));
  });

  it('moves to the next day once the hour has passed', () => {
    expect(firstFireAtOrAfter('daily', local(2, 9, 30), settings)).toEqual(local(3, 9));
  });

  it('moves weekly classes to the configured weekday', () => {
    expect(firstFireAtOrAfter('weekly', local(3, 8), settings)).toEqual(local(9, 9));
    expect(firstFireAtOrAfter('biweekly', local(2, 8), settings)).toEqual(local(2, 9));
  });
});

describe('advanceFire', () => {
  it('advances one period after an on-time fire', () => {
    expect(advanceFire(local(2, 9), 'daily', local(2, 9))).toEqual(local(3, 9));
    expect(advanceFire(local(2, 9), 'weekly', local(2, 9))).toEqual(local(9, 9));
    expect(advanceFire(local(2, 9), 'biweekly', local(2, 9))).toEqual(local(16, 9));
  });

  it('skips missed periods instead of replaying them', () => {
    expect(advanceFire(local(2, 9), 'daily', local(5, 12))).toEqual(local(6, 9));
  });
});

describe('schedule helpers', () => {
  it('names cycles by local date', () => {
    expect(cycleIdFor(local(2, 9))).toBe('2026-03-02');
  });

  it('knows which classes are timed', () => {
    expect(isTimedSchedule('weekly')).toBe(true);
    expect(isTimedSchedule('event_triggered')).toBe(false);
    expect(isTimedSchedule('always_on')).toBe(false);
    expect(periodDays('biweekly')).toBe(14);
  });

  it('treats an entry as due at its fire time', () => {
    const entry = { key: 'a', scheduleClass: 'daily' as const, nextFireAt: local(2, 9), lastFiredAt: null };
    expect(isDue(entry, local(2, 8, 59))).toBe(false);
    expect(isDue(entry, local(2, 9))).toBe(true);
  });
});

describe('InMemoryScheduleStore', () => {
  it('upserts entries by key', async () => {
    const store = new InMemoryScheduleStore();
    await store.save([{ key: 'a', scheduleClass: 'daily', nextFireAt: local(2, 9), lastFiredAt: null }]);
    await store.save([{ key: 'a', scheduleClass: 'daily', nextFireAt: local(3, 9), lastFiredAt: local(2, 9) }]);

    expect(await store.load()).toEqual([
      { key: 'a', scheduleClass: 'daily', nextFireAt: local(3, 9), lastFiredAt: local(2, 9) },
    ]);
  });
});
