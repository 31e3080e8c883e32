import type { ScheduleEntry, ScheduleStore } from '@cadre/core';

import { scheduleState, type Database } from '../db/index.js';

/**
 * Postgres Schedule Store
 */
export class PgScheduleStore implements ScheduleStore {
  constructor(private db: Database) {}

  async load(): Promise<ScheduleEntry[]> {
    return this.db.select().from(scheduleState);
  }

  async save(entries: readonly ScheduleEntry[]): Promise<void> {
    if (entries.length === 0) return;

    await this.db.transaction(async (tx) => {
      for (const entry of entries) {
        await tx
          .insert(scheduleState)
          .values(entry)
          .onConflictDoUpdate({
            target: scheduleState.key,
            set: {
              scheduleClass: entry.scheduleClass,
              nextFireAt: entry.nextFireAt,
              lastFiredAt: entry.lastFiredAt,
            },
          });
      }
    });
  }
}
