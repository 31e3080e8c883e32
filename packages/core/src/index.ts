// Concurrency
export { KeyedMutex, PriorityPool } from './concurrency.js';

// Task queue
export { TaskQueue, taskRank } from './queue.js';

// Memory
export { InMemoryMemoryStore } from './store.js';
export type { MemoryStore, NewMemoryRecord, EntryQuery } from './store.js';
export { BulletSummarizer, condense } from './summarizer.js';
export type { Summarizer } from './summarizer.js';
export { MemoryManager } from './memory-manager.js';
export type { MemoryManagerOptions, RecentContext, CompactionOutcome, NewEntry } from './memory-manager.js';

// Run ledger
export { InMemoryRunLedger, toFailedRunSummary } from './ledger.js';
export type { RunLedger, TaskRecord, TaskRecordStatus, CycleRun } from './ledger.js';

// Roster
export { AgentRoster, RosterValidationError } from './registry.js';

// Schedule
export {
  CYCLE_KEY,
  InMemoryScheduleStore,
  advanceFire,
  cycleIdFor,
  firstFireAtOrAfter,
  isDue,
  isTimedSchedule,
  periodDays,
} from './schedule.js';
export type { ScheduleEntry, ScheduleSettings, ScheduleStore, TimedScheduleClass } from './schedule.js';
