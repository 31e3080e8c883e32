import {
  bigserial,
  index,
  integer,
  jsonb,
  pgEnum,
  pgTable,
  text,
  timestamp,
} from 'drizzle-orm/pg-core';

import type { ErrorKind, TaskHints, TokenUsage } from '@cadre/protocol';

// Enums aligned with @cadre/protocol

export const taskPriorityEnum = pgEnum('task_priority', ['high', 'medium', 'low']);

export const runStatusEnum = pgEnum('run_status', ['pending', 'running', 'succeeded', 'failed', 'retrying']);

export const taskStatusEnum = pgEnum('task_status', ['active', 'complete', 'interrupted']);

export const scheduleClassEnum = pgEnum('schedule_class', ['daily', 'weekly', 'biweekly']);

// Dates inside jsonb columns are kept as ISO strings

export type StoredOrigin =
  | { kind: 'human'; channel: string; author: string; receivedAt: string }
  | { kind: 'schedule'; trigger: 'cycle' | 'event' | 'briefing'; cycleId?: string }
  | { kind: 'agent'; agentId: string; parentTaskId: string; cycleId?: string };

export interface StoredRunError {
  kind: ErrorKind;
  message: string;
  retryable: boolean;
}

export interface StoredAttempt {
  attempt: number;
  startedAt: string;
  finishedAt: string;
  error?: StoredRunError;
}

// Memory entries - append-only, one per successful run
export const memoryEntries = pgTable('memory_entries', {
  seq: bigserial('seq', { mode: 'number' }).primaryKey(),
  id: text('id').notNull().unique(), // mem_<id>
  agentId: text('agent_id').notNull(),
  timestamp: timestamp('timestamp', { withTimezone: true }).notNull(),
  summary: text('summary').notNull(),
  rawRef: text('raw_ref').notNull(), // out_<id>, see agent_outputs
  taskId: text('task_id'),
  runId: text('run_id'),
}, (table) => [
  index('memory_entries_agent_time_idx').on(table.agentId, table.timestamp, table.seq),
]);

// Full run outputs, addressed by memory entry raw_ref
export const agentOutputs = pgTable('agent_outputs', {
  ref: text('ref').primaryKey(),
  agentId: text('agent_id').notNull(),
  content: text('content').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

// Rolling summary per agent
export const agentSummaries = pgTable('agent_summaries', {
  agentId: text('agent_id').primaryKey(),
  text: text('text').notNull(),
  compactedThrough: timestamp('compacted_through', { withTimezone: true }),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull(),
});

// Accepted tasks
export const tasks = pgTable('tasks', {
  seq: bigserial('seq', { mode: 'number' }).notNull(),
  id: text('id').primaryKey(), // task_<id>
  originKind: text('origin_kind').$type<StoredOrigin['kind']>().notNull(),
  origin: jsonb('origin').$type<StoredOrigin>().notNull(),
  cycleId: text('cycle_id'),
  targetAgentIds: jsonb('target_agent_ids').$type<string[]>().notNull(),
  instruction: text('instruction').notNull(),
  hints: jsonb('hints').$type<TaskHints>().default({}).notNull(),
  priority: taskPriorityEnum('priority').notNull(),
  status: taskStatusEnum('status').default('active').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
  completedAt: timestamp('completed_at', { withTimezone: true }),
}, (table) => [
  index('tasks_cycle_id_idx').on(table.cycleId),
  index('tasks_status_idx').on(table.status),
]);

// Runs - one per (task, agent)
export const runs = pgTable('runs', {
  seq: bigserial('seq', { mode: 'number' }).notNull(),
  id: text('id').primaryKey(), // run_<id>
  taskId: text('task_id').notNull(),
  agentId: text('agent_id').notNull(),
  status: runStatusEnum('status').notNull(),
  attemptCount: integer('attempt_count').default(0).notNull(),
  attempts: jsonb('attempts').$type<StoredAttempt[]>().default([]).notNull(),
  startedAt: timestamp('started_at', { withTimezone: true }),
  finishedAt: timestamp('finished_at', { withTimezone: true }),
  result: text('result'),
  error: jsonb('error').$type<StoredRunError>(),
  usage: jsonb('usage').$type<TokenUsage>().notNull(),
  reportedIn: text('reported_in'), // briefing id
}, (table) => [
  index('runs_task_id_idx').on(table.taskId),
  index('runs_status_idx').on(table.status),
]);

// Next-fire table for timed agents and the daily cycle
export const scheduleState = pgTable('schedule_state', {
  key: text('key').primaryKey(),
  scheduleClass: scheduleClassEnum('schedule_class').notNull(),
  nextFireAt: timestamp('next_fire_at', { withTimezone: true }).notNull(),
  lastFiredAt: timestamp('last_fired_at', { withTimezone: true }),
});

// Type exports
export type MemoryEntryRow = typeof memoryEntries.$inferSelect;
export type AgentSummaryRow = typeof agentSummaries.$inferSelect;
export type TaskRow = typeof tasks.$inferSelect;
export type NewTaskRow = typeof tasks.$inferInsert;
export type RunRow = typeof runs.$inferSelect;
export type NewRunRow = typeof runs.$inferInsert;
export type ScheduleStateRow = typeof scheduleState.$inferSelect;
