import { and, asc, eq, inArray, isNull, ne } from 'drizzle-orm';

import type { FailedRunSummary, Run, RunAttempt, Task, TaskOrigin } from '@cadre/protocol';
import { cycleIdOf } from '@cadre/protocol';
import type { CycleRun, RunLedger, TaskRecord, TaskRecordStatus } from '@cadre/core';
import { toFailedRunSummary } from '@cadre/core';

import {
  runs,
  tasks,
  type Database,
  type NewRunRow,
  type RunRow,
  type StoredAttempt,
  type StoredOrigin,
  type TaskRow,
} from '../db/index.js';

function toStoredOrigin(origin: Readonly<TaskOrigin>): StoredOrigin {
  return origin.kind === 'human' ? { ...origin, receivedAt: origin.receivedAt.toISOString() } : { ...origin };
}

function fromStoredOrigin(origin: StoredOrigin): TaskOrigin {
  return origin.kind === 'human' ? { ...origin, receivedAt: new Date(origin.receivedAt) } : { ...origin };
}

function toTask(row: TaskRow): Task {
  return Object.freeze({
    id: row.id,
    origin: Object.freeze(fromStoredOrigin(row.origin)),
    targetAgentIds: Object.freeze([...row.targetAgentIds]),
    payload: Object.freeze({ instruction: row.instruction, hints: Object.freeze({ ...row.hints }) }),
    priority: row.priority,
    createdAt: row.createdAt,
  });
}

function toStoredAttempt(attempt: RunAttempt): StoredAttempt {
  return {
    attempt: attempt.attempt,
    startedAt: attempt.startedAt.toISOString(),
    finishedAt: attempt.finishedAt.toISOString(),
    error: attempt.error,
  };
}

function toRun(row: RunRow): Run {
  return {
    id: row.id,
    taskId: row.taskId,
    agentId: row.agentId,
    status: row.status,
    attemptCount: row.attemptCount,
    attempts: row.attempts.map((attempt) => ({
      attempt: attempt.attempt,
      startedAt: new Date(attempt.startedAt),
      finishedAt: new Date(attempt.finishedAt),
      error: attempt.error,
    })),
    startedAt: row.startedAt ?? undefined,
    finishedAt: row.finishedAt ?? undefined,
    result: row.result ?? undefined,
    error: row.error ?? undefined,
    usage: row.usage,
  };
}

function toRunRow(taskId: string, run: Run): NewRunRow {
  return {
    id: run.id,
    taskId,
    agentId: run.agentId,
    status: run.status,
    attemptCount: run.attemptCount,
    attempts: run.attempts.map(toStoredAttempt),
    startedAt: run.startedAt ?? null,
    finishedAt: run.finishedAt ?? null,
    result: run.result ?? null,
    error: run.error ?? null,
    usage: run.usage,
  };
}

/**
 * Postgres Run Ledger
 */
export class PgRunLedger implements RunLedger {
  constructor(private db: Database) {}

  async recordTask(task: Task): Promise<void> {
    await this.db
      .insert(tasks)
      .values({
        id: task.id,
        originKind: task.origin.kind,
        origin: toStoredOrigin(task.origin),
        cycleId: cycleIdOf(task) ?? null,
        targetAgentIds: [...task.targetAgentIds],
        instruction: task.payload.instruction,
        hints: task.payload.hints,
        priority: task.priority,
        createdAt: task.createdAt,
      })
      .onConflictDoNothing({ target: tasks.id });
  }

  async recordRuns(taskId: string, taskRuns: readonly Run[]): Promise<void> {
    await this.db.transaction(async (tx) => {
      const [task] = await tx.select({ id: tasks.id }).from(tasks).where(eq(tasks.id, taskId));
      if (!task) {
        throw new Error(`Task not found: ${taskId}`);
      }

      for (const run of taskRuns) {
        const row = toRunRow(taskId, run);
        await tx
          .insert(runs)
          .values(row)
          .onConflictDoUpdate({
            target: runs.id,
            set: {
              status: row.status,
              attemptCount: row.attemptCount,
              attempts: row.attempts,
              startedAt: row.startedAt,
              finishedAt: row.finishedAt,
              result: row.result,
              error: row.error,
              usage: row.usage,
            },
          });
      }
    });
  }

  async completeTask(taskId: string, status: Exclude<TaskRecordStatus, 'active'>, at: Date): Promise<void> {
    const updated = await this.db
      .update(tasks)
      .set({ status, completedAt: at })
      .where(eq(tasks.id, taskId))
      .returning({ id: tasks.id });

    if (updated.length === 0) {
      throw new Error(`Task not found: ${taskId}`);
    }
  }

  async getTask(taskId: string): Promise<TaskRecord | null> {
    const [row] = await this.db.select().from(tasks).where(eq(tasks.id, taskId));
    if (!row) return null;

    const runRows = await this.db.select().from(runs).where(eq(runs.taskId, taskId)).orderBy(asc(runs.seq));
    return {
      task: toTask(row),
      status: row.status,
      runs: runRows.map(toRun),
      completedAt: row.completedAt ?? undefined,
    };
  }

  async activeTasks(): Promise<Task[]> {
    const rows = await this.db.select().from(tasks).where(eq(tasks.status, 'active')).orderBy(asc(tasks.seq));
    return rows.map(toTask);
  }

  async runsForCycle(cycleId: string): Promise<CycleRun[]> {
    const taskRows = await this.db.select().from(tasks).where(eq(tasks.cycleId, cycleId)).orderBy(asc(tasks.seq));
    if (taskRows.length === 0) return [];

    const runRows = await this.db
      .select()
      .from(runs)
      .where(inArray(runs.taskId, taskRows.map((row) => row.id)))
      .orderBy(asc(runs.seq));

    const result: CycleRun[] = [];
    for (const taskRow of taskRows) {
      const task = toTask(taskRow);
      for (const runRow of runRows) {
        if (runRow.taskId === task.id) result.push({ task, run: toRun(runRow) });
      }
    }
    return result;
  }

  async unreportedFailures(): Promise<FailedRunSummary[]> {
    const rows = await this.db
      .select({ run: runs, task: tasks })
      .from(runs)
      .innerJoin(tasks, eq(runs.taskId, tasks.id))
      .where(and(eq(runs.status, 'failed'), isNull(runs.reportedIn), ne(tasks.originKind, 'human')))
      .orderBy(asc(runs.seq));

    const failures: FailedRunSummary[] = [];
    for (const row of rows) {
      const failure = toFailedRunSummary(toTask(row.task), toRun(row.run));
      if (failure) failures.push(failure);
    }
    return failures;
  }

  async markReported(runIds: readonly string[], briefingId: string): Promise<void> {
    if (runIds.length === 0) return;
    await this.db
      .update(runs)
      .set({ reportedIn: briefingId })
      .where(inArray(runs.id, [...runIds]));
  }
}
