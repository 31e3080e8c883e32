import type { FailedRunSummary, Run, Task } from '@cadre/protocol';
import { cycleIdOf } from '@cadre/protocol';

export type TaskRecordStatus = 'active' | 'complete' | 'interrupted';

export interface TaskRecord {
  task: Task;
  status: TaskRecordStatus;
  runs: Run[];
  completedAt?: Date;
}

export interface CycleRun {
  task: Task;
  run: Run;
}

/**
 * Run Ledger Interface
 *
 * Audit trail of accepted tasks and their runs. Failures stay "unreported"
 * until a briefing lists them.
 */
export interface RunLedger {
  /**
   * Record a task as accepted (idempotent)
   */
  recordTask(task: Task): Promise<void>;

  /**
   * Insert or update runs by id
   */
  recordRuns(taskId: string, runs: readonly Run[]): Promise<void>;

  completeTask(taskId: string, status: Exclude<TaskRecordStatus, 'active'>, at: Date): Promise<void>;

  getTask(taskId: string): Promise<TaskRecord | null>;

  activeTasks(): Promise<Task[]>;

  /**
   * Every run belonging to tasks of one cycle, in task acceptance order
   */
  runsForCycle(cycleId: string): Promise<CycleRun[]>;

  /**
   * Failed runs of non-interactive tasks that no briefing has reported yet
   */
  unreportedFailures(): Promise<FailedRunSummary[]>;

  markReported(runIds: readonly string[], briefingId: string): Promise<void>;
}

export function toFailedRunSummary(task: Task, run: Run): FailedRunSummary | null {
  if (run.status !== 'failed' || !run.error) return null;
  return {
    runId: run.id,
    taskId: task.id,
    agentId: run.agentId,
    instruction: task.payload.instruction,
    error: run.error,
    finishedAt: run.finishedAt,
  };
}

/**
 * In-Memory Run Ledger (for development and testing)
 */
export class InMemoryRunLedger implements RunLedger {
  private records: Map<string, TaskRecord> = new Map();
  private reported: Map<string, string> = new Map();

  async recordTask(task: Task): Promise<void> {
    if (this.records.has(task.id)) return;
    this.records.set(task.id, { task, status: 'active', runs: [] });
  }

  async recordRuns(taskId: string, runs: readonly Run[]): Promise<void> {
    const record = this.records.get(taskId);
    if (!record) {
      throw new Error(`Task not found: ${taskId}`);
    }

    for (const run of runs) {
      const snapshot: Run = { ...run, attempts: [...run.attempts] };
      const index = record.runs.findIndex((r) => r.id === run.id);
      if (index === -1) {
        record.runs.push(snapshot);
      } else {
        record.runs[index] = snapshot;
      }
    }
  }

  async completeTask(taskId: string, status: Exclude<TaskRecordStatus, 'active'>, at: Date): Promise<void> {
    const record = this.records.get(taskId);
    if (!record) {
      throw new Error(`Task not found: ${taskId}`);
    }
    record.status = status;
    record.completedAt = at;
  }

  async getTask(taskId: string): Promise<TaskRecord | null> {
    const record = this.records.get(taskId);
    return record ? { ...record, runs: [...record.runs] } : null;
  }

  async activeTasks(): Promise<Task[]> {
    return Array.from(this.records.values())
      .filter((record) => record.status === 'active')
      .map((record) => record.task);
  }

  async runsForCycle(cycleId: string): Promise<CycleRun[]> {
    const result: CycleRun[] = [];
    for (const record of this.records.values()) {
      if (cycleIdOf(record.task) !== cycleId) continue;
      for (const run of record.runs) {
        result.push({ task: record.task, run });
      }
    }
    return result;
  }

  async unreportedFailures(): Promise<FailedRunSummary[]> {
    const failures: FailedRunSummary[] = [];
    for (const record of this.records.values()) {
      if (record.task.origin.kind === 'human') continue;
      for (const run of record.runs) {
        if (this.reported.has(run.id)) continue;
        const failure = toFailedRunSummary(record.task, run);
        if (failure) failures.push(failure);
      }
    }
    return failures;
  }

  async markReported(runIds: readonly string[], briefingId: string): Promise<void> {
    for (const runId of runIds) {
      this.reported.set(runId, briefingId);
    }
  }

  // Testing helpers

  reportedIn(runId: string): string | undefined {
    return this.reported.get(runId);
  }
}
