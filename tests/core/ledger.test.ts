import { describe, it, expect } from 'vitest';
import type { Run, Task } from '@cadre/protocol';
import { createTask, emptyUsage } from '@cadre/protocol';
import { InMemoryRunLedger } from '@cadre/core';

function run(task: Task, agentId: string, status: Run['status']): Run {
  return {
    id: `run_${agentId}_${status}`,
    taskId: task.id,
    agentId,
    status,
    attemptCount: 1,
    attempts: [],
    error: status === 'failed' ? { kind: 'PermanentExternalError', message: 'bad request', retryable: false } : undefined,
    usage: emptyUsage(),
  };
}

describe('InMemoryRunLedger', () => {
  const cycleTask = createTask({
    origin: { kind: 'schedule', trigger: 'cycle', cycleId: '2026-03-02' },
    instruction: 'Daily review',
    targetAgentIds: ['market_research', 'fundraising'],
  });
  const humanTask = createTask({
    origin: { kind: 'human', channel: 'requests', author: 'sam', receivedAt: new Date(0) },
    instruction: 'Question',
    targetAgentIds: ['fundraising'],
  });

  it('records tasks once and upserts runs by id', async () => {
    const ledger = new InMemoryRunLedger();
    await ledger.recordTask(cycleTask);
    await ledger.recordTask(cycleTask);

    await ledger.recordRuns(cycleTask.id, [run(cycleTask, 'market_research', 'running')]);
    await ledger.recordRuns(cycleTask.id, [{ ...run(cycleTask, 'market_research', 'running'), status: 'succeeded' }]);

    const record = await ledger.getTask(cycleTask.id);
    expect(record?.status).toBe('active');
    expect(record?.runs.map((r) => r.status)).toEqual(['succeeded']);
    expect(await ledger.activeTasks()).toEqual([cycleTask]);
  });

  it('refuses runs for a task it never accepted', async () => {
    const ledger = new InMemoryRunLedger();

    await expect(ledger.recordRuns('task_unknown', [])).rejects.toThrow('Task not found: task_unknown');
  });

  it('reports failures of non-interactive tasks until a briefing marks them', async () => {
    const ledger = new InMemoryRunLedger();
    await ledger.recordTask(cycleTask);
    await ledger.recordTask(humanTask);
    await ledger.recordRuns(cycleTask.id, [
      run(cycleTask, 'market_research', 'succeeded'),
      run(cycleTask, 'fundraising', 'failed'),
    ]);
    await ledger.recordRuns(humanTask.id, [run(humanTask, 'fundraising', 'failed')]);

    const failures = await ledger.unreportedFailures();
    expect(failures).toEqual([
      {
        runId: 'run_fundraising_failed',
        taskId: cycleTask.id,
        agentId: 'fundraising',
        instruction: 'Daily review',
        error: { kind: 'PermanentExternalError', message: 'bad request', retryable: false },
        finishedAt: undefined,
      },
    ]);

    await ledger.markReported(['run_fundraising_failed'], 'brief_1');
    expect(await ledger.unreportedFailures()).toEqual([]);
    expect(ledger.reportedIn('run_fundraising_failed')).toBe('brief_1');
  });

  it('collects the runs of one cycle', async () => {
    const ledger = new InMemoryRunLedger();
    await ledger.recordTask(cycleTask);
    await ledger.recordTask(humanTask);
    await ledger.recordRuns(cycleTask.id, [run(cycleTask, 'market_research', 'succeeded')]);
    await ledger.recordRuns(humanTask.id, [run(humanTask, 'fundraising', 'succeeded')]);

    const cycleRuns = await ledger.runsForCycle('2026-03-02');

    expect(cycleRuns.map(({ task, run: r }) => [task.id, r.agentId])).toEqual([[cycleTask.id, 'market_research']]);
  });
});
