/**
 * Dispatcher
 *
 * Turns tasks into runs and runs into completed tasks:
 * - resolves targets (explicit ids, or a routing run for unaddressed human requests)
 * - executes runs with per-agent serialisation and a bounded, priority-ordered run pool
 * - orders runs along dependency chains inside one task
 * - on completion: replies to humans, spawns follow-ups from scheduled work, posts briefings
 *
 * A task is complete only once every one of its runs is terminal.
 */

import { EventEmitter } from 'events';

import type { AgentDefinition, Briefing, FailedRunSummary, Run, RunError, Task } from '@cadre/protocol';
import {
  BRIEFING_AGENT_ID,
  OrchestrationError,
  RoutingAmbiguityError,
  createTask,
  cycleIdOf,
  generateBriefingId,
  isTaskComplete,
  toRunError,
} from '@cadre/protocol';
import type { AgentRoster, MemoryManager, RunLedger } from '@cadre/core';
import { KeyedMutex, PriorityPool, TaskQueue, condense, taskRank } from '@cadre/core';
import type { Runner } from '@cadre/agents';

import { withTaskScope } from '../correlation.js';
import { logger } from '../logger.js';
import type { ChatPoster } from '../transports/types.js';
import {
  composeBriefing,
  formatClarification,
  formatReply,
  parseDispatchDirectives,
  selectFollowUps,
  type FollowUpProposal,
} from './completion.js';
import { buildRouterAgent, parseRoutingReply } from './routing.js';

export interface DispatcherDeps {
  roster: AgentRoster;
  runner: Runner;
  ledger: RunLedger;
  memory: MemoryManager;
  chat: ChatPoster;
  briefingChannel: string;
  now?: () => Date;
}

export interface DispatcherOptions {
  /** Runs executing at once across all agents */
  maxConcurrentRuns: number;
  /** Tasks being worked on at once; the rest wait in the queue */
  maxActiveTasks: number;
}

export interface TaskOutcome {
  task: Task;
  runs: Run[];
  /** Every run is terminal */
  complete: boolean;
  /** Set when the task could not be resolved to any agent */
  error?: RunError;
  /** Text posted back to the requesting channel */
  reply?: string;
  posted: boolean;
  followUps: Task[];
  briefing?: Briefing;
}

/**
 * Events emitted by the Dispatcher. `task_spawned` for a follow-up always
 * fires before `task_complete` of the task that proposed it.
 */
export interface DispatcherEvents {
  task_spawned: (task: Task, parent: Task) => void;
  task_complete: (outcome: TaskOutcome) => void;
  run_finished: (run: Run, task: Task) => void;
}

interface Resolution {
  agents: AgentDefinition[];
  routingRun?: Run;
  error?: OrchestrationError;
}

interface Upstream {
  agentId: string;
  /** Undefined when the upstream task ended without a run for the agent */
  run: Run | undefined;
}

/**
 * Terminal run of one agent in one daily cycle, awaited by dependents that
 * the cycle fired in other tasks.
 */
interface CycleSlot {
  agentId: string;
  run: Promise<Run | undefined>;
  settle: (run: Run | undefined) => void;
}

function cycleOf(task: Task): string | undefined {
  return task.origin.kind === 'schedule' && task.origin.trigger === 'cycle' ? task.origin.cycleId : undefined;
}

export interface Dispatcher {
  on<E extends keyof DispatcherEvents>(event: E, listener: DispatcherEvents[E]): this;
  emit<E extends keyof DispatcherEvents>(event: E, ...args: Parameters<DispatcherEvents[E]>): boolean;
}

export class Dispatcher extends EventEmitter {
  private queue = new TaskQueue();
  private pool: PriorityPool;
  private agentLocks = new KeyedMutex();
  private active: Map<string, { task: Task; done: Promise<TaskOutcome> }> = new Map();
  private idleWaiters: Array<() => void> = [];
  private cycleSlots: Map<string, Map<string, CycleSlot>> = new Map();
  private taskSlots: Map<string, CycleSlot[]> = new Map();
  private abandoned = new Set<string>();
  private accepting = true;
  private router: AgentDefinition;
  private now: () => Date;

  constructor(
    private deps: DispatcherDeps,
    private options: DispatcherOptions,
  ) {
    super();
    this.pool = new PriorityPool(options.maxConcurrentRuns);
    this.router = buildRouterAgent(deps.roster);
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Queue a task. Tasks start in priority order as active slots free up.
   */
  enqueue(task: Task): void {
    if (!this.accepting) {
      throw new Error('Dispatcher is shutting down and no longer accepts tasks');
    }

    this.queue.enqueue(task);
    this.openCycleSlots(task);
    logger.debug({ taskId: task.id, origin: task.origin.kind, queued: this.queue.size }, 'Task queued');
    this.pump();
  }

  /**
   * Resolves once the queue is empty and no task is active
   */
  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Stop accepting and starting tasks. Returns the tasks that never started.
   */
  stop(): Task[] {
    this.accepting = false;
    const queued = this.queue.drain();
    for (const task of queued) {
      this.releaseCycleSlots(task);
    }
    return queued;
  }

  /**
   * Leave the ledger alone for tasks already recorded as interrupted. Their
   * runs may still finish.
   */
  abandon(taskIds: Iterable<string>): void {
    for (const taskId of taskIds) {
      this.abandoned.add(taskId);
    }
  }

  activeTasks(): Task[] {
    return Array.from(this.active.values()).map((entry) => entry.task);
  }

  getStats(): { queued: number; activeTasks: number; runs: ReturnType<PriorityPool['getStats']> } {
    return { queued: this.queue.size, activeTasks: this.active.size, runs: this.pool.getStats() };
  }

  /**
   * Execute one task to completion. Never rejects for run failures; those are
   * recorded on the runs.
   */
  async submit(task: Task): Promise<TaskOutcome> {
    return withTaskScope(task.id, async () => {
      await this.writeLedger(task, 'record task', () => this.deps.ledger.recordTask(task));
      logger.info({ origin: task.origin.kind, targets: task.targetAgentIds }, 'Task started');

      const resolution = await this.resolveTargets(task);
      const runs: Run[] = resolution.routingRun ? [resolution.routingRun] : [];
      if (!resolution.error) {
        runs.push(...(await this.executePlan(task, resolution.agents)));
      }

      if (!isTaskComplete(runs)) {
        throw new Error(`Task ${task.id} finished with non-terminal runs`);
      }

      const outcome = await this.complete(task, runs, resolution.error?.toRunError());
      await this.writeLedger(task, 'complete task', () =>
        this.deps.ledger.completeTask(task.id, 'complete', this.now()),
      );

      logger.info(
        {
          runs: runs.length,
          failed: runs.filter((run) => run.status === 'failed').length,
          followUps: outcome.followUps.length,
        },
        'Task complete',
      );
      this.emit('task_complete', outcome);
      return outcome;
    });
  }

  private pump(): void {
    while (this.accepting && this.active.size < this.options.maxActiveTasks) {
      const task = this.queue.dequeue();
      if (!task) break;

      const done = this.submit(task)
        .catch((error: unknown) => this.abort(task, error))
        .finally(() => {
          this.releaseCycleSlots(task);
          this.abandoned.delete(task.id);
          this.active.delete(task.id);
          this.pump();
          this.notifyIdle();
        });

      this.active.set(task.id, { task, done });
    }
  }

  /**
   * A task whose processing threw still answers its requester and still
   * reaches `task_complete`, so a cycle waiting on it can brief.
   */
  private async abort(task: Task, error: unknown): Promise<TaskOutcome> {
    logger.error({ error, taskId: task.id }, 'Task aborted');
    const outcome: TaskOutcome = {
      task,
      runs: [],
      complete: false,
      error: toRunError(error),
      posted: false,
      followUps: [],
    };

    if (task.origin.kind === 'human') {
      outcome.reply = "I couldn't complete that request.";
      outcome.posted = await this.post(task.origin.channel, outcome.reply);
    }
    this.emit('task_complete', outcome);
    return outcome;
  }

  private isIdle(): boolean {
    return this.active.size === 0 && (this.queue.size === 0 || !this.accepting);
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private async resolveTargets(task: Task): Promise<Resolution> {
    if (task.targetAgentIds.length > 0) {
      const known = task.targetAgentIds.filter((id) => this.deps.roster.has(id));
      const unknown = task.targetAgentIds.filter((id) => !this.deps.roster.has(id));
      if (unknown.length > 0) {
        logger.warn({ unknown }, 'Ignoring unknown target agents');
      }
      if (known.length === 0) {
        return { agents: [], error: new RoutingAmbiguityError(`no known agent among ${unknown.join(', ')}`) };
      }
      return { agents: Array.from(new Set(known)).map((id) => this.deps.roster.require(id)) };
    }

    if (task.origin.kind !== 'human') {
      return { agents: [], error: new RoutingAmbiguityError('task names no target agents') };
    }

    const routingRun = await this.runAgent(this.router, task, [], false);
    if (routingRun.status !== 'succeeded') {
      return {
        agents: [],
        routingRun,
        error: new RoutingAmbiguityError(`routing failed: ${routingRun.error?.message ?? 'unknown error'}`),
      };
    }

    const selected = parseRoutingReply(routingRun.result ?? '', this.deps.roster);
    if (selected.length === 0) {
      return { agents: [], routingRun, error: new RoutingAmbiguityError('no agent matched the request') };
    }

    logger.info({ selected }, 'Request routed');
    return { agents: selected.map((id) => this.deps.roster.require(id)), routingRun };
  }

  /**
   * One run per agent. An agent waits for the agents it depends on, whether
   * selected in this task or fired by the same daily cycle in another task,
   * and is skipped when any of them did not succeed.
   */
  private executePlan(task: Task, agents: readonly AgentDefinition[]): Promise<Run[]> {
    const selected = new Set(agents.map((agent) => agent.id));
    const scheduled = new Map<string, Promise<Run>>();

    const schedule = (agent: AgentDefinition): Promise<Run> => {
      const existing = scheduled.get(agent.id);
      if (existing) return existing;

      const waits = [
        ...this.deps.roster
          .upstreamWithin(agent.id, selected)
          .map((id) => schedule(this.deps.roster.require(id)).then((run): Upstream => ({ agentId: id, run }))),
        ...this.cycleUpstream(task, agent, selected),
      ];
      const promise = Promise.all(waits).then(async (upstream) => {
        const unmet = upstream.filter(({ run }) => run?.status !== 'succeeded').map(({ agentId }) => agentId);
        if (unmet.length > 0) {
          const skipped = this.deps.runner.skip(agent, task, unmet);
          await this.recordRun(skipped, task);
          return skipped;
        }
        return this.runAgent(
          agent,
          task,
          upstream.flatMap(({ run }) => (run ? [run] : [])),
        );
      });

      scheduled.set(agent.id, promise);
      return promise;
    };

    return Promise.all(agents.map(schedule));
  }

  /**
   * Dependencies outside this task that the same cycle fired elsewhere
   */
  private cycleUpstream(task: Task, agent: AgentDefinition, selected: ReadonlySet<string>): Promise<Upstream>[] {
    const cycleId = cycleOf(task);
    const slots = cycleId ? this.cycleSlots.get(cycleId) : undefined;
    if (!slots) return [];

    return agent.dependsOn
      .filter((id) => !selected.has(id))
      .flatMap((id) => {
        const slot = slots.get(id);
        return slot ? [slot.run.then((run): Upstream => ({ agentId: id, run }))] : [];
      });
  }

  private openCycleSlots(task: Task): void {
    const cycleId = cycleOf(task);
    if (!cycleId) return;

    let slots = this.cycleSlots.get(cycleId);
    if (!slots) {
      slots = new Map();
      this.cycleSlots.set(cycleId, slots);
    }
    // a later firing of the same agent in the cycle replaces the slot for new dependents
    const owned: CycleSlot[] = [];
    for (const agentId of new Set(task.targetAgentIds)) {
      let settle: (run: Run | undefined) => void = () => undefined;
      const run = new Promise<Run | undefined>((resolve) => {
        settle = resolve;
      });
      const slot: CycleSlot = { agentId, run, settle };
      slots.set(agentId, slot);
      owned.push(slot);
    }
    this.taskSlots.set(task.id, owned);
  }

  private settleCycleSlot(task: Task, run: Run): void {
    this.taskSlots
      .get(task.id)
      ?.find((slot) => slot.agentId === run.agentId)
      ?.settle(run);
  }

  /**
   * Settle the slots a task never filled, so dependents are skipped instead of waiting
   */
  private releaseCycleSlots(task: Task): void {
    for (const slot of this.taskSlots.get(task.id) ?? []) {
      slot.settle(undefined);
    }
    this.taskSlots.delete(task.id);
  }

  /**
   * Runs of one agent never overlap; the pool slot is taken only once the
   * agent's lock is held so a waiting agent does not block others.
   */
  private async runAgent(
    agent: AgentDefinition,
    task: Task,
    upstream: readonly Run[],
    remember = true,
  ): Promise<Run> {
    const run = await this.agentLocks.runExclusive(agent.id, () =>
      this.pool.run(taskRank(task), () => this.deps.runner.execute(agent, task, { upstream, remember })),
    );
    await this.recordRun(run, task);
    return run;
  }

  private async recordRun(run: Run, task: Task): Promise<void> {
    await this.writeLedger(task, 'record run', () => this.deps.ledger.recordRuns(task.id, [run]));
    this.settleCycleSlot(task, run);
    this.emit('run_finished', run, task);
  }

  /**
   * A failed ledger write is logged and the task carries on, so its outcome
   * is still delivered. Abandoned tasks are not written.
   */
  private async writeLedger(task: Task, action: string, write: () => Promise<void>): Promise<void> {
    if (this.abandoned.has(task.id)) return;
    try {
      await write();
    } catch (error) {
      logger.error({ error, taskId: task.id, action }, 'Run ledger write failed');
    }
  }

  private async complete(task: Task, runs: Run[], error: RunError | undefined): Promise<TaskOutcome> {
    const outcome: TaskOutcome = { task, runs, complete: isTaskComplete(runs), error, posted: false, followUps: [] };

    switch (task.origin.kind) {
      case 'human': {
        outcome.reply =
          error?.kind === 'RoutingAmbiguityError'
            ? formatClarification(this.deps.roster, error.message)
            : formatReply(runs, this.deps.roster);
        outcome.posted = await this.post(task.origin.channel, outcome.reply);
        break;
      }
      case 'schedule': {
        if (error) {
          logger.warn({ error }, 'Scheduled task could not be resolved');
        }
        if (task.origin.trigger === 'briefing') {
          const published = await this.publishBriefing(task, runs);
          outcome.briefing = published.briefing;
          outcome.posted = published.posted;
          this.cycleSlots.delete(published.briefing.cycleId);
        }
        outcome.followUps = this.spawnFollowUps(task, runs);
        break;
      }
      case 'agent':
        // follow-ups never spawn further follow-ups
        break;
    }

    return outcome;
  }

  private spawnFollowUps(parent: Task, runs: readonly Run[]): Task[] {
    const proposals: FollowUpProposal[] = [];
    for (const run of runs) {
      if (run.status !== 'succeeded' || !run.result) continue;
      const proposer = this.deps.roster.get(run.agentId);
      if (!proposer) continue;
      for (const directive of parseDispatchDirectives(run.result)) {
        proposals.push({ proposer, directive });
      }
    }

    const selected = selectFollowUps(proposals, this.deps.roster);
    if (selected.length > 0 && !this.accepting) {
      logger.warn({ proposed: selected.length }, 'Shutting down; follow-ups not spawned');
      return [];
    }

    const followUps = selected.map(({ proposer, directive }) =>
      createTask({
        origin: { kind: 'agent', agentId: proposer.id, parentTaskId: parent.id, cycleId: cycleIdOf(parent) },
        instruction: directive.task,
        targetAgentIds: [directive.agent_id],
        hints: { contextFromAgents: directive.context_from_agents ?? [proposer.id] },
        priority: directive.priority ?? 'medium',
        createdAt: this.now(),
      }),
    );

    for (const followUp of followUps) {
      logger.info(
        { followUpId: followUp.id, target: followUp.targetAgentIds[0], parentTaskId: parent.id },
        'Follow-up spawned',
      );
      this.emit('task_spawned', followUp, parent);
      this.enqueue(followUp);
    }
    return followUps;
  }

  private async publishBriefing(task: Task, runs: readonly Run[]): Promise<{ briefing: Briefing; posted: boolean }> {
    const cycleId = cycleIdOf(task) ?? 'unscheduled';
    const failures = (await this.unreportedFailures()).filter((failure) => failure.taskId !== task.id);
    const run = runs.find((r) => r.agentId === this.deps.roster.chiefOfStaffId);

    const text = composeBriefing(
      { cycleId, run, digest: task.payload.hints.additionalContext ?? '', failures },
      this.deps.roster,
    );
    const briefing: Briefing = {
      id: generateBriefingId(),
      cycleId,
      createdAt: this.now(),
      text,
      runIds: runs.map((r) => r.id),
      failures,
    };

    const posted = await this.post(this.deps.briefingChannel, text);
    try {
      await this.deps.memory.append(BRIEFING_AGENT_ID, {
        timestamp: briefing.createdAt,
        summary: condense(text),
        raw: text,
        taskId: task.id,
      });
    } catch (error) {
      logger.error({ error, briefingId: briefing.id }, 'Failed to store briefing in memory');
    }

    const ownFailures = runs.filter((r) => r.status === 'failed').map((r) => r.id);
    await this.writeLedger(task, 'mark reported', () =>
      this.deps.ledger.markReported([...failures.map((failure) => failure.runId), ...ownFailures], briefing.id),
    );

    logger.info({ briefingId: briefing.id, cycleId, failures: failures.length, posted }, 'Briefing published');
    return { briefing, posted };
  }

  /**
   * Failures not yet briefed. When the ledger cannot be read they stay
   * unreported and reach the next briefing.
   */
  private async unreportedFailures(): Promise<FailedRunSummary[]> {
    try {
      return await this.deps.ledger.unreportedFailures();
    } catch (error) {
      logger.error({ error }, 'Could not read unreported failures');
      return [];
    }
  }

  /**
   * Post to chat. A failed post is logged and reported on the outcome; the
   * task's runs are already recorded.
   */
  private async post(channel: string, text: string): Promise<boolean> {
    try {
      await this.deps.chat.post(channel, text);
      return true;
    } catch (error) {
      logger.error({ error, channel }, 'Failed to post to chat');
      return false;
    }
  }
}
