/**
 * Scheduler
 *
 * Fires time-triggered agents from a persistent next-fire table, opens one
 * cycle per day, and hands the chief of staff a briefing task once every task
 * of an opened cycle (follow-ups included) is complete.
 */

import { EventEmitter } from 'events';

import cron, { type ScheduledTask } from 'node-cron';

import type { AgentDefinition, Task, TaskHints, TaskPriority } from '@cadre/protocol';
import { createTask, cycleIdOf } from '@cadre/protocol';
import type { AgentRoster, MemoryManager, RunLedger, ScheduleEntry, ScheduleSettings, ScheduleStore } from '@cadre/core';
import { CYCLE_KEY, advanceFire, cycleIdFor, firstFireAtOrAfter, isDue, isTimedSchedule } from '@cadre/core';

import { createChildLogger } from '../logger.js';
import { briefingInstruction, cycleDigest } from './completion.js';
import type { Dispatcher, TaskOutcome } from './dispatcher.js';

const log = createChildLogger({ component: 'scheduler' });

const DEFAULT_INSTRUCTION = 'Perform your scheduled review and report key findings, risks and recommended actions.';

export interface SchedulerDeps {
  roster: AgentRoster;
  dispatcher: Dispatcher;
  store: ScheduleStore;
  ledger: RunLedger;
  memory: MemoryManager;
  now?: () => Date;
}

export interface SchedulerOptions {
  settings: ScheduleSettings;
  tickCron?: string;
  timezone?: string;
}

export interface TickOptions {
  /** Fire every timed agent and open the cycle regardless of next-fire times */
  force?: boolean;
}

export interface TriggerPayload {
  instruction?: string;
  hints?: TaskHints;
  priority?: TaskPriority;
}

interface CycleState {
  opened: boolean;
  briefed: boolean;
  pending: Set<string>;
}

export class Scheduler extends EventEmitter {
  private cycles: Map<string, CycleState> = new Map();
  private job: ScheduledTask | null = null;
  private ticking = false;
  private now: () => Date;

  constructor(
    private deps: SchedulerDeps,
    private options: SchedulerOptions,
  ) {
    super();
    this.now = deps.now ?? (() => new Date());
    deps.dispatcher.on('task_spawned', (task: Task) => this.onTaskSpawned(task));
    deps.dispatcher.on('task_complete', (outcome: TaskOutcome) => this.onTaskComplete(outcome));
  }

  /**
   * Cycles still waiting on work or on their briefing
   */
  openCycles(): string[] {
    return Array.from(this.cycles.keys());
  }

  /**
   * Make sure every timed agent has a schedule entry. Safe to call on every start.
   */
  async init(now: Date = this.now()): Promise<void> {
    const table = this.reconcile(await this.deps.store.load(), now);
    await this.deps.store.save(Array.from(table.values()));
    log.info({ entries: table.size }, 'Schedule table ready');
  }

  start(): void {
    if (this.job) return;
    const expression = this.options.tickCron ?? '*/5 * * * *';
    if (!cron.validate(expression)) {
      throw new Error(`Invalid scheduler tick expression: ${expression}`);
    }

    this.job = cron.schedule(
      expression,
      () => {
        this.tick().catch((error: unknown) => log.error({ error }, 'Scheduler tick failed'));
      },
      { timezone: this.options.timezone },
    );
    log.info({ expression }, 'Scheduler started');
  }

  stop(): void {
    this.job?.stop();
    this.job = null;
  }

  /**
   * One scheduling pass. Returns the tasks it queued.
   *
   * A table that cannot be read is retried on the next tick; a table that
   * cannot be written means nothing fires, so no fire is lost or doubled.
   */
  async tick(now: Date = this.now(), options: TickOptions = {}): Promise<Task[]> {
    if (this.ticking) {
      log.warn('Previous tick still running; skipping');
      return [];
    }

    this.ticking = true;
    try {
      return await this.runTick(now, options);
    } finally {
      this.ticking = false;
    }
  }

  /**
   * Queue a task for an event-triggered agent
   */
  trigger(agentId: string, payload: TriggerPayload = {}): Task {
    const agent = this.deps.roster.get(agentId);
    if (!agent) {
      throw new Error(`Agent not found: ${agentId}`);
    }
    if (agent.scheduleClass !== 'event_triggered') {
      throw new Error(`Agent ${agentId} is ${agent.scheduleClass}, not event_triggered`);
    }

    const task = createTask({
      origin: { kind: 'schedule', trigger: 'event' },
      instruction: payload.instruction ?? this.instructionFor(agent),
      targetAgentIds: [agent.id],
      hints: payload.hints,
      priority: payload.priority ?? 'medium',
      createdAt: this.now(),
    });

    log.info({ agentId, taskId: task.id }, 'Event trigger fired');
    this.deps.dispatcher.enqueue(task);
    return task;
  }

  /**
   * Persist the current next-fire table
   */
  async flush(): Promise<void> {
    const table = this.reconcile(await this.deps.store.load(), this.now());
    await this.deps.store.save(Array.from(table.values()));
  }

  private async runTick(now: Date, options: TickOptions): Promise<Task[]> {
    let stored: ScheduleEntry[];
    try {
      stored = await this.deps.store.load();
    } catch (error) {
      log.error({ error }, 'Could not read schedule table; retrying next tick');
      return [];
    }

    const table = this.reconcile(stored, now);
    const cycleId = cycleIdFor(now);
    const due = (entry: ScheduleEntry) => options.force === true || isDue(entry, now);

    let opensCycle = false;
    const cycleEntry = table.get(CYCLE_KEY);
    if (cycleEntry && due(cycleEntry)) {
      opensCycle = true;
      this.fire(cycleEntry, now);
    }

    // upstream agents are queued first so a dependent never holds a slot its upstream needs
    const tasks: Task[] = [];
    for (const agent of this.deps.roster.inDependencyOrder(this.deps.roster.scheduled())) {
      const entry = table.get(agent.id);
      if (!entry || !due(entry)) continue;
      this.fire(entry, now);
      tasks.push(
        createTask({
          origin: { kind: 'schedule', trigger: 'cycle', cycleId },
          instruction: this.instructionFor(agent),
          targetAgentIds: [agent.id],
          priority: 'medium',
          createdAt: now,
        }),
      );
    }

    if (!opensCycle && tasks.length === 0) return [];

    try {
      await this.deps.store.save(Array.from(table.values()));
    } catch (error) {
      log.error({ error }, 'Could not write schedule table; nothing fired this tick');
      return [];
    }

    const cycle = this.cycleFor(cycleId);
    if (opensCycle) {
      cycle.opened = true;
      log.info({ cycleId, tasks: tasks.length }, 'Cycle opened');
    }
    for (const task of tasks) {
      if (!cycle.briefed) cycle.pending.add(task.id);
      this.deps.dispatcher.enqueue(task);
    }

    this.maybeBrief(cycleId);
    return tasks;
  }

  /**
   * Table keyed by entry key, with entries added for timed agents that have none
   * and entries for agents no longer on the roster left out.
   */
  private reconcile(stored: readonly ScheduleEntry[], now: Date): Map<string, ScheduleEntry> {
    const byKey = new Map(stored.map((entry) => [entry.key, entry] as const));
    const table = new Map<string, ScheduleEntry>();

    table.set(
      CYCLE_KEY,
      byKey.get(CYCLE_KEY) ?? {
        key: CYCLE_KEY,
        scheduleClass: 'daily',
        nextFireAt: firstFireAtOrAfter('daily', now, this.options.settings),
        lastFiredAt: null,
      },
    );

    for (const agent of this.deps.roster.scheduled()) {
      if (!isTimedSchedule(agent.scheduleClass)) continue;
      const existing = byKey.get(agent.id);
      if (existing && existing.scheduleClass === agent.scheduleClass) {
        table.set(agent.id, existing);
        continue;
      }
      table.set(agent.id, {
        key: agent.id,
        scheduleClass: agent.scheduleClass,
        nextFireAt: firstFireAtOrAfter(agent.scheduleClass, now, this.options.settings),
        lastFiredAt: existing?.lastFiredAt ?? null,
      });
    }

    return table;
  }

  private fire(entry: ScheduleEntry, now: Date): void {
    entry.lastFiredAt = now;
    entry.nextFireAt = advanceFire(entry.nextFireAt, entry.scheduleClass, now);
  }

  private instructionFor(agent: AgentDefinition): string {
    return agent.defaultTask ?? DEFAULT_INSTRUCTION;
  }

  private cycleFor(cycleId: string): CycleState {
    let cycle = this.cycles.get(cycleId);
    if (!cycle) {
      cycle = { opened: false, briefed: false, pending: new Set() };
      this.cycles.set(cycleId, cycle);
    }
    return cycle;
  }

  private onTaskSpawned(task: Task): void {
    const cycleId = cycleIdOf(task);
    const cycle = cycleId ? this.cycles.get(cycleId) : undefined;
    if (cycle && !cycle.briefed) {
      cycle.pending.add(task.id);
    }
  }

  private onTaskComplete(outcome: TaskOutcome): void {
    const { task } = outcome;
    const cycleId = cycleIdOf(task);
    if (!cycleId) return;

    if (task.origin.kind === 'schedule' && task.origin.trigger === 'briefing') {
      this.cycles.delete(cycleId);
      this.deps.memory
        .compactAll()
        .then((results) => {
          const failed = results.filter((result) => result.status === 'failed');
          log.info({ cycleId, agents: results.length, failed: failed.length }, 'Memory compacted after briefing');
          this.emit('compacted', cycleId, results);
        })
        .catch((error: unknown) => log.error({ error, cycleId }, 'Memory compaction failed'));
      return;
    }

    const cycle = this.cycles.get(cycleId);
    if (!cycle?.pending.delete(task.id)) return;
    this.maybeBrief(cycleId);
  }

  private maybeBrief(cycleId: string): void {
    const cycle = this.cycles.get(cycleId);
    if (!cycle || !cycle.opened || cycle.briefed || cycle.pending.size > 0) return;

    cycle.briefed = true;
    this.emitBriefing(cycleId).catch((error: unknown) => {
      log.error({ error, cycleId }, 'Could not queue briefing');
    });
  }

  private async emitBriefing(cycleId: string): Promise<Task> {
    const digest = cycleDigest(
      await this.deps.ledger.runsForCycle(cycleId),
      await this.deps.ledger.unreportedFailures(),
      this.deps.roster,
    );
    const task = createTask({
      origin: { kind: 'schedule', trigger: 'briefing', cycleId },
      instruction: briefingInstruction(cycleId),
      targetAgentIds: [this.deps.roster.chiefOfStaffId],
      hints: { additionalContext: digest },
      priority: 'high',
      createdAt: this.now(),
    });

    log.info({ cycleId, taskId: task.id }, 'Briefing queued');
    this.deps.dispatcher.enqueue(task);
    this.emit('briefing_queued', task);
    return task;
  }
}
