/**
 * Orchestrator state
 *
 * Composition root for one process: wires memory, runner, dispatcher,
 * scheduler and chat listener, and owns startup and graceful shutdown.
 */

import type { Run, Task } from '@cadre/protocol';
import { TransientExternalError, emptyUsage, generateRunId } from '@cadre/protocol';
import type { AgentRoster, MemoryStore, RunLedger, ScheduleStore, Summarizer } from '@cadre/core';
import { MemoryManager } from '@cadre/core';
import type { DocumentStore, ReasoningClient, SharedContext } from '@cadre/agents';
import { ContextAssembler, ReasoningSummarizer, Runner } from '@cadre/agents';

import type { AppConfig } from '../config.js';
import { logger } from '../logger.js';
import type { LoadedRoster } from '../roster.js';
import type { ChatTransport } from '../transports/types.js';
import { ChatListener } from './chat-listener.js';
import { Dispatcher } from './dispatcher.js';
import { Scheduler } from './scheduler.js';

export type OrchestratorSettings = Pick<AppConfig, 'schedule' | 'limits' | 'retry' | 'memory' | 'chat' | 'timezone'>;

export interface OrchestratorDeps {
  loaded: LoadedRoster;
  settings: OrchestratorSettings;
  memoryStore: MemoryStore;
  ledger: RunLedger;
  scheduleStore: ScheduleStore;
  client: ReasoningClient;
  transport: ChatTransport;
  documents?: DocumentStore;
  shared?: SharedContext;
  /** Defaults to a summarizer on the economy model tier */
  summarizer?: Summarizer;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface InitOptions {
  /** Start the cron-driven scheduler, default true */
  schedule?: boolean;
  /** Start listening on the chat transport, default true */
  listen?: boolean;
}

export interface TeardownReport {
  drained: boolean;
  interrupted: string[];
}

export class OrchestratorState {
  readonly roster: AgentRoster;
  readonly memory: MemoryManager;
  readonly runner: Runner;
  readonly dispatcher: Dispatcher;
  readonly scheduler: Scheduler;
  readonly chat: ChatListener;
  private now: () => Date;

  constructor(private deps: OrchestratorDeps) {
    const { loaded, settings } = deps;
    this.roster = loaded.roster;
    this.now = deps.now ?? (() => new Date());

    this.memory = new MemoryManager(deps.memoryStore, {
      retainEntries: settings.memory.retainEntries,
      summarizer:
        deps.summarizer ??
        new ReasoningSummarizer(deps.client, loaded.models.economy, settings.memory.summaryMaxChars),
      now: this.now,
    });

    const context = new ContextAssembler({
      memory: this.memory,
      roster: loaded.roster,
      documents: deps.documents,
      shared: deps.shared,
      memoryBudgetChars: settings.memory.contextBudgetChars,
    });

    this.runner = new Runner(
      { client: deps.client, memory: this.memory, context, models: loaded.models },
      { ...settings.retry, sleep: deps.sleep, now: this.now },
    );

    this.dispatcher = new Dispatcher(
      {
        roster: loaded.roster,
        runner: this.runner,
        ledger: deps.ledger,
        memory: this.memory,
        chat: deps.transport,
        briefingChannel: settings.chat.briefingChannel,
        now: this.now,
      },
      {
        maxConcurrentRuns: settings.limits.maxConcurrentRuns,
        maxActiveTasks: settings.limits.maxActiveTasks,
      },
    );

    this.scheduler = new Scheduler(
      {
        roster: loaded.roster,
        dispatcher: this.dispatcher,
        store: deps.scheduleStore,
        ledger: deps.ledger,
        memory: this.memory,
        now: this.now,
      },
      {
        settings: settings.schedule,
        tickCron: settings.schedule.tickCron,
        timezone: settings.timezone,
      },
    );

    this.chat = new ChatListener(loaded.roster, this.dispatcher, {
      requestChannel: settings.chat.requestChannel,
      channelRoutes: loaded.channelRoutes,
    });
  }

  async init(options: InitOptions = {}): Promise<void> {
    await this.scheduler.init(this.now());

    if (options.listen !== false) {
      await this.deps.transport.start((event) => {
        try {
          this.chat.handle(event);
        } catch (error) {
          logger.error({ error, channel: event.channel }, 'Could not accept chat message');
        }
      });
    }

    if (options.schedule !== false) {
      this.scheduler.start();
    }

    logger.info({ agents: this.deps.loaded.roster.list().length }, 'Orchestrator started');
  }

  /**
   * Stop the scheduler and transport, give active tasks the grace period to
   * finish, then record whatever is left as interrupted and flush the schedule.
   */
  async teardown(): Promise<TeardownReport> {
    this.scheduler.stop();
    await this.deps.transport.stop();

    const queued = this.dispatcher.stop();
    const drained = await this.waitForDrain(this.deps.settings.limits.shutdownGraceMs);
    const running = drained ? [] : this.dispatcher.activeTasks();
    this.dispatcher.abandon(running.map((task) => task.id));
    const interrupted = [...queued, ...running];

    for (const task of interrupted) {
      await this.recordInterrupted(task);
    }

    await this.scheduler.flush();
    logger.info(
      { drained, interrupted: interrupted.length, openCycles: this.scheduler.openCycles() },
      'Orchestrator stopped',
    );
    return { drained, interrupted: interrupted.map((task) => task.id) };
  }

  private waitForDrain(graceMs: number): Promise<boolean> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => resolve(false), graceMs);
      void this.dispatcher.drain().then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  /**
   * Targets without a terminal run get a failed run so the next briefing reports them
   */
  private async recordInterrupted(task: Task): Promise<void> {
    const { ledger } = this.deps;
    await ledger.recordTask(task);

    const record = await ledger.getTask(task.id);
    const finished = new Set(record?.runs.map((run) => run.agentId) ?? []);
    const now = this.now();
    const error = new TransientExternalError('interrupted by shutdown').toRunError();

    const runs: Run[] = task.targetAgentIds
      .filter((agentId) => !finished.has(agentId))
      .map((agentId): Run => ({
        id: generateRunId(),
        taskId: task.id,
        agentId,
        status: 'failed',
        attemptCount: 0,
        attempts: [],
        startedAt: now,
        finishedAt: now,
        error,
        usage: emptyUsage(),
      }));

    if (runs.length > 0) {
      await ledger.recordRuns(task.id, runs);
    }
    await ledger.completeTask(task.id, 'interrupted', now);
    logger.warn({ taskId: task.id, runs: runs.length }, 'Task interrupted by shutdown');
  }
}
