import { setTimeout as delay } from 'timers/promises';

import pino from 'pino';

import type { AgentDefinition, Run, RunError, Task } from '@cadre/protocol';
import {
  DependencyUnmetError,
  MemoryWriteError,
  TransientExternalError,
  addUsage,
  emptyUsage,
  generateRunId,
  toRunError,
} from '@cadre/protocol';
import { condense, type MemoryManager } from '@cadre/core';

import type { ModelTable, ReasoningClient, ReasoningResult } from '../types.js';
import type { ContextAssembler } from './context.js';

export interface RunnerDeps {
  client: ReasoningClient;
  memory: MemoryManager;
  context: ContextAssembler;
  models: ModelTable;
}

export interface RunnerOptions {
  /** Attempts per run including the first, default 3 */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface ExecuteOptions {
  /** Terminal runs of upstream agents the run depends on */
  upstream?: readonly Run[];
  /** Write a memory entry on success, default true */
  remember?: boolean;
}

type AttemptOutcome = { ok: true; response: ReasoningResult } | { ok: false; error: unknown };

/**
 * Runner
 *
 * Executes one agent against one task: assembles context, calls the reasoning
 * service with bounded exponential backoff on transient errors, and writes one
 * memory entry before reporting success. Always returns a terminal run.
 */
export class Runner {
  private logger = pino({ name: 'runner', level: process.env.LOG_LEVEL ?? 'info' });
  private maxAttempts: number;
  private baseDelayMs: number;
  private maxDelayMs: number;
  private sleep: (ms: number) => Promise<void>;
  private now: () => Date;

  constructor(
    private deps: RunnerDeps,
    options: RunnerOptions = {},
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.maxDelayMs = options.maxDelayMs ?? 30_000;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Delay before attempt `failedAttempt + 1`: base * 2^(n-1), capped, and never
   * shorter than a server-supplied Retry-After (which is also capped).
   */
  backoffMs(failedAttempt: number, error?: unknown): number {
    const exponential = Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** (failedAttempt - 1));
    if (error instanceof TransientExternalError && error.retryAfterMs !== undefined) {
      return Math.min(this.maxDelayMs, Math.max(exponential, error.retryAfterMs));
    }
    return exponential;
  }

  async execute(agent: AgentDefinition, task: Task, options: ExecuteOptions = {}): Promise<Run> {
    const run: Run = {
      id: generateRunId(),
      taskId: task.id,
      agentId: agent.id,
      status: 'running',
      attemptCount: 0,
      attempts: [],
      startedAt: this.now(),
      usage: emptyUsage(),
    };
    const log = this.logger.child({ runId: run.id, taskId: task.id, agentId: agent.id });
    const model = this.deps.models[task.payload.hints.modelTier ?? agent.modelTier];

    while (run.attemptCount < this.maxAttempts) {
      run.attemptCount++;
      const startedAt = this.now();
      const outcome = await this.attempt(agent, task, model, options.upstream ?? []);

      if (outcome.ok) {
        run.usage = addUsage(run.usage, outcome.response.usage);
        run.attempts.push({ attempt: run.attemptCount, startedAt, finishedAt: this.now() });
        return this.persist(agent, task, run, outcome.response.text, options.remember !== false);
      }

      const error = toRunError(outcome.error);
      run.attempts.push({ attempt: run.attemptCount, startedAt, finishedAt: this.now(), error });
      run.error = error;

      if (!error.retryable || run.attemptCount >= this.maxAttempts) {
        log.warn({ attempt: run.attemptCount, error }, 'Run failed');
        break;
      }

      const waitMs = this.backoffMs(run.attemptCount, outcome.error);
      run.status = 'retrying';
      log.info({ attempt: run.attemptCount, waitMs, error: error.message }, 'Transient failure, retrying');
      await this.sleep(waitMs);
      run.status = 'running';
    }

    return this.fail(run, run.error ?? toRunError(new Error('Run ended without an attempt')));
  }

  /**
   * Terminal run for an agent whose upstream dependencies did not succeed.
   * No reasoning call is made.
   */
  skip(agent: AgentDefinition, task: Task, upstreamAgentIds: string[]): Run {
    const now = this.now();
    const error = new DependencyUnmetError(agent.id, upstreamAgentIds).toRunError();
    this.logger.info({ taskId: task.id, agentId: agent.id, upstreamAgentIds }, 'Run skipped');
    return {
      id: generateRunId(),
      taskId: task.id,
      agentId: agent.id,
      status: 'failed',
      attemptCount: 0,
      attempts: [],
      startedAt: now,
      finishedAt: now,
      error,
      usage: emptyUsage(),
    };
  }

  private async attempt(
    agent: AgentDefinition,
    task: Task,
    model: string,
    upstream: readonly Run[],
  ): Promise<AttemptOutcome> {
    try {
      const { system, prompt } = await this.deps.context.assemble(agent, task, upstream);
      const response = await this.deps.client.invoke({ agentId: agent.id, model, system, prompt });
      return { ok: true, response };
    } catch (error) {
      return { ok: false, error };
    }
  }

  private async persist(agent: AgentDefinition, task: Task, run: Run, text: string, remember: boolean): Promise<Run> {
    const finishedAt = this.now();
    run.result = text;

    if (remember) {
      try {
        await this.deps.memory.append(agent.id, {
          timestamp: finishedAt,
          summary: condense(text),
          raw: text,
          taskId: task.id,
          runId: run.id,
        });
      } catch (error) {
        const writeError = new MemoryWriteError(
          `Memory write failed: ${error instanceof Error ? error.message : String(error)}`,
          { cause: error },
        );
        this.logger.error({ runId: run.id, agentId: agent.id, error: writeError.message }, 'Memory write failed');
        return this.fail(run, writeError.toRunError());
      }
    }

    run.status = 'succeeded';
    run.finishedAt = finishedAt;
    this.logger.info(
      { runId: run.id, taskId: task.id, agentId: agent.id, attempts: run.attemptCount, tokens: run.usage.totalTokens },
      'Run succeeded',
    );
    return run;
  }

  private fail(run: Run, error: RunError): Run {
    run.status = 'failed';
    run.error = error;
    run.finishedAt = this.now();
    return run;
  }
}
