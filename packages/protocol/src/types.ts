import { customAlphabet } from 'nanoid';
import { z } from 'zod';

// ID prefixes
export const ID_PREFIXES = {
  task: 'task_',
  run: 'run_',
  memory: 'mem_',
  output: 'out_',
  briefing: 'brief_',
} as const;

// Reserved pseudo-agents
export const BRIEFING_AGENT_ID = '__briefing__';
export const ROUTER_AGENT_ID = 'router';

// Schedule classes
export const ScheduleClass = z.enum([
  'always_on',
  'daily',
  'weekly',
  'biweekly',
  'event_triggered',
]);

export type ScheduleClass = z.infer<typeof ScheduleClass>;

// Model tiers (cost/quality level, mapped to concrete models by configuration)
export const ModelTier = z.enum(['premium', 'standard', 'economy']);
export type ModelTier = z.infer<typeof ModelTier>;

export const TaskPriority = z.enum(['high', 'medium', 'low']);
export type TaskPriority = z.infer<typeof TaskPriority>;

export const RunStatus = z.enum(['pending', 'running', 'succeeded', 'failed', 'retrying']);
export type RunStatus = z.infer<typeof RunStatus>;

export const ErrorKind = z.enum([
  'TransientExternalError',
  'PermanentExternalError',
  'RoutingAmbiguityError',
  'DependencyUnmetError',
  'MemoryWriteError',
]);

export type ErrorKind = z.infer<typeof ErrorKind>;

/**
 * Which shared material an agent sees besides its own memory
 */
export interface AgentContextPolicy {
  sharedDocs: boolean;
  priorities: boolean;
  summariesFrom: string[] | 'all';
}

/**
 * A configured unit of specialised behaviour. Loaded once at startup.
 */
export interface AgentDefinition {
  id: string;
  name: string;
  /** Dotted path; more segments means narrower expertise */
  capabilityTag: string;
  scheduleClass: ScheduleClass;
  modelTier: ModelTier;
  systemPrompt: string;
  dependsOn: string[];
  dispatchable: boolean;
  defaultTask?: string;
  context: AgentContextPolicy;
}

export type TaskOrigin =
  | { kind: 'human'; channel: string; author: string; receivedAt: Date }
  | { kind: 'schedule'; trigger: 'cycle' | 'event' | 'briefing'; cycleId?: string }
  | { kind: 'agent'; agentId: string; parentTaskId: string; cycleId?: string };

export interface TaskHints {
  documentRefs?: readonly string[];
  contextFromAgents?: readonly string[];
  additionalContext?: string;
  modelTier?: ModelTier;
}

export interface TaskPayload {
  instruction: string;
  hints: TaskHints;
}

export interface Task {
  readonly id: string;
  readonly origin: Readonly<TaskOrigin>;
  readonly targetAgentIds: readonly string[];
  readonly payload: Readonly<TaskPayload>;
  readonly priority: TaskPriority;
  readonly createdAt: Date;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  cost: number;
}

export interface RunError {
  kind: ErrorKind;
  message: string;
  retryable: boolean;
}

export interface RunAttempt {
  attempt: number;
  startedAt: Date;
  finishedAt: Date;
  error?: RunError;
}

export interface Run {
  id: string;
  taskId: string;
  agentId: string;
  status: RunStatus;
  attemptCount: number;
  attempts: RunAttempt[];
  startedAt?: Date;
  finishedAt?: Date;
  result?: string;
  error?: RunError;
  usage: TokenUsage;
}

export interface MemoryEntry {
  id: string;
  agentId: string;
  timestamp: Date;
  summary: string;
  rawRef: string;
  taskId?: string;
  runId?: string;
}

export interface AgentSummary {
  agentId: string;
  text: string;
  /** Timestamp of the newest entry folded into `text` */
  compactedThrough: Date | null;
  updatedAt: Date;
}

export interface FailedRunSummary {
  runId: string;
  taskId: string;
  agentId: string;
  instruction: string;
  error: RunError;
  finishedAt?: Date;
}

export interface Briefing {
  id: string;
  cycleId: string;
  createdAt: Date;
  text: string;
  runIds: string[];
  failures: FailedRunSummary[];
}

/**
 * Inbound chat event as delivered by a transport
 */
export interface ChatEvent {
  channel: string;
  author: string;
  text: string;
  timestamp: Date;
}

export function emptyUsage(): TokenUsage {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0, cost: 0 };
}

export function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
    totalTokens: a.totalTokens + b.totalTokens,
    cost: a.cost + b.cost,
  };
}

export function isTerminalRunStatus(status: RunStatus): boolean {
  return status === 'succeeded' || status === 'failed';
}

/**
 * A task is complete iff every one of its runs is terminal.
 */
export function isTaskComplete(runs: readonly Pick<Run, 'status'>[]): boolean {
  return runs.every((run) => isTerminalRunStatus(run.status));
}

/**
 * Narrowness of a capability tag: `research.market` (2) is narrower than `orchestration` (1).
 */
export function capabilityDepth(tag: string): number {
  return tag.split('.').filter((segment) => segment.length > 0).length;
}

/**
 * Cycle a task belongs to, if any. Human requests never belong to a cycle.
 */
export function cycleIdOf(task: Pick<Task, 'origin'>): string | undefined {
  return task.origin.kind === 'human' ? undefined : task.origin.cycleId;
}

export interface CreateTaskInput {
  origin: TaskOrigin;
  instruction: string;
  targetAgentIds?: readonly string[];
  hints?: TaskHints;
  priority?: TaskPriority;
  createdAt?: Date;
}

export function createTask(input: CreateTaskInput): Task {
  const hints: TaskHints = { ...(input.hints ?? {}) };
  if (hints.documentRefs) hints.documentRefs = Object.freeze([...hints.documentRefs]);
  if (hints.contextFromAgents) hints.contextFromAgents = Object.freeze([...hints.contextFromAgents]);

  return Object.freeze({
    id: generateTaskId(),
    origin: Object.freeze({ ...input.origin }),
    targetAgentIds: Object.freeze([...(input.targetAgentIds ?? [])]),
    payload: Object.freeze({
      instruction: input.instruction,
      hints: Object.freeze(hints),
    }),
    priority: input.priority ?? (input.origin.kind === 'human' ? 'high' : 'medium'),
    createdAt: input.createdAt ?? new Date(),
  });
}

// ID generators
const idSuffix = customAlphabet('0123456789abcdefghijklmnopqrstuvwxyz', 16);

export function generateId(prefix: keyof typeof ID_PREFIXES): string {
  return `${ID_PREFIXES[prefix]}${idSuffix()}`;
}

export function generateTaskId(): string {
  return generateId('task');
}

export function generateRunId(): string {
  return generateId('run');
}

export function generateMemoryId(): string {
  return generateId('memory');
}

export function generateOutputId(): string {
  return generateId('output');
}

export function generateBriefingId(): string {
  return generateId('briefing');
}
