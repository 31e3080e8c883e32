import { z } from 'zod';

import { ModelTier, ScheduleClass, TaskPriority } from './types.js';

/**
 * Roster configuration (config/agents.yaml)
 *
 * Read once at startup; changes require a restart.
 */

const capabilityTag = z
  .string()
  .regex(/^[a-z][a-z0-9_]*(\.[a-z][a-z0-9_]*)*$/, 'capability tags are dotted lowercase paths');

export const AgentConfigV1 = z.object({
  id: z.string().regex(/^[a-z][a-z0-9_]*$/),
  name: z.string(),
  capability_tag: capabilityTag,
  schedule: ScheduleClass,
  model_tier: ModelTier.default('standard'),
  system_prompt: z.string().min(1),
  depends_on: z.array(z.string()).default([]),
  dispatchable: z.boolean().default(true),
  default_task: z.string().optional(),
  context: z
    .object({
      shared_docs: z.boolean().default(false),
      priorities: z.boolean().default(false),
      summaries_from: z.union([z.literal('all'), z.array(z.string())]).default([]),
    })
    .default({}),
});

export type AgentConfigV1 = z.infer<typeof AgentConfigV1>;

export const RosterConfigV1 = z.object({
  chief_of_staff: z.string(),
  model_tiers: z.object({
    premium: z.string(),
    standard: z.string(),
    economy: z.string(),
  }),
  channels: z
    .object({
      routes: z.record(z.string()).default({}),
    })
    .default({}),
  agents: z.array(AgentConfigV1).min(1),
});

export type RosterConfigV1 = z.infer<typeof RosterConfigV1>;

/**
 * Follow-up directive an agent may emit in a ```dispatch fenced block
 */
export const DispatchDirectiveV1 = z.object({
  agent_id: z.string(),
  task: z.string().min(1),
  priority: TaskPriority.optional(),
  context_from_agents: z.array(z.string()).optional(),
});

export type DispatchDirectiveV1 = z.infer<typeof DispatchDirectiveV1>;

export const DispatchBlockV1 = z.union([
  z.array(DispatchDirectiveV1),
  DispatchDirectiveV1.transform((directive) => [directive]),
]);

/**
 * Reply expected from the routing run
 */
export const RoutingReplyV1 = z.union([
  z.array(z.string()),
  z.object({ agents: z.array(z.string()) }).transform((reply) => reply.agents),
]);

export type RoutingReplyV1 = z.infer<typeof RoutingReplyV1>;
