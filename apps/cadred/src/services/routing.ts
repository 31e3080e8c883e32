import type { AgentDefinition } from '@cadre/protocol';
import { ROUTER_AGENT_ID, RoutingReplyV1 } from '@cadre/protocol';
import type { AgentRoster } from '@cadre/core';

import { logger } from '../logger.js';

/**
 * Pseudo-agent whose run picks the targets of an unaddressed human request.
 * Its runs go through the Runner like any other and are part of the task.
 */
export function buildRouterAgent(roster: AgentRoster): AgentDefinition {
  const lines = roster
    .dispatchable()
    .map((agent) => `- ${agent.id} (${agent.capabilityTag}): ${agent.name}`);

  return {
    id: ROUTER_AGENT_ID,
    name: 'Router',
    capabilityTag: 'routing',
    scheduleClass: 'event_triggered',
    modelTier: 'economy',
    dependsOn: [],
    dispatchable: false,
    context: { sharedDocs: false, priorities: false, summariesFrom: [] },
    systemPrompt: [
      'You route requests to the specialist agents best suited to handle them.',
      'Available agents:',
      ...lines,
      '',
      'Reply with a JSON array of agent ids, most relevant first, e.g. ["market_research"].',
      'Reply with [] if no agent fits.',
    ].join('\n'),
  };
}

function extractJson(text: string): string | null {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(text);
  if (fenced?.[1]) return fenced[1].trim();

  const arrayStart = text.indexOf('[');
  const arrayEnd = text.lastIndexOf(']');
  if (arrayStart !== -1 && arrayEnd > arrayStart) return text.slice(arrayStart, arrayEnd + 1);

  const objectStart = text.indexOf('{');
  const objectEnd = text.lastIndexOf('}');
  if (objectStart !== -1 && objectEnd > objectStart) return text.slice(objectStart, objectEnd + 1);

  return null;
}

/**
 * Agent ids selected by a routing reply, in reply order. Unknown and
 * non-dispatchable ids are dropped; an unreadable reply selects nothing.
 */
export function parseRoutingReply(text: string, roster: AgentRoster): string[] {
  const json = extractJson(text);
  if (!json) return [];

  let candidate: unknown;
  try {
    candidate = JSON.parse(json);
  } catch (error) {
    logger.warn({ error, reply: text.slice(0, 200) }, 'Routing reply is not valid JSON');
    return [];
  }

  const parsed = RoutingReplyV1.safeParse(candidate);
  if (!parsed.success) {
    logger.warn({ reply: text.slice(0, 200) }, 'Routing reply has an unexpected shape');
    return [];
  }

  const selected: string[] = [];
  for (const id of parsed.data) {
    if (selected.includes(id)) continue;
    if (!roster.get(id)?.dispatchable) {
      logger.warn({ agentId: id }, 'Routing selected an agent that cannot be dispatched');
      continue;
    }
    selected.push(id);
  }
  return selected;
}
