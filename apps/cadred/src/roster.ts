import { readFile, readdir } from 'fs/promises';
import path from 'path';

import { parse } from 'yaml';

import type { AgentConfigV1, AgentDefinition } from '@cadre/protocol';
import { RosterConfigV1 } from '@cadre/protocol';
import { AgentRoster } from '@cadre/core';
import type { ModelTable, SharedContext } from '@cadre/agents';

import { logger } from './logger.js';

export interface LoadedRoster {
  roster: AgentRoster;
  models: ModelTable;
  /** Chat channel name to the agent that owns it */
  channelRoutes: Record<string, string>;
}

export function toAgentDefinition(agent: AgentConfigV1): AgentDefinition {
  return {
    id: agent.id,
    name: agent.name,
    capabilityTag: agent.capability_tag,
    scheduleClass: agent.schedule,
    modelTier: agent.model_tier,
    systemPrompt: agent.system_prompt.trim(),
    dependsOn: agent.depends_on,
    dispatchable: agent.dispatchable,
    defaultTask: agent.default_task?.trim(),
    context: {
      sharedDocs: agent.context.shared_docs,
      priorities: agent.context.priorities,
      summariesFrom: agent.context.summaries_from,
    },
  };
}

/**
 * Validate a parsed roster document and build the roster from it
 */
export function buildRoster(document: unknown): LoadedRoster {
  const config = RosterConfigV1.parse(document);
  const roster = new AgentRoster(config.agents.map(toAgentDefinition), config.chief_of_staff);

  for (const [channel, agentId] of Object.entries(config.channels.routes)) {
    if (!roster.has(agentId)) {
      throw new Error(`Channel ${channel} routes to unknown agent ${agentId}`);
    }
  }

  return { roster, models: config.model_tiers, channelRoutes: config.channels.routes };
}

/**
 * Load the roster from YAML. Read once at startup.
 */
export async function loadRoster(configPath: string): Promise<LoadedRoster> {
  try {
    const content = await readFile(configPath, 'utf-8');
    const loaded = buildRoster(parse(content));
    logger.info({ agents: loaded.roster.list().length, configPath }, 'Roster loaded');
    return loaded;
  } catch (error) {
    logger.error({ error, configPath }, 'Failed to load roster config');
    throw error;
  }
}

/**
 * Shared docs are every markdown file in the context directory except
 * priorities.md, which is kept apart. A missing directory means no shared context.
 */
export async function loadSharedContext(contextDir: string): Promise<SharedContext> {
  let files: string[];
  try {
    files = (await readdir(contextDir)).filter((file) => file.endsWith('.md')).sort();
  } catch (error) {
    logger.warn({ error, contextDir }, 'No shared context directory');
    return {};
  }

  const docs: string[] = [];
  let priorities: string | undefined;

  for (const file of files) {
    const content = (await readFile(path.join(contextDir, file), 'utf-8')).trim();
    if (!content) continue;
    if (file === 'priorities.md') {
      priorities = content;
    } else {
      docs.push(content);
    }
  }

  return { docs: docs.length > 0 ? docs.join('\n\n') : undefined, priorities };
}
