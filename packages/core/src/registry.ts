import type { AgentDefinition } from '@cadre/protocol';
import { capabilityDepth } from '@cadre/protocol';

export class RosterValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RosterValidationError';
  }
}

const TIMED_SCHEDULES = new Set(['daily', 'weekly', 'biweekly']);

/**
 * Agent Roster
 *
 * Read-only set of agent definitions, validated once at construction:
 * unique ids, known dependencies, no dependency cycles, and a chief of staff present.
 */
export class AgentRoster {
  private agents: Map<string, AgentDefinition> = new Map();

  constructor(
    definitions: readonly AgentDefinition[],
    readonly chiefOfStaffId: string,
  ) {
    for (const definition of definitions) {
      if (this.agents.has(definition.id)) {
        throw new RosterValidationError(`Duplicate agent id: ${definition.id}`);
      }
      this.agents.set(definition.id, definition);
    }

    for (const definition of definitions) {
      for (const dep of definition.dependsOn) {
        if (!this.agents.has(dep)) {
          throw new RosterValidationError(`Agent ${definition.id} depends on unknown agent ${dep}`);
        }
      }
    }

    if (!this.agents.has(chiefOfStaffId)) {
      throw new RosterValidationError(`Chief of staff ${chiefOfStaffId} is not on the roster`);
    }

    this.assertAcyclic();
  }

  get(agentId: string): AgentDefinition | undefined {
    return this.agents.get(agentId);
  }

  has(agentId: string): boolean {
    return this.agents.has(agentId);
  }

  /**
   * Get an agent or throw
   */
  require(agentId: string): AgentDefinition {
    const agent = this.agents.get(agentId);
    if (!agent) {
      throw new Error(`Agent not found: ${agentId}`);
    }
    return agent;
  }

  list(): AgentDefinition[] {
    return Array.from(this.agents.values()).sort((a, b) => a.id.localeCompare(b.id));
  }

  /**
   * Agents a human request or a follow-up directive may target
   */
  dispatchable(): AgentDefinition[] {
    return this.list().filter((agent) => agent.dispatchable);
  }

  /**
   * Agents the scheduler fires on a clock
   */
  scheduled(): AgentDefinition[] {
    return this.list().filter((agent) => TIMED_SCHEDULES.has(agent.scheduleClass));
  }

  get chiefOfStaff(): AgentDefinition {
    return this.require(this.chiefOfStaffId);
  }

  /**
   * Direct dependencies of `agentId` that are also part of `selected`.
   * Dependencies outside the selection are not waited on.
   */
  upstreamWithin(agentId: string, selected: ReadonlySet<string>): string[] {
    return this.require(agentId).dependsOn.filter((dep) => selected.has(dep));
  }

  /**
   * The given agents with every dependency ahead of its dependents.
   * Otherwise keeps the input order.
   */
  inDependencyOrder(agents: readonly AgentDefinition[]): AgentDefinition[] {
    const included = new Set(agents.map((agent) => agent.id));
    const placed = new Set<string>();
    const ordered: AgentDefinition[] = [];

    const place = (agent: AgentDefinition): void => {
      if (placed.has(agent.id)) return;
      placed.add(agent.id);
      for (const dep of agent.dependsOn) {
        if (included.has(dep)) place(this.require(dep));
      }
      ordered.push(agent);
    };

    agents.forEach(place);
    return ordered;
  }

  /**
   * Order agents so that narrower capability tags come first, ties by id.
   */
  compareSpecificity(a: AgentDefinition, b: AgentDefinition): number {
    const depth = capabilityDepth(b.capabilityTag) - capabilityDepth(a.capabilityTag);
    return depth !== 0 ? depth : a.id.localeCompare(b.id);
  }

  private assertAcyclic(): void {
    const state = new Map<string, 'visiting' | 'done'>();

    const visit = (agentId: string, path: string[]): void => {
      const current = state.get(agentId);
      if (current === 'done') return;
      if (current === 'visiting') {
        throw new RosterValidationError(`Dependency cycle: ${[...path, agentId].join(' -> ')}`);
      }

      state.set(agentId, 'visiting');
      for (const dep of this.require(agentId).dependsOn) {
        visit(dep, [...path, agentId]);
      }
      state.set(agentId, 'done');
    };

    for (const agentId of this.agents.keys()) {
      visit(agentId, []);
    }
  }
}
