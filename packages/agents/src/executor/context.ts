import type { AgentDefinition, Run, Task } from '@cadre/protocol';
import { PermanentExternalError } from '@cadre/protocol';
import type { AgentRoster, MemoryManager } from '@cadre/core';

import type { DocumentStore, SharedContext } from '../types.js';

export interface ContextAssemblerOptions {
  memory: MemoryManager;
  roster: AgentRoster;
  documents?: DocumentStore;
  shared?: SharedContext;
  /** Budget for an agent's own recent entries, default 6000 chars */
  memoryBudgetChars?: number;
  /** Per-document cap, default 20000 chars */
  documentCharLimit?: number;
}

export interface AssembledPrompt {
  system: string;
  prompt: string;
}

const SECTION_SEPARATOR = '\n\n---\n\n';

/**
 * Builds the prompt for one attempt of a run.
 *
 * Section order: shared docs, priorities, own memory, other agents' summaries,
 * upstream results, documents, additional context, then the task itself.
 */
export class ContextAssembler {
  private memoryBudgetChars: number;
  private documentCharLimit: number;

  constructor(private options: ContextAssemblerOptions) {
    this.memoryBudgetChars = options.memoryBudgetChars ?? 6000;
    this.documentCharLimit = options.documentCharLimit ?? 20_000;
  }

  async assemble(agent: AgentDefinition, task: Task, upstream: readonly Run[] = []): Promise<AssembledPrompt> {
    const sections: string[] = [];
    const { shared } = this.options;

    if (agent.context.sharedDocs && shared?.docs) {
      sections.push(`# Shared Documentation\n\n${shared.docs}`);
    }
    if (agent.context.priorities && shared?.priorities) {
      sections.push(`# Current Priorities\n\n${shared.priorities}`);
    }

    const own = await this.ownMemory(agent.id);
    if (own) sections.push(own);

    sections.push(...(await this.otherSummaries(agent, task)));

    for (const run of upstream) {
      if (run.status !== 'succeeded' || !run.result) continue;
      sections.push(`# Findings from ${this.nameOf(run.agentId)}\n\n${run.result}`);
    }

    for (const ref of task.payload.hints.documentRefs ?? []) {
      sections.push(await this.document(ref));
    }

    if (task.payload.hints.additionalContext) {
      sections.push(`# Additional Context for This Task\n\n${task.payload.hints.additionalContext}`);
    }

    sections.push(`# Your Task\n\n${task.payload.instruction}`);

    return { system: agent.systemPrompt, prompt: sections.join(SECTION_SEPARATOR) };
  }

  private async ownMemory(agentId: string): Promise<string | null> {
    const { summary, entries } = await this.options.memory.recentContext(agentId, this.memoryBudgetChars);
    if (!summary && entries.length === 0) return null;

    const parts = ['# Your Previous Work & Memory'];
    if (summary) parts.push(summary);
    if (entries.length > 0) {
      const lines = entries.map((entry) => `- [${entry.timestamp.toISOString()}] ${entry.summary}`);
      parts.push(`## Recent Entries\n${lines.join('\n')}`);
    }
    return parts.join('\n\n');
  }

  private async otherSummaries(agent: AgentDefinition, task: Task): Promise<string[]> {
    const wanted = new Set<string>();
    if (agent.context.summariesFrom === 'all') {
      for (const other of this.options.roster.list()) wanted.add(other.id);
    } else {
      for (const id of agent.context.summariesFrom) wanted.add(id);
    }
    for (const id of task.payload.hints.contextFromAgents ?? []) wanted.add(id);
    wanted.delete(agent.id);

    const sections: string[] = [];
    for (const id of wanted) {
      const summary = await this.options.memory.getSummary(id);
      if (!summary?.text) continue;
      sections.push(`# ${this.nameOf(id)} Summary\n\n${summary.text}`);
    }
    return sections;
  }

  private async document(ref: string): Promise<string> {
    if (!this.options.documents) {
      throw new PermanentExternalError(`No document store configured; cannot read ${ref}`);
    }

    const content = (await this.options.documents.fetch(ref)).toString('utf8');
    const body =
      content.length > this.documentCharLimit
        ? `${content.slice(0, this.documentCharLimit)}\n\n[truncated]`
        : content;
    return `# Document: ${ref}\n\n${body}`;
  }

  private nameOf(agentId: string): string {
    return this.options.roster.get(agentId)?.name ?? agentId;
  }
}
