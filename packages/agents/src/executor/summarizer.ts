import type { MemoryEntry } from '@cadre/protocol';
import type { Summarizer } from '@cadre/core';

import type { ReasoningClient } from '../types.js';

const SYSTEM_PROMPT = `You maintain a rolling memory summary for an agent.
Merge the new entries into the existing summary. Keep key findings, decisions,
open questions and dates. Drop anything superseded. Reply with the summary only.`;

/**
 * Compaction summarizer backed by the reasoning service, on the economy tier.
 * Temperature is left to the client; compaction output is stored, not recomputed,
 * so a second pass with no new entries never calls this.
 */
export class ReasoningSummarizer implements Summarizer {
  constructor(
    private client: ReasoningClient,
    private model: string,
    private maxChars = 3000,
  ) {}

  async summarize(agentId: string, previous: string, entries: readonly MemoryEntry[]): Promise<string> {
    const lines = entries.map((entry) => `- [${entry.timestamp.toISOString()}] ${entry.summary}`);
    const prompt = [
      `## Existing summary\n\n${previous || '(empty)'}`,
      `## New entries\n\n${lines.join('\n')}`,
      `Keep the result under ${this.maxChars} characters.`,
    ].join('\n\n');

    const response = await this.client.invoke({ agentId, model: this.model, system: SYSTEM_PROMPT, prompt });
    const text = response.text.trim();
    return text.length > this.maxChars ? text.slice(0, this.maxChars) : text;
  }
}
