import type { MemoryEntry } from '@cadre/protocol';

/**
 * Folds entries into an agent's rolling summary. Must be deterministic in its
 * inputs for compaction to stay idempotent.
 */
export interface Summarizer {
  summarize(agentId: string, previous: string, entries: readonly MemoryEntry[]): Promise<string>;
}

/**
 * Collapse a run's output to a single short line for its memory entry.
 * Prefers the first paragraph longer than 40 characters, so a leading title is skipped.
 */
export function condense(text: string, maxChars = 280): string {
  const paragraphs = text
    .split(/\n\s*\n/)
    .map((p) => p.replace(/^#+\s*/gm, '').replace(/\s+/g, ' ').trim())
    .filter((p) => p.length > 0);

  const first = paragraphs.find((p) => p.length > 40) ?? paragraphs[0] ?? '';
  if (first.length <= maxChars) return first;
  return `${first.slice(0, maxChars - 1).trimEnd()}…`;
}

/**
 * Default summarizer: one dated bullet per entry appended to the previous
 * summary, oldest bullets dropped once the summary exceeds `maxChars`.
 */
export class BulletSummarizer implements Summarizer {
  constructor(private maxChars = 3000) {}

  async summarize(_agentId: string, previous: string, entries: readonly MemoryEntry[]): Promise<string> {
    const lines = previous.split('\n').filter((line) => line.trim().length > 0);

    for (const entry of entries) {
      lines.push(`- [${entry.timestamp.toISOString().slice(0, 10)}] ${entry.summary}`);
    }

    while (lines.length > 1 && lines.join('\n').length > this.maxChars) {
      lines.shift();
    }

    return lines.join('\n');
  }
}
