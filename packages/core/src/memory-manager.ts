/**
 * Memory Manager
 *
 * Owns per-agent persistent memory:
 * - append-only entries, one per successful run, with the full output stored by reference
 * - a rolling summary per agent, folded from entries older than the retained window
 * - bounded recent context for prompt assembly
 *
 * Writes for one agent are serialised; writes for different agents proceed in parallel.
 */

import type { AgentSummary, MemoryEntry } from '@cadre/protocol';

import { KeyedMutex } from './concurrency.js';
import type { MemoryStore, NewMemoryRecord } from './store.js';
import { BulletSummarizer, type Summarizer } from './summarizer.js';

export interface MemoryManagerOptions {
  /** Newest entries kept out of the summary, default 5 */
  retainEntries?: number;
  summarizer?: Summarizer;
  now?: () => Date;
}

export interface RecentContext {
  summary: string;
  entries: MemoryEntry[];
}

export type CompactionOutcome =
  | { agentId: string; status: 'compacted'; folded: number }
  | { agentId: string; status: 'unchanged' }
  | { agentId: string; status: 'failed'; error: Error };

export type NewEntry = Omit<NewMemoryRecord, 'agentId' | 'timestamp'> & { timestamp?: Date };

export class MemoryManager {
  private locks = new KeyedMutex();
  private retainEntries: number;
  private summarizer: Summarizer;
  private now: () => Date;

  constructor(
    private store: MemoryStore,
    options: MemoryManagerOptions = {},
  ) {
    this.retainEntries = Math.max(0, options.retainEntries ?? 5);
    this.summarizer = options.summarizer ?? new BulletSummarizer();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Append one entry. Resolves once the entry and its raw output are durable.
   */
  async append(agentId: string, entry: NewEntry): Promise<MemoryEntry> {
    return this.locks.runExclusive(agentId, () =>
      this.store.append({ ...entry, agentId, timestamp: entry.timestamp ?? this.now() }),
    );
  }

  /**
   * The rolling summary plus the newest un-summarised entries that fit in
   * `budgetChars` (counted on entry summaries, after the rolling summary).
   */
  async recentContext(agentId: string, budgetChars: number): Promise<RecentContext> {
    const current = await this.store.getSummary(agentId);
    const summary = current?.text ?? '';
    const pending = await this.store.entries(agentId, { after: current?.compactedThrough ?? null });

    let remaining = budgetChars - summary.length;
    const entries: MemoryEntry[] = [];
    for (let i = pending.length - 1; i >= 0; i--) {
      const entry = pending[i];
      if (!entry || entry.summary.length > remaining) break;
      remaining -= entry.summary.length;
      entries.unshift(entry);
    }

    return { summary, entries };
  }

  /**
   * Fold entries older than the retained window into the rolling summary.
   *
   * Idempotent: the summary records the newest timestamp it has folded, and a
   * second run with no new entries finds nothing to fold. The fold boundary never
   * splits entries sharing a timestamp.
   */
  async compact(agentId: string): Promise<CompactionOutcome> {
    return this.locks.runExclusive(agentId, async () => {
      const current = await this.store.getSummary(agentId);
      const pending = await this.store.entries(agentId, { after: current?.compactedThrough ?? null });

      const foldable = pending.slice(0, Math.max(0, pending.length - this.retainEntries));
      const firstRetained = pending[foldable.length];
      while (
        foldable.length > 0 &&
        firstRetained &&
        foldable[foldable.length - 1]?.timestamp.getTime() === firstRetained.timestamp.getTime()
      ) {
        foldable.pop();
      }

      const newest = foldable[foldable.length - 1];
      if (!newest) {
        return { agentId, status: 'unchanged' as const };
      }

      const text = await this.summarizer.summarize(agentId, current?.text ?? '', foldable);
      await this.store.saveSummary({
        agentId,
        text,
        compactedThrough: newest.timestamp,
        updatedAt: this.now(),
      });

      return { agentId, status: 'compacted' as const, folded: foldable.length };
    });
  }

  /**
   * Compact every agent with entries. One agent's failure does not stop the others.
   */
  async compactAll(): Promise<CompactionOutcome[]> {
    const agentIds = await this.store.agentIds();
    return Promise.all(
      agentIds.map((agentId) =>
        this.compact(agentId).catch(
          (error: unknown): CompactionOutcome => ({
            agentId,
            status: 'failed',
            error: error instanceof Error ? error : new Error(String(error)),
          }),
        ),
      ),
    );
  }

  async getSummary(agentId: string): Promise<AgentSummary | null> {
    return this.store.getSummary(agentId);
  }

  async getAllSummaries(): Promise<AgentSummary[]> {
    return this.store.listSummaries();
  }

  /**
   * Full history for one agent, newest last. Folded entries are included.
   */
  async history(agentId: string, options: { limit?: number } = {}): Promise<MemoryEntry[]> {
    return this.store.entries(agentId, { limit: options.limit });
  }

  async readRaw(rawRef: string): Promise<string | null> {
    return this.store.readRaw(rawRef);
  }
}
