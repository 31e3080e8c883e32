import type { AgentSummary, MemoryEntry } from '@cadre/protocol';
import { generateMemoryId, generateOutputId } from '@cadre/protocol';

export interface NewMemoryRecord {
  agentId: string;
  timestamp: Date;
  summary: string;
  /** Full output text, stored out of line and addressed by the entry's rawRef */
  raw: string;
  taskId?: string;
  runId?: string;
}

export interface EntryQuery {
  /** Only entries with a timestamp strictly after this instant */
  after?: Date | null;
  /** Keep the newest N matching entries */
  limit?: number;
}

/**
 * Memory Store Interface
 *
 * Append-only entries per agent, raw outputs by reference, and one rolling
 * summary per agent. Entries are never rewritten once stored.
 */
export interface MemoryStore {
  /**
   * Store the raw output and its entry together. Either both become visible or neither does.
   */
  append(record: NewMemoryRecord): Promise<MemoryEntry>;

  /**
   * Entries for one agent, oldest first (timestamp, then insertion order)
   */
  entries(agentId: string, query?: EntryQuery): Promise<MemoryEntry[]>;

  /**
   * Raw output text by reference, or null when the reference is unknown
   */
  readRaw(rawRef: string): Promise<string | null>;

  getSummary(agentId: string): Promise<AgentSummary | null>;

  saveSummary(summary: AgentSummary): Promise<void>;

  listSummaries(): Promise<AgentSummary[]>;

  /**
   * Every agent id with at least one entry
   */
  agentIds(): Promise<string[]>;
}

interface StoredEntry {
  entry: MemoryEntry;
  seq: number;
}

function compareStored(a: StoredEntry, b: StoredEntry): number {
  const byTime = a.entry.timestamp.getTime() - b.entry.timestamp.getTime();
  return byTime !== 0 ? byTime : a.seq - b.seq;
}

/**
 * In-Memory Memory Store (for development and testing)
 */
export class InMemoryMemoryStore implements MemoryStore {
  private entriesByAgent: Map<string, StoredEntry[]> = new Map();
  private outputs: Map<string, string> = new Map();
  private summaries: Map<string, AgentSummary> = new Map();
  private seq = 0;

  async append(record: NewMemoryRecord): Promise<MemoryEntry> {
    const rawRef = generateOutputId();
    const entry: MemoryEntry = {
      id: generateMemoryId(),
      agentId: record.agentId,
      timestamp: record.timestamp,
      summary: record.summary,
      rawRef,
      taskId: record.taskId,
      runId: record.runId,
    };

    const list = this.entriesByAgent.get(record.agentId) ?? [];
    list.push({ entry, seq: this.seq++ });
    list.sort(compareStored);
    this.entriesByAgent.set(record.agentId, list);
    this.outputs.set(rawRef, record.raw);

    return { ...entry };
  }

  async entries(agentId: string, query: EntryQuery = {}): Promise<MemoryEntry[]> {
    const after = query.after;
    let list = (this.entriesByAgent.get(agentId) ?? []).map((stored) => stored.entry);

    if (after) {
      list = list.filter((entry) => entry.timestamp.getTime() > after.getTime());
    }
    if (query.limit !== undefined) {
      list = query.limit > 0 ? list.slice(-query.limit) : [];
    }

    return list.map((entry) => ({ ...entry }));
  }

  async readRaw(rawRef: string): Promise<string | null> {
    return this.outputs.get(rawRef) ?? null;
  }

  async getSummary(agentId: string): Promise<AgentSummary | null> {
    const summary = this.summaries.get(agentId);
    return summary ? { ...summary } : null;
  }

  async saveSummary(summary: AgentSummary): Promise<void> {
    this.summaries.set(summary.agentId, { ...summary });
  }

  async listSummaries(): Promise<AgentSummary[]> {
    return Array.from(this.summaries.values())
      .map((summary) => ({ ...summary }))
      .sort((a, b) => a.agentId.localeCompare(b.agentId));
  }

  async agentIds(): Promise<string[]> {
    return Array.from(this.entriesByAgent.keys()).sort();
  }

  // Testing helpers

  clear(): void {
    this.entriesByAgent.clear();
    this.outputs.clear();
    this.summaries.clear();
  }

  get entryCount(): number {
    let count = 0;
    for (const list of this.entriesByAgent.values()) count += list.length;
    return count;
  }
}
