import { and, asc, desc, eq, gt, type SQL } from 'drizzle-orm';

import type { AgentSummary, MemoryEntry } from '@cadre/protocol';
import { generateMemoryId, generateOutputId } from '@cadre/protocol';
import type { EntryQuery, MemoryStore, NewMemoryRecord } from '@cadre/core';

import { agentOutputs, agentSummaries, memoryEntries, type Database, type MemoryEntryRow } from '../db/index.js';

function toEntry(row: MemoryEntryRow): MemoryEntry {
  return {
    id: row.id,
    agentId: row.agentId,
    timestamp: row.timestamp,
    summary: row.summary,
    rawRef: row.rawRef,
    taskId: row.taskId ?? undefined,
    runId: row.runId ?? undefined,
  };
}

/**
 * Postgres Memory Store
 *
 * Entries are ordered by timestamp, then by the serial column, which gives
 * insertion order for entries that share a timestamp.
 */
export class PgMemoryStore implements MemoryStore {
  constructor(private db: Database) {}

  async append(record: NewMemoryRecord): Promise<MemoryEntry> {
    const rawRef = generateOutputId();

    return this.db.transaction(async (tx) => {
      await tx.insert(agentOutputs).values({ ref: rawRef, agentId: record.agentId, content: record.raw });

      const [row] = await tx
        .insert(memoryEntries)
        .values({
          id: generateMemoryId(),
          agentId: record.agentId,
          timestamp: record.timestamp,
          summary: record.summary,
          rawRef,
          taskId: record.taskId ?? null,
          runId: record.runId ?? null,
        })
        .returning();

      if (!row) {
        throw new Error(`Memory entry for ${record.agentId} was not stored`);
      }
      return toEntry(row);
    });
  }

  async entries(agentId: string, query: EntryQuery = {}): Promise<MemoryEntry[]> {
    const conditions: SQL[] = [eq(memoryEntries.agentId, agentId)];
    if (query.after) {
      conditions.push(gt(memoryEntries.timestamp, query.after));
    }

    if (query.limit !== undefined) {
      if (query.limit <= 0) return [];
      const newest = await this.db
        .select()
        .from(memoryEntries)
        .where(and(...conditions))
        .orderBy(desc(memoryEntries.timestamp), desc(memoryEntries.seq))
        .limit(query.limit);
      return newest.reverse().map(toEntry);
    }

    const rows = await this.db
      .select()
      .from(memoryEntries)
      .where(and(...conditions))
      .orderBy(asc(memoryEntries.timestamp), asc(memoryEntries.seq));
    return rows.map(toEntry);
  }

  async readRaw(rawRef: string): Promise<string | null> {
    const [row] = await this.db
      .select({ content: agentOutputs.content })
      .from(agentOutputs)
      .where(eq(agentOutputs.ref, rawRef));
    return row?.content ?? null;
  }

  async getSummary(agentId: string): Promise<AgentSummary | null> {
    const [row] = await this.db.select().from(agentSummaries).where(eq(agentSummaries.agentId, agentId));
    return row ?? null;
  }

  async saveSummary(summary: AgentSummary): Promise<void> {
    await this.db
      .insert(agentSummaries)
      .values(summary)
      .onConflictDoUpdate({
        target: agentSummaries.agentId,
        set: {
          text: summary.text,
          compactedThrough: summary.compactedThrough,
          updatedAt: summary.updatedAt,
        },
      });
  }

  async listSummaries(): Promise<AgentSummary[]> {
    return this.db.select().from(agentSummaries).orderBy(asc(agentSummaries.agentId));
  }

  async agentIds(): Promise<string[]> {
    const rows = await this.db
      .selectDistinct({ agentId: memoryEntries.agentId })
      .from(memoryEntries)
      .orderBy(asc(memoryEntries.agentId));
    return rows.map((row) => row.agentId);
  }
}
