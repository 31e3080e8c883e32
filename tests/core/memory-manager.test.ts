import { describe, it, expect, beforeEach } from 'vitest';
import type { MemoryEntry } from '@cadre/protocol';
import { BulletSummarizer, InMemoryMemoryStore, MemoryManager, type Summarizer } from '@cadre/core';

const at = (iso: string) => new Date(`2026-03-${iso}Z`);

describe('MemoryManager', () => {
  let store: InMemoryMemoryStore;
  let memory: MemoryManager;

  beforeEach(() => {
    store = new InMemoryMemoryStore();
    memory = new MemoryManager(store, { retainEntries: 2, summarizer: new BulletSummarizer() });
  });

  async function seed(agentId: string, stamps: string[]) {
    for (const [i, stamp] of stamps.entries()) {
      await memory.append(agentId, { timestamp: at(stamp), summary: `finding ${i + 1}`, raw: `full output ${i + 1}` });
    }
  }

  it('reads entries back in timestamp order regardless of append order', async () => {
    await seed('market_research', ['03T09:00:00', '01T09:00:00', '02T09:00:00']);

    const history = await memory.history('market_research');

    expect(history.map((entry) => entry.summary)).toEqual(['finding 2', 'finding 3', 'finding 1']);
    const times = history.map((entry) => entry.timestamp.getTime());
    expect(times).toEqual([...times].sort((a, b) => a - b));
  });

  it('stores the raw output by reference', async () => {
    const entry = await memory.append('fundraising', { timestamp: at('01T09:00:00'), summary: 'short', raw: 'long form' });

    expect(entry.rawRef).toMatch(/^out_/);
    expect(await memory.readRaw(entry.rawRef)).toBe('long form');
    expect(await memory.readRaw('out_missing')).toBeNull();
  });

  it('limits history to the newest entries', async () => {
    await seed('market_research', ['01T09:00:00', '02T09:00:00', '03T09:00:00']);

    const recent = await memory.history('market_research', { limit: 2 });

    expect(recent.map((entry) => entry.summary)).toEqual(['finding 2', 'finding 3']);
  });

  it('fills recent context newest first within the budget', async () => {
    await memory.append('a', { timestamp: at('01T09:00:00'), summary: 'aaaa', raw: '' });
    await memory.append('a', { timestamp: at('02T09:00:00'), summary: 'bbbb', raw: '' });
    await memory.append('a', { timestamp: at('03T09:00:00'), summary: 'cccc', raw: '' });

    const context = await memory.recentContext('a', 9);

    expect(context.summary).toBe('');
    expect(context.entries.map((entry) => entry.summary)).toEqual(['bbbb', 'cccc']);
  });

  it('folds entries older than the retained window into the summary', async () => {
    await seed('market_research', ['01T09:00:00', '02T09:00:00', '03T09:00:00', '04T09:00:00', '05T09:00:00']);

    const outcome = await memory.compact('market_research');

    expect(outcome).toEqual({ agentId: 'market_research', status: 'compacted', folded: 3 });
    const summary = await memory.getSummary('market_research');
    expect(summary?.text).toBe(
      ['- [2026-03-01] finding 1', '- [2026-03-02] finding 2', '- [2026-03-03] finding 3'].join('\n'),
    );
    expect(summary?.compactedThrough).toEqual(at('03T09:00:00'));

    const context = await memory.recentContext('market_research', 6000);
    expect(context.entries.map((entry) => entry.summary)).toEqual(['finding 4', 'finding 5']);
  });

  it('gives the same summary when compaction runs twice', async () => {
    await seed('market_research', ['01T09:00:00', '02T09:00:00', '03T09:00:00', '04T09:00:00']);

    await memory.compact('market_research');
    const first = await memory.getSummary('market_research');
    const second = await memory.compact('market_research');

    expect(second).toEqual({ agentId: 'market_research', status: 'unchanged' });
    expect((await memory.getSummary('market_research'))?.text).toBe(first?.text);
  });

  it('keeps entries sharing a timestamp on the same side of the fold', async () => {
    memory = new MemoryManager(store, { retainEntries: 1 });
    await seed('a', ['01T09:00:00', '02T09:00:00', '02T09:00:00']);

    const outcome = await memory.compact('a');

    expect(outcome).toEqual({ agentId: 'a', status: 'compacted', folded: 1 });
    expect((await memory.getSummary('a'))?.compactedThrough).toEqual(at('01T09:00:00'));
  });

  it('reports per-agent failures without stopping other agents', async () => {
    const failing: Summarizer = {
      async summarize(agentId: string, previous: string, entries: readonly MemoryEntry[]) {
        if (agentId === 'b') throw new Error('summary service down');
        return [previous, ...entries.map((entry) => entry.summary)].filter(Boolean).join('\n');
      },
    };
    memory = new MemoryManager(store, { retainEntries: 0, summarizer: failing });
    await seed('a', ['01T09:00:00']);
    await seed('b', ['01T09:00:00']);

    const results = await memory.compactAll();

    expect(results.map((result) => [result.agentId, result.status])).toEqual([
      ['a', 'compacted'],
      ['b', 'failed'],
    ]);
    expect((await memory.getSummary('a'))?.text).toBe('finding 1');
    expect(await memory.getSummary('b')).toBeNull();
  });
});
