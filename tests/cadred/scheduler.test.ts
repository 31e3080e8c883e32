import { once } from 'events';

import { describe, it, expect, vi } from 'vitest';
import type { AgentDefinition, Run, Task } from '@cadre/protocol';
import { BRIEFING_AGENT_ID, PermanentExternalError } from '@cadre/protocol';
import type { CompactionOutcome } from '@cadre/core';

import { agent, createHarness, testAgents, testSettings } from '../helpers/fixtures.js';
import { ScriptedReasoningClient } from '../helpers/scripted-client.js';

// 2026-03-03 is a Tuesday; weekly agents fire on Mondays
const TUESDAY_8AM = new Date(2026, 2, 3, 8, 0);
const TUESDAY_9AM = new Date(2026, 2, 3, 9, 0);

function withDefaultTask(agentId: string, defaultTask: string): AgentDefinition[] {
  return testAgents().map((agent) => (agent.id === agentId ? { ...agent, defaultTask } : agent));
}

/** Adds a daily domain_intelligence that the daily technical_pm depends on */
function withDailyDependency(): AgentDefinition[] {
  return [
    ...testAgents().map((definition) =>
      definition.id === 'technical_pm' ? { ...definition, dependsOn: ['domain_intelligence'] } : definition,
    ),
    agent({
      id: 'domain_intelligence',
      name: 'Domain Intelligence',
      capabilityTag: 'research.domain',
      scheduleClass: 'daily',
    }),
  ];
}

describe('Scheduler', () => {
  it('fires each due daily agent exactly once at the configured hour', async () => {
    const { scheduler, scheduleStore, dispatcher } = createHarness();
    await scheduler.init(TUESDAY_8AM);

    expect(await scheduler.tick(new Date(2026, 2, 3, 8, 55))).toEqual([]);

    const tasks = await scheduler.tick(TUESDAY_9AM);
    expect(tasks.map((task) => task.targetAgentIds)).toEqual([['market_research'], ['technical_pm']]);
    expect(tasks[0]?.origin).toEqual({ kind: 'schedule', trigger: 'cycle', cycleId: '2026-03-03' });
    expect(tasks[0]?.priority).toBe('medium');
    expect(tasks[0]?.payload.instruction).toBe(
      'Perform your scheduled review and report key findings, risks and recommended actions.',
    );
    expect(scheduleStore.get('market_research')?.nextFireAt).toEqual(new Date(2026, 2, 4, 9, 0));
    expect(scheduleStore.get('market_research')?.lastFiredAt).toEqual(TUESDAY_9AM);
    expect(scheduleStore.get('fundraising')?.nextFireAt).toEqual(new Date(2026, 2, 9, 9, 0));

    expect(await scheduler.tick(new Date(2026, 2, 3, 9, 5))).toEqual([]);
    await dispatcher.drain();
  });

  it('does not replay fires missed while the process was down', async () => {
    const { scheduler, scheduleStore, dispatcher } = createHarness();
    await scheduler.init(TUESDAY_8AM);

    const tasks = await scheduler.tick(new Date(2026, 2, 6, 10, 0));

    expect(tasks.map((task) => task.targetAgentIds[0])).toEqual(['market_research', 'technical_pm']);
    expect(scheduleStore.get('market_research')?.nextFireAt).toEqual(new Date(2026, 2, 7, 9, 0));
    await dispatcher.drain();
  });

  it('fires on the next tick after the table could not be read', async () => {
    const { scheduler, scheduleStore, dispatcher } = createHarness();
    await scheduler.init(TUESDAY_8AM);
    vi.spyOn(scheduleStore, 'load').mockRejectedValueOnce(new Error('connection reset'));

    expect(await scheduler.tick(TUESDAY_9AM)).toEqual([]);
    expect(dispatcher.getStats().queued).toBe(0);

    const tasks = await scheduler.tick(new Date(2026, 2, 3, 9, 5));
    expect(tasks).toHaveLength(2);
    await dispatcher.drain();
  });

  it('fires nothing when the advanced table cannot be written', async () => {
    const { scheduler, scheduleStore, client, dispatcher } = createHarness();
    await scheduler.init(TUESDAY_8AM);
    vi.spyOn(scheduleStore, 'save').mockRejectedValueOnce(new Error('disk full'));

    expect(await scheduler.tick(TUESDAY_9AM)).toEqual([]);
    await dispatcher.drain();
    expect(client.calls).toEqual([]);
    expect(scheduleStore.get('market_research')?.nextFireAt).toEqual(TUESDAY_9AM);

    expect(await scheduler.tick(new Date(2026, 2, 3, 9, 5))).toHaveLength(2);
    await dispatcher.drain();
  });

  it('fires every timed agent when forced', async () => {
    const { scheduler, dispatcher } = createHarness();
    await scheduler.init(TUESDAY_8AM);

    const tasks = await scheduler.tick(new Date(2026, 2, 3, 14, 0), { force: true });

    expect(tasks.map((task) => task.targetAgentIds[0])).toEqual(['fundraising', 'market_research', 'technical_pm']);
    await dispatcher.drain();
  });

  it('queues one briefing for the chief of staff once the cycle and its follow-ups are done', async () => {
    const client = new ScriptedReasoningClient().script(
      'technical_pm',
      'Findings\n\n```dispatch\n{"agent_id": "fundraising", "task": "Estimate runway"}\n```',
    );
    const { scheduler, dispatcher, transport } = createHarness({ client });
    const queued: Task[] = [];
    let followUpsDoneFirst = 0;
    scheduler.on('briefing_queued', (task: Task) => {
      queued.push(task);
      followUpsDoneFirst = client.callsFor('fundraising').length;
    });
    await scheduler.init(TUESDAY_8AM);

    const briefed = once(scheduler, 'briefing_queued');
    await scheduler.tick(TUESDAY_9AM);
    await briefed;
    await dispatcher.drain();

    expect(queued).toHaveLength(1);
    expect(followUpsDoneFirst).toBe(1);
    expect(queued[0]?.targetAgentIds).toEqual(['chief_of_staff']);
    expect(queued[0]?.origin).toEqual({ kind: 'schedule', trigger: 'briefing', cycleId: '2026-03-03' });
    expect(client.callsFor('chief_of_staff')[0]?.prompt).toContain(
      [
        '## Work completed this cycle',
        '- Market Research: Report from market_research',
        '- Technical PM: Findings',
        '- Fundraising: Report from fundraising',
        '',
        '## Failures not yet reported',
        '- none',
      ].join('\n'),
    );
    expect(transport.postsTo('briefings')).toEqual([
      '# Daily Briefing: 2026-03-03\n\nReport from chief_of_staff\n\n## Failures\nNone.',
    ]);
    expect(scheduler.openCycles()).toEqual([]);
  });

  it('skips a daily agent whose upstream failed earlier in the same cycle', async () => {
    const client = new ScriptedReasoningClient().script(
      'domain_intelligence',
      new PermanentExternalError('source offline'),
    );
    const { scheduler, dispatcher } = createHarness({ client, agents: withDailyDependency() });
    const finished: Run[] = [];
    dispatcher.on('run_finished', (run) => finished.push(run));
    await scheduler.init(TUESDAY_8AM);

    const briefed = once(scheduler, 'briefing_queued');
    const tasks = await scheduler.tick(TUESDAY_9AM);
    await briefed;
    await dispatcher.drain();

    expect(tasks.map((task) => task.targetAgentIds[0])).toEqual([
      'domain_intelligence',
      'market_research',
      'technical_pm',
    ]);
    expect(client.callsFor('technical_pm')).toEqual([]);
    expect(finished.find((run) => run.agentId === 'technical_pm')?.error).toEqual({
      kind: 'DependencyUnmetError',
      message: 'Skipped technical_pm: upstream domain_intelligence did not succeed',
      retryable: false,
    });
  });

  it('hands a cycle upstream result to its dependent in another task', async () => {
    const { scheduler, dispatcher, client } = createHarness({ agents: withDailyDependency() });
    await scheduler.init(TUESDAY_8AM);

    const briefed = once(scheduler, 'briefing_queued');
    await scheduler.tick(TUESDAY_9AM);
    await briefed;
    await dispatcher.drain();

    expect(client.callsFor('technical_pm')[0]?.prompt).toContain(
      '# Findings from Domain Intelligence\n\nReport from domain_intelligence',
    );
  });

  it('still briefs when a cycle run cannot be recorded', async () => {
    const { scheduler, dispatcher, ledger, transport } = createHarness();
    vi.spyOn(ledger, 'recordRuns').mockRejectedValueOnce(new Error('connection reset'));
    await scheduler.init(TUESDAY_8AM);

    const briefed = once(scheduler, 'briefing_queued');
    await scheduler.tick(TUESDAY_9AM);
    await briefed;
    await dispatcher.drain();

    expect(transport.postsTo('briefings')).toEqual([
      '# Daily Briefing: 2026-03-03\n\nReport from chief_of_staff\n\n## Failures\nNone.',
    ]);
  });

  it('lists failed scheduled runs in the briefing and marks them reported', async () => {
    const client = new ScriptedReasoningClient().script('market_research', new PermanentExternalError('quota exceeded'));
    const { scheduler, dispatcher, transport, ledger } = createHarness({
      client,
      agents: withDefaultTask('market_research', 'Scan the market'),
    });
    await scheduler.init(TUESDAY_8AM);

    const briefed = once(scheduler, 'briefing_queued');
    await scheduler.tick(TUESDAY_9AM);
    await briefed;
    await dispatcher.drain();

    expect(transport.postsTo('briefings')).toEqual([
      [
        '# Daily Briefing: 2026-03-03',
        'Report from chief_of_staff',
        '## Failures\n- Market Research: Scan the market (PermanentExternalError: quota exceeded)',
      ].join('\n\n'),
    ]);
    expect(await ledger.unreportedFailures()).toEqual([]);
  });

  it('compacts every agent memory after the briefing completes', async () => {
    const settings = testSettings();
    settings.memory.retainEntries = 0;
    const { scheduler, dispatcher } = createHarness({ settings });
    await scheduler.init(TUESDAY_8AM);

    const compacted = once(scheduler, 'compacted');
    await scheduler.tick(TUESDAY_9AM);
    const [cycleId, results] = await compacted;
    await dispatcher.drain();

    expect(cycleId).toBe('2026-03-03');
    const outcomes: CompactionOutcome[] = results;
    expect(outcomes.map((outcome) => [outcome.agentId, outcome.status])).toEqual([
      [BRIEFING_AGENT_ID, 'compacted'],
      ['chief_of_staff', 'compacted'],
      ['market_research', 'compacted'],
      ['technical_pm', 'compacted'],
    ]);
  });

  it('triggers event-driven agents on demand', async () => {
    const { scheduler, dispatcher, client } = createHarness();

    const task = scheduler.trigger('brand_marketing', { instruction: 'React to the launch coverage' });
    await dispatcher.drain();

    expect(task.origin).toEqual({ kind: 'schedule', trigger: 'event' });
    expect(client.callsFor('brand_marketing')[0]?.prompt).toContain('# Your Task\n\nReact to the launch coverage');
    expect(() => scheduler.trigger('market_research')).toThrow('Agent market_research is daily, not event_triggered');
    expect(() => scheduler.trigger('ghost')).toThrow('Agent not found: ghost');
  });
});
