import { describe, it, expect } from 'vitest';
import type { FailedRunSummary, Run, RunError } from '@cadre/protocol';
import { createTask, emptyUsage } from '@cadre/protocol';

import {
  composeBriefing,
  cycleDigest,
  formatReply,
  parseDispatchDirectives,
  selectFollowUps,
  stripDispatchBlocks,
} from '../../apps/cadred/src/services/completion.js';
import { agent, testAgents, testRoster } from '../helpers/fixtures.js';

const roster = testRoster();

function run(agentId: string, outcome: { result: string } | { error: RunError }): Run {
  return {
    id: `run_${agentId}`,
    taskId: 'task_1',
    agentId,
    status: 'result' in outcome ? 'succeeded' : 'failed',
    attemptCount: 1,
    attempts: [],
    usage: emptyUsage(),
    ...outcome,
  };
}

const permanent = (message: string): RunError => ({ kind: 'PermanentExternalError', message, retryable: false });

function failure(agentId: string, instruction: string, error: RunError): FailedRunSummary {
  return { runId: `run_${agentId}`, taskId: 'task_1', agentId, instruction, error };
}

describe('stripDispatchBlocks', () => {
  it('removes directive blocks and collapses the gap they leave', () => {
    expect(stripDispatchBlocks('Intro\n\n```dispatch\n{"agent_id": "x", "task": "y"}\n```\n\nOutro')).toBe(
      'Intro\n\nOutro',
    );
  });
});

describe('formatReply', () => {
  it('hides routing runs and directive blocks', () => {
    const runs = [
      run('router', { result: '["fundraising"]' }),
      run('fundraising', { result: 'Runway is 14 months.\n\n```dispatch\n[]\n```' }),
    ];

    expect(formatReply(runs, roster)).toBe('*Fundraising*\nRunway is 14 months.');
  });

  it('apologises when every agent failed', () => {
    const runs = [
      run('fundraising', { error: permanent('bad request') }),
      run('technical_pm', { error: { kind: 'TransientExternalError', message: 'timeout', retryable: true } }),
    ];

    expect(formatReply(runs, roster)).toBe(
      "I couldn't complete that request.\n- Fundraising: PermanentExternalError: bad request\n- Technical PM: TransientExternalError: timeout",
    );
  });
});

describe('parseDispatchDirectives', () => {
  it('collects directives from every well-formed block', () => {
    const text = [
      '```dispatch\n{"agent_id": "fundraising", "task": "Update the model", "priority": "low"}\n```',
      '```dispatch\nnot json\n```',
      '```dispatch\n{"agent": "fundraising"}\n```',
      '```dispatch\n[{"agent_id": "brand_marketing", "task": "Draft"}, {"agent_id": "technical_pm", "task": "Plan"}]\n```',
    ].join('\n\n');

    expect(parseDispatchDirectives(text)).toEqual([
      { agent_id: 'fundraising', task: 'Update the model', priority: 'low' },
      { agent_id: 'brand_marketing', task: 'Draft' },
      { agent_id: 'technical_pm', task: 'Plan' },
    ]);
  });
});

describe('selectFollowUps', () => {
  it('keeps one proposal per target, from the narrowest proposer, then the smaller id', () => {
    const extended = testRoster([...testAgents(), agent({ id: 'archivist', dispatchable: false })]);
    const proposer = (id: string) => extended.require(id);

    const selected = selectFollowUps(
      [
        { proposer: proposer('technical_pm'), directive: { agent_id: 'brand_marketing', task: 'from pm' } },
        { proposer: proposer('market_research'), directive: { agent_id: 'brand_marketing', task: 'from research' } },
        { proposer: proposer('fundraising'), directive: { agent_id: 'brand_marketing', task: 'from fundraising' } },
        { proposer: proposer('fundraising'), directive: { agent_id: 'fundraising', task: 'self' } },
        { proposer: proposer('fundraising'), directive: { agent_id: 'archivist', task: 'not dispatchable' } },
        { proposer: proposer('fundraising'), directive: { agent_id: 'ghost', task: 'unknown' } },
      ],
      extended,
    );

    expect(selected.map(({ proposer, directive }) => [proposer.id, directive.task])).toEqual([
      ['fundraising', 'from fundraising'],
    ]);
  });
});

describe('cycleDigest', () => {
  it('lists completed work and open failures', () => {
    const task = createTask({
      origin: { kind: 'schedule', trigger: 'cycle', cycleId: '2026-03-03' },
      instruction: 'Scan the market',
    });
    const digest = cycleDigest(
      [{ task, run: run('market_research', { result: '## Headline\n\nDemand is up.' }) }],
      [failure('fundraising', 'Refresh the pipeline', permanent('quota exceeded'))],
      roster,
    );

    expect(digest).toBe(
      [
        '## Work completed this cycle',
        '- Market Research: Headline',
        '',
        '## Failures not yet reported',
        '- Fundraising: PermanentExternalError: quota exceeded',
      ].join('\n'),
    );
  });
});

describe('composeBriefing', () => {
  it('falls back to the digest when the chief of staff failed', () => {
    const text = composeBriefing(
      {
        cycleId: '2026-03-03',
        run: run('chief_of_staff', { error: permanent('context too long') }),
        digest: '## Work completed this cycle\n- none',
        failures: [failure('technical_pm', 'x'.repeat(100), permanent('bad request'))],
      },
      roster,
    );

    expect(text).toBe(
      [
        '# Daily Briefing: 2026-03-03',
        '_The chief of staff could not compile this briefing (PermanentExternalError: context too long)._',
        '## Work completed this cycle\n- none',
        `## Failures\n- Technical PM: ${'x'.repeat(79)}… (PermanentExternalError: bad request)`,
      ].join('\n\n'),
    );
  });
});
