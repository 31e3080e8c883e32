/**
 * Completion helpers
 *
 * Pure functions the Dispatcher uses once a task is complete: the reply to a
 * human request, follow-up directives parsed out of results, and the daily
 * briefing text.
 */

import type { AgentDefinition, FailedRunSummary, Run, RunError } from '@cadre/protocol';
import { DispatchBlockV1, ROUTER_AGENT_ID, type DispatchDirectiveV1 } from '@cadre/protocol';
import type { AgentRoster, CycleRun } from '@cadre/core';
import { condense } from '@cadre/core';

import { logger } from '../logger.js';

const DISPATCH_BLOCK = /```dispatch\s*([\s\S]*?)```/g;

export interface FollowUpProposal {
  proposer: AgentDefinition;
  directive: DispatchDirectiveV1;
}

function nameOf(roster: AgentRoster, agentId: string): string {
  return roster.get(agentId)?.name ?? agentId;
}

function describeError(error: RunError | undefined): string {
  return error ? `${error.kind}: ${error.message}` : 'unknown error';
}

export function stripDispatchBlocks(text: string): string {
  return text.replace(DISPATCH_BLOCK, '').replace(/\n{3,}/g, '\n\n').trim();
}

/**
 * Reply to a human request: every successful result under its agent's name,
 * then a section naming the agents that failed. Routing runs are not shown.
 */
export function formatReply(runs: readonly Run[], roster: AgentRoster): string {
  const agentRuns = runs.filter((run) => run.agentId !== ROUTER_AGENT_ID);
  const succeeded = agentRuns.filter((run) => run.status === 'succeeded');
  const failed = agentRuns.filter((run) => run.status === 'failed');
  const failureLines = failed.map((run) => `- ${nameOf(roster, run.agentId)}: ${describeError(run.error)}`);

  if (succeeded.length === 0) {
    return ["I couldn't complete that request.", ...failureLines].join('\n');
  }

  const sections = succeeded.map(
    (run) => `*${nameOf(roster, run.agentId)}*\n${stripDispatchBlocks(run.result ?? '')}`,
  );
  if (failureLines.length > 0) {
    sections.push(['_Could not complete:_', ...failureLines].join('\n'));
  }
  return sections.join('\n\n');
}

export function formatClarification(roster: AgentRoster, reason: string): string {
  const options = roster.dispatchable().map((agent) => `- @${agent.id}: ${agent.name}`);
  return [
    `I couldn't tell which agent should handle this (${reason}).`,
    'Mention one directly, for example:',
    ...options,
  ].join('\n');
}

/**
 * Directives from every ```dispatch block in a result. A block that is not
 * valid JSON or has the wrong shape is skipped.
 */
export function parseDispatchDirectives(text: string): DispatchDirectiveV1[] {
  const directives: DispatchDirectiveV1[] = [];

  for (const match of text.matchAll(DISPATCH_BLOCK)) {
    const body = match[1]?.trim();
    if (!body) continue;

    let candidate: unknown;
    try {
      candidate = JSON.parse(body);
    } catch (error) {
      logger.warn({ error }, 'Ignoring dispatch block that is not valid JSON');
      continue;
    }

    const parsed = DispatchBlockV1.safeParse(candidate);
    if (!parsed.success) {
      logger.warn({ issues: parsed.error.issues.length }, 'Ignoring dispatch block with unexpected shape');
      continue;
    }
    directives.push(...parsed.data);
  }

  return directives;
}

/**
 * At most one follow-up per target. When several agents propose work for the
 * same target, the proposer with the narrowest capability tag wins, then the
 * smaller agent id. Targets must be dispatchable and not the proposer itself.
 */
export function selectFollowUps(proposals: readonly FollowUpProposal[], roster: AgentRoster): FollowUpProposal[] {
  const winners = new Map<string, FollowUpProposal>();

  for (const proposal of proposals) {
    const targetId = proposal.directive.agent_id;
    if (targetId === proposal.proposer.id) continue;
    if (!roster.get(targetId)?.dispatchable) {
      logger.warn({ proposer: proposal.proposer.id, targetId }, 'Follow-up targets an agent that cannot be dispatched');
      continue;
    }

    const current = winners.get(targetId);
    if (!current || roster.compareSpecificity(proposal.proposer, current.proposer) < 0) {
      winners.set(targetId, proposal);
    }
  }

  return Array.from(winners.values());
}

export function briefingInstruction(cycleId: string): string {
  return [
    `Compile the daily briefing for ${cycleId} from the work summarised in the additional context.`,
    'Lead with critical items that need action, then key findings and cross-domain connections.',
    'To assign follow-up work, add a ```dispatch block containing a JSON array of',
    '{"agent_id": "...", "task": "...", "priority": "high|medium|low"} objects.',
  ].join('\n');
}

/**
 * Digest handed to the chief of staff: the cycle's successful work and every
 * scheduled failure not yet reported. Also the briefing body when the chief
 * of staff fails.
 */
export function cycleDigest(
  cycleRuns: readonly CycleRun[],
  failures: readonly FailedRunSummary[],
  roster: AgentRoster,
): string {
  const completed = cycleRuns
    .filter(({ run }) => run.status === 'succeeded')
    .map(({ run }) => `- ${nameOf(roster, run.agentId)}: ${condense(stripDispatchBlocks(run.result ?? ''), 400)}`);
  const failed = failures.map((failure) => `- ${nameOf(roster, failure.agentId)}: ${describeError(failure.error)}`);

  return [
    '## Work completed this cycle',
    ...(completed.length > 0 ? completed : ['- none']),
    '',
    '## Failures not yet reported',
    ...(failed.length > 0 ? failed : ['- none']),
  ].join('\n');
}

export interface BriefingInput {
  cycleId: string;
  /** Terminal run of the chief of staff on the briefing task */
  run: Run | undefined;
  digest: string;
  failures: readonly FailedRunSummary[];
}

/**
 * The posted briefing. Always carries the failure summary, whether or not the
 * chief of staff produced a body.
 */
export function composeBriefing(input: BriefingInput, roster: AgentRoster): string {
  const body =
    input.run?.status === 'succeeded' && input.run.result
      ? stripDispatchBlocks(input.run.result)
      : `_The chief of staff could not compile this briefing (${describeError(input.run?.error)})._\n\n${input.digest}`;

  const failureLines = input.failures.map(
    (failure) =>
      `- ${nameOf(roster, failure.agentId)}: ${condense(failure.instruction, 80)} (${describeError(failure.error)})`,
  );

  return [
    `# Daily Briefing: ${input.cycleId}`,
    body,
    ['## Failures', ...(failureLines.length > 0 ? failureLines : ['None.'])].join('\n'),
  ].join('\n\n');
}
