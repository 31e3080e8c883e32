/**
 * Operator CLI
 *
 * Usage:
 *   npm run cli -- list
 *   npm run cli -- run <agent_id> "<task>" [--tier premium|standard|economy]
 *   npm run cli -- daily
 *   npm run cli -- trigger <agent_id> ["<task>"]
 *   npm run cli -- summary <agent_id>
 *   npm run cli -- compact
 */

import { once } from 'events';

import { ModelTier, createTask } from '@cadre/protocol';

import { createRuntime, type Runtime } from '../apps/cadred/src/bootstrap.js';

function parseArgs(argv: string[]) {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg) continue;
    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const value = argv[i + 1];
      if (value && !value.startsWith('--')) {
        flags.set(key, value);
        i++;
      } else {
        flags.set(key, 'true');
      }
    } else {
      positional.push(arg);
    }
  }
  return { positional, flags };
}

function requireArg(value: string | undefined, name: string): string {
  if (!value) {
    throw new Error(`Missing argument: ${name}`);
  }
  return value;
}

function printUsage(runtime: Runtime) {
  const usage = runtime.client.getUsageSummary();
  console.log(`\nLLM calls: ${usage.calls}, tokens: ${usage.totalTokens}, cost: $${usage.cost.toFixed(4)}`);
}

async function list(runtime: Runtime) {
  const { roster } = runtime.orchestrator;
  for (const agent of roster.list()) {
    const flags = [agent.scheduleClass, agent.modelTier, agent.dispatchable ? 'dispatchable' : 'internal'];
    console.log(`${agent.id.padEnd(20)} ${agent.name.padEnd(28)} ${flags.join(', ')}`);
  }
}

async function run(runtime: Runtime, agentId: string, instruction: string, tier: string | undefined) {
  const modelTier = tier === undefined ? undefined : ModelTier.parse(tier);
  const task = createTask({
    origin: { kind: 'human', channel: 'cli', author: process.env.USER ?? 'operator', receivedAt: new Date() },
    instruction,
    targetAgentIds: [agentId],
    hints: modelTier ? { modelTier } : undefined,
  });

  const outcome = await runtime.orchestrator.dispatcher.submit(task);
  if (!outcome.posted && outcome.reply) {
    console.log(outcome.reply);
  }
  printUsage(runtime);
}

async function daily(runtime: Runtime) {
  const { scheduler, dispatcher } = runtime.orchestrator;
  const briefed = once(scheduler, 'briefing_queued');
  const compacted = once(scheduler, 'compacted');

  const tasks = await scheduler.tick(new Date(), { force: true });
  console.log(`Queued ${tasks.length} scheduled task(s)`);

  await briefed;
  await dispatcher.drain();
  await compacted;
  printUsage(runtime);
}

async function trigger(runtime: Runtime, agentId: string, instruction: string | undefined) {
  runtime.orchestrator.scheduler.trigger(agentId, { instruction });
  await runtime.orchestrator.dispatcher.drain();
  printUsage(runtime);
}

async function summary(runtime: Runtime, agentId: string) {
  const { memory } = runtime.orchestrator;
  const current = await memory.getSummary(agentId);
  console.log(`# ${agentId}\n`);
  console.log(current?.text || '(no summary yet)');

  const recent = await memory.history(agentId, { limit: 5 });
  if (recent.length > 0) {
    console.log('\n## Recent entries');
    for (const entry of recent) {
      console.log(`- [${entry.timestamp.toISOString()}] ${entry.summary}`);
    }
  }
}

async function compact(runtime: Runtime) {
  const results = await runtime.orchestrator.memory.compactAll();
  for (const result of results) {
    const detail =
      result.status === 'compacted'
        ? `folded ${result.folded}`
        : result.status === 'failed'
          ? `failed: ${result.error.message}`
          : 'unchanged';
    console.log(`${result.agentId.padEnd(20)} ${detail}`);
  }
}

async function main() {
  const { positional, flags } = parseArgs(process.argv.slice(2));
  const [command, first, second] = positional;

  const runtime = await createRuntime();
  await runtime.orchestrator.init({ schedule: false, listen: false });

  try {
    switch (command) {
      case 'list':
        await list(runtime);
        break;
      case 'run':
        await run(runtime, requireArg(first, 'agent_id'), requireArg(second, 'task'), flags.get('tier'));
        break;
      case 'daily':
        await daily(runtime);
        break;
      case 'trigger':
        await trigger(runtime, requireArg(first, 'agent_id'), second);
        break;
      case 'summary':
        await summary(runtime, requireArg(first, 'agent_id'));
        break;
      case 'compact':
        await compact(runtime);
        break;
      default:
        console.log('Commands: list | run <agent_id> "<task>" | daily | trigger <agent_id> | summary <agent_id> | compact');
        process.exitCode = command ? 1 : 0;
    }
  } finally {
    await runtime.orchestrator.teardown();
    await runtime.close();
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
