import type { AgentDefinition } from '@cadre/protocol';
import {
  AgentRoster,
  BulletSummarizer,
  InMemoryMemoryStore,
  InMemoryRunLedger,
  InMemoryScheduleStore,
} from '@cadre/core';
import type { ModelTable } from '@cadre/agents';

import { OrchestratorState, type OrchestratorSettings } from '../../apps/cadred/src/services/orchestrator.js';
import { MemoryTransport } from './memory-transport.js';
import { ScriptedReasoningClient } from './scripted-client.js';

export const MODELS: ModelTable = {
  premium: 'model-premium',
  standard: 'model-standard',
  economy: 'model-economy',
};

export function agent(overrides: Partial<AgentDefinition> & Pick<AgentDefinition, 'id'>): AgentDefinition {
  return {
    name: overrides.id,
    capabilityTag: 'general',
    scheduleClass: 'always_on',
    modelTier: 'standard',
    systemPrompt: `You are ${overrides.id}.`,
    dependsOn: [],
    dispatchable: true,
    context: { sharedDocs: false, priorities: false, summariesFrom: [] },
    ...overrides,
  };
}

/**
 * chief_of_staff, two daily agents, one weekly, one event-triggered and a
 * dependent pair (competitive_intel waits for market_research).
 */
export function testAgents(): AgentDefinition[] {
  return [
    agent({ id: 'chief_of_staff', name: 'Chief of Staff', capabilityTag: 'orchestration', modelTier: 'premium' }),
    agent({ id: 'market_research', name: 'Market Research', capabilityTag: 'research.market', scheduleClass: 'daily' }),
    agent({
      id: 'competitive_intel',
      name: 'Competitive Intel',
      capabilityTag: 'research.market.competitive',
      dependsOn: ['market_research'],
    }),
    agent({ id: 'fundraising', name: 'Fundraising', capabilityTag: 'finance.fundraising', scheduleClass: 'weekly' }),
    agent({ id: 'brand_marketing', name: 'Brand Marketing', capabilityTag: 'marketing.brand', scheduleClass: 'event_triggered' }),
    agent({ id: 'technical_pm', name: 'Technical PM', capabilityTag: 'product', scheduleClass: 'daily' }),
  ];
}

export function testRoster(agents: AgentDefinition[] = testAgents()): AgentRoster {
  return new AgentRoster(agents, 'chief_of_staff');
}

export function testSettings(): OrchestratorSettings {
  return {
    timezone: undefined,
    schedule: { hour: 9, minute: 0, weekday: 1, tickCron: '*/5 * * * *' },
    limits: { maxConcurrentRuns: 4, maxActiveTasks: 8, shutdownGraceMs: 50 },
    retry: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 30_000 },
    memory: { contextBudgetChars: 6000, retainEntries: 5, summaryMaxChars: 3000 },
    chat: { requestChannel: 'requests', briefingChannel: 'briefings' },
  };
}

export interface HarnessOptions {
  client?: ScriptedReasoningClient;
  agents?: AgentDefinition[];
  now?: () => Date;
  settings?: OrchestratorSettings;
}

/**
 * A full orchestrator on in-memory stores, a scripted client and a recording transport.
 * Retry sleeps resolve immediately.
 */
export function createHarness(options: HarnessOptions = {}) {
  const client = options.client ?? new ScriptedReasoningClient();
  const transport = new MemoryTransport();
  const memoryStore = new InMemoryMemoryStore();
  const ledger = new InMemoryRunLedger();
  const scheduleStore = new InMemoryScheduleStore();
  const roster = testRoster(options.agents);

  const orchestrator = new OrchestratorState({
    loaded: { roster, models: MODELS, channelRoutes: { fundraising: 'fundraising' } },
    settings: options.settings ?? testSettings(),
    memoryStore,
    ledger,
    scheduleStore,
    client,
    transport,
    summarizer: new BulletSummarizer(),
    sleep: async () => undefined,
    now: options.now,
  });

  return {
    client,
    transport,
    memoryStore,
    ledger,
    scheduleStore,
    roster,
    orchestrator,
    dispatcher: orchestrator.dispatcher,
    scheduler: orchestrator.scheduler,
    memory: orchestrator.memory,
  };
}

export type Harness = ReturnType<typeof createHarness>;
