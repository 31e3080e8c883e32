import { InMemoryMemoryStore, InMemoryRunLedger, InMemoryScheduleStore } from '@cadre/core';
import type { MemoryStore, RunLedger, ScheduleStore } from '@cadre/core';
import { LLMClient, LocalDocumentStore } from '@cadre/agents';

import { config, type AppConfig } from './config.js';
import { logger } from './logger.js';
import { loadRoster, loadSharedContext } from './roster.js';
import { OrchestratorState } from './services/orchestrator.js';
import { ConsoleTransport } from './transports/console.js';
import type { ChatTransport } from './transports/types.js';

export interface Backend {
  memoryStore: MemoryStore;
  ledger: RunLedger;
  scheduleStore: ScheduleStore;
  close(): Promise<void>;
}

export interface Runtime {
  orchestrator: OrchestratorState;
  client: LLMClient;
  close(): Promise<void>;
}

export interface RuntimeOptions {
  transport?: ChatTransport;
  config?: AppConfig;
}

/**
 * Storage for memory, the run ledger and the schedule table. The Postgres
 * client is only loaded when that backend is selected.
 */
export async function createBackend(settings: Pick<AppConfig, 'memoryBackend' | 'databaseUrl'>): Promise<Backend> {
  if (settings.memoryBackend === 'memory') {
    logger.warn('Using in-memory storage; nothing survives a restart');
    return {
      memoryStore: new InMemoryMemoryStore(),
      ledger: new InMemoryRunLedger(),
      scheduleStore: new InMemoryScheduleStore(),
      close: async () => undefined,
    };
  }

  const { connectDatabase } = await import('./db/index.js');
  const { PgMemoryStore, PgRunLedger, PgScheduleStore } = await import('./repositories/index.js');
  const handle = connectDatabase(settings.databaseUrl);

  return {
    memoryStore: new PgMemoryStore(handle.db),
    ledger: new PgRunLedger(handle.db),
    scheduleStore: new PgScheduleStore(handle.db),
    close: () => handle.close(),
  };
}

export async function createRuntime(options: RuntimeOptions = {}): Promise<Runtime> {
  const settings = options.config ?? config;

  const loaded = await loadRoster(settings.agentsConfigPath);
  const shared = await loadSharedContext(settings.contextDir);
  const backend = await createBackend(settings);

  if (!settings.llm.apiKey) {
    logger.warn({ provider: settings.llm.provider }, 'No LLM API key configured; every run will fail');
  }

  const client = new LLMClient({
    provider: settings.llm.provider,
    apiKey: settings.llm.apiKey,
    baseUrl: settings.llm.baseUrl,
    defaultModel: loaded.models.standard,
    timeoutMs: settings.llm.timeoutMs,
  });

  const orchestrator = new OrchestratorState({
    loaded,
    settings,
    memoryStore: backend.memoryStore,
    ledger: backend.ledger,
    scheduleStore: backend.scheduleStore,
    client,
    transport: options.transport ?? new ConsoleTransport(settings.chat.requestChannel),
    documents: new LocalDocumentStore(settings.documentsRoot),
    shared,
  });

  return {
    orchestrator,
    client,
    close: () => backend.close(),
  };
}
