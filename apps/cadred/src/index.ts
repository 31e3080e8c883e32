import { logger } from './logger.js';
import { createRuntime } from './bootstrap.js';

const runtime = await createRuntime();
let stopping = false;

async function shutdown(signal: string) {
  if (stopping) return;
  stopping = true;
  logger.info({ signal }, 'Shutting down...');

  try {
    const report = await runtime.orchestrator.teardown();
    logger.info(report, 'Shutdown complete');
  } finally {
    await runtime.close();
  }
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ error }, 'Shutdown failed');
      process.exitCode = 1;
    });
  });
}

try {
  await runtime.orchestrator.init();
  logger.info({ usage: 'Type a request, or "#channel text" to post to a channel' }, 'cadred running');
} catch (error) {
  logger.fatal({ error }, 'Failed to start');
  await runtime.close();
  process.exit(1);
}
