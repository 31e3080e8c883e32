import { AsyncLocalStorage } from 'async_hooks';

export const taskStorage = new AsyncLocalStorage<string>();

export function getTaskId(): string | undefined {
  return taskStorage.getStore();
}

/**
 * Run `work` with `taskId` attached to every log line written inside it
 */
export function withTaskScope<T>(taskId: string, work: () => Promise<T>): Promise<T> {
  return taskStorage.run(taskId, work);
}
