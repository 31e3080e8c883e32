import type { Task, TaskPriority } from '@cadre/protocol';

const PRIORITY_ORDER: Record<TaskPriority, number> = {
  high: 0,
  medium: 1,
  low: 2,
};

/**
 * Rank used for both task dequeue order and run-slot admission.
 * Interactive (human) tasks always rank ahead of scheduled and agent-spawned work.
 */
export function taskRank(task: Pick<Task, 'origin' | 'priority'>): number {
  const originRank = task.origin.kind === 'human' ? 0 : 1;
  return originRank * 3 + PRIORITY_ORDER[task.priority];
}

interface QueuedTask {
  task: Task;
  rank: number;
  seq: number;
}

/**
 * In-process priority queue of tasks awaiting dispatch
 */
export class TaskQueue {
  private items: QueuedTask[] = [];
  private seq = 0;

  enqueue(task: Task): void {
    const item: QueuedTask = { task, rank: taskRank(task), seq: this.seq++ };
    const index = this.items.findIndex(
      (i) => i.rank > item.rank || (i.rank === item.rank && i.seq > item.seq),
    );
    if (index === -1) {
      this.items.push(item);
    } else {
      this.items.splice(index, 0, item);
    }
  }

  dequeue(): Task | undefined {
    return this.items.shift()?.task;
  }

  peek(): Task | undefined {
    return this.items[0]?.task;
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Remove and return everything still waiting
   */
  drain(): Task[] {
    const tasks = this.items.map((i) => i.task);
    this.items = [];
    return tasks;
  }
}
