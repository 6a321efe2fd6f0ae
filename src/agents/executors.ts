/**
 * Task execution contract
 *
 * Agents never decide what a task does; they delegate to an injected
 * executor and only govern when and how often it runs.
 */

import type { Task } from '../models/task';

export interface TaskExecutor {
  /** Resolve with the task's result, or reject to fail it */
  execute(task: Task): Promise<unknown>;
}

export type TaskHandler = (task: Task) => unknown;

export function executorFromFunction(handler: TaskHandler): TaskExecutor {
  return {
    async execute(task: Task): Promise<unknown> {
      return await handler(task);
    },
  };
}

/**
 * Dispatches on the first required capability (in declaration order) that
 * has a handler, falling back when none does.
 */
export function createCapabilityExecutor(
  handlers: Record<string, TaskHandler>,
  fallback?: TaskHandler,
): TaskExecutor {
  const table = new Map(Object.entries(handlers));

  return {
    async execute(task: Task): Promise<unknown> {
      for (const capability of task.requiredCapabilities) {
        const handler = table.get(capability);
        if (handler) {
          return await handler(task);
        }
      }

      if (fallback) {
        return await fallback(task);
      }

      throw new Error(
        `No handler for capabilities [${[...task.requiredCapabilities].join(', ')}]`,
      );
    },
  };
}
