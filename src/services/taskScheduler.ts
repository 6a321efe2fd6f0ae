/**
 * Task Scheduler
 * Holds unclaimed tasks in priority order and tracks running, completed,
 * failed and cancelled tasks by id.
 */

import type { Task } from '../models/task';
import type {
  SchedulerStats,
  TaskFilter,
  TaskStatus,
} from '../types/taskTypes';
import logger from '../utils/logger';

type Partition = 'running' | 'completed' | 'failed' | 'cancelled';

export class TaskScheduler {
  private pending: Task[] = [];
  private readonly partitions: Record<Partition, Map<string, Task>> = {
    running: new Map(),
    completed: new Map(),
    failed: new Map(),
    cancelled: new Map(),
  };

  /**
   * Queue a task and resort: priority descending, then oldest first.
   */
  add(task: Task): void {
    this.pending.push(task);
    this.sortQueue();
    logger.debug('Task queued for scheduling', {
      taskId: task.id,
      priority: task.priority,
      pending: this.pending.length,
    });
  }

  /**
   * Remove and return the first pending task whose dependencies have all
   * completed and whose required capabilities the caller offers.
   */
  next(capabilities: ReadonlySet<string>): Task | null {
    const completedIds = new Set(this.partitions.completed.keys());

    const index = this.pending.findIndex(
      (task) =>
        task.status === 'pending' &&
        task.canStart(completedIds) &&
        task.requiresOnly(capabilities),
    );
    if (index === -1) {
      return null;
    }

    const [task] = this.pending.splice(index, 1);
    return task;
  }

  /**
   * Reclassify a task into the partition matching its status.
   */
  update(task: Task): void {
    this.removeFromPartitions(task.id);

    const partition = this.partitionFor(task.status);
    if (partition) {
      this.partitions[partition].set(task.id, task);
    }
  }

  /**
   * Cancel a pending or running task. Returns the task when it was found
   * and moved to the cancelled partition.
   */
  cancel(taskId: string): Task | null {
    const index = this.pending.findIndex((task) => task.id === taskId);
    if (index !== -1) {
      const [task] = this.pending.splice(index, 1);
      if (task.cancel()) {
        this.update(task);
        return task;
      }
      this.pending.splice(index, 0, task);
      return null;
    }

    const running = this.partitions.running.get(taskId);
    if (running?.cancel()) {
      this.update(running);
      return running;
    }
    return null;
  }

  has(taskId: string): boolean {
    return this.getTask(taskId) !== undefined;
  }

  /**
   * Get task by ID from any collection the scheduler holds
   */
  getTask(taskId: string): Task | undefined {
    const pending = this.pending.find((task) => task.id === taskId);
    if (pending) return pending;

    for (const partition of Object.values(this.partitions)) {
      const task = partition.get(taskId);
      if (task) return task;
    }
    return undefined;
  }

  getPendingTasks(): Task[] {
    return [...this.pending];
  }

  getRunningTasks(): Task[] {
    return Array.from(this.partitions.running.values());
  }

  getRunningTask(taskId: string): Task | undefined {
    return this.partitions.running.get(taskId);
  }

  getCompletedTask(taskId: string): Task | undefined {
    return this.partitions.completed.get(taskId);
  }

  getFailedTask(taskId: string): Task | undefined {
    return this.partitions.failed.get(taskId);
  }

  getCompletedTaskIds(): Set<string> {
    return new Set(this.partitions.completed.keys());
  }

  /**
   * Get tasks by filter, pending first (in scheduling order), then the
   * running, completed, failed and cancelled partitions.
   */
  listTasks(filter: TaskFilter = {}): Task[] {
    const all = [
      ...this.pending,
      ...this.partitions.running.values(),
      ...this.partitions.completed.values(),
      ...this.partitions.failed.values(),
      ...this.partitions.cancelled.values(),
    ];

    const matching = all.filter(
      (task) =>
        (filter.status === undefined || task.status === filter.status) &&
        (filter.priority === undefined || task.priority === filter.priority) &&
        (filter.assignedAgent === undefined ||
          task.assignedAgent === filter.assignedAgent),
    );

    const offset = filter.offset ?? 0;
    return matching.slice(offset, offset + (filter.limit ?? 100));
  }

  /**
   * Get task statistics
   */
  getStats(): SchedulerStats {
    return {
      pendingTasks: this.pending.filter((task) => task.status === 'pending')
        .length,
      runningTasks: this.partitions.running.size,
      completedTasks: this.partitions.completed.size,
      failedTasks: this.partitions.failed.size,
      cancelledTasks: this.partitions.cancelled.size,
    };
  }

  private sortQueue(): void {
    // Array.prototype.sort is stable, so equal timestamps keep insertion order
    this.pending.sort((a, b) => {
      if (a.priorityRank !== b.priorityRank) {
        return b.priorityRank - a.priorityRank;
      }
      return a.createdAt.getTime() - b.createdAt.getTime();
    });
  }

  private partitionFor(status: TaskStatus): Partition | null {
    switch (status) {
      case 'running':
      case 'completed':
      case 'failed':
      case 'cancelled':
        return status;
      default:
        return null;
    }
  }

  private removeFromPartitions(taskId: string): void {
    for (const partition of Object.values(this.partitions)) {
      partition.delete(taskId);
    }
  }
}
