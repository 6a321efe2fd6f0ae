/**
 * Task entity and lifecycle
 *
 * PENDING -> RUNNING -> COMPLETED | FAILED, with CANCELLED reachable from
 * PENDING or RUNNING. The first terminal write on a running task wins;
 * later writes are refused and leave the task untouched.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import {
  PRIORITY_RANK,
  TERMINAL_STATUSES,
  TaskInit,
  TaskParameters,
  TaskPriority,
  TaskRecord,
  TaskStatus,
} from '../types/taskTypes';
import { ValidationError } from '../utils/errors';

const isoDate = z.string().datetime({ offset: true });

const taskRecordSchema = z.object({
  id: z.string().min(1),
  description: z.string(),
  requiredCapabilities: z.array(z.string()).default([]),
  priority: z.enum(['low', 'medium', 'high', 'critical']).default('medium'),
  parameters: z.record(z.unknown()).default({}),
  timeoutMs: z.number().nonnegative().nullable().default(null),
  dependencies: z.array(z.string()).default([]),
  status: z
    .enum(['pending', 'running', 'completed', 'failed', 'cancelled'])
    .default('pending'),
  assignedAgent: z.string().nullable().default(null),
  createdAt: isoDate,
  startedAt: isoDate.nullable().default(null),
  completedAt: isoDate.nullable().default(null),
  result: z.unknown(),
  error: z.string().nullable().default(null),
});

export class Task {
  readonly id: string;
  readonly description: string;
  readonly requiredCapabilities: ReadonlySet<string>;
  readonly priority: TaskPriority;
  readonly parameters: TaskParameters;
  readonly timeoutMs?: number;
  readonly dependencies: readonly string[];
  readonly createdAt: Date;

  assignedAgent?: string;
  private _status: TaskStatus = 'pending';
  private _startedAt?: Date;
  private _completedAt?: Date;
  private _result?: unknown;
  private _error?: string;

  constructor(init: TaskInit) {
    this.id = init.id ?? randomUUID();
    this.description = init.description;
    this.requiredCapabilities = new Set(init.requiredCapabilities ?? []);
    this.priority = init.priority ?? 'medium';
    this.parameters = { ...(init.parameters ?? {}) };
    this.timeoutMs = init.timeoutMs;
    this.dependencies = [...(init.dependencies ?? [])];
    this.createdAt = init.createdAt ?? new Date();
  }

  get status(): TaskStatus {
    return this._status;
  }

  get startedAt(): Date | undefined {
    return this._startedAt;
  }

  get completedAt(): Date | undefined {
    return this._completedAt;
  }

  get result(): unknown {
    return this._result;
  }

  get error(): string | undefined {
    return this._error;
  }

  get priorityRank(): number {
    return PRIORITY_RANK[this.priority];
  }

  /**
   * True once every dependency id is in the completed set.
   */
  canStart(completedTaskIds: ReadonlySet<string>): boolean {
    return this.dependencies.every((depId) => completedTaskIds.has(depId));
  }

  /**
   * Measured from start time; a task that never started cannot expire.
   */
  isExpired(now: Date = new Date()): boolean {
    if (this.timeoutMs === undefined || !this._startedAt) {
      return false;
    }
    return now.getTime() - this._startedAt.getTime() > this.timeoutMs;
  }

  isTerminal(): boolean {
    return TERMINAL_STATUSES.has(this._status);
  }

  requiresOnly(capabilities: ReadonlySet<string>): boolean {
    for (const capability of this.requiredCapabilities) {
      if (!capabilities.has(capability)) return false;
    }
    return true;
  }

  markRunning(now: Date = new Date()): boolean {
    if (this._status !== 'pending') return false;
    this._status = 'running';
    this._startedAt = now;
    return true;
  }

  complete(result: unknown, now: Date = new Date()): boolean {
    if (this._status !== 'running') return false;
    this._status = 'completed';
    this._result = result;
    this._completedAt = now;
    return true;
  }

  fail(error: string, now: Date = new Date()): boolean {
    if (this._status !== 'running') return false;
    this._status = 'failed';
    this._error = error;
    this._completedAt = now;
    return true;
  }

  cancel(now: Date = new Date()): boolean {
    if (this._status !== 'pending' && this._status !== 'running') return false;
    this._status = 'cancelled';
    this._completedAt = now;
    return true;
  }

  toRecord(): TaskRecord {
    return {
      id: this.id,
      description: this.description,
      requiredCapabilities: [...this.requiredCapabilities],
      priority: this.priority,
      parameters: { ...this.parameters },
      timeoutMs: this.timeoutMs ?? null,
      dependencies: [...this.dependencies],
      status: this._status,
      assignedAgent: this.assignedAgent ?? null,
      createdAt: this.createdAt.toISOString(),
      startedAt: this._startedAt?.toISOString() ?? null,
      completedAt: this._completedAt?.toISOString() ?? null,
      result: this._result ?? null,
      error: this._error ?? null,
    };
  }

  static fromRecord(input: unknown): Task {
    const parsed = taskRecordSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid task record',
        parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      );
    }

    const record = parsed.data;
    const task = new Task({
      id: record.id,
      description: record.description,
      requiredCapabilities: record.requiredCapabilities,
      priority: record.priority,
      parameters: record.parameters,
      timeoutMs: record.timeoutMs ?? undefined,
      dependencies: record.dependencies,
      createdAt: new Date(record.createdAt),
    });
    task.assignedAgent = record.assignedAgent ?? undefined;
    task._status = record.status;
    task._startedAt = record.startedAt ? new Date(record.startedAt) : undefined;
    task._completedAt = record.completedAt
      ? new Date(record.completedAt)
      : undefined;
    task._result = record.result ?? undefined;
    task._error = record.error ?? undefined;
    return task;
  }
}
