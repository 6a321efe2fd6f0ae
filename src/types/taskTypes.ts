/**
 * Type definitions for Task Management
 */

export type TaskPriority = 'low' | 'medium' | 'high' | 'critical';
export type TaskStatus =
  | 'pending'
  | 'running'
  | 'completed'
  | 'failed'
  | 'cancelled';

// critical > high > medium > low
export const PRIORITY_RANK: Record<TaskPriority, number> = {
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};

export const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set<TaskStatus>([
  'completed',
  'failed',
  'cancelled',
]);

export interface TaskParameters {
  [key: string]: unknown;
}

export interface TaskInit {
  id?: string;
  description: string;
  requiredCapabilities?: Iterable<string>;
  priority?: TaskPriority;
  parameters?: TaskParameters;
  timeoutMs?: number;
  dependencies?: string[];
  createdAt?: Date;
}

/**
 * Flat, field-keyed form of a task used by persistence, transport and
 * display collaborators. Timestamps are ISO-8601 strings.
 */
export interface TaskRecord {
  id: string;
  description: string;
  requiredCapabilities: string[];
  priority: TaskPriority;
  parameters: TaskParameters;
  timeoutMs: number | null;
  dependencies: string[];
  status: TaskStatus;
  assignedAgent: string | null;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  result: unknown;
  error: string | null;
}

export interface TaskFilter {
  status?: TaskStatus;
  priority?: TaskPriority;
  assignedAgent?: string;
  limit?: number;
  offset?: number;
}

export interface SchedulerStats {
  pendingTasks: number;
  runningTasks: number;
  completedTasks: number;
  failedTasks: number;
  cancelledTasks: number;
}

/**
 * Content carried by a `task_response` message.
 */
export interface TaskOutcomeContent {
  task_id: string;
  success: boolean;
  result?: unknown;
  error?: string;
}
