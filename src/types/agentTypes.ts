/**
 * Type definitions for agents and the agent system
 */

import type { MessageBusStats } from './messageTypes';
import type { SchedulerStats } from './taskTypes';

export type AgentStatus = 'idle' | 'busy' | 'error' | 'offline';

export interface AgentCapability {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface AgentMetrics {
  tasksCompleted: number;
  tasksFailed: number;
  totalExecutionTimeMs: number;
  lastActivity: Date | null;
}

export interface AgentStatusSnapshot {
  name: string;
  status: AgentStatus;
  capabilities: string[];
  maxConcurrentTasks: number;
  currentTasks: number;
  queuedTasks: number;
  completedTasks: number;
  metrics: {
    tasksCompleted: number;
    tasksFailed: number;
    totalExecutionTimeMs: number;
    lastActivity: string | null;
  };
}

export interface SystemStatus {
  name: string;
  running: boolean;
  agents: Record<string, AgentStatusSnapshot>;
  tasks: SchedulerStats;
  messageBus: MessageBusStats;
  metrics: Record<string, number>;
}
