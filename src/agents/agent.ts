/**
 * Agent
 *
 * Executes up to `maxConcurrentTasks` tasks at once through an injected
 * executor. Tasks assigned while the agent is at capacity wait in an
 * intake queue that a background loop polls as slots free up.
 */

import { DEFAULT_SYSTEM_CONFIG } from '../config/systemConfig';
import { Message } from '../models/message';
import type { Task } from '../models/task';
import type {
  AgentCapability,
  AgentMetrics,
  AgentStatus,
  AgentStatusSnapshot,
} from '../types/agentTypes';
import type { MessageType } from '../types/messageTypes';
import type { TaskOutcomeContent } from '../types/taskTypes';
import { AsyncQueue } from '../utils/asyncQueue';
import { delay } from '../utils/delay';
import { describeError } from '../utils/errors';
import logger from '../utils/logger';
import type { TaskExecutor } from './executors';

export type AgentMessageHandler = (message: Message) => void;
export type InboundMessageHandler = (message: Message) => void | Promise<void>;

export interface AgentOptions {
  name: string;
  executor: TaskExecutor;
  capabilities?: Iterable<string>;
  maxConcurrentTasks?: number;
  /** Receives every notification the agent emits */
  messageHandler?: AgentMessageHandler;
  /** Called for messages delivered to this agent over the bus */
  onMessage?: InboundMessageHandler;
  /** Recipient of task notifications */
  coordinatorName?: string;
  pollIntervalMs?: number;
  intakeWaitMs?: number;
}

export interface CoordinatorBinding {
  name: string;
  handler: AgentMessageHandler;
  pollIntervalMs: number;
  intakeWaitMs: number;
}

export class Agent {
  readonly name: string;
  readonly maxConcurrentTasks: number;

  private readonly executor: TaskExecutor;
  private readonly capabilities = new Map<string, AgentCapability>();
  private readonly currentTasks = new Map<string, Task>();
  private readonly completedTasks: Task[] = [];
  private readonly intake = new AsyncQueue<Task>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly metrics: AgentMetrics = {
    tasksCompleted: 0,
    tasksFailed: 0,
    totalExecutionTimeMs: 0,
    lastActivity: null,
  };
  private readonly onMessage?: InboundMessageHandler;
  private readonly explicitPollIntervalMs?: number;
  private readonly explicitIntakeWaitMs?: number;

  private _status: AgentStatus = 'idle';
  private messageHandler?: AgentMessageHandler;
  private coordinatorName: string;
  private pollIntervalMs: number;
  private intakeWaitMs: number;
  private abortController: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(options: AgentOptions) {
    if (
      options.maxConcurrentTasks !== undefined &&
      (!Number.isInteger(options.maxConcurrentTasks) ||
        options.maxConcurrentTasks < 1)
    ) {
      throw new RangeError(
        `maxConcurrentTasks must be a positive integer, got ${options.maxConcurrentTasks}`,
      );
    }

    this.name = options.name;
    this.executor = options.executor;
    this.maxConcurrentTasks = options.maxConcurrentTasks ?? 1;
    this.messageHandler = options.messageHandler;
    this.onMessage = options.onMessage;
    this.coordinatorName =
      options.coordinatorName ?? DEFAULT_SYSTEM_CONFIG.systemName;
    this.explicitPollIntervalMs = options.pollIntervalMs;
    this.explicitIntakeWaitMs = options.intakeWaitMs;
    this.pollIntervalMs =
      options.pollIntervalMs ?? DEFAULT_SYSTEM_CONFIG.agentPollIntervalMs;
    this.intakeWaitMs =
      options.intakeWaitMs ?? DEFAULT_SYSTEM_CONFIG.agentIntakeWaitMs;

    for (const capability of options.capabilities ?? []) {
      this.addCapability(capability);
    }
  }

  get status(): AgentStatus {
    return this._status;
  }

  get isRunning(): boolean {
    return this.abortController !== null;
  }

  addCapability(
    name: string,
    description = '',
    parameters: Record<string, unknown> = {},
  ): void {
    this.capabilities.set(name, { name, description, parameters });
  }

  hasCapability(name: string): boolean {
    return this.capabilities.has(name);
  }

  getCapabilityNames(): Set<string> {
    return new Set(this.capabilities.keys());
  }

  getCapabilities(): AgentCapability[] {
    return Array.from(this.capabilities.values());
  }

  setMessageHandler(handler: AgentMessageHandler | undefined): void {
    this.messageHandler = handler;
  }

  /**
   * Route notifications to a coordinator. Loop timings the agent was
   * constructed with take precedence over the coordinator's.
   */
  bindCoordinator(binding: CoordinatorBinding): void {
    this.coordinatorName = binding.name;
    this.messageHandler = binding.handler;
    this.pollIntervalMs = this.explicitPollIntervalMs ?? binding.pollIntervalMs;
    this.intakeWaitMs = this.explicitIntakeWaitMs ?? binding.intakeWaitMs;
  }

  start(): void {
    if (this.abortController) return;

    const controller = new AbortController();
    this.abortController = controller;
    this._status = this.currentTasks.size > 0 ? 'busy' : 'idle';
    this.loop = this.processTasks(controller.signal);
    logger.info('Agent started', {
      agent: this.name,
      capabilities: [...this.capabilities.keys()],
      maxConcurrentTasks: this.maxConcurrentTasks,
    });
  }

  /**
   * Stops taking new work. Executions already in progress run to completion.
   */
  async stop(): Promise<void> {
    this._status = 'offline';
    const controller = this.abortController;
    if (!controller) return;

    controller.abort();
    await this.loop;
    this.abortController = null;
    this.loop = null;
    logger.info('Agent stopped', {
      agent: this.name,
      inFlight: this.currentTasks.size,
      queued: this.intake.size,
    });
  }

  /**
   * Wait for every execution in progress to settle.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }

  canAccept(task: Task): boolean {
    if (this._status === 'offline') {
      return false;
    }
    return task.requiresOnly(this.getCapabilityNames());
  }

  /**
   * Accept a task: start it now if a slot is free, otherwise queue it.
   * Returns false when the agent is offline or lacks a required capability.
   */
  assign(task: Task): boolean {
    if (!this.canAccept(task)) {
      logger.debug('Task refused', {
        agent: this.name,
        taskId: task.id,
        status: this._status,
        required: [...task.requiredCapabilities],
      });
      return false;
    }

    if (task.status !== 'pending') {
      logger.warn('Refusing task that is not pending', {
        agent: this.name,
        taskId: task.id,
        status: task.status,
      });
      return false;
    }

    task.assignedAgent = this.name;

    if (this.currentTasks.size >= this.maxConcurrentTasks) {
      this.intake.put(task);
      logger.debug('Task queued', {
        agent: this.name,
        taskId: task.id,
        queued: this.intake.size,
      });
      return true;
    }

    this.beginExecution(task);
    return true;
  }

  /**
   * Take a queued (not yet started) task back out of the intake queue.
   */
  withdraw(taskId: string): Task | undefined {
    return this.intake.remove((task) => task.id === taskId);
  }

  getCurrentTask(taskId: string): Task | undefined {
    return this.currentTasks.get(taskId);
  }

  getCurrentTasks(): Task[] {
    return Array.from(this.currentTasks.values());
  }

  getQueuedTasks(): Task[] {
    return this.intake.toArray();
  }

  get load(): number {
    return this.currentTasks.size;
  }

  /**
   * Bus delivery entry point for messages addressed to this agent.
   */
  async receive(message: Message): Promise<void> {
    this.metrics.lastActivity = new Date();
    if (this.onMessage) {
      await this.onMessage(message);
    }
  }

  sendMessage(recipient: string, type: MessageType, content: unknown): Message {
    const message = new Message({
      sender: this.name,
      recipient,
      type,
      content,
    });
    this.dispatch(message);
    return message;
  }

  getStatus(): AgentStatusSnapshot {
    return {
      name: this.name,
      status: this._status,
      capabilities: [...this.capabilities.keys()],
      maxConcurrentTasks: this.maxConcurrentTasks,
      currentTasks: this.currentTasks.size,
      queuedTasks: this.intake.size,
      completedTasks: this.completedTasks.length,
      metrics: {
        tasksCompleted: this.metrics.tasksCompleted,
        tasksFailed: this.metrics.tasksFailed,
        totalExecutionTimeMs: this.metrics.totalExecutionTimeMs,
        lastActivity: this.metrics.lastActivity?.toISOString() ?? null,
      },
    };
  }

  private async processTasks(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        if (this.currentTasks.size < this.maxConcurrentTasks) {
          const task = await this.intake.get(this.intakeWaitMs, signal);
          if (task) {
            this.startQueued(task);
          }
        }
      } catch (error) {
        logger.error('Error in agent intake loop', { agent: this.name, error });
        this._status = 'error';
      }
      await delay(this.pollIntervalMs, signal);
    }
  }

  private startQueued(task: Task): void {
    // A direct assignment may have taken the slot while we were waiting
    if (this.currentTasks.size >= this.maxConcurrentTasks) {
      this.intake.requeue(task);
      return;
    }
    if (task.status !== 'pending') {
      logger.info('Skipping queued task that is no longer pending', {
        agent: this.name,
        taskId: task.id,
        status: task.status,
      });
      return;
    }
    this.beginExecution(task);
  }

  private beginExecution(task: Task): void {
    if (!task.markRunning()) {
      logger.warn('Task could not be started', {
        agent: this.name,
        taskId: task.id,
        status: task.status,
      });
      return;
    }

    this.currentTasks.set(task.id, task);
    if (this._status === 'idle') {
      this._status = 'busy';
    }
    this.metrics.lastActivity = new Date();
    logger.debug('Task started', { agent: this.name, taskId: task.id });
    this.sendMessage(this.coordinatorName, 'status_update', {
      task_id: task.id,
      status: 'running',
    });

    const run: Promise<void> = this.runTask(task).finally(() => {
      this.inFlight.delete(run);
    });
    this.inFlight.add(run);
  }

  private async runTask(task: Task): Promise<void> {
    const startedAt = Date.now();
    let settled = false;

    try {
      const result = await this.executor.execute(task);
      settled = task.complete(result);
      if (settled) {
        this.metrics.tasksCompleted++;
        this.completedTasks.push(task);
      }
    } catch (error) {
      settled = task.fail(describeError(error));
      if (settled) {
        this.metrics.tasksFailed++;
        if (this._status !== 'offline') {
          this._status = 'error';
        }
        logger.warn('Task failed', {
          agent: this.name,
          taskId: task.id,
          error: task.error,
        });
      }
    } finally {
      this.metrics.totalExecutionTimeMs += Date.now() - startedAt;
      this.metrics.lastActivity = new Date();
      this.currentTasks.delete(task.id);
      if (this.currentTasks.size === 0 && this._status !== 'offline') {
        this._status = 'idle';
      }
    }

    if (!settled) {
      logger.warn('Task outcome discarded; task was already settled', {
        agent: this.name,
        taskId: task.id,
        status: task.status,
      });
    }

    const outcome: TaskOutcomeContent =
      task.status === 'completed'
        ? { task_id: task.id, success: true, result: task.result }
        : { task_id: task.id, success: false, error: task.error };
    this.sendMessage(this.coordinatorName, 'task_response', outcome);
  }

  private dispatch(message: Message): void {
    if (!this.messageHandler) return;
    try {
      this.messageHandler(message);
    } catch (error) {
      logger.error('Agent message handler failed', {
        agent: this.name,
        messageId: message.id,
        error,
      });
    }
  }
}
