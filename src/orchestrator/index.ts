/**
 * Agent System
 *
 * Owns the agent registry, the task scheduler and the message bus, and runs
 * the coordination loop: every tick idle agents are offered at most one
 * eligible task each, then running tasks past their timeout are failed.
 * Agents report progress as messages that are relayed over the bus and
 * applied to the scheduler by the coordinator's subscription.
 */

import { z } from 'zod';
import { Agent } from '../agents/agent';
import {
  DEFAULT_SYSTEM_CONFIG,
  SystemConfig,
  loadEnvFile,
  loadSystemConfig,
} from '../config/systemConfig';
import { Message } from '../models/message';
import { Task } from '../models/task';
import { AgentCommunicationService } from '../services/agentCommunicationService';
import { AgentManagerService } from '../services/agentManagerService';
import { TaskScheduler } from '../services/taskScheduler';
import type { SystemStatus } from '../types/agentTypes';
import type { MessageType } from '../types/messageTypes';
import type { TaskInit } from '../types/taskTypes';
import { delay } from '../utils/delay';
import { DuplicateRegistrationError } from '../utils/errors';
import logger from '../utils/logger';
import { MessageBus, MessageHandler } from '../utils/messageBus';
import { MetricsRecorder } from '../utils/metrics';

export const TASK_TIMEOUT_ERROR = 'Task timeout exceeded';

const taskOutcomeSchema = z.object({
  task_id: z.string(),
  success: z.boolean(),
  result: z.unknown().optional(),
  error: z.string().optional(),
});

const taskStatusSchema = z.object({
  task_id: z.string(),
  status: z.string(),
});

export class AgentSystem {
  readonly config: SystemConfig;
  readonly messageBus: MessageBus;
  readonly scheduler: TaskScheduler;
  readonly agentManager: AgentManagerService;
  readonly communication: AgentCommunicationService;
  readonly metrics = new MetricsRecorder();

  // Tasks handed to an agent and not yet reclassified as terminal
  private readonly assigned = new Map<string, Task>();
  private readonly agentSubscriptions = new Map<string, MessageHandler>();
  private abortController: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private assignmentOffset = 0;

  constructor(config: Partial<SystemConfig> = {}) {
    this.config = { ...DEFAULT_SYSTEM_CONFIG, ...config };
    this.messageBus = new MessageBus({
      maxHistory: this.config.maxHistory,
      pollWaitMs: this.config.busPollWaitMs,
    });
    this.scheduler = new TaskScheduler();
    this.agentManager = new AgentManagerService();
    this.communication = new AgentCommunicationService(this.messageBus);
  }

  /**
   * Build a system from a .env file and AGENTIC_* environment variables
   */
  static fromEnv(envPath?: string): AgentSystem {
    loadEnvFile(envPath);
    return new AgentSystem(loadSystemConfig());
  }

  get name(): string {
    return this.config.systemName;
  }

  get isRunning(): boolean {
    return this.abortController !== null;
  }

  start(): void {
    if (this.abortController) return;

    const controller = new AbortController();
    this.abortController = controller;

    this.messageBus.start();
    this.messageBus.subscribe(this.name, this.handleCoordinationMessage);
    for (const agent of this.agentManager.listAgents()) {
      agent.start();
      this.subscribeAgent(agent);
    }

    this.loop = this.coordinationLoop(controller.signal);
    logger.info('Agent system started', {
      system: this.name,
      agents: this.agentManager.size,
      intervalMs: this.config.coordinationIntervalMs,
    });
  }

  /**
   * Cooperative shutdown: loops exit at their next iteration boundary and
   * in-flight executions are left to finish.
   */
  async stop(): Promise<void> {
    const controller = this.abortController;
    if (!controller) return;

    controller.abort();
    await this.loop;
    this.abortController = null;
    this.loop = null;

    for (const agent of this.agentManager.listAgents()) {
      this.unsubscribeAgent(agent.name);
      await agent.stop();
    }
    this.messageBus.unsubscribe(this.name, this.handleCoordinationMessage);
    await this.messageBus.stop();
    logger.info('Agent system stopped', { system: this.name });
  }

  registerAgent(agent: Agent): void {
    if (agent.name === this.name) {
      throw new DuplicateRegistrationError('agent', agent.name);
    }

    this.agentManager.register(agent);
    agent.bindCoordinator({
      name: this.name,
      handler: this.handleAgentMessage,
      pollIntervalMs: this.config.agentPollIntervalMs,
      intakeWaitMs: this.config.agentIntakeWaitMs,
    });

    if (this.isRunning) {
      agent.start();
      this.subscribeAgent(agent);
    }
  }

  async unregisterAgent(name: string): Promise<boolean> {
    const agent = this.agentManager.unregister(name);
    if (!agent) {
      return false;
    }

    this.unsubscribeAgent(name);
    await agent.stop();
    return true;
  }

  submitTask(input: Task | TaskInit): string {
    const task = input instanceof Task ? input : new Task(input);
    if (this.scheduler.has(task.id) || this.assigned.has(task.id)) {
      throw new DuplicateRegistrationError('task', task.id);
    }

    this.scheduler.add(task);
    this.metrics.increment('tasks_submitted', { priority: task.priority });
    logger.info('Task submitted', {
      taskId: task.id,
      priority: task.priority,
      requiredCapabilities: [...task.requiredCapabilities],
      dependencies: task.dependencies,
    });
    return task.id;
  }

  getTask(taskId: string): Task | undefined {
    return this.scheduler.getTask(taskId) ?? this.assigned.get(taskId);
  }

  /**
   * Poll for a terminal task until the wait budget runs out. Resolves null
   * when the outcome is still unknown; the task itself is unaffected.
   */
  async getTaskResult(
    taskId: string,
    timeoutMs: number = this.config.resultTimeoutMs,
  ): Promise<Task | null> {
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const task =
        this.scheduler.getCompletedTask(taskId) ??
        this.scheduler.getFailedTask(taskId) ??
        this.cancelledTask(taskId);
      if (task) {
        return task;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return null;
      }
      await delay(Math.min(this.config.resultPollIntervalMs, remaining));
    }
  }

  /**
   * Cancel a task that has not reached a terminal state. A task waiting in
   * an agent's intake queue is withdrawn; a running execution is left to
   * finish but its outcome is discarded.
   */
  cancelTask(taskId: string): boolean {
    let task = this.scheduler.cancel(taskId);

    if (!task) {
      const handed = this.assigned.get(taskId);
      if (handed?.cancel()) {
        if (handed.assignedAgent) {
          this.agentManager.getAgent(handed.assignedAgent)?.withdraw(taskId);
        }
        this.scheduler.update(handed);
        task = handed;
      }
    }

    if (!task) {
      return false;
    }

    this.assigned.delete(taskId);
    this.metrics.increment('tasks_cancelled');
    logger.info('Task cancelled', { taskId, agent: task.assignedAgent });
    return true;
  }

  /**
   * One coordination tick: assignment pass, then timeout pass.
   */
  runCycle(now: Date = new Date()): void {
    this.assignPendingTasks();
    this.checkTaskTimeouts(now);
  }

  /**
   * Every message an agent emits is re-published on the bus.
   */
  readonly handleAgentMessage = (message: Message): void => {
    this.messageBus.send(message);
  };

  getSystemStatus(): SystemStatus {
    const agents: SystemStatus['agents'] = {};
    for (const agent of this.agentManager.listAgents()) {
      agents[agent.name] = agent.getStatus();
    }

    return {
      name: this.name,
      running: this.isRunning,
      agents,
      tasks: this.scheduler.getStats(),
      messageBus: this.messageBus.getStats(),
      metrics: this.metrics.snapshot(),
    };
  }

  findAgentsByCapability(capability: string): string[] {
    return this.agentManager
      .findByCapability(capability)
      .map((agent) => agent.name);
  }

  /**
   * Send a message to every registered agent except the sender
   */
  broadcastMessage(
    sender: string,
    type: MessageType,
    content: unknown,
  ): Message[] {
    return this.agentManager
      .listAgents()
      .filter((agent) => agent.name !== sender)
      .map((agent) =>
        this.communication.sendMessage(sender, agent.name, type, content),
      );
  }

  private async coordinationLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        this.runCycle();
      } catch (error) {
        this.metrics.increment('coordination_errors');
        logger.error('Error in coordination loop', { error });
      }
      await delay(this.config.coordinationIntervalMs, signal);
    }
  }

  private assignPendingTasks(): void {
    for (const agent of this.idleAgentsForTick()) {
      const task = this.scheduler.next(agent.getCapabilityNames());
      if (!task) {
        continue;
      }

      task.assignedAgent = agent.name;
      if (agent.assign(task)) {
        this.assigned.set(task.id, task);
        this.scheduler.update(task);
        this.metrics.increment('tasks_assigned', { agent: agent.name });
        logger.info('Task assigned', {
          taskId: task.id,
          agent: agent.name,
          status: task.status,
        });
      } else {
        // Agent changed state since the snapshot; retry next tick
        task.assignedAgent = undefined;
        this.scheduler.add(task);
        this.metrics.increment('assignments_refused', { agent: agent.name });
        logger.warn('Assignment refused, task returned to scheduler', {
          taskId: task.id,
          agent: agent.name,
        });
      }
    }
  }

  private idleAgentsForTick(): Agent[] {
    const agents = this.agentManager.listAgents();
    if (this.config.assignmentOrder === 'round-robin' && agents.length > 0) {
      const start = this.assignmentOffset % agents.length;
      this.assignmentOffset = (start + 1) % agents.length;
      return [...agents.slice(start), ...agents.slice(0, start)].filter(
        (agent) => agent.status === 'idle',
      );
    }
    return this.agentManager.getIdleAgents();
  }

  private checkTaskTimeouts(now: Date): void {
    for (const task of this.scheduler.getRunningTasks()) {
      if (task.isExpired(now) && task.fail(TASK_TIMEOUT_ERROR, now)) {
        this.scheduler.update(task);
        this.assigned.delete(task.id);
        this.metrics.increment('tasks_timed_out');
        logger.warn('Task timeout exceeded', {
          taskId: task.id,
          agent: task.assignedAgent,
          timeoutMs: task.timeoutMs,
        });
      }
    }
  }

  private readonly handleCoordinationMessage = (message: Message): void => {
    switch (message.type) {
      case 'task_response':
        this.applyTaskOutcome(message);
        break;
      case 'status_update':
        this.applyStatusUpdate(message);
        break;
      default:
        logger.debug('Coordinator received message', {
          sender: message.sender,
          type: message.type,
        });
    }
  };

  private applyTaskOutcome(message: Message): void {
    const parsed = taskOutcomeSchema.safeParse(message.content);
    if (!parsed.success) {
      logger.warn('Ignoring malformed task response', {
        sender: message.sender,
        messageId: message.id,
      });
      return;
    }

    const outcome = parsed.data;
    const task =
      this.scheduler.getRunningTask(outcome.task_id) ??
      this.assigned.get(outcome.task_id);
    if (!task) {
      logger.debug('Task response for a task that is not running', {
        taskId: outcome.task_id,
        sender: message.sender,
      });
      return;
    }

    if (task.status === 'running') {
      if (outcome.success) {
        task.complete(outcome.result);
      } else {
        task.fail(outcome.error ?? 'Task failed');
      }
    }

    this.scheduler.update(task);
    if (task.isTerminal()) {
      this.assigned.delete(task.id);
      logger.info('Task finished', {
        taskId: task.id,
        status: task.status,
        agent: task.assignedAgent,
      });
    }
  }

  private applyStatusUpdate(message: Message): void {
    const parsed = taskStatusSchema.safeParse(message.content);
    if (!parsed.success) {
      // Agent-level status update, nothing to reclassify
      return;
    }

    const taskId = parsed.data.task_id;
    const task =
      this.agentManager.getAgent(message.sender)?.getCurrentTask(taskId) ??
      this.assigned.get(taskId);
    if (task?.status === 'running') {
      this.scheduler.update(task);
    }
  }

  private cancelledTask(taskId: string): Task | undefined {
    const task = this.scheduler.getTask(taskId);
    return task?.status === 'cancelled' ? task : undefined;
  }

  private subscribeAgent(agent: Agent): void {
    if (this.agentSubscriptions.has(agent.name)) return;

    const handler: MessageHandler = (message) => agent.receive(message);
    this.agentSubscriptions.set(agent.name, handler);
    this.messageBus.subscribe(agent.name, handler);
  }

  private unsubscribeAgent(name: string): void {
    const handler = this.agentSubscriptions.get(name);
    if (handler) {
      this.messageBus.unsubscribe(name, handler);
      this.agentSubscriptions.delete(name);
    }
  }
}
