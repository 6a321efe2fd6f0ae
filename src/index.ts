/**
 * Agent orchestration engine
 *
 * Matches tasks to agents by capability, priority and dependencies and
 * relays status notifications over an in-process message bus.
 */

export { AgentSystem, TASK_TIMEOUT_ERROR } from './orchestrator';
export { Agent } from './agents/agent';
export type {
  AgentMessageHandler,
  AgentOptions,
  CoordinatorBinding,
  InboundMessageHandler,
} from './agents/agent';
export {
  createCapabilityExecutor,
  executorFromFunction,
} from './agents/executors';
export type { TaskExecutor, TaskHandler } from './agents/executors';
export { Task } from './models/task';
export { Message } from './models/message';
export { TaskScheduler } from './services/taskScheduler';
export { AgentManagerService } from './services/agentManagerService';
export { AgentCommunicationService } from './services/agentCommunicationService';
export type { RoutingRule } from './services/agentCommunicationService';
export { MessageBus } from './utils/messageBus';
export type {
  DeliveryFailure,
  MessageBusOptions,
  MessageHandler,
} from './utils/messageBus';
export { AsyncQueue } from './utils/asyncQueue';
export { MetricsRecorder } from './utils/metrics';
export {
  AppError,
  ConfigError,
  DuplicateRegistrationError,
  ValidationError,
  describeError,
} from './utils/errors';
export {
  DEFAULT_SYSTEM_CONFIG,
  loadEnvFile,
  loadSystemConfig,
} from './config/systemConfig';
export type { AssignmentOrder, SystemConfig } from './config/systemConfig';
export { default as logger } from './utils/logger';
export * from './types/agentTypes';
export * from './types/messageTypes';
export * from './types/taskTypes';
