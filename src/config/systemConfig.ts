/**
 * Centralized Agent System Configuration
 *
 * Intervals and capacities for the coordination loop, agent intake loops,
 * the message bus and result polling. Values can be overridden through
 * AGENTIC_* environment variables.
 */

import * as dotenv from 'dotenv';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from '../utils/errors';

export type AssignmentOrder = 'registration' | 'round-robin';

export interface SystemConfig {
  /** Name the coordinator subscribes under on the bus */
  systemName: string;
  coordinationIntervalMs: number;
  agentPollIntervalMs: number;
  agentIntakeWaitMs: number;
  busPollWaitMs: number;
  maxHistory: number;
  resultPollIntervalMs: number;
  resultTimeoutMs: number;
  /**
   * registration: idle agents are served in registration order every tick.
   * round-robin: the first agent served rotates by one each tick.
   */
  assignmentOrder: AssignmentOrder;
}

export const DEFAULT_SYSTEM_CONFIG: Readonly<SystemConfig> = {
  systemName: 'system',
  coordinationIntervalMs: 1000,
  agentPollIntervalMs: 10,
  agentIntakeWaitMs: 100,
  busPollWaitMs: 100,
  maxHistory: 1000,
  resultPollIntervalMs: 100,
  resultTimeoutMs: 30000,
  assignmentOrder: 'registration',
};

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  AGENTIC_SYSTEM_NAME: z.string().min(1).optional(),
  AGENTIC_COORDINATION_INTERVAL_MS: positiveInt.optional(),
  AGENTIC_AGENT_POLL_INTERVAL_MS: positiveInt.optional(),
  AGENTIC_AGENT_INTAKE_WAIT_MS: positiveInt.optional(),
  AGENTIC_BUS_POLL_WAIT_MS: positiveInt.optional(),
  AGENTIC_MAX_HISTORY: positiveInt.optional(),
  AGENTIC_RESULT_POLL_INTERVAL_MS: positiveInt.optional(),
  AGENTIC_RESULT_TIMEOUT_MS: positiveInt.optional(),
  AGENTIC_ASSIGNMENT_ORDER: z.enum(['registration', 'round-robin']).optional(),
});

/**
 * Build a config from environment variables, falling back to defaults.
 */
export function loadSystemConfig(
  env: NodeJS.ProcessEnv = process.env,
): SystemConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid agent system configuration: ${issues.join('; ')}`);
  }

  const vars = parsed.data;
  return {
    systemName: vars.AGENTIC_SYSTEM_NAME ?? DEFAULT_SYSTEM_CONFIG.systemName,
    coordinationIntervalMs:
      vars.AGENTIC_COORDINATION_INTERVAL_MS ??
      DEFAULT_SYSTEM_CONFIG.coordinationIntervalMs,
    agentPollIntervalMs:
      vars.AGENTIC_AGENT_POLL_INTERVAL_MS ??
      DEFAULT_SYSTEM_CONFIG.agentPollIntervalMs,
    agentIntakeWaitMs:
      vars.AGENTIC_AGENT_INTAKE_WAIT_MS ??
      DEFAULT_SYSTEM_CONFIG.agentIntakeWaitMs,
    busPollWaitMs:
      vars.AGENTIC_BUS_POLL_WAIT_MS ?? DEFAULT_SYSTEM_CONFIG.busPollWaitMs,
    maxHistory: vars.AGENTIC_MAX_HISTORY ?? DEFAULT_SYSTEM_CONFIG.maxHistory,
    resultPollIntervalMs:
      vars.AGENTIC_RESULT_POLL_INTERVAL_MS ??
      DEFAULT_SYSTEM_CONFIG.resultPollIntervalMs,
    resultTimeoutMs:
      vars.AGENTIC_RESULT_TIMEOUT_MS ?? DEFAULT_SYSTEM_CONFIG.resultTimeoutMs,
    assignmentOrder:
      vars.AGENTIC_ASSIGNMENT_ORDER ?? DEFAULT_SYSTEM_CONFIG.assignmentOrder,
  };
}

/**
 * Load a .env file into process.env. Existing variables win.
 */
export function loadEnvFile(
  envPath: string = path.resolve(process.cwd(), '.env'),
): void {
  dotenv.config({ path: envPath });
}
