/**
 * Agent Manager Service
 * Registry of the agents one agent system coordinates
 */

import type { Agent } from '../agents/agent';
import { DuplicateRegistrationError } from '../utils/errors';
import logger from '../utils/logger';

export class AgentManagerService {
  // Map iteration order is registration order
  private readonly agentRegistry: Map<string, Agent> = new Map();

  register(agent: Agent): void {
    if (this.agentRegistry.has(agent.name)) {
      throw new DuplicateRegistrationError('agent', agent.name);
    }

    this.agentRegistry.set(agent.name, agent);
    logger.info('Agent registered', {
      agent: agent.name,
      agentCount: this.agentRegistry.size,
    });
  }

  unregister(name: string): Agent | undefined {
    const agent = this.agentRegistry.get(name);
    if (!agent) {
      return undefined;
    }

    this.agentRegistry.delete(name);
    logger.info('Agent unregistered', {
      agent: name,
      agentCount: this.agentRegistry.size,
    });
    return agent;
  }

  /**
   * Get agent by name
   */
  getAgent(name: string): Agent | undefined {
    return this.agentRegistry.get(name);
  }

  /**
   * List all agents in registration order
   */
  listAgents(): Agent[] {
    return Array.from(this.agentRegistry.values());
  }

  /**
   * Snapshot of the agents currently idle, in registration order
   */
  getIdleAgents(): Agent[] {
    return this.listAgents().filter((agent) => agent.status === 'idle');
  }

  findByCapability(capability: string): Agent[] {
    return this.listAgents().filter((agent) => agent.hasCapability(capability));
  }

  get size(): number {
    return this.agentRegistry.size;
  }
}
