/**
 * Agent Registry
 *
 * Process-wide source of truth for agent descriptors and their handler
 * tables. Populated once at startup, then frozen; sessions only read it.
 *
 * @module modules/agents/core/registry/AgentRegistry
 */

import {
  isAgentId,
  type AgentId,
  type AgentSummary,
} from '@campus-desk/shared';
import { createChildLogger, type Logger } from '@/shared/utils/logger';
import {
  ConfigurationError,
  DuplicateAgentError,
  UnknownAgentError,
} from '@/types/error.types';
import type {
  AgentDefinition,
  AgentToolConfig,
  AgentWithTools,
} from './AgentDefinition';

/**
 * Centralized Agent Registry.
 *
 * Provides:
 * - Registration: register(), registerTools(), registerWithTools(), freeze()
 * - Queries: resolve(), get(), getWithTools(), getAll(), getSpecialists(), has(), size
 * - Routing: getRoutingEdges(), getDispatcher()
 * - Display: getSummaries()
 */
export class AgentRegistry {
  private agents = new Map<AgentId, AgentDefinition>();
  private toolConfigs = new Map<AgentId, AgentToolConfig>();
  private frozen = false;
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createChildLogger({ service: 'AgentRegistry' });
  }

  // ============================================
  // Registration
  // ============================================

  /**
   * Register an agent definition.
   * @throws DuplicateAgentError if an agent with the same ID is registered
   */
  register(definition: AgentDefinition): void {
    this.assertWritable();
    if (this.agents.has(definition.id)) {
      throw new DuplicateAgentError(definition.id);
    }
    this.agents.set(definition.id, Object.freeze({ ...definition }));
    this.logger.info({ agentId: definition.id, instructionOrigin: definition.instructionOrigin }, 'Agent registered');
  }

  /**
   * Register the handler table for an already-registered agent.
   * @throws UnknownAgentError if the agent is not registered
   */
  registerTools(agentId: AgentId, toolConfig: AgentToolConfig): void {
    this.assertWritable();
    if (!this.agents.has(agentId)) {
      throw new UnknownAgentError(agentId);
    }
    this.toolConfigs.set(agentId, { handlers: Object.freeze([...toolConfig.handlers]) });
    this.logger.info({ agentId, tools: toolConfig.handlers.map(h => h.name) }, 'Tools registered for agent');
  }

  /**
   * Register a definition and its handler table in a single call.
   * @throws DuplicateAgentError if an agent with the same ID is registered
   */
  registerWithTools(definition: AgentDefinition, toolConfig: AgentToolConfig): void {
    this.register(definition);
    this.registerTools(definition.id, toolConfig);
  }

  /**
   * Reject any further registration.
   */
  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  // ============================================
  // Queries
  // ============================================

  /**
   * Get agent definition by ID.
   * @throws UnknownAgentError if absent
   */
  resolve(agentId: string): AgentDefinition {
    const definition = this.findDefinition(agentId);
    if (!definition) {
      throw new UnknownAgentError(agentId);
    }
    return definition;
  }

  get(agentId: string): AgentDefinition | undefined {
    return this.findDefinition(agentId);
  }

  /**
   * Get agent with its handler table.
   * @throws UnknownAgentError if absent
   */
  getWithTools(agentId: string): AgentWithTools {
    const definition = this.resolve(agentId);
    const handlers = this.toolConfigs.get(definition.id)?.handlers ?? [];
    return { ...definition, handlers };
  }

  getAll(): AgentDefinition[] {
    return Array.from(this.agents.values());
  }

  getSpecialists(): AgentDefinition[] {
    return this.getAll().filter(a => a.role === 'specialist');
  }

  /**
   * The single dispatcher every session starts with.
   * @throws ConfigurationError unless exactly one dispatcher is registered
   */
  getDispatcher(): AgentDefinition {
    const dispatchers = this.getAll().filter(a => a.role === 'dispatcher');
    const [dispatcher] = dispatchers;
    if (dispatchers.length !== 1 || !dispatcher) {
      throw new ConfigurationError(`Expected exactly one dispatcher agent, found ${dispatchers.length}`);
    }
    return dispatcher;
  }

  has(agentId: string): boolean {
    return this.findDefinition(agentId) !== undefined;
  }

  get size(): number {
    return this.agents.size;
  }

  // ============================================
  // Routing
  // ============================================

  /**
   * Agents reachable from `agentId` through its route handlers.
   */
  getRoutingEdges(agentId: string): AgentId[] {
    const handlers = this.toolConfigs.get(this.resolve(agentId).id)?.handlers ?? [];
    return handlers.flatMap(h => (h.routesTo ? [h.routesTo] : []));
  }

  // ============================================
  // Display
  // ============================================

  getSummaries(): AgentSummary[] {
    return this.getAll().map(a => ({
      id: a.id,
      name: a.name,
      description: a.description,
      icon: a.icon,
      role: a.role,
      toolNames: (this.toolConfigs.get(a.id)?.handlers ?? []).map(h => h.name),
      externalToolScopes: [...a.externalToolScopes],
    }));
  }

  // ============================================
  // Reset (for testing)
  // ============================================

  /**
   * Clear all registrations and unfreeze. For testing only.
   */
  reset(): void {
    this.agents.clear();
    this.toolConfigs.clear();
    this.frozen = false;
  }

  private findDefinition(agentId: string): AgentDefinition | undefined {
    return isAgentId(agentId) ? this.agents.get(agentId) : undefined;
  }

  private assertWritable(): void {
    if (this.frozen) {
      throw new ConfigurationError('Agent registry is frozen; register agents before sessions start');
    }
  }
}

// ============================================
// Singleton
// ============================================

let instance: AgentRegistry | null = null;

/**
 * Get the singleton AgentRegistry instance.
 */
export function getAgentRegistry(): AgentRegistry {
  if (!instance) {
    instance = new AgentRegistry();
  }
  return instance;
}

/**
 * Reset the singleton (for testing).
 */
export function resetAgentRegistry(): void {
  if (instance) {
    instance.reset();
  }
  instance = null;
}
