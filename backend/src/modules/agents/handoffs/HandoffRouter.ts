/**
 * Handoff Router
 *
 * Resolves a tool invocation of the active agent through that agent's
 * handler table. Tables are copied from the registry when the router is
 * built; route targets are checked then, so a bad edge fails at startup.
 *
 * @module modules/agents/handoffs/HandoffRouter
 */

import type { AgentId, ContextMap } from '@campus-desk/shared';
import type { AgentRegistry } from '@/modules/agents/core/registry/AgentRegistry';
import { createChildLogger, type Logger } from '@/shared/utils/logger';
import { UnauthorizedToolError } from '@/types/error.types';
import type { HandoffHandler, HandoffTransition, ToolSpec } from './handoff-handler';

export class HandoffRouter {
  private readonly tables = new Map<AgentId, ReadonlyMap<string, HandoffHandler>>();
  private readonly logger: Logger;

  /**
   * @throws UnknownAgentError if a handler routes to an unregistered agent
   */
  constructor(registry: AgentRegistry, logger?: Logger) {
    this.logger = logger ?? createChildLogger({ service: 'HandoffRouter' });

    for (const agent of registry.getAll()) {
      const { handlers } = registry.getWithTools(agent.id);
      for (const handler of handlers) {
        if (handler.routesTo) {
          registry.resolve(handler.routesTo);
        }
      }
      this.tables.set(agent.id, new Map(handlers.map(h => [h.name, h])));
    }

    this.logger.debug({ agents: this.tables.size }, 'Handoff router built');
  }

  hasTool(agentId: AgentId, toolName: string): boolean {
    return this.tables.get(agentId)?.has(toolName) ?? false;
  }

  /**
   * Resolve one invocation to a transition.
   *
   * @throws UnauthorizedToolError if the tool is not in the agent's table
   * @throws InvalidToolArgumentsError if the arguments fail the handler's schema
   */
  resolve(
    agentId: AgentId,
    toolName: string,
    args: Record<string, unknown>,
    context: Readonly<ContextMap>
  ): HandoffTransition {
    const handler = this.tables.get(agentId)?.get(toolName);
    if (!handler) {
      throw new UnauthorizedToolError(agentId, toolName);
    }
    return handler.resolve(args, context);
  }

  /**
   * Whether `from` declares a routing edge to `to`.
   */
  canRoute(from: AgentId, to: AgentId): boolean {
    const table = this.tables.get(from);
    if (!table) return false;
    return Array.from(table.values()).some(h => h.routesTo === to);
  }

  /**
   * Tool specs to advertise to the model, in table order.
   */
  getToolSpecs(agentId: AgentId): ToolSpec[] {
    const table = this.tables.get(agentId);
    if (!table) return [];
    return Array.from(table.values()).map(({ name, description, schema }) => ({ name, description, schema }));
  }
}
