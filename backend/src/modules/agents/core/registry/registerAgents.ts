/**
 * Agent Registration Bootstrap
 *
 * Builds descriptors from the definition templates, attaches their handoff
 * handler tables and freezes the registry. Call once at startup, before any
 * session runs.
 *
 * @module modules/agents/core/registry/registerAgents
 */

import { AgentRegistry, getAgentRegistry } from './AgentRegistry';
import type { AgentDefinition, AgentDefinitionTemplate } from './AgentDefinition';
import { AGENT_DEFINITION_TEMPLATES } from '../definitions';
import { resolveInstructions, type InstructionSource } from '../instructions/instruction-source';
import { HANDOFF_HANDLERS } from '@/modules/agents/handoffs/handoff-handlers';
import { createChildLogger } from '@/shared/utils/logger';

const logger = createChildLogger({ service: 'RegisterAgents' });

/**
 * Resolve a template's instructions (override file first, built-in default
 * otherwise) into a full descriptor.
 */
export function buildAgentDefinition(
  template: AgentDefinitionTemplate,
  source?: InstructionSource
): AgentDefinition {
  const { defaultInstructions, ...rest } = template;
  const resolved = resolveInstructions(template.id, defaultInstructions, source);
  return {
    ...rest,
    externalToolScopes: [...template.externalToolScopes],
    instructions: resolved.text,
    instructionOrigin: resolved.origin,
  };
}

export interface RegisterAgentsOptions {
  registry?: AgentRegistry;
  instructionSource?: InstructionSource;
}

/**
 * Register the four agents and their handler tables, then freeze.
 * A registry that is already populated is returned unchanged.
 */
export function registerAgents(options: RegisterAgentsOptions = {}): AgentRegistry {
  const registry = options.registry ?? getAgentRegistry();

  // Skip if already registered (idempotent)
  if (registry.size > 0) {
    logger.info('Agent registry already populated, skipping registration');
    return registry;
  }

  for (const template of AGENT_DEFINITION_TEMPLATES) {
    registry.registerWithTools(buildAgentDefinition(template, options.instructionSource), {
      handlers: HANDOFF_HANDLERS[template.id],
    });
  }

  registry.freeze();

  logger.info({ agentCount: registry.size }, 'All agents registered successfully');
  return registry;
}
