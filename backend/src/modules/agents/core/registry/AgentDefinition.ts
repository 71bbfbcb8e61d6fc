/**
 * Agent Definition Types
 *
 * Backend-only types for full agent descriptors, including instruction text
 * and handler tables (neither is printed or serialized).
 *
 * @module modules/agents/core/registry/AgentDefinition
 */

import type { AgentId, AgentRole, ExternalToolName } from '@campus-desk/shared';
import type { HandoffHandler } from '@/modules/agents/handoffs/handoff-handler';
import type { InstructionOrigin } from '../instructions/instruction-source';

/** Full agent descriptor. Immutable once registered. */
export interface AgentDefinition {
  id: AgentId;
  name: string;
  description: string;
  icon: string;
  role: AgentRole;
  instructions: string;
  /** Whether the instructions came from an override file or the built-in default */
  instructionOrigin: InstructionOrigin;
  externalToolScopes: readonly ExternalToolName[];
  /** Tool calls of one turn may be resolved concurrently */
  parallelToolCalls: boolean;
}

/**
 * Static part of a definition; instructions are resolved when the
 * descriptor is built.
 */
export interface AgentDefinitionTemplate extends Omit<AgentDefinition, 'instructions' | 'instructionOrigin'> {
  defaultInstructions: string;
}

/** Tool configuration: the agent's handoff handler table, in order */
export interface AgentToolConfig {
  handlers: readonly HandoffHandler[];
}

/** Agent with resolved handlers */
export interface AgentWithTools extends AgentDefinition {
  handlers: readonly HandoffHandler[];
}
