/**
 * Agents Core Module
 *
 * Re-exports from registry, definitions and instructions.
 *
 * @module modules/agents/core
 */

// Registry
export {
  AgentRegistry,
  getAgentRegistry,
  resetAgentRegistry,
  registerAgents,
  buildAgentDefinition,
} from './registry';
export type {
  AgentDefinition,
  AgentDefinitionTemplate,
  AgentToolConfig,
  AgentWithTools,
  RegisterAgentsOptions,
} from './registry';

// Definitions
export {
  AGENT_DEFINITION_TEMPLATES,
  triageDefinition,
  courseAdvisorDefinition,
  universityPoetDefinition,
  schedulingAssistantDefinition,
} from './definitions';

// Instructions
export {
  FileInstructionSource,
  resolveInstructions,
  instructionFileName,
  type InstructionSource,
  type InstructionOrigin,
  type ResolvedInstructions,
} from './instructions/instruction-source';
