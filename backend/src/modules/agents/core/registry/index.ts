/**
 * Agent Registry Index
 *
 * @module modules/agents/core/registry
 */

export { AgentRegistry, getAgentRegistry, resetAgentRegistry } from './AgentRegistry';
export { registerAgents, buildAgentDefinition, type RegisterAgentsOptions } from './registerAgents';
export type {
  AgentDefinition,
  AgentDefinitionTemplate,
  AgentToolConfig,
  AgentWithTools,
} from './AgentDefinition';
