/**
 * @module domains/agent/tools
 *
 * External tool execution for agents.
 */

// Types
export * from './types';

export { ToolGateway } from './ToolGateway';
export { normalizeToolArgs } from './normalizeToolArgs';
