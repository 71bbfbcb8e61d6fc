/**
 * @module domains/agent/tools/types
 *
 * Contracts for external (data) tools.
 */

import type { AgentId } from '@campus-desk/shared';
import type { StorageRow } from '@/modules/agents/handoffs/transition';
import type { ToolSpec } from '@/modules/agents/handoffs/handoff-handler';

export type { StorageRow };

/**
 * Storage collaborator behind the gateway.
 * Implementations fail with StorageUnavailableError.
 */
export interface IStorageCollaborator {
  query(sql: string): Promise<StorageRow[]>;
}

/**
 * Interface for the tool gateway.
 */
export interface IToolGateway {
  /** Whether `toolName` is an external tool the gateway serves */
  handles(toolName: string): boolean;
  getToolSpecs(agentId: AgentId): ToolSpec[];
  execute(toolName: string, args: Record<string, unknown>, callerAgentId: AgentId): Promise<StorageRow[]>;
}
