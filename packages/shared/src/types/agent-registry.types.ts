/**
 * Agent Registry Types
 *
 * Summary of an agent that is safe to print or serialize
 * (no instructions, no handler tables).
 *
 * @module @campus-desk/shared/types/agent-registry
 */

import type { AgentId } from '../constants/agent-registry.constants';

export type AgentRole = 'dispatcher' | 'specialist';

export interface AgentSummary {
  id: AgentId;
  name: string;
  description: string;
  icon: string;
  role: AgentRole;
  toolNames: string[];
  externalToolScopes: string[];
}
