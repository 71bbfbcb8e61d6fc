/**
 * Session Result Types
 *
 * Caller-facing outcome of one conversation session.
 *
 * @module @campus-desk/shared/types/session
 */

import type { AgentId } from '../constants/agent-registry.constants';
import type { ContextMap, Message } from './conversation.types';

export type SessionStatus = 'success' | 'failure';

/**
 * Why the conversation loop stopped.
 */
export type TerminationReason =
  | 'finalized'
  | 'closing_sentinel'
  | 'no_further_agent'
  | 'max_turns'
  | 'executor_error'
  | 'internal_error';

export interface BlueprintMetadata {
  title: string;
  description: string;
  requiredStorage: string[];
  envVars: string[];
}

export interface SessionResult {
  status: SessionStatus;
  sessionId: string;
  transcript: Message[];
  context: ContextMap;
  terminationReason: TerminationReason;
  /** Agent that was active when the loop stopped */
  finalAgentId: AgentId;
  turns: number;
  error?: string;
  metadata: BlueprintMetadata;
}
