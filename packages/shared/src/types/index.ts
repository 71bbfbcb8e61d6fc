/**
 * Types Index
 *
 * @module @campus-desk/shared/types
 */

export type {
  MessageRole,
  ToolInvocation,
  Message,
  NewMessage,
  ContextMap,
} from './conversation.types';

export type {
  SessionStatus,
  TerminationReason,
  BlueprintMetadata,
  SessionResult,
} from './session.types';

export type { AgentRole, AgentSummary } from './agent-registry.types';
