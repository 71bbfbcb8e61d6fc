/**
 * Conversation Types
 *
 * Transcript messages, tool invocations and context variables shared by the
 * conversation loop, the executor adapters and the CLI.
 *
 * @module @campus-desk/shared/types/conversation
 */

import type { AgentId } from '../constants/agent-registry.constants';

export type MessageRole = 'user' | 'agent' | 'tool';

/**
 * A tool call emitted by an agent during a turn.
 */
export interface ToolInvocation {
  /** Call id, unique within the session (pairs the call with its tool message) */
  id: string;
  name: string;
  args: Record<string, unknown>;
}

/**
 * One transcript entry. Appended once, never mutated.
 */
export interface Message {
  role: MessageRole;
  content: string;
  /** Zero-based turn that produced the message (the user query is turn 0) */
  turn: number;
  /** Author of an `agent` message */
  agentId?: AgentId;
  /** Tool calls issued alongside an `agent` message */
  toolCalls?: ToolInvocation[];
  /** Invocation a `tool` message answers */
  toolCallId?: string;
  toolName?: string;
}

/** Message as produced by an executor, before the driver stamps the turn. */
export type NewMessage = Omit<Message, 'turn'>;

/**
 * Context variables: string keys to arbitrary values.
 */
export type ContextMap = Record<string, unknown>;
