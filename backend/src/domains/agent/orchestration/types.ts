/**
 * @module domains/agent/orchestration/types
 *
 * Contracts between the conversation loop and the agent executor.
 */
import type {
  ContextMap,
  Message,
  NewMessage,
  SessionResult,
  ToolInvocation,
} from '@campus-desk/shared';
import type { AgentDefinition } from '@/modules/agents/core/registry/AgentDefinition';
import type { ToolSpec } from '@/modules/agents/handoffs/handoff-handler';

// Re-export for convenience
export type { SessionResult };

/**
 * An agent as handed to the executor: its descriptor plus every tool it may
 * call this turn (handoff tools first, then scoped external tools).
 */
export interface ExecutableAgent {
  definition: AgentDefinition;
  tools: ToolSpec[];
}

/**
 * What one agent turn produced.
 */
export interface ExecutorResult {
  /** Messages to append, in order. The loop stamps the turn index. */
  newMessages: NewMessage[];
  /** Tool calls to resolve, in issued order */
  toolInvocations: ToolInvocation[];
  /** Agent the executor suggests should speak next */
  nextAgentHint?: string;
  /** Context keys the executor wants written */
  updatedContext?: ContextMap;
}

/**
 * Runs one agent turn. Fails with ExecutorError.
 */
export interface IAgentExecutor {
  invoke(
    agent: ExecutableAgent,
    transcript: readonly Message[],
    context: Readonly<ContextMap>
  ): Promise<ExecutorResult>;
}

export interface RunSessionOptions {
  /** Initial context variables */
  context?: ContextMap;
  /** Overrides the loop's default bound */
  maxTurns?: number;
}

/**
 * Main entry point for one conversation session.
 */
export interface IConversationLoop {
  run(query: string, options?: RunSessionOptions): Promise<SessionResult>;
}
