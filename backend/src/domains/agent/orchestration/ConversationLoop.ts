/**
 * @module domains/agent/orchestration/ConversationLoop
 *
 * Drives one conversation session from the user query to a terminal state.
 *
 * ## Turn
 *
 * 1. Invoke the active agent with the full transcript and a context snapshot
 * 2. Append the executor's messages, apply its context updates
 * 3. Resolve every tool invocation (Tool Gateway for external tools, Handoff
 *    Router otherwise), concurrently when the agent allows parallel calls
 * 4. Append one tool message per non-terminating result, in issued order
 * 5. Decide: Terminate > ContinueWith > tool results > hint > sentinel > stop
 *
 * Tool failures are recorded and the session goes on; executor failures end
 * it with a failure result that still carries the partial transcript.
 *
 * @example
 * ```typescript
 * const loop = createConversationLoop({ registry, executor, gateway });
 * const result = await loop.run('Which courses suit a future data scientist?');
 * ```
 */

import { randomUUID } from 'crypto';
import {
  AGENT_DISPLAY_NAME,
  CLOSING_SENTINEL,
  DEFAULT_MAX_TURNS,
  UNIVERSITY_BLUEPRINT_METADATA,
  isAgentId,
  type AgentId,
  type Message,
  type NewMessage,
  type SessionResult,
  type SessionStatus,
  type TerminationReason,
  type ToolInvocation,
  type ContextMap,
} from '@campus-desk/shared';
import { createChildLogger, type Logger } from '@/shared/utils/logger';
import type { AgentRegistry } from '@/modules/agents/core/registry/AgentRegistry';
import type { AgentDefinition } from '@/modules/agents/core/registry/AgentDefinition';
import { ContextStore } from '@/modules/agents/context/ContextStore';
import {
  HandoffRouter,
  dataResult,
  rejected,
  type ContinueWithTransition,
  type TerminateTransition,
  type Transition,
} from '@/modules/agents/handoffs';
import type { IToolGateway } from '@/domains/agent/tools/types';
import {
  ConfigurationError,
  ExecutorError,
  isToolFailureError,
  toErrorMessage,
} from '@/types/error.types';
import type {
  ExecutableAgent,
  ExecutorResult,
  IAgentExecutor,
  IConversationLoop,
  RunSessionOptions,
} from './types';

/**
 * Dependencies for ConversationLoop.
 */
export interface ConversationLoopDependencies {
  registry: AgentRegistry;
  executor: IAgentExecutor;
  gateway: IToolGateway;
  /** Built from the registry when omitted */
  router?: HandoffRouter;
  /** Default bound on agent turns per session */
  maxTurns?: number;
  logger?: Logger;
}

interface Resolution {
  invocation: ToolInvocation;
  transition: Transition;
}

type TurnOutcome =
  | { kind: 'continue'; nextAgentId: AgentId }
  | { kind: 'stop'; reason: Extract<TerminationReason, 'finalized' | 'closing_sentinel' | 'no_further_agent'> };

/**
 * Per-session mutable state. Never shared between sessions.
 */
function checkMaxTurns(maxTurns: number): number {
  if (!Number.isInteger(maxTurns) || maxTurns < 1) {
    throw new ConfigurationError(`maxTurns must be a positive integer, got ${maxTurns}`);
  }
  return maxTurns;
}

interface SessionState {
  sessionId: string;
  transcript: Message[];
  context: ContextStore;
  activeAgentId: AgentId;
  turn: number;
  logger: Logger;
}

export class ConversationLoop implements IConversationLoop {
  private readonly registry: AgentRegistry;
  private readonly executor: IAgentExecutor;
  private readonly gateway: IToolGateway;
  private readonly router: HandoffRouter;
  private readonly maxTurns: number;
  private readonly dispatcherId: AgentId;
  private readonly logger: Logger;

  /**
   * @throws ConfigurationError unless the registry holds exactly one dispatcher,
   *   or if `maxTurns` is not a positive integer
   * @throws UnknownAgentError if a handler routes to an unregistered agent
   */
  constructor(deps: ConversationLoopDependencies) {
    this.registry = deps.registry;
    this.executor = deps.executor;
    this.gateway = deps.gateway;
    this.logger = deps.logger ?? createChildLogger({ service: 'ConversationLoop' });
    this.router = deps.router ?? new HandoffRouter(deps.registry);
    this.maxTurns = checkMaxTurns(deps.maxTurns ?? DEFAULT_MAX_TURNS);
    this.dispatcherId = deps.registry.getDispatcher().id;
  }

  /**
   * Run one session. Session failures come back as a result with
   * `status: 'failure'`.
   *
   * @throws ConfigurationError if `options.maxTurns` is not a positive integer;
   *   no session is started
   */
  async run(query: string, options: RunSessionOptions = {}): Promise<SessionResult> {
    const maxTurns = checkMaxTurns(options.maxTurns ?? this.maxTurns);
    const sessionId = randomUUID();
    const state: SessionState = {
      sessionId,
      transcript: [Object.freeze<Message>({ role: 'user', content: query, turn: 0 })],
      context: new ContextStore(options.context),
      activeAgentId: this.dispatcherId,
      turn: 0,
      logger: this.logger.child({ sessionId }),
    };

    state.logger.info({ activeAgentId: state.activeAgentId, maxTurns }, 'Session started');

    try {
      while (state.turn < maxTurns) {
        state.turn += 1;
        const outcome = await this.runTurn(state);

        if (outcome.kind === 'stop') {
          return this.finish(state, 'success', outcome.reason);
        }
        if (outcome.nextAgentId !== state.activeAgentId) {
          state.logger.info({ from: state.activeAgentId, to: outcome.nextAgentId, turn: state.turn }, 'Active agent switched');
        }
        state.activeAgentId = outcome.nextAgentId;
      }

      return this.finish(state, 'failure', 'max_turns', `Session stopped after reaching the limit of ${maxTurns} turns`);
    } catch (error) {
      const reason = error instanceof ExecutorError ? 'executor_error' : 'internal_error';
      state.logger.error({ err: error, turn: state.turn, activeAgentId: state.activeAgentId }, 'Session failed');
      return this.finish(state, 'failure', reason, toErrorMessage(error));
    }
  }

  // ============================================
  // Turn
  // ============================================

  private async runTurn(state: SessionState): Promise<TurnOutcome> {
    const definition = this.registry.resolve(state.activeAgentId);
    const result = await this.invokeExecutor(state, definition);

    for (const message of result.newMessages) {
      this.append(state, message);
    }
    state.context.apply(result.updatedContext);

    const resolutions = await this.resolveAll(state, definition, result.toolInvocations);

    const terminal = resolutions.find(
      (r): r is Resolution & { transition: TerminateTransition } => r.transition.kind === 'terminate'
    );
    let handoff: ContinueWithTransition | undefined;
    let resolvedTools = false;

    for (const { invocation, transition } of resolutions) {
      switch (transition.kind) {
        case 'terminate':
          break;
        case 'continue_with':
          if (!terminal) {
            state.context.apply(transition.contextUpdates);
            handoff = transition;
          }
          this.appendToolMessage(state, invocation, `Successfully transferred to ${AGENT_DISPLAY_NAME[transition.targetAgentId]}`);
          break;
        case 'data_result':
          resolvedTools = true;
          this.appendToolMessage(state, invocation, JSON.stringify(transition.rows));
          break;
        case 'rejected':
          resolvedTools = true;
          this.appendToolMessage(state, invocation, `Error: ${transition.error.name}: ${transition.error.message}`);
          break;
      }
    }

    if (terminal) {
      this.append(state, { role: 'agent', content: terminal.transition.payload });
      state.context.apply(terminal.transition.updatedContext);
      state.logger.info({ tool: terminal.invocation.name, turn: state.turn }, 'Session finalized');
      return { kind: 'stop', reason: 'finalized' };
    }

    if (handoff) {
      return { kind: 'continue', nextAgentId: handoff.targetAgentId };
    }

    if (resolvedTools) {
      return { kind: 'continue', nextAgentId: state.activeAgentId };
    }

    const hinted = this.acceptHint(state, result.nextAgentHint);
    if (hinted) {
      return { kind: 'continue', nextAgentId: hinted };
    }

    const sentinelSeen = state.transcript.some(m => m.role === 'agent' && m.content.includes(CLOSING_SENTINEL));
    return { kind: 'stop', reason: sentinelSeen ? 'closing_sentinel' : 'no_further_agent' };
  }

  private async invokeExecutor(state: SessionState, definition: AgentDefinition): Promise<ExecutorResult> {
    const agent: ExecutableAgent = {
      definition,
      tools: [...this.router.getToolSpecs(definition.id), ...this.gateway.getToolSpecs(definition.id)],
    };

    try {
      return await this.executor.invoke(agent, [...state.transcript], state.context.snapshot());
    } catch (error) {
      if (error instanceof ExecutorError) {
        throw error;
      }
      throw new ExecutorError(`Agent "${definition.id}" failed: ${toErrorMessage(error)}`, { cause: error });
    }
  }

  /**
   * A hint naming the active agent continues the loop; a hint naming another
   * agent is honoured only along a declared routing edge.
   */
  private acceptHint(state: SessionState, hint: string | undefined): AgentId | undefined {
    if (hint === undefined) {
      return undefined;
    }
    if (hint === state.activeAgentId) {
      return hint;
    }
    if (isAgentId(hint) && this.router.canRoute(state.activeAgentId, hint)) {
      return hint;
    }
    state.logger.warn({ hint, activeAgentId: state.activeAgentId }, 'Ignoring hint outside routing edges');
    return undefined;
  }

  // ============================================
  // Tool resolution
  // ============================================

  private async resolveAll(
    state: SessionState,
    definition: AgentDefinition,
    invocations: ToolInvocation[]
  ): Promise<Resolution[]> {
    const context = state.context.snapshot();
    const resolveOne = async (invocation: ToolInvocation): Promise<Resolution> => ({
      invocation,
      transition: await this.resolveInvocation(state, definition.id, invocation, context),
    });

    if (definition.parallelToolCalls) {
      return Promise.all(invocations.map(resolveOne));
    }

    const resolutions: Resolution[] = [];
    for (const invocation of invocations) {
      resolutions.push(await resolveOne(invocation));
    }
    return resolutions;
  }

  private async resolveInvocation(
    state: SessionState,
    agentId: AgentId,
    invocation: ToolInvocation,
    context: Readonly<ContextMap>
  ): Promise<Transition> {
    try {
      if (this.gateway.handles(invocation.name)) {
        return dataResult(await this.gateway.execute(invocation.name, invocation.args, agentId));
      }
      return this.router.resolve(agentId, invocation.name, invocation.args, context);
    } catch (error) {
      if (isToolFailureError(error)) {
        state.logger.warn({ err: error, tool: invocation.name, agentId }, 'Tool call rejected');
        return rejected(error);
      }
      throw error;
    }
  }

  // ============================================
  // Transcript
  // ============================================

  private append(state: SessionState, message: NewMessage): void {
    const stamped: Message = { ...message, turn: state.turn };
    if (message.role === 'agent') {
      stamped.agentId = state.activeAgentId;
    }
    state.transcript.push(Object.freeze(stamped));
  }

  private appendToolMessage(state: SessionState, invocation: ToolInvocation, content: string): void {
    this.append(state, {
      role: 'tool',
      content,
      toolCallId: invocation.id,
      toolName: invocation.name,
    });
  }

  private finish(
    state: SessionState,
    status: SessionStatus,
    terminationReason: TerminationReason,
    error?: string
  ): SessionResult {
    const details = { terminationReason, turns: state.turn, finalAgentId: state.activeAgentId };
    if (status === 'success') {
      state.logger.info(details, 'Session ended');
    } else {
      state.logger.warn(details, 'Session ended');
    }

    return {
      status,
      sessionId: state.sessionId,
      transcript: [...state.transcript],
      context: state.context.snapshot(),
      terminationReason,
      finalAgentId: state.activeAgentId,
      turns: state.turn,
      ...(error !== undefined ? { error } : {}),
      metadata: { ...UNIVERSITY_BLUEPRINT_METADATA },
    };
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a ConversationLoop. Allows dependency injection for testing.
 */
export function createConversationLoop(deps: ConversationLoopDependencies): ConversationLoop {
  return new ConversationLoop(deps);
}
