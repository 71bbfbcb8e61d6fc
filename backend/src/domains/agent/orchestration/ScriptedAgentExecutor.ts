/**
 * ScriptedAgentExecutor for Testing
 *
 * IAgentExecutor that plays back a queue of scripted turns instead of calling
 * a model. Each invocation consumes one turn; an empty queue answers with a
 * silent turn (no messages, no tool calls).
 *
 * @module domains/agent/orchestration/ScriptedAgentExecutor
 */

import type { AgentId, ContextMap, Message, ToolInvocation } from '@campus-desk/shared';
import { ExecutorError } from '@/types/error.types';
import type { ExecutableAgent, ExecutorResult, IAgentExecutor } from './types';

/**
 * One scripted agent turn.
 */
export interface ScriptedTurn {
  /** Agent expected to be active; a mismatch fails the invocation */
  agentId?: AgentId;
  /** Text of the agent message (omitted: no agent message) */
  text?: string;
  toolCalls?: Array<{ name: string; args?: Record<string, unknown>; id?: string }>;
  nextAgentHint?: string;
  updatedContext?: ContextMap;
  /** Fail the invocation instead of answering */
  error?: Error | string;
  /** Resolve after this many milliseconds */
  delayMs?: number;
}

export interface ScriptedCall {
  agentId: AgentId;
  toolNames: string[];
  transcriptLength: number;
  context: ContextMap;
}

/**
 * Usage:
 * ```typescript
 * const executor = new ScriptedAgentExecutor([
 *   { agentId: 'triage', text: 'Routing you.', toolCalls: [{ name: 'route_to_course_advisor' }] },
 *   { agentId: 'course-advisor', toolCalls: [{ name: 'course_advisor_finalise' }] },
 * ]);
 * ```
 */
export class ScriptedAgentExecutor implements IAgentExecutor {
  private readonly turns: ScriptedTurn[];
  readonly calls: ScriptedCall[] = [];

  constructor(turns: ScriptedTurn[] = []) {
    this.turns = [...turns];
  }

  enqueue(...turns: ScriptedTurn[]): void {
    this.turns.push(...turns);
  }

  get remaining(): number {
    return this.turns.length;
  }

  async invoke(
    agent: ExecutableAgent,
    transcript: readonly Message[],
    context: Readonly<ContextMap>
  ): Promise<ExecutorResult> {
    const agentId = agent.definition.id;
    this.calls.push({
      agentId,
      toolNames: agent.tools.map(t => t.name),
      transcriptLength: transcript.length,
      context: { ...context },
    });

    const turn = this.turns.shift();
    if (!turn) {
      return { newMessages: [], toolInvocations: [] };
    }

    if (turn.delayMs) {
      await new Promise(resolve => setTimeout(resolve, turn.delayMs));
    }

    if (turn.agentId && turn.agentId !== agentId) {
      throw new ExecutorError(`Scripted turn expected agent "${turn.agentId}" but "${agentId}" was invoked`);
    }

    if (turn.error) {
      throw turn.error instanceof Error ? turn.error : new ExecutorError(turn.error);
    }

    const callNumber = this.calls.length;
    const toolInvocations: ToolInvocation[] = (turn.toolCalls ?? []).map((call, index) => ({
      id: call.id ?? `call_${callNumber}_${index}`,
      name: call.name,
      args: call.args ?? {},
    }));

    const speaks = turn.text !== undefined || toolInvocations.length > 0;

    return {
      newMessages: speaks
        ? [
            {
              role: 'agent',
              content: turn.text ?? '',
              agentId,
              ...(toolInvocations.length > 0 ? { toolCalls: toolInvocations } : {}),
            },
          ]
        : [],
      toolInvocations,
      ...(turn.nextAgentHint !== undefined ? { nextAgentHint: turn.nextAgentHint } : {}),
      ...(turn.updatedContext ? { updatedContext: turn.updatedContext } : {}),
    };
  }
}
