/**
 * LangChainAgentExecutor - runs one agent turn against a chat model
 *
 * Maps the transcript to LangChain messages, binds the agent's tool specs to
 * the model and maps the reply back to executor output. The model never sees
 * context values except through the summary appended to the instructions.
 *
 * Binding goes through a `ChatModelBinder` so tests can supply a fake model.
 *
 * @module core/langchain/LangChainAgentExecutor
 */

import { randomUUID } from 'crypto';
import {
  AIMessage,
  HumanMessage,
  SystemMessage,
  ToolMessage,
  type BaseMessage,
  type MessageContent,
} from '@langchain/core/messages';
import type { ToolCall } from '@langchain/core/messages/tool';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { ContextMap, Message, NewMessage, ToolInvocation } from '@campus-desk/shared';
import { createChildLogger, type Logger } from '@/shared/utils/logger';
import { normalizeToolArgs } from '@/domains/agent/tools/normalizeToolArgs';
import type { ToolSpec } from '@/modules/agents/handoffs/handoff-handler';
import type {
  ExecutableAgent,
  ExecutorResult,
  IAgentExecutor,
} from '@/domains/agent/orchestration/types';
import { ConfigurationError, ExecutorError, toErrorMessage } from '@/types/error.types';
import { ModelFactory } from './ModelFactory';

// ============================================
// Binding seam
// ============================================

/** The parts of a model reply the executor reads. */
export interface ModelReply {
  content: MessageContent;
  tool_calls?: ToolCall[];
}

export interface BoundChatModel {
  invoke(messages: BaseMessage[]): Promise<ModelReply>;
}

export interface ChatModelBinder {
  bind(tools: ToolSpec[], options: { parallelToolCalls: boolean }): BoundChatModel;
}

/**
 * Binder over a LangChain chat model. Sequential agents ask the provider to
 * emit at most one tool call per reply.
 */
export function createChatModelBinder(model: BaseChatModel): ChatModelBinder {
  return {
    bind(tools, { parallelToolCalls }) {
      if (tools.length === 0) {
        return model;
      }
      if (!model.bindTools) {
        throw new ConfigurationError('Chat model does not support tool binding');
      }
      const structuredTools = tools.map(({ name, description, schema }) => ({ name, description, schema }));
      return model.bindTools(
        structuredTools,
        parallelToolCalls ? {} : { tool_choice: { type: 'auto', disable_parallel_tool_use: true } }
      );
    },
  };
}

// ============================================
// Message mapping
// ============================================

/**
 * Instructions, followed by the non-empty context as `key: value` lines.
 */
export function buildSystemPrompt(instructions: string, context: Readonly<ContextMap>): string {
  const entries = Object.entries(context);
  if (entries.length === 0) {
    return instructions;
  }
  const lines = entries.map(([key, value]) => `${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`);
  return `${instructions}\n\nSession context:\n${lines.join('\n')}`;
}

export function toLangChainMessages(
  instructions: string,
  transcript: readonly Message[],
  context: Readonly<ContextMap>
): BaseMessage[] {
  const messages: BaseMessage[] = [new SystemMessage(buildSystemPrompt(instructions, context))];

  for (const message of transcript) {
    switch (message.role) {
      case 'user':
        messages.push(new HumanMessage(message.content));
        break;
      case 'agent':
        messages.push(
          new AIMessage({
            content: message.content,
            tool_calls: (message.toolCalls ?? []).map(call => ({
              id: call.id,
              name: call.name,
              args: call.args,
              type: 'tool_call' as const,
            })),
          })
        );
        break;
      case 'tool':
        messages.push(
          new ToolMessage({
            content: message.content,
            tool_call_id: message.toolCallId ?? '',
            name: message.toolName,
          })
        );
        break;
    }
  }

  return messages;
}

export function extractText(content: MessageContent): string {
  if (typeof content === 'string') {
    return content;
  }
  return content
    .map(part => (part.type === 'text' && 'text' in part && typeof part.text === 'string' ? part.text : ''))
    .join('');
}

// ============================================
// Executor
// ============================================

export interface LangChainAgentExecutorOptions {
  /** Defaults to a binder over ModelFactory.createDefault() */
  binder?: ChatModelBinder;
  logger?: Logger;
}

export class LangChainAgentExecutor implements IAgentExecutor {
  private readonly binder: ChatModelBinder;
  private readonly logger: Logger;

  constructor(options: LangChainAgentExecutorOptions = {}) {
    this.binder = options.binder ?? createChatModelBinder(ModelFactory.createDefault());
    this.logger = options.logger ?? createChildLogger({ service: 'LangChainAgentExecutor' });
  }

  async invoke(
    agent: ExecutableAgent,
    transcript: readonly Message[],
    context: Readonly<ContextMap>
  ): Promise<ExecutorResult> {
    const { definition, tools } = agent;
    const startTime = Date.now();

    let reply: ModelReply;
    try {
      const model = this.binder.bind(tools, { parallelToolCalls: definition.parallelToolCalls });
      reply = await model.invoke(toLangChainMessages(definition.instructions, transcript, context));
    } catch (error) {
      this.logger.error({ err: error, agentId: definition.id }, 'Model invocation failed');
      throw new ExecutorError(`Model call for agent "${definition.id}" failed: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }

    const toolInvocations: ToolInvocation[] = (reply.tool_calls ?? []).map(call => ({
      id: call.id ?? `call_${randomUUID()}`,
      name: call.name,
      args: normalizeToolArgs(call.args, call.name),
    }));
    const text = extractText(reply.content);

    this.logger.debug(
      {
        agentId: definition.id,
        toolCalls: toolInvocations.map(t => t.name),
        textLength: text.length,
        durationMs: Date.now() - startTime,
      },
      'Model replied'
    );

    const newMessages: NewMessage[] =
      text || toolInvocations.length > 0
        ? [
            {
              role: 'agent',
              content: text,
              agentId: definition.id,
              ...(toolInvocations.length > 0 ? { toolCalls: toolInvocations } : {}),
            },
          ]
        : [];

    return { newMessages, toolInvocations };
  }
}
