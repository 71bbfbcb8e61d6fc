import { describe, it, expect, vi } from 'vitest';
import { AIMessage, HumanMessage, SystemMessage, ToolMessage, type BaseMessage } from '@langchain/core/messages';
import { ChatAnthropic } from '@langchain/anthropic';
import type { Message } from '@campus-desk/shared';
import {
  LangChainAgentExecutor,
  buildSystemPrompt,
  createChatModelBinder,
  extractText,
  type BoundChatModel,
  type ChatModelBinder,
  type ModelReply,
} from './LangChainAgentExecutor';
import { buildAgentDefinition } from '@/modules/agents/core/registry/registerAgents';
import { courseAdvisorDefinition } from '@/modules/agents/core/definitions';
import type { ToolSpec } from '@/modules/agents/handoffs/handoff-handler';
import { ExecutorError } from '@/types/error.types';
import { readQueryArgsSchema } from '@campus-desk/shared';
import { z } from 'zod';

vi.mock('@/shared/utils/logger', () => ({
  createChildLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

// ============================================
// Fixtures
// ============================================

const advisor = buildAgentDefinition(courseAdvisorDefinition);

const TOOLS: ToolSpec[] = [
  { name: 'course_advisor_finalise', description: 'Finish the session.', schema: z.object({}) },
  { name: 'read_query', description: 'Run a read-only query.', schema: readQueryArgsSchema },
];

class FakeBinder implements ChatModelBinder {
  readonly bound: Array<{ tools: string[]; parallelToolCalls: boolean }> = [];
  readonly received: BaseMessage[][] = [];

  constructor(private readonly reply: ModelReply | Error) {}

  bind(tools: ToolSpec[], options: { parallelToolCalls: boolean }): BoundChatModel {
    this.bound.push({ tools: tools.map(t => t.name), parallelToolCalls: options.parallelToolCalls });
    return {
      invoke: async (messages: BaseMessage[]) => {
        this.received.push(messages);
        if (this.reply instanceof Error) {
          throw this.reply;
        }
        return this.reply;
      },
    };
  }
}

const TRANSCRIPT: Message[] = [
  { role: 'user', content: 'Which courses suit a data scientist?', turn: 0 },
  {
    role: 'agent',
    content: 'Routing you.',
    agentId: 'triage',
    toolCalls: [{ id: 'c1', name: 'route_to_course_advisor', args: {} }],
    turn: 1,
  },
  {
    role: 'tool',
    content: 'Successfully transferred to Course Advisor',
    toolCallId: 'c1',
    toolName: 'route_to_course_advisor',
    turn: 1,
  },
];

describe('LangChainAgentExecutor', () => {
  describe('message mapping', () => {
    it('should send instructions then the transcript in order', async () => {
      const binder = new FakeBinder({ content: '' });
      const executor = new LangChainAgentExecutor({ binder });

      await executor.invoke({ definition: advisor, tools: TOOLS }, TRANSCRIPT, {});

      const sent = binder.received[0] ?? [];
      expect(sent).toHaveLength(4);
      expect(sent[0]).toBeInstanceOf(SystemMessage);
      expect(sent[0]?.content).toBe(advisor.instructions);
      expect(sent[1]).toBeInstanceOf(HumanMessage);
      expect(sent[1]?.content).toBe('Which courses suit a data scientist?');

      const ai = sent[2];
      expect(ai).toBeInstanceOf(AIMessage);
      if (ai instanceof AIMessage) {
        expect(ai.tool_calls).toEqual([
          expect.objectContaining({ id: 'c1', name: 'route_to_course_advisor', args: {} }),
        ]);
      }

      const tool = sent[3];
      expect(tool).toBeInstanceOf(ToolMessage);
      if (tool instanceof ToolMessage) {
        expect(tool.tool_call_id).toBe('c1');
        expect(tool.content).toBe('Successfully transferred to Course Advisor');
      }
    });

    it('should bind the agent tools with its parallel setting', async () => {
      const binder = new FakeBinder({ content: '' });
      const executor = new LangChainAgentExecutor({ binder });

      await executor.invoke({ definition: { ...advisor, parallelToolCalls: false }, tools: TOOLS }, TRANSCRIPT, {});

      expect(binder.bound).toEqual([
        { tools: ['course_advisor_finalise', 'read_query'], parallelToolCalls: false },
      ]);
    });
  });

  describe('reply mapping', () => {
    it('should map text and tool calls to one agent message', async () => {
      const executor = new LangChainAgentExecutor({
        binder: new FakeBinder({
          content: 'Let me check the catalogue.',
          tool_calls: [{ id: 'toolu_1', name: 'read_query', args: { query: 'SELECT * FROM courses' } }],
        }),
      });

      const result = await executor.invoke({ definition: advisor, tools: TOOLS }, TRANSCRIPT, {});

      const invocation = { id: 'toolu_1', name: 'read_query', args: { query: 'SELECT * FROM courses' } };
      expect(result).toEqual({
        newMessages: [
          {
            role: 'agent',
            content: 'Let me check the catalogue.',
            agentId: 'course-advisor',
            toolCalls: [invocation],
          },
        ],
        toolInvocations: [invocation],
      });
    });

    it('should generate an id for tool calls without one', async () => {
      const executor = new LangChainAgentExecutor({
        binder: new FakeBinder({ content: '', tool_calls: [{ name: 'course_advisor_finalise', args: {} }] }),
      });

      const result = await executor.invoke({ definition: advisor, tools: TOOLS }, TRANSCRIPT, {});

      expect(result.toolInvocations[0]?.id).toMatch(/^call_[0-9a-f-]{36}$/);
    });

    it('should produce no messages for an empty reply', async () => {
      const executor = new LangChainAgentExecutor({ binder: new FakeBinder({ content: '' }) });

      const result = await executor.invoke({ definition: advisor, tools: TOOLS }, TRANSCRIPT, {});

      expect(result).toEqual({ newMessages: [], toolInvocations: [] });
    });

    it('should join text blocks of structured content', async () => {
      const executor = new LangChainAgentExecutor({
        binder: new FakeBinder({
          content: [
            { type: 'text', text: 'Data Structures ' },
            { type: 'text', text: 'is a good start.' },
          ],
        }),
      });

      const result = await executor.invoke({ definition: advisor, tools: TOOLS }, TRANSCRIPT, {});

      expect(result.newMessages[0]?.content).toBe('Data Structures is a good start.');
    });
  });

  describe('failures', () => {
    it('should wrap model errors in ExecutorError', async () => {
      const executor = new LangChainAgentExecutor({ binder: new FakeBinder(new Error('rate limited')) });

      const attempt = executor.invoke({ definition: advisor, tools: TOOLS }, TRANSCRIPT, {});

      await expect(attempt).rejects.toThrow(ExecutorError);
      await expect(attempt).rejects.toThrow('Model call for agent "course-advisor" failed: rate limited');
    });
  });
});

describe('buildSystemPrompt', () => {
  it('should return the instructions unchanged without context', () => {
    expect(buildSystemPrompt('Be helpful.', {})).toBe('Be helpful.');
  });

  it('should append context as key: value lines', () => {
    expect(buildSystemPrompt('Be helpful.', { response_haiku: 'true', year: 2 })).toBe(
      'Be helpful.\n\nSession context:\nresponse_haiku: true\nyear: 2'
    );
  });
});

describe('extractText', () => {
  it('should skip non-text blocks', () => {
    expect(
      extractText([
        { type: 'tool_use', id: 'toolu_1', name: 'read_query', input: {} },
        { type: 'text', text: 'ok' },
      ])
    ).toBe('ok');
  });
});

describe('createChatModelBinder', () => {
  const model = new ChatAnthropic({ model: 'claude-3-5-haiku-20241022', apiKey: 'test-secret' });

  it('should return the model itself when there are no tools', () => {
    expect(createChatModelBinder(model).bind([], { parallelToolCalls: true })).toBe(model);
  });

  it('should return a bound runnable when there are tools', () => {
    const bound = createChatModelBinder(model).bind(TOOLS, { parallelToolCalls: false });

    expect(bound).not.toBe(model);
    expect(typeof bound.invoke).toBe('function');
  });
});
