/**
 * @module domains/agent/orchestration
 *
 * Conversation loop and the executor contract it drives.
 */

export * from './types';

export {
  ConversationLoop,
  createConversationLoop,
  type ConversationLoopDependencies,
} from './ConversationLoop';
export {
  ScriptedAgentExecutor,
  type ScriptedTurn,
  type ScriptedCall,
} from './ScriptedAgentExecutor';
