/**
 * Handoffs Module
 *
 * Transition union, per-agent handler tables and the router that resolves
 * tool invocations through them.
 *
 * @module modules/agents/handoffs
 */

export {
  continueWith,
  terminate,
  dataResult,
  rejected,
  type Transition,
  type ContinueWithTransition,
  type TerminateTransition,
  type DataResultTransition,
  type RejectedTransition,
  type StorageRow,
} from './transition';
export {
  defineHandoffHandler,
  type HandoffHandler,
  type HandoffHandlerSpec,
  type HandoffTransition,
  type ToolSpec,
} from './handoff-handler';
export { HANDOFF_HANDLERS } from './handoff-handlers';
export { HandoffRouter } from './HandoffRouter';
