/**
 * Transition
 *
 * Closed result type of resolving one tool invocation. The conversation loop
 * switches on `kind`; there is no string-keyed dispatch past this point.
 *
 * @module modules/agents/handoffs/transition
 */

import type { AgentId, ContextMap } from '@campus-desk/shared';
import type { ToolFailureError } from '@/types/error.types';

/** Raw row returned by the storage collaborator. */
export type StorageRow = Record<string, unknown>;

export interface ContinueWithTransition {
  kind: 'continue_with';
  targetAgentId: AgentId;
  /** Context keys the handler writes (empty when it writes none) */
  contextUpdates: ContextMap;
}

export interface TerminateTransition {
  kind: 'terminate';
  payload: string;
  updatedContext: ContextMap;
}

export interface DataResultTransition {
  kind: 'data_result';
  rows: StorageRow[];
}

export interface RejectedTransition {
  kind: 'rejected';
  error: ToolFailureError;
}

export type Transition =
  | ContinueWithTransition
  | TerminateTransition
  | DataResultTransition
  | RejectedTransition;

export function continueWith(targetAgentId: AgentId, contextUpdates: ContextMap = {}): ContinueWithTransition {
  return { kind: 'continue_with', targetAgentId, contextUpdates };
}

export function terminate(payload: string, updatedContext: ContextMap): TerminateTransition {
  return { kind: 'terminate', payload, updatedContext };
}

export function dataResult(rows: StorageRow[]): DataResultTransition {
  return { kind: 'data_result', rows };
}

export function rejected(error: ToolFailureError): RejectedTransition {
  return { kind: 'rejected', error };
}
