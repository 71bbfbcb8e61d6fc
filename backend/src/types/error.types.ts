/**
 * Orchestration Error Types
 *
 * Error taxonomy for the handoff engine. Each class carries a stable `code`
 * so callers and tool messages can tell failures apart without `instanceof`.
 *
 * - Startup-fatal: ConfigurationError, UnknownAgentError, DuplicateAgentError
 * - Per-tool (recorded, session continues): UnauthorizedToolError,
 *   ScopeViolationError, InvalidToolArgumentsError, StorageUnavailableError
 * - Session-fatal: ExecutorError
 *
 * @module types/error.types
 */

export const ORCHESTRATION_ERROR_CODE = {
  CONFIGURATION: 'CONFIGURATION_ERROR',
  UNKNOWN_AGENT: 'UNKNOWN_AGENT',
  DUPLICATE_AGENT: 'DUPLICATE_AGENT',
  UNAUTHORIZED_TOOL: 'UNAUTHORIZED_TOOL',
  SCOPE_VIOLATION: 'SCOPE_VIOLATION',
  INVALID_TOOL_ARGUMENTS: 'INVALID_TOOL_ARGUMENTS',
  EXECUTOR_FAILURE: 'EXECUTOR_FAILURE',
  STORAGE_UNAVAILABLE: 'STORAGE_UNAVAILABLE',
} as const;

export type OrchestrationErrorCode =
  (typeof ORCHESTRATION_ERROR_CODE)[keyof typeof ORCHESTRATION_ERROR_CODE];

/**
 * Base class for every error raised by the engine.
 */
export abstract class CampusDeskError extends Error {
  abstract readonly code: OrchestrationErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing or invalid setup (e.g. storage location unset).
 */
export class ConfigurationError extends CampusDeskError {
  readonly code = ORCHESTRATION_ERROR_CODE.CONFIGURATION;
}

export class UnknownAgentError extends CampusDeskError {
  readonly code = ORCHESTRATION_ERROR_CODE.UNKNOWN_AGENT;

  constructor(readonly agentId: string) {
    super(`Agent "${agentId}" is not registered`);
  }
}

export class DuplicateAgentError extends CampusDeskError {
  readonly code = ORCHESTRATION_ERROR_CODE.DUPLICATE_AGENT;

  constructor(readonly agentId: string) {
    super(`Agent "${agentId}" is already registered`);
  }
}

/**
 * An agent called a tool outside its handler table.
 */
export class UnauthorizedToolError extends CampusDeskError {
  readonly code = ORCHESTRATION_ERROR_CODE.UNAUTHORIZED_TOOL;

  constructor(readonly agentId: string, readonly toolName: string) {
    super(`Agent "${agentId}" is not permitted to call tool "${toolName}"`);
  }
}

/**
 * An agent called an external tool outside its declared scopes.
 */
export class ScopeViolationError extends CampusDeskError {
  readonly code = ORCHESTRATION_ERROR_CODE.SCOPE_VIOLATION;

  constructor(readonly agentId: string, readonly toolName: string) {
    super(`Agent "${agentId}" has no scope for external tool "${toolName}"`);
  }
}

export class InvalidToolArgumentsError extends CampusDeskError {
  readonly code = ORCHESTRATION_ERROR_CODE.INVALID_TOOL_ARGUMENTS;

  constructor(readonly toolName: string, detail: string) {
    super(`Invalid arguments for tool "${toolName}": ${detail}`);
  }
}

/**
 * The agent executor failed (transport or model error). Session-fatal.
 */
export class ExecutorError extends CampusDeskError {
  readonly code = ORCHESTRATION_ERROR_CODE.EXECUTOR_FAILURE;
}

/**
 * The storage collaborator could not be reached or rejected the query.
 */
export class StorageUnavailableError extends CampusDeskError {
  readonly code = ORCHESTRATION_ERROR_CODE.STORAGE_UNAVAILABLE;
}

/**
 * Errors the loop records as a tool failure instead of aborting.
 */
export type ToolFailureError =
  | UnauthorizedToolError
  | ScopeViolationError
  | InvalidToolArgumentsError
  | StorageUnavailableError;

export function isToolFailureError(error: unknown): error is ToolFailureError {
  return (
    error instanceof UnauthorizedToolError ||
    error instanceof ScopeViolationError ||
    error instanceof InvalidToolArgumentsError ||
    error instanceof StorageUnavailableError
  );
}

/**
 * Normalize any thrown value to a message string.
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
