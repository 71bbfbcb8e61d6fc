/**
 * Error Types Unit Tests
 *
 * Tests for the orchestration error classes and helpers.
 *
 * @module __tests__/unit/types/error.types.test.ts
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  DuplicateAgentError,
  ExecutorError,
  InvalidToolArgumentsError,
  ORCHESTRATION_ERROR_CODE,
  ScopeViolationError,
  StorageUnavailableError,
  UnauthorizedToolError,
  UnknownAgentError,
  isToolFailureError,
  toErrorMessage,
} from '@/types/error.types';

describe('Error Types', () => {
  describe('error classes', () => {
    it.each([
      [new ConfigurationError('missing'), 'ConfigurationError', ORCHESTRATION_ERROR_CODE.CONFIGURATION, 'missing'],
      [new UnknownAgentError('librarian'), 'UnknownAgentError', ORCHESTRATION_ERROR_CODE.UNKNOWN_AGENT, 'Agent "librarian" is not registered'],
      [new DuplicateAgentError('triage'), 'DuplicateAgentError', ORCHESTRATION_ERROR_CODE.DUPLICATE_AGENT, 'Agent "triage" is already registered'],
      [
        new UnauthorizedToolError('triage', 'read_query'),
        'UnauthorizedToolError',
        ORCHESTRATION_ERROR_CODE.UNAUTHORIZED_TOOL,
        'Agent "triage" is not permitted to call tool "read_query"',
      ],
      [
        new ScopeViolationError('university-poet', 'read_query'),
        'ScopeViolationError',
        ORCHESTRATION_ERROR_CODE.SCOPE_VIOLATION,
        'Agent "university-poet" has no scope for external tool "read_query"',
      ],
      [
        new InvalidToolArgumentsError('read_query', 'query cannot be empty'),
        'InvalidToolArgumentsError',
        ORCHESTRATION_ERROR_CODE.INVALID_TOOL_ARGUMENTS,
        'Invalid arguments for tool "read_query": query cannot be empty',
      ],
      [new ExecutorError('timeout'), 'ExecutorError', ORCHESTRATION_ERROR_CODE.EXECUTOR_FAILURE, 'timeout'],
      [new StorageUnavailableError('offline'), 'StorageUnavailableError', ORCHESTRATION_ERROR_CODE.STORAGE_UNAVAILABLE, 'offline'],
    ])('%s should carry its name, code and message', (error, name, code, message) => {
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe(name);
      expect(error.code).toBe(code);
      expect(error.message).toBe(message);
    });

    it('should preserve the cause', () => {
      const cause = new Error('socket hang up');
      const error = new ExecutorError('Model call failed', { cause });

      expect(error.cause).toBe(cause);
    });
  });

  describe('isToolFailureError', () => {
    it('should accept per-tool failures', () => {
      expect(isToolFailureError(new UnauthorizedToolError('triage', 'x'))).toBe(true);
      expect(isToolFailureError(new ScopeViolationError('triage', 'read_query'))).toBe(true);
      expect(isToolFailureError(new InvalidToolArgumentsError('read_query', 'bad'))).toBe(true);
      expect(isToolFailureError(new StorageUnavailableError('down'))).toBe(true);
    });

    it('should reject session-fatal and foreign errors', () => {
      expect(isToolFailureError(new ExecutorError('boom'))).toBe(false);
      expect(isToolFailureError(new ConfigurationError('bad'))).toBe(false);
      expect(isToolFailureError(new TypeError('nope'))).toBe(false);
      expect(isToolFailureError('UnauthorizedToolError')).toBe(false);
    });
  });

  describe('toErrorMessage', () => {
    it('should read the message of an Error', () => {
      expect(toErrorMessage(new Error('failed'))).toBe('failed');
    });

    it('should pass strings through', () => {
      expect(toErrorMessage('plain')).toBe('plain');
    });

    it('should fall back for anything else', () => {
      expect(toErrorMessage({ code: 42 })).toBe('Unknown error');
    });
  });
});
