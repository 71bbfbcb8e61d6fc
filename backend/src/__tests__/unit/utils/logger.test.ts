/**
 * Logger Utility Unit Tests
 *
 * Tests for our Pino logger configuration:
 * - Child logger context inheritance (createChildLogger pattern)
 * - Per-session scoping
 * - Test helper utilities (createTestLogger factory)
 *
 * Pino internals (serialization, timestamps) are not retested here.
 *
 * @module __tests__/unit/utils/logger
 */

import { describe, it, expect } from 'vitest';
import { createTestLogger } from '../../helpers/mockPinoFactory';
import { createChildLogger, logger } from '@/shared/utils/logger';

// ============================================================================
// TEST SUITE: Child Logger Pattern
// ============================================================================

describe('Logger Utility', () => {
  describe('createChildLogger', () => {
    it('should be silent under test', () => {
      expect(logger.level).toBe('silent');
    });

    it('should bind the service to the child logger', () => {
      const child = createChildLogger({ service: 'HandoffRouter' });

      expect(child.bindings()).toMatchObject({ service: 'HandoffRouter' });
    });
  });

  describe('child logger pattern', () => {
    it('should add service context to child logger', () => {
      const { testLogger, logs } = createTestLogger();

      testLogger.child({ service: 'ToolGateway' }).info('Query forwarded');

      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatchObject({ service: 'ToolGateway', msg: 'Query forwarded', env: 'test' });
    });

    it('should stack session scope on top of service scope', () => {
      const { testLogger, logs } = createTestLogger();
      const sessionLogger = testLogger.child({ service: 'ConversationLoop' }).child({ sessionId: 'session-1' });

      sessionLogger.warn({ hint: 'triage' }, 'Ignoring hint outside routing edges');

      expect(logs[0]).toMatchObject({
        service: 'ConversationLoop',
        sessionId: 'session-1',
        hint: 'triage',
        msg: 'Ignoring hint outside routing edges',
      });
    });
  });

  // ============================================================================
  // TEST SUITE: Test helper
  // ============================================================================

  describe('createTestLogger', () => {
    it('should filter logs by level', () => {
      const { testLogger, getLogsByLevel } = createTestLogger();

      testLogger.info('one');
      testLogger.warn('two');
      testLogger.warn('three');

      expect(getLogsByLevel('warn').map(l => l.msg)).toEqual(['two', 'three']);
      expect(getLogsByLevel('error')).toEqual([]);
    });

    it('should respect the minimum level', () => {
      const { testLogger, logs } = createTestLogger('warn');

      testLogger.debug('hidden');
      testLogger.error('shown');

      expect(logs.map(l => l.msg)).toEqual(['shown']);
    });

    it('should find and clear captured logs', () => {
      const { testLogger, logs, hasLogWithMessage, clearLogs } = createTestLogger();

      testLogger.info('Session started');
      expect(hasLogWithMessage('Session started')).toBe(true);
      expect(hasLogWithMessage('Session ended')).toBe(false);

      clearLogs();
      expect(logs).toHaveLength(0);
    });
  });
});
