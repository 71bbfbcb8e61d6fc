/**
 * Environment Configuration Unit Tests
 *
 * @module __tests__/unit/config/environment
 */

import { describe, it, expect } from 'vitest';
import { parseEnvironment, requireDatabaseConnectionString } from '@/infrastructure/config/environment';
import { ConfigurationError } from '@/types/error.types';

describe('Environment Configuration', () => {
  describe('parseEnvironment', () => {
    it('should apply defaults to an empty environment', () => {
      const config = parseEnvironment({});

      expect(config).toMatchObject({
        NODE_ENV: 'development',
        ANTHROPIC_MODEL: 'claude-3-5-sonnet-20241022',
        MODEL_TEMPERATURE: 0,
        MAX_TURNS: 20,
      });
      expect(config.DATABASE_CONNECTION_STRING).toBeUndefined();
    });

    it('should convert numeric settings', () => {
      const config = parseEnvironment({ MAX_TURNS: '8', MODEL_TEMPERATURE: '0.4' });

      expect(config.MAX_TURNS).toBe(8);
      expect(config.MODEL_TEMPERATURE).toBe(0.4);
    });

    it.each([
      [{ MAX_TURNS: '0' }, 'MAX_TURNS'],
      [{ MAX_TURNS: 'many' }, 'MAX_TURNS'],
      [{ MODEL_TEMPERATURE: '2' }, 'MODEL_TEMPERATURE'],
      [{ LOG_LEVEL: 'verbose' }, 'LOG_LEVEL'],
    ])('should reject %o', (source, field) => {
      expect(() => parseEnvironment(source)).toThrow(ConfigurationError);
      expect(() => parseEnvironment(source)).toThrow(`Invalid environment variables: ${field}`);
    });
  });

  describe('requireDatabaseConnectionString', () => {
    it('should return the trimmed connection string', () => {
      const config = parseEnvironment({ DATABASE_CONNECTION_STRING: '  Server=localhost;Database=campus  ' });

      expect(requireDatabaseConnectionString(config)).toBe('Server=localhost;Database=campus');
    });

    it.each([{}, { DATABASE_CONNECTION_STRING: '   ' }])('should throw when unset or blank (%o)', source => {
      expect(() => requireDatabaseConnectionString(parseEnvironment(source))).toThrow(
        'DATABASE_CONNECTION_STRING environment variable is required.'
      );
    });
  });
});
