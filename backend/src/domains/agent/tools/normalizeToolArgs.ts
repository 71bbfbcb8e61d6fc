/**
 * @module domains/agent/tools/normalizeToolArgs
 *
 * Normalizes tool arguments coming back from the model. Providers sometimes
 * return the arguments as a JSON string instead of an object.
 */

import { createChildLogger } from '@/shared/utils/logger';

const logger = createChildLogger({ service: 'normalizeToolArgs' });

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Normalize tool arguments to a Record<string, unknown>.
 *
 * @param args - Tool arguments (object or JSON string)
 * @param toolName - Tool name for logging context
 */
export function normalizeToolArgs(args: unknown, toolName?: string): Record<string, unknown> {
  if (isPlainRecord(args)) {
    return args;
  }

  if (typeof args === 'string') {
    const trimmed = args.trim();
    if (trimmed.startsWith('{') && trimmed.endsWith('}')) {
      try {
        const parsed: unknown = JSON.parse(trimmed);
        if (isPlainRecord(parsed)) {
          logger.debug({ toolName, originalType: 'string' }, 'Normalized tool args from JSON string to object');
          return parsed;
        }
      } catch (error) {
        logger.warn({ toolName, argsPreview: trimmed.substring(0, 100), error }, 'Failed to parse tool args JSON string');
      }
    }
  }

  if (args !== undefined && args !== null) {
    logger.warn({ toolName, argsType: typeof args }, 'Tool args had unexpected type, returning empty object');
  }

  return {};
}
