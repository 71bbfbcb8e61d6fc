/**
 * Structured logger using Pino
 *
 * - JSON structured logging (production) / Pretty printing (development)
 * - Silent by default under test
 * - Child loggers scoped by service and session
 * - Automatic redaction of secrets
 *
 * Usage:
 * ```typescript
 * const serviceLogger = createChildLogger({ service: 'HandoffRouter' });
 * serviceLogger.info({ agentId }, 'Resolved handoff');
 *
 * // Per-session scope
 * const sessionLogger = serviceLogger.child({ sessionId });
 * ```
 */

import pino, { type Logger } from 'pino';
import { env, isDev, isTest } from '@/infrastructure/config/environment';

export type { Logger };

const logLevel = env.LOG_LEVEL ?? (isTest ? 'silent' : isDev ? 'debug' : 'info');

// Service filtering for diagnostics (LOG_SERVICES=Service1,Service2,...)
const allowedServices = env.LOG_SERVICES?.split(',').map(s => s.trim()).filter(Boolean) ?? [];

const baseOptions: pino.LoggerOptions = {
  level: logLevel,
  serializers: {
    err: pino.stdSerializers.err,
  },
  base: {
    env: env.NODE_ENV,
    service: 'campus-desk',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ['password', 'apiKey', 'connectionString', '*.password', '*.apiKey', '*.connectionString'],
    remove: true,
  },
};

function createBaseLogger(): Logger {
  // Tests never spawn the transport worker thread
  if (isTest) {
    return pino(baseOptions);
  }

  const transport = isDev
    ? pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,env',
          messageFormat: '[{service}] {msg}',
        },
      })
    : pino.transport({
        target: 'pino/file',
        options: { destination: 1 },
      });

  return pino(baseOptions, transport);
}

export const logger = createBaseLogger();

/**
 * Create a child logger with additional context.
 *
 * When LOG_SERVICES is set, services not in the list get a silent logger.
 *
 * @example
 * const serviceLogger = createChildLogger({ service: 'ConversationLoop' });
 */
export const createChildLogger = (context: Record<string, unknown>): Logger => {
  const serviceName = typeof context.service === 'string' ? context.service : undefined;

  if (allowedServices.length > 0 && serviceName && !allowedServices.includes(serviceName)) {
    return pino({ level: 'silent' });
  }

  return logger.child(context);
};
