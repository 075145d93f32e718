/**
 * Logger Service
 *
 * Structured logging with Pino.
 *
 * Log Levels:
 * - fatal: Application crash
 * - critical: Data-integrity faults (duplicate series identities)
 * - error: Error conditions (missing files, missing scan roots)
 * - warn: Warning conditions (unparseable files, empty ignore files)
 * - info: Informational messages (default)
 * - debug: Debug information
 * - trace: Very detailed tracing
 */

import { pino, type DestinationStream, type Logger, type LoggerOptions } from 'pino';

// =============================================================================
// Configuration
// =============================================================================

const nodeEnv = process.env.NODE_ENV;
const isTest = nodeEnv === 'test' || process.env.VITEST !== undefined;
const isDevelopment = nodeEnv !== 'production' && !isTest;
const logLevel = process.env.LOG_LEVEL || (isTest ? 'silent' : isDevelopment ? 'debug' : 'info');

/** Sits between error (50) and fatal (60). */
export const CRITICAL_LEVEL = 55;

const customLevels = { critical: CRITICAL_LEVEL };

export type ScanLogger = Logger<'critical'>;

// =============================================================================
// Logger Instance
// =============================================================================

function baseOptions(level: string): LoggerOptions<'critical'> {
  return {
    level,
    customLevels,
    base: {
      app: 'series-scanner',
    },
  };
}

export const logger: ScanLogger = pino<'critical'>({
  ...baseOptions(logLevel),
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          customLevels: `critical:${CRITICAL_LEVEL}`,
        },
      }
    : undefined,
});

/**
 * Build a standalone logger writing to the given stream. Used by scripts that
 * want plain JSON output and by tests that capture log entries.
 */
export function createStreamLogger(stream: DestinationStream, level = 'trace'): ScanLogger {
  return pino<'critical'>(baseOptions(level), stream);
}

// =============================================================================
// Child Loggers for Services
// =============================================================================

/**
 * Create a child logger with service context
 */
export function createServiceLogger(service: string, parent: ScanLogger = logger): ScanLogger {
  return parent.child({ service });
}

export const scannerLogger = createServiceLogger('library-scanner');
export const discoveryLogger = createServiceLogger('scanner-discovery');
export const trackerLogger = createServiceLogger('series-tracker');
export const fileProcessingLogger = createServiceLogger('file-processing');
export const parallelLogger = createServiceLogger('parallel');
export const configLogger = createServiceLogger('config');
export const comicInfoLogger = createServiceLogger('comicinfo');

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Log an error with context
 */
export function logError(context: string, error: unknown, metadata?: Record<string, unknown>) {
  const message = errorMessage(error);
  const stack = error instanceof Error ? error.stack : undefined;

  logger.error({
    context,
    error: message,
    stack,
    ...metadata,
  }, `[${context}] ${message}`);
}

export default logger;
