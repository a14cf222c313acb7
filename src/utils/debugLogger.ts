/**
 * Debug logging utilities for troubleshooting data flow.
 * Enabled via DEBUG_LOGGING=true environment variable.
 *
 * Categories:
 * - REQUEST: Parsed request bodies
 * - VALIDATION: Zod schema validation details
 * - SESSION: Session state transitions
 * - STORAGE: Local document reads and writes
 * - SYNC: Remote store transfers
 */

import type { LogContext, Logger } from './logger';

// Debug categories for filtering/identification
export type DebugCategory = 'REQUEST' | 'SESSION' | 'STORAGE' | 'SYNC' | 'VALIDATION';

/**
 * Core debug logging function.
 * Only logs if DEBUG_LOGGING is enabled.
 */
export function debugLog(
  logger: Logger,
  category: DebugCategory,
  message: string,
  data?: unknown,
): void {
  if (!isDebugEnabled()) return;

  const context: LogContext = {
    debugCategory: category,
  };

  if (data !== undefined) {
    context.data = data;
  }

  logger.debug(`[DEBUG:${category}] ${message}`, context);
}

/**
 * Log raw request body.
 */
export function debugRequest(logger: Logger, body: unknown, metadata?: LogContext): void {
  if (!isDebugEnabled()) return;

  const bodySize = JSON.stringify(body ?? {}).length;
  debugLog(logger, 'REQUEST', `Request body (${String(bodySize)} bytes)`, {
    body,
    ...metadata,
  });
}

/**
 * Log a session state transition.
 */
export function debugSession(
  logger: Logger,
  operation: string,
  details: { sessionId: string; outcome: string; metadata?: LogContext },
): void {
  if (!isDebugEnabled()) return;

  debugLog(logger, 'SESSION', operation, details);
}

/**
 * Log storage operation.
 */
export function debugStorage(
  logger: Logger,
  operation: string,
  details: {
    filePath?: string;
    key?: string;
    metadata?: LogContext;
  },
): void {
  if (!isDebugEnabled()) return;

  debugLog(logger, 'STORAGE', operation, details);
}

/**
 * Log a remote transfer of one collection.
 */
export function debugSync(
  logger: Logger,
  operation: string,
  details: { collection: string; itemCount?: number; metadata?: LogContext },
): void {
  if (!isDebugEnabled()) return;

  debugLog(logger, 'SYNC', operation, details);
}

/**
 * Log validation results.
 */
export function debugValidation(
  logger: Logger,
  success: boolean,
  input?: unknown,
  errors?: unknown,
): void {
  if (!isDebugEnabled()) return;

  if (success) {
    debugLog(logger, 'VALIDATION', 'Validation passed', { input });
  } else {
    debugLog(logger, 'VALIDATION', 'Validation failed', { errors, input });
  }
}

/**
 * Check if debug logging is enabled.
 */
export function isDebugEnabled(): boolean {
  return process.env.DEBUG_LOGGING === 'true';
}
