import { PriceOracleError } from '../../execution/price-oracle.js';
import type { ToolErrorType, ToolFailure, ToolOutcome, ToolSuccess } from './types.js';
import { ValidationError } from './validate.js';

export function createSuccessOutcome<T>(
  data: T,
  metadata?: Record<string, unknown>,
  now: () => number = Date.now
): ToolSuccess<T> {
  const outcome: ToolSuccess<T> = { success: true, data, timestamp: now() };
  if (metadata && Object.keys(metadata).length > 0) {
    outcome.metadata = metadata;
  }
  return outcome;
}

export function createErrorOutcome(
  type: ToolErrorType,
  message: string,
  now: () => number = Date.now
): ToolFailure {
  return {
    success: false,
    error: { type, message, timestamp: now() },
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Maps a thrown fault onto the failure taxonomy. Anything that is not a
 * validation problem is charged to `fallback`.
 */
export function outcomeFromError(
  error: unknown,
  fallback: ToolErrorType = 'tool_error'
): ToolFailure {
  if (error instanceof ValidationError) {
    return createErrorOutcome('validation_error', error.message);
  }
  if (error instanceof PriceOracleError) {
    return createErrorOutcome('exchange_error', error.message);
  }
  return createErrorOutcome(fallback, errorMessage(error));
}

/**
 * Text rendering of an outcome for the model and the inspector UI.
 */
export function formatOutcomeForDisplay(outcome: ToolOutcome): string {
  if (!outcome.success) {
    return `Error (${outcome.error.type}): ${outcome.error.message}`;
  }
  if (typeof outcome.data === 'string') {
    return outcome.data;
  }
  return JSON.stringify(outcome.data ?? {}, null, 2);
}
