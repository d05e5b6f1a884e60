/**
 * Stream Error Codes and Classes
 *
 * - transient collaborator failures are recovered by the issuing handler
 * - validation failures drop the offending item
 * - state-invariant violations stop the dispatch loop
 * - shutdown-path failures are logged and the sequence proceeds
 */

import type { CollaboratorName } from './collaborators.js';

// ============================================================================
// Error Codes
// ============================================================================

export const StreamErrorCodes = {
  TRANSIENT_COLLABORATOR: 'TRANSIENT_COLLABORATOR',
  COLLABORATOR_TIMEOUT: 'COLLABORATOR_TIMEOUT',
  VALIDATION: 'VALIDATION',
  STATE_INVARIANT: 'STATE_INVARIANT',
  SHUTDOWN_PATH: 'SHUTDOWN_PATH',
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const;

export type StreamErrorCode = (typeof StreamErrorCodes)[keyof typeof StreamErrorCodes];

// ============================================================================
// Error Classes
// ============================================================================

export class StreamError extends Error {
  readonly code: StreamErrorCode;
  readonly data?: Record<string, unknown>;

  constructor(code: StreamErrorCode, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'StreamError';
    this.code = code;
    this.data = data;
  }
}

export class TransientCollaboratorError extends StreamError {
  constructor(
    public readonly collaborator: CollaboratorName,
    message: string,
    public readonly status?: number
  ) {
    super(StreamErrorCodes.TRANSIENT_COLLABORATOR, message, { collaborator, status });
    this.name = 'TransientCollaboratorError';
  }
}

export class CollaboratorTimeoutError extends StreamError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(StreamErrorCodes.COLLABORATOR_TIMEOUT, `${operation} timed out after ${timeoutMs}ms`, {
      operation,
      timeoutMs,
    });
    this.name = 'CollaboratorTimeoutError';
  }
}

export class ValidationError extends StreamError {
  constructor(message: string, public readonly errors: Array<{ path: string; message: string }> = []) {
    super(StreamErrorCodes.VALIDATION, message, { errors });
    this.name = 'ValidationError';
  }
}

export class StateInvariantError extends StreamError {
  constructor(message: string, data?: Record<string, unknown>) {
    super(StreamErrorCodes.STATE_INVARIANT, message, data);
    this.name = 'StateInvariantError';
  }
}

export class ShutdownPathError extends StreamError {
  constructor(message: string, data?: Record<string, unknown>) {
    super(StreamErrorCodes.SHUTDOWN_PATH, message, data);
    this.name = 'ShutdownPathError';
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

export function isTransientError(error: unknown): error is TransientCollaboratorError | CollaboratorTimeoutError {
  return error instanceof TransientCollaboratorError || error instanceof CollaboratorTimeoutError;
}

export function isStateInvariantError(error: unknown): error is StateInvariantError {
  return error instanceof StateInvariantError;
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
