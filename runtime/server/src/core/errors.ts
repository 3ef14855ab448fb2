/**
 * Error taxonomy for the session runtime
 *
 * Focus and binding operations never throw. Registry lifecycle operations
 * throw UnknownSessionError / InvalidTransitionError. Connection errors come
 * from the transport collaborator and reach callers wrapped in a single
 * SessionLaunchError per launch.
 */

import type {
  ConnectionFailureKind,
  SessionId,
  SessionLifecycleState,
} from '@termfocus/shared-types';

export type TermfocusErrorCode =
  | 'UNKNOWN_SESSION'
  | 'INVALID_TRANSITION'
  | 'AUTH_ERROR'
  | 'CONFIG_ERROR'
  | 'NETWORK_ERROR'
  | 'SESSION_LAUNCH_FAILED';

export class TermfocusError extends Error {
  readonly code: TermfocusErrorCode;

  constructor(code: TermfocusErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// ============================================================================
// Registry errors
// ============================================================================

export class UnknownSessionError extends TermfocusError {
  readonly sessionId: SessionId;

  constructor(sessionId: SessionId) {
    super('UNKNOWN_SESSION', `Unknown session: ${sessionId}`);
    this.sessionId = sessionId;
  }
}

export class InvalidTransitionError extends TermfocusError {
  readonly sessionId: SessionId;
  readonly from: SessionLifecycleState;
  readonly to: SessionLifecycleState;

  constructor(sessionId: SessionId, from: SessionLifecycleState, to: SessionLifecycleState) {
    super('INVALID_TRANSITION', `Session ${sessionId} cannot move from ${from} to ${to}`);
    this.sessionId = sessionId;
    this.from = from;
    this.to = to;
  }
}

// ============================================================================
// Connection errors (raised by the transport collaborator)
// ============================================================================

export abstract class ConnectionError extends TermfocusError {
  abstract readonly kind: ConnectionFailureKind;
}

/** Invalid or missing credential material */
export class AuthError extends ConnectionError {
  readonly kind = 'auth' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super('AUTH_ERROR', message, options);
  }
}

/** Malformed profile or configuration */
export class ConfigError extends ConnectionError {
  readonly kind = 'config' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_ERROR', message, options);
  }
}

/** Socket-level failure */
export class NetworkError extends ConnectionError {
  readonly kind = 'network' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super('NETWORK_ERROR', message, options);
  }
}

/**
 * The single failure signal a launch surfaces to its caller
 */
export class SessionLaunchError extends TermfocusError {
  readonly sessionId: SessionId;
  readonly kind: ConnectionFailureKind;

  constructor(sessionId: SessionId, kind: ConnectionFailureKind, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('SESSION_LAUNCH_FAILED', `Session ${sessionId} failed to start (${kind}): ${reason}`, { cause });
    this.sessionId = sessionId;
    this.kind = kind;
  }
}

export function isConnectionError(error: unknown): error is ConnectionError {
  return error instanceof ConnectionError;
}
