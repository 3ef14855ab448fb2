import type { RemoteProfileRef } from "../transport/connection.js";

/**
 * Stable identifier of a running session
 */
export type SessionId = string;

/**
 * How the session reaches its process
 */
export type SessionType =
  | 'local'         // Process on this machine
  | 'remote-shell'  // Shell on a remote host (SSH)
  | 'socket';       // Socket-based stream

/**
 * Session lifecycle state values.
 */
export type SessionLifecycleState =
  | 'idle'
  | 'starting'
  | 'running'
  | 'stopping'
  | 'stopped'
  | 'error';

/**
 * Values allowed in the free-form session statistics map
 */
export type SessionStatValue = string | number | boolean | null;

export type SessionStats = Record<string, SessionStatValue>;

/**
 * Flags the auto-focus policy acts on
 */
export interface AutoFocusFlags {
  /** Interactive work: always takes focus */
  requiresInput: boolean;
  /** Long-lived work: fills an empty focus slot */
  isPersistent: boolean;
}

/**
 * Options accepted when a session is created
 */
export interface SessionConfig {
  /**
   * Context the new session should drive. Bound as soon as the session exists.
   */
  contextId?: string;

  /**
   * Command the session runs, used to infer the auto-focus flags
   */
  command?: string;

  /** Initial working directory */
  workingDirectory?: string;

  /** Remote profile reference (remote-shell sessions) */
  profile?: RemoteProfileRef;

  /** Endpoint (socket sessions) */
  socketUrl?: string;

  /** Overrides the inferred `requiresInput` flag */
  interactive?: boolean;

  /** Overrides the inferred `isPersistent` flag */
  persistent?: boolean;
}

// =============================================================================
// Read-side shapes
// =============================================================================

/**
 * Read-only view of a session handed out by the registry.
 * Timestamps are epoch milliseconds.
 */
export interface SessionSnapshot {
  readonly id: SessionId;
  readonly type: SessionType;
  readonly state: SessionLifecycleState;
  readonly createdAt: number;
  readonly lastActivityAt: number;
  readonly commandCount: number;
  readonly recentCommands: readonly string[];
  readonly currentWorkingDirectory: string | null;
  readonly sessionStats: Readonly<SessionStats>;
  readonly profile: RemoteProfileRef | null;
  readonly socketUrl: string | null;
  readonly contextId: string | null;
  readonly autoFocus: Readonly<AutoFocusFlags>;
}

/**
 * Serialized session shape consumed by diagnostics and UI layers
 */
export interface SerializedSession {
  id: SessionId;
  type: SessionType;
  state: SessionLifecycleState;
  /** ISO-8601 */
  createdAt: string;
  /** ISO-8601 */
  lastActivityAt: string;
  commandCount: number;
  recentCommands: string[];
  currentWorkingDirectory: string | null;
  sessionStats: SessionStats;
  profile: RemoteProfileRef | null;
  socketUrl: string | null;
}

/**
 * Aggregate counts over the live sessions
 */
export interface SessionRegistryStats {
  total: number;
  byState: Record<SessionLifecycleState, number>;
  byType: Record<SessionType, number>;
  totalCommands: number;
  focusedSessionId: SessionId | null;
}
