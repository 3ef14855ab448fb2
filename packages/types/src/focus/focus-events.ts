import type { SessionId } from "../session/session.js";

export type ContextId = string;

// ============================================================================
// Focus Events
// ============================================================================

export type FocusEventKind =
  | 'focusChanged'       // Focus moved to a session, or was cleared
  | 'blockDeactivated';  // A session stopped being routable

/**
 * One focus/lifecycle transition published by the focus router
 */
export interface FocusEvent {
  readonly kind: FocusEventKind;
  /**
   * Session the transition concerns. For a cleared focus this is the
   * session that lost it.
   */
  readonly sessionId: SessionId;
  readonly contextId?: ContextId;
  readonly message: string;
  /** ISO-8601 */
  readonly timestamp: string;
}

export type FocusEventListener = (event: FocusEvent) => void;

// ============================================================================
// Diagnostics
// ============================================================================

export interface FocusSnapshot {
  readonly focusedSession: SessionId | null;
  readonly contextBindings: Readonly<Record<ContextId, SessionId>>;
  readonly count: number;
}

/**
 * Where keyboard input should go right now
 */
export type InputRoute =
  | { destination: 'session'; sessionId: SessionId }
  | { destination: 'main-input' };
