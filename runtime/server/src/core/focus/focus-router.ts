/**
 * FocusRouter - sole authority on which session owns keyboard input
 *
 * Holds the globally focused session id and the context → session bindings.
 * Every observable transition is published on the FocusEventChannel.
 *
 * Routing is advisory: nothing here validates that a session exists, so focus
 * can be granted before a session finishes starting, and missing references
 * degrade to no-ops.
 */

import type {
  AutoFocusFlags,
  ContextId,
  FocusEvent,
  FocusEventKind,
  FocusSnapshot,
  InputRoute,
  SessionId,
} from '@termfocus/shared-types';
import { logger } from '../../config/logger.js';
import type { FocusEventChannel } from './focus-event-channel.js';

export class FocusRouter {
  private focusedSession: SessionId | null = null;
  private readonly contextBindings = new Map<ContextId, SessionId>();
  private readonly channel: FocusEventChannel;

  constructor(channel: FocusEventChannel) {
    this.channel = channel;
  }

  get focusedSessionId(): SessionId | null {
    return this.focusedSession;
  }

  // ==========================================================================
  // Focus
  // ==========================================================================

  focus(sessionId: SessionId, contextId?: ContextId): void {
    const previous = this.focusedSession;
    this.focusedSession = sessionId;

    this.emit('focusChanged', sessionId, `Session focused (previous: ${previous ?? 'none'})`, contextId);
    logger.debug({ sessionId, previous, contextId }, 'Focus granted');
  }

  clearFocus(): void {
    const previous = this.focusedSession;
    this.focusedSession = null;

    if (previous !== null) {
      this.emit('focusChanged', previous, 'Focus cleared');
    }
    logger.debug({ previous }, 'Focus cleared');
  }

  isFocused(sessionId: SessionId): boolean {
    return this.focusedSession === sessionId;
  }

  /**
   * Interactive work always takes focus; persistent work only fills an
   * empty slot; everything else leaves focus alone.
   */
  applyAutoFocus(sessionId: SessionId, flags: AutoFocusFlags, contextId?: ContextId): void {
    if (flags.requiresInput) {
      this.focus(sessionId, contextId);
      return;
    }

    if (flags.isPersistent && this.focusedSession === null) {
      this.focus(sessionId, contextId);
      return;
    }

    logger.debug({ sessionId, ...flags }, 'No auto-focus applied');
  }

  // ==========================================================================
  // Context bindings
  // ==========================================================================

  bindContext(contextId: ContextId, sessionId: SessionId): void {
    this.contextBindings.set(contextId, sessionId);
  }

  unbindContext(contextId: ContextId): void {
    this.contextBindings.delete(contextId);
  }

  /**
   * Drop every binding that points at the session
   */
  unbindSession(sessionId: SessionId): void {
    for (const [contextId, boundSessionId] of this.contextBindings) {
      if (boundSessionId === sessionId) {
        this.contextBindings.delete(contextId);
      }
    }
  }

  getBoundSession(contextId: ContextId): SessionId | undefined {
    return this.contextBindings.get(contextId);
  }

  /**
   * Resolve where input typed in a context should go: the context's own
   * session, then the focused session, then the main input field.
   */
  resolveInputTarget(contextId?: ContextId): InputRoute {
    const bound = contextId === undefined ? undefined : this.contextBindings.get(contextId);
    const sessionId = bound ?? this.focusedSession;
    if (sessionId === null) {
      return { destination: 'main-input' };
    }
    return { destination: 'session', sessionId };
  }

  // ==========================================================================
  // Cleanup
  // ==========================================================================

  handleDeactivation(sessionId: SessionId): void {
    this.unbindSession(sessionId);

    if (this.focusedSession === sessionId) {
      this.clearFocus();
    }

    this.emit('blockDeactivated', sessionId, 'Session deactivated and its bindings removed');
  }

  /**
   * Tear down a context. Focus is cleared only when it is held by the
   * session the context was bound to.
   */
  cleanupContext(contextId: ContextId): void {
    const boundSessionId = this.contextBindings.get(contextId);
    if (boundSessionId === undefined) {
      return;
    }

    this.contextBindings.delete(contextId);

    if (this.focusedSession === boundSessionId) {
      this.clearFocus();
    }

    logger.debug({ contextId, sessionId: boundSessionId }, 'Context cleaned up');
  }

  // ==========================================================================
  // Diagnostics
  // ==========================================================================

  snapshot(): FocusSnapshot {
    const contextBindings = Object.freeze(Object.fromEntries(this.contextBindings));
    return Object.freeze({
      focusedSession: this.focusedSession,
      contextBindings,
      count: this.contextBindings.size,
    });
  }

  /**
   * Hard reinitialization. Emits nothing.
   */
  reset(): void {
    this.focusedSession = null;
    this.contextBindings.clear();
    logger.debug('Focus state reset');
  }

  private emit(kind: FocusEventKind, sessionId: SessionId, message: string, contextId?: ContextId): void {
    const event: FocusEvent = Object.freeze({
      kind,
      sessionId,
      message,
      timestamp: new Date().toISOString(),
      ...(contextId === undefined ? {} : { contextId }),
    });
    this.channel.publish(event);
  }
}
