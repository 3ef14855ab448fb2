/**
 * SessionRegistry - authoritative owner of all SessionInstance objects
 *
 * Responsibilities:
 * - Allocate sessions and derive their auto-focus flags
 * - Validate lifecycle transitions against the state graph
 * - Drive the FocusRouter: auto-focus on `running`, deactivation on
 *   `stopped` / `error`
 * - Publish lifecycle events on the RegistryEventBus
 *
 * The router never sees SessionInstance objects, only ids.
 */

import { randomUUID } from 'crypto';
import type {
  FocusEvent,
  SerializedSession,
  SessionConfig,
  SessionId,
  SessionLifecycleState,
  SessionRegistryStats,
  SessionSnapshot,
  SessionStatValue,
  SessionType,
} from '@termfocus/shared-types';
import { logger } from '../config/logger.js';
import { ConfigError, InvalidTransitionError, UnknownSessionError } from './errors.js';
import { RegistryEventBus } from './event-bus.js';
import type { FocusEventChannel } from './focus/focus-event-channel.js';
import type { FocusRouter } from './focus/focus-router.js';
import { deriveAutoFocusFlags } from './session/auto-focus-policy.js';
import { canTransition, isTerminalState, teardownPath } from './session/lifecycle.js';
import { ProcessDetector } from './session/process-detector.js';
import { DEFAULT_RECENT_COMMAND_LIMIT, SessionInstance } from './session/session-instance.js';

export interface SessionRegistryOptions {
  /** Capacity of each session's recent-command log */
  recentCommandLimit?: number;
  /** Channel to watch for focus grants (feeds the `focusCount` stat) */
  channel?: FocusEventChannel;
  events?: RegistryEventBus;
  detector?: ProcessDetector;
}

export class SessionRegistry {
  private readonly sessions = new Map<SessionId, SessionInstance>();

  // Dependencies
  private readonly router: FocusRouter;
  private readonly detector: ProcessDetector;
  private readonly recentCommandLimit: number;
  private readonly unsubscribeFocus: () => void;

  readonly events: RegistryEventBus;

  /**
   * @throws ConfigError when `recentCommandLimit` is not a positive integer
   */
  constructor(router: FocusRouter, options: SessionRegistryOptions = {}) {
    this.router = router;
    this.detector = options.detector ?? new ProcessDetector();
    this.recentCommandLimit = options.recentCommandLimit ?? DEFAULT_RECENT_COMMAND_LIMIT;
    if (!Number.isInteger(this.recentCommandLimit) || this.recentCommandLimit < 1) {
      throw new ConfigError(`recentCommandLimit must be a positive integer, got ${this.recentCommandLimit}`);
    }
    this.events = options.events ?? new RegistryEventBus();
    this.unsubscribeFocus = options.channel
      ? options.channel.subscribe((event) => this.handleFocusEvent(event))
      : () => {};
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Allocate a session in `starting`. Auto-focus is applied later, when the
   * session transitions to `running`.
   */
  createSession(type: SessionType, config: SessionConfig = {}): SessionId {
    const id = randomUUID();
    const autoFocus = deriveAutoFocusFlags(type, config, this.detector);

    const instance = new SessionInstance({
      id,
      type,
      state: 'starting',
      autoFocus,
      contextId: config.contextId,
      profile: config.profile,
      socketUrl: config.socketUrl,
      workingDirectory: config.workingDirectory,
      recentCommandLimit: this.recentCommandLimit,
    });
    this.sessions.set(id, instance);

    if (config.contextId !== undefined) {
      this.router.bindContext(config.contextId, id);
    }

    logger.info({ sessionId: id, type, autoFocus, contextId: config.contextId }, 'Session created');

    this.events.emit('session:created', { session: instance.snapshot() });
    this.events.emit('sessions:changed');

    return id;
  }

  /**
   * Move a session along the lifecycle graph.
   *
   * @throws UnknownSessionError when the session is not live
   * @throws InvalidTransitionError when the move is not allowed; state is unchanged
   */
  transition(sessionId: SessionId, newState: SessionLifecycleState): void {
    const instance = this.require(sessionId);
    const from = instance.state;

    if (!canTransition(from, newState)) {
      throw new InvalidTransitionError(sessionId, from, newState);
    }

    // Router and map are settled before any listener runs
    instance.setState(newState);
    logger.debug({ sessionId, from, to: newState }, 'Session state changed');

    const removed = isTerminalState(newState);
    if (newState === 'running') {
      this.router.applyAutoFocus(sessionId, instance.autoFocus, instance.contextId ?? undefined);
    } else if (removed) {
      this.router.handleDeactivation(sessionId);
      this.sessions.delete(sessionId);
      logger.info({ sessionId, finalState: newState, liveCount: this.sessions.size }, 'Session removed');
    }

    this.events.emit('session:state', { sessionId, from, to: newState });
    if (removed) {
      this.events.emit('session:removed', { sessionId, finalState: newState });
      this.events.emit('sessions:changed');
    }
  }

  /**
   * @throws UnknownSessionError when the session is not live
   */
  recordCommand(sessionId: SessionId, command: string): void {
    const instance = this.require(sessionId);
    instance.addCommand(command);
    this.events.emit('session:command', { sessionId, command, commandCount: instance.commandCount });
  }

  setWorkingDirectory(sessionId: SessionId, cwd: string | null): boolean {
    const instance = this.sessions.get(sessionId);
    if (!instance) {
      return false;
    }
    instance.setWorkingDirectory(cwd);
    return true;
  }

  setSessionStat(sessionId: SessionId, key: string, value: SessionStatValue): boolean {
    const instance = this.sessions.get(sessionId);
    if (!instance) {
      return false;
    }
    instance.setStat(key, value);
    return true;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  get(sessionId: SessionId): SessionSnapshot | undefined {
    return this.sessions.get(sessionId)?.snapshot();
  }

  has(sessionId: SessionId): boolean {
    return this.sessions.has(sessionId);
  }

  list(): SessionSnapshot[] {
    return Array.from(this.sessions.values(), (instance) => instance.snapshot());
  }

  toJSON(sessionId: SessionId): SerializedSession | undefined {
    return this.sessions.get(sessionId)?.toJSON();
  }

  stats(): SessionRegistryStats {
    const byState: Record<SessionLifecycleState, number> = {
      idle: 0,
      starting: 0,
      running: 0,
      stopping: 0,
      stopped: 0,
      error: 0,
    };
    const byType: Record<SessionType, number> = { local: 0, 'remote-shell': 0, socket: 0 };
    let totalCommands = 0;

    for (const instance of this.sessions.values()) {
      byState[instance.state]++;
      byType[instance.type]++;
      totalCommands += instance.commandCount;
    }

    return {
      total: this.sessions.size,
      byState,
      byType,
      totalCommands,
      focusedSessionId: this.router.focusedSessionId,
    };
  }

  // ==========================================================================
  // Shutdown
  // ==========================================================================

  /**
   * Tear every live session down along the lifecycle graph, so each one is
   * deactivated on the router.
   */
  shutdown(): void {
    logger.info({ liveCount: this.sessions.size }, 'Shutting down SessionRegistry...');

    for (const sessionId of Array.from(this.sessions.keys())) {
      const instance = this.sessions.get(sessionId);
      if (!instance) {
        continue;
      }
      for (const next of teardownPath(instance.state)) {
        this.transition(sessionId, next);
      }
    }

    this.unsubscribeFocus();
    logger.info('SessionRegistry shutdown complete');
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private require(sessionId: SessionId): SessionInstance {
    const instance = this.sessions.get(sessionId);
    if (!instance) {
      throw new UnknownSessionError(sessionId);
    }
    return instance;
  }

  private handleFocusEvent(event: FocusEvent): void {
    if (event.kind !== 'focusChanged' || !this.router.isFocused(event.sessionId)) {
      return;
    }
    this.sessions.get(event.sessionId)?.incrementStat('focusCount');
  }
}
