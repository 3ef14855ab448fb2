/**
 * Registry Event Bus - typed lifecycle events published by the SessionRegistry
 *
 * Focus transitions go out on the FocusEventChannel; this bus carries the
 * session lifecycle itself (creation, state moves, commands, removal).
 */

import { EventEmitter } from 'events';
import type {
  SessionId,
  SessionLifecycleState,
  SessionSnapshot,
} from '@termfocus/shared-types';
import { logger } from '../config/logger.js';

export interface RegistryEvents {
  /** A session was allocated */
  'session:created': {
    session: SessionSnapshot;
  };

  /** A session moved along the lifecycle graph */
  'session:state': {
    sessionId: SessionId;
    from: SessionLifecycleState;
    to: SessionLifecycleState;
  };

  /** A command was recorded against a session */
  'session:command': {
    sessionId: SessionId;
    command: string;
    commandCount: number;
  };

  /** A session reached stopped/error and was removed */
  'session:removed': {
    sessionId: SessionId;
    finalState: SessionLifecycleState;
  };

  /** The set of live sessions changed */
  'sessions:changed': void;
}

/**
 * Type-safe EventBus for registry events
 *
 * Usage:
 * ```typescript
 * const events = new RegistryEventBus();
 *
 * events.on('session:removed', ({ sessionId, finalState }) => {
 *   console.log(sessionId, finalState);
 * });
 * ```
 */
export class RegistryEventBus extends EventEmitter {
  /**
   * Deliver to every listener. A listener that throws is logged and skipped;
   * the registry state change that produced the event is already complete.
   */
  override emit<K extends keyof RegistryEvents>(
    event: K,
    ...args: RegistryEvents[K] extends void ? [] : [RegistryEvents[K]]
  ): boolean {
    const listeners = this.rawListeners(event);
    for (const listener of listeners) {
      try {
        Reflect.apply(listener, this, args);
      } catch (error) {
        logger.warn({ error, event }, 'Registry event listener failed');
      }
    }
    return listeners.length > 0;
  }

  override on<K extends keyof RegistryEvents>(
    event: K,
    listener: RegistryEvents[K] extends void ? () => void : (data: RegistryEvents[K]) => void
  ): this {
    return super.on(event, listener);
  }

  override once<K extends keyof RegistryEvents>(
    event: K,
    listener: RegistryEvents[K] extends void ? () => void : (data: RegistryEvents[K]) => void
  ): this {
    return super.once(event, listener);
  }

  override off<K extends keyof RegistryEvents>(
    event: K,
    listener: RegistryEvents[K] extends void ? () => void : (data: RegistryEvents[K]) => void
  ): this {
    return super.off(event, listener);
  }

  override removeAllListeners(event?: keyof RegistryEvents): this {
    return super.removeAllListeners(event);
  }
}
