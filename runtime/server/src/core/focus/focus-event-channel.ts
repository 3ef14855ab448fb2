/**
 * Focus Event Channel - single-producer, multi-consumer broadcast channel
 *
 * The FocusRouter publishes every focus transition here; UI and input layers
 * subscribe. Delivery is synchronous and best-effort: a closed channel drops
 * events, and a failing subscriber never reaches the producer.
 */

import { EventEmitter } from 'events';
import type { FocusEvent, FocusEventListener } from '@termfocus/shared-types';
import { logger } from '../../config/logger.js';

const FOCUS_EVENT = 'focus';

const DEFAULT_MAX_LISTENERS = 20;

export interface FocusEventChannelOptions {
  /** Subscriber count above which Node warns about a possible leak */
  maxListeners?: number;
}

/**
 * publish / subscribe / close are the only entry points; the emitter stays private.
 */
export class FocusEventChannel {
  private readonly emitter = new EventEmitter();
  private closed = false;

  constructor(options: FocusEventChannelOptions = {}) {
    this.emitter.setMaxListeners(options.maxListeners ?? DEFAULT_MAX_LISTENERS);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get subscriberCount(): number {
    return this.emitter.listenerCount(FOCUS_EVENT);
  }

  get maxListeners(): number {
    return this.emitter.getMaxListeners();
  }

  /**
   * Deliver an event to every subscriber.
   *
   * @returns false when the channel is closed and the event was dropped
   */
  publish(event: FocusEvent): boolean {
    if (this.closed) {
      logger.trace({ kind: event.kind, sessionId: event.sessionId }, 'Focus channel closed, event dropped');
      return false;
    }
    this.emitter.emit(FOCUS_EVENT, event);
    return true;
  }

  /**
   * Attach a subscriber. The returned function detaches it.
   */
  subscribe(listener: FocusEventListener): () => void {
    if (this.closed) {
      return () => {};
    }

    const guarded = (event: FocusEvent): void => {
      try {
        listener(event);
      } catch (error) {
        logger.warn({ error, kind: event.kind, sessionId: event.sessionId }, 'Focus event subscriber failed');
      }
    };

    this.emitter.on(FOCUS_EVENT, guarded);
    return () => {
      this.emitter.off(FOCUS_EVENT, guarded);
    };
  }

  /**
   * Close the channel for good. Idempotent.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.emitter.removeAllListeners(FOCUS_EVENT);
    logger.debug('Focus event channel closed');
  }
}
