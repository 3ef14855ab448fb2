/**
 * Runtime factory - wires the focus channel, router, registry and launcher
 *
 * One runtime per application. Consumers get the instances by reference;
 * nothing here is a process-wide singleton.
 *
 * @example
 * ```typescript
 * import { createSessionRuntime } from '@termfocus/session-runtime';
 *
 * const runtime = createSessionRuntime({ establisher: mySshTransport });
 *
 * runtime.channel.subscribe((event) => ui.onFocusEvent(event));
 *
 * const sessionId = await runtime.launcher?.launch({ type: 'local' });
 * ```
 */

import { env } from './config/env.js';
import { logger } from './config/logger.js';
import { RegistryEventBus } from './core/event-bus.js';
import { FocusEventChannel } from './core/focus/focus-event-channel.js';
import { FocusRouter } from './core/focus/focus-router.js';
import { SessionRegistry } from './core/session-registry.js';
import { SessionLauncher, type ConnectionEstablisher } from './lib/transport/session-launcher.js';

export interface SessionRuntimeConfig {
  /** Transport collaborator. Without one, no launcher is created. */
  establisher?: ConnectionEstablisher;

  /**
   * Capacity of each session's recent-command log
   *
   * @default env.RECENT_COMMAND_LIMIT (50)
   */
  recentCommandLimit?: number;

  /**
   * @default env.FOCUS_CHANNEL_MAX_LISTENERS (20)
   */
  maxFocusListeners?: number;
}

export type SessionRuntime = {
  channel: FocusEventChannel;
  router: FocusRouter;
  registry: SessionRegistry;
  events: RegistryEventBus;
  launcher: SessionLauncher | null;

  /**
   * Tear every session down, then close the focus channel
   */
  shutdown(): void;
};

export function createSessionRuntime(config: SessionRuntimeConfig = {}): SessionRuntime {
  const channel = new FocusEventChannel({
    maxListeners: config.maxFocusListeners ?? env.FOCUS_CHANNEL_MAX_LISTENERS,
  });
  const router = new FocusRouter(channel);
  const events = new RegistryEventBus();
  const registry = new SessionRegistry(router, {
    channel,
    events,
    recentCommandLimit: config.recentCommandLimit ?? env.RECENT_COMMAND_LIMIT,
  });
  const launcher = config.establisher ? new SessionLauncher(registry, config.establisher) : null;

  logger.info({ hasLauncher: launcher !== null }, 'Session runtime created');

  return {
    channel,
    router,
    registry,
    events,
    launcher,
    shutdown() {
      logger.info('Shutting down session runtime...');
      registry.shutdown();
      channel.close();
      events.removeAllListeners();
    },
  };
}
