/**
 * termfocus session runtime - public API
 *
 * @example
 * ```typescript
 * import { createSessionRuntime } from '@termfocus/session-runtime';
 *
 * const { registry, router, channel } = createSessionRuntime();
 *
 * channel.subscribe((event) => console.log(event.kind, event.sessionId));
 *
 * const id = registry.createSession('local', { contextId: 'chat-1' });
 * registry.transition(id, 'running');   // interactive shell takes focus
 * router.isFocused(id);                  // true
 * ```
 */

// ============================================================================
// Runtime Factory
// ============================================================================

export { createSessionRuntime } from './runtime.js';
export type { SessionRuntime, SessionRuntimeConfig } from './runtime.js';

// ============================================================================
// Core
// ============================================================================

export { FocusRouter } from './core/focus/focus-router.js';
export { FocusEventChannel } from './core/focus/focus-event-channel.js';
export type { FocusEventChannelOptions } from './core/focus/focus-event-channel.js';
export { SessionRegistry } from './core/session-registry.js';
export type { SessionRegistryOptions } from './core/session-registry.js';
export { RegistryEventBus } from './core/event-bus.js';
export type { RegistryEvents } from './core/event-bus.js';
export { deriveAutoFocusFlags } from './core/session/auto-focus-policy.js';
export { ProcessDetector, loadProcessPatterns } from './core/session/process-detector.js';
export type { ProcessDetectorOptions, ProcessInfo, ProcessType } from './core/session/process-detector.js';
export { canTransition } from './core/session/lifecycle.js';

// ============================================================================
// Errors
// ============================================================================

export {
  TermfocusError,
  UnknownSessionError,
  InvalidTransitionError,
  ConnectionError,
  AuthError,
  ConfigError,
  NetworkError,
  SessionLaunchError,
} from './core/errors.js';

// ============================================================================
// Transport boundary
// ============================================================================

export { SessionLauncher } from './lib/transport/session-launcher.js';
export type { ConnectionEstablisher, LaunchRequest } from './lib/transport/session-launcher.js';
export { validateProfile, toProfileRef } from './lib/transport/profile-validation.js';
export { parsePrivateKey, DEFAULT_KEY_STRATEGIES } from './lib/transport/private-key.js';
export type { KeyParseStrategy } from './lib/transport/private-key.js';

// ============================================================================
// Configuration
// ============================================================================

export { loadEnv } from './config/env.js';
export type { Env } from './config/env.js';
export { logger } from './config/logger.js';

export type * from '@termfocus/shared-types';
