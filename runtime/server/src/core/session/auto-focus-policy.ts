import type { AutoFocusFlags, SessionConfig, SessionType } from '@termfocus/shared-types';
import { ProcessDetector } from './process-detector.js';

/**
 * Flags for a session that runs no known command
 */
const TYPE_DEFAULTS: Record<SessionType, AutoFocusFlags> = {
  // Interactive shells
  local: { requiresInput: true, isPersistent: true },
  'remote-shell': { requiresInput: true, isPersistent: true },
  // Long-lived stream, watched rather than typed into
  socket: { requiresInput: false, isPersistent: true },
};

/**
 * Derive the auto-focus flags for a new session.
 *
 * Explicit `interactive` / `persistent` overrides win, then the detected
 * command, then the session type.
 */
export function deriveAutoFocusFlags(
  type: SessionType,
  config: SessionConfig,
  detector: ProcessDetector
): AutoFocusFlags {
  let inferred = TYPE_DEFAULTS[type];

  if (config.command !== undefined && config.command.trim() !== '') {
    const info = detector.detect(config.command);
    inferred = { requiresInput: info.requiresInput, isPersistent: info.isPersistent };
  }

  return {
    requiresInput: config.interactive ?? inferred.requiresInput,
    isPersistent: config.persistent ?? inferred.isPersistent,
  };
}
