import type { SessionLifecycleState } from '@termfocus/shared-types';

/**
 * Allowed lifecycle moves. Any non-terminal state may also fail into `error`.
 */
const NEXT_STATES: Record<SessionLifecycleState, readonly SessionLifecycleState[]> = {
  idle: ['starting', 'error'],
  starting: ['running', 'error'],
  running: ['stopping', 'error'],
  stopping: ['stopped', 'error'],
  stopped: [],
  error: [],
};

export function canTransition(from: SessionLifecycleState, to: SessionLifecycleState): boolean {
  return NEXT_STATES[from].includes(to);
}

/**
 * States after which a session is deactivated and removed
 */
export function isTerminalState(state: SessionLifecycleState): boolean {
  return state === 'stopped' || state === 'error';
}

/**
 * The moves that take a live session to a terminal state along the graph
 */
export function teardownPath(state: SessionLifecycleState): SessionLifecycleState[] {
  switch (state) {
    case 'running':
      return ['stopping', 'stopped'];
    case 'stopping':
      return ['stopped'];
    case 'idle':
    case 'starting':
      return ['error'];
    case 'stopped':
    case 'error':
      return [];
  }
}
