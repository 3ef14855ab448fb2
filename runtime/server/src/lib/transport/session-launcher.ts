/**
 * SessionLauncher - runs a session through connection establishment
 *
 * The registry is synchronous and never touches the network. The launcher
 * creates the session, awaits the transport collaborator outside any registry
 * call, then moves the session to `running` or `error`. Whatever the
 * collaborator throws reaches the caller as one SessionLaunchError.
 *
 * No retries: a reconnect is a fresh launch.
 */

import type {
  ConnectionFailureKind,
  ConnectionHandle,
  ConnectionTarget,
  RemoteProfile,
  SessionConfig,
  SessionId,
} from '@termfocus/shared-types';
import { logger } from '../../config/logger.js';
import {
  ConfigError,
  isConnectionError,
  SessionLaunchError,
  UnknownSessionError,
} from '../../core/errors.js';
import type { SessionRegistry } from '../../core/session-registry.js';
import { toProfileRef, validateProfile } from './profile-validation.js';

/**
 * Transport collaborator. Rejects with AuthError, ConfigError or NetworkError.
 */
export interface ConnectionEstablisher {
  establishConnection(target: ConnectionTarget): Promise<ConnectionHandle>;
}

export type LaunchRequest =
  | { type: 'local'; config?: SessionConfig }
  | { type: 'remote-shell'; profile: RemoteProfile; config?: SessionConfig }
  | { type: 'socket'; url: string; config?: SessionConfig };

export class SessionLauncher {
  private readonly registry: SessionRegistry;
  private readonly establisher: ConnectionEstablisher;
  private readonly handles = new Map<SessionId, ConnectionHandle>();

  constructor(registry: SessionRegistry, establisher: ConnectionEstablisher) {
    this.registry = registry;
    this.establisher = establisher;

    this.registry.events.on('session:removed', ({ sessionId }) => {
      this.releaseHandle(sessionId);
    });
  }

  /**
   * Create a session and bring it to `running`.
   *
   * @throws SessionLaunchError when the connection could not be established;
   *   the session has already moved to `error` and been removed
   */
  async launch(request: LaunchRequest): Promise<SessionId> {
    const sessionId = this.registry.createSession(request.type, this.buildConfig(request));

    if (request.type === 'local') {
      this.registry.transition(sessionId, 'running');
      return sessionId;
    }

    let handle: ConnectionHandle;
    try {
      handle = await this.connect(request);
    } catch (error) {
      const kind = failureKind(error);
      logger.warn({ sessionId, kind, error }, 'Session connection failed');
      if (this.registry.has(sessionId)) {
        this.registry.transition(sessionId, 'error');
      }
      throw new SessionLaunchError(sessionId, kind, error);
    }

    // Torn down by the caller while connecting
    const current = this.registry.get(sessionId);
    if (!current) {
      logger.info({ sessionId }, 'Session gone before connection completed, closing handle');
      await handle.close();
      throw new UnknownSessionError(sessionId);
    }

    this.handles.set(sessionId, handle);
    if (current.state === 'starting') {
      this.registry.transition(sessionId, 'running');
    }
    logger.info({ sessionId, type: request.type, connectionId: handle.id }, 'Session launched');

    return sessionId;
  }

  getHandle(sessionId: SessionId): ConnectionHandle | undefined {
    return this.handles.get(sessionId);
  }

  get openHandleCount(): number {
    return this.handles.size;
  }

  private async connect(request: Exclude<LaunchRequest, { type: 'local' }>): Promise<ConnectionHandle> {
    if (request.type === 'remote-shell') {
      const problem = validateProfile(request.profile);
      if (problem !== undefined) {
        throw new ConfigError(problem);
      }
      return this.establisher.establishConnection({ kind: 'remote-shell', profile: request.profile });
    }

    if (request.url.trim() === '') {
      throw new ConfigError('Socket URL is required');
    }
    return this.establisher.establishConnection({ kind: 'socket', url: request.url });
  }

  private buildConfig(request: LaunchRequest): SessionConfig {
    const config = request.config ?? {};
    switch (request.type) {
      case 'local':
        return config;
      case 'remote-shell':
        return { ...config, profile: toProfileRef(request.profile) };
      case 'socket':
        return { ...config, socketUrl: request.url };
    }
  }

  private releaseHandle(sessionId: SessionId): void {
    const handle = this.handles.get(sessionId);
    if (!handle) {
      return;
    }
    this.handles.delete(sessionId);

    handle.close().catch((error: unknown) => {
      logger.error({ error, sessionId, connectionId: handle.id }, 'Failed to close connection handle');
    });
  }
}

function failureKind(error: unknown): ConnectionFailureKind {
  return isConnectionError(error) ? error.kind : 'network';
}
