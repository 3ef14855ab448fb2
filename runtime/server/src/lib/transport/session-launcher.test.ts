/**
 * Tests for SessionLauncher
 *
 * The transport collaborator is an in-process fake; no socket is opened.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type {
  ConnectionHandle,
  ConnectionTarget,
  RemoteProfile,
  SessionId,
} from '@termfocus/shared-types';
import { AuthError, NetworkError, SessionLaunchError, UnknownSessionError } from '../../core/errors.js';
import { FocusEventChannel } from '../../core/focus/focus-event-channel.js';
import { FocusRouter } from '../../core/focus/focus-router.js';
import { SessionRegistry } from '../../core/session-registry.js';
import { SessionLauncher, type ConnectionEstablisher } from './session-launcher.js';

const PROFILE: RemoteProfile = {
  id: 'profile-1',
  name: 'staging',
  host: 'staging.example.internal',
  port: 22,
  username: 'deploy',
  authType: 'password',
  password: 'test-secret',
};

class FakeEstablisher implements ConnectionEstablisher {
  readonly targets: ConnectionTarget[] = [];
  result: () => Promise<ConnectionHandle>;

  constructor(result: () => Promise<ConnectionHandle>) {
    this.result = result;
  }

  establishConnection(target: ConnectionTarget): Promise<ConnectionHandle> {
    this.targets.push(target);
    return this.result();
  }
}

function makeHandle(id = 'conn-1') {
  return { id, close: vi.fn(() => Promise.resolve()) };
}

let router: FocusRouter;
let registry: SessionRegistry;

beforeEach(() => {
  router = new FocusRouter(new FocusEventChannel());
  registry = new SessionRegistry(router);
});

describe('SessionLauncher', () => {
  it('brings a local session straight to running', async () => {
    const establisher = new FakeEstablisher(() => Promise.resolve(makeHandle()));
    const launcher = new SessionLauncher(registry, establisher);

    const id = await launcher.launch({ type: 'local', config: { contextId: 'ctx-1' } });

    expect(registry.get(id)?.state).toBe('running');
    expect(router.focusedSessionId).toBe(id);
    expect(establisher.targets).toEqual([]);
  });

  it('connects a remote shell and keeps its handle', async () => {
    const handle = makeHandle();
    const establisher = new FakeEstablisher(() => Promise.resolve(handle));
    const launcher = new SessionLauncher(registry, establisher);

    const id = await launcher.launch({ type: 'remote-shell', profile: PROFILE });

    expect(establisher.targets).toEqual([{ kind: 'remote-shell', profile: PROFILE }]);
    expect(registry.get(id)?.state).toBe('running');
    expect(registry.get(id)?.profile).toEqual({
      id: 'profile-1',
      name: 'staging',
      host: 'staging.example.internal',
      port: 22,
      username: 'deploy',
      authType: 'password',
    });
    expect(launcher.getHandle(id)).toBe(handle);
    expect(launcher.openHandleCount).toBe(1);
  });

  it('records the endpoint of a socket session', async () => {
    const establisher = new FakeEstablisher(() => Promise.resolve(makeHandle()));
    const launcher = new SessionLauncher(registry, establisher);

    const id = await launcher.launch({ type: 'socket', url: 'ws://localhost:9000' });

    expect(establisher.targets).toEqual([{ kind: 'socket', url: 'ws://localhost:9000' }]);
    expect(registry.get(id)?.socketUrl).toBe('ws://localhost:9000');
    // Sockets are persistent, so they fill the empty focus slot
    expect(router.focusedSessionId).toBe(id);
  });

  it('wraps an auth failure and removes the session', async () => {
    const establisher = new FakeEstablisher(() => Promise.reject(new AuthError('Authentication failed')));
    const launcher = new SessionLauncher(registry, establisher);
    const finalStates: string[] = [];
    registry.events.on('session:removed', ({ finalState }) => finalStates.push(finalState));

    const error = await launcher.launch({ type: 'remote-shell', profile: PROFILE }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SessionLaunchError);
    expect(error).toMatchObject({ code: 'SESSION_LAUNCH_FAILED', kind: 'auth' });
    if (error instanceof SessionLaunchError) {
      expect(error.message).toBe(`Session ${error.sessionId} failed to start (auth): Authentication failed`);
      expect(error.cause).toBeInstanceOf(AuthError);
      expect(registry.has(error.sessionId)).toBe(false);
    }
    expect(finalStates).toEqual(['error']);
    expect(registry.list()).toEqual([]);
  });

  it('rejects an invalid profile without calling the transport', async () => {
    const establisher = new FakeEstablisher(() => Promise.resolve(makeHandle()));
    const launcher = new SessionLauncher(registry, establisher);

    await expect(launcher.launch({ type: 'remote-shell', profile: { ...PROFILE, host: '' } })).rejects.toMatchObject({
      kind: 'config',
      message: expect.stringContaining('(config): Host is required'),
    });
    expect(establisher.targets).toEqual([]);
    expect(registry.list()).toEqual([]);
  });

  it('rejects a blank socket URL', async () => {
    const establisher = new FakeEstablisher(() => Promise.resolve(makeHandle()));
    const launcher = new SessionLauncher(registry, establisher);

    await expect(launcher.launch({ type: 'socket', url: '  ' })).rejects.toMatchObject({
      kind: 'config',
      message: expect.stringContaining('Socket URL is required'),
    });
  });

  it.each([
    ['NetworkError', new NetworkError('Connection refused'), 'network'],
    ['unclassified error', new Error('socket hang up'), 'network'],
  ])('classifies %s as a network failure', async (_label, cause, kind) => {
    const establisher = new FakeEstablisher(() => Promise.reject(cause));
    const launcher = new SessionLauncher(registry, establisher);

    await expect(launcher.launch({ type: 'socket', url: 'ws://localhost:9000' })).rejects.toMatchObject({ kind });
  });

  it('closes the handle when the session is removed', async () => {
    const handle = makeHandle();
    const launcher = new SessionLauncher(registry, new FakeEstablisher(() => Promise.resolve(handle)));

    const id = await launcher.launch({ type: 'remote-shell', profile: PROFILE });
    registry.transition(id, 'stopping');
    registry.transition(id, 'stopped');

    expect(handle.close).toHaveBeenCalledTimes(1);
    expect(launcher.getHandle(id)).toBeUndefined();
    expect(launcher.openHandleCount).toBe(0);
  });

  it('closes a late handle when the session was torn down while connecting', async () => {
    const handle = makeHandle();
    let resolveConnection: (value: ConnectionHandle) => void = () => {};
    const pending = new Promise<ConnectionHandle>((resolve) => {
      resolveConnection = resolve;
    });
    const launcher = new SessionLauncher(registry, new FakeEstablisher(() => pending));

    let createdId: SessionId | undefined;
    registry.events.on('session:created', ({ session }) => {
      createdId = session.id;
    });

    const launching = launcher.launch({ type: 'remote-shell', profile: PROFILE });
    if (createdId !== undefined) {
      registry.transition(createdId, 'error');
    }
    resolveConnection(handle);

    await expect(launching).rejects.toBeInstanceOf(UnknownSessionError);
    expect(handle.close).toHaveBeenCalledTimes(1);
    expect(launcher.openHandleCount).toBe(0);
  });
});
