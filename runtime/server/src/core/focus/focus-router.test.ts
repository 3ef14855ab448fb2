/**
 * Tests for FocusRouter
 *
 * Every assertion on events goes through a real FocusEventChannel, the same
 * way the UI layer observes the router.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { FocusEvent } from '@termfocus/shared-types';
import { FocusEventChannel } from './focus-event-channel.js';
import { FocusRouter } from './focus-router.js';

let channel: FocusEventChannel;
let router: FocusRouter;
let events: FocusEvent[];

beforeEach(() => {
  channel = new FocusEventChannel();
  router = new FocusRouter(channel);
  events = [];
  channel.subscribe((event) => events.push(event));
});

function kinds(): string[] {
  return events.map((event) => `${event.kind}:${event.sessionId}`);
}

describe('focus / clearFocus', () => {
  it('starts unfocused', () => {
    expect(router.focusedSessionId).toBeNull();
    expect(router.isFocused('a')).toBe(false);
  });

  it('holds the last focused session', () => {
    router.focus('a');
    router.focus('b');
    router.focus('c');

    expect(router.focusedSessionId).toBe('c');
    expect(router.isFocused('c')).toBe(true);
    expect(router.isFocused('a')).toBe(false);
  });

  it('is null after the last call was clearFocus', () => {
    router.focus('a');
    router.clearFocus();
    expect(router.focusedSessionId).toBeNull();
  });

  it('emits focusChanged naming the previous session', () => {
    router.focus('a');
    router.focus('b', 'ctx-1');

    expect(events).toHaveLength(2);
    expect(events[0]).toMatchObject({
      kind: 'focusChanged',
      sessionId: 'a',
      message: 'Session focused (previous: none)',
    });
    expect(events[0]).not.toHaveProperty('contextId');
    expect(events[1]).toMatchObject({
      kind: 'focusChanged',
      sessionId: 'b',
      contextId: 'ctx-1',
      message: 'Session focused (previous: a)',
    });
  });

  it('emits again when refocusing the same session', () => {
    router.focus('a');
    router.focus('a');
    expect(kinds()).toEqual(['focusChanged:a', 'focusChanged:a']);
  });

  it('emits nothing when clearing an empty focus', () => {
    router.clearFocus();
    expect(events).toHaveLength(0);
  });

  it('emits exactly one focusChanged when clearing a held focus', () => {
    router.focus('a');
    events.length = 0;

    router.clearFocus();

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ kind: 'focusChanged', sessionId: 'a', message: 'Focus cleared' });
  });

  it('stamps events with an ISO timestamp', () => {
    router.focus('a');
    const timestamp = events[0]?.timestamp ?? '';
    expect(new Date(timestamp).toISOString()).toBe(timestamp);
  });
});

describe('applyAutoFocus', () => {
  it('focuses interactive sessions unconditionally', () => {
    router.focus('a');
    router.applyAutoFocus('b', { requiresInput: true, isPersistent: false });
    expect(router.focusedSessionId).toBe('b');
  });

  it('focuses a persistent session when nothing is focused', () => {
    router.applyAutoFocus('b', { requiresInput: false, isPersistent: true }, 'ctx-1');

    expect(router.focusedSessionId).toBe('b');
    expect(events[0]).toMatchObject({ kind: 'focusChanged', sessionId: 'b', contextId: 'ctx-1' });
  });

  it('leaves an existing focus alone for a persistent session', () => {
    router.focus('a');
    events.length = 0;

    router.applyAutoFocus('b', { requiresInput: false, isPersistent: true });

    expect(router.focusedSessionId).toBe('a');
    expect(events).toHaveLength(0);
  });

  it('does nothing for one-shot work', () => {
    router.applyAutoFocus('b', { requiresInput: false, isPersistent: false });

    expect(router.focusedSessionId).toBeNull();
    expect(events).toHaveLength(0);
  });
});

describe('context bindings', () => {
  it('binds, replaces and unbinds a context', () => {
    router.bindContext('ctx-1', 'a');
    expect(router.getBoundSession('ctx-1')).toBe('a');

    router.bindContext('ctx-1', 'b');
    expect(router.getBoundSession('ctx-1')).toBe('b');

    router.unbindContext('ctx-1');
    expect(router.getBoundSession('ctx-1')).toBeUndefined();
  });

  it('ignores unbinding an unknown context', () => {
    expect(() => router.unbindContext('missing')).not.toThrow();
    expect(router.snapshot().count).toBe(0);
  });

  it('removes every binding to a session', () => {
    router.bindContext('ctx-1', 'a');
    router.bindContext('ctx-2', 'a');
    router.bindContext('ctx-3', 'b');

    router.unbindSession('a');

    expect(router.snapshot().contextBindings).toEqual({ 'ctx-3': 'b' });
  });

  it('does not emit events for binding changes', () => {
    router.bindContext('ctx-1', 'a');
    router.unbindContext('ctx-1');
    expect(events).toHaveLength(0);
  });
});

describe('resolveInputTarget', () => {
  it('routes to the main input when nothing applies', () => {
    expect(router.resolveInputTarget('ctx-1')).toEqual({ destination: 'main-input' });
    expect(router.resolveInputTarget()).toEqual({ destination: 'main-input' });
  });

  it('prefers the context binding over the focused session', () => {
    router.focus('a');
    router.bindContext('ctx-1', 'b');

    expect(router.resolveInputTarget('ctx-1')).toEqual({ destination: 'session', sessionId: 'b' });
    expect(router.resolveInputTarget('ctx-2')).toEqual({ destination: 'session', sessionId: 'a' });
  });
});

describe('handleDeactivation', () => {
  it('removes bindings, clears focus and emits one blockDeactivated', () => {
    router.bindContext('ctx-1', 'a');
    router.bindContext('ctx-2', 'a');
    router.focus('a');
    events.length = 0;

    router.handleDeactivation('a');

    expect(router.focusedSessionId).toBeNull();
    expect(router.snapshot().count).toBe(0);
    expect(kinds()).toEqual(['focusChanged:a', 'blockDeactivated:a']);
    expect(events[1]?.message).toBe('Session deactivated and its bindings removed');
  });

  it('keeps focus held by another session', () => {
    router.bindContext('ctx-1', 'a');
    router.focus('b');
    events.length = 0;

    router.handleDeactivation('a');

    expect(router.focusedSessionId).toBe('b');
    expect(router.getBoundSession('ctx-1')).toBeUndefined();
    expect(kinds()).toEqual(['blockDeactivated:a']);
  });

  it('emits for a session the router has never seen', () => {
    router.handleDeactivation('ghost');
    expect(kinds()).toEqual(['blockDeactivated:ghost']);
  });
});

describe('cleanupContext', () => {
  it('clears focus when the bound session holds it', () => {
    router.bindContext('ctx-1', 'a');
    router.focus('a');

    router.cleanupContext('ctx-1');

    expect(router.getBoundSession('ctx-1')).toBeUndefined();
    expect(router.focusedSessionId).toBeNull();
  });

  it('keeps focus held by another session', () => {
    router.bindContext('ctx-1', 'a');
    router.focus('b');

    router.cleanupContext('ctx-1');

    expect(router.getBoundSession('ctx-1')).toBeUndefined();
    expect(router.focusedSessionId).toBe('b');
  });

  it('is a no-op for an unbound context', () => {
    router.focus('a');
    events.length = 0;

    router.cleanupContext('ctx-1');

    expect(router.focusedSessionId).toBe('a');
    expect(events).toHaveLength(0);
  });
});

describe('snapshot / reset', () => {
  it('returns a detached, frozen copy', () => {
    router.bindContext('ctx-1', 'a');
    router.focus('a');

    const snapshot = router.snapshot();
    router.bindContext('ctx-2', 'b');

    expect(snapshot).toEqual({ focusedSession: 'a', contextBindings: { 'ctx-1': 'a' }, count: 1 });
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.contextBindings)).toBe(true);
  });

  it('reset wipes state without emitting', () => {
    router.bindContext('ctx-1', 'a');
    router.focus('a');
    events.length = 0;

    router.reset();

    expect(router.snapshot()).toEqual({ focusedSession: null, contextBindings: {}, count: 0 });
    expect(events).toHaveLength(0);
  });
});

it('keeps working after the channel is closed', () => {
  channel.close();

  router.focus('a');
  router.handleDeactivation('a');

  expect(router.focusedSessionId).toBeNull();
  expect(events).toHaveLength(0);
});
