/**
 * SessionInstance - one live session owned by the SessionRegistry
 *
 * Identity (id, type) is immutable. Lifecycle state and activity metadata are
 * mutated only through the registry; everything else gets snapshots.
 */

import type {
  AutoFocusFlags,
  RemoteProfileRef,
  SerializedSession,
  SessionId,
  SessionLifecycleState,
  SessionSnapshot,
  SessionStats,
  SessionStatValue,
  SessionType,
} from '@termfocus/shared-types';

export const DEFAULT_RECENT_COMMAND_LIMIT = 50;

export interface SessionInstanceInit {
  id: SessionId;
  type: SessionType;
  state: SessionLifecycleState;
  autoFocus: AutoFocusFlags;
  contextId?: string;
  profile?: RemoteProfileRef;
  socketUrl?: string;
  workingDirectory?: string;
  recentCommandLimit?: number;
}

export class SessionInstance {
  // Identity (immutable)
  private readonly _id: SessionId;
  private readonly _type: SessionType;
  private readonly _createdAt: number;
  private readonly _autoFocus: Readonly<AutoFocusFlags>;
  private readonly _contextId: string | null;
  private readonly _profile: RemoteProfileRef | null;
  private readonly _socketUrl: string | null;

  // Lifecycle + activity
  private _state: SessionLifecycleState;
  private _lastActivityAt: number;
  private _commandCount = 0;
  private _recentCommands: string[] = [];
  private _currentWorkingDirectory: string | null;
  private _sessionStats: SessionStats = {};

  private readonly recentCommandLimit: number;

  constructor(init: SessionInstanceInit) {
    this._id = init.id;
    this._type = init.type;
    this._state = init.state;
    this._autoFocus = Object.freeze({ ...init.autoFocus });
    this._contextId = init.contextId ?? null;
    this._profile = init.profile ? { ...init.profile } : null;
    this._socketUrl = init.socketUrl ?? null;
    this._currentWorkingDirectory = init.workingDirectory ?? null;
    this.recentCommandLimit = init.recentCommandLimit ?? DEFAULT_RECENT_COMMAND_LIMIT;

    this._createdAt = Date.now();
    this._lastActivityAt = this._createdAt;
  }

  // =========================================================================
  // Getters
  // =========================================================================

  get id(): SessionId {
    return this._id;
  }

  get type(): SessionType {
    return this._type;
  }

  get state(): SessionLifecycleState {
    return this._state;
  }

  get autoFocus(): Readonly<AutoFocusFlags> {
    return this._autoFocus;
  }

  get contextId(): string | null {
    return this._contextId;
  }

  get commandCount(): number {
    return this._commandCount;
  }

  get recentCommands(): readonly string[] {
    return this._recentCommands;
  }

  // =========================================================================
  // Mutations (registry only)
  // =========================================================================

  setState(state: SessionLifecycleState): void {
    this._state = state;
    this.touch();
  }

  addCommand(command: string): void {
    this._commandCount++;
    this._recentCommands.push(command);
    if (this._recentCommands.length > this.recentCommandLimit) {
      this._recentCommands = this._recentCommands.slice(-this.recentCommandLimit);
    }
    this.touch();
  }

  setWorkingDirectory(cwd: string | null): void {
    this._currentWorkingDirectory = cwd;
    this.touch();
  }

  setStat(key: string, value: SessionStatValue): void {
    this._sessionStats[key] = value;
  }

  incrementStat(key: string): void {
    const current = this._sessionStats[key];
    this._sessionStats[key] = (typeof current === 'number' ? current : 0) + 1;
  }

  touch(): void {
    this._lastActivityAt = Date.now();
  }

  // =========================================================================
  // Read-side views
  // =========================================================================

  snapshot(): SessionSnapshot {
    return Object.freeze({
      id: this._id,
      type: this._type,
      state: this._state,
      createdAt: this._createdAt,
      lastActivityAt: this._lastActivityAt,
      commandCount: this._commandCount,
      recentCommands: Object.freeze([...this._recentCommands]),
      currentWorkingDirectory: this._currentWorkingDirectory,
      sessionStats: Object.freeze({ ...this._sessionStats }),
      profile: this._profile ? Object.freeze({ ...this._profile }) : null,
      socketUrl: this._socketUrl,
      contextId: this._contextId,
      autoFocus: this._autoFocus,
    });
  }

  toJSON(): SerializedSession {
    return {
      id: this._id,
      type: this._type,
      state: this._state,
      createdAt: new Date(this._createdAt).toISOString(),
      lastActivityAt: new Date(this._lastActivityAt).toISOString(),
      commandCount: this._commandCount,
      recentCommands: [...this._recentCommands],
      currentWorkingDirectory: this._currentWorkingDirectory,
      sessionStats: { ...this._sessionStats },
      profile: this._profile ? { ...this._profile } : null,
      socketUrl: this._socketUrl,
    };
  }
}
