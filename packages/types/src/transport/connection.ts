/**
 * Transport boundary types
 *
 * The transport itself (socket connect, SSH handshake, authentication) lives
 * outside the core. These types describe what crosses the boundary.
 */

export type SshAuthType = 'password' | 'key';

/**
 * Full remote profile, including credential material.
 * Only the transport collaborator ever reads the credential fields.
 */
export interface RemoteProfile {
  id: string;
  name?: string;
  host: string;
  port: number;
  username: string;
  authType: SshAuthType;
  password?: string;
  privateKey?: string;
  passphrase?: string;
}

/**
 * Credential-free reference to a remote profile, safe to keep on a session
 */
export interface RemoteProfileRef {
  id: string;
  name: string | null;
  host: string;
  port: number;
  username: string;
  authType: SshAuthType;
}

/**
 * What the establisher is asked to connect to
 */
export type ConnectionTarget =
  | { kind: 'remote-shell'; profile: RemoteProfile }
  | { kind: 'socket'; url: string };

/**
 * Opaque handle to an established connection
 */
export interface ConnectionHandle {
  readonly id: string;
  close(): Promise<void>;
}

export type ConnectionFailureKind = 'auth' | 'config' | 'network';
