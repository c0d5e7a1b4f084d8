/**
 * Remote command execution contract
 */

/**
 * SSH login material. Built once from configuration and never mutated.
 */
export interface SshCredentials {
  readonly username: string;
  /** PEM or OpenSSH private key text */
  readonly privateKey: string;
}

export interface SshTransportOptions {
  /** @default 22 */
  port?: number;
  /** Handshake timeout in milliseconds. @default 20000 */
  readyTimeoutMs?: number;
  /**
   * Expected SHA-256 host key fingerprints by host (`SHA256:...` or bare
   * base64). Hosts without an entry are accepted without verification.
   */
  hostFingerprints?: Readonly<Record<string, string>>;
}

/**
 * Runs one command on one host and resolves with its stdout.
 *
 * Implementations open a fresh session per call and keep nothing between
 * calls. Rejects with InvalidCredentialError, ConnectionError, SessionError
 * or CommandError.
 */
export interface ITransport {
  run(command: string, host: string): Promise<string>;
}
