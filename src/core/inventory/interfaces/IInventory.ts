/**
 * Inventory service contracts
 *
 * The inventory service (Uyuni) is the system of record for which minion
 * keys have been accepted by the salt master.
 */

import type { Dispatcher } from "undici";

export interface InventoryCredentials {
  /** API root, e.g. `https://uyuni.example.com/rhn/manager/api` */
  readonly baseUrl: string;
  readonly username: string;
  readonly password: string;
}

export interface InventoryClientOptions {
  /** Validate the server certificate. @default false */
  verifyTls?: boolean;
  /** Per-request timeout in milliseconds. @default 30000 */
  requestTimeoutMs?: number;
  /** Overrides the HTTP dispatcher (tests pass an undici MockAgent) */
  dispatcher?: Dispatcher;
}

export interface IInventoryClient {
  /**
   * Logs in and returns the accepted minion ids. Every call opens its own
   * session.
   */
  acceptedHosts(): Promise<string[]>;

  /**
   * True iff `host` appears verbatim in the accepted list.
   */
  isAccepted(host: string): Promise<boolean>;
}

export interface ReadinessPollEvent {
  host: string;
  attempt: number;
  accepted: boolean;
  /** Milliseconds left before the gate gives up */
  remainingMs: number;
}

export interface IReadinessGate {
  /**
   * Resolves once `host` is accepted. Rejects with ReadinessTimeoutError or
   * InventoryError.
   */
  waitUntilReady(host: string): Promise<void>;
}
