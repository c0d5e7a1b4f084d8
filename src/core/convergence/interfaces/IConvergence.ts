/**
 * Convergence (state.apply) contracts
 */

export interface ConvergenceOptions {
  /** Pause between busy checks while another state.apply runs. @default 1000 */
  busyPollIntervalMs?: number;
  /**
   * Upper bound on busy checks before giving up. Unset means wait for as
   * long as the other job runs, however long that is.
   */
  maxBusyChecks?: number;
  /** Lines of the host-side log returned to the caller. @default 50 */
  logTailLines?: number;
}

export interface IConvergenceTrigger {
  /**
   * Waits until no state.apply runs on `host`, runs one, and resolves with
   * the tail of its log. A failing state run still resolves; only transport
   * failures reject, as ConvergenceError.
   */
  converge(host: string): Promise<string>;
}
