/**
 * Readiness gate
 *
 * Blocks a grain operation until the minion's salt key shows up in the
 * inventory's accepted list. Inventory failures end the wait immediately;
 * only "not accepted yet" is retried.
 */

import { InventoryError, ReadinessTimeoutError, errorMessage } from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";
import { systemClock, type Clock } from "../../../utils/async.js";
import type { IInventoryClient, IReadinessGate, ReadinessPollEvent } from "../interfaces/IInventory.js";

const logger = createLogger("readiness");

export const READINESS_TIMEOUT_MINUTES = 30;
export const READINESS_TIMEOUT_MS = READINESS_TIMEOUT_MINUTES * 60 * 1000;
export const READINESS_POLL_INTERVAL_MS = 10 * 1000;

export interface ReadinessGateOptions {
  /** Time source; tests substitute a manual clock */
  clock?: Clock;
  /** Called after every inventory check */
  onPoll?: (event: ReadinessPollEvent) => void;
}

export class ReadinessGate implements IReadinessGate {
  private readonly clock: Clock;
  private readonly onPoll?: (event: ReadinessPollEvent) => void;

  constructor(
    private readonly inventory: IInventoryClient,
    options: ReadinessGateOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.onPoll = options.onPoll;
  }

  async waitUntilReady(host: string): Promise<void> {
    const deadline = this.clock.now() + READINESS_TIMEOUT_MS;
    logger.info({ host }, "Waiting for the minion key to be accepted");

    for (let attempt = 1; ; attempt++) {
      if (this.clock.now() > deadline) {
        throw new ReadinessTimeoutError(host, READINESS_TIMEOUT_MINUTES);
      }

      const accepted = await this.check(host);
      logger.debug({ host, attempt, accepted }, "Checked salt-key acceptance");
      this.onPoll?.({ host, attempt, accepted, remainingMs: Math.max(0, deadline - this.clock.now()) });

      if (accepted) {
        return;
      }
      await this.clock.sleep(READINESS_POLL_INTERVAL_MS);
    }
  }

  private async check(host: string): Promise<boolean> {
    try {
      return await this.inventory.isAccepted(host);
    } catch (error) {
      throw new InventoryError(
        `error checking salt-key acceptance of ${host}: ${errorMessage(error)}`,
        { host, status: error instanceof InventoryError ? error.status : undefined },
        { cause: error }
      );
    }
  }
}
