/**
 * Convergence trigger
 *
 * Two salt jobs applying state at once on one minion fight over the same
 * resources, so a new state.apply starts only after the minion's proc
 * directory shows none in flight. The wait runs on the minion, in the same
 * shell as the state.apply it guards.
 */

import { CommandError, ConvergenceError, errorMessage } from "../../errors.js";
import { STATE_APPLY_BUSY_EXIT, stateApplyCommand } from "../../grains/commands.js";
import type { ITransport } from "../../transport/interfaces/ITransport.js";
import { createLogger } from "../../../utils/logger.js";
import type { ConvergenceOptions, IConvergenceTrigger } from "../interfaces/IConvergence.js";

const logger = createLogger("convergence");

export const DEFAULT_BUSY_POLL_INTERVAL_MS = 1000;
export const DEFAULT_LOG_TAIL_LINES = 50;

export class ConvergenceTrigger implements IConvergenceTrigger {
  private readonly maxBusyChecks?: number;
  private readonly command: string;

  constructor(
    private readonly transport: ITransport,
    options: ConvergenceOptions = {}
  ) {
    this.maxBusyChecks = options.maxBusyChecks;
    this.command = stateApplyCommand({
      busyPollIntervalMs: options.busyPollIntervalMs ?? DEFAULT_BUSY_POLL_INTERVAL_MS,
      maxBusyChecks: options.maxBusyChecks,
      tailLines: options.logTailLines ?? DEFAULT_LOG_TAIL_LINES,
    });
  }

  async converge(host: string): Promise<string> {
    logger.info({ host, maxBusyChecks: this.maxBusyChecks }, "Running state.apply once the minion is idle");
    try {
      const log = await this.transport.run(this.command, host);
      logger.debug({ host, log }, "state.apply finished");
      return log;
    } catch (error) {
      if (
        this.maxBusyChecks !== undefined &&
        error instanceof CommandError &&
        error.exitCode === STATE_APPLY_BUSY_EXIT
      ) {
        throw new ConvergenceError(
          `state.apply still running on ${host} after ${this.maxBusyChecks} checks`,
          host,
          { cause: error }
        );
      }
      throw new ConvergenceError(`cannot apply state: ${errorMessage(error)}`, host, { cause: error });
    }
  }
}
