/**
 * ready command - wait until a minion's key is accepted by the inventory
 */

import chalk from "chalk";
import ora from "ora";
import { createLogger } from "../../utils/logger.js";
import { openRuntime, type GlobalOptions } from "../shared.js";

const logger = createLogger("cli-ready");

export async function readyCommand(host: string, options: GlobalOptions): Promise<void> {
  logger.info({ host }, "Ready command");

  const spinner = ora(`Checking whether ${host} is accepted...`).start();
  try {
    const { gate } = openRuntime(options, spinner);
    await gate.waitUntilReady(host);
    spinner.succeed(chalk.green(`${host} is accepted`));

    if (options.json) {
      console.log(JSON.stringify({ host, accepted: true }));
    }
  } catch (error) {
    spinner.fail(chalk.red(`${host} is not ready`));
    throw error;
  }
}
