/**
 * converge command - run state.apply on a minion once it is accepted
 */

import chalk from "chalk";
import ora from "ora";
import { createLogger } from "../../utils/logger.js";
import { openRuntime, type GlobalOptions } from "../shared.js";

const logger = createLogger("cli-converge");

export async function convergeCommand(host: string, options: GlobalOptions): Promise<void> {
  logger.info({ host }, "Converge command");

  const spinner = ora(`Checking whether ${host} is accepted...`).start();
  try {
    const { gate, convergence } = openRuntime(options, spinner);
    await gate.waitUntilReady(host);

    spinner.text = `Running state.apply on ${host}...`;
    const log = await convergence.converge(host);
    spinner.succeed(chalk.green(`state.apply finished on ${host}`));

    if (options.json) {
      console.log(JSON.stringify({ host, log }, null, 2));
      return;
    }
    console.log();
    console.log(chalk.dim(log.trimEnd()));
    console.log();
  } catch (error) {
    spinner.fail(chalk.red(`state.apply on ${host} failed`));
    throw error;
  }
}
