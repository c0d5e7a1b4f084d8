/**
 * config command - show the resolved configuration with secrets masked
 */

import chalk from "chalk";
import { ENV_OVERRIDES, loadConfig, redactConfig } from "../../core/config/loader.js";
import { createLogger } from "../../utils/logger.js";
import type { GlobalOptions } from "../shared.js";

const logger = createLogger("cli-config");

export async function configCommand(options: GlobalOptions): Promise<void> {
  logger.info({ options }, "Config command");

  const config = loadConfig({ configPath: options.config });
  const view = redactConfig(config);

  if (options.json) {
    console.log(JSON.stringify(view, null, 2));
    return;
  }

  console.log();
  console.log(chalk.cyan.bold("grainctl Configuration"));
  console.log(chalk.dim("─".repeat(50)));
  console.log(`  Source:     ${config.source ? chalk.dim(config.source) : chalk.yellow("environment only")}`);

  console.log();
  console.log(chalk.white.bold("SSH"));
  console.log(`  User:       ${chalk.cyan(config.ssh.username)}`);
  console.log(`  Port:       ${config.ssh.port}`);
  const pinned = Object.keys(config.ssh.hostFingerprints);
  console.log(
    `  Host keys:  ${pinned.length > 0 ? `pinned for ${pinned.join(", ")}` : chalk.yellow("not verified")}`
  );

  console.log();
  console.log(chalk.white.bold("Inventory"));
  console.log(`  URL:        ${chalk.cyan(config.inventory.baseUrl)}`);
  console.log(`  User:       ${config.inventory.username}`);
  console.log(`  TLS:        ${config.inventory.verifyTls ? chalk.green("verified") : chalk.yellow("not verified")}`);

  console.log();
  console.log(chalk.white.bold("Convergence"));
  console.log(`  Busy poll:  ${config.convergence.busyPollIntervalMs} ms`);
  console.log(`  Max checks: ${config.convergence.maxBusyChecks ?? chalk.yellow("unbounded")}`);
  console.log(`  Log tail:   ${config.convergence.logTailLines} lines`);

  console.log();
  console.log(chalk.dim("─".repeat(50)));
  console.log(chalk.dim(`Environment overrides: ${Object.keys(ENV_OVERRIDES).join(", ")}`));
  console.log();
}
