#!/usr/bin/env node

/**
 * grainctl CLI
 * Read and reconcile Salt grains on remote minions
 */

import { Command } from "commander";
import chalk from "chalk";
import { getCommand, setCommand, deleteCommand } from "./commands/grain.js";
import type { DeleteOptions, GetOptions, SetOptions } from "./commands/grain.js";
import { readyCommand } from "./commands/ready.js";
import { convergeCommand } from "./commands/converge.js";
import { configCommand } from "./commands/config.js";
import type { GlobalOptions } from "./shared.js";
import { isGrainctlError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

const program = new Command();

program
  .name("grainctl")
  .description("Reconcile Salt grains on remote minions over SSH")
  .version("0.1.0")
  .option("-c, --config <path>", "Path to the config file (default: .grainctl/config.json)")
  .option("--json", "Print machine-readable output")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("get")
  .description("Read a grain's live value from a minion")
  .argument("<host>", "Minion address")
  .argument("<key>", "Grain key")
  .option("-l, --list", "Treat the grain as a list")
  .action((host: string, key: string, _options: unknown, command: Command) =>
    getCommand(host, key, command.optsWithGlobals<GetOptions>())
  );

program
  .command("set")
  .description("Make a grain hold the given value(s)")
  .argument("<host>", "Minion address")
  .argument("<key>", "Grain key")
  .argument("[values...]", "Desired value, or desired list elements with --list (none clears the list)")
  .option("-l, --list", "Treat the grain as a list and reconcile it as a set")
  .option("--create", "Only write the values, without diffing against the minion")
  .option("-a, --apply", "Run state.apply after the change")
  .action((host: string, key: string, values: string[], _options: unknown, command: Command) =>
    setCommand(host, key, values, command.optsWithGlobals<SetOptions>())
  );

program
  .command("delete")
  .description("Delete a scalar grain, or remove the given elements from a list grain")
  .argument("<host>", "Minion address")
  .argument("<key>", "Grain key")
  .argument("[values...]", "List elements to remove (with --list)")
  .option("-l, --list", "Treat the grain as a list")
  .option("-a, --apply", "Run state.apply after the change")
  .action((host: string, key: string, values: string[], _options: unknown, command: Command) =>
    deleteCommand(host, key, values, command.optsWithGlobals<DeleteOptions>())
  );

program
  .command("ready")
  .description("Wait until the inventory has accepted the minion's key")
  .argument("<host>", "Minion address")
  .action((host: string, _options: unknown, command: Command) =>
    readyCommand(host, command.optsWithGlobals<GlobalOptions>())
  );

program
  .command("converge")
  .description("Run state.apply on a minion, waiting for any run in progress")
  .argument("<host>", "Minion address")
  .action((host: string, _options: unknown, command: Command) =>
    convergeCommand(host, command.optsWithGlobals<GlobalOptions>())
  );

program
  .command("config")
  .description("Show the resolved configuration")
  .action((_options: unknown, command: Command) => configCommand(command.optsWithGlobals<GlobalOptions>()));

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    const label = isGrainctlError(error) ? `[${error.code}] ` : "";
    console.error(chalk.red(`\nError: ${label}${error.message}`));
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Signal Handlers
// =============================================================================

// Remote commands already in flight keep running on the minion
function shutdown(signal: string): void {
  logger.info({ signal }, "Received shutdown signal");
  console.log(chalk.dim(`\nReceived ${signal}, exiting`));
  process.exit(130);
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
