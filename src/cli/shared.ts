/**
 * Helpers shared by the grain-facing commands
 */

import chalk from "chalk";
import type { Ora } from "ora";
import { loadConfig } from "../core/config/loader.js";
import { ErrorCode, GrainctlError } from "../core/errors.js";
import { createGrainRuntime, type GrainRuntime } from "../core/grains/factory.js";
import { list, scalar, type AnyGrainState, type GrainOperationResult, type GrainState } from "../core/grains/models.js";

// Type aliases (not interfaces) so they satisfy commander's OptionValues
export type GlobalOptions = {
  config?: string;
  json?: boolean;
};

export interface StateInput {
  host: string;
  key: string;
  values: readonly string[];
  list?: boolean;
  apply?: boolean;
}

/**
 * Builds the desired state a command operates on. A scalar needs exactly one
 * value; a list takes any number.
 */
export function toDesiredState(input: StateInput): AnyGrainState {
  const base = { host: input.host, key: input.key, apply: input.apply ?? false };

  if (input.list) {
    return { ...base, value: list(input.values) };
  }

  const [value, ...rest] = input.values;
  if (value === undefined || rest.length > 0) {
    throw new GrainctlError(
      `a scalar grain takes exactly one value, got ${input.values.length}; pass --list for list grains`,
      ErrorCode.INVALID_ARGUMENT,
      { key: input.key }
    );
  }
  return { ...base, value: scalar(value) };
}

/**
 * Loads configuration and wires the runtime, reporting readiness polls on
 * the spinner.
 */
export function openRuntime(options: GlobalOptions, spinner: Ora): GrainRuntime {
  const config = loadConfig({ configPath: options.config });

  return createGrainRuntime(config, {
    onReadinessPoll: (event) => {
      if (event.accepted) return;
      const minutesLeft = Math.ceil(event.remainingMs / 60_000);
      spinner.text = `Waiting for ${event.host} to be accepted (check ${event.attempt}, ${minutesLeft} min left)`;
    },
  });
}

export function formatValue(state: GrainState): string {
  if (state.value.kind === "scalar") {
    return JSON.stringify(state.value.value);
  }
  return `[${state.value.values.map((value) => JSON.stringify(value)).join(", ")}]`;
}

/**
 * Prints an operation result, as JSON or for a terminal.
 */
export function printResult(result: GrainOperationResult, options: GlobalOptions): void {
  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  console.log();
  console.log(`  ${chalk.white.bold("Id:")}     ${chalk.cyan(result.id)}`);
  console.log(`  ${chalk.white.bold("Key:")}    ${result.state.key}`);
  if (result.operation !== "delete") {
    console.log(`  ${chalk.white.bold("Value:")}  ${formatValue(result.state)}`);
  }

  for (const warning of result.warnings) {
    console.log();
    console.log(chalk.yellow(`  Warning: ${warning}`));
  }
  console.log();
}
