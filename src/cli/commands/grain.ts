/**
 * get / set / delete commands - read and reconcile one grain on one host
 */

import chalk from "chalk";
import ora from "ora";
import type { AnyGrainState, GrainOperation, GrainOperationResult } from "../../core/grains/models.js";
import type { GrainService } from "../../core/grains/impl/GrainService.js";
import { ErrorCode, GrainctlError } from "../../core/errors.js";
import { createLogger } from "../../utils/logger.js";
import { openRuntime, printResult, toDesiredState, type GlobalOptions, type StateInput } from "../shared.js";

const logger = createLogger("cli-grain");

export type GetOptions = GlobalOptions & {
  list?: boolean;
};

export type SetOptions = GlobalOptions & {
  list?: boolean;
  create?: boolean;
  apply?: boolean;
};

export type DeleteOptions = GlobalOptions & {
  list?: boolean;
  apply?: boolean;
};

const PROGRESS: Record<GrainOperation, string> = {
  create: "Creating",
  read: "Reading",
  update: "Reconciling",
  delete: "Deleting",
};

function dispatch(
  service: GrainService,
  operation: GrainOperation,
  state: AnyGrainState
): Promise<GrainOperationResult> {
  switch (operation) {
    case "create":
      return service.create(state);
    case "read":
      return service.read(state);
    case "update":
      return service.update(state);
    case "delete":
      return service.delete(state);
  }
}

async function runOperation(
  operation: GrainOperation,
  input: StateInput,
  options: GlobalOptions
): Promise<void> {
  const state = toDesiredState(input);
  logger.info({ operation, host: state.host, key: state.key, kind: state.value.kind }, "Grain command");

  const spinner = ora(`${PROGRESS[operation]} ${state.key} on ${state.host}...`).start();
  try {
    const { service } = openRuntime(options, spinner);
    const result = await dispatch(service, operation, state);

    if (result.warnings.length > 0 && result.convergenceLog === undefined && state.apply) {
      spinner.warn(chalk.yellow(`${operation} ${result.id} done, state.apply failed`));
    } else {
      spinner.succeed(chalk.green(`${operation} ${result.id}`));
    }
    printResult(result, options);
  } catch (error) {
    spinner.fail(chalk.red(`${operation} ${state.key} on ${state.host} failed`));
    throw error;
  }
}

export async function getCommand(host: string, key: string, options: GetOptions): Promise<void> {
  // The value is ignored by a read; an empty one keeps the scalar shape valid
  const values = options.list ? [] : [""];
  await runOperation("read", { host, key, values, list: options.list }, options);
}

export async function setCommand(
  host: string,
  key: string,
  values: string[],
  options: SetOptions
): Promise<void> {
  await runOperation(
    options.create ? "create" : "update",
    { host, key, values, list: options.list, apply: options.apply },
    options
  );
}

export async function deleteCommand(
  host: string,
  key: string,
  values: string[],
  options: DeleteOptions
): Promise<void> {
  if (options.list && values.length === 0) {
    throw new GrainctlError(
      "delete --list needs the elements to remove; pass them after the key",
      ErrorCode.INVALID_ARGUMENT,
      { key }
    );
  }

  // grains.delkey only needs the key
  await runOperation(
    "delete",
    { host, key, values: options.list ? values : [""], list: options.list, apply: options.apply },
    options
  );
}
