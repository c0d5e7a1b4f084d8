/**
 * salt-call command lines issued on the minion
 */

import { encodeToken } from "./codec.js";

export const SALT_CALL = "/usr/lib/venv-salt-minion/bin/salt-call";

/** Per-job files the minion keeps while a job runs */
export const MINION_PROC_DIR = "/var/cache/venv-salt-minion/proc";

/** Host-side log that every state.apply run is appended to */
export const STATE_APPLY_LOG = "/var/log/state.apply.tf.log";

export function setValCommand(key: string, value: string): string {
  return `${SALT_CALL} grains.setval ${encodeToken(key)} ${encodeToken(value)}`;
}

export function getCommand(key: string): string {
  return `${SALT_CALL} grains.get ${encodeToken(key)} --out=json`;
}

export function delKeyCommand(key: string): string {
  return `${SALT_CALL} grains.delkey ${encodeToken(key)} --out=json`;
}

export function appendCommand(key: string, value: string): string {
  return `${SALT_CALL} grains.append ${encodeToken(key)} ${encodeToken(value)} --out=json`;
}

export function removeCommand(key: string, value: string): string {
  return `${SALT_CALL} grains.remove ${encodeToken(key)} ${encodeToken(value)} --out=json`;
}

/** Exit status of the converge command when the busy wait runs out */
export const STATE_APPLY_BUSY_EXIT = 75;

export interface StateApplyCommandOptions {
  busyPollIntervalMs: number;
  /** Unset: wait without limit */
  maxBusyChecks?: number;
  tailLines: number;
}

/**
 * Waits until no proc file mentions state.apply, runs state.apply into the
 * persistent log and prints the log's tail. The wait and the run share one
 * remote shell. The command exits with tail's status, not state.apply's.
 */
export function stateApplyCommand(options: StateApplyCommandOptions): string {
  const pause = `sleep ${options.busyPollIntervalMs / 1000};`;
  const max = options.maxBusyChecks;
  const body =
    max === undefined
      ? pause
      : `checks=$((checks + 1)); if [ "$checks" -ge ${max} ]; then ` +
        `echo "state.apply still running after ${max} checks" >&2; exit ${STATE_APPLY_BUSY_EXIT}; fi; ${pause}`;

  return [
    ...(max === undefined ? [] : ["checks=0"]),
    `while grep -qs state.apply ${MINION_PROC_DIR}/*; do ${body} done`,
    `${SALT_CALL} state.apply >> ${STATE_APPLY_LOG} 2>&1`,
    `tail -n ${options.tailLines} ${STATE_APPLY_LOG}`,
  ].join("; ");
}
