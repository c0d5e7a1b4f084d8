/**
 * List grain reconciler
 *
 * Lists are compared as sets. An update appends what the host lacks, reads
 * the list again, then removes every live element the desired list does not
 * contain. Steps already applied stay applied when a later command fails.
 */

import { decodeList } from "../codec.js";
import { appendCommand, getCommand, removeCommand } from "../commands.js";
import type { IGrainReconciler } from "../interfaces/IGrainReconciler.js";
import { uniqueValues, type DesiredState, type ListGrainValue, type LiveState } from "../models.js";
import type { ITransport } from "../../transport/interfaces/ITransport.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("list-grain");

/**
 * Elements of `desired` missing from `live`, in desired order.
 */
export function missingFrom(live: readonly string[], desired: readonly string[]): string[] {
  const present = new Set(live);
  return uniqueValues(desired).filter((value) => !present.has(value));
}

/**
 * Live elements that are not anywhere in `desired`. Repeated live entries
 * are returned once per occurrence, since `grains.remove` drops one at a
 * time.
 */
export function extraneousIn(live: readonly string[], desired: readonly string[]): string[] {
  const wanted = new Set(desired);
  return live.filter((value) => !wanted.has(value));
}

export class ListReconciler implements IGrainReconciler<ListGrainValue> {
  constructor(private readonly transport: ITransport) {}

  async create(state: DesiredState<ListGrainValue>): Promise<DesiredState<ListGrainValue>> {
    for (const value of uniqueValues(state.value.values)) {
      await this.append(state, value);
    }
    logger.info({ host: state.host, key: state.key, count: state.value.values.length }, "Created list grain");
    return state;
  }

  async read(state: DesiredState<ListGrainValue>): Promise<LiveState<ListGrainValue>> {
    const values = await this.fetch(state);
    logger.debug({ host: state.host, key: state.key, values }, "Read list grain");
    return { ...state, value: { kind: "list", values } };
  }

  async update(state: DesiredState<ListGrainValue>): Promise<DesiredState<ListGrainValue>> {
    const desired = state.value.values;

    const before = await this.fetch(state);
    const additions = missingFrom(before, desired);
    for (const value of additions) {
      await this.append(state, value);
    }

    const after = await this.fetch(state);
    const removals = extraneousIn(after, desired);
    for (const value of removals) {
      await this.remove(state, value);
    }

    logger.info({ host: state.host, key: state.key, additions, removals }, "Updated list grain");
    return state;
  }

  /**
   * Removes the elements of the given (desired) list, not a diff against the
   * host.
   */
  async delete(state: DesiredState<ListGrainValue>): Promise<void> {
    for (const value of state.value.values) {
      await this.remove(state, value);
    }
    logger.info({ host: state.host, key: state.key }, "Deleted list grain values");
  }

  private async fetch(state: DesiredState<ListGrainValue>): Promise<string[]> {
    return decodeList(await this.transport.run(getCommand(state.key), state.host));
  }

  private async append(state: DesiredState<ListGrainValue>, value: string): Promise<void> {
    const output = await this.transport.run(appendCommand(state.key, value), state.host);
    logger.debug({ host: state.host, key: state.key, value, output }, "Appended grain value");
  }

  private async remove(state: DesiredState<ListGrainValue>, value: string): Promise<void> {
    const output = await this.transport.run(removeCommand(state.key, value), state.host);
    logger.debug({ host: state.host, key: state.key, value, output }, "Removed grain value");
  }
}
