/**
 * Scalar grain reconciler
 *
 * `grains.setval` overwrites, so create and update issue the same single
 * command without reading first.
 */

import { decodeScalar } from "../codec.js";
import { delKeyCommand, getCommand, setValCommand } from "../commands.js";
import type { IGrainReconciler } from "../interfaces/IGrainReconciler.js";
import type { DesiredState, LiveState, ScalarGrainValue } from "../models.js";
import type { ITransport } from "../../transport/interfaces/ITransport.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("scalar-grain");

export class ScalarReconciler implements IGrainReconciler<ScalarGrainValue> {
  constructor(private readonly transport: ITransport) {}

  async create(state: DesiredState<ScalarGrainValue>): Promise<DesiredState<ScalarGrainValue>> {
    await this.set(state);
    logger.info({ host: state.host, key: state.key }, "Created scalar grain");
    return state;
  }

  async read(state: DesiredState<ScalarGrainValue>): Promise<LiveState<ScalarGrainValue>> {
    const raw = await this.transport.run(getCommand(state.key), state.host);
    const value = decodeScalar(raw);
    logger.debug({ host: state.host, key: state.key, value }, "Read scalar grain");
    return { ...state, value: { kind: "scalar", value } };
  }

  async update(state: DesiredState<ScalarGrainValue>): Promise<DesiredState<ScalarGrainValue>> {
    await this.set(state);
    logger.info({ host: state.host, key: state.key }, "Updated scalar grain");
    return state;
  }

  async delete(state: DesiredState<ScalarGrainValue>): Promise<void> {
    await this.transport.run(delKeyCommand(state.key), state.host);
    logger.info({ host: state.host, key: state.key }, "Deleted scalar grain");
  }

  private async set(state: DesiredState<ScalarGrainValue>): Promise<void> {
    await this.transport.run(setValCommand(state.key, state.value.value), state.host);
  }
}
