/**
 * Grain service
 *
 * Drives one grain operation end to end: readiness gate, the reconciler for
 * the value kind, then state.apply when the caller asked for it. A failed
 * state.apply is reported as a warning and never fails the operation.
 */

import { wrapError, ErrorCode } from "../../errors.js";
import type { IConvergenceTrigger } from "../../convergence/interfaces/IConvergence.js";
import type { IReadinessGate } from "../../inventory/interfaces/IInventory.js";
import type { ITransport } from "../../transport/interfaces/ITransport.js";
import { createLogger } from "../../../utils/logger.js";
import {
  grainId,
  isScalarState,
  type AnyGrainState,
  type GrainOperation,
  type GrainOperationResult,
} from "../models.js";
import { ListReconciler } from "./ListReconciler.js";
import { ScalarReconciler } from "./ScalarReconciler.js";

const logger = createLogger("grain-service");

export interface GrainServiceDeps {
  transport: ITransport;
  gate: IReadinessGate;
  convergence: IConvergenceTrigger;
}

export class GrainService {
  private readonly gate: IReadinessGate;
  private readonly convergence: IConvergenceTrigger;
  private readonly scalar: ScalarReconciler;
  private readonly list: ListReconciler;

  constructor(deps: GrainServiceDeps) {
    this.gate = deps.gate;
    this.convergence = deps.convergence;
    this.scalar = new ScalarReconciler(deps.transport);
    this.list = new ListReconciler(deps.transport);
  }

  async create(state: AnyGrainState): Promise<GrainOperationResult> {
    await this.gate.waitUntilReady(state.host);
    const next = isScalarState(state) ? await this.scalar.create(state) : await this.list.create(state);
    return this.afterMutation("create", next);
  }

  /**
   * Reads the live value. Never runs state.apply.
   */
  async read(state: AnyGrainState): Promise<GrainOperationResult> {
    await this.gate.waitUntilReady(state.host);
    const live = isScalarState(state) ? await this.scalar.read(state) : await this.list.read(state);
    return { id: grainId(live.host, live.key), operation: "read", state: live, warnings: [] };
  }

  async update(state: AnyGrainState): Promise<GrainOperationResult> {
    await this.gate.waitUntilReady(state.host);
    const next = isScalarState(state) ? await this.scalar.update(state) : await this.list.update(state);
    return this.afterMutation("update", next);
  }

  async delete(state: AnyGrainState): Promise<GrainOperationResult> {
    await this.gate.waitUntilReady(state.host);
    if (isScalarState(state)) {
      await this.scalar.delete(state);
    } else {
      await this.list.delete(state);
    }
    return this.afterMutation("delete", state);
  }

  private async afterMutation(operation: GrainOperation, state: AnyGrainState): Promise<GrainOperationResult> {
    const result: GrainOperationResult = {
      id: grainId(state.host, state.key),
      operation,
      state,
      warnings: [],
    };

    if (!state.apply) {
      return result;
    }

    try {
      const log = await this.convergence.converge(state.host);
      result.convergenceLog = log;
      result.warnings.push(`apply state result: ${log}`);
    } catch (error) {
      const failure = wrapError(error, "state.apply failed", ErrorCode.CONVERGENCE_FAILED);
      logger.warn({ host: state.host, err: failure }, "state.apply failed after grain mutation");
      result.warnings.push(failure.message);
    }
    return result;
  }
}
