/**
 * Grain reconciler contract
 *
 * One implementation per value kind. Reconcilers talk to the host only; the
 * readiness gate and state.apply are driven by GrainService.
 */

import type { DesiredState, GrainValue, LiveState } from "../models.js";

export interface IGrainReconciler<V extends GrainValue> {
  /** Writes the desired value; resolves with the state to record */
  create(state: DesiredState<V>): Promise<DesiredState<V>>;

  /** Reads the grain back; the host's value replaces the given one */
  read(state: DesiredState<V>): Promise<LiveState<V>>;

  /** Moves the host to the desired value; resolves with the state to record */
  update(state: DesiredState<V>): Promise<DesiredState<V>>;

  delete(state: DesiredState<V>): Promise<void>;
}
