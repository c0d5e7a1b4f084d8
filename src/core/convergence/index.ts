/**
 * Convergence Module
 *
 * Runs state.apply on a minion without overlapping a run already in flight.
 */

export * from "./interfaces/IConvergence.js";
export * from "./impl/ConvergenceTrigger.js";
