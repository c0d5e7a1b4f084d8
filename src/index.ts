/**
 * grainctl
 *
 * Reconciles Salt grains on remote minions over SSH, gated on the minion's
 * key being accepted by the inventory service.
 */

export * from "./core/errors.js";
export * from "./core/config/index.js";
export * from "./core/transport/index.js";
export * from "./core/inventory/index.js";
export * from "./core/grains/index.js";
export * from "./core/convergence/index.js";
