/**
 * Grains Module
 *
 * Scalar and list grain reconciliation against a minion.
 */

// Models
export * from "./models.js";
export * from "./codec.js";
export * from "./commands.js";

// Interfaces
export * from "./interfaces/IGrainReconciler.js";

// Implementation
export * from "./impl/ScalarReconciler.js";
export * from "./impl/ListReconciler.js";
export * from "./impl/GrainService.js";
export * from "./factory.js";
