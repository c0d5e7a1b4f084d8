/**
 * Inventory Module
 *
 * Talks to the inventory service and gates grain operations on minion key
 * acceptance.
 */

// Interfaces
export * from "./interfaces/IInventory.js";

// Implementation
export * from "./impl/InventoryClient.js";
export * from "./impl/ReadinessGate.js";
