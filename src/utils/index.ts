/**
 * Shared utilities
 */

import * as path from "node:path";

export * from "./logger.js";
export * from "./async.js";

// =============================================================================
// Configuration Paths
// =============================================================================

export const CONFIG_DIR = ".grainctl";
export const CONFIG_FILE = "config.json";

export function getProjectRoot(): string {
  return process.cwd();
}

export function getConfigDir(projectRoot: string = getProjectRoot()): string {
  return path.join(projectRoot, CONFIG_DIR);
}

export function getConfigPath(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), CONFIG_FILE);
}

export function getLogsDir(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), "logs");
}
