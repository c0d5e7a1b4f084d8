/**
 * Configuration loader
 *
 * Reads the config file (if any), lays environment overrides on top,
 * validates the result and loads the SSH key.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { z } from "zod";
import { ConfigurationError, errorMessage } from "../errors.js";
import { assertPrivateKey } from "../transport/impl/SshTransport.js";
import { getConfigPath } from "../../utils/index.js";
import { createLogger } from "../../utils/logger.js";
import { ConfigFileSchema, type ConfigFile, type GrainctlConfig } from "./schema.js";

const logger = createLogger("config");

/**
 * Environment variables and the config path each one overrides
 */
export const ENV_OVERRIDES = {
  GRAINCTL_SSH_USERNAME: ["ssh", "username"],
  GRAINCTL_SSH_PRIVATE_KEY: ["ssh", "privateKey"],
  GRAINCTL_SSH_PRIVATE_KEY_PATH: ["ssh", "privateKeyPath"],
  GRAINCTL_INVENTORY_URL: ["inventory", "baseUrl"],
  GRAINCTL_INVENTORY_USERNAME: ["inventory", "username"],
  GRAINCTL_INVENTORY_PASSWORD: ["inventory", "password"],
} as const;

export interface LoadConfigOptions {
  /** Explicit config file; must exist when given */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

type RawObject = Record<string, unknown>;

function isRawObject(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readConfigFile(filePath: string): RawObject {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigurationError(`cannot read config file ${filePath}: ${errorMessage(error)}`, { filePath });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`config file ${filePath} is not valid JSON: ${errorMessage(error)}`, {
      filePath,
    });
  }

  if (!isRawObject(parsed)) {
    throw new ConfigurationError(`config file ${filePath} must contain a JSON object`, { filePath });
  }
  return parsed;
}

/**
 * Returns a copy of `raw` with environment values written over it. An
 * inline key from the environment replaces a key path from the file and
 * the other way round.
 */
export function applyEnvOverrides(raw: RawObject, env: NodeJS.ProcessEnv): RawObject {
  const sections: Record<string, RawObject> = {
    ssh: isRawObject(raw.ssh) ? { ...raw.ssh } : {},
    inventory: isRawObject(raw.inventory) ? { ...raw.inventory } : {},
  };

  for (const [variable, [section, field]] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable];
    if (value === undefined || value === "") continue;

    const target = sections[section];
    if (!target) continue;
    target[field] = value;

    if (field === "privateKey") delete target.privateKeyPath;
    if (field === "privateKeyPath") delete target.privateKey;
  }

  return { ...raw, ...sections };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

function readKeyFile(keyPath: string, baseDir: string): string {
  const resolved = path.resolve(baseDir, keyPath);
  try {
    return fs.readFileSync(resolved, "utf-8");
  } catch (error) {
    throw new ConfigurationError(`cannot read private key file ${resolved}: ${errorMessage(error)}`, {
      privateKeyPath: resolved,
    });
  }
}

function resolvePrivateKey(ssh: ConfigFile["ssh"], baseDir: string): string {
  if (ssh.privateKey !== undefined) return ssh.privateKey;
  if (ssh.privateKeyPath !== undefined) return readKeyFile(ssh.privateKeyPath, baseDir);
  throw new ConfigurationError("exactly one of ssh.privateKey or ssh.privateKeyPath is required");
}

/**
 * Loads and validates configuration.
 *
 * @throws ConfigurationError when the file or values are invalid
 * @throws InvalidCredentialError when the private key cannot be parsed
 */
export function loadConfig(options: LoadConfigOptions = {}): GrainctlConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const filePath = options.configPath ? path.resolve(cwd, options.configPath) : getConfigPath(cwd);
  let raw: RawObject = {};
  let source: string | undefined;

  if (options.configPath || fs.existsSync(filePath)) {
    raw = readConfigFile(filePath);
    source = filePath;
  }

  const parsed = ConfigFileSchema.safeParse(applyEnvOverrides(raw, env));
  if (!parsed.success) {
    throw new ConfigurationError(`invalid configuration: ${formatIssues(parsed.error)}`, { source });
  }

  const { ssh, inventory, convergence } = parsed.data;
  const privateKey = resolvePrivateKey(ssh, source ? path.dirname(source) : cwd);
  assertPrivateKey(privateKey);

  logger.debug({ source, inventory: inventory.baseUrl, user: ssh.username }, "Loaded configuration");

  return Object.freeze({
    ssh: Object.freeze({
      username: ssh.username,
      privateKey,
      port: ssh.port,
      readyTimeoutMs: ssh.readyTimeoutMs,
      hostFingerprints: Object.freeze({ ...ssh.hostFingerprints }),
    }),
    inventory: Object.freeze({ ...inventory }),
    convergence: Object.freeze({ ...convergence }),
    source,
  });
}

/**
 * Copy of the configuration that is safe to print.
 */
export function redactConfig(config: GrainctlConfig): Record<string, unknown> {
  return {
    source: config.source ?? null,
    ssh: {
      username: config.ssh.username,
      privateKey: "<redacted>",
      port: config.ssh.port,
      readyTimeoutMs: config.ssh.readyTimeoutMs,
      hostFingerprints: config.ssh.hostFingerprints,
    },
    inventory: {
      baseUrl: config.inventory.baseUrl,
      username: config.inventory.username,
      password: "<redacted>",
      verifyTls: config.inventory.verifyTls,
      requestTimeoutMs: config.inventory.requestTimeoutMs,
    },
    convergence: {
      busyPollIntervalMs: config.convergence.busyPollIntervalMs,
      maxBusyChecks: config.convergence.maxBusyChecks ?? null,
      logTailLines: config.convergence.logTailLines,
    },
  };
}
