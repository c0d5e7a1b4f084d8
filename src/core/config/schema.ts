/**
 * Configuration schema
 *
 * Zod schemas for the `.grainctl/config.json` file, with the resolved shape
 * the rest of the code consumes.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// File Schema
// =============================================================================

export const SshConfigSchema = z
  .object({
    username: z.string().min(1),
    /** Key text inline */
    privateKey: z.string().min(1).optional(),
    /** Path to the key file, relative to the config file */
    privateKeyPath: z.string().min(1).optional(),
    port: z.number().int().positive().max(65535).default(22),
    readyTimeoutMs: z.number().int().positive().default(20_000),
    /** Pinned SHA-256 host key fingerprints by host */
    hostFingerprints: z.record(z.string().min(1)).default({}),
  })
  .refine((ssh) => (ssh.privateKey === undefined) !== (ssh.privateKeyPath === undefined), {
    message: "exactly one of privateKey or privateKeyPath is required",
    path: ["privateKey"],
  });

export const InventoryConfigSchema = z.object({
  baseUrl: z.string().url(),
  username: z.string().min(1),
  password: z.string().min(1),
  verifyTls: z.boolean().default(false),
  requestTimeoutMs: z.number().int().positive().default(30_000),
});

export const ConvergenceConfigSchema = z.object({
  busyPollIntervalMs: z.number().int().positive().default(1000),
  /** Unset: wait for a running state.apply without limit */
  maxBusyChecks: z.number().int().positive().optional(),
  logTailLines: z.number().int().positive().default(50),
});

export const ConfigFileSchema = z.object({
  ssh: SshConfigSchema,
  inventory: InventoryConfigSchema,
  convergence: ConvergenceConfigSchema.default({}),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// =============================================================================
// Resolved Configuration
// =============================================================================

export interface ResolvedSshConfig {
  readonly username: string;
  readonly privateKey: string;
  readonly port: number;
  readonly readyTimeoutMs: number;
  readonly hostFingerprints: Readonly<Record<string, string>>;
}

export type ResolvedInventoryConfig = Readonly<z.infer<typeof InventoryConfigSchema>>;

export type ResolvedConvergenceConfig = Readonly<z.infer<typeof ConvergenceConfigSchema>>;

/**
 * Configuration after validation, env overrides and key loading. Frozen.
 */
export interface GrainctlConfig {
  readonly ssh: ResolvedSshConfig;
  readonly inventory: ResolvedInventoryConfig;
  readonly convergence: ResolvedConvergenceConfig;
  /** Where the file was read from, if one was */
  readonly source?: string;
}
