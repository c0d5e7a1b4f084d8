/**
 * Wires the grain service from resolved configuration.
 */

import type { GrainctlConfig } from "../config/schema.js";
import { ConvergenceTrigger } from "../convergence/impl/ConvergenceTrigger.js";
import { InventoryClient } from "../inventory/impl/InventoryClient.js";
import { ReadinessGate } from "../inventory/impl/ReadinessGate.js";
import type { ReadinessPollEvent } from "../inventory/interfaces/IInventory.js";
import { SshTransport } from "../transport/impl/SshTransport.js";
import { GrainService } from "./impl/GrainService.js";

export interface GrainRuntimeOptions {
  onReadinessPoll?: (event: ReadinessPollEvent) => void;
}

/**
 * The collaborators behind a GrainService, exposed for the CLI commands that
 * drive one of them directly.
 */
export interface GrainRuntime {
  transport: SshTransport;
  inventory: InventoryClient;
  gate: ReadinessGate;
  convergence: ConvergenceTrigger;
  service: GrainService;
}

export function createGrainRuntime(config: GrainctlConfig, options: GrainRuntimeOptions = {}): GrainRuntime {
  const transport = new SshTransport(
    { username: config.ssh.username, privateKey: config.ssh.privateKey },
    {
      port: config.ssh.port,
      readyTimeoutMs: config.ssh.readyTimeoutMs,
      hostFingerprints: config.ssh.hostFingerprints,
    }
  );

  const inventory = new InventoryClient(
    {
      baseUrl: config.inventory.baseUrl,
      username: config.inventory.username,
      password: config.inventory.password,
    },
    { verifyTls: config.inventory.verifyTls, requestTimeoutMs: config.inventory.requestTimeoutMs }
  );

  const gate = new ReadinessGate(inventory, { onPoll: options.onReadinessPoll });
  const convergence = new ConvergenceTrigger(transport, {
    busyPollIntervalMs: config.convergence.busyPollIntervalMs,
    maxBusyChecks: config.convergence.maxBusyChecks,
    logTailLines: config.convergence.logTailLines,
  });

  return {
    transport,
    inventory,
    gate,
    convergence,
    service: new GrainService({ transport, gate, convergence }),
  };
}
