/**
 * Grain Service Tests
 */

import { describe, it, expect, vi } from "vitest";
import { ConvergenceTrigger } from "../../convergence/impl/ConvergenceTrigger.js";
import { ReadinessTimeoutError } from "../../errors.js";
import type { IReadinessGate } from "../../inventory/interfaces/IInventory.js";
import { GrainService } from "../impl/GrainService.js";
import { list, scalar, type AnyGrainState } from "../models.js";
import { FakeMinion } from "./fake-minion.js";

function setup(grains: Record<string, string | string[]> = {}) {
  const minion = new FakeMinion("web01", grains);
  const gate = { waitUntilReady: vi.fn<IReadinessGate["waitUntilReady"]>().mockResolvedValue(undefined) };
  const convergence = new ConvergenceTrigger(minion);
  const service = new GrainService({ transport: minion, gate, convergence });
  return { minion, gate, service };
}

const rolesState = (values: string[], apply: boolean): AnyGrainState => ({
  host: "web01",
  key: "roles",
  value: list(values),
  apply,
});

describe("GrainService", () => {
  it("should wait for readiness before touching the host", async () => {
    const { minion, gate, service } = setup();
    gate.waitUntilReady.mockRejectedValue(new ReadinessTimeoutError("web01", 30));

    await expect(service.create(rolesState(["docker"], false))).rejects.toBeInstanceOf(ReadinessTimeoutError);

    expect(gate.waitUntilReady).toHaveBeenCalledWith("web01");
    expect(minion.commands).toHaveLength(0);
  });

  it("should identify results as host-key", async () => {
    const { service } = setup();

    const result = await service.create({ host: "web01", key: "color", value: scalar("blue"), apply: false });

    expect(result.id).toBe("web01-color");
    expect(result.operation).toBe("create");
    expect(result.warnings).toEqual([]);
  });

  it("should not run state.apply when apply is off", async () => {
    const { minion, service } = setup();

    await service.update(rolesState(["docker"], false));

    expect(minion.commands.some((command) => command.includes("state.apply"))).toBe(false);
  });

  it("should converge exactly once after a list update with apply on", async () => {
    const { minion, service } = setup();

    const result = await service.update(rolesState(["docker"], true));

    const applies = minion.commands.filter((command) => command.includes("salt-call state.apply"));
    expect(applies).toHaveLength(1);
    expect(minion.commands.at(-1)).toBe(applies[0]);
    expect(result.convergenceLog).toBe(minion.stateApplyLog);
    expect(result.warnings).toEqual([`apply state result: ${minion.stateApplyLog}`]);
  });

  it("should converge after delete when apply is on", async () => {
    const { minion, service } = setup({ color: "blue" });

    const result = await service.delete({ host: "web01", key: "color", value: scalar(""), apply: true });

    expect(minion.grains.has("color")).toBe(false);
    expect(result.operation).toBe("delete");
    expect(result.convergenceLog).toBe(minion.stateApplyLog);
  });

  it("should never converge on read", async () => {
    const { minion, service } = setup({ roles: ["docker"] });

    const result = await service.read(rolesState([], true));

    expect(result.state.value).toEqual({ kind: "list", values: ["docker"] });
    expect(result.warnings).toEqual([]);
    expect(minion.commands).toEqual(["/usr/lib/venv-salt-minion/bin/salt-call grains.get roles --out=json"]);
  });

  it("should report a failed state.apply as a warning", async () => {
    const { minion, service } = setup();
    // get, append, get, state.apply
    minion.failOn = { index: 4, message: "exit status 1" };

    const result = await service.update(rolesState(["docker"], true));

    expect(minion.grains.get("roles")).toEqual(["docker"]);
    expect(result.convergenceLog).toBeUndefined();
    expect(result.warnings).toEqual(["cannot apply state: exit status 1"]);
  });

  it("should report a non-Error convergence failure as a warning", async () => {
    const minion = new FakeMinion();
    const gate = { waitUntilReady: vi.fn<IReadinessGate["waitUntilReady"]>().mockResolvedValue(undefined) };
    const convergence = { converge: vi.fn<(host: string) => Promise<string>>().mockRejectedValue("agent gone") };
    const service = new GrainService({ transport: minion, gate, convergence });

    const result = await service.create(rolesState(["docker"], true));

    expect(convergence.converge).toHaveBeenCalledTimes(1);
    expect(result.warnings).toEqual(["agent gone"]);
  });
});
