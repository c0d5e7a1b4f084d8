/**
 * Readiness Gate Tests
 */

import { describe, it, expect, vi } from "vitest";
import { InventoryError, ReadinessTimeoutError } from "../../errors.js";
import type { Clock } from "../../../utils/async.js";
import { READINESS_POLL_INTERVAL_MS, ReadinessGate } from "../impl/ReadinessGate.js";
import type { IInventoryClient, ReadinessPollEvent } from "../interfaces/IInventory.js";

function manualClock(): Clock & { sleeps: number[] } {
  let now = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => now,
    sleep: async (ms) => {
      sleeps.push(ms);
      now += ms;
    },
  };
}

function inventory(isAccepted: IInventoryClient["isAccepted"]) {
  return {
    acceptedHosts: vi.fn<IInventoryClient["acceptedHosts"]>().mockResolvedValue([]),
    isAccepted: vi.fn(isAccepted),
  };
}

describe("ReadinessGate", () => {
  it("should return after one check when the key is already accepted", async () => {
    const client = inventory(async () => true);
    const clock = manualClock();

    await new ReadinessGate(client, { clock }).waitUntilReady("web01");

    expect(client.isAccepted).toHaveBeenCalledTimes(1);
    expect(client.isAccepted).toHaveBeenCalledWith("web01");
    expect(clock.sleeps).toEqual([]);
  });

  it("should poll every ten seconds until the key is accepted", async () => {
    let calls = 0;
    const client = inventory(async () => ++calls === 3);
    const clock = manualClock();

    await new ReadinessGate(client, { clock }).waitUntilReady("web01");

    expect(client.isAccepted).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([READINESS_POLL_INTERVAL_MS, READINESS_POLL_INTERVAL_MS]);
  });

  it("should time out after thirty minutes", async () => {
    const client = inventory(async () => false);
    const clock = manualClock();

    const error = await new ReadinessGate(client, { clock }).waitUntilReady("web01").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ReadinessTimeoutError);
    if (!(error instanceof ReadinessTimeoutError)) return;
    expect(error.message).toBe("timeout reached after 30 minutes; salt-key for web01 not accepted");
    // checks at t = 0, 10s, ..., 1800s inclusive
    expect(client.isAccepted).toHaveBeenCalledTimes(181);
  });

  it("should stop at the first inventory failure", async () => {
    const client = inventory(async () => {
      throw new InventoryError("login failed: denied", { status: 401 });
    });
    const clock = manualClock();

    const error = await new ReadinessGate(client, { clock }).waitUntilReady("web01").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InventoryError);
    if (!(error instanceof InventoryError)) return;
    expect(error.message).toBe("error checking salt-key acceptance of web01: login failed: denied");
    expect(error.status).toBe(401);
    expect(client.isAccepted).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });

  it("should report each poll", async () => {
    let calls = 0;
    const client = inventory(async () => ++calls === 2);
    const events: ReadinessPollEvent[] = [];

    await new ReadinessGate(client, { clock: manualClock(), onPoll: (event) => events.push(event) }).waitUntilReady(
      "web01"
    );

    expect(events).toEqual([
      { host: "web01", attempt: 1, accepted: false, remainingMs: 1_800_000 },
      { host: "web01", attempt: 2, accepted: true, remainingMs: 1_790_000 },
    ]);
  });
});
