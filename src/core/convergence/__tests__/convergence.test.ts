/**
 * Convergence Trigger Tests
 */

import { describe, it, expect } from "vitest";
import { ConvergenceError } from "../../errors.js";
import { FakeMinion } from "../../grains/__tests__/fake-minion.js";
import { ConvergenceTrigger } from "../impl/ConvergenceTrigger.js";

const SALT_CALL = "/usr/lib/venv-salt-minion/bin/salt-call";
const APPLY_AND_TAIL = `${SALT_CALL} state.apply >> /var/log/state.apply.tf.log 2>&1; tail -n 50 /var/log/state.apply.tf.log`;

describe("ConvergenceTrigger", () => {
  it("should wait and apply in a single remote command", async () => {
    const minion = new FakeMinion();
    const trigger = new ConvergenceTrigger(minion);

    const log = await trigger.converge("web01");

    expect(log).toBe(minion.stateApplyLog);
    expect(minion.commands).toEqual([
      `while grep -qs state.apply /var/cache/venv-salt-minion/proc/*; do sleep 1; done; ${APPLY_AND_TAIL}`,
    ]);
  });

  it("should carry the poll interval and check limit into the wait", async () => {
    const minion = new FakeMinion();
    const trigger = new ConvergenceTrigger(minion, { busyPollIntervalMs: 2000, maxBusyChecks: 5 });

    await trigger.converge("web01");

    expect(minion.commands).toEqual([
      "checks=0; while grep -qs state.apply /var/cache/venv-salt-minion/proc/*; do " +
        'checks=$((checks + 1)); if [ "$checks" -ge 5 ]; then ' +
        'echo "state.apply still running after 5 checks" >&2; exit 75; fi; sleep 2; done; ' +
        APPLY_AND_TAIL,
    ]);
  });

  it("should tail the configured number of log lines", async () => {
    const minion = new FakeMinion();
    const trigger = new ConvergenceTrigger(minion, { logTailLines: 20 });

    await trigger.converge("web01");

    expect(minion.commands[0]?.endsWith("tail -n 20 /var/log/state.apply.tf.log")).toBe(true);
  });

  it("should report a wait that ran out of checks", async () => {
    const minion = new FakeMinion();
    minion.stateApplyBusy = true;
    const trigger = new ConvergenceTrigger(minion, { maxBusyChecks: 2 });

    const error = await trigger.converge("web01").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConvergenceError);
    if (!(error instanceof ConvergenceError)) return;
    expect(error.message).toBe("state.apply still running on web01 after 2 checks");
    expect(minion.commands).toHaveLength(1);
  });

  it("should wrap a failed run", async () => {
    const minion = new FakeMinion();
    minion.failOn = { index: 1, message: "exit status 1" };
    const trigger = new ConvergenceTrigger(minion);

    const error = await trigger.converge("web01").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConvergenceError);
    if (!(error instanceof ConvergenceError)) return;
    expect(error.host).toBe("web01");
    expect(error.message).toBe("cannot apply state: exit status 1");
  });

  it("should treat exit 75 as an ordinary failure when the wait is unbounded", async () => {
    const minion = new FakeMinion();
    minion.stateApplyBusy = true;
    const trigger = new ConvergenceTrigger(minion);

    await expect(trigger.converge("web01")).rejects.toThrow("cannot apply state: exit status 75");
  });
});
