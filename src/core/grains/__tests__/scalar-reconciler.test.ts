/**
 * Scalar Reconciler Tests
 */

import { describe, it, expect } from "vitest";
import { ScalarReconciler } from "../impl/ScalarReconciler.js";
import { scalar, type DesiredState, type ScalarGrainValue } from "../models.js";
import { FakeMinion } from "./fake-minion.js";

function desired(value: string): DesiredState<ScalarGrainValue> {
  return { host: "web01", key: "color", value: scalar(value), apply: false };
}

describe("ScalarReconciler", () => {
  it("should create with a single setval and no read", async () => {
    const minion = new FakeMinion();
    const reconciler = new ScalarReconciler(minion);

    const state = await reconciler.create(desired("blue"));

    expect(state.value).toEqual({ kind: "scalar", value: "blue" });
    expect(minion.commands).toHaveLength(1);
    expect(minion.callsTo("grains.setval")).toHaveLength(1);
    expect(minion.grains.get("color")).toBe("blue");
  });

  it("should read back what it created", async () => {
    const minion = new FakeMinion();
    const reconciler = new ScalarReconciler(minion);

    await reconciler.create(desired("blue"));
    const live = await reconciler.read(desired("ignored"));

    expect(live.value).toEqual({ kind: "scalar", value: "blue" });
  });

  it("should replace the caller's value with the host's on read", async () => {
    const minion = new FakeMinion("web01", { color: "green" });
    const reconciler = new ScalarReconciler(minion);

    const live = await reconciler.read(desired("blue"));

    expect(live).toEqual({ host: "web01", key: "color", value: { kind: "scalar", value: "green" }, apply: false });
  });

  it("should read an unset grain as an empty string", async () => {
    const reconciler = new ScalarReconciler(new FakeMinion());

    const live = await reconciler.read(desired("blue"));

    expect(live.value).toEqual({ kind: "scalar", value: "" });
  });

  it("should update by overwriting without reading first", async () => {
    const minion = new FakeMinion("web01", { color: "green" });
    const reconciler = new ScalarReconciler(minion);

    await reconciler.update(desired("blue"));

    expect(minion.commands).toEqual(["/usr/lib/venv-salt-minion/bin/salt-call grains.setval color blue"]);
    expect(minion.grains.get("color")).toBe("blue");
  });

  it("should delete with exactly one delkey and no reads", async () => {
    const minion = new FakeMinion("web01", { color: "green" });
    const reconciler = new ScalarReconciler(minion);

    await reconciler.delete(desired("green"));

    expect(minion.commands).toEqual(["/usr/lib/venv-salt-minion/bin/salt-call grains.delkey color --out=json"]);
    expect(minion.grains.has("color")).toBe(false);
  });
});
