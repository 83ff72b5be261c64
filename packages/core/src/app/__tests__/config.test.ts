import { assert, describe, test } from "@termloom/testkit";
import { isLoomError } from "../../errors.js";
import { resolveAppConfig } from "../config.js";
import { computeFrameInterval, computeSleepMs } from "../frameTiming.js";
import { AppStateMachine } from "../stateMachine.js";

describe("resolveAppConfig", () => {
  test("defaults", () => {
    const c = resolveAppConfig(undefined);
    assert.equal(c.fpsCap, 30);
    assert.equal(c.inputQueueCapacity, 100);
    assert.equal(c.historyLimit, 100);
    assert.deepEqual(c.exitKeys, ["ctrl+c"]);
    assert.equal(c.notificationTtlMs, 3000);
    assert.equal(c.synchronizedOutput, true);
    assert.equal(c.exitBindings.length, 1);
  });

  test("overrides are validated", () => {
    const c = resolveAppConfig({ fpsCap: 60, exitKeys: ["q"], synchronizedOutput: false });
    assert.equal(c.fpsCap, 60);
    assert.deepEqual(c.exitKeys, ["q"]);
    assert.equal(c.synchronizedOutput, false);
    const invalid = (e: unknown) => isLoomError(e, "LOOM_INVALID_PROPS");
    assert.throws(() => resolveAppConfig({ fpsCap: 0 }), invalid);
    assert.throws(() => resolveAppConfig({ inputQueueCapacity: 2.5 }), invalid);
    assert.throws(() => resolveAppConfig({ exitKeys: ["ctrl+"] }), invalid);
  });
});

describe("frame timing", () => {
  test("interval from the fps cap", () => {
    assert.equal(computeFrameInterval(30), 33);
    assert.equal(computeFrameInterval(60), 16);
    assert.equal(computeFrameInterval(5000), 1);
    assert.equal(computeFrameInterval(Number.NaN), 33);
  });

  test("sleep is the rest of the interval, never below 1ms", () => {
    assert.equal(computeSleepMs(33, 10), 23);
    assert.equal(computeSleepMs(33, 40), 1);
    assert.equal(computeSleepMs(33, -5), 33);
  });
});

describe("AppStateMachine", () => {
  test("Created -> Running -> Stopped -> Running", () => {
    const sm = new AppStateMachine();
    sm.toRunning();
    sm.toStopped();
    sm.toRunning();
    assert.equal(sm.state, "Running");
  });

  test("stopping twice is a lifecycle error", () => {
    const sm = new AppStateMachine();
    assert.throws(() => sm.toStopped(), (e: unknown) => isLoomError(e, "LOOM_INVALID_STATE"));
    sm.toRunning();
    sm.toFaulted();
    assert.throws(() => sm.toRunning(), (e: unknown) => isLoomError(e, "LOOM_INVALID_STATE"));
  });
});
