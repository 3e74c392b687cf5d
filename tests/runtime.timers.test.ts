import { afterEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { runtimeTimers, sleep, withTimeout } from "../src/runtime/timers.js";

describe("runtime timers", () => {
  let clock: sinon.SinonFakeTimers | null = null;

  afterEach(() => {
    clock?.restore();
    clock = null;
    sinon.restore();
  });

  it("resolves timers through the global object at call time", () => {
    const fakeHandle = setTimeout(() => undefined, 0);
    clearTimeout(fakeHandle);
    const override = sinon.stub(globalThis, "setTimeout").returns(fakeHandle);

    const handle = runtimeTimers.setTimeout(() => undefined, -5);

    sinon.assert.calledOnceWithExactly(override, sinon.match.func, 0);
    expect(handle).to.equal(fakeHandle);
  });

  it("sleeps for the requested delay", async () => {
    const timers = sinon.useFakeTimers();
    clock = timers;
    let done: boolean | null = null;
    void sleep(40).then((value) => {
      done = value;
    });

    await timers.tickAsync(39);
    expect(done).to.equal(null);
    await timers.tickAsync(1);
    expect(done).to.equal(true);
  });

  it("wakes a sleeper early when its signal aborts", async () => {
    const timers = sinon.useFakeTimers();
    clock = timers;
    const controller = new AbortController();
    const pending = sleep(1_000, controller.signal);

    controller.abort();

    expect(await pending).to.equal(false);
    expect(timers.countTimers()).to.equal(0);
    expect(await sleep(10, controller.signal)).to.equal(false);
  });

  it("resolves with the value when the promise wins the race", async () => {
    expect(await withTimeout(Promise.resolve("fast"), 1_000)).to.equal("fast");
  });

  it("resolves with null once the timeout elapses", async () => {
    const timers = sinon.useFakeTimers();
    clock = timers;
    const pending = withTimeout(new Promise<string>(() => undefined), 25);

    await timers.tickAsync(25);

    expect(await pending).to.equal(null);
  });

  it("propagates rejections of the raced promise", async () => {
    let caught: unknown = null;
    try {
      await withTimeout(Promise.reject(new Error("broken")), null);
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(Error);
    if (caught instanceof Error) {
      expect(caught.message).to.equal("broken");
    }
  });
});
