import {expect} from "chai";
import {setImmediate as tick} from "node:timers/promises";
import {runPool} from "../src/worker/pool";

describe("runPool", function () {
  it("never runs more than `width` tasks at once and completes them all", async function () {
    let active = 0;
    let peak = 0;

    const settled = await runPool(["a", "b", "c"], 2, async (item) => {
      active += 1;
      peak = Math.max(peak, active);
      await tick();
      await tick();
      active -= 1;
      return item.toUpperCase();
    });

    expect(peak).to.equal(2);
    expect(settled).to.have.length(3);
    expect(settled.map((entry) => entry.index).sort()).to.deep.equal([0, 1, 2]);
  });

  it("returns results in completion order", async function () {
    const settled = await runPool([3, 1, 2], 3, async (delayTicks) => {
      for (let i = 0; i < delayTicks; i++) {
        await tick();
      }
      return delayTicks;
    });

    expect(settled.map((entry) => (entry.status === "fulfilled" ? entry.value : null))).to.deep.equal([1, 2, 3]);
  });

  it("isolates a rejected task from the rest", async function () {
    const settled = await runPool([1, 2, 3], 1, async (value) => {
      if (value === 2) {
        throw new Error("boom");
      }
      return value * 10;
    });

    expect(settled.map((entry) => entry.status)).to.deep.equal(["fulfilled", "rejected", "fulfilled"]);
    const rejected = settled[1];
    expect(rejected.status === "rejected" && rejected.reason instanceof Error && rejected.reason.message).to.equal("boom");
  });

  it("handles an empty input", async function () {
    expect(await runPool([], 4, async () => 1)).to.deep.equal([]);
  });
});
