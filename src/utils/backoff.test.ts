import { describe, it, expect } from "vitest";
import { Pacer, exponentialDelay, jitteredDelay } from "./backoff";
import { fakeClock } from "../testing/fixtures";

const options = { baseDelay: 1000, maxDelay: 10_000 };

describe("exponentialDelay", () => {
  it("doubles per retry", () => {
    expect([0, 1, 2, 3].map((n) => exponentialDelay(n, options))).toEqual([
      1000, 2000, 4000, 8000,
    ]);
  });

  it("never exceeds maxDelay", () => {
    expect(exponentialDelay(10, options)).toBe(10_000);
  });
});

describe("jitteredDelay", () => {
  it("spreads the delay below the exponential value", () => {
    expect(jitteredDelay(1, options, 0.25, () => 0)).toBe(2000);
    expect(jitteredDelay(1, options, 0.25, () => 1)).toBe(1500);
    expect(jitteredDelay(1, options, 0.25, () => 0.5)).toBe(1750);
  });
});

describe("Pacer", () => {
  it("lets the first call through", async () => {
    const clock = fakeClock();
    await new Pacer(1000, clock.now, clock.sleep).wait();
    expect(clock.sleeps).toEqual([]);
  });

  it("waits out the rest of the interval", async () => {
    const clock = fakeClock();
    const pacer = new Pacer(1000, clock.now, clock.sleep);

    await pacer.wait();
    clock.advance(300);
    await pacer.wait();
    clock.advance(1500);
    await pacer.wait();

    expect(clock.sleeps).toEqual([700]);
  });

  it("derives the interval from an hourly quota", async () => {
    const clock = fakeClock();
    const pacer = Pacer.perHour(50, clock.now, clock.sleep);

    await pacer.wait();
    await pacer.wait();

    expect(clock.sleeps).toEqual([72_000]);
  });
});
