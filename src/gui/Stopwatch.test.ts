import { describe, it, expect } from "vitest";
import { Stopwatch } from "./Stopwatch";

describe("Stopwatch", () => {
  it("reports seconds since creation and since reset", () => {
    let now = 1000;
    const stopwatch = new Stopwatch(() => now);

    now = 3500;
    expect(stopwatch.time()).toBe(2.5);

    stopwatch.reset();
    now = 3750;
    expect(stopwatch.time()).toBe(0.25);
  });
});
