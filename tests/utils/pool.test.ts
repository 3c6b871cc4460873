import { describe, expect, test } from "vitest";
import { describeRejection, mapWithConcurrency } from "../../src/utils/pool";

describe("mapWithConcurrency", () => {
  test("keeps input order", async () => {
    const delays = [30, 5, 15, 1];
    const settled = await mapWithConcurrency(delays, 2, async (ms, index) => {
      await new Promise((resolve) => setTimeout(resolve, ms));
      return index;
    });

    expect(settled.map((s) => (s.status === "fulfilled" ? s.value : -1))).toEqual([0, 1, 2, 3]);
  });

  test("never exceeds the limit", async () => {
    let inFlight = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 3, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
    });

    expect(peak).toBe(3);
  });

  test("a rejected job does not stop the others", async () => {
    const settled = await mapWithConcurrency(["a", "b", "c"], 1, async (item) => {
      if (item === "b") {
        throw new Error("b failed");
      }
      return item.toUpperCase();
    });

    expect(settled[0]).toEqual({ status: "fulfilled", value: "A" });
    expect(settled[1]?.status).toBe("rejected");
    expect(settled[2]).toEqual({ status: "fulfilled", value: "C" });
  });

  test("handles an empty list and a zero limit", async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
    const settled = await mapWithConcurrency([1, 2], 0, async (n) => n * 2);
    expect(settled).toEqual([
      { status: "fulfilled", value: 2 },
      { status: "fulfilled", value: 4 },
    ]);
  });

  test("describeRejection", () => {
    expect(describeRejection(new Error("boom"))).toBe("boom");
    expect(describeRejection("plain")).toBe("plain");
  });
});
