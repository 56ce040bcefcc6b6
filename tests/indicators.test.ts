import { describe, expect, it } from "vitest";

import { computeEma, computeRsi, computeVolatility, latestDefined } from "@/lib/indicators";

describe("computeEma", () => {
  it("seeds with the simple average and smooths afterwards", () => {
    expect(computeEma([1, 2, 3, 4], 3)).toEqual([null, null, 2, 3]);
  });

  it("converges to a constant price", () => {
    const series = computeEma(new Array<number>(30).fill(5), 15);
    expect(series.slice(0, 14).every((value) => value === null)).toBe(true);
    expect(series.slice(14)).toEqual(new Array<number>(16).fill(5));
  });

  it("returns an all-null series when there are fewer prices than the period", () => {
    expect(computeEma([1, 2], 3)).toEqual([null, null]);
    expect(computeEma([], 3)).toEqual([]);
  });

  it("uses alpha = 2 / (period + 1)", () => {
    const series = computeEma([10, 10, 10, 14], 3);
    expect(series[3]).toBeCloseTo(12, 10);
  });
});

describe("latestDefined", () => {
  it("returns the last non-null value", () => {
    expect(latestDefined([null, 2, 3, null])).toBe(3);
    expect(latestDefined([null, null])).toBeNull();
  });
});

describe("computeRsi", () => {
  it("is 100 when there are no losses", () => {
    const closes = Array.from({ length: 15 }, (_, index) => index + 1);
    expect(computeRsi(closes, 14)).toBe(100);
  });

  it("is 50 when gains and losses balance", () => {
    expect(computeRsi([10, 11, 10], 2)).toBe(50);
  });

  it("needs period + 1 closes", () => {
    expect(computeRsi([1, 2, 3], 14)).toBeNull();
  });
});

describe("computeVolatility", () => {
  it("is zero for constant returns and short input", () => {
    expect(computeVolatility([100, 110, 121])).toBeCloseTo(0, 10);
    expect(computeVolatility([5])).toBe(0);
  });

  it("is the population deviation of simple returns", () => {
    // returns +10% and -10%
    expect(computeVolatility([100, 110, 99])).toBeCloseTo(0.1, 10);
  });
});
