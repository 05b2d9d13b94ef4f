import { describe, expect, it } from "vitest";
import type { PricePoint } from "../market/types.js";
import { classifyTrend, meanSentiment, recommend, trendOf } from "./classify.js";

const series = (...prices: number[]): PricePoint[] =>
  prices.map((price, i) => ({ time: `2024-05-01 09:${String(30 + i * 5).padStart(2, "0")}:00`, price }));

describe("classifyTrend", () => {
  it("returns Buy for an up-trend with positive news", () => {
    const r = classifyTrend(series(100, 105), [0.4, 0.2]);
    expect(r.ok).toBe(true);
    if (!r.ok) return;
    expect(r.value.recommendation).toBe("Buy");
    expect(r.value.trend).toBe("up");
    expect(r.value.meanSentiment).toBeCloseTo(0.3, 10);
    expect(r.value.confidence).toBe("normal");
  });

  it("returns Sell for a down-trend with no news", () => {
    const r = classifyTrend(series(100, 90), []);
    expect(r).toEqual({
      ok: true,
      value: { recommendation: "Sell", trend: "down", meanSentiment: 0, confidence: "normal" },
    });
  });

  it("buys on an up-trend with exactly neutral sentiment", () => {
    const r = classifyTrend(series(10, 9, 11), [0.5, -0.5]);
    expect(r.ok && r.value.recommendation).toBe("Buy");
  });

  it("sells on a down-trend with negative sentiment", () => {
    const r = classifyTrend(series(50, 55, 40), [-0.2]);
    expect(r.ok && r.value.recommendation).toBe("Sell");
  });

  it("holds when trend and sentiment disagree", () => {
    const up = classifyTrend(series(100, 101), [-0.1]);
    const down = classifyTrend(series(100, 99), [0.1]);
    expect(up.ok && up.value.recommendation).toBe("Hold");
    expect(down.ok && down.value.recommendation).toBe("Hold");
  });

  it("holds on a flat session", () => {
    const r = classifyTrend(series(100, 120, 100), [0.9]);
    expect(r.ok && r.value).toMatchObject({ recommendation: "Hold", trend: "flat" });
  });

  it("compares only the first and last points", () => {
    const r = classifyTrend(series(100, 50, 60, 101), []);
    expect(r.ok && r.value.trend).toBe("up");
  });

  it("reports DataInsufficient for fewer than two points", () => {
    expect(classifyTrend(series(100), [0.5])).toEqual({ ok: false, reason: "DataInsufficient", points: 1 });
    expect(classifyTrend([], [])).toEqual({ ok: false, reason: "DataInsufficient", points: 0 });
  });
});

describe("recommend", () => {
  it("degrades insufficient data to a low-confidence Hold", () => {
    const r = recommend(series(100), [0.4, 0.2]);
    expect(r).toMatchObject({ recommendation: "Hold", trend: "flat", confidence: "low", reason: "DataInsufficient" });
    expect(r.meanSentiment).toBeCloseTo(0.3, 10);
  });

  it("passes through a normal classification", () => {
    expect(recommend(series(1, 2), []).recommendation).toBe("Buy");
  });
});

describe("helpers", () => {
  it("uses exactly 0 for an empty sentiment set", () => {
    expect(meanSentiment([])).toBe(0);
  });

  it("derives the trend from the sign of the change", () => {
    expect(trendOf(1, 2)).toBe("up");
    expect(trendOf(2, 1)).toBe("down");
    expect(trendOf(2, 2)).toBe("flat");
  });
});
