// server/analysis/classify.ts
import type { PricePoint } from "../market/types.js";
import type { Classification, ClassifyResult, Recommendation, Trend } from "./types.js";

export const MIN_POINTS = 2;

export function meanSentiment(scores: readonly number[]): number {
  if (!scores.length) return 0;
  return scores.reduce((a, b) => a + b, 0) / scores.length;
}

export function trendOf(first: number, last: number): Trend {
  const d = last - first;
  if (d > 0) return "up";
  if (d < 0) return "down";
  return "flat";
}

function decide(trend: Trend, mean: number): Recommendation {
  if (trend === "up" && mean >= 0) return "Buy";
  if (trend === "down" && mean <= 0) return "Sell";
  return "Hold";
}

/**
 * Combines price direction (first vs last point, ascending time) with the mean
 * article sentiment. Pure; short series are reported, not thrown.
 */
export function classifyTrend(points: readonly PricePoint[], sentiments: readonly number[]): ClassifyResult {
  if (points.length < MIN_POINTS) {
    return { ok: false, reason: "DataInsufficient", points: points.length };
  }
  const trend = trendOf(points[0].price, points[points.length - 1].price);
  const mean = meanSentiment(sentiments);
  return {
    ok: true,
    value: { recommendation: decide(trend, mean), trend, meanSentiment: mean, confidence: "normal" },
  };
}

/** classifyTrend with the caller-side fallback: insufficient data degrades to a low-confidence Hold. */
export function recommend(points: readonly PricePoint[], sentiments: readonly number[]): Classification {
  const r = classifyTrend(points, sentiments);
  if (r.ok) return r.value;
  return {
    recommendation: "Hold",
    trend: "flat",
    meanSentiment: meanSentiment(sentiments),
    confidence: "low",
    reason: r.reason,
  };
}
