import type { PriceSeries } from "../market/types.js";

export type PriceSummary = {
  latest: number;
  first: number;
  changePct: number;
  changeText: string; // "+1.23%"
  direction: "positive" | "negative";
};

export type ChartPayload = {
  title: string;
  xTitle: string;
  yTitle: string;
  series: { name: string; x: string[]; y: number[] };
};

export function summarizePrice(series: PriceSeries): PriceSummary | null {
  const pts = series.points;
  if (!pts.length) return null;
  const first = pts[0].price;
  const latest = pts[pts.length - 1].price;
  const changePct = first === 0 ? 0 : ((latest - first) * 100) / first;
  return {
    latest,
    first,
    changePct,
    changeText: `${changePct >= 0 ? "+" : ""}${changePct.toFixed(2)}%`,
    direction: changePct >= 0 ? "positive" : "negative",
  };
}

export function buildChart(series: PriceSeries): ChartPayload {
  return {
    title: `${series.symbol} Intraday Stock Data (5-min Interval)`,
    xTitle: "Time",
    yTitle: "Price (USD)",
    series: {
      name: "Closing Price",
      x: series.points.map((p) => p.time),
      y: series.points.map((p) => p.price),
    },
  };
}
