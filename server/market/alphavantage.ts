// server/market/alphavantage.ts
import { z } from "zod";
import { DataUnavailableError, errorMessage } from "../shared/errors.js";
import { fetchJSON, type FetchLike } from "../shared/http.js";
import type { MarketDataFetcher, PricePoint, PriceSeries } from "./types.js";

const AV_BASE = "https://www.alphavantage.co/query";
const INTERVAL = "5min";

const IntradaySchema = z.object({
  "Meta Data": z.object({ "6. Time Zone": z.string().optional() }).passthrough().optional(),
  "Time Series (5min)": z.record(z.object({ "4. close": z.string() }).passthrough()).optional(),
  Note: z.string().optional(),
  Information: z.string().optional(),
  "Error Message": z.string().optional(),
});

export function parseIntraday(symbol: string, body: unknown): PriceSeries {
  const parsed = IntradaySchema.safeParse(body);
  if (!parsed.success) {
    throw new DataUnavailableError(symbol, "unexpected Alpha Vantage payload");
  }
  const data = parsed.data;
  if (data["Error Message"]) throw new DataUnavailableError(symbol, data["Error Message"]);
  if (data.Note || data.Information) {
    throw new DataUnavailableError(symbol, `rate limited by Alpha Vantage: ${data.Note ?? data.Information}`);
  }
  const ts = data["Time Series (5min)"];
  if (!ts) throw new DataUnavailableError(symbol, "no intraday series in response");

  const points: PricePoint[] = [];
  for (const [time, bar] of Object.entries(ts)) {
    const price = parseFloat(bar["4. close"]);
    if (Number.isFinite(price)) points.push({ time, price });
  }
  points.sort((a, b) => a.time.localeCompare(b.time));

  return {
    symbol,
    interval: INTERVAL,
    timeZone: data["Meta Data"]?.["6. Time Zone"] ?? "US/Eastern",
    points,
  };
}

export function createAlphaVantageFetcher(opts: {
  apiKey: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}): MarketDataFetcher {
  return {
    async fetchIntraday(symbol) {
      const url =
        `${AV_BASE}?function=TIME_SERIES_INTRADAY&symbol=${encodeURIComponent(symbol)}` +
        `&interval=${INTERVAL}&outputsize=compact&apikey=${encodeURIComponent(opts.apiKey)}`;

      let body: unknown;
      try {
        body = await fetchJSON(url, { fetchImpl: opts.fetchImpl, timeoutMs: opts.timeoutMs });
      } catch (e) {
        console.warn("[market] Alpha Vantage fetch failed:", symbol, errorMessage(e));
        throw new DataUnavailableError(symbol, errorMessage(e), { cause: e });
      }

      let series: PriceSeries;
      try {
        series = parseIntraday(symbol, body);
      } catch (e) {
        console.warn("[market]", errorMessage(e));
        throw e;
      }
      if (series.points.length === 0) console.warn("[market] empty intraday series:", symbol);
      return series;
    },
  };
}
