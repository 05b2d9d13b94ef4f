import { z } from "zod";
import { fetchJSON, type FetchLike } from "../../shared/http.js";
import type { RawNewsItem } from "../types.js";

const SERPER_URL = "https://google.serper.dev/news";

const SerperSchema = z.object({
  news: z
    .array(
      z.object({
        title: z.string().optional(),
        link: z.string().optional(),
        snippet: z.string().optional(),
        date: z.string().optional(),
        source: z.string().optional(),
      })
    )
    .default([]),
});

const UNIT_MS: Record<string, number> = {
  second: 1000,
  minute: 60_000,
  hour: 3_600_000,
  day: 86_400_000,
  week: 7 * 86_400_000,
  month: 30 * 86_400_000,
};

// Serper reports "3 hours ago", "an hour ago", "2 months ago" or an absolute date.
export function parseSerperDate(raw: string | undefined, now: Date): string {
  const s = (raw ?? "").trim();
  const rel = s.toLowerCase().match(/^(\d+|an?)\s+(second|minute|hour|day|week|month)s?\s+ago$/);
  if (rel) {
    const n = /^\d+$/.test(rel[1]) ? Number(rel[1]) : 1;
    const ms = UNIT_MS[rel[2]] ?? 0;
    return new Date(now.getTime() - n * ms).toISOString();
  }
  const abs = Date.parse(s);
  return Number.isNaN(abs) ? now.toISOString() : new Date(abs).toISOString();
}

export async function fetchSerperNews(
  symbol: string,
  opts: { apiKey?: string; num: number; fetchImpl?: FetchLike; timeoutMs?: number; now?: Date }
): Promise<RawNewsItem[]> {
  if (!opts.apiKey) {
    console.warn("[news] SERPER_API_KEY not set. Skipping Serper.");
    return [];
  }

  const body = await fetchJSON(SERPER_URL, {
    method: "POST",
    headers: { "X-API-KEY": opts.apiKey, "Content-Type": "application/json" },
    body: JSON.stringify({ q: `${symbol} stock news`, num: opts.num, tbs: "qdr:d" }),
    fetchImpl: opts.fetchImpl,
    timeoutMs: opts.timeoutMs,
  });

  const parsed = SerperSchema.safeParse(body);
  if (!parsed.success) {
    console.warn("[news] Serper: unexpected payload");
    return [];
  }

  const now = opts.now ?? new Date();
  const out: RawNewsItem[] = [];
  for (const x of parsed.data.news) {
    if (!x.title || !x.link) continue;
    out.push({
      title: x.title.trim(),
      url: x.link,
      source: x.source ? `Serper/${x.source}` : "Serper",
      publishedAt: parseSerperDate(x.date, now),
      snippet: x.snippet ?? null,
    });
  }
  return out;
}
