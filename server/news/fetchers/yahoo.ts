import { fetchText, type FetchLike } from "../../shared/http.js";
import type { RawNewsItem } from "../types.js";

const ENTITIES: Record<string, string> = { "&amp;": "&", "&lt;": "<", "&gt;": ">", "&quot;": '"', "&#39;": "'", "&apos;": "'" };

function decode(s: string) {
  return s.replace(/&(amp|lt|gt|quot|apos|#39);/g, (m) => ENTITIES[m] ?? m);
}

function tag(block: string, name: string): string {
  const cdata = block.match(new RegExp(`<${name}><!\\[CDATA\\[([\\s\\S]*?)\\]\\]></${name}>`))?.[1];
  if (cdata !== undefined) return cdata.trim();
  return decode(block.match(new RegExp(`<${name}>([\\s\\S]*?)</${name}>`))?.[1] ?? "").trim();
}

// Example: https://feeds.finance.yahoo.com/rss/2.0/headline?s=AAPL&region=US&lang=en-US
export function parseYahooRss(xml: string, limit: number, now: Date): RawNewsItem[] {
  const items: RawNewsItem[] = [];
  const itemRegex = /<item>([\s\S]*?)<\/item>/g;
  let m: RegExpExecArray | null;
  while ((m = itemRegex.exec(xml)) && items.length < limit) {
    const block = m[1];
    const title = tag(block, "title");
    const link = tag(block, "link");
    const pub = tag(block, "pubDate");
    if (!title || !link) continue;

    const t = pub ? Date.parse(pub) : NaN;
    items.push({
      title,
      url: link,
      source: "Yahoo",
      publishedAt: new Date(Number.isNaN(t) ? now.getTime() : t).toISOString(),
      snippet: tag(block, "description") || null,
    });
  }
  return items;
}

export async function fetchYahooRss(
  symbol: string,
  opts: { limit: number; fetchImpl?: FetchLike; timeoutMs?: number; now?: Date }
): Promise<RawNewsItem[]> {
  const url = `https://feeds.finance.yahoo.com/rss/2.0/headline?s=${encodeURIComponent(symbol)}&region=US&lang=en-US`;
  const xml = await fetchText(url, { fetchImpl: opts.fetchImpl, timeoutMs: opts.timeoutMs });
  return parseYahooRss(xml, opts.limit, opts.now ?? new Date());
}
