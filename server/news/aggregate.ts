import { errorMessage } from "../shared/errors.js";
import { hashKey } from "../shared/hash.js";
import type { FetchLike } from "../shared/http.js";
import { fetchSerperNews } from "./fetchers/serper.js";
import { fetchYahooRss } from "./fetchers/yahoo.js";
import { fetchArticleText } from "./scrape.js";
import type { Article, NewsResult, NewsScraper, RawNewsItem } from "./types.js";

function safeKey(url: string, title: string) {
  try {
    const u = new URL(url);
    return (title.trim().toLowerCase() + "|" + u.hostname + u.pathname).slice(0, 300);
  } catch {
    return title.trim().toLowerCase() + "|" + url.slice(0, 50);
  }
}

export function dedupe(items: RawNewsItem[]): RawNewsItem[] {
  const seen = new Set<string>();
  const out: RawNewsItem[] = [];
  for (const it of items) {
    const key = safeKey(it.url, it.title);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(it);
  }
  return out;
}

async function toArticle(it: RawNewsItem, opts: { fetchImpl?: FetchLike; timeoutMs?: number }): Promise<Article> {
  const base = { id: hashKey(it.url), title: it.title, url: it.url, source: it.source, publishedAt: it.publishedAt };
  try {
    const text = await fetchArticleText(it.url, opts);
    if (text) return { ...base, text, textSource: "page" };
  } catch (e) {
    console.warn("[news] scrape failed:", it.url, errorMessage(e));
  }
  return { ...base, text: [it.title, it.snippet].filter(Boolean).join(". "), textSource: "snippet" };
}

export type NewsScraperOptions = {
  serperKey?: string;
  limit: number;
  fetchImpl?: FetchLike;
  timeoutMs?: number;
  now?: () => Date;
};

export function createNewsScraper(opts: NewsScraperOptions): NewsScraper {
  return {
    async collect(symbol): Promise<NewsResult> {
      const now = opts.now?.() ?? new Date();
      const http = { fetchImpl: opts.fetchImpl, timeoutMs: opts.timeoutMs, now };

      const [a, b] = await Promise.allSettled([
        fetchSerperNews(symbol, { apiKey: opts.serperKey, num: opts.limit, ...http }),
        fetchYahooRss(symbol, { limit: opts.limit, ...http }),
      ]);

      if (a.status === "rejected") console.warn("[news] Serper failed:", errorMessage(a.reason));
      if (b.status === "rejected") console.warn("[news] Yahoo RSS failed:", errorMessage(b.reason));
      const serper = a.status === "fulfilled" ? a.value : [];
      const yahoo = b.status === "fulfilled" ? b.value : [];

      const raw = dedupe([...serper, ...yahoo]);
      // newest first
      raw.sort((x, y) => y.publishedAt.localeCompare(x.publishedAt));

      const articles = await Promise.all(
        raw.slice(0, opts.limit).map((it) => toArticle(it, { fetchImpl: opts.fetchImpl, timeoutMs: opts.timeoutMs }))
      );

      return {
        articles,
        sources: [...(serper.length ? ["Serper"] : []), ...(yahoo.length ? ["Yahoo"] : [])],
      };
    },
  };
}
