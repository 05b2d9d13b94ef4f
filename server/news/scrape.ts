// server/news/scrape.ts
import * as cheerio from "cheerio";
import { fetchText, type FetchLike } from "../shared/http.js";

const UA =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124 Safari/537.36";

const HEADERS = {
  "user-agent": UA,
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9",
};

/** Joined text of every <p> on the page, whitespace collapsed. */
export function extractParagraphs(html: string): string {
  const $ = cheerio.load(html);
  return $("p")
    .map((_, p) => $(p).text().replace(/\s+/g, " ").trim())
    .get()
    .filter(Boolean)
    .join(" ");
}

export async function fetchArticleText(
  url: string,
  opts: { fetchImpl?: FetchLike; timeoutMs?: number } = {}
): Promise<string> {
  const html = await fetchText(url, { headers: HEADERS, retries: 1, ...opts });
  return extractParagraphs(html);
}
