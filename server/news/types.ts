export type RawNewsItem = {
  title: string;
  url: string;
  source: string;
  publishedAt: string; // ISO
  snippet: string | null;
};

export type Article = {
  id: string;
  title: string;
  url: string;
  source: string;
  publishedAt: string; // ISO
  text: string;
  /** "snippet" when the page could not be scraped and title + snippet stand in. */
  textSource: "page" | "snippet";
};

export type NewsResult = {
  articles: Article[]; // newest first
  sources: string[];
};

export interface NewsScraper {
  collect(symbol: string): Promise<NewsResult>;
}
