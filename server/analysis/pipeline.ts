// server/analysis/pipeline.ts
import type { MarketDataFetcher } from "../market/types.js";
import type { NewsScraper } from "../news/types.js";
import type { SentimentScore } from "../sentiment/types.js";
import type { SentimentScorer } from "../sentiment/score.js";
import { buildChart, summarizePrice, type ChartPayload, type PriceSummary } from "./chart.js";
import { recommend } from "./classify.js";
import { buildInsightsHeuristic, type InsightInput } from "./insights.js";
import type { Classification, Insights } from "./types.js";

export type ScoredArticle = {
  id: string;
  title: string;
  url: string;
  source: string;
  publishedAt: string;
  textSource: "page" | "snippet";
  sentiment: SentimentScore;
};

export type AnalysisPayload = {
  symbol: string;
  price: PriceSummary | null;
  chart: ChartPayload;
  classification: Classification;
  articles: ScoredArticle[];
  insights: Omit<Insights, "llm">;
  meta: { generatedAt: string; sources: string[]; llm: "on" | "off" };
};

export type PipelineDeps = {
  market: MarketDataFetcher;
  news: NewsScraper;
  scorer: SentimentScorer;
  /** Resolves to null when the LLM is off or fails; the heuristic then applies. */
  insights?: (input: InsightInput) => Promise<Insights | null>;
  now?: () => Date;
};

/**
 * One request: price and news in parallel, then scoring and classification.
 * Rejects with DataUnavailableError when the price series cannot be fetched;
 * news problems never fail the request.
 */
export async function analyzeTicker(symbol: string, deps: PipelineDeps): Promise<AnalysisPayload> {
  const [series, news] = await Promise.all([deps.market.fetchIntraday(symbol), deps.news.collect(symbol)]);

  const articles: ScoredArticle[] = news.articles.map((a) => ({
    id: a.id,
    title: a.title,
    url: a.url,
    source: a.source,
    publishedAt: a.publishedAt,
    textSource: a.textSource,
    sentiment: deps.scorer.scoreText(a.text),
  }));

  const classification = recommend(
    series.points,
    articles.map((a) => a.sentiment.score)
  );
  const price = summarizePrice(series);

  const input: InsightInput = { symbol, price, classification, articles };
  const insights = (deps.insights ? await deps.insights(input) : null) ?? buildInsightsHeuristic(input);

  return {
    symbol,
    price,
    chart: buildChart(series),
    classification,
    articles,
    insights: { outlook: insights.outlook, commentary: insights.commentary, points: insights.points },
    meta: {
      generatedAt: (deps.now?.() ?? new Date()).toISOString(),
      sources: news.sources,
      llm: insights.llm,
    },
  };
}
