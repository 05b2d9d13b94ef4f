import { z } from "zod";
import { errorMessage } from "../shared/errors.js";
import { fetchJSON, type FetchLike } from "../shared/http.js";
import type { SentimentScore } from "../sentiment/types.js";
import type { PriceSummary } from "./chart.js";
import type { Classification, Insights, Outlook } from "./types.js";

const GROQ_URL = "https://api.groq.com/openai/v1/chat/completions";
const MAX_POINTS = 10;

export type InsightInput = {
  symbol: string;
  price: PriceSummary | null;
  classification: Classification;
  articles: Array<{ title: string; sentiment: SentimentScore }>;
};

const ChatSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })).min(1),
});

const ReplySchema = z.object({
  outlook: z.enum(["Bullish", "Bearish", "Neutral"]),
  commentary: z.string().min(1),
  points: z.array(z.string()).default([]),
});

function trimTo(input: string, max: number) {
  return input.length <= max ? input : input.slice(0, max);
}

export function buildPrompt(input: InsightInput): string {
  const { symbol, price, classification: c } = input;
  const headlines = input.articles
    .slice(0, 15)
    .map((a) => `- [${a.sentiment.label.toUpperCase()} ${a.sentiment.score.toFixed(2)}] ${a.title}`)
    .join("\n");

  return (
    `Stock: ${symbol}\n` +
    `Latest price: ${price ? `${price.latest} (${price.changeText} over the session)` : "n/a"}\n` +
    `Recommendation: ${c.recommendation} (trend ${c.trend}, mean news sentiment ${c.meanSentiment.toFixed(2)}, confidence ${c.confidence})\n\n` +
    `Tasks:\n` +
    `1. Classify the stock as Bullish, Bearish, or Neutral based on the market data and news.\n` +
    `2. Explain the recommendation above in 2-3 sentences. Do not change it.\n` +
    `3. Give up to ${MAX_POINTS} research points drawn from the headlines. No links.\n\n` +
    `Reply with JSON only: {"outlook": "Bullish|Bearish|Neutral", "commentary": string, "points": string[]}\n\n` +
    `Headlines:\n${trimTo(headlines || "(no news found)", 6000)}`
  );
}

export async function buildInsightsLLM(
  input: InsightInput,
  opts: { apiKey?: string; model: string; fetchImpl?: FetchLike; timeoutMs?: number }
): Promise<Insights | null> {
  if (!opts.apiKey) return null;

  try {
    const body = await fetchJSON(GROQ_URL, {
      method: "POST",
      headers: { authorization: `Bearer ${opts.apiKey}`, "content-type": "application/json" },
      body: JSON.stringify({
        model: opts.model,
        messages: [
          { role: "system", content: "You are an equity analyst. You write concise, price-relevant notes and reply in JSON." },
          { role: "user", content: buildPrompt(input) },
        ],
        response_format: { type: "json_object" },
        temperature: 0.2,
      }),
      fetchImpl: opts.fetchImpl,
      timeoutMs: opts.timeoutMs,
    });

    const content = ChatSchema.parse(body).choices[0].message.content ?? "";
    const reply = ReplySchema.parse(JSON.parse(content));
    return {
      outlook: reply.outlook,
      commentary: reply.commentary.trim(),
      points: reply.points.map((s) => s.trim()).filter(Boolean).slice(0, MAX_POINTS),
      llm: "on",
    };
  } catch (e) {
    console.warn("[llm] insights failed, using heuristic:", errorMessage(e));
    return null;
  }
}

const OUTLOOK: Record<Classification["recommendation"], Outlook> = {
  Buy: "Bullish",
  Sell: "Bearish",
  Hold: "Neutral",
};

export function buildInsightsHeuristic(input: InsightInput): Insights {
  const c = input.classification;
  const news = input.articles.length
    ? `mean sentiment ${c.meanSentiment.toFixed(2)} across ${input.articles.length} article${input.articles.length === 1 ? "" : "s"}`
    : "no recent news";

  const commentary =
    c.confidence === "low"
      ? `Not enough intraday data for ${input.symbol} to read a trend; defaulting to Hold.`
      : `${input.symbol} trend is ${c.trend} with ${news}, giving ${c.recommendation}.`;

  return {
    outlook: OUTLOOK[c.recommendation],
    commentary,
    points: input.articles.slice(0, MAX_POINTS).map((a) => `${a.title} (${a.sentiment.label})`),
    llm: "off",
  };
}
