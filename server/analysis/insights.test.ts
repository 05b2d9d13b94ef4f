import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { json, routeFetch } from "../shared/testing.js";
import { buildInsightsHeuristic, buildInsightsLLM, buildPrompt, type InsightInput } from "./insights.js";

const input: InsightInput = {
  symbol: "ACME",
  price: { latest: 105, first: 100, changePct: 5, changeText: "+5.00%", direction: "positive" },
  classification: { recommendation: "Buy", trend: "up", meanSentiment: 0.3, confidence: "normal" },
  articles: [
    { title: "Acme beats estimates", sentiment: { score: 0.4, label: "positive" } },
    { title: "Acme opens plant", sentiment: { score: 0, label: "neutral" } },
  ],
};

const chat = (content: string) => json({ choices: [{ message: { role: "assistant", content } }] });

describe("buildInsightsLLM", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns null without an API key and makes no request", async () => {
    const fetchImpl = routeFetch([]);
    await expect(buildInsightsLLM(input, { model: "m", fetchImpl })).resolves.toBeNull();
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("parses the structured reply", async () => {
    const reply = { outlook: "Bullish", commentary: " Momentum and news agree. ", points: ["Beat on revenue", " ", "New plant"] };
    const fetchImpl = routeFetch([["https://api.groq.com/", () => chat(JSON.stringify(reply))]]);

    const out = await buildInsightsLLM(input, { apiKey: "test-key", model: "test-model", fetchImpl });

    expect(out).toEqual({
      outlook: "Bullish",
      commentary: "Momentum and news agree.",
      points: ["Beat on revenue", "New plant"],
      llm: "on",
    });
    const sent = JSON.parse(String(fetchImpl.mock.calls[0][1]?.body));
    expect(sent.model).toBe("test-model");
    expect(sent.response_format).toEqual({ type: "json_object" });
  });

  it("returns null on a malformed reply", async () => {
    const fetchImpl = routeFetch([["https://api.groq.com/", () => chat('{"outlook":"Moon"}')]]);
    await expect(buildInsightsLLM(input, { apiKey: "k", model: "m", fetchImpl })).resolves.toBeNull();
  });

  it("returns null when the request fails", async () => {
    const fetchImpl = routeFetch([["https://api.groq.com/", () => json({ error: "bad key" }, 401)]]);
    await expect(buildInsightsLLM(input, { apiKey: "k", model: "m", fetchImpl })).resolves.toBeNull();
  });
});

describe("buildInsightsHeuristic", () => {
  it("maps the recommendation to an outlook and lists headlines", () => {
    expect(buildInsightsHeuristic(input)).toEqual({
      outlook: "Bullish",
      commentary: "ACME trend is up with mean sentiment 0.30 across 2 articles, giving Buy.",
      points: ["Acme beats estimates (positive)", "Acme opens plant (neutral)"],
      llm: "off",
    });
  });

  it("explains a low-confidence Hold", () => {
    const out = buildInsightsHeuristic({
      ...input,
      classification: { recommendation: "Hold", trend: "flat", meanSentiment: 0, confidence: "low", reason: "DataInsufficient" },
      articles: [],
    });
    expect(out.outlook).toBe("Neutral");
    expect(out.commentary).toBe("Not enough intraday data for ACME to read a trend; defaulting to Hold.");
    expect(out.points).toEqual([]);
  });

  it("mentions missing news", () => {
    const out = buildInsightsHeuristic({
      ...input,
      classification: { recommendation: "Sell", trend: "down", meanSentiment: 0, confidence: "normal" },
      articles: [],
    });
    expect(out.commentary).toBe("ACME trend is down with no recent news, giving Sell.");
    expect(out.outlook).toBe("Bearish");
  });
});

describe("buildPrompt", () => {
  it("includes price, recommendation and tagged headlines", () => {
    const p = buildPrompt(input);
    expect(p).toContain("Latest price: 105 (+5.00% over the session)");
    expect(p).toContain("Recommendation: Buy (trend up, mean news sentiment 0.30, confidence normal)");
    expect(p).toContain("- [POSITIVE 0.40] Acme beats estimates");
  });
});
