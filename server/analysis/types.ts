export type Recommendation = "Buy" | "Sell" | "Hold";

export type Trend = "up" | "down" | "flat";

export type Classification = {
  recommendation: Recommendation;
  trend: Trend;
  meanSentiment: number;
  confidence: "normal" | "low";
  reason?: "DataInsufficient";
};

export type ClassifyResult =
  | { ok: true; value: Classification }
  | { ok: false; reason: "DataInsufficient"; points: number };

export type Outlook = "Bullish" | "Bearish" | "Neutral";

export type Insights = {
  outlook: Outlook;
  commentary: string;
  points: string[];
  llm: "on" | "off";
};
