export type SentimentLabel = "positive" | "negative" | "neutral";

export type SentimentScore = {
  score: number; // -1..1
  label: SentimentLabel;
};

export type Lexicon = {
  polarity: Record<string, number>;
  intensifiers: Record<string, number>;
  negators: string[];
};
