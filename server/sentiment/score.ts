// server/sentiment/score.ts
import { readFileSync } from "node:fs";
import { z } from "zod";
import type { Lexicon, SentimentLabel, SentimentScore } from "./types.js";

const NEGATION_FACTOR = -0.5;

const LexiconSchema = z.object({
  polarity: z.record(z.number().min(-1).max(1)),
  intensifiers: z.record(z.number().positive()),
  negators: z.array(z.string()),
});

export function loadLexicon(file: URL = new URL("./lexicon.json", import.meta.url)): Lexicon {
  return LexiconSchema.parse(JSON.parse(readFileSync(file, "utf8")));
}

const clamp = (x: number) => Math.max(-1, Math.min(1, x));

export function labelFor(score: number): SentimentLabel {
  if (score > 0) return "positive";
  if (score < 0) return "negative";
  return "neutral";
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().replace(/[\u2018\u2019]/g, "'").match(/[a-z]+(?:'[a-z]+)?/g) ?? [];
}

export interface SentimentScorer {
  scoreText(text: string): SentimentScore;
}

/**
 * Lexicon polarity scorer. Modifiers apply to the next scored word only:
 * an intensifier multiplies it, a negator flips and halves it. Any other
 * unscored word drops pending modifiers.
 */
export function createScorer(lexicon: Lexicon): SentimentScorer {
  const negators = new Set(lexicon.negators);
  const polarity = new Map(Object.entries(lexicon.polarity));
  const intensifiers = new Map(Object.entries(lexicon.intensifiers));

  return {
    scoreText(text) {
      const hits: number[] = [];
      let negate = false;
      let intensity = 1;

      for (const tok of tokenize(text)) {
        if (negators.has(tok) || tok.endsWith("n't")) {
          negate = true;
          continue;
        }
        const boost = intensifiers.get(tok);
        if (boost !== undefined) {
          intensity *= boost;
          continue;
        }
        const p = polarity.get(tok);
        if (p !== undefined) {
          hits.push(clamp(p * intensity * (negate ? NEGATION_FACTOR : 1)));
        }
        negate = false;
        intensity = 1;
      }

      const score = hits.length ? hits.reduce((a, b) => a + b, 0) / hits.length : 0;
      return { score, label: labelFor(score) };
    },
  };
}

let defaultScorer: SentimentScorer | null = null;

export function getDefaultScorer(): SentimentScorer {
  if (!defaultScorer) defaultScorer = createScorer(loadLexicon());
  return defaultScorer;
}
