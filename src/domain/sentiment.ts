import type { SentimentAnalysis, SentimentLabel } from "./types.js";

const POSITIVE_WORDS = ["good", "great", "excellent", "amazing", "wonderful", "fantastic"];
const NEGATIVE_WORDS = ["bad", "terrible", "awful", "horrible", "disappointing"];

function countMatches(text: string, words: readonly string[]): number {
  return words.filter((word) => text.includes(word)).length;
}

function confidenceFor(matches: number): number {
  return Math.round(Math.min(0.9, 0.6 + matches * 0.1) * 100) / 100;
}

// Keyword presence, not frequency: each listed word counts at most once.
export function analyzeSentiment(text: string): SentimentAnalysis {
  const lowered = text.toLowerCase();
  const positive = countMatches(lowered, POSITIVE_WORDS);
  const negative = countMatches(lowered, NEGATIVE_WORDS);

  let sentiment: SentimentLabel = "neutral";
  let confidence = 0.7;
  if (positive > negative) {
    sentiment = "positive";
    confidence = confidenceFor(positive);
  } else if (negative > positive) {
    sentiment = "negative";
    confidence = confidenceFor(negative);
  }

  return {
    sentiment,
    confidence,
    emotions: {
      joy: sentiment === "positive" ? 0.8 : 0.2,
      sadness: sentiment === "negative" ? 0.8 : 0.2,
      anger: 0.1,
      fear: 0.1,
    },
  };
}
