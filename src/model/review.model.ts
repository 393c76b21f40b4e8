// src/model/review.model.ts

export const SENTIMENTS = ["positive", "negative", "neutral"] as const;

export type Sentiment = (typeof SENTIMENTS)[number];

export interface Review {
  id: number;
  text: string;
  sentiment: Sentiment;
  created_at: string;
}

export const isSentiment = (value: unknown): value is Sentiment =>
  typeof value === "string" &&
  SENTIMENTS.some((sentiment) => sentiment === value);
