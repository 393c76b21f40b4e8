// src/services/sentiment.classifier.ts
import { SentimentRule } from "../config";
import { Sentiment } from "../model/review.model";

interface CompiledRule {
  label: Sentiment;
  patterns: RegExp[];
}

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

// `\b` only knows ASCII word characters, so the boundary is spelled out for any script.
const stemPattern = (stem: string) =>
  new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(stem.toLowerCase())}`, "u");

export class SentimentClassifier {
  private readonly rules: CompiledRule[];

  constructor(rules: readonly SentimentRule[]) {
    this.rules = rules.map((rule) => ({
      label: rule.label,
      patterns: rule.stems.map(stemPattern),
    }));
  }

  classify(text: string): Sentiment {
    const lower = text.toLowerCase();

    for (const rule of this.rules) {
      if (rule.patterns.some((pattern) => pattern.test(lower))) {
        return rule.label;
      }
    }

    return "neutral";
  }
}
