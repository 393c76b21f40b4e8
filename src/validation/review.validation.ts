// src/validation/review.validation.ts
import { ValidationError } from "../errors";
import { isSentiment, Sentiment } from "../model/review.model";

export interface TextFieldRule {
  type: "string";
  trim: boolean;
  minLength: number;
  maxLength: number;
}

export interface ReviewCreateRules {
  text: TextFieldRule;
}

export const reviewCreateRules = (maxReviewLength: number): ReviewCreateRules => ({
  text: { type: "string", trim: true, minLength: 1, maxLength: maxReviewLength },
});

// Code points, so a character outside the BMP counts once.
export const textLength = (value: string) => Array.from(value).length;

const checkTextField = (value: unknown, rule: TextFieldRule): string => {
  if (typeof value !== "string") {
    throw new ValidationError();
  }
  const text = rule.trim ? value.trim() : value;
  const length = textLength(text);
  if (length < rule.minLength || length > rule.maxLength) {
    throw new ValidationError();
  }
  return text;
};

/** Returns the trimmed review text or throws `ValidationError`. */
export const validateReviewCreate = (body: unknown, rules: ReviewCreateRules): string => {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw new ValidationError();
  }
  return checkTextField("text" in body ? body.text : undefined, rules.text);
};

/**
 * `undefined` means no filter. An empty value, a repeated parameter or an
 * unknown label is rejected rather than ignored.
 */
export const parseSentimentFilter = (value: unknown): Sentiment | undefined => {
  if (value === undefined) return undefined;
  if (!isSentiment(value)) {
    throw new ValidationError("Invalid sentiment filter");
  }
  return value;
};
