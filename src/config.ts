// src/config.ts
import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { ConfigError } from "./errors";
import { isSentiment, Sentiment } from "./model/review.model";

export interface SentimentRule {
  label: Sentiment;
  stems: readonly string[];
}

export interface AppConfig {
  port: number;
  dbPath: string;
  maxReviewLength: number;
  corsOrigin: string;
  sentimentRules: readonly SentimentRule[];
}

// Checked in order: positive wins over negative when both match.
export const DEFAULT_SENTIMENT_RULES: readonly SentimentRule[] = [
  { label: "positive", stems: ["хорош", "люблю"] },
  { label: "negative", stems: ["плох", "ненавиж"] },
];

const DEFAULT_PORT = 4000;
const DEFAULT_DB_PATH = "mysql://root@localhost:3306/reviews";
const DEFAULT_MAX_REVIEW_LENGTH = 1000;

const parsePositiveInt = (name: string, raw: string | undefined, fallback: number) => {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const parseSentimentRules = (input: unknown): SentimentRule[] => {
  if (!isRecord(input) || !Array.isArray(input.rules)) {
    throw new ConfigError('Sentiment patterns must be an object with a "rules" array');
  }

  return input.rules.map((rule: unknown, index: number) => {
    if (!isRecord(rule)) {
      throw new ConfigError(`Sentiment rule #${index} must be an object`);
    }
    const { label, stems } = rule;
    if (!isSentiment(label)) {
      throw new ConfigError(`Sentiment rule #${index} has an unknown label`);
    }
    if (
      !Array.isArray(stems) ||
      !stems.every((stem): stem is string => typeof stem === "string" && stem.trim() !== "")
    ) {
      throw new ConfigError(`Sentiment rule #${index} must list non-empty string stems`);
    }
    return { label, stems: stems.map((stem) => stem.trim()) };
  });
};

const loadSentimentRules = (file: string | undefined): readonly SentimentRule[] => {
  if (!file) return DEFAULT_SENTIMENT_RULES;

  const fullPath = path.resolve(file);
  let raw: string;
  try {
    raw = fs.readFileSync(fullPath, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read sentiment patterns at ${fullPath}: ${String(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError(`Sentiment patterns at ${fullPath} are not valid JSON`);
  }
  return parseSentimentRules(parsed);
};

const freezeRules = (rules: readonly SentimentRule[]) =>
  Object.freeze(
    rules.map((rule) => Object.freeze({ label: rule.label, stems: Object.freeze([...rule.stems]) }))
  );

/**
 * Builds the configuration once at startup. Pass `env` to read from something
 * other than `process.env` (tests do); `.env` is only loaded for the real one.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> => {
  if (env === process.env) dotenv.config();

  return Object.freeze({
    port: parsePositiveInt("PORT", env.PORT, DEFAULT_PORT),
    dbPath: env.DB_PATH?.trim() || DEFAULT_DB_PATH,
    maxReviewLength: parsePositiveInt(
      "MAX_REVIEW_LENGTH",
      env.MAX_REVIEW_LENGTH,
      DEFAULT_MAX_REVIEW_LENGTH
    ),
    corsOrigin: env.CORS_ORIGIN?.trim() || "*",
    sentimentRules: freezeRules(loadSentimentRules(env.SENTIMENT_PATTERNS_PATH)),
  });
};

// Hides the password when the connection URI is printed at startup.
export const maskDbPath = (dbPath: string) => dbPath.replace(/(\/\/[^:/@]+:)[^@]*@/, "$1****@");
