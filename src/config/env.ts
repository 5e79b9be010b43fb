import dotenv from "dotenv";
import path from "node:path";
import type { LogLevel } from "./logger";

dotenv.config();

export interface MethodWeights {
  lexicon: number;
  contextual: number;
  sentiment: number;
}

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  referenceDataDir: string;
  maxTextLength: number;
  maxSuggestions: number;
  rewriteThreshold: number;
  negationWindow: number;
  negationFactor: number;
  idiomFactor: number;
  comprehensiveWeights: MethodWeights;
  rateLimitPerMinute: number;
  jsonBodyLimit: string;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const portRaw = source.PORT ?? "3000";
  const port = Number(portRaw);
  const maxTextLengthRaw = source.MAX_TEXT_LENGTH ?? "20000";
  const maxTextLength = Number(maxTextLengthRaw);
  const maxSuggestionsRaw = source.MAX_SUGGESTIONS ?? "3";
  const maxSuggestions = Number(maxSuggestionsRaw);
  const rewriteThresholdRaw = source.REWRITE_THRESHOLD ?? "15";
  const rewriteThreshold = Number(rewriteThresholdRaw);
  const negationWindowRaw = source.NEGATION_WINDOW ?? "3";
  const negationWindow = Number(negationWindowRaw);
  const negationFactorRaw = source.NEGATION_FACTOR ?? "0.5";
  const negationFactor = Number(negationFactorRaw);
  const idiomFactorRaw = source.IDIOM_FACTOR ?? "0.25";
  const idiomFactor = Number(idiomFactorRaw);
  const rateLimitRaw = source.RATE_LIMIT_PER_MINUTE ?? "60";
  const rateLimitPerMinute = Number(rateLimitRaw);
  const logLevel = parseLogLevel((source.LOG_LEVEL ?? "info").trim().toLowerCase());

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isInteger(maxTextLength) || maxTextLength < 100) {
    throw new Error(`Invalid MAX_TEXT_LENGTH value: ${maxTextLengthRaw}`);
  }
  if (!Number.isInteger(maxSuggestions) || maxSuggestions < 1) {
    throw new Error(`Invalid MAX_SUGGESTIONS value: ${maxSuggestionsRaw}`);
  }
  if (!Number.isFinite(rewriteThreshold) || rewriteThreshold < 0 || rewriteThreshold > 100) {
    throw new Error(`Invalid REWRITE_THRESHOLD value: ${rewriteThresholdRaw}`);
  }
  if (!Number.isInteger(negationWindow) || negationWindow < 1) {
    throw new Error(`Invalid NEGATION_WINDOW value: ${negationWindowRaw}`);
  }
  if (!isUnitFactor(negationFactor)) {
    throw new Error(
      `Invalid NEGATION_FACTOR value: ${negationFactorRaw}. Expected number between 0 and 1.`,
    );
  }
  if (!isUnitFactor(idiomFactor)) {
    throw new Error(`Invalid IDIOM_FACTOR value: ${idiomFactorRaw}. Expected number between 0 and 1.`);
  }
  if (!Number.isInteger(rateLimitPerMinute) || rateLimitPerMinute < 1) {
    throw new Error(`Invalid RATE_LIMIT_PER_MINUTE value: ${rateLimitRaw}`);
  }

  // Six bytes per character covers text sent as \uXXXX escapes.
  const jsonBodyLimitKb = Math.ceil((maxTextLength * 6) / 1024) + 16;

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    port,
    logLevel,
    referenceDataDir: path.resolve(process.cwd(), source.REFERENCE_DATA_DIR?.trim() || "data/reference"),
    maxTextLength,
    maxSuggestions,
    rewriteThreshold,
    negationWindow,
    negationFactor,
    idiomFactor,
    comprehensiveWeights: parseMethodWeights(source.COMPREHENSIVE_WEIGHTS ?? "0.4,0.35,0.25"),
    rateLimitPerMinute,
    jsonBodyLimit: `${jsonBodyLimitKb}kb`,
  };
}

export function parseMethodWeights(value: string): MethodWeights {
  const parts = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
    .map((item) => Number(item));
  if (parts.length !== 3 || parts.some((item) => !Number.isFinite(item) || item < 0)) {
    throw new Error(
      `Invalid COMPREHENSIVE_WEIGHTS value: ${value}. Expected three non-negative numbers.`,
    );
  }
  const [lexicon = 0, contextual = 0, sentiment = 0] = parts;
  const total = lexicon + contextual + sentiment;
  if (total <= 0) {
    throw new Error(`Invalid COMPREHENSIVE_WEIGHTS value: ${value}. Weights must not all be zero.`);
  }
  return {
    lexicon: lexicon / total,
    contextual: contextual / total,
    sentiment: sentiment / total,
  };
}

function isUnitFactor(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}
