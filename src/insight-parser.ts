// Insight parsing — free text from a model into a typed insight.
//
// Strict JSON first, then the first balanced {...} embedded in the text.
// Anything else is a ResponseParseFailed carrying the raw text; no field
// is ever filled with an invented value.

import { Either, Option, Schema } from "effect";
import type {
  Direction,
  Insight,
  InsightKind,
  ProviderId,
  RiskLevel,
  Sentiment,
} from "./domain.ts";
import { ResponseParseFailed } from "./ai-provider.ts";

// --- JSON extraction ---

const parseJson = Option.liftThrowable((text: string): unknown => JSON.parse(text));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseObject(text: string): Option.Option<Record<string, unknown>> {
  return parseJson(text).pipe(Option.filter(isRecord));
}

/** End index (exclusive) of the balanced object opening at `start`, if the
 *  braces close. Braces inside string literals don't count. */
export function balancedEnd(text: string, start: number): number | undefined {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return undefined;
}

/** First balanced `{...}` substring of `text` that decodes as an object. */
export function findEmbeddedObject(
  text: string,
): Option.Option<Record<string, unknown>> {
  for (let start = text.indexOf("{"); start !== -1; start = text.indexOf("{", start + 1)) {
    const end = balancedEnd(text, start);
    if (end === undefined) continue;
    const candidate = parseObject(text.slice(start, end));
    if (Option.isSome(candidate)) return candidate;
  }
  return Option.none();
}

export function extractJsonObject(
  raw: string,
  provider: ProviderId,
): Either.Either<Record<string, unknown>, ResponseParseFailed> {
  return parseObject(raw.trim()).pipe(
    Option.orElse(() => findEmbeddedObject(raw)),
    Either.fromOption(() =>
      new ResponseParseFailed({
        provider,
        raw,
        message: "No JSON object found in response",
      })
    ),
  );
}

// --- Field normalization ---

/** Confidence as a fraction in [0, 1]. Models often answer in percent
 *  despite being asked for a fraction, so values above 10 are read as
 *  percentages; anything between 1 and 10 is an overshoot and clamps to 1. */
export function clampConfidence(value: number): number {
  const fraction = value > 10 ? value / 100 : value;
  return Math.min(1, Math.max(0, fraction));
}

export function normalizeDirection(value: string): Direction {
  switch (value.trim().toLowerCase()) {
    case "up":
    case "bullish":
    case "rise":
    case "increase":
      return "up";
    case "down":
    case "bearish":
    case "fall":
    case "decrease":
      return "down";
    default:
      return "neutral";
  }
}

export function normalizeRiskLevel(value: string | undefined): RiskLevel {
  switch (value?.trim().toLowerCase()) {
    case "low":
      return "low";
    case "medium":
    case "moderate":
      return "medium";
    case "high":
      return "high";
    default:
      return "unknown";
  }
}

export function normalizeSentiment(value: string | undefined): Sentiment {
  switch (value?.trim().toLowerCase()) {
    case "bullish":
    case "positive":
      return "bullish";
    case "bearish":
    case "negative":
      return "bearish";
    default:
      return "neutral";
  }
}

// --- Variant schemas ---

const Numeric = Schema.Union(
  Schema.Finite,
  Schema.NumberFromString.pipe(Schema.finite()),
);

const Text = Schema.Union(
  Schema.String,
  Schema.Array(Schema.String).pipe(
    Schema.transform(Schema.String, {
      strict: true,
      decode: (lines) => lines.join("\n"),
      encode: (text) => text.split("\n"),
    }),
  ),
);

const PortfolioSummaryJson = Schema.Struct({
  summary: Schema.String,
  risk_level: Schema.optional(Schema.String),
  sentiment: Schema.optional(Schema.String),
  bullet_points: Schema.optional(Schema.Array(Schema.String)),
  confidence_score: Schema.optional(Numeric),
});

const StockPredictionJson = Schema.Struct({
  direction: Schema.String,
  confidence: Numeric,
  predicted_change: Numeric,
  reasoning: Schema.String,
});

const MarketingBriefingJson = Schema.Struct({
  overview: Text,
  keyDrivers: Text,
  highlightsAndActivity: Text,
  riskFactors: Text,
});

// --- Decoding ---

export function decodeInsight(
  kind: InsightKind,
  json: Record<string, unknown>,
  provider: ProviderId,
  raw: string,
  generatedAt: number,
): Either.Either<Insight, ResponseParseFailed> {
  const fail = (e: { readonly message: string }) =>
    new ResponseParseFailed({
      provider,
      raw,
      message: `Response is missing required fields: ${e.message}`,
    });

  switch (kind._tag) {
    case "PortfolioSummary":
      return Schema.decodeUnknownEither(PortfolioSummaryJson)(json).pipe(
        Either.mapLeft(fail),
        Either.map((r): Insight => ({
          _tag: "PortfolioSummary",
          provider,
          summary: r.summary,
          riskLevel: normalizeRiskLevel(r.risk_level),
          sentiment: normalizeSentiment(r.sentiment),
          bulletPoints: r.bullet_points ?? [],
          confidence: r.confidence_score === undefined
            ? undefined
            : clampConfidence(r.confidence_score),
          generatedAt,
        })),
      );
    case "StockPrediction":
      return Schema.decodeUnknownEither(StockPredictionJson)(json).pipe(
        Either.mapLeft(fail),
        Either.map((r): Insight => ({
          _tag: "StockPrediction",
          provider,
          symbol: kind.symbol,
          direction: normalizeDirection(r.direction),
          confidence: clampConfidence(r.confidence),
          predictedChangePercent: r.predicted_change,
          reasoning: r.reasoning,
          generatedAt,
        })),
      );
    case "MarketingBriefing":
      return Schema.decodeUnknownEither(MarketingBriefingJson)(json).pipe(
        Either.mapLeft(fail),
        Either.map((r): Insight => ({
          _tag: "MarketingBriefing",
          provider,
          overview: r.overview,
          keyDrivers: r.keyDrivers,
          highlightsAndActivity: r.highlightsAndActivity,
          riskFactors: r.riskFactors,
          generatedAt,
        })),
      );
  }
}

export function parseInsight(
  kind: InsightKind,
  raw: string,
  provider: ProviderId,
  generatedAt: number,
): Either.Either<Insight, ResponseParseFailed> {
  return extractJsonObject(raw, provider).pipe(
    Either.flatMap((json) => decodeInsight(kind, json, provider, raw, generatedAt)),
  );
}
