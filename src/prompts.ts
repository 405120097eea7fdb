// Prompt construction — built-in instructions per insight kind, with the
// portfolio appended as JSON context whatever instructions are used.

import type { InsightKind, PortfolioSnapshot } from "./domain.ts";
import type { ChatPrompt } from "./ai-provider.ts";

type KindTag = InsightKind["_tag"];

interface KindDefaults {
  readonly system: string;
  readonly instructions: string;
  readonly temperature: number;
  readonly maxTokens: number;
}

const analystSystem =
  "You are a financial analyst AI. Be concise and factual. " +
  "Always answer with a single valid JSON object and nothing else.";

export const kindDefaults: Readonly<Record<KindTag, KindDefaults>> = {
  PortfolioSummary: {
    system: analystSystem,
    instructions: [
      "Analyze the stock portfolio below. Summarize its overall health, diversification and risk profile, and suggest improvements.",
      "Reply with JSON of the form:",
      '{"summary": "...", "risk_level": "low|medium|high", "sentiment": "bullish|bearish|neutral", "bullet_points": ["..."], "confidence_score": 0.0-1.0}',
    ].join("\n"),
    temperature: 0.4,
    maxTokens: 800,
  },
  StockPrediction: {
    system:
      "You are a financial analyst AI specialized in short-term stock predictions. " +
      "Focus on price action, volume and recent market behaviour. " +
      "Always answer with a single valid JSON object and nothing else.",
    instructions: [
      "Predict the next trading day's movement of the target symbol.",
      "Reply with JSON of the form:",
      '{"direction": "up|down|neutral", "confidence": 0.0-1.0, "predicted_change": 1.5, "reasoning": "..."}',
      "predicted_change is a percentage.",
    ].join("\n"),
    temperature: 0.3,
    maxTokens: 500,
  },
  MarketingBriefing: {
    system: analystSystem,
    instructions: [
      "Write a daily market briefing for the portfolio below: current market events, earnings, institutional activity and a short health assessment.",
      'Reply with JSON with exactly four string keys: "overview", "keyDrivers", "highlightsAndActivity", "riskFactors".',
    ].join("\n"),
    temperature: 0.5,
    maxTokens: 1200,
  },
};

/** The instruction text in effect: the override verbatim, else the default. */
export function effectiveInstructions(kind: InsightKind, override?: string): string {
  return override !== undefined && override.trim().length > 0
    ? override
    : kindDefaults[kind._tag].instructions;
}

const round2 = (n: number) => Math.round(n * 100) / 100;

export function portfolioContext(
  kind: InsightKind,
  snapshot: PortfolioSnapshot,
): string {
  const context = {
    ...(kind._tag === "StockPrediction" ? { target: kind.symbol } : {}),
    holdings: snapshot.positions.map(({ holding, quote }) => ({
      symbol: holding.symbol,
      shares: holding.shares,
      price: quote === undefined ? null : round2(quote.price),
      change: quote === undefined ? null : round2(quote.change),
      changePercent: quote === undefined ? null : round2(quote.changePercent),
    })),
    totalValue: round2(snapshot.stats.totalValue),
  };
  return `Portfolio context (JSON):\n${JSON.stringify(context)}`;
}

export function buildPrompt(
  kind: InsightKind,
  snapshot: PortfolioSnapshot,
  override?: string,
): ChatPrompt {
  const defaults = kindDefaults[kind._tag];
  return {
    system: defaults.system,
    user: `${effectiveInstructions(kind, override)}\n\n${portfolioContext(kind, snapshot)}`,
    temperature: defaults.temperature,
    maxTokens: defaults.maxTokens,
  };
}
