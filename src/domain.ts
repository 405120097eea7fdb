// Pure domain types — no framework dependency, no I/O.

// --- Quotes ---

export interface Quote {
  readonly symbol: string;
  readonly price: number;
  readonly change: number;
  readonly changePercent: number;
  readonly previousClose: number;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly volume: number;
  readonly currency: string;
  readonly fetchedAt: number; // epoch ms
}

/** A quote together with where it came from. `stale` is set only when the
 *  value is served past its freshness window because every source failed. */
export interface QuoteResult {
  readonly quote: Quote;
  readonly source: string;
  readonly stale: boolean;
}

export function percentChange(price: number, previousClose: number): number {
  return previousClose === 0 ? 0 : ((price - previousClose) / previousClose) * 100;
}

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

// --- Portfolio ---

export interface Holding {
  readonly symbol: string;
  readonly shares: number;
  /** Per-share purchase price. */
  readonly costBasis?: number;
  readonly addedAt: number;
}

export interface Position {
  readonly holding: Holding;
  readonly quote: Quote | undefined;
  readonly stale: boolean;
  readonly error: string | undefined;
}

export type Health = "healthy" | "warning" | "danger";

export interface PortfolioStats {
  readonly totalValue: number;
  readonly dailyChange: number;
  readonly dailyChangePercent: number;
  readonly totalCost: number | undefined;
  readonly totalGain: number | undefined;
  readonly totalGainPercent: number | undefined;
  readonly healthyCount: number;
  readonly warningCount: number;
  readonly dangerCount: number;
  readonly overallHealth: Health;
}

export interface PortfolioSnapshot {
  readonly positions: ReadonlyArray<Position>;
  readonly stats: PortfolioStats;
  readonly refreshedAt: number;
}

// --- AI providers ---

export const providerIds = [
  "deepseek",
  "openai",
  "openrouter",
  "qwen",
  "anthropic",
  "gemini",
] as const;

export type ProviderId = (typeof providerIds)[number];

export const defaultProviderId: ProviderId = "deepseek";

export function isProviderId(value: string): value is ProviderId {
  return providerIds.some((id) => id === value);
}

// --- Insight requests ---

export type InsightKind =
  | { readonly _tag: "PortfolioSummary" }
  | { readonly _tag: "StockPrediction"; readonly symbol: string }
  | { readonly _tag: "MarketingBriefing" };

export const PortfolioSummaryKind: InsightKind = { _tag: "PortfolioSummary" };

export const StockPredictionKind = (symbol: string): InsightKind => ({
  _tag: "StockPrediction",
  symbol: normalizeSymbol(symbol),
});

export const MarketingBriefingKind: InsightKind = { _tag: "MarketingBriefing" };

// --- Insights ---

export type RiskLevel = "low" | "medium" | "high" | "unknown";
export type Sentiment = "bullish" | "bearish" | "neutral";
export type Direction = "up" | "down" | "neutral";

export interface PortfolioSummary {
  readonly _tag: "PortfolioSummary";
  readonly provider: ProviderId;
  readonly summary: string;
  readonly riskLevel: RiskLevel;
  readonly sentiment: Sentiment;
  readonly bulletPoints: ReadonlyArray<string>;
  readonly confidence: number | undefined;
  readonly generatedAt: number;
}

export interface StockPrediction {
  readonly _tag: "StockPrediction";
  readonly provider: ProviderId;
  readonly symbol: string;
  readonly direction: Direction;
  readonly confidence: number;
  readonly predictedChangePercent: number;
  readonly reasoning: string;
  readonly generatedAt: number;
}

export interface MarketingBriefing {
  readonly _tag: "MarketingBriefing";
  readonly provider: ProviderId;
  readonly overview: string;
  readonly keyDrivers: string;
  readonly highlightsAndActivity: string;
  readonly riskFactors: string;
  readonly generatedAt: number;
}

export type Insight = PortfolioSummary | StockPrediction | MarketingBriefing;
