// Pure formatting functions — no I/O.

import type {
  Health,
  Insight,
  PortfolioSnapshot,
  Position,
  QuoteResult,
} from "./domain.ts";
import type { AnalysisError, ProviderRequestFailed } from "./ai-provider.ts";
import type { HoldingsFileError } from "./holdings-file.ts";
import type { ProviderStatus } from "./provider-registry.ts";
import { credentialEnvNames } from "./credential-store.ts";
import { marketSignalFor, type SignalBand } from "./market-signal.ts";
import type { QuoteSourceError, QuoteUnavailable } from "./quote-source.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const YELLOW = "\x1b[33m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Numbers ---

const fixed = (n: number) => n.toFixed(2);
const signed = (n: number) => `${n >= 0 ? "+" : ""}${n.toFixed(2)}`;
const percent = (fraction: number) => `${Math.round(fraction * 100)}%`;
const changeColor = (n: number) => (n >= 0 ? GREEN : RED);

const healthColor: Record<Health, string> = {
  healthy: GREEN,
  warning: YELLOW,
  danger: RED,
};

const signalColor: Record<SignalBand, string> = {
  strong: GREEN,
  moderate: YELLOW,
  weak: RED,
};

// --- Quote formatting ---

export function formatQuote(result: QuoteResult): string {
  const { quote } = result;
  const direction = quote.change >= 0 ? "▲" : "▼";
  const color = changeColor(quote.change);
  const origin = result.stale
    ? `${result.source} ${YELLOW}(stale)${RESET}${DIM}`
    : result.source;

  const lines = [
    "",
    `${BOLD}  ${quote.symbol}${RESET}`,
    `  ${BOLD}${fixed(quote.price)} ${quote.currency}${RESET}`,
    `  ${color}${direction} ${signed(quote.change)} (${signed(quote.changePercent)}%)${RESET}`,
    `  ${DIM}${origin} · ${new Date(quote.fetchedAt).toISOString()}${RESET}`,
    "",
  ];

  return lines.join("\n");
}

// --- Portfolio formatting ---

function formatPosition({ holding, quote, stale, error }: Position): Array<string> {
  const symbol = holding.symbol.padEnd(6);
  const shares = String(holding.shares).padStart(8);

  if (quote === undefined) {
    return [`  ${symbol}${shares}  ${DIM}no quote${RESET}`, `  ${DIM}  ${error ?? ""}${RESET}`];
  }

  const value = fixed(holding.shares * quote.price).padStart(12);
  const move = `${signed(quote.changePercent)}%`.padStart(8);
  const marker = stale ? ` ${YELLOW}(stale)${RESET}` : "";
  return [
    `  ${symbol}${shares}${fixed(quote.price).padStart(10)}${changeColor(quote.change)}${move}${RESET}${value}${marker}`,
  ];
}

export function formatPortfolio(snapshot: PortfolioSnapshot): string {
  const { stats } = snapshot;
  const health = stats.overallHealth;

  const lines = [
    "",
    `${BOLD}  ${"Symbol".padEnd(6)}${"Shares".padStart(8)}${"Price".padStart(10)}${"Day".padStart(8)}${"Value".padStart(12)}${RESET}`,
    ...snapshot.positions.flatMap(formatPosition),
    "",
    `  Total value   ${BOLD}${fixed(stats.totalValue)}${RESET}`,
    `  Day change    ${changeColor(stats.dailyChange)}${signed(stats.dailyChange)} (${signed(stats.dailyChangePercent)}%)${RESET}`,
  ];

  if (stats.totalGain !== undefined && stats.totalGainPercent !== undefined) {
    lines.push(
      `  Total gain    ${changeColor(stats.totalGain)}${signed(stats.totalGain)} (${signed(stats.totalGainPercent)}%)${RESET}`,
    );
  }

  lines.push(
    `  Health        ${healthColor[health]}${health}${RESET} ${DIM}(${stats.healthyCount} healthy, ${stats.warningCount} warning, ${stats.dangerCount} danger)${RESET}`,
    "",
  );
  return lines.join("\n");
}

// --- Insight formatting ---

function section(title: string, body: string): Array<string> {
  return [`  ${BOLD}${title}${RESET}`, ...body.split("\n").map((line) => `    ${line}`)];
}

function insightBody(insight: Insight): Array<string> {
  switch (insight._tag) {
    case "PortfolioSummary": {
      const facts = [`Risk: ${insight.riskLevel}`, `Sentiment: ${insight.sentiment}`];
      if (insight.confidence !== undefined) facts.push(`Confidence: ${percent(insight.confidence)}`);
      return [
        `${BOLD}  Portfolio summary${RESET}`,
        `  ${insight.summary}`,
        `  ${DIM}${facts.join(" · ")}${RESET}`,
        ...insight.bulletPoints.map((point) => `  • ${point}`),
      ];
    }
    case "StockPrediction": {
      const signal = marketSignalFor(insight);
      const arrow = insight.direction === "up" ? "▲" : insight.direction === "down" ? "▼" : "■";
      const color = insight.direction === "up" ? GREEN : insight.direction === "down" ? RED : DIM;
      return [
        `${BOLD}  ${insight.symbol} next session${RESET}`,
        `  ${color}${arrow} ${insight.direction} ${signed(insight.predictedChangePercent)}%${RESET} ${DIM}(confidence ${percent(insight.confidence)})${RESET}`,
        `  Signal ${signalColor[signal.band]}${signal.score}/100 ${signal.band}${RESET}`,
        `  ${insight.reasoning}`,
      ];
    }
    case "MarketingBriefing":
      return [
        `${BOLD}  Market briefing${RESET}`,
        ...section("Overview", insight.overview),
        ...section("Key drivers", insight.keyDrivers),
        ...section("Highlights and activity", insight.highlightsAndActivity),
        ...section("Risk factors", insight.riskFactors),
      ];
  }
}

export function formatInsight(insight: Insight): string {
  return [
    "",
    ...insightBody(insight),
    `  ${DIM}via ${insight.provider} · ${new Date(insight.generatedAt).toISOString()}${RESET}`,
    "",
  ].join("\n");
}

// --- Provider listing ---

export function formatProviders(
  statuses: ReadonlyArray<ProviderStatus>,
  active: string | undefined,
): string {
  return [
    "",
    ...statuses.map(({ provider, configured }) => {
      const marker = provider.id === active ? `${GREEN}*${RESET}` : " ";
      const state = configured
        ? `${GREEN}configured${RESET}`
        : `${DIM}set ${credentialEnvNames[provider.id]}${RESET}`;
      return `  ${marker} ${provider.id.padEnd(11)}${provider.displayName.padEnd(11)}${provider.tier.padEnd(8)}${state}`;
    }),
    "",
  ].join("\n");
}

// --- Error formatting ---

export type AppError = QuoteUnavailable | AnalysisError | HoldingsFileError;

export function formatError(error: AppError): string {
  const friendly = classifyError(error);
  return [
    "",
    `${RED}${BOLD}  ✗ ${friendly.title}${RESET}`,
    ...friendly.hint.split("\n").map((line) => `  ${DIM}${line}${RESET}`),
    "",
  ].join("\n");
}

interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

function classifyError(error: AppError): ClassifiedError {
  switch (error._tag) {
    case "QuoteUnavailable":
      return {
        title: `No quote for ${error.symbol}`,
        hint: error.failures.length === 0
          ? "No quote sources are configured."
          : error.failures.map((f) => `${f.source}: ${sourceHint(f.error)}`).join("\n"),
      };
    case "ProviderUnconfigured":
      return error.provider === undefined
        ? {
          title: "No AI provider configured",
          hint: `Set ${credentialEnvNames.deepseek} or pick a configured provider with --provider.`,
        }
        : {
          title: `${error.provider} is not configured`,
          hint: `Set ${credentialEnvNames[error.provider]} to use it.`,
        };
    case "ProviderRequestFailed":
      return classifyRequestFailure(error);
    case "ResponseParseFailed":
      return {
        title: "Unreadable AI response",
        hint: `${error.message}\n${excerpt(error.raw)}`,
      };
    case "HoldingsFileError":
      return {
        title: "Cannot read holdings",
        hint: `${error.path}: ${error.message}`,
      };
  }
}

function classifyRequestFailure(error: ProviderRequestFailed): ClassifiedError {
  if (error.status === 401 || error.status === 403) {
    return {
      title: "Authentication failed",
      hint: `${error.provider} rejected the API key in ${credentialEnvNames[error.provider]}.`,
    };
  }
  if (error.status === 429) {
    return {
      title: "Rate limited",
      hint: `${error.provider} is throttling requests. Wait a moment and try again.`,
    };
  }
  return {
    title: "AI request failed",
    hint: `${error.provider}: ${error.message}`,
  };
}

function sourceHint(error: QuoteSourceError): string {
  switch (error._tag) {
    case "NetworkError":
      return `network error (${error.message})`;
    case "HttpError":
      if (error.status === 404) return "symbol not found";
      if (error.status === 429) return "rate limited";
      if (error.status >= 500 && error.status < 600) return `server error (HTTP ${error.status})`;
      return `HTTP ${error.status}`;
    case "SymbolNotFound":
      return "symbol not found";
    case "ServiceError":
      return error.message;
    case "ParseError":
      return "unexpected response format";
  }
}

const excerpt = (raw: string) => {
  const flat = raw.replace(/\s+/g, " ").trim();
  return flat.length > 120 ? `${flat.slice(0, 120)}…` : flat;
};
