import { expect, test } from "vitest";
import {
  MarketingBriefingKind,
  PortfolioSummaryKind,
  StockPredictionKind,
  type PortfolioSnapshot,
  type Position,
} from "./domain.ts";
import { computeStats } from "./portfolio-stats.ts";
import { buildPrompt, effectiveInstructions, kindDefaults, portfolioContext } from "./prompts.ts";

const positions: Array<Position> = [
  {
    holding: { symbol: "AAPL", shares: 10, addedAt: 0 },
    quote: {
      symbol: "AAPL",
      price: 225.304,
      change: 3.454,
      changePercent: 1.5567,
      previousClose: 221.85,
      open: 222,
      high: 226,
      low: 221,
      volume: 100,
      currency: "USD",
      fetchedAt: 0,
    },
    stale: false,
    error: undefined,
  },
  {
    holding: { symbol: "TSLA", shares: 2, addedAt: 0 },
    quote: undefined,
    stale: false,
    error: "TSLA: no quote sources configured",
  },
];

const snapshot: PortfolioSnapshot = {
  positions,
  stats: computeStats({ positions }),
  refreshedAt: 0,
};

test("portfolioContext: holdings with rounded numbers, null when unquoted", () => {
  expect(portfolioContext(PortfolioSummaryKind, snapshot)).toBe(
    "Portfolio context (JSON):\n" +
      '{"holdings":[' +
      '{"symbol":"AAPL","shares":10,"price":225.3,"change":3.45,"changePercent":1.56},' +
      '{"symbol":"TSLA","shares":2,"price":null,"change":null,"changePercent":null}' +
      '],"totalValue":2253.04}',
  );
});

test("portfolioContext: prediction names its target first", () => {
  expect(portfolioContext(StockPredictionKind("aapl"), snapshot)).toMatch(
    /^Portfolio context \(JSON\):\n\{"target":"AAPL","holdings":/,
  );
});

test("effectiveInstructions: override is used verbatim", () => {
  expect(effectiveInstructions(PortfolioSummaryKind, "  Just list risks.\n")).toBe(
    "  Just list risks.\n",
  );
});

test("effectiveInstructions: blank or missing override uses the default", () => {
  const fallback = kindDefaults.MarketingBriefing.instructions;
  expect(effectiveInstructions(MarketingBriefingKind)).toBe(fallback);
  expect(effectiveInstructions(MarketingBriefingKind, " \n ")).toBe(fallback);
});

test("buildPrompt: sampling settings per kind", () => {
  const summary = buildPrompt(PortfolioSummaryKind, snapshot);
  const prediction = buildPrompt(StockPredictionKind("AAPL"), snapshot);
  const briefing = buildPrompt(MarketingBriefingKind, snapshot);

  expect([summary.temperature, summary.maxTokens]).toEqual([0.4, 800]);
  expect([prediction.temperature, prediction.maxTokens]).toEqual([0.3, 500]);
  expect([briefing.temperature, briefing.maxTokens]).toEqual([0.5, 1200]);
});

test("buildPrompt: user text is instructions then context", () => {
  const prompt = buildPrompt(PortfolioSummaryKind, snapshot, "Custom");
  expect(prompt.user).toBe(`Custom\n\n${portfolioContext(PortfolioSummaryKind, snapshot)}`);
  expect(prompt.system).toBe(kindDefaults.PortfolioSummary.system);
});
