// Sample quote source — fixed data for development and offline runs.

import { Effect } from "effect";
import { percentChange, normalizeSymbol, type Quote } from "../domain.ts";
import { SymbolNotFound, type QuoteSource } from "../quote-source.ts";

// --- Sample data ---

const at = Date.parse("2025-06-13T20:00:00Z");

function sample(
  symbol: string,
  price: number,
  previousClose: number,
  volume: number,
): Quote {
  return {
    symbol,
    price,
    change: price - previousClose,
    changePercent: percentChange(price, previousClose),
    previousClose,
    open: previousClose,
    high: Math.max(price, previousClose),
    low: Math.min(price, previousClose),
    volume,
    currency: "USD",
    fetchedAt: at,
  };
}

const quotes: Record<string, Quote> = {
  AAPL: sample("AAPL", 225.3, 221.85, 48_211_000),
  GOOGL: sample("GOOGL", 190.5, 192.6, 22_904_000),
  TSLA: sample("TSLA", 385.2, 372.6, 97_412_000),
  NVDA: sample("NVDA", 98.4, 112.1, 310_554_000),
};

// --- Source ---

export const sampleQuoteSource: QuoteSource = {
  name: "sample",
  getQuote: (symbol: string) => {
    const quote = quotes[normalizeSymbol(symbol)];
    return quote !== undefined
      ? Effect.succeed(quote)
      : Effect.fail(new SymbolNotFound({ symbol }));
  },
};
