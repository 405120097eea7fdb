// Yahoo Finance — secondary quote source.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Clock, Config, type ConfigError, Effect, Schema } from "effect";
import { percentChange, type Quote } from "../domain.ts";
import {
  HttpError,
  NetworkError,
  ParseError,
  SymbolNotFound,
  type QuoteSource,
} from "../quote-source.ts";

// --- Yahoo response schema ---

const YahooMeta = Schema.Struct({
  symbol: Schema.String,
  regularMarketPrice: Schema.Number,
  chartPreviousClose: Schema.optional(Schema.Number),
  previousClose: Schema.optional(Schema.Number),
  regularMarketDayHigh: Schema.optional(Schema.Number),
  regularMarketDayLow: Schema.optional(Schema.Number),
  regularMarketVolume: Schema.optional(Schema.Number),
  currency: Schema.optional(Schema.String),
});

// Intraday bars; only the first open of the session is used.
const YahooIndicators = Schema.Struct({
  quote: Schema.Array(
    Schema.Struct({
      open: Schema.optional(Schema.Array(Schema.NullOr(Schema.Number))),
    }),
  ),
});

const YahooChartResponse = Schema.Struct({
  chart: Schema.Struct({
    result: Schema.NullOr(
      Schema.Array(
        Schema.Struct({
          meta: YahooMeta,
          indicators: Schema.optional(YahooIndicators),
        }),
      ),
    ),
    error: Schema.NullOr(
      Schema.Struct({
        description: Schema.optional(Schema.String),
      }),
    ),
  }),
});

type YahooChartResponseType = typeof YahooChartResponse.Type;

// --- Decode Yahoo response into Quote ---

export function decodeYahooResponse(
  json: unknown,
  symbol: string,
  fetchedAt: number,
): Effect.Effect<Quote, ParseError | SymbolNotFound> {
  return Schema.decodeUnknown(YahooChartResponse)(json).pipe(
    Effect.mapError(
      (schemaError) =>
        new ParseError({
          message: `Invalid response: ${schemaError.message}`,
        }),
    ),
    Effect.flatMap((response) => interpretYahooResponse(response, symbol, fetchedAt)),
  );
}

function interpretYahooResponse(
  response: YahooChartResponseType,
  symbol: string,
  fetchedAt: number,
): Effect.Effect<Quote, ParseError | SymbolNotFound> {
  const { chart } = response;

  if (chart.error !== null || chart.result === null || chart.result.length === 0) {
    return Effect.fail(new SymbolNotFound({ symbol }));
  }

  const { meta, indicators } = chart.result[0];
  const previousClose = meta.chartPreviousClose ?? meta.previousClose;

  if (previousClose === undefined) {
    return Effect.fail(
      new ParseError({
        message: "Missing or invalid 'previousClose'",
      }),
    );
  }
  if (meta.regularMarketPrice < 0) {
    return Effect.fail(new ParseError({ message: "Negative price" }));
  }

  const price = meta.regularMarketPrice;
  const sessionOpen = indicators?.quote[0]?.open?.find(
    (value): value is number => value !== null,
  );

  return Effect.succeed({
    symbol: meta.symbol.toUpperCase(),
    price,
    change: price - previousClose,
    changePercent: percentChange(price, previousClose),
    previousClose,
    open: sessionOpen ?? price,
    high: meta.regularMarketDayHigh ?? price,
    low: meta.regularMarketDayLow ?? price,
    volume: Math.round(meta.regularMarketVolume ?? 0),
    currency: meta.currency ?? "USD",
    fetchedAt,
  });
}

// --- Source ---

export const makeYahooFinanceSource: Effect.Effect<
  QuoteSource,
  ConfigError.ConfigError,
  HttpClient.HttpClient
> = Effect.gen(function* () {
  const client = (yield* HttpClient.HttpClient).pipe(
    HttpClient.filterStatusOk,
    HttpClient.mapRequest(
      HttpClientRequest.setHeader("User-Agent", "Mozilla/5.0"),
    ),
  );
  const baseUrl = yield* Config.string("YAHOO_BASE_URL").pipe(
    Config.withDefault("https://query1.finance.yahoo.com/v8/finance/chart"),
  );

  const getQuote = (symbol: string) =>
    Effect.gen(function* () {
      const json = yield* Effect.scoped(
        client.get(`${baseUrl}/${encodeURIComponent(symbol)}?interval=1d&range=1d`).pipe(
          Effect.flatMap((response) => response.json),
        ),
      );
      const now = yield* Clock.currentTimeMillis;
      return yield* decodeYahooResponse(json, symbol, now);
    }).pipe(
      Effect.catchTags({
        RequestError: (e) => Effect.fail(new NetworkError({ message: e.message })),
        ResponseError: (e) =>
          e.reason === "StatusCode"
            ? Effect.fail(new HttpError({ status: e.response.status }))
            : Effect.fail(
                new ParseError({
                  message: `JSON parse failed: ${e.message}`,
                }),
              ),
      }),
    );

  return { name: "yahoo", getQuote };
});
