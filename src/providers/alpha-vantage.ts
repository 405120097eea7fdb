// Alpha Vantage — primary quote source.

import { HttpClient, type HttpClientError } from "@effect/platform";
import {
  Clock,
  Config,
  type ConfigError,
  type Duration,
  Effect,
  Option,
  Schema,
} from "effect";
import { percentChange, type Quote } from "../domain.ts";
import { CredentialStore, getUsableSecret } from "../credential-store.ts";
import {
  HttpError,
  NetworkError,
  ParseError,
  ServiceError,
  SymbolNotFound,
  timeoutAfter,
  type QuoteSource,
} from "../quote-source.ts";
import type { RateLimiter } from "../rate-limiter.ts";

// --- Alpha Vantage response schema ---

const AlphaVantageGlobalQuote = Schema.Struct({
  "01. symbol": Schema.String,
  "02. open": Schema.String,
  "03. high": Schema.String,
  "04. low": Schema.String,
  "05. price": Schema.String,
  "06. volume": Schema.String,
  "08. previous close": Schema.String,
});

type AlphaVantageGlobalQuoteType = typeof AlphaVantageGlobalQuote.Type;

// --- Decode Alpha Vantage response into Quote ---

export function decodeAlphaVantageResponse(
  json: unknown,
  symbol: string,
  fetchedAt: number,
): Effect.Effect<Quote, ParseError | SymbolNotFound | ServiceError> {
  if (typeof json !== "object" || json === null) {
    return Effect.fail(new ParseError({ message: "Response is not an object" }));
  }

  const obj: Record<string, unknown> = { ...json };

  // Errors and rate-limit notices arrive as 200s with a top-level string.
  for (const field of ["Error Message", "Note", "Information"]) {
    const notice = obj[field];
    if (typeof notice === "string") {
      return Effect.fail(new ServiceError({ message: notice }));
    }
  }

  const globalQuote = obj["Global Quote"];

  if (
    typeof globalQuote !== "object" ||
    globalQuote === null ||
    Object.keys(globalQuote).length === 0
  ) {
    return Effect.fail(new SymbolNotFound({ symbol }));
  }

  return Schema.decodeUnknown(AlphaVantageGlobalQuote)(globalQuote).pipe(
    Effect.mapError(
      (e) => new ParseError({ message: `Invalid response: ${e.message}` }),
    ),
    Effect.flatMap((q) => toQuote(q, fetchedAt)),
  );
}

function toQuote(
  q: AlphaVantageGlobalQuoteType,
  fetchedAt: number,
): Effect.Effect<Quote, ParseError> {
  const price = Number(q["05. price"]);
  const previousClose = Number(q["08. previous close"]);
  const open = Number(q["02. open"]);
  const high = Number(q["03. high"]);
  const low = Number(q["04. low"]);
  const volume = Number.parseInt(q["06. volume"], 10);

  if ([price, previousClose, open, high, low, volume].some(Number.isNaN)) {
    return Effect.fail(
      new ParseError({ message: "Non-numeric value in quote data" }),
    );
  }
  if (price < 0) {
    return Effect.fail(new ParseError({ message: "Negative price" }));
  }

  return Effect.succeed({
    symbol: q["01. symbol"].toUpperCase(),
    price,
    change: price - previousClose,
    changePercent: percentChange(price, previousClose),
    previousClose,
    open,
    high,
    low,
    volume,
    currency: "USD", // GLOBAL_QUOTE does not report a currency
    fetchedAt,
  });
}

// --- Source ---

export interface AlphaVantageOptions {
  /** Gates the HTTP call only, so a request that never leaves (no key)
   *  does not use up a slot. */
  readonly limiter?: RateLimiter;
  /** Applied once a slot is granted; queueing doesn't count against it. */
  readonly timeout?: Duration.DurationInput;
}

export const makeAlphaVantageSource = (
  options: AlphaVantageOptions = {},
): Effect.Effect<
  QuoteSource,
  ConfigError.ConfigError,
  HttpClient.HttpClient | CredentialStore
> =>
  Effect.gen(function* () {
    const name = "alphavantage";
    const client = (yield* HttpClient.HttpClient).pipe(HttpClient.filterStatusOk);
    const store = yield* CredentialStore;
    const baseUrl = yield* Config.string("ALPHA_VANTAGE_BASE_URL").pipe(
      Config.withDefault("https://www.alphavantage.co/query"),
    );

    const request = (url: string) => {
      const call = Effect.scoped(
        client.get(url).pipe(Effect.flatMap((response) => response.json)),
      );
      const timed: Effect.Effect<unknown, HttpClientError.HttpClientError | NetworkError> =
        options.timeout === undefined
          ? call
          : call.pipe(timeoutAfter(name, options.timeout));
      return options.limiter === undefined ? timed : options.limiter.run(timed);
    };

    const getQuote = (symbol: string) =>
      Effect.gen(function* () {
        // Read per request so a key added at runtime is picked up.
        const apiKey = yield* getUsableSecret("alphavantage").pipe(
          Effect.provideService(CredentialStore, store),
        );
        if (Option.isNone(apiKey)) {
          return yield* Effect.fail(
            new ServiceError({ message: "Alpha Vantage API key not configured" }),
          );
        }
        const json = yield* request(
          `${baseUrl}?function=GLOBAL_QUOTE&symbol=${encodeURIComponent(symbol)}&apikey=${apiKey.value}`,
        );
        const now = yield* Clock.currentTimeMillis;
        return yield* decodeAlphaVantageResponse(json, symbol, now);
      }).pipe(
        Effect.catchTags({
          RequestError: (e) => Effect.fail(new NetworkError({ message: e.message })),
          ResponseError: (e) =>
            e.reason === "StatusCode"
              ? Effect.fail(new HttpError({ status: e.response.status }))
              : Effect.fail(
                  new ParseError({ message: `JSON parse failed: ${e.message}` }),
                ),
        }),
      );

    return { name, getQuote };
  });
