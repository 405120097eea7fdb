// Quote fetcher — fresh cache, then each source in order, then stale cache.

import {
  Console,
  Context,
  Deferred,
  Duration,
  Effect,
  HashMap,
  Layer,
  Option,
  Ref,
} from "effect";
import { normalizeSymbol, type Quote, type QuoteResult } from "./domain.ts";
import { QuoteSettings } from "./config.ts";
import { makeTtlCache } from "./ttl-cache.ts";
import { makeRateLimiter } from "./rate-limiter.ts";
import {
  describeSourceError,
  QuoteUnavailable,
  timeoutAfter,
  type QuoteSource,
  type SourceFailure,
} from "./quote-source.ts";
import { makeAlphaVantageSource } from "./providers/alpha-vantage.ts";
import { makeYahooFinanceSource } from "./providers/yahoo-finance.ts";
import { sampleQuoteSource } from "./providers/sample-quotes.ts";

// --- Service ---

export class QuoteFetcher extends Context.Tag("QuoteFetcher")<
  QuoteFetcher,
  {
    readonly getQuote: (
      symbol: string,
    ) => Effect.Effect<QuoteResult, QuoteUnavailable>;
  }
>() {}

// --- Tiers ---

/** A source and how long its answers stay fresh. */
export interface QuoteTier {
  readonly source: QuoteSource;
  readonly ttl: Duration.DurationInput;
}

/** Per-request timeout so a hanging source fails and the next one gets a
 *  turn. */
export function withTimeout(
  source: QuoteSource,
  timeout: Duration.DurationInput,
): QuoteSource {
  return {
    name: source.name,
    getQuote: (symbol) => source.getQuote(symbol).pipe(timeoutAfter(source.name, timeout)),
  };
}

// --- Fallback logic ---

export interface TierSuccess {
  readonly tier: QuoteTier;
  readonly quote: Quote;
}

/** Try each tier in order. Any failure moves on to the next tier; when all
 *  fail, the failures are returned in order. */
export function tryTiers(
  tiers: ReadonlyArray<QuoteTier>,
  symbol: string,
): Effect.Effect<TierSuccess, ReadonlyArray<SourceFailure>> {
  const loop = (
    index: number,
    failures: ReadonlyArray<SourceFailure>,
  ): Effect.Effect<TierSuccess, ReadonlyArray<SourceFailure>> => {
    if (index >= tiers.length) return Effect.fail(failures);

    const tier = tiers[index];
    const { name } = tier.source;

    return Console.debug(`[quotes] ${symbol}: trying ${name}...`).pipe(
      Effect.flatMap(() => tier.source.getQuote(symbol)),
      Effect.map((quote) => ({ tier, quote })),
      Effect.tapError((e) =>
        Console.debug(`[quotes] ${symbol}: ${name} failed: ${describeSourceError(e)}`)
      ),
      Effect.catchAll((error) =>
        loop(index + 1, [...failures, { source: name, error }])
      ),
    );
  };

  return loop(0, []);
}

// --- Fetcher ---

type InFlight = Deferred.Deferred<QuoteResult, QuoteUnavailable>;

export function makeQuoteFetcher(
  tiers: ReadonlyArray<QuoteTier>,
): Effect.Effect<Context.Tag.Service<QuoteFetcher>> {
  return Effect.gen(function* () {
    const cache = yield* makeTtlCache<Quote>({ name: "quotes", retainExpired: true });
    const inFlight = yield* Ref.make(HashMap.empty<string, InFlight>());

    const resolve = (symbol: string): Effect.Effect<QuoteResult, QuoteUnavailable> =>
      tryTiers(tiers, symbol).pipe(
        Effect.tap(({ tier, quote }) => cache.set(symbol, quote, tier.ttl)),
        Effect.map(({ tier, quote }): QuoteResult => ({
          quote,
          source: tier.source.name,
          stale: false,
        })),
        Effect.catchAll((failures) =>
          cache.latest(symbol).pipe(
            Effect.flatMap(Option.match({
              onNone: () => Effect.fail(new QuoteUnavailable({ symbol, failures })),
              onSome: (entry) =>
                Console.debug(`[quotes] ${symbol}: all sources failed, serving stale`).pipe(
                  Effect.as<QuoteResult>({ quote: entry.value, source: "cache", stale: true }),
                ),
            })),
          )
        ),
      );

    // At most one fetch per symbol: later callers wait on the first one.
    const fetchOnce = (symbol: string) =>
      Effect.gen(function* () {
        const mine = yield* Deferred.make<QuoteResult, QuoteUnavailable>();
        const existing = yield* Ref.modify(
          inFlight,
          (map): readonly [Option.Option<InFlight>, HashMap.HashMap<string, InFlight>] => {
            const current = HashMap.get(map, symbol);
            return Option.isSome(current)
              ? [current, map]
              : [Option.none(), HashMap.set(map, symbol, mine)];
          },
        );

        if (Option.isSome(existing)) {
          yield* Console.debug(`[quotes] ${symbol}: joining in-flight fetch`);
          return yield* Deferred.await(existing.value);
        }

        return yield* resolve(symbol).pipe(
          Effect.onExit((exit) =>
            Ref.update(inFlight, HashMap.remove(symbol)).pipe(
              Effect.zipRight(Deferred.done(mine, exit)),
            )
          ),
        );
      });

    const getQuote = (raw: string) => {
      const symbol = normalizeSymbol(raw);
      return cache.get(symbol).pipe(
        Effect.flatMap(Option.match({
          onSome: (quote) => Effect.succeed<QuoteResult>({ quote, source: "cache", stale: false }),
          onNone: () => fetchOnce(symbol),
        })),
      );
    };

    return QuoteFetcher.of({ getQuote });
  });
}

// --- Layers ---

/** Alpha Vantage first (rate-limited), Yahoo Finance second. */
export const QuoteFetcherLive = Layer.effect(
  QuoteFetcher,
  Effect.gen(function* () {
    const settings = yield* QuoteSettings;

    if (settings.source === "sample") {
      return yield* makeQuoteFetcher([
        { source: sampleQuoteSource, ttl: settings.primaryTtl },
      ]);
    }

    const limiter = yield* makeRateLimiter({
      name: "limiter:alphavantage",
      limit: settings.primaryRequestsPerMinute,
      interval: "1 minute",
    });
    const alphaVantage = yield* makeAlphaVantageSource({
      limiter,
      timeout: settings.sourceTimeout,
    });
    const yahoo = yield* makeYahooFinanceSource;

    yield* Console.debug(
      `[quotes] sources: ${alphaVantage.name} (${settings.primaryRequestsPerMinute}/min), ${yahoo.name}`,
    );

    return yield* makeQuoteFetcher([
      {
        source: alphaVantage,
        ttl: settings.primaryTtl,
      },
      {
        source: withTimeout(yahoo, settings.sourceTimeout),
        ttl: settings.secondaryTtl,
      },
    ]);
  }),
);
