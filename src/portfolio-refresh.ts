// Portfolio refresh — fetch every holding's quote, wait for all of them to
// settle, then aggregate.

import { Clock, Console, Effect, Either } from "effect";
import {
  normalizeSymbol,
  type Holding,
  type PortfolioSnapshot,
  type Position,
} from "./domain.ts";
import { QuoteFetcher } from "./quote-fetcher.ts";
import { describeUnavailable } from "./quote-source.ts";
import { computeStats, defaultHealthPolicy, type HealthPolicy } from "./portfolio-stats.ts";

export interface RefreshOptions {
  /** Last snapshot; its quote is kept for holdings that fail this time. */
  readonly previous?: PortfolioSnapshot;
  readonly policy?: HealthPolicy;
}

function previousQuote(previous: PortfolioSnapshot | undefined, symbol: string) {
  return previous?.positions.find(
    (p) => normalizeSymbol(p.holding.symbol) === symbol,
  )?.quote;
}

export function refreshPortfolio(
  holdings: ReadonlyArray<Holding>,
  options: RefreshOptions = {},
): Effect.Effect<PortfolioSnapshot, never, QuoteFetcher> {
  return Effect.gen(function* () {
    const fetcher = yield* QuoteFetcher;

    // One failed symbol must not abort the others, so every fetch is
    // turned into an Either and the batch only completes when all settle.
    const positions = yield* Effect.forEach(
      holdings,
      (holding) =>
        fetcher.getQuote(holding.symbol).pipe(
          Effect.either,
          Effect.map((result): Position =>
            Either.match(result, {
              onRight: ({ quote, stale }) => ({ holding, quote, stale, error: undefined }),
              onLeft: (e) => {
                const kept = previousQuote(options.previous, normalizeSymbol(holding.symbol));
                return {
                  holding,
                  quote: kept,
                  stale: kept !== undefined,
                  error: describeUnavailable(e),
                };
              },
            })
          ),
        ),
      { concurrency: "unbounded" },
    );

    const failed = positions.filter((p) => p.error !== undefined).length;
    if (failed > 0) {
      yield* Console.debug(`[refresh] ${failed}/${positions.length} holdings without a fresh quote`);
    }

    return {
      positions,
      stats: computeStats({ positions }, options.policy ?? defaultHealthPolicy),
      refreshedAt: yield* Clock.currentTimeMillis,
    };
  });
}
