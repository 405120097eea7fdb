// Rate limiter — Effect shell over rate-limit-state.ts.

import { Clock, Console, Duration, Effect, Ref } from "effect";
import { initialWindow, reserve, type Window } from "./rate-limit-state.ts";

export interface RateLimiterConfig {
  readonly name?: string;
  readonly limit: number;
  readonly interval: Duration.DurationInput;
}

export interface RateLimiter {
  /** Delay `effect` until a slot is free, then run it. */
  readonly run: <A, E, R>(effect: Effect.Effect<A, E, R>) => Effect.Effect<A, E, R>;
}

export function makeRateLimiter(
  config: RateLimiterConfig,
): Effect.Effect<RateLimiter> {
  return Effect.gen(function* () {
    const intervalMs = Duration.toMillis(Duration.decode(config.interval));
    const label = config.name ?? "limiter";
    const ref = yield* Ref.make<Window>(initialWindow);

    const run = <A, E, R>(effect: Effect.Effect<A, E, R>) =>
      Effect.gen(function* () {
        const now = yield* Clock.currentTimeMillis;
        const waitMs = yield* Ref.modify(
          ref,
          (w) => reserve(w, now, config.limit, intervalMs),
        );
        if (waitMs > 0) {
          yield* Console.debug(`[${label}] ceiling reached, waiting ${waitMs}ms`);
          yield* Effect.sleep(Duration.millis(waitMs));
        }
        return yield* effect;
      });

    return { run } satisfies RateLimiter;
  });
}
