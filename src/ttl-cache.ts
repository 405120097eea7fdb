// TTL cache — Effect shell over the pure rules in cache-entry.ts.
//
// Entries live in an immutable HashMap behind a Ref, so every read and
// write is a single atomic step and concurrent fibers never see a
// half-written map.

import { Clock, Console, Duration, Effect, HashMap, Option, Ref } from "effect";
import { CacheEntry, classify } from "./cache-entry.ts";

export type { CacheEntry } from "./cache-entry.ts";

// --- Config ---

export interface TtlCacheConfig {
  readonly name?: string;
  /** Keep expired entries until overwritten so `latest` can still serve
   *  them; otherwise they are dropped on the lookup that finds them. */
  readonly retainExpired: boolean;
}

// --- Cache ---

export interface TtlCache<A> {
  /** Fresh value for `key`, if any. */
  readonly get: (key: string) => Effect.Effect<Option.Option<A>>;

  /** Most recent entry for `key`, fresh or not. */
  readonly latest: (key: string) => Effect.Effect<Option.Option<CacheEntry<A>>>;

  readonly set: (
    key: string,
    value: A,
    ttl: Duration.DurationInput,
  ) => Effect.Effect<void>;

  readonly size: Effect.Effect<number>;
}

export function makeTtlCache<A>(
  config: TtlCacheConfig,
): Effect.Effect<TtlCache<A>> {
  return Effect.gen(function* () {
    const label = config.name ?? "cache";
    const ref = yield* Ref.make(HashMap.empty<string, CacheEntry<A>>());

    const lookup = (key: string) =>
      Effect.gen(function* () {
        const now = yield* Clock.currentTimeMillis;
        return yield* Ref.modify(ref, (map) => {
          const result = classify(Option.getOrUndefined(HashMap.get(map, key)), now);
          const next = result._tag === "Expired" && !config.retainExpired
            ? HashMap.remove(map, key)
            : map;
          return [result, next] as const;
        });
      });

    const get = (key: string) =>
      lookup(key).pipe(
        Effect.tap((result) =>
          result._tag === "Expired"
            ? Console.debug(`[${label}] ${key} expired`)
            : Effect.void
        ),
        Effect.map((result) =>
          result._tag === "Hit" ? Option.some(result.entry.value) : Option.none()
        ),
      );

    const latest = (key: string) =>
      lookup(key).pipe(
        Effect.map((result) => {
          switch (result._tag) {
            case "Hit":
              return Option.some(result.entry);
            case "Expired":
              return config.retainExpired ? Option.some(result.entry) : Option.none();
            case "Miss":
              return Option.none();
          }
        }),
      );

    const set = (key: string, value: A, ttl: Duration.DurationInput) =>
      Effect.gen(function* () {
        const now = yield* Clock.currentTimeMillis;
        const ttlMs = Duration.toMillis(Duration.decode(ttl));
        yield* Ref.update(ref, HashMap.set(key, CacheEntry(value, now, ttlMs)));
      });

    return {
      get,
      latest,
      set,
      size: Ref.get(ref).pipe(Effect.map(HashMap.size)),
    } satisfies TtlCache<A>;
  });
}
