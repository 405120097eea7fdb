// Insight cache — generated insights keyed by request fingerprint.

import { createHash } from "node:crypto";
import { Context, Duration, Effect, Layer, Option } from "effect";
import {
  normalizeSymbol,
  type Holding,
  type Insight,
  type InsightKind,
  type ProviderId,
} from "./domain.ts";
import { InsightSettings } from "./config.ts";
import { makeTtlCache } from "./ttl-cache.ts";

const sha256 = (text: string) => createHash("sha256").update(text).digest("hex");

/**
 * Stable hash of everything that shapes a generated insight: the provider,
 * what was asked for, the holdings (order-insensitive) and the instruction
 * text. Prices are left out, so a refresh alone doesn't invalidate.
 */
export function fingerprint(
  provider: ProviderId,
  kind: InsightKind,
  holdings: ReadonlyArray<Holding>,
  promptText: string,
): string {
  const pairs = holdings
    .map((h) => [normalizeSymbol(h.symbol), h.shares] as const)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  return sha256(JSON.stringify([
    provider,
    kind._tag,
    kind._tag === "StockPrediction" ? kind.symbol : null,
    pairs,
    sha256(promptText),
  ]));
}

export class InsightCache extends Context.Tag("InsightCache")<
  InsightCache,
  {
    readonly get: (
      provider: ProviderId,
      fingerprint: string,
    ) => Effect.Effect<Option.Option<Insight>>;
    readonly put: (
      provider: ProviderId,
      fingerprint: string,
      insight: Insight,
    ) => Effect.Effect<void>;
  }
>() {}

export function makeInsightCache(
  ttl: Duration.DurationInput,
): Effect.Effect<Context.Tag.Service<InsightCache>> {
  return makeTtlCache<Insight>({ name: "insight", retainExpired: false }).pipe(
    Effect.map((cache) =>
      InsightCache.of({
        get: (provider, key) => cache.get(`${provider}:${key}`),
        put: (provider, key, insight) => cache.set(`${provider}:${key}`, insight, ttl),
      })
    ),
  );
}

export const InsightCacheLive = Layer.effect(
  InsightCache,
  InsightSettings.pipe(Effect.flatMap((settings) => makeInsightCache(settings.ttl))),
);
