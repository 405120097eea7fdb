// Holdings file — the portfolio as a JSON array on disk.
//
// [{ "symbol": "AAPL", "shares": 10, "costBasis": 180.5 }, ...]

import { FileSystem } from "@effect/platform";
import { Clock, Data, Effect, Schema } from "effect";
import { normalizeSymbol, type Holding } from "./domain.ts";

export class HoldingsFileError extends Data.TaggedError("HoldingsFileError")<{
  readonly path: string;
  readonly message: string;
}> {}

const HoldingJson = Schema.Struct({
  symbol: Schema.NonEmptyTrimmedString,
  shares: Schema.NonNegative,
  costBasis: Schema.optional(Schema.NonNegative),
  addedAt: Schema.optional(Schema.Number),
});

const HoldingsJson = Schema.parseJson(Schema.Array(HoldingJson));

export function decodeHoldings(
  text: string,
  path: string,
): Effect.Effect<ReadonlyArray<Holding>, HoldingsFileError> {
  return Effect.gen(function* () {
    const rows = yield* Schema.decodeUnknown(HoldingsJson)(text).pipe(
      Effect.mapError((e) => new HoldingsFileError({ path, message: e.message })),
    );
    const now = yield* Clock.currentTimeMillis;

    const seen = new Set<string>();
    const holdings: Array<Holding> = [];
    for (const row of rows) {
      const symbol = normalizeSymbol(row.symbol);
      if (seen.has(symbol)) {
        return yield* Effect.fail(
          new HoldingsFileError({ path, message: `Duplicate symbol ${symbol}` }),
        );
      }
      seen.add(symbol);
      holdings.push({
        symbol,
        shares: row.shares,
        costBasis: row.costBasis,
        addedAt: row.addedAt ?? now,
      });
    }
    return holdings;
  });
}

export const loadHoldings = (
  path: string,
): Effect.Effect<ReadonlyArray<Holding>, HoldingsFileError, FileSystem.FileSystem> =>
  FileSystem.FileSystem.pipe(
    Effect.flatMap((fs) => fs.readFileString(path)),
    Effect.mapError((e) => new HoldingsFileError({ path, message: e.message })),
    Effect.flatMap((text) => decodeHoldings(text, path)),
  );
