import { expect, test } from "vitest";
import { Effect, Option, TestClock, TestContext } from "effect";
import { makeTtlCache } from "./ttl-cache.ts";

function run<A, E>(effect: Effect.Effect<A, E, never>): Promise<A> {
  return Effect.runPromise(effect.pipe(Effect.provide(TestContext.TestContext)));
}

test("ttl cache: value is served until its ttl elapses", async () => {
  const result = await run(
    Effect.gen(function* () {
      const cache = yield* makeTtlCache<number>({ retainExpired: false });
      yield* cache.set("AAPL", 1, "5 minutes");
      yield* TestClock.adjust("4 minutes");
      const before = yield* cache.get("AAPL");
      yield* TestClock.adjust("1 minute");
      const after = yield* cache.get("AAPL");
      return { before, after };
    }),
  );

  expect(result.before).toEqual(Option.some(1));
  expect(Option.isNone(result.after)).toBe(true);
});

test("ttl cache: expired entry is dropped on lookup", async () => {
  const result = await run(
    Effect.gen(function* () {
      const cache = yield* makeTtlCache<number>({ retainExpired: false });
      yield* cache.set("AAPL", 1, "1 minute");
      yield* TestClock.adjust("2 minutes");
      const sizeBefore = yield* cache.size;
      yield* cache.get("AAPL");
      return { sizeBefore, sizeAfter: yield* cache.size, latest: yield* cache.latest("AAPL") };
    }),
  );

  expect(result.sizeBefore).toBe(1);
  expect(result.sizeAfter).toBe(0);
  expect(Option.isNone(result.latest)).toBe(true);
});

test("ttl cache: retained expired entry stays available through latest", async () => {
  const result = await run(
    Effect.gen(function* () {
      const cache = yield* makeTtlCache<string>({ retainExpired: true });
      yield* cache.set("AAPL", "old", "1 minute");
      yield* TestClock.adjust("2 minutes");
      return {
        fresh: yield* cache.get("AAPL"),
        latest: yield* cache.latest("AAPL"),
        size: yield* cache.size,
      };
    }),
  );

  expect(Option.isNone(result.fresh)).toBe(true);
  expect(result.latest).toEqual(Option.some({ value: "old", insertedAt: 0, ttlMs: 60_000 }));
  expect(result.size).toBe(1);
});

test("ttl cache: set overwrites the entry and restarts its ttl", async () => {
  const result = await run(
    Effect.gen(function* () {
      const cache = yield* makeTtlCache<number>({ retainExpired: false });
      yield* cache.set("AAPL", 1, "1 minute");
      yield* TestClock.adjust("50 seconds");
      yield* cache.set("AAPL", 2, "1 minute");
      yield* TestClock.adjust("50 seconds");
      return yield* cache.get("AAPL");
    }),
  );

  expect(result).toEqual(Option.some(2));
});

test("ttl cache: keys are independent", async () => {
  const result = await run(
    Effect.gen(function* () {
      const cache = yield* makeTtlCache<number>({ retainExpired: false });
      yield* cache.set("AAPL", 1, "1 minute");
      return { aapl: yield* cache.get("AAPL"), tsla: yield* cache.get("TSLA") };
    }),
  );

  expect(result.aapl).toEqual(Option.some(1));
  expect(Option.isNone(result.tsla)).toBe(true);
});
