import { expect, test } from "vitest";
import { Effect, Either, TestClock, TestContext } from "effect";
import { decodeHoldings } from "./holdings-file.ts";

function decode(text: string) {
  return Effect.runPromise(
    TestClock.setTime(42).pipe(
      Effect.zipRight(decodeHoldings(text, "portfolio.json")),
      Effect.either,
      Effect.provide(TestContext.TestContext),
    ),
  );
}

test("decodeHoldings: valid file", async () => {
  const result = await decode(
    '[{"symbol":"aapl","shares":10,"costBasis":180.5},{"symbol":"TSLA","shares":0,"addedAt":7}]',
  );

  expect(result).toEqual(
    Either.right([
      { symbol: "AAPL", shares: 10, costBasis: 180.5, addedAt: 42 },
      { symbol: "TSLA", shares: 0, costBasis: undefined, addedAt: 7 },
    ]),
  );
});

test("decodeHoldings: empty list", async () => {
  expect(await decode("[]")).toEqual(Either.right([]));
});

test("decodeHoldings: duplicate symbols are rejected", async () => {
  const result = await decode('[{"symbol":"AAPL","shares":1},{"symbol":"aapl","shares":2}]');

  expect(Either.isLeft(result) && result.left).toMatchObject({
    _tag: "HoldingsFileError",
    path: "portfolio.json",
    message: "Duplicate symbol AAPL",
  });
});

test("decodeHoldings: negative shares are rejected", async () => {
  const result = await decode('[{"symbol":"AAPL","shares":-1}]');
  expect(Either.isLeft(result) && result.left._tag).toBe("HoldingsFileError");
});

test("decodeHoldings: blank symbol is rejected", async () => {
  const result = await decode('[{"symbol":"  ","shares":1}]');
  expect(Either.isLeft(result)).toBe(true);
});

test("decodeHoldings: malformed JSON is rejected", async () => {
  const result = await decode("[{");
  expect(Either.isLeft(result) && result.left.path).toBe("portfolio.json");
});
