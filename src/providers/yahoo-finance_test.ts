import { expect, test } from "vitest";
import { Effect, Either } from "effect";
import { decodeYahooResponse, makeYahooFinanceSource } from "./yahoo-finance.ts";
import type { ParseError, SymbolNotFound } from "../quote-source.ts";
import type { Quote } from "../domain.ts";
import { fakeHttpClient, type FakeReply } from "../fake-http-client.ts";

// --- Test data ---

const validYahooResponse = {
  chart: {
    result: [
      {
        meta: {
          symbol: "googl",
          regularMarketPrice: 190.5,
          chartPreviousClose: 188.0,
          regularMarketDayHigh: 191.2,
          regularMarketDayLow: 187.9,
          regularMarketVolume: 22904000.4,
          currency: "USD",
        },
        indicators: { quote: [{ open: [null, 188.4, 189] }] },
      },
    ],
    error: null,
  },
};

const minimalMeta = { symbol: "SAP", regularMarketPrice: 50, previousClose: 40 };

// --- Helpers ---

function decode(json: unknown): Promise<Either.Either<Quote, ParseError | SymbolNotFound>> {
  return Effect.runPromise(Effect.either(decodeYahooResponse(json, "TEST", 1_000)));
}

async function decodeSuccess(json: unknown): Promise<Quote> {
  const result = await decode(json);
  if (Either.isLeft(result)) throw new Error(`Expected success, got: ${result.left._tag}`);
  return result.right;
}

async function decodeFailure(json: unknown): Promise<ParseError | SymbolNotFound> {
  const result = await decode(json);
  if (Either.isRight(result)) throw new Error("Expected failure but got success");
  return result.left;
}

// --- decodeYahooResponse ---

test("decodeYahooResponse: valid response produces a Quote", async () => {
  const quote = await decodeSuccess(validYahooResponse);

  expect(quote).toEqual({
    symbol: "GOOGL",
    price: 190.5,
    change: 2.5,
    changePercent: (2.5 / 188) * 100,
    previousClose: 188,
    open: 188.4,
    high: 191.2,
    low: 187.9,
    volume: 22904000,
    currency: "USD",
    fetchedAt: 1_000,
  });
});

test("decodeYahooResponse: missing optional fields fall back to price and USD", async () => {
  const quote = await decodeSuccess({
    chart: { result: [{ meta: minimalMeta }], error: null },
  });

  expect(quote).toMatchObject({
    previousClose: 40,
    change: 10,
    changePercent: 25,
    open: 50,
    high: 50,
    low: 50,
    volume: 0,
    currency: "USD",
  });
});

test("decodeYahooResponse: chart error returns SymbolNotFound", async () => {
  const error = await decodeFailure({
    chart: { result: null, error: { description: "No data found" } },
  });
  expect(error._tag).toBe("SymbolNotFound");
});

test("decodeYahooResponse: empty result returns SymbolNotFound", async () => {
  const error = await decodeFailure({ chart: { result: [], error: null } });
  expect(error._tag).toBe("SymbolNotFound");
});

test("decodeYahooResponse: no previous close returns ParseError", async () => {
  const error = await decodeFailure({
    chart: { result: [{ meta: { symbol: "X", regularMarketPrice: 1 } }], error: null },
  });
  expect(error).toMatchObject({ _tag: "ParseError", message: "Missing or invalid 'previousClose'" });
});

test("decodeYahooResponse: negative price returns ParseError", async () => {
  const error = await decodeFailure({
    chart: { result: [{ meta: { ...minimalMeta, regularMarketPrice: -1 } }], error: null },
  });
  expect(error._tag).toBe("ParseError");
});

test("decodeYahooResponse: wrong shape returns ParseError", async () => {
  const error = await decodeFailure({ foo: "bar" });
  expect(error._tag).toBe("ParseError");
});

// --- makeYahooFinanceSource ---

function fetchWith(reply: FakeReply, urls: Array<string> = []) {
  return Effect.runPromise(
    makeYahooFinanceSource.pipe(
      Effect.flatMap((source) => source.getQuote("BRK.B")),
      Effect.either,
      Effect.provide(
        fakeHttpClient((_request, url) =>
          Effect.sync(() => {
            urls.push(url.toString());
            return reply;
          })
        ),
      ),
    ),
  );
}

test("yahoo source: requests the daily chart for the symbol", async () => {
  const urls: Array<string> = [];
  const result = await fetchWith(
    { body: JSON.stringify({ chart: { result: [{ meta: minimalMeta }], error: null } }) },
    urls,
  );

  expect(Either.isRight(result)).toBe(true);
  expect(urls).toEqual([
    "https://query1.finance.yahoo.com/v8/finance/chart/BRK.B?interval=1d&range=1d",
  ]);
});

test("yahoo source: non-2xx status is an HttpError", async () => {
  const result = await fetchWith({ status: 503, body: "" });
  expect(Either.isLeft(result) && result.left).toMatchObject({ _tag: "HttpError", status: 503 });
});

test("yahoo source: non-JSON body is a ParseError", async () => {
  const result = await fetchWith({ body: "<html>" });
  expect(Either.isLeft(result) && result.left._tag).toBe("ParseError");
});
