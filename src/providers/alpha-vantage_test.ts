import { expect, test } from "vitest";
import { Effect, Either, Fiber, TestClock, TestContext } from "effect";
import { decodeAlphaVantageResponse, makeAlphaVantageSource } from "./alpha-vantage.ts";
import type { ParseError, ServiceError, SymbolNotFound } from "../quote-source.ts";
import type { Quote } from "../domain.ts";
import { CredentialStoreMemory, type Secrets } from "../credential-store.ts";
import { fakeHttpClient, type FakeReply } from "../fake-http-client.ts";
import { makeRateLimiter } from "../rate-limiter.ts";

// --- Test data ---

const validResponse = {
  "Global Quote": {
    "01. symbol": "msft",
    "02. open": "420.00",
    "03. high": "425.00",
    "04. low": "418.00",
    "05. price": "422.50",
    "06. volume": "10067390",
    "07. latest trading day": "2025-06-15",
    "08. previous close": "419.00",
    "09. change": "3.50",
    "10. change percent": "0.8354%",
  },
};

// --- Helpers ---

type DecodeError = ParseError | SymbolNotFound | ServiceError;

function decode(json: unknown): Promise<Either.Either<Quote, DecodeError>> {
  return Effect.runPromise(Effect.either(decodeAlphaVantageResponse(json, "TEST", 1_000)));
}

async function decodeSuccess(json: unknown): Promise<Quote> {
  const result = await decode(json);
  if (Either.isLeft(result)) throw new Error(`Expected success, got: ${result.left._tag}`);
  return result.right;
}

async function decodeFailure(json: unknown): Promise<DecodeError> {
  const result = await decode(json);
  if (Either.isRight(result)) throw new Error("Expected failure but got success");
  return result.left;
}

// --- decodeAlphaVantageResponse ---

test("decodeAlphaVantageResponse: valid response produces a Quote", async () => {
  const quote = await decodeSuccess(validResponse);

  expect(quote).toEqual({
    symbol: "MSFT",
    price: 422.5,
    change: 3.5,
    changePercent: (3.5 / 419) * 100,
    previousClose: 419,
    open: 420,
    high: 425,
    low: 418,
    volume: 10067390,
    currency: "USD",
    fetchedAt: 1_000,
  });
});

test("decodeAlphaVantageResponse: null input returns ParseError", async () => {
  const error = await decodeFailure(null);
  expect(error._tag).toBe("ParseError");
});

test("decodeAlphaVantageResponse: non-object input returns ParseError", async () => {
  const error = await decodeFailure("not an object");
  expect(error._tag).toBe("ParseError");
});

test("decodeAlphaVantageResponse: Error Message field returns ServiceError", async () => {
  const error = await decodeFailure({ "Error Message": "Invalid API call" });
  expect(error).toMatchObject({ _tag: "ServiceError", message: "Invalid API call" });
});

test("decodeAlphaVantageResponse: Note field returns ServiceError (rate limit)", async () => {
  const error = await decodeFailure({
    "Note": "Thank you for using Alpha Vantage! Rate limit exceeded.",
  });
  expect(error._tag).toBe("ServiceError");
});

test("decodeAlphaVantageResponse: Information field returns ServiceError", async () => {
  const error = await decodeFailure({ "Information": "Please provide a valid API key." });
  expect(error._tag).toBe("ServiceError");
});

test("decodeAlphaVantageResponse: empty Global Quote returns SymbolNotFound", async () => {
  const error = await decodeFailure({ "Global Quote": {} });
  expect(error).toMatchObject({ _tag: "SymbolNotFound", symbol: "TEST" });
});

test("decodeAlphaVantageResponse: missing Global Quote returns SymbolNotFound", async () => {
  const error = await decodeFailure({});
  expect(error._tag).toBe("SymbolNotFound");
});

test("decodeAlphaVantageResponse: missing required field returns ParseError", async () => {
  const error = await decodeFailure({ "Global Quote": { "01. symbol": "MSFT" } });
  expect(error._tag).toBe("ParseError");
});

test("decodeAlphaVantageResponse: non-numeric price returns ParseError", async () => {
  const error = await decodeFailure({
    "Global Quote": { ...validResponse["Global Quote"], "05. price": "not-a-number" },
  });
  expect(error).toMatchObject({ _tag: "ParseError", message: "Non-numeric value in quote data" });
});

test("decodeAlphaVantageResponse: negative price returns ParseError", async () => {
  const error = await decodeFailure({
    "Global Quote": { ...validResponse["Global Quote"], "05. price": "-1" },
  });
  expect(error).toMatchObject({ _tag: "ParseError", message: "Negative price" });
});

// --- makeAlphaVantageSource ---

function fetchWith(reply: FakeReply, secrets: Secrets, urls: Array<string> = []) {
  return Effect.runPromise(
    makeAlphaVantageSource().pipe(
      Effect.flatMap((source) => source.getQuote("MSFT")),
      Effect.either,
      Effect.provide(
        fakeHttpClient((_request, url) =>
          Effect.sync(() => {
            urls.push(url.toString());
            return reply;
          })
        ),
      ),
      Effect.provide(CredentialStoreMemory(secrets)),
    ),
  );
}

test("alpha vantage source: GLOBAL_QUOTE request with the stored key", async () => {
  const urls: Array<string> = [];
  const result = await fetchWith(
    { body: JSON.stringify(validResponse) },
    { alphavantage: "test-secret" },
    urls,
  );

  expect(Either.isRight(result) && result.right.symbol).toBe("MSFT");
  expect(urls).toEqual([
    "https://www.alphavantage.co/query?function=GLOBAL_QUOTE&symbol=MSFT&apikey=test-secret",
  ]);
});

test("alpha vantage source: no key fails without a request", async () => {
  const urls: Array<string> = [];
  const result = await fetchWith({ body: "{}" }, {}, urls);

  expect(Either.isLeft(result) && result.left).toMatchObject({
    _tag: "ServiceError",
    message: "Alpha Vantage API key not configured",
  });
  expect(urls).toEqual([]);
});

test("alpha vantage source: non-2xx status is an HttpError", async () => {
  const result = await fetchWith({ status: 500, body: "" }, { alphavantage: "test-secret" });
  expect(Either.isLeft(result) && result.left).toMatchObject({ _tag: "HttpError", status: 500 });
});

test("alpha vantage source: a missing key does not use up a rate-limit slot", async () => {
  const polled = await Effect.runPromise(
    Effect.gen(function* () {
      const limiter = yield* makeRateLimiter({ limit: 1, interval: "1 minute" });
      const source = yield* makeAlphaVantageSource({ limiter });
      yield* source.getQuote("MSFT").pipe(Effect.either);
      const fiber = yield* Effect.fork(limiter.run(Effect.succeed("free")));
      yield* TestClock.adjust("1 second");
      return yield* Fiber.poll(fiber);
    }).pipe(
      Effect.provide(fakeHttpClient(() => Effect.succeed({ body: "{}" }))),
      Effect.provide(CredentialStoreMemory({})),
      Effect.provide(TestContext.TestContext),
    ),
  );

  expect(polled._tag).toBe("Some");
});
