// Quote sources — service shape and domain errors.

import { Data, type Duration, Effect } from "effect";
import type { Quote } from "./domain.ts";

// --- Source errors ---

export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly message: string;
}> {}

export class HttpError extends Data.TaggedError("HttpError")<{
  readonly status: number;
}> {}

export class ParseError extends Data.TaggedError("ParseError")<{
  readonly message: string;
}> {}

export class SymbolNotFound extends Data.TaggedError("SymbolNotFound")<{
  readonly symbol: string;
}> {}

export class ServiceError extends Data.TaggedError("ServiceError")<{
  readonly message: string;
}> {}

export type QuoteSourceError =
  | NetworkError
  | HttpError
  | ParseError
  | SymbolNotFound
  | ServiceError;

// --- Fetcher error ---

export interface SourceFailure {
  readonly source: string;
  readonly error: QuoteSourceError;
}

/** Every source failed and nothing was cached for the symbol. */
export class QuoteUnavailable extends Data.TaggedError("QuoteUnavailable")<{
  readonly symbol: string;
  readonly failures: ReadonlyArray<SourceFailure>;
}> {}

// --- Source ---

export interface QuoteSource {
  readonly name: string;
  readonly getQuote: (symbol: string) => Effect.Effect<Quote, QuoteSourceError>;
}

/** Fail with NetworkError when `effect` takes longer than `timeout`. */
export const timeoutAfter = (name: string, timeout: Duration.DurationInput) =>
<A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E | NetworkError, R> =>
  effect.pipe(
    Effect.timeoutFail({
      duration: timeout,
      onTimeout: () => new NetworkError({ message: `${name}: request timed out` }),
    }),
  );

export function describeSourceError(e: QuoteSourceError): string {
  switch (e._tag) {
    case "NetworkError":
    case "ParseError":
    case "ServiceError":
      return `${e._tag}: ${e.message}`;
    case "HttpError":
      return `HttpError: HTTP ${e.status}`;
    case "SymbolNotFound":
      return `SymbolNotFound: ${e.symbol}`;
  }
}

export function describeUnavailable(e: QuoteUnavailable): string {
  if (e.failures.length === 0) return `${e.symbol}: no quote sources configured`;
  return `${e.symbol}: ` +
    e.failures.map((f) => `${f.source} ${describeSourceError(f.error)}`).join("; ");
}
