// AI providers — adapter shape and dispatch errors.

import type { HttpClientRequest } from "@effect/platform";
import { Data, Effect, Schema } from "effect";
import type { ProviderId } from "./domain.ts";

// --- Errors ---

export class ProviderUnconfigured extends Data.TaggedError("ProviderUnconfigured")<{
  readonly provider: ProviderId | undefined;
}> {}

export class ProviderRequestFailed extends Data.TaggedError("ProviderRequestFailed")<{
  readonly provider: ProviderId;
  readonly message: string;
  readonly status?: number;
}> {}

/** The reply could not be turned into an insight. `raw` is the text as
 *  received, kept for diagnosis. */
export class ResponseParseFailed extends Data.TaggedError("ResponseParseFailed")<{
  readonly provider: ProviderId;
  readonly message: string;
  readonly raw: string;
}> {}

export type AnalysisError =
  | ProviderUnconfigured
  | ProviderRequestFailed
  | ResponseParseFailed;

// --- Adapter ---

export interface ChatPrompt {
  readonly system: string;
  readonly user: string;
  readonly temperature: number;
  readonly maxTokens: number;
}

export interface AiProvider {
  readonly id: ProviderId;
  readonly displayName: string;
  /** The default provider is offered first; premium ones are opt-in. */
  readonly tier: "default" | "premium";
  readonly model: string;
  readonly buildRequest: (
    prompt: ChatPrompt,
    apiKey: string,
  ) => HttpClientRequest.HttpClientRequest;
  /** Pull the model's text out of the provider's response envelope. */
  readonly parseResponse: (raw: string) => Effect.Effect<string, ResponseParseFailed>;
}

/** Decode a JSON envelope, failing with the raw body attached. */
export function decodeEnvelope<A, I>(
  schema: Schema.Schema<A, I>,
  provider: ProviderId,
  raw: string,
): Effect.Effect<A, ResponseParseFailed> {
  return Schema.decodeUnknown(Schema.parseJson(schema))(raw).pipe(
    Effect.mapError(
      (e) =>
        new ResponseParseFailed({
          provider,
          raw,
          message: `Unexpected response envelope: ${e.message}`,
        }),
    ),
  );
}

export function requireText(
  text: string,
  provider: ProviderId,
  raw: string,
): Effect.Effect<string, ResponseParseFailed> {
  return text.trim().length > 0
    ? Effect.succeed(text)
    : Effect.fail(
        new ResponseParseFailed({ provider, raw, message: "Empty completion" }),
      );
}
