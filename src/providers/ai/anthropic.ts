// Anthropic messages API.

import { HttpClientRequest } from "@effect/platform";
import { Effect, Schema } from "effect";
import { decodeEnvelope, requireText, type AiProvider } from "../../ai-provider.ts";

const MessageResponse = Schema.Struct({
  content: Schema.Array(
    Schema.Struct({
      type: Schema.String,
      text: Schema.optional(Schema.String),
    }),
  ),
});

const model = "claude-3-5-haiku-latest";

export const anthropic: AiProvider = {
  id: "anthropic",
  displayName: "Anthropic",
  tier: "premium",
  model,
  buildRequest: (prompt, apiKey) =>
    HttpClientRequest.post("https://api.anthropic.com/v1/messages").pipe(
      HttpClientRequest.setHeaders({
        "x-api-key": apiKey,
        "anthropic-version": "2023-06-01",
      }),
      HttpClientRequest.bodyUnsafeJson({
        model,
        system: prompt.system,
        messages: [{ role: "user", content: prompt.user }],
        temperature: prompt.temperature,
        max_tokens: prompt.maxTokens,
      }),
    ),
  parseResponse: (raw) =>
    decodeEnvelope(MessageResponse, "anthropic", raw).pipe(
      Effect.flatMap((message) =>
        requireText(
          message.content
            .filter((block) => block.type === "text")
            .map((block) => block.text ?? "")
            .join(""),
          "anthropic",
          raw,
        )
      ),
    ),
};
