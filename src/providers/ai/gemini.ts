// Google Gemini generateContent API.

import { HttpClientRequest } from "@effect/platform";
import { Effect, Schema } from "effect";
import { decodeEnvelope, requireText, type AiProvider } from "../../ai-provider.ts";

const GenerateContentResponse = Schema.Struct({
  candidates: Schema.optional(
    Schema.Array(
      Schema.Struct({
        content: Schema.Struct({
          parts: Schema.Array(Schema.Struct({ text: Schema.optional(Schema.String) })),
        }),
      }),
    ),
  ),
});

const model = "gemini-1.5-flash";

export const gemini: AiProvider = {
  id: "gemini",
  displayName: "Gemini",
  tier: "premium",
  model,
  buildRequest: (prompt, apiKey) =>
    HttpClientRequest.post(
      `https://generativelanguage.googleapis.com/v1beta/models/${model}:generateContent`,
    ).pipe(
      HttpClientRequest.setHeader("x-goog-api-key", apiKey),
      HttpClientRequest.bodyUnsafeJson({
        systemInstruction: { parts: [{ text: prompt.system }] },
        contents: [{ role: "user", parts: [{ text: prompt.user }] }],
        generationConfig: {
          temperature: prompt.temperature,
          maxOutputTokens: prompt.maxTokens,
        },
      }),
    ),
  parseResponse: (raw) =>
    decodeEnvelope(GenerateContentResponse, "gemini", raw).pipe(
      Effect.flatMap((response) =>
        requireText(
          (response.candidates?.[0]?.content.parts ?? [])
            .map((part) => part.text ?? "")
            .join(""),
          "gemini",
          raw,
        )
      ),
    ),
};
