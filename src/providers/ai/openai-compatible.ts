// OpenAI-style chat completions — shared by every provider that speaks
// that wire format.

import { HttpClientRequest } from "@effect/platform";
import { Effect, Schema } from "effect";
import type { ProviderId } from "../../domain.ts";
import { decodeEnvelope, requireText, type AiProvider } from "../../ai-provider.ts";

const ChatCompletion = Schema.Struct({
  choices: Schema.Array(
    Schema.Struct({
      message: Schema.Struct({
        content: Schema.NullOr(Schema.String),
      }),
    }),
  ),
});

export interface OpenAiCompatibleOptions {
  readonly id: ProviderId;
  readonly displayName: string;
  readonly tier: AiProvider["tier"];
  readonly url: string;
  readonly model: string;
  readonly headers?: Readonly<Record<string, string>>;
}

export function openAiCompatible(options: OpenAiCompatibleOptions): AiProvider {
  const { id, model } = options;

  return {
    id,
    displayName: options.displayName,
    tier: options.tier,
    model,
    buildRequest: (prompt, apiKey) =>
      HttpClientRequest.post(options.url).pipe(
        HttpClientRequest.bearerToken(apiKey),
        HttpClientRequest.setHeaders(options.headers ?? {}),
        HttpClientRequest.bodyUnsafeJson({
          model,
          messages: [
            { role: "system", content: prompt.system },
            { role: "user", content: prompt.user },
          ],
          temperature: prompt.temperature,
          max_tokens: prompt.maxTokens,
        }),
      ),
    parseResponse: (raw) =>
      decodeEnvelope(ChatCompletion, id, raw).pipe(
        Effect.flatMap((completion) =>
          requireText(completion.choices[0]?.message.content ?? "", id, raw)
        ),
      ),
  };
}

// --- Providers ---

export const deepSeek = openAiCompatible({
  id: "deepseek",
  displayName: "DeepSeek",
  tier: "default",
  url: "https://api.deepseek.com/v1/chat/completions",
  model: "deepseek-chat",
});

export const openAi = openAiCompatible({
  id: "openai",
  displayName: "OpenAI",
  tier: "premium",
  url: "https://api.openai.com/v1/chat/completions",
  model: "gpt-4o-mini",
});

export const openRouter = openAiCompatible({
  id: "openrouter",
  displayName: "OpenRouter",
  tier: "premium",
  url: "https://openrouter.ai/api/v1/chat/completions",
  model: "openai/gpt-4o-mini",
  headers: { "X-Title": "ticker-insight" },
});

export const qwen = openAiCompatible({
  id: "qwen",
  displayName: "Qwen",
  tier: "premium",
  url: "https://dashscope-intl.aliyuncs.com/compatible-mode/v1/chat/completions",
  model: "qwen-plus",
});
