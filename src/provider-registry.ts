// Provider registry — one adapter per provider id. Adding a provider means
// adding an adapter here; dispatch doesn't change.

import { Effect, Option } from "effect";
import { providerIds, type ProviderId } from "./domain.ts";
import type { AiProvider } from "./ai-provider.ts";
import { getUsableSecret, type CredentialStore } from "./credential-store.ts";
import { deepSeek, openAi, openRouter, qwen } from "./providers/ai/openai-compatible.ts";
import { anthropic } from "./providers/ai/anthropic.ts";
import { gemini } from "./providers/ai/gemini.ts";

export type ProviderRegistry = Readonly<Record<ProviderId, AiProvider>>;

export const providerRegistry: ProviderRegistry = {
  deepseek: deepSeek,
  openai: openAi,
  openrouter: openRouter,
  qwen,
  anthropic,
  gemini,
};

export interface ProviderStatus {
  readonly provider: AiProvider;
  readonly configured: boolean;
}

export function providerStatuses(
  registry: ProviderRegistry = providerRegistry,
): Effect.Effect<ReadonlyArray<ProviderStatus>, never, CredentialStore> {
  return Effect.forEach(providerIds, (id) =>
    getUsableSecret(id).pipe(
      Effect.map((secret) => ({ provider: registry[id], configured: Option.isSome(secret) })),
    ));
}

/** Providers with a usable credential, in registry order. */
export function configuredProviders(
  registry: ProviderRegistry = providerRegistry,
): Effect.Effect<ReadonlyArray<ProviderId>, never, CredentialStore> {
  return providerStatuses(registry).pipe(
    Effect.map((statuses) =>
      statuses.filter((s) => s.configured).map((s) => s.provider.id)
    ),
  );
}
