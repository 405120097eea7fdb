// Credential store — the single place secrets are read from and written to.

import { Config, Context, Effect, HashMap, Layer, Option, Ref } from "effect";
import { providerIds } from "./domain.ts";

export const credentialIds = [...providerIds, "alphavantage"] as const;

export type CredentialId = (typeof credentialIds)[number];

export class CredentialStore extends Context.Tag("CredentialStore")<
  CredentialStore,
  {
    readonly getSecret: (id: CredentialId) => Effect.Effect<Option.Option<string>>;
    readonly setSecret: (id: CredentialId, value: string) => Effect.Effect<void>;
    readonly deleteSecret: (id: CredentialId) => Effect.Effect<void>;
  }
>() {}

/** Empty keys and the placeholders shipped in sample configs don't count. */
export function isUsableSecret(value: string): boolean {
  const key = value.trim();
  return key.length > 0 &&
    !key.startsWith("sk-REPLACE") &&
    !key.startsWith("REPLACE_") &&
    !key.startsWith("your_") &&
    !key.includes("PLACEHOLDER");
}

export const getUsableSecret = (
  id: CredentialId,
): Effect.Effect<Option.Option<string>, never, CredentialStore> =>
  CredentialStore.pipe(
    Effect.flatMap((store) => store.getSecret(id)),
    Effect.map(Option.filter(isUsableSecret)),
  );

// --- In-memory store ---

export type Secrets = Partial<Record<CredentialId, string>>;

export function makeMemoryCredentialStore(
  initial: Secrets = {},
): Effect.Effect<Context.Tag.Service<CredentialStore>> {
  const entries: Array<[CredentialId, string]> = [];
  for (const id of credentialIds) {
    const value = initial[id];
    if (value !== undefined) entries.push([id, value]);
  }

  return Ref.make(HashMap.fromIterable(entries)).pipe(
    Effect.map((ref) =>
      CredentialStore.of({
        getSecret: (id) => Ref.get(ref).pipe(Effect.map(HashMap.get(id))),
        setSecret: (id, value) => Ref.update(ref, HashMap.set(id, value)),
        deleteSecret: (id) => Ref.update(ref, HashMap.remove(id)),
      })
    ),
  );
}

export const CredentialStoreMemory = (initial: Secrets = {}) =>
  Layer.effect(CredentialStore, makeMemoryCredentialStore(initial));

// --- Environment-seeded store ---

export const credentialEnvNames: Record<CredentialId, string> = {
  deepseek: "DEEPSEEK_API_KEY",
  openai: "OPENAI_API_KEY",
  openrouter: "OPENROUTER_API_KEY",
  qwen: "QWEN_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  gemini: "GEMINI_API_KEY",
  alphavantage: "ALPHA_VANTAGE_API_KEY",
};

export const CredentialStoreFromEnv = Layer.effect(
  CredentialStore,
  Effect.gen(function* () {
    const secrets: Secrets = {};
    for (const id of credentialIds) {
      const value = yield* Config.option(Config.string(credentialEnvNames[id]));
      if (Option.isSome(value)) secrets[id] = value.value;
    }
    return yield* makeMemoryCredentialStore(secrets);
  }),
);
