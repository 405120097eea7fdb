// Analysis dispatcher — provider-agnostic insight generation.
//
// credential → cache → prompt → remote call → envelope → insight → cache.
// Nothing here branches on which provider is in use; the adapter in the
// registry owns the wire format.

import { HttpClient } from "@effect/platform";
import { Clock, Console, Context, Duration, Effect, Layer, Option } from "effect";
import type {
  Insight,
  InsightKind,
  PortfolioSnapshot,
  ProviderId,
} from "./domain.ts";
import {
  ProviderRequestFailed,
  ProviderUnconfigured,
  type AnalysisError,
} from "./ai-provider.ts";
import { CredentialStore, getUsableSecret } from "./credential-store.ts";
import { providerRegistry, type ProviderRegistry } from "./provider-registry.ts";
import { buildPrompt, effectiveInstructions } from "./prompts.ts";
import { fingerprint, InsightCache } from "./insight-cache.ts";
import { parseInsight } from "./insight-parser.ts";
import { InsightSettings } from "./config.ts";

export class AnalysisDispatcher extends Context.Tag("AnalysisDispatcher")<
  AnalysisDispatcher,
  {
    /** `provider` undefined means nothing is selected or usable; that is
     *  reported as ProviderUnconfigured, never silently substituted. */
    readonly generateInsight: (
      kind: InsightKind,
      snapshot: PortfolioSnapshot,
      provider: ProviderId | undefined,
      promptOverride?: string,
    ) => Effect.Effect<Insight, AnalysisError>;
  }
>() {}

export interface DispatcherOptions {
  readonly registry?: ProviderRegistry;
  readonly timeout: Duration.DurationInput;
}

export function makeAnalysisDispatcher(
  options: DispatcherOptions,
): Effect.Effect<
  Context.Tag.Service<AnalysisDispatcher>,
  never,
  HttpClient.HttpClient | CredentialStore | InsightCache
> {
  return Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(HttpClient.filterStatusOk);
    const store = yield* CredentialStore;
    const cache = yield* InsightCache;
    const registry = options.registry ?? providerRegistry;

    const call = (
      providerId: ProviderId,
      apiKey: string,
      kind: InsightKind,
      snapshot: PortfolioSnapshot,
      override?: string,
    ) => {
      const adapter = registry[providerId];
      const request = adapter.buildRequest(buildPrompt(kind, snapshot, override), apiKey);

      return client.execute(request).pipe(
        Effect.flatMap((response) => response.text),
        Effect.scoped,
        Effect.timeoutFail({
          duration: options.timeout,
          onTimeout: () =>
            new ProviderRequestFailed({
              provider: providerId,
              message: `No response within ${Duration.format(options.timeout)}`,
            }),
        }),
        Effect.catchTags({
          RequestError: (e) =>
            Effect.fail(new ProviderRequestFailed({ provider: providerId, message: e.message })),
          ResponseError: (e) =>
            Effect.fail(
              new ProviderRequestFailed({
                provider: providerId,
                message: e.message,
                ...(e.reason === "StatusCode" ? { status: e.response.status } : {}),
              }),
            ),
        }),
      );
    };

    const generateInsight = (
      kind: InsightKind,
      snapshot: PortfolioSnapshot,
      providerId: ProviderId | undefined,
      promptOverride?: string,
    ) =>
      Effect.gen(function* () {
        if (providerId === undefined) {
          return yield* Effect.fail(new ProviderUnconfigured({ provider: undefined }));
        }

        // A removed key also stops cached answers from being served.
        const apiKey = yield* getUsableSecret(providerId).pipe(
          Effect.provideService(CredentialStore, store),
        );
        if (Option.isNone(apiKey)) {
          return yield* Effect.fail(new ProviderUnconfigured({ provider: providerId }));
        }

        const key = fingerprint(
          providerId,
          kind,
          snapshot.positions.map((p) => p.holding),
          effectiveInstructions(kind, promptOverride),
        );

        const cached = yield* cache.get(providerId, key);
        if (Option.isSome(cached)) {
          yield* Console.debug(`[insight] ${kind._tag} via ${providerId}: cache hit`);
          return cached.value;
        }

        const adapter = registry[providerId];
        yield* Console.debug(`[insight] ${kind._tag} via ${providerId} (${adapter.model})...`);

        const raw = yield* call(providerId, apiKey.value, kind, snapshot, promptOverride);
        const text = yield* adapter.parseResponse(raw);
        const now = yield* Clock.currentTimeMillis;
        const insight = yield* parseInsight(kind, text, providerId, now);

        yield* cache.put(providerId, key, insight);
        return insight;
      }).pipe(
        Effect.tapError((e) => Console.debug(`[insight] ${kind._tag} failed: ${e._tag}`)),
      );

    return AnalysisDispatcher.of({ generateInsight });
  });
}

export const AnalysisDispatcherLive = Layer.effect(
  AnalysisDispatcher,
  InsightSettings.pipe(
    Effect.flatMap((settings) => makeAnalysisDispatcher({ timeout: settings.timeout })),
  ),
);
