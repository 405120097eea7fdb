import { Command, Options, Prompt } from "@effect/cli";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import { Console, Effect, Layer, Option } from "effect";
import {
  MarketingBriefingKind,
  PortfolioSummaryKind,
  providerIds,
  StockPredictionKind,
  type Holding,
  type InsightKind,
} from "./src/domain.ts";
import { HealthPolicySettings } from "./src/config.ts";
import { CredentialStoreFromEnv } from "./src/credential-store.ts";
import { QuoteFetcher, QuoteFetcherLive } from "./src/quote-fetcher.ts";
import { refreshPortfolio } from "./src/portfolio-refresh.ts";
import { HoldingsFileError, loadHoldings } from "./src/holdings-file.ts";
import { InsightCacheLive } from "./src/insight-cache.ts";
import { AnalysisDispatcher, AnalysisDispatcherLive } from "./src/analysis-dispatcher.ts";
import { configuredProviders, providerStatuses } from "./src/provider-registry.ts";
import {
  activeProvider,
  initialAnalysisSettings,
  promptOverrideFor,
  selectProvider,
  setPromptOverride,
} from "./src/analysis-settings.ts";
import {
  type AppError,
  formatError,
  formatInsight,
  formatPortfolio,
  formatProviders,
  formatQuote,
} from "./src/format.ts";

// --- Shared options ---

const holdingsFile = Options.file("file").pipe(
  Options.withAlias("f"),
  Options.withDescription("Holdings JSON file"),
  Options.withDefault("portfolio.json"),
);

const portfolioSnapshot = (path: string) =>
  Effect.gen(function* () {
    const holdings = yield* loadHoldings(path);
    const policy = yield* HealthPolicySettings;
    return { holdings, snapshot: yield* refreshPortfolio(holdings, { policy }) };
  });

// --- quote ---

const symbol = Options.text("symbol").pipe(
  Options.withDescription("Stock ticker symbol (e.g. AAPL, GOOGL, TSLA)"),
  Options.withFallbackPrompt(
    Prompt.text({
      message: "Enter a stock symbol:",
      validate: (value) =>
        value.trim().length === 0
          ? Effect.fail("Symbol cannot be empty")
          : Effect.succeed(value.trim()),
    }),
  ),
);

const quote = Command.make("quote", { symbol }, ({ symbol }) =>
  Effect.gen(function* () {
    const fetcher = yield* QuoteFetcher;
    const result = yield* fetcher.getQuote(symbol);
    yield* Console.log(formatQuote(result));
  })).pipe(Command.withDescription("Show the latest quote for one symbol"));

// --- portfolio ---

const portfolio = Command.make("portfolio", { file: holdingsFile }, ({ file }) =>
  portfolioSnapshot(file).pipe(
    Effect.flatMap(({ snapshot }) => Console.log(formatPortfolio(snapshot))),
  )).pipe(Command.withDescription("Value the holdings and rate their health"));

// --- insight ---

const kindChoice = Options.choice("kind", ["summary", "prediction", "briefing"]).pipe(
  Options.withDescription("What to generate"),
  Options.withDefault("summary"),
);

const targetSymbol = Options.text("symbol").pipe(
  Options.withDescription("Symbol to predict (defaults to the first holding)"),
  Options.optional,
);

const providerChoice = Options.choice("provider", providerIds).pipe(
  Options.withDescription("AI provider (defaults to deepseek when configured)"),
  Options.optional,
);

const promptText = Options.text("prompt").pipe(
  Options.withDescription("Instructions to use instead of the built-in prompt"),
  Options.optional,
);

function insightKind(
  kind: "summary" | "prediction" | "briefing",
  symbol: Option.Option<string>,
  holdings: ReadonlyArray<Holding>,
  file: string,
): Effect.Effect<InsightKind, HoldingsFileError> {
  switch (kind) {
    case "summary":
      return Effect.succeed(PortfolioSummaryKind);
    case "briefing":
      return Effect.succeed(MarketingBriefingKind);
    case "prediction": {
      const target = Option.orElse(symbol, () => Option.fromNullable(holdings[0]?.symbol));
      return Option.match(target, {
        onNone: () =>
          Effect.fail(new HoldingsFileError({ path: file, message: "No holdings to predict" })),
        onSome: (s) => Effect.succeed(StockPredictionKind(s)),
      });
    }
  }
}

const insight = Command.make(
  "insight",
  {
    file: holdingsFile,
    kind: kindChoice,
    symbol: targetSymbol,
    provider: providerChoice,
    prompt: promptText,
  },
  ({ file, kind, symbol, provider, prompt }) =>
    Effect.gen(function* () {
      const { holdings, snapshot } = yield* portfolioSnapshot(file);
      const target = yield* insightKind(kind, symbol, holdings, file);
      const configured = yield* configuredProviders();

      let settings = setPromptOverride(
        initialAnalysisSettings,
        target._tag,
        Option.getOrUndefined(prompt),
      );
      if (Option.isSome(provider)) {
        settings = yield* selectProvider(settings, provider.value, configured);
      }

      const dispatcher = yield* AnalysisDispatcher;
      const result = yield* dispatcher.generateInsight(
        target,
        snapshot,
        activeProvider(settings, configured),
        promptOverrideFor(settings, target),
      );
      yield* Console.log(formatInsight(result));
    }),
).pipe(Command.withDescription("Ask an AI provider about the portfolio"));

// --- providers ---

const providers = Command.make("providers", {}, () =>
  Effect.gen(function* () {
    const statuses = yield* providerStatuses();
    const configured = yield* configuredProviders();
    yield* Console.log(
      formatProviders(statuses, activeProvider(initialAnalysisSettings, configured)),
    );
  })).pipe(Command.withDescription("List AI providers and their credentials"));

const command = Command.make("ticker-insight").pipe(
  Command.withSubcommands([quote, portfolio, insight, providers]),
);

// --- Layers ---
// QUOTE_SOURCE=sample serves fixed quotes without network access.

const AppLive = Layer.mergeAll(QuoteFetcherLive, AnalysisDispatcherLive).pipe(
  Layer.provide(InsightCacheLive),
  Layer.provideMerge(CredentialStoreFromEnv),
  Layer.provide(FetchHttpClient.layer),
);

// --- Run ---

const cli = Command.run(command, {
  name: "ticker-insight",
  version: "0.1.0",
});

const logAppError = (e: AppError) => Console.error(formatError(e));

cli(process.argv).pipe(
  Effect.catchTags({
    QuoteUnavailable: logAppError,
    ProviderUnconfigured: logAppError,
    ProviderRequestFailed: logAppError,
    ResponseParseFailed: logAppError,
    HoldingsFileError: logAppError,
  }),
  Effect.provide(AppLive),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
