import { expect, test } from "vitest";
import { Either } from "effect";
import { PortfolioSummaryKind, StockPredictionKind } from "./domain.ts";
import { ProviderUnconfigured } from "./ai-provider.ts";
import {
  activeProvider,
  clearSelection,
  initialAnalysisSettings,
  promptOverrideFor,
  selectProvider,
  setPromptOverride,
} from "./analysis-settings.ts";

test("selectProvider: a configured provider becomes the selection", () => {
  const result = selectProvider(initialAnalysisSettings, "openai", ["deepseek", "openai"]);
  expect(result).toEqual(Either.right({ selected: "openai", promptOverrides: {} }));
});

test("selectProvider: an unconfigured provider is refused", () => {
  const result = selectProvider(initialAnalysisSettings, "gemini", ["deepseek"]);
  expect(result).toEqual(Either.left(new ProviderUnconfigured({ provider: "gemini" })));
});

test("selectProvider: leaves the input untouched", () => {
  selectProvider(initialAnalysisSettings, "openai", ["openai"]);
  expect(initialAnalysisSettings.selected).toBeUndefined();
});

test("activeProvider: credentialed selection wins", () => {
  const settings = { ...initialAnalysisSettings, selected: "anthropic" as const };
  expect(activeProvider(settings, ["deepseek", "anthropic"])).toBe("anthropic");
});

test("activeProvider: falls back to the default when the selection lost its credential", () => {
  const settings = { ...initialAnalysisSettings, selected: "anthropic" as const };
  expect(activeProvider(settings, ["deepseek"])).toBe("deepseek");
});

test("activeProvider: nothing when neither selection nor default is credentialed", () => {
  expect(activeProvider(initialAnalysisSettings, ["openai"])).toBeUndefined();
  expect(activeProvider(initialAnalysisSettings, [])).toBeUndefined();
});

test("clearSelection: returns to the default provider", () => {
  const settings = clearSelection({ ...initialAnalysisSettings, selected: "qwen" });
  expect(settings.selected).toBeUndefined();
  expect(activeProvider(settings, ["deepseek", "qwen"])).toBe("deepseek");
});

test("setPromptOverride: stores per kind and blank text removes it", () => {
  const withOverride = setPromptOverride(initialAnalysisSettings, "PortfolioSummary", "Be brief");
  expect(promptOverrideFor(withOverride, PortfolioSummaryKind)).toBe("Be brief");
  expect(promptOverrideFor(withOverride, StockPredictionKind("AAPL"))).toBeUndefined();

  const cleared = setPromptOverride(withOverride, "PortfolioSummary", "   ");
  expect(cleared.promptOverrides).toEqual({});
  expect(promptOverrideFor(withOverride, PortfolioSummaryKind)).toBe("Be brief");
});
