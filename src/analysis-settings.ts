// Analysis settings — which provider answers and with which instructions.
//
// Plain immutable values: every write returns the next settings (or why it
// was refused). Saving them anywhere is up to the caller.

import { Either } from "effect";
import { defaultProviderId, type InsightKind, type ProviderId } from "./domain.ts";
import { ProviderUnconfigured } from "./ai-provider.ts";

type KindTag = InsightKind["_tag"];

export interface AnalysisSettings {
  readonly selected: ProviderId | undefined;
  readonly promptOverrides: Readonly<Partial<Record<KindTag, string>>>;
}

export const initialAnalysisSettings: AnalysisSettings = {
  selected: undefined,
  promptOverrides: {},
};

/** Only providers with a usable credential can be selected. */
export function selectProvider(
  settings: AnalysisSettings,
  provider: ProviderId,
  configured: ReadonlyArray<ProviderId>,
): Either.Either<AnalysisSettings, ProviderUnconfigured> {
  return configured.includes(provider)
    ? Either.right({ ...settings, selected: provider })
    : Either.left(new ProviderUnconfigured({ provider }));
}

export function clearSelection(settings: AnalysisSettings): AnalysisSettings {
  return { ...settings, selected: undefined };
}

/** A blank text removes the override. */
export function setPromptOverride(
  settings: AnalysisSettings,
  kind: KindTag,
  text: string | undefined,
): AnalysisSettings {
  const promptOverrides: Partial<Record<KindTag, string>> = { ...settings.promptOverrides };
  if (text === undefined || text.trim().length === 0) delete promptOverrides[kind];
  else promptOverrides[kind] = text;
  return { ...settings, promptOverrides };
}

export function promptOverrideFor(
  settings: AnalysisSettings,
  kind: InsightKind,
): string | undefined {
  return settings.promptOverrides[kind._tag];
}

/**
 * The selection if it is still credentialed, else the default provider if
 * it is, else nothing.
 */
export function activeProvider(
  settings: AnalysisSettings,
  configured: ReadonlyArray<ProviderId>,
): ProviderId | undefined {
  if (settings.selected !== undefined && configured.includes(settings.selected)) {
    return settings.selected;
  }
  return configured.includes(defaultProviderId) ? defaultProviderId : undefined;
}
