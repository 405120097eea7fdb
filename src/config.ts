// Environment configuration. Every value has a default; override through
// the environment, e.g. QUOTE_PRIMARY_TTL="2 minutes".

import { Config, Duration } from "effect";
import { defaultHealthPolicy, type HealthPolicy } from "./portfolio-stats.ts";

// --- Quotes ---

export interface QuoteSettings {
  readonly source: "live" | "sample";
  readonly primaryTtl: Duration.Duration;
  readonly secondaryTtl: Duration.Duration;
  readonly sourceTimeout: Duration.Duration;
  readonly primaryRequestsPerMinute: number;
}

export const defaultQuoteSettings: QuoteSettings = {
  source: "live",
  primaryTtl: Duration.minutes(5),
  secondaryTtl: Duration.minutes(10),
  sourceTimeout: Duration.seconds(5),
  primaryRequestsPerMinute: 5,
};

export const QuoteSettings: Config.Config<QuoteSettings> = Config.all({
  source: Config.literal("live", "sample")("QUOTE_SOURCE").pipe(
    Config.withDefault(defaultQuoteSettings.source),
  ),
  primaryTtl: Config.duration("QUOTE_PRIMARY_TTL").pipe(
    Config.withDefault(defaultQuoteSettings.primaryTtl),
  ),
  secondaryTtl: Config.duration("QUOTE_SECONDARY_TTL").pipe(
    Config.withDefault(defaultQuoteSettings.secondaryTtl),
  ),
  sourceTimeout: Config.duration("QUOTE_SOURCE_TIMEOUT").pipe(
    Config.withDefault(defaultQuoteSettings.sourceTimeout),
  ),
  primaryRequestsPerMinute: Config.integer("QUOTE_PRIMARY_RPM").pipe(
    Config.withDefault(defaultQuoteSettings.primaryRequestsPerMinute),
  ),
});

// --- Insights ---

export interface InsightSettings {
  readonly ttl: Duration.Duration;
  readonly timeout: Duration.Duration;
}

export const defaultInsightSettings: InsightSettings = {
  ttl: Duration.minutes(5),
  timeout: Duration.seconds(60),
};

export const InsightSettings: Config.Config<InsightSettings> = Config.all({
  ttl: Config.duration("INSIGHT_TTL").pipe(
    Config.withDefault(defaultInsightSettings.ttl),
  ),
  timeout: Config.duration("INSIGHT_TIMEOUT").pipe(
    Config.withDefault(defaultInsightSettings.timeout),
  ),
});

// --- Health policy ---

export const HealthPolicySettings: Config.Config<HealthPolicy> = Config.all({
  warningMovePercent: Config.number("HEALTH_WARNING_MOVE").pipe(
    Config.withDefault(defaultHealthPolicy.warningMovePercent),
  ),
  dangerDeclinePercent: Config.number("HEALTH_DANGER_DECLINE").pipe(
    Config.withDefault(defaultHealthPolicy.dangerDeclinePercent),
  ),
  dangerRatio: Config.number("HEALTH_DANGER_RATIO").pipe(
    Config.withDefault(defaultHealthPolicy.dangerRatio),
  ),
  warningRatio: Config.number("HEALTH_WARNING_RATIO").pipe(
    Config.withDefault(defaultHealthPolicy.warningRatio),
  ),
});
