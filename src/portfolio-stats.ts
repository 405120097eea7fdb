// Portfolio aggregation — pure functions over positions, no I/O.

import type { Health, PortfolioStats, Position } from "./domain.ts";

// --- Policy ---

/** Thresholds for health buckets. Percentages are in percent units. */
export interface HealthPolicy {
  /** |changePercent| at or above this is a warning. */
  readonly warningMovePercent: number;
  /** A fall of at least this much is danger. */
  readonly dangerDeclinePercent: number;
  /** Portfolio is in danger when more than this share of holdings is. */
  readonly dangerRatio: number;
  /** Portfolio is in warning when more than this share of holdings is. */
  readonly warningRatio: number;
}

export const defaultHealthPolicy: HealthPolicy = {
  warningMovePercent: 2,
  dangerDeclinePercent: 10,
  dangerRatio: 0.3,
  warningRatio: 0.5,
};

// --- Classification ---

export function classifyHolding(
  changePercent: number,
  policy: HealthPolicy = defaultHealthPolicy,
): Health {
  if (changePercent <= -policy.dangerDeclinePercent) return "danger";
  if (Math.abs(changePercent) >= policy.warningMovePercent) return "warning";
  return "healthy";
}

export interface HealthCounts {
  readonly healthyCount: number;
  readonly warningCount: number;
  readonly dangerCount: number;
}

export function overallHealth(
  counts: HealthCounts,
  policy: HealthPolicy = defaultHealthPolicy,
): Health {
  const total = counts.healthyCount + counts.warningCount + counts.dangerCount;
  if (total === 0) return "healthy";
  if (counts.dangerCount / total > policy.dangerRatio) return "danger";
  if (counts.warningCount / total > policy.warningRatio) return "warning";
  return "healthy";
}

// --- Stats ---

export function computeStats(
  snapshot: { readonly positions: ReadonlyArray<Position> },
  policy: HealthPolicy = defaultHealthPolicy,
): PortfolioStats {
  let totalValue = 0;
  let dailyChange = 0;
  let costedValue = 0;
  let totalCost = 0;
  let hasCost = false;
  const counts = { healthyCount: 0, warningCount: 0, dangerCount: 0 };

  for (const { holding, quote } of snapshot.positions) {
    // Holdings without any quote carry no value and no health signal.
    if (quote === undefined) continue;

    const value = holding.shares * quote.price;
    totalValue += value;
    dailyChange += holding.shares * quote.change;

    if (holding.costBasis !== undefined) {
      hasCost = true;
      costedValue += value;
      totalCost += holding.shares * holding.costBasis;
    }

    switch (classifyHolding(quote.changePercent, policy)) {
      case "healthy":
        counts.healthyCount++;
        break;
      case "warning":
        counts.warningCount++;
        break;
      case "danger":
        counts.dangerCount++;
        break;
    }
  }

  const previousValue = totalValue - dailyChange;
  const totalGain = hasCost ? costedValue - totalCost : undefined;

  return {
    totalValue,
    dailyChange,
    dailyChangePercent: previousValue === 0 ? 0 : (dailyChange / previousValue) * 100,
    totalCost: hasCost ? totalCost : undefined,
    totalGain,
    totalGainPercent: totalGain === undefined
      ? undefined
      : totalCost === 0
        ? 0
        : (totalGain / totalCost) * 100,
    ...counts,
    overallHealth: overallHealth(counts, policy),
  };
}
