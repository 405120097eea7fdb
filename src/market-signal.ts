// Market signal — a 0–100 score blended from prediction metrics, no I/O.

import type { StockPrediction } from "./domain.ts";

// --- Metrics ---

/** Inputs to the score, each on a 0–100 scale. */
export interface SignalMetrics {
  readonly profitLikelihood: number;
  readonly gainPotential: number;
  readonly confidenceScore: number;
  readonly upsideChance: number;
}

export interface SignalWeights {
  readonly profitLikelihood: number;
  readonly gainPotential: number;
  readonly confidenceScore: number;
  readonly upsideChance: number;
}

export const defaultSignalWeights: SignalWeights = {
  profitLikelihood: 0.35,
  gainPotential: 0.25,
  confidenceScore: 0.25,
  upsideChance: 0.15,
};

/**
 * Metrics derived from a single prediction. A predicted move counts ten
 * points per percent toward gain potential, capped at 100; a prediction
 * that isn't upward gets an even 50 for upside.
 */
export function metricsFromPrediction(prediction: StockPrediction): SignalMetrics {
  const confidence = prediction.confidence * 100;
  return {
    profitLikelihood: confidence,
    gainPotential: Math.min(Math.abs(prediction.predictedChangePercent) * 10, 100),
    confidenceScore: confidence,
    upsideChance: prediction.direction === "up" ? confidence : 50,
  };
}

// --- Score ---

export type SignalBand = "weak" | "moderate" | "strong";

export interface MarketSignal {
  /** Whole number in [0, 100]. */
  readonly score: number;
  readonly band: SignalBand;
}

export function signalBand(score: number): SignalBand {
  if (score <= 40) return "weak";
  if (score <= 70) return "moderate";
  return "strong";
}

export function computeMarketSignal(
  metrics: SignalMetrics,
  weights: SignalWeights = defaultSignalWeights,
): MarketSignal {
  const raw = metrics.profitLikelihood * weights.profitLikelihood +
    metrics.gainPotential * weights.gainPotential +
    metrics.confidenceScore * weights.confidenceScore +
    metrics.upsideChance * weights.upsideChance;
  const score = Math.max(0, Math.min(100, Math.round(raw)));
  return { score, band: signalBand(score) };
}

export const marketSignalFor = (
  prediction: StockPrediction,
  weights: SignalWeights = defaultSignalWeights,
): MarketSignal => computeMarketSignal(metricsFromPrediction(prediction), weights);
