/**
 * COMPLIANCE EVALUATOR
 *
 * Turns per-standard totals into pass/fail results, the phototoxicity
 * sum-of-ratios, the critical component and the maximum safe dosage.
 *
 * Max safe dosage relies on linear scaling: the formula composition is fixed
 * and only the dilution varies, so every concentration scales with dosage.
 */

import type { PhototoxicityResult, SourceAttribution, StandardResult } from "@shared/schema";
import type { ReferenceData } from "../referenceData";
import type { StandardAggregation } from "./standardAggregator";

// ============================================================================
// TYPES
// ============================================================================

export const PHOTOTOXICITY_AGGREGATE_LABEL = "Phototoxicity (Sum of Ratios)";
export const NO_SOURCES_LABEL = "Inherited/Direct Addition";

/** Ratios at or below this count as zero exposure */
const RATIO_EPSILON = 1e-9;

export interface Evaluation {
  isCompliant: boolean;
  results: StandardResult[];
  phototoxicity: PhototoxicityResult;
  criticalComponent: string | null;
  maxSafeDosage: number;
}

// ============================================================================
// HELPERS
// ============================================================================

export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value)) return value;
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function standardRatio(concentration: number, limit: number | undefined): number {
  if (limit === undefined) return 0;
  if (limit > 0) return concentration / limit;
  return concentration === 0 ? 0 : Number.POSITIVE_INFINITY;
}

export function exceedancePercent(ratio: number): number {
  return Math.max(0, (ratio - 1) * 100);
}

function toSources(sources: ReadonlyMap<string, number>): SourceAttribution[] {
  return Array.from(sources)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([name, concentration]) => ({ name, concentration: roundTo(concentration, 6) }));
}

function summarizeSources(sources: SourceAttribution[]): string {
  if (sources.length === 0) return NO_SOURCES_LABEL;
  return sources.map((s) => `${s.name} (${s.concentration}%)`).join(", ");
}

// ============================================================================
// EVALUATOR
// ============================================================================

export function evaluateCompliance(
  ref: ReferenceData,
  aggregation: ReadonlyMap<string, StandardAggregation>,
  finishedDosage: number,
  options: { passTolerance: number }
): Evaluation {
  const results: StandardResult[] = [];
  let allStandardsPass = true;
  let criticalComponent: string | null = null;
  let maxRatio = RATIO_EPSILON;
  let sumOfRatios = 0;

  // Standards table order keeps the output independent of formula order
  for (const standardId of Array.from(ref.standards.keys())) {
    const agg = aggregation.get(standardId);
    if (!agg) continue;

    const concentration = agg.totalConcentration;
    const ratio = standardRatio(concentration, agg.limit);
    const pass = agg.limit === undefined || concentration <= agg.limit + options.passTolerance;

    if (agg.type === "phototoxicity" && agg.limit !== undefined && agg.limit > 0) {
      sumOfRatios += ratio;
    }
    if (!pass) allStandardsPass = false;
    if (ratio > maxRatio) {
      maxRatio = ratio;
      criticalComponent = agg.name;
    }

    const sources = toSources(agg.sources);
    results.push({
      standardId,
      standardName: agg.name,
      type: agg.type,
      concentration: roundTo(concentration, 6),
      limit: agg.limit ?? "specification",
      pass,
      ratio: roundTo(ratio, 4),
      exceedancePerc: roundTo(exceedancePercent(ratio), 2),
      sources,
      sourceSummary: summarizeSources(sources),
    });
  }

  const phototoxicityPass = sumOfRatios <= 1;
  if (sumOfRatios > maxRatio) {
    maxRatio = sumOfRatios;
    criticalComponent = PHOTOTOXICITY_AGGREGATE_LABEL;
  }

  const maxSafeDosage =
    maxRatio > RATIO_EPSILON ? Math.min(100, finishedDosage / maxRatio) : 100;

  return {
    isCompliant: allStandardsPass && phototoxicityPass,
    results,
    phototoxicity: {
      sumOfRatios: roundTo(sumOfRatios, 4),
      pass: phototoxicityPass,
      exceedancePerc: roundTo(exceedancePercent(sumOfRatios), 2),
    },
    criticalComponent,
    maxSafeDosage,
  };
}
