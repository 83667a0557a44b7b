/**
 * COMPLIANCE ENGINE
 *
 * Entry point for category 4 compliance checks:
 *
 *   formula + finished dosage
 *     → normalize → resolve → aggregate → { integrity check, evaluate }
 *     → ComplianceResult
 *
 * Synchronous and free of I/O. The reference data is shared read-only across
 * calls; every call builds its own aggregation state.
 */

import type { ComplianceResult, FormulaEntry } from "@shared/schema";
import { DEFAULT_ENGINE_OPTIONS, type EngineOptions } from "../config";
import type { ReferenceData } from "./referenceData";
import {
  normalizeFormula,
  validateFinishedDosage,
  validateFormula,
} from "./engines/formulaNormalizer";
import {
  aggregateByStandard,
  collectCasBuckets,
  resolveEntries,
} from "./engines/standardAggregator";
import { checkDataIntegrity } from "./engines/integrityChecker";
import { evaluateCompliance } from "./engines/complianceEvaluator";

export class ComplianceEngine {
  private readonly options: EngineOptions;

  constructor(
    private readonly ref: ReferenceData,
    options: Partial<EngineOptions> = {}
  ) {
    this.options = Object.freeze({ ...DEFAULT_ENGINE_OPTIONS, ...options });
  }

  get referenceData(): ReferenceData {
    return this.ref;
  }

  /**
   * Validate raw formula rows (e.g. a request body) and calculate.
   * Throws FormulaValidationError for rows with unusable numbers.
   */
  calculate(rawFormula: readonly unknown[], finishedDosage: number = 100): ComplianceResult {
    return this.calculateEntries(validateFormula(rawFormula), finishedDosage);
  }

  calculateEntries(formula: readonly FormulaEntry[], finishedDosage: number = 100): ComplianceResult {
    const dosage = validateFinishedDosage(finishedDosage);
    const { ref, options } = this;

    const normalized = normalizeFormula(formula, dosage);
    const resolutions = resolveEntries(ref, normalized);

    const collection = collectCasBuckets(ref, resolutions, options);
    const aggregation = aggregateByStandard(ref, collection.buckets);
    const dataIntegrityWarnings = checkDataIntegrity(ref, resolutions, options);
    const evaluation = evaluateCompliance(ref, aggregation, dosage, options);

    return {
      isCompliant: evaluation.isCompliant,
      results: evaluation.results,
      phototoxicity: evaluation.phototoxicity,
      criticalComponent: evaluation.criticalComponent,
      maxSafeDosage: evaluation.maxSafeDosage,
      finishedDosage: dosage,
      unresolvedMaterials: collection.unresolvedMaterials,
      dataIntegrityWarnings,
      truncatedMaterials: collection.truncatedMaterials,
    };
  }
}
