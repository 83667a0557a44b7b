/**
 * COMPLIANCE ENGINE INDEX
 *
 * Central export point for the compliance modules:
 * - Reference data (tables, loading, key normalization)
 * - Engines (Normalizer, Resolver, Aggregator, Integrity Checker, Evaluator)
 * - ComplianceEngine facade
 * - Errors
 */

export * from "./referenceData";
export * from "./errors";

export {
  normalizeFormula,
  toFormulaEntry,
  validateFormula,
  validateFinishedDosage,
  totalAmount,
  type NormalizedEntry,
} from "./engines/formulaNormalizer";

export {
  resolveContributions,
  classifyConstituent,
  type ConstituentKind,
  type ResolutionOutcome,
} from "./engines/contributionResolver";

export {
  isPhotoExempt,
  findResolutionKey,
  resolveEntries,
  collectCasBuckets,
  aggregateByStandard,
  type CasBucket,
  type EntryResolution,
  type StandardAggregation,
} from "./engines/standardAggregator";

export { checkDataIntegrity, isIntentionalDilution } from "./engines/integrityChecker";

export {
  evaluateCompliance,
  standardRatio,
  PHOTOTOXICITY_AGGREGATE_LABEL,
  type Evaluation,
} from "./engines/complianceEvaluator";

export { ComplianceEngine } from "./complianceEngine";
