/**
 * STANDARD AGGREGATOR
 *
 * Folds resolved constituents of every formula entry into per-CAS buckets,
 * then into per-standard totals.
 *
 * Phototoxicity exemption: furocoumarin-free, distilled and terpeneless
 * citrus materials do not count toward phototoxicity standards. A CAS bucket
 * is exempt only when every material feeding it is exempt, and the exemption
 * applies to phototoxicity standards only.
 */

import type { StandardType } from "@shared/schema";
import type { ReferenceData } from "../referenceData";
import { isDecomposable, isMappedStandard, normalizeKey } from "../referenceData";
import type { NormalizedEntry } from "./formulaNormalizer";
import { resolveContributions } from "./contributionResolver";

// ============================================================================
// TYPES
// ============================================================================

export interface EntryResolution {
  entry: NormalizedEntry;
  /** Key into the contributions table and/or CAS mapping, null when unknown */
  key: string | null;
}

export interface CasBucket {
  totalConcentration: number;
  photoExempt: boolean;
  /** material display name → % of finished product */
  sources: Map<string, number>;
}

export interface StandardAggregation {
  standardId: string;
  name: string;
  type: StandardType;
  limit?: number;
  totalConcentration: number;
  sources: Map<string, number>;
}

export interface BucketCollection {
  buckets: Map<string, CasBucket>;
  unresolvedMaterials: string[];
  truncatedMaterials: string[];
}

// ============================================================================
// EXEMPTION
// ============================================================================

export function isPhotoExempt(materialName: string, tokens: readonly string[]): boolean {
  const upper = materialName.toUpperCase();
  return tokens.some((token) => token.length > 0 && upper.includes(token.toUpperCase()));
}

// ============================================================================
// ENTRY RESOLUTION
// ============================================================================

function isKnown(ref: ReferenceData, key: string | null): key is string {
  return key !== null && (isDecomposable(ref, key) || isMappedStandard(ref, key));
}

/** CAS first, then SKU, then the material name. */
export function findResolutionKey(ref: ReferenceData, entry: NormalizedEntry): string | null {
  const candidates = [normalizeKey(entry.cas), normalizeKey(entry.sku), normalizeKey(entry.name)];
  for (const candidate of candidates) {
    if (isKnown(ref, candidate)) return candidate;
  }
  return null;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Entries in a canonical order so that the sums do not depend on how the
 * formula happened to be listed.
 */
export function canonicalOrder(entries: readonly NormalizedEntry[]): NormalizedEntry[] {
  return [...entries].sort(
    (a, b) =>
      compareText(a.name, b.name) ||
      compareText(a.cas ?? "", b.cas ?? "") ||
      compareText(a.sku ?? "", b.sku ?? "") ||
      a.concentration - b.concentration
  );
}

export function resolveEntries(
  ref: ReferenceData,
  entries: readonly NormalizedEntry[]
): EntryResolution[] {
  return canonicalOrder(entries).map((entry) => ({ entry, key: findResolutionKey(ref, entry) }));
}

// ============================================================================
// AGGREGATION
// ============================================================================

function addToBucket(
  buckets: Map<string, CasBucket>,
  cas: string,
  concentration: number,
  materialName: string,
  exempt: boolean
): void {
  let bucket = buckets.get(cas);
  if (!bucket) {
    bucket = { totalConcentration: 0, photoExempt: exempt, sources: new Map() };
    buckets.set(cas, bucket);
  }
  bucket.totalConcentration += concentration;
  bucket.sources.set(materialName, (bucket.sources.get(materialName) ?? 0) + concentration);
  bucket.photoExempt = bucket.photoExempt && exempt;
}

export function collectCasBuckets(
  ref: ReferenceData,
  resolutions: readonly EntryResolution[],
  options: { maxResolutionDepth: number; photoExemptTokens: readonly string[] }
): BucketCollection {
  const buckets = new Map<string, CasBucket>();
  const unresolved = new Set<string>();
  const truncated = new Set<string>();

  for (const { entry, key } of resolutions) {
    if (key === null) {
      unresolved.add(entry.name);
      continue;
    }

    const exempt = isPhotoExempt(entry.name, options.photoExemptTokens);

    if (isDecomposable(ref, key)) {
      const outcome = resolveContributions(ref, key, entry.concentration, options.maxResolutionDepth);
      if (outcome.truncated) truncated.add(entry.name);
      for (const [cas, conc] of Array.from(outcome.contributions)) {
        addToBucket(buckets, cas, conc, entry.name, exempt);
      }
    }

    // A material listed in the CAS mapping counts under its own standards too
    if (isMappedStandard(ref, key)) {
      addToBucket(buckets, key, entry.concentration, entry.name, exempt);
    }
  }

  return {
    buckets,
    unresolvedMaterials: Array.from(unresolved).sort(compareText),
    truncatedMaterials: Array.from(truncated).sort(compareText),
  };
}

export function aggregateByStandard(
  ref: ReferenceData,
  buckets: ReadonlyMap<string, CasBucket>
): Map<string, StandardAggregation> {
  const aggregation = new Map<string, StandardAggregation>();

  for (const [cas, bucket] of Array.from(buckets)) {
    const standardIds = ref.casMapping.get(cas);
    if (!standardIds) continue;

    for (const standardId of standardIds) {
      const standard = ref.standards.get(standardId);
      if (!standard) continue;
      if (bucket.photoExempt && standard.type === "phototoxicity") continue;

      let agg = aggregation.get(standardId);
      if (!agg) {
        agg = {
          standardId,
          name: standard.name,
          type: standard.type,
          limit: standard.limitCat4,
          totalConcentration: 0,
          sources: new Map(),
        };
        aggregation.set(standardId, agg);
      }
      agg.totalConcentration += bucket.totalConcentration;
      for (const [sourceName, conc] of Array.from(bucket.sources)) {
        agg.sources.set(sourceName, (agg.sources.get(sourceName) ?? 0) + conc);
      }
    }
  }

  return aggregation;
}
