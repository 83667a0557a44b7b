/**
 * Material Lookup Service
 *
 * Search over the contributions table by key/CAS or display name, and the
 * constituent breakdown of a single material.
 */

import type { MaterialBreakdown, MaterialSearchHit } from "@shared/schema";
import type { ReferenceData } from "../compliance/referenceData";
import { declaredTotal, isMappedStandard, normalizeKey } from "../compliance/referenceData";
import { roundTo } from "../compliance/engines/complianceEvaluator";

export function searchMaterials(ref: ReferenceData, query: string, limit: number): MaterialSearchHit[] {
  const needle = normalizeKey(query);
  if (!needle) return [];

  const hits: MaterialSearchHit[] = [];
  for (const record of Array.from(ref.contributions.values())) {
    if (record.key.includes(needle) || record.name.toLowerCase().includes(needle)) {
      hits.push({ key: record.key, name: record.name, constituentCount: record.constituents.length });
    }
  }

  hits.sort((a, b) => {
    const byName = a.name.localeCompare(b.name);
    return byName !== 0 ? byName : a.key.localeCompare(b.key);
  });
  return hits.slice(0, limit);
}

export function describeMaterial(
  ref: ReferenceData,
  rawKey: string,
  completenessThreshold: number
): MaterialBreakdown | null {
  const key = normalizeKey(rawKey);
  if (!key) return null;
  const record = ref.contributions.get(key);
  if (!record) return null;

  const constituents = record.constituents
    .map((c) => ({
      key: c.key,
      percentage: c.percentage,
      kind: isMappedStandard(ref, c.key) ? ("standard" as const) : ("constituent" as const),
    }))
    .sort((a, b) => b.percentage - a.percentage || a.key.localeCompare(b.key));

  const total = declaredTotal(record);
  return {
    key: record.key,
    name: record.name,
    constituents,
    totalPercentage: roundTo(total, 2),
    complete: total >= completenessThreshold,
  };
}
