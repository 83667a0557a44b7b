/**
 * DATA INTEGRITY CHECKER
 *
 * Flags materials whose documented composition falls short of the threshold.
 * Informational only: the figures are used as declared, never scaled up.
 */

import type { ReferenceData } from "../referenceData";
import { declaredTotal } from "../referenceData";
import type { EntryResolution } from "./standardAggregator";

export function isIntentionalDilution(materialName: string, markers: readonly string[]): boolean {
  const lower = materialName.toLowerCase();
  return markers.some((marker) => lower.includes(marker.toLowerCase()));
}

export function checkDataIntegrity(
  ref: ReferenceData,
  resolutions: readonly EntryResolution[],
  options: { integrityThresholdPercent: number; dilutionMarkers: readonly string[] }
): string[] {
  const warnings = new Map<string, string>();

  for (const { entry, key } of resolutions) {
    if (key === null || warnings.has(entry.name)) continue;
    const record = ref.contributions.get(key);
    if (!record) continue;

    const total = declaredTotal(record);
    if (total < options.integrityThresholdPercent && !isIntentionalDilution(entry.name, options.dilutionMarkers)) {
      const rounded = Math.round(total * 10) / 10;
      warnings.set(entry.name, `${entry.name} (Composition only totals ${rounded}%)`);
    }
  }

  return Array.from(warnings.keys())
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((name) => warnings.get(name) ?? name);
}
