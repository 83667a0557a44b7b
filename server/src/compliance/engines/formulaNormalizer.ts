/**
 * FORMULA NORMALIZER
 *
 * Turns raw formula rows into finished-product concentrations.
 *
 * Rows carry either an amount (mass or parts, relative to the other amount
 * rows) or a concentration (% of concentrate). Both end up as % of the
 * finished product once scaled by the finished dosage.
 */

import {
  finishedDosageSchema,
  formulaEntryInputSchema,
  type FormulaEntry,
} from "@shared/schema";
import { FormulaValidationError } from "../errors";

// ============================================================================
// TYPES
// ============================================================================

export interface NormalizedEntry {
  name: string;
  cas?: string;
  sku?: string;
  /** % of finished product */
  concentration: number;
}

// ============================================================================
// VALIDATION
// ============================================================================

function rawName(raw: unknown): string | null {
  if (raw && typeof raw === "object" && "name" in raw && typeof raw.name === "string") {
    return raw.name;
  }
  return null;
}

export function toFormulaEntry(raw: unknown, index: number): FormulaEntry {
  const parsed = formulaEntryInputSchema.safeParse(raw);
  const name = rawName(raw);
  const label = name ?? `#${index + 1}`;

  if (!parsed.success) {
    const issues = parsed.error.errors.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
    }));
    const fields = Array.from(new Set(issues.map((i) => i.field || "entry"))).join(", ");
    throw new FormulaValidationError(
      `Formula entry ${label} has invalid ${fields}`,
      index,
      name,
      issues
    );
  }

  const { amount, concentration, ...identity } = parsed.data;
  if (amount !== undefined) {
    return { ...identity, kind: "amount", amount };
  }
  if (concentration !== undefined) {
    return { ...identity, kind: "concentration", concentration };
  }
  throw new FormulaValidationError(
    `Formula entry ${label} needs an amount or a concentration`,
    index,
    name,
    [{ field: "amount", message: "Either amount or concentration is required" }]
  );
}

export function validateFormula(rawEntries: readonly unknown[]): FormulaEntry[] {
  return rawEntries.map((raw, index) => toFormulaEntry(raw, index));
}

export function validateFinishedDosage(finishedDosage: number): number {
  const parsed = finishedDosageSchema.safeParse(finishedDosage);
  if (!parsed.success) {
    throw new FormulaValidationError(
      `Finished dosage must be greater than 0 and at most 100 (got ${finishedDosage})`,
      -1,
      null,
      [{ field: "finishedDosage", message: parsed.error.errors[0]?.message ?? "Invalid value" }]
    );
  }
  return parsed.data;
}

// ============================================================================
// NORMALIZATION
// ============================================================================

/** Summed smallest first, so the total does not depend on row order. */
export function totalAmount(entries: readonly FormulaEntry[]): number {
  return entries
    .flatMap((e) => (e.kind === "amount" ? [e.amount] : []))
    .sort((a, b) => a - b)
    .reduce((sum, amount) => sum + amount, 0);
}

export function normalizeFormula(
  entries: readonly FormulaEntry[],
  finishedDosage: number
): NormalizedEntry[] {
  const total = totalAmount(entries);
  const dosageFactor = finishedDosage / 100;

  return entries.map((entry) => {
    let concentration: number;
    if (entry.kind === "amount") {
      concentration = total > 0 ? (entry.amount / total) * 100 * dosageFactor : 0;
    } else {
      concentration = entry.concentration * dosageFactor;
    }

    const normalized: NormalizedEntry = { name: entry.name, concentration };
    if (entry.cas !== undefined) normalized.cas = entry.cas;
    if (entry.sku !== undefined) normalized.sku = entry.sku;
    return normalized;
  });
}
