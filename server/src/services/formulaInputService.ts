/**
 * Formula Input Service
 *
 * Helpers for formulas typed in by hand: "Name, Amount" lines and rescaling
 * of amount-based rows (by multiplier or to a target total).
 */

import type { AmountEntry, FormulaEntry } from "@shared/schema";
import { totalAmount } from "../compliance/engines/formulaNormalizer";

// ============================================================================
// TYPES
// ============================================================================

export interface SkippedLine {
  lineNumber: number;
  text: string;
  reason: string;
}

export interface ParsedFormulaText {
  formula: AmountEntry[];
  skippedLines: SkippedLine[];
}

export type FormulaScaling =
  | { mode: "multiplier"; factor: number }
  | { mode: "total"; targetTotal: number };

export interface ScaledFormula {
  formula: FormulaEntry[];
  factor: number;
}

// ============================================================================
// PARSING
// ============================================================================

/**
 * One material per line, amount after the last comma:
 *   Phenyl Ethyl Alcohol, 120
 *   Lavender oil, Bulgarian, 12.5
 * Blank lines and lines starting with "#" are ignored.
 */
export function parseFormulaText(text: string): ParsedFormulaText {
  const formula: AmountEntry[] = [];
  const skippedLines: SkippedLine[] = [];

  text.split(/\r?\n/).forEach((rawLine, idx) => {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith("#")) return;
    const lineNumber = idx + 1;

    const comma = line.lastIndexOf(",");
    if (comma === -1) {
      skippedLines.push({ lineNumber, text: line, reason: "Expected 'Name, Amount'" });
      return;
    }

    const name = line.slice(0, comma).trim();
    const amountText = line.slice(comma + 1).trim();
    const amount = Number(amountText);

    if (name.length === 0) {
      skippedLines.push({ lineNumber, text: line, reason: "Missing material name" });
    } else if (amountText.length === 0 || !Number.isFinite(amount) || amount < 0) {
      skippedLines.push({ lineNumber, text: line, reason: `Invalid amount "${amountText}"` });
    } else {
      formula.push({ kind: "amount", name, amount });
    }
  });

  return { formula, skippedLines };
}

// ============================================================================
// SCALING
// ============================================================================

export function scaleFormula(formula: readonly FormulaEntry[], scaling: FormulaScaling): ScaledFormula {
  let factor: number;
  if (scaling.mode === "multiplier") {
    factor = scaling.factor;
  } else {
    const current = totalAmount(formula);
    factor = current > 0 ? scaling.targetTotal / current : 1;
  }

  return {
    formula: formula.map((entry) =>
      entry.kind === "amount" ? { ...entry, amount: entry.amount * factor } : { ...entry }
    ),
    factor,
  };
}
