import { describe, it, expect } from "vitest";
import type { FormulaEntry } from "@shared/schema";
import { parseFormulaText, scaleFormula } from "./formulaInputService";

describe("Formula Input Service", () => {
  describe("parseFormulaText", () => {
    it("reads one material per line with the amount after the last comma", () => {
      const parsed = parseFormulaText(
        ["# Rose accord v2", "Phenyl Ethyl Alcohol, 120", "", "Lavender oil, Bulgarian, 12.5"].join("\r\n")
      );

      expect(parsed).toEqual({
        formula: [
          { kind: "amount", name: "Phenyl Ethyl Alcohol", amount: 120 },
          { kind: "amount", name: "Lavender oil, Bulgarian", amount: 12.5 },
        ],
        skippedLines: [],
      });
    });

    it("reports lines it cannot use", () => {
      const parsed = parseFormulaText("Rose Base, 10\nno amount here\n, 5\nLemon, x\nCitral, -2\nGeraniol,");

      expect(parsed.formula).toEqual([{ kind: "amount", name: "Rose Base", amount: 10 }]);
      expect(parsed.skippedLines).toEqual([
        { lineNumber: 2, text: "no amount here", reason: "Expected 'Name, Amount'" },
        { lineNumber: 3, text: ", 5", reason: "Missing material name" },
        { lineNumber: 4, text: "Lemon, x", reason: 'Invalid amount "x"' },
        { lineNumber: 5, text: "Citral, -2", reason: 'Invalid amount "-2"' },
        { lineNumber: 6, text: "Geraniol,", reason: 'Invalid amount ""' },
      ]);
    });
  });

  describe("scaleFormula", () => {
    const formula: FormulaEntry[] = [
      { kind: "amount", name: "A", amount: 30 },
      { kind: "amount", name: "B", amount: 10 },
      { kind: "concentration", name: "C", concentration: 2 },
    ];

    it("multiplies amount rows only", () => {
      expect(scaleFormula(formula, { mode: "multiplier", factor: 2.5 })).toEqual({
        factor: 2.5,
        formula: [
          { kind: "amount", name: "A", amount: 75 },
          { kind: "amount", name: "B", amount: 25 },
          { kind: "concentration", name: "C", concentration: 2 },
        ],
      });
    });

    it("scales to a target total", () => {
      const scaled = scaleFormula(formula, { mode: "total", targetTotal: 1000 });
      expect(scaled.factor).toBe(25);
      expect(scaled.formula.map((e) => (e.kind === "amount" ? e.amount : null))).toEqual([750, 250, null]);
    });

    it("leaves a formula without amounts unchanged", () => {
      const scaled = scaleFormula([{ kind: "amount", name: "A", amount: 0 }], { mode: "total", targetTotal: 50 });
      expect(scaled).toEqual({ factor: 1, formula: [{ kind: "amount", name: "A", amount: 0 }] });
    });
  });
});
