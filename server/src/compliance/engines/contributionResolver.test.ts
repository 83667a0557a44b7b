import { describe, it, expect } from "vitest";
import { buildTestReferenceData } from "../testFixtures";
import { classifyConstituent, resolveContributions } from "./contributionResolver";

const ref = buildTestReferenceData();

describe("Contribution Resolver", () => {
  describe("classifyConstituent", () => {
    it("classifies mapped, decomposable and leaf keys", () => {
      expect(classifyConstituent(ref, "107-75-5")).toEqual(["mapped-standard"]);
      expect(classifyConstituent(ref, "compound a")).toEqual(["decomposable"]);
      expect(classifyConstituent(ref, "oil-b")).toEqual(["mapped-standard", "decomposable"]);
      expect(classifyConstituent(ref, "leaf-1")).toEqual(["leaf"]);
    });
  });

  describe("resolveContributions", () => {
    it("scales each constituent by the material concentration", () => {
      const { contributions, truncated } = resolveContributions(ref, "compound a", 7.3, 10);

      expect(truncated).toBe(false);
      expect(Array.from(contributions.keys()).sort()).toEqual(["107-75-5", "78-70-6", "leaf-1"]);
      expect(contributions.get("107-75-5")).toBeCloseTo(3.65, 9);
      expect(contributions.get("78-70-6")).toBeCloseTo(2.19, 9);
      expect(contributions.get("leaf-1")).toBeCloseTo(0.73, 9);
    });

    it("counts a key that is both mapped and decomposable on both paths", () => {
      const { contributions } = resolveContributions(ref, "bergamot", 10, 10);

      expect(contributions.get("oil-b")).toBeCloseTo(10, 9);
      expect(contributions.get("5392-40-5")).toBeCloseTo(0.2, 9);
    });

    it("terminates on cycles and reports the cut", () => {
      const { contributions, truncated } = resolveContributions(ref, "cycle-a", 10, 10);

      expect(truncated).toBe(true);
      // cycle-b is expanded at depths 1, 3, 5, 7 and 9
      expect(contributions.get("107-75-5")).toBeCloseTo(0.5, 9);
    });

    it("drops levels beyond the depth limit", () => {
      const shallow = resolveContributions(ref, "chain-0", 4, 10);
      expect(shallow.truncated).toBe(true);
      expect(shallow.contributions.size).toBe(0);

      const deep = resolveContributions(ref, "chain-0", 4, 12);
      expect(deep.truncated).toBe(false);
      expect(deep.contributions.get("107-75-5")).toBeCloseTo(4, 9);
    });

    it("returns nothing for unknown materials", () => {
      const { contributions, truncated } = resolveContributions(ref, "mystery", 5, 10);
      expect(contributions.size).toBe(0);
      expect(truncated).toBe(false);
    });
  });
});
