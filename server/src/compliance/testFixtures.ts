import type { ContributionsFile, StandardsFile } from "@shared/schema";
import { parseReferenceData, type ReferenceData } from "./referenceData";

// Standards in a fixed order: evaluation output follows this order.
export const TEST_STANDARDS: StandardsFile = {
  metadata: {
    R20: { name: "Restricted X", type: "RESTRICTION", limit_cat4: 20 },
    HC: { name: "Hydroxycitronellal", type: "RESTRICTION", limit_cat4: 1 },
    PH1: { name: "Photo One", type: "PHOTOTOXICITY", limit_cat4: 1 },
    PH2: { name: "Photo Two", type: "PHOTOTOXICITY", limit_cat4: 2 },
    LIN: { name: "Linalool", type: "SPECIFICATION", limit_cat4: null },
    ZERO: { name: "Prohibited Z", type: "RESTRICTION", limit_cat4: 0 },
    CIT: { name: "Citral", type: "RESTRICTION", limit_cat4: 0.6 },
  },
  cas_mapping: {
    x: ["R20"],
    "107-75-5": ["HC"],
    "p-1": ["PH1"],
    "p-2": ["PH2"],
    "78-70-6": ["LIN"],
    "banned-1": ["ZERO"],
    "5392-40-5": ["CIT"],
    "oil-b": ["PH1", "CIT"],
  },
};

function chain(length: number): ContributionsFile {
  const links: ContributionsFile = {};
  for (let i = 0; i < length; i++) {
    links[`chain-${i}`] = { name: `Chain ${i}`, constituents: { [`chain-${i + 1}`]: 100 } };
  }
  links[`chain-${length}`] = { name: `Chain ${length}`, constituents: { "107-75-5": 100 } };
  return links;
}

export const TEST_CONTRIBUTIONS: ContributionsFile = {
  "compound a": {
    name: "Compound A",
    constituents: { "107-75-5": 50, "78-70-6": 30, "leaf-1": 10 },
  },
  "cycle-a": { name: "Cycle A", constituents: { "cycle-b": 100 } },
  "cycle-b": { name: "Cycle B", constituents: { "cycle-a": 100, "107-75-5": 1 } },
  "oil-b": { name: "Oil B", constituents: { "5392-40-5": 2 } },
  "bergamot fcf": { name: "Bergamot FCF", constituents: { "oil-b": 100 } },
  bergamot: { name: "Bergamot", constituents: { "oil-b": 100 } },
  "lemon distilled": { name: "Lemon Distilled", constituents: { "p-1": 100 } },
  "lime terpeneless": { name: "Lime Terpeneless", constituents: { "p-1": 100 } },
  partial: { name: "Partial Absolute", constituents: { "107-75-5": 20, "leaf-2": 40.04 } },
  "vanillin 10% in dpg": { name: "Vanillin 10% in DPG", constituents: { "leaf-3": 10 } },
  ...chain(12),
};

export function buildTestReferenceData(): ReferenceData {
  return parseReferenceData(TEST_STANDARDS, TEST_CONTRIBUTIONS);
}
