import { z } from "zod";

// ============== STANDARDS ==============
export type StandardType = "restriction" | "phototoxicity" | "specification-only";

// Reference files spell the type freely ("PHOTOTOXICITY", "Specification", ...)
export function classifyStandardType(raw: string): StandardType {
  const lower = raw.toLowerCase();
  if (lower.includes("phototox")) return "phototoxicity";
  if (lower.includes("spec")) return "specification-only";
  return "restriction";
}

export const standardRecordSchema = z.object({
  name: z.string().min(1),
  type: z.string().default("restriction"),
  limit_cat4: z.number().nonnegative().nullable().optional(),
});

export const standardsFileSchema = z.object({
  metadata: z.record(standardRecordSchema),
  cas_mapping: z.record(z.array(z.string())),
});

export type StandardsFile = z.infer<typeof standardsFileSchema>;

// ============== CONTRIBUTIONS ==============
export const contributionRecordSchema = z.object({
  name: z.string().optional(),
  constituents: z.record(z.number().min(0).max(100)).default({}),
});

export const contributionsFileSchema = z.record(contributionRecordSchema);

export type ContributionsFile = z.infer<typeof contributionsFileSchema>;

// ============== FORMULA ==============
// Numbers may arrive as numeric strings from text or spreadsheet sources.
export const numericInputSchema = z
  .union([z.number(), z.string().trim().min(1)])
  .pipe(z.coerce.number().finite().nonnegative());

const optionalKeySchema = z
  .string()
  .nullable()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v : undefined));

export const formulaEntryInputSchema = z.object({
  name: z.string().trim().min(1),
  cas: optionalKeySchema,
  sku: optionalKeySchema,
  amount: numericInputSchema.optional(),
  concentration: numericInputSchema.optional(),
});

interface FormulaEntryBase {
  name: string;
  cas?: string;
  sku?: string;
}

export interface AmountEntry extends FormulaEntryBase {
  kind: "amount";
  /** Mass or parts, relative to the other amount entries */
  amount: number;
}

export interface ConcentrationEntry extends FormulaEntryBase {
  kind: "concentration";
  /** Percentage of the concentrate */
  concentration: number;
}

export type FormulaEntry = AmountEntry | ConcentrationEntry;

export const finishedDosageSchema = z.number().gt(0).max(100);

export const complianceRequestSchema = z.object({
  formula: z.array(z.unknown()).min(1),
  finishedDosage: z.number().default(100),
});

export const formulaParseRequestSchema = z.object({
  text: z.string(),
});

export const formulaScaleRequestSchema = z.discriminatedUnion("mode", [
  z.object({
    mode: z.literal("multiplier"),
    formula: z.array(z.unknown()).min(1),
    factor: z.number().positive(),
  }),
  z.object({
    mode: z.literal("total"),
    formula: z.array(z.unknown()).min(1),
    targetTotal: z.number().positive(),
  }),
]);

// ============== RESULTS ==============
export interface SourceAttribution {
  name: string;
  concentration: number;
}

export interface StandardResult {
  standardId: string;
  standardName: string;
  type: StandardType;
  concentration: number;
  limit: number | "specification";
  pass: boolean;
  ratio: number;
  exceedancePerc: number;
  sources: SourceAttribution[];
  sourceSummary: string;
}

export interface PhototoxicityResult {
  sumOfRatios: number;
  pass: boolean;
  exceedancePerc: number;
}

export interface ComplianceResult {
  isCompliant: boolean;
  results: StandardResult[];
  phototoxicity: PhototoxicityResult;
  criticalComponent: string | null;
  maxSafeDosage: number;
  finishedDosage: number;
  unresolvedMaterials: string[];
  dataIntegrityWarnings: string[];
  /** Materials whose constituent graph was cut at the depth limit */
  truncatedMaterials: string[];
}

// ============== MATERIAL LOOKUP ==============
export interface MaterialSearchHit {
  key: string;
  name: string;
  constituentCount: number;
}

export interface ConstituentBreakdown {
  key: string;
  percentage: number;
  kind: "standard" | "constituent";
}

export interface MaterialBreakdown {
  key: string;
  name: string;
  constituents: ConstituentBreakdown[];
  totalPercentage: number;
  complete: boolean;
}
