/**
 * REFERENCE DATA
 *
 * Immutable lookup tables the engine calculates against:
 * - Standards (id → name, type, category 4 limit)
 * - CAS mapping (CAS → standard ids)
 * - Material contributions (material key → constituent breakdown)
 *
 * Loaded once and passed explicitly into every engine call.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { ZodError } from "zod";
import {
  classifyStandardType,
  contributionsFileSchema,
  standardsFileSchema,
  type ContributionsFile,
  type StandardType,
  type StandardsFile,
} from "@shared/schema";
import { ReferenceDataError, type FieldIssue } from "./errors";

// ============================================================================
// TYPES
// ============================================================================

export interface Standard {
  id: string;
  name: string;
  type: StandardType;
  limitCat4?: number;
}

export interface Constituent {
  key: string;
  percentage: number;
}

export interface ContributionRecord {
  key: string;
  name: string;
  constituents: readonly Constituent[];
}

export interface ReferenceData {
  standards: ReadonlyMap<string, Standard>;
  casMapping: ReadonlyMap<string, readonly string[]>;
  contributions: ReadonlyMap<string, ContributionRecord>;
}

export interface ReferenceDataPaths {
  standardsPath: string;
  contributionsPath: string;
}

// ============================================================================
// KEYS
// ============================================================================

/** CAS numbers, SKUs, names and table keys all compare trimmed and lower-cased. */
export function normalizeKey(raw: string | null | undefined): string | null {
  if (raw === null || raw === undefined) return null;
  const key = raw.trim().toLowerCase();
  return key.length > 0 ? key : null;
}

export function isMappedStandard(ref: ReferenceData, key: string): boolean {
  return ref.casMapping.has(key);
}

export function isDecomposable(ref: ReferenceData, key: string): boolean {
  return ref.contributions.has(key);
}

export function declaredTotal(record: ContributionRecord): number {
  return record.constituents.reduce((sum, c) => sum + c.percentage, 0);
}

// ============================================================================
// CONSTRUCTION
// ============================================================================

export function buildReferenceData(
  standardsFile: StandardsFile,
  contributionsFile: ContributionsFile
): ReferenceData {
  const standards = new Map<string, Standard>();
  for (const [id, raw] of Object.entries(standardsFile.metadata)) {
    const standard: Standard = {
      id,
      name: raw.name,
      type: classifyStandardType(raw.type),
    };
    if (raw.limit_cat4 !== null && raw.limit_cat4 !== undefined) {
      standard.limitCat4 = raw.limit_cat4;
    }
    standards.set(id, Object.freeze(standard));
  }

  const casMapping = new Map<string, readonly string[]>();
  for (const [cas, ids] of Object.entries(standardsFile.cas_mapping)) {
    const key = normalizeKey(cas);
    if (!key) continue;
    const merged = [...(casMapping.get(key) ?? [])];
    for (const id of ids) {
      if (!merged.includes(id)) merged.push(id);
    }
    casMapping.set(key, Object.freeze(merged));
  }

  const contributions = new Map<string, ContributionRecord>();
  for (const [rawKey, raw] of Object.entries(contributionsFile)) {
    const key = normalizeKey(rawKey);
    if (!key) continue;
    const constituents: Constituent[] = [];
    for (const [constituentKey, percentage] of Object.entries(raw.constituents)) {
      const normalized = normalizeKey(constituentKey);
      if (normalized) constituents.push(Object.freeze({ key: normalized, percentage }));
    }
    contributions.set(
      key,
      Object.freeze({ key, name: raw.name ?? rawKey, constituents: Object.freeze(constituents) })
    );
  }

  return Object.freeze({ standards, casMapping, contributions });
}

function toIssues(error: ZodError): FieldIssue[] {
  return error.errors.map((issue) => ({
    field: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Validate raw (already JSON-decoded) tables and build the lookup maps.
 */
export function parseReferenceData(
  rawStandards: unknown,
  rawContributions: unknown,
  sources: { standards: string; contributions: string } = {
    standards: "standards",
    contributions: "contributions",
  }
): ReferenceData {
  const standards = standardsFileSchema.safeParse(rawStandards);
  if (!standards.success) {
    throw new ReferenceDataError(
      `Standards table ${sources.standards} is malformed`,
      sources.standards,
      toIssues(standards.error)
    );
  }

  const contributions = contributionsFileSchema.safeParse(rawContributions);
  if (!contributions.success) {
    throw new ReferenceDataError(
      `Contributions table ${sources.contributions} is malformed`,
      sources.contributions,
      toIssues(contributions.error)
    );
  }

  return buildReferenceData(standards.data, contributions.data);
}

async function readJson(filePath: string): Promise<unknown> {
  const raw = await fs.promises.readFile(filePath, "utf8");
  try {
    return JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ReferenceDataError(`${filePath} is not valid JSON`, filePath, [
      { field: "", message },
    ]);
  }
}

export async function loadReferenceData(
  paths: ReferenceDataPaths,
  baseDir: string = process.cwd()
): Promise<ReferenceData> {
  const standardsPath = path.resolve(baseDir, paths.standardsPath);
  const contributionsPath = path.resolve(baseDir, paths.contributionsPath);

  const [rawStandards, rawContributions] = await Promise.all([
    readJson(standardsPath),
    readJson(contributionsPath),
  ]);

  const ref = parseReferenceData(rawStandards, rawContributions, {
    standards: standardsPath,
    contributions: contributionsPath,
  });

  console.log(
    `[ReferenceData] Loaded ${ref.standards.size} standards, ${ref.casMapping.size} CAS mappings, ${ref.contributions.size} materials`
  );
  return ref;
}
