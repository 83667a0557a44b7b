import type { Express, Response } from "express";
import type { ZodError } from "zod";
import {
  complianceRequestSchema,
  formulaParseRequestSchema,
  formulaScaleRequestSchema,
} from "@shared/schema";
import type { AppConfig } from "./src/config";
import type { ComplianceEngine } from "./src/compliance/complianceEngine";
import { FormulaValidationError } from "./src/compliance/errors";
import { validateFormula } from "./src/compliance/engines/formulaNormalizer";
import { describeMaterial, searchMaterials } from "./src/services/materialLookupService";
import { parseFormulaText, scaleFormula } from "./src/services/formulaInputService";

export interface RouteContext {
  engine: ComplianceEngine;
  config: AppConfig;
}

function sendZodError(res: Response, error: ZodError) {
  return res.status(400).json({ error: "Invalid request", details: error.errors });
}

function sendFormulaError(res: Response, error: FormulaValidationError) {
  return res.status(400).json({
    error: error.message,
    entryIndex: error.entryIndex,
    entryName: error.entryName,
    details: error.issues,
  });
}

export function registerRoutes(app: Express, { engine, config }: RouteContext): void {
  const ref = engine.referenceData;

  app.get("/api/health", (_req, res) => {
    res.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      referenceData: {
        standards: ref.standards.size,
        casMappings: ref.casMapping.size,
        materials: ref.contributions.size,
      },
      uptime: process.uptime(),
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // COMPLIANCE
  // ═══════════════════════════════════════════════════════════════════════════════

  app.post("/api/compliance/calculate", (req, res, next) => {
    const parsed = complianceRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendZodError(res, parsed.error);
    }

    try {
      const result = engine.calculate(parsed.data.formula, parsed.data.finishedDosage);
      if (result.unresolvedMaterials.length > 0) {
        console.warn(
          `[Compliance] ${result.unresolvedMaterials.length} material(s) not found in reference data: ${result.unresolvedMaterials.join(", ")}`
        );
      }
      if (result.truncatedMaterials.length > 0) {
        console.warn(
          `[Compliance] Resolution depth limit reached for: ${result.truncatedMaterials.join(", ")}`
        );
      }
      res.json(result);
    } catch (error) {
      if (error instanceof FormulaValidationError) {
        return sendFormulaError(res, error);
      }
      next(error);
    }
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // MATERIAL LOOKUP
  // ═══════════════════════════════════════════════════════════════════════════════

  app.get("/api/materials", (req, res) => {
    const query = typeof req.query.q === "string" ? req.query.q.trim() : "";
    if (!query) {
      return res.status(400).json({ error: "Query parameter 'q' is required" });
    }
    res.json({ query, materials: searchMaterials(ref, query, config.lookup.materialSearchLimit) });
  });

  app.get("/api/materials/:key", (req, res) => {
    const breakdown = describeMaterial(ref, req.params.key, config.engine.integrityThresholdPercent);
    if (!breakdown) {
      return res.status(404).json({ error: "Material not found" });
    }
    res.json(breakdown);
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // FORMULA INPUT
  // ═══════════════════════════════════════════════════════════════════════════════

  app.post("/api/formula/parse", (req, res) => {
    const parsed = formulaParseRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendZodError(res, parsed.error);
    }
    res.json(parseFormulaText(parsed.data.text));
  });

  app.post("/api/formula/scale", (req, res, next) => {
    const parsed = formulaScaleRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendZodError(res, parsed.error);
    }

    try {
      const body = parsed.data;
      const formula = validateFormula(body.formula);
      const scaled =
        body.mode === "multiplier"
          ? scaleFormula(formula, { mode: "multiplier", factor: body.factor })
          : scaleFormula(formula, { mode: "total", targetTotal: body.targetTotal });
      res.json(scaled);
    } catch (error) {
      if (error instanceof FormulaValidationError) {
        return sendFormulaError(res, error);
      }
      next(error);
    }
  });
}
