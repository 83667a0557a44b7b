/**
 * Application Configuration
 *
 * Defaults for the server, the reference-data files and the compliance engine,
 * overridden per deployment through environment variables.
 */

import { z } from "zod";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type LogVerbosity = "minimal" | "standard" | "verbose";

export interface EngineOptions {
  /** Deepest constituent level that is still expanded */
  maxResolutionDepth: number;
  /** Slack allowed when comparing a concentration to its limit */
  passTolerance: number;
  /** Name tokens that exempt a material from phototoxicity aggregation */
  photoExemptTokens: string[];
  /** Declared composition below this total raises an integrity warning */
  integrityThresholdPercent: number;
  /** Name fragments that mark a material as an intentional dilution */
  dilutionMarkers: string[];
}

export interface AppConfig {
  server: {
    port: number;
  };

  referenceData: {
    standardsPath: string;
    contributionsPath: string;
  };

  engine: EngineOptions;

  lookup: {
    materialSearchLimit: number;
  };

  logging: {
    verbosity: LogVerbosity;
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  maxResolutionDepth: 10,
  passTolerance: 1e-9,
  photoExemptTokens: ["FCF", "DISTILLED", "TERPENELESS"],
  integrityThresholdPercent: 90,
  dilutionMarkers: ["% in", "dilution", "(dil)"],
};

export const DEFAULT_APP_CONFIG: AppConfig = {
  server: {
    port: 5000,
  },

  referenceData: {
    standardsPath: "data/standards.json",
    contributionsPath: "data/contributions.json",
  },

  engine: DEFAULT_ENGINE_OPTIONS,

  lookup: {
    materialSearchLimit: 25,
  },

  logging: {
    verbosity: "standard",
  },
};

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT OVERRIDES
// ═══════════════════════════════════════════════════════════════════════════════

const tokenListSchema = z
  .string()
  .transform((raw) => raw.split(",").map((t) => t.trim()).filter((t) => t.length > 0));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).optional(),
  STANDARDS_PATH: z.string().min(1).optional(),
  CONTRIBUTIONS_PATH: z.string().min(1).optional(),
  MAX_RESOLUTION_DEPTH: z.coerce.number().int().min(0).optional(),
  INTEGRITY_THRESHOLD_PERCENT: z.coerce.number().min(0).max(100).optional(),
  PHOTO_EXEMPT_TOKENS: tokenListSchema.optional(),
  MATERIAL_SEARCH_LIMIT: z.coerce.number().int().min(1).optional(),
  LOG_VERBOSITY: z.enum(["minimal", "standard", "verbose"]).optional(),
});

/**
 * Build the configuration from defaults and the given environment.
 * Throws when a variable is set to a value that cannot be used.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.errors
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  const vars = parsed.data;
  const defaults = DEFAULT_APP_CONFIG;

  return {
    server: {
      port: vars.PORT ?? defaults.server.port,
    },
    referenceData: {
      standardsPath: vars.STANDARDS_PATH ?? defaults.referenceData.standardsPath,
      contributionsPath: vars.CONTRIBUTIONS_PATH ?? defaults.referenceData.contributionsPath,
    },
    engine: {
      ...defaults.engine,
      maxResolutionDepth: vars.MAX_RESOLUTION_DEPTH ?? defaults.engine.maxResolutionDepth,
      integrityThresholdPercent:
        vars.INTEGRITY_THRESHOLD_PERCENT ?? defaults.engine.integrityThresholdPercent,
      photoExemptTokens: vars.PHOTO_EXEMPT_TOKENS ?? [...defaults.engine.photoExemptTokens],
      dilutionMarkers: [...defaults.engine.dilutionMarkers],
    },
    lookup: {
      materialSearchLimit: vars.MATERIAL_SEARCH_LIMIT ?? defaults.lookup.materialSearchLimit,
    },
    logging: {
      verbosity: vars.LOG_VERBOSITY ?? defaults.logging.verbosity,
    },
  };
}
