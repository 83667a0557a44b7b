/**
 * CONTRIBUTION RESOLVER
 *
 * Expands a material into the constituents it carries into the finished
 * product. Compound materials (essential oils, Schiff bases, bases and
 * accords) are walked level by level over the contributions table with an
 * explicit work stack; the depth counter stops cyclic or runaway graphs.
 */

import type { ReferenceData } from "../referenceData";
import { isDecomposable, isMappedStandard } from "../referenceData";

// ============================================================================
// TYPES
// ============================================================================

/**
 * How a constituent key is treated. A key may be both a mapped standard and
 * decomposable, in which case both paths contribute.
 */
export type ConstituentKind = "mapped-standard" | "decomposable" | "leaf";

export interface ResolutionOutcome {
  /** constituent key → % of finished product */
  contributions: Map<string, number>;
  /** True when some branch went past the depth limit and was dropped */
  truncated: boolean;
}

interface Frame {
  key: string;
  concentration: number;
  depth: number;
}

// ============================================================================
// RESOLVER
// ============================================================================

export function classifyConstituent(ref: ReferenceData, key: string): ConstituentKind[] {
  const kinds: ConstituentKind[] = [];
  if (isMappedStandard(ref, key)) kinds.push("mapped-standard");
  if (isDecomposable(ref, key)) kinds.push("decomposable");
  if (kinds.length === 0) kinds.push("leaf");
  return kinds;
}

/**
 * Resolve `materialKey` present at `concentration` (% of finished product).
 * Levels 0..maxDepth are expanded; anything deeper is dropped and reported
 * through `truncated`.
 */
export function resolveContributions(
  ref: ReferenceData,
  materialKey: string,
  concentration: number,
  maxDepth: number,
  startDepth: number = 0
): ResolutionOutcome {
  const contributions = new Map<string, number>();
  let truncated = false;
  const stack: Frame[] = [{ key: materialKey, concentration, depth: startDepth }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;

    if (frame.depth > maxDepth) {
      truncated = true;
      continue;
    }

    const record = ref.contributions.get(frame.key);
    if (!record) continue;

    for (const constituent of record.constituents) {
      const absolute = frame.concentration * (constituent.percentage / 100);

      for (const kind of classifyConstituent(ref, constituent.key)) {
        if (kind === "decomposable") {
          stack.push({ key: constituent.key, concentration: absolute, depth: frame.depth + 1 });
        } else {
          contributions.set(constituent.key, (contributions.get(constituent.key) ?? 0) + absolute);
        }
      }
    }
  }

  return { contributions, truncated };
}
