/**
 * Suitability Scorer
 *
 * Length-weighted average of per-surface weights, one score per bike type.
 */

import { SURFACE_SUITABILITY } from "../config.js";
import type { SuitabilityScores, SurfaceLengthMap } from "../types.js";
import { surfaceEntries, totalSurfaceLength } from "./surface-aggregator.js";

/**
 * Score a route from its surface composition.
 *
 * score = Σ weight(surface) × length(surface) / total length
 *
 * Units of the map don't matter (meters and kilometers score the same).
 * An empty or zero-length map scores 0 for both bikes.
 *
 * @example
 * calculateSuitability({ asphalt: 1500, gravel: 500 });
 * // Returns: { roadbike: 0.75, gravelbike: 0.85 }
 */
export function calculateSuitability(
  lengths: SurfaceLengthMap,
  weights: typeof SURFACE_SUITABILITY = SURFACE_SUITABILITY
): SuitabilityScores {
  const total = totalSurfaceLength(lengths);
  if (!(total > 0)) {
    return { roadbike: 0, gravelbike: 0 };
  }

  let roadbike = 0;
  let gravelbike = 0;

  for (const [surface, length] of surfaceEntries(lengths)) {
    roadbike += weights[surface].roadbike * length;
    gravelbike += weights[surface].gravelbike * length;
  }

  return { roadbike: roadbike / total, gravelbike: gravelbike / total };
}
