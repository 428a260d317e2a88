/**
 * Surface Aggregator
 *
 * Reduces per-segment classifications into length per surface label.
 * Addition per key only, so any split of the segments merged in any order
 * gives the same map.
 */

import type { SegmentClassification, SurfaceLabel, SurfaceLengthMap } from "../types.js";
import { SURFACE_LABELS } from "./surface-vocabulary.js";

export function aggregateSurfaceLengths(
  segments: readonly SegmentClassification[]
): SurfaceLengthMap {
  const lengths: SurfaceLengthMap = {};

  for (const segment of segments) {
    lengths[segment.surface] = (lengths[segment.surface] ?? 0) + segment.lengthMeters;
  }

  return lengths;
}

/**
 * Combine two partial aggregations (e.g. from separate chunks of a track).
 */
export function mergeSurfaceLengths(
  a: SurfaceLengthMap,
  b: SurfaceLengthMap
): SurfaceLengthMap {
  const merged: SurfaceLengthMap = { ...a };

  for (const [surface, length] of surfaceEntries(b)) {
    merged[surface] = (merged[surface] ?? 0) + length;
  }

  return merged;
}

/**
 * Present entries of a length map, in vocabulary order.
 */
export function surfaceEntries(lengths: SurfaceLengthMap): [SurfaceLabel, number][] {
  const entries: [SurfaceLabel, number][] = [];

  for (const surface of SURFACE_LABELS) {
    const length = lengths[surface];
    if (length !== undefined) entries.push([surface, length]);
  }

  return entries;
}

export function totalSurfaceLength(lengths: SurfaceLengthMap): number {
  return surfaceEntries(lengths).reduce((sum, [, length]) => sum + length, 0);
}
