/**
 * Surface Matcher
 *
 * Classifies each track segment by the surface of the way nearest to its
 * midpoint. Segments with no way within tolerance are "unknown".
 */

import { distance, segmentMidpoint, type GeoPoint } from "../../../services/geo.service.js";
import type { SegmentClassification } from "../types.js";
import type { SurfaceIndex } from "./surface-index.js";
import { UNKNOWN_SURFACE } from "./surface-vocabulary.js";

/**
 * Classify one segment.
 */
export function classifySegment(
  start: GeoPoint,
  end: GeoPoint,
  index: SurfaceIndex,
  toleranceMeters: number
): SegmentClassification {
  const lengthMeters = distance(start, end);
  const way = index.nearestWay(segmentMidpoint(start, end), toleranceMeters);

  if (!way) {
    return { lengthMeters, surface: UNKNOWN_SURFACE, osmId: null };
  }
  return { lengthMeters, surface: way.surface, osmId: way.osmId };
}

/**
 * Classify every consecutive pair of points, in track order.
 * A track with fewer than 2 points has no segments.
 *
 * @example
 * const segments = classifyTrackSegments(points, index, 25);
 * // [{ lengthMeters: 111.2, surface: "asphalt", osmId: "way/1" }, ...]
 */
export function classifyTrackSegments(
  points: readonly GeoPoint[],
  index: SurfaceIndex,
  toleranceMeters: number
): SegmentClassification[] {
  const segments: SegmentClassification[] = [];

  for (let i = 1; i < points.length; i++) {
    segments.push(classifySegment(points[i - 1], points[i], index, toleranceMeters));
  }

  return segments;
}
