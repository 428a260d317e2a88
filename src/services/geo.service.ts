/**
 * Geo Service
 * Geospatial calculations for GPS data using Turf.js
 *
 * This service provides utility functions for:
 * - Calculating distances between GPS points (Haversine formula)
 * - Measuring point-to-segment distances (for surface matching)
 * - Finding segment midpoints
 * - Computing bounding boxes around GPS tracks
 *
 * All distance calculations return values in METERS.
 *
 * Dependencies:
 * - @turf/turf: Industry-standard geospatial library
 */

import * as turf from "@turf/turf";
import type { BoundingBox, LngLat } from "../types/track.types.js";

/** Anything with a latitude and longitude */
export interface GeoPoint {
  lat: number;
  lng: number;
}

/**
 * Meters per degree used when converting a buffer in meters to degrees.
 * Slightly under the true ~111,195m so the converted buffer errs wide.
 */
export const METERS_PER_DEGREE = 111000;

// ============================================
// Distance Calculations
// ============================================

/**
 * Great-circle distance between two points in meters
 *
 * @example
 * distance({ lat: 0, lng: 0 }, { lat: 0, lng: 0.001 });
 * // Returns: 111.195 (meters)
 */
export function distance(from: GeoPoint, to: GeoPoint): number {
  return turf.distance(
    turf.point([from.lng, from.lat]),
    turf.point([to.lng, to.lat]),
    { units: "meters" }
  );
}

/**
 * Calculate total distance of a GPS track in meters
 *
 * Sums the distance between each consecutive pair of points.
 * Not rounded: the surface lengths are compared against this total.
 */
export function calculateTotalDistance(points: readonly GeoPoint[]): number {
  // Need at least 2 points to calculate distance
  if (points.length < 2) return 0;

  let totalDistance = 0;
  for (let i = 1; i < points.length; i++) {
    totalDistance += distance(points[i - 1], points[i]);
  }
  return totalDistance;
}

// ============================================
// Point-to-Segment Distance
// ============================================

/**
 * Shortest distance in meters from a point to the segment start → end
 *
 * Used to decide whether a track segment lies on a tagged way.
 * A zero-length segment degrades to point-to-point distance.
 *
 * @example
 * const d = pointToSegmentDistance(
 *   { lat: 0.0001, lng: 0 },
 *   { lat: 0, lng: -0.001 },
 *   { lat: 0, lng: 0.001 }
 * );
 * // Returns: ~11.12 (meters)
 */
export function pointToSegmentDistance(
  point: GeoPoint,
  segmentStart: GeoPoint,
  segmentEnd: GeoPoint
): number {
  if (segmentStart.lat === segmentEnd.lat && segmentStart.lng === segmentEnd.lng) {
    return distance(point, segmentStart);
  }

  const line = turf.lineString([
    [segmentStart.lng, segmentStart.lat],
    [segmentEnd.lng, segmentEnd.lat],
  ]);
  return turf.pointToLineDistance(turf.point([point.lng, point.lat]), line, {
    units: "meters",
  });
}

/**
 * Same as pointToSegmentDistance, for [lng, lat] vertices of a way geometry
 */
export function pointToVertexSegmentDistance(
  point: GeoPoint,
  start: LngLat,
  end: LngLat
): number {
  return pointToSegmentDistance(
    point,
    { lat: start[1], lng: start[0] },
    { lat: end[1], lng: end[0] }
  );
}

/**
 * Geodesic midpoint of a track segment
 */
export function segmentMidpoint(start: GeoPoint, end: GeoPoint): GeoPoint {
  const mid = turf.midpoint(
    turf.point([start.lng, start.lat]),
    turf.point([end.lng, end.lat])
  );
  const [lng, lat] = mid.geometry.coordinates;
  return { lat, lng };
}

// ============================================
// Bounding Box Calculation
// ============================================

/**
 * Calculate bounding box around GPS points with buffer
 *
 * Creates a rectangular region that contains all GPS points,
 * plus a buffer zone around them, so ways just beside the track
 * (within the matching tolerance) are part of the geodata query.
 *
 * @param points - Array of GPS coordinates (at least one)
 * @param bufferMeters - Buffer added on every side
 *
 * @example
 * const bbox = calculateBoundingBox(
 *   [{ lat: 50.7989, lng: -1.0912 }, { lat: 50.8010, lng: -1.0950 }],
 *   0
 * );
 * // Returns: { south: 50.7989, north: 50.801, west: -1.095, east: -1.0912 }
 */
export function calculateBoundingBox(
  points: readonly GeoPoint[],
  bufferMeters: number
): BoundingBox {
  let south = Infinity;
  let north = -Infinity;
  let west = Infinity;
  let east = -Infinity;

  for (const p of points) {
    south = Math.min(south, p.lat);
    north = Math.max(north, p.lat);
    west = Math.min(west, p.lng);
    east = Math.max(east, p.lng);
  }

  const latBuffer = bufferMeters / METERS_PER_DEGREE;
  const lngBuffer = bufferMeters / (METERS_PER_DEGREE * longitudeScale((south + north) / 2));

  return {
    south: Math.max(-90, south - latBuffer),
    north: Math.min(90, north + latBuffer),
    west: Math.max(-180, west - lngBuffer),
    east: Math.min(180, east + lngBuffer),
  };
}

/**
 * Fraction of an equatorial degree that one degree of longitude spans at
 * this latitude. Floored so the poles don't produce infinite buffers.
 */
export function longitudeScale(lat: number): number {
  return Math.max(Math.cos((lat * Math.PI) / 180), 0.01);
}
