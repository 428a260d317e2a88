/**
 * Surface Index
 *
 * Grid spatial index over the segments of every tagged way in one analysis
 * region. Each way segment is bucketed into every grid cell its bounding box
 * touches; a query only measures segments in the cells covering the search
 * radius instead of every way in the region.
 *
 * Built once per analysis and never mutated afterwards.
 */

import {
  METERS_PER_DEGREE,
  longitudeScale,
  pointToVertexSegmentDistance,
  type GeoPoint,
} from "../../../services/geo.service.js";
import type { RawTaggedWay, TaggedWay } from "../types.js";
import { canonicalizeSurfaceTag } from "./surface-vocabulary.js";

/** Distances closer than this (meters) are treated as a tie */
const TIE_EPSILON_METERS = 1e-9;

/** One edge of one way */
interface SegmentRef {
  wayOrder: number;
  vertex: number; // segment runs vertex → vertex + 1
}

export class SurfaceIndex {
  private readonly ways = new Map<number, TaggedWay>();
  private readonly cells = new Map<string, SegmentRef[]>();

  private constructor(ways: readonly TaggedWay[], private readonly cellDegrees: number) {
    for (const way of ways) {
      this.ways.set(way.order, way);
      for (let v = 0; v < way.geometry.length - 1; v++) {
        const [lngA, latA] = way.geometry[v];
        const [lngB, latB] = way.geometry[v + 1];
        // Segment wraps the antimeridian; its lng extent would cover the globe
        if (Math.abs(lngB - lngA) > 180) continue;
        this.insert(
          { wayOrder: way.order, vertex: v },
          Math.min(lngA, lngB),
          Math.min(latA, latB),
          Math.max(lngA, lngB),
          Math.max(latA, latB)
        );
      }
    }
  }

  /**
   * Build an index from ways in geodata fetch order.
   * Surface tags are canonicalized here; ways with fewer than 2 vertices
   * are dropped but keep their fetch position for tie-breaking.
   */
  static build(rawWays: readonly RawTaggedWay[], cellDegrees: number): SurfaceIndex {
    if (!(cellDegrees > 0)) {
      throw new RangeError(`Index cell size must be positive, got ${cellDegrees}`);
    }

    const ways: TaggedWay[] = [];
    rawWays.forEach((raw, order) => {
      if (raw.geometry.length < 2) return;
      ways.push(
        Object.freeze({
          osmId: raw.osmId,
          order,
          geometry: Object.freeze(raw.geometry.map(([lng, lat]): [number, number] => [lng, lat])),
          surface: canonicalizeSurfaceTag(raw.surfaceTag),
        })
      );
    });

    return new SurfaceIndex(ways, cellDegrees);
  }

  get wayCount(): number {
    return this.ways.size;
  }

  /**
   * Nearest way to `point` by point-to-segment distance, or null when no
   * way is within maxDistanceMeters.
   *
   * Equal distances resolve to the way fetched first.
   */
  nearestWay(point: GeoPoint, maxDistanceMeters: number): TaggedWay | null {
    if (this.ways.size === 0) return null;

    const latRadius = maxDistanceMeters / METERS_PER_DEGREE;
    const lngRadius = Math.min(
      maxDistanceMeters / (METERS_PER_DEGREE * longitudeScale(point.lat)),
      360
    );

    let best: TaggedWay | null = null;
    let bestDistance = Infinity;

    for (const ref of this.query(
      point.lng - lngRadius,
      point.lat - latRadius,
      point.lng + lngRadius,
      point.lat + latRadius
    )) {
      const way = this.ways.get(ref.wayOrder);
      if (!way) continue;

      const d = pointToVertexSegmentDistance(
        point,
        way.geometry[ref.vertex],
        way.geometry[ref.vertex + 1]
      );
      if (d > maxDistanceMeters) continue;

      const closer = d < bestDistance - TIE_EPSILON_METERS;
      const tiedEarlier =
        best !== null &&
        Math.abs(d - bestDistance) <= TIE_EPSILON_METERS &&
        way.order < best.order;

      if (closer || tiedEarlier) {
        best = way;
        bestDistance = Math.min(d, bestDistance);
      }
    }

    return best;
  }

  private key(ix: number, iy: number): string {
    return `${ix}:${iy}`;
  }

  private cellIndex(degrees: number): number {
    return Math.floor(degrees / this.cellDegrees);
  }

  private insert(
    ref: SegmentRef,
    minLng: number,
    minLat: number,
    maxLng: number,
    maxLat: number
  ): void {
    for (let x = this.cellIndex(minLng); x <= this.cellIndex(maxLng); x++) {
      for (let y = this.cellIndex(minLat); y <= this.cellIndex(maxLat); y++) {
        const bucketKey = this.key(x, y);
        const bucket = this.cells.get(bucketKey);
        if (bucket) bucket.push(ref);
        else this.cells.set(bucketKey, [ref]);
      }
    }
  }

  /** Distinct segments in the cells overlapping the box, in way order */
  private query(minLng: number, minLat: number, maxLng: number, maxLat: number): SegmentRef[] {
    const seen = new Set<string>();
    const refs: SegmentRef[] = [];

    for (let x = this.cellIndex(minLng); x <= this.cellIndex(maxLng); x++) {
      for (let y = this.cellIndex(minLat); y <= this.cellIndex(maxLat); y++) {
        const bucket = this.cells.get(this.key(x, y));
        if (!bucket) continue;
        for (const ref of bucket) {
          const id = `${ref.wayOrder}:${ref.vertex}`;
          if (seen.has(id)) continue;
          seen.add(id);
          refs.push(ref);
        }
      }
    }

    return refs.sort((a, b) => a.wayOrder - b.wayOrder || a.vertex - b.vertex);
  }
}
