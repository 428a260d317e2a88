/**
 * Geo Service Tests
 * Distances, segment midpoints and buffered bounding boxes
 */

import { describe, it, expect } from "vitest";
import {
  calculateBoundingBox,
  calculateTotalDistance,
  distance,
  pointToSegmentDistance,
  segmentMidpoint,
} from "../services/geo.service.js";

describe("distance", () => {
  it("measures 0.001° of longitude at the equator as ~111.195m", () => {
    expect(distance({ lat: 0, lng: 0 }, { lat: 0, lng: 0.001 })).toBeCloseTo(111.195, 2);
  });

  it("is zero for identical points", () => {
    expect(distance({ lat: 51.5, lng: -0.1 }, { lat: 51.5, lng: -0.1 })).toBe(0);
  });
});

describe("calculateTotalDistance", () => {
  it("sums consecutive segments", () => {
    const total = calculateTotalDistance([
      { lat: 0, lng: 0 },
      { lat: 0, lng: 0.001 },
      { lat: 0, lng: 0.002 },
    ]);
    expect(total).toBeCloseTo(222.39, 1);
  });

  it("returns 0 for fewer than 2 points", () => {
    expect(calculateTotalDistance([])).toBe(0);
    expect(calculateTotalDistance([{ lat: 10, lng: 10 }])).toBe(0);
  });
});

describe("pointToSegmentDistance", () => {
  it("measures perpendicular distance to the segment", () => {
    const d = pointToSegmentDistance(
      { lat: 0.0001, lng: 0 },
      { lat: 0, lng: -0.001 },
      { lat: 0, lng: 0.001 }
    );
    expect(d).toBeCloseTo(11.12, 1);
  });

  it("measures to the nearest endpoint beyond the segment", () => {
    const d = pointToSegmentDistance(
      { lat: 0, lng: 0.002 },
      { lat: 0, lng: -0.001 },
      { lat: 0, lng: 0.001 }
    );
    expect(d).toBeCloseTo(111.195, 1);
  });

  it("falls back to point distance for a zero-length segment", () => {
    const d = pointToSegmentDistance(
      { lat: 0, lng: 0.001 },
      { lat: 0, lng: 0 },
      { lat: 0, lng: 0 }
    );
    expect(d).toBeCloseTo(111.195, 2);
  });
});

describe("segmentMidpoint", () => {
  it("returns the point halfway along the segment", () => {
    const mid = segmentMidpoint({ lat: 0, lng: 0 }, { lat: 0, lng: 0.002 });
    expect(mid.lat).toBeCloseTo(0, 9);
    expect(mid.lng).toBeCloseTo(0.001, 9);
  });
});

describe("calculateBoundingBox", () => {
  it("wraps the points exactly with no buffer", () => {
    const bbox = calculateBoundingBox(
      [
        { lat: 50.7989, lng: -1.0912 },
        { lat: 50.801, lng: -1.095 },
      ],
      0
    );
    expect(bbox).toEqual({ south: 50.7989, north: 50.801, west: -1.095, east: -1.0912 });
  });

  it("adds the buffer in degrees on every side", () => {
    const bbox = calculateBoundingBox([{ lat: 0, lng: 0 }], 111);
    expect(bbox.south).toBeCloseTo(-0.001, 9);
    expect(bbox.north).toBeCloseTo(0.001, 9);
    expect(bbox.west).toBeCloseTo(-0.001, 9);
    expect(bbox.east).toBeCloseTo(0.001, 9);
  });

  it("clamps to valid coordinates", () => {
    const bbox = calculateBoundingBox([{ lat: 89.9999, lng: 179.9999 }], 1000);
    expect(bbox.north).toBe(90);
    expect(bbox.east).toBe(180);
  });
});
