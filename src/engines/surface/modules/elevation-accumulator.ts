/**
 * Elevation Accumulator
 *
 * Total ascent and descent over a sequence of elevation samples. Deltas
 * smaller than the noise threshold are dropped; missing samples are skipped
 * and the next valid sample is compared with the last valid one.
 */

import type { ElevationResult, Trackpoint } from "../types.js";

export class ElevationAccumulator {
  private up = 0;
  private down = 0;
  private previous: number | undefined;

  constructor(private readonly noiseThresholdMeters: number) {}

  add(elevation: number | undefined): void {
    if (elevation === undefined || !Number.isFinite(elevation)) return;

    if (this.previous !== undefined) {
      const delta = elevation - this.previous;
      if (Math.abs(delta) >= this.noiseThresholdMeters) {
        if (delta > 0) this.up += delta;
        else this.down += -delta;
      }
    }

    this.previous = elevation;
  }

  result(): ElevationResult {
    return { up: this.up, down: this.down };
  }
}

/**
 * @example
 * accumulateElevation(
 *   [{ lat: 0, lng: 0, elevation: 100 }, { lat: 0, lng: 0, elevation: 150 }, { lat: 0, lng: 0, elevation: 120 }],
 *   0.5
 * );
 * // Returns: { up: 50, down: 30 }
 */
export function accumulateElevation(
  points: readonly Pick<Trackpoint, "elevation">[],
  noiseThresholdMeters: number
): ElevationResult {
  const accumulator = new ElevationAccumulator(noiseThresholdMeters);
  for (const point of points) accumulator.add(point.elevation);
  return accumulator.result();
}
