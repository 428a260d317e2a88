/**
 * Surface analysis pipeline.
 *
 * Validate -> Bounding box -> Fetch ways -> Index -> Match -> Aggregate -> Score,
 * with elevation accumulated alongside from the same trackpoints.
 */

import { calculateBoundingBox, calculateTotalDistance } from "../../services/geo.service.js";
import { resolveEngineConfig } from "./config.js";
import {
  AnalysisCancelledError,
  GeodataUnavailableError,
  TrackInputError,
} from "./errors.js";
import { accumulateElevation } from "./modules/elevation-accumulator.js";
import { aggregateSurfaceLengths, surfaceEntries } from "./modules/surface-aggregator.js";
import { SurfaceIndex } from "./modules/surface-index.js";
import { classifyTrackSegments } from "./modules/surface-matcher.js";
import { calculateSuitability } from "./modules/suitability-scorer.js";
import type {
  AnalysisResult,
  AnalyzeOptions,
  GeodataClient,
  RawTaggedWay,
  SegmentClassification,
  SurfaceAnalysisResponse,
  SurfaceEngineConfig,
  SurfaceLengthMap,
  Trackpoint,
} from "./types.js";

interface SurfaceClassificationOutcome {
  segments: SegmentClassification[];
  wayCount: number;
  geodataDegraded: boolean;
  warnings: string[];
}

/**
 * Analyze a track's surfaces, bike suitability and elevation.
 *
 * @param trackpoints - Track in recorded order (at least one point)
 * @param geodataClient - Source of surface-tagged ways
 * @throws TrackInputError if the track is empty or has invalid coordinates
 * @throws GeodataUnavailableError if the geodata fetch fails and the policy is "fail"
 * @throws AnalysisCancelledError if options.signal aborts during the fetch
 *
 * @example
 * const result = await analyzeTrack(points, overpassClient);
 * // result.surfaceLengthsKm → { asphalt: 12.4, gravel: 3.1, unknown: 0.6 }
 */
export async function analyzeTrack(
  trackpoints: readonly Trackpoint[],
  geodataClient: GeodataClient,
  options: AnalyzeOptions = {}
): Promise<AnalysisResult> {
  const config = resolveEngineConfig(options.config);

  validateTrackpoints(trackpoints);

  // Elevation never waits on, or fails because of, the geodata source
  const [elevation, classification] = await Promise.all([
    Promise.resolve().then(() =>
      accumulateElevation(trackpoints, config.elevationNoiseThresholdMeters)
    ),
    classifySurfaces(trackpoints, geodataClient, config, options.signal),
  ]);

  const lengthsMeters = aggregateSurfaceLengths(classification.segments);

  return {
    surfaceLengthsKm: toKilometers(lengthsMeters),
    suitability: calculateSuitability(lengthsMeters),
    elevation,
    diagnostics: {
      pointCount: trackpoints.length,
      segmentCount: classification.segments.length,
      matchedSegmentCount: classification.segments.filter((s) => s.osmId !== null).length,
      wayCount: classification.wayCount,
      totalDistanceMeters: calculateTotalDistance(trackpoints),
      geodataDegraded: classification.geodataDegraded,
      warnings: classification.warnings,
    },
  };
}

/**
 * Reject empty tracks, coordinates outside lat [-90, 90] / lng [-180, 180],
 * and tracks crossing the antimeridian.
 * Elevation is not validated: unusable values are skipped by the accumulator.
 */
export function validateTrackpoints(trackpoints: readonly Trackpoint[]): void {
  if (trackpoints.length === 0) {
    throw new TrackInputError("Track must contain at least one trackpoint");
  }

  trackpoints.forEach((p, i) => {
    const validLat = Number.isFinite(p.lat) && p.lat >= -90 && p.lat <= 90;
    const validLng = Number.isFinite(p.lng) && p.lng >= -180 && p.lng <= 180;
    if (!validLat || !validLng) {
      throw new TrackInputError(
        `Trackpoint ${i} has invalid coordinates (lat=${p.lat}, lng=${p.lng})`
      );
    }
    // A bounding box can't wrap ±180, so it would span every longitude
    if (i > 0 && Math.abs(p.lng - trackpoints[i - 1].lng) > 180) {
      throw new TrackInputError(
        `Track crosses the antimeridian between trackpoints ${i - 1} and ${i}`
      );
    }
  });
}

async function classifySurfaces(
  trackpoints: readonly Trackpoint[],
  geodataClient: GeodataClient,
  config: SurfaceEngineConfig,
  signal: AbortSignal | undefined
): Promise<SurfaceClassificationOutcome> {
  // No segments to classify, so nothing to fetch
  if (trackpoints.length < 2) {
    return { segments: [], wayCount: 0, geodataDegraded: false, warnings: [] };
  }

  const bbox = calculateBoundingBox(trackpoints, config.matchToleranceMeters);
  const fetched = await fetchWays(geodataClient, bbox, config, signal);

  const index = SurfaceIndex.build(fetched.ways, config.indexCellDegrees);
  const segments = classifyTrackSegments(trackpoints, index, config.matchToleranceMeters);

  console.log(
    `[SurfaceEngine] Classified ${segments.length} segments against ${index.wayCount} ways`
  );

  return {
    segments,
    wayCount: index.wayCount,
    geodataDegraded: fetched.warning !== undefined,
    warnings: fetched.warning ? [fetched.warning] : [],
  };
}

async function fetchWays(
  geodataClient: GeodataClient,
  bbox: ReturnType<typeof calculateBoundingBox>,
  config: SurfaceEngineConfig,
  signal: AbortSignal | undefined
): Promise<{ ways: RawTaggedWay[]; warning?: string }> {
  if (signal?.aborted) throw new AnalysisCancelledError(signal.reason);

  try {
    return { ways: await geodataClient.fetchTaggedWays(bbox, { signal }) };
  } catch (error) {
    if (signal?.aborted) throw new AnalysisCancelledError(error);

    const message = `Geodata source unavailable: ${
      error instanceof Error ? error.message : String(error)
    }`;

    if (config.geodataFailurePolicy === "fail") {
      throw new GeodataUnavailableError(message, error);
    }

    console.warn(`[SurfaceEngine] ${message}. Classifying every segment as unknown.`);
    return { ways: [], warning: message };
  }
}

function toKilometers(lengthsMeters: SurfaceLengthMap): SurfaceLengthMap {
  const km: SurfaceLengthMap = {};
  for (const [surface, meters] of surfaceEntries(lengthsMeters)) {
    km[surface] = meters / 1000;
  }
  return km;
}

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Serialize for the HTTP response: kilometers to 3 decimals, scores and
 * elevation to 2.
 */
export function toSurfaceAnalysisResponse(result: AnalysisResult): SurfaceAnalysisResponse {
  const surfaceLengths: SurfaceLengthMap = {};
  for (const [surface, km] of surfaceEntries(result.surfaceLengthsKm)) {
    surfaceLengths[surface] = round(km, 3);
  }

  return {
    surface_lengths_km: surfaceLengths,
    suitability_scores: {
      roadbike: round(result.suitability.roadbike, 2),
      gravelbike: round(result.suitability.gravelbike, 2),
    },
    elevation: {
      elevation_up: round(result.elevation.up, 2),
      elevation_down: round(result.elevation.down, 2),
    },
  };
}
