/**
 * Surface Engine Type Definitions
 *
 * Track segments are matched to tagged OSM ways; lengths are summed per
 * surface label and scored per bike type.
 */

import type { BoundingBox, LngLat, Trackpoint } from "../../types/track.types.js";
import type { SurfaceLabel } from "./modules/surface-vocabulary.js";

export type { SurfaceLabel };

// ============================================
// Geodata Boundary
// ============================================

/** A way as returned by a geodata source, surface tag still raw */
export interface RawTaggedWay {
  osmId: string;
  geometry: LngLat[]; // [lng, lat] pairs, at least 2
  surfaceTag?: string;
}

export interface GeodataFetchOptions {
  signal?: AbortSignal;
}

/**
 * Source of tagged way geometries for a bounding region.
 * Implemented by the Overpass client and the caching decorator.
 */
export interface GeodataClient {
  fetchTaggedWays(
    bbox: BoundingBox,
    options?: GeodataFetchOptions
  ): Promise<RawTaggedWay[]>;
}

// ============================================
// Surface Index Types
// ============================================

/** A way with its surface canonicalized, owned by one SurfaceIndex */
export interface TaggedWay {
  readonly osmId: string;
  /** Position in the geodata response; lower wins distance ties */
  readonly order: number;
  readonly geometry: readonly LngLat[];
  readonly surface: SurfaceLabel;
}

// ============================================
// Matching & Aggregation Types
// ============================================

/** Classification of one track segment */
export interface SegmentClassification {
  lengthMeters: number;
  surface: SurfaceLabel;
  osmId: string | null;
}

/** Surface label → accumulated length. Only encountered labels are present. */
export type SurfaceLengthMap = Partial<Record<SurfaceLabel, number>>;

export interface SuitabilityScores {
  roadbike: number;
  gravelbike: number;
}

export type BikeType = keyof SuitabilityScores;

export interface ElevationResult {
  up: number;
  down: number;
}

// ============================================
// Analysis Types
// ============================================

/** What to do when the geodata source cannot be reached */
export type GeodataFailurePolicy = "fail" | "degrade";

export interface SurfaceEngineConfig {
  /** Max distance from a segment midpoint to a way, in meters */
  matchToleranceMeters: number;
  /** Elevation deltas smaller than this (meters) count as zero */
  elevationNoiseThresholdMeters: number;
  /** Surface index grid cell size in degrees */
  indexCellDegrees: number;
  geodataFailurePolicy: GeodataFailurePolicy;
}

export interface AnalyzeOptions {
  config?: Partial<SurfaceEngineConfig>;
  signal?: AbortSignal;
}

export interface AnalysisDiagnostics {
  pointCount: number;
  segmentCount: number;
  matchedSegmentCount: number;
  wayCount: number;
  totalDistanceMeters: number;
  geodataDegraded: boolean;
  warnings: string[];
}

export interface AnalysisResult {
  /** Surface label → kilometers */
  surfaceLengthsKm: SurfaceLengthMap;
  suitability: SuitabilityScores;
  elevation: ElevationResult;
  diagnostics: AnalysisDiagnostics;
}

/** Response body of POST /surface/analyze; field names are a public contract */
export interface SurfaceAnalysisResponse {
  surface_lengths_km: SurfaceLengthMap;
  suitability_scores: SuitabilityScores;
  elevation: {
    elevation_up: number;
    elevation_down: number;
  };
}

export type { Trackpoint };
