/**
 * Surface Engine Configuration
 *
 * Matching tolerance, noise threshold and index resolution are policy
 * constants; each can be overridden from the environment or per call.
 */

import { getEnvNumber, getEnvVarOptional } from "../../config/constants.js";
import type {
  BikeType,
  GeodataFailurePolicy,
  SurfaceEngineConfig,
  SurfaceLabel,
} from "./types.js";

function parseFailurePolicy(raw: string): GeodataFailurePolicy {
  return raw.trim().toLowerCase() === "degrade" ? "degrade" : "fail";
}

export const SURFACE_ENGINE_CONFIG: Readonly<SurfaceEngineConfig> = {
  // A segment midpoint within 25m of a way is on that way (GPS drift is 5-15m)
  matchToleranceMeters: getEnvNumber("SURFACE_MATCH_TOLERANCE_METERS", 25),

  // Sub-meter jitter from barometric/GPS altitude is ignored
  elevationNoiseThresholdMeters: getEnvNumber(
    "ELEVATION_NOISE_THRESHOLD_METERS",
    0.5
  ),

  // ~111m cells at the equator
  indexCellDegrees: getEnvNumber("SURFACE_INDEX_CELL_DEGREES", 0.001) || 0.001,

  // "fail" surfaces GeodataUnavailableError, "degrade" reports everything as unknown
  geodataFailurePolicy: parseFailurePolicy(
    getEnvVarOptional("GEODATA_FAILURE_POLICY", "fail")
  ),
};

/**
 * Per-surface suitability weights, 0 (unrideable) to 1 (ideal).
 *
 * "unknown" is neutral for both bikes: an unmatched segment neither
 * confirms nor rules out either style.
 */
export const SURFACE_SUITABILITY: Readonly<
  Record<SurfaceLabel, Readonly<Record<BikeType, number>>>
> = {
  asphalt: { roadbike: 1.0, gravelbike: 0.8 },
  concrete: { roadbike: 1.0, gravelbike: 0.8 },
  paved: { roadbike: 1.0, gravelbike: 0.8 },
  paving_stones: { roadbike: 0.8, gravelbike: 1.0 },
  sett: { roadbike: 0.6, gravelbike: 1.0 },
  cobblestone: { roadbike: 0.5, gravelbike: 1.0 },
  metal: { roadbike: 0.6, gravelbike: 0.8 },
  wood: { roadbike: 0.5, gravelbike: 0.8 },
  compacted: { roadbike: 0.4, gravelbike: 1.0 },
  fine_gravel: { roadbike: 0.0, gravelbike: 1.0 },
  gravel: { roadbike: 0.0, gravelbike: 1.0 },
  unpaved: { roadbike: 0.2, gravelbike: 0.9 },
  dirt: { roadbike: 0.0, gravelbike: 1.0 },
  earth: { roadbike: 0.0, gravelbike: 1.0 },
  grass: { roadbike: 0.0, gravelbike: 0.8 },
  sand: { roadbike: 0.0, gravelbike: 0.6 },
  mud: { roadbike: 0.0, gravelbike: 0.5 },
  clay: { roadbike: 0.0, gravelbike: 0.8 },
  snow: { roadbike: 0.0, gravelbike: 0.2 },
  ice: { roadbike: 0.0, gravelbike: 0.1 },
  unknown: { roadbike: 0.5, gravelbike: 0.5 },
};

/**
 * Merge per-call overrides onto the environment defaults.
 * Undefined override fields keep the default.
 */
export function resolveEngineConfig(
  overrides: Partial<SurfaceEngineConfig> = {}
): SurfaceEngineConfig {
  return {
    matchToleranceMeters:
      overrides.matchToleranceMeters ?? SURFACE_ENGINE_CONFIG.matchToleranceMeters,
    elevationNoiseThresholdMeters:
      overrides.elevationNoiseThresholdMeters ??
      SURFACE_ENGINE_CONFIG.elevationNoiseThresholdMeters,
    indexCellDegrees:
      overrides.indexCellDegrees ?? SURFACE_ENGINE_CONFIG.indexCellDegrees,
    geodataFailurePolicy:
      overrides.geodataFailurePolicy ?? SURFACE_ENGINE_CONFIG.geodataFailurePolicy,
  };
}
