/**
 * Surface engine
 *
 * Public entry points: the analysis pipeline, its errors and types, and the
 * Express router mounted at /api/v1/surface.
 */

import { GEODATA_CACHE } from "../../config/constants.js";
import { createCachedGeodataClient } from "../../services/geodata-cache.service.js";
import { OverpassGeodataClient } from "../../services/overpass.service.js";
import type { GeodataClient } from "./types.js";

export { analyzeTrack, toSurfaceAnalysisResponse, validateTrackpoints } from "./analyze-track.js";
export { SURFACE_ENGINE_CONFIG, SURFACE_SUITABILITY, resolveEngineConfig } from "./config.js";
export * from "./errors.js";
export { createSurfaceRoutes } from "./surface.routes.js";
export type * from "./types.js";

/** Overpass client, behind the bounding-box cache unless disabled */
export function createDefaultGeodataClient(): GeodataClient {
  const overpass = new OverpassGeodataClient();
  if (!GEODATA_CACHE.ENABLED) return overpass;
  return createCachedGeodataClient(overpass);
}
