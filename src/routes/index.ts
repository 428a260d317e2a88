/**
 * Route Aggregator
 * Combines all route modules and mounts them under /api/v1
 *
 * ROUTE MODULES:
 * --------------
 * | Module  | Path     | Description                              |
 * |---------|----------|------------------------------------------|
 * | surface | /surface | GPX surface, suitability and elevation   |
 */

import { Router } from "express";
import {
  createDefaultGeodataClient,
  createSurfaceRoutes,
  type GeodataClient,
  type SurfaceEngineConfig,
} from "../engines/surface/index.js";

export interface ApiRouteDeps {
  geodataClient?: GeodataClient;
  surfaceConfig?: Partial<SurfaceEngineConfig>;
}

export function createApiRoutes(deps: ApiRouteDeps = {}): Router {
  const router = Router();

  // Mount route modules
  router.use(
    "/surface",
    createSurfaceRoutes({
      geodataClient: deps.geodataClient ?? createDefaultGeodataClient(),
      config: deps.surfaceConfig,
    })
  );

  return router;
}
