/**
 * Surface engine routes
 * Mounted at /api/v1/surface
 */

import { Router } from "express";
import { createSurfaceHandlers, type SurfaceHandlerDeps } from "./handlers.js";
import { uploadGpx, handleMulterError } from "../../middleware/upload.middleware.js";
import { GPX_UPLOAD } from "../../config/constants.js";

export function createSurfaceRoutes(deps: SurfaceHandlerDeps): Router {
  const router = Router();
  const { getInfo, analyzeGpx } = createSurfaceHandlers(deps);

  /**
   * @openapi
   * /surface:
   *   get:
   *     tags: [Surface]
   *     summary: Surface engine info
   *     description: Returns engine metadata, available endpoints, the active matching/elevation settings and the surface vocabulary.
   *     responses:
   *       200:
   *         description: Engine info
   *         content:
   *           application/json:
   *             schema:
   *               type: object
   *               properties:
   *                 message: { type: string }
   *                 version: { type: string }
   *                 endpoints: { type: object }
   *                 description: { type: string }
   *                 config:
   *                   $ref: '#/components/schemas/SurfaceEngineConfig'
   *                 surfaces:
   *                   type: array
   *                   items: { type: string }
   */
  router.get("/", getInfo);

  /**
   * @openapi
   * /surface/analyze:
   *   post:
   *     tags: [Surface]
   *     summary: Analyze a GPX track's surfaces
   *     description: |
   *       Matches each track segment to the nearest surface-tagged OpenStreetMap way
   *       and returns kilometers per surface, road/gravel bike suitability (0-1)
   *       and total ascent/descent in meters.
   *     parameters:
   *       - in: query
   *         name: debug
   *         schema: { type: boolean }
   *         description: Include analysis diagnostics
   *     requestBody:
   *       required: true
   *       content:
   *         multipart/form-data:
   *           schema:
   *             type: object
   *             required: [gpx_file]
   *             properties:
   *               gpx_file:
   *                 type: string
   *                 format: binary
   *                 description: GPX file (max 10MB)
   *     responses:
   *       200:
   *         description: Analysis complete
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/SurfaceAnalysisResponse'
   *       400:
   *         description: Missing file, invalid format or invalid coordinates
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/ApiErrorResponse'
   *       413:
   *         description: File larger than 10MB
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/ApiErrorResponse'
   *       503:
   *         description: Surface data source unavailable
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/ApiErrorResponse'
   */
  router.post(
    "/analyze",
    uploadGpx.single(GPX_UPLOAD.FORM_FIELD),
    handleMulterError,
    analyzeGpx
  );

  return router;
}
