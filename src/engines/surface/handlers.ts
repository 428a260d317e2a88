/**
 * Surface engine handlers
 *
 * 2-step pipeline: Parse GPX -> Analyze track (geodata, match, score, elevation)
 */

import type { Request, Response } from "express";
import type { GeodataClient, SurfaceEngineConfig } from "./types.js";
import { analyzeTrack, toSurfaceAnalysisResponse } from "./analyze-track.js";
import { resolveEngineConfig } from "./config.js";
import {
  AnalysisCancelledError,
  GeodataUnavailableError,
  TrackInputError,
} from "./errors.js";
import { SURFACE_LABELS } from "./modules/surface-vocabulary.js";
import { parseGpxBuffer, GpxParseError } from "../../services/gpx.service.js";
import { API, ERROR_CODES, GPX_UPLOAD } from "../../config/constants.js";
import type { ApiErrorResponse } from "../../types/track.types.js";

export interface SurfaceHandlerDeps {
  geodataClient: GeodataClient;
  /** Per-deployment overrides of the engine policy constants */
  config?: Partial<SurfaceEngineConfig>;
}

export function createSurfaceHandlers({ geodataClient, config }: SurfaceHandlerDeps) {
  /**
   * GET /api/v1/surface
   * Returns info about the surface engine and its active policy constants.
   */
  function getInfo(_req: Request, res: Response): void {
    res.json({
      message: "Route Surface Analysis Engine",
      version: "1.0.0",
      endpoints: {
        analyze: `POST ${API.PREFIX}/surface/analyze`,
      },
      description:
        "Upload a GPX file to get the distance travelled on each road surface, road/gravel bike suitability scores, and total ascent/descent.",
      config: resolveEngineConfig(config),
      surfaces: SURFACE_LABELS,
    });
  }

  /**
   * POST /api/v1/surface/analyze
   * Analyzes a GPX file's surfaces, suitability and elevation.
   *
   * Query params:
   *   - debug=true: Include analysis diagnostics
   *
   * Body:
   *   - gpx_file: GPX file (multipart/form-data)
   *
   * Response: SurfaceAnalysisResponse
   */
  async function analyzeGpx(req: Request, res: Response): Promise<void> {
    const file = req.file;
    if (!file) {
      sendError(res, 400, {
        error: `No GPX file provided. Use '${GPX_UPLOAD.FORM_FIELD}' form field.`,
        code: ERROR_CODES.GPX_FILE_REQUIRED,
      });
      return;
    }

    // A client that disconnects mid-analysis cancels the geodata request
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    const debug = req.query.debug === "true";
    const startTime = Date.now();

    try {
      // Step 1: Parse GPX
      const gpxData = parseGpxBuffer(file.buffer);
      console.log(
        `[Surface] Parsed ${gpxData.points.length} points from "${gpxData.name ?? file.originalname}"`
      );

      // Step 2: Analyze
      const result = await analyzeTrack(gpxData.points, geodataClient, {
        config,
        signal: controller.signal,
      });

      console.log(
        `[Surface] Analysis complete in ${Date.now() - startTime}ms: ${result.diagnostics.matchedSegmentCount}/${result.diagnostics.segmentCount} segments matched`
      );

      const body = toSurfaceAnalysisResponse(result);
      res.json(debug ? { ...body, diagnostics: result.diagnostics } : body);
    } catch (error) {
      sendAnalysisError(res, error);
    }
  }

  return { getInfo, analyzeGpx };
}

/**
 * Map a pipeline failure to a status code and error body.
 *
 * GPX/input errors → 400, geodata unavailable → 503, anything else → 500.
 * A cancelled analysis has no one left to answer.
 */
function sendAnalysisError(res: Response, error: unknown): void {
  if (error instanceof AnalysisCancelledError) {
    console.log("[Surface] Client disconnected, analysis cancelled");
    return;
  }

  if (error instanceof GpxParseError) {
    sendError(res, 400, { error: error.message, code: ERROR_CODES.GPX_PARSE_ERROR });
    return;
  }

  if (error instanceof TrackInputError) {
    sendError(res, 400, { error: error.message, code: ERROR_CODES.TRACK_INVALID_INPUT });
    return;
  }

  if (error instanceof GeodataUnavailableError) {
    console.error("[Surface] Geodata unavailable:", error.message);
    sendError(res, 503, {
      error: "Surface data is temporarily unavailable. Please try again later.",
      code: ERROR_CODES.GEODATA_UNAVAILABLE,
    });
    return;
  }

  console.error("[Surface] Analysis error:", error);
  sendError(res, 500, {
    error: error instanceof Error ? error.message : "Internal server error",
    code: ERROR_CODES.INTERNAL_ERROR,
  });
}

function sendError(
  res: Response,
  status: number,
  body: Omit<ApiErrorResponse, "success">
): void {
  if (res.headersSent) return;
  const payload: ApiErrorResponse = { success: false, ...body };
  res.status(status).json(payload);
}
