/**
 * OpenAPI/Swagger Configuration
 * Defines the API specification and all reusable schemas
 *
 * This configuration is used by swagger-jsdoc to generate the OpenAPI spec
 * and swagger-ui-express to serve the interactive API documentation.
 */

import path from "path";
import { fileURLToPath } from "url";
import swaggerJsdoc from "swagger-jsdoc";
import { SURFACE_LABELS } from "../engines/surface/modules/surface-vocabulary.js";

// Route files carry @openapi blocks; .ts under tsx/vitest, .js once built
const srcDir = path.join(path.dirname(fileURLToPath(import.meta.url)), "..");

const surfaceLengthProperties = Object.fromEntries(
  SURFACE_LABELS.map((label) => [label, { type: "number", description: "Kilometers" }])
);

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: "3.1.0",
    info: {
      title: "Route Surface API",
      version: "1.0.0",
      description: `
# Route Surface API

Upload a GPX track and get back how far it runs on each road surface,
how well suited it is to a road bike and a gravel bike, and its total
ascent and descent.

Surface data comes from OpenStreetMap via the Overpass API.

\`\`\`bash
curl -F "gpx_file=@ride.gpx" http://localhost:3000/api/v1/surface/analyze
\`\`\`
      `,
      license: {
        name: "MIT",
      },
    },
    servers: [
      {
        url: "http://localhost:3000/api/v1",
        description: "Development server",
      },
    ],
    tags: [
      {
        name: "Surface",
        description: "GPX surface, suitability and elevation analysis",
      },
    ],
    components: {
      schemas: {
        // ============================================
        // Common Schemas
        // ============================================

        ApiErrorResponse: {
          type: "object",
          required: ["success", "error", "code"],
          properties: {
            success: { type: "boolean", enum: [false] },
            error: {
              type: "string",
              description: "Human-readable error message",
            },
            code: {
              type: "string",
              description: "Machine-readable error code",
            },
          },
          example: {
            success: false,
            error: "No track points found in GPX file",
            code: "GPX_PARSE_ERROR",
          },
        },

        // ============================================
        // Surface Schemas
        // ============================================

        SurfaceAnalysisResponse: {
          type: "object",
          required: ["surface_lengths_km", "suitability_scores", "elevation"],
          properties: {
            surface_lengths_km: {
              type: "object",
              description: "Kilometers per surface; only surfaces on the track are present",
              properties: surfaceLengthProperties,
            },
            suitability_scores: {
              type: "object",
              required: ["roadbike", "gravelbike"],
              properties: {
                roadbike: { type: "number", minimum: 0, maximum: 1 },
                gravelbike: { type: "number", minimum: 0, maximum: 1 },
              },
            },
            elevation: {
              type: "object",
              required: ["elevation_up", "elevation_down"],
              properties: {
                elevation_up: { type: "number", description: "Total ascent (m)" },
                elevation_down: { type: "number", description: "Total descent (m)" },
              },
            },
          },
          example: {
            surface_lengths_km: { asphalt: 12.412, gravel: 3.05, unknown: 0.61 },
            suitability_scores: { roadbike: 0.8, gravelbike: 0.85 },
            elevation: { elevation_up: 312.4, elevation_down: 309.8 },
          },
        },

        SurfaceEngineConfig: {
          type: "object",
          properties: {
            matchToleranceMeters: { type: "number" },
            elevationNoiseThresholdMeters: { type: "number" },
            indexCellDegrees: { type: "number" },
            geodataFailurePolicy: { type: "string", enum: ["fail", "degrade"] },
          },
        },
      },
    },
  },
  apis: [path.join(srcDir, "engines", "**", "*.routes.{ts,js}")],
};

export const swaggerSpec = swaggerJsdoc(options);
