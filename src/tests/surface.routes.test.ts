/**
 * Surface routes: GET /surface, POST /surface/analyze
 * The app runs with an in-memory geodata client.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import request from "supertest";
import express from "express";
import multer from "multer";
import { createApp } from "../app.js";
import { handleMulterError } from "../middleware/upload.middleware.js";
import type { GeodataClient, RawTaggedWay } from "../engines/surface/types.js";
import { buildGpx, THREE_POINT_TRACK } from "./helpers/gpx.js";

const asphaltAlongTrack: RawTaggedWay = {
  osmId: "way/100",
  surfaceTag: "asphalt",
  geometry: [
    [-0.0005, 0],
    [0.0025, 0],
  ],
};

const fetchTaggedWays = vi.fn<GeodataClient["fetchTaggedWays"]>();
const app = createApp({
  geodataClient: { fetchTaggedWays },
  surfaceConfig: { geodataFailurePolicy: "fail" },
});

const gpxUpload = (xml: string) => Buffer.from(xml, "utf-8");

describe("GET /api/v1/surface", () => {
  it("returns engine info with the active settings", async () => {
    const res = await request(app).get("/api/v1/surface").expect(200);

    expect(res.body.endpoints).toEqual({ analyze: "POST /api/v1/surface/analyze" });
    expect(res.body.config.geodataFailurePolicy).toBe("fail");
    expect(res.body.surfaces).toContain("fine_gravel");
    expect(res.body.surfaces).toContain("unknown");
  });
});

describe("POST /api/v1/surface/analyze", () => {
  beforeEach(() => {
    fetchTaggedWays.mockReset();
    fetchTaggedWays.mockResolvedValue([asphaltAlongTrack]);
  });

  it("returns surface lengths, suitability and elevation", async () => {
    const res = await request(app)
      .post("/api/v1/surface/analyze")
      .attach("gpx_file", gpxUpload(buildGpx(THREE_POINT_TRACK)), "ride.gpx")
      .expect(200);

    expect(res.body).toEqual({
      surface_lengths_km: { asphalt: 0.222 },
      suitability_scores: { roadbike: 1, gravelbike: 0.8 },
      elevation: { elevation_up: 5, elevation_down: 3 },
    });
    expect(fetchTaggedWays).toHaveBeenCalledTimes(1);
  });

  it("includes diagnostics when debug=true", async () => {
    const res = await request(app)
      .post("/api/v1/surface/analyze?debug=true")
      .attach("gpx_file", gpxUpload(buildGpx(THREE_POINT_TRACK)), "ride.gpx")
      .expect(200);

    expect(res.body.diagnostics).toMatchObject({
      pointCount: 3,
      segmentCount: 2,
      matchedSegmentCount: 2,
      wayCount: 1,
      geodataDegraded: false,
    });
  });

  it("returns 400 when no file is sent", async () => {
    const res = await request(app).post("/api/v1/surface/analyze").expect(400);

    expect(res.body).toEqual({
      success: false,
      error: "No GPX file provided. Use 'gpx_file' form field.",
      code: "GPX_FILE_REQUIRED",
    });
  });

  it("returns 400 when the file is sent under another field", async () => {
    const res = await request(app)
      .post("/api/v1/surface/analyze")
      .attach("gpxFile", gpxUpload(buildGpx(THREE_POINT_TRACK)), "ride.gpx")
      .expect(400);

    expect(res.body.code).toBe("GPX_FILE_REQUIRED");
  });

  it("returns 400 for a non-.gpx file", async () => {
    const res = await request(app)
      .post("/api/v1/surface/analyze")
      .attach("gpx_file", Buffer.from("lat,lng\n0,0\n"), "ride.csv")
      .expect(400);

    expect(res.body).toEqual({
      success: false,
      error: "Only .gpx files are allowed",
      code: "GPX_INVALID_FORMAT",
    });
  });

  it("returns 400 for a GPX file without points", async () => {
    const res = await request(app)
      .post("/api/v1/surface/analyze")
      .attach("gpx_file", gpxUpload('<gpx version="1.1"><trk/></gpx>'), "empty.gpx")
      .expect(400);

    expect(res.body).toEqual({
      success: false,
      error: "No track points found in GPX file",
      code: "GPX_PARSE_ERROR",
    });
    expect(fetchTaggedWays).not.toHaveBeenCalled();
  });

  it("returns 400 for out-of-range coordinates", async () => {
    const res = await request(app)
      .post("/api/v1/surface/analyze")
      .attach("gpx_file", gpxUpload(buildGpx([{ lat: 95, lon: 0 }])), "bad.gpx")
      .expect(400);

    expect(res.body).toEqual({
      success: false,
      error: "Trackpoint 0 has invalid coordinates (lat=95, lng=0)",
      code: "TRACK_INVALID_INPUT",
    });
  });

  it("returns 503 when surface data is unavailable", async () => {
    fetchTaggedWays.mockRejectedValue(new Error("Service unavailable"));

    const res = await request(app)
      .post("/api/v1/surface/analyze")
      .attach("gpx_file", gpxUpload(buildGpx(THREE_POINT_TRACK)), "ride.gpx")
      .expect(503);

    expect(res.body).toEqual({
      success: false,
      error: "Surface data is temporarily unavailable. Please try again later.",
      code: "GEODATA_UNAVAILABLE",
    });
  });
});

describe("handleMulterError", () => {
  it("returns 413 for files over the size limit", async () => {
    const uploadApp = express();
    uploadApp.post(
      "/upload",
      (_req: express.Request, _res: express.Response, next: express.NextFunction) =>
        next(new multer.MulterError("LIMIT_FILE_SIZE", "gpx_file")),
      handleMulterError
    );

    const res = await request(uploadApp).post("/upload").expect(413);

    expect(res.body).toEqual({
      success: false,
      error: "File too large. Maximum size is 10MB.",
      code: "GPX_FILE_TOO_LARGE",
    });
  });
});

describe("app routes", () => {
  it("reports health", async () => {
    const res = await request(app).get("/health").expect(200);
    expect(res.body.status).toBe("healthy");
  });

  it("serves the OpenAPI document", async () => {
    const res = await request(app).get("/docs/openapi.json").expect(200);
    expect(res.body.info.title).toBe("Route Surface API");
    expect(Object.keys(res.body.paths)).toEqual(
      expect.arrayContaining(["/surface", "/surface/analyze"])
    );
  });

  it("returns 404 for unknown routes", async () => {
    const res = await request(app).get("/api/v1/nothing-here").expect(404);
    expect(res.body).toEqual({
      success: false,
      error: "Route not found",
      code: "NOT_FOUND",
      path: "/api/v1/nothing-here",
    });
  });
});
