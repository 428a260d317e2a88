/**
 * GPX Service
 * Parses GPX files and extracts trackpoints
 *
 * GPX (GPS Exchange Format) is an XML schema for GPS data.
 * This service converts GPX files into an ordered list of trackpoints
 * with coordinates and optional elevation.
 *
 * GPX Structure (simplified):
 * <gpx>
 *   <metadata><name>Ride Name</name></metadata>
 *   <trk>
 *     <name>Track Name</name>
 *     <trkseg>
 *       <trkpt lat="50.79" lon="-1.09">
 *         <ele>25.5</ele>
 *       </trkpt>
 *       ...more points...
 *     </trkseg>
 *   </trk>
 * </gpx>
 *
 * Files with no <trkpt> are read from their route points (<rtept>) instead.
 */

import { DOMParser } from "@xmldom/xmldom";
import type { ParsedGpxData, Trackpoint } from "../types/track.types.js";

// ============================================
// Main Parse Function
// ============================================

/**
 * Parse GPX content from a Buffer into trackpoints
 *
 * Takes a file buffer (from Multer upload) and returns trackpoints in
 * document order. Segments of a track are concatenated.
 *
 * @param buffer - Raw GPX file content as Buffer
 * @returns Parsed data with points array and optional name
 * @throws GpxParseError if the file is not GPX or has no usable points
 *
 * @example
 * const gpxData = parseGpxBuffer(req.file.buffer);
 * console.log(gpxData.points.length);  // Number of trackpoints
 * console.log(gpxData.name);           // "Sunday Loop"
 */
export function parseGpxBuffer(buffer: Buffer): ParsedGpxData {
  const gpxContent = buffer.toString("utf-8");
  const dom = parseXml(gpxContent);

  const root = dom.documentElement;
  if (!root || root.localName !== "gpx") {
    throw new GpxParseError("Invalid GPX file: root element is not <gpx>");
  }

  let pointElements = Array.from(dom.getElementsByTagName("trkpt"));
  if (pointElements.length === 0) {
    pointElements = Array.from(dom.getElementsByTagName("rtept"));
  }

  if (pointElements.length === 0) {
    throw new GpxParseError("No track points found in GPX file");
  }

  const points = pointElements.map((element, index) => toTrackpoint(element, index));

  return { points, name: extractGpxName(dom) };
}

function parseXml(content: string): Document {
  const errors: string[] = [];

  try {
    const dom = new DOMParser({
      errorHandler: (level, msg) => {
        if (level !== "warning") errors.push(String(msg));
      },
    }).parseFromString(content, "text/xml");

    if (errors.length > 0) {
      throw new GpxParseError(`Invalid GPX file: malformed XML (${errors[0]})`);
    }

    return dom;
  } catch (error) {
    if (error instanceof GpxParseError) throw error;
    throw new GpxParseError("Invalid GPX file: malformed XML");
  }
}

// ============================================
// Point Extraction
// ============================================

/**
 * Read lat/lon attributes and the optional <ele> child.
 * An unparsable <ele> is dropped; unparsable coordinates are an error.
 */
function toTrackpoint(element: Element, index: number): Trackpoint {
  const lat = parseFloat(element.getAttribute("lat") ?? "");
  const lng = parseFloat(element.getAttribute("lon") ?? "");

  if (!Number.isFinite(lat) || !Number.isFinite(lng)) {
    throw new GpxParseError(`Track point ${index} has missing or invalid coordinates`);
  }

  const point: Trackpoint = { lat, lng };

  const eleText = element.getElementsByTagName("ele")[0]?.textContent;
  if (eleText) {
    const elevation = parseFloat(eleText);
    if (Number.isFinite(elevation)) point.elevation = elevation;
  }

  return point;
}

// ============================================
// Metadata Extraction
// ============================================

/**
 * Extract GPX track/route name
 *
 * Prefers <trk><name>, then <rte><name>, then <metadata><name>.
 */
function extractGpxName(dom: Document): string | undefined {
  for (const container of ["trk", "rte", "metadata"]) {
    const element = dom.getElementsByTagName(container)[0];
    const name = element?.getElementsByTagName("name")[0]?.textContent?.trim();
    if (name) return name;
  }

  return undefined;
}

// ============================================
// Custom Error Class
// ============================================

/**
 * Custom error class for GPX parsing errors
 *
 * Thrown when:
 * - XML is malformed or the root is not <gpx>
 * - No track or route points found
 * - A point has missing/unparsable coordinates
 *
 * @example
 * try {
 *   const data = parseGpxBuffer(buffer);
 * } catch (error) {
 *   if (error instanceof GpxParseError) {
 *     res.status(400).json({ error: error.message });
 *   }
 * }
 */
export class GpxParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GpxParseError";
  }
}
