/**
 * Track Types
 * Types for GPX parsing and geodata queries
 */

/** [lng, lat] pair, GeoJSON order */
export type LngLat = [number, number];

/** Single recorded position from a GPX track */
export interface Trackpoint {
  lat: number;
  lng: number;
  elevation?: number;
}

/** Parsed GPX data */
export interface ParsedGpxData {
  points: Trackpoint[];
  name?: string;
}

/** Bounding box for area queries */
export interface BoundingBox {
  south: number;
  west: number;
  north: number;
  east: number;
}

/** Error response */
export interface ApiErrorResponse {
  success: false;
  error: string;
  code: string;
}

/** Overpass API element response */
export interface OverpassElement {
  type: "way" | "node" | "relation";
  id: number;
  geometry?: { lat: number; lon: number }[];
  tags?: {
    surface?: string;
    highway?: string;
    [key: string]: string | undefined;
  };
}

/** Overpass API response structure */
export interface OverpassResponse {
  elements: OverpassElement[];
  /** Set by the server on query timeouts and memory exhaustion, with a 200 status */
  remark?: string;
}
