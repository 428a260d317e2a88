/**
 * Application Constants
 * Centralized configuration values
 */

// ============================================
// Environment Variable Helpers
// ============================================

/**
 * Get optional environment variable with default
 */
export function getEnvVarOptional(name: string, defaultValue: string): string {
  return process.env[name] ?? defaultValue;
}

/**
 * Get a numeric environment variable. Missing, non-numeric or negative
 * values fall back to the default.
 */
export function getEnvNumber(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return defaultValue;
  const value = Number(raw);
  return Number.isFinite(value) && value >= 0 ? value : defaultValue;
}

/**
 * Get a boolean environment variable ("true"/"false", "1"/"0").
 */
export function getEnvBoolean(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name]?.trim().toLowerCase();
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  return defaultValue;
}

// ============================================
// API Configuration
// ============================================

export const API = {
  VERSION: "v1",
  PREFIX: "/api/v1",
} as const;

export const FRONTEND_URL = getEnvVarOptional(
  "FRONTEND_URL",
  "http://localhost:5173"
);

// ============================================
// Error Codes
// ============================================

export const ERROR_CODES = {
  // General errors
  INTERNAL_ERROR: "INTERNAL_ERROR",
  NOT_FOUND: "NOT_FOUND",

  // GPX errors
  GPX_PARSE_ERROR: "GPX_PARSE_ERROR",
  GPX_INVALID_FORMAT: "GPX_INVALID_FORMAT",
  GPX_FILE_TOO_LARGE: "GPX_FILE_TOO_LARGE",
  GPX_FILE_REQUIRED: "GPX_FILE_REQUIRED",

  // Analysis errors
  TRACK_INVALID_INPUT: "TRACK_INVALID_INPUT",
  GEODATA_UNAVAILABLE: "GEODATA_UNAVAILABLE",
} as const;

// ============================================
// GPX Upload
// ============================================

export const GPX_UPLOAD = {
  MAX_FILE_SIZE_BYTES: 10 * 1024 * 1024,
  FORM_FIELD: "gpx_file",
} as const;

// ============================================
// Overpass API
// ============================================

export const OVERPASS = {
  // Primary API endpoint
  API_URL: getEnvVarOptional(
    "OVERPASS_API_URL",
    "https://overpass-api.de/api/interpreter"
  ),

  // Tried on the retry if the primary fails
  FALLBACK_URLS: ["https://overpass.private.coffee/api/interpreter"],

  // Client timeout (axios timeout)
  TIMEOUT_MS: getEnvNumber("OVERPASS_TIMEOUT_MS", 30000),

  // Query timeout (Overpass QL timeout parameter)
  QUERY_TIMEOUT_SECONDS: 30,

  // First attempt + one retry
  MAX_ATTEMPTS: 2,

  RETRY_DELAY_MS: 1000,

  // Minimum gap between the start of two requests (avoids 429s)
  MIN_REQUEST_INTERVAL_MS: 1500,
} as const;

// ============================================
// Geodata Cache
// ============================================

/**
 * Process-wide cache of Overpass responses keyed by bounding box.
 * Keys are formatted as "surface:bbox:{south}:{west}:{north}:{east}".
 */
export const GEODATA_CACHE = {
  ENABLED: getEnvBoolean("GEODATA_CACHE_ENABLED", true),

  TTL_MINUTES: getEnvNumber("GEODATA_CACHE_TTL_MINUTES", 60),

  MAX_ENTRIES: getEnvNumber("GEODATA_CACHE_MAX_ENTRIES", 100),

  KEY_PREFIX: "surface:bbox:",

  /**
   * Decimal places the bounding box is rounded (outward) to.
   * 3 decimal places = ~111m
   */
  COORD_PRECISION: 3,
} as const;
