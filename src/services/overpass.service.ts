/**
 * Overpass Service
 * Queries OpenStreetMap via Overpass API for surface-tagged ways
 *
 * Overpass API is a read-only API for querying OpenStreetMap data.
 * It's free to use, no API key required, but be respectful of rate limits.
 *
 * What this service does:
 * 1. Takes a bounding box (track extent plus matching tolerance)
 * 2. Queries Overpass API for every way carrying a "surface" tag in that area
 * 3. Returns way geometries with their raw surface tags
 *
 * API Endpoint: https://overpass-api.de/api/interpreter
 *
 * @see https://wiki.openstreetmap.org/wiki/Overpass_API
 */

import axios from "axios";
import type { AxiosRequestConfig } from "axios";
import type {
  BoundingBox,
  LngLat,
  OverpassResponse,
} from "../types/track.types.js";
import type {
  GeodataClient,
  GeodataFetchOptions,
  RawTaggedWay,
} from "../engines/surface/types.js";
import { OVERPASS } from "../config/constants.js";
import { RequestThrottle } from "./overpass-throttle.service.js";

/** The part of axios the client needs; tests pass a fake */
export interface OverpassHttp {
  post(url: string, data: string, config: AxiosRequestConfig): Promise<{ data: unknown }>;
}

export interface OverpassClientOptions {
  /** Primary server first; attempts rotate through the list */
  servers?: string[];
  timeoutMs?: number;
  maxAttempts?: number;
  retryDelayMs?: number;
  minRequestIntervalMs?: number;
  http?: OverpassHttp;
}

/**
 * Build the Overpass QL query for surface-tagged ways in a bounding box.
 *
 * @example
 * buildSurfaceQuery({ south: 50.79, west: -1.1, north: 50.81, east: -1.08 });
 * // "[out:json][timeout:30];\nway[\"surface\"](50.79,-1.1,50.81,-1.08);\nout body geom;"
 */
export function buildSurfaceQuery(
  bbox: BoundingBox,
  timeoutSeconds: number = OVERPASS.QUERY_TIMEOUT_SECONDS
): string {
  return [
    `[out:json][timeout:${timeoutSeconds}];`,
    `way["surface"](${bbox.south},${bbox.west},${bbox.north},${bbox.east});`,
    "out body geom;",
  ].join("\n");
}

export class OverpassGeodataClient implements GeodataClient {
  private readonly servers: string[];
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly http: OverpassHttp;
  private readonly throttle: RequestThrottle;

  constructor(options: OverpassClientOptions = {}) {
    this.servers = options.servers ?? [OVERPASS.API_URL, ...OVERPASS.FALLBACK_URLS];
    this.timeoutMs = options.timeoutMs ?? OVERPASS.TIMEOUT_MS;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? OVERPASS.MAX_ATTEMPTS);
    this.retryDelayMs = options.retryDelayMs ?? OVERPASS.RETRY_DELAY_MS;
    this.http = options.http ?? axios;
    this.throttle = new RequestThrottle(
      options.minRequestIntervalMs ?? OVERPASS.MIN_REQUEST_INTERVAL_MS
    );

    if (this.servers.length === 0) {
      throw new RangeError("OverpassGeodataClient needs at least one server URL");
    }
  }

  /**
   * Fetch all surface-tagged ways in a bounding box.
   *
   * One attempt per server in turn, up to maxAttempts. Only timeouts,
   * network failures and 502/503/504 are retried.
   *
   * @throws OverpassError if every attempt fails or the error is not retryable
   *
   * @example
   * const client = new OverpassGeodataClient();
   * const ways = await client.fetchTaggedWays({ south: 50.79, north: 50.81, west: -1.10, east: -1.08 });
   * // Returns: [{ osmId: "way/123", surfaceTag: "asphalt", geometry: [[-1.09, 50.8], ...] }, ...]
   */
  async fetchTaggedWays(
    bbox: BoundingBox,
    options: GeodataFetchOptions = {}
  ): Promise<RawTaggedWay[]> {
    const query = buildSurfaceQuery(bbox);
    const { signal } = options;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const serverUrl = this.servers[attempt % this.servers.length];

      try {
        if (attempt > 0 && this.retryDelayMs > 0) {
          await waitForRetry(this.retryDelayMs, signal);
        }
        if (signal?.aborted) {
          throw new OverpassError("Request aborted", { cause: signal.reason });
        }

        const response = await this.throttle.run(() =>
          this.http.post(serverUrl, query, {
            headers: { "Content-Type": "text/plain" },
            timeout: this.timeoutMs,
            signal,
          })
        );

        const ways = parseOverpassResponse(response.data);
        console.log(
          `[Overpass] ${serverUrl} returned ${ways.length} surface-tagged ways (attempt ${attempt + 1})`
        );
        return ways;
      } catch (error) {
        if (error instanceof OverpassError && !error.retryable) throw error;

        const errorMessage = getErrorMessage(error, this.timeoutMs);
        const isLastAttempt = attempt === this.maxAttempts - 1;

        // If not retryable (e.g., 400 Bad Request), don't retry
        if (!isRetryableError(error)) {
          throw new OverpassError(errorMessage, { cause: error });
        }

        if (isLastAttempt) {
          throw new OverpassError(
            `Overpass API failed after ${this.maxAttempts} attempts. Last error: ${errorMessage}`,
            { cause: error }
          );
        }

        console.warn(
          `[Overpass] ${serverUrl} failed (attempt ${attempt + 1}/${this.maxAttempts}): ${errorMessage}`
        );
      }
    }

    // maxAttempts >= 1, so the loop always returns or throws
    throw new OverpassError("Overpass API was not queried");
  }
}

/**
 * Wait out the retry back-off, ending early if the signal aborts
 */
function waitForRetry(ms: number, signal: AbortSignal | undefined): Promise<void> {
  if (signal?.aborted) return Promise.resolve();

  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}

/**
 * Check if an error is retryable (should we try again?)
 *
 * Retryable errors:
 * - 502/503/504 (server busy or temporarily down)
 * - ECONNABORTED / ETIMEDOUT (client timeout)
 * - Network errors
 *
 * - Overpass runtime errors reported in a 200 reply (query timeout, out of memory)
 *
 * Non-retryable errors:
 * - 400 Bad Request (query syntax error)
 * - 429 Too Many Requests (rate limit - wait longer)
 * - Cancelled requests
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof OverpassError) return error.retryable;
  if (!axios.isAxiosError(error)) return false;

  if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") return true;

  const status = error.response?.status;

  if (status === 504 || status === 503 || status === 502) return true;

  if (status === 429 || status === 400) return false;

  // Network errors - retryable
  if (!status && (error.code === "ERR_NETWORK" || error.message.includes("Network"))) {
    return true;
  }

  return false;
}

/**
 * Extract user-friendly error message from error
 */
function getErrorMessage(error: unknown, timeoutMs: number): string {
  if (!axios.isAxiosError(error)) {
    return error instanceof Error ? error.message : `Unknown error: ${String(error)}`;
  }

  if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
    return `Request timeout after ${timeoutMs}ms`;
  }

  if (error.code === "ERR_CANCELED") {
    return "Request aborted";
  }

  const status = error.response?.status;

  if (status === 429) return "Rate limit exceeded - too many requests";
  if (status === 504) return "Gateway timeout - server is busy";
  if (status === 503) return "Service unavailable - server is temporarily down";
  if (status === 502) return "Bad gateway - upstream server error";

  return `HTTP ${status ?? "unknown"}: ${error.message}`;
}

// ============================================
// Response Parsing
// ============================================

/**
 * Parse Overpass API response into RawTaggedWay objects
 *
 * Overpass response structure:
 * {
 *   elements: [
 *     {
 *       type: "way",
 *       id: 123456789,
 *       geometry: [{ lat: 50.79, lon: -1.09 }, ...],
 *       tags: { surface: "asphalt", highway: "residential" }
 *     },
 *     ...
 *   ]
 * }
 *
 * Non-way elements and ways with fewer than 2 usable nodes are skipped.
 * Element order is kept; the surface index breaks distance ties by it.
 *
 * A "runtime error" remark means the server gave up partway, so the
 * elements are incomplete and must not be read as the whole region.
 *
 * @throws OverpassError if the body has no elements array
 * @throws OverpassError (retryable) if the server reports a runtime error
 */
export function parseOverpassResponse(data: unknown): RawTaggedWay[] {
  if (!isOverpassResponse(data)) {
    throw new OverpassError("Malformed Overpass response: missing elements array");
  }

  if (typeof data.remark === "string" && data.remark.startsWith("runtime error")) {
    throw new OverpassError(`Overpass ${data.remark}`, { retryable: true });
  }

  const ways: RawTaggedWay[] = [];

  for (const element of data.elements) {
    if (element.type !== "way") continue;

    // Overpass: { lat, lon }  →  GeoJSON: [lng, lat]
    const geometry: LngLat[] = (element.geometry ?? [])
      .filter((node) => Number.isFinite(node.lat) && Number.isFinite(node.lon))
      .map((node) => [node.lon, node.lat]);

    if (geometry.length < 2) continue;

    ways.push({
      osmId: `way/${element.id}`,
      geometry,
      surfaceTag: element.tags?.surface,
    });
  }

  return ways;
}

function isOverpassResponse(data: unknown): data is OverpassResponse {
  return (
    typeof data === "object" &&
    data !== null &&
    "elements" in data &&
    Array.isArray(data.elements)
  );
}

// ============================================
// Custom Error Class
// ============================================

/**
 * Custom error for Overpass API failures
 */
export class OverpassError extends Error {
  /** Whether another server may still answer the same query */
  readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown; retryable?: boolean }) {
    super(message, { cause: options?.cause });
    this.name = "OverpassError";
    this.retryable = options?.retryable ?? false;
  }
}
