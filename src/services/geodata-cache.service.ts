/**
 * Geodata Cache Service
 * Caches surface-tagged ways to reduce Overpass API calls
 *
 * Wraps any GeodataClient. Key features:
 *
 * 1. **TTL**: Cached data expires after GEODATA_CACHE.TTL_MINUTES
 * 2. **Outward rounding**: The requested box is widened to a 3-decimal grid
 *    (~111m) and the widened box is fetched, so nearby tracks share entries
 * 3. **Bounded size**: Oldest entries are evicted past MAX_ENTRIES
 *
 * Held in process memory; surface data is relatively static and nothing
 * outlives a restart.
 *
 * @example
 * const client = createCachedGeodataClient(new OverpassGeodataClient());
 * const ways = await client.fetchTaggedWays(bbox); // miss: queries Overpass
 * const again = await client.fetchTaggedWays(bbox); // hit
 */

import { GEODATA_CACHE } from "../config/constants.js";
import type { BoundingBox } from "../types/track.types.js";
import type {
  GeodataClient,
  GeodataFetchOptions,
  RawTaggedWay,
} from "../engines/surface/types.js";

export interface GeodataCacheOptions {
  ttlMs?: number;
  maxEntries?: number;
  precision?: number;
  /** Clock in ms; tests pass a fake */
  now?: () => number;
}

interface CacheEntry {
  ways: RawTaggedWay[];
  expiresAt: number;
}

// ============================================
// Cache Key Generation
// ============================================

/**
 * Widen a bounding box to the cache grid: south/west rounded down,
 * north/east rounded up, clamped to valid coordinates.
 *
 * @example
 * expandBoundingBox({ south: 50.7912, west: -1.0934, north: 50.8051, east: -1.0811 }, 3);
 * // Returns: { south: 50.791, west: -1.094, north: 50.806, east: -1.081 }
 */
export function expandBoundingBox(
  bbox: BoundingBox,
  precision: number = GEODATA_CACHE.COORD_PRECISION
): BoundingBox {
  const factor = 10 ** precision;
  const down = (value: number) => Math.floor(value * factor) / factor;
  const up = (value: number) => Math.ceil(value * factor) / factor;

  return {
    south: Math.max(-90, down(bbox.south)),
    west: Math.max(-180, down(bbox.west)),
    north: Math.min(90, up(bbox.north)),
    east: Math.min(180, up(bbox.east)),
  };
}

/**
 * Key format: "surface:bbox:{south}:{west}:{north}:{east}"
 *
 * @example
 * generateBboxCacheKey({ south: 50.791, west: -1.094, north: 50.806, east: -1.081 });
 * // Returns: "surface:bbox:50.791:-1.094:50.806:-1.081"
 */
export function generateBboxCacheKey(
  bbox: BoundingBox,
  precision: number = GEODATA_CACHE.COORD_PRECISION
): string {
  const parts = [bbox.south, bbox.west, bbox.north, bbox.east].map((v) =>
    v.toFixed(precision)
  );
  return `${GEODATA_CACHE.KEY_PREFIX}${parts.join(":")}`;
}

// ============================================
// Cache Store
// ============================================

export class GeodataCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: GeodataCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? GEODATA_CACHE.TTL_MINUTES * 60 * 1000;
    this.maxEntries = Math.max(1, options.maxEntries ?? GEODATA_CACHE.MAX_ENTRIES);
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Cached ways, or null if not cached or expired */
  get(cacheKey: string): RawTaggedWay[] | null {
    const cached = this.entries.get(cacheKey);
    if (!cached) return null;

    if (this.now() >= cached.expiresAt) {
      this.entries.delete(cacheKey);
      console.log(`[GeodataCache] Expired cache entry deleted: ${cacheKey}`);
      return null;
    }

    return cached.ways;
  }

  set(cacheKey: string, ways: RawTaggedWay[]): void {
    // Re-inserting moves the key to the end of the eviction order
    this.entries.delete(cacheKey);
    this.entries.set(cacheKey, { ways, expiresAt: this.now() + this.ttlMs });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  clear(): void {
    this.entries.clear();
  }
}

// ============================================
// Caching Client
// ============================================

/**
 * Decorate a GeodataClient with the bounding-box cache.
 * Failed fetches are not cached.
 */
export function createCachedGeodataClient(
  client: GeodataClient,
  options: GeodataCacheOptions = {}
): GeodataClient & { cache: GeodataCache } {
  const cache = new GeodataCache(options);
  const precision = options.precision ?? GEODATA_CACHE.COORD_PRECISION;

  return {
    cache,
    async fetchTaggedWays(
      bbox: BoundingBox,
      fetchOptions?: GeodataFetchOptions
    ): Promise<RawTaggedWay[]> {
      const expanded = expandBoundingBox(bbox, precision);
      const cacheKey = generateBboxCacheKey(expanded, precision);

      const cached = cache.get(cacheKey);
      if (cached) {
        console.log(`[GeodataCache] Cache hit: ${cacheKey}`);
        return cached;
      }

      const ways = await client.fetchTaggedWays(expanded, fetchOptions);
      cache.set(cacheKey, ways);
      console.log(`[GeodataCache] Cached ${ways.length} ways: ${cacheKey}`);
      return ways;
    },
  };
}
