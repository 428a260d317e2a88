/**
 * Geodata Cache Tests
 * Bounding-box keys, TTL expiry, size eviction and failure handling
 */

import { describe, it, expect, vi } from "vitest";
import {
  GeodataCache,
  createCachedGeodataClient,
  expandBoundingBox,
  generateBboxCacheKey,
} from "../services/geodata-cache.service.js";
import {
  OverpassGeodataClient,
  type OverpassHttp,
} from "../services/overpass.service.js";
import { analyzeTrack } from "../engines/surface/analyze-track.js";
import { GeodataUnavailableError } from "../engines/surface/errors.js";
import type { GeodataClient, RawTaggedWay } from "../engines/surface/types.js";
import type { BoundingBox } from "../types/track.types.js";

const ways: RawTaggedWay[] = [
  {
    osmId: "way/1",
    surfaceTag: "gravel",
    geometry: [
      [-1.09, 50.8],
      [-1.091, 50.801],
    ],
  },
];

const trackBox: BoundingBox = { south: 50.7912, west: -1.0934, north: 50.8051, east: -1.0811 };

function innerClient() {
  const fetchTaggedWays = vi.fn<GeodataClient["fetchTaggedWays"]>().mockResolvedValue(ways);
  return { inner: { fetchTaggedWays }, fetchTaggedWays };
}

/** A box that expands to the grid cell row starting at `lat` */
function boxAt(lat: number): BoundingBox {
  return { south: lat + 0.0001, west: 0.0001, north: lat + 0.0009, east: 0.0009 };
}

describe("expandBoundingBox", () => {
  it("rounds south/west down and north/east up", () => {
    expect(expandBoundingBox(trackBox, 3)).toEqual({
      south: 50.791,
      west: -1.094,
      north: 50.806,
      east: -1.081,
    });
  });

  it("clamps to valid coordinates", () => {
    expect(
      expandBoundingBox({ south: -89.99991, west: -179.99991, north: 89.99991, east: 179.99991 }, 3)
    ).toEqual({ south: -90, west: -180, north: 90, east: 180 });
  });
});

describe("generateBboxCacheKey", () => {
  it("formats the box at the cache precision", () => {
    expect(
      generateBboxCacheKey({ south: 50.791, west: -1.094, north: 50.806, east: -1.081 }, 3)
    ).toBe("surface:bbox:50.791:-1.094:50.806:-1.081");
  });
});

describe("createCachedGeodataClient", () => {
  it("fetches the expanded box once and serves repeats from cache", async () => {
    const { inner, fetchTaggedWays } = innerClient();
    const client = createCachedGeodataClient(inner, { now: () => 0 });

    const first = await client.fetchTaggedWays(trackBox);
    const second = await client.fetchTaggedWays(trackBox);

    expect(first).toEqual(ways);
    expect(second).toBe(first);
    expect(fetchTaggedWays).toHaveBeenCalledTimes(1);
    expect(fetchTaggedWays.mock.calls[0][0]).toEqual({
      south: 50.791,
      west: -1.094,
      north: 50.806,
      east: -1.081,
    });
  });

  it("shares an entry between boxes in the same grid cells", async () => {
    const { inner, fetchTaggedWays } = innerClient();
    const client = createCachedGeodataClient(inner, { now: () => 0 });

    await client.fetchTaggedWays(trackBox);
    await client.fetchTaggedWays({ south: 50.7915, west: -1.0931, north: 50.8052, east: -1.0812 });

    expect(fetchTaggedWays).toHaveBeenCalledTimes(1);
  });

  it("passes the abort signal to the inner client", async () => {
    const { inner, fetchTaggedWays } = innerClient();
    const client = createCachedGeodataClient(inner);
    const controller = new AbortController();

    await client.fetchTaggedWays(trackBox, { signal: controller.signal });

    expect(fetchTaggedWays.mock.calls[0][1]).toEqual({ signal: controller.signal });
  });

  it("refetches once an entry expires", async () => {
    const { inner, fetchTaggedWays } = innerClient();
    let clock = 0;
    const client = createCachedGeodataClient(inner, { ttlMs: 1000, now: () => clock });

    await client.fetchTaggedWays(trackBox);
    clock = 999;
    await client.fetchTaggedWays(trackBox);
    expect(fetchTaggedWays).toHaveBeenCalledTimes(1);

    clock = 1000;
    await client.fetchTaggedWays(trackBox);
    expect(fetchTaggedWays).toHaveBeenCalledTimes(2);
  });

  it("evicts the oldest entry past maxEntries", async () => {
    const { inner, fetchTaggedWays } = innerClient();
    const client = createCachedGeodataClient(inner, { maxEntries: 2, now: () => 0 });

    await client.fetchTaggedWays(boxAt(1));
    await client.fetchTaggedWays(boxAt(2));
    await client.fetchTaggedWays(boxAt(3));
    expect(client.cache.size).toBe(2);

    await client.fetchTaggedWays(boxAt(3));
    expect(fetchTaggedWays).toHaveBeenCalledTimes(3);

    await client.fetchTaggedWays(boxAt(1));
    expect(fetchTaggedWays).toHaveBeenCalledTimes(4);
  });

  it("does not cache failures", async () => {
    const fetchTaggedWays = vi
      .fn<GeodataClient["fetchTaggedWays"]>()
      .mockRejectedValueOnce(new Error("Service unavailable"))
      .mockResolvedValueOnce(ways);
    const client = createCachedGeodataClient({ fetchTaggedWays }, { now: () => 0 });

    await expect(client.fetchTaggedWays(trackBox)).rejects.toThrow("Service unavailable");
    expect(client.cache.size).toBe(0);

    await expect(client.fetchTaggedWays(trackBox)).resolves.toEqual(ways);
    expect(fetchTaggedWays).toHaveBeenCalledTimes(2);
  });

  it("does not cache an Overpass runtime error reply", async () => {
    const post = vi.fn<OverpassHttp["post"]>().mockResolvedValue({
      data: { elements: [], remark: "runtime error: Query timed out after 30 seconds." },
    });
    const client = createCachedGeodataClient(
      new OverpassGeodataClient({
        servers: ["https://primary.test/api/interpreter"],
        retryDelayMs: 0,
        minRequestIntervalMs: 0,
        http: { post },
      }),
      { now: () => 0 }
    );

    const error = await analyzeTrack(
      [
        { lat: 0, lng: 0 },
        { lat: 0, lng: 0.001 },
      ],
      client,
      { config: { geodataFailurePolicy: "fail" } }
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GeodataUnavailableError);
    expect(client.cache.size).toBe(0);
  });
});

describe("GeodataCache", () => {
  it("returns null for missing keys", () => {
    expect(new GeodataCache().get("surface:bbox:0:0:0:0")).toBeNull();
  });

  it("clears all entries", () => {
    const cache = new GeodataCache({ now: () => 0 });
    cache.set("a", ways);
    cache.set("b", ways);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
