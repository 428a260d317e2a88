/**
 * Surface vocabulary.
 *
 * Fixed set of surface labels the engine reports, and the mapping from raw
 * OSM `surface=*` values onto it. Anything not recognized is "unknown".
 */

export const SURFACE_LABELS = [
  "asphalt",
  "concrete",
  "paved",
  "paving_stones",
  "sett",
  "cobblestone",
  "metal",
  "wood",
  "compacted",
  "fine_gravel",
  "gravel",
  "unpaved",
  "dirt",
  "earth",
  "grass",
  "sand",
  "mud",
  "clay",
  "snow",
  "ice",
  "unknown",
] as const;

export type SurfaceLabel = (typeof SURFACE_LABELS)[number];

export const UNKNOWN_SURFACE: SurfaceLabel = "unknown";

const LABEL_SET: ReadonlySet<string> = new Set<string>(SURFACE_LABELS);

/** OSM values that mean the same thing as one of the labels */
const SURFACE_TAG_ALIASES: ReadonlyMap<string, SurfaceLabel> = new Map<string, SurfaceLabel>([
  ["concrete:plates", "concrete"],
  ["concrete:lanes", "concrete"],
  ["chipseal", "asphalt"],
  ["bricks", "paving_stones"],
  ["grass_paver", "paving_stones"],
  ["unhewn_cobblestone", "cobblestone"],
  ["metal_grid", "metal"],
  ["pebblestone", "gravel"],
  ["rock", "unpaved"],
  ["woodchips", "unpaved"],
  ["ground", "earth"],
]);

export function isSurfaceLabel(value: string): value is SurfaceLabel {
  return LABEL_SET.has(value);
}

/**
 * Map a raw OSM surface tag onto the vocabulary.
 *
 * Multi-valued tags ("asphalt;gravel") use their first value.
 *
 * @example
 * canonicalizeSurfaceTag(" Asphalt ")       // "asphalt"
 * canonicalizeSurfaceTag("ground")          // "earth"
 * canonicalizeSurfaceTag("gravel;asphalt")  // "gravel"
 * canonicalizeSurfaceTag("lava")            // "unknown"
 */
export function canonicalizeSurfaceTag(raw: string | undefined): SurfaceLabel {
  if (!raw) return UNKNOWN_SURFACE;

  const value = raw.split(";")[0].trim().toLowerCase().replace(/\s+/g, "_");
  if (isSurfaceLabel(value)) return value;

  return SURFACE_TAG_ALIASES.get(value) ?? UNKNOWN_SURFACE;
}
