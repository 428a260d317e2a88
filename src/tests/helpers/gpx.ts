/**
 * GPX document builder for tests
 */

export interface FixturePoint {
  lat: number | string;
  lon: number | string;
  ele?: number | string;
}

export function buildGpx(
  points: FixturePoint[],
  options: { name?: string; pointTag?: "trkpt" | "rtept" } = {}
): string {
  const tag = options.pointTag ?? "trkpt";
  const body = points
    .map((p) => {
      const ele = p.ele === undefined ? "" : `<ele>${p.ele}</ele>`;
      return `      <${tag} lat="${p.lat}" lon="${p.lon}">${ele}</${tag}>`;
    })
    .join("\n");
  const name = options.name ? `<name>${options.name}</name>` : "";

  const container =
    tag === "trkpt"
      ? `  <trk>${name}\n    <trkseg>\n${body}\n    </trkseg>\n  </trk>`
      : `  <rte>${name}\n${body}\n  </rte>`;

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<gpx version="1.1" creator="test" xmlns="http://www.topografix.com/GPX/1/1">',
    container,
    "</gpx>",
  ].join("\n");
}

/** (0,0) → (0,0.001) → (0,0.002) climbing 100 → 105 → 102 */
export const THREE_POINT_TRACK: FixturePoint[] = [
  { lat: 0, lon: 0, ele: 100 },
  { lat: 0, lon: 0.001, ele: 105 },
  { lat: 0, lon: 0.002, ele: 102 },
];
