/**
 * Surface engine errors.
 *
 * Every error names the stage that failed so the route handler can pick a
 * status code and message without inspecting the cause.
 *
 * @example
 * try {
 *   const result = await analyzeTrack(points, client);
 * } catch (error) {
 *   if (error instanceof GeodataUnavailableError) {
 *     res.status(503).json({ error: error.message });
 *   }
 * }
 */

export type AnalysisStage = "input" | "geodata";

export class AnalysisError extends Error {
  constructor(
    message: string,
    readonly stage: AnalysisStage,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "AnalysisError";
  }
}

/** No trackpoints, or a coordinate outside the valid lat/lng range */
export class TrackInputError extends AnalysisError {
  constructor(message: string) {
    super(message, "input");
    this.name = "TrackInputError";
  }
}

/** The geodata source failed after its retry */
export class GeodataUnavailableError extends AnalysisError {
  constructor(message: string, cause?: unknown) {
    super(message, "geodata", { cause });
    this.name = "GeodataUnavailableError";
  }
}

/** The caller aborted while the geodata request was pending */
export class AnalysisCancelledError extends AnalysisError {
  constructor(cause?: unknown) {
    super("Analysis cancelled", "geodata", { cause });
    this.name = "AnalysisCancelledError";
  }
}
