/**
 * aeropose — Settings
 *
 * Each tunable group has an interface and a DEFAULT_* constant; entry
 * points take `Partial<...>` overrides and merge them over the default.
 */

import type { LineSource } from './io.js';
import type { Logger } from './logger.js';
import type { TelemetryFrame } from './telemetry-frame.js';

// ─── Parsers ─────────────────────────────────────────────────────────────────

export interface ParseOptions {
  /** Number of leading frames to drop. */
  skip?: number;
  /** Stop after this many frames. */
  limit?: number;
  logger?: Logger;
}

/**
 * Shared contract of the two telemetry parsers. `frames` is lazy and
 * starts over on every call; `parse` collects it.
 */
export interface TelemetryParser {
  frames(source: LineSource, options?: ParseOptions): Generator<TelemetryFrame, void, undefined>;
  parse(source: LineSource, options?: ParseOptions): TelemetryFrame[];
}

export interface FlightLogSettings {
  delimiter: string;
  quote: string;
  /** Max distance between a video start and its marker frame. */
  videoOffsetToleranceS: number;
}

export const DEFAULT_FLIGHT_LOG: FlightLogSettings = {
  delimiter: ',',
  quote: '"',
  videoOffsetToleranceS: 60,
};

export interface SubtitleSettings {
  /**
   * Zone of the wall-clock timestamps embedded in the captions, in minutes
   * east of UTC. Undefined means the host's local zone.
   */
  utcOffsetMinutes?: number;
}

export const DEFAULT_SUBTITLE: SubtitleSettings = {};

// ─── Interpolation ───────────────────────────────────────────────────────────

export interface InterpolationSettings {
  /** Period of angular fields in degrees. */
  angularPeriodDeg: number;
  /**
   * Latitudes on opposite sides of ±this value are joined across the pole.
   * A flight-path heuristic, not great-circle interpolation.
   */
  latitudeWrapThresholdDeg: number;
  /** Longitudes on opposite sides of ±this value are joined across the antimeridian. */
  longitudeWrapThresholdDeg: number;
}

export const DEFAULT_INTERPOLATION: InterpolationSettings = {
  angularPeriodDeg: 360,
  latitudeWrapThresholdDeg: 45,
  longitudeWrapThresholdDeg: 90,
};

// ─── Alignment ───────────────────────────────────────────────────────────────

export interface NelderMeadSettings {
  maxIterations: number;
  /** Stop once every simplex vertex is within this distance of the best one... */
  xTolerance: number;
  /** ...and every objective value within this of the best value. */
  fTolerance: number;
  /** Step used to build the initial simplex for zero-valued coordinates. */
  initialStep: number;
}

export const DEFAULT_NELDER_MEAD: NelderMeadSettings = {
  maxIterations: 200,
  xTolerance: 1e-4,
  fTolerance: 1e-4,
  initialStep: 0.00025,
};

export interface AlignmentSettings extends NelderMeadSettings {
  initialOffsetS: number;
}

export const DEFAULT_ALIGNMENT: AlignmentSettings = {
  ...DEFAULT_NELDER_MEAD,
  initialOffsetS: 0,
};

// ─── Projection ──────────────────────────────────────────────────────────────

export interface ProjectionSettings {
  /** UTM zone, 1–60. */
  zone: number;
  hemisphere: 'north' | 'south';
}

export const DEFAULT_PROJECTION: ProjectionSettings = {
  zone: 33,
  hemisphere: 'north',
};
