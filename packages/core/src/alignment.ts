/**
 * aeropose — Temporal alignment of subtitle and flight-log streams
 *
 * The subtitle clock and the flight-log clock drift apart by an unknown
 * constant. We look for the offset s that minimises the mean squared
 * position error between each caption's own latitude/longitude and the
 * flight log interpolated at `caption time + s`:
 *
 *   mse(s) = mean[(lat_log(t + s) − lat_sub)² + (lon_log(t + s) − lon_sub)²]
 *
 * The flight log should already be cut to the video segment.
 */

import { MalformedInputError } from './errors.js';
import { TelemetryInterpolator, wrapDelta } from './interpolation.js';
import { consoleLogger } from './logger.js';
import type { Logger } from './logger.js';
import { minimizeNelderMead } from './nelder-mead.js';
import type { TelemetryFrame } from './telemetry-frame.js';
import { DEFAULT_ALIGNMENT } from './types.js';
import type { AlignmentSettings, InterpolationSettings } from './types.js';

export interface AlignmentResult {
  /** Seconds to add to every subtitle timestamp. */
  offsetS: number;
  /** Objective value at `offsetS` (degrees²). */
  mse: number;
  iterations: number;
  evaluations: number;
  converged: boolean;
  /** Number of captions that took part in the fit. */
  samples: number;
}

export interface AlignmentOptions extends Partial<AlignmentSettings> {
  interpolation?: Partial<InterpolationSettings>;
  logger?: Logger;
}

/**
 * Build the mse(s) objective. Exposed so callers can probe the error
 * surface around a result.
 */
export function createAlignmentObjective(
  subtitleFrames: readonly TelemetryFrame[],
  logFrames: readonly TelemetryFrame[],
  interpolation: Partial<InterpolationSettings> = {},
): { objective: (offsetS: number) => number; samples: number } {
  const interpolator = new TelemetryInterpolator(logFrames, {
    timeField: 'datetime',
    settings: interpolation,
  });

  const elapsed: number[] = [];
  const lats: number[] = [];
  const lons: number[] = [];
  for (const frame of subtitleFrames) {
    if (frame.timestamp === undefined || frame.latitude === undefined || frame.longitude === undefined) {
      continue;
    }
    elapsed.push(interpolator.elapsedS(frame.timestamp));
    lats.push(frame.latitude);
    lons.push(frame.longitude);
  }
  if (elapsed.length === 0) {
    throw new MalformedInputError('No subtitle frames carry a timestamp and a position');
  }
  if (interpolator.length === 0) {
    throw new MalformedInputError('Flight log segment is empty');
  }

  const shifted = new Float64Array(elapsed.length);
  const objective = (offsetS: number): number => {
    for (let i = 0; i < elapsed.length; i++) shifted[i] = elapsed[i] + offsetS;
    const logLats = interpolator.sample('latitude', shifted);
    const logLons = interpolator.sample('longitude', shifted);
    let sum = 0;
    let count = 0;
    for (let i = 0; i < elapsed.length; i++) {
      const lat = logLats[i];
      const lon = logLons[i];
      if (lat === undefined || lon === undefined) continue;
      const dLat = lat - lats[i];
      const dLon = wrapDelta(lons[i], lon, 360);
      sum += dLat * dLat + dLon * dLon;
      count++;
    }
    return count > 0 ? sum / count : Infinity;
  };

  return { objective, samples: elapsed.length };
}

export function alignStreams(
  subtitleFrames: readonly TelemetryFrame[],
  logFrames: readonly TelemetryFrame[],
  options: AlignmentOptions = {},
): AlignmentResult {
  const { interpolation, logger = consoleLogger, ...overrides } = options;
  const settings = { ...DEFAULT_ALIGNMENT, ...overrides };
  const { objective, samples } = createAlignmentObjective(subtitleFrames, logFrames, interpolation);

  const result = minimizeNelderMead((x) => objective(x[0]), [settings.initialOffsetS], settings);
  const offsetS = result.x[0];

  logger.log(
    `[Align] offset=${offsetS.toFixed(3)}s mse=${result.fun.toExponential(3)} ` +
      `over ${samples} captions after ${result.iterations} iterations`,
  );
  if (!result.converged) {
    logger.warn(`[Align] Simplex search stopped at ${settings.maxIterations} iterations without converging`);
  }

  return {
    offsetS,
    mse: result.fun,
    iterations: result.iterations,
    evaluations: result.evaluations,
    converged: result.converged,
    samples,
  };
}
