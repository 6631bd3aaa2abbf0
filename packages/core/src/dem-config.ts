/**
 * aeropose — DEM/origin configuration
 *
 *   { "origin_wgs84": { "longitude": 15.1, "latitude": 47.2, "altitude": 410 } }
 *
 * The origin anchors the local scene frame. Any problem reading it is
 * reported and the zero origin is used instead, so a reconstruction can
 * still be produced (in absolute UTM metres).
 */

import { z } from 'zod';
import { FileAccessError } from './errors.js';
import { readFileText } from './io.js';
import { consoleLogger } from './logger.js';
import type { Logger } from './logger.js';
import { DEFAULT_PROJECTION } from './types.js';
import type { ProjectionSettings } from './types.js';
import { projectUtm } from './utm.js';
import type { UtmCoordinate } from './utm.js';

export const demConfigSchema = z.object({
  origin_wgs84: z.object({
    longitude: z.number().min(-180).max(180),
    latitude: z.number().min(-90).max(90),
    altitude: z.number(),
  }),
});

export type DemConfig = z.infer<typeof demConfigSchema>;

export interface SceneOrigin {
  /** Undefined when the fallback origin is in use. */
  wgs84?: DemConfig['origin_wgs84'];
  projected: UtmCoordinate;
  altitude: number;
}

export const ZERO_ORIGIN: SceneOrigin = {
  projected: { easting: 0, northing: 0 },
  altitude: 0,
};

export function originFromConfig(
  config: DemConfig,
  projection: Partial<ProjectionSettings> = DEFAULT_PROJECTION,
): SceneOrigin {
  const wgs84 = config.origin_wgs84;
  return {
    wgs84,
    projected: projectUtm(wgs84.latitude, wgs84.longitude, projection),
    altitude: wgs84.altitude,
  };
}

/** Validate an already-parsed document. */
export function parseDemConfig(value: unknown): DemConfig {
  return demConfigSchema.parse(value);
}

/** Read the origin from a JSON file, falling back to ZERO_ORIGIN. */
export function loadSceneOrigin(
  path: string,
  projection: Partial<ProjectionSettings> = DEFAULT_PROJECTION,
  logger: Logger = consoleLogger,
): SceneOrigin {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileText(path));
  } catch (err) {
    const reason = err instanceof FileAccessError ? err.message : `Invalid JSON in ${path}`;
    logger.warn(`[Config] ${reason}; using zero origin`);
    return ZERO_ORIGIN;
  }

  const result = demConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    logger.warn(`[Config] Invalid DEM config ${path} (${issues}); using zero origin`);
    return ZERO_ORIGIN;
  }

  const origin = originFromConfig(result.data, projection);
  logger.log(
    `[Config] Origin ${origin.altitude}m at E${origin.projected.easting.toFixed(2)} ` +
      `N${origin.projected.northing.toFixed(2)}`,
  );
  return origin;
}
