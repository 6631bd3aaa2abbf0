/**
 * aeropose — WGS-84 → UTM projection
 *
 * Forward transverse Mercator using Krüger's series in the third flattening
 * n, truncated after n³ (sub-millimetre within a zone). Inputs are degrees,
 * outputs metres with the usual false easting/northing.
 */

import { MalformedInputError } from './errors.js';
import { DEFAULT_PROJECTION } from './types.js';
import type { ProjectionSettings } from './types.js';

const WGS84_A = 6_378_137;
const WGS84_F = 1 / 298.257223563;
const K0 = 0.9996;
const FALSE_EASTING = 500_000;
const FALSE_NORTHING_SOUTH = 10_000_000;

const N = WGS84_F / (2 - WGS84_F);
const RECTIFYING_RADIUS = (WGS84_A / (1 + N)) * (1 + (N * N) / 4 + (N ** 4) / 64);
const ALPHA = [
  N / 2 - (2 / 3) * N * N + (5 / 16) * N ** 3,
  (13 / 48) * N * N - (3 / 5) * N ** 3,
  (61 / 240) * N ** 3,
];
const E2N = (2 * Math.sqrt(N)) / (1 + N);

const DEG2RAD = Math.PI / 180;

export interface UtmCoordinate {
  easting: number;
  northing: number;
}

/** Longitude of the central meridian of a UTM zone, in degrees. */
export function utmCentralMeridian(zone: number): number {
  return (zone - 1) * 6 - 180 + 3;
}

export function projectUtm(
  latitude: number,
  longitude: number,
  settings: Partial<ProjectionSettings> = {},
): UtmCoordinate {
  const { zone, hemisphere } = { ...DEFAULT_PROJECTION, ...settings };
  if (!Number.isInteger(zone) || zone < 1 || zone > 60) {
    throw new MalformedInputError(`Invalid UTM zone: ${zone}`);
  }

  const phi = latitude * DEG2RAD;
  const dLambda = (longitude - utmCentralMeridian(zone)) * DEG2RAD;
  const sinPhi = Math.sin(phi);

  const t = Math.sinh(Math.atanh(sinPhi) - E2N * Math.atanh(E2N * sinPhi));
  const xiP = Math.atan2(t, Math.cos(dLambda));
  const etaP = Math.atanh(Math.sin(dLambda) / Math.sqrt(1 + t * t));

  let xi = xiP;
  let eta = etaP;
  ALPHA.forEach((alpha, i) => {
    const j = 2 * (i + 1);
    xi += alpha * Math.sin(j * xiP) * Math.cosh(j * etaP);
    eta += alpha * Math.cos(j * xiP) * Math.sinh(j * etaP);
  });

  return {
    easting: FALSE_EASTING + K0 * RECTIFYING_RADIUS * eta,
    northing: (hemisphere === 'south' ? FALSE_NORTHING_SOUTH : 0) + K0 * RECTIFYING_RADIUS * xi,
  };
}
