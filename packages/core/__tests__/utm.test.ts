import { describe, expect, it } from 'vitest';
import { MalformedInputError } from '../src/errors.js';
import { projectUtm, utmCentralMeridian } from '../src/utm.js';

describe('projectUtm', () => {
  it('maps the zone origin to the false easting', () => {
    const { easting, northing } = projectUtm(0, 15);
    expect(easting).toBeCloseTo(500_000, 6);
    expect(northing).toBeCloseTo(0, 6);
  });

  it('scales the meridian arc by the central scale factor', () => {
    // Meridian arc from the equator to 1°N is 110 574.4 m.
    expect(Math.abs(projectUtm(1, 15).northing - 0.9996 * 110_574.4)).toBeLessThan(1);
  });

  it('is symmetric about the central meridian', () => {
    const east = projectUtm(47, 16);
    const west = projectUtm(47, 14);
    expect(east.easting - 500_000).toBeCloseTo(500_000 - west.easting, 6);
    expect(east.northing).toBeCloseTo(west.northing, 6);
    expect(east.easting).toBeGreaterThan(500_000);
  });

  it('applies the southern false northing', () => {
    const north = projectUtm(1, 15);
    const south = projectUtm(-1, 15, { hemisphere: 'south' });
    expect(south.northing).toBeCloseTo(10_000_000 - north.northing, 6);
  });

  it('honours the configured zone', () => {
    expect(utmCentralMeridian(33)).toBe(15);
    expect(utmCentralMeridian(32)).toBe(9);
    expect(projectUtm(0, 9, { zone: 32 }).easting).toBeCloseTo(500_000, 6);
  });

  it('rejects invalid zones', () => {
    expect(() => projectUtm(0, 0, { zone: 61 })).toThrow(MalformedInputError);
  });
});
