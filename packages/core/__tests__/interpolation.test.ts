import { describe, expect, it } from 'vitest';
import { MalformedInputError } from '../src/errors.js';
import {
  TelemetryInterpolator,
  blendNumeric,
  interpolateFrames,
  interpolatePair,
  wrapDelta,
} from '../src/interpolation.js';
import type { TelemetryFrame } from '../src/telemetry-frame.js';

const T0 = Date.UTC(2023, 3, 15, 10, 0, 0);

function at(seconds: number): Date {
  return new Date(T0 + seconds * 1000);
}

function frame(id: number, seconds: number, fields: Omit<TelemetryFrame, 'id' | 'datetime'> = {}): TelemetryFrame {
  return { id, datetime: at(seconds), ...fields };
}

describe('wrapDelta', () => {
  it('takes the short way round', () => {
    expect(wrapDelta(350, 10, 360)).toBe(20);
    expect(wrapDelta(10, 350, 360)).toBe(-20);
  });

  it('keeps the sign of a half-period step', () => {
    expect(wrapDelta(0, 180, 360)).toBe(180);
    expect(wrapDelta(180, 0, 360)).toBe(-180);
  });
});

describe('blendNumeric', () => {
  it('interpolates headings across north', () => {
    expect(blendNumeric('angular', 350, 10, 0.5)).toBeCloseTo(0, 10);
    expect(blendNumeric('angular', 350, 10, 0.25)).toBeCloseTo(355, 10);
  });

  it('interpolates longitude across the antimeridian', () => {
    const lon = blendNumeric('longitude', 179, -179, 0.5);
    expect(Math.abs(lon)).toBeCloseTo(180, 10);
    expect(blendNumeric('longitude', 179, -179, 0.25)).toBeCloseTo(179.5, 10);
  });

  it('interpolates latitude across the pole', () => {
    expect(blendNumeric('latitude', -80, 80, 0.25)).toBe(-85);
    expect(blendNumeric('latitude', 80, -80, 0.5)).toBe(-90);
  });

  it('stays linear away from the wrap thresholds', () => {
    expect(blendNumeric('latitude', 10, 20, 0.5)).toBe(15);
    expect(blendNumeric('longitude', -80, 80, 0.5)).toBe(0);
  });

  it('honours configured thresholds', () => {
    const settings = { angularPeriodDeg: 360, latitudeWrapThresholdDeg: 45, longitudeWrapThresholdDeg: 170 };
    expect(blendNumeric('longitude', 160, -160, 0.5, settings)).toBe(0);
    expect(blendNumeric('latitude', -80, 80, 0.25, { ...settings, latitudeWrapThresholdDeg: 85 })).toBe(-40);
  });
});

describe('interpolatePair', () => {
  const a = frame(0, 0, { speed: 10, isVideo: 0, message: 'a', extras: { k: 1 } });
  const b = frame(1, 1, { speed: 20, isVideo: 1, message: 'b', extras: { k: 2 } });

  it('copies the endpoints exactly', () => {
    expect(interpolatePair(a, b, 0, 5)).toEqual({ ...a, id: 5 });
    expect(interpolatePair(a, b, 1, 6)).toEqual({ ...b, id: 6 });
  });

  it('takes flags, text and extras from the nearer frame', () => {
    const early = interpolatePair(a, b, 0.25, 0);
    const late = interpolatePair(a, b, 0.75, 0);

    expect(early.isVideo).toBe(0);
    expect(late.isVideo).toBe(1);
    expect(early.message).toBe('a');
    expect(late.message).toBe('b');
    expect(early.extras).toEqual({ k: 1 });
    expect(late.extras).toEqual({ k: 2 });
  });

  it('blends timestamps on elapsed time', () => {
    expect(interpolatePair(a, b, 0.5, 0).datetime).toEqual(new Date(T0 + 500));
  });

  it('keeps a value present on one side only from the nearer frame', () => {
    const c = frame(2, 1, { speed: 20, altitude: 100 });
    expect(interpolatePair(a, c, 0.4, 0).altitude).toBeUndefined();
    expect(interpolatePair(a, c, 0.6, 0).altitude).toBe(100);
  });
});

describe('interpolateFrames', () => {
  const frames = [
    frame(0, 0, { compassHeading: 350, latitude: 47, longitude: 179, speed: 10 }),
    frame(1, 1, { compassHeading: 10, latitude: 48, longitude: -179, speed: 20 }),
    frame(2, 3, { compassHeading: 30, latitude: 49, longitude: -178, speed: 40 }),
  ];

  it('returns source frames at source timestamps', () => {
    const out = interpolateFrames(frames, [at(0), at(1), at(3)]);
    expect(out).toEqual(frames.map((f, id) => ({ ...f, id })));
  });

  it('interpolates between frames', () => {
    const [mid] = interpolateFrames(frames, [at(0.5)]);

    expect(mid.id).toBe(0);
    expect(mid.compassHeading).toBeCloseTo(0, 10);
    expect(mid.latitude).toBeCloseTo(47.5, 10);
    expect(Math.abs(mid.longitude ?? 0)).toBeCloseTo(180, 10);
    expect(mid.speed).toBeCloseTo(15, 10);
    expect(mid.datetime).toEqual(at(0.5));
  });

  it('uses the matching segment for later targets', () => {
    const [out] = interpolateFrames(frames, [at(2)]);
    expect(out.speed).toBeCloseTo(30, 10);
    expect(out.compassHeading).toBeCloseTo(20, 10);
  });

  it('extrapolates past both ends', () => {
    const [before, after] = interpolateFrames(frames, [at(-1), at(4)]);
    expect(before.speed).toBeCloseTo(0, 10);
    expect(after.speed).toBeCloseTo(50, 10);
  });

  it('returns the only frame for every target', () => {
    const only = frame(0, 0, { speed: 7, compassHeading: 90 });
    const out = interpolateFrames([only], [at(-5), at(0), at(100)]);
    expect(out).toEqual([0, 1, 2].map((id) => ({ ...only, id })));
  });

  it('returns nothing for an empty source', () => {
    expect(interpolateFrames([], [at(0)])).toEqual([]);
  });

  it('interpolates on another timestamp field', () => {
    const captions: TelemetryFrame[] = [
      { id: 0, timestamp: at(0), relAlt: 10 },
      { id: 1, timestamp: at(2), relAlt: 20 },
    ];
    const [out] = interpolateFrames(captions, [at(1)], { timeField: 'timestamp' });
    expect(out.relAlt).toBe(15);
  });

  it('rejects frames without the time field', () => {
    expect(() => interpolateFrames([{ id: 0 }], [at(0)])).toThrow(MalformedInputError);
  });
});

describe('TelemetryInterpolator.sample', () => {
  it('samples one field at elapsed seconds', () => {
    const interpolator = new TelemetryInterpolator([
      frame(0, 0, { speed: 10 }),
      frame(1, 2, { speed: 30 }),
    ]);

    expect(interpolator.elapsedS(at(1.5))).toBe(1.5);
    expect(interpolator.sample('speed', [0, 1, 2, 3])).toEqual([10, 20, 30, 40]);
    expect(interpolator.sample('altitude', [1])).toEqual([undefined]);
  });
});
