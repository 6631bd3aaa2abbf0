import { Quaternion, Vector3 } from 'three';
import { describe, expect, it } from 'vitest';
import type { SceneOrigin } from '../src/dem-config.js';
import { MalformedInputError } from '../src/errors.js';
import { cameraEulerDegrees, computeCameraPose } from '../src/pose.js';
import type { CameraPose } from '../src/pose.js';
import type { TelemetryFrame } from '../src/telemetry-frame.js';
import { projectUtm } from '../src/utm.js';

const ORIGIN: SceneOrigin = { projected: projectUtm(47, 15), altitude: 400 };

function rotate(pose: CameraPose, v: [number, number, number]): number[] {
  const [w, x, y, z] = pose.quaternion;
  return new Vector3(...v).applyQuaternion(new Quaternion(x, y, z, w)).toArray();
}

function expectClose(actual: readonly number[], expected: readonly number[]): void {
  expect(actual).toHaveLength(expected.length);
  actual.forEach((value, i) => expect(value).toBeCloseTo(expected[i], 9));
}

describe('cameraEulerDegrees', () => {
  it('tilts the gimbal pitch to the nadir and wraps into [0, 360)', () => {
    expect(cameraEulerDegrees({ id: 0, gimbalPitch: -30, compassHeading: -90 })).toEqual([60, 0, 270]);
  });

  it('treats missing angles as zero', () => {
    expect(cameraEulerDegrees({ id: 0 })).toEqual([0, 0, 0]);
  });
});

describe('computeCameraPose', () => {
  const base: TelemetryFrame = { id: 0, latitude: 47, longitude: 15, altitude: 450 };

  it('places a camera above the origin looking straight down', () => {
    const pose = computeCameraPose({ ...base, gimbalPitch: -90, compassHeading: 0 }, ORIGIN);

    expect(pose.translation).toEqual([0, 0, -50]);
    expectClose(pose.quaternion, [0, 1, 0, 0]);
  });

  it('turns with the compass heading', () => {
    const pose = computeCameraPose({ ...base, gimbalPitch: -90, compassHeading: 90 }, ORIGIN);
    expectClose(rotate(pose, [1, 0, 0]), [0, -1, 0]);
  });

  it('looks along the horizon at zero gimbal pitch', () => {
    const pose = computeCameraPose({ ...base, gimbalPitch: 0, compassHeading: 0 }, ORIGIN);
    expectClose(rotate(pose, [0, 0, 1]), [0, 1, 0]);
  });

  it('keeps the scalar part non-negative', () => {
    const pose = computeCameraPose({ ...base, gimbalPitch: 45, compassHeading: 200 }, ORIGIN);
    expect(pose.quaternion[0]).toBeGreaterThanOrEqual(0);
    expect(Math.hypot(...pose.quaternion)).toBeCloseTo(1, 12);
  });

  it('measures east and north relative to the origin', () => {
    const pose = computeCameraPose({ ...base, latitude: 47.001, longitude: 15.002 }, ORIGIN);
    const { easting, northing } = projectUtm(47.001, 15.002);

    expect(pose.translation[0]).toBeCloseTo(easting - ORIGIN.projected.easting, 9);
    expect(pose.translation[1]).toBeCloseTo(ORIGIN.projected.northing - northing, 9);
    expect(pose.translation[0]).toBeGreaterThan(0);
    expect(pose.translation[1]).toBeLessThan(0);
  });

  it('requires a position', () => {
    expect(() => computeCameraPose({ id: 3, altitude: 10 }, ORIGIN)).toThrow(MalformedInputError);
  });
});
