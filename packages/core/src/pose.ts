/**
 * aeropose — Camera pose from telemetry
 *
 * Scene frame: UTM easting/northing and altitude relative to the scene
 * origin, then flipped into the camera convention of the reconstruction
 * (x right, y down, z forward) by diag(1, −1, −1).
 *
 * Orientation: gimbal pitch is measured from the horizon, so +90° turns a
 * nadir-pointing default into a forward-looking one. Roll is ignored. The
 * angles (pitch + 90, 0, heading) are applied about the fixed X, Y and Z
 * axes in that order.
 */

import { Euler, MathUtils, Matrix4, Quaternion } from 'three';
import type { SceneOrigin } from './dem-config.js';
import { MalformedInputError } from './errors.js';
import type { Quat, Vec3 } from './reconstruction.js';
import type { TelemetryFrame } from './telemetry-frame.js';
import { DEFAULT_PROJECTION } from './types.js';
import type { ProjectionSettings } from './types.js';
import { projectUtm } from './utm.js';

const AXIS_FLIP = new Matrix4().makeScale(1, -1, -1);

export interface CameraPose {
  /** (w, x, y, z), w ≥ 0. */
  quaternion: Quat;
  translation: Vec3;
}

function mod360(deg: number): number {
  return ((deg % 360) + 360) % 360;
}

/** Euler angles in degrees about X, Y, Z. */
export function cameraEulerDegrees(frame: TelemetryFrame): Vec3 {
  const pitch = frame.gimbalPitch === undefined ? 0 : frame.gimbalPitch + 90;
  return [mod360(pitch), 0, mod360(frame.compassHeading ?? 0)];
}

export function computeCameraPose(
  frame: TelemetryFrame,
  origin: SceneOrigin,
  projection: Partial<ProjectionSettings> = DEFAULT_PROJECTION,
): CameraPose {
  if (frame.latitude === undefined || frame.longitude === undefined) {
    throw new MalformedInputError(`Frame ${frame.id} has no position`);
  }
  const { easting, northing } = projectUtm(frame.latitude, frame.longitude, projection);
  const translation: Vec3 = [
    easting - origin.projected.easting,
    origin.projected.northing - northing,
    origin.altitude - (frame.altitude ?? 0),
  ];

  // Three's 'ZYX' order composes Rz·Ry·Rx, i.e. rotations about fixed X, then Y, then Z.
  const [rx, ry, rz] = cameraEulerDegrees(frame).map(MathUtils.degToRad);
  const rotation = new Matrix4()
    .makeRotationFromEuler(new Euler(rx, ry, rz, 'ZYX'))
    .premultiply(AXIS_FLIP);
  const q = new Quaternion().setFromRotationMatrix(rotation);
  const sign = q.w < 0 ? -1 : 1;

  return {
    quaternion: [sign * q.w, sign * q.x, sign * q.y, sign * q.z],
    translation,
  };
}
