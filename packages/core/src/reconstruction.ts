/**
 * aeropose — Reconstruction model
 *
 * Cameras, posed images and 3-D points as exchanged with structure-from-
 * motion tools. Codecs for the binary and text layouts live in
 * reconstruction-binary.ts and reconstruction-text.ts.
 */

import { FormatMismatchError, MalformedInputError, UnsupportedModelError } from './errors.js';

// ─── Camera models ───────────────────────────────────────────────────────────

export type CameraModelName =
  | 'SIMPLE_PINHOLE'
  | 'PINHOLE'
  | 'SIMPLE_RADIAL'
  | 'RADIAL'
  | 'OPENCV'
  | 'OPENCV_FISHEYE'
  | 'FULL_OPENCV'
  | 'FOV'
  | 'SIMPLE_RADIAL_FISHEYE'
  | 'RADIAL_FISHEYE'
  | 'THIN_PRISM_FISHEYE';

export interface CameraModel {
  readonly id: number;
  readonly name: CameraModelName;
  readonly numParams: number;
}

export const CAMERA_MODELS: readonly CameraModel[] = Object.freeze([
  { id: 0, name: 'SIMPLE_PINHOLE', numParams: 3 },
  { id: 1, name: 'PINHOLE', numParams: 4 },
  { id: 2, name: 'SIMPLE_RADIAL', numParams: 4 },
  { id: 3, name: 'RADIAL', numParams: 5 },
  { id: 4, name: 'OPENCV', numParams: 8 },
  { id: 5, name: 'OPENCV_FISHEYE', numParams: 8 },
  { id: 6, name: 'FULL_OPENCV', numParams: 12 },
  { id: 7, name: 'FOV', numParams: 5 },
  { id: 8, name: 'SIMPLE_RADIAL_FISHEYE', numParams: 4 },
  { id: 9, name: 'RADIAL_FISHEYE', numParams: 5 },
  { id: 10, name: 'THIN_PRISM_FISHEYE', numParams: 12 },
]);

const MODELS_BY_ID = new Map(CAMERA_MODELS.map((model) => [model.id, model]));
const MODELS_BY_NAME = new Map<string, CameraModel>(CAMERA_MODELS.map((model) => [model.name, model]));

export function cameraModelById(id: number): CameraModel {
  const model = MODELS_BY_ID.get(id);
  if (model === undefined) {
    throw new UnsupportedModelError(`Unknown camera model id ${id}`, id);
  }
  return model;
}

export function cameraModelByName(name: string): CameraModel {
  const model = MODELS_BY_NAME.get(name);
  if (model === undefined) {
    throw new UnsupportedModelError(`Unknown camera model "${name}"`, name);
  }
  return model;
}

// ─── Entities ────────────────────────────────────────────────────────────────

export type Vec3 = [number, number, number];
/** Quaternion in (w, x, y, z) order. */
export type Quat = [number, number, number, number];
export type Rgb = [number, number, number];

export interface Camera {
  id: number;
  model: CameraModel;
  width: number;
  height: number;
  /** Exactly `model.numParams` values. */
  params: number[];
}

/** Observed point3D id of a keypoint that has no 3-D point. */
export const INVALID_POINT3D_ID = -1;

export interface Point2D {
  x: number;
  y: number;
  point3DId: number;
}

/** An image with its world-to-camera pose. */
export interface PosedImage {
  id: number;
  quaternion: Quat;
  translation: Vec3;
  cameraId: number;
  name: string;
  points2D: Point2D[];
}

export interface Point3D {
  id: number;
  xyz: Vec3;
  rgb: Rgb;
  error: number;
  /** Track: `imageIds[i]` observes this point at keypoint `point2DIdxs[i]`. */
  imageIds: number[];
  point2DIdxs: number[];
}

// ─── Validation ──────────────────────────────────────────────────────────────

export function assertCameraParams(camera: Camera): void {
  if (camera.params.length !== camera.model.numParams) {
    throw new FormatMismatchError(
      'Camera',
      camera.id,
      camera.model.numParams,
      camera.params.length,
      `${camera.model.name} parameter count`,
    );
  }
}

export function assertTrack(point: Point3D): void {
  if (point.imageIds.length !== point.point2DIdxs.length) {
    throw new FormatMismatchError(
      'Point3D',
      point.id,
      point.imageIds.length,
      point.point2DIdxs.length,
      'track length',
    );
  }
}

export function createCamera(
  id: number,
  model: CameraModel | CameraModelName,
  width: number,
  height: number,
  params: readonly number[],
): Camera {
  const camera: Camera = {
    id,
    model: typeof model === 'string' ? cameraModelByName(model) : model,
    width,
    height,
    params: [...params],
  };
  assertCameraParams(camera);
  return camera;
}

// ─── Calibration import ──────────────────────────────────────────────────────

/** Output of a checkerboard calibration: 3×3 intrinsic matrix and distortion. */
export interface OpenCvCalibration {
  mtx: ReadonlyArray<readonly number[]>;
  dist: readonly number[];
  width: number;
  height: number;
}

/**
 * Build an OPENCV camera from a calibration. Only k1, k2, p1, p2 are kept;
 * missing coefficients are zero.
 */
export function cameraFromOpenCv(calibration: OpenCvCalibration, id = 0): Camera {
  const { mtx, dist, width, height } = calibration;
  if (mtx.length !== 3 || mtx.some((row) => row.length !== 3)) {
    throw new MalformedInputError('Camera matrix must be 3×3');
  }
  const distortion = [0, 1, 2, 3].map((i) => dist[i] ?? 0);
  return createCamera(id, 'OPENCV', width, height, [
    mtx[0][0],
    mtx[1][1],
    mtx[0][2],
    mtx[1][2],
    ...distortion,
  ]);
}
