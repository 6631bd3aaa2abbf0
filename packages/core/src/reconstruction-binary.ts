/**
 * aeropose — Reconstruction binary layout
 *
 * Little-endian, no header beyond the record count:
 *
 *   cameras   u64 n, then n × { u32 id, i32 model, u64 width, u64 height, f64 × numParams }
 *   images    u64 n, then n × { u32 id, f64 × 4 qwxyz, f64 × 3 t, u32 camera,
 *                               name\0, u64 m, m × { f64 x, f64 y, u64 point3D } }
 *   points3D  u64 n, then n × { u64 id, f64 × 3 xyz, u8 × 3 rgb, f64 error,
 *                               u64 m, m × { u32 image, u32 point2D index } }
 *
 * An unobserved keypoint stores 2⁶⁴−1 as its point3D id.
 */

import { BinaryReader, BinaryWriter } from './binary-io.js';
import {
  INVALID_POINT3D_ID,
  assertCameraParams,
  assertTrack,
  cameraModelById,
} from './reconstruction.js';
import type { Camera, Point2D, Point3D, PosedImage } from './reconstruction.js';

const UNOBSERVED = 0xffff_ffff_ffff_ffffn;

type Entity = Camera | PosedImage | Point3D;

function encodeAll<T extends Entity>(items: readonly T[], write: (w: BinaryWriter, item: T) => void): Uint8Array {
  const writer = new BinaryWriter();
  writer.u64(items.length);
  for (const item of items) write(writer, item);
  return writer.toBytes();
}

function* decodeAll<T extends Entity>(
  bytes: Uint8Array,
  source: string | undefined,
  read: (r: BinaryReader) => T,
): Generator<T, void, undefined> {
  const reader = new BinaryReader(bytes, source);
  const count = reader.u64Number('record count');
  for (let i = 0; i < count; i++) yield read(reader);
}

// ─── Cameras ─────────────────────────────────────────────────────────────────

function writeCamera(w: BinaryWriter, camera: Camera): void {
  assertCameraParams(camera);
  w.u32(camera.id).i32(camera.model.id).u64(camera.width).u64(camera.height);
  for (const p of camera.params) w.f64(p);
}

function readCamera(r: BinaryReader): Camera {
  const id = r.u32('camera id');
  const model = cameraModelById(r.i32('camera model'));
  const width = r.u64Number('camera width');
  const height = r.u64Number('camera height');
  const params: number[] = [];
  for (let i = 0; i < model.numParams; i++) params.push(r.f64('camera parameter'));
  return { id, model, width, height, params };
}

export function encodeCamerasBinary(cameras: readonly Camera[]): Uint8Array {
  return encodeAll(cameras, writeCamera);
}

export function iterateCamerasBinary(bytes: Uint8Array, source?: string): Generator<Camera, void, undefined> {
  return decodeAll(bytes, source, readCamera);
}

export function decodeCamerasBinary(bytes: Uint8Array, source?: string): Camera[] {
  return [...iterateCamerasBinary(bytes, source)];
}

// ─── Images ──────────────────────────────────────────────────────────────────

function writeImage(w: BinaryWriter, image: PosedImage): void {
  w.u32(image.id);
  for (const q of image.quaternion) w.f64(q);
  for (const t of image.translation) w.f64(t);
  w.u32(image.cameraId).cstring(image.name).u64(image.points2D.length);
  for (const point of image.points2D) {
    w.f64(point.x).f64(point.y);
    w.u64(point.point3DId === INVALID_POINT3D_ID ? UNOBSERVED : point.point3DId);
  }
}

function readImage(r: BinaryReader): PosedImage {
  const id = r.u32('image id');
  const quaternion: PosedImage['quaternion'] = [r.f64('qw'), r.f64('qx'), r.f64('qy'), r.f64('qz')];
  const translation: PosedImage['translation'] = [r.f64('tx'), r.f64('ty'), r.f64('tz')];
  const cameraId = r.u32('camera id');
  const name = r.cstring('image name');
  const count = r.u64Number('observation count');
  const points2D: Point2D[] = [];
  for (let i = 0; i < count; i++) {
    const x = r.f64('keypoint x');
    const y = r.f64('keypoint y');
    const raw = r.u64('point3D id');
    const point3DId = raw === UNOBSERVED ? INVALID_POINT3D_ID : r.toSafeNumber(raw, 'point3D id');
    points2D.push({ x, y, point3DId });
  }
  return { id, quaternion, translation, cameraId, name, points2D };
}

export function encodeImagesBinary(images: readonly PosedImage[]): Uint8Array {
  return encodeAll(images, writeImage);
}

export function iterateImagesBinary(bytes: Uint8Array, source?: string): Generator<PosedImage, void, undefined> {
  return decodeAll(bytes, source, readImage);
}

export function decodeImagesBinary(bytes: Uint8Array, source?: string): PosedImage[] {
  return [...iterateImagesBinary(bytes, source)];
}

// ─── Points3D ────────────────────────────────────────────────────────────────

function writePoint3D(w: BinaryWriter, point: Point3D): void {
  assertTrack(point);
  w.u64(point.id);
  for (const c of point.xyz) w.f64(c);
  for (const c of point.rgb) w.u8(c);
  w.f64(point.error).u64(point.imageIds.length);
  point.imageIds.forEach((imageId, i) => {
    w.u32(imageId).u32(point.point2DIdxs[i]);
  });
}

function readPoint3D(r: BinaryReader): Point3D {
  const id = r.u64Number('point3D id');
  const xyz: Point3D['xyz'] = [r.f64('x'), r.f64('y'), r.f64('z')];
  const rgb: Point3D['rgb'] = [r.u8('red'), r.u8('green'), r.u8('blue')];
  const error = r.f64('reprojection error');
  const length = r.u64Number('track length');
  const imageIds: number[] = [];
  const point2DIdxs: number[] = [];
  for (let i = 0; i < length; i++) {
    imageIds.push(r.u32('track image id'));
    point2DIdxs.push(r.u32('track point2D index'));
  }
  return { id, xyz, rgb, error, imageIds, point2DIdxs };
}

export function encodePoints3DBinary(points: readonly Point3D[]): Uint8Array {
  return encodeAll(points, writePoint3D);
}

export function iteratePoints3DBinary(bytes: Uint8Array, source?: string): Generator<Point3D, void, undefined> {
  return decodeAll(bytes, source, readPoint3D);
}

export function decodePoints3DBinary(bytes: Uint8Array, source?: string): Point3D[] {
  return [...iteratePoints3DBinary(bytes, source)];
}
