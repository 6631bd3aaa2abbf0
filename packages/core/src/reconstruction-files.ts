/**
 * aeropose — Reconstruction file access
 *
 * `read*Binary` / `read*Text` and their writers, plus extension-dispatching
 * readers: `.bin` means the binary layout, anything else the text layout.
 * The `iterate*File` variants stream records instead of collecting them.
 */

import { extname } from 'node:path';
import { readFileBytes, readFileLines, writeFileContents } from './io.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { Camera, Point3D, PosedImage } from './reconstruction.js';
import {
  decodeCamerasBinary,
  decodeImagesBinary,
  decodePoints3DBinary,
  encodeCamerasBinary,
  encodeImagesBinary,
  encodePoints3DBinary,
  iterateCamerasBinary,
  iterateImagesBinary,
  iteratePoints3DBinary,
} from './reconstruction-binary.js';
import {
  encodeCamerasText,
  encodeImagesText,
  encodePoints3DText,
  iterateCamerasText,
  iterateImagesText,
  iteratePoints3DText,
} from './reconstruction-text.js';

export type ReconstructionLayout = 'binary' | 'text';

export function layoutOf(path: string): ReconstructionLayout {
  return extname(path).toLowerCase() === '.bin' ? 'binary' : 'text';
}

function logWrite(logger: Logger, kind: string, count: number, path: string): void {
  logger.log(`[Codec] Wrote ${count} ${kind} to ${path}`);
}

// ─── Binary ──────────────────────────────────────────────────────────────────

export function readCamerasBinary(path: string): Camera[] {
  return decodeCamerasBinary(readFileBytes(path), path);
}

export function readImagesBinary(path: string): PosedImage[] {
  return decodeImagesBinary(readFileBytes(path), path);
}

export function readPoints3DBinary(path: string): Point3D[] {
  return decodePoints3DBinary(readFileBytes(path), path);
}

export function writeCamerasBinary(cameras: readonly Camera[], path: string, logger: Logger = silentLogger): void {
  writeFileContents(path, encodeCamerasBinary(cameras));
  logWrite(logger, 'cameras', cameras.length, path);
}

export function writeImagesBinary(images: readonly PosedImage[], path: string, logger: Logger = silentLogger): void {
  writeFileContents(path, encodeImagesBinary(images));
  logWrite(logger, 'images', images.length, path);
}

export function writePoints3DBinary(points: readonly Point3D[], path: string, logger: Logger = silentLogger): void {
  writeFileContents(path, encodePoints3DBinary(points));
  logWrite(logger, 'points3D', points.length, path);
}

// ─── Text ────────────────────────────────────────────────────────────────────

export function readCamerasText(path: string): Camera[] {
  return [...iterateCamerasText(readFileLines(path), path)];
}

export function readImagesText(path: string): PosedImage[] {
  return [...iterateImagesText(readFileLines(path), path)];
}

export function readPoints3DText(path: string): Point3D[] {
  return [...iteratePoints3DText(readFileLines(path), path)];
}

export function writeCamerasText(cameras: readonly Camera[], path: string, logger: Logger = silentLogger): void {
  writeFileContents(path, encodeCamerasText(cameras));
  logWrite(logger, 'cameras', cameras.length, path);
}

export function writeImagesText(images: readonly PosedImage[], path: string, logger: Logger = silentLogger): void {
  writeFileContents(path, encodeImagesText(images));
  logWrite(logger, 'images', images.length, path);
}

export function writePoints3DText(points: readonly Point3D[], path: string, logger: Logger = silentLogger): void {
  writeFileContents(path, encodePoints3DText(points));
  logWrite(logger, 'points3D', points.length, path);
}

// ─── By extension ────────────────────────────────────────────────────────────

export function iterateCamerasFile(path: string): Iterable<Camera> {
  return layoutOf(path) === 'binary'
    ? iterateCamerasBinary(readFileBytes(path), path)
    : iterateCamerasText(readFileLines(path), path);
}

export function iterateImagesFile(path: string): Iterable<PosedImage> {
  return layoutOf(path) === 'binary'
    ? iterateImagesBinary(readFileBytes(path), path)
    : iterateImagesText(readFileLines(path), path);
}

export function iteratePoints3DFile(path: string): Iterable<Point3D> {
  return layoutOf(path) === 'binary'
    ? iteratePoints3DBinary(readFileBytes(path), path)
    : iteratePoints3DText(readFileLines(path), path);
}

export function readCameras(path: string): Camera[] {
  return [...iterateCamerasFile(path)];
}

export function readImages(path: string): PosedImage[] {
  return [...iterateImagesFile(path)];
}

export function readPoints3D(path: string): Point3D[] {
  return [...iteratePoints3DFile(path)];
}

export function writeCameras(cameras: readonly Camera[], path: string, logger?: Logger): void {
  if (layoutOf(path) === 'binary') writeCamerasBinary(cameras, path, logger);
  else writeCamerasText(cameras, path, logger);
}

export function writeImages(images: readonly PosedImage[], path: string, logger?: Logger): void {
  if (layoutOf(path) === 'binary') writeImagesBinary(images, path, logger);
  else writeImagesText(images, path, logger);
}

export function writePoints3D(points: readonly Point3D[], path: string, logger?: Logger): void {
  if (layoutOf(path) === 'binary') writePoints3DBinary(points, path, logger);
  else writePoints3DText(points, path, logger);
}
