import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MalformedInputError, UnsupportedModelError } from '../src/errors.js';
import { silentLogger } from '../src/logger.js';
import {
  POSE_EXPORT_FILE,
  exportPoses,
  imageTransform,
  readPoseExport,
  reconstructionToPoseExport,
} from '../src/pose-export.js';
import type { TransformMatrix } from '../src/pose-export.js';
import { createCamera } from '../src/reconstruction.js';
import type { PosedImage } from '../src/reconstruction.js';
import { writeCamerasText, writeImagesBinary } from '../src/reconstruction-files.js';

const CAMERA = createCamera(1, 'OPENCV', 1920, 1080, [1500, 1510, 960, 540, 0.01, -0.02, 0.001, 0.002]);

const IDENTITY: PosedImage = {
  id: 1,
  quaternion: [1, 0, 0, 0],
  translation: [1, 2, 3],
  cameraId: 1,
  name: 'a.png',
  points2D: [],
};

const TURNED: PosedImage = {
  id: 2,
  quaternion: [Math.SQRT1_2, 0, 0, Math.SQRT1_2],
  translation: [0, 0, 0],
  cameraId: 1,
  name: 'b.png',
  points2D: [],
};

function expectTransformClose(actual: TransformMatrix, expected: number[][]): void {
  actual.forEach((row, i) => row.forEach((value, j) => expect(value).toBeCloseTo(expected[i][j], 12)));
}

describe('imageTransform', () => {
  it('re-expresses the translation in the renderer world axes', () => {
    expectTransformClose(imageTransform(IDENTITY), [
      [1, 0, 0, 1],
      [0, 0, 1, 3],
      [0, -1, 0, -2],
      [0, 0, 0, 1],
    ]);
  });

  it('re-expresses the rotation in the renderer world axes', () => {
    expectTransformClose(imageTransform(TURNED), [
      [0, -1, 0, 0],
      [0, 0, 1, 0],
      [-1, 0, 0, 0],
      [0, 0, 0, 1],
    ]);
  });
});

describe('reconstructionToPoseExport', () => {
  it('copies the intrinsics and lists every image', () => {
    const doc = reconstructionToPoseExport([CAMERA], [IDENTITY, TURNED], 'images');

    expect(doc).toMatchObject({
      w: 1920,
      h: 1080,
      fl_x: 1500,
      fl_y: 1510,
      cx: 960,
      cy: 540,
      k1: 0.01,
      k2: -0.02,
      p1: 0.001,
      p2: 0.002,
      camera_model: 'OPENCV',
    });
    expect(doc.frames.map((frame) => frame.file_path)).toEqual(['images/a.png', 'images/b.png']);
  });

  it('defaults the image root to ./images', () => {
    expect(reconstructionToPoseExport([CAMERA], [IDENTITY]).frames[0].file_path).toBe('images/a.png');
  });

  it('requires exactly one OPENCV camera', () => {
    const pinhole = createCamera(1, 'PINHOLE', 10, 10, [1, 1, 5, 5]);

    expect(() => reconstructionToPoseExport([CAMERA, { ...CAMERA, id: 2 }], [])).toThrow(UnsupportedModelError);
    expect(() => reconstructionToPoseExport([], [])).toThrow(UnsupportedModelError);
    expect(() => reconstructionToPoseExport([pinhole], [])).toThrow(UnsupportedModelError);
  });
});

describe('exportPoses', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'aeropose-export-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes an indented document that validates on read', () => {
    const cameraFile = join(dir, 'cameras.txt');
    const imageFile = join(dir, 'images.bin');
    writeCamerasText([CAMERA], cameraFile);
    writeImagesBinary([IDENTITY], imageFile);

    const target = exportPoses(cameraFile, imageFile, join(dir, 'out'), './images', silentLogger);

    expect(target).toBe(join(dir, 'out', POSE_EXPORT_FILE));
    expect(readFileSync(target, 'utf-8').startsWith('{\n    "w": 1920,')).toBe(true);
    const doc = readPoseExport(target);
    expect(doc.frames).toHaveLength(1);
    expect(doc.frames[0].file_path).toBe('images/a.png');
  });

  it('rejects invalid exports', () => {
    const broken = join(dir, 'broken.json');
    writeFileSync(broken, '{"w": 1');
    const wrongModel = join(dir, 'wrong.json');
    writeFileSync(wrongModel, JSON.stringify({ ...reconstructionToPoseExport([CAMERA], []), camera_model: 'PINHOLE' }));

    expect(() => readPoseExport(broken)).toThrow(MalformedInputError);
    expect(() => readPoseExport(wrongModel)).toThrow(MalformedInputError);
  });
});
