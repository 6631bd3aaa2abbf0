import { describe, expect, it } from 'vitest';
import { BinaryWriter } from '../src/binary-io.js';
import { FormatMismatchError, MalformedInputError, UnsupportedModelError } from '../src/errors.js';
import {
  CAMERA_MODELS,
  cameraFromOpenCv,
  cameraModelById,
  cameraModelByName,
  createCamera,
} from '../src/reconstruction.js';
import type { Camera, Point3D, PosedImage } from '../src/reconstruction.js';
import {
  decodeCamerasBinary,
  decodeImagesBinary,
  decodePoints3DBinary,
  encodeCamerasBinary,
  encodeImagesBinary,
  encodePoints3DBinary,
  iterateImagesBinary,
} from '../src/reconstruction-binary.js';
import {
  decodeCamerasText,
  decodeImagesText,
  decodePoints3DText,
  encodeCamerasText,
  encodeImagesText,
  encodePoints3DText,
} from '../src/reconstruction-text.js';

const CAMERAS: Camera[] = [
  createCamera(1, 'OPENCV', 1920, 1080, [1000.5, 1001.25, 960, 540, 0.1, -0.05, 0.001, 0.002]),
  createCamera(2, 'SIMPLE_PINHOLE', 640, 480, [500, 320, 240]),
];

const IMAGES: PosedImage[] = [
  {
    id: 1,
    quaternion: [Math.SQRT1_2, 0, 0, Math.SQRT1_2],
    translation: [1.5, -2.25, 1e-9],
    cameraId: 1,
    name: 'frame_0001.png',
    points2D: [
      { x: 10.5, y: 20.25, point3DId: 7 },
      { x: 0.1, y: 0.2, point3DId: -1 },
    ],
  },
  {
    id: 2,
    quaternion: [1, 0, 0, 0],
    translation: [0, 0, 0],
    cameraId: 2,
    name: 'bild_ä.png',
    points2D: [],
  },
];

const POINTS: Point3D[] = [
  { id: 7, xyz: [1.25, -3.5, 100.125], rgb: [255, 128, 0], error: 0.75, imageIds: [1, 2], point2DIdxs: [0, 5] },
  { id: 8, xyz: [0, 0, 0], rgb: [0, 0, 0], error: 0, imageIds: [], point2DIdxs: [] },
];

describe('camera models', () => {
  it('has the fixed model set', () => {
    expect(CAMERA_MODELS).toHaveLength(11);
    expect(cameraModelById(4)).toEqual({ id: 4, name: 'OPENCV', numParams: 8 });
    expect(cameraModelByName('THIN_PRISM_FISHEYE').numParams).toBe(12);
  });

  it('rejects unknown models', () => {
    expect(() => cameraModelById(11)).toThrow(UnsupportedModelError);
    expect(() => cameraModelByName('PINHOLE_2')).toThrow(UnsupportedModelError);
  });

  it('checks the parameter count', () => {
    expect(() => createCamera(3, 'PINHOLE', 10, 10, [1, 2])).toThrow(FormatMismatchError);
  });
});

describe('cameraFromOpenCv', () => {
  const mtx = [
    [800, 0, 320],
    [0, 810, 240],
    [0, 0, 1],
  ];

  it('pads missing distortion coefficients', () => {
    const camera = cameraFromOpenCv({ mtx, dist: [0.1, -0.2], width: 640, height: 480 });
    expect(camera.model.name).toBe('OPENCV');
    expect(camera.id).toBe(0);
    expect(camera.params).toEqual([800, 810, 320, 240, 0.1, -0.2, 0, 0]);
  });

  it('keeps only the first four coefficients', () => {
    const camera = cameraFromOpenCv({ mtx, dist: [1, 2, 3, 4, 5], width: 640, height: 480 }, 9);
    expect(camera.id).toBe(9);
    expect(camera.params.slice(4)).toEqual([1, 2, 3, 4]);
  });

  it('rejects a malformed matrix', () => {
    expect(() => cameraFromOpenCv({ mtx: [[1, 2, 3]], dist: [], width: 1, height: 1 })).toThrow(MalformedInputError);
  });
});

describe('binary layout', () => {
  it('round-trips every entity', () => {
    expect(decodeCamerasBinary(encodeCamerasBinary(CAMERAS))).toEqual(CAMERAS);
    expect(decodeImagesBinary(encodeImagesBinary(IMAGES))).toEqual(IMAGES);
    expect(decodePoints3DBinary(encodePoints3DBinary(POINTS))).toEqual(POINTS);
  });

  it('round-trips empty sequences', () => {
    expect(encodeCamerasBinary([])).toHaveLength(8);
    expect(decodeCamerasBinary(encodeCamerasBinary([]))).toEqual([]);
    expect(decodeImagesBinary(encodeImagesBinary([]))).toEqual([]);
    expect(decodePoints3DBinary(encodePoints3DBinary([]))).toEqual([]);
  });

  it('uses fixed-width little-endian records', () => {
    const bytes = encodeCamerasBinary([CAMERAS[1]]);
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

    expect(bytes).toHaveLength(8 + 4 + 4 + 8 + 8 + 3 * 8);
    expect(view.getBigUint64(0, true)).toBe(1n);
    expect(view.getUint32(8, true)).toBe(2);
    expect(view.getInt32(12, true)).toBe(0);
    expect(view.getFloat64(32, true)).toBe(500);
  });

  it('stores an unobserved keypoint as the maximum u64', () => {
    const bytes = encodeImagesBinary([{ ...IMAGES[1], points2D: [{ x: 1, y: 2, point3DId: -1 }] }]);
    expect([...bytes.slice(-8)]).toEqual([255, 255, 255, 255, 255, 255, 255, 255]);
  });

  it('rejects point3D ids beyond the safe integer range', () => {
    const writer = new BinaryWriter().u64(1).u32(1);
    for (const v of [1, 0, 0, 0, 0, 0, 0]) writer.f64(v);
    writer.u32(1).cstring('a.png').u64(1).f64(1).f64(2).u64(2n ** 53n + 1n);

    expect(() => decodeImagesBinary(writer.toBytes())).toThrow(MalformedInputError);
  });

  it('streams images one at a time', () => {
    const iterator = iterateImagesBinary(encodeImagesBinary(IMAGES));
    expect(iterator.next().value).toEqual(IMAGES[0]);
    expect(iterator.next().value).toEqual(IMAGES[1]);
    expect(iterator.next().done).toBe(true);
  });

  it('rejects truncated data', () => {
    const bytes = encodePoints3DBinary(POINTS);
    expect(() => decodePoints3DBinary(bytes.subarray(0, bytes.length - 1))).toThrow(MalformedInputError);
  });

  it('rejects unknown model ids', () => {
    const bytes = new BinaryWriter().u64(1).u32(1).i32(42).u64(1).u64(1).toBytes();
    expect(() => decodeCamerasBinary(bytes)).toThrow(UnsupportedModelError);
  });

  it('rejects inconsistent entities on encode', () => {
    expect(() => encodePoints3DBinary([{ ...POINTS[0], point2DIdxs: [0] }])).toThrow(FormatMismatchError);
    expect(() => encodeCamerasBinary([{ ...CAMERAS[0], params: [1] }])).toThrow(FormatMismatchError);
  });
});

describe('text layout', () => {
  it('round-trips every entity', () => {
    expect(decodeCamerasText(encodeCamerasText(CAMERAS))).toEqual(CAMERAS);
    expect(decodeImagesText(encodeImagesText(IMAGES))).toEqual(IMAGES);
    expect(decodePoints3DText(encodePoints3DText(POINTS))).toEqual(POINTS);
  });

  it('round-trips empty sequences', () => {
    expect(decodeCamerasText(encodeCamerasText([]))).toEqual([]);
    expect(decodeImagesText(encodeImagesText([]))).toEqual([]);
    expect(decodePoints3DText(encodePoints3DText([]))).toEqual([]);
  });

  it('writes one line per camera after the header', () => {
    const lines = encodeCamerasText([CAMERAS[1]]).split('\n');
    expect(lines[0]).toBe('# Camera list with one line of data per camera:');
    expect(lines[2]).toBe('# Number of cameras: 1');
    expect(lines[3]).toBe('2 SIMPLE_PINHOLE 640 480 500 320 240');
  });

  it('writes observations as X Y POINT3D_ID triples', () => {
    const lines = encodeImagesText([IMAGES[0]]).split('\n');
    expect(lines[4]).toBe(`1 ${Math.SQRT1_2} 0 0 ${Math.SQRT1_2} 1.5 -2.25 1e-9 1 frame_0001.png`);
    expect(lines[5]).toBe('10.5 20.25 7 0.1 0.2 -1');
  });

  it('writes tracks as IMAGE_ID POINT2D_IDX pairs', () => {
    const lines = encodePoints3DText([POINTS[0]]).split('\n');
    expect(lines[3]).toBe('7 1.25 -3.5 100.125 255 128 0 0.75 1 0 2 5');
  });

  it('reads an image without its observation line at end of input', () => {
    expect(decodeImagesText('3 1 0 0 0 0 0 0 1 a.png')).toEqual([
      { id: 3, quaternion: [1, 0, 0, 0], translation: [0, 0, 0], cameraId: 1, name: 'a.png', points2D: [] },
    ]);
  });

  it('refuses to write a blank image name', () => {
    expect(() => encodeImagesText([{ ...IMAGES[1], name: '' }])).toThrow(MalformedInputError);
    expect(() => encodeImagesText([{ ...IMAGES[1], name: '  ' }])).toThrow(MalformedInputError);
  });

  it('rejects malformed lines', () => {
    expect(() => decodeCamerasText('1 PINHOLE 640 480 1 2 3')).toThrow(FormatMismatchError);
    expect(() => decodeCamerasText('1 FISHEYE 640 480 1 2 3')).toThrow(UnsupportedModelError);
    expect(() => decodeCamerasText('1 SIMPLE_PINHOLE wide 480 1 2 3')).toThrow(MalformedInputError);
    expect(() => decodePoints3DText('1 0 0 0 0 0 0 0 5')).toThrow(MalformedInputError);
    expect(() => decodeImagesText('1 1 0 0 0 0 0 0 1 a.png\n1 2')).toThrow(MalformedInputError);
  });
});
