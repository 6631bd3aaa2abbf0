/**
 * aeropose — Reconstruction text layout
 *
 * Whitespace-separated, `#` starts a comment line.
 *
 *   cameras   CAMERA_ID MODEL WIDTH HEIGHT PARAMS...
 *   images    IMAGE_ID QW QX QY QZ TX TY TZ CAMERA_ID NAME
 *             (X Y POINT3D_ID)...            ← second line, may be empty
 *   points3D  POINT3D_ID X Y Z R G B ERROR (IMAGE_ID POINT2D_IDX)...
 *
 * Numbers are written with their shortest round-trip representation, so
 * decode(encode(x)) reproduces every float bit for bit. Image names must
 * be non-blank and must not contain line breaks; runs of whitespace inside
 * a name collapse to a single space.
 */

import { MalformedInputError } from './errors.js';
import { linesOf } from './io.js';
import { assertCameraParams, assertTrack, cameraModelByName } from './reconstruction.js';
import type { Camera, Point2D, Point3D, PosedImage } from './reconstruction.js';

// ─── Tokens ──────────────────────────────────────────────────────────────────

interface Line {
  tokens: string[];
  number: number;
}

/** Non-comment lines, tokenised. Blank lines are kept (images need them). */
function* tokenLines(lines: Iterable<string>): Generator<Line, void, undefined> {
  let number = 0;
  for (const raw of lines) {
    number++;
    const line = raw.trim();
    if (line.startsWith('#')) continue;
    yield { tokens: line.length === 0 ? [] : line.split(/\s+/), number };
  }
}

class TokenCursor {
  private index = 0;

  constructor(
    private readonly line: Line,
    private readonly source: string,
  ) {}

  get rest(): string[] {
    return this.line.tokens.slice(this.index);
  }

  private next(what: string): string {
    const token = this.line.tokens[this.index];
    if (token === undefined) {
      throw new MalformedInputError(`Missing ${what}`, this.source, this.line.number);
    }
    this.index++;
    return token;
  }

  text(what: string): string {
    return this.next(what);
  }

  float(what: string): number {
    const token = this.next(what);
    const value = Number(token);
    if (token.length === 0 || isNaN(value)) {
      throw new MalformedInputError(`Invalid ${what} "${token}"`, this.source, this.line.number);
    }
    return value;
  }

  int(what: string): number {
    const value = this.float(what);
    if (!Number.isInteger(value)) {
      throw new MalformedInputError(`Invalid ${what} "${value}"`, this.source, this.line.number);
    }
    return value;
  }
}

function fmt(values: readonly number[]): string {
  return values.map(String).join(' ');
}

function document(header: string[], body: string[]): string {
  return [...header.map((line) => `# ${line}`), ...body].join('\n') + '\n';
}

// ─── Cameras ─────────────────────────────────────────────────────────────────

export function encodeCamerasText(cameras: readonly Camera[]): string {
  return document(
    [
      'Camera list with one line of data per camera:',
      '  CAMERA_ID, MODEL, WIDTH, HEIGHT, PARAMS[]',
      `Number of cameras: ${cameras.length}`,
    ],
    cameras.map((camera) => {
      assertCameraParams(camera);
      const head = `${camera.id} ${camera.model.name} ${camera.width} ${camera.height}`;
      return camera.params.length > 0 ? `${head} ${fmt(camera.params)}` : head;
    }),
  );
}

export function* iterateCamerasText(
  lines: Iterable<string>,
  source = '<memory>',
): Generator<Camera, void, undefined> {
  for (const line of tokenLines(lines)) {
    if (line.tokens.length === 0) continue;
    const c = new TokenCursor(line, source);
    const id = c.int('camera id');
    const model = cameraModelByName(c.text('camera model'));
    const width = c.int('camera width');
    const height = c.int('camera height');
    const params = c.rest.map((_, i) => c.float(`camera parameter ${i}`));
    const camera = { id, model, width, height, params };
    assertCameraParams(camera);
    yield camera;
  }
}

export function decodeCamerasText(text: string, source?: string): Camera[] {
  return [...iterateCamerasText(linesOf(text), source)];
}

// ─── Images ──────────────────────────────────────────────────────────────────

export function encodeImagesText(images: readonly PosedImage[]): string {
  const body: string[] = [];
  for (const image of images) {
    if (/[\r\n]/.test(image.name)) {
      throw new MalformedInputError(`Image ${image.id} name contains a line break`);
    }
    if (image.name.trim().length === 0) {
      throw new MalformedInputError(`Image ${image.id} has an empty name`);
    }
    body.push(
      `${image.id} ${fmt(image.quaternion)} ${fmt(image.translation)} ${image.cameraId} ${image.name}`,
      image.points2D.map((p) => fmt([p.x, p.y, p.point3DId])).join(' '),
    );
  }
  return document(
    [
      'Image list with two lines of data per image:',
      '  IMAGE_ID, QW, QX, QY, QZ, TX, TY, TZ, CAMERA_ID, NAME',
      '  POINTS2D[] as (X, Y, POINT3D_ID)',
      `Number of images: ${images.length}`,
    ],
    body,
  );
}

function parsePoints2D(line: Line, source: string): Point2D[] {
  if (line.tokens.length % 3 !== 0) {
    throw new MalformedInputError(
      `Observation line has ${line.tokens.length} values, not a multiple of 3`,
      source,
      line.number,
    );
  }
  const c = new TokenCursor(line, source);
  const points: Point2D[] = [];
  while (c.rest.length > 0) {
    points.push({ x: c.float('keypoint x'), y: c.float('keypoint y'), point3DId: c.int('point3D id') });
  }
  return points;
}

/**
 * Pose line, then observation line. A pose line at end of input without
 * its observation line yields an image with no observations.
 */
export function* iterateImagesText(
  lines: Iterable<string>,
  source = '<memory>',
): Generator<PosedImage, void, undefined> {
  let pending: Omit<PosedImage, 'points2D'> | undefined;
  for (const line of tokenLines(lines)) {
    if (pending !== undefined) {
      yield { ...pending, points2D: parsePoints2D(line, source) };
      pending = undefined;
      continue;
    }
    if (line.tokens.length === 0) continue;
    const c = new TokenCursor(line, source);
    const id = c.int('image id');
    const quaternion: PosedImage['quaternion'] = [c.float('qw'), c.float('qx'), c.float('qy'), c.float('qz')];
    const translation: PosedImage['translation'] = [c.float('tx'), c.float('ty'), c.float('tz')];
    const cameraId = c.int('camera id');
    const name = [c.text('image name'), ...c.rest].join(' ');
    pending = { id, quaternion, translation, cameraId, name };
  }
  if (pending !== undefined) yield { ...pending, points2D: [] };
}

export function decodeImagesText(text: string, source?: string): PosedImage[] {
  return [...iterateImagesText(linesOf(text), source)];
}

// ─── Points3D ────────────────────────────────────────────────────────────────

export function encodePoints3DText(points: readonly Point3D[]): string {
  return document(
    [
      '3D point list with one line of data per point:',
      '  POINT3D_ID, X, Y, Z, R, G, B, ERROR, TRACK[] as (IMAGE_ID, POINT2D_IDX)',
      `Number of points: ${points.length}`,
    ],
    points.map((point) => {
      assertTrack(point);
      const track = point.imageIds.flatMap((imageId, i) => [imageId, point.point2DIdxs[i]]);
      const head = `${point.id} ${fmt(point.xyz)} ${fmt(point.rgb)} ${point.error}`;
      return track.length > 0 ? `${head} ${fmt(track)}` : head;
    }),
  );
}

export function* iteratePoints3DText(
  lines: Iterable<string>,
  source = '<memory>',
): Generator<Point3D, void, undefined> {
  for (const line of tokenLines(lines)) {
    if (line.tokens.length === 0) continue;
    const c = new TokenCursor(line, source);
    const id = c.int('point3D id');
    const xyz: Point3D['xyz'] = [c.float('x'), c.float('y'), c.float('z')];
    const rgb: Point3D['rgb'] = [c.int('red'), c.int('green'), c.int('blue')];
    const error = c.float('reprojection error');
    const rest = c.rest.length;
    if (rest % 2 !== 0) {
      throw new MalformedInputError(`Track of point ${id} has an odd number of values`, source, line.number);
    }
    const imageIds: number[] = [];
    const point2DIdxs: number[] = [];
    for (let i = 0; i < rest; i += 2) {
      imageIds.push(c.int('track image id'));
      point2DIdxs.push(c.int('track point2D index'));
    }
    yield { id, xyz, rgb, error, imageIds, point2DIdxs };
  }
}

export function decodePoints3DText(text: string, source?: string): Point3D[] {
  return [...iteratePoints3DText(linesOf(text), source)];
}
