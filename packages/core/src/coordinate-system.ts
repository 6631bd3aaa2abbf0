/**
 * aeropose — Coordinate system algebra
 *
 * A coordinate system is the triple of directions its +X, +Y and +Z axes
 * point to. Its matrix stacks the unit vector of each direction as a row,
 * expressed in the reference basis
 *
 *   right = +x   up = +y   forward = +z
 *
 * Converting from system A to system B is the fixed linear map
 * B.matrix · A.matrix⁻¹, applied to rotation matrices and to vectors alike.
 */

import { Matrix3, Vector3 } from 'three';
import { DegenerateGeometryError } from './errors.js';

export type Direction = 'right' | 'left' | 'up' | 'down' | 'forward' | 'backward';

/** `degenerate` when two axes are parallel. */
export type Handedness = 'left' | 'right' | 'degenerate';

export const DIRECTION_VECTORS: Readonly<Record<Direction, readonly [number, number, number]>> = {
  right: [1, 0, 0],
  left: [-1, 0, 0],
  up: [0, 1, 0],
  down: [0, -1, 0],
  forward: [0, 0, 1],
  backward: [0, 0, -1],
};

export class CoordinateSystem {
  private readonly rows: Matrix3;
  private readonly det: number;

  constructor(
    readonly x: Direction,
    readonly y: Direction,
    readonly z: Direction,
  ) {
    const [a, b, c] = [DIRECTION_VECTORS[x], DIRECTION_VECTORS[y], DIRECTION_VECTORS[z]];
    this.rows = new Matrix3().set(a[0], a[1], a[2], b[0], b[1], b[2], c[0], c[1], c[2]);
    this.det = this.rows.clone().transpose().determinant();
  }

  get axes(): readonly [Direction, Direction, Direction] {
    return [this.x, this.y, this.z];
  }

  /** Row i is the unit vector of axis i. A fresh copy on each access. */
  get matrix(): Matrix3 {
    return this.rows.clone();
  }

  /**
   * The reference basis (right, up, forward) is itself left-handed, so a
   * positive determinant means a left-handed system.
   */
  get handedness(): Handedness {
    if (this.det > 0) return 'left';
    if (this.det < 0) return 'right';
    return 'degenerate';
  }

  get isLeftHanded(): boolean {
    return this.handedness === 'left';
  }

  get isRightHanded(): boolean {
    return this.handedness === 'right';
  }

  equals(other: CoordinateSystem): boolean {
    return this.x === other.x && this.y === other.y && this.z === other.z;
  }

  /** The operator taking coordinates in this system to `target`. */
  conversionMatrix(target: CoordinateSystem): Matrix3 {
    this.assertValid();
    target.assertValid();
    return target.matrix.multiply(this.rows.clone().invert());
  }

  /** target.matrix · this.matrix⁻¹ · m */
  convert(m: Matrix3, target: CoordinateSystem): Matrix3 {
    return this.conversionMatrix(target).multiply(m);
  }

  convertVector(v: Vector3, target: CoordinateSystem): Vector3 {
    return v.clone().applyMatrix3(this.conversionMatrix(target));
  }

  /** `convert` with the operator composed once up front. */
  convertFunc(target: CoordinateSystem): (m: Matrix3) => Matrix3 {
    const op = this.conversionMatrix(target);
    return (m) => op.clone().multiply(m);
  }

  toString(): string {
    return `(${this.x}, ${this.y}, ${this.z})`;
  }

  private assertValid(): void {
    if (this.det === 0) {
      throw new DegenerateGeometryError(
        `Coordinate system ${this.toString()} has parallel axes`,
        this.axes,
      );
    }
  }
}

// ─── Well-known conventions ──────────────────────────────────────────────────

export const COORDINATE_SYSTEMS = {
  OPENGL: new CoordinateSystem('right', 'up', 'backward'),
  OPENCV: new CoordinateSystem('right', 'down', 'forward'),
  COLMAP: new CoordinateSystem('right', 'down', 'forward'),
  NERFSTUDIO_CAMERA: new CoordinateSystem('right', 'up', 'backward'),
  NERFSTUDIO_WORLD: new CoordinateSystem('right', 'forward', 'up'),
  PYTORCH3D: new CoordinateSystem('left', 'up', 'forward'),
  BLENDER: new CoordinateSystem('right', 'forward', 'up'),
  UNITY: new CoordinateSystem('right', 'up', 'forward'),
  UNREAL: new CoordinateSystem('forward', 'right', 'up'),
} as const;

export type CoordinateSystemName = keyof typeof COORDINATE_SYSTEMS;

export interface Pose {
  rotation: Matrix3;
  translation: Vector3;
}

/** Re-express a rotation and translation pair in another convention. */
export function convertPose(
  rotation: Matrix3,
  translation: Vector3,
  from: CoordinateSystem,
  to: CoordinateSystem,
): Pose {
  const op = from.conversionMatrix(to);
  return {
    rotation: op.clone().multiply(rotation),
    translation: translation.clone().applyMatrix3(op),
  };
}
