/**
 * aeropose — Pose export for neural rendering
 *
 * Turns a single-camera reconstruction into a `transforms.json` document:
 * OPENCV intrinsics at the top level and one `{ file_path,
 * transform_matrix }` entry per image. Rotations and translations are
 * re-expressed from the reconstruction convention (right, down, forward)
 * in the world convention of the renderer (right, forward, up).
 */

import { posix, join } from 'node:path';
import { Matrix3, Matrix4, Quaternion, Vector3 } from 'three';
import { z } from 'zod';
import { COORDINATE_SYSTEMS, convertPose } from './coordinate-system.js';
import { MalformedInputError, UnsupportedModelError } from './errors.js';
import { ensureDirectory, readFileText, writeFileContents } from './io.js';
import { consoleLogger } from './logger.js';
import type { Logger } from './logger.js';
import type { Camera, PosedImage } from './reconstruction.js';
import { readCameras, readImages } from './reconstruction-files.js';

export const POSE_EXPORT_FILE = 'transforms.json';

const row4 = z.tuple([z.number(), z.number(), z.number(), z.number()]);

export const poseExportSchema = z.object({
  w: z.number().int(),
  h: z.number().int(),
  fl_x: z.number(),
  fl_y: z.number(),
  cx: z.number(),
  cy: z.number(),
  k1: z.number(),
  k2: z.number(),
  p1: z.number(),
  p2: z.number(),
  camera_model: z.literal('OPENCV'),
  frames: z.array(
    z.object({
      file_path: z.string(),
      transform_matrix: z.tuple([row4, row4, row4, row4]),
    }),
  ),
});

export type PoseExport = z.infer<typeof poseExportSchema>;
export type TransformMatrix = PoseExport['frames'][number]['transform_matrix'];

/** [R | t; 0 0 0 1] as row-major nested arrays. */
function transformMatrix(rotation: Matrix3, translation: Vector3): TransformMatrix {
  // Matrix3.elements is column-major.
  const e = rotation.elements;
  return [
    [e[0], e[3], e[6], translation.x],
    [e[1], e[4], e[7], translation.y],
    [e[2], e[5], e[8], translation.z],
    [0, 0, 0, 1],
  ];
}

export function imageTransform(image: PosedImage): TransformMatrix {
  const [w, x, y, z] = image.quaternion;
  const rotation = new Matrix3().setFromMatrix4(
    new Matrix4().makeRotationFromQuaternion(new Quaternion(x, y, z, w).normalize()),
  );
  const pose = convertPose(
    rotation,
    new Vector3(...image.translation),
    COORDINATE_SYSTEMS.COLMAP,
    COORDINATE_SYSTEMS.NERFSTUDIO_WORLD,
  );
  return transformMatrix(pose.rotation, pose.translation);
}

export function reconstructionToPoseExport(
  cameras: readonly Camera[],
  images: readonly PosedImage[],
  imagesRoot = './images',
): PoseExport {
  if (cameras.length !== 1) {
    throw new UnsupportedModelError(
      `Exactly one camera shared by all images is supported, got ${cameras.length}`,
    );
  }
  const camera = cameras[0];
  if (camera.model.name !== 'OPENCV') {
    throw new UnsupportedModelError(
      `Only OPENCV cameras can be exported, got ${camera.model.name}`,
      camera.model.name,
    );
  }
  const [flX, flY, cx, cy, k1, k2, p1, p2] = camera.params;

  return {
    w: camera.width,
    h: camera.height,
    fl_x: flX,
    fl_y: flY,
    cx,
    cy,
    k1,
    k2,
    p1,
    p2,
    camera_model: 'OPENCV',
    frames: images.map((image) => ({
      file_path: posix.join(imagesRoot, image.name),
      transform_matrix: imageTransform(image),
    })),
  };
}

/**
 * Read a camera file and an image file (either layout) and write
 * `transforms.json` into `outputDir`. Returns the written path.
 */
export function exportPoses(
  cameraFile: string,
  imageFile: string,
  outputDir: string,
  imagesRoot = './images',
  logger: Logger = consoleLogger,
): string {
  const document = reconstructionToPoseExport(readCameras(cameraFile), readImages(imageFile), imagesRoot);
  ensureDirectory(outputDir);
  const target = join(outputDir, POSE_EXPORT_FILE);
  writeFileContents(target, JSON.stringify(document, null, 4));
  logger.log(`[Export] Wrote ${document.frames.length} frames to ${target}`);
  return target;
}

/** Load and validate a previously written export. */
export function readPoseExport(path: string): PoseExport {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileText(path));
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new MalformedInputError(`Invalid JSON: ${err.message}`, path);
    }
    throw err;
  }
  const result = poseExportSchema.safeParse(raw);
  if (!result.success) {
    throw new MalformedInputError(`Invalid pose export: ${result.error.issues[0]?.message ?? 'unknown'}`, path);
  }
  return result.data;
}
