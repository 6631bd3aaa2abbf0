/**
 * aeropose — Pose synthesis pipeline
 *
 * Flight log + per-video subtitle streams + scene origin → one posed image
 * per extracted video frame:
 *
 *   1. rebuild millisecond flight-log datetimes
 *   2. cut the log to the video segment nearest the first caption
 *   3. align subtitle and log clocks, shift every caption by the offset
 *   4. plan which caption indices become images
 *   5. interpolate the log at each planned caption time
 *   6. pose each interpolated frame
 *
 * Decoding the video frames themselves happens outside; callers get the
 * extraction plan with the file name each frame is expected under.
 */

import { join, parse as parsePath } from 'node:path';
import { alignStreams } from './alignment.js';
import type { AlignmentResult } from './alignment.js';
import { loadSceneOrigin } from './dem-config.js';
import type { SceneOrigin } from './dem-config.js';
import { MalformedInputError } from './errors.js';
import { parseFlightLog, refineFlightLogTimestamps, selectVideoSegment } from './flight-log-parser.js';
import { interpolateFrames } from './interpolation.js';
import { ensureDirectory } from './io.js';
import { consoleLogger } from './logger.js';
import type { Logger } from './logger.js';
import { computeCameraPose } from './pose.js';
import type { PosedImage } from './reconstruction.js';
import { writeImagesText } from './reconstruction-files.js';
import { applyTimeOffset, loadSubtitleSegments } from './subtitle-parser.js';
import type { TelemetryFrame } from './telemetry-frame.js';
import { DEFAULT_FLIGHT_LOG, DEFAULT_PROJECTION } from './types.js';
import type {
  AlignmentSettings,
  InterpolationSettings,
  ProjectionSettings,
  SubtitleSettings,
} from './types.js';

// ─── Settings ────────────────────────────────────────────────────────────────

export interface PipelineSettings {
  /** Keep every n-th caption; ≤ 0 keeps all. */
  samplingRate: number;
  imageExtension: string;
  cameraId: number;
  videoOffsetToleranceS: number;
  /** Directory (inside the output directory) the extracted frames go to. */
  imagesDirName: string;
  imageFileName: string;
}

export const DEFAULT_PIPELINE: PipelineSettings = {
  samplingRate: 3,
  imageExtension: 'png',
  cameraId: 1,
  videoOffsetToleranceS: DEFAULT_FLIGHT_LOG.videoOffsetToleranceS,
  imagesDirName: 'images',
  imageFileName: 'images.txt',
};

export interface PipelineOptions extends Partial<PipelineSettings> {
  alignment?: Partial<AlignmentSettings>;
  interpolation?: Partial<InterpolationSettings>;
  projection?: Partial<ProjectionSettings>;
  subtitle?: Partial<SubtitleSettings>;
  logger?: Logger;
}

// ─── Extraction plan ─────────────────────────────────────────────────────────

export interface FrameExtraction {
  /** Position in the overall plan; also the image id. */
  index: number;
  videoIndex: number;
  /** Caption (= video frame) index within its video. */
  frameIndex: number;
  captionId: number;
  fileName: string;
  /** Corrected caption time. */
  timestamp: Date;
}

export function planFrameExtraction(
  segments: readonly (readonly TelemetryFrame[])[],
  samplingRate: number = DEFAULT_PIPELINE.samplingRate,
  imageExtension: string = DEFAULT_PIPELINE.imageExtension,
): FrameExtraction[] {
  const step = samplingRate > 0 ? samplingRate : 1;
  const plan: FrameExtraction[] = [];
  segments.forEach((captions, videoIndex) => {
    for (let frameIndex = 0; frameIndex < captions.length; frameIndex += step) {
      const caption = captions[frameIndex];
      if (caption.timestamp === undefined) {
        throw new MalformedInputError(`Caption ${caption.id} of video ${videoIndex} has no timestamp`);
      }
      const index = plan.length;
      plan.push({
        index,
        videoIndex,
        frameIndex,
        captionId: caption.id,
        fileName: `${index}_${frameIndex}_${caption.id}.${imageExtension}`,
        timestamp: caption.timestamp,
      });
    }
  });
  return plan;
}

// ─── Pose synthesis ──────────────────────────────────────────────────────────

export interface PoseSynthesisInput {
  /** Caption frames, one array per video, in recording order. */
  subtitleSegments: readonly (readonly TelemetryFrame[])[];
  flightLog: readonly TelemetryFrame[];
  origin: SceneOrigin;
}

export interface PoseSynthesisResult {
  images: PosedImage[];
  plan: FrameExtraction[];
  alignment: AlignmentResult;
  /** Flight-log frames of the video segment, with refined datetimes. */
  logSegment: TelemetryFrame[];
}

export function synthesizePoses(input: PoseSynthesisInput, options: PipelineOptions = {}): PoseSynthesisResult {
  const { alignment: alignmentSettings, interpolation, projection = DEFAULT_PROJECTION, logger = consoleLogger } =
    options;
  const settings = { ...DEFAULT_PIPELINE, ...options };

  const captions = input.subtitleSegments.flat();
  const videoStart = captions.find((frame) => frame.timestamp !== undefined)?.timestamp;
  if (videoStart === undefined) {
    throw new MalformedInputError('No caption carries a timestamp');
  }

  const refined = refineFlightLogTimestamps(input.flightLog);
  const logSegment = selectVideoSegment(refined, videoStart, settings.videoOffsetToleranceS);
  const alignment = alignStreams(captions, logSegment, { ...alignmentSettings, interpolation, logger });

  const corrected = input.subtitleSegments.map((segment) => applyTimeOffset(segment, alignment.offsetS));
  const plan = planFrameExtraction(corrected, settings.samplingRate, settings.imageExtension);
  const frames = interpolateFrames(
    logSegment,
    plan.map((entry) => entry.timestamp),
    { timeField: 'datetime', settings: interpolation },
  );

  const images = frames.map((frame, i): PosedImage => ({
    id: plan[i].index,
    ...computeCameraPose(frame, input.origin, projection),
    cameraId: settings.cameraId,
    name: plan[i].fileName,
    points2D: [],
  }));

  logger.log(
    `[Pipeline] Posed ${images.length} images from ${input.subtitleSegments.length} videos ` +
      `(${logSegment.length} log frames in segment)`,
  );
  return { images, plan, alignment, logSegment };
}

// ─── Files ───────────────────────────────────────────────────────────────────

/** Captions are stored beside each video under the same base name. */
export function subtitlePathForVideo(videoPath: string): string {
  const { dir, name } = parsePath(videoPath);
  return join(dir, `${name}.srt`);
}

export interface ReconstructionPaths {
  videoFiles: readonly string[];
  flightLogFile: string;
  demConfigFile: string;
  outputDir: string;
}

export interface ReconstructionOutput extends PoseSynthesisResult {
  imageFile: string;
  imagesDir: string;
}

/**
 * File-level pipeline. Writes the image list in the text layout and
 * creates the directory the extracted frames belong in.
 */
export function synthesizeReconstruction(
  paths: ReconstructionPaths,
  options: PipelineOptions = {},
): ReconstructionOutput {
  const { logger = consoleLogger, projection = DEFAULT_PROJECTION, subtitle } = options;
  const settings = { ...DEFAULT_PIPELINE, ...options };

  const imagesDir = join(paths.outputDir, settings.imagesDirName);
  const imageFile = join(paths.outputDir, settings.imageFileName);
  ensureDirectory(imagesDir);

  const { segments } = loadSubtitleSegments(paths.videoFiles.map(subtitlePathForVideo), subtitle, logger);
  const flightLog = parseFlightLog(paths.flightLogFile, { logger });
  const origin = loadSceneOrigin(paths.demConfigFile, projection, logger);

  const result = synthesizePoses({ subtitleSegments: segments, flightLog, origin }, options);
  writeImagesText(result.images, imageFile, logger);

  return { ...result, imageFile, imagesDir };
}
