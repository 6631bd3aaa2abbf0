/**
 * @aeropose/core — Main entry point
 */

// ─── Errors & logging ───────────────────────────────────────────────────────

export {
  AeroposeError,
  MalformedInputError,
  UnsupportedModelError,
  SynchronizationError,
  DegenerateGeometryError,
  FormatMismatchError,
  FileAccessError,
} from './errors.js';

export type { Logger } from './logger.js';
export { consoleLogger, silentLogger } from './logger.js';

export type { LineSource } from './io.js';
export { linesOf, readFileLines } from './io.js';

// ─── Settings ───────────────────────────────────────────────────────────────

export type {
  ParseOptions,
  TelemetryParser,
  FlightLogSettings,
  SubtitleSettings,
  InterpolationSettings,
  NelderMeadSettings,
  AlignmentSettings,
  ProjectionSettings,
} from './types.js';

export {
  DEFAULT_FLIGHT_LOG,
  DEFAULT_SUBTITLE,
  DEFAULT_INTERPOLATION,
  DEFAULT_NELDER_MEAD,
  DEFAULT_ALIGNMENT,
  DEFAULT_PROJECTION,
} from './types.js';

// ─── Telemetry ──────────────────────────────────────────────────────────────

export type {
  FieldValue,
  TelemetryFrame,
  NumericField,
  TimestampField,
  TextField,
  NumericPolicy,
} from './telemetry-frame.js';

export {
  NUMERIC_POLICIES,
  NUMERIC_FIELD_NAMES,
  TIMESTAMP_FIELD_NAMES,
  TEXT_FIELD_NAMES,
  isNumericField,
  isTimestampField,
  isTextField,
  normalizeKey,
  FrameBuilder,
  withTimestamp,
} from './telemetry-frame.js';

export type { ColumnHeader } from './flight-log-parser.js';
export {
  FlightLogParser,
  parseFlightLog,
  flightLogFrames,
  splitDelimited,
  parseHeader,
  classifyCell,
  findVideoOffset,
  refineFlightLogTimestamps,
  selectVideoSegment,
} from './flight-log-parser.js';

export type { SubtitleSegments } from './subtitle-parser.js';
export {
  SubtitleParser,
  parseSubtitles,
  parseSubtitleValue,
  parseTimeRange,
  parseEmbeddedTimestamp,
  parseBracketGroups,
  loadSubtitleSegments,
  applyTimeOffset,
} from './subtitle-parser.js';

// ─── Interpolation & alignment ──────────────────────────────────────────────

export type { InterpolatorOptions } from './interpolation.js';
export {
  TelemetryInterpolator,
  interpolateFrames,
  interpolatePair,
  blendNumeric,
  wrapDelta,
} from './interpolation.js';

export type { MinimizeResult } from './nelder-mead.js';
export { minimizeNelderMead } from './nelder-mead.js';

export type { AlignmentResult, AlignmentOptions } from './alignment.js';
export { alignStreams, createAlignmentObjective } from './alignment.js';

// ─── Geometry ───────────────────────────────────────────────────────────────

export type { Direction, Handedness, CoordinateSystemName, Pose } from './coordinate-system.js';
export {
  CoordinateSystem,
  COORDINATE_SYSTEMS,
  DIRECTION_VECTORS,
  convertPose,
} from './coordinate-system.js';

export type { UtmCoordinate } from './utm.js';
export { projectUtm, utmCentralMeridian } from './utm.js';

export type { DemConfig, SceneOrigin } from './dem-config.js';
export {
  demConfigSchema,
  parseDemConfig,
  originFromConfig,
  loadSceneOrigin,
  ZERO_ORIGIN,
} from './dem-config.js';

export type { CameraPose } from './pose.js';
export { computeCameraPose, cameraEulerDegrees } from './pose.js';

// ─── Reconstruction ─────────────────────────────────────────────────────────

export type {
  CameraModelName,
  CameraModel,
  Camera,
  Point2D,
  PosedImage,
  Point3D,
  Vec3,
  Quat,
  Rgb,
  OpenCvCalibration,
} from './reconstruction.js';

export {
  CAMERA_MODELS,
  INVALID_POINT3D_ID,
  cameraModelById,
  cameraModelByName,
  createCamera,
  cameraFromOpenCv,
} from './reconstruction.js';

export { BinaryReader, BinaryWriter } from './binary-io.js';

export {
  encodeCamerasBinary,
  decodeCamerasBinary,
  iterateCamerasBinary,
  encodeImagesBinary,
  decodeImagesBinary,
  iterateImagesBinary,
  encodePoints3DBinary,
  decodePoints3DBinary,
  iteratePoints3DBinary,
} from './reconstruction-binary.js';

export {
  encodeCamerasText,
  decodeCamerasText,
  iterateCamerasText,
  encodeImagesText,
  decodeImagesText,
  iterateImagesText,
  encodePoints3DText,
  decodePoints3DText,
  iteratePoints3DText,
} from './reconstruction-text.js';

export type { ReconstructionLayout } from './reconstruction-files.js';
export {
  layoutOf,
  readCamerasBinary,
  readImagesBinary,
  readPoints3DBinary,
  writeCamerasBinary,
  writeImagesBinary,
  writePoints3DBinary,
  readCamerasText,
  readImagesText,
  readPoints3DText,
  writeCamerasText,
  writeImagesText,
  writePoints3DText,
  iterateCamerasFile,
  iterateImagesFile,
  iteratePoints3DFile,
  readCameras,
  readImages,
  readPoints3D,
  writeCameras,
  writeImages,
  writePoints3D,
} from './reconstruction-files.js';

// ─── Pipeline & export ──────────────────────────────────────────────────────

export type {
  PipelineSettings,
  PipelineOptions,
  FrameExtraction,
  PoseSynthesisInput,
  PoseSynthesisResult,
  ReconstructionPaths,
  ReconstructionOutput,
} from './pipeline.js';

export {
  DEFAULT_PIPELINE,
  planFrameExtraction,
  synthesizePoses,
  synthesizeReconstruction,
  subtitlePathForVideo,
} from './pipeline.js';

export type { PoseExport, TransformMatrix } from './pose-export.js';
export {
  POSE_EXPORT_FILE,
  poseExportSchema,
  reconstructionToPoseExport,
  imageTransform,
  exportPoses,
  readPoseExport,
} from './pose-export.js';
