/**
 * aeropose — Telemetry frame model
 *
 * One record type for both telemetry streams. The flight log and the
 * video subtitles fill disjoint-but-overlapping subsets of the fields;
 * whatever a source emits outside the fixed set lands in `extras`.
 *
 * Every field has an interpolation policy, declared once in the tables
 * below. The tables are typed against the interface, so adding a field
 * without a policy does not compile.
 */

export type FieldValue = number | string | Date;

export interface TelemetryFrame {
  /** Zero-based sequence number assigned by the producer. */
  readonly id: number;

  // ─── Flight log ────────────────────────────────────────────────────────────
  /** Milliseconds since the log started. */
  readonly time?: number;
  /** Absolute UTC time of the record. */
  readonly datetime?: Date;
  readonly latitude?: number;
  readonly longitude?: number;
  readonly heightAboveTakeoff?: number;
  readonly heightAboveGroundAtDroneLocation?: number;
  readonly groundElevationAtDroneLocation?: number;
  readonly altitudeAboveSeaLevel?: number;
  readonly heightSonar?: number;
  readonly speed?: number;
  readonly distance?: number;
  readonly mileage?: number;
  readonly satellites?: number;
  readonly gpslevel?: number;
  readonly voltage?: number;
  readonly maxAltitude?: number;
  readonly maxAscent?: number;
  readonly maxSpeed?: number;
  readonly maxDistance?: number;
  readonly xSpeed?: number;
  readonly ySpeed?: number;
  readonly zSpeed?: number;
  readonly compassHeading?: number;
  readonly pitch?: number;
  readonly roll?: number;
  readonly isPhoto?: number;
  readonly isVideo?: number;
  readonly rcElevator?: number;
  readonly rcAileron?: number;
  readonly rcThrottle?: number;
  readonly rcRudder?: number;
  readonly gimbalHeading?: number;
  readonly gimbalPitch?: number;
  readonly gimbalRoll?: number;
  readonly batteryPercent?: number;
  readonly voltageCell1?: number;
  readonly voltageCell2?: number;
  readonly voltageCell3?: number;
  readonly voltageCell4?: number;
  readonly voltageCell5?: number;
  readonly voltageCell6?: number;
  readonly current?: number;
  readonly batteryTemperature?: number;
  readonly altitude?: number;
  readonly ascent?: number;
  readonly flycStateRaw?: number;
  readonly flycState?: string;
  readonly message?: string;

  // ─── Subtitle ──────────────────────────────────────────────────────────────
  /** Caption start, milliseconds since the video started. */
  readonly startMs?: number;
  readonly endMs?: number;
  readonly frameCnt?: number;
  readonly diffTime?: string;
  /** Wall-clock time embedded in the caption. */
  readonly timestamp?: Date;
  readonly iso?: number;
  readonly shutter?: string;
  readonly fnum?: number;
  readonly ev?: number;
  readonly ct?: number;
  readonly colorMd?: string;
  readonly focalLen?: number;
  readonly dzoom?: number;
  readonly dzoomRatio?: number;
  readonly relAlt?: number;
  readonly absAlt?: number;
  readonly droneSpeedx?: number;
  readonly droneSpeedy?: number;
  readonly droneSpeedz?: number;
  readonly droneYaw?: number;
  readonly dronePitch?: number;
  readonly droneRoll?: number;
  readonly gbYaw?: number;
  readonly gbPitch?: number;
  readonly gbRoll?: number;
  readonly aeMeterMd?: number;
  readonly delta?: number;

  /** Source keys outside the fixed field set. */
  readonly extras?: Readonly<Record<string, FieldValue>>;
}

type FieldsOfKind<T> = {
  [K in keyof TelemetryFrame]-?: K extends 'id' | 'extras'
    ? never
    : NonNullable<TelemetryFrame[K]> extends T
      ? K
      : never;
}[keyof TelemetryFrame];

export type NumericField = FieldsOfKind<number>;
export type TimestampField = FieldsOfKind<Date>;
export type TextField = FieldsOfKind<string>;

// ─── Policies ────────────────────────────────────────────────────────────────

/**
 * - `linear`: plain linear inter/extrapolation
 * - `angular`: degrees, unwrapped across 0/360 and re-wrapped with mod 360
 * - `latitude` / `longitude`: shorter-path handling across the wrap thresholds
 * - `flag`: 0/1 marker taken from the nearer frame
 */
export type NumericPolicy = 'linear' | 'angular' | 'latitude' | 'longitude' | 'flag';

export const NUMERIC_POLICIES: Readonly<Record<NumericField, NumericPolicy>> = {
  time: 'linear',
  latitude: 'latitude',
  longitude: 'longitude',
  heightAboveTakeoff: 'linear',
  heightAboveGroundAtDroneLocation: 'linear',
  groundElevationAtDroneLocation: 'linear',
  altitudeAboveSeaLevel: 'linear',
  heightSonar: 'linear',
  speed: 'linear',
  distance: 'linear',
  mileage: 'linear',
  satellites: 'linear',
  gpslevel: 'linear',
  voltage: 'linear',
  maxAltitude: 'linear',
  maxAscent: 'linear',
  maxSpeed: 'linear',
  maxDistance: 'linear',
  xSpeed: 'linear',
  ySpeed: 'linear',
  zSpeed: 'linear',
  compassHeading: 'angular',
  pitch: 'angular',
  roll: 'angular',
  isPhoto: 'flag',
  isVideo: 'flag',
  rcElevator: 'linear',
  rcAileron: 'linear',
  rcThrottle: 'linear',
  rcRudder: 'linear',
  gimbalHeading: 'angular',
  gimbalPitch: 'angular',
  gimbalRoll: 'angular',
  batteryPercent: 'linear',
  voltageCell1: 'linear',
  voltageCell2: 'linear',
  voltageCell3: 'linear',
  voltageCell4: 'linear',
  voltageCell5: 'linear',
  voltageCell6: 'linear',
  current: 'linear',
  batteryTemperature: 'linear',
  altitude: 'linear',
  ascent: 'linear',
  flycStateRaw: 'linear',
  startMs: 'linear',
  endMs: 'linear',
  frameCnt: 'linear',
  iso: 'linear',
  fnum: 'linear',
  ev: 'linear',
  ct: 'linear',
  focalLen: 'linear',
  dzoom: 'linear',
  dzoomRatio: 'linear',
  relAlt: 'linear',
  absAlt: 'linear',
  droneSpeedx: 'linear',
  droneSpeedy: 'linear',
  droneSpeedz: 'linear',
  droneYaw: 'angular',
  dronePitch: 'angular',
  droneRoll: 'angular',
  gbYaw: 'angular',
  gbPitch: 'angular',
  gbRoll: 'angular',
  aeMeterMd: 'linear',
  delta: 'linear',
};

// Timestamps are always interpolated on elapsed seconds; text is always nearest.
export const TIMESTAMP_FIELDS: Readonly<Record<TimestampField, true>> = {
  datetime: true,
  timestamp: true,
};

export const TEXT_FIELDS: Readonly<Record<TextField, true>> = {
  flycState: true,
  message: true,
  diffTime: true,
  shutter: true,
  colorMd: true,
};

export const NUMERIC_FIELD_NAMES = Object.freeze(
  Object.keys(NUMERIC_POLICIES).filter(isNumericField),
);
export const TIMESTAMP_FIELD_NAMES = Object.freeze(
  Object.keys(TIMESTAMP_FIELDS).filter(isTimestampField),
);
export const TEXT_FIELD_NAMES = Object.freeze(Object.keys(TEXT_FIELDS).filter(isTextField));

export function isNumericField(key: string): key is NumericField {
  return Object.prototype.hasOwnProperty.call(NUMERIC_POLICIES, key);
}

export function isTimestampField(key: string): key is TimestampField {
  return Object.prototype.hasOwnProperty.call(TIMESTAMP_FIELDS, key);
}

export function isTextField(key: string): key is TextField {
  return Object.prototype.hasOwnProperty.call(TEXT_FIELDS, key);
}

// ─── Keys ────────────────────────────────────────────────────────────────────

/** Misspellings emitted by some aircraft firmware. */
const KEY_ALIASES: Readonly<Record<string, string>> = {
  longtitude: 'longitude',
};

/**
 * Turn a source key into a field name: `height_above_takeoff` →
 * `heightAboveTakeoff`, `FrameCnt` → `frameCnt`, `isPhoto` → `isPhoto`.
 */
export function normalizeKey(raw: string): string {
  const trimmed = raw.trim();
  const aliased = KEY_ALIASES[trimmed.toLowerCase()] ?? trimmed;
  const parts = aliased.split('_').filter((p) => p.length > 0);
  if (parts.length === 0) return '';
  return parts
    .map((part, i) =>
      i === 0
        ? part.charAt(0).toLowerCase() + part.slice(1)
        : part.charAt(0).toUpperCase() + part.slice(1),
    )
    .join('');
}

// ─── Construction ────────────────────────────────────────────────────────────

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

/**
 * Collects typed values for one frame. Values whose kind does not match
 * the target field are rejected (`assign` returns false) so parsers can
 * count them; unknown keys go to `extras`.
 */
export class FrameBuilder {
  private readonly fields: Partial<Mutable<Omit<TelemetryFrame, 'id' | 'extras'>>> = {};
  private extras: Record<string, FieldValue> | undefined;

  assign(key: string, value: FieldValue): boolean {
    if (isNumericField(key)) {
      if (typeof value !== 'number') return false;
      this.fields[key] = value;
      return true;
    }
    if (isTimestampField(key)) {
      if (!(value instanceof Date)) return false;
      this.fields[key] = value;
      return true;
    }
    if (isTextField(key)) {
      this.fields[key] = value instanceof Date ? value.toISOString() : String(value);
      return true;
    }
    this.extras ??= {};
    this.extras[key] = value;
    return true;
  }

  build(id: number): TelemetryFrame {
    return this.extras === undefined
      ? { ...this.fields, id }
      : { ...this.fields, id, extras: { ...this.extras } };
  }
}

/** Copy a frame, replacing one timestamp field. */
export function withTimestamp(
  frame: TelemetryFrame,
  field: TimestampField,
  value: Date,
): TelemetryFrame {
  return field === 'datetime' ? { ...frame, datetime: value } : { ...frame, timestamp: value };
}
