/**
 * aeropose — Interpolation engine
 *
 * Resamples a timestamped frame sequence at arbitrary target times.
 * Targets outside the source range are extrapolated from the first or
 * last segment. Each field follows its policy from the frame model:
 *
 *   linear      a + (b − a)·w
 *   angular     shortest signed step across 0/360, result mod 360
 *   latitude    across the pole when a and b straddle ±threshold
 *   longitude   across the antimeridian when a and b straddle ±threshold
 *   flag        value of the nearer frame, as 0/1
 *   timestamp   linear on elapsed seconds
 *   text        value of the nearer frame
 *
 * At w = 0 and w = 1 the output carries the source frame's values as-is.
 */

import { MalformedInputError } from './errors.js';
import {
  NUMERIC_FIELD_NAMES,
  NUMERIC_POLICIES,
  TEXT_FIELD_NAMES,
  TIMESTAMP_FIELD_NAMES,
} from './telemetry-frame.js';
import type {
  FieldValue,
  NumericField,
  NumericPolicy,
  TelemetryFrame,
  TimestampField,
} from './telemetry-frame.js';
import { DEFAULT_INTERPOLATION } from './types.js';
import type { InterpolationSettings } from './types.js';

// ─── Scalar blending ─────────────────────────────────────────────────────────

/** Positive modulo. */
function mod(value: number, period: number): number {
  return ((value % period) + period) % period;
}

/**
 * Signed step from `a` to `b` along the shorter way round a circle of
 * the given period, in [−P/2, P/2]. A step of exactly half a period keeps
 * its sign.
 */
export function wrapDelta(a: number, b: number, period: number): number {
  const d = b - a;
  const half = period / 2;
  const wrapped = mod(d + half, period) - half;
  return wrapped === -half && d > 0 ? half : wrapped;
}

function straddles(a: number, b: number, threshold: number): boolean {
  return (a < -threshold && b > threshold) || (a > threshold && b < -threshold);
}

/** Blend across a periodic coordinate, normalizing into [−P/2, P/2). */
function blendAcross(a: number, b: number, w: number, period: number): number {
  const half = period / 2;
  return mod(a + wrapDelta(a, b, period) * w + half, period) - half;
}

export function blendNumeric(
  policy: Exclude<NumericPolicy, 'flag'>,
  a: number,
  b: number,
  w: number,
  settings: InterpolationSettings = DEFAULT_INTERPOLATION,
): number {
  switch (policy) {
    case 'linear':
      return a + (b - a) * w;
    case 'angular': {
      const period = settings.angularPeriodDeg;
      return mod(a + wrapDelta(a, b, period) * w, period);
    }
    case 'latitude':
      return straddles(a, b, settings.latitudeWrapThresholdDeg)
        ? blendAcross(a, b, w, 180)
        : a + (b - a) * w;
    case 'longitude':
      return straddles(a, b, settings.longitudeWrapThresholdDeg)
        ? blendAcross(a, b, w, 360)
        : a + (b - a) * w;
  }
}

function nearer<T>(a: T, b: T, w: number): T {
  return w <= 0.5 ? a : b;
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };
type FrameDraft = Partial<Mutable<Omit<TelemetryFrame, 'id' | 'extras'>>>;

function blendNumericField(
  field: NumericField,
  a: TelemetryFrame,
  b: TelemetryFrame,
  w: number,
  settings: InterpolationSettings,
): number | undefined {
  const va = a[field];
  const vb = b[field];
  if (va === undefined || vb === undefined) return nearer(va, vb, w);
  const policy = NUMERIC_POLICIES[field];
  if (policy === 'flag') return nearer(va, vb, w) > 0 ? 1 : 0;
  return blendNumeric(policy, va, vb, w, settings);
}

function blendTimestampField(
  field: TimestampField,
  a: TelemetryFrame,
  b: TelemetryFrame,
  w: number,
): Date | undefined {
  const va = a[field];
  const vb = b[field];
  if (va === undefined || vb === undefined) return nearer(va, vb, w);
  const ta = va.getTime();
  return new Date(ta + (vb.getTime() - ta) * w);
}

function blendExtras(
  a: TelemetryFrame,
  b: TelemetryFrame,
  w: number,
): Record<string, FieldValue> | undefined {
  if (a.extras === undefined && b.extras === undefined) return undefined;
  const near = nearer(a.extras, b.extras, w);
  const far = near === a.extras ? b.extras : a.extras;
  return { ...far, ...near };
}

/**
 * Blend two frames. `w` is 0 at `a`, 1 at `b`, and may lie outside [0, 1]
 * when extrapolating.
 */
export function interpolatePair(
  a: TelemetryFrame,
  b: TelemetryFrame,
  w: number,
  id: number,
  settings: InterpolationSettings = DEFAULT_INTERPOLATION,
): TelemetryFrame {
  if (w === 0) return { ...a, id };
  if (w === 1) return { ...b, id };

  const draft: FrameDraft = {};
  for (const field of NUMERIC_FIELD_NAMES) {
    const value = blendNumericField(field, a, b, w, settings);
    if (value !== undefined) draft[field] = value;
  }
  for (const field of TIMESTAMP_FIELD_NAMES) {
    const value = blendTimestampField(field, a, b, w);
    if (value !== undefined) draft[field] = value;
  }
  for (const field of TEXT_FIELD_NAMES) {
    const value = nearer(a[field], b[field], w);
    if (value !== undefined) draft[field] = value;
  }
  const extras = blendExtras(a, b, w);
  return extras === undefined ? { ...draft, id } : { ...draft, id, extras };
}

// ─── Interpolator ────────────────────────────────────────────────────────────

export interface InterpolatorOptions {
  /** Field carrying each frame's time. Default: `datetime`. */
  timeField?: TimestampField;
  settings?: Partial<InterpolationSettings>;
}

/**
 * Precomputes elapsed seconds of a frame sequence so it can be sampled
 * repeatedly. Frames must be in time order and all carry `timeField`.
 */
export class TelemetryInterpolator {
  readonly timeField: TimestampField;
  readonly settings: InterpolationSettings;
  private readonly frames: readonly TelemetryFrame[];
  private readonly seconds: Float64Array;
  private readonly startMs: number;

  constructor(frames: readonly TelemetryFrame[], options: InterpolatorOptions = {}) {
    this.timeField = options.timeField ?? 'datetime';
    this.settings = { ...DEFAULT_INTERPOLATION, ...options.settings };
    this.frames = frames;
    this.seconds = new Float64Array(frames.length);

    const times = frames.map((frame) => {
      const t = frame[this.timeField];
      if (t === undefined) {
        throw new MalformedInputError(`Frame ${frame.id} has no ${this.timeField}`);
      }
      return t.getTime();
    });
    this.startMs = times.length > 0 ? times[0] : 0;
    times.forEach((t, i) => {
      this.seconds[i] = (t - this.startMs) / 1000;
    });
  }

  get length(): number {
    return this.frames.length;
  }

  /** Seconds between the first source frame and `time`. */
  elapsedS(time: Date): number {
    return (time.getTime() - this.startMs) / 1000;
  }

  /**
   * Index of the segment used for `x`: the last i with seconds[i] ≤ x,
   * clamped so that i + 1 is valid (extrapolation reuses the end segments).
   */
  private segmentAt(x: number): number {
    const n = this.seconds.length;
    if (n < 2 || x <= this.seconds[0]) return 0;
    if (x >= this.seconds[n - 1]) return n - 2;
    let lo = 0;
    let hi = n - 1;
    while (hi - lo > 1) {
      const mid = (lo + hi) >> 1;
      if (this.seconds[mid] <= x) {
        lo = mid;
      } else {
        hi = mid;
      }
    }
    return lo;
  }

  private weightAt(lo: number, x: number): number {
    const dt = this.seconds[lo + 1] - this.seconds[lo];
    return dt > 0 ? (x - this.seconds[lo]) / dt : 0;
  }

  /** Interpolated frames at the given times, ids numbered from 0. */
  at(targets: readonly Date[]): TelemetryFrame[] {
    if (this.frames.length === 0) return [];
    if (this.frames.length === 1) {
      const only = this.frames[0];
      return targets.map((_, id) => ({ ...only, id }));
    }
    return targets.map((target, id) => {
      const x = this.elapsedS(target);
      const lo = this.segmentAt(x);
      return interpolatePair(this.frames[lo], this.frames[lo + 1], this.weightAt(lo, x), id, this.settings);
    });
  }

  /**
   * Sample one numeric field at elapsed-second offsets. Cheaper than
   * `at()` when only a couple of fields are needed (e.g. alignment).
   */
  sample(field: NumericField, elapsed: ArrayLike<number>): Array<number | undefined> {
    const out = new Array<number | undefined>(elapsed.length);
    if (this.frames.length === 0) return out;
    for (let i = 0; i < elapsed.length; i++) {
      if (this.frames.length === 1) {
        out[i] = this.frames[0][field];
        continue;
      }
      const x = elapsed[i];
      const lo = this.segmentAt(x);
      const w = this.weightAt(lo, x);
      const a = this.frames[lo];
      const b = this.frames[lo + 1];
      out[i] = w === 0 ? a[field] : w === 1 ? b[field] : blendNumericField(field, a, b, w, this.settings);
    }
    return out;
  }
}

export function interpolateFrames(
  frames: readonly TelemetryFrame[],
  targets: readonly Date[],
  options: InterpolatorOptions = {},
): TelemetryFrame[] {
  return new TelemetryInterpolator(frames, options).at(targets);
}
