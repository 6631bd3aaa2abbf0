/**
 * aeropose — Flight-log parser
 *
 * Reads the delimited flight-record export (one row per telemetry sample,
 * header row first). Column names may carry a unit in parentheses, e.g.
 * `height_above_takeoff(feet)`; recognised units are normalised while
 * parsing:
 *
 *   feet → metres   (÷ 3.28)
 *   mph  → km/h     (× 1.6093)
 *
 * Cells are typed by content: empty → absent, number-like → number,
 * `YYYY-MM-DD HH:MM:SS` → UTC Date, anything else → string.
 */

import { MalformedInputError, SynchronizationError } from './errors.js';
import { readLines, sourceName } from './io.js';
import type { LineSource } from './io.js';
import { consoleLogger } from './logger.js';
import { FrameBuilder, isTextField, normalizeKey } from './telemetry-frame.js';
import type { FieldValue, TelemetryFrame } from './telemetry-frame.js';
import { DEFAULT_FLIGHT_LOG } from './types.js';
import type { FlightLogSettings, ParseOptions, TelemetryParser } from './types.js';

const FEET_PER_METER = 3.28;
const KMH_PER_MPH = 1.6093;

const NUMBER_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const DATETIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

// ─── Cells ───────────────────────────────────────────────────────────────────

/**
 * Split one delimited line. Quoted cells may contain the delimiter and
 * doubled quotes; a quoted cell cannot span lines.
 */
export function splitDelimited(line: string, delimiter: string, quote: string): string[] {
  const cells: string[] = [];
  let current = '';
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === quote) {
        if (line[i + 1] === quote) {
          current += quote;
          i++;
        } else {
          quoted = false;
        }
      } else {
        current += ch;
      }
    } else if (ch === quote) {
      quoted = true;
    } else if (ch === delimiter) {
      cells.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  cells.push(current);
  return cells;
}

export interface ColumnHeader {
  /** Field name after normalisation (`heightAboveTakeoff`). */
  field: string;
  unit?: string;
}

export function parseHeader(cells: readonly string[]): ColumnHeader[] {
  return cells.map((cell) => {
    const open = cell.indexOf('(');
    if (open < 0) return { field: normalizeKey(cell) };
    const close = cell.lastIndexOf(')');
    const unit = cell.slice(open + 1, close > open ? close : undefined).trim();
    return { field: normalizeKey(cell.slice(0, open)), unit };
  });
}

function convertUnit(value: number, unit: string | undefined): number {
  switch (unit?.toLowerCase()) {
    case 'feet':
      return value / FEET_PER_METER;
    case 'mph':
      return value * KMH_PER_MPH;
    default:
      return value;
  }
}

/** Type one trimmed, non-empty cell. */
export function classifyCell(cell: string, unit?: string): FieldValue {
  if (NUMBER_PATTERN.test(cell)) {
    return convertUnit(Number(cell), unit);
  }
  const m = DATETIME_PATTERN.exec(cell);
  if (m) {
    const date = new Date(
      Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3]), Number(m[4]), Number(m[5]), Number(m[6])),
    );
    if (!isNaN(date.getTime())) return date;
  }
  return cell;
}

// ─── Parser ──────────────────────────────────────────────────────────────────

export class FlightLogParser implements TelemetryParser {
  readonly settings: FlightLogSettings;

  constructor(settings: Partial<FlightLogSettings> = {}) {
    this.settings = { ...DEFAULT_FLIGHT_LOG, ...settings };
  }

  *frames(source: LineSource, options: ParseOptions = {}): Generator<TelemetryFrame, void, undefined> {
    const { skip = 0, limit, logger = consoleLogger } = options;
    const { delimiter, quote } = this.settings;
    const name = sourceName(source);

    let headers: ColumnHeader[] | undefined;
    let frameId = -1;
    let produced = 0;
    let droppedCells = 0;
    let lineNo = 0;

    if (limit !== undefined && limit <= 0) return;

    for (const line of readLines(source)) {
      lineNo++;
      if (line.trim().length === 0) continue;

      const cells = splitDelimited(line, delimiter, quote);
      if (headers === undefined) {
        headers = parseHeader(cells);
        continue;
      }

      frameId++;
      if (frameId < skip) continue;

      const builder = new FrameBuilder();
      const count = Math.min(cells.length, headers.length);
      for (let i = 0; i < count; i++) {
        const cell = cells[i].trim();
        if (cell.length === 0) continue;
        const { field, unit } = headers[i];
        if (field.length === 0) continue;
        const accepted = isTextField(field)
          ? builder.assign(field, cell)
          : builder.assign(field, classifyCell(cell, unit));
        if (!accepted) droppedCells++;
      }

      yield builder.build(frameId);
      produced++;
      if (limit !== undefined && produced >= limit) break;
    }

    if (headers === undefined) {
      throw new MalformedInputError('Flight log has no header row', name, lineNo);
    }

    logger.log(
      `[FlightLog] Parsed ${produced} frames from ${name}` +
        (droppedCells > 0 ? ` (dropped ${droppedCells} cells of unexpected type)` : ''),
    );
  }

  parse(source: LineSource, options: ParseOptions = {}): TelemetryFrame[] {
    return [...this.frames(source, options)];
  }

  /**
   * Offset (ms, from the `time` column) of the video/photo-marked frame
   * nearest to `videoTime`.
   */
  getVideoOffset(source: LineSource, videoTime: Date, options: ParseOptions = {}): number {
    return findVideoOffset(this.frames(source, options), videoTime, this.settings.videoOffsetToleranceS);
  }

  /** First and last UTC datetime of the log, if it has at least two dated rows. */
  getStartAndEnd(source: LineSource, options: ParseOptions = {}): [Date, Date] | undefined {
    let start: Date | undefined;
    let end: Date | undefined;
    let dated = 0;
    for (const frame of this.frames(source, options)) {
      if (frame.datetime === undefined) continue;
      start ??= frame.datetime;
      end = frame.datetime;
      dated++;
    }
    if (start === undefined || end === undefined || dated < 2) return undefined;
    return [start, end];
  }
}

export function parseFlightLog(
  source: LineSource,
  options: ParseOptions & Partial<FlightLogSettings> = {},
): TelemetryFrame[] {
  const { skip, limit, logger, ...settings } = options;
  return new FlightLogParser(settings).parse(source, { skip, limit, logger });
}

/** Lazy variant of parseFlightLog. */
export function flightLogFrames(
  source: LineSource,
  options: ParseOptions & Partial<FlightLogSettings> = {},
): Generator<TelemetryFrame, void, undefined> {
  const { skip, limit, logger, ...settings } = options;
  return new FlightLogParser(settings).frames(source, { skip, limit, logger });
}

// ─── Video markers ───────────────────────────────────────────────────────────

function isMarked(frame: TelemetryFrame): boolean {
  return (frame.isVideo ?? 0) > 0 || (frame.isPhoto ?? 0) > 0;
}

/**
 * Find the video/photo-marked frame closest in time to `videoTime` and
 * return its millisecond offset. Throws SynchronizationError when the
 * best candidate is more than `toleranceS` away (or there is none).
 */
export function findVideoOffset(
  frames: Iterable<TelemetryFrame>,
  videoTime: Date,
  toleranceS: number = DEFAULT_FLIGHT_LOG.videoOffsetToleranceS,
): number {
  const target = videoTime.getTime();
  let best: TelemetryFrame | undefined;
  let bestDiff = Infinity;

  for (const frame of frames) {
    if (!isMarked(frame) || frame.datetime === undefined) continue;
    const diff = Math.abs(frame.datetime.getTime() - target);
    if (diff < bestDiff) {
      best = frame;
      bestDiff = diff;
    }
  }

  if (best === undefined) {
    throw new SynchronizationError(
      'Flight log contains no video or photo marked frames',
      videoTime,
      undefined,
      toleranceS,
    );
  }
  if (bestDiff > toleranceS * 1000) {
    throw new SynchronizationError(
      `Time difference between video and flight log is larger than ${toleranceS} seconds ` +
        `(${best.datetime?.toISOString()} vs. ${videoTime.toISOString()})`,
      videoTime,
      best.datetime,
      toleranceS,
    );
  }
  if (best.time === undefined) {
    throw new MalformedInputError(`Flight log frame ${best.id} has no time offset`);
  }
  return best.time;
}

/**
 * The log's datetime column only has second resolution. Rebuild every
 * datetime from the first dated frame and the millisecond `time` counter.
 */
export function refineFlightLogTimestamps(frames: readonly TelemetryFrame[]): TelemetryFrame[] {
  const anchor = frames.find((f) => f.datetime !== undefined && f.time !== undefined);
  if (anchor?.datetime === undefined || anchor.time === undefined) {
    throw new MalformedInputError('Flight log has no frame with both datetime and time');
  }
  const base = anchor.datetime.getTime() - anchor.time;
  return frames.map((frame) =>
    frame.time === undefined ? frame : { ...frame, datetime: new Date(base + frame.time) },
  );
}

/**
 * Cut the contiguous `isVideo` run that starts at the marker frame nearest
 * to `videoStart`.
 */
export function selectVideoSegment(
  frames: readonly TelemetryFrame[],
  videoStart: Date,
  toleranceS: number = DEFAULT_FLIGHT_LOG.videoOffsetToleranceS,
): TelemetryFrame[] {
  const msOffset = findVideoOffset(frames, videoStart, toleranceS);
  const inVideo = frames.map(
    (frame) => frame.time !== undefined && frame.time >= msOffset && (frame.isVideo ?? 0) > 0,
  );

  const first = inVideo.indexOf(true);
  if (first < 0) {
    throw new SynchronizationError(
      `No video-marked frame at or after offset ${msOffset}ms`,
      videoStart,
      undefined,
      toleranceS,
    );
  }
  let last = first;
  while (last + 1 < inVideo.length && inVideo[last + 1]) last++;

  if (last <= first) {
    throw new SynchronizationError(
      `Frames ${first} and ${last} do not form a valid video segment`,
      videoStart,
      frames[first].datetime,
      toleranceS,
    );
  }
  return frames.slice(first, last + 1);
}
