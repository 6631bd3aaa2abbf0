/**
 * aeropose — Subtitle telemetry parser
 *
 * Aircraft cameras write one caption per video frame into a sidecar
 * subtitle file. Each caption block looks like:
 *
 *   12
 *   00:00:00,396 --> 00:00:00,429
 *   <font size="28">FrameCnt: 12, DiffTime: 33ms
 *   2023-04-15 10:12:34.567
 *   [iso: 100] [shutter: 1/1000.0] [fnum: 2.8] [ev: 0] [latitude: 47.1] ...
 *   [rel_alt: 50.000 abs_alt: 400.000] </font>
 *
 * Blocks are read with a small state machine; a block is emitted once the
 * closing `</font>` is seen. An unfinished block at end of input is dropped.
 */

import { MalformedInputError } from './errors.js';
import { readLines, sourceName } from './io.js';
import type { LineSource } from './io.js';
import { consoleLogger } from './logger.js';
import type { Logger } from './logger.js';
import { FrameBuilder, isTextField, normalizeKey, withTimestamp } from './telemetry-frame.js';
import type { FieldValue, TelemetryFrame, TimestampField } from './telemetry-frame.js';
import { DEFAULT_SUBTITLE } from './types.js';
import type { ParseOptions, SubtitleSettings, TelemetryParser } from './types.js';

const TIME_RANGE =
  /^(\d{1,2}):(\d{2}):(\d{2})[,.](\d{1,3})\s*-->\s*(\d{1,2}):(\d{2}):(\d{2})[,.](\d{1,3})/;
const EMBEDDED_TIMESTAMP = /(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})[,.](\d{1,6})/;
const BRACKET_GROUP = /\[[^\]]*\]/g;
const PLAIN_NUMBER = /^[-+]?(\d+\.?\d*|\.\d+)$/;

type BlockState = 'index' | 'range' | 'meta' | 'timestamp' | 'body';

// ─── Values ──────────────────────────────────────────────────────────────────

export function parseSubtitleValue(raw: string): FieldValue {
  const value = raw.trim();
  return PLAIN_NUMBER.test(value) ? Number(value) : value;
}

function clockToMs(h: string, m: string, s: string, frac: string): number {
  return ((Number(h) * 60 + Number(m)) * 60 + Number(s)) * 1000 + Number(frac.padEnd(3, '0'));
}

export function parseTimeRange(line: string): { startMs: number; endMs: number } | undefined {
  const m = TIME_RANGE.exec(line);
  if (!m) return undefined;
  return {
    startMs: clockToMs(m[1], m[2], m[3], m[4]),
    endMs: clockToMs(m[5], m[6], m[7], m[8]),
  };
}

/**
 * Parse the first `YYYY-MM-DD HH:MM:SS.fff` in `text`. Sub-millisecond
 * digits are truncated.
 */
export function parseEmbeddedTimestamp(
  text: string,
  utcOffsetMinutes?: number,
): { date: Date; index: number } | undefined {
  const m = EMBEDDED_TIMESTAMP.exec(text);
  if (!m) return undefined;
  const parts = [m[1], m[2], m[3], m[4], m[5], m[6]].map(Number);
  const ms = Number(m[7].slice(0, 3).padEnd(3, '0'));
  const [year, month, day, hour, minute, second] = parts;
  const date =
    utcOffsetMinutes === undefined
      ? new Date(year, month - 1, day, hour, minute, second, ms)
      : new Date(
          Date.UTC(year, month - 1, day, hour, minute, second, ms) - utcOffsetMinutes * 60_000,
        );
  if (isNaN(date.getTime())) return undefined;
  return { date, index: m.index };
}

// ─── Key/value groups ────────────────────────────────────────────────────────

/**
 * Decode the bracketed groups of a caption body into raw key/value pairs.
 *
 *   [iso: 100]                       → iso
 *   [rel_alt: 50.0 abs_alt: 400.0]   → rel_alt, abs_alt
 *   [a: 1, b: 2]                     → a, b
 *   [Drone: Yaw:-1.2, Pitch:0.3]     → drone_yaw, drone_pitch
 */
export function parseBracketGroups(text: string): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (const match of text.matchAll(BRACKET_GROUP)) {
    const group = match[0].slice(1, -1).replace(/\s+/g, ' ').trim();
    const splits = group.split(':');

    if (splits.length === 2) {
      pairs.push([splits[0].trim().toLowerCase(), splits[1]]);
    } else if (splits.length > 2 && group.includes(',')) {
      const items = group.split(',');
      let base: string | undefined;
      const head = items[0];
      if (head.split(':').length > 2) {
        const colon = head.indexOf(':');
        base = head.slice(0, colon).trim();
        items[0] = head.slice(colon + 1);
      }
      for (const item of items) {
        const [key, value] = item.split(':');
        if (value === undefined) continue;
        const name = base === undefined ? key.trim() : `${base}_${key.trim()}`;
        pairs.push([name.toLowerCase(), value]);
      }
    } else if (splits.length > 2) {
      const tokens = group.replace(/: /g, ' ').split(' ');
      for (let i = 0; i + 1 < tokens.length; i += 2) {
        pairs.push([tokens[i].toLowerCase(), tokens[i + 1]]);
      }
    }
  }
  return pairs;
}

/** `FrameCnt: 12, DiffTime: 33ms` (anything before `FrameCnt` is ignored). */
function parseMetaPairs(text: string): Array<[string, string]> {
  const start = text.indexOf('FrameCnt');
  const body = start >= 0 ? text.slice(start) : text.slice(text.indexOf('>') + 1);
  const pairs: Array<[string, string]> = [];
  for (const item of body.split(',')) {
    const colon = item.indexOf(':');
    if (colon < 0) continue;
    pairs.push([item.slice(0, colon).trim(), item.slice(colon + 1)]);
  }
  return pairs;
}

// ─── Parser ──────────────────────────────────────────────────────────────────

interface BlockDraft {
  builder: FrameBuilder;
  id: number;
  body: string;
  dropped: number;
}

function assignPair(draft: BlockDraft, rawKey: string, rawValue: string): void {
  const field = normalizeKey(rawKey);
  if (field.length === 0) return;
  const accepted = isTextField(field)
    ? draft.builder.assign(field, rawValue.trim())
    : draft.builder.assign(field, parseSubtitleValue(rawValue));
  if (!accepted) draft.dropped++;
}

export class SubtitleParser implements TelemetryParser {
  readonly settings: SubtitleSettings;

  constructor(settings: Partial<SubtitleSettings> = {}) {
    this.settings = { ...DEFAULT_SUBTITLE, ...settings };
  }

  *frames(source: LineSource, options: ParseOptions = {}): Generator<TelemetryFrame, void, undefined> {
    const { skip = 0, limit, logger = consoleLogger } = options;
    const { utcOffsetMinutes } = this.settings;
    const name = sourceName(source);

    let state: BlockState = 'index';
    let draft: BlockDraft | undefined;
    let blocks = 0;
    let produced = 0;
    let dropped = 0;
    let lineNo = 0;

    if (limit !== undefined && limit <= 0) return;

    for (const rawLine of readLines(source)) {
      lineNo++;
      const line = rawLine.trim();
      if (line.length === 0) continue;

      if (state === 'index' || draft === undefined) {
        const index = Number(line);
        if (!Number.isInteger(index)) {
          throw new MalformedInputError(`Expected caption index, got "${line}"`, name, lineNo);
        }
        blocks++;
        draft = { builder: new FrameBuilder(), id: index - 1, body: '', dropped: 0 };
        state = 'range';
        continue;
      }

      switch (state) {
        case 'range': {
          const range = parseTimeRange(line);
          if (!range) {
            throw new MalformedInputError(`Invalid caption time range "${line}"`, name, lineNo);
          }
          draft.builder.assign('startMs', range.startMs);
          draft.builder.assign('endMs', range.endMs);
          state = 'meta';
          break;
        }
        case 'meta': {
          const stamp = parseEmbeddedTimestamp(line, utcOffsetMinutes);
          if (line.includes('<font')) {
            const metaText = stamp === undefined ? line : line.slice(0, stamp.index);
            for (const [key, value] of parseMetaPairs(metaText)) assignPair(draft, key, value);
          } else if (stamp === undefined) {
            throw new MalformedInputError(`Expected caption metadata, got "${line}"`, name, lineNo);
          }
          if (stamp !== undefined) draft.builder.assign('timestamp', stamp.date);
          state = stamp === undefined ? 'timestamp' : 'body';
          break;
        }
        case 'timestamp': {
          const stamp = parseEmbeddedTimestamp(line, utcOffsetMinutes);
          if (stamp === undefined || stamp.index !== 0) {
            throw new MalformedInputError(`Invalid caption timestamp "${line}"`, name, lineNo);
          }
          draft.builder.assign('timestamp', stamp.date);
          state = 'body';
          break;
        }
        case 'body': {
          draft.body += `${line} `;
          if (!line.includes('</font>')) break;

          // Some firmware writes "[...]," between groups.
          const body = draft.body.replace(/<\/font>/g, '').replace(/\],/g, ']');
          for (const [key, value] of parseBracketGroups(body)) assignPair(draft, key, value);

          const frame = draft.builder.build(draft.id);
          dropped += draft.dropped;
          draft = undefined;
          state = 'index';

          if (blocks > skip) {
            yield frame;
            produced++;
            if (limit !== undefined && produced >= limit) {
              logSummary(logger, name, produced, dropped);
              return;
            }
          }
          break;
        }
      }
    }

    logSummary(logger, name, produced, dropped);
  }

  parse(source: LineSource, options: ParseOptions = {}): TelemetryFrame[] {
    return [...this.frames(source, options)];
  }
}

function logSummary(logger: Logger, name: string, produced: number, dropped: number): void {
  logger.log(
    `[Subtitle] Parsed ${produced} frames from ${name}` +
      (dropped > 0 ? ` (dropped ${dropped} values of unexpected type)` : ''),
  );
}

export function parseSubtitles(
  source: LineSource,
  options: ParseOptions & SubtitleSettings = {},
): TelemetryFrame[] {
  const { skip, limit, logger, ...settings } = options;
  return new SubtitleParser(settings).parse(source, { skip, limit, logger });
}

// ─── Segments ────────────────────────────────────────────────────────────────

export interface SubtitleSegments {
  /** Frames of each video, in input order. */
  segments: TelemetryFrame[][];
  /** All frames, concatenated. */
  frames: TelemetryFrame[];
  /** Video index of each entry of `frames`. */
  frameToVideo: number[];
}

/** Parse one subtitle file per recorded video. */
export function loadSubtitleSegments(
  sources: readonly LineSource[],
  settings: Partial<SubtitleSettings> = {},
  logger: Logger = consoleLogger,
): SubtitleSegments {
  const parser = new SubtitleParser(settings);
  const segments = sources.map((source) => parser.parse(source, { logger }));
  return {
    segments,
    frames: segments.flat(),
    frameToVideo: segments.flatMap((frames, video) => frames.map(() => video)),
  };
}

/**
 * Shift one timestamp field of every frame by `offsetS` seconds. Frames
 * without the field pass through unchanged.
 */
export function applyTimeOffset(
  frames: readonly TelemetryFrame[],
  offsetS: number,
  field: TimestampField = 'timestamp',
): TelemetryFrame[] {
  const offsetMs = offsetS * 1000;
  return frames.map((frame) => {
    const value = frame[field];
    if (value === undefined) return frame;
    return withTimestamp(frame, field, new Date(value.getTime() + offsetMs));
  });
}
