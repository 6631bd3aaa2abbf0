/**
 * aeropose — File access helpers
 *
 * Every helper owns its file descriptor for the duration of the call and
 * releases it on every exit path, including when a consumer abandons a
 * line generator half way through.
 */

import { closeSync, mkdirSync, openSync, readFileSync, readSync, writeFileSync } from 'node:fs';
import { FileAccessError } from './errors.js';

const CHUNK_SIZE = 64 * 1024;

/**
 * Anything a text parser can consume: a file path, or lines already in
 * memory (e.g. `text.split('\n')`).
 */
export type LineSource = string | Iterable<string>;

export function sourceName(source: LineSource): string {
  return typeof source === 'string' ? source : '<memory>';
}

/** Split in-memory text into lines (handles \r\n). */
export function linesOf(text: string): string[] {
  return text.split(/\r?\n/);
}

function openForRead(path: string): number {
  try {
    return openSync(path, 'r');
  } catch (err) {
    throw new FileAccessError(path, 'read', err);
  }
}

/**
 * Lazily read a UTF-8 file line by line. Line terminators are stripped.
 */
export function* readFileLines(path: string): Generator<string, void, undefined> {
  const fd = openForRead(path);
  try {
    const decoder = new TextDecoder('utf-8');
    const chunk = new Uint8Array(CHUNK_SIZE);
    let pending = '';
    for (;;) {
      let n: number;
      try {
        n = readSync(fd, chunk, 0, CHUNK_SIZE, null);
      } catch (err) {
        throw new FileAccessError(path, 'read', err);
      }
      if (n === 0) break;
      pending += decoder.decode(chunk.subarray(0, n), { stream: true });
      let nl = pending.indexOf('\n');
      while (nl >= 0) {
        yield pending.slice(0, nl).replace(/\r$/, '');
        pending = pending.slice(nl + 1);
        nl = pending.indexOf('\n');
      }
    }
    pending += decoder.decode();
    if (pending.length > 0) yield pending.replace(/\r$/, '');
  } finally {
    closeSync(fd);
  }
}

export function readLines(source: LineSource): Iterable<string> {
  return typeof source === 'string' ? readFileLines(source) : source;
}

export function readFileBytes(path: string): Uint8Array {
  try {
    return new Uint8Array(readFileSync(path));
  } catch (err) {
    throw new FileAccessError(path, 'read', err);
  }
}

export function readFileText(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (err) {
    throw new FileAccessError(path, 'read', err);
  }
}

export function writeFileContents(path: string, contents: string | Uint8Array): void {
  try {
    writeFileSync(path, contents);
  } catch (err) {
    throw new FileAccessError(path, 'write', err);
  }
}

export function ensureDirectory(path: string): void {
  try {
    mkdirSync(path, { recursive: true });
  } catch (err) {
    throw new FileAccessError(path, 'write', err);
  }
}
