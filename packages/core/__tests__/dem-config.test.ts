import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ZERO_ORIGIN, loadSceneOrigin, parseDemConfig } from '../src/dem-config.js';
import type { Logger } from '../src/logger.js';
import { projectUtm } from '../src/utm.js';

function capture(): Logger & { logs: string[]; warnings: string[] } {
  const logs: string[] = [];
  const warnings: string[] = [];
  return { logs, warnings, log: (m) => logs.push(m), warn: (m) => warnings.push(m) };
}

describe('loadSceneOrigin', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'aeropose-dem-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('projects the configured origin', () => {
    const path = join(dir, 'dem.json');
    writeFileSync(path, JSON.stringify({ origin_wgs84: { longitude: 15.1, latitude: 47.2, altitude: 410 } }));
    const logger = capture();

    const origin = loadSceneOrigin(path, undefined, logger);

    expect(origin).toEqual({
      wgs84: { longitude: 15.1, latitude: 47.2, altitude: 410 },
      projected: projectUtm(47.2, 15.1),
      altitude: 410,
    });
    expect(logger.warnings).toEqual([]);
    expect(logger.logs).toHaveLength(1);
    expect(logger.logs[0]).toMatch(/^\[Config\] Origin 410m at E\d+\.\d{2} N\d+\.\d{2}$/);
  });

  it('falls back to the zero origin when the file is missing', () => {
    const path = join(dir, 'missing.json');
    const logger = capture();

    expect(loadSceneOrigin(path, undefined, logger)).toBe(ZERO_ORIGIN);
    expect(logger.warnings).toHaveLength(1);
    expect(logger.warnings[0]).toMatch(/^\[Config\] Cannot read .*missing\.json: .*; using zero origin$/);
  });

  it('falls back to the zero origin on invalid JSON', () => {
    const path = join(dir, 'dem.json');
    writeFileSync(path, '{ origin_wgs84: ');
    const logger = capture();

    expect(loadSceneOrigin(path, undefined, logger)).toBe(ZERO_ORIGIN);
    expect(logger.warnings).toEqual([`[Config] Invalid JSON in ${path}; using zero origin`]);
  });

  it('falls back to the zero origin when a field is missing', () => {
    const path = join(dir, 'dem.json');
    writeFileSync(path, JSON.stringify({ origin_wgs84: { longitude: 15.1, latitude: 47.2 } }));
    const logger = capture();

    expect(loadSceneOrigin(path, undefined, logger)).toBe(ZERO_ORIGIN);
    expect(logger.warnings).toHaveLength(1);
    expect(logger.warnings[0]).toMatch(
      new RegExp(`^\\[Config\\] Invalid DEM config .*dem\\.json \\(origin_wgs84\\.altitude: .*\\); using zero origin$`),
    );
  });
});

describe('parseDemConfig', () => {
  it('accepts a valid document', () => {
    expect(parseDemConfig({ origin_wgs84: { longitude: -3, latitude: 40, altitude: 0 } }).origin_wgs84.latitude).toBe(40);
  });

  it('rejects out-of-range coordinates', () => {
    expect(() => parseDemConfig({ origin_wgs84: { longitude: 200, latitude: 40, altitude: 0 } })).toThrow();
  });
});
