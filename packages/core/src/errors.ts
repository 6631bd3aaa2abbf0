/**
 * aeropose — Error taxonomy
 *
 * Data problems and path problems are kept apart: everything thrown for
 * unreadable content derives from AeroposeError, while failures of the
 * file system surface as FileAccessError so callers can tell a bad path
 * from a bad file.
 */

export class AeroposeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AeroposeError';
  }
}

/** A row, line, cell or byte sequence could not be decoded. */
export class MalformedInputError extends AeroposeError {
  constructor(
    message: string,
    public readonly source?: string,
    public readonly line?: number,
  ) {
    super(
      source === undefined
        ? message
        : `${message} (${source}${line === undefined ? '' : `:${line}`})`,
    );
    this.name = 'MalformedInputError';
  }
}

/** Camera model outside the fixed set, or a camera layout the caller cannot handle. */
export class UnsupportedModelError extends AeroposeError {
  constructor(
    message: string,
    public readonly model?: string | number,
  ) {
    super(message);
    this.name = 'UnsupportedModelError';
  }
}

export class SynchronizationError extends AeroposeError {
  constructor(
    message: string,
    public readonly target?: Date,
    public readonly candidate?: Date,
    public readonly toleranceS?: number,
  ) {
    super(message);
    this.name = 'SynchronizationError';
  }
}

export class DegenerateGeometryError extends AeroposeError {
  constructor(
    message: string,
    public readonly axes: readonly string[],
  ) {
    super(message);
    this.name = 'DegenerateGeometryError';
  }
}

/** A count or length inside an entity disagrees with what its layout requires. */
export class FormatMismatchError extends AeroposeError {
  constructor(
    public readonly entity: string,
    public readonly identifier: number,
    public readonly expected: number,
    public readonly actual: number,
    detail: string,
  ) {
    super(`${entity} ${identifier}: ${detail} (expected ${expected}, got ${actual})`);
    this.name = 'FormatMismatchError';
  }
}

export class FileAccessError extends Error {
  constructor(
    public readonly path: string,
    public readonly operation: 'read' | 'write',
    public readonly cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot ${operation} ${path}: ${reason}`);
    this.name = 'FileAccessError';
  }
}
